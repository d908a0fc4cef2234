import { BareRepositoryError, NotARepositoryError } from "./errors.js";

export type ExecResult = {
  stdout: string;
  stderr: string;
};

export type ExecFn = (
  command: string,
  options?: { cwd?: string }
) => Promise<ExecResult>;

export interface RepositoryLocation {
  /** Working tree root; target paths resolve against it */
  workTree: string;
  /** Absolute path of the repository metadata directory */
  gitDir: string;
}

export async function locateRepository(
  cwd: string,
  exec: ExecFn
): Promise<RepositoryLocation> {
  const [bare, gitDir] = await revParse(
    cwd,
    exec,
    "--is-bare-repository --absolute-git-dir"
  );
  if (bare === "true") {
    throw new BareRepositoryError(gitDir ?? cwd);
  }

  const [workTree] = await revParse(cwd, exec, "--show-toplevel");
  if (!gitDir || !workTree) {
    throw new NotARepositoryError(cwd);
  }

  return { workTree, gitDir };
}

async function revParse(
  cwd: string,
  exec: ExecFn,
  args: string
): Promise<string[]> {
  try {
    const { stdout } = await exec(`git rev-parse ${args}`, { cwd });
    return stdout
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  } catch (error) {
    throw new NotARepositoryError(cwd, { cause: error });
  }
}
