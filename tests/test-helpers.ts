import { vi } from "vitest";
import { Volume, createFsFromVolume } from "memfs";
import { LuaFactory } from "wasmoon";
import { createLuaRuntime, type BumpFileSystem } from "@git-bump/engine";
import { createProgram } from "../src/cli/program.js";
import type { ExecFn } from "../src/cli/repository.js";

export const homeDir = "/home/test";
export const repoRoot = "/repo";
export const gitDir = "/repo/.git";

const factory = new LuaFactory();

export function createRepoFs(files: Record<string, string> = {}): {
  fs: BumpFileSystem;
  vol: Volume;
} {
  const vol = Volume.fromJSON(files, "/");
  vol.mkdirSync(homeDir, { recursive: true });
  vol.mkdirSync(gitDir, { recursive: true });
  return {
    fs: createFsFromVolume(vol).promises as unknown as BumpFileSystem,
    vol
  };
}

export function createGitExec(
  location: { workTree: string; gitDir: string; bare?: boolean } = {
    workTree: repoRoot,
    gitDir
  }
) {
  return vi.fn<ExecFn>(async (command) => {
    if (command === "git rev-parse --is-bare-repository --absolute-git-dir") {
      return {
        stdout: `${location.bare ? "true" : "false"}\n${location.gitDir}\n`,
        stderr: ""
      };
    }
    if (command === "git rev-parse --show-toplevel") {
      return { stdout: `${location.workTree}\n`, stderr: "" };
    }
    throw new Error(`Unexpected command: ${command}`);
  });
}

export interface CliHarness {
  logs: string[];
  output: string[];
  run(args: string[]): Promise<void>;
}

export function createCliHarness(options: {
  fs: BumpFileSystem;
  exec?: ExecFn;
  cwd?: string;
}): CliHarness {
  const logs: string[] = [];
  const output: string[] = [];
  const program = createProgram({
    fs: options.fs,
    env: { cwd: options.cwd ?? repoRoot, homeDir, variables: {} },
    exec: options.exec ?? createGitExec(),
    createRuntime: () => createLuaRuntime({ factory }),
    logger: (message) => {
      logs.push(message);
    },
    stdout: (text) => {
      output.push(text);
    },
    suppressCommanderOutput: true
  });

  return {
    logs,
    output,
    async run(args) {
      await program.parseAsync(["node", "git-bump", ...args]);
    }
  };
}

export { stripAnsi } from "@git-bump/design-system";
