import * as nodeFs from "node:fs/promises";
import { realpathSync } from "node:fs";
import { homedir } from "node:os";
import { pathToFileURL } from "node:url";
import { log } from "@git-bump/design-system";
import { BumpError, type BumpFileSystem } from "@git-bump/engine";
import type { Command } from "commander";
import { CliError, SilentError } from "./errors.js";
import type { CliDependencies } from "./program.js";

const fsAdapter: BumpFileSystem = {
  readFile: (path) => nodeFs.readFile(path),
  writeFile: (path, content, options) =>
    nodeFs.writeFile(path, content, options),
  stat: (path) => nodeFs.stat(path),
  access: (path, mode) => nodeFs.access(path, mode)
};

export function createCliMain(
  programFactory: (dependencies: CliDependencies) => Command
): () => Promise<void> {
  return async function runCli(): Promise<void> {
    const program = programFactory({
      fs: fsAdapter,
      env: {
        cwd: process.cwd(),
        homeDir: homedir(),
        variables: process.env
      },
      exitOverride: false
    });

    try {
      await program.parseAsync(process.argv);
    } catch (error) {
      if (error instanceof SilentError) {
        return;
      }
      if (error instanceof Error) {
        if (isUserFacing(error)) {
          log.error(error.message);
        } else {
          log.error(`Error: ${error.message}`);
        }
        process.exit(1);
      }
      throw error;
    }
  };
}

function isUserFacing(error: Error): boolean {
  if (error instanceof CliError) {
    return error.isUserError;
  }
  return error instanceof BumpError;
}

export function isCliInvocation(
  argv: string[],
  moduleUrl: string,
  realpath: (path: string) => string = realpathSync
): boolean {
  const entry = argv.at(1);
  if (typeof entry !== "string") {
    return false;
  }

  const candidates = [pathToFileURL(entry).href];

  try {
    candidates.push(pathToFileURL(realpath(entry)).href);
  } catch {
    // Unresolvable entry; compare the direct path only.
  }

  return candidates.includes(moduleUrl);
}
