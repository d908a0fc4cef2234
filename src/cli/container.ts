import { execSync } from "node:child_process";
import {
  createHostCommandRunner,
  createLuaRuntime,
  type BumpFileSystem,
  type RuntimeFactory
} from "@git-bump/engine";
import { getTheme, resolveOutputFormat } from "@git-bump/design-system";
import {
  createCliEnvironment,
  type CliEnvironment,
  type CliEnvironmentInit
} from "./environment.js";
import { createLoggerFactory, type LoggerFactory, type LoggerFn } from "./logger.js";
import type { ExecFn } from "./repository.js";

export interface CliDependencies {
  fs: BumpFileSystem;
  env: CliEnvironmentInit;
  /** Runs `git`; defaults to a synchronous shell call. */
  exec?: ExecFn;
  /** Creates the Lua runtime for one run; defaults to wasmoon with host commands. */
  createRuntime?: RuntimeFactory;
  logger?: LoggerFn;
  /** Receives machine-readable output (file lists, the sample config). */
  stdout?: (text: string) => void;
  exitOverride?: boolean;
  suppressCommanderOutput?: boolean;
}

export interface CliContainer {
  env: CliEnvironment;
  fs: BumpFileSystem;
  exec: ExecFn;
  createRuntime: RuntimeFactory;
  loggerFactory: LoggerFactory;
  stdout: (text: string) => void;
}

export function createCliContainer(dependencies: CliDependencies): CliContainer {
  const env = createCliEnvironment(dependencies.env);

  // Both are cached per process; resolve them from the injected variables first.
  resolveOutputFormat(env.variables);
  getTheme(env.variables);

  return {
    env,
    fs: dependencies.fs,
    exec: dependencies.exec ?? createShellExec(),
    createRuntime:
      dependencies.createRuntime ??
      (() =>
        createLuaRuntime({ hostCommands: createHostCommandRunner(env.cwd) })),
    loggerFactory: createLoggerFactory(dependencies.logger),
    stdout: dependencies.stdout ?? ((text) => process.stdout.write(text))
  };
}

function createShellExec(): ExecFn {
  return async (command, options) => ({
    stdout: execSync(command, {
      cwd: options?.cwd,
      encoding: "utf8",
      stdio: ["ignore", "pipe", "pipe"]
    }),
    stderr: ""
  });
}
