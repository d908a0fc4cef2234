import type { Command } from "commander";
import {
  loadEffectiveMapping,
  resolveCandidatePaths,
  type LoadedConfig,
  type ScriptRuntime
} from "@git-bump/engine";
import type { CliContainer } from "../container.js";
import type { ScopedLogger } from "../logger.js";
import { locateRepository, type RepositoryLocation } from "../repository.js";

export interface CommandFlags {
  listFiles: boolean;
  printSampleConfig: boolean;
  requireConfig: boolean;
  trailingNewline: boolean;
  verbose: boolean;
}

export function resolveCommandFlags(program: Command): CommandFlags {
  const opts = program.opts();
  return {
    listFiles: Boolean(opts.listFiles),
    printSampleConfig: Boolean(opts.printSampleConfig),
    requireConfig: Boolean(opts.requireConfig),
    trailingNewline: Boolean(opts.trailingNewline),
    verbose: Boolean(opts.verbose)
  };
}

export function createCommandLogger(
  container: CliContainer,
  flags: CommandFlags,
  scope: string
): ScopedLogger {
  return container.loggerFactory.create({ verbose: flags.verbose, scope });
}

export interface ConfigSession {
  repository: RepositoryLocation;
  config: LoadedConfig;
  runtime: ScriptRuntime;
}

/**
 * Locate the repository, load every config source into a fresh runtime and
 * hand the result to `work`. The runtime is closed when `work` settles.
 */
export async function withConfigSession<T>(
  container: CliContainer,
  flags: CommandFlags,
  logger: ScopedLogger,
  work: (session: ConfigSession) => Promise<T>
): Promise<T> {
  const repository = await locateRepository(container.env.cwd, container.exec);
  logger.verbose(`Repository root: ${repository.workTree}`);

  const candidates = resolveCandidatePaths({
    homeDir: container.env.homeDir,
    gitDir: repository.gitDir,
    workTree: repository.workTree
  });

  const runtime = await container.createRuntime();
  try {
    const config = await loadEffectiveMapping({
      candidates,
      runtime,
      fs: container.fs,
      requireConfig: flags.requireConfig
    });
    for (const source of config.sources) {
      logger.verbose(`Loaded ${source.kind} config ${source.path}`);
    }
    return await work({ repository, config, runtime });
  } finally {
    runtime.close();
  }
}
