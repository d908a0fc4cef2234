import { runBump, type BumpReport } from "@git-bump/engine";
import type { CliContainer } from "../container.js";
import type { ScopedLogger } from "../logger.js";
import {
  createCommandLogger,
  withConfigSession,
  type CommandFlags
} from "./shared.js";

export async function runBumpCommand(
  container: CliContainer,
  flags: CommandFlags,
  version: string
): Promise<void> {
  const logger = createCommandLogger(container, flags, "bump");
  logger.intro(`bump to ${version}`);

  await withConfigSession(container, flags, logger, async (session) => {
    if (session.config.sources.length === 0) {
      logger.warn("No config files found, nothing to bump.");
      return;
    }

    const run = await runBump(session.config.mapping, {
      version,
      repoRoot: session.repository.workTree,
      runtime: session.runtime,
      fs: container.fs,
      ensureTrailingNewline: flags.trailingNewline,
      observers: {
        onStart: (target) => logger.verbose(`Processing ${target.path}`),
        onComplete: (report) => logReport(logger, report)
      }
    });

    if (run.failure) {
      throw run.failure.error;
    }

    const updated = run.reports.filter(
      (report) => report.status === "updated"
    ).length;
    logger.outro(
      `Bumped ${updated} ${updated === 1 ? "file" : "files"} to ${version}`
    );
  });
}

function logReport(logger: ScopedLogger, report: BumpReport): void {
  switch (report.status) {
    case "updated":
      logger.success(`Updated ${report.file}`);
      return;
    case "skipped-missing":
      logger.skipped(`Skipped ${report.file} (file not found)`);
      return;
    case "failed":
      logger.verbose(`Failed ${report.file} (${report.reason})`);
  }
}
