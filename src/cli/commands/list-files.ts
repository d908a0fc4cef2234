import { listTargets } from "@git-bump/engine";
import type { CliContainer } from "../container.js";
import {
  createCommandLogger,
  withConfigSession,
  type CommandFlags
} from "./shared.js";

export async function runListFilesCommand(
  container: CliContainer,
  flags: CommandFlags
): Promise<void> {
  const logger = createCommandLogger(container, flags, "list-files");

  await withConfigSession(container, flags, logger, async (session) => {
    if (session.config.sources.length === 0) {
      logger.verbose("No config files found.");
      return;
    }
    for (const target of listTargets(
      session.config.mapping,
      session.repository.workTree
    )) {
      container.stdout(`${target}\n`);
    }
  });
}
