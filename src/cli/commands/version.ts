import type { Command } from "commander";
import type { CliContainer } from "../container.js";
import { VersionExit } from "../exit-signals.js";

export function registerVersionOption(
  program: Command,
  container: CliContainer,
  currentVersion: string
): void {
  program.option("-V, --version", "Output the version number");

  program.hook("preAction", (thisCommand) => {
    if (thisCommand.opts().version) {
      container.loggerFactory
        .create({ scope: "version" })
        .info(`git-bump ${currentVersion}`);
      throw new VersionExit();
    }
  });
}
