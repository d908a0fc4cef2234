import { Command } from "commander";
import { createRequire } from "node:module";
import { text } from "@git-bump/design-system";
import {
  createCliContainer,
  type CliContainer,
  type CliDependencies
} from "./container.js";
import { ValidationError } from "./errors.js";
import { runBumpCommand } from "./commands/bump.js";
import { runListFilesCommand } from "./commands/list-files.js";
import { runSampleConfigCommand } from "./commands/sample-config.js";
import { resolveCommandFlags, type CommandFlags } from "./commands/shared.js";
import { registerVersionOption } from "./commands/version.js";

const require = createRequire(import.meta.url);
const packageJson = require("../../package.json") as { version: string };

const USAGE = "<NEW_VERSION|--list-files|--print-sample-config>";

function formatHelpText(): string {
  const opt = (flag: string, desc: string) =>
    `  ${text.option(flag.padEnd(23))}${desc}`;

  return [
    text.heading("Bump version strings across the files of a Git repository."),
    "",
    `${text.section("Usage:")} ${text.usageCommand("git-bump")} ${text.argument(USAGE)}`,
    "",
    text.section("Arguments:"),
    `  ${text.argument("[NEW_VERSION]".padEnd(23))}Version to set`,
    "",
    text.section("Options:"),
    opt("--list-files", "List files that would be updated"),
    opt("--print-sample-config", "Print sample config file"),
    opt("--require-config", "Fail when no config file is found"),
    opt("--trailing-newline", "Append a final newline to written files when missing"),
    opt("--verbose", "Show verbose logs"),
    opt("-V, --version", "Output the version number"),
    opt("-h, --help", "Display help for command"),
    "",
    text.section("Config files (later ones override earlier ones):"),
    `  ${text.muted("~/.git-bump.lua")}`,
    `  ${text.muted("$GIT_DIR/git-bump.lua")}`,
    `  ${text.muted("<repository root>/.git-bump.lua")}`,
    "",
    `${text.muted("Example:")} ${text.example("git-bump 1.2.3")}`
  ].join("\n");
}

export function createProgram(dependencies: CliDependencies): Command {
  const container = createCliContainer(dependencies);
  const program = bootstrapProgram(container);

  if (dependencies.exitOverride ?? true) {
    program.exitOverride();
  }

  if (dependencies.suppressCommanderOutput) {
    program.configureOutput({
      writeOut: () => {},
      writeErr: () => {}
    });
  }

  return program;
}

function bootstrapProgram(container: CliContainer): Command {
  const program = new Command();
  program
    .name("git-bump")
    .description("Bump version strings across the files of a Git repository.")
    .usage(USAGE)
    .argument("[NEW_VERSION]", "Version to set")
    .option("--list-files", "List files that would be updated")
    .option("--print-sample-config", "Print sample config file")
    .option("--require-config", "Fail when no config file is found")
    .option(
      "--trailing-newline",
      "Append a final newline to written files when missing"
    )
    .option("--verbose", "Show verbose logs")
    .helpOption("-h, --help", "Display help for command")
    .configureHelp({
      formatHelp: () => formatHelpText()
    });

  registerVersionOption(program, container, packageJson.version);

  program.action(async (newVersion: string | undefined) => {
    const flags = resolveCommandFlags(program);
    const mode = resolveMode(newVersion, flags);

    switch (mode.kind) {
      case "bump":
        await runBumpCommand(container, flags, mode.version);
        return;
      case "list-files":
        await runListFilesCommand(container, flags);
        return;
      case "print-sample-config":
        await runSampleConfigCommand(container);
    }
  });

  return program;
}

type Mode =
  | { kind: "bump"; version: string }
  | { kind: "list-files" }
  | { kind: "print-sample-config" };

/**
 * Exactly one of NEW_VERSION, --list-files and --print-sample-config must be
 * given.
 */
export function resolveMode(
  newVersion: string | undefined,
  flags: Pick<CommandFlags, "listFiles" | "printSampleConfig">
): Mode {
  const modes: Mode[] = [];
  if (newVersion !== undefined) {
    modes.push({ kind: "bump", version: newVersion });
  }
  if (flags.listFiles) {
    modes.push({ kind: "list-files" });
  }
  if (flags.printSampleConfig) {
    modes.push({ kind: "print-sample-config" });
  }

  const [mode] = modes;
  if (!mode || modes.length > 1) {
    throw new ValidationError(`Usage: git-bump ${USAGE}`);
  }
  return mode;
}

export type { CliDependencies };
