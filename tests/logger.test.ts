import { describe, it, expect, vi, beforeEach } from "vitest";
import chalk from "chalk";

const logMessage = vi.hoisted(() => vi.fn());
const logWarn = vi.hoisted(() => vi.fn());
const logError = vi.hoisted(() => vi.fn());
const introFn = vi.hoisted(() => vi.fn());
const outroFn = vi.hoisted(() => vi.fn());

vi.mock("@clack/prompts", () => ({
  log: {
    message: logMessage,
    warn: logWarn,
    error: logError
  },
  intro: introFn,
  outro: outroFn
}));

import {
  dark,
  getTheme,
  resetOutputFormatCache,
  resetThemeCache,
  resolveOutputFormat
} from "@git-bump/design-system";
import { createLoggerFactory } from "../src/cli/logger.js";

describe("createLoggerFactory", () => {
  beforeEach(() => {
    logMessage.mockClear();
    logWarn.mockClear();
    logError.mockClear();
    introFn.mockClear();
    outroFn.mockClear();
    resetOutputFormatCache();
    resetThemeCache();
    resolveOutputFormat({});
    getTheme({});
  });

  it("renders report lines with the palette symbols", () => {
    const logger = createLoggerFactory().create();

    logger.info("Hello");
    logger.success("Updated VERSION");
    logger.skipped("Skipped missing.txt (file not found)");

    expect(logMessage).toHaveBeenNthCalledWith(1, "Hello", {
      symbol: chalk.red("●")
    });
    expect(logMessage).toHaveBeenNthCalledWith(2, "Updated VERSION", {
      symbol: dark.updatedSymbol
    });
    expect(logMessage).toHaveBeenNthCalledWith(
      3,
      "Skipped missing.txt (file not found)",
      { symbol: dark.skippedSymbol }
    );
  });

  it("routes warnings and errors to the matching clack log level", () => {
    const logger = createLoggerFactory().create();

    logger.warn("No config files found, nothing to bump.");
    logger.error("Failed");

    expect(logWarn).toHaveBeenCalledWith("No config files found, nothing to bump.");
    expect(logError).toHaveBeenCalledWith("Failed");
  });

  it("renders intro and outro through clack", () => {
    const logger = createLoggerFactory().create();

    logger.intro("bump to 1.2.3");
    logger.outro("Bumped 1 file to 1.2.3");

    expect(introFn).toHaveBeenCalledWith(dark.intro("bump to 1.2.3"));
    expect(outroFn).toHaveBeenCalledWith("Bumped 1 file to 1.2.3");
  });

  it("renders verbose messages with a bar when verbose is enabled", () => {
    const logger = createLoggerFactory().create({ verbose: true });

    logger.verbose("Processing /repo/VERSION");

    expect(logMessage).toHaveBeenCalledWith("Processing /repo/VERSION", {
      symbol: chalk.gray("│")
    });
  });

  it("does not render verbose messages when verbose is disabled", () => {
    const emitter = vi.fn();
    const logger = createLoggerFactory(emitter).create({ verbose: false });

    logger.verbose("Processing /repo/VERSION");

    expect(emitter).not.toHaveBeenCalled();
    expect(logMessage).not.toHaveBeenCalled();
  });

  it("prefixes the scope only in verbose mode", () => {
    const emitter = vi.fn();
    const factory = createLoggerFactory(emitter);

    factory.create({ scope: "bump" }).info("Quiet");
    factory.create({ scope: "bump", verbose: true }).info("Loud");

    expect(emitter).toHaveBeenNthCalledWith(1, "Quiet");
    expect(emitter).toHaveBeenNthCalledWith(2, "[bump] Loud");
  });

  it("keeps per-file report lines unprefixed", () => {
    const emitter = vi.fn();
    const logger = createLoggerFactory(emitter).create({
      scope: "bump",
      verbose: true
    });

    logger.success("Updated VERSION");
    logger.skipped("Skipped missing.txt (file not found)");

    expect(emitter.mock.calls).toEqual([
      ["Updated VERSION"],
      ["Skipped missing.txt (file not found)"]
    ]);
  });

  it("writes plain lines to stdout for non-terminal formats", () => {
    resetOutputFormatCache();
    resolveOutputFormat({ OUTPUT_FORMAT: "markdown" });
    const write = vi
      .spyOn(process.stdout, "write")
      .mockImplementation(() => true);

    try {
      createLoggerFactory().create().warn("plain");

      expect(write).toHaveBeenCalledWith("plain\n");
      expect(logWarn).not.toHaveBeenCalled();
    } finally {
      write.mockRestore();
    }
  });
});
