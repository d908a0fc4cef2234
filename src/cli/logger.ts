import {
  intro as designIntro,
  log,
  outro as designOutro,
  resolveOutputFormat,
  symbols
} from "@git-bump/design-system";
import chalk from "chalk";

export type LoggerFn = (message: string) => void;

export interface LoggerContext {
  verbose?: boolean;
  scope?: string;
}

export interface ScopedLogger {
  readonly context: Required<Pick<LoggerContext, "verbose">> &
    Pick<LoggerContext, "scope">;
  info(message: string): void;
  success(message: string): void;
  skipped(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  verbose(message: string): void;
  intro(title: string): void;
  outro(message: string): void;
}

export interface LoggerFactory {
  create(context?: LoggerContext): ScopedLogger;
}

type Level = "info" | "success" | "skipped" | "warn" | "error";

export function createLoggerFactory(emitter?: LoggerFn): LoggerFactory {
  const emit = (level: Level, message: string): void => {
    if (emitter) {
      emitter(message);
      return;
    }
    if (resolveOutputFormat() !== "terminal") {
      process.stdout.write(message + "\n");
      return;
    }
    switch (level) {
      case "success":
        log.message(message, { symbol: symbols.updated });
        return;
      case "skipped":
        log.message(message, { symbol: symbols.skipped });
        return;
      case "warn":
        log.warn(message);
        return;
      case "error":
        log.error(message);
        return;
      case "info":
        log.message(message, { symbol: symbols.info });
    }
  };

  const create = (context: LoggerContext = {}): ScopedLogger => {
    const verbose = context.verbose ?? false;
    const scope = context.scope;
    const formatMessage = (message: string): string =>
      scope && verbose ? `[${scope}] ${message}` : message;

    return {
      context: { verbose, scope },
      info(message) {
        emit("info", formatMessage(message));
      },
      success(message) {
        emit("success", message);
      },
      skipped(message) {
        emit("skipped", message);
      },
      warn(message) {
        emit("warn", formatMessage(message));
      },
      error(message) {
        emit("error", formatMessage(message));
      },
      verbose(message) {
        if (!verbose) {
          return;
        }
        if (emitter) {
          emitter(formatMessage(message));
          return;
        }
        if (resolveOutputFormat() !== "terminal") {
          process.stdout.write(formatMessage(message) + "\n");
          return;
        }
        log.message(formatMessage(message), { symbol: chalk.gray(symbols.bar) });
      },
      intro(title) {
        if (emitter) {
          emitter(title);
          return;
        }
        designIntro(title);
      },
      outro(message) {
        if (emitter) {
          emitter(message);
          return;
        }
        designOutro(message);
      }
    };
  };

  return { create };
}
