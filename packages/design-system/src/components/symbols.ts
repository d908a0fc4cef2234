import chalk from "chalk";
import { getTheme } from "../internal/theme-detect.js";

export const symbols = {
  get info(): string {
    return chalk.red("●");
  },
  get updated(): string {
    return getTheme().updatedSymbol;
  },
  get skipped(): string {
    return getTheme().skippedSymbol;
  },
  bar: "│"
} as const;
