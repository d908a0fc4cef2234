import chalk from "chalk";

export const brand = "#f05133";

export const dark = {
  header: (text: string) => chalk.redBright.bold(text),
  section: (text: string) => chalk.bold(text),
  muted: (text: string) => chalk.dim(text),
  intro: (text: string) => chalk.bgRed.white(` git-bump - ${text} `),
  updatedSymbol: chalk.green("◆"),
  skippedSymbol: chalk.dim("○")
};

export const light = {
  header: (text: string) => chalk.hex(brand).bold(text),
  section: (text: string) => chalk.bold(text),
  muted: (text: string) => chalk.hex("#666666")(text),
  intro: (text: string) => chalk.bgHex(brand).white(` git-bump - ${text} `),
  updatedSymbol: chalk.hex("#008800")("◆"),
  skippedSymbol: chalk.hex("#666666")("○")
};

export type ThemeName = "dark" | "light";
export type ThemePalette = typeof dark;
