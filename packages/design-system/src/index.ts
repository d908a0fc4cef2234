// Tokens
export { brand, dark, light } from "./tokens/colors.js";
export type { ThemeName, ThemePalette } from "./tokens/colors.js";

// Components
export { text } from "./components/text.js";
export { symbols } from "./components/symbols.js";

// Terminal output
export { intro, outro, log, stripAnsi } from "./terminal/index.js";

// Internal utilities
export { getTheme, resolveThemeName, resetThemeCache } from "./internal/theme-detect.js";
export type { ThemeEnv } from "./internal/theme-detect.js";
export {
  OUTPUT_FORMATS,
  resolveOutputFormat,
  resetOutputFormatCache
} from "./internal/output-format.js";
export type { OutputFormat } from "./internal/output-format.js";
