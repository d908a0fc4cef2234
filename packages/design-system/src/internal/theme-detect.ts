import { dark, light, type ThemeName, type ThemePalette } from "../tokens/colors.js";

export interface ThemeEnv {
  GIT_BUMP_THEME?: string;
  APPLE_INTERFACE_STYLE?: string;
  VSCODE_COLOR_THEME_KIND?: string;
  COLORFGBG?: string;
}

function parseThemeName(value: string | undefined): ThemeName | undefined {
  const normalized = value?.trim().toLowerCase();
  if (normalized === "light" || normalized === "dark") {
    return normalized;
  }
  return undefined;
}

function detectThemeFromEnv(env: ThemeEnv): ThemeName | undefined {
  if (typeof env.APPLE_INTERFACE_STYLE === "string") {
    return parseThemeName(env.APPLE_INTERFACE_STYLE) ?? "light";
  }

  const vscodeKind = env.VSCODE_COLOR_THEME_KIND?.toLowerCase();
  if (vscodeKind?.includes("light")) {
    return "light";
  }
  if (vscodeKind?.includes("dark")) {
    return "dark";
  }

  // COLORFGBG is "<fg>;<bg>" (sometimes "<fg>;<default>;<bg>")
  const background = Number.parseInt(env.COLORFGBG?.split(";").at(-1) ?? "", 10);
  if (Number.isFinite(background)) {
    return background >= 8 ? "light" : "dark";
  }

  return undefined;
}

export function resolveThemeName(env: ThemeEnv = process.env): ThemeName {
  return parseThemeName(env.GIT_BUMP_THEME) ?? detectThemeFromEnv(env) ?? "dark";
}

let cachedTheme: ThemePalette | undefined;

export function getTheme(env?: ThemeEnv): ThemePalette {
  if (!cachedTheme) {
    cachedTheme = resolveThemeName(env) === "light" ? light : dark;
  }
  return cachedTheme;
}

export function resetThemeCache(): void {
  cachedTheme = undefined;
}
