export const OUTPUT_FORMATS = ["terminal", "markdown", "json"] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

function isOutputFormat(value: string | undefined): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

let cached: OutputFormat | undefined;

/**
 * Read `OUTPUT_FORMAT` once per process. Unknown values fall back to
 * `"terminal"`.
 */
export function resolveOutputFormat(
  env: { OUTPUT_FORMAT?: string } = process.env
): OutputFormat {
  if (cached) {
    return cached;
  }
  const raw = env.OUTPUT_FORMAT?.trim().toLowerCase();
  cached = isOutputFormat(raw) ? raw : "terminal";
  return cached;
}

export function resetOutputFormatCache(): void {
  cached = undefined;
}
