import { readFile } from "node:fs/promises";
import path from "node:path";
import type { EffectiveMapping } from "./types.js";

const SAMPLE_CONFIG_URL = new URL(
  "../templates/sample-config.lua",
  import.meta.url
);

/**
 * Absolute paths of every configured file, in mapping order, whether or not
 * the file exists.
 */
export function listTargets(
  effective: EffectiveMapping,
  repoRoot: string
): string[] {
  return Array.from(effective.keys(), (file) => path.resolve(repoRoot, file));
}

let sampleConfigCache: string | null = null;

export async function loadSampleConfig(): Promise<string> {
  if (sampleConfigCache === null) {
    sampleConfigCache = await readFile(SAMPLE_CONFIG_URL, "utf8");
  }
  return sampleConfigCache;
}
