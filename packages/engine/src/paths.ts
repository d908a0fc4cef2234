import path from "node:path";
import { isReadableFile } from "./fs-utils.js";
import type { BumpFileSystem, CandidatePath } from "./types.js";

export const USER_CONFIG_FILENAME = ".git-bump.lua";
export const PRIVATE_CONFIG_FILENAME = "git-bump.lua";
export const SHARED_CONFIG_FILENAME = ".git-bump.lua";

export interface CandidateLocations {
  homeDir: string;
  /** Repository metadata directory ($GIT_DIR) */
  gitDir: string;
  /** Working tree root ($GIT_WORK_TREE) */
  workTree: string;
}

export function resolveCandidatePaths(
  locations: CandidateLocations
): CandidatePath[] {
  return [
    {
      kind: "global-user",
      path: path.join(locations.homeDir, USER_CONFIG_FILENAME)
    },
    {
      kind: "repo-private",
      path: path.join(locations.gitDir, PRIVATE_CONFIG_FILENAME)
    },
    {
      kind: "repo-shared",
      path: path.join(locations.workTree, SHARED_CONFIG_FILENAME)
    }
  ];
}

/**
 * Keep the candidates that exist as readable files, preserving priority order.
 * Missing candidates are dropped without error.
 */
export async function resolveConfigPaths(
  candidates: readonly CandidatePath[],
  fs: BumpFileSystem
): Promise<CandidatePath[]> {
  const existing: CandidatePath[] = [];
  for (const candidate of candidates) {
    if (await isReadableFile(fs, candidate.path)) {
      existing.push(candidate);
    }
  }
  return existing;
}
