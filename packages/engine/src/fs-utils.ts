import { constants } from "node:fs";
import type { BumpFileSystem } from "./types.js";

const MISSING_CODES = new Set(["ENOENT", "ENOTDIR"]);
const DENIED_CODES = new Set(["EACCES", "EPERM"]);

function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    const { code } = error;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

/**
 * Check if an error is a "file not found" error.
 */
export function isNotFound(error: unknown): boolean {
  const code = errorCode(error);
  return code !== undefined && MISSING_CODES.has(code);
}

export function isPermissionDenied(error: unknown): boolean {
  const code = errorCode(error);
  return code !== undefined && DENIED_CODES.has(code);
}

const utf8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/**
 * Read a file as UTF-8 text. Bytes that are not valid UTF-8 are an error
 * rather than being replaced.
 */
export async function readText(
  fs: BumpFileSystem,
  target: string
): Promise<string> {
  const bytes = await fs.readFile(target);
  try {
    return utf8.decode(bytes);
  } catch (error) {
    throw new Error("contents are not valid UTF-8", { cause: error });
  }
}

/**
 * Check if a path exists (file or directory).
 */
export async function pathExists(
  fs: BumpFileSystem,
  target: string
): Promise<boolean> {
  try {
    await fs.stat(target);
    return true;
  } catch (error) {
    if (isNotFound(error)) {
      return false;
    }
    throw error;
  }
}

/**
 * True for a regular file the current process may read.
 */
export async function isReadableFile(
  fs: BumpFileSystem,
  target: string
): Promise<boolean> {
  try {
    const stats = await fs.stat(target);
    if (!stats.isFile()) {
      return false;
    }
    await fs.access(target, constants.R_OK);
    return true;
  } catch (error) {
    if (isNotFound(error) || isPermissionDenied(error)) {
      return false;
    }
    throw error;
  }
}
