import type { CandidatePath, HookName } from "./types.js";

export class BumpError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "BumpError";
  }
}

export const SCRIPT_ERROR_KINDS = [
  "malformed-result",
  "evaluation-failed",
  "malformed-hook-result",
  "transform-failed",
  "hook-failed"
] as const;

export type ScriptErrorKind = (typeof SCRIPT_ERROR_KINDS)[number];

export interface ScriptErrorDetails {
  kind: ScriptErrorKind;
  /** Config script the failing code came from */
  origin: string;
  /** Target file being bumped, for transform and hook faults */
  target?: string;
  hook?: HookName;
  detail: string;
}

function describeScriptError(details: ScriptErrorDetails): string {
  const target = details.target ?? "unknown file";
  switch (details.kind) {
    case "evaluation-failed":
      return `Failed to load Lua code from ${details.origin}: ${details.detail}`;
    case "malformed-result":
      return `Invalid config in ${details.origin}: ${details.detail}`;
    case "transform-failed":
      return `Failed to execute Lua code for ${target} (${details.origin}): ${details.detail}`;
    case "malformed-hook-result":
      return `Invalid hooks returned for ${target} (${details.origin}): ${details.detail}`;
    case "hook-failed":
      return `Failed to run ${details.hook ?? "hook"} for ${target} (${details.origin}): ${details.detail}`;
  }
}

export class ScriptError extends BumpError {
  readonly kind: ScriptErrorKind;
  readonly origin: string;
  readonly target?: string;
  readonly hook?: HookName;
  readonly detail: string;

  constructor(details: ScriptErrorDetails) {
    super(describeScriptError(details));
    this.name = "ScriptError";
    this.kind = details.kind;
    this.origin = details.origin;
    this.target = details.target;
    this.hook = details.hook;
    this.detail = details.detail;
  }
}

export type FileIOErrorKind = "read-error" | "write-error";

export class FileIOError extends BumpError {
  readonly kind: FileIOErrorKind;
  readonly path: string;

  constructor(kind: FileIOErrorKind, path: string, cause: unknown) {
    const verb = kind === "read-error" ? "read from" : "write to";
    super(`Failed to ${verb} file ${path}: ${describeCause(cause)}`, {
      cause
    });
    this.name = "FileIOError";
    this.kind = kind;
    this.path = path;
  }
}

export class NoConfigFoundError extends BumpError {
  readonly candidates: CandidatePath[];

  constructor(candidates: CandidatePath[]) {
    super("No valid config files found");
    this.name = "NoConfigFoundError";
    this.candidates = candidates;
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}
