import type { BumpError } from "./errors.js";

// ============================================================================
// Config Sources
// ============================================================================

/** Listed from lowest to highest override priority. */
export type ConfigSourceKind = "global-user" | "repo-private" | "repo-shared";

export interface CandidatePath {
  kind: ConfigSourceKind;
  path: string;
}

// ============================================================================
// Script Values
// ============================================================================

/**
 * Opaque reference to a function living inside the script runtime.
 * `origin` names the config script that produced it.
 */
export interface Callable {
  readonly handle: number;
  readonly origin: string;
}

/** File path (relative to the repository root) to transform. */
export type Mapping = ReadonlyMap<string, Callable>;

export type EffectiveMapping = ReadonlyMap<string, Callable>;

export type HookName = "pre_func" | "post_func";

export interface HookSet {
  pre?: Callable;
  post?: Callable;
}

export interface TransformOutcome {
  newContent: string;
  hooks?: HookSet;
}

// ============================================================================
// Script Runtime Interface
// ============================================================================

export interface ScriptRuntime {
  /** Evaluate a config script and return its file mapping. */
  load(source: string, origin: string): Mapping;

  invoke(
    callable: Callable,
    version: string,
    content: string,
    target?: string
  ): TransformOutcome;

  invokeHook(callable: Callable, hook: HookName, target?: string): void;

  /** Drop the runtime's reference to a callable that will not be used again. */
  release(callable: Callable): void;

  close(): void;
}

// ============================================================================
// FileSystem Interface
// ============================================================================

export interface BumpFileSystem {
  readFile(path: string): Promise<Uint8Array>;
  writeFile(
    path: string,
    content: string,
    options?: { encoding: "utf8" }
  ): Promise<void>;
  stat(path: string): Promise<{ isFile(): boolean }>;
  access(path: string, mode?: number): Promise<void>;
}

// ============================================================================
// Bump Results
// ============================================================================

export type FailureReason =
  | "read-error"
  | "transform-failed"
  | "pre-hook-failed"
  | "write-error"
  | "post-hook-failed";

export interface BumpTarget {
  /** Key from the effective mapping */
  file: string;
  /** Absolute path below the repository root */
  path: string;
}

export type BumpReport =
  | (BumpTarget & { status: "updated" })
  | (BumpTarget & { status: "skipped-missing" })
  | (BumpTarget & {
      status: "failed";
      reason: FailureReason;
      error: BumpError;
    });

export type FailedReport = Extract<BumpReport, { status: "failed" }>;

export interface BumpRun {
  reports: BumpReport[];
  /** Set when a step failed; no entry after it was processed. */
  failure?: FailedReport;
}

export interface BumpObservers {
  onStart?(target: BumpTarget): void;
  onComplete?(report: BumpReport): void;
}
