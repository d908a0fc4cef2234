// Main exports
export { resolveCandidatePaths, resolveConfigPaths } from "./paths.js";
export { aggregateMappings } from "./aggregate.js";
export { loadEffectiveMapping } from "./load-config.js";
export { runBump } from "./engine.js";
export { listTargets, loadSampleConfig } from "./reporter.js";
export { createLuaRuntime } from "./runtime/lua-runtime.js";
export { createHostCommandRunner } from "./runtime/host.js";

// Errors
export {
  BumpError,
  ScriptError,
  FileIOError,
  NoConfigFoundError,
  SCRIPT_ERROR_KINDS
} from "./errors.js";
export type { ScriptErrorKind, FileIOErrorKind } from "./errors.js";

// Types
export type {
  ConfigSourceKind,
  CandidatePath,
  Callable,
  Mapping,
  EffectiveMapping,
  HookName,
  HookSet,
  TransformOutcome,
  ScriptRuntime,
  BumpFileSystem,
  FailureReason,
  BumpTarget,
  BumpReport,
  FailedReport,
  BumpRun,
  BumpObservers
} from "./types.js";
export type { CandidateLocations } from "./paths.js";
export type { AggregateOptions } from "./aggregate.js";
export type {
  LoadEffectiveMappingOptions,
  LoadedConfig
} from "./load-config.js";
export type { RunBumpOptions } from "./engine.js";
export type {
  LuaRuntimeOptions,
  RuntimeFactory
} from "./runtime/lua-runtime.js";
export type { HostCommandRunner } from "./runtime/host.js";
