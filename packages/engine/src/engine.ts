import path from "node:path";
import { BumpError, FileIOError, ScriptError, describeCause } from "./errors.js";
import { pathExists, readText } from "./fs-utils.js";
import type {
  BumpFileSystem,
  BumpObservers,
  BumpReport,
  BumpRun,
  BumpTarget,
  Callable,
  EffectiveMapping,
  FailedReport,
  FailureReason,
  HookName,
  ScriptRuntime,
  TransformOutcome
} from "./types.js";

export interface RunBumpOptions {
  version: string;
  repoRoot: string;
  runtime: ScriptRuntime;
  fs: BumpFileSystem;
  observers?: BumpObservers;
  /** Append "\n" to content that does not end with one before writing. */
  ensureTrailingNewline?: boolean;
}

/**
 * Bump every file of the effective mapping, in mapping order.
 *
 * Missing files are skipped. The first failing step stops the run; files
 * written before it stay written.
 */
export async function runBump(
  effective: EffectiveMapping,
  options: RunBumpOptions
): Promise<BumpRun> {
  const reports: BumpReport[] = [];

  for (const [file, callable] of effective) {
    const target: BumpTarget = {
      file,
      path: path.resolve(options.repoRoot, file)
    };
    options.observers?.onStart?.(target);

    const report = await bumpFile(target, callable, options);
    reports.push(report);
    options.observers?.onComplete?.(report);

    if (report.status === "failed") {
      return { reports, failure: report };
    }
  }

  return { reports };
}

async function bumpFile(
  target: BumpTarget,
  callable: Callable,
  options: RunBumpOptions
): Promise<BumpReport> {
  const { fs, runtime } = options;

  let content: string;
  try {
    if (!(await pathExists(fs, target.path))) {
      return { ...target, status: "skipped-missing" };
    }
    content = await readText(fs, target.path);
  } catch (error) {
    return failed(
      target,
      "read-error",
      new FileIOError("read-error", target.path, error)
    );
  }

  let outcome: TransformOutcome;
  try {
    outcome = runtime.invoke(callable, options.version, content, target.file);
  } catch (error) {
    return failed(
      target,
      "transform-failed",
      asScriptError(error, "transform-failed", callable, target)
    );
  }

  const { pre, post } = outcome.hooks ?? {};
  try {
    if (pre) {
      const error = runHook(runtime, pre, "pre_func", target);
      if (error) {
        return failed(target, "pre-hook-failed", error);
      }
    }

    let newContent = outcome.newContent;
    if (options.ensureTrailingNewline && !newContent.endsWith("\n")) {
      newContent += "\n";
    }

    try {
      await fs.writeFile(target.path, newContent, { encoding: "utf8" });
    } catch (error) {
      return failed(
        target,
        "write-error",
        new FileIOError("write-error", target.path, error)
      );
    }

    if (post) {
      const error = runHook(runtime, post, "post_func", target);
      if (error) {
        return failed(target, "post-hook-failed", error);
      }
    }
  } finally {
    if (pre) runtime.release(pre);
    if (post) runtime.release(post);
  }

  return { ...target, status: "updated" };
}

function runHook(
  runtime: ScriptRuntime,
  hook: Callable,
  name: HookName,
  target: BumpTarget
): BumpError | undefined {
  try {
    runtime.invokeHook(hook, name, target.file);
    return undefined;
  } catch (error) {
    return asScriptError(error, "hook-failed", hook, target, name);
  }
}

function asScriptError(
  error: unknown,
  kind: "transform-failed" | "hook-failed",
  callable: Callable,
  target: BumpTarget,
  hook?: HookName
): BumpError {
  if (error instanceof BumpError) {
    return error;
  }
  return new ScriptError({
    kind,
    origin: callable.origin,
    target: target.file,
    hook,
    detail: describeCause(error)
  });
}

function failed(
  target: BumpTarget,
  reason: FailureReason,
  error: BumpError
): FailedReport {
  return { ...target, status: "failed", reason, error };
}
