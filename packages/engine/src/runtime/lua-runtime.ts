import { LuaFactory, type LuaEngine } from "wasmoon";
import type { z } from "zod";
import { BumpError, ScriptError } from "../errors.js";
import type {
  Callable,
  HookName,
  Mapping,
  ScriptRuntime,
  TransformOutcome
} from "../types.js";
import {
  BRIDGE_SOURCE,
  callReplySchema,
  invokeReplySchema,
  isLuaBridge,
  loadReplySchema,
  type LuaBridge
} from "./bridge.js";
import { fromHex, toHex } from "./bytes.js";
import {
  HOST_CAPTURE_GLOBAL,
  HOST_EXECUTE_GLOBAL,
  HOST_PRELUDE,
  type HostCommandRunner
} from "./host.js";

export interface LuaRuntimeOptions {
  /** Reuse a factory to avoid compiling the Lua module again. */
  factory?: LuaFactory;
  /** Back `os.execute` and `io.popen` with real commands. Omit to leave them as built. */
  hostCommands?: HostCommandRunner;
}

export type RuntimeFactory = () => Promise<ScriptRuntime>;

/**
 * Create the single Lua state shared by every config script of a run.
 * Globals defined by one script remain visible to later scripts and to all
 * transform and hook functions.
 */
export async function createLuaRuntime(
  options: LuaRuntimeOptions = {}
): Promise<ScriptRuntime> {
  const factory = options.factory ?? new LuaFactory();
  const engine = await factory.createEngine();

  try {
    if (options.hostCommands) {
      await installHostCommands(engine, options.hostCommands);
    }
    const exported: unknown = await engine.doString(BRIDGE_SOURCE);
    if (!isLuaBridge(exported)) {
      throw new BumpError("Lua bridge did not initialize");
    }
    return createRuntime(engine, exported);
  } catch (error) {
    engine.global.close();
    throw error;
  }
}

async function installHostCommands(
  engine: LuaEngine,
  runner: HostCommandRunner
): Promise<void> {
  engine.global.set(HOST_EXECUTE_GLOBAL, (command: unknown) =>
    runner.execute(String(command))
  );
  engine.global.set(HOST_CAPTURE_GLOBAL, (command: unknown) =>
    toHex(runner.capture(String(command)))
  );
  await engine.doString(HOST_PRELUDE);
}

function decode<Schema extends z.ZodTypeAny>(
  schema: Schema,
  reply: unknown,
  operation: string
): z.infer<Schema> {
  const parsed = schema.safeParse(reply);
  if (!parsed.success) {
    throw new BumpError(
      `Unexpected reply from Lua during ${operation}: ${parsed.error.message}`
    );
  }
  return parsed.data;
}

function releaseHooks(
  bridge: LuaBridge,
  reply: { pre?: number; post?: number }
): void {
  if (reply.pre !== undefined) bridge.release(reply.pre);
  if (reply.post !== undefined) bridge.release(reply.post);
}

function createRuntime(engine: LuaEngine, bridge: LuaBridge): ScriptRuntime {
  let closed = false;

  const ensureOpen = (): void => {
    if (closed) {
      throw new BumpError("Lua runtime is already closed");
    }
  };

  return {
    load(source: string, origin: string): Mapping {
      ensureOpen();
      const reply = decode(loadReplySchema, bridge.load(toHex(source), origin), "load");
      if (reply.status === "error") {
        throw new ScriptError({
          kind: reply.kind,
          origin,
          detail: reply.message
        });
      }
      const mapping = new Map<string, Callable>();
      for (const entry of reply.entries) {
        mapping.set(entry.path, { handle: entry.handle, origin });
      }
      return mapping;
    },

    invoke(
      callable: Callable,
      version: string,
      content: string,
      target?: string
    ): TransformOutcome {
      ensureOpen();
      const reply = decode(
        invokeReplySchema,
        bridge.invoke(callable.handle, version, toHex(content)),
        "invoke"
      );
      if (reply.status === "error") {
        throw new ScriptError({
          kind: reply.kind,
          origin: callable.origin,
          target,
          detail: reply.message
        });
      }
      let newContent: string;
      try {
        newContent = fromHex(reply.content);
      } catch {
        releaseHooks(bridge, reply);
        throw new ScriptError({
          kind: "transform-failed",
          origin: callable.origin,
          target,
          detail: "returned content is not valid UTF-8"
        });
      }
      const outcome: TransformOutcome = { newContent };
      if (reply.pre !== undefined || reply.post !== undefined) {
        outcome.hooks = {};
        if (reply.pre !== undefined) {
          outcome.hooks.pre = { handle: reply.pre, origin: callable.origin };
        }
        if (reply.post !== undefined) {
          outcome.hooks.post = { handle: reply.post, origin: callable.origin };
        }
      }
      return outcome;
    },

    invokeHook(callable: Callable, hook: HookName, target?: string): void {
      ensureOpen();
      const reply = decode(
        callReplySchema,
        bridge.call(callable.handle),
        hook
      );
      if (reply.status === "error") {
        throw new ScriptError({
          kind: reply.kind,
          origin: callable.origin,
          target,
          hook,
          detail: reply.message
        });
      }
    },

    release(callable: Callable): void {
      if (closed) {
        return;
      }
      bridge.release(callable.handle);
    },

    close(): void {
      if (closed) {
        return;
      }
      closed = true;
      engine.global.close();
    }
  };
}
