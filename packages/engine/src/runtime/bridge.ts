import { z } from "zod";
import { SCRIPT_ERROR_KINDS } from "../errors.js";
import { HEX_CODEC_SOURCE } from "./bytes.js";

/**
 * Lua side of the runtime adapter.
 *
 * Lua functions never leave the Lua state: they are stored in a handle table
 * and JavaScript refers to them by integer handle. Every bridge function
 * returns exactly one table, because values crossing into JavaScript keep
 * only the first result of a call. Script sources and file contents travel
 * hex-encoded in both directions.
 */
export const BRIDGE_SOURCE = String.raw`
${HEX_CODEC_SOURCE}
local callables = {}
local next_handle = 0

local function register(fn)
  next_handle = next_handle + 1
  callables[next_handle] = fn
  return next_handle
end

local function describe(err)
  if type(err) == "string" then
    return err
  end
  return tostring(err)
end

local function failure(kind, message)
  return { status = "error", kind = kind, message = message }
end

local bridge = {}

function bridge.load(source, label)
  local chunk, err = load(from_hex(source), "@" .. label, "t")
  if chunk == nil then
    return failure("evaluation-failed", describe(err))
  end

  local ok, result = pcall(chunk)
  if not ok then
    return failure("evaluation-failed", describe(result))
  end
  if type(result) ~= "table" then
    return failure("malformed-result", "expected a table, got " .. type(result))
  end

  local keys = {}
  local functions = {}
  for key, value in pairs(result) do
    local key_type = type(key)
    if key_type == "number" then
      key = tostring(key)
    elseif key_type ~= "string" then
      return failure("malformed-result", "expected file names as keys, got " .. key_type)
    end
    if functions[key] ~= nil then
      return failure("malformed-result", ("duplicate file name %q"):format(key))
    end
    if type(value) ~= "function" then
      return failure(
        "malformed-result",
        ("expected a function for %q, got %s"):format(key, type(value))
      )
    end
    keys[#keys + 1] = key
    functions[key] = value
  end

  table.sort(keys)
  local entries = {}
  for index, key in ipairs(keys) do
    entries[index] = { path = key, handle = register(functions[key]) }
  end
  return { status = "ok", entries = entries }
end

function bridge.invoke(handle, version, content)
  local fn = callables[handle]
  if fn == nil then
    return failure("transform-failed", "unknown callable " .. tostring(handle))
  end

  local results = table.pack(pcall(fn, version, from_hex(content)))
  if not results[1] then
    return failure("transform-failed", describe(results[2]))
  end

  local new_content = results[2]
  if type(new_content) == "number" then
    new_content = tostring(new_content)
  end
  if type(new_content) ~= "string" then
    return failure(
      "transform-failed",
      "expected the new file content as a string, got " .. type(new_content)
    )
  end

  local reply = { status = "ok", content = to_hex(new_content) }
  local hooks = results[3]
  if hooks == nil then
    return reply
  end
  if type(hooks) ~= "table" then
    return failure("malformed-hook-result", "expected a hook table, got " .. type(hooks))
  end
  for _, name in ipairs({ "pre_func", "post_func" }) do
    local hook = hooks[name]
    if hook ~= nil and type(hook) ~= "function" then
      return failure(
        "malformed-hook-result",
        ("expected %s to be a function, got %s"):format(name, type(hook))
      )
    end
  end

  if hooks.pre_func ~= nil then
    reply.pre = register(hooks.pre_func)
  end
  if hooks.post_func ~= nil then
    reply.post = register(hooks.post_func)
  end
  return reply
end

function bridge.call(handle)
  local fn = callables[handle]
  if fn == nil then
    return failure("hook-failed", "unknown callable " .. tostring(handle))
  end
  local ok, err = pcall(fn)
  if not ok then
    return failure("hook-failed", describe(err))
  end
  return { status = "ok" }
end

function bridge.release(handle)
  callables[handle] = nil
  return { status = "ok" }
end

return bridge
`;

type LuaFunction = (...args: unknown[]) => unknown;

export interface LuaBridge {
  load: LuaFunction;
  invoke: LuaFunction;
  call: LuaFunction;
  release: LuaFunction;
}

export function isLuaBridge(value: unknown): value is LuaBridge {
  return (
    typeof value === "object" &&
    value !== null &&
    "load" in value &&
    typeof value.load === "function" &&
    "invoke" in value &&
    typeof value.invoke === "function" &&
    "call" in value &&
    typeof value.call === "function" &&
    "release" in value &&
    typeof value.release === "function"
  );
}

/**
 * Lua sequences arrive as arrays, except the empty table which arrives as an
 * empty object. Tables keyed "1".."n" are accepted as well.
 */
function fromLuaSequence(value: unknown): unknown {
  if (Array.isArray(value) || typeof value !== "object" || value === null) {
    return value;
  }
  const entries = Object.entries(value);
  if (!entries.every(([key]) => /^[1-9]\d*$/.test(key))) {
    return value;
  }
  return entries
    .sort(([a], [b]) => Number(a) - Number(b))
    .map(([, item]) => item);
}

const handleSchema = z.number().int().positive();

const hexSchema = z.string().regex(/^(?:[0-9a-f]{2})*$/);

const failureReplySchema = z.object({
  status: z.literal("error"),
  kind: z.enum(SCRIPT_ERROR_KINDS),
  message: z.string()
});

export const loadReplySchema = z.union([
  z.object({
    status: z.literal("ok"),
    entries: z.preprocess(
      fromLuaSequence,
      z.array(z.object({ path: z.string(), handle: handleSchema }))
    )
  }),
  failureReplySchema
]);

export const invokeReplySchema = z.union([
  z.object({
    status: z.literal("ok"),
    content: hexSchema,
    pre: handleSchema.optional(),
    post: handleSchema.optional()
  }),
  failureReplySchema
]);

export const callReplySchema = z.union([
  z.object({ status: z.literal("ok") }),
  failureReplySchema
]);
