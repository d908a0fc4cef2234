import { spawnSync } from "node:child_process";
import { HEX_CODEC_SOURCE } from "./bytes.js";

/**
 * Shell access for config scripts. The WebAssembly build of Lua has no
 * process support, so `os.execute` and `io.popen` are routed through here.
 */
export interface HostCommandRunner {
  /** Run a command with inherited stdio and return its exit code. */
  execute(command: string): number;
  /** Run a command and return its standard output. */
  capture(command: string): string;
}

export function createHostCommandRunner(cwd: string): HostCommandRunner {
  return {
    execute(command) {
      const result = spawnSync(command, {
        cwd,
        shell: true,
        stdio: "inherit"
      });
      if (result.error) {
        throw result.error;
      }
      return result.status ?? 1;
    },
    capture(command) {
      const result = spawnSync(command, {
        cwd,
        shell: true,
        encoding: "utf8",
        stdio: ["ignore", "pipe", "inherit"]
      });
      if (result.error) {
        throw result.error;
      }
      return result.stdout;
    }
  };
}

export const HOST_EXECUTE_GLOBAL = "__git_bump_execute";
export const HOST_CAPTURE_GLOBAL = "__git_bump_capture";

export const HOST_PRELUDE = String.raw`
${HEX_CODEC_SOURCE}
local execute = ${HOST_EXECUTE_GLOBAL}
local capture = ${HOST_CAPTURE_GLOBAL}
${HOST_EXECUTE_GLOBAL} = nil
${HOST_CAPTURE_GLOBAL} = nil

os.execute = function(command)
  if command == nil then
    return true
  end
  local code = execute(command)
  code = math.tointeger(code) or code
  if code == 0 then
    return true, "exit", 0
  end
  return nil, "exit", code
end

io.popen = function(command, mode)
  if mode ~= nil and mode ~= "r" then
    error("io.popen: only read mode is supported", 2)
  end

  local output = from_hex(capture(command))
  local position = 1
  local handle = {}

  local function read_line(keep_newline)
    if position > #output then
      return nil
    end
    local newline = output:find("\n", position, true)
    local last = newline or #output
    local line = output:sub(position, last)
    position = last + 1
    if keep_newline or newline == nil then
      return line
    end
    return line:sub(1, -2)
  end

  local function read_one(format)
    if format == "a" then
      local rest = output:sub(position)
      position = #output + 1
      return rest
    end
    if format == "n" then
      return tonumber(read_line(false))
    end
    return read_line(format == "L")
  end

  function handle:read(...)
    local formats = table.pack(...)
    if formats.n == 0 then
      return read_one("l")
    end
    local results = {}
    for index = 1, formats.n do
      local format = tostring(formats[index]):gsub("^%*", "")
      results[index] = read_one(format:sub(1, 1))
    end
    return table.unpack(results, 1, formats.n)
  end

  function handle:lines(format)
    return function()
      return self:read(format or "l")
    end
  end

  function handle:close()
    return true, "exit", 0
  end

  return handle
end
`;
