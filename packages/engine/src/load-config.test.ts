import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { Volume, createFsFromVolume } from "memfs";
import { LuaFactory } from "wasmoon";
import { runBump } from "./engine.js";
import { FileIOError, NoConfigFoundError, ScriptError } from "./errors.js";
import { loadEffectiveMapping } from "./load-config.js";
import { resolveCandidatePaths } from "./paths.js";
import { createLuaRuntime } from "./runtime/lua-runtime.js";
import type { BumpFileSystem, ScriptRuntime } from "./types.js";

const factory = new LuaFactory();

const candidates = resolveCandidatePaths({
  homeDir: "/home/test",
  gitDir: "/repo/.git",
  workTree: "/repo"
});

function createMemFs(files: Record<string, string> = {}): {
  fs: BumpFileSystem;
  vol: Volume;
} {
  const vol = Volume.fromJSON(files, "/");
  return {
    fs: createFsFromVolume(vol).promises as unknown as BumpFileSystem,
    vol
  };
}

describe("loadEffectiveMapping", () => {
  let runtime: ScriptRuntime;

  beforeEach(async () => {
    runtime = await createLuaRuntime({ factory });
  });

  afterEach(() => {
    runtime.close();
  });

  it("returns an empty mapping when no config exists", async () => {
    const { fs } = createMemFs();

    const loaded = await loadEffectiveMapping({ candidates, runtime, fs });

    expect(loaded.sources).toEqual([]);
    expect(loaded.mapping.size).toBe(0);
  });

  it("throws when a config is required and none exists", async () => {
    const { fs } = createMemFs();

    const result = loadEffectiveMapping({
      candidates,
      runtime,
      fs,
      requireConfig: true
    });

    await expect(result).rejects.toBeInstanceOf(NoConfigFoundError);
    await expect(result).rejects.toThrow("No valid config files found");
  });

  it("lets the shared config override the user config", async () => {
    const { fs, vol } = createMemFs({
      "/home/test/.git-bump.lua": `
        return {
          VERSION = function() return "from user" end,
          ["USER_ONLY"] = function(version) return "user " .. version end,
        }
      `,
      "/repo/.git-bump.lua": `
        return { VERSION = function(version) return "shared " .. version end }
      `,
      "/repo/VERSION": "0.1.0",
      "/repo/USER_ONLY": "0.1.0"
    });

    const loaded = await loadEffectiveMapping({ candidates, runtime, fs });
    await runBump(loaded.mapping, {
      version: "1.0.0",
      repoRoot: "/repo",
      runtime,
      fs
    });

    expect(loaded.sources.map((source) => source.kind)).toEqual([
      "global-user",
      "repo-shared"
    ]);
    expect([...loaded.mapping.keys()]).toEqual(["USER_ONLY", "VERSION"]);
    expect(loaded.mapping.get("VERSION")?.origin).toBe("/repo/.git-bump.lua");
    expect(vol.readFileSync("/repo/VERSION", "utf8")).toBe("shared 1.0.0");
    expect(vol.readFileSync("/repo/USER_ONLY", "utf8")).toBe("user 1.0.0");
  });

  it("lets the private config override the user config", async () => {
    const { fs } = createMemFs({
      "/home/test/.git-bump.lua":
        'return { VERSION = function() return "user" end }',
      "/repo/.git/git-bump.lua":
        'return { VERSION = function() return "private" end }'
    });

    const loaded = await loadEffectiveMapping({ candidates, runtime, fs });

    expect(loaded.mapping.get("VERSION")?.origin).toBe(
      "/repo/.git/git-bump.lua"
    );
  });

  it("releases overridden callables", async () => {
    const { fs } = createMemFs({
      "/home/test/.git-bump.lua":
        'return { VERSION = function() return "user" end }',
      "/repo/.git-bump.lua":
        'return { VERSION = function() return "shared" end }'
    });
    const release = vi.spyOn(runtime, "release");

    const loaded = await loadEffectiveMapping({ candidates, runtime, fs });

    expect(release).toHaveBeenCalledTimes(1);
    expect(release).toHaveBeenCalledWith(
      expect.objectContaining({ origin: "/home/test/.git-bump.lua" })
    );
    expect(loaded.mapping.size).toBe(1);
  });

  it("propagates config evaluation errors with the script path", async () => {
    const { fs } = createMemFs({
      "/repo/.git-bump.lua": "return 42"
    });

    const result = loadEffectiveMapping({ candidates, runtime, fs });

    await expect(result).rejects.toBeInstanceOf(ScriptError);
    await expect(result).rejects.toMatchObject({
      kind: "malformed-result",
      origin: "/repo/.git-bump.lua"
    });
  });

  it("wraps config read failures", async () => {
    const { fs } = createMemFs({
      "/repo/.git-bump.lua": "return {}"
    });
    vi.spyOn(fs, "readFile").mockRejectedValue(new Error("I/O error"));

    const result = loadEffectiveMapping({ candidates, runtime, fs });

    await expect(result).rejects.toBeInstanceOf(FileIOError);
    await expect(result).rejects.toThrow(
      "Failed to read from file /repo/.git-bump.lua: I/O error"
    );
  });
});
