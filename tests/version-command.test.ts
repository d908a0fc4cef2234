import { describe, it, expect } from "vitest";
import { createRequire } from "node:module";
import { SilentError } from "../src/cli/errors.js";
import { VersionExit } from "../src/cli/exit-signals.js";
import {
  createCliHarness,
  createGitExec,
  createRepoFs
} from "./test-helpers.js";

const require = createRequire(import.meta.url);
const packageJson = require("../package.json") as { version: string };

describe("--version", () => {
  it("prints the package version and exits silently", async () => {
    const exec = createGitExec();
    const cli = createCliHarness({ fs: createRepoFs().fs, exec });

    const result = cli.run(["--version"]);

    await expect(result).rejects.toBeInstanceOf(VersionExit);
    await expect(result).rejects.toBeInstanceOf(SilentError);
    expect(cli.logs).toEqual([`git-bump ${packageJson.version}`]);
    expect(exec).not.toHaveBeenCalled();
  });

  it("takes precedence over a requested bump", async () => {
    const { fs, vol } = createRepoFs({
      "/repo/.git-bump.lua":
        "return { VERSION = function(version) return version end }",
      "/repo/VERSION": "0.1.0"
    });
    const cli = createCliHarness({ fs });

    await expect(cli.run(["-V", "9.9.9"])).rejects.toBeInstanceOf(VersionExit);

    expect(vol.readFileSync("/repo/VERSION", "utf8")).toBe("0.1.0");
  });
});
