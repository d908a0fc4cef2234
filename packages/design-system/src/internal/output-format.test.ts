import { describe, it, expect, afterEach } from "vitest";
import {
  OUTPUT_FORMATS,
  resetOutputFormatCache,
  resolveOutputFormat
} from "./output-format.js";

describe("resolveOutputFormat", () => {
  afterEach(() => {
    resetOutputFormatCache();
  });

  it.each(OUTPUT_FORMATS)("accepts OUTPUT_FORMAT=%s", (format) => {
    expect(resolveOutputFormat({ OUTPUT_FORMAT: format })).toBe(format);
  });

  it.each([
    [" Markdown ", "markdown"],
    ["JSON", "json"],
    ["yaml", "terminal"],
    ["", "terminal"]
  ])("normalises %j to %s", (raw, expected) => {
    expect(resolveOutputFormat({ OUTPUT_FORMAT: raw })).toBe(expected);
  });

  it("keeps the first answer until the cache is reset", () => {
    expect(resolveOutputFormat({ OUTPUT_FORMAT: "json" })).toBe("json");
    expect(resolveOutputFormat({})).toBe("json");

    resetOutputFormatCache();

    expect(resolveOutputFormat({})).toBe("terminal");
  });
});
