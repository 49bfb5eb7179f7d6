import { describe, expect, it } from "vitest";

import { parseContentRange } from "../src/utils/contentRange.js";

describe("parseContentRange", () => {
  it("parses a byte range with its total", () => {
    expect(parseContentRange("bytes 0-499/1000")).toEqual({ start: 0, end: 499, total: 1000 });
  });

  it("accepts surrounding whitespace and any case", () => {
    expect(parseContentRange("  Bytes 500-999/1000 ")).toEqual({ start: 500, end: 999, total: 1000 });
  });

  it.each([undefined, "", "   "])("reports %o as missing", (header) => {
    expect(parseContentRange(header)).toEqual({ error: "MISSING" });
  });

  it.each([
    "bytes 0-499/*",
    "bytes */1000",
    "bytes=0-499/1000",
    "bytes -1-499/1000",
    "items 0-499/1000",
    "bytes 0-99999999999999999999/1000",
  ])("rejects %s", (header) => {
    expect(parseContentRange(header)).toEqual({ error: "INVALID" });
  });
});
