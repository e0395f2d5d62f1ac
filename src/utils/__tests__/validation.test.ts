/**
 * Conversion option validation tests
 */

import { describe, it, expect } from "vitest";
import { defaultVersionInfo, parseConvertOptions } from "../validation.js";

describe("defaultVersionInfo", () => {
  it("should format local time without milliseconds or zone", () => {
    expect(defaultVersionInfo(new Date(2024, 0, 5, 7, 8, 9, 123))).toBe("2024-01-05T07:08:09");
  });
});

describe("parseConvertOptions", () => {
  it("should apply defaults", () => {
    const result = parseConvertOptions({ input: " ./csv ", output: "domain.nq", version: "6.1.0" });
    expect(result).toEqual({
      ok: true,
      value: {
        input: "./csv",
        output: "domain.nq",
        unfiltered: false,
        expanded: false,
        version: "6.1.0",
      },
    });
  });

  it("should default the version to a timestamp", () => {
    const result = parseConvertOptions({ input: "csv", output: "out.nq" });
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.version).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}$/);
    }
  });

  it("should list every invalid field", () => {
    expect(parseConvertOptions({ input: "", expanded: "yes" })).toEqual({
      ok: false,
      error: [
        "input: an input directory is required",
        "output: Required",
        "expanded: Expected boolean, received string",
      ],
    });
  });
});
