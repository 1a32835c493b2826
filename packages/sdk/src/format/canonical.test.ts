import { describe, it, expect } from "vitest";
import { canonicalize, safeParseJson } from "./canonical.js";

describe("canonicalize", () => {
  it("should sort keys at every level", () => {
    const out = canonicalize({ b: 1, a: { d: true, c: null } });
    expect(out).toBe('{\n  "a": {\n    "c": null,\n    "d": true\n  },\n  "b": 1\n}\n');
  });

  it("should keep array order", () => {
    expect(canonicalize({ dirs: ["/z", "/a"] })).toBe('{\n  "dirs": [\n    "/z",\n    "/a"\n  ]\n}\n');
  });

  it("should be stable across key insertion order", () => {
    expect(canonicalize({ x: 1, y: 2 })).toBe(canonicalize({ y: 2, x: 1 }));
  });

  it("should honor CRLF and compact options", () => {
    const out = canonicalize({ b: 1, a: 2 }, { indent: 0, stableKeyOrder: false, eol: "CRLF", trailingNewline: true });
    expect(out).toBe('{"b":1,"a":2}\r\n');
  });
});

describe("safeParseJson", () => {
  it("should parse valid JSON", () => {
    expect(safeParseJson('{"a":1}')).toEqual({ success: true, data: { a: 1 } });
  });

  it("should strip a byte order mark", () => {
    expect(safeParseJson('\uFEFF{"a":1}')).toEqual({ success: true, data: { a: 1 } });
  });

  it("should report parse failures", () => {
    const result = safeParseJson("{not json");
    expect(result.success).toBe(false);
  });
});
