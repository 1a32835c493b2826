/**
 * Canonical JSON formatting for the settings file
 *
 * Provides deterministic, byte-stable formatting with:
 * - Stable key ordering (code point order)
 * - Consistent EOL normalization (LF or CRLF)
 * - Single trailing newline
 *
 * Invariants:
 * - Pure function: same input always produces same output bytes
 * - No mutation of input objects
 * - Cycle detection prevents infinite loops
 */

import type { CanonicalOptions, JsonValue } from "../types.js";

/**
 * Formatting used for every settings file write
 */
export const SETTINGS_FORMAT: CanonicalOptions = {
  indent: 2,
  stableKeyOrder: true,
  eol: "LF",
  trailingNewline: true,
};

/**
 * Canonicalize a value to stable, deterministic JSON
 * @throws Error if circular references detected
 */
export function canonicalize(input: JsonValue, options: CanonicalOptions = SETTINGS_FORMAT): string {
  const seen = new WeakSet<object>();

  const compareKeys = (a: string, b: string): number => {
    if (a === b) return 0;
    return a < b ? -1 : 1;
  };

  const normalize = (value: JsonValue): JsonValue => {
    if (value === null || typeof value !== "object") {
      return value;
    }

    if (seen.has(value)) {
      throw new Error("Circular reference detected in object");
    }
    seen.add(value);

    try {
      // Arrays: preserve order but normalize contents
      if (Array.isArray(value)) {
        return value.map(normalize);
      }

      const entries = Object.entries(value);
      if (options.stableKeyOrder) {
        entries.sort(([a], [b]) => compareKeys(a, b));
      }

      const normalized: { [key: string]: JsonValue } = {};
      for (const [key, child] of entries) {
        normalized[key] = normalize(child);
      }
      return normalized;
    } finally {
      seen.delete(value);
    }
  };

  const json = JSON.stringify(normalize(input), null, options.indent);

  const eol = options.eol === "CRLF" ? "\r\n" : "\n";
  const withEol = json.replace(/\r\n|\r|\n/g, eol);

  if (options.trailingNewline) {
    return withEol.replace(/\s*$/, "") + eol;
  }

  return withEol;
}

/**
 * Safe JSON parsing with structured error information
 * @param raw - Raw string to parse
 * @returns Parsed value or error details
 */
export function safeParseJson(
  raw: string
): { success: true; data: unknown } | { success: false; error: string } {
  try {
    // Strip BOM if present
    const cleaned = raw.charCodeAt(0) === 0xfeff ? raw.slice(1) : raw;
    const data: unknown = JSON.parse(cleaned);
    return { success: true, data };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { success: false, error: message };
  }
}
