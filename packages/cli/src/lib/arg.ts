/**
 * Argument parsing helpers
 */

import { safeParseJson, JsonValueSchema, type JsonValue } from "@paramstore/sdk";

/**
 * Parse a command-line value: JSON when it parses, otherwise the raw string
 *
 * `42` → 42, `true` → true, `["/a"]` → ["/a"], `clean` → "clean"
 */
export function parseValue(raw: string): JsonValue {
  const parsed = safeParseJson(raw);
  if (!parsed.success) {
    return raw;
  }

  const json = JsonValueSchema.safeParse(parsed.data);
  return json.success ? json.data : raw;
}

/**
 * Combine one or more command-line values; several become an array
 */
export function parseValues(raw: readonly string[]): JsonValue {
  const [only] = raw;
  if (raw.length === 1 && only !== undefined) {
    return parseValue(only);
  }
  return raw.map(parseValue);
}
