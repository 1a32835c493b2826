/**
 * Settings schema: defaults, keys without defaults, and key resolution
 */

import * as path from "node:path";
import type { DefaultSettings, JsonObject, KnownKey, NonDefaultSettings, ResolvedKey } from "./types.js";

/**
 * Fixed name of the backing file
 */
export const SETTINGS_FILENAME = "paramstore_settings.json";

/**
 * Directory under the user's home searched during discovery
 */
export const SETTINGS_HOME_DIRNAME = ".paramstore";

/**
 * Lock timeout for the initial load, before `file_timeout` can be read
 */
export const BOOTSTRAP_TIMEOUT_MS = 10_000;

/**
 * Default value for every key that has one
 */
export const DEFAULTS: Readonly<DefaultSettings> = Object.freeze({
  clean_level: "clean",
  directory_format: path.join("{platform}", "{name}", "{tag}", "{inst_id}"),
  ignore_empty_files: false,
  file_timeout: 10,
  update_files: true,
  user_modules: {},
  warn_empty_file_list: false,
});

/**
 * Keys that are persisted without a working default
 */
export const NON_DEFAULT_KEYS: readonly (keyof NonDefaultSettings)[] = Object.freeze(["data_dirs"]);

const DEFAULT_KEYS = Object.keys(DEFAULTS);

/**
 * Check whether a key is one of the store's own settings
 */
export function isKnownKey(key: string): key is KnownKey {
  return DEFAULT_KEYS.includes(key) || NON_DEFAULT_KEYS.some((k) => k === key);
}

/**
 * Decide how set() handles a key
 */
export function resolveKey(key: string): ResolvedKey {
  switch (key) {
    case "data_dirs":
      return { kind: "data_dirs" };
    case "user_modules":
      return { kind: "user_modules" };
    default:
      return { kind: "generic", key };
  }
}

/**
 * Fresh deep copy of the defaults
 */
export function createDefaults(): JsonObject {
  return structuredClone<JsonObject>({ ...DEFAULTS });
}

/**
 * Mapping produced by a full reinitialization: defaults plus empty no-default keys
 */
export function createInitialSettings(): JsonObject {
  const data = createDefaults();
  for (const key of NON_DEFAULT_KEYS) {
    data[key] = [];
  }
  return data;
}
