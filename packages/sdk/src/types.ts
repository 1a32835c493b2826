/**
 * Core type definitions for the parameter store
 */

/**
 * Any value that survives a JSON round trip
 */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/**
 * JSON object (the shape of the whole settings file)
 */
export type JsonObject = { [key: string]: JsonValue };

/**
 * Settings that ship with a default value
 */
export type DefaultSettings = {
  clean_level: string;
  directory_format: string;
  ignore_empty_files: boolean;
  file_timeout: number;
  update_files: boolean;
  user_modules: UserModules;
  warn_empty_file_list: boolean;
};

/**
 * Settings that are persisted but have no working default
 */
export type NonDefaultSettings = {
  data_dirs: string[];
};

/**
 * Closed set of keys the store knows about
 */
export type KnownKey = keyof DefaultSettings | keyof NonDefaultSettings;

/**
 * Known keys plus any user-defined key
 */
export type SettingKey = KnownKey | (string & {});

/**
 * Registered instrument modules: platform → name → module specifier
 */
export type UserModules = { [platform: string]: { [name: string]: string } };

/**
 * How a key is handled by set(), resolved once at the call boundary
 */
export type ResolvedKey =
  | { kind: "data_dirs" }
  | { kind: "user_modules" }
  | { kind: "generic"; key: string };

/**
 * Options for opening a parameter store
 */
export interface ParametersOptions {
  /** Directory holding the settings file; skips discovery when set */
  path?: string;
  /** Write a fresh settings file (full reset) before loading */
  createNew?: boolean;
  /** Working directory searched first during discovery (default: process.cwd()) */
  cwd?: string;
  /** Home directory searched second during discovery (default: os.homedir()) */
  homeDir?: string;
}

/**
 * Options for the human-readable summary
 */
export interface DescribeOptions {
  /** List every setting with its value (default: true) */
  long?: boolean;
}

/**
 * Canonical JSON formatting options
 */
export interface CanonicalOptions {
  indent: number;
  stableKeyOrder: boolean;
  eol: "LF" | "CRLF";
  trailingNewline: boolean;
}

/**
 * Handle on one settings file
 *
 * Reads are served from memory. Every mutation takes the file lock,
 * writes the whole mapping and only then updates memory, so a failed
 * call leaves both memory and disk as they were.
 */
export interface ParameterStore {
  /** Absolute path of the backing file */
  readonly filePath: string;

  /** Copy of the default values */
  readonly defaults: DefaultSettings;

  /** Keys persisted without a default */
  readonly nonDefaults: readonly string[];

  /**
   * Current value of a setting
   * @throws {KeyNotFoundError} If the key is absent
   */
  get(key: SettingKey): JsonValue;

  /** Whether a key is present */
  has(key: SettingKey): boolean;

  /** Keys currently present */
  keys(): string[];

  /** Deep copy of the whole mapping */
  snapshot(): JsonObject;

  /**
   * Assign a setting and persist
   * @throws {ProtectedKeyWriteError} For `user_modules`
   * @throws {PathNotFoundError} For `data_dirs` entries that are not directories
   * @throws {InvalidSettingError} If the value is not JSON-representable
   * @throws {LockTimeoutError} If the file lock is not obtained in time
   */
  set(key: SettingKey, value: JsonValue): Promise<void>;

  /** Reset every key that has a default; other keys are kept */
  restoreDefaults(): Promise<void>;

  /** Replace everything with the defaults plus empty no-default keys */
  clearAndRestart(): Promise<void>;

  /** Write the current mapping to disk */
  store(): Promise<void>;

  /** Re-read the backing file, picking up writes from other handles */
  reload(): Promise<void>;

  /**
   * Replace `user_modules` through an updater
   * Reserved for the module registry
   */
  updateUserModules(update: (current: UserModules) => UserModules): Promise<void>;

  /** Human-readable summary of tracked settings */
  describe(options?: DescribeOptions): string;
}
