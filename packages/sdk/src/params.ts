/**
 * Parameter store backed by a single locked JSON file
 */

import * as path from "node:path";
import { homedir } from "node:os";
import type {
  DefaultSettings,
  DescribeOptions,
  JsonObject,
  JsonValue,
  ParameterStore,
  ParametersOptions,
  SettingKey,
  UserModules,
} from "./types.js";
import {
  BOOTSTRAP_TIMEOUT_MS,
  DEFAULTS,
  NON_DEFAULT_KEYS,
  SETTINGS_FILENAME,
  SETTINGS_HOME_DIRNAME,
  createDefaults,
  createInitialSettings,
  isKnownKey,
  resolveKey,
} from "./keys.js";
import { FileLock } from "./lock.js";
import { atomicWrite, ensureDirectory, isDirectory, isFile, readDocument } from "./io.js";
import { canonicalize, safeParseJson } from "./format/canonical.js";
import { expandHome, validateDataDirs, type PathExpansionOptions } from "./paths.js";
import { JsonValueSchema, SettingsFileSchema, UserModulesSchema, describeIssues } from "./schemas.js";
import {
  CorruptStoreError,
  InvalidSettingError,
  KeyNotFoundError,
  PathNotFoundError,
  ProtectedKeyWriteError,
  SettingsFileNotLocatedError,
} from "./errors.js";
import { logger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";

/**
 * Lock timeout configured by a mapping's `file_timeout` (seconds)
 *
 * A mapping without the key (a hand-edited file) uses the default.
 * @throws InvalidSettingError if the value is not a non-negative number
 */
function fileTimeoutMs(data: JsonObject): number {
  const seconds = data.file_timeout ?? DEFAULTS.file_timeout;
  if (typeof seconds !== "number" || !Number.isFinite(seconds) || seconds < 0) {
    throw new InvalidSettingError(
      "file_timeout",
      `expected a non-negative number of seconds, found ${JSON.stringify(seconds)}`
    );
  }
  return Math.round(seconds * 1000);
}

/**
 * Serialize a mapping to the backing file under the write lock
 */
async function writeSettings(lock: FileLock, filePath: string, data: JsonObject): Promise<void> {
  const timeoutMs = fileTimeoutMs(data);
  const content = canonicalize(data);
  const start = Date.now();

  await lock.withLock("write", timeoutMs, () => atomicWrite(filePath, content));

  metrics.recordWriteTime(filePath, Date.now() - start);
  logger.debug("params.store", { file: filePath, details: { keys: Object.keys(data).length } });
}

/**
 * Load and validate the backing file under the read lock
 * @throws CorruptStoreError if the file is not a JSON object
 */
async function readSettings(lock: FileLock, filePath: string, timeoutMs: number): Promise<JsonObject> {
  const start = Date.now();

  // Flush after reading in case the file sits on a networked filesystem
  const raw = await lock.withLock("read", timeoutMs, () => readDocument(filePath, { sync: true }));

  metrics.recordReadTime(filePath, Date.now() - start);

  const parsed = safeParseJson(raw);
  if (!parsed.success) {
    throw new CorruptStoreError(filePath, parsed.error);
  }

  if (parsed.data === null || typeof parsed.data !== "object" || Array.isArray(parsed.data)) {
    const found = parsed.data === null ? "null" : Array.isArray(parsed.data) ? "array" : typeof parsed.data;
    throw new CorruptStoreError(filePath, `expected a JSON object, found ${found}`);
  }

  const settings = SettingsFileSchema.safeParse(parsed.data);
  if (!settings.success) {
    throw new CorruptStoreError(filePath, describeIssues(settings.error));
  }

  logger.debug("params.load", { file: filePath, details: { keys: Object.keys(settings.data).length } });
  return settings.data;
}

/**
 * Settings file locations searched when no explicit path is given, in order
 */
export function settingsSearchPaths(cwd: string, homeDir: string): string[] {
  return [
    path.join(cwd, SETTINGS_FILENAME),
    path.join(homeDir, SETTINGS_HOME_DIRNAME, SETTINGS_FILENAME),
  ];
}

/**
 * Find the first existing settings file
 * @returns The file path, or null with the locations that were searched
 */
export async function findSettingsFile(
  cwd: string,
  homeDir: string
): Promise<{ filePath: string | null; searched: string[] }> {
  const searched = settingsSearchPaths(cwd, homeDir);
  for (const candidate of searched) {
    if (await isFile(candidate)) {
      return { filePath: candidate, searched };
    }
  }
  return { filePath: null, searched };
}

/**
 * Settings store implementation
 *
 * Holds the mapping loaded from the backing file. Mutations on one handle
 * run one at a time; across handles and processes the file lock orders them.
 *
 * @example
 * ```typescript
 * const params = await openParameters({ createNew: true, path: "/srv/settings" });
 *
 * await params.set("data_dirs", ["~/data", "$SCRATCH/data"]);
 * await params.set("custom_threshold", 0.5);
 *
 * params.get("clean_level"); // "clean"
 * ```
 */
class Parameters implements ParameterStore {
  #filePath: string;
  #lock: FileLock;
  #data: JsonObject;
  #pathOptions: PathExpansionOptions;
  #pending: Promise<void> = Promise.resolve();

  constructor(filePath: string, lock: FileLock, data: JsonObject, pathOptions: PathExpansionOptions) {
    this.#filePath = filePath;
    this.#lock = lock;
    this.#data = data;
    this.#pathOptions = pathOptions;
  }

  get filePath(): string {
    return this.#filePath;
  }

  get defaults(): DefaultSettings {
    return structuredClone<DefaultSettings>({ ...DEFAULTS });
  }

  get nonDefaults(): readonly string[] {
    return [...NON_DEFAULT_KEYS];
  }

  get(key: SettingKey): JsonValue {
    const value = Object.hasOwn(this.#data, key) ? this.#data[key] : undefined;
    if (value === undefined) {
      throw new KeyNotFoundError(key);
    }
    // Copy so callers cannot change memory without persisting
    return structuredClone(value);
  }

  has(key: SettingKey): boolean {
    return Object.hasOwn(this.#data, key);
  }

  keys(): string[] {
    return Object.keys(this.#data);
  }

  snapshot(): JsonObject {
    return structuredClone(this.#data);
  }

  async set(key: SettingKey, value: JsonValue): Promise<void> {
    const target = resolveKey(key);

    switch (target.kind) {
      case "user_modules":
        throw new ProtectedKeyWriteError(key);

      case "data_dirs":
        return this.#serialize(async () => {
          const dirs = await validateDataDirs(value, this.#pathOptions);
          await this.#commit({ ...this.#data, data_dirs: dirs });
          logger.debug("params.set", { file: this.#filePath, key, details: { dirs } });
        });

      case "generic": {
        const parsed = JsonValueSchema.safeParse(value);
        if (!parsed.success) {
          throw new InvalidSettingError(target.key, describeIssues(parsed.error));
        }
        return this.#serialize(async () => {
          await this.#commit({ ...this.#data, [target.key]: parsed.data });
          logger.debug("params.set", { file: this.#filePath, key: target.key });
        });
      }
    }
  }

  async restoreDefaults(): Promise<void> {
    return this.#serialize(async () => {
      await this.#commit({ ...this.#data, ...createDefaults() });
    });
  }

  async clearAndRestart(): Promise<void> {
    return this.#serialize(async () => {
      await this.#commit(createInitialSettings());
    });
  }

  async store(): Promise<void> {
    return this.#serialize(async () => {
      await this.#commit(this.#data);
    });
  }

  async reload(): Promise<void> {
    return this.#serialize(async () => {
      this.#data = await readSettings(this.#lock, this.#filePath, fileTimeoutMs(this.#data));
    });
  }

  async updateUserModules(update: (current: UserModules) => UserModules): Promise<void> {
    return this.#serialize(async () => {
      const current = UserModulesSchema.safeParse(this.#data.user_modules ?? {});
      if (!current.success) {
        throw new InvalidSettingError("user_modules", describeIssues(current.error));
      }

      const next = UserModulesSchema.safeParse(update(structuredClone(current.data)));
      if (!next.success) {
        throw new InvalidSettingError("user_modules", describeIssues(next.error));
      }

      await this.#commit({ ...this.#data, user_modules: next.data });
    });
  }

  describe(options: DescribeOptions = {}): string {
    const standard = Object.keys(DEFAULTS);
    const noDefaults = [...NON_DEFAULT_KEYS];
    const user = this.keys().filter((key) => !isKnownKey(key));

    const lines = [
      "Parameters",
      "----------",
      `Tracking ${standard.length} standard settings`,
      `Tracking ${noDefaults.length} settings without defaults`,
      `Tracking ${user.length} user settings`,
    ];

    if (options.long ?? true) {
      const render = (key: string): string => {
        const value = this.#data[key];
        return `${key} : ${value === undefined ? "<unset>" : JSON.stringify(value)}`;
      };

      lines.push("", "Standard settings:", ...standard.map(render));
      lines.push("", "Settings without defaults:", ...noDefaults.map(render));
      lines.push("", "User settings:", ...user.map(render));
    }

    return lines.join("\n") + "\n";
  }

  toString(): string {
    return `Parameters(path="${path.dirname(this.#filePath)}")`;
  }

  /**
   * Persist a candidate mapping, then adopt it as current
   */
  async #commit(next: JsonObject): Promise<void> {
    await writeSettings(this.#lock, this.#filePath, next);
    this.#data = next;
  }

  /**
   * Run mutations on this handle one at a time
   */
  #serialize<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.#pending.then(fn);
    // The caller receives the failure through `run`; the chain only needs to settle
    this.#pending = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}

/**
 * Resolve the backing file for the given options
 */
async function resolveSettingsFile(options: ParametersOptions, cwd: string, homeDir: string): Promise<string> {
  if (options.path !== undefined) {
    const dir = path.resolve(cwd, expandHome(options.path, homeDir));
    if (!(await isDirectory(dir))) {
      throw new PathNotFoundError([dir]);
    }
    return path.join(dir, SETTINGS_FILENAME);
  }

  const { filePath, searched } = await findSettingsFile(cwd, homeDir);
  if (filePath) {
    return filePath;
  }

  if (!options.createNew) {
    throw new SettingsFileNotLocatedError(searched);
  }

  return path.join(homeDir, SETTINGS_HOME_DIRNAME, SETTINGS_FILENAME);
}

/**
 * Open a parameter store
 *
 * Locates (or, with `createNew`, initializes) the settings file and loads it
 * under a read lock. The initial load uses a fixed timeout because the
 * configured `file_timeout` lives in the file being read.
 *
 * @throws {PathNotFoundError} If `path` is not an existing directory
 * @throws {SettingsFileNotLocatedError} If no file is found and `createNew` is not set
 * @throws {CorruptStoreError} If the file does not hold a JSON object
 * @throws {LockTimeoutError} If the file stays locked past the bootstrap timeout
 */
export async function openParameters(options: ParametersOptions = {}): Promise<ParameterStore> {
  const cwd = path.resolve(options.cwd ?? process.cwd());
  const homeDir = options.homeDir ?? homedir();

  const filePath = path.resolve(await resolveSettingsFile(options, cwd, homeDir));
  const lock = new FileLock(filePath);

  if (options.createNew) {
    await ensureDirectory(path.dirname(filePath));
    await writeSettings(lock, filePath, createInitialSettings());
    logger.debug("params.created", { file: filePath });
  }

  const data = await readSettings(lock, filePath, BOOTSTRAP_TIMEOUT_MS);
  return new Parameters(filePath, lock, data, { cwd, homeDir });
}
