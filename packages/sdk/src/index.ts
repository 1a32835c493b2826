/**
 * Parameter store SDK
 *
 * A settings file shared safely between processes through an advisory lock
 */

// Re-export types
export type {
  JsonValue,
  JsonObject,
  DefaultSettings,
  NonDefaultSettings,
  KnownKey,
  SettingKey,
  UserModules,
  ResolvedKey,
  ParametersOptions,
  DescribeOptions,
  CanonicalOptions,
  ParameterStore,
} from "./types.js";
export type { ModuleEntry, ModuleRef } from "./schemas.js";
export type { LockMode, LockInfo } from "./lock.js";
export type { PathExpansionOptions } from "./paths.js";
export type { RegisterOptions } from "./registry.js";
export type { LogLevel, LogEntry, LogSink } from "./observability/logs.js";
export type { FileMetrics } from "./observability/metrics.js";

// Store
export { openParameters, findSettingsFile, settingsSearchPaths } from "./params.js";

// Settings schema
export {
  SETTINGS_FILENAME,
  SETTINGS_HOME_DIRNAME,
  BOOTSTRAP_TIMEOUT_MS,
  DEFAULTS,
  NON_DEFAULT_KEYS,
  isKnownKey,
  resolveKey,
} from "./keys.js";

// Module registry
export { listModules, registerModule, deregisterModule } from "./registry.js";

// Locking and paths
export { FileLock } from "./lock.js";
export { expandHome, expandEnvVars, normalizeDataDir, validateDataDirs } from "./paths.js";

// Formatting and I/O
export { canonicalize, safeParseJson, SETTINGS_FORMAT } from "./format/canonical.js";
export { JsonValueSchema } from "./schemas.js";
export { atomicWrite, readDocument, ensureDirectory } from "./io.js";

// Observability
export { logger } from "./observability/logs.js";
export { metrics } from "./observability/metrics.js";

// Errors
export {
  ParamStoreError,
  PathNotFoundError,
  SettingsFileNotLocatedError,
  LockTimeoutError,
  ProtectedKeyWriteError,
  KeyNotFoundError,
  CorruptStoreError,
  InvalidSettingError,
  DocumentReadError,
  DocumentWriteError,
  DirectoryError,
} from "./errors.js";
