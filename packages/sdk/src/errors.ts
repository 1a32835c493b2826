/**
 * Error types for parameter store operations
 *
 * Invariants:
 * - File-related errors include the absolute path in the message
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

/**
 * Base class for all parameter store errors
 */
export abstract class ParamStoreError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when an explicit settings directory or a data directory does not exist
 */
export class PathNotFoundError extends ParamStoreError {
  readonly code = "E_PATH_NOT_FOUND";

  constructor(
    public readonly paths: readonly string[],
    options?: ErrorOptions
  ) {
    super(
      paths.length === 1
        ? `Path does not lead to a valid directory: ${paths[0]}`
        : `Paths do not lead to valid directories: ${paths.join(", ")}`,
      options
    );
  }
}

/**
 * Thrown when no settings file is found and creation was not requested
 */
export class SettingsFileNotLocatedError extends ParamStoreError {
  readonly code = "E_SETTINGS_NOT_LOCATED";

  constructor(
    public readonly searched: readonly string[],
    options?: ErrorOptions
  ) {
    super(
      `Unable to locate a settings file. Searched: ${searched.join(", ")}. ` +
        `Open with createNew to initialize one.`,
      options
    );
  }
}

/**
 * Thrown when the advisory lock cannot be obtained within the timeout
 */
export class LockTimeoutError extends ParamStoreError {
  readonly code = "E_LOCK_TIMEOUT";

  constructor(
    public readonly lockPath: string,
    public readonly timeoutMs: number,
    options?: ErrorOptions
  ) {
    super(
      `Failed to acquire lock after ${timeoutMs}ms. Lock file: ${lockPath}. ` +
        `A lock left behind by a crashed process can be removed manually.`,
      options
    );
  }
}

/**
 * Thrown on a direct write to a key that only a dedicated interface may change
 */
export class ProtectedKeyWriteError extends ParamStoreError {
  readonly code = "E_PROTECTED_KEY";

  constructor(
    public readonly key: string,
    options?: ErrorOptions
  ) {
    super(
      `"${key}" is not modifiable through set(); use the module registry ` +
        `functions (registerModule, deregisterModule) instead.`,
      options
    );
  }
}

/**
 * Thrown when reading a key that is not present
 */
export class KeyNotFoundError extends ParamStoreError {
  readonly code = "E_KEY_NOT_FOUND";

  constructor(
    public readonly key: string,
    options?: ErrorOptions
  ) {
    super(`Setting not found: ${key}`, options);
  }
}

/**
 * Thrown when the backing file does not hold a JSON object
 */
export class CorruptStoreError extends ParamStoreError {
  readonly code = "E_CORRUPT_STORE";

  constructor(
    public readonly filePath: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Settings file is corrupt: ${filePath}: ${reason}`, options);
  }
}

/**
 * Thrown when a value cannot be stored under a key
 */
export class InvalidSettingError extends ParamStoreError {
  readonly code = "E_INVALID_SETTING";

  constructor(
    public readonly key: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Invalid value for "${key}": ${reason}`, options);
  }
}

/**
 * Thrown when a file read operation fails
 */
export class DocumentReadError extends ParamStoreError {
  readonly code = "READ_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to read file: ${filePath}`, options);
  }
}

/**
 * Thrown when a file write operation fails
 */
export class DocumentWriteError extends ParamStoreError {
  readonly code = "WRITE_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to write file: ${filePath}`, options);
  }
}

/**
 * Thrown when a directory operation fails
 */
export class DirectoryError extends ParamStoreError {
  readonly code = "DIRECTORY_ERROR";

  constructor(dirPath: string, options?: ErrorOptions) {
    super(`Directory operation failed: ${dirPath}`, options);
  }
}
