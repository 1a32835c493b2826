/**
 * CLI error handling and exit code mapping
 */

import {
  KeyNotFoundError,
  LockTimeoutError,
  PathNotFoundError,
  SettingsFileNotLocatedError,
} from "@paramstore/sdk";

/**
 * Base CLI error class
 */
export class CliError extends Error {
  exitCode: number;

  constructor(message: string, options?: { exitCode?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "CliError";
    this.exitCode = options?.exitCode ?? 1;
  }
}

/**
 * Map SDK errors to CLI exit codes
 * - 0: success
 * - 1: usage/validation/IO/unknown error
 * - 2: key, path or settings file not found
 * - 3: settings file locked by another process
 */
export function mapSdkErrorToExitCode(error: unknown): number {
  if (error instanceof CliError) {
    return error.exitCode;
  }

  if (
    error instanceof KeyNotFoundError ||
    error instanceof PathNotFoundError ||
    error instanceof SettingsFileNotLocatedError
  ) {
    return 2;
  }

  if (error instanceof LockTimeoutError) {
    return 3;
  }

  return 1;
}

/**
 * Format an error for CLI output
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (error instanceof Error) {
    let message = error.message;

    // Redact large payloads from error messages
    if (message.length > 2000) {
      message = message.substring(0, 2000) + "... (truncated)";
    }

    if (verbose && error.cause) {
      message += `\n  Cause: ${String(error.cause)}`;
    }

    if (verbose && error.stack) {
      message += `\n${error.stack}`;
    }

    return message;
  }

  return String(error);
}
