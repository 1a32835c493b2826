/**
 * Unit tests for error handling
 */

import { describe, it, expect } from "vitest";
import {
  CorruptStoreError,
  InvalidSettingError,
  KeyNotFoundError,
  LockTimeoutError,
  PathNotFoundError,
  ProtectedKeyWriteError,
  SettingsFileNotLocatedError,
} from "@paramstore/sdk";
import { CliError, mapSdkErrorToExitCode, formatCliError } from "../src/lib/errors.js";

describe("error handling", () => {
  describe("CliError", () => {
    it("should create error with default exit code 1", () => {
      const err = new CliError("test error");
      expect(err.message).toBe("test error");
      expect(err.exitCode).toBe(1);
      expect(err.name).toBe("CliError");
    });

    it("should create error with custom exit code", () => {
      const err = new CliError("not found", { exitCode: 2 });
      expect(err.exitCode).toBe(2);
    });

    it("should support cause", () => {
      const cause = new Error("underlying error");
      const err = new CliError("wrapper", { cause });
      expect(err.cause).toBe(cause);
    });
  });

  describe("mapSdkErrorToExitCode", () => {
    it("should map not-found errors to exit code 2", () => {
      expect(mapSdkErrorToExitCode(new KeyNotFoundError("missing"))).toBe(2);
      expect(mapSdkErrorToExitCode(new PathNotFoundError(["/nowhere"]))).toBe(2);
      expect(mapSdkErrorToExitCode(new SettingsFileNotLocatedError(["/a/settings.json"]))).toBe(2);
    });

    it("should map LockTimeoutError to exit code 3", () => {
      expect(mapSdkErrorToExitCode(new LockTimeoutError("/a/settings.json.lock", 100))).toBe(3);
    });

    it("should map other SDK errors to exit code 1", () => {
      expect(mapSdkErrorToExitCode(new ProtectedKeyWriteError("user_modules"))).toBe(1);
      expect(mapSdkErrorToExitCode(new InvalidSettingError("file_timeout", "must be a number"))).toBe(1);
      expect(mapSdkErrorToExitCode(new CorruptStoreError("/a/settings.json", "bad JSON"))).toBe(1);
    });

    it("should use the exit code carried by CliError", () => {
      expect(mapSdkErrorToExitCode(new CliError("x", { exitCode: 4 }))).toBe(4);
    });

    it("should map unknown errors to exit code 1", () => {
      expect(mapSdkErrorToExitCode(new Error("unknown"))).toBe(1);
      expect(mapSdkErrorToExitCode("not an error")).toBe(1);
    });
  });

  describe("formatCliError", () => {
    it("should format Error instances", () => {
      expect(formatCliError(new Error("test message"))).toBe("test message");
    });

    it("should format non-Error values", () => {
      expect(formatCliError("string error")).toBe("string error");
      expect(formatCliError(42)).toBe("42");
    });

    it("should truncate very long messages", () => {
      const result = formatCliError(new Error("x".repeat(3000)));
      expect(result).toHaveLength(2000 + "... (truncated)".length);
      expect(result.endsWith("... (truncated)")).toBe(true);
    });

    it("should include cause and stack in verbose mode", () => {
      const err = new CliError("outer", { cause: "inner" });
      const result = formatCliError(err, true);

      expect(result.startsWith("outer\n  Cause: inner\n")).toBe(true);
      expect(result.endsWith(`\n${err.stack}`)).toBe(true);
    });

    it("should leave out cause when not verbose", () => {
      expect(formatCliError(new CliError("outer", { cause: "inner" }))).toBe("outer");
    });
  });
});
