import { describe, it, expect } from "vitest";
import {
  ParamStoreError,
  PathNotFoundError,
  SettingsFileNotLocatedError,
  LockTimeoutError,
  ProtectedKeyWriteError,
  KeyNotFoundError,
  CorruptStoreError,
  InvalidSettingError,
  DocumentWriteError,
} from "./errors.js";

describe("errors", () => {
  it("should carry stable names and codes", () => {
    const cases: [ParamStoreError, string, string][] = [
      [new PathNotFoundError(["/x"]), "PathNotFoundError", "E_PATH_NOT_FOUND"],
      [new SettingsFileNotLocatedError(["/a", "/b"]), "SettingsFileNotLocatedError", "E_SETTINGS_NOT_LOCATED"],
      [new LockTimeoutError("/x.lock", 10), "LockTimeoutError", "E_LOCK_TIMEOUT"],
      [new ProtectedKeyWriteError("user_modules"), "ProtectedKeyWriteError", "E_PROTECTED_KEY"],
      [new KeyNotFoundError("k"), "KeyNotFoundError", "E_KEY_NOT_FOUND"],
      [new CorruptStoreError("/x", "bad"), "CorruptStoreError", "E_CORRUPT_STORE"],
      [new InvalidSettingError("k", "bad"), "InvalidSettingError", "E_INVALID_SETTING"],
      [new DocumentWriteError("/x"), "DocumentWriteError", "WRITE_ERROR"],
    ];

    for (const [err, name, code] of cases) {
      expect(err).toBeInstanceOf(ParamStoreError);
      expect(err).toBeInstanceOf(Error);
      expect(err.name).toBe(name);
      expect(err.code).toBe(code);
    }
  });

  it("should phrase single and multiple missing paths", () => {
    expect(new PathNotFoundError(["/a"]).message).toBe("Path does not lead to a valid directory: /a");
    expect(new PathNotFoundError(["/a", "/b"]).message).toBe("Paths do not lead to valid directories: /a, /b");
  });

  it("should list searched locations", () => {
    const err = new SettingsFileNotLocatedError(["/cwd/s.json", "/home/.p/s.json"]);
    expect(err.message).toContain("Searched: /cwd/s.json, /home/.p/s.json.");
  });

  it("should keep the cause", () => {
    const cause = new Error("disk full");
    const err = new DocumentWriteError("/x", { cause });
    expect(err.cause).toBe(cause);
  });
});
