import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, mkdir, rm, readFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import * as path from "node:path";
import { openParameters } from "./params.js";
import { DEFAULTS, SETTINGS_FILENAME } from "./keys.js";
import type { ParameterStore } from "./types.js";
import {
  InvalidSettingError,
  KeyNotFoundError,
  PathNotFoundError,
  ProtectedKeyWriteError,
} from "./errors.js";

describe("Parameters", () => {
  let testDir: string;
  let params: ParameterStore;

  beforeEach(async () => {
    testDir = await mkdtemp(path.join(tmpdir(), "paramstore-params-"));
    params = await openParameters({ path: testDir, createNew: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  async function readBackingFile(): Promise<unknown> {
    return JSON.parse(await readFile(params.filePath, "utf-8"));
  }

  describe("construction with createNew", () => {
    it("should place the file in the given directory", () => {
      expect(params.filePath).toBe(path.join(testDir, SETTINGS_FILENAME));
    });

    it("should start from defaults plus empty no-default keys", async () => {
      expect(params.snapshot()).toEqual({ ...DEFAULTS, data_dirs: [] });
      expect(await readBackingFile()).toEqual({ ...DEFAULTS, data_dirs: [] });
    });

    it("should expose defaults and no-default keys", () => {
      expect(params.defaults).toEqual(DEFAULTS);
      expect(params.nonDefaults).toEqual(["data_dirs"]);
    });

    it("should write canonical JSON", async () => {
      const raw = await readFile(params.filePath, "utf-8");
      const keys = Object.keys(JSON.parse(raw));

      expect(keys).toEqual([...keys].sort());
      expect(raw.endsWith("}\n")).toBe(true);
    });
  });

  describe("get", () => {
    it("should return current values", () => {
      expect(params.get("clean_level")).toBe("clean");
      expect(params.get("file_timeout")).toBe(10);
      expect(params.get("data_dirs")).toEqual([]);
    });

    it("should throw KeyNotFoundError for absent keys", () => {
      expect(() => params.get("missing_key")).toThrow(KeyNotFoundError);
      expect(() => params.get("missing_key")).toThrow("Setting not found: missing_key");
    });

    it("should not find inherited object properties", () => {
      expect(() => params.get("toString")).toThrow(KeyNotFoundError);
      expect(params.has("constructor")).toBe(false);
    });

    it("should return copies that do not alter the store", () => {
      const dirs = params.get("data_dirs");
      if (Array.isArray(dirs)) {
        dirs.push("/tmp/not-stored");
      }

      expect(params.get("data_dirs")).toEqual([]);
    });
  });

  describe("set", () => {
    it("should store generic values and persist them", async () => {
      await params.set("clean_level", "dusty");
      await params.set("custom_threshold", 0.25);

      expect(params.get("clean_level")).toBe("dusty");
      expect(params.get("custom_threshold")).toBe(0.25);
      expect(await readBackingFile()).toMatchObject({ clean_level: "dusty", custom_threshold: 0.25 });
    });

    it("should not type-check generic values", async () => {
      await params.set("update_files", "sometimes");
      expect(params.get("update_files")).toBe("sometimes");
    });

    it("should store nested JSON values", async () => {
      const value = { bands: [1, 2, 3], meta: { source: "test", active: true, note: null } };
      await params.set("custom_block", value);

      expect(params.get("custom_block")).toEqual(value);
      expect(await readBackingFile()).toMatchObject({ custom_block: value });
    });

    it("should reject values that are not JSON-representable", async () => {
      await expect(params.set("bad", Number.NaN)).rejects.toBeInstanceOf(InvalidSettingError);
      await expect(params.set("bad", Number.POSITIVE_INFINITY)).rejects.toBeInstanceOf(InvalidSettingError);
      expect(params.has("bad")).toBe(false);
    });

    it("should always refuse user_modules", async () => {
      const before = await readFile(params.filePath, "utf-8");

      await expect(params.set("user_modules", { demo: { inst: "demo.inst" } })).rejects.toBeInstanceOf(
        ProtectedKeyWriteError
      );
      await expect(params.set("user_modules", {})).rejects.toThrow(/not modifiable through set\(\)/);

      expect(params.get("user_modules")).toEqual({});
      expect(await readFile(params.filePath, "utf-8")).toBe(before);
    });

    it("should reject an unusable file_timeout without changing state", async () => {
      const before = await readFile(params.filePath, "utf-8");

      await expect(params.set("file_timeout", "soon")).rejects.toBeInstanceOf(InvalidSettingError);
      await expect(params.set("file_timeout", -1)).rejects.toBeInstanceOf(InvalidSettingError);

      expect(params.get("file_timeout")).toBe(10);
      expect(await readFile(params.filePath, "utf-8")).toBe(before);
    });

    it("should apply concurrent sets on one handle without losing any", async () => {
      await Promise.all([params.set("alpha", 1), params.set("beta", 2), params.set("gamma", 3)]);

      expect(params.get("alpha")).toBe(1);
      expect(params.get("beta")).toBe(2);
      expect(params.get("gamma")).toBe(3);
      expect(await readBackingFile()).toMatchObject({ alpha: 1, beta: 2, gamma: 3 });
    });
  });

  describe("data_dirs", () => {
    let first: string;
    let second: string;

    beforeEach(async () => {
      first = path.join(testDir, "data-a");
      second = path.join(testDir, "data-b");
      await mkdir(first);
      await mkdir(second);
    });

    it("should replace the full list with valid directories", async () => {
      await params.set("data_dirs", [first]);
      await params.set("data_dirs", [first, second]);

      expect(params.get("data_dirs")).toEqual([first, second]);
      expect(await readBackingFile()).toMatchObject({ data_dirs: [first, second] });
    });

    it("should accept a single path", async () => {
      await params.set("data_dirs", second);
      expect(params.get("data_dirs")).toEqual([second]);
    });

    it("should leave the prior list when any path is invalid", async () => {
      await params.set("data_dirs", [first]);
      const before = await readFile(params.filePath, "utf-8");

      await expect(params.set("data_dirs", [second, path.join(testDir, "missing")])).rejects.toBeInstanceOf(
        PathNotFoundError
      );

      expect(params.get("data_dirs")).toEqual([first]);
      expect(await readFile(params.filePath, "utf-8")).toBe(before);
    });

    it("should clear the list with an empty array", async () => {
      await params.set("data_dirs", [first, second]);
      await params.set("user_key", "kept");

      await params.set("data_dirs", []);

      expect(params.get("data_dirs")).toEqual([]);
      expect(params.get("user_key")).toBe("kept");
      expect(await readBackingFile()).toMatchObject({ data_dirs: [], user_key: "kept" });
    });

    it("should store normalized absolute paths", async () => {
      await params.set("data_dirs", [path.join(first, "..", "data-b", ".")]);
      expect(params.get("data_dirs")).toEqual([second]);
    });
  });

  describe("restoreDefaults", () => {
    it("should reset default keys and keep user and no-default keys", async () => {
      const dataDir = path.join(testDir, "data");
      await mkdir(dataDir);
      await params.set("user_key", 42);
      await params.set("clean_level", "none");
      await params.set("file_timeout", 3);
      await params.set("data_dirs", [dataDir]);

      await params.restoreDefaults();

      expect(params.get("user_key")).toBe(42);
      expect(params.get("data_dirs")).toEqual([dataDir]);
      for (const [key, value] of Object.entries(DEFAULTS)) {
        expect(params.get(key)).toEqual(value);
      }
      expect(await readBackingFile()).toEqual({ ...DEFAULTS, data_dirs: [dataDir], user_key: 42 });
    });
  });

  describe("clearAndRestart", () => {
    it("should drop user keys and reset everything", async () => {
      const dataDir = path.join(testDir, "data");
      await mkdir(dataDir);
      await params.set("user_key", 42);
      await params.set("clean_level", "none");
      await params.set("data_dirs", [dataDir]);

      await params.clearAndRestart();

      expect(params.get("clean_level")).toBe("clean");
      expect(params.get("data_dirs")).toEqual([]);
      expect(params.has("user_key")).toBe(false);
      expect(await readBackingFile()).toEqual({ ...DEFAULTS, data_dirs: [] });
    });
  });

  describe("describe", () => {
    it("should count settings in the short form", async () => {
      await params.set("user_key", 42);

      expect(params.describe({ long: false })).toBe(
        [
          "Parameters",
          "----------",
          "Tracking 7 standard settings",
          "Tracking 1 settings without defaults",
          "Tracking 1 user settings",
          "",
        ].join("\n")
      );
    });

    it("should list values in the long form", async () => {
      await params.set("user_key", 42);

      const lines = params.describe().split("\n");

      expect(lines).toContain("Standard settings:");
      expect(lines).toContain('clean_level : "clean"');
      expect(lines).toContain("file_timeout : 10");
      expect(lines).toContain("Settings without defaults:");
      expect(lines).toContain("data_dirs : []");
      expect(lines).toContain("User settings:");
      expect(lines).toContain("user_key : 42");
    });

    it("should show the directory in toString", () => {
      expect(String(params)).toBe(`Parameters(path="${testDir}")`);
    });
  });
});
