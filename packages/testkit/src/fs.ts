/**
 * File system test utilities
 */

import { mkdtemp, rm, mkdir } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { openParameters } from "@paramstore/sdk";
import type { ParameterStore, ParametersOptions } from "@paramstore/sdk";

/**
 * Create a unique temporary directory for testing
 * @param prefix - Prefix for the temp directory (default: "paramstore-test-")
 * @returns Absolute path to temp directory
 */
export async function createTempDir(prefix = "paramstore-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory recursively
 * @param path - Path to remove
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Create subdirectories of a root and return their absolute paths
 */
export async function makeDirs(root: string, ...names: string[]): Promise<string[]> {
  const dirs = names.map((name) => join(root, name));
  await Promise.all(dirs.map((dir) => mkdir(dir, { recursive: true })));
  return dirs;
}

/**
 * Execute a function with a clean temp directory
 * @param fn - Function to execute with temp directory path
 * @returns Result of fn
 */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await createTempDir();
  try {
    return await fn(dir);
  } finally {
    await removeDir(dir);
  }
}

/**
 * Execute a function with a freshly created settings file in a temp directory
 *
 * Discovery is pinned inside the temp directory so nothing outside it is read.
 * @param fn - Function to execute with the store and its directory
 * @param options - Extra open options (path and createNew are overridden)
 * @returns Result of fn
 */
export async function withTempParams<T>(
  fn: (params: ParameterStore, dir: string) => Promise<T>,
  options?: Partial<ParametersOptions>
): Promise<T> {
  return withTempDir(async (dir) => {
    const params = await openParameters({
      cwd: dir,
      homeDir: join(dir, "home"),
      ...options,
      path: dir,
      createNew: true,
    });
    return fn(params, dir);
  });
}
