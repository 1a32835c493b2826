/**
 * Expansion, normalization and validation of data directory paths
 *
 * Invariants:
 * - Output paths are absolute and normalized
 * - A batch is accepted only if every path names an existing directory
 */

import * as path from "node:path";
import { homedir } from "node:os";
import { InvalidSettingError, PathNotFoundError } from "./errors.js";
import { isDirectory } from "./io.js";
import { DataDirsInputSchema, describeIssues } from "./schemas.js";

export interface PathExpansionOptions {
  /** Base for relative paths (default: process.cwd()) */
  cwd?: string;
  /** Replacement for a leading ~ (default: os.homedir()) */
  homeDir?: string;
  /** Variables available to $NAME and ${NAME} (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

/**
 * Expand a leading tilde (~) to the home directory
 */
export function expandHome(input: string, homeDir: string = homedir()): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homeDir;
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // Leave "~user" style references untouched
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(homeDir, rest);
}

const ENV_REFERENCE = /\$(?:\{([^}]+)\}|([A-Za-z_][A-Za-z0-9_]*))/g;

/**
 * Expand $NAME and ${NAME} references; unknown names are left as written
 */
export function expandEnvVars(input: string, env: NodeJS.ProcessEnv = process.env): string {
  return input.replace(ENV_REFERENCE, (reference: string, braced?: string, bare?: string) => {
    const name = braced ?? bare;
    if (name === undefined) {
      return reference;
    }
    const value = env[name];
    return value === undefined ? reference : value;
  });
}

/**
 * Expand and normalize one path to an absolute form
 */
export function normalizeDataDir(input: string, options: PathExpansionOptions = {}): string {
  const expanded = expandEnvVars(expandHome(input, options.homeDir), options.env);
  return path.resolve(options.cwd ?? process.cwd(), expanded);
}

/**
 * Normalize a path or list of paths and confirm each is an existing directory
 * @returns Normalized absolute paths, in input order
 * @throws InvalidSettingError if the input is not a string or a list of strings
 * @throws PathNotFoundError naming every path that is not a directory
 */
export async function validateDataDirs(
  input: unknown,
  options: PathExpansionOptions = {}
): Promise<string[]> {
  const parsed = DataDirsInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidSettingError("data_dirs", describeIssues(parsed.error));
  }

  const raw = typeof parsed.data === "string" ? [parsed.data] : parsed.data;
  const normalized = raw.map((dir) => normalizeDataDir(dir, options));

  const checks = await Promise.all(normalized.map((dir) => isDirectory(dir)));
  const failing = normalized.filter((_, index) => !checks[index]);

  if (failing.length > 0) {
    throw new PathNotFoundError(failing);
  }

  return normalized;
}
