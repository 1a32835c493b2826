/**
 * Registry of user instrument modules kept under `user_modules`
 *
 * This is the only path that may change `user_modules`; `set()` refuses it.
 */

import { InvalidSettingError, KeyNotFoundError } from "./errors.js";
import {
  ModuleEntrySchema,
  ModuleRefSchema,
  UserModulesSchema,
  describeIssues,
  type ModuleEntry,
  type ModuleRef,
} from "./schemas.js";
import type { ParameterStore, UserModules } from "./types.js";
import { logger } from "./observability/logs.js";

export interface RegisterOptions {
  /** Replace an existing entry that points at a different module */
  overwrite?: boolean;
}

/**
 * Registered modules, flattened and sorted by platform then name
 */
export function listModules(params: ParameterStore): ModuleEntry[] {
  const raw = params.has("user_modules") ? params.get("user_modules") : {};
  const parsed = UserModulesSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidSettingError("user_modules", describeIssues(parsed.error));
  }

  const entries: ModuleEntry[] = [];
  for (const [platform, names] of Object.entries(parsed.data)) {
    for (const [name, module] of Object.entries(names)) {
      entries.push({ platform, name, module });
    }
  }

  return entries.sort((a, b) =>
    a.platform === b.platform ? compare(a.name, b.name) : compare(a.platform, b.platform)
  );
}

function compare(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Register a module under platform/name
 * Re-registering the same module is a no-op write
 * @throws InvalidSettingError on a malformed entry, or a conflicting entry without `overwrite`
 */
export async function registerModule(
  params: ParameterStore,
  entry: ModuleEntry,
  options: RegisterOptions = {}
): Promise<void> {
  const parsed = ModuleEntrySchema.safeParse(entry);
  if (!parsed.success) {
    throw new InvalidSettingError("user_modules", describeIssues(parsed.error));
  }
  const { platform, name, module } = parsed.data;

  await params.updateUserModules((current): UserModules => {
    const existing = current[platform]?.[name];
    if (existing !== undefined && existing !== module && !options.overwrite) {
      throw new InvalidSettingError(
        "user_modules",
        `${platform}/${name} is already registered to "${existing}"`
      );
    }
    return { ...current, [platform]: { ...current[platform], [name]: module } };
  });

  logger.debug("registry.register", { file: params.filePath, details: { platform, name, module } });
}

/**
 * Remove a module registration; platforms left empty are dropped
 * @throws KeyNotFoundError if platform/name is not registered
 */
export async function deregisterModule(params: ParameterStore, ref: ModuleRef): Promise<void> {
  const parsed = ModuleRefSchema.safeParse(ref);
  if (!parsed.success) {
    throw new InvalidSettingError("user_modules", describeIssues(parsed.error));
  }
  const { platform, name } = parsed.data;

  await params.updateUserModules((current): UserModules => {
    const names = current[platform];
    if (!names || names[name] === undefined) {
      throw new KeyNotFoundError(`user_modules.${platform}.${name}`);
    }

    const { [name]: _removed, ...rest } = names;
    const next = { ...current };
    if (Object.keys(rest).length === 0) {
      delete next[platform];
    } else {
      next[platform] = rest;
    }
    return next;
  });

  logger.debug("registry.deregister", { file: params.filePath, details: { platform, name } });
}
