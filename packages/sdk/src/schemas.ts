/**
 * Zod schemas for values crossing the store boundary
 * Provides runtime type safety and detailed validation errors
 */

import { z } from "zod";
import type { JsonObject, JsonValue, UserModules } from "./types.js";

/**
 * Any JSON-representable value (finite numbers only)
 */
export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(z.string(), JsonValueSchema),
  ])
);

/**
 * Whole settings file: a JSON object, never an array or scalar
 */
export const SettingsFileSchema: z.ZodType<JsonObject> = z.record(z.string(), JsonValueSchema);

/**
 * data_dirs input: one path or a list of paths (an empty list clears it)
 */
export const DataDirsInputSchema = z.union([
  z.string().min(1, "path must be non-empty"),
  z.array(z.string().min(1, "path must be non-empty")),
]);

/**
 * Holder record inside a lock file; only the pid is needed to spot a dead holder
 */
export const LockHolderSchema = z.object({
  pid: z.number().int().positive(),
});

/**
 * user_modules: platform → name → module specifier
 */
export const UserModulesSchema: z.ZodType<UserModules> = z.record(
  z.string(),
  z.record(z.string(), z.string())
);

const namePattern = /^[A-Za-z0-9]+(?:[._-][A-Za-z0-9]+)*$/;

const NameSchema = z
  .string()
  .min(1)
  .regex(namePattern, "must start with alphanumeric and contain only letters, numbers, dots, underscores, and hyphens");

/**
 * Registry entry identifying one instrument module
 */
export const ModuleRefSchema = z.object({
  platform: NameSchema,
  name: NameSchema,
});

/**
 * Registry entry with the module specifier to load
 */
export const ModuleEntrySchema = ModuleRefSchema.extend({
  module: z.string().min(1, "module specifier must be non-empty"),
});

export type ModuleRef = z.infer<typeof ModuleRefSchema>;
export type ModuleEntry = z.infer<typeof ModuleEntrySchema>;

/**
 * Flatten zod issues into one line for error messages
 */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
