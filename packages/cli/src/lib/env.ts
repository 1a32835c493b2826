/**
 * Environment and configuration resolution
 */

/**
 * Resolve the settings directory
 * Priority: CLI option > PARAMSTORE_PATH env var > discovery (undefined)
 */
export function resolveSettingsDir(cliPath: string | undefined, env: NodeJS.ProcessEnv = process.env): string | undefined {
  const fromEnv = env.PARAMSTORE_PATH;
  return cliPath ?? (fromEnv ? fromEnv : undefined);
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.PARAMSTORE_CLI_DEBUG === "1";
}
