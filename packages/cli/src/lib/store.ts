/**
 * Store adapter for the CLI
 */

import { openParameters, type ParameterStore } from "@paramstore/sdk";
import { resolveSettingsDir } from "./env.js";

/**
 * Where the CLI looks for settings
 */
export interface CliLocation {
  /** --path option */
  path?: string;
  env: NodeJS.ProcessEnv;
  cwd?: string;
  homeDir?: string;
}

/**
 * Open the settings file the CLI was pointed at
 */
export function openCliParameters(location: CliLocation, createNew = false): Promise<ParameterStore> {
  return openParameters({
    path: resolveSettingsDir(location.path, location.env),
    createNew,
    cwd: location.cwd,
    homeDir: location.homeDir,
  });
}
