/**
 * Where repo-velocity keeps its two local files: optional threshold
 * overrides (config.json) and snapshot history (history.db). Both live
 * under one home directory, `$REPO_VELOCITY_HOME` or `~/.repo-velocity`.
 */

import { mkdirSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';

export const HOME_ENV_VAR = 'REPO_VELOCITY_HOME';
export const CONFIG_FILE_NAME = 'config.json';
export const HISTORY_DB_FILE_NAME = 'history.db';

export interface VelocityPaths {
  home: string;
  configFile: string;
  historyDb: string;
}

export function resolvePaths(env: NodeJS.ProcessEnv = process.env): VelocityPaths {
  const home = env[HOME_ENV_VAR] || join(homedir(), '.repo-velocity');
  return {
    home,
    configFile: join(home, CONFIG_FILE_NAME),
    historyDb: join(home, HISTORY_DB_FILE_NAME),
  };
}

/**
 * Create the home directory (owner-only) before the history database is
 * opened in it. An existing directory keeps its permissions.
 */
export function ensureHome(home: string = resolvePaths().home): string {
  mkdirSync(home, { recursive: true, mode: 0o700 });
  return home;
}
