/**
 * Centralized Path Definitions
 *
 * Single source of truth for ragent's on-disk locations.
 *
 * Directory structure:
 * ~/.ragent/            (or $RAGENT_HOME)
 * ├── config.toml       (User configuration)
 * ├── sessions.db       (SQLite session store)
 * └── index/            (Saved vector index)
 *
 * Resolved on every call so RAGENT_HOME can change between tests.
 */

import { join } from 'node:path';
import { homedir } from 'node:os';

/**
 * Get the ragent home directory ($RAGENT_HOME or ~/.ragent)
 */
export function getRagentDir(): string {
  const override = process.env.RAGENT_HOME?.trim();
  return override ? override : join(homedir(), '.ragent');
}

/**
 * Get the config file path (<home>/config.toml)
 */
export function getConfigPath(): string {
  return join(getRagentDir(), 'config.toml');
}

/**
 * Expand a leading `~/` (as written in config.toml) to the user's home.
 * The `~/.ragent` prefix follows RAGENT_HOME when it is set.
 */
export function expandHome(path: string): string {
  if (path === '~/.ragent' || path.startsWith('~/.ragent/')) {
    return join(getRagentDir(), path.slice('~/.ragent'.length));
  }
  if (path === '~' || path.startsWith('~/')) {
    return join(homedir(), path.slice(1));
  }
  return path;
}
