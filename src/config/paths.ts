/**
 * Centralized Path Definitions
 *
 * Single source of truth for SkyDoc's home directory.
 *
 * Directory structure:
 * ~/.skydoc/
 * └── config.toml     (User configuration)
 *
 * SKYDOC_HOME overrides the location (tests point it at a temp dir).
 */

import { join } from 'node:path';
import { homedir } from 'node:os';

/**
 * Get the SkyDoc directory path (~/.skydoc or $SKYDOC_HOME)
 *
 * Resolved on every call so tests can change SKYDOC_HOME between cases.
 */
export function getSkydocDir(): string {
  return process.env.SKYDOC_HOME ?? join(homedir(), '.skydoc');
}

/**
 * Get the config file path (~/.skydoc/config.toml)
 */
export function getConfigPath(): string {
  return join(getSkydocDir(), 'config.toml');
}
