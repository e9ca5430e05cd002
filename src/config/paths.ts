/**
 * Centralized Path Definitions
 *
 * ~/.know/
 * └── config.toml     (User configuration)
 *
 * KNOW_HOME relocates the directory (used by tests and CI).
 */

import { join } from 'node:path';
import { homedir } from 'node:os';

/**
 * Get the know directory path (~/.know, or $KNOW_HOME)
 */
export function getKnowDir(): string {
  return process.env['KNOW_HOME'] ?? join(homedir(), '.know');
}

/**
 * Get the default config file path (~/.know/config.toml)
 */
export function getConfigPath(): string {
  return join(getKnowDir(), 'config.toml');
}
