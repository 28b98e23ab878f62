/**
 * Store path utilities for locating the desktop configurator's database
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { getConfig } from '../config';
import { getErrorMessage, StoreError, toError } from '../errors';

/**
 * Permissions for directories created on the way to the store file
 */
export const STORE_DIR_MODE = 0o750;

/**
 * Expand a leading `~` to the current user's home directory
 */
export function expandHomeDir(input: string, homeDir: string = os.homedir()): string {
  if (input === '~') {
    return homeDir;
  }
  if (input.startsWith('~/')) {
    return path.join(homeDir, input.slice(2));
  }
  return input;
}

/**
 * Resolve the store file path:
 * - No input -> configured default (`~/.config/.keymapp/keymapp.sqlite3`)
 * - `~/...` -> relative to the home directory
 * - Anything else -> resolved against the working directory
 */
export function resolveStorePath(input?: string, homeDir?: string): string {
  const raw = input?.trim() ? input.trim() : getConfig().store.defaultPath;
  return path.resolve(expandHomeDir(raw, homeDir));
}

/**
 * Ensure the directory holding the store exists, creating it if necessary
 */
export function ensureStoreDirectory(storePath: string): string {
  const storeDir = path.dirname(storePath);

  try {
    fs.mkdirSync(storeDir, { recursive: true, mode: STORE_DIR_MODE });
  } catch (error) {
    throw new StoreError(`Failed to create store directory at ${storeDir}: ${getErrorMessage(error)}`, toError(error));
  }

  return storeDir;
}
