/**
 * Layout sync command helpers
 */

import { type LayoutSyncOptions, resolveStorePath } from '@keymirror/shared';
import { CLI_NAME } from '../utils/constants.js';
import { CLIUsageError } from '../utils/error-handling.js';

export const SYNC_USAGE = `Usage: ${CLI_NAME} sync --layout <url> [--path <file>] [--skip-mkdir] [--debug]`;

export interface SyncCommandValues {
  layout?: string;
  path?: string;
  'skip-mkdir'?: boolean;
}

/**
 * Turn parsed command-line values into sync options
 */
export function buildSyncRequest(values: SyncCommandValues, homeDir?: string): LayoutSyncOptions {
  const address = values.layout?.trim();
  if (!address) {
    throw new CLIUsageError(`Missing required option --layout\n${SYNC_USAGE}`);
  }

  return {
    address,
    storePath: resolveStorePath(values.path, homeDir),
    createDirectories: !values['skip-mkdir'],
  };
}

/**
 * Format a byte count for display
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  const k = 1024;
  const sizes = ['B', 'KB', 'MB', 'GB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
  return `${(bytes / k ** i).toFixed(2)} ${sizes[i]}`;
}
