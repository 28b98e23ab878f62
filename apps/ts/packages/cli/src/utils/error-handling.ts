/**
 * Error Handling Utilities
 * Common error handling patterns for CLI commands
 */

import { isKeymirrorError, type KeymirrorErrorCode } from '@keymirror/shared';
import chalk from 'chalk';
import type ora from 'ora';

/**
 * Base error class for CLI operations
 * Provides structured error handling with exit codes
 */
export class CLIError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number = 1,
    public readonly silent: boolean = false,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'CLIError';
  }
}

/**
 * Error thrown when a required option is missing or a flag is misused.
 * Exits with status 2 like other command-line usage errors.
 */
export class CLIUsageError extends CLIError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 2, false, options);
    this.name = 'CLIUsageError';
  }
}

/**
 * Error thrown when a required resource is not found
 */
export class CLINotFoundError extends CLIError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 1, false, options);
    this.name = 'CLINotFoundError';
  }
}

const DEBUG_TIP = 'Try with --debug flag for more information';

/**
 * Troubleshooting tips per failure kind of a sync run
 */
export const SYNC_TIPS: Record<KeymirrorErrorCode, string[]> = {
  INVALID_ADDRESS: [
    'Copy the address from the layout page of the configurator website',
    'Expected form: https://configure.zsa.io/<geometry>/layouts/<layoutId>/<revisionId>',
  ],
  FETCH_FAILED: [
    'Check network connectivity',
    'Raise the request deadline with KEYMIRROR_REQUEST_TIMEOUT_MS',
    DEBUG_TIP,
  ],
  MALFORMED_RESPONSE: ['Verify that the layout and revision exist and are public', DEBUG_TIP],
  STORE_ERROR: [
    'Check that the store path is writable',
    'Quit the desktop configurator if it holds the database open',
    DEBUG_TIP,
  ],
};

/**
 * Status command troubleshooting tips
 */
export const STATUS_TIPS = ['Pass --path if the store is not in the default location', DEBUG_TIP];

const DEFAULT_TROUBLESHOOTING_TIPS = [DEBUG_TIP];

/**
 * Pick the tips that match a failure
 */
export function getTipsForError(error: unknown): string[] {
  if (isKeymirrorError(error)) {
    return SYNC_TIPS[error.code];
  }
  return DEFAULT_TROUBLESHOOTING_TIPS;
}

/**
 * Display troubleshooting tips
 */
export function displayTroubleshootingTips(tips: string[]): void {
  console.error(chalk.gray('\n💡 Troubleshooting tips:'));
  for (const tip of tips) {
    console.error(chalk.gray(`   • ${tip}`));
  }
}

/**
 * Handle command error with consistent formatting
 */
export function handleCommandError(
  error: unknown,
  spinner: ReturnType<typeof ora>,
  options: {
    failMessage: string;
    debug?: boolean;
    tips?: string[];
  }
): never {
  // Re-throw CLIError directly to preserve original exitCode/silent flags
  if (error instanceof CLIError) {
    spinner.stop();
    throw error;
  }

  spinner.fail(options.failMessage);

  const errorMessage = error instanceof Error ? error.message : String(error);
  console.error(chalk.red(`\nError: ${errorMessage}`));

  if (options.debug && error instanceof Error && error.stack) {
    console.error(chalk.gray(`\n[DEBUG] Stack trace:\n${error.stack}`));
  }

  displayTroubleshootingTips(options.tips ?? getTipsForError(error));

  throw new CLIError(errorMessage, 1, true, { cause: error });
}
