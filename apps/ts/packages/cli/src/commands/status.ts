/**
 * Store Status Command
 * Show what the local configurator store currently holds
 */

import * as fs from 'node:fs';
import { DrizzleLayoutStore, logger, resolveStorePath } from '@keymirror/shared';
import chalk from 'chalk';
import { define } from 'gunshi';
import ora from 'ora';
import { CLI_NAME } from '../utils/constants.js';
import { displayFooter, displayHeader, displayKeyValue, displaySection } from '../utils/display-helpers.js';
import { CLINotFoundError, handleCommandError, STATUS_TIPS } from '../utils/error-handling.js';
import { collectStoreStatus, type StoreStatus } from './status-report.js';
import { formatBytes } from './sync-request.js';

function displayStatus(status: StoreStatus): void {
  displayHeader('Layout Store Status');
  displayKeyValue('Store', status.storePath);
  displayKeyValue('Tables', status.tables.join(', '));

  displaySection('Settings');
  if (status.config.length === 0) {
    console.log(chalk.gray('  (none)'));
  }
  for (const entry of status.config) {
    displayKeyValue(`  ${entry.key}`, entry.value ?? chalk.gray('NULL'), 26);
  }

  displaySection('Metadata');
  displayKeyValue(
    'Stored',
    status.metadataBytes === null ? chalk.gray('No') : `Yes (${formatBytes(status.metadataBytes)})`
  );

  displaySection('Revisions');
  if (status.revisions.length === 0) {
    console.log(chalk.gray('  (none)'));
  }
  for (const revision of status.revisions) {
    displayKeyValue(`  ${revision.revisionId}`, formatBytes(revision.size), 26);
  }

  displayFooter();
}

export const statusCommand = define({
  name: 'status',
  description: 'Show the settings, metadata and revisions held by the local store',
  args: {
    path: {
      type: 'string',
      short: 'p',
      description: 'Path of the configurator database (default: ~/.config/.keymapp/keymapp.sqlite3)',
    },
    json: {
      type: 'boolean',
      description: 'Print the status as JSON',
    },
    debug: {
      type: 'boolean',
      short: 'd',
      description: 'Enable debug logging',
    },
  },
  examples: `
# Inspect the default store
${CLI_NAME} status

# Machine-readable output
${CLI_NAME} status --json --path ./keymapp.sqlite3
  `.trim(),
  run: (ctx) => {
    const { json, debug } = ctx.values;
    const storePath = resolveStorePath(ctx.values.path);

    if (debug) {
      logger.setLevel('DEBUG');
    }

    if (!fs.existsSync(storePath)) {
      throw new CLINotFoundError(`No layout store found at ${storePath}`);
    }

    const spinner = ora({ text: 'Reading layout store...', isSilent: json === true }).start();

    let status: StoreStatus;
    try {
      const store = new DrizzleLayoutStore(storePath, { debug: debug === true, readonly: true });
      try {
        status = collectStoreStatus(store);
      } finally {
        store.close();
      }
      spinner.stop();
    } catch (error) {
      handleCommandError(error, spinner, {
        failMessage: 'Failed to read layout store',
        debug,
        tips: STATUS_TIPS,
      });
    }

    if (json) {
      console.log(JSON.stringify(status, null, 2));
      return;
    }
    displayStatus(status);
  },
});
