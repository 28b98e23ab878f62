/**
 * Layout Sync Command
 * Mirror one layout revision into the configurator's local store
 */

import {
  ConsoleLogger,
  type LayoutSyncResult,
  logger,
  MetadataClient,
  RevisionClient,
  SilentLogger,
  syncLayout,
} from '@keymirror/shared';
import chalk from 'chalk';
import { define } from 'gunshi';
import ora from 'ora';
import { CLI_NAME } from '../utils/constants.js';
import { displayFooter, displayHeader, displayKeyValue, displayList, displaySuccess } from '../utils/display-helpers.js';
import { handleCommandError } from '../utils/error-handling.js';
import { buildSyncRequest, formatBytes } from './sync-request.js';

/**
 * Display sync result summary
 */
function displaySyncResult(result: LayoutSyncResult): void {
  displayHeader('Layout Sync Summary');

  displayKeyValue('Geometry', result.address.geometry);
  displayKeyValue('Layout', result.address.layoutId);
  displayKeyValue('Revision', result.revisionId);
  if (result.revisionId !== result.address.revisionId) {
    console.log(chalk.gray(`  (requested as "${result.address.revisionId}")`));
  }
  displayKeyValue('Payload', formatBytes(result.revisionBytes));
  displayKeyValue(
    'Metadata',
    result.metadataFetched ? `fetched (${formatBytes(result.metadataBytes)})` : chalk.gray('already present')
  );
  displayKeyValue('Store', result.storePath);

  if (result.seededKeys.length > 0) {
    console.log(chalk.white('\nDefault settings added:'));
    displayList(result.seededKeys);
  }

  displayFooter();
}

/**
 * Sync command definition
 */
export const syncCommand = define({
  name: 'sync',
  description: 'Download a layout revision and save it into the local configurator store',
  args: {
    layout: {
      type: 'string',
      short: 'l',
      description: 'Layout page address (https://configure.zsa.io/<geometry>/layouts/<layoutId>/<revisionId>)',
    },
    path: {
      type: 'string',
      short: 'p',
      description: 'Path of the configurator database (default: ~/.config/.keymapp/keymapp.sqlite3)',
    },
    'skip-mkdir': {
      type: 'boolean',
      description: 'Do not create missing directories on the way to the store',
    },
    debug: {
      type: 'boolean',
      short: 'd',
      description: 'Enable debug logging',
    },
  },
  examples: `
# Mirror a revision into the default store
${CLI_NAME} sync --layout https://configure.zsa.io/moonlander/layouts/AbCd1/latest/0

# Use a different store file
${CLI_NAME} sync --layout <url> --path ./keymapp.sqlite3

# Enable debug logging
${CLI_NAME} sync --layout <url> --debug
  `.trim(),
  run: async (ctx) => {
    const { debug } = ctx.values;
    const request = buildSyncRequest(ctx.values);

    if (debug) {
      logger.setLevel('DEBUG');
    }
    const runLogger = debug ? new ConsoleLogger() : new SilentLogger();

    const spinner = ora('Preparing layout sync...').start();

    try {
      const result = await syncLayout(request, {
        revisionFetcher: new RevisionClient({ logger: runLogger }),
        metadataFetcher: new MetadataClient({ logger: runLogger }),
        logger: runLogger,
        onProgress: (_stage, message) => {
          spinner.text = message;
        },
      });

      spinner.stop();
      displaySyncResult(result);
      displaySuccess(`Revision ${result.revisionId} saved to ${result.storePath}`);
    } catch (error) {
      handleCommandError(error, spinner, {
        failMessage: 'Layout sync failed',
        debug,
      });
    }
  },
});
