/**
 * CLI Commands - Main Export
 * Command registry for Gunshi
 */

import { define } from 'gunshi';
import { CLI_DESCRIPTION, CLI_NAME } from '../utils/constants.js';
import { statusCommand } from './status.js';
import { syncCommand } from './sync.js';

// Main command (shown when no subcommand is provided)
export const mainCommand = define({
  name: CLI_NAME,
  description: CLI_DESCRIPTION,
  run: (ctx) => {
    ctx.log('Available commands: sync, status');
    ctx.log(`Use "${CLI_NAME} <command> --help" for more information`);
  },
});

// Direct imports for full args display in help
export const subCommands = {
  sync: syncCommand,
  status: statusCommand,
};
