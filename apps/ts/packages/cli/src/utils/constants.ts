/**
 * CLI constants
 */

export const CLI_NAME = 'keymirror';
export const CLI_VERSION = '0.1.0';
export const CLI_DESCRIPTION = 'Mirror keyboard layout revisions into the local configurator store';
