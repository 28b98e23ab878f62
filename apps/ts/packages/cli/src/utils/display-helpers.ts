/**
 * Display Helpers
 * Common display patterns for CLI commands
 */

import chalk from 'chalk';

const SEPARATOR_WIDTH = 60;

/**
 * Display a section header with separator lines
 */
export function displayHeader(title: string): void {
  console.log(`\n${chalk.bold('='.repeat(SEPARATOR_WIDTH))}`);
  console.log(chalk.bold.cyan(title));
  console.log(chalk.bold('='.repeat(SEPARATOR_WIDTH)));
}

/**
 * Display a section footer
 */
export function displayFooter(): void {
  console.log(`${chalk.bold('='.repeat(SEPARATOR_WIDTH))}\n`);
}

/**
 * Display a section title
 */
export function displaySection(title: string): void {
  console.log(chalk.yellow(`\n--- ${title} ---`));
}

/**
 * Display a key-value pair with the value column aligned
 */
export function displayKeyValue(key: string, value: string, width = 16): void {
  console.log(`${`${key}:`.padEnd(width)}${chalk.white(value)}`);
}

/**
 * Display a list of items with bullet points
 */
export function displayList(items: string[], options?: { color?: 'red' | 'yellow' | 'gray'; maxItems?: number }): void {
  const { color = 'gray', maxItems = 10 } = options ?? {};
  const colorFn = color === 'red' ? chalk.red : color === 'yellow' ? chalk.yellow : chalk.gray;

  for (const item of items.slice(0, maxItems)) {
    console.log(colorFn(`  • ${item}`));
  }

  if (items.length > maxItems) {
    console.log(colorFn(`  ... and ${items.length - maxItems} more`));
  }
}

/**
 * Display success message
 */
export function displaySuccess(message: string): void {
  console.log(chalk.green(`✓ ${message}`));
}
