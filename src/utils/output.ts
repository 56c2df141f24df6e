/**
 * Output formatting utilities
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';

export const colors = {
  error: chalk.red,
  warning: chalk.yellow,
  info: chalk.cyan,
  dim: chalk.gray,
};

export function printWarning(message: string): void {
  console.log(colors.warning(`⚠ ${message}`));
}

export function printInfo(message: string): void {
  console.log(colors.info(`→ ${message}`));
}

export function printDebug(message: string): void {
  console.log(colors.dim(`[DEBUG] ${message}`));
}

export function printBlank(): void {
  console.log('');
}

export function printRaw(message: string): void {
  console.error(message);
}

/**
 * Render a command vector the way a shell would accept it
 */
export function formatCommand(vector: readonly string[]): string {
  return vector
    .map((arg) => (/^[\w@%+=:,./-]+$/.test(arg) ? arg : `'${arg.replace(/'/g, `'\\''`)}'`))
    .join(' ');
}

/**
 * Spinner shown while hosts are looked up. Only on an interactive terminal.
 */
export function startSpinner(text: string): Ora | undefined {
  return process.stderr.isTTY ? ora(text).start() : undefined;
}
