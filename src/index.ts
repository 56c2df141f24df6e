#!/usr/bin/env node

/**
 * shorthop CLI - Main entry point
 * An SSH wrapper that completes short hostnames and expands shorthand flags
 */

import { Command } from 'commander';
import { SHORTHOP_VERSION } from './constants';
import { registerConnectCommand } from './commands/connect';
import { handleError } from './utils/errors';
import { installInterruptHandler } from './utils/process';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('shorthop')
    .description(
      'An SSH wrapper to simplify life. Provides shortcuts for common SSH flags, ' +
        'hostname completion from a configurable list of domains, and password autofill via sshpass'
    )
    .version(SHORTHOP_VERSION, '-V, --version', 'Show version information')
    .showHelpAfterError('(add --help for additional information)');

  registerConnectCommand(program);

  return program;
}

if (require.main === module) {
  installInterruptHandler();
  createProgram().parseAsync(process.argv).catch(handleError);
}
