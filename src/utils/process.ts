/**
 * Process delegation
 * Runs the built command with the user's terminal attached.
 */

import { spawn } from 'child_process';
import { constants } from 'os';
import type { CommandVector } from '../types';
import { CommandError, InterruptError, handleError } from './errors';

let childRunning = false;

/**
 * Exit code for a child that ended on a signal, the way shells report it
 */
export function signalExitCode(signal: NodeJS.Signals): number {
  for (const [name, value] of Object.entries(constants.signals)) {
    if (name === signal && typeof value === 'number') {
      return 128 + value;
    }
  }
  return 128;
}

/**
 * Ctrl-C before ssh starts ends the run quietly. Once ssh owns the terminal
 * it receives the interrupt itself and we wait for its exit status.
 */
export function handleInterrupt(): void {
  if (!childRunning) {
    handleError(new InterruptError());
  }
}

export function installInterruptHandler(): () => void {
  process.on('SIGINT', handleInterrupt);
  return () => {
    process.off('SIGINT', handleInterrupt);
  };
}

/**
 * Spawn the command and resolve with its exit code
 */
export function runCommand(vector: CommandVector): Promise<number> {
  const [program, ...args] = vector;
  if (program === undefined) {
    return Promise.reject(new Error('Cannot run an empty command'));
  }

  return new Promise((resolve, reject) => {
    childRunning = true;
    const proc = spawn(program, args, {
      stdio: 'inherit',
      shell: false,
    });

    proc.on('error', (error) => {
      childRunning = false;
      reject(new CommandError(program, error));
    });

    proc.on('close', (code, signal) => {
      childRunning = false;
      resolve(code ?? (signal ? signalExitCode(signal) : 1));
    });
  });
}
