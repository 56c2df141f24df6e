/**
 * Command Error Handling
 *
 * Every failure the CLI reports goes through here so messages and exit
 * codes stay consistent. A failing ssh child is not an error of ours: its
 * exit status is passed through without a message.
 */

import { printBlank, printRaw, colors } from './output';

/**
 * CLI Error codes for different failure scenarios
 */
export enum ErrorCode {
  // General errors (1-9)
  UNKNOWN = 1,
  INTERRUPTED = 2,
  COMMAND_FAILED = 3,

  // Configuration errors (10-19)
  CONFIG_INVALID = 11,

  // Resolution errors (30-39)
  HOST_NOT_RESOLVED = 30,
  JUMP_HOST_NOT_RESOLVED = 31,
}

/**
 * Base CLI error class with structured information
 */
export class CLIError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode = ErrorCode.UNKNOWN,
    public readonly suggestion?: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'CLIError';
  }

  /**
   * Create error from unknown thrown value
   */
  static from(error: unknown, code: ErrorCode = ErrorCode.UNKNOWN): CLIError {
    if (error instanceof CLIError) {
      return error;
    }
    if (error instanceof Error) {
      return new CLIError(error.message, code, undefined, error);
    }
    return new CLIError(String(error), code);
  }
}

export class ConfigError extends CLIError {
  constructor(message: string, suggestion?: string) {
    super(message, ErrorCode.CONFIG_INVALID, suggestion);
    this.name = 'ConfigError';
  }
}

/**
 * No probe could turn the target host into something ssh can reach
 */
export class ResolutionError extends CLIError {
  constructor(public readonly attemptedHost: string) {
    super(`Failed to find valid FQDN for "${attemptedHost}"`, ErrorCode.HOST_NOT_RESOLVED);
    this.name = 'ResolutionError';
  }
}

export class JumpHostResolutionError extends CLIError {
  constructor(public readonly attemptedHost: string) {
    super(`Failed to find valid FQDN for jumphost "${attemptedHost}"`, ErrorCode.JUMP_HOST_NOT_RESOLVED);
    this.name = 'JumpHostResolutionError';
  }
}

/**
 * The external program could not be started at all
 */
export class CommandError extends CLIError {
  constructor(program: string, cause: Error) {
    super(
      `Failed to run ${program}: ${cause.message}`,
      ErrorCode.COMMAND_FAILED,
      `Check that ${program} is installed and on your PATH`,
      cause
    );
    this.name = 'CommandError';
  }
}

/**
 * Raised when the user interrupts a blocking step. Ends the run silently.
 */
export class InterruptError extends CLIError {
  constructor() {
    super('Interrupted', ErrorCode.INTERRUPTED);
    this.name = 'InterruptError';
  }
}

/**
 * Format error for display
 */
export function formatError(error: CLIError): string {
  const lines: string[] = [];

  lines.push(colors.error(`Error: ${error.message}`));

  if (error.suggestion) {
    lines.push(colors.dim(`  → ${error.suggestion}`));
  }

  if (process.env.DEBUG && error.cause) {
    lines.push(colors.dim(`  Caused by: ${error.cause.message}`));
    if (error.cause.stack) {
      lines.push(colors.dim(error.cause.stack));
    }
  }

  return lines.join('\n');
}

/**
 * Handle error and exit process
 * This is the ONLY place that should call process.exit for errors
 */
export function handleError(error: unknown): never {
  const cliError = CLIError.from(error);

  if (!(cliError instanceof InterruptError)) {
    printBlank();
    printRaw(formatError(cliError));
    printBlank();
  }

  process.exit(cliError.code);
}

/**
 * Type for async command action handlers
 */
export type CommandAction<T extends unknown[] = unknown[]> = (...args: T) => Promise<void>;

/**
 * Wrap a command action with error handling
 *
 * Usage:
 * ```typescript
 * .action(withErrorHandler(async (host, options) => {
 *   if (!resolved) throw new ResolutionError(host);
 * }))
 * ```
 */
export function withErrorHandler<T extends unknown[]>(
  action: CommandAction<T>
): CommandAction<T> {
  return async (...args: T): Promise<void> => {
    try {
      await action(...args);
    } catch (error) {
      handleError(error);
    }
  };
}
