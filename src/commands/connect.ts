/**
 * Connect command - resolve the host and hand the terminal to ssh
 */

import { InvalidArgumentError, Option, type Command } from 'commander';
import { buildCommand, resolveHost, type ResolveOptions, type TargetResolver } from '../core';
import type { CommandVector, ConnectionOptions } from '../types';
import { getConfigPath, getExplicitConfigPath, loadSettings } from '../utils/config';
import {
  ConfigError,
  JumpHostResolutionError,
  ResolutionError,
  withErrorHandler,
} from '../utils/errors';
import { formatCommand, printDebug, printInfo, printWarning, startSpinner } from '../utils/output';
import { runCommand } from '../utils/process';

/**
 * Options as commander hands them over
 */
export interface ConnectCommandOptions {
  command?: string;
  dev?: boolean;
  jump?: boolean;
  jumphost?: string;
  nopubkey?: boolean;
  port?: string;
  tunnel?: boolean;
  verbose: number;
  config?: string;
}

export type ConnectAction = (host: string, options: ConnectCommandOptions) => Promise<void>;

function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

function parsePort(value: string): string {
  const port = Number(value);
  if (!/^\d+$/.test(value) || port < 1 || port > 65535) {
    throw new InvalidArgumentError('Port must be a number between 1 and 65535.');
  }
  return String(port);
}

export function toConnectionOptions(raw: ConnectCommandOptions): ConnectionOptions {
  return {
    command: raw.command,
    jump: raw.jump ?? false,
    jumphost: raw.jumphost,
    nopubkey: raw.nopubkey ?? false,
    port: raw.port,
    tunnel: raw.tunnel ?? false,
    verbose: raw.verbose,
    dev: raw.dev ?? false,
  };
}

/**
 * Resolve, build and run. Exit status mirrors the ssh process.
 */
export async function connect(host: string, raw: ConnectCommandOptions): Promise<void> {
  const explicitPath = getExplicitConfigPath(raw.config);
  const configPath = explicitPath ?? getConfigPath();
  const settings = loadSettings(configPath, explicitPath !== undefined);
  const options = toConnectionOptions(raw);

  if (options.jump && !settings.jumpHost) {
    throw new ConfigError(
      'No jump host configured',
      `Set jump_host in ${configPath} or pass one with -J <host>`
    );
  }

  if (options.nopubkey) {
    printWarning('Detected use of deprecated -o flag.');
    console.log(
      '  - The behavior of this flag will be changed in a future release to support SSH options more generically'
    );
    console.log('');
  }

  const resolveOptions: ResolveOptions = options.dev
    ? { onProbeFailure: (candidate, reason) => printDebug(`Probe for ${candidate} failed: ${reason}`) }
    : {};
  const resolve: TargetResolver = (token, domains) => resolveHost(token, domains, resolveOptions);

  // Debug lines would be overwritten by the spinner
  const spinner = options.dev ? undefined : startSpinner(`Resolving ${host}...`);
  let vector: CommandVector;
  try {
    const target = await resolve(host, settings.domains);
    if (!target.success) {
      throw new ResolutionError(target.error.attemptedHost);
    }
    const command = await buildCommand(options, settings, target.data, resolve);
    if (!command.success) {
      throw new JumpHostResolutionError(command.error.attemptedHost);
    }
    vector = command.data;
  } finally {
    spinner?.stop();
  }

  if (options.dev) {
    printInfo(formatCommand(vector));
    return;
  }

  process.exitCode = await runCommand(vector);
}

export function registerConnectCommand(program: Command, action: ConnectAction = connect): void {
  program
    .argument(
      '<host>',
      'IP address, FQDN, or the host portion of an FQDN. Names without a "." are completed ' +
        'with the configured list of domains. May carry a "user@" prefix'
    )
    .option(
      '-c, --command <command>',
      'Run the command on the remote host instead of opening an interactive shell. ' +
        'The --tunnel flag is ignored when a command is given'
    )
    .addOption(new Option('-d, --dev', 'Print lookup failures and the ssh command instead of running it').hideHelp())
    .addOption(
      new Option('-j, --jump', 'Connect through the jump host from the config file').conflicts('jumphost')
    )
    .addOption(
      new Option('-J, --jumphost <host>', 'Connect through this jump host instead of the configured one').conflicts(
        'jump'
      )
    )
    .option(
      '-o, --nopubkey',
      'Disable public key authentication (sets PubkeyAuthentication=no). Deprecated'
    )
    .option('-p, --port <port>', 'SSH port (defaults to the configured port)', parsePort)
    .option('-t, --tunnel', 'Open a SOCKS5 tunnel on the configured tunnel port')
    .option('-v, --verbose', 'Verbose ssh output, repeat up to 3 times (-vvv)', increaseVerbosity, 0)
    .option('--config <path>', 'Use this config file')
    .action(withErrorHandler(action));
}
