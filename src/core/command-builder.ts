/**
 * Command Builder
 *
 * Assembles the argument vector for the system ssh client from the parsed
 * flags, the user settings and an already resolved target. Each flag maps to
 * one small step so the order of the final vector is easy to follow.
 */

import { MAX_VERBOSITY, SSH_COMMAND, SSHPASS_COMMAND } from '../constants';
import type {
  CommandVector,
  ConnectionOptions,
  ResolutionFailure,
  ResolvedTarget,
  Result,
  Settings,
} from '../types';
import { ok } from '../types';
import { resolveHost } from './resolver';

export type TargetResolver = (
  rawToken: string,
  domains: readonly string[]
) => Promise<Result<ResolvedTarget, ResolutionFailure>>;

/**
 * `-v`, `-vv` or `-vvv`; nothing for a count of zero
 */
export function verbosityArgs(count: number): string[] {
  const level = Math.min(Math.max(Math.trunc(count), 0), MAX_VERBOSITY);
  return level > 0 ? [`-${'v'.repeat(level)}`] : [];
}

export function authArgs(options: Pick<ConnectionOptions, 'nopubkey'>): string[] {
  const args = ['-o', 'StrictHostKeyChecking=no'];
  if (options.nopubkey) {
    args.push('-o', 'PubkeyAuthentication=no');
  }
  return args;
}

/**
 * A remote command closes the session as soon as it exits, so a tunnel
 * would be torn down before anything could use it.
 */
export function tunnelArgs(
  options: Pick<ConnectionOptions, 'tunnel' | 'command'>,
  settings: Pick<Settings, 'tunnelPort'>
): string[] {
  return options.tunnel && !options.command ? ['-D', settings.tunnelPort] : [];
}

export function remoteCommandArgs(options: Pick<ConnectionOptions, 'command'>): string[] {
  return options.command ? [options.command] : [];
}

/**
 * sshpass cannot answer the prompts of a jump host, and a target with its own
 * user is assumed to need other credentials than the stored one.
 */
export function usesPasswordInjection(
  settings: Pick<Settings, 'sshpass'>,
  target: ResolvedTarget,
  jumpHost: string | undefined
): boolean {
  return jumpHost === undefined && settings.sshpass && !target.includes('@');
}

/**
 * Pick the jump host for this invocation and resolve it.
 * An explicit --jumphost wins over the configured host used by --jump.
 */
export async function resolveJumpHost(
  options: Pick<ConnectionOptions, 'jump' | 'jumphost'>,
  settings: Pick<Settings, 'jumpHost' | 'domains'>,
  resolve: TargetResolver = resolveHost
): Promise<Result<string | undefined, ResolutionFailure>> {
  const requested = options.jumphost || (options.jump ? settings.jumpHost : undefined);
  if (!requested) {
    return ok(undefined);
  }
  return resolve(requested, settings.domains);
}

/**
 * Build the command vector once every host involved is known
 */
export function assembleCommand(
  options: ConnectionOptions,
  settings: Settings,
  target: ResolvedTarget,
  jumpHost?: string
): CommandVector {
  const wrapper = usesPasswordInjection(settings, target, jumpHost) ? [SSHPASS_COMMAND, '-e'] : [];
  const jumpArgs = jumpHost !== undefined ? ['-J', jumpHost] : [];

  return [
    ...wrapper,
    SSH_COMMAND,
    '-p', options.port ?? settings.sshPort,
    ...verbosityArgs(options.verbose),
    ...authArgs(options),
    ...jumpArgs,
    ...tunnelArgs(options, settings),
    target,
    ...remoteCommandArgs(options),
  ];
}

/**
 * Build the full invocation for a resolved target.
 * Fails only when the jump host cannot be resolved.
 */
export async function buildCommand(
  options: ConnectionOptions,
  settings: Settings,
  target: ResolvedTarget,
  resolve: TargetResolver = resolveHost
): Promise<Result<CommandVector, ResolutionFailure>> {
  const jumpHost = await resolveJumpHost(options, settings, resolve);
  if (!jumpHost.success) {
    return jumpHost;
  }
  return ok(assembleCommand(options, settings, target, jumpHost.data));
}
