/**
 * Host Resolver
 *
 * Turns a host token typed by the user into the host string handed to ssh.
 * Probes run cheapest first and the first success wins:
 *   1. IPv4 literal, no lookup
 *   2. the name itself, only when it already contains a dot
 *   3. the name completed with each configured domain, in order
 */

import { lookup } from 'dns/promises';
import type { ResolutionFailure, ResolvedTarget, Result } from '../types';
import { ok, err } from '../types';
import { isIPv4Literal } from './ipv4';

/**
 * Platform name resolution. Rejects when the name does not resolve.
 */
export type HostLookup = (hostname: string) => Promise<unknown>;

export interface ResolveOptions {
  lookup?: HostLookup;
  /** Called once for every candidate that failed to resolve */
  onProbeFailure?: (candidate: string, reason: string) => void;
}

/**
 * Default lookup backed by getaddrinfo
 */
export const systemLookup: HostLookup = (hostname) => lookup(hostname, { all: true });

/**
 * Split `user@host` at the last `@`. The prefix keeps its `@`.
 */
export function splitUserPrefix(rawToken: string): { prefix: string; host: string } {
  const at = rawToken.lastIndexOf('@');
  return {
    prefix: rawToken.slice(0, at + 1),
    host: rawToken.slice(at + 1),
  };
}

function reasonOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function probeLookup(lookupFn: HostLookup, candidate: string): Promise<Result<string, string>> {
  try {
    await lookupFn(candidate);
    return ok(candidate);
  } catch (error) {
    return err(reasonOf(error));
  }
}

/**
 * Resolve a raw host token against the domain search list
 */
export async function resolveHost(
  rawToken: string,
  domains: readonly string[],
  options: ResolveOptions = {}
): Promise<Result<ResolvedTarget, ResolutionFailure>> {
  const { lookup: lookupFn = systemLookup, onProbeFailure } = options;
  const { host } = splitUserPrefix(rawToken);

  if (isIPv4Literal(host)) {
    return ok(rawToken);
  }
  onProbeFailure?.(host, 'not an IPv4 address or network');

  // An undotted name is never a complete FQDN, and looking one up against
  // public resolvers only fails slowly.
  if (host.includes('.')) {
    const direct = await probeLookup(lookupFn, host);
    if (direct.success) {
      return ok(rawToken);
    }
    onProbeFailure?.(host, direct.error);
  }

  for (const domain of domains) {
    const candidate = `${host}.${domain}`;
    const completed = await probeLookup(lookupFn, candidate);
    if (completed.success) {
      return ok(`${rawToken}.${domain}`);
    }
    onProbeFailure?.(candidate, completed.error);
  }

  return err({ attemptedHost: host });
}
