/**
 * Connection type definitions
 */

/**
 * Host string handed to ssh: `[user@]host`, where host is an IPv4 literal
 * or a name the platform resolver accepted.
 */
export type ResolvedTarget = string;

/**
 * Literal process invocation: program name first, then its arguments.
 */
export type CommandVector = readonly string[];

/**
 * Raised as a value when no probe could validate a host
 */
export interface ResolutionFailure {
  attemptedHost: string;
}

/**
 * Flags parsed from the command line
 */
export interface ConnectionOptions {
  /** Remote command to run instead of an interactive shell */
  command?: string;
  /** Route through the configured jump host */
  jump: boolean;
  /** Explicit jump host, overrides the configured one */
  jumphost?: string;
  /** Disable public key authentication */
  nopubkey: boolean;
  /** SSH port, falls back to the configured port */
  port?: string;
  /** Open a SOCKS5 dynamic forward */
  tunnel: boolean;
  /** Number of -v flags given */
  verbose: number;
  /** Print diagnostics and the command instead of running it */
  dev: boolean;
}
