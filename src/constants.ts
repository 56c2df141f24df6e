/**
 * Application-wide constants
 */

import packageJson from '../package.json';

export const SHORTHOP_VERSION = packageJson.version;

/**
 * Default settings, used for any key missing from the config file
 */
export const DEFAULT_SSH_PORT = '22';
export const DEFAULT_TUNNEL_PORT = '1080';

/**
 * External programs
 */
export const SSH_COMMAND = 'ssh';
export const SSHPASS_COMMAND = 'sshpass';

/** Highest -v level OpenSSH understands */
export const MAX_VERBOSITY = 3;

/**
 * Config file location
 */
export const CONFIG_ENV_VAR = 'SHORTHOP_CONFIG';
export const CONFIG_DIR_NAME = 'shorthop';
export const CONFIG_FILE_NAME = 'config.yml';
