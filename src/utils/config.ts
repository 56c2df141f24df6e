/**
 * Configuration utilities
 * Locates and reads the user's config.yml
 */

import { readFileSync, existsSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import { parse as parseYaml } from 'yaml';
import { CONFIG_DIR_NAME, CONFIG_ENV_VAR, CONFIG_FILE_NAME } from '../constants';
import { validateSettings, formatValidationErrors } from '../schemas';
import type { Settings } from '../types';
import { ConfigError } from './errors';

/**
 * Config file path: $SHORTHOP_CONFIG, then $XDG_CONFIG_HOME, then ~/.config
 */
export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const explicit = env[CONFIG_ENV_VAR];
  if (explicit) {
    return explicit;
  }
  const configHome = env.XDG_CONFIG_HOME || join(homedir(), '.config');
  return join(configHome, CONFIG_DIR_NAME, CONFIG_FILE_NAME);
}

/**
 * Config file named by the user, through --config or $SHORTHOP_CONFIG
 */
export function getExplicitConfigPath(
  override?: string,
  env: NodeJS.ProcessEnv = process.env
): string | undefined {
  return override || env[CONFIG_ENV_VAR] || undefined;
}

/**
 * Load settings from a config file. A missing file means all defaults,
 * unless the user named that file explicitly.
 */
export function loadSettings(configPath: string = getConfigPath(), mustExist = false): Settings {
  let content: string | undefined;
  if (!existsSync(configPath)) {
    if (mustExist) {
      throw new ConfigError(
        `Config file not found: ${configPath}`,
        `Check the path given with --config or $${CONFIG_ENV_VAR}`
      );
    }
  } else {
    try {
      content = readFileSync(configPath, 'utf-8');
    } catch (error) {
      throw new ConfigError(
        `Cannot read ${configPath}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  let data: unknown;
  try {
    data = content === undefined ? {} : parseYaml(content);
  } catch (error) {
    throw new ConfigError(
      `Invalid YAML in ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
      'Check the indentation and quoting of the file'
    );
  }

  const result = validateSettings(data);
  if (!result.success) {
    throw new ConfigError(formatValidationErrors(result.error, configPath));
  }
  return result.data;
}
