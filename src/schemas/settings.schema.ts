/**
 * Schema validation for the user config file
 * Uses Zod for runtime type checking and validation
 */

import { z } from 'zod';
import { DEFAULT_SSH_PORT, DEFAULT_TUNNEL_PORT } from '../constants';

/**
 * Ports may be written as numbers or strings in YAML; ssh receives strings
 */
export const PortSchema = z
  .union([z.number().int(), z.string().regex(/^\d+$/, 'Port must be a number')])
  .transform((value) => Number(value))
  .refine((port) => port >= 1 && port <= 65535, { message: 'Port must be between 1 and 65535' })
  .transform((port) => String(port));

export const DomainSchema = z
  .string()
  .min(1, 'Domain cannot be empty')
  .regex(/^[^.\s@/][^\s@/]*$/, 'Domain must not start with a dot or contain spaces, "@" or "/"');

/**
 * config.yml schema. Keys are written in snake_case on disk.
 */
export const SettingsFileSchema = z
  .object({
    ssh_port: PortSchema.optional().default(DEFAULT_SSH_PORT).describe('Default SSH port'),
    jump_host: z.string().optional().default('').describe('Jump host used by --jump'),
    domains: z.array(DomainSchema).optional().default([]).describe(
      'Domain suffixes tried, in order, to complete short hostnames'
    ),
    tunnel_port: PortSchema.optional().default(DEFAULT_TUNNEL_PORT).describe(
      'Local port of the SOCKS5 tunnel opened by --tunnel'
    ),
    sshpass: z.boolean().optional().default(false).describe(
      'Wrap ssh with "sshpass -e" (password read from $SSHPASS)'
    ),
  })
  .strict();
