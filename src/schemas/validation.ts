/**
 * Validation utilities for the config file
 * Provides user-friendly error messages and formatting
 */

import { z } from 'zod';
import { SettingsFileSchema } from './settings.schema';
import type { Result, Settings } from '../types';
import { ok, err } from '../types';

/**
 * Validation error with path and message
 */
export interface ValidationIssue {
  path: string;
  message: string;
  code: string;
}

/**
 * Format Zod path to readable string
 */
function formatPath(path: PropertyKey[]): string {
  if (path.length === 0) return 'root';

  return path.map((segment, index) => {
    if (typeof segment === 'number') {
      return `[${segment}]`;
    }
    if (typeof segment === 'symbol') {
      return `[Symbol(${segment.description ?? ''})]`;
    }
    return index === 0 ? segment : `.${segment}`;
  }).join('');
}

function transformZodErrors(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: formatPath(issue.path),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Format validation errors for console output.
 * Left uncoloured: the error handler colours the whole message.
 */
export function formatValidationErrors(errors: ValidationIssue[], fileName: string): string {
  const lines: string[] = [`Validation failed for ${fileName}`];

  for (const error of errors) {
    lines.push(`  → ${error.path}: ${error.message}`);
  }

  return lines.join('\n');
}

/**
 * Validate parsed config content and map it onto Settings.
 * An empty document (null) yields the defaults.
 */
export function validateSettings(data: unknown): Result<Settings, ValidationIssue[]> {
  const result = SettingsFileSchema.safeParse(data ?? {});

  if (!result.success) {
    return err(transformZodErrors(result.error));
  }

  const file = result.data;
  return ok({
    sshPort: file.ssh_port,
    jumpHost: file.jump_host,
    domains: file.domains,
    tunnelPort: file.tunnel_port,
    sshpass: file.sshpass,
  });
}
