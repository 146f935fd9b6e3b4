// ---------------------------------------------------------------------------
// @spatial-text/shared: Environment
// ---------------------------------------------------------------------------
// Process-level settings read from the environment. Component behaviour is
// configured through constructor options, never through env.

import { z } from 'zod';
import { ConfigurationError } from './errors.js';

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

function optional(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

/**
 * Resolve `LOG_LEVEL` (default `info`). Throws on an unknown level so a
 * misspelt setting surfaces at startup instead of silencing logs.
 */
export function readLogLevel(): z.infer<typeof logLevelSchema> {
  const raw = optional('LOG_LEVEL', 'info').toLowerCase();
  const result = logLevelSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError('env', [
      `LOG_LEVEL: expected one of ${logLevelSchema.options.join(', ')}, got "${raw}"`,
    ]);
  }
  return result.data;
}
