// ---------------------------------------------------------------------------
// @spatial-text/shared: Option Validation
// ---------------------------------------------------------------------------

import type { z } from 'zod';
import { ConfigurationError } from './errors.js';

/** Format zod issues as `path: message` lines. */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

/**
 * Parse constructor options with a zod schema, applying its defaults.
 * @throws ConfigurationError listing every failing field
 */
export function parseOptions<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown,
  component: string,
): z.output<T> {
  const result = schema.safeParse(input ?? {});
  if (!result.success) {
    throw new ConfigurationError(component, formatIssues(result.error));
  }
  return result.data;
}
