import { z } from 'zod';

/**
 * Validates a bundled JSON table at load time.
 * A malformed table throws so the process never starts with bad coefficients.
 */
export function parseTable<S extends z.ZodTypeAny>(schema: S, input: unknown, label: string): z.infer<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new Error(`[Config] Invalid ${label}: ${issues}`);
  }
  return result.data;
}
