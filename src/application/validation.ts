import type { z } from 'zod';
import { ValidationError } from '../domain/index.js';
import type { StorageErrorContext } from '../domain/index.js';

/**
 * Parses `raw` with a zod schema, converting failures into a
 * `ValidationError` that lists every issue with its dotted path.
 */
export function parseWith<S extends z.ZodTypeAny>(
  schema: S,
  raw: unknown,
  context: Omit<StorageErrorContext, 'cause'> = {},
): z.output<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(
      result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
      context,
    );
  }
  return result.data;
}
