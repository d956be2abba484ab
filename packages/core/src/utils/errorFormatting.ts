import { ZodError } from 'zod';

/**
 * Folds an unknown error into one line of text for error messages and logs.
 *
 * A `ZodError` lists each issue as `path: message`, joined by `; `, with `(root)` standing
 * in for an empty path. Other errors give their message; anything else is stringified.
 *
 * @example
 * ```typescript
 * formatError(JsonWebKeySetSchema.safeParse({}).error);
 * // => 'keys: Invalid input: expected array, received undefined'
 * ```
 */
export function formatError(error: unknown): string {
  if (error instanceof ZodError) {
    return error.issues
      .map((issue) => `${issue.path.map(String).join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
