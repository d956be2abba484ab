import { z } from 'zod';

/**
 * Zod schema for an `Authorization: Bearer <token>` header, yielding the token.
 */
export const BearerAuthorizationSchema = z
  .string()
  .regex(/^Bearer\s+\S+$/i, 'Bearer token required')
  .transform((header) => header.replace(/^Bearer\s+/i, ''));

/**
 * Type representing the token extracted from a bearer authorization header.
 */
export type BearerToken = z.output<typeof BearerAuthorizationSchema>;
