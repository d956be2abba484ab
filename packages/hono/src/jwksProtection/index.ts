import { type JwksClient, JwksClientError } from '@jwks-cache/core';
import type { Context, MiddlewareHandler, Next, TypedResponse } from 'hono';
import { endTime, startTime } from 'hono/timing';
import type { JWTPayload } from 'jose';
import type { BaseLogger } from 'pino';

import { BearerAuthorizationSchema } from '../schemas/bearerAuthorization.schema.js';

/**
 * Context variables available when using JWKS protection middleware.
 */
export interface JwksContextVariables {
  jwtPayload: JWTPayload;
}

/**
 * Options for {@link secureJwksToken}.
 */
export interface JwksAuthConfig {
  /** Client whose key set verifies incoming tokens; share one per issuer */
  client: JwksClient;
  /** Accepted `aud` values; omit or leave empty to skip audience validation */
  audience?: readonly string[];
  /** Optional pino logger */
  logger?: BaseLogger;
}

type JwksAuthFailure = Response &
  TypedResponse<
    'Bearer token required' | 'Invalid token' | 'Signing keys unavailable',
    401 | 503,
    'text'
  >;

/**
 * Creates middleware that verifies the request's bearer token against a cached JWKS and
 * protects routes.
 *
 * Responds `401` when the header is missing or the token fails verification, and `503`
 * when the key set cannot be fetched and no cached key could verify the token.
 *
 * @param config - Client, accepted audiences and logger
 * @returns Hono middleware handler that sets `jwtPayload` on success
 */
export function secureJwksToken(config: JwksAuthConfig): MiddlewareHandler {
  return async (
    c: Context<{ Variables: JwksContextVariables }>,
    next: Next,
  ): Promise<JwksAuthFailure | undefined> => {
    startTime(c, 'jwksAuthMiddleware');

    const result = BearerAuthorizationSchema.safeParse(c.req.header('Authorization'));
    if (!result.success) {
      return c.text('Bearer token required', 401);
    }

    let payload: JWTPayload;
    startTime(c, 'verifyToken');
    try {
      payload = await config.client.decode(result.data, config.audience ?? []);
    } catch (error) {
      if (!(error instanceof JwksClientError)) {
        throw error;
      }
      config.logger?.warn(
        { code: error.code, path: c.req.path, error: error.message },
        'Bearer token rejected',
      );
      if (error.code === 'FETCH_FAILED') {
        return c.text('Signing keys unavailable', 503);
      }
      return c.text('Invalid token', 401);
    } finally {
      endTime(c, 'verifyToken');
    }

    c.set('jwtPayload', payload);

    endTime(c, 'jwksAuthMiddleware');
    await next();
  };
}
