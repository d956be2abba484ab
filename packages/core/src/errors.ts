import { errors } from 'jose';

import { formatError } from './utils/errorFormatting.js';

/**
 * Discriminates the failures a {@link JwksClient} reports.
 *
 * - `FETCH_FAILED` - the key set could not be fetched and no cached key could stand in
 * - `KEY_NOT_FOUND` - the key id is absent from a freshly fetched key set
 * - `TOKEN_DECODE` - malformed token, bad signature, expired, audience or claims mismatch
 * - `MISSING_KID` - the token header carries no `kid`
 * - `UNSUPPORTED_KEY_TYPE` - the matching key cannot verify tokens (only RSA can today)
 */
export type JwksClientErrorCode =
  | 'FETCH_FAILED'
  | 'KEY_NOT_FOUND'
  | 'TOKEN_DECODE'
  | 'MISSING_KID'
  | 'UNSUPPORTED_KEY_TYPE';

/**
 * The single error type surfaced by the client. The underlying error, when there is one,
 * is kept as `cause` so callers can inspect it (e.g. `error.cause instanceof errors.JWTExpired`).
 */
export class JwksClientError extends Error {
  override readonly name = 'JwksClientError';

  private constructor(
    readonly code: JwksClientErrorCode,
    message: string,
    options?: { cause?: unknown; keyId?: string; keyType?: string },
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.keyId = options?.keyId;
    this.keyType = options?.keyType;
  }

  /** Key id involved in a `KEY_NOT_FOUND` or `UNSUPPORTED_KEY_TYPE` failure. */
  readonly keyId?: string;

  /** `kty` of the rejected key for `UNSUPPORTED_KEY_TYPE`. */
  readonly keyType?: string;

  static fetchFailed(cause: unknown): JwksClientError {
    return new JwksClientError(
      'FETCH_FAILED',
      `Failed fetching the key set: ${formatError(cause)}`,
      { cause },
    );
  }

  static keyNotFound(keyId: string): JwksClientError {
    return new JwksClientError('KEY_NOT_FOUND', `Cannot find key for key_id: ${keyId}`, {
      keyId,
    });
  }

  static tokenDecode(cause: unknown): JwksClientError {
    return new JwksClientError('TOKEN_DECODE', `Token decoding error: ${formatError(cause)}`, {
      cause,
    });
  }

  static missingKid(): JwksClientError {
    return new JwksClientError('MISSING_KID', 'Missing kid value in the JWT token header');
  }

  static unsupportedKeyType(keyId: string, keyType: string): JwksClientError {
    return new JwksClientError(
      'UNSUPPORTED_KEY_TYPE',
      `Key '${keyId}' has unsupported key type for token verification: ${keyType}`,
      { keyId, keyType },
    );
  }

  /** True when decoding failed only because the token's `exp` has passed. */
  get isTokenExpired(): boolean {
    return this.code === 'TOKEN_DECODE' && this.cause instanceof errors.JWTExpired;
  }
}

/** Why a {@link JwksSource} could not produce a key set. */
export type FetchErrorReason = 'network' | 'timeout' | 'status' | 'parse';

/**
 * Failure raised by a key set source. Network, timeout, HTTP status and body parsing
 * failures are told apart by `reason`.
 */
export class FetchError extends Error {
  override readonly name = 'FetchError';

  constructor(
    readonly reason: FetchErrorReason,
    readonly url: string,
    message: string,
    options?: { cause?: unknown; status?: number },
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.status = options?.status;
  }

  /** HTTP status for `reason === 'status'`. */
  readonly status?: number;
}

/**
 * Normalizes anything thrown while resolving a key into a {@link JwksClientError}.
 * Errors that are already client errors pass through untouched.
 */
export function toJwksClientError(error: unknown): JwksClientError {
  if (error instanceof JwksClientError) {
    return error;
  }
  return JwksClientError.fetchFailed(error);
}
