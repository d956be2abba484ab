import { decodeProtectedHeader, importJWK, type JWTPayload, jwtVerify } from 'jose';
import type { BaseLogger } from 'pino';
import type * as z from 'zod';

import { KeySetCache } from './cache/keySetCache.js';
import { JwksClientError, toJwksClientError } from './errors.js';
import type { KeySetCacheConfig } from './interfaces/jwksClientConfig.js';
import type { JwksSource } from './interfaces/jwksSource.js';
import { JwksClientBuilder } from './jwksClientBuilder.js';
import type { JsonWebKey, RsaPublicJwk } from './schemas/jsonWebKey.schema.js';
import { resolveLogger } from './utils/logger.js';

/** Default key set time-to-live: 24 hours. */
export const DEFAULT_TIME_TO_LIVE_MS = 24 * 60 * 60 * 1000;

/** Algorithm assumed when a key does not declare one. */
export const DEFAULT_ALGORITHM = 'RS256';

/** Signature algorithms an RSA key can verify. */
export const RSA_ALGORITHMS = new Set<string>([
  'RS256',
  'RS384',
  'RS512',
  'PS256',
  'PS384',
  'PS512',
]);

/** Clock skew tolerated on `exp`, `nbf` and `iat`, in seconds. */
const CLOCK_TOLERANCE_SECONDS = 60;

/**
 * Client for an identity provider's JSON Web Key Set that resolves signing keys by id and
 * verifies tokens signed with them.
 *
 * Keys come from a {@link KeySetCache} that refreshes the whole set from the
 * {@link JwksSource} when a key is missing or the set has outlived its time-to-live. A
 * stale key keeps being served while the source is failing. Share one client across
 * requests; it is safe for concurrent use.
 *
 * @example
 * ```typescript
 * const client = JwksClient.builder()
 *   .timeToLive(60 * 60 * 1000)
 *   .build(new WebSource({ url: 'https://issuer.example.com/.well-known/jwks.json' }));
 *
 * const claims = await client.decode(token, ['https://api.example.com']);
 * ```
 */
export class JwksClient {
  private readonly cache: KeySetCache;
  private readonly logger: BaseLogger;

  /**
   * Prefer {@link JwksClient.builder}.
   *
   * @param source - Where key sets are fetched from
   * @param config - Cache settings; `timeToLiveMs` defaults to 24 hours
   */
  constructor(
    private readonly source: JwksSource,
    config: Partial<KeySetCacheConfig> = {},
  ) {
    this.logger = resolveLogger(config.logger);
    this.cache = new KeySetCache({
      timeToLiveMs: config.timeToLiveMs ?? DEFAULT_TIME_TO_LIVE_MS,
      now: config.now,
      logger: this.logger,
    });
  }

  static builder(): JwksClientBuilder {
    return new JwksClientBuilder();
  }

  /**
   * Retrieves a key from the cache, fetching the key set from the source when the key is
   * unknown or the cached set has expired.
   *
   * @param keyId - Key identifier, usually a token header's `kid`
   * @returns The matching key
   * @throws {JwksClientError} `KEY_NOT_FOUND` when the freshly fetched set lacks the key,
   *   `FETCH_FAILED` when the source fails and no cached key can stand in
   */
  async get(keyId: string): Promise<JsonWebKey> {
    try {
      return await this.cache.getOrRefresh(keyId, () => this.source.fetchKeys());
    } catch (error) {
      throw toJwksClientError(error);
    }
  }

  /**
   * Same as {@link get} with an optional result type, for call sites that treat keys as
   * optional. Every failure of `get`, `KEY_NOT_FOUND` included, still rejects.
   */
  async getOptional(keyId: string): Promise<JsonWebKey | undefined> {
    return await this.get(keyId);
  }

  /**
   * Verifies a token against the key named by its header `kid` and returns its claims.
   *
   * The algorithm is pinned to the key's `alg` (RS256 when the key declares none), `exp`
   * is required and a 60 second clock skew is tolerated. Audience is enforced only when
   * `audience` is non-empty. Only RSA keys can verify tokens today; EC keys are rejected
   * with `UNSUPPORTED_KEY_TYPE`.
   *
   * @param token - Compact JWS token
   * @param audience - Accepted `aud` values; pass an empty array to skip audience validation
   * @param schema - Optional zod schema the verified claims must satisfy
   * @returns Verified claims, parsed by `schema` when given
   * @throws {JwksClientError} `MISSING_KID`, `KEY_NOT_FOUND`, `FETCH_FAILED`,
   *   `UNSUPPORTED_KEY_TYPE` or `TOKEN_DECODE`
   */
  async decode(token: string, audience?: readonly string[]): Promise<JWTPayload>;
  async decode<S extends z.ZodType>(
    token: string,
    audience: readonly string[],
    schema: S,
  ): Promise<z.output<S>>;
  async decode(
    token: string,
    audience: readonly string[] = [],
    schema?: z.ZodType,
  ): Promise<unknown> {
    let keyId: string | undefined;
    try {
      keyId = decodeProtectedHeader(token).kid;
    } catch (error) {
      throw JwksClientError.tokenDecode(error);
    }
    if (!keyId) {
      throw JwksClientError.missingKid();
    }

    const key = await this.get(keyId);
    const algorithm = key.alg ?? DEFAULT_ALGORITHM;

    let payload: JWTPayload;
    switch (key.kty) {
      case 'RSA':
        payload = await this.verifyWithRsaKey(token, key, algorithm, audience);
        break;
      case 'EC':
        // TODO: verify ES256/ES384 tokens once EC keys get the same algorithm pinning as RSA
        throw JwksClientError.unsupportedKeyType(key.kid, key.kty);
      default: {
        const unsupported: never = key;
        throw JwksClientError.unsupportedKeyType(keyId, String(unsupported));
      }
    }

    if (!schema) {
      return payload;
    }
    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw JwksClientError.tokenDecode(parsed.error);
    }
    return parsed.data;
  }

  private async verifyWithRsaKey(
    token: string,
    key: RsaPublicJwk,
    algorithm: string,
    audience: readonly string[],
  ): Promise<JWTPayload> {
    if (!RSA_ALGORITHMS.has(algorithm)) {
      throw JwksClientError.tokenDecode(
        new Error(`Key '${key.kid}' declares algorithm ${algorithm}, which RSA keys cannot verify`),
      );
    }

    try {
      const publicKey = await importJWK({ kty: key.kty, n: key.n, e: key.e }, algorithm);
      const { payload } = await jwtVerify(token, publicKey, {
        algorithms: [algorithm],
        audience: audience.length > 0 ? [...audience] : undefined,
        requiredClaims: ['exp'],
        clockTolerance: CLOCK_TOLERANCE_SECONDS,
      });
      return payload;
    } catch (error) {
      this.logger.debug({ keyId: key.kid, algorithm }, 'token verification failed');
      throw JwksClientError.tokenDecode(error);
    }
  }
}
