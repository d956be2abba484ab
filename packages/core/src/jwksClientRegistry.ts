import type { JWTPayload } from 'jose';
import { LRUCache } from 'lru-cache';
import type { BaseLogger } from 'pino';

import { JwksClientError } from './errors.js';
import type { JwksClientRegistryConfig } from './interfaces/jwksClientConfig.js';
import { DEFAULT_TIME_TO_LIVE_MS, JwksClient } from './jwksClient.js';
import { WebSource } from './sources/webSource.js';
import { resolveLogger } from './utils/logger.js';

const DEFAULT_MAX_CLIENTS = 100;

/**
 * Keeps one web-backed {@link JwksClient} per JWKS URL, for services that accept tokens
 * from several issuers.
 *
 * Clients live in an LRU cache so that a growing set of issuers cannot grow memory
 * without bound; an evicted client's key set is simply fetched again on next use.
 *
 * @example
 * ```typescript
 * const registry = new JwksClientRegistry({ timeToLiveMs: 15 * 60 * 1000, logger });
 * const claims = await registry.decode(issuer.jwksUri, token, [clientId]);
 * ```
 */
export class JwksClientRegistry {
  private readonly clients: LRUCache<string, JwksClient>;
  private readonly logger: BaseLogger;

  constructor(private readonly config: JwksClientRegistryConfig = {}) {
    this.logger = resolveLogger(config.logger);
    this.clients = new LRUCache<string, JwksClient>({
      max: config.maxClients ?? DEFAULT_MAX_CLIENTS,
    });
  }

  /** Number of clients currently held. */
  get size(): number {
    return this.clients.size;
  }

  /**
   * Returns the client for a JWKS URL, creating it on first use.
   *
   * @param jwksUrl - Absolute http(s) URL of the key set
   * @throws {ZodError} When the URL is not an absolute http(s) URL
   */
  getClient(jwksUrl: string): JwksClient {
    let client = this.clients.get(jwksUrl);
    if (!client) {
      const source = new WebSource(
        {
          url: jwksUrl,
          connectTimeoutMs: this.config.connectTimeoutMs,
          timeoutMs: this.config.timeoutMs,
        },
        this.logger,
      );
      client = new JwksClient(source, {
        timeToLiveMs: this.config.timeToLiveMs ?? DEFAULT_TIME_TO_LIVE_MS,
        logger: this.logger,
      });
      this.logger.debug({ jwksUrl }, 'created key set client');
      this.clients.set(jwksUrl, client);
    }
    return client;
  }

  /**
   * Verifies a token against the key set published at `jwksUrl`.
   *
   * @throws {JwksClientError} As {@link JwksClient.decode}; an invalid `jwksUrl` rejects
   *   with `FETCH_FAILED` and the `ZodError` as cause
   * @see JwksClient.decode
   */
  async decode(
    jwksUrl: string,
    token: string,
    audience: readonly string[] = [],
  ): Promise<JWTPayload> {
    let client: JwksClient;
    try {
      client = this.getClient(jwksUrl);
    } catch (error) {
      throw JwksClientError.fetchFailed(error);
    }
    return await client.decode(token, audience);
  }
}
