import type { BaseLogger } from 'pino';

import type { Clock, KeySetCacheConfig } from './interfaces/jwksClientConfig.js';
import type { JwksSource } from './interfaces/jwksSource.js';
import { JwksClient } from './jwksClient.js';

/**
 * Immutable builder for {@link JwksClient}. Each setter returns a new builder, so a
 * partially configured builder can be shared and specialized.
 *
 * @example
 * ```typescript
 * const client = JwksClient.builder()
 *   .timeToLive(60_000)
 *   .logger(pino())
 *   .build(source);
 * ```
 */
export class JwksClientBuilder {
  constructor(private readonly config: Partial<KeySetCacheConfig> = {}) {}

  /**
   * @param timeToLiveMs - How long a fetched key set is served before the next lookup
   *   refreshes it, in milliseconds (defaults to 24 hours)
   */
  timeToLive(timeToLiveMs: number): JwksClientBuilder {
    return new JwksClientBuilder({ ...this.config, timeToLiveMs });
  }

  /** Overrides the clock used for expiry decisions, mainly for tests. */
  clock(now: Clock): JwksClientBuilder {
    return new JwksClientBuilder({ ...this.config, now });
  }

  logger(logger: BaseLogger): JwksClientBuilder {
    return new JwksClientBuilder({ ...this.config, logger });
  }

  build(source: JwksSource): JwksClient {
    return new JwksClient(source, this.config);
  }
}
