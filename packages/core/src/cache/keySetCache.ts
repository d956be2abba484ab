import type { BaseLogger } from 'pino';

import { FetchError } from '../errors.js';
import type { Clock, KeySetCacheConfig } from '../interfaces/jwksClientConfig.js';
import { JsonWebKeySet } from '../keySet.js';
import type { JsonWebKey } from '../schemas/jsonWebKey.schema.js';
import { formatError } from '../utils/errorFormatting.js';
import { resolveLogger } from '../utils/logger.js';

/** Fetches a complete key set, e.g. `() => source.fetchKeys()`. */
export type FetchKeys = () => Promise<JsonWebKeySet>;

interface CacheEntry {
  readonly keySet: JsonWebKeySet;
  /** Epoch milliseconds after which the entry is stale */
  readonly expiresAt: number;
}

/**
 * Single-slot cache for a key set, refreshed on demand.
 *
 * A lookup first takes a snapshot of the current entry. A fresh entry holding the key
 * answers immediately. Otherwise the set is refreshed and the key looked up again. When
 * the refresh fails with a {@link FetchError}, or the refreshed set dropped the key, a
 * key found in the stale entry is served instead. Any other rejection propagates. Only a key id that no fetched set ever held is reported as
 * `KEY_NOT_FOUND`.
 *
 * Refreshes are single-flight: while one fetch is in progress every other lookup that
 * needs a refresh awaits the same promise, so at most one fetch runs per cache.
 * Entries are replaced as a whole, so a lookup never sees a half-installed set.
 */
export class KeySetCache {
  private entry: CacheEntry = {
    keySet: JsonWebKeySet.empty(),
    expiresAt: Number.NEGATIVE_INFINITY,
  };
  private pendingRefresh?: Promise<JsonWebKeySet>;
  private readonly timeToLiveMs: number;
  private readonly now: Clock;
  private readonly logger: BaseLogger;

  constructor(config: KeySetCacheConfig) {
    if (!Number.isFinite(config.timeToLiveMs) || config.timeToLiveMs < 0) {
      throw new RangeError(
        `timeToLiveMs must be a non-negative finite number, got ${config.timeToLiveMs}`,
      );
    }
    this.timeToLiveMs = config.timeToLiveMs;
    this.now = config.now ?? Date.now;
    this.logger = resolveLogger(config.logger);
  }

  /** Epoch milliseconds at which the cached set goes stale; `-Infinity` before the first fetch. */
  get expiresAt(): number {
    return this.entry.expiresAt;
  }

  /** Expiry is strict: the set is still fresh during the millisecond it expires on. */
  isExpired(): boolean {
    return this.now() > this.entry.expiresAt;
  }

  /**
   * Resolves a key from the cached set, refreshing it through `fetchKeys` when the key is
   * missing or the set is stale.
   *
   * @param keyId - Key id from a token header
   * @param fetchKeys - Loads a fresh key set; called at most once per refresh
   * @returns The freshest available key with this id
   * @throws {JwksClientError} `KEY_NOT_FOUND` when a successful refresh does not contain the key
   * @throws Whatever `fetchKeys` rejected with, when it fails and no stale key exists or
   *   the rejection is not a {@link FetchError}
   */
  async getOrRefresh(keyId: string, fetchKeys: FetchKeys): Promise<JsonWebKey> {
    // snapshot phase: nothing below is awaited until the refresh starts
    const expired = this.isExpired();
    const cached = this.entry.keySet.findKey(keyId);

    if (cached && !expired) {
      return cached;
    }

    if (!cached) {
      const keySet = await this.refresh(fetchKeys);
      return keySet.getKey(keyId);
    }

    let keySet: JsonWebKeySet;
    try {
      keySet = await this.refresh(fetchKeys);
    } catch (error) {
      if (!(error instanceof FetchError)) {
        throw error;
      }
      this.logger.debug(
        { keyId, error: formatError(error) },
        'key set refresh failed, serving cached key',
      );
      return cached;
    }

    return keySet.findKey(keyId) ?? cached;
  }

  /**
   * Replaces the cached set with a freshly fetched one. A caller arriving while a refresh
   * is already running joins it instead of fetching again.
   *
   * On failure the cached entry is left untouched and the error is rethrown to every
   * caller awaiting this refresh.
   *
   * @returns The newly installed key set
   */
  refresh(fetchKeys: FetchKeys): Promise<JsonWebKeySet> {
    if (this.pendingRefresh) {
      this.logger.debug('joining in-flight key set refresh');
      return this.pendingRefresh;
    }

    const pending = this.fetchAndInstall(fetchKeys).finally(() => {
      if (this.pendingRefresh === pending) {
        this.pendingRefresh = undefined;
      }
    });
    this.pendingRefresh = pending;
    return pending;
  }

  private async fetchAndInstall(fetchKeys: FetchKeys): Promise<JsonWebKeySet> {
    const keySet = await fetchKeys();
    this.entry = { keySet, expiresAt: this.now() + this.timeToLiveMs };
    this.logger.debug(
      { keys: keySet.size, expiresAt: this.entry.expiresAt },
      'installed refreshed key set',
    );
    return keySet;
  }
}
