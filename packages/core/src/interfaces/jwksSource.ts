import type { JsonWebKeySet } from '../keySet.js';

/**
 * Where a client gets its key set from. Implement this interface to load keys from
 * somewhere other than an HTTP endpoint.
 *
 * Implementations perform no retries and no caching: each call is one attempt, and the
 * {@link KeySetCache} decides when to make it.
 */
export interface JwksSource {
  /**
   * Fetches the current key set.
   *
   * @returns The complete key set; an empty set is valid
   * @throws {FetchError} When the key set cannot be retrieved or parsed
   */
  fetchKeys(): Promise<JsonWebKeySet>;
}
