import { JwksClientError } from './errors.js';
import {
  type JsonWebKey,
  type JsonWebKeySetDocument,
  JsonWebKeySetSchema,
} from './schemas/jsonWebKey.schema.js';

/**
 * Immutable, ordered set of public keys published by an identity provider.
 *
 * Lookups scan the keys in publication order. When a provider publishes the same `kid`
 * twice the first matching key wins.
 *
 * @see https://www.rfc-editor.org/rfc/rfc7517#section-5
 */
export class JsonWebKeySet {
  private readonly keyList: readonly JsonWebKey[];

  private constructor(keys: readonly JsonWebKey[]) {
    this.keyList = Object.freeze([...keys]);
  }

  /** A set with no keys, the state of a cache that has not fetched anything yet. */
  static empty(): JsonWebKeySet {
    return new JsonWebKeySet([]);
  }

  static from(keys: readonly JsonWebKey[]): JsonWebKeySet {
    return new JsonWebKeySet(keys);
  }

  /**
   * Validates a key set document (typically a parsed `jwks_uri` response body).
   *
   * @param input - Decoded JSON value
   * @throws {ZodError} When the document is not a key set, or an RSA/EC key lacks required members
   */
  static parse(input: unknown): JsonWebKeySet {
    return new JsonWebKeySet(JsonWebKeySetSchema.parse(input).keys);
  }

  get size(): number {
    return this.keyList.length;
  }

  /**
   * Finds the key with the given id.
   *
   * @throws {JwksClientError} `KEY_NOT_FOUND` when no key matches
   */
  getKey(keyId: string): JsonWebKey {
    const key = this.findKey(keyId);
    if (!key) {
      throw JwksClientError.keyNotFound(keyId);
    }
    return key;
  }

  /**
   * Same contract as {@link getKey}. Keys are immutable and shared, so handing one out
   * does not remove it from the set.
   */
  takeKey(keyId: string): JsonWebKey {
    return this.getKey(keyId);
  }

  /** Non-throwing lookup used by the cache, which must tell a miss from a failure. */
  findKey(keyId: string): JsonWebKey | undefined {
    return this.keyList.find((key) => key.kid === keyId);
  }

  keys(): JsonWebKey[] {
    return [...this.keyList];
  }

  toJSON(): JsonWebKeySetDocument {
    return { keys: this.keys() };
  }
}
