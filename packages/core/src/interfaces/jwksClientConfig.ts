import type { BaseLogger } from 'pino';

/** Returns the current time in milliseconds since the epoch. */
export type Clock = () => number;

/**
 * Options shared by the key set cache and the client that owns it.
 */
export interface KeySetCacheConfig {
  /** How long a fetched key set is served before the next lookup refreshes it, in milliseconds */
  timeToLiveMs: number;

  /** Clock used for expiry decisions (defaults to `Date.now`) */
  now?: Clock;

  /** Optional pino logger */
  logger?: BaseLogger;
}

/**
 * Options for a {@link JwksClientRegistry}, which builds one web-backed client per JWKS URL.
 */
export interface JwksClientRegistryConfig {
  /** Maximum number of clients kept before the least recently used is dropped (defaults to 100) */
  maxClients?: number;

  /** Key set time-to-live for every client, in milliseconds (defaults to 24 hours) */
  timeToLiveMs?: number;

  /** Time allowed until response headers arrive, in milliseconds (defaults to 20 seconds) */
  connectTimeoutMs?: number;

  /** Time allowed for a whole key set request, in milliseconds (defaults to 10 seconds) */
  timeoutMs?: number;

  /** Optional pino logger, shared by the registry and its clients */
  logger?: BaseLogger;
}
