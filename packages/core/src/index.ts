export { type FetchKeys, KeySetCache } from './cache/keySetCache.js';
export {
  FetchError,
  type FetchErrorReason,
  JwksClientError,
  type JwksClientErrorCode,
} from './errors.js';
export type {
  Clock,
  JwksClientRegistryConfig,
  JwksSource,
  KeySetCacheConfig,
} from './interfaces/index.js';
export {
  DEFAULT_ALGORITHM,
  DEFAULT_TIME_TO_LIVE_MS,
  JwksClient,
  RSA_ALGORITHMS,
} from './jwksClient.js';
export { JwksClientBuilder } from './jwksClientBuilder.js';
export { JwksClientRegistry } from './jwksClientRegistry.js';
export { JsonWebKeySet } from './keySet.js';
export * from './schemas/index.js';
export { StaticSource } from './sources/staticSource.js';
export { WebSource } from './sources/webSource.js';
