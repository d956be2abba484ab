export type {
  Clock,
  JwksClientRegistryConfig,
  KeySetCacheConfig,
} from './jwksClientConfig.js';
export type { JwksSource } from './jwksSource.js';
