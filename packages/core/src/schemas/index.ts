export {
  EcPublicJwkSchema,
  type EcPublicJwk,
  JsonWebKeySchema,
  type JsonWebKey,
  JsonWebKeySetSchema,
  type JsonWebKeySetDocument,
  RsaPublicJwkSchema,
  type RsaPublicJwk,
  SUPPORTED_KEY_TYPES,
} from './jsonWebKey.schema.js';
export {
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_TIMEOUT_MS,
  WebSourceConfigSchema,
  type WebSourceOptions,
  type WebSourceSettings,
} from './webSourceConfig.schema.js';
