export {
  type JwksAuthConfig,
  type JwksContextVariables,
  secureJwksToken,
} from './jwksProtection/index.js';
export {
  BearerAuthorizationSchema,
  type BearerToken,
} from './schemas/bearerAuthorization.schema.js';
