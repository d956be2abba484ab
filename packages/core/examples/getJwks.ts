import { pino } from 'pino';
import * as z from 'zod';

import { JwksClient, JwksClientError, WebSource } from '../src/index.js';

/**
 * Looks up a key on a live JWKS endpoint.
 *
 *   JWKS_URL=https://issuer.example.com/.well-known/jwks.json KID=my-key-id npm run example
 *
 * `KID` must be one of the `kid` values the endpoint publishes.
 */
const EnvSchema = z.object({
  JWKS_URL: z.url(),
  KID: z.string().min(1),
  JWKS_TTL_SECONDS: z.coerce.number().int().positive().default(60),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error']).default('info'),
});

const env = EnvSchema.parse(process.env);
const logger = pino({ level: env.LOG_LEVEL });

const source = new WebSource({ url: env.JWKS_URL }, logger);
const client = JwksClient.builder()
  .timeToLive(env.JWKS_TTL_SECONDS * 1000)
  .logger(logger)
  .build(source);

// "unknown" is not a kid any provider publishes, so this lookup must fail
try {
  await client.get('unknown');
} catch (error) {
  if (!(error instanceof JwksClientError)) {
    throw error;
  }
  logger.info({ code: error.code }, `get with kid "unknown": ${error.message}`);
}

const key = await client.get(env.KID);
logger.info({ key }, `get with kid "${env.KID}"`);
