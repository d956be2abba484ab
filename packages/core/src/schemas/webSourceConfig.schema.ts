import * as z from 'zod';

export const DEFAULT_CONNECT_TIMEOUT_MS = 20_000;
export const DEFAULT_TIMEOUT_MS = 10_000;

/**
 * Zod schema for the options of a {@link WebSource}.
 *
 * @property url - Absolute http(s) URL of the key set (usually `<issuer>/.well-known/jwks.json`)
 * @property connectTimeoutMs - Time allowed until response headers arrive
 * @property timeoutMs - Time allowed for the whole request, body included
 * @property headers - Extra request headers (e.g. an API gateway key)
 */
export const WebSourceConfigSchema = z.object({
  url: z.url({ protocol: /^https?$/ }),
  connectTimeoutMs: z.number().int().positive().default(DEFAULT_CONNECT_TIMEOUT_MS),
  timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  headers: z.record(z.string(), z.string()).optional(),
});

export type WebSourceOptions = z.input<typeof WebSourceConfigSchema>;
export type WebSourceSettings = z.output<typeof WebSourceConfigSchema>;
