import type { BaseLogger } from 'pino';

import { FetchError } from '../errors.js';
import type { JwksSource } from '../interfaces/jwksSource.js';
import { JsonWebKeySet } from '../keySet.js';
import {
  type WebSourceOptions,
  type WebSourceSettings,
  WebSourceConfigSchema,
} from '../schemas/webSourceConfig.schema.js';
import { formatError } from '../utils/errorFormatting.js';
import { jwksFetch } from '../utils/jwksFetch.js';
import { resolveLogger } from '../utils/logger.js';

/**
 * Key set source that downloads the key set from an HTTP(S) endpoint, typically an
 * identity provider's `/.well-known/jwks.json`.
 *
 * Every {@link fetchKeys} call issues exactly one GET request. Two timers bound it:
 * `connectTimeoutMs` until the response headers arrive and `timeoutMs` for the whole
 * exchange, body included. Non-2xx responses and bodies that are not a key set fail.
 *
 * @example
 * ```typescript
 * const source = new WebSource({
 *   url: 'https://issuer.example.com/.well-known/jwks.json',
 *   timeoutMs: 5_000,
 * });
 * const keySet = await source.fetchKeys();
 * ```
 */
export class WebSource implements JwksSource {
  private readonly settings: WebSourceSettings;
  private readonly logger: BaseLogger;

  /**
   * @param options - Endpoint URL, timeouts and extra headers
   * @param logger - Optional pino logger
   * @throws {ZodError} When the URL is not an absolute http(s) URL or a timeout is not a positive integer
   */
  constructor(options: WebSourceOptions, logger?: BaseLogger) {
    this.settings = WebSourceConfigSchema.parse(options);
    this.logger = resolveLogger(logger);
  }

  get url(): string {
    return this.settings.url;
  }

  async fetchKeys(): Promise<JsonWebKeySet> {
    const { url, connectTimeoutMs, timeoutMs, headers } = this.settings;
    const controller = new AbortController();
    let timedOut: 'connect' | 'total' | undefined;

    const connectTimer = setTimeout(() => {
      timedOut = 'connect';
      controller.abort();
    }, connectTimeoutMs);
    const totalTimer = setTimeout(() => {
      timedOut = 'total';
      controller.abort();
    }, timeoutMs);

    this.logger.debug({ url }, 'fetching key set');

    try {
      let response: Response;
      try {
        response = await jwksFetch(url, { headers, signal: controller.signal });
      } catch (error) {
        throw this.requestFailure(error, timedOut);
      }
      clearTimeout(connectTimer);

      if (!response.ok) {
        try {
          await response.body?.cancel();
        } catch (error) {
          this.logger.debug({ url, error: formatError(error) }, 'discarding response body failed');
        }
        throw new FetchError(
          'status',
          url,
          `Key set request failed: ${response.status} ${response.statusText}`,
          { status: response.status },
        );
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch (error) {
        if (timedOut) {
          throw this.requestFailure(error, timedOut);
        }
        throw new FetchError(
          'parse',
          url,
          `Key set response is not valid JSON: ${formatError(error)}`,
          { cause: error },
        );
      }

      const keySet = parseKeySet(url, body);
      this.logger.debug({ url, keys: keySet.size }, 'fetched key set');
      return keySet;
    } finally {
      clearTimeout(connectTimer);
      clearTimeout(totalTimer);
    }
  }

  private requestFailure(
    error: unknown,
    timedOut: 'connect' | 'total' | undefined,
  ): FetchError {
    const { url, connectTimeoutMs, timeoutMs } = this.settings;
    if (timedOut === 'connect') {
      return new FetchError(
        'timeout',
        url,
        `Key set request received no response within ${connectTimeoutMs}ms`,
        { cause: error },
      );
    }
    if (timedOut === 'total') {
      return new FetchError('timeout', url, `Key set request exceeded ${timeoutMs}ms`, {
        cause: error,
      });
    }
    return new FetchError('network', url, `Key set request failed: ${formatError(error)}`, {
      cause: error,
    });
  }
}

function parseKeySet(url: string, body: unknown): JsonWebKeySet {
  try {
    return JsonWebKeySet.parse(body);
  } catch (error) {
    throw new FetchError('parse', url, `Response is not a valid key set: ${formatError(error)}`, {
      cause: error,
    });
  }
}
