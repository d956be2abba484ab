import packageJson from '../../package.json' with { type: 'json' };

/** User-Agent sent with key set requests unless the caller provides one. */
export const USER_AGENT = `jwks-cache/${packageJson.version}`;

/**
 * Wrapper around fetch() that adds the library's User-Agent and a JSON Accept header
 * to key set requests. Headers given by the caller take precedence.
 *
 * @param url - Request URL (string or URL object)
 * @param init - Fetch options (headers, signal, etc.)
 * @returns Promise resolving to Response
 *
 * @example
 * ```typescript
 * const response = await jwksFetch('https://issuer.example.com/.well-known/jwks.json', {
 *   signal: AbortSignal.timeout(5_000),
 * });
 * ```
 */
// oxlint-disable-next-line require-await
export async function jwksFetch(url: string | URL, init?: RequestInit): Promise<Response> {
  const headers = new Headers(init?.headers);
  if (!headers.has('User-Agent')) {
    headers.set('User-Agent', USER_AGENT);
  }
  if (!headers.has('Accept')) {
    headers.set('Accept', 'application/json');
  }
  return fetch(url, {
    ...init,
    method: 'GET',
    headers,
  });
}
