/**
 * HTTP client for the external auth service
 *
 * The stored auth service reference is the service's base URL. Tokens are
 * checked with `POST {base}/validate` and a `{ accessToken }` body; the
 * service answers `{ principal }`.
 */

import type { AuthService, AuthServiceResolver } from '../systems/identity.js';

export interface HttpAuthServiceOptions {
  /** Request timeout in ms (default: 5000) */
  timeoutMs?: number;
  fetch?: typeof fetch;
}

function isHttpUrl(reference: string): boolean {
  try {
    const url = new URL(reference);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

export function createHttpAuthService(baseUrl: string, options: HttpAuthServiceOptions = {}): AuthService {
  const timeoutMs = options.timeoutMs ?? 5000;
  const doFetch = options.fetch ?? fetch;
  const endpoint = `${baseUrl.replace(/\/+$/, '')}/validate`;

  return {
    async validateAccessToken(accessToken: string): Promise<string> {
      const response = await doFetch(endpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ accessToken }),
        signal: AbortSignal.timeout(timeoutMs),
      });
      if (!response.ok) {
        throw new Error(`auth service answered ${response.status}`);
      }
      const body: unknown = await response.json();
      if (typeof body !== 'object' || body === null || !('principal' in body) || typeof body.principal !== 'string') {
        throw new Error('auth service response has no principal');
      }
      return body.principal;
    },
  };
}

/**
 * Resolver that serves http(s) references and rejects anything else
 */
export function createHttpAuthServiceResolver(options: HttpAuthServiceOptions = {}): AuthServiceResolver {
  const clients = new Map<string, AuthService>();
  return (reference) => {
    if (!isHttpUrl(reference)) {
      return undefined;
    }
    let client = clients.get(reference);
    if (!client) {
      client = createHttpAuthService(reference, options);
      clients.set(reference, client);
    }
    return client;
  };
}
