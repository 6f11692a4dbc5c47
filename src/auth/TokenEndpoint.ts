import { readTokenCookies, type TokenPair } from './cookies.js';

/** Exchanges a refresh token for a fresh pair. Throws when the authority refuses. */
export interface TokenExchange {
  exchange(refreshToken: string): Promise<TokenPair>;
}

export class TokenEndpoint implements TokenExchange {
  private url: string;

  constructor(baseUrl: string, private timeoutMs = 15_000) {
    this.url = new URL('/api/refresh', baseUrl).toString();
  }

  async exchange(refreshToken: string): Promise<TokenPair> {
    const res = await fetch(this.url, {
      method: 'POST',
      headers: {
        Accept: 'application/json',
        Cookie: `refresh=${refreshToken}`,
      },
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!res.ok) {
      const body = await res.text().catch(() => '');
      throw new Error(`Token refresh rejected (${res.status}): ${body}`);
    }

    const tokens = readTokenCookies(res.headers.getSetCookie());
    if (!tokens.accessToken) {
      throw new Error('Token refresh response carried no access token');
    }
    return {
      accessToken: tokens.accessToken,
      // The authority only rotates the refresh token sometimes
      refreshToken: tokens.refreshToken ?? refreshToken,
    };
  }
}
