export interface TokenPair {
  accessToken: string;
  refreshToken: string;
}

/** Cookie header carrying both tokens, the way the authority's web client sends them. */
export function tokenCookie(tokens: TokenPair): string {
  return `refresh=${tokens.refreshToken}; token=${tokens.accessToken}`;
}

/**
 * Pull `token=` / `refresh=` values out of Set-Cookie headers. Attributes after the
 * first `;` (Path, Expires, ...) are ignored.
 */
export function readTokenCookies(setCookies: readonly string[]): Partial<TokenPair> {
  const found: Partial<TokenPair> = {};
  for (const cookie of setCookies) {
    const pair = cookie.split(';')[0].trim();
    if (pair.startsWith('token=')) {
      found.accessToken = pair.slice('token='.length);
    } else if (pair.startsWith('refresh=')) {
      found.refreshToken = pair.slice('refresh='.length);
    }
  }
  return found;
}

/**
 * Expiry (ms since epoch) from a JWT's `exp` claim, or null when the token is opaque.
 */
export function readTokenExpiry(token: string): number | null {
  const parts = token.split('.');
  if (parts.length !== 3) return null;
  try {
    const payload: unknown = JSON.parse(Buffer.from(parts[1], 'base64url').toString('utf-8'));
    if (typeof payload === 'object' && payload !== null && 'exp' in payload && typeof payload.exp === 'number') {
      return payload.exp * 1000;
    }
    return null;
  } catch {
    return null;
  }
}
