import { logger, errorMessage } from '../logger.js';
import { readTokenExpiry, type TokenPair } from './cookies.js';
import type { TokenExchange } from './TokenEndpoint.js';

export interface CredentialState {
  readonly accessToken: string;
  readonly refreshToken: string;
  /** Access token expiry (ms since epoch) when readable from the token itself. */
  readonly expiresHint: number | null;
}

const PROACTIVE_MARGIN_MS = 60_000;

/**
 * Sole owner of the token pair. Every change goes through `refresh`, and concurrent
 * callers share a single in-flight exchange.
 */
export class CredentialManager {
  private state: CredentialState;
  private inFlight: Promise<boolean> | null = null;
  private refreshCount = 0;

  constructor(initial: TokenPair, private endpoint: TokenExchange) {
    this.state = toState(initial);
  }

  currentAccessToken(): string {
    return this.state.accessToken;
  }

  current(): CredentialState {
    return this.state;
  }

  /** Number of exchanges actually sent to the token endpoint. */
  get refreshes(): number {
    return this.refreshCount;
  }

  /**
   * Replace the pair. Tokens the authority already handed out (`offered`) are installed
   * as-is; otherwise the refresh token is exchanged at the token endpoint.
   */
  refresh(offered?: TokenPair): Promise<boolean> {
    if (!this.inFlight) {
      const next = offered ? this.adopt(offered) : this.exchange();
      this.inFlight = next.finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  /** True when the held token is known to expire within the next minute. */
  isExpiring(now: number): boolean {
    return this.state.expiresHint !== null && now >= this.state.expiresHint - PROACTIVE_MARGIN_MS;
  }

  private async adopt(tokens: TokenPair): Promise<boolean> {
    this.state = toState(tokens);
    logger.info('[Credentials] Adopted tokens rotated by the authority', {
      expiresAt: this.state.expiresHint === null ? null : new Date(this.state.expiresHint).toISOString(),
    });
    return true;
  }

  private async exchange(): Promise<boolean> {
    this.refreshCount++;
    try {
      const tokens = await this.endpoint.exchange(this.state.refreshToken);
      this.state = toState(tokens);
      logger.info('[Credentials] Access token refreshed', {
        expiresAt: this.state.expiresHint === null ? null : new Date(this.state.expiresHint).toISOString(),
      });
      return true;
    } catch (err) {
      logger.error('[Credentials] Token refresh failed, re-authentication required', {
        error: errorMessage(err),
      });
      return false;
    }
  }
}

function toState(tokens: TokenPair): CredentialState {
  return Object.freeze({
    accessToken: tokens.accessToken,
    refreshToken: tokens.refreshToken,
    expiresHint: readTokenExpiry(tokens.accessToken),
  });
}
