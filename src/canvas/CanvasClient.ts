import { z } from 'zod';
import { logger, errorMessage } from '../logger.js';
import { AuthError, CooldownError, FatalError, TransientError, isAbortError } from '../errors.js';
import { systemClock, type Clock } from '../clock.js';
import { readTokenCookies, tokenCookie, type TokenPair } from '../auth/cookies.js';
import type { CredentialManager } from '../auth/CredentialManager.js';
import { RetryPolicy } from './RetryPolicy.js';
import { createSnapshot, transposeColumns } from './snapshot.js';
import type { CanvasPort, CanvasSnapshot, WriteReceipt } from './types.js';

// ─── Authority wire format ───

const boardResponseSchema = z.object({
  type: z.string().optional(),
  colors: z.array(z.object({
    id: z.number().int(),
    name: z.string(),
    red: z.number().int().min(0).max(255),
    green: z.number().int().min(0).max(255),
    blue: z.number().int().min(0).max(255),
  })).default([]),
  // Column-major: board[x][y]
  board: z.array(z.array(z.object({ color_id: z.number().int() }).passthrough())),
});

const timerResponseSchema = z.object({
  timers: z.array(z.string()).default([]),
  message: z.string().optional(),
});

const TOO_EARLY = 'Too early';

interface HttpRequest {
  method: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: string;
}

interface HttpReply {
  status: number;
  body: string;
}

export interface CanvasClientOptions {
  baseUrl: string;
  credentials: CredentialManager;
  retry?: RetryPolicy;
  requestTimeoutMs?: number;
  clock?: Clock;
}

/**
 * Reads and writes the remote canvas. Both operations share one retry policy for
 * transient failures and a single refresh-then-retry for expired credentials.
 */
export class CanvasClient implements CanvasPort {
  private baseUrl: string;
  private credentials: CredentialManager;
  private retry: RetryPolicy;
  private requestTimeoutMs: number;
  private clock: Clock;

  constructor(options: CanvasClientOptions) {
    this.baseUrl = options.baseUrl;
    this.credentials = options.credentials;
    this.clock = options.clock ?? systemClock;
    this.retry = options.retry ?? new RetryPolicy({ maxAttempts: 10, backoffMs: 120_000, clock: this.clock });
    this.requestTimeoutMs = options.requestTimeoutMs ?? 15_000;
  }

  async fetchSnapshot(signal?: AbortSignal): Promise<CanvasSnapshot> {
    return this.call('Fetch board', async () => {
      const reply = await this.request('/api/get?type=board', { method: 'GET' }, signal);
      const parsed = boardResponseSchema.safeParse(readJson(reply, 'board'));
      if (!parsed.success) {
        throw new FatalError(`Unexpected board response: ${parsed.error.issues[0]?.message ?? 'invalid'}`, reply.status);
      }

      const rows = transposeColumns(parsed.data.board.map((column) => column.map((cell) => cell.color_id)));
      const snapshot = createSnapshot(rows, this.clock.now(), parsed.data.colors);
      logger.debug(`Board fetched: ${snapshot.width}x${snapshot.height}, ${snapshot.palette.size} colors`);
      return snapshot;
    }, signal);
  }

  async writePixel(x: number, y: number, colorId: number, signal?: AbortSignal): Promise<WriteReceipt> {
    return this.call(`Place pixel (${x}, ${y})`, async () => {
      const reply = await this.request('/api/set', {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Referer: `${this.baseUrl}/?x=${x}&y=${y}&scale=1`,
        },
        body: JSON.stringify({ x, y, color: String(colorId) }),
      }, signal);

      const timers = parseTimers(reply.body);
      logger.debug(`Placed pixel at (${x}, ${y}) with color ${colorId}`);
      return { nextAvailableAt: timers === null ? null : earliestFuture(timers.timers, this.clock.now()) };
    }, signal);
  }

  // ─── Auth + retry wrapper ───

  private async call<T>(operation: string, fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.refreshIfExpiring();

    // One refresh per logical call, however many transient retries it takes
    let refreshed = false;
    return this.retry.run(operation, async () => {
      try {
        return await fn();
      } catch (err) {
        if (!(err instanceof AuthError)) throw err;
        if (refreshed) {
          throw new AuthError(`${operation}: credentials rejected after refresh; replace the access and refresh tokens`, err.status);
        }
        refreshed = true;
        logger.info(err.offered
          ? `${operation}: access token rotated by the authority (${err.status ?? 'auth'}), adopting new tokens`
          : `${operation}: access token rejected (${err.status ?? 'auth'}), refreshing`);
        const ok = await this.credentials.refresh(err.offered);
        if (!ok) {
          throw new AuthError(`${operation}: refresh token rejected; replace the refresh token`, err.status);
        }
        try {
          return await fn();
        } catch (retryErr) {
          if (retryErr instanceof AuthError) {
            throw new AuthError(`${operation}: credentials rejected after refresh; replace the access and refresh tokens`, retryErr.status);
          }
          throw retryErr;
        }
      }
    }, signal);
  }

  private async refreshIfExpiring(): Promise<void> {
    if (!this.credentials.isExpiring(this.clock.now())) return;
    logger.info('Access token about to expire, refreshing ahead of time');
    const ok = await this.credentials.refresh();
    if (!ok) logger.warn('Proactive refresh failed; continuing with the current token');
  }

  // ─── HTTP ───

  private async request(path: string, init: HttpRequest, signal?: AbortSignal): Promise<HttpReply> {
    const timeout = new AbortController();
    const onAbort = () => timeout.abort();
    signal?.addEventListener('abort', onAbort, { once: true });
    const timer = setTimeout(() => timeout.abort(), this.requestTimeoutMs);

    // The timeout and cancellation cover the body read as well as the headers
    let res: Response;
    let body: string;
    try {
      res = await fetch(`${this.baseUrl}${path}`, {
        method: init.method,
        body: init.body,
        headers: {
          Accept: 'application/json',
          ...init.headers,
          Origin: this.baseUrl,
          Cookie: tokenCookie(this.credentials.current()),
        },
        signal: timeout.signal,
      });
      body = await res.text();
    } catch (err) {
      if (signal?.aborted) throw err;
      if (isAbortError(err)) {
        throw new TransientError(`Request to ${path} timed out after ${this.requestTimeoutMs}ms`);
      }
      throw new TransientError(`Request to ${path} failed: ${errorMessage(err)}`);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }

    if (res.ok) return { status: res.status, body };

    if (res.status === 502) {
      throw new TransientError(`${path} returned 502 Bad Gateway`, 502);
    }
    if (res.status === 401 || res.status === 426) {
      throw new AuthError(`${path} returned ${res.status}`, res.status, this.rotatedTokens(res.headers));
    }
    const timers = parseTimers(body);
    if (timers?.message === TOO_EARLY) {
      throw new CooldownError(earliestFuture(timers.timers, this.clock.now()));
    }
    throw new FatalError(`${path} returned ${res.status}: ${body}`, res.status);
  }

  /** New pair from Set-Cookie on an auth rejection; the refresh token is kept when not rotated. */
  private rotatedTokens(headers: Headers): TokenPair | undefined {
    const found = readTokenCookies(headers.getSetCookie());
    if (!found.accessToken) return undefined;
    return {
      accessToken: found.accessToken,
      refreshToken: found.refreshToken ?? this.credentials.current().refreshToken,
    };
  }
}

function readJson(reply: HttpReply, what: string): unknown {
  try {
    return JSON.parse(reply.body);
  } catch (err) {
    throw new TransientError(`Could not read ${what} response: ${errorMessage(err)}`);
  }
}

function parseTimers(text: string): z.infer<typeof timerResponseSchema> | null {
  if (!text) return null;
  try {
    const parsed = timerResponseSchema.safeParse(JSON.parse(text));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

/** Earliest timer still in the future, or null if none is. Unparseable entries are skipped. */
export function earliestFuture(timers: readonly string[], now: number): number | null {
  let earliest: number | null = null;
  for (const timer of timers) {
    const at = Date.parse(timer);
    if (Number.isNaN(at) || at <= now) continue;
    if (earliest === null || at < earliest) earliest = at;
  }
  return earliest;
}
