import type { TokenPair } from './auth/cookies.js';

// ─── Startup errors ───

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

export class PatternFormatError extends Error {
  constructor(readonly source: string, detail: string) {
    super(`Malformed pattern ${source}: ${detail}`);
    this.name = 'PatternFormatError';
  }
}

// ─── Canvas authority errors ───

/** 502-class failure, network drop or request timeout. Retried with backoff. */
export class TransientError extends Error {
  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = 'TransientError';
  }
}

/** 401-class failure. Recovered by one refresh, fatal after that. */
export class AuthError extends Error {
  /** Tokens the authority rotated in on the rejecting response, if it sent any. */
  constructor(message: string, readonly status?: number, readonly offered?: TokenPair) {
    super(message);
    this.name = 'AuthError';
  }
}

/** Any other non-2xx response. Never retried. */
export class FatalError extends Error {
  constructor(message: string, readonly status: number) {
    super(message);
    this.name = 'FatalError';
  }
}

/** The authority refused a write because the account's pixels are still cooling down. */
export class CooldownError extends Error {
  constructor(readonly availableAt: number | null) {
    super(
      availableAt === null
        ? 'Canvas authority rejected write: too early'
        : `Canvas authority rejected write: too early (next pixel at ${new Date(availableAt).toISOString()})`,
    );
    this.name = 'CooldownError';
  }
}

export class RetryExhaustedError extends Error {
  constructor(readonly operation: string, readonly attempts: number, readonly lastError: unknown) {
    const reason = lastError instanceof Error ? lastError.message : String(lastError);
    super(`${operation} failed after ${attempts} attempts: ${reason}`);
    this.name = 'RetryExhaustedError';
  }
}

export function isAbortError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'name' in err && err.name === 'AbortError';
}
