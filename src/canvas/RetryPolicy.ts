import { logger, errorMessage } from '../logger.js';
import { RetryExhaustedError, TransientError, isAbortError } from '../errors.js';
import { systemClock, type Clock } from '../clock.js';

export interface RetryPolicyOptions {
  maxAttempts: number;
  backoffMs: number;
  /** Which failures are worth another attempt. Defaults to `TransientError`. */
  isTransient?: (err: unknown) => boolean;
  clock?: Clock;
}

/**
 * Fixed-backoff retry shared by every canvas call. A fresh budget is created per `run`,
 * so one call's failures never eat into another's attempts.
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  readonly backoffMs: number;
  private isTransient: (err: unknown) => boolean;
  private clock: Clock;

  constructor(options: RetryPolicyOptions) {
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${options.maxAttempts}`);
    }
    this.maxAttempts = options.maxAttempts;
    this.backoffMs = options.backoffMs;
    this.isTransient = options.isTransient ?? ((err) => err instanceof TransientError);
    this.clock = options.clock ?? systemClock;
  }

  async run<T>(operation: string, fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    let attemptsRemaining = this.maxAttempts;

    for (;;) {
      try {
        return await fn();
      } catch (err) {
        if (isAbortError(err) || !this.isTransient(err)) throw err;

        attemptsRemaining--;
        const attempt = this.maxAttempts - attemptsRemaining;
        if (attemptsRemaining === 0) {
          logger.error(`${operation}: giving up after ${attempt} attempts`, { error: errorMessage(err) });
          throw new RetryExhaustedError(operation, attempt, err);
        }

        logger.warn(
          `${operation}: transient failure (attempt ${attempt}/${this.maxAttempts}), waiting ${Math.round(this.backoffMs / 1000)}s before retry`,
          { error: errorMessage(err) },
        );
        await this.clock.sleep(this.backoffMs, signal);
      }
    }
  }
}
