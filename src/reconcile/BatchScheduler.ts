import { EventEmitter } from 'node:events';
import { v4 as uuidv4 } from 'uuid';
import { logger, errorMessage } from '../logger.js';
import { AuthError, CooldownError, isAbortError } from '../errors.js';
import { systemClock, formatDuration, type Clock } from '../clock.js';
import type { CanvasPort, CanvasSnapshot } from '../canvas/types.js';
import type { PatternSet, PatternSetSummary } from '../patterns/PatternSet.js';
import { computeDiffs, type WarningSink } from './DiffEngine.js';

export const MAX_BATCH_SIZE = 10;
export const WINDOW_MS = 31 * 60_000;
export const PACING_MS = 1000;

export type SchedulerState = 'IDLE' | 'FETCHING' | 'DIFFING' | 'SUBMITTING' | 'WAITING';

/**
 * - reconciled: canvas already matched every pattern
 * - submitted: the whole batch was written
 * - aborted: a write failed, the rest of the batch was dropped
 * - fetch-failed: no snapshot this cycle
 */
export type CycleOutcome = 'reconciled' | 'submitted' | 'aborted' | 'fetch-failed';

export interface CycleReport {
  id: string;
  index: number;
  startedAt: number;
  outcome: CycleOutcome;
  pending: number; // disagreeing pixels found this cycle
  attempted: number;
  written: number;
  nextCycleAt: number;
  error?: string;
}

export interface SchedulerStatus {
  state: SchedulerState;
  cycles: number;
  nextCycleAt: number | null;
  lastReport: CycleReport | null;
  patterns: PatternSetSummary[];
}

export interface BatchSchedulerOptions {
  batchSize?: number;
  windowMs?: number;
  pacingMs?: number;
  clock?: Clock;
  onOutOfBounds?: WarningSink;
}

/**
 * The reconciliation loop: FETCHING → DIFFING → SUBMITTING → WAITING, forever.
 *
 * Windows run cycle-start to cycle-start, so at most `batchSize` writes go out per
 * window no matter how long fetching or retries take. Server cooldown hints can push
 * the next cycle later but never earlier.
 *
 * Events:
 * - `stateChange` (state)
 * - `snapshot` (CanvasSnapshot) after every successful fetch
 * - `cycle` (CycleReport)
 */
export class BatchScheduler extends EventEmitter {
  private state: SchedulerState = 'IDLE';
  private cycles = 0;
  private nextCycleAt: number | null = null;
  private lastReport: CycleReport | null = null;
  private lastSnapshot: CanvasSnapshot | null = null;
  private readonly batchSize: number;
  private readonly windowMs: number;
  private readonly pacingMs: number;
  private readonly clock: Clock;
  private readonly onOutOfBounds?: WarningSink;

  constructor(
    private canvas: CanvasPort,
    private patterns: PatternSet,
    options: BatchSchedulerOptions = {},
  ) {
    super();
    this.batchSize = Math.min(options.batchSize ?? MAX_BATCH_SIZE, MAX_BATCH_SIZE);
    this.windowMs = Math.max(options.windowMs ?? WINDOW_MS, WINDOW_MS);
    this.pacingMs = Math.max(options.pacingMs ?? PACING_MS, PACING_MS);
    this.clock = options.clock ?? systemClock;
    this.onOutOfBounds = options.onOutOfBounds;
  }

  getState(): SchedulerState {
    return this.state;
  }

  getLastReport(): CycleReport | null {
    return this.lastReport;
  }

  getLastSnapshot(): CanvasSnapshot | null {
    return this.lastSnapshot;
  }

  status(): SchedulerStatus {
    return {
      state: this.state,
      cycles: this.cycles,
      nextCycleAt: this.nextCycleAt,
      lastReport: this.lastReport,
      patterns: this.patterns.summary(),
    };
  }

  /**
   * Run cycles until `signal` aborts. Resolves on cancellation; rejects only on an
   * unrecoverable AuthError.
   */
  async run(signal: AbortSignal): Promise<void> {
    logger.info(`Scheduler started: ${this.patterns.size} targets, ${this.patterns.totalPixels} pixels, `
      + `${this.batchSize} writes per ${formatDuration(this.windowMs)}`);
    try {
      while (!signal.aborted) {
        const report = await this.runCycle(signal);
        this.setState('WAITING');
        const wait = report.nextCycleAt - this.clock.now();
        logger.info(`Next cycle in ${formatDuration(wait)}`, { at: new Date(report.nextCycleAt).toISOString() });
        await this.clock.sleep(wait, signal);
      }
    } catch (err) {
      if (signal.aborted && isAbortError(err)) {
        logger.info('Scheduler stopped');
        return;
      }
      throw err;
    } finally {
      this.setState('IDLE');
    }
  }

  /** One FETCHING → DIFFING → SUBMITTING pass. Does not wait out the window. */
  async runCycle(signal?: AbortSignal): Promise<CycleReport> {
    const index = ++this.cycles;
    const startedAt = this.clock.now();
    const windowEnd = startedAt + this.windowMs;
    const base = { id: uuidv4(), index, startedAt };

    // ─── FETCHING ───
    this.setState('FETCHING');
    let snapshot: CanvasSnapshot;
    try {
      snapshot = await this.canvas.fetchSnapshot(signal);
    } catch (err) {
      if (isAbortError(err) || err instanceof AuthError) throw err;
      logger.error(`Cycle ${index}: board fetch failed, retrying the cycle in ${formatDuration(this.windowMs)}`, {
        error: errorMessage(err),
      });
      return this.finish({
        ...base,
        outcome: 'fetch-failed',
        pending: 0,
        attempted: 0,
        written: 0,
        nextCycleAt: this.clock.now() + this.windowMs,
        error: errorMessage(err),
      });
    }
    this.lastSnapshot = snapshot;
    this.emit('snapshot', snapshot);

    // ─── DIFFING ───
    this.setState('DIFFING');
    const diffs = computeDiffs(snapshot, this.patterns.targets, this.onOutOfBounds);
    const batch = diffs.slice(0, this.batchSize);
    if (batch.length === 0) {
      logger.info(`Cycle ${index}: all patterns match the canvas`);
      return this.finish({ ...base, outcome: 'reconciled', pending: 0, attempted: 0, written: 0, nextCycleAt: windowEnd });
    }
    logger.info(`Cycle ${index}: ${diffs.length} pixels differ, submitting ${batch.length}`);

    // ─── SUBMITTING ───
    this.setState('SUBMITTING');
    let attempted = 0;
    let written = 0;
    let cooldownUntil: number | null = null;
    let failure: string | undefined;

    for (const [i, write] of batch.entries()) {
      attempted++;
      try {
        const receipt = await this.canvas.writePixel(write.x, write.y, write.desiredColor, signal);
        written++;
        cooldownUntil = later(cooldownUntil, receipt.nextAvailableAt);
        logger.info(`Placed pixel ${written}/${batch.length} at (${write.x}, ${write.y}) color ${write.desiredColor}`);
      } catch (err) {
        if (isAbortError(err) || err instanceof AuthError) throw err;
        if (err instanceof CooldownError) cooldownUntil = later(cooldownUntil, err.availableAt);
        failure = errorMessage(err);
        logger.error(`Cycle ${index}: write at (${write.x}, ${write.y}) failed, dropping the remaining ${batch.length - i - 1} pixels`, {
          error: failure,
        });
        break;
      }
      if (i < batch.length - 1) {
        await this.clock.sleep(this.pacingMs, signal);
      }
    }

    const nextCycleAt = Math.max(windowEnd, cooldownUntil ?? 0, this.clock.now() + this.pacingMs);
    return this.finish({
      ...base,
      outcome: failure === undefined ? 'submitted' : 'aborted',
      pending: diffs.length,
      attempted,
      written,
      nextCycleAt,
      error: failure,
    });
  }

  private finish(report: CycleReport): CycleReport {
    this.lastReport = report;
    this.nextCycleAt = report.nextCycleAt;
    logger.info(`Cycle ${report.index} ${report.outcome}: ${report.written}/${report.attempted} pixels written`);
    this.emit('cycle', report);
    return report;
  }

  private setState(state: SchedulerState): void {
    if (this.state === state) return;
    this.state = state;
    this.emit('stateChange', state);
  }
}

function later(current: number | null, candidate: number | null): number | null {
  if (candidate === null) return current;
  return current === null || candidate > current ? candidate : current;
}
