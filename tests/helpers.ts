import type { Clock } from '../src/clock.js';
import { createSnapshot } from '../src/canvas/snapshot.js';
import type { CanvasPort, CanvasSnapshot, PrioritizedTarget, Tier, WriteReceipt } from '../src/canvas/types.js';

export const T0 = Date.UTC(2024, 0, 15, 12, 0, 0);

/** Clock whose sleeps return immediately and move time forward by the requested amount. */
export class FakeClock implements Clock {
  time: number;
  sleeps: number[] = [];
  onSleep?: (ms: number) => void;

  constructor(start = T0) {
    this.time = start;
  }

  now(): number {
    return this.time;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    this.sleeps.push(ms);
    if (ms > 0) this.time += ms;
    this.onSleep?.(ms);
    signal?.throwIfAborted();
  }
}

export function grid(width: number, height: number, color = 1): number[][] {
  return Array.from({ length: height }, () => Array.from({ length: width }, () => color));
}

export function target(tier: Tier, x: number, y: number, pixels: Array<[number, number, number]>): PrioritizedTarget {
  return {
    tier,
    pattern: {
      origin: { x, y },
      pixels: pixels.map(([dx, dy, colorId]) => ({ dx, dy, colorId })),
      source: `${tier}.json`,
    },
  };
}

export interface RecordedWrite {
  x: number;
  y: number;
  color: number;
  at: number;
}

/**
 * In-memory canvas authority. Writes land on `board` unless `applyWrites` is off;
 * queued failures are thrown in order before normal behaviour resumes.
 */
export class FakeCanvas implements CanvasPort {
  writes: RecordedWrite[] = [];
  fetches = 0;
  fetchFailures: Error[] = [];
  writeFailures = new Map<number, Error>(); // keyed by 0-based write call index
  receipts: WriteReceipt[] = [];
  applyWrites = true;

  constructor(private clock: FakeClock, public board: number[][]) {}

  async fetchSnapshot(): Promise<CanvasSnapshot> {
    this.fetches++;
    const failure = this.fetchFailures.shift();
    if (failure) throw failure;
    return createSnapshot(this.board, this.clock.now());
  }

  async writePixel(x: number, y: number, colorId: number): Promise<WriteReceipt> {
    const index = this.writes.length;
    this.writes.push({ x, y, color: colorId, at: this.clock.now() });
    const failure = this.writeFailures.get(index);
    if (failure) throw failure;
    if (this.applyWrites) this.board[y][x] = colorId;
    return this.receipts.shift() ?? { nextAvailableAt: null };
  }
}
