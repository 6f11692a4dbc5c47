// ─── Patterns ───

export interface PixelSpec {
  readonly dx: number;
  readonly dy: number;
  readonly colorId: number; // 1–16
}

export interface Point {
  readonly x: number;
  readonly y: number;
}

export interface Pattern {
  readonly origin: Point;
  readonly pixels: readonly PixelSpec[];
  readonly source: string; // file the pattern was loaded from
}

export const TIERS = [
  'defensive-primary',
  'defensive-secondary',
  'build-1',
  'build-2',
  'build-3',
] as const;

export type Tier = (typeof TIERS)[number];

export function tierRank(tier: Tier): number {
  return TIERS.indexOf(tier);
}

export interface PrioritizedTarget {
  readonly pattern: Pattern;
  readonly tier: Tier;
}

// ─── Canvas ───

export interface PaletteColor {
  id: number;
  name: string;
  red: number;
  green: number;
  blue: number;
}

export interface CanvasSnapshot {
  readonly width: number;
  readonly height: number;
  /** Row-major: cells[y][x] */
  readonly cells: ReadonlyArray<ReadonlyArray<number>>;
  readonly fetchedAt: number;
  readonly palette: ReadonlyMap<number, PaletteColor>;
}

export interface PixelWrite {
  readonly x: number;
  readonly y: number;
  readonly desiredColor: number;
}

export interface WriteReceipt {
  /** Earliest time the authority says another pixel can be placed, if it said so. */
  nextAvailableAt: number | null;
}

/** The operations the scheduler needs from the canvas authority. */
export interface CanvasPort {
  fetchSnapshot(signal?: AbortSignal): Promise<CanvasSnapshot>;
  writePixel(x: number, y: number, colorId: number, signal?: AbortSignal): Promise<WriteReceipt>;
}
