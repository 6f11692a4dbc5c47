import { logger } from '../logger.js';
import { colorAt, inBounds } from '../canvas/snapshot.js';
import type { CanvasSnapshot, PixelWrite, PrioritizedTarget, Tier } from '../canvas/types.js';

export interface OutOfBoundsWarning {
  tier: Tier;
  source: string;
  x: number;
  y: number;
  width: number;
  height: number;
}

export type WarningSink = (warning: OutOfBoundsWarning) => void;

const logWarning: WarningSink = (w) => {
  logger.warn(`Pattern point (${w.x}, ${w.y}) out of bounds for ${w.width}x${w.height} canvas, skipping`, {
    tier: w.tier,
    pattern: w.source,
  });
};

/**
 * Every pattern pixel that disagrees with the snapshot, in tier order and then in each
 * pattern's declared order. Overlapping targets are not deduplicated: a lower tier's
 * write for a shared cell simply lands later in the list.
 */
export function computeDiffs(
  snapshot: CanvasSnapshot,
  targets: readonly PrioritizedTarget[],
  onWarning: WarningSink = logWarning,
): PixelWrite[] {
  const writes: PixelWrite[] = [];

  for (const { pattern, tier } of targets) {
    for (const pixel of pattern.pixels) {
      const x = pattern.origin.x + pixel.dx;
      const y = pattern.origin.y + pixel.dy;

      if (!inBounds(snapshot, x, y)) {
        onWarning({ tier, source: pattern.source, x, y, width: snapshot.width, height: snapshot.height });
        continue;
      }

      if (colorAt(snapshot, x, y) !== pixel.colorId) {
        writes.push({ x, y, desiredColor: pixel.colorId });
      }
    }
  }

  return writes;
}
