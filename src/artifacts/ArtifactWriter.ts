import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { PNG } from 'pngjs';
import { logger, errorMessage } from '../logger.js';
import { DEFAULT_PALETTE, paletteMap, toHex } from '../canvas/palette.js';
import type { CanvasSnapshot } from '../canvas/types.js';
import type { BatchScheduler } from '../reconcile/BatchScheduler.js';

/** Text dump of the board: one row per line, each cell a right-aligned 2-wide color id. */
export function renderBoard(snapshot: CanvasSnapshot): string {
  return snapshot.cells
    .map((row) => row.map((id) => `${String(id).padStart(2, ' ')} `).join(''))
    .join('\n') + '\n';
}

export function renderColors(snapshot: CanvasSnapshot): string {
  const ids = [...snapshot.palette.keys()].sort((a, b) => a - b);
  return ids
    .map((id) => {
      const color = snapshot.palette.get(id);
      return color ? `Color ${id}: ${color.name} (${toHex(color)})\n` : '';
    })
    .join('');
}

const FALLBACK_COLORS = paletteMap(DEFAULT_PALETTE);

/**
 * One pixel per cell, colored from the snapshot's palette. Ids missing from it fall back
 * to the default table, and unknown ids stay black.
 */
export function renderPng(snapshot: CanvasSnapshot): Buffer {
  const png = new PNG({ width: snapshot.width, height: snapshot.height });
  for (const [y, row] of snapshot.cells.entries()) {
    for (const [x, id] of row.entries()) {
      const color = snapshot.palette.get(id) ?? FALLBACK_COLORS.get(id);
      const i = (y * snapshot.width + x) * 4;
      png.data[i] = color?.red ?? 0;
      png.data[i + 1] = color?.green ?? 0;
      png.data[i + 2] = color?.blue ?? 0;
      png.data[i + 3] = 255;
    }
  }
  return PNG.sync.write(png);
}

/** Local-time stamp safe for file names, e.g. 2024-03-09_14-05-00. */
export function fileTimestamp(at: number): string {
  const d = new Date(at);
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}_${pad(d.getHours())}-${pad(d.getMinutes())}-${pad(d.getSeconds())}`;
}

/**
 * Keeps a record of every fetched board. Runs off the scheduler's `snapshot` event and
 * only ever reads the snapshot; a failed write is logged and the loop carries on.
 */
export class ArtifactWriter {
  private pending: Promise<void> = Promise.resolve();

  constructor(private dir: string) {}

  attach(scheduler: BatchScheduler): void {
    scheduler.on('snapshot', (snapshot: CanvasSnapshot) => {
      // Chained so two quick fetches never interleave their files
      this.pending = this.pending.then(async () => {
        await this.write(snapshot);
      }).catch((err: unknown) => {
        logger.warn('Failed to save board artifacts', { dir: this.dir, error: errorMessage(err) });
      });
    });
  }

  /** Resolves once every queued write has settled. */
  idle(): Promise<void> {
    return this.pending;
  }

  async write(snapshot: CanvasSnapshot): Promise<string[]> {
    await mkdir(this.dir, { recursive: true });
    const stamp = fileTimestamp(snapshot.fetchedAt);
    const boardPath = join(this.dir, `board_${stamp}.txt`);
    const colorsPath = join(this.dir, `colors_${stamp}.txt`);
    const imagePath = join(this.dir, `board_${stamp}.png`);
    await writeFile(boardPath, renderBoard(snapshot), 'utf-8');
    await writeFile(colorsPath, renderColors(snapshot), 'utf-8');
    await writeFile(imagePath, renderPng(snapshot));
    logger.info(`Board data saved to ${this.dir} with timestamp ${stamp}`);
    return [boardPath, colorsPath, imagePath];
  }
}
