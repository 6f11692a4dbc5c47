import type { CanvasSnapshot, PaletteColor } from './types.js';
import { DEFAULT_PALETTE, paletteMap } from './palette.js';

export function inBounds(snapshot: CanvasSnapshot, x: number, y: number): boolean {
  return Number.isInteger(x) && Number.isInteger(y)
    && x >= 0 && y >= 0 && x < snapshot.width && y < snapshot.height;
}

/** Current color at (x, y). Callers check `inBounds` first. */
export function colorAt(snapshot: CanvasSnapshot, x: number, y: number): number {
  return snapshot.cells[y][x];
}

/**
 * Build a frozen snapshot from row-major rows. Every row must have the same width.
 */
export function createSnapshot(
  rows: number[][],
  fetchedAt: number,
  colors: readonly PaletteColor[] = DEFAULT_PALETTE,
): CanvasSnapshot {
  const height = rows.length;
  const width = height > 0 ? rows[0].length : 0;
  for (const [y, row] of rows.entries()) {
    if (row.length !== width) {
      throw new Error(`Board row ${y} has ${row.length} cells, expected ${width}`);
    }
  }
  return Object.freeze({
    width,
    height,
    cells: Object.freeze(rows.map((row) => Object.freeze([...row]))),
    fetchedAt,
    palette: paletteMap(colors.length > 0 ? colors : DEFAULT_PALETTE),
  });
}

/**
 * The authority serves the board column-major (board[x][y]); snapshots are row-major.
 */
export function transposeColumns(columns: number[][]): number[][] {
  const width = columns.length;
  const height = width > 0 ? columns[0].length : 0;
  const rows: number[][] = [];
  for (let y = 0; y < height; y++) {
    const row: number[] = [];
    for (let x = 0; x < width; x++) {
      const column = columns[x];
      if (column.length !== height) {
        throw new Error(`Board column ${x} has ${column.length} cells, expected ${height}`);
      }
      row.push(column[y]);
    }
    rows.push(row);
  }
  return rows;
}
