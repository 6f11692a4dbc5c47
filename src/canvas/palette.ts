import type { PaletteColor } from './types.js';

export const MIN_COLOR_ID = 1;
export const MAX_COLOR_ID = 16;

/**
 * Color table used when the authority's board response carries no colors.
 * Ids match the authority's 1-based palette indices.
 */
export const DEFAULT_PALETTE: readonly PaletteColor[] = [
  { id: 1, name: 'White', red: 255, green: 255, blue: 255 },
  { id: 2, name: 'Light Gray', red: 228, green: 228, blue: 228 },
  { id: 3, name: 'Gray', red: 136, green: 136, blue: 136 },
  { id: 4, name: 'Black', red: 34, green: 34, blue: 34 },
  { id: 5, name: 'Pink', red: 255, green: 167, blue: 209 },
  { id: 6, name: 'Red', red: 229, green: 0, blue: 0 },
  { id: 7, name: 'Orange', red: 229, green: 149, blue: 0 },
  { id: 8, name: 'Brown', red: 160, green: 106, blue: 66 },
  { id: 9, name: 'Yellow', red: 229, green: 217, blue: 0 },
  { id: 10, name: 'Light Green', red: 148, green: 224, blue: 68 },
  { id: 11, name: 'Green', red: 2, green: 190, blue: 1 },
  { id: 12, name: 'Cyan', red: 0, green: 211, blue: 221 },
  { id: 13, name: 'Blue', red: 0, green: 131, blue: 199 },
  { id: 14, name: 'Dark Blue', red: 0, green: 0, blue: 234 },
  { id: 15, name: 'Light Purple', red: 207, green: 110, blue: 228 },
  { id: 16, name: 'Purple', red: 130, green: 0, blue: 128 },
];

export function paletteMap(colors: readonly PaletteColor[]): ReadonlyMap<number, PaletteColor> {
  return new Map(colors.map((c) => [c.id, c]));
}

export function toHex(color: PaletteColor): string {
  const hex = (n: number) => n.toString(16).padStart(2, '0');
  return `#${hex(color.red)}${hex(color.green)}${hex(color.blue)}`.toUpperCase();
}
