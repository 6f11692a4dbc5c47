import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { PatternFormatError } from '../errors.js';
import { errorMessage } from '../logger.js';
import { MAX_COLOR_ID, MIN_COLOR_ID } from '../canvas/palette.js';
import type { Pattern, Point } from '../canvas/types.js';

// {"pattern": [{"x": 0, "y": 0, "color": 4}, ...]}; x and y are offsets from the origin
const patternFileSchema = z.object({
  pattern: z.array(z.object({
    x: z.number().int(),
    y: z.number().int(),
    color: z.number().int().min(MIN_COLOR_ID).max(MAX_COLOR_ID),
  })),
});

/** Validate already-parsed pattern JSON and anchor it at `origin`. */
export function parsePattern(raw: unknown, origin: Point, source: string): Pattern {
  const parsed = patternFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    throw new PatternFormatError(source, `${where}: ${issue.message}`);
  }
  return Object.freeze({
    origin: Object.freeze({ x: origin.x, y: origin.y }),
    pixels: Object.freeze(parsed.data.pattern.map((p) => Object.freeze({ dx: p.x, dy: p.y, colorId: p.color }))),
    source,
  });
}

export async function loadPattern(path: string, origin: Point): Promise<Pattern> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (err) {
    throw new PatternFormatError(path, `cannot read file (${errorMessage(err)})`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new PatternFormatError(path, `invalid JSON (${errorMessage(err)})`);
  }
  return parsePattern(raw, origin, path);
}
