import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { PNG } from 'pngjs';
import { ArtifactWriter, fileTimestamp, renderBoard, renderColors, renderPng } from '../src/artifacts/ArtifactWriter.js';
import { createSnapshot } from '../src/canvas/snapshot.js';
import { BatchScheduler } from '../src/reconcile/BatchScheduler.js';
import { PatternSet } from '../src/patterns/PatternSet.js';
import { FakeCanvas, FakeClock, grid, target } from './helpers.js';

const AT = new Date(2024, 2, 9, 14, 5, 0).getTime();
const colors = [
  { id: 2, name: 'Red', red: 255, green: 0, blue: 0 },
  { id: 1, name: 'White', red: 255, green: 255, blue: 255 },
];

describe('artifact rendering', () => {
  it('renders one row per line with 2-wide ids', () => {
    const snapshot = createSnapshot([[1, 2], [3, 14]], AT, colors);
    expect(renderBoard(snapshot)).toBe(' 1  2 \n 3 14 \n');
  });

  it('lists colors by id with hex codes', () => {
    const snapshot = createSnapshot([[1]], AT, colors);
    expect(renderColors(snapshot)).toBe('Color 1: White (#FFFFFF)\nColor 2: Red (#FF0000)\n');
  });

  it('draws one pixel per cell, falling back to the default colors', () => {
    // 12 is absent from the snapshot palette; the default table has it as Cyan
    const snapshot = createSnapshot([[1, 2], [12, 99]], AT, colors);

    const png = PNG.sync.read(renderPng(snapshot));

    expect([png.width, png.height]).toEqual([2, 2]);
    expect([...png.data.subarray(0, 4)]).toEqual([255, 255, 255, 255]);
    expect([...png.data.subarray(4, 8)]).toEqual([255, 0, 0, 255]);
    expect([...png.data.subarray(8, 12)]).toEqual([0, 211, 221, 255]);
    expect([...png.data.subarray(12, 16)]).toEqual([0, 0, 0, 255]);
  });

  it('stamps files with local time', () => {
    expect(fileTimestamp(AT)).toBe('2024-03-09_14-05-00');
  });
});

describe('ArtifactWriter', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'keeper-artifacts-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes the board, the color table and the image', async () => {
    const writer = new ArtifactWriter(join(dir, 'map'));
    const snapshot = createSnapshot([[1, 2]], AT, colors);

    const paths = await writer.write(snapshot);

    expect(paths).toEqual([
      join(dir, 'map', 'board_2024-03-09_14-05-00.txt'),
      join(dir, 'map', 'colors_2024-03-09_14-05-00.txt'),
      join(dir, 'map', 'board_2024-03-09_14-05-00.png'),
    ]);
    expect(await readFile(paths[0], 'utf-8')).toBe(' 1  2 \n');
    const image = PNG.sync.read(await readFile(paths[2]));
    expect([image.width, image.height]).toEqual([2, 1]);
    expect([...image.data.subarray(4, 8)]).toEqual([255, 0, 0, 255]);
  });

  it('saves every snapshot the scheduler fetches', async () => {
    const clock = new FakeClock(AT);
    const canvas = new FakeCanvas(clock, grid(2, 2, 1));
    const scheduler = new BatchScheduler(canvas, new PatternSet([target('defensive-primary', 0, 0, [[0, 0, 1]])]), { clock });
    const writer = new ArtifactWriter(dir);
    writer.attach(scheduler);

    await scheduler.runCycle();
    await writer.idle();

    expect((await readdir(dir)).sort()).toEqual([
      'board_2024-03-09_14-05-00.png',
      'board_2024-03-09_14-05-00.txt',
      'colors_2024-03-09_14-05-00.txt',
    ]);
  });

  it('logs and carries on when the directory cannot be created', async () => {
    const blocker = join(dir, 'not-a-dir');
    await writeFile(blocker, 'x');
    const clock = new FakeClock(AT);
    const scheduler = new BatchScheduler(
      new FakeCanvas(clock, grid(1, 1, 1)),
      new PatternSet([target('defensive-primary', 0, 0, [[0, 0, 1]])]),
      { clock },
    );
    const writer = new ArtifactWriter(join(blocker, 'map'));
    writer.attach(scheduler);

    const report = await scheduler.runCycle();
    await expect(writer.idle()).resolves.toBeUndefined();
    expect(report.outcome).toBe('reconciled');
  });
});
