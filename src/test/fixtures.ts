import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import sharp from 'sharp';
import { RECT_STYLE } from '../config';
import type { Frame } from '../types';

export function makeTempDir(): string {
  return mkdtempSync(join(tmpdir(), 'voc-annotator-'));
}

export function removeDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/** Writes a solid-colour RGB JPEG of the given size. */
export async function createJpeg(path: string, width: number, height: number): Promise<void> {
  await sharp({
    create: { width, height, channels: 3, background: { r: 40, g: 120, b: 200 } },
  })
    .jpeg()
    .toFile(path);
}

export function makeFrame(overrides: Partial<Frame> = {}): Frame {
  return {
    revision: 1,
    imageIndex: 0,
    imageCount: 2,
    imageName: 'a.jpg',
    width: 100,
    height: 80,
    label: 'red roomba',
    boxes: [],
    inProgress: null,
    dirty: false,
    style: RECT_STYLE,
    ...overrides,
  };
}
