import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { PNG } from 'pngjs';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  createTransparentPng,
  PngPlaceholderWriter,
} from '@/infrastructure/video-assembly/images/png-placeholder-writer.js';

let tempDir: string;

beforeEach(async () => {
  tempDir = await mkdtemp(path.join(os.tmpdir(), 'placeholder-test-'));
});

afterEach(async () => {
  await rm(tempDir, { recursive: true, force: true });
});

describe('createTransparentPng', () => {
  it('encodes a fully transparent square', () => {
    const decoded = PNG.sync.read(createTransparentPng(4));

    expect(decoded.width).toBe(4);
    expect(decoded.height).toBe(4);
    expect(decoded.data.every((byte) => byte === 0)).toBe(true);
  });

  it('rejects a non-positive size', () => {
    expect(() => createTransparentPng(0)).toThrow('Placeholder size must be a positive integer');
  });
});

describe('PngPlaceholderWriter', () => {
  it('writes the placeholder and its missing directories', async () => {
    const target = path.join(tempDir, 'png', 'transparent.png');

    await new PngPlaceholderWriter().ensureTransparentImage(target, 8);

    expect(PNG.sync.read(await readFile(target)).width).toBe(8);
  });

  it('leaves an existing placeholder untouched', async () => {
    const target = path.join(tempDir, 'transparent.png');
    await writeFile(target, 'keep');

    await new PngPlaceholderWriter().ensureTransparentImage(target, 8);

    expect(await readFile(target, 'utf8')).toBe('keep');
  });
});
