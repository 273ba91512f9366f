import { access, mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { PlaceholderImageWriter } from '@domain/video-assembly/index.js';
import { PNG } from 'pngjs';

import { createChildLogger } from '@/shared/logger/pino.js';

export function createTransparentPng(size: number): Buffer {
  if (!Number.isInteger(size) || size <= 0) {
    throw new Error('Placeholder size must be a positive integer');
  }

  const png = new PNG({ width: size, height: size });
  png.data.fill(0);
  return PNG.sync.write(png);
}

export class PngPlaceholderWriter implements PlaceholderImageWriter {
  private readonly logger = createChildLogger({ module: 'PngPlaceholderWriter' });

  public async ensureTransparentImage(imagePath: string, size: number): Promise<void> {
    const exists = await access(imagePath).then(() => true, () => false);
    if (exists) {
      return;
    }

    await mkdir(path.dirname(imagePath), { recursive: true });
    await writeFile(imagePath, createTransparentPng(size));
    this.logger.debug({ imagePath, size }, 'Wrote transparent placeholder');
  }
}
