import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { ImageTextComposer, ImageTextRequest } from '@domain/video-assembly/index.js';
import { createCanvas, GlobalFonts, loadImage } from '@napi-rs/canvas';

import { AppError } from '@/shared/errors/app-error.js';
import { createChildLogger } from '@/shared/logger/pino.js';
import { wrapText } from '@/shared/media/textWrap.js';

export class CanvasImageTextComposer implements ImageTextComposer {
  private readonly logger = createChildLogger({ module: 'CanvasImageTextComposer' });

  private readonly registeredFonts = new Map<string, string>();

  public async compose(request: ImageTextRequest): Promise<string> {
    const family = this.registerFont(request.fontPath);
    const image = await loadImage(await readFile(request.baseImagePath));

    const canvas = createCanvas(image.width, image.height);
    const ctx = canvas.getContext('2d');
    ctx.drawImage(image, 0, 0);

    ctx.fillStyle = request.color;
    ctx.textBaseline = 'top';
    ctx.font = `${request.fontSize}px "${family}"`;

    const lines = wrapText(request.text, request.wrapWidth);
    const lineHeight = request.fontSize + request.padding;

    const { origin } = request;
    ctx.textAlign = origin.x === 'center' ? 'center' : 'left';
    const x = origin.x === 'center' ? image.width / 2 : origin.x;
    let y = origin.y === 'middle' ? Math.floor(image.height / 2) + request.padding : origin.y;
    for (const line of lines) {
      ctx.fillText(line, x, y);
      y += lineHeight;
    }

    ctx.textAlign = 'left';
    for (const extra of request.extraText ?? []) {
      ctx.font = `${extra.fontSize}px "${family}"`;
      ctx.fillText(extra.text, extra.x, extra.y);
    }

    await mkdir(path.dirname(request.outputPath), { recursive: true });
    await writeFile(request.outputPath, await canvas.encode('png'));

    this.logger.debug({ outputPath: request.outputPath, lines: lines.length }, 'Composed image text');
    return request.outputPath;
  }

  private registerFont(fontPath: string): string {
    const known = this.registeredFonts.get(fontPath);
    if (known) {
      return known;
    }

    const family = path.basename(fontPath, path.extname(fontPath));
    if (!GlobalFonts.registerFromPath(fontPath, family)) {
      throw AppError.unsupported('video-assembly.font-unavailable', `Unable to load font ${fontPath}`, { fontPath });
    }

    this.registeredFonts.set(fontPath, family);
    return family;
  }
}
