import { readdir } from 'node:fs/promises';
import path from 'node:path';

import { type ImageTextComposer, imageAsset, type JobWorkspace } from '@domain/video-assembly/index.js';

import type { VideoSettings } from '@/shared/config/settings.js';
import { createChildLogger } from '@/shared/logger/pino.js';

const TITLE_FONT = 'Roboto-Bold.ttf';
const TITLE_FONT_SIZE = 47;
const TITLE_COLOR = '#000000';
const TITLE_PADDING = 5;
const TITLE_WRAP = 35;
const CHANNEL_NAME_PLACEMENT = { x: 205, y: 825, fontSize: 30 } as const;
const THUMBNAIL_WRAP = 20;

function isMissingDirectory(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Title card and thumbnail, both drawn through the same image-text composer.
 */
export class ArtworkService {
  private readonly logger = createChildLogger({ module: 'ArtworkService' });

  public constructor(
    private readonly composer: ImageTextComposer,
    private readonly settings: VideoSettings,
  ) {}

  public async composeTitleCard(title: string, workspace: JobWorkspace): Promise<string> {
    const { paths, channelName } = this.settings;

    return this.composer.compose({
      baseImagePath: paths.titleTemplate,
      outputPath: imageAsset(workspace, 'title'),
      text: title,
      fontPath: path.join(paths.fontsDir, TITLE_FONT),
      fontSize: TITLE_FONT_SIZE,
      color: TITLE_COLOR,
      padding: TITLE_PADDING,
      wrapWidth: TITLE_WRAP,
      origin: { x: 120, y: 'middle' },
      extraText: channelName ? [{ text: channelName, ...CHANNEL_NAME_PLACEMENT }] : [],
    });
  }

  /** Resolves to `null` when thumbnails are disabled or no background still is available. */
  public async composeThumbnail(title: string, outputPath: string): Promise<string | null> {
    const { thumbnail } = this.settings.background;
    if (!thumbnail.enabled) {
      return null;
    }

    const backgroundsDir = this.settings.paths.backgroundsDir;
    const entries = await readdir(backgroundsDir).catch((error: unknown): string[] => {
      if (isMissingDirectory(error)) {
        return [];
      }
      throw error;
    });
    const still = entries.filter((entry) => entry.endsWith('.png')).sort()[0];
    if (!still) {
      this.logger.warn({ backgroundsDir }, 'No png files found for the thumbnail');
      return null;
    }

    return this.composer.compose({
      baseImagePath: path.join(backgroundsDir, still),
      outputPath,
      text: title,
      fontPath: path.join(this.settings.paths.fontsDir, `${thumbnail.fontFamily}.ttf`),
      fontSize: thumbnail.fontSize,
      color: thumbnail.fontColor,
      padding: Math.round(thumbnail.fontSize / 4),
      wrapWidth: THUMBNAIL_WRAP,
      origin: { x: 'center', y: 'middle' },
    });
  }
}
