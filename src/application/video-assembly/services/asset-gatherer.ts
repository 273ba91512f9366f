import {
  type DurationProbe,
  EmptySegmentSetError,
  type JobWorkspace,
  LAYOUT_STRATEGIES,
  type LayoutMode,
  type MediaSegment,
  MissingAssetError,
  type PlaceholderImageWriter,
  type SegmentImageReference,
} from '@domain/video-assembly/index.js';

import { createChildLogger } from '@/shared/logger/pino.js';

import { fileExists } from './filesystem.js';

export interface GatherRequest {
  readonly mode: LayoutMode;
  /** Number of body items (comments or paragraphs); ignored by the title-and-body layout. */
  readonly itemCount: number;
  readonly workspace: JobWorkspace;
}

interface AssetGathererOptions {
  /** Edge length of the transparent placeholder used by blank layouts. */
  readonly placeholderSize: number;
}

export class AssetGatherer {
  private readonly logger = createChildLogger({ module: 'AssetGatherer' });

  public constructor(
    private readonly probe: DurationProbe,
    private readonly placeholders: PlaceholderImageWriter,
    private readonly options: AssetGathererOptions,
  ) {}

  public async gather(request: GatherRequest): Promise<MediaSegment[]> {
    const strategy = LAYOUT_STRATEGIES[request.mode];

    if (strategy.requiresBodySegments && request.itemCount <= 0) {
      throw new EmptySegmentSetError(request.mode);
    }

    const references = strategy.enumerate(request.itemCount, request.workspace);
    const segments: MediaSegment[] = [];

    for (const [index, reference] of references.entries()) {
      if (!(await fileExists(reference.audioPath))) {
        throw new MissingAssetError(reference.audioPath, 'audio');
      }
      const imagePath = await this.resolveImage(reference.image);
      const durationSeconds = await this.probe.probeDurationSeconds(reference.audioPath);

      segments.push(Object.freeze({
        index,
        role: reference.role,
        audioPath: reference.audioPath,
        durationSeconds,
        imagePath,
      }));
    }

    this.logger.info(
      { mode: request.mode, segments: segments.length },
      'Gathered media segments',
    );

    return segments;
  }

  private async resolveImage(image: SegmentImageReference): Promise<string> {
    if (image.type === 'placeholder') {
      await this.placeholders.ensureTransparentImage(image.path, this.options.placeholderSize);
      return image.path;
    }

    if (!(await fileExists(image.path))) {
      throw new MissingAssetError(image.path, 'image');
    }
    return image.path;
  }
}
