import { EmptySegmentSetError, JobShapeError } from '../errors/video-assembly.errors.js';
import type { LayoutMode } from '../value-objects/layout-mode.js';
import type { MediaSegment } from '../value-objects/media-segment.js';
import type { BackgroundCredit, RenderSettings } from '../value-objects/render-settings.js';

export interface RenderOutputs {
  readonly main: string;
  /** Narration without the background-music mix; `null` when not requested. */
  readonly narrationOnly: string | null;
}

export interface RenderJobProps {
  readonly id: string;
  readonly mode: LayoutMode;
  readonly backgroundVideoPath: string;
  readonly backgroundAudioPath: string | null;
  readonly segments: readonly MediaSegment[];
  readonly settings: RenderSettings;
  readonly credit: BackgroundCredit | null;
  readonly outputs: RenderOutputs;
}

export class RenderJob {
  public readonly id: string;

  public readonly mode: LayoutMode;

  public readonly backgroundVideoPath: string;

  public readonly backgroundAudioPath: string | null;

  public readonly segments: readonly MediaSegment[];

  public readonly settings: RenderSettings;

  public readonly credit: BackgroundCredit | null;

  public readonly outputs: RenderOutputs;

  private constructor(props: RenderJobProps) {
    this.id = props.id;
    this.mode = props.mode;
    this.backgroundVideoPath = props.backgroundVideoPath;
    this.backgroundAudioPath = props.backgroundAudioPath;
    this.segments = Object.freeze([...props.segments]);
    this.settings = props.settings;
    this.credit = props.credit;
    this.outputs = props.outputs;
  }

  public static create(props: RenderJobProps): RenderJob {
    const { resolution, opacity, backgroundAudioVolume, screenshotWidthPercent } = props.settings;

    if (!Number.isInteger(resolution.width) || !Number.isInteger(resolution.height)
      || resolution.width <= 0 || resolution.height <= 0) {
      throw new JobShapeError('Resolution must be made of positive integers', { ...resolution });
    }

    if (opacity < 0 || opacity > 1) {
      throw new JobShapeError('Opacity must be within [0, 1]', { opacity });
    }

    if (backgroundAudioVolume < 0) {
      throw new JobShapeError('Background audio volume cannot be negative', { backgroundAudioVolume });
    }

    if (screenshotWidthPercent <= 0 || screenshotWidthPercent > 100) {
      throw new JobShapeError('Screenshot width must be a percentage of the frame', { screenshotWidthPercent });
    }

    if (props.segments.length === 0) {
      throw new EmptySegmentSetError(props.mode);
    }

    props.segments.forEach((segment, position) => {
      if (segment.index !== position) {
        throw new JobShapeError('Segments must be ordered by index', { position, index: segment.index });
      }
      if (!Number.isFinite(segment.durationSeconds) || segment.durationSeconds < 0) {
        throw new JobShapeError('Segment durations must be finite and non-negative', {
          index: segment.index,
          durationSeconds: segment.durationSeconds,
        });
      }
    });

    const job = new RenderJob(props);

    if (props.outputs.narrationOnly !== null && !job.mixesBackgroundAudio) {
      throw new JobShapeError('A narration-only output only differs from the main one when background audio is mixed');
    }

    return job;
  }

  public get mixesBackgroundAudio(): boolean {
    return this.backgroundAudioPath !== null && this.settings.backgroundAudioVolume > 0;
  }

  public get totalDurationSeconds(): number {
    return this.segments.reduce((total, segment) => total + segment.durationSeconds, 0);
  }
}
