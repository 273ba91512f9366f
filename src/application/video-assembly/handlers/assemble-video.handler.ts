import path from 'node:path';

import {
  type BackgroundCredit,
  buildCompositionGraph,
  buildTimeline,
  type CompositionGraph,
  createJobWorkspace,
  DEFAULT_SCREENSHOT_WIDTH_PERCENT,
  type DurationProbe,
  type ImageTextComposer,
  type JobWorkspace,
  type LayoutMode,
  type PlaceholderImageWriter,
  type ProgressMonitorFactory,
  RenderJob,
  type RenderSettings,
  type RenderVariant,
  type Renderer,
  resolveLayoutMode,
  screenshotWidth,
  type Timeline,
} from '@domain/video-assembly/index.js';

import type { VideoSettings } from '@/shared/config/settings.js';
import { AppError } from '@/shared/errors/app-error.js';
import { createChildLogger } from '@/shared/logger/pino.js';
import { normalizeFileName } from '@/shared/media/fileName.js';

import type { AssembleVideoCommand, RenderProgressUpdate } from '../commands/assemble-video.command.js';
import {
  assembleVideoCommandSchema,
  type AssembleVideoPayload,
  type ValidatedAssembleVideoPayload,
} from '../dto/assemble-video.dto.js';
import { ArtworkService } from '../services/artwork.service.js';
import { AssetGatherer } from '../services/asset-gatherer.js';
import { fileExists } from '../services/filesystem.js';
import { assertGraphInputsExist } from '../services/graph-input-verifier.js';
import { prepareOutputDirectories, resolveOutputPaths } from '../services/output-paths.js';

export interface AssembleVideoDependencies {
  readonly probe: DurationProbe;
  readonly placeholderWriter: PlaceholderImageWriter;
  readonly renderer: Renderer;
  readonly createProgressMonitor: ProgressMonitorFactory;
  /** Needed only for title cards and thumbnails. */
  readonly composer?: ImageTextComposer;
  /** Runs after every job, whether it rendered or failed. */
  readonly cleanupScratch?: (workspace: JobWorkspace) => Promise<void>;
}

export interface AssembleVideoResult {
  readonly mode: LayoutMode;
  readonly durationSeconds: number;
  readonly mainPath: string;
  readonly narrationOnlyPath: string | null;
  readonly thumbnailPath: string | null;
}

const CREDIT_FONT = 'Roboto-Regular.ttf';
const CREDIT_FONT_SIZE = 5;
const CREDIT_FONT_COLOR = 'White';

export function toRenderSettings(settings: VideoSettings): RenderSettings {
  return {
    resolution: settings.resolution,
    opacity: settings.opacity,
    backgroundAudioVolume: settings.background.audioVolume,
    screenshotWidthPercent: DEFAULT_SCREENSHOT_WIDTH_PERCENT,
  };
}

export class AssembleVideoHandler {
  private readonly logger = createChildLogger({ module: 'AssembleVideoHandler' });

  public constructor(private readonly dependencies: AssembleVideoDependencies) {}

  public async execute(command: AssembleVideoCommand): Promise<AssembleVideoResult> {
    const payload = this.validate(command.payload);
    const workspace = createJobWorkspace(payload.settings.paths.scratchRoot, payload.id);

    this.logger.info({ jobId: payload.id, category: payload.category }, 'Starting video assembly');

    try {
      return await this.assemble(payload, workspace, command.onProgress);
    } catch (error) {
      this.logger.error({ jobId: payload.id, error }, 'Video assembly failed');
      throw AppError.fromUnknown(error, 'video-assembly.failure');
    } finally {
      await this.cleanup(workspace);
    }
  }

  private async assemble(
    payload: ValidatedAssembleVideoPayload,
    workspace: JobWorkspace,
    onProgress?: (update: RenderProgressUpdate) => void,
  ): Promise<AssembleVideoResult> {
    const { settings } = payload;
    const mode = resolveLayoutMode(settings);
    const renderSettings = toRenderSettings(settings);
    const fileName = normalizeFileName(payload.title);
    if (fileName.length === 0) {
      throw AppError.validation('video-assembly.invalid-title', { title: payload.title });
    }
    const artwork = this.dependencies.composer ? new ArtworkService(this.dependencies.composer, settings) : null;

    if (payload.composeTitleCard) {
      if (!artwork) {
        throw AppError.unsupported('video-assembly.composer-missing', 'Title cards need an image composer');
      }
      await artwork.composeTitleCard(fileName, workspace);
    }

    const gatherer = new AssetGatherer(this.dependencies.probe, this.dependencies.placeholderWriter, {
      placeholderSize: screenshotWidth(renderSettings),
    });
    const segments = await gatherer.gather({ mode, itemCount: payload.itemCount, workspace });
    const timeline = buildTimeline(mode, segments, renderSettings);

    const backgroundAudioPath = (await fileExists(workspace.backgroundAudioPath)) ? workspace.backgroundAudioPath : null;
    const outputs = resolveOutputPaths({
      resultsRoot: settings.paths.resultsRoot,
      category: payload.category,
      fileName,
      includeNarrationOnly: settings.background.enableNarrationOnlyVariant
        && settings.background.audioVolume !== 0
        && backgroundAudioPath !== null,
    });

    const job = RenderJob.create({
      id: payload.id,
      mode,
      backgroundVideoPath: workspace.backgroundVideoPath,
      backgroundAudioPath,
      segments,
      settings: renderSettings,
      credit: payload.credit ? this.credit(payload.credit, settings) : null,
      outputs: { main: outputs.main, narrationOnly: outputs.narrationOnly },
    });

    this.logger.info(
      { jobId: job.id, mode, segments: segments.length, durationSeconds: timeline.totalDurationSeconds },
      'Timeline ready',
    );

    const mainGraph = buildCompositionGraph(job, timeline, 'main');
    await assertGraphInputsExist(mainGraph);
    await prepareOutputDirectories(outputs);

    await this.renderVariant(mainGraph, job.outputs.main, timeline, 'main', onProgress);

    let narrationOnlyPath: string | null = null;
    if (job.outputs.narrationOnly !== null) {
      const narrationGraph = buildCompositionGraph(job, timeline, 'narrationOnly');
      await this.renderVariant(narrationGraph, job.outputs.narrationOnly, timeline, 'narrationOnly', onProgress);
      narrationOnlyPath = job.outputs.narrationOnly;
    }

    const thumbnailPath = artwork ? await artwork.composeThumbnail(payload.title, outputs.thumbnail) : null;

    return {
      mode,
      durationSeconds: timeline.totalDurationSeconds,
      mainPath: job.outputs.main,
      narrationOnlyPath,
      thumbnailPath,
    };
  }

  private async renderVariant(
    graph: CompositionGraph,
    outputPath: string,
    timeline: Timeline,
    variant: RenderVariant,
    onProgress?: (update: RenderProgressUpdate) => void,
  ): Promise<void> {
    this.logger.info({ variant, outputPath }, 'Rendering variant');

    const monitor = this.dependencies.createProgressMonitor(timeline.totalDurationSeconds, (fraction) => {
      onProgress?.({ variant, fraction });
    });
    await this.dependencies.renderer.render(graph, outputPath, monitor);

    onProgress?.({ variant, fraction: 1 });
  }

  private credit(author: string, settings: VideoSettings): BackgroundCredit {
    return {
      text: `Background by ${author}`,
      fontFile: path.join(settings.paths.fontsDir, CREDIT_FONT),
      fontSize: CREDIT_FONT_SIZE,
      fontColor: CREDIT_FONT_COLOR,
    };
  }

  private async cleanup(workspace: JobWorkspace): Promise<void> {
    if (!this.dependencies.cleanupScratch) {
      return;
    }

    try {
      await this.dependencies.cleanupScratch(workspace);
      this.logger.info({ scratch: workspace.root }, 'Removed temporary files');
    } catch (error) {
      this.logger.error({ scratch: workspace.root, error }, 'Failed to remove temporary files');
    }
  }

  private validate(payload: AssembleVideoPayload): ValidatedAssembleVideoPayload {
    const parsed = assembleVideoCommandSchema.safeParse(payload);

    if (!parsed.success) {
      const error = AppError.validation('video-assembly.invalid-payload', {
        issues: parsed.error.issues,
      });
      this.logger.warn({ issues: parsed.error.issues }, 'Invalid assembly payload received');
      throw error;
    }

    return parsed.data;
  }
}
