import { performance } from 'node:perf_hooks';

import {
  type CompositionGraph,
  EncodeError,
  type EncoderParameters,
  type ProgressMonitor,
  type RenderedOutput,
  type Renderer,
} from '@domain/video-assembly/index.js';

import { env } from '@/shared/config/environment.js';
import { createChildLogger } from '@/shared/logger/pino.js';
import { type ProcessResult, type ProcessRunner, runProcess } from '@/shared/media/processRunner.js';

import { buildEncoderArguments } from './encoder-arguments.js';
import { serializeCompositionGraph } from './filter-graph.serializer.js';

interface FfmpegRendererOptions {
  readonly encoder: EncoderParameters;
  readonly binary?: string;
  readonly runProcess?: ProcessRunner;
}

const STDERR_LOG_TAIL = 2_000;

export class FfmpegRenderer implements Renderer {
  private readonly logger = createChildLogger({ module: 'FfmpegRenderer' });

  private readonly encoder: EncoderParameters;

  private readonly binary: string;

  private readonly runProcess: ProcessRunner;

  public constructor(options: FfmpegRendererOptions) {
    this.encoder = options.encoder;
    this.binary = options.binary ?? env.FFMPEG_PATH;
    this.runProcess = options.runProcess ?? runProcess;
  }

  public async render(graph: CompositionGraph, outputPath: string, monitor: ProgressMonitor): Promise<RenderedOutput> {
    const startedAt = performance.now();
    const serialized = serializeCompositionGraph(graph);

    let result: ProcessResult;
    try {
      await monitor.start();
      const args = buildEncoderArguments(serialized, {
        outputPath,
        progressPath: monitor.channelPath,
        encoder: this.encoder,
      });
      this.logger.debug({ outputPath, inputs: serialized.inputs.length }, 'Starting encoder');
      result = await this.execute(args, outputPath);
    } finally {
      await monitor.stop();
    }

    if (result.exitCode !== 0) {
      this.logger.error(
        {
          outputPath,
          exitCode: result.exitCode,
          signal: result.signal,
          stderr: result.stderr.slice(-STDERR_LOG_TAIL),
        },
        'Encoder failed',
      );
      throw new EncodeError({ outputPath, exitCode: result.exitCode, signal: result.signal, stderr: result.stderr });
    }

    const elapsedMs = performance.now() - startedAt;
    this.logger.info({ outputPath, elapsedMs }, 'Encoder finished');

    return { outputPath, elapsedMs };
  }

  private async execute(args: readonly string[], outputPath: string): Promise<ProcessResult> {
    try {
      return await this.runProcess(this.binary, args);
    } catch (error) {
      throw new EncodeError({
        outputPath,
        exitCode: null,
        stderr: error instanceof Error ? error.message : String(error),
        cause: error,
      });
    }
  }
}
