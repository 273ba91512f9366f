import { BaseError } from '@/shared/errors/base.error.js';

import type { LayoutMode } from '../value-objects/layout-mode.js';

export type AssetKind = 'audio' | 'image' | 'video';

export class MissingAssetError extends BaseError {
  public readonly assetPath: string;

  public constructor(assetPath: string, kind: AssetKind) {
    super({
      code: 'video-assembly.missing-asset',
      message: `Missing ${kind} asset: ${assetPath}`,
      metadata: { assetPath, kind },
    });
    this.assetPath = assetPath;
  }
}

export class ProbeError extends BaseError {
  public readonly mediaPath: string;

  public constructor(mediaPath: string, reason: string, cause?: unknown) {
    super({
      code: 'video-assembly.probe-failed',
      message: `Unable to probe duration of ${mediaPath}: ${reason}`,
      metadata: { mediaPath },
      cause,
    });
    this.mediaPath = mediaPath;
  }
}

export class JobShapeError extends BaseError {
  public constructor(message: string, metadata: Record<string, unknown> = {}, code = 'video-assembly.invalid-job') {
    super({ code, message, metadata });
  }
}

export class EmptySegmentSetError extends JobShapeError {
  public constructor(mode: LayoutMode) {
    super(
      `Layout mode ${mode} needs at least one body segment`,
      { mode },
      'video-assembly.empty-segment-set',
    );
  }
}

export class GraphBuildError extends BaseError {
  public constructor(message: string, metadata: Record<string, unknown> = {}) {
    super({ code: 'video-assembly.graph-build-failed', message, metadata });
  }
}

function describeEncoderExit(exitCode: number | null, signal: string | null): string {
  if (exitCode !== null) {
    return `encoder exited with code ${exitCode}`;
  }
  return signal === null ? 'encoder could not be started' : `encoder was killed by ${signal}`;
}

export class EncodeError extends BaseError {
  public readonly outputPath: string;

  public readonly exitCode: number | null;

  /** Signal that terminated the encoder, if it did not exit on its own. */
  public readonly signal: string | null;

  public readonly stderr: string;

  public constructor(options: {
    readonly outputPath: string;
    readonly exitCode: number | null;
    readonly signal?: string | null;
    readonly stderr: string;
    readonly cause?: unknown;
  }) {
    const signal = options.signal ?? null;
    super({
      code: 'video-assembly.encode-failed',
      message: `Encoding ${options.outputPath} failed: ${describeEncoderExit(options.exitCode, signal)}`,
      metadata: { outputPath: options.outputPath, exitCode: options.exitCode, signal },
      cause: options.cause,
    });
    this.outputPath = options.outputPath;
    this.exitCode = options.exitCode;
    this.signal = signal;
    this.stderr = options.stderr;
  }
}
