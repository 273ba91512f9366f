import type { RenderVariant } from '@domain/video-assembly/index.js';

import type { AssembleVideoPayload } from '../dto/assemble-video.dto.js';

export interface RenderProgressUpdate {
  readonly variant: RenderVariant;
  readonly fraction: number;
}

export class AssembleVideoCommand {
  public readonly payload: AssembleVideoPayload;

  public readonly onProgress?: (update: RenderProgressUpdate) => void;

  public constructor(payload: AssembleVideoPayload, onProgress?: (update: RenderProgressUpdate) => void) {
    this.payload = payload;
    this.onProgress = onProgress;
  }
}
