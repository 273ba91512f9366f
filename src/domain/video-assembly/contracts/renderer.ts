import type { CompositionGraph } from '../entities/composition-graph.js';

export type ProgressCallback = (fraction: number) => void;

/**
 * Polls the progress channel an encoder writes to. The encoder is pointed at
 * `channelPath` once `start()` resolves.
 */
export interface ProgressMonitor {
  readonly channelPath: string;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export type ProgressMonitorFactory = (
  expectedDurationSeconds: number,
  onProgress: ProgressCallback,
) => ProgressMonitor;

export interface RenderedOutput {
  readonly outputPath: string;
  readonly elapsedMs: number;
}

export interface Renderer {
  render(graph: CompositionGraph, outputPath: string, monitor: ProgressMonitor): Promise<RenderedOutput>;
}
