import type { ProgressMonitorFactory } from '@domain/video-assembly/index.js';

import { FileProgressMonitor } from './progress/file-progress-monitor.js';

export * from './cache/cached-duration-probe.js';
export * from './ffmpeg/encoder-arguments.js';
export * from './ffmpeg/ffmpeg-renderer.service.js';
export * from './ffmpeg/ffprobe-duration-probe.js';
export * from './ffmpeg/filter-graph.serializer.js';
export * from './images/canvas-image-text-composer.js';
export * from './images/png-placeholder-writer.js';
export * from './progress/file-progress-monitor.js';
export * from './progress/progress-parser.js';

export function fileProgressMonitorFactory(options: { intervalMs?: number } = {}): ProgressMonitorFactory {
  return (expectedDurationSeconds, onProgress) =>
    new FileProgressMonitor(expectedDurationSeconds, onProgress, options);
}
