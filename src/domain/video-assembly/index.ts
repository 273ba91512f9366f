export * from './contracts/duration-probe.js';
export * from './contracts/image-text-composer.js';
export * from './contracts/placeholder-image-writer.js';
export * from './contracts/renderer.js';
export * from './entities/composition-graph.js';
export * from './entities/render-job.js';
export * from './errors/video-assembly.errors.js';
export * from './services/composition-graph-builder.js';
export * from './services/layout-strategies.js';
export * from './services/timeline-builder.js';
export * from './value-objects/job-workspace.js';
export * from './value-objects/layout-mode.js';
export * from './value-objects/media-segment.js';
export * from './value-objects/overlay-window.js';
export * from './value-objects/render-settings.js';
