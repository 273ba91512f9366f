export * from './commands/assemble-video.command.js';
export * from './dto/assemble-video.dto.js';
export * from './handlers/assemble-video.handler.js';
export * from './services/artwork.service.js';
export * from './services/asset-gatherer.js';
export * from './services/filesystem.js';
export * from './services/graph-input-verifier.js';
export * from './services/output-paths.js';
