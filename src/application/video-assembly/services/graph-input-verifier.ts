import { type CompositionGraph, GraphBuildError } from '@domain/video-assembly/index.js';

import { fileExists } from './filesystem.js';

/**
 * Fails before any encoder is spawned when a file the graph reads is gone.
 */
export async function assertGraphInputsExist(graph: CompositionGraph): Promise<void> {
  const paths = [...new Set(graph.inputs().map((input) => input.path))];
  const checks = await Promise.all(paths.map(async (inputPath) => ({ inputPath, exists: await fileExists(inputPath) })));
  const missing = checks.filter((check) => !check.exists).map((check) => check.inputPath);

  if (missing.length > 0) {
    throw new GraphBuildError(`Composition inputs are missing: ${missing.join(', ')}`, { missing });
  }
}
