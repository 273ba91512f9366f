import { mkdir } from 'node:fs/promises';
import path from 'node:path';

export const NARRATION_ONLY_DIRECTORY = 'OnlyTTS';
export const THUMBNAIL_DIRECTORY = 'thumbnails';

export interface OutputPaths {
  readonly main: string;
  readonly narrationOnly: string | null;
  readonly thumbnail: string;
}

export function resolveOutputPaths(options: {
  readonly resultsRoot: string;
  readonly category: string;
  readonly fileName: string;
  readonly includeNarrationOnly: boolean;
}): OutputPaths {
  const categoryDir = path.join(options.resultsRoot, options.category);
  return {
    main: path.join(categoryDir, `${options.fileName}.mp4`),
    narrationOnly: options.includeNarrationOnly
      ? path.join(categoryDir, NARRATION_ONLY_DIRECTORY, `${options.fileName}.mp4`)
      : null,
    thumbnail: path.join(categoryDir, THUMBNAIL_DIRECTORY, `${options.fileName}.png`),
  };
}

export async function prepareOutputDirectories(paths: OutputPaths): Promise<void> {
  await mkdir(path.dirname(paths.main), { recursive: true });
  if (paths.narrationOnly) {
    await mkdir(path.dirname(paths.narrationOnly), { recursive: true });
  }
}
