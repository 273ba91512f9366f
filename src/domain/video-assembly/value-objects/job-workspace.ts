import path from 'node:path';

/**
 * Scratch directory of one job: `background.mp4`, an optional
 * `background.mp3`, narration under `mp3/` and images under `png/`.
 */
export interface JobWorkspace {
  readonly root: string;
  readonly backgroundVideoPath: string;
  readonly backgroundAudioPath: string;
  readonly audioDir: string;
  readonly imageDir: string;
}

export function createJobWorkspace(scratchRoot: string, jobId: string): JobWorkspace {
  const root = path.join(scratchRoot, jobId);
  return {
    root,
    backgroundVideoPath: path.join(root, 'background.mp4'),
    backgroundAudioPath: path.join(root, 'background.mp3'),
    audioDir: path.join(root, 'mp3'),
    imageDir: path.join(root, 'png'),
  };
}

export function audioAsset(workspace: JobWorkspace, name: string): string {
  return path.join(workspace.audioDir, `${name}.mp3`);
}

export function imageAsset(workspace: JobWorkspace, name: string): string {
  return path.join(workspace.imageDir, `${name}.png`);
}
