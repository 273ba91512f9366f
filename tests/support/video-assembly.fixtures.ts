import { type MediaSegment, RenderJob, type RenderJobProps, type RenderSettings } from '@domain/video-assembly/index.js';

export const defaultRenderSettings: RenderSettings = {
  resolution: { width: 1080, height: 1920 },
  opacity: 0.9,
  backgroundAudioVolume: 0.15,
  screenshotWidthPercent: 45,
};

export function makeSegments(durations: readonly number[], withImages = true): MediaSegment[] {
  return durations.map((durationSeconds, index): MediaSegment => ({
    index,
    role: index === 0 ? 'title' : 'body',
    audioPath: index === 0 ? '/scratch/job/mp3/title.mp3' : `/scratch/job/mp3/${index - 1}.mp3`,
    durationSeconds,
    imagePath: withImages
      ? (index === 0 ? '/scratch/job/png/title.png' : `/scratch/job/png/comment_${index - 1}.png`)
      : null,
  }));
}

export function makeJob(overrides: Partial<RenderJobProps> = {}): RenderJob {
  return RenderJob.create({
    id: 'job',
    mode: 'flatComments',
    backgroundVideoPath: '/scratch/job/background.mp4',
    backgroundAudioPath: '/scratch/job/background.mp3',
    segments: makeSegments([1.5, 2]),
    settings: defaultRenderSettings,
    credit: null,
    outputs: { main: '/results/general/job.mp4', narrationOnly: null },
    ...overrides,
  });
}
