import { describe, expect, it } from 'vitest';

import { EmptySegmentSetError, JobShapeError } from '@domain/video-assembly/index.js';

import { defaultRenderSettings, makeJob, makeSegments } from '../../../support/video-assembly.fixtures.js';

describe('RenderJob', () => {
  it('sums the segment durations', () => {
    expect(makeJob({ segments: makeSegments([1.5, 2, 0.5]) }).totalDurationSeconds).toBe(4);
  });

  it('mixes background audio only when a track exists and the volume is positive', () => {
    expect(makeJob().mixesBackgroundAudio).toBe(true);
    expect(makeJob({ backgroundAudioPath: null }).mixesBackgroundAudio).toBe(false);
    expect(
      makeJob({ settings: { ...defaultRenderSettings, backgroundAudioVolume: 0 } }).mixesBackgroundAudio,
    ).toBe(false);
  });

  it('rejects a job without segments', () => {
    expect(() => makeJob({ segments: [] })).toThrow(EmptySegmentSetError);
  });

  it('rejects negative durations and out-of-order segments', () => {
    expect(() => makeJob({ segments: makeSegments([1, -0.5]) })).toThrow(JobShapeError);

    const [title, body] = makeSegments([1, 2]);
    expect(title).toBeDefined();
    expect(body).toBeDefined();
    if (title && body) {
      expect(() => makeJob({ segments: [body, title] })).toThrow(JobShapeError);
    }
  });

  it('rejects invalid settings', () => {
    expect(() => makeJob({ settings: { ...defaultRenderSettings, opacity: 1.2 } })).toThrow(JobShapeError);
    expect(() => makeJob({ settings: { ...defaultRenderSettings, resolution: { width: 0, height: 1920 } } })).toThrow(
      JobShapeError,
    );
    expect(() => makeJob({ settings: { ...defaultRenderSettings, backgroundAudioVolume: -1 } })).toThrow(
      JobShapeError,
    );
  });

  it('refuses a narration-only output when nothing is mixed', () => {
    expect(() =>
      makeJob({
        backgroundAudioPath: null,
        outputs: { main: '/results/general/job.mp4', narrationOnly: '/results/general/OnlyTTS/job.mp4' },
      }),
    ).toThrow(JobShapeError);
  });
});
