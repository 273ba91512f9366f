import { ProbeError } from '@domain/video-assembly/index.js';
import { describe, expect, it, vi } from 'vitest';

import {
  FfprobeDurationProbe,
  parseProbeDuration,
} from '@/infrastructure/video-assembly/ffmpeg/ffprobe-duration-probe.js';
import type { ProcessResult } from '@/shared/media/processRunner.js';

const result = (overrides: Partial<ProcessResult>): ProcessResult => ({
  exitCode: 0,
  signal: null,
  stdout: '',
  stderr: '',
  ...overrides,
});

describe('parseProbeDuration', () => {
  it('reads the first line as seconds', () => {
    expect(parseProbeDuration('/a.mp3', '12.345000\n')).toBe(12.345);
    expect(parseProbeDuration('/a.mp3', '0.000000\r\nignored\n')).toBe(0);
  });

  it('rejects output that is not a duration', () => {
    expect(() => parseProbeDuration('/a.mp3', 'N/A\n')).toThrow(ProbeError);
    expect(() => parseProbeDuration('/a.mp3', '')).toThrow(ProbeError);
    expect(() => parseProbeDuration('/a.mp3', '-1\n')).toThrow(ProbeError);
  });
});

describe('FfprobeDurationProbe', () => {
  it('asks ffprobe for the container duration only', async () => {
    const runProcess = vi.fn(async (_binary: string, _args: readonly string[]) => result({ stdout: '3.5\n' }));
    const probe = new FfprobeDurationProbe({ binary: 'ffprobe-test', runProcess });

    await expect(probe.probeDurationSeconds('/scratch/a.mp3')).resolves.toBe(3.5);
    expect(runProcess).toHaveBeenCalledWith('ffprobe-test', [
      '-v',
      'error',
      '-show_entries',
      'format=duration',
      '-of',
      'default=noprint_wrappers=1:nokey=1',
      '/scratch/a.mp3',
    ]);
  });

  it('reports a failing probe with its stderr', async () => {
    const runProcess = vi.fn(async () => result({ exitCode: 1, stderr: 'Invalid data found\n' }));
    const probe = new FfprobeDurationProbe({ runProcess });

    const error = await probe.probeDurationSeconds('/scratch/broken.mp3').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ProbeError);
    expect(error).toMatchObject({
      mediaPath: '/scratch/broken.mp3',
      message: 'Unable to probe duration of /scratch/broken.mp3: Invalid data found',
    });
  });

  it('reports a probe that cannot be started', async () => {
    const runProcess = vi.fn(async (): Promise<ProcessResult> => {
      throw new Error('ffprobe binary not found');
    });
    const probe = new FfprobeDurationProbe({ runProcess });

    await expect(probe.probeDurationSeconds('/scratch/a.mp3')).rejects.toBeInstanceOf(ProbeError);
  });
});
