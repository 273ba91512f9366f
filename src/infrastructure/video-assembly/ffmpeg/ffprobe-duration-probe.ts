import { type DurationProbe, ProbeError } from '@domain/video-assembly/index.js';

import { env } from '@/shared/config/environment.js';
import { type ProcessResult, type ProcessRunner, runProcess } from '@/shared/media/processRunner.js';

interface FfprobeDurationProbeOptions {
  readonly binary?: string;
  readonly runProcess?: ProcessRunner;
}

export function parseProbeDuration(mediaPath: string, stdout: string): number {
  const raw = stdout.trim().split(/\r?\n/)[0] ?? '';
  const duration = Number.parseFloat(raw);

  if (!Number.isFinite(duration) || duration < 0) {
    throw new ProbeError(mediaPath, `unexpected duration "${raw}"`);
  }

  return duration;
}

export class FfprobeDurationProbe implements DurationProbe {
  private readonly binary: string;

  private readonly runProcess: ProcessRunner;

  public constructor(options: FfprobeDurationProbeOptions = {}) {
    this.binary = options.binary ?? env.FFPROBE_PATH;
    this.runProcess = options.runProcess ?? runProcess;
  }

  public async probeDurationSeconds(mediaPath: string): Promise<number> {
    let result: ProcessResult;
    try {
      result = await this.runProcess(this.binary, [
        '-v',
        'error',
        '-show_entries',
        'format=duration',
        '-of',
        'default=noprint_wrappers=1:nokey=1',
        mediaPath,
      ]);
    } catch (error) {
      throw new ProbeError(mediaPath, 'ffprobe could not be started', error);
    }

    if (result.exitCode !== 0) {
      throw new ProbeError(mediaPath, result.stderr.trim() || `ffprobe exited with code ${result.exitCode}`);
    }

    return parseProbeDuration(mediaPath, result.stdout);
  }
}
