export interface ProgressSample {
  readonly elapsedMicroseconds: number;
}

export interface ParsedProgress {
  readonly latest: ProgressSample | null;
  readonly ended: boolean;
}

const ELAPSED_PATTERN = /^out_time_ms=(\d+)$/;

/**
 * Reads `key=value` lines written by `ffmpeg -progress`. Despite its name
 * `out_time_ms` counts microseconds. Non-numeric values such as `N/A` are skipped.
 */
export function parseProgressLines(lines: readonly string[]): ParsedProgress {
  let latest: ProgressSample | null = null;
  let ended = false;

  for (const rawLine of lines) {
    const line = rawLine.trim();
    const match = ELAPSED_PATTERN.exec(line);
    if (match?.[1] !== undefined) {
      latest = { elapsedMicroseconds: Number.parseInt(match[1], 10) };
    } else if (line === 'progress=end') {
      ended = true;
    }
  }

  return { latest, ended };
}
