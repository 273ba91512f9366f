export interface DurationProbe {
  /** Rejects with `ProbeError` when the file cannot be probed. */
  probeDurationSeconds(mediaPath: string): Promise<number>;
}
