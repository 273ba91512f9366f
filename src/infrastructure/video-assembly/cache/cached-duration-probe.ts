import { stat } from 'node:fs/promises';

import { type DurationProbe, ProbeError } from '@domain/video-assembly/index.js';
import { LRUCache } from 'lru-cache';

import { createChildLogger } from '@/shared/logger/pino.js';

interface CachedDurationProbeOptions {
  readonly maxEntries?: number;
  readonly ttlMs?: number;
}

const DEFAULT_OPTIONS = {
  maxEntries: 512,
  ttlMs: 30 * 60 * 1000,
} as const;

/** Durations keyed by file version: path, size and mtime. */
export class CachedDurationProbe implements DurationProbe {
  private readonly logger = createChildLogger({ module: 'CachedDurationProbe' });

  private readonly cache: LRUCache<string, number>;

  public constructor(private readonly inner: DurationProbe, options: CachedDurationProbeOptions = {}) {
    this.cache = new LRUCache<string, number>({
      max: options.maxEntries ?? DEFAULT_OPTIONS.maxEntries,
      ttl: options.ttlMs ?? DEFAULT_OPTIONS.ttlMs,
    });
  }

  public async probeDurationSeconds(mediaPath: string): Promise<number> {
    const key = await this.cacheKey(mediaPath);
    const cached = this.cache.get(key);
    if (cached !== undefined) {
      this.logger.debug({ mediaPath }, 'Returning cached duration');
      return cached;
    }

    const duration = await this.inner.probeDurationSeconds(mediaPath);
    this.cache.set(key, duration);
    return duration;
  }

  private async cacheKey(mediaPath: string): Promise<string> {
    try {
      const stats = await stat(mediaPath);
      return `${mediaPath}:${stats.size}:${stats.mtimeMs}`;
    } catch (error) {
      throw new ProbeError(mediaPath, 'file is not readable', error);
    }
  }
}
