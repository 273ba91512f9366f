import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { type DurationProbe, ProbeError } from '@domain/video-assembly/index.js';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { CachedDurationProbe } from '@/infrastructure/video-assembly/cache/cached-duration-probe.js';

let tempDir: string;

beforeEach(async () => {
  tempDir = await mkdtemp(path.join(os.tmpdir(), 'cached-probe-test-'));
});

afterEach(async () => {
  await rm(tempDir, { recursive: true, force: true });
});

function createInner() {
  const probeDurationSeconds = vi.fn(async (_mediaPath: string) => 2.5);
  const inner: DurationProbe = { probeDurationSeconds };
  return { inner, probeDurationSeconds };
}

describe('CachedDurationProbe', () => {
  it('probes an unchanged file once', async () => {
    const file = path.join(tempDir, 'title.mp3');
    await writeFile(file, 'abc');
    const { inner, probeDurationSeconds } = createInner();
    const probe = new CachedDurationProbe(inner);

    await expect(probe.probeDurationSeconds(file)).resolves.toBe(2.5);
    await expect(probe.probeDurationSeconds(file)).resolves.toBe(2.5);

    expect(probeDurationSeconds).toHaveBeenCalledTimes(1);
  });

  it('caches zero-length clips too', async () => {
    const file = path.join(tempDir, 'silence.mp3');
    await writeFile(file, 'abc');
    const { inner, probeDurationSeconds } = createInner();
    probeDurationSeconds.mockResolvedValue(0);
    const probe = new CachedDurationProbe(inner);

    await expect(probe.probeDurationSeconds(file)).resolves.toBe(0);
    await expect(probe.probeDurationSeconds(file)).resolves.toBe(0);

    expect(probeDurationSeconds).toHaveBeenCalledTimes(1);
  });

  it('probes again once the file changes size', async () => {
    const file = path.join(tempDir, 'title.mp3');
    await writeFile(file, 'abc');
    const { inner, probeDurationSeconds } = createInner();
    const probe = new CachedDurationProbe(inner);

    await probe.probeDurationSeconds(file);
    await writeFile(file, 'abcdef');
    await probe.probeDurationSeconds(file);

    expect(probeDurationSeconds).toHaveBeenCalledTimes(2);
  });

  it('fails with ProbeError for a file that does not exist', async () => {
    const { inner, probeDurationSeconds } = createInner();
    const probe = new CachedDurationProbe(inner);

    await expect(probe.probeDurationSeconds(path.join(tempDir, 'missing.mp3'))).rejects.toBeInstanceOf(ProbeError);
    expect(probeDurationSeconds).not.toHaveBeenCalled();
  });
});
