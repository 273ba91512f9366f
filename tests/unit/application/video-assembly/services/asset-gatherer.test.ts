import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import {
  createJobWorkspace,
  type DurationProbe,
  EmptySegmentSetError,
  type JobWorkspace,
  MissingAssetError,
  type PlaceholderImageWriter,
  ProbeError,
} from '@domain/video-assembly/index.js';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { AssetGatherer } from '@/application/video-assembly/services/asset-gatherer.js';

import { touchFiles } from '../../../../support/scratch.fixtures.js';

const DURATIONS: Record<string, number> = {
  'title.mp3': 1.5,
  '0.mp3': 2,
  '1.mp3': 3.5,
  'postaudio.mp3': 9,
  'postaudio-0.mp3': 4,
  'postaudio-1.mp3': 0,
};

let tempDir: string;
let workspace: JobWorkspace;

beforeEach(async () => {
  tempDir = await mkdtemp(path.join(os.tmpdir(), 'asset-gatherer-test-'));
  workspace = createJobWorkspace(tempDir, 'job1');
});

afterEach(async () => {
  await rm(tempDir, { recursive: true, force: true });
});

function createGatherer() {
  const probeDurationSeconds = vi.fn(async (mediaPath: string) => DURATIONS[path.basename(mediaPath)] ?? 1);
  const ensureTransparentImage = vi.fn(async (_imagePath: string, _size: number) => undefined);
  const probe: DurationProbe = { probeDurationSeconds };
  const placeholders: PlaceholderImageWriter = { ensureTransparentImage };
  const gatherer = new AssetGatherer(probe, placeholders, { placeholderSize: 486 });
  return { gatherer, probeDurationSeconds, ensureTransparentImage };
}

describe('AssetGatherer', () => {
  it('gathers the title and every comment with probed durations', async () => {
    await touchFiles(workspace.root, [
      'mp3/title.mp3',
      'mp3/0.mp3',
      'mp3/1.mp3',
      'png/title.png',
      'png/comment_0.png',
      'png/comment_1.png',
    ]);
    const { gatherer } = createGatherer();

    const segments = await gatherer.gather({ mode: 'flatComments', itemCount: 2, workspace });

    expect(segments).toEqual([
      {
        index: 0,
        role: 'title',
        audioPath: path.join(workspace.root, 'mp3/title.mp3'),
        durationSeconds: 1.5,
        imagePath: path.join(workspace.root, 'png/title.png'),
      },
      {
        index: 1,
        role: 'body',
        audioPath: path.join(workspace.root, 'mp3/0.mp3'),
        durationSeconds: 2,
        imagePath: path.join(workspace.root, 'png/comment_0.png'),
      },
      {
        index: 2,
        role: 'body',
        audioPath: path.join(workspace.root, 'mp3/1.mp3'),
        durationSeconds: 3.5,
        imagePath: path.join(workspace.root, 'png/comment_1.png'),
      },
    ]);
    expect(Object.isFrozen(segments[0])).toBe(true);
  });

  it('gathers a title and a single body for the title-and-body layout', async () => {
    await touchFiles(workspace.root, ['mp3/title.mp3', 'mp3/postaudio.mp3', 'png/title.png', 'png/story_content.png']);
    const { gatherer } = createGatherer();

    const segments = await gatherer.gather({ mode: 'storyTitleAndBody', itemCount: 0, workspace });

    expect(segments.map((segment) => segment.durationSeconds)).toEqual([1.5, 9]);
  });

  it('uses the transparent placeholder for blank paragraphs', async () => {
    await touchFiles(workspace.root, ['mp3/title.mp3', 'mp3/postaudio-0.mp3', 'mp3/postaudio-1.mp3', 'png/title.png']);
    const { gatherer, ensureTransparentImage } = createGatherer();

    const segments = await gatherer.gather({ mode: 'storyPerParagraphBlank', itemCount: 2, workspace });
    const placeholder = path.join(workspace.root, 'png/transparent.png');

    expect(segments.map((segment) => segment.imagePath)).toEqual([
      path.join(workspace.root, 'png/title.png'),
      placeholder,
      placeholder,
    ]);
    expect(segments.map((segment) => segment.durationSeconds)).toEqual([1.5, 4, 0]);
    expect(ensureTransparentImage).toHaveBeenCalledWith(placeholder, 486);
  });

  it('reports a missing comment image', async () => {
    await touchFiles(workspace.root, ['mp3/title.mp3', 'mp3/0.mp3', 'png/title.png']);
    const { gatherer } = createGatherer();

    const error = await gatherer.gather({ mode: 'flatComments', itemCount: 1, workspace }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(MissingAssetError);
    expect(error).toMatchObject({ assetPath: path.join(workspace.root, 'png/comment_0.png') });
  });

  it('reports missing narration before probing it', async () => {
    await touchFiles(workspace.root, ['png/title.png']);
    const { gatherer, probeDurationSeconds } = createGatherer();

    await expect(gatherer.gather({ mode: 'storyPerParagraph', itemCount: 1, workspace })).rejects.toBeInstanceOf(
      MissingAssetError,
    );
    expect(probeDurationSeconds).not.toHaveBeenCalled();
  });

  it('refuses layouts without body items', async () => {
    const { gatherer } = createGatherer();

    await expect(gatherer.gather({ mode: 'flatComments', itemCount: 0, workspace })).rejects.toBeInstanceOf(
      EmptySegmentSetError,
    );
    await expect(gatherer.gather({ mode: 'storyPerParagraph', itemCount: 0, workspace })).rejects.toBeInstanceOf(
      EmptySegmentSetError,
    );
  });

  it('passes probe failures through', async () => {
    await touchFiles(workspace.root, ['mp3/title.mp3', 'mp3/0.mp3', 'png/title.png', 'png/comment_0.png']);
    const { gatherer, probeDurationSeconds } = createGatherer();
    probeDurationSeconds.mockRejectedValueOnce(new ProbeError('title.mp3', 'unexpected duration "N/A"'));

    await expect(gatherer.gather({ mode: 'flatComments', itemCount: 1, workspace })).rejects.toBeInstanceOf(ProbeError);
  });
});
