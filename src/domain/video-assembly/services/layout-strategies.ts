import { JobShapeError } from '../errors/video-assembly.errors.js';
import { audioAsset, imageAsset, type JobWorkspace } from '../value-objects/job-workspace.js';
import type { LayoutMode } from '../value-objects/layout-mode.js';
import type { MediaSegment, SegmentReference } from '../value-objects/media-segment.js';
import type { OverlayWindow } from '../value-objects/overlay-window.js';
import type { RenderSettings } from '../value-objects/render-settings.js';

export const TRANSPARENT_PLACEHOLDER_NAME = 'transparent';

export interface LayoutStrategy {
  readonly mode: LayoutMode;
  readonly requiresBodySegments: boolean;
  /** Ordered references, title first. */
  enumerate(itemCount: number, workspace: JobWorkspace): SegmentReference[];
  windows(segments: readonly MediaSegment[], settings: Pick<RenderSettings, 'opacity'>): OverlayWindow[];
}

function titleReference(workspace: JobWorkspace): SegmentReference {
  return {
    role: 'title',
    audioPath: audioAsset(workspace, 'title'),
    image: { type: 'file', path: imageAsset(workspace, 'title') },
  };
}

function range(count: number): number[] {
  return Array.from({ length: count }, (_, index) => index);
}

function accumulateWindows(segments: readonly MediaSegment[], opacity: number): OverlayWindow[] {
  let cursor = 0;
  return segments.map((segment) => {
    const window: OverlayWindow = {
      segmentIndex: segment.index,
      startSeconds: cursor,
      endSeconds: cursor + segment.durationSeconds,
      position: 'center',
      opacity,
    };
    cursor = window.endSeconds;
    return window;
  });
}

const flatComments: LayoutStrategy = {
  mode: 'flatComments',
  requiresBodySegments: true,
  enumerate: (itemCount, workspace) => [
    titleReference(workspace),
    ...range(itemCount).map((index): SegmentReference => ({
      role: 'body',
      audioPath: audioAsset(workspace, String(index)),
      image: { type: 'file', path: imageAsset(workspace, `comment_${index}`) },
    })),
  ],
  windows: (segments, settings) => accumulateWindows(segments, settings.opacity),
};

const storyTitleAndBody: LayoutStrategy = {
  mode: 'storyTitleAndBody',
  requiresBodySegments: false,
  enumerate: (_itemCount, workspace) => [
    titleReference(workspace),
    {
      role: 'body',
      audioPath: audioAsset(workspace, 'postaudio'),
      image: { type: 'file', path: imageAsset(workspace, 'story_content') },
    },
  ],
  windows: (segments) => {
    if (segments.length !== 2) {
      throw new JobShapeError('Title-and-body layout needs exactly a title and a body segment', {
        segmentCount: segments.length,
      });
    }
    return accumulateWindows(segments, 1);
  },
};

const storyPerParagraph: LayoutStrategy = {
  mode: 'storyPerParagraph',
  requiresBodySegments: true,
  enumerate: (itemCount, workspace) => [
    titleReference(workspace),
    ...range(itemCount).map((index): SegmentReference => ({
      role: 'body',
      audioPath: audioAsset(workspace, `postaudio-${index}`),
      image: { type: 'file', path: imageAsset(workspace, `img${index}`) },
    })),
  ],
  windows: (segments) => accumulateWindows(segments, 1),
};

const storyPerParagraphBlank: LayoutStrategy = {
  mode: 'storyPerParagraphBlank',
  requiresBodySegments: true,
  enumerate: (itemCount, workspace) =>
    storyPerParagraph.enumerate(itemCount, workspace).map((reference): SegmentReference =>
      reference.role === 'title'
        ? reference
        : { ...reference, image: { type: 'placeholder', path: imageAsset(workspace, TRANSPARENT_PLACEHOLDER_NAME) } },
    ),
  windows: (segments, settings) => storyPerParagraph.windows(segments, settings),
};

export const LAYOUT_STRATEGIES: { readonly [Mode in LayoutMode]: LayoutStrategy } = {
  flatComments,
  storyTitleAndBody,
  storyPerParagraph,
  storyPerParagraphBlank,
};
