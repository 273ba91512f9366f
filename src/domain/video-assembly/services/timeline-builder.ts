import { EmptySegmentSetError } from '../errors/video-assembly.errors.js';
import type { LayoutMode } from '../value-objects/layout-mode.js';
import type { MediaSegment } from '../value-objects/media-segment.js';
import type { Timeline } from '../value-objects/overlay-window.js';
import type { RenderSettings } from '../value-objects/render-settings.js';

import { LAYOUT_STRATEGIES } from './layout-strategies.js';

/**
 * Lays the segments end to end. Zero-length segments keep their (empty)
 * window so the next one still starts where the previous ended.
 */
export function buildTimeline(
  mode: LayoutMode,
  segments: readonly MediaSegment[],
  settings: Pick<RenderSettings, 'opacity'>,
): Timeline {
  if (segments.length === 0) {
    throw new EmptySegmentSetError(mode);
  }

  const windows = LAYOUT_STRATEGIES[mode].windows(segments, settings);
  const last = windows.at(-1);

  return {
    windows,
    totalDurationSeconds: last ? last.endSeconds : 0,
  };
}
