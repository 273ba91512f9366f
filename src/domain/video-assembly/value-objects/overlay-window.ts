export type OverlayPosition = 'center';

export interface OverlayWindow {
  readonly segmentIndex: number;
  readonly startSeconds: number;
  readonly endSeconds: number;
  readonly position: OverlayPosition;
  readonly opacity: number;
}

export interface Timeline {
  readonly windows: readonly OverlayWindow[];
  readonly totalDurationSeconds: number;
}
