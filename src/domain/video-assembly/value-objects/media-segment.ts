export type SegmentRole = 'title' | 'body';

/**
 * One narrated unit: an audio file paired with the image shown while it plays.
 */
export interface MediaSegment {
  readonly index: number;
  readonly role: SegmentRole;
  readonly audioPath: string;
  readonly durationSeconds: number;
  readonly imagePath: string | null;
}

export type SegmentImageReference =
  | { readonly type: 'file'; readonly path: string }
  | { readonly type: 'placeholder'; readonly path: string };

export interface SegmentReference {
  readonly role: SegmentRole;
  readonly audioPath: string;
  readonly image: SegmentImageReference;
}
