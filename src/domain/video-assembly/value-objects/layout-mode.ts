export const LAYOUT_MODES = [
  'flatComments',
  'storyTitleAndBody',
  'storyPerParagraph',
  'storyPerParagraphBlank',
] as const;

export type LayoutMode = (typeof LAYOUT_MODES)[number];

export interface LayoutSelection {
  readonly storyMode: boolean;
  readonly storyModeMethod: 0 | 1;
  readonly storyModeBlankImages: boolean;
}

export function resolveLayoutMode(selection: LayoutSelection): LayoutMode {
  if (!selection.storyMode) {
    return 'flatComments';
  }

  if (selection.storyModeMethod === 0) {
    return 'storyTitleAndBody';
  }

  return selection.storyModeBlankImages ? 'storyPerParagraphBlank' : 'storyPerParagraph';
}
