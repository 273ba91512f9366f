export interface TextPlacement {
  readonly text: string;
  readonly x: number;
  readonly y: number;
  readonly fontSize: number;
}

export interface ImageTextRequest {
  readonly baseImagePath: string;
  readonly outputPath: string;
  readonly text: string;
  readonly fontPath: string;
  readonly fontSize: number;
  readonly color: string;
  readonly padding: number;
  /** Maximum characters per line before wrapping. */
  readonly wrapWidth: number;
  /**
   * Where the first line starts. `center` centres each line horizontally;
   * `middle` starts the block `padding` pixels below half the image height.
   */
  readonly origin: { readonly x: number | 'center'; readonly y: number | 'middle' };
  readonly extraText?: readonly TextPlacement[];
}

export interface ImageTextComposer {
  compose(request: ImageTextRequest): Promise<string>;
}
