export interface PlaceholderImageWriter {
  ensureTransparentImage(imagePath: string, size: number): Promise<void>;
}
