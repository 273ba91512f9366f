const MAX_FILE_NAME_LENGTH = 251;

export function normalizeFileName(title: string): string {
  return title
    .replace(/[?\\"%*:|<>]/g, '')
    .replace(/( [wW]\s?\/\s?[oO0])/g, ' without')
    .replace(/( [wW]\s?\/)/g, ' with')
    .replace(/(\d+)\s?\/\s?(\d+)/g, '$1 of $2')
    .replace(/(\w+)\s?\/\s?(\w+)/g, '$1 or $2')
    .replace(/\//g, '')
    .slice(0, MAX_FILE_NAME_LENGTH);
}
