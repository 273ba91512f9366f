/**
 * Quotes a free-text filter option (drawtext text, font paths) for use inside
 * `-filter_complex`. The option parser unescapes `\`, `'` and `:` first, then
 * the graph parser strips the outer quotes.
 */
export function quoteFilterValue(value: string): string {
  const optionEscaped = value.replace(/[\\':]/g, (character) => `\\${character}`);
  return `'${optionEscaped.replace(/'/g, "'\\''")}'`;
}
