/**
 * Greedy word wrap on character count. Words longer than the width are split.
 */
export function wrapText(text: string, width: number): string[] {
  if (width <= 0) {
    throw new Error('Wrap width must be positive');
  }

  const lines: string[] = [];
  let current = '';

  for (const word of text.split(/\s+/).filter((part) => part.length > 0)) {
    let remaining = word;

    while (remaining.length > width) {
      if (current) {
        lines.push(current);
        current = '';
      }
      lines.push(remaining.slice(0, width));
      remaining = remaining.slice(width);
    }

    if (!remaining) {
      continue;
    }

    if (!current) {
      current = remaining;
    } else if (current.length + 1 + remaining.length <= width) {
      current = `${current} ${remaining}`;
    } else {
      lines.push(current);
      current = remaining;
    }
  }

  if (current) {
    lines.push(current);
  }

  return lines;
}
