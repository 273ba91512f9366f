import { describe, expect, it } from 'vitest';

import { normalizeFileName } from '@/shared/media/fileName.js';

describe('normalizeFileName', () => {
  it('drops characters that are not allowed in file names', () => {
    expect(normalizeFileName('Why? "Because" 100% <true>|*')).toBe('Why Because 100 true');
  });

  it('spells out slash abbreviations', () => {
    expect(normalizeFileName("What's your w/o moment?")).toBe("What's your without moment");
    expect(normalizeFileName('Best 1/2 day w/ friends')).toBe('Best 1 of 2 day with friends');
    expect(normalizeFileName('cats/dogs: who wins?')).toBe('cats or dogs who wins');
  });

  it('removes slashes it cannot rewrite', () => {
    expect(normalizeFileName('left // right')).toBe('left  right');
  });

  it('truncates long titles', () => {
    expect(normalizeFileName('x'.repeat(300))).toHaveLength(251);
  });
});
