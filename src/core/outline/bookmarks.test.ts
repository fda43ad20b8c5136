import { describe, it, expect } from 'vitest';
import { adaptOutlineEntries } from './bookmarks.js';

describe('adaptOutlineEntries', () => {
  it('treats absent or empty bookmarks as abstention', () => {
    expect(adaptOutlineEntries(undefined)).toEqual([]);
    expect(adaptOutlineEntries(null)).toEqual([]);
    expect(adaptOutlineEntries([])).toEqual([]);
    expect(adaptOutlineEntries({ level: 1, title: 'Intro', page: 1 })).toEqual([]);
  });

  it('keeps valid entries in the given order and drops malformed ones', () => {
    const raw: unknown[] = [
      { level: 1, title: ' Intro ', page: 4 },
      { level: 0, title: 'Level zero', page: 1 },
      { level: 1, title: '   ', page: 2 },
      { level: 1.5, title: 'Fractional', page: 2 },
      { level: 2, title: 'String page', page: '3' },
      'junk',
      null,
      { level: 2, title: 'Sub', page: 3 },
    ];

    expect(adaptOutlineEntries(raw)).toEqual([
      { level: 1, title: 'Intro', page: 4 },
      { level: 2, title: 'Sub', page: 3 },
    ]);
  });
});
