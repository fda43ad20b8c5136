import { describe, it, expect } from 'vitest';
import { NoStructureDetectedError } from './errors.js';
import { runAllStrategies, selectStrategy } from './select.js';
import type { OutlineEntry } from './types.js';

const BOOKMARKS: OutlineEntry[] = [
  { level: 1, title: 'Overview', page: 1 },
  { level: 1, title: 'Environment', page: 3 },
];

const TOC_PAGES = [
  'Contents\nIntroduction .......... 2\nClimate Strategy .......... 3',
  'Introduction body.',
  'Climate body.',
];

const HEADING_PAGES = [
  'Letter from the chair',
  'our emissions fell this year.',
  '2 Nature Positive',
];

const PROSE_PAGES = ['the quick brown fox.', 'lower case body text only.'];

describe('selectStrategy', () => {
  it('prefers bookmarks over a table of contents under auto', () => {
    const outcome = selectStrategy({ pagesText: TOC_PAGES, outlineEntries: BOOKMARKS, strategy: 'auto', maxTocPages: 8 });

    expect(outcome.strategy).toBe('outline');
    expect(outcome.entries).toEqual(BOOKMARKS);
    expect(outcome.attempts.map((a) => a.strategy)).toEqual(['outline']);
    expect(outcome.tocPages).toEqual([]);
  });

  it('falls back to the table of contents when there are no bookmarks', () => {
    const outcome = selectStrategy({ pagesText: TOC_PAGES, strategy: 'auto', maxTocPages: 8 });

    expect(outcome.strategy).toBe('toc');
    expect(outcome.tocPages).toEqual([0]);
    expect(outcome.entries).toEqual([
      { level: 1, title: 'Introduction', page: 2 },
      { level: 1, title: 'Climate Strategy', page: 3 },
    ]);
    expect(outcome.attempts.map((a) => [a.strategy, a.status])).toEqual([
      ['outline', 'abstained'],
      ['toc', 'found'],
    ]);
  });

  it('falls back to headings when neither bookmarks nor contents pages exist', () => {
    const outcome = selectStrategy({ pagesText: HEADING_PAGES, outlineEntries: [], strategy: 'auto', maxTocPages: 8 });

    expect(outcome.strategy).toBe('headings');
    expect(outcome.entries).toEqual([
      { level: 1, title: 'Letter from the chair', page: 1 },
      { level: 1, title: 'Nature Positive', page: 3 },
    ]);
    expect(outcome.attempts).toHaveLength(3);
  });

  it('moves on to headings when contents pages have no parseable entries', () => {
    const pages = ['Contents', ...HEADING_PAGES.slice(1)];
    const outcome = selectStrategy({ pagesText: pages, strategy: 'auto', maxTocPages: 8 });

    expect(outcome.strategy).toBe('headings');
    expect(outcome.tocPages).toEqual([0]);
    expect(outcome.attempts[1]).toEqual({
      status: 'abstained',
      strategy: 'toc',
      reason: 'contents pages had no parseable entries',
    });
  });

  it('runs only the forced strategy', () => {
    const outcome = selectStrategy({ pagesText: TOC_PAGES, outlineEntries: BOOKMARKS, strategy: 'toc', maxTocPages: 8 });

    expect(outcome.strategy).toBe('toc');
    expect(outcome.attempts.map((a) => a.strategy)).toEqual(['toc']);
  });

  it('fails a forced strategy that abstains without trying others', () => {
    try {
      selectStrategy({ pagesText: HEADING_PAGES, strategy: 'outline', maxTocPages: 8 });
      expect.unreachable('selectStrategy should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(NoStructureDetectedError);
      if (err instanceof NoStructureDetectedError) {
        expect(err.attempts).toEqual([{ status: 'abstained', strategy: 'outline', reason: 'no embedded bookmarks' }]);
      }
    }
  });

  it('fails with NoStructureDetectedError when every strategy abstains', () => {
    expect(() => selectStrategy({ pagesText: PROSE_PAGES, strategy: 'auto', maxTocPages: 8 }))
      .toThrow(NoStructureDetectedError);
  });

  it('ignores a contents page outside the search window', () => {
    const pages = [...PROSE_PAGES, ...PROSE_PAGES, ...PROSE_PAGES, ...PROSE_PAGES, 'Contents\nIntroduction .......... 2'];
    expect(() => selectStrategy({ pagesText: pages, strategy: 'toc', maxTocPages: 8 }))
      .toThrow('No outline, table of contents or headings detected (tried: toc)');
  });
});

describe('runAllStrategies', () => {
  it('evaluates every strategy without stopping at the first hit', () => {
    const { attempts, tocPages } = runAllStrategies({ pagesText: TOC_PAGES, outlineEntries: BOOKMARKS, maxTocPages: 8 });

    expect(attempts.map((a) => [a.strategy, a.status])).toEqual([
      ['outline', 'found'],
      ['toc', 'found'],
      ['headings', 'abstained'],
    ]);
    expect(tocPages).toEqual([0]);
  });
});
