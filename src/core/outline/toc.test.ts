import { describe, it, expect } from 'vitest';
import { findTocPages, looksLikeTocLine, parseTocEntries, parseTocLine } from './toc.js';

describe('findTocPages', () => {
  const pages = [
    'Annual Sustainability Report 2024',
    'TABLE OF CONTENTS\nIntroduction ........ 3',
    'Introduction\nWe are pleased to present...',
  ];

  it('returns 0-based indices of pages mentioning contents', () => {
    expect(findTocPages(pages, 8)).toEqual([1]);
  });

  it('only searches the first maxPages pages', () => {
    const late = [...Array.from({ length: 9 }, () => 'body text'), 'Contents'];
    expect(findTocPages(late, 8)).toEqual([]);
    expect(findTocPages(late, 10)).toEqual([9]);
  });

  it('abstains with an empty list when no page matches', () => {
    expect(findTocPages(['Cover', 'Letter from the chair'], 8)).toEqual([]);
  });
});

describe('looksLikeTocLine', () => {
  it.each([
    ['Climate Strategy .......... 12'],
    ['Governance      18'],
    ['2.3 Climate Risk 45'],
    ['B) Appendix 90'],
    ['Our people…… 7'],
  ])('accepts %j', (line) => {
    expect(looksLikeTocLine(line)).toBe(true);
  });

  it.each([
    ['Page 4'],
    ['.......... 12'],
    ['Introduction'],
    ['A Message from the CEO 3'],
    ['Scope 1 emissions 12345'],
  ])('rejects %j', (line) => {
    expect(looksLikeTocLine(line)).toBe(false);
  });
});

describe('parseTocLine', () => {
  it('strips dot leaders from an unnumbered title', () => {
    expect(parseTocLine('Climate Strategy .......... 12')).toEqual({ level: 1, title: 'Climate Strategy', page: 12 });
  });

  it('derives the level from numeric prefixes', () => {
    expect(parseTocLine('2.3.1 Scope 3 emissions 45')).toEqual({ level: 3, title: 'Scope 3 emissions', page: 45 });
    expect(parseTocLine('1. Introduction ..... 3')).toEqual({ level: 1, title: 'Introduction', page: 3 });
  });

  it('drops lettered prefixes at level 1', () => {
    expect(parseTocLine('B) Appendix 90')).toEqual({ level: 1, title: 'Appendix', page: 90 });
  });

  it('returns null when no title remains', () => {
    expect(parseTocLine('3 ...... 12')).toBeNull();
  });

  it('returns null for page 0', () => {
    expect(parseTocLine('Cover ........ 0')).toBeNull();
  });
});

describe('parseTocEntries', () => {
  it('parses, dedupes and sorts entries from TOC pages', () => {
    const pages = [
      'Cover',
      [
        'Table of Contents',
        '2 Climate Strategy ........ 12',
        '1 Introduction ........ 3',
        '1.1 Our approach ........ 4',
        '2 Climate Strategy ........ 12',
        'GOVERNANCE      18',
        'Governance      18',
        'Some prose paragraph that is not an entry.',
      ].join('\n'),
    ];

    expect(parseTocEntries(pages, [1])).toEqual([
      { level: 1, title: 'Introduction', page: 3 },
      { level: 2, title: 'Our approach', page: 4 },
      { level: 1, title: 'Climate Strategy', page: 12 },
      { level: 1, title: 'GOVERNANCE', page: 18 },
    ]);
  });

  it('merges entries across several TOC pages in page order', () => {
    const pages = ['Contents\nResults .......... 20', 'Contents (continued)\nForeword .......... 2'];
    expect(parseTocEntries(pages, [0, 1])).toEqual([
      { level: 1, title: 'Foreword', page: 2 },
      { level: 1, title: 'Results', page: 20 },
    ]);
  });

  it('ignores page indices outside the document', () => {
    expect(parseTocEntries(['Contents'], [5])).toEqual([]);
  });
});
