/**
 * Table-of-contents strategy: locate TOC pages near the front of the document
 * and parse their dot-leader / wide-gap lines into leveled entries.
 *
 * Recognised line shapes:
 *   Climate Strategy .......... 12
 *   Governance            18
 *   2.3 Climate Risk 45
 *   B) Appendix 90
 */

import { EntryCollector, pageLines } from './entries.js';
import type { OutlineEntry } from './types.js';

/** Lowercase phrases that mark a page as a table of contents. */
export const TOC_MARKERS: readonly string[] = ['table of contents', 'contents'];

const MIN_LINE_LENGTH = 6;

/** Trailing 1–4 digit page number. */
const TRAILING_PAGE = /\b(\d{1,4})\s*$/;
const HAS_LETTER = /[A-Za-z]/;
/** Three or more leader dots, or a typographic ellipsis. */
const DOT_LEADER = /[.·]{3,}|…/;
const WIDE_GAP_BEFORE_PAGE = /\s{3,}\d{1,4}\s*$/;
/** "1", "1.2", "2.3.1" or a lettered "A." / "B)" followed by text. */
const NUMBERED_LINE = /^(\d+(?:\.\d+){0,4}|[A-Z](?=[.)]))[.)]?\s+\S+/;
const NUMBERING_PREFIX = /^(\d+(?:\.\d+){0,6}|[A-Z](?=[.)]))[.)]?\s+(.*)$/;
const TRAILING_LEADER = /[\s.·…]+$/;

/**
 * Find likely TOC pages within the first `maxPages` pages.
 * Returns 0-based page indices in ascending order; empty means "abstain".
 */
export function findTocPages(pagesText: readonly string[], maxPages: number): number[] {
  const pages: number[] = [];
  const n = Math.min(pagesText.length, maxPages);
  for (let i = 0; i < n; i++) {
    const low = pagesText[i].toLowerCase();
    if (TOC_MARKERS.some((marker) => low.includes(marker))) {
      pages.push(i);
    }
  }
  return pages;
}

/** Heuristic: does this trimmed line look like a TOC entry? */
export function looksLikeTocLine(line: string): boolean {
  const s = line.trim();
  if (s.length < MIN_LINE_LENGTH) return false;
  if (!TRAILING_PAGE.test(s)) return false;
  if (!HAS_LETTER.test(s)) return false;
  if (DOT_LEADER.test(s) || WIDE_GAP_BEFORE_PAGE.test(s)) return true;
  return NUMBERED_LINE.test(s);
}

/**
 * Split a TOC line into an entry, or null when nothing usable remains.
 * Numeric prefixes set the level (dot count + 1); lettered prefixes are dropped at level 1.
 */
export function parseTocLine(line: string): OutlineEntry | null {
  const s = line.trim();
  const m = s.match(TRAILING_PAGE);
  if (!m || m.index === undefined) return null;

  const page = parseInt(m[1], 10);
  if (page < 1) return null;

  const titlePart = s.slice(0, m.index).replace(TRAILING_LEADER, '').trim();

  let level = 1;
  let title = titlePart;
  const prefix = titlePart.match(NUMBERING_PREFIX);
  if (prefix) {
    const num = prefix[1];
    title = prefix[2].trim();
    if (/^\d/.test(num)) {
      level = num.split('.').length;
    }
  }

  if (!HAS_LETTER.test(title)) return null;
  return { level, title, page };
}

/**
 * Parse every TOC-like line on the given pages.
 * Deduplicated by (level, lowercased title, page) and sorted by (page, level, title).
 */
export function parseTocEntries(pagesText: readonly string[], tocPages: readonly number[]): OutlineEntry[] {
  const collector = new EntryCollector();

  for (const p of tocPages) {
    const text = pagesText[p];
    if (text === undefined) continue;

    for (const ln of pageLines(text)) {
      if (!looksLikeTocLine(ln)) continue;
      const entry = parseTocLine(ln);
      if (entry) collector.add(entry.level, entry.title, entry.page);
    }
  }

  return collector.sorted();
}
