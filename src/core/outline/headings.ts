/**
 * Fallback heading detection directly from body text.
 *
 * Three ordered, mutually exclusive grammars; the first that matches a line wins:
 *   1. Numbered heading    "2.3 Climate Risk"        level = dots + 1
 *   2. All-caps short line "OUR APPROACH"            title-cased, level 1
 *   3. Proper-case line    "Materiality assessment"  level 1
 */

import { EntryCollector, pageLines } from './entries.js';
import type { OutlineEntry } from './types.js';

const MIN_LENGTH = 6;
const MAX_LENGTH = 120;
const MAX_CAPS_LENGTH = 60;
/** Max count of , ; : before a proper-case line reads as a sentence. */
const MAX_CLAUSE_PUNCTUATION = 2;

const NUMBERED_HEADING = /^(\d+(?:\.\d+){0,5})\s+([A-Z][A-Za-z0-9&,\-:’'()\/ ]+)$/;
const PROPER_CASE = /^[A-Z][A-Za-z0-9&,\-:’'()\/ ]+$/;
const CAPTION = /^(figure|table)\s+\d+/i;

/** Upper-case the first letter of every letter run, lower-case the rest. */
export function toTitleCase(s: string): string {
  return s.toLowerCase().replace(/(^|[^\p{L}])(\p{L})/gu, (_, before: string, letter: string) => before + letter.toUpperCase());
}

function isAllCaps(s: string): boolean {
  return s === s.toUpperCase() && s !== s.toLowerCase();
}

function clausePunctuation(s: string): number {
  let count = 0;
  for (const ch of s) {
    if (ch === ',' || ch === ';' || ch === ':') count++;
  }
  return count;
}

/** Classify one whitespace-normalised line, or null if no grammar matches. */
export function classifyHeading(line: string): { level: number; title: string } | null {
  const s = line.replace(/\s+/g, ' ').trim();
  if (s.length < MIN_LENGTH || s.length > MAX_LENGTH) return null;

  const numbered = s.match(NUMBERED_HEADING);
  if (numbered) {
    return { level: numbered[1].split('.').length, title: numbered[2].trim() };
  }

  if (isAllCaps(s) && s.length <= MAX_CAPS_LENGTH) {
    return { level: 1, title: toTitleCase(s) };
  }

  if (s.endsWith('.')) return null;
  if (s.split(' ').length < 2) return null;
  if (!PROPER_CASE.test(s)) return null;
  if (clausePunctuation(s) > MAX_CLAUSE_PUNCTUATION) return null;
  if (CAPTION.test(s)) return null;

  return { level: 1, title: s };
}

/**
 * Scan every line of every page for heading-like lines.
 * Returns (level, title, page) entries sorted by (page, level, title); empty means "abstain".
 */
export function detectHeadings(pagesText: readonly string[]): OutlineEntry[] {
  const collector = new EntryCollector();

  pagesText.forEach((text, i) => {
    for (const ln of pageLines(text)) {
      const heading = classifyHeading(ln);
      if (heading) collector.add(heading.level, heading.title, i + 1);
    }
  });

  return collector.sorted();
}
