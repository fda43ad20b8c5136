/**
 * Shared helpers for building outline entry lists.
 */

import type { OutlineEntry } from './types.js';

/** Document order: page, then level, then title (code-unit order). */
export function compareEntries(a: OutlineEntry, b: OutlineEntry): number {
  if (a.page !== b.page) return a.page - b.page;
  if (a.level !== b.level) return a.level - b.level;
  if (a.title < b.title) return -1;
  if (a.title > b.title) return 1;
  return 0;
}

/**
 * Collects entries, dropping repeats of (level, lowercased title, page).
 * First occurrence wins.
 */
export class EntryCollector {
  private readonly seen = new Set<string>();
  private readonly entries: OutlineEntry[] = [];

  add(level: number, title: string, page: number): void {
    const key = `${level}\u0000${title.toLowerCase()}\u0000${page}`;
    if (this.seen.has(key)) return;
    this.seen.add(key);
    this.entries.push({ level, title, page });
  }

  /** Entries sorted into document order. */
  sorted(): OutlineEntry[] {
    return [...this.entries].sort(compareEntries);
  }
}

/** Split page text into trimmed physical lines. */
export function pageLines(text: string): string[] {
  return text.split(/\r?\n/).map((ln) => ln.trim());
}
