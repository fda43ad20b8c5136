/**
 * Outline (bookmark) strategy: shape validation of externally supplied entries.
 * Bookmarks already come in document order and are not re-sorted.
 */

import type { OutlineEntry } from './types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isPositiveInt(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 1;
}

/** Validate one raw bookmark; null when it doesn't have the (level, title, page) shape. */
export function toOutlineEntry(raw: unknown): OutlineEntry | null {
  if (!isRecord(raw)) return null;
  const { level, title, page } = raw;
  if (!isPositiveInt(level) || !isPositiveInt(page)) return null;
  if (typeof title !== 'string') return null;
  const trimmed = title.trim();
  if (!trimmed) return null;
  return { level, title: trimmed, page };
}

/**
 * Adapt a bookmark list. Absent, non-array and empty input all yield [] (abstain);
 * malformed items are dropped.
 */
export function adaptOutlineEntries(raw: unknown): OutlineEntry[] {
  if (!Array.isArray(raw)) return [];
  const entries: OutlineEntry[] = [];
  for (const item of raw) {
    const entry = toOutlineEntry(item);
    if (entry) entries.push(entry);
  }
  return entries;
}
