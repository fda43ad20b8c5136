/**
 * Resolve a PDF bookmark tree to (level, title, page) entries.
 * Works against the minimal OutlineSource slice of a pdf.js document.
 */

import type { OutlineEntry } from '../outline/types.js';
import type { OutlineSource, PdfOutlineItem } from './types.js';

/** Resolve a bookmark destination to a 1-based page, or null if it can't be resolved. */
async function resolvePage(source: OutlineSource, dest: PdfOutlineItem['dest']): Promise<number | null> {
  if (!dest) return null;
  try {
    const explicit = typeof dest === 'string' ? await source.getDestination(dest) : dest;
    if (!Array.isArray(explicit) || !explicit[0]) return null;
    const pageIndex = await source.getPageIndex(explicit[0]);
    return pageIndex + 1;
  } catch (err) {
    // Broken named destinations are common in exported reports
    if (err instanceof Error) return null;
    throw err;
  }
}

/**
 * Flatten the bookmark tree into (level, title, page) entries in document order.
 * Level is nesting depth starting at 1. Bookmarks whose destination can't be
 * resolved are skipped; their children are still visited.
 *
 * @returns null when the document has no bookmarks.
 */
export async function extractOutlineEntries(source: OutlineSource): Promise<OutlineEntry[] | null> {
  const outline = await source.getOutline();
  if (!outline || outline.length === 0) return null;

  const entries: OutlineEntry[] = [];

  const walk = async (items: PdfOutlineItem[], level: number): Promise<void> => {
    for (const item of items) {
      const title = item.title.trim();
      const page = await resolvePage(source, item.dest);
      if (title && page !== null) {
        entries.push({ level, title, page });
      }
      if (Array.isArray(item.items) && item.items.length > 0) {
        await walk(item.items, level + 1);
      }
    }
  };

  await walk(outline, 1);
  return entries.length > 0 ? entries : null;
}
