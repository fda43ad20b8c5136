/**
 * Types for PDF text and bookmark extraction.
 */

import type { OutlineEntry } from '../outline/types.js';

/** A bookmark as pdf.js reports it (only the fields we read). */
export interface PdfOutlineItem {
  title: string;
  /** Named destination, explicit destination array, or null. */
  dest: string | unknown[] | null;
  items: PdfOutlineItem[];
}

/** The slice of a pdf.js document needed to resolve bookmarks to pages. */
export interface OutlineSource {
  getOutline(): Promise<PdfOutlineItem[] | null>;
  getDestination(id: string): Promise<unknown[] | null>;
  /** 0-based index of the page a destination reference points at. */
  getPageIndex(ref: unknown): Promise<number>;
}

export interface PdfContent {
  pageCount: number;
  /** Normalized text per page; index 0 is page 1. */
  pagesText: string[];
  /** Bookmarks in document order, or null when the PDF has none. */
  outlineEntries: OutlineEntry[] | null;
}
