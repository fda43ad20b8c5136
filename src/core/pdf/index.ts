/**
 * PDF page text + bookmark extraction.
 *
 * Usage:
 *   import { readPdfDocument } from '../core/pdf/index.js';
 */

export { loadPdf, extractPagesText, readPdfDocument } from './extract.js';
export { extractOutlineEntries } from './bookmarks.js';
export { normalizePageText, joinTextItems } from './text.js';
export type { TextContentItem } from './text.js';
export type { PdfOutlineItem, OutlineSource, PdfContent } from './types.js';
