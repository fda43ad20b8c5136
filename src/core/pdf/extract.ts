/**
 * Page text + bookmark extraction for report PDFs.
 *
 * Uses the pdfjs-dist legacy build for Node.js (pure JS, no canvas).
 */

import { readFileSync } from 'node:fs';
import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';
import { extractOutlineEntries } from './bookmarks.js';
import { joinTextItems } from './text.js';
import type { PdfContent } from './types.js';

type PdfDocument = Awaited<ReturnType<typeof getDocument>['promise']>;

/** Open a PDF from raw bytes. Caller must `destroy()` the document. */
export async function loadPdf(data: Uint8Array): Promise<PdfDocument> {
  return getDocument({
    data,
    isEvalSupported: false, // Security: no code generation from strings
    verbosity: 0,           // Suppress warnings
  }).promise;
}

/** Plain text of every page, in page order. */
export async function extractPagesText(doc: PdfDocument): Promise<string[]> {
  const pages: string[] = [];

  for (let i = 1; i <= doc.numPages; i++) {
    const page = await doc.getPage(i); // 1-based
    const content = await page.getTextContent();

    pages.push(joinTextItems(content.items));
    page.cleanup();
  }

  return pages;
}

/** Read a PDF from disk and extract page text and bookmarks. */
export async function readPdfDocument(filePath: string): Promise<PdfContent> {
  const doc = await loadPdf(new Uint8Array(readFileSync(filePath)));
  try {
    const pagesText = await extractPagesText(doc);
    const outlineEntries = await extractOutlineEntries(doc);
    return { pageCount: doc.numPages, pagesText, outlineEntries };
  } finally {
    await doc.destroy();
  }
}
