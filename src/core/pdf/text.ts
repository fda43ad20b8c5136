/**
 * Page text assembly from pdf.js text-content items.
 */

/** A pdf.js text item, or a marked-content marker (no `str`). */
export type TextContentItem = { str: string; hasEOL: boolean } | { type: string };

/** NBSP → space; drop spaces/tabs that trail a line. */
export function normalizePageText(text: string): string {
  return text.replace(/\u00a0/g, ' ').replace(/[ \t]+\n/g, '\n');
}

/** Concatenate text items, breaking lines where pdf.js reports an end of line. */
export function joinTextItems(items: readonly TextContentItem[]): string {
  let text = '';
  for (const item of items) {
    if (!('str' in item)) continue;
    text += item.str;
    if (item.hasEOL) text += '\n';
  }
  return normalizePageText(text);
}
