/**
 * Document-structure inference: select a strategy, build and finalize the
 * tree, flatten it into sections and render the outline.
 *
 * Pure and synchronous; a call shares no state with any other call.
 */

import { renderOutlineMarkdown } from './render.js';
import { flattenSections } from './sections.js';
import { DEFAULT_MAX_TOC_PAGES, selectStrategy } from './select.js';
import { buildTree, finalizeTree } from './tree.js';
import type { InferStructureInput, OutlineResult } from './types.js';
import { parseStrategyMode, validateMaxTocPages, validatePagesText } from './validate.js';

/**
 * Infer the outline of a document from its page text.
 *
 * @throws InvalidInputError for an empty document, unknown strategy or bad TOC window.
 * @throws NoStructureDetectedError when no attempted strategy yields entries.
 */
export function inferStructure(input: InferStructureInput): OutlineResult {
  const { pagesText } = input;
  validatePagesText(pagesText);
  // Callers outside TypeScript can pass anything here
  const strategy = parseStrategyMode(String(input.strategy ?? 'auto'));
  const maxTocPages = input.maxTocPages ?? DEFAULT_MAX_TOC_PAGES;
  validateMaxTocPages(maxTocPages);

  const selection = selectStrategy({
    pagesText,
    outlineEntries: input.outlineEntries,
    strategy,
    maxTocPages,
  });

  const pageCount = pagesText.length;
  const tree = finalizeTree(buildTree(selection.entries), pageCount);
  const sections = flattenSections(tree, pagesText);

  return {
    strategy: selection.strategy,
    pageCount,
    entries: selection.entries,
    attempts: selection.attempts,
    tocPages: selection.tocPages,
    tree,
    sections,
    markdown: renderOutlineMarkdown(tree),
  };
}
