/**
 * Stateless renderings of a finalized outline tree.
 */

import type { RootNode, SectionNode, SerializedNode } from './types.js';

/** Title the synthetic root carries in serialized output. */
export const ROOT_TITLE = 'ROOT';

const INDENT = '  ';

function pageLabel(page: number | null): string {
  return page === null ? '?' : String(page);
}

/**
 * Markdown bullet outline, two-space indent per depth:
 *   - Intro  *(pp. 1–5)*
 *     - Sub A  *(pp. 2–3)*
 */
export function renderOutlineMarkdown(root: RootNode): string {
  const lines: string[] = [];

  const rec = (children: SectionNode[], depth: number): void => {
    for (const ch of children) {
      lines.push(`${INDENT.repeat(depth)}- ${ch.title}  *(pp. ${pageLabel(ch.startPage)}–${pageLabel(ch.endPage)})*`);
      rec(ch.children, depth + 1);
    }
  };

  rec(root.children, 0);
  return lines.join('\n').trim() + '\n';
}

function serializeSection(node: SectionNode): SerializedNode {
  return {
    title: node.title,
    level: node.level,
    start_page: node.startPage,
    end_page: node.endPage,
    children: node.children.map(serializeSection),
  };
}

/** JSON-ready tree, root included under {@link ROOT_TITLE} at level 0. */
export function serializeTree(root: RootNode): SerializedNode {
  return {
    title: ROOT_TITLE,
    level: root.level,
    start_page: root.startPage,
    end_page: root.endPage,
    children: root.children.map(serializeSection),
  };
}
