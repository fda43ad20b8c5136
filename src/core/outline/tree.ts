/**
 * Outline tree construction (level-stack) and page-range finalization.
 */

import { InvalidInputError } from './errors.js';
import type { OutlineEntry, RootNode, SectionNode, TreeNode } from './types.js';

export function createRoot(): RootNode {
  return { kind: 'root', level: 0, startPage: null, endPage: null, children: [] };
}

/**
 * Build a tree from entries in document order.
 *
 * Keeps a stack of open ancestors; for each entry pops every ancestor whose
 * level is >= the entry's, so equal levels become siblings. The root is never popped.
 */
export function buildTree(entries: readonly OutlineEntry[]): RootNode {
  const root = createRoot();
  const stack: TreeNode[] = [root];

  for (const entry of entries) {
    if (entry.level < 1) {
      throw new InvalidInputError(`Entry "${entry.title}" has level ${entry.level}; levels start at 1`);
    }

    const node: SectionNode = {
      kind: 'section',
      title: entry.title.trim(),
      level: entry.level,
      startPage: entry.page,
      endPage: null,
      children: [],
    };

    while (stack.length > 1 && stack[stack.length - 1].level >= entry.level) {
      stack.pop();
    }
    stack[stack.length - 1].children.push(node);
    stack.push(node);
  }

  return root;
}

/**
 * Give every child an end page: the page before its next sibling starts, or
 * the parent's end for the last child. `max` with the child's own start keeps
 * ranges from inverting when siblings share a start page.
 */
function assignEndPages(children: SectionNode[], parentEnd: number): void {
  for (let i = 0; i < children.length; i++) {
    const child = children[i];
    const next = children[i + 1];
    child.endPage = next
      ? Math.max(child.startPage, next.startPage - 1)
      : Math.max(child.startPage, parentEnd);
    if (child.children.length > 0) {
      assignEndPages(child.children, child.endPage);
    }
  }
}

/** Set the root to [1, pageCount] and fill in every end page. Idempotent. */
export function finalizeTree(root: RootNode, pageCount: number): RootNode {
  root.startPage = 1;
  root.endPage = pageCount;
  assignEndPages(root.children, pageCount);
  return root;
}

/** Count of non-root nodes. */
export function countSections(root: RootNode): number {
  let count = 0;
  const stack: SectionNode[] = [...root.children];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) continue;
    count++;
    stack.push(...node.children);
  }
  return count;
}
