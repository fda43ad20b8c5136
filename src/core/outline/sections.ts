/**
 * Flatten a finalized outline tree into section records with sliced page text.
 */

import { createHash } from 'node:crypto';
import type { RootNode, Section, SectionNode, SectionRecord, SectionSummaryRow } from './types.js';

const PATH_SEPARATOR = ' > ';
const ID_LENGTH = 12;

/**
 * Structural fingerprint: SHA-1 of the title path and page range.
 * Two sections with the same path and range share an id.
 */
export function sectionId(path: readonly string[], startPage: number, endPage: number): string {
  return createHash('sha1')
    .update(`${path.join(PATH_SEPARATOR)}|${startPage}|${endPage}`, 'utf8')
    .digest('hex')
    .slice(0, ID_LENGTH);
}

/** Text of pages [startPage, endPage] (1-based, inclusive), newline-joined and trimmed. */
export function slicePages(pagesText: readonly string[], startPage: number, endPage: number): string {
  return pagesText.slice(startPage - 1, endPage).join('\n').trim();
}

/** Pre-order walk over the tree (root skipped); output is in ascending page order. */
export function flattenSections(root: RootNode, pagesText: readonly string[]): Section[] {
  const sections: Section[] = [];

  const walk = (children: SectionNode[], path: string[]): void => {
    for (const child of children) {
      const childPath = [...path, child.title];
      const startPage = Math.max(1, child.startPage);
      const endPage = Math.max(startPage, child.endPage ?? startPage);

      sections.push({
        id: sectionId(childPath, startPage, endPage),
        title: child.title,
        level: child.level,
        startPage,
        endPage,
        path: childPath,
        text: slicePages(pagesText, startPage, endPage),
      });

      walk(child.children, childPath);
    }
  };

  walk(root.children, []);
  return sections;
}

export function toSectionRecord(section: Section): SectionRecord {
  return {
    id: section.id,
    title: section.title,
    level: section.level,
    start_page: section.startPage,
    end_page: section.endPage,
    path: [...section.path],
    text: section.text,
  };
}

/** Tabular view with character and word counts. */
export function summarizeSections(sections: readonly Section[]): SectionSummaryRow[] {
  return sections.map((s) => {
    const words = s.text.split(/\s+/).filter(Boolean);
    return {
      id: s.id,
      title: s.title,
      level: s.level,
      startPage: s.startPage,
      endPage: s.endPage,
      path: s.path.join(PATH_SEPARATOR),
      nChars: s.text.length,
      nWords: words.length,
    };
  });
}
