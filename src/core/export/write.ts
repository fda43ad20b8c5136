/**
 * Write an inferred outline to disk:
 *   raw_text.txt    page text with "===== PAGE n =====" separators
 *   tree.json       serialized tree, root included
 *   tree.md         markdown outline
 *   sections.jsonl  one section record per line
 */

import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { serializeTree } from '../outline/render.js';
import { toSectionRecord } from '../outline/sections.js';
import type { OutlineResult, RootNode, Section } from '../outline/types.js';

export interface ExportPaths {
  rawText: string;
  treeJson: string;
  treeMd: string;
  sectionsJsonl: string;
}

export function formatRawText(pagesText: readonly string[]): string {
  return pagesText
    .map((t, i) => `\n\n===== PAGE ${i + 1} =====\n\n${t.trimEnd()}\n`)
    .join('');
}

export function formatSectionsJsonl(sections: readonly Section[]): string {
  return sections.map((s) => JSON.stringify(toSectionRecord(s)) + '\n').join('');
}

export function writeRawText(outDir: string, pagesText: readonly string[]): string {
  mkdirSync(outDir, { recursive: true });
  const p = join(outDir, 'raw_text.txt');
  writeFileSync(p, formatRawText(pagesText), 'utf-8');
  return p;
}

export function writeTreeJson(outDir: string, root: RootNode): string {
  mkdirSync(outDir, { recursive: true });
  const p = join(outDir, 'tree.json');
  writeFileSync(p, JSON.stringify(serializeTree(root), null, 2), 'utf-8');
  return p;
}

export function writeTreeMd(outDir: string, markdown: string): string {
  mkdirSync(outDir, { recursive: true });
  const p = join(outDir, 'tree.md');
  writeFileSync(p, markdown, 'utf-8');
  return p;
}

export function writeSectionsJsonl(outDir: string, sections: readonly Section[]): string {
  mkdirSync(outDir, { recursive: true });
  const p = join(outDir, 'sections.jsonl');
  writeFileSync(p, formatSectionsJsonl(sections), 'utf-8');
  return p;
}

/** Write all four export files into `outDir` (created if missing). */
export function exportOutline(outDir: string, result: OutlineResult, pagesText: readonly string[]): ExportPaths {
  return {
    rawText: writeRawText(outDir, pagesText),
    treeJson: writeTreeJson(outDir, result.tree),
    treeMd: writeTreeMd(outDir, result.markdown),
    sectionsJsonl: writeSectionsJsonl(outDir, result.sections),
  };
}
