/**
 * Types for document-structure inference.
 *
 * Pages are 1-based everywhere except where noted (TOC page indices are
 * 0-based array positions into pagesText).
 */

// ── Strategies ───────────────────────────────────────────────

/** Concrete outline-detection strategies, in `auto` priority order. */
export const DETECTION_STRATEGIES = ['outline', 'toc', 'headings'] as const;
export type DetectionStrategy = typeof DETECTION_STRATEGIES[number];

/** Strategy modes accepted from callers. */
export const STRATEGY_MODES = ['auto', ...DETECTION_STRATEGIES] as const;
export type StrategyMode = typeof STRATEGY_MODES[number];

// ── Entries ──────────────────────────────────────────────────

/** A single (level, title, page) outline candidate. */
export interface OutlineEntry {
  readonly level: number;
  readonly title: string;
  readonly page: number;
}

/** Result of running one strategy: entries found, or an explicit abstention. */
export type StrategyAttempt =
  | { status: 'found'; strategy: DetectionStrategy; entries: OutlineEntry[] }
  | { status: 'abstained'; strategy: DetectionStrategy; reason: string };

/** The winning strategy plus everything tried on the way. */
export interface SelectionOutcome {
  strategy: DetectionStrategy;
  entries: OutlineEntry[];
  attempts: StrategyAttempt[];
  /** 0-based indices of pages recognised as a table of contents (empty unless toc was tried). */
  tocPages: number[];
}

// ── Tree ─────────────────────────────────────────────────────

/** One titled node of the outline. `endPage` is null until finalized. */
export interface SectionNode {
  kind: 'section';
  title: string;
  level: number;
  startPage: number;
  endPage: number | null;
  children: SectionNode[];
}

/** Synthetic root spanning the whole document. */
export interface RootNode {
  kind: 'root';
  level: 0;
  startPage: number | null;
  endPage: number | null;
  children: SectionNode[];
}

export type TreeNode = RootNode | SectionNode;

/** JSON shape of a tree node (root included). */
export interface SerializedNode {
  title: string;
  level: number;
  start_page: number | null;
  end_page: number | null;
  children: SerializedNode[];
}

// ── Sections ─────────────────────────────────────────────────

/** A flattened, text-bearing view of one non-root node. */
export interface Section {
  /** 12-char hex fingerprint of path + page range. */
  readonly id: string;
  readonly title: string;
  readonly level: number;
  readonly startPage: number;
  readonly endPage: number;
  /** Ancestor titles down to and including this section, root excluded. */
  readonly path: readonly string[];
  readonly text: string;
}

/** Line-delimited export record for a section. */
export interface SectionRecord {
  id: string;
  title: string;
  level: number;
  start_page: number;
  end_page: number;
  path: string[];
  text: string;
}

export interface SectionSummaryRow {
  id: string;
  title: string;
  level: number;
  startPage: number;
  endPage: number;
  /** Path joined with " > ". */
  path: string;
  nChars: number;
  nWords: number;
}

// ── Pipeline ─────────────────────────────────────────────────

export interface InferStructureInput {
  /** Plain text per page; index 0 is page 1. */
  pagesText: readonly string[];
  /** Embedded bookmarks, if the provider found any. Validated before use. */
  outlineEntries?: unknown;
  strategy?: StrategyMode;
  /** Number of leading pages searched for a table of contents (default 8). */
  maxTocPages?: number;
}

export interface OutlineResult {
  strategy: DetectionStrategy;
  pageCount: number;
  entries: OutlineEntry[];
  attempts: StrategyAttempt[];
  tocPages: number[];
  tree: RootNode;
  sections: Section[];
  markdown: string;
}
