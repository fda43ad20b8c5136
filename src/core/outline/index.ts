/**
 * Document-structure inference.
 *
 * Usage:
 *   import { inferStructure, NoStructureDetectedError } from '../core/outline/index.js';
 */

export { inferStructure } from './pipeline.js';
export { findTocPages, parseTocEntries, parseTocLine, looksLikeTocLine, TOC_MARKERS } from './toc.js';
export { detectHeadings, classifyHeading, toTitleCase } from './headings.js';
export { adaptOutlineEntries, toOutlineEntry } from './bookmarks.js';
export { selectStrategy, runStrategy, runAllStrategies, strategiesFor, DEFAULT_MAX_TOC_PAGES } from './select.js';
export type { SelectionInput } from './select.js';
export { buildTree, finalizeTree, createRoot, countSections } from './tree.js';
export { flattenSections, sectionId, slicePages, toSectionRecord, summarizeSections } from './sections.js';
export { renderOutlineMarkdown, serializeTree, ROOT_TITLE } from './render.js';
export { parseStrategyMode, isStrategyMode } from './validate.js';
export { OutlineError, InvalidInputError, NoStructureDetectedError } from './errors.js';
export { printEntriesPreview, printOutlineSummary, printStrategyReport } from './format.js';
export { DETECTION_STRATEGIES, STRATEGY_MODES } from './types.js';
export type {
  DetectionStrategy,
  StrategyMode,
  OutlineEntry,
  StrategyAttempt,
  SelectionOutcome,
  SectionNode,
  RootNode,
  TreeNode,
  SerializedNode,
  Section,
  SectionRecord,
  SectionSummaryRow,
  InferStructureInput,
  OutlineResult,
} from './types.js';
