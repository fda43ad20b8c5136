/**
 * Strategy selection: outline → toc → headings under `auto`, or a single forced strategy.
 * The first strategy that finds entries wins; later ones are never run.
 */

import { adaptOutlineEntries } from './bookmarks.js';
import { NoStructureDetectedError } from './errors.js';
import { detectHeadings } from './headings.js';
import { findTocPages, parseTocEntries } from './toc.js';
import { DETECTION_STRATEGIES } from './types.js';
import type {
  DetectionStrategy,
  OutlineEntry,
  SelectionOutcome,
  StrategyAttempt,
  StrategyMode,
} from './types.js';

export const DEFAULT_MAX_TOC_PAGES = 8;

export interface SelectionInput {
  pagesText: readonly string[];
  outlineEntries?: unknown;
  strategy: StrategyMode;
  maxTocPages: number;
}

interface AttemptWithPages {
  attempt: StrategyAttempt;
  tocPages: number[];
}

function found(strategy: DetectionStrategy, entries: OutlineEntry[], emptyReason: string): StrategyAttempt {
  return entries.length > 0
    ? { status: 'found', strategy, entries }
    : { status: 'abstained', strategy, reason: emptyReason };
}

/** Run a single strategy. Never throws for an empty result. */
export function runStrategy(strategy: DetectionStrategy, input: SelectionInput): AttemptWithPages {
  switch (strategy) {
    case 'outline':
      return {
        attempt: found('outline', adaptOutlineEntries(input.outlineEntries), 'no embedded bookmarks'),
        tocPages: [],
      };
    case 'toc': {
      const tocPages = findTocPages(input.pagesText, input.maxTocPages);
      if (tocPages.length === 0) {
        return {
          attempt: {
            status: 'abstained',
            strategy: 'toc',
            reason: `no contents page in the first ${input.maxTocPages} pages`,
          },
          tocPages,
        };
      }
      const entries = parseTocEntries(input.pagesText, tocPages);
      return { attempt: found('toc', entries, 'contents pages had no parseable entries'), tocPages };
    }
    case 'headings':
      return {
        attempt: found('headings', detectHeadings(input.pagesText), 'no heading-like lines'),
        tocPages: [],
      };
    default: {
      const _exhaustive: never = strategy;
      throw new Error(`Unknown strategy: ${_exhaustive}`);
    }
  }
}

/** Strategies tried for a mode, in priority order. */
export function strategiesFor(mode: StrategyMode): readonly DetectionStrategy[] {
  return mode === 'auto' ? DETECTION_STRATEGIES : [mode];
}

/**
 * Pick the first strategy (in priority order) that yields entries.
 * @throws NoStructureDetectedError if every attempted strategy abstains.
 */
export function selectStrategy(input: SelectionInput): SelectionOutcome {
  const attempts: StrategyAttempt[] = [];
  let tocPages: number[] = [];

  for (const strategy of strategiesFor(input.strategy)) {
    const result = runStrategy(strategy, input);
    attempts.push(result.attempt);
    if (strategy === 'toc') tocPages = result.tocPages;

    if (result.attempt.status === 'found') {
      return { strategy, entries: result.attempt.entries, attempts, tocPages };
    }
  }

  throw new NoStructureDetectedError(attempts);
}

/** Evaluate every strategy without short-circuiting (diagnostics only). */
export function runAllStrategies(input: Omit<SelectionInput, 'strategy'>): { attempts: StrategyAttempt[]; tocPages: number[] } {
  const attempts: StrategyAttempt[] = [];
  let tocPages: number[] = [];
  for (const strategy of DETECTION_STRATEGIES) {
    const result = runStrategy(strategy, { ...input, strategy });
    attempts.push(result.attempt);
    if (strategy === 'toc') tocPages = result.tocPages;
  }
  return { attempts, tocPages };
}
