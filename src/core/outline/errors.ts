/**
 * Outline inference errors.
 * Only whole-pipeline failures are raised; noisy candidate lines are filtered silently.
 */

import type { StrategyAttempt } from './types.js';

export class OutlineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'OutlineError';
  }
}

/** Rejected before any processing: empty document, unknown strategy, bad window. */
export class InvalidInputError extends OutlineError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

/** Every attempted strategy abstained. */
export class NoStructureDetectedError extends OutlineError {
  readonly attempts: StrategyAttempt[];

  constructor(attempts: StrategyAttempt[]) {
    const tried = attempts.map((a) => a.strategy).join(', ') || 'none';
    super(`No outline, table of contents or headings detected (tried: ${tried})`);
    this.name = 'NoStructureDetectedError';
    this.attempts = attempts;
  }
}
