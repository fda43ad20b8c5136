/**
 * Input validation for outline inference.
 * Throws InvalidInputError with user-friendly messages.
 */

import { InvalidInputError } from './errors.js';
import { STRATEGY_MODES } from './types.js';
import type { StrategyMode } from './types.js';

export function isStrategyMode(value: string): value is StrategyMode {
  return (STRATEGY_MODES as readonly string[]).includes(value);
}

/** Parse a strategy name (case-insensitive, surrounding whitespace ignored). */
export function parseStrategyMode(value: string): StrategyMode {
  const normalized = value.trim().toLowerCase();
  if (!isStrategyMode(normalized)) {
    throw new InvalidInputError(`Unknown strategy "${value}". Valid: ${STRATEGY_MODES.join(', ')}`);
  }
  return normalized;
}

export function validatePagesText(pagesText: readonly string[]): void {
  if (pagesText.length === 0) {
    throw new InvalidInputError('Document has no pages');
  }
}

export function validateMaxTocPages(value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new InvalidInputError(`maxTocPages must be a positive integer (got ${value})`);
  }
}
