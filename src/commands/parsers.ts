import { InvalidArgumentError } from 'commander';
import { isStrategyMode } from '../core/outline/validate.js';
import { STRATEGY_MODES } from '../core/outline/types.js';
import type { StrategyMode } from '../core/outline/types.js';

/** Commander option parser for positive integers. */
export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError(`Expected a positive integer (got "${value}")`);
  }
  return n;
}

/** Commander option parser for --strategy. */
export function parseStrategyOption(value: string): StrategyMode {
  const normalized = value.trim().toLowerCase();
  if (!isStrategyMode(normalized)) {
    throw new InvalidArgumentError(`Expected one of ${STRATEGY_MODES.join(', ')} (got "${value}")`);
  }
  return normalized;
}
