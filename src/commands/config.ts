/**
 * Option resolution for outline commands: CLI flag → environment → default.
 *
 * Environment:
 *   REPORT_OUTLINE_STRATEGY        auto | outline | toc | headings
 *   REPORT_OUTLINE_MAX_TOC_PAGES   positive integer
 *   REPORT_OUTLINE_OUT_DIR         export directory
 */

import { InvalidInputError } from '../core/outline/errors.js';
import { DEFAULT_MAX_TOC_PAGES } from '../core/outline/select.js';
import type { StrategyMode } from '../core/outline/types.js';
import { parseStrategyMode, validateMaxTocPages } from '../core/outline/validate.js';

export const DEFAULT_OUT_DIR = 'outputs/report';

export interface ParseConfig {
  strategy: StrategyMode;
  maxTocPages: number;
  outDir: string;
}

export interface ParseConfigFlags {
  strategy?: StrategyMode;
  maxTocPages?: number;
  outDir?: string;
}

type Env = Record<string, string | undefined>;

function envInt(env: Env, name: string): number | undefined {
  const raw = env[name]?.trim();
  if (!raw) return undefined;
  if (!/^\d+$/.test(raw)) {
    throw new InvalidInputError(`${name} must be a positive integer (got "${raw}")`);
  }
  return parseInt(raw, 10);
}

function envString(env: Env, name: string): string | undefined {
  const raw = env[name]?.trim();
  return raw ? raw : undefined;
}

/** Resolve and validate effective settings. Env values are validated like flags. */
export function resolveParseConfig(flags: ParseConfigFlags = {}, env: Env = process.env): ParseConfig {
  const envStrategy = envString(env, 'REPORT_OUTLINE_STRATEGY');
  const strategy = flags.strategy ?? (envStrategy ? parseStrategyMode(envStrategy) : 'auto');

  const maxTocPages = flags.maxTocPages ?? envInt(env, 'REPORT_OUTLINE_MAX_TOC_PAGES') ?? DEFAULT_MAX_TOC_PAGES;
  validateMaxTocPages(maxTocPages);

  const outDir = flags.outDir ?? envString(env, 'REPORT_OUTLINE_OUT_DIR') ?? DEFAULT_OUT_DIR;

  return { strategy, maxTocPages, outDir };
}
