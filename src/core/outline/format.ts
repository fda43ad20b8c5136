/**
 * Human-readable CLI output for outline inference: chalk tables padded to fixed widths.
 */

import chalk from 'chalk';
import { summarizeSections } from './sections.js';
import type { OutlineEntry, OutlineResult, StrategyAttempt } from './types.js';

const line = (w: number): string => chalk.dim('─'.repeat(w));
const clip = (s: string, w: number): string => (s.length > w ? s.slice(0, w - 1) + '…' : s);

/** Print the first `maxRows` entries as a Level / Title / Page table. */
export function printEntriesPreview(entries: readonly OutlineEntry[], maxRows = 12, title = 'Detected outline entries (preview)'): void {
  const W = 72;

  console.log();
  console.log(chalk.bold(title));
  console.log(chalk.dim(['Level'.padStart(5), 'Title'.padEnd(56), 'Page'.padStart(5)].join('  ')));
  console.log(line(W));

  for (const e of entries.slice(0, maxRows)) {
    console.log([String(e.level).padStart(5), clip(e.title, 56).padEnd(56), String(e.page).padStart(5)].join('  '));
  }
  if (entries.length > maxRows) {
    console.log(chalk.dim(['…'.padStart(5), `(+${entries.length - maxRows} more)`.padEnd(56), '…'.padStart(5)].join('  ')));
  }
  console.log(line(W));
}

/** Print strategy, page count and a per-section table. */
export function printOutlineSummary(result: OutlineResult, savedTo?: string): void {
  const W = 80;
  const rows = summarizeSections(result.sections);

  console.log();
  console.log(chalk.bold(`Sections produced: ${rows.length} (strategy=${result.strategy})`));
  console.log(line(W));
  console.log(`  Pages:      ${result.pageCount}`);
  if (result.tocPages.length > 0) {
    console.log(`  TOC pages:  ${result.tocPages.map((p) => p + 1).join(', ')}`);
  }
  if (savedTo) {
    console.log(`  Saved to:   ${chalk.green(savedTo)}`);
  }
  console.log(line(W));

  if (rows.length === 0) return;

  console.log(chalk.dim(['Section'.padEnd(50), 'Pages'.padStart(11), 'Words'.padStart(9)].join('  ')));
  for (const r of rows) {
    const indented = '  '.repeat(Math.max(0, r.level - 1)) + r.title;
    console.log([
      clip(indented, 50).padEnd(50),
      `${r.startPage}–${r.endPage}`.padStart(11),
      r.nWords.toLocaleString('en-US').padStart(9),
    ].join('  '));
  }
  console.log(line(W));
  console.log();
}

/** Print what each strategy found (or why it abstained). */
export function printStrategyReport(attempts: readonly StrategyAttempt[], tocPages: readonly number[]): void {
  for (const a of attempts) {
    if (a.status === 'found') {
      console.log(chalk.green(`✓ ${a.strategy}`) + chalk.dim(` — ${a.entries.length} entr${a.entries.length === 1 ? 'y' : 'ies'}`));
      if (a.strategy === 'toc' && tocPages.length > 0) {
        console.log(chalk.dim(`  contents pages: ${tocPages.map((p) => p + 1).join(', ')}`));
      }
      printEntriesPreview(a.entries, 8, `${a.strategy} entries (preview)`);
    } else {
      console.log(chalk.yellow(`✗ ${a.strategy}`) + chalk.dim(` — ${a.reason}`));
    }
  }
  console.log();
}
