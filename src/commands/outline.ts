/**
 * report-outline outline — print the inferred outline without writing files.
 *
 * Usage:
 *   report-outline outline report.pdf
 *   report-outline outline report.pdf --strategy toc --json
 */
import chalk from 'chalk';
import { Command } from 'commander';
import { inferStructure, serializeTree } from '../core/outline/index.js';
import type { StrategyMode } from '../core/outline/index.js';
import { resolveParseConfig } from './config.js';
import { loadReport, outlineAction } from './outline-action.js';
import { parsePositiveInt, parseStrategyOption } from './parsers.js';

interface OutlineOpts {
  strategy?: StrategyMode;
  maxTocPages?: number;
  json?: boolean;
}

export function registerOutlineCommand(program: Command): void {
  program
    .command('outline <pdf>')
    .description('Print the inferred outline as a markdown bullet list')
    .option('--strategy <mode>', 'auto | outline | toc | headings (default auto)', parseStrategyOption)
    .option('--max-toc-pages <n>', 'Search for a table of contents within the first N pages (default 8)', parsePositiveInt)
    .option('--json', 'Output the tree as JSON')
    .action(outlineAction(async (pdfPath: string, opts: OutlineOpts) => {
      const { strategy, maxTocPages } = resolveParseConfig({
        strategy: opts.strategy,
        maxTocPages: opts.maxTocPages,
      });

      const report = await loadReport(pdfPath, { quiet: opts.json });
      const result = inferStructure({
        pagesText: report.pagesText,
        outlineEntries: report.outlineEntries,
        strategy,
        maxTocPages,
      });

      if (opts.json) {
        console.log(JSON.stringify({ strategy: result.strategy, tree: serializeTree(result.tree) }, null, 2));
        return;
      }

      console.log(chalk.dim(`strategy=${result.strategy}  sections=${result.sections.length}\n`));
      process.stdout.write(result.markdown);
    }));
}
