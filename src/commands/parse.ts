import chalk from 'chalk';
import { Command } from 'commander';
import { exportOutline } from '../core/export/write.js';
import { inferStructure, printEntriesPreview, printOutlineSummary } from '../core/outline/index.js';
import type { DetectionStrategy, StrategyMode } from '../core/outline/index.js';
import { resolveParseConfig } from './config.js';
import { loadReport, outlineAction } from './outline-action.js';
import { parsePositiveInt, parseStrategyOption } from './parsers.js';

interface ParseOpts {
  out?: string;
  strategy?: StrategyMode;
  maxTocPages?: number;
  json?: boolean;
}

const STRATEGY_MESSAGES: Record<DetectionStrategy, string> = {
  outline: chalk.green('Using PDF outline/bookmarks.'),
  toc: chalk.green('Using table of contents pages.'),
  headings: chalk.yellow('Using fallback heading detection.'),
};

export function registerParseCommand(program: Command): void {
  // ── report-outline parse ──────────────────────────────────────
  program
    .command('parse <pdf>')
    .description('Parse a report PDF into an outline tree + per-section text exports')
    .option('--out <dir>', 'Output directory (default outputs/report)')
    .option('--strategy <mode>', 'auto | outline | toc | headings (default auto)', parseStrategyOption)
    .option('--max-toc-pages <n>', 'Search for a table of contents within the first N pages (default 8)', parsePositiveInt)
    .option('--json', 'Output summary as JSON')
    .action(outlineAction(async (pdfPath: string, opts: ParseOpts) => {
      const config = resolveParseConfig({
        strategy: opts.strategy,
        maxTocPages: opts.maxTocPages,
        outDir: opts.out,
      });

      const report = await loadReport(pdfPath, { quiet: opts.json });
      const result = inferStructure({
        pagesText: report.pagesText,
        outlineEntries: report.outlineEntries,
        strategy: config.strategy,
        maxTocPages: config.maxTocPages,
      });
      const outputs = exportOutline(config.outDir, result, report.pagesText);

      if (opts.json) {
        console.log(JSON.stringify({
          file: pdfPath,
          strategy: result.strategy,
          pageCount: result.pageCount,
          entryCount: result.entries.length,
          sectionCount: result.sections.length,
          tocPages: result.tocPages.map((p) => p + 1),
          outputs,
        }, null, 2));
        return;
      }

      console.log(STRATEGY_MESSAGES[result.strategy]);
      printEntriesPreview(result.entries);
      printOutlineSummary(result, config.outDir);
      console.log(chalk.green('Done.') + ` Outputs written to: ${config.outDir}`);
      console.log(chalk.dim(`Open ${outputs.treeMd} to see the outline.`));
    }));
}
