import chalk from 'chalk';
import { Command } from 'commander';
import { DEFAULT_MAX_TOC_PAGES, printStrategyReport, runAllStrategies } from '../core/outline/index.js';
import { loadReport, outlineAction } from './outline-action.js';
import { parsePositiveInt } from './parsers.js';

interface DetectOpts {
  maxTocPages?: number;
  json?: boolean;
}

export function registerDetectCommand(program: Command): void {
  // ── report-outline detect ─────────────────────────────────────
  program
    .command('detect <pdf>')
    .description('Run every outline strategy and report what each one finds')
    .option('--max-toc-pages <n>', 'Search for a table of contents within the first N pages (default 8)', parsePositiveInt)
    .option('--json', 'Output as JSON')
    .action(outlineAction(async (pdfPath: string, opts: DetectOpts) => {
      const report = await loadReport(pdfPath, { quiet: opts.json });
      const { attempts, tocPages } = runAllStrategies({
        pagesText: report.pagesText,
        outlineEntries: report.outlineEntries,
        maxTocPages: opts.maxTocPages ?? DEFAULT_MAX_TOC_PAGES,
      });

      if (opts.json) {
        console.log(JSON.stringify({
          file: pdfPath,
          pageCount: report.pageCount,
          tocPages: tocPages.map((p) => p + 1),
          strategies: attempts.map((a) => (a.status === 'found'
            ? { strategy: a.strategy, status: a.status, entryCount: a.entries.length, entries: a.entries }
            : { strategy: a.strategy, status: a.status, reason: a.reason })),
        }, null, 2));
        return;
      }

      console.log(chalk.bold(`\n${report.pageCount} pages\n`));
      printStrategyReport(attempts, tocPages);
    }));
}
