import chalk from 'chalk';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { InvalidInputError, NoStructureDetectedError } from '../core/outline/errors.js';
import { readPdfDocument } from '../core/pdf/index.js';
import type { PdfContent } from '../core/pdf/index.js';

/** Exit code when no strategy found any structure. */
export const EXIT_NO_STRUCTURE = 2;
export const EXIT_FAILURE = 1;

export function exitCodeFor(err: unknown): number {
  return err instanceof NoStructureDetectedError ? EXIT_NO_STRUCTURE : EXIT_FAILURE;
}

/**
 * Wrap a command action: print failures in red and exit with
 * EXIT_NO_STRUCTURE (2) or EXIT_FAILURE (1).
 */
export function outlineAction<A extends unknown[]>(
  fn: (...args: A) => Promise<void>,
): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await fn(...args);
    } catch (err) {
      console.error(chalk.red(`Error: ${err instanceof Error ? err.message : String(err)}`));
      if (err instanceof NoStructureDetectedError) {
        for (const a of err.attempts) {
          if (a.status === 'abstained') console.error(chalk.dim(`  ${a.strategy}: ${a.reason}`));
        }
        console.error(chalk.dim('  Try a different --strategy or a PDF with a text layer.'));
      }
      process.exit(exitCodeFor(err));
    }
  };
}

/** Read a report PDF, logging progress on stderr unless quiet. */
export async function loadReport(pdfPath: string, opts: { quiet?: boolean } = {}): Promise<PdfContent> {
  const filePath = resolve(pdfPath);
  if (!existsSync(filePath)) {
    throw new InvalidInputError(`PDF not found: ${pdfPath}`);
  }

  if (!opts.quiet) process.stderr.write(chalk.dim(`Reading PDF: ${filePath}\n`));
  const content = await readPdfDocument(filePath);
  if (!opts.quiet) {
    const bookmarks = content.outlineEntries ? `, ${content.outlineEntries.length} bookmarks` : '';
    process.stderr.write(chalk.dim(`Extracted ${content.pageCount} pages of text${bookmarks}.\n`));
  }
  return content;
}
