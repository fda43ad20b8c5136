#!/usr/bin/env node
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { Command } from 'commander';
import { registerDetectCommand } from './commands/detect.js';
import { registerOutlineCommand } from './commands/outline.js';
import { registerParseCommand } from './commands/parse.js';

// package.json sits one level above both src/ and dist/
const pkgPath = join(dirname(fileURLToPath(import.meta.url)), '..', 'package.json');
const pkg = JSON.parse(readFileSync(pkgPath, 'utf-8')) as { version: string };

const program = new Command();

program
  .name('report-outline')
  .description('Infer the section outline of long report PDFs')
  .version(pkg.version);

registerParseCommand(program);
registerOutlineCommand(program);
registerDetectCommand(program);

await program.parseAsync(process.argv);
