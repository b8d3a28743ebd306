#!/usr/bin/env node
/**
 * sheetscope CLI entry point.
 *
 * structure | analyze | extract  → write a JSON document under the output dir
 * summarize                      → print a summary of a written document
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import { runAnalyze } from './commands/analyze.js';
import { runExtract } from './commands/extract.js';
import { runStructure } from './commands/structure.js';
import { runSummarize } from './commands/summarize.js';
import { errorMessage } from './sheets/errors.js';
import type {
  AnalyzeOptions,
  ExtractOptions,
  StructureOptions,
  SummarizeOptions,
} from './types/index.js';

const VERSION = '0.1.0';

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

/** Flags every spreadsheet command accepts. */
function withSourceOptions(command: Command): Command {
  return command
    .option('--credentials <path>', 'OAuth client file (default: $SHEETSCOPE_CREDENTIALS or ./credentials.json)')
    .option('--token <path>', 'cached token file (default: $SHEETSCOPE_TOKEN or ./token.json)')
    .option('--output-dir <dir>', 'where documents are written (default: $SHEETSCOPE_OUTPUT_DIR or ./.tmp)');
}

const program = new Command();

program
  .name('sheetscope')
  .description('Dump Google Sheets data and structural summaries to JSON')
  .version(VERSION);

withSourceOptions(
  program
    .command('structure')
    .description('Detect header-row and first-column patterns of every sheet')
    .argument('<spreadsheet>', 'spreadsheet URL or id')
    .option('--rows <n>', 'leading rows read per sheet', parsePositiveInt, 20),
).action(async (spreadsheet: string, options: StructureOptions) => {
  await runStructure(spreadsheet, options);
});

withSourceOptions(
  program
    .command('analyze')
    .description('Analyse headers, column types and formula flow of every sheet')
    .argument('<spreadsheet>', 'spreadsheet URL or id')
    .option('--max-rows <n>', 'rows read per sheet before truncating', parsePositiveInt, 5000),
).action(async (spreadsheet: string, options: AnalyzeOptions) => {
  await runAnalyze(spreadsheet, options);
});

withSourceOptions(
  program
    .command('extract')
    .description('Extract every sheet as header-keyed rows')
    .argument('<spreadsheet>', 'spreadsheet URL or id')
    .option('--max-rows <n>', 'rows read per sheet before truncating', parsePositiveInt, 5000),
).action(async (spreadsheet: string, options: ExtractOptions) => {
  await runExtract(spreadsheet, options);
});

program
  .command('summarize')
  .description('Summarize a structure or analysis document')
  .argument('<file>', 'path to a sheet_structure_*.json or sheet_analysis_*.json file')
  .addOption(
    new Option('-f, --format <format>', 'output format')
      .choices(['table', 'markdown'])
      .default('table'),
  )
  .action(async (file: string, options: SummarizeOptions) => {
    await runSummarize(file, options);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(errorMessage(error));
  process.exit(1);
});
