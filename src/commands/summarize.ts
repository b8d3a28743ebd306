/**
 * `sheetscope summarize` command implementation.
 *
 * Loads a structure or analysis document written by an earlier run and
 * prints a human-readable summary of it.
 */

import chalk from 'chalk';
import {
  DocumentFormatError,
  parseSummarizableDocument,
} from '../schemas/documents.js';
import { errorMessage } from '../sheets/errors.js';
import { readFileIfExists } from '../utils/file-operations.js';
import {
  formatAnalysisMarkdown,
  formatStructureMarkdown,
} from '../formatters/markdown.js';
import {
  formatAnalysisTable,
  formatStructureTable,
} from '../formatters/table.js';
import type { SummarizableDocument } from '../schemas/documents.js';
import type { SummarizeOptions } from '../types/index.js';

/**
 * Run the `summarize` command.
 *
 * @param filePath - Path to a `sheet_structure_*.json` or `sheet_analysis_*.json` file.
 * @param options  - CLI options parsed by Commander.
 * @returns The printed summary.
 */
export async function runSummarize(
  filePath: string,
  options: SummarizeOptions = {},
): Promise<string> {
  try {
    const content = await readFileIfExists(filePath);
    if (content === null) {
      throw new DocumentFormatError(`File not found: ${filePath}`);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new DocumentFormatError(
        `Invalid JSON in ${filePath}: ${errorMessage(error)}`,
      );
    }

    const summary = formatSummary(
      parseSummarizableDocument(raw),
      options.format ?? 'table',
    );
    console.log(summary);
    return summary;
  } catch (error) {
    console.error(chalk.red(`\nError: ${errorMessage(error)}`));
    process.exit(1);
  }
}

function formatSummary(
  parsed: SummarizableDocument,
  format: NonNullable<SummarizeOptions['format']>,
): string {
  if (parsed.kind === 'analysis') {
    return format === 'markdown'
      ? formatAnalysisMarkdown(parsed.document)
      : formatAnalysisTable(parsed.document);
  }
  return format === 'markdown'
    ? formatStructureMarkdown(parsed.document)
    : formatStructureTable(parsed.document);
}
