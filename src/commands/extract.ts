/**
 * `sheetscope extract` command implementation.
 *
 * Dumps every sheet's formatted values as header-keyed row records, ready to
 * feed to other tools.
 */

import chalk from 'chalk';
import ora from 'ora';
import { tabulateSheet } from '../analyzers/sheet.js';
import { errorMessage } from '../sheets/errors.js';
import { extractSpreadsheetId } from '../sheets/range.js';
import {
  getDocumentPath,
  getOutputDir,
  writeJsonFile,
} from '../utils/file-operations.js';
import {
  buildEnvelope,
  DEFAULT_MAX_ROWS,
  openSource,
  printDocumentStats,
  sheetFetchRange,
} from './shared.js';
import type { SheetsSource } from '../sheets/client.js';
import type {
  DataDocument,
  ExtractOptions,
  SheetTableEntry,
} from '../types/index.js';

/**
 * Run the `extract` command.
 *
 * @param urlOrId - Spreadsheet URL or id.
 * @param options - CLI options parsed by Commander.
 * @param source  - Sheets source; created from the environment when omitted.
 * @returns The data document (also written to the output directory).
 */
export async function runExtract(
  urlOrId: string,
  options: ExtractOptions = {},
  source?: SheetsSource,
): Promise<DataDocument> {
  const spinner = ora('Extracting spreadsheet data…').start();

  try {
    const spreadsheetId = extractSpreadsheetId(urlOrId);
    const sheets = await openSource(spinner, options, source);

    spinner.text = 'Reading spreadsheet metadata…';
    const info = await sheets.getSpreadsheet(spreadsheetId);
    const maxRows = options.maxRows ?? DEFAULT_MAX_ROWS;

    const entries: SheetTableEntry[] = [];
    for (const sheet of info.sheets) {
      spinner.text = `Extracting: ${sheet.title}…`;
      try {
        const range = sheetFetchRange(spinner, sheet, maxRows);
        const values = await sheets.getValues(spreadsheetId, range);
        entries.push(
          values.length === 0
            ? { sheetName: sheet.title, isEmpty: true }
            : tabulateSheet(sheet.title, values),
        );
      } catch (error) {
        const message = errorMessage(error);
        spinner.warn(`Error extracting sheet '${sheet.title}': ${message}`);
        spinner.start();
        entries.push({ sheetName: sheet.title, error: message });
      }
    }

    const document: DataDocument = {
      ...buildEnvelope(spreadsheetId, info),
      sheets: entries,
      summary: {
        totalSheets: info.sheets.length,
        sheetNames: info.sheets.map((s) => s.title),
        totalDataRows: entries.reduce(
          (sum, s) => sum + ('dimensions' in s ? s.dimensions.rows : 0),
          0,
        ),
      },
    };

    const outputPath = getDocumentPath(
      getOutputDir(options.outputDir),
      'sheet_data',
      spreadsheetId,
    );
    await writeJsonFile(outputPath, document);

    spinner.succeed('Extraction complete!');
    printDocumentStats(
      document.title,
      [
        ['Sheets', document.sheetCount],
        ['Total data rows', document.summary.totalDataRows],
      ],
      outputPath,
    );

    return document;
  } catch (error) {
    spinner.fail('Extraction failed');
    console.error(chalk.red(`\nError: ${errorMessage(error)}`));
    process.exit(1);
  }
}
