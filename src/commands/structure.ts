/**
 * `sheetscope structure` command implementation.
 *
 * Reads the leading rows of every sheet and records the pattern of the header
 * row and of the first column. No data values are written.
 */

import chalk from 'chalk';
import ora from 'ora';
import { describeSheetStructure } from '../analyzers/sheet.js';
import { errorMessage } from '../sheets/errors.js';
import { buildSheetRange, extractSpreadsheetId } from '../sheets/range.js';
import {
  getDocumentPath,
  getOutputDir,
  writeJsonFile,
} from '../utils/file-operations.js';
import { buildEnvelope, openSource, printDocumentStats } from './shared.js';
import type { SheetsSource } from '../sheets/client.js';
import type {
  SheetProperties,
  SheetStructureEntry,
  StructureDocument,
  StructureOptions,
} from '../types/index.js';

/** Leading rows fetched per sheet for header detection. */
export const DEFAULT_HEADER_ROWS = 20;

/**
 * Run the `structure` command.
 *
 * @param urlOrId - Spreadsheet URL or id.
 * @param options - CLI options parsed by Commander.
 * @param source  - Sheets source; created from the environment when omitted.
 * @returns The structure document (also written to the output directory).
 */
export async function runStructure(
  urlOrId: string,
  options: StructureOptions = {},
  source?: SheetsSource,
): Promise<StructureDocument> {
  const spinner = ora('Extracting sheet structure…').start();

  try {
    const spreadsheetId = extractSpreadsheetId(urlOrId);
    const sheets = await openSource(spinner, options, source);

    spinner.text = 'Reading spreadsheet metadata…';
    const info = await sheets.getSpreadsheet(spreadsheetId);
    const headerRows = options.rows ?? DEFAULT_HEADER_ROWS;

    const entries: SheetStructureEntry[] = [];
    for (const sheet of info.sheets) {
      spinner.text = `Analyzing: ${sheet.title}…`;
      try {
        entries.push(
          await readSheetStructure(sheets, spreadsheetId, sheet, headerRows),
        );
      } catch (error) {
        const message = errorMessage(error);
        spinner.warn(`Error in sheet '${sheet.title}': ${message}`);
        spinner.start();
        entries.push({ sheetName: sheet.title, error: message });
      }
    }

    const document: StructureDocument = {
      ...buildEnvelope(spreadsheetId, info),
      sheets: entries,
    };

    const outputPath = getDocumentPath(
      getOutputDir(options.outputDir),
      'sheet_structure',
      spreadsheetId,
    );
    await writeJsonFile(outputPath, document);

    spinner.succeed('Structure extraction complete!');
    printDocumentStats(document.title, [['Sheets', document.sheetCount]], outputPath);

    return document;
  } catch (error) {
    spinner.fail('Structure extraction failed');
    console.error(chalk.red(`\nError: ${errorMessage(error)}`));
    process.exit(1);
  }
}

async function readSheetStructure(
  sheets: SheetsSource,
  spreadsheetId: string,
  sheet: SheetProperties,
  headerRows: number,
): Promise<SheetStructureEntry> {
  if (sheet.rowCount === 0) {
    return { sheetName: sheet.title, isEmpty: true };
  }

  const values = await sheets.getValues(
    spreadsheetId,
    buildSheetRange(sheet.title, headerRows),
  );

  if (values.length === 0) {
    return { sheetName: sheet.title, isEmpty: true };
  }

  return describeSheetStructure(sheet.title, sheet, values);
}
