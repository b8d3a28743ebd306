/**
 * Pipeline steps shared by the spreadsheet commands: opening a source,
 * building the document envelope, choosing a sheet's fetch range, and the
 * closing status lines.
 */

import chalk from 'chalk';
import type { Ora } from 'ora';
import { createSheetsSource, type SheetsSource } from '../sheets/client.js';
import { buildSheetRange, quoteSheetName, spreadsheetUrl } from '../sheets/range.js';
import type {
  SheetProperties,
  SourceOptions,
  SpreadsheetEnvelope,
  SpreadsheetInfo,
} from '../types/index.js';

/** Rows fetched per sheet before a sheet is truncated. */
export const DEFAULT_MAX_ROWS = 5000;

/**
 * Return the injected source, or create one. The spinner is paused while
 * the OAuth flow may be prompting on the terminal.
 */
export async function openSource(
  spinner: Ora,
  options: SourceOptions,
  source?: SheetsSource,
): Promise<SheetsSource> {
  if (source) return source;

  spinner.stop();
  const created = await createSheetsSource(options);
  spinner.start('Connecting to Google Sheets…');
  return created;
}

export function buildEnvelope(
  spreadsheetId: string,
  info: SpreadsheetInfo,
): SpreadsheetEnvelope {
  return {
    spreadsheetId,
    spreadsheetUrl: spreadsheetUrl(spreadsheetId),
    title: info.title,
    locale: info.locale,
    timezone: info.timeZone,
    sheetCount: info.sheets.length,
  };
}

/**
 * The whole sheet, or its first `maxRows` rows when it is larger. Truncation
 * is reported on the spinner.
 */
export function sheetFetchRange(
  spinner: Ora,
  sheet: SheetProperties,
  maxRows: number,
): string {
  if (sheet.rowCount <= maxRows) return quoteSheetName(sheet.title);

  spinner.warn(
    `Sheet '${sheet.title}' has ${sheet.rowCount} rows, limiting to ${maxRows} rows`,
  );
  spinner.start();
  return buildSheetRange(sheet.title, maxRows);
}

/** Status lines printed after a document has been written. */
export function printDocumentStats(
  title: string,
  stats: Array<[label: string, value: string | number]>,
  outputPath: string,
): void {
  console.log('');
  console.log(`  ${chalk.bold('Spreadsheet:')} ${title}`);
  for (const [label, value] of stats) {
    console.log(`  ${chalk.bold(`${label}:`)} ${value}`);
  }
  console.log(`  ${chalk.bold('Output:')} ${chalk.green(outputPath)}`);
}
