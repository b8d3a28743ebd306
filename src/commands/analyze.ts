/**
 * `sheetscope analyze` command implementation.
 *
 * Orchestrates: spreadsheet id → metadata → per-sheet grid data (with
 * formulas and validation) → headers + column analysis → JSON document.
 */

import chalk from 'chalk';
import ora from 'ora';
import { analyzeSheetGrid } from '../analyzers/sheet.js';
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
import type { Ora } from 'ora';
import type { SheetsSource } from '../sheets/client.js';
import type {
  AnalysisDocument,
  AnalyzeOptions,
  SheetAnalysisEntry,
  SheetProperties,
} from '../types/index.js';

/**
 * Run the `analyze` command.
 *
 * Fetches full grid data for every sheet, analyses headers, column types and
 * formula flow, and writes `sheet_analysis_<id>.json`.
 *
 * @param urlOrId - Spreadsheet URL or id.
 * @param options - CLI options parsed by Commander.
 * @param source  - Sheets source; created from the environment when omitted.
 * @returns The analysis document (also written to the output directory).
 */
export async function runAnalyze(
  urlOrId: string,
  options: AnalyzeOptions = {},
  source?: SheetsSource,
): Promise<AnalysisDocument> {
  const spinner = ora('Analyzing spreadsheet…').start();

  try {
    // 1 ── Resolve spreadsheet and source ───────────────────────────────────
    const spreadsheetId = extractSpreadsheetId(urlOrId);
    const sheets = await openSource(spinner, options, source);

    // 2 ── Metadata ──────────────────────────────────────────────────────────
    spinner.text = 'Reading spreadsheet metadata…';
    const info = await sheets.getSpreadsheet(spreadsheetId);
    const maxRows = options.maxRows ?? DEFAULT_MAX_ROWS;

    // 3 ── Per-sheet analysis ────────────────────────────────────────────────
    const entries: SheetAnalysisEntry[] = [];
    for (const sheet of info.sheets) {
      spinner.text = `Analyzing sheet: ${sheet.title}…`;
      entries.push(
        await analyzeOneSheet(spinner, sheets, spreadsheetId, sheet, maxRows),
      );
    }

    // 4 ── Build document ───────────────────────────────────────────────────
    const document: AnalysisDocument = {
      ...buildEnvelope(spreadsheetId, info),
      sheets: entries,
      analysisSummary: {
        totalSheets: info.sheets.length,
        nonEmptySheets: entries.filter((s) => !('isEmpty' in s && s.isEmpty))
          .length,
        totalRows: entries.reduce(
          (sum, s) => sum + ('dimensions' in s ? s.dimensions.rowCount : 0),
          0,
        ),
        sheetNames: info.sheets.map((s) => s.title),
      },
    };

    // 5 ── Write ─────────────────────────────────────────────────────────────
    const outputPath = getDocumentPath(
      getOutputDir(options.outputDir),
      'sheet_analysis',
      spreadsheetId,
    );
    await writeJsonFile(outputPath, document);

    spinner.succeed('Analysis complete!');
    printDocumentStats(
      document.title,
      [
        ['Sheets', document.sheetCount],
        ['Total rows', document.analysisSummary.totalRows],
      ],
      outputPath,
    );

    return document;
  } catch (error) {
    spinner.fail('Analysis failed');
    console.error(chalk.red(`\nError: ${errorMessage(error)}`));
    process.exit(1);
  }
}

/** Analyse one sheet; a failed fetch is recorded in the entry, not thrown. */
async function analyzeOneSheet(
  spinner: Ora,
  sheets: SheetsSource,
  spreadsheetId: string,
  sheet: SheetProperties,
  maxRows: number,
): Promise<SheetAnalysisEntry> {
  try {
    const range = sheetFetchRange(spinner, sheet, maxRows);
    const rows = await sheets.getGridData(spreadsheetId, range);

    if (rows.length === 0) {
      return { sheetName: sheet.title, isEmpty: true };
    }

    return analyzeSheetGrid(sheet.title, sheet.sheetId, rows);
  } catch (error) {
    const message = errorMessage(error);
    spinner.warn(`Error analyzing sheet '${sheet.title}': ${message}`);
    spinner.start();
    return { sheetName: sheet.title, sheetId: sheet.sheetId, error: message };
  }
}
