/**
 * SheetsSource – interface + Google/fixture implementations.
 *
 * Commands take a `SheetsSource` handle instead of reaching for a global
 * client, so tests (and offline runs) can hand them a fixture-backed source.
 *
 * Toggle: set `SHEETSCOPE_FIXTURES_DIR=<dir>` to read spreadsheets from
 * `<dir>/<spreadsheetId>.json` instead of the API.
 */

import path from 'node:path';
import { google, type sheets_v4 } from 'googleapis';
import { getCellValue } from '../parsers/cells.js';
import { spreadsheetFixtureSchema, type SpreadsheetFixture } from '../schemas/sheets.js';
import { readJsonFile } from '../utils/file-operations.js';
import { authorize, resolveAuthConfig, type CodePrompt } from './auth.js';
import { errorMessage, SheetsRequestError } from './errors.js';
import { parseSheetRange } from './range.js';
import type {
  CellValue,
  RowData,
  SheetProperties,
  SourceOptions,
  SpreadsheetInfo,
} from '../types/index.js';

// ── Interface ───────────────────────────────────────────────────────────────

/** Read access to one or more spreadsheets. */
export interface SheetsSource {
  /** Spreadsheet metadata and the properties of every sheet. */
  getSpreadsheet(spreadsheetId: string): Promise<SpreadsheetInfo>;

  /** Full cell data (values, formulas, validation) for a range. */
  getGridData(spreadsheetId: string, range: string): Promise<RowData[]>;

  /** Formatted display values for a range, trailing blanks trimmed. */
  getValues(spreadsheetId: string, range: string): Promise<CellValue[][]>;
}

// ── Google implementation ───────────────────────────────────────────────────

/** Calls the Sheets API v4 through `googleapis`. */
export class GoogleSheetsSource implements SheetsSource {
  constructor(private readonly sheets: sheets_v4.Sheets) {}

  async getSpreadsheet(spreadsheetId: string): Promise<SpreadsheetInfo> {
    const { data } = await this.call(`read spreadsheet ${spreadsheetId}`, () =>
      this.sheets.spreadsheets.get({ spreadsheetId, includeGridData: false }),
    );

    const properties = data.properties ?? {};
    return {
      spreadsheetId: data.spreadsheetId ?? spreadsheetId,
      title: properties.title ?? 'Unknown',
      locale: properties.locale ?? 'unknown',
      timeZone: properties.timeZone ?? 'unknown',
      sheets: (data.sheets ?? []).map(parseSheetProperties),
    };
  }

  async getGridData(spreadsheetId: string, range: string): Promise<RowData[]> {
    const { data } = await this.call(`read grid data for ${range}`, () =>
      this.sheets.spreadsheets.get({
        spreadsheetId,
        ranges: [range],
        includeGridData: true,
      }),
    );

    return data.sheets?.[0]?.data?.[0]?.rowData ?? [];
  }

  async getValues(spreadsheetId: string, range: string): Promise<CellValue[][]> {
    const { data } = await this.call(`read values for ${range}`, () =>
      this.sheets.spreadsheets.values.get({
        spreadsheetId,
        range,
        valueRenderOption: 'FORMATTED_VALUE',
      }),
    );

    const values: unknown[][] = data.values ?? [];
    return values.map((row) => row.map(toCellValue));
  }

  private async call<T>(what: string, request: () => Promise<T>): Promise<T> {
    try {
      return await request();
    } catch (error) {
      throw new SheetsRequestError(
        `Google API error (${what}): ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }
}

function parseSheetProperties(sheet: sheets_v4.Schema$Sheet): SheetProperties {
  const properties = sheet.properties ?? {};
  const grid = properties.gridProperties ?? {};

  return {
    sheetId: properties.sheetId ?? 0,
    title: properties.title ?? 'Untitled Sheet',
    index: properties.index ?? 0,
    rowCount: grid.rowCount ?? 0,
    columnCount: grid.columnCount ?? 0,
    frozenRowCount: grid.frozenRowCount ?? 0,
    frozenColumnCount: grid.frozenColumnCount ?? 0,
  };
}

function toCellValue(value: unknown): CellValue {
  if (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  ) {
    return value;
  }
  return value === null || value === undefined ? null : String(value);
}

// ── Fixture implementation ──────────────────────────────────────────────────

/**
 * Serves spreadsheets from JSON files on disk, one per spreadsheet id.
 * Range handling follows the API: bounded ranges cut the row count, and an
 * unknown sheet is a request error.
 */
export class FixtureSheetsSource implements SheetsSource {
  constructor(private readonly fixturesDir: string) {}

  async getSpreadsheet(spreadsheetId: string): Promise<SpreadsheetInfo> {
    const fixture = await this.load(spreadsheetId);

    return {
      spreadsheetId,
      title: fixture.title,
      locale: fixture.locale ?? 'unknown',
      timeZone: fixture.timeZone ?? 'unknown',
      sheets: fixture.sheets.map((sheet, index) => ({
        sheetId: sheet.properties.sheetId,
        title: sheet.properties.title,
        index,
        rowCount: sheet.properties.rowCount ?? sheet.rowData.length,
        columnCount:
          sheet.properties.columnCount ??
          Math.max(0, ...sheet.rowData.map((row) => row.values?.length ?? 0)),
        frozenRowCount: sheet.properties.frozenRowCount ?? 0,
        frozenColumnCount: sheet.properties.frozenColumnCount ?? 0,
      })),
    };
  }

  async getGridData(spreadsheetId: string, range: string): Promise<RowData[]> {
    const fixture = await this.load(spreadsheetId);
    const { sheetName, maxRows } = parseSheetRange(range);

    const sheet = fixture.sheets.find((s) => s.properties.title === sheetName);
    if (!sheet) {
      throw new SheetsRequestError(`Unable to parse range: ${range}`);
    }

    return maxRows === null ? sheet.rowData : sheet.rowData.slice(0, maxRows);
  }

  async getValues(spreadsheetId: string, range: string): Promise<CellValue[][]> {
    const rows = await this.getGridData(spreadsheetId, range);

    const values = rows.map((row) =>
      trimTrailing(
        (row.values ?? []).map((cell) => {
          const value = getCellValue(cell);
          return value === null ? '' : String(value);
        }),
      ),
    );

    while (values.length > 0 && values[values.length - 1].length === 0) {
      values.pop();
    }
    return values;
  }

  private async load(spreadsheetId: string): Promise<SpreadsheetFixture> {
    const file = path.join(this.fixturesDir, `${spreadsheetId}.json`);
    const fixture = await readJsonFile(file, spreadsheetFixtureSchema);
    if (!fixture) {
      throw new SheetsRequestError(
        `Requested entity was not found: spreadsheet ${spreadsheetId}`,
      );
    }
    return fixture;
  }
}

function trimTrailing(row: string[]): string[] {
  let end = row.length;
  while (end > 0 && row[end - 1] === '') end--;
  return row.slice(0, end);
}

// ── Factory ─────────────────────────────────────────────────────────────────

/**
 * Create the appropriate `SheetsSource` based on the environment.
 *
 * - `SHEETSCOPE_FIXTURES_DIR` set → `FixtureSheetsSource`
 * - otherwise → `GoogleSheetsSource` (runs the OAuth flow if needed)
 */
export async function createSheetsSource(
  options: SourceOptions = {},
  prompt?: CodePrompt,
): Promise<SheetsSource> {
  const fixturesDir = process.env.SHEETSCOPE_FIXTURES_DIR;
  if (fixturesDir) {
    return new FixtureSheetsSource(path.resolve(fixturesDir));
  }

  const auth = await authorize(resolveAuthConfig(options), prompt);
  return new GoogleSheetsSource(google.sheets({ version: 'v4', auth }));
}
