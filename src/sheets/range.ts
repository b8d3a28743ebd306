/**
 * Spreadsheet ids and A1 range notation.
 */

/** Last column of a bounded sheet range; wide enough for any real sheet. */
export const LAST_COLUMN = 'ZZZ';

const SPREADSHEET_URL_RE = /\/spreadsheets\/d\/([a-zA-Z0-9-_]+)/;

const BOUNDED_RANGE_RE = /^(?:'((?:[^']|'')*)'|([^'!]+))!A1:[A-Z]+(\d+)$/;

/** Accepts a full Sheets URL or a bare spreadsheet id. */
export function extractSpreadsheetId(urlOrId: string): string {
  const match = SPREADSHEET_URL_RE.exec(urlOrId);
  return match ? match[1] : urlOrId.trim();
}

export function spreadsheetUrl(spreadsheetId: string): string {
  return `https://docs.google.com/spreadsheets/d/${spreadsheetId}`;
}

/** Quote a sheet name for A1 notation (`It's` → `'It''s'`). */
export function quoteSheetName(sheetName: string): string {
  return `'${sheetName.replace(/'/g, "''")}'`;
}

/** `'Sheet 1'!A1:ZZZ20`: the first `maxRows` rows of a sheet. */
export function buildSheetRange(sheetName: string, maxRows: number): string {
  return `${quoteSheetName(sheetName)}!A1:${LAST_COLUMN}${maxRows}`;
}

export interface ParsedRange {
  sheetName: string;
  /** Row limit of a bounded range; `null` for a whole-sheet range. */
  maxRows: number | null;
}

/**
 * Parse the two range forms sheetscope issues: a bare sheet name, or a
 * bounded range from {@link buildSheetRange}.
 */
export function parseSheetRange(range: string): ParsedRange {
  const bounded = BOUNDED_RANGE_RE.exec(range);
  if (bounded) {
    const sheetName =
      bounded[1] !== undefined ? bounded[1].replace(/''/g, "'") : bounded[2];
    return { sheetName, maxRows: Number(bounded[3]) };
  }

  const quoted = /^'((?:[^']|'')*)'$/.exec(range);
  if (quoted) {
    return { sheetName: quoted[1].replace(/''/g, "'"), maxRows: null };
  }

  return { sheetName: range, maxRows: null };
}
