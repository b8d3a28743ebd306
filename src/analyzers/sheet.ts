/**
 * Sheet-level views built from fetched grids: structure (header patterns),
 * analysis (headers + column analysis) and tabulated data.
 */

import { getHeaderValue } from '../parsers/cells.js';
import { analyzeColumns } from './columns.js';
import { detectPattern } from './patterns.js';
import type {
  CellValue,
  RowData,
  SheetAnalysis,
  SheetProperties,
  SheetStructure,
  SheetTable,
} from '../types/index.js';

/** Leading rows whose first cell is reported as a row header. */
export const ROW_HEADER_LIMIT = 10;

// ── Analysis ────────────────────────────────────────────────────────────────

/** Headers, dimensions and per-column analysis of a sheet's grid data. */
export function analyzeSheetGrid(
  sheetName: string,
  sheetId: number,
  rows: readonly RowData[],
): SheetAnalysis {
  const columnCount = Math.max(0, ...rows.map((row) => row.values?.length ?? 0));

  const columnHeaders = (rows[0]?.values ?? []).map(getHeaderValue);

  const rowHeaders = rows.slice(0, ROW_HEADER_LIMIT).map((row) => {
    const first = row.values?.[0];
    return first ? getHeaderValue(first) : '';
  });

  return {
    sheetName,
    sheetId,
    isEmpty: false,
    dimensions: { rowCount: rows.length, columnCount },
    columnHeaders,
    rowHeaders,
    columns: analyzeColumns(rows),
  };
}

// ── Structure ───────────────────────────────────────────────────────────────

/**
 * Describe a sheet's layout from the formatted values of its leading rows:
 * the first row's pattern and the first column's pattern.
 */
export function describeSheetStructure(
  sheetName: string,
  properties: SheetProperties,
  values: readonly CellValue[][],
): SheetStructure {
  const columnHeaders = (values[0] ?? []).map(toText);
  const rowHeaders = values.map((row) => (row.length > 0 ? toText(row[0]) : null));

  const structure: SheetStructure = {
    sheetName,
    isEmpty: false,
    dimensions: { rows: properties.rowCount, columns: properties.columnCount },
    columnStructure: detectPattern(columnHeaders),
    rowStructure: detectPattern(rowHeaders),
  };

  if (properties.frozenRowCount || properties.frozenColumnCount) {
    structure.frozen = {
      rows: properties.frozenRowCount,
      columns: properties.frozenColumnCount,
    };
  }

  return structure;
}

// ── Data ────────────────────────────────────────────────────────────────────

/**
 * Make header names unique and non-blank: blanks become `Column<n>`
 * (1-based) and repeats get the first `_<k>` suffix no other header uses.
 */
export function normalizeHeaders(headers: readonly CellValue[]): string[] {
  const seen = new Set<string>();
  const repeats = new Map<string, number>();

  return headers.map((raw, i) => {
    const text = raw === null || raw === '' ? '' : String(raw).trim();
    const base = text || `Column${i + 1}`;

    let header = base;
    let k = repeats.get(base) ?? 0;
    while (seen.has(header)) {
      k += 1;
      header = `${base}_${k}`;
    }
    repeats.set(base, k);
    seen.add(header);
    return header;
  });
}

/** Turn a values grid into header-keyed row records; `''` becomes `null`. */
export function tabulateSheet(
  sheetName: string,
  values: readonly CellValue[][],
): SheetTable {
  const headers = normalizeHeaders(values[0] ?? []);

  const data = values.slice(1).map((row) => {
    const record: Record<string, CellValue> = {};
    headers.forEach((header, i) => {
      const value = row[i] ?? '';
      record[header] = value === '' ? null : value;
    });
    return record;
  });

  return {
    sheetName,
    isEmpty: false,
    dimensions: { rows: data.length, columns: headers.length },
    headers,
    data,
  };
}

function toText(value: CellValue | undefined): string | null {
  if (value === null || value === undefined) return null;
  return String(value);
}
