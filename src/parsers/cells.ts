/**
 * Single-cell primitives over Sheets API `CellData`.
 *
 * Everything here is total: a cell missing any of the fields it inspects
 * classifies as `empty` or yields `null`.
 */

import type {
  CellData,
  CellType,
  CellValue,
  DataType,
} from '../types/index.js';

/** Sheets serial day 0 (1899-12-30), in UTC milliseconds. */
const SHEETS_EPOCH_MS = Date.UTC(1899, 11, 30);

const MS_PER_DAY = 86_400_000;

const BOOLEAN_WORDS = new Set(['true', 'false', 'yes', 'no']);

/** Date shapes accepted by {@link inferDataType} (two- or four-digit years). */
const DATE_VALUE_PATTERNS: RegExp[] = [
  /^\d{1,2}\/\d{1,2}\/\d{2,4}$/,
  /^\d{4}-\d{2}-\d{2}$/,
  /^\d{1,2}-\d{1,2}-\d{2,4}$/,
];

const NUMBER_RE = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

const EMAIL_RE = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;

// ── Formula / validation ────────────────────────────────────────────────────

/** The formula text the user entered, or `null` for a plain value. */
export function extractFormula(cell: CellData): string | null {
  return cell.userEnteredValue?.formulaValue || null;
}

/** Options of a `ONE_OF_LIST` dropdown, or `null`. */
export function extractDropdownOptions(cell: CellData): string[] | null {
  const condition = cell.dataValidation?.condition;
  if (condition?.type !== 'ONE_OF_LIST' || !condition.values) return null;
  return condition.values.map((v) => v.userEnteredValue ?? '');
}

/**
 * Classify a cell from its metadata. Validation rules win over formulas,
 * and formulas over the effective value.
 */
export function getCellType(cell: CellData): CellType {
  const conditionType = cell.dataValidation?.condition?.type;
  if (conditionType === 'BOOLEAN') return 'checkbox';
  if (conditionType === 'ONE_OF_RANGE' || conditionType === 'ONE_OF_LIST') {
    return 'dropdown';
  }

  if (extractFormula(cell) !== null) return 'formula';

  const effective = cell.effectiveValue;
  if (effective) {
    if (effective.numberValue != null) return 'number';
    if (effective.stringValue != null) return 'text';
    if (effective.boolValue != null) return 'boolean';
  }

  return 'empty';
}

// ── Values ──────────────────────────────────────────────────────────────────

/** Classify a single raw value by its text. */
export function inferDataType(value: CellValue | undefined): DataType {
  if (value === null || value === undefined || value === '') return 'empty';

  const text = String(value).trim();

  if (NUMBER_RE.test(text.replace(/,/g, ''))) return 'number';
  if (BOOLEAN_WORDS.has(text.toLowerCase())) return 'boolean';
  if (DATE_VALUE_PATTERNS.some((re) => re.test(text))) return 'date';
  if (text.startsWith('http://') || text.startsWith('https://')) return 'url';
  if (EMAIL_RE.test(text)) return 'email';

  return 'text';
}

/**
 * Convert a Sheets serial date to `YYYY-MM-DD`. Values outside the
 * representable range are returned as plain text.
 */
export function serialToDate(serial: number): string {
  const date = new Date(SHEETS_EPOCH_MS + serial * MS_PER_DAY);
  if (Number.isNaN(date.getTime())) return String(serial);
  return date.toISOString().slice(0, 10);
}

/** What the user sees in the cell: the formatted text, else the raw value. */
export function getCellValue(cell: CellData): CellValue {
  if (cell.formattedValue != null) return cell.formattedValue;

  const effective = cell.effectiveValue;
  if (effective) {
    if (effective.stringValue != null) return effective.stringValue;
    if (effective.numberValue != null) return effective.numberValue;
    if (effective.boolValue != null) return effective.boolValue;
  }

  return null;
}

/**
 * Header text for a cell. Numbers formatted as dates are rendered as
 * `YYYY-MM-DD` when no formatted value is available.
 */
export function getHeaderValue(cell: CellData): string {
  if (cell.formattedValue != null) return cell.formattedValue;

  const effective = cell.effectiveValue;
  if (!effective) return '';

  if (effective.stringValue != null) return effective.stringValue;

  if (effective.numberValue != null) {
    const num = effective.numberValue;
    const formatType = cell.effectiveFormat?.numberFormat?.type;
    if (
      num > 1 &&
      num < 100_000 &&
      (formatType === 'DATE' || formatType === 'DATE_TIME')
    ) {
      return serialToDate(num);
    }
    return String(num);
  }

  if (effective.boolValue != null) return effective.boolValue ? 'True' : 'False';

  return '';
}
