/**
 * Formula range and flow analysis.
 *
 * A column's formulas are reduced to reference-shape signatures
 * (`=SUM(A2:A9)` and `=SUM(A3:A10)` both become `=SUM({REL}:{REL})`), then
 * contiguous rows sharing a signature are grouped into ranges. The flow view
 * adds, for each range, where the column's formulas resume after a gap.
 */

import { extractFormula } from '../parsers/cells.js';
import type {
  FormulaFlowEntry,
  FormulaRange,
  RowData,
} from '../types/index.js';

/** First row scanned by default; row 0 holds the headers. */
export const DEFAULT_START_ROW = 1;

/** Number of rows inspected after a range for a resumption. */
export const LOOKAHEAD_ROWS = 9;

/** Example formulas kept per range. */
export const MAX_EXAMPLES = 3;

// ── Normalization ───────────────────────────────────────────────────────────

/**
 * Reference passes, most specific first. Each pass writes a private-use
 * sentinel so no later pass can match text an earlier one replaced.
 */
const REFERENCE_PASSES: ReadonlyArray<{
  re: RegExp;
  sentinel: string;
  label: string;
}> = [
  { re: /\$[A-Z]+\$\d+/g, sentinel: '\uE000', label: '{ABS}' },
  { re: /\$[A-Z]+\d+/g, sentinel: '\uE001', label: '{COL_ABS}' },
  { re: /[A-Z]+\$\d+/g, sentinel: '\uE002', label: '{ROW_ABS}' },
  { re: /[A-Z]+\d+/g, sentinel: '\uE003', label: '{REL}' },
];

/**
 * Reduce a formula to its reference-shape signature.
 *
 * @example
 * normalizeFormula('=$A$1+B2'); // '={ABS}+{REL}'
 * normalizeFormula('=A1+$B1'); // '={REL}+{COL_ABS}'
 */
export function normalizeFormula(formula: string): string {
  if (!formula) return '';

  let normalized = formula;
  for (const pass of REFERENCE_PASSES) {
    normalized = normalized.replace(pass.re, pass.sentinel);
  }
  for (const pass of REFERENCE_PASSES) {
    normalized = normalized.split(pass.sentinel).join(pass.label);
  }
  return normalized;
}

// ── Range detection ─────────────────────────────────────────────────────────

/**
 * Group a column's formulas into ranges of contiguous rows sharing one
 * signature. Rows are 0-based. A row without a cell at `columnIndex`, or
 * whose cell has no formula, closes the open range.
 */
export function analyzeColumn(
  rows: readonly RowData[],
  columnIndex: number,
  startRow: number = DEFAULT_START_ROW,
): FormulaRange[] {
  const ranges: FormulaRange[] = [];
  let current: FormulaRange | null = null;

  for (let rowIdx = Math.max(0, startRow); rowIdx < rows.length; rowIdx++) {
    const formula = formulaAt(rows, rowIdx, columnIndex);

    if (formula === null) {
      if (current) {
        ranges.push(current);
        current = null;
      }
      continue;
    }

    const pattern = normalizeFormula(formula);

    if (current && current.pattern === pattern) {
      current.endRow = rowIdx;
      current.formulaCount += 1;
      if (current.formulas.length < MAX_EXAMPLES) {
        current.formulas.push(formula);
      }
      continue;
    }

    if (current) ranges.push(current);
    current = {
      startRow: rowIdx,
      endRow: rowIdx,
      pattern,
      firstFormula: formula,
      formulaCount: 1,
      formulas: [formula],
    };
  }

  if (current) ranges.push(current);

  return ranges;
}

// ── Flow ────────────────────────────────────────────────────────────────────

/**
 * Project 0-based ranges to 1-based flow entries and annotate each one with
 * the next formula row found within {@link LOOKAHEAD_ROWS} rows after it.
 */
export function buildFormulaFlow(
  rows: readonly RowData[],
  columnIndex: number,
  ranges: readonly FormulaRange[],
): FormulaFlowEntry[] {
  return ranges.map((range) => {
    const entry: FormulaFlowEntry = {
      startRow: range.startRow + 1,
      endRow: range.endRow + 1,
      pattern: range.pattern,
      firstFormula: range.firstFormula,
      formulaCount: range.formulaCount,
      formulas: range.formulas.slice(0, MAX_EXAMPLES),
    };

    if (range.endRow < rows.length - 1) {
      const limit = Math.min(range.endRow + 1 + LOOKAHEAD_ROWS, rows.length);
      for (let rowIdx = range.endRow + 1; rowIdx < limit; rowIdx++) {
        if (formulaAt(rows, rowIdx, columnIndex) !== null) {
          const continuesAtRow = rowIdx + 1;
          entry.breakAfter = true;
          entry.continuesAtRow = continuesAtRow;
          entry.breakSize = continuesAtRow - entry.endRow - 1;
          break;
        }
      }
    }

    return entry;
  });
}

/** {@link analyzeColumn} followed by {@link buildFormulaFlow}. */
export function analyzeFormulaFlow(
  rows: readonly RowData[],
  columnIndex: number,
  startRow: number = DEFAULT_START_ROW,
): FormulaFlowEntry[] {
  return buildFormulaFlow(
    rows,
    columnIndex,
    analyzeColumn(rows, columnIndex, startRow),
  );
}

function formulaAt(
  rows: readonly RowData[],
  rowIdx: number,
  columnIndex: number,
): string | null {
  const cell = rows[rowIdx]?.values?.[columnIndex];
  return cell ? extractFormula(cell) : null;
}
