/**
 * Per-column type analysis.
 *
 * For every column below the header row: cell-type and data-type
 * distributions, dropdown options, and the formula flow when the column
 * carries formulas.
 */

import {
  extractDropdownOptions,
  extractFormula,
  getCellType,
  inferDataType,
} from '../parsers/cells.js';
import { columnLetter } from '../utils/strings.js';
import { analyzeColumn, buildFormulaFlow, DEFAULT_START_ROW } from './formula-ranges.js';
import type {
  CellType,
  ColumnAnalysis,
  DataType,
  RowData,
} from '../types/index.js';

/** Analyse every column of a grid, from `startRow` (0-based) down. */
export function analyzeColumns(
  rows: readonly RowData[],
  startRow: number = DEFAULT_START_ROW,
): ColumnAnalysis[] {
  if (rows.length <= startRow) return [];

  const width = Math.max(0, ...rows.map((row) => row.values?.length ?? 0));
  const columns: ColumnAnalysis[] = [];

  for (let col = 0; col < width; col++) {
    columns.push(analyzeSingleColumn(rows, col, startRow));
  }

  return columns;
}

function analyzeSingleColumn(
  rows: readonly RowData[],
  col: number,
  startRow: number,
): ColumnAnalysis {
  const cellTypes: CellType[] = [];
  const dataTypes: DataType[] = [];
  let formulaCount = 0;
  let hasDropdown = false;
  let dropdownOptions: string[] | null = null;

  for (let rowIdx = startRow; rowIdx < rows.length; rowIdx++) {
    const cell = rows[rowIdx].values?.[col];
    if (!cell) continue;

    const cellType = getCellType(cell);
    cellTypes.push(cellType);

    if (extractFormula(cell) !== null) formulaCount += 1;

    if (cellType === 'dropdown') {
      hasDropdown = true;
      if (!dropdownOptions) {
        const options = extractDropdownOptions(cell);
        if (options && options.length > 0) dropdownOptions = options;
      }
    }

    const effective = cell.effectiveValue;
    if (effective) {
      if (effective.stringValue != null) {
        dataTypes.push(inferDataType(effective.stringValue));
      } else if (effective.numberValue != null) {
        dataTypes.push('number');
      } else if (effective.boolValue != null) {
        dataTypes.push('boolean');
      }
    }
  }

  const cellSummary = summarize(cellTypes, 'empty');
  const dataSummary = summarize(dataTypes, 'empty');

  const analysis: ColumnAnalysis = {
    columnIndex: col,
    columnLetter: columnLetter(col),
    dominantCellType: cellSummary.dominant,
    cellTypeDistribution: cellSummary.distribution,
    dominantDataType: dataSummary.dominant,
    dataTypeDistribution: dataSummary.distribution,
    nonEmptyCount: cellTypes.filter((t) => t !== 'empty').length,
  };

  if (formulaCount > 0) {
    const ranges = analyzeColumn(rows, col, startRow);
    analysis.formulaCount = formulaCount;
    analysis.formulaRanges = ranges.length;
    analysis.formulaFlow = buildFormulaFlow(rows, col, ranges);
  }

  if (hasDropdown) {
    analysis.hasDropdown = true;
    if (dropdownOptions) analysis.dropdownOptions = dropdownOptions;
  }

  return analysis;
}

interface Summary<T extends string> {
  dominant: T;
  distribution: Partial<Record<T, number>>;
}

/**
 * Most common label (ties go to the label seen first) and each label's
 * share of the total.
 */
function summarize<T extends string>(labels: T[], fallback: T): Summary<T> {
  if (labels.length === 0) {
    const distribution: Partial<Record<T, number>> = {};
    distribution[fallback] = 1;
    return { dominant: fallback, distribution };
  }

  const counts = new Map<T, number>();
  for (const label of labels) {
    counts.set(label, (counts.get(label) ?? 0) + 1);
  }

  let dominant = labels[0];
  let best = 0;
  const distribution: Partial<Record<T, number>> = {};
  for (const [label, count] of counts) {
    if (count > best) {
      dominant = label;
      best = count;
    }
    distribution[label] = count / labels.length;
  }

  return { dominant, distribution };
}
