/**
 * Shared type definitions for sheetscope.
 *
 * Cell shapes are a structural subset of the Sheets API v4 `CellData`, so a
 * `googleapis` response can be passed straight to the analyzers.
 */

// ── Sheets API subset ───────────────────────────────────────────────────────

export interface ExtendedValue {
  stringValue?: string | null;
  numberValue?: number | null;
  boolValue?: boolean | null;
  formulaValue?: string | null;
}

export interface ConditionValue {
  userEnteredValue?: string | null;
}

export interface DataValidationRule {
  condition?: {
    type?: string | null;
    values?: ConditionValue[];
  };
}

export interface CellFormat {
  numberFormat?: {
    type?: string | null;
    pattern?: string | null;
  };
}

export interface CellData {
  userEnteredValue?: ExtendedValue;
  effectiveValue?: ExtendedValue;
  formattedValue?: string | null;
  dataValidation?: DataValidationRule;
  effectiveFormat?: CellFormat;
}

export interface RowData {
  values?: CellData[];
}

/** A value as returned by the values endpoint. */
export type CellValue = string | number | boolean | null;

export interface SheetProperties {
  sheetId: number;
  title: string;
  index: number;
  rowCount: number;
  columnCount: number;
  frozenRowCount: number;
  frozenColumnCount: number;
}

export interface SpreadsheetInfo {
  spreadsheetId: string;
  title: string;
  locale: string;
  timeZone: string;
  sheets: SheetProperties[];
}

// ── Cell classification ─────────────────────────────────────────────────────

export type CellType =
  | 'checkbox'
  | 'dropdown'
  | 'formula'
  | 'number'
  | 'text'
  | 'boolean'
  | 'empty';

export type DataType =
  | 'empty'
  | 'number'
  | 'boolean'
  | 'date'
  | 'url'
  | 'email'
  | 'text';

// ── Sequence patterns ───────────────────────────────────────────────────────

/** A chunk that did not match the dominant template of a repeating sequence. */
export interface PatternBreak {
  blockIndex: number;
  /** Start offset of the chunk within the non-blank values. */
  position: number;
  expectedTemplate: string[];
  actualValues: string[];
}

export type PatternResult =
  | { type: 'Empty' }
  | { type: 'AllEmpty'; count: number }
  | { type: 'Single'; value: string }
  | { type: 'Uniform'; value: string; count: number }
  | {
      type: 'Repeating';
      blockSize: number;
      template: string[];
      repeatCount: number;
      totalItems: number;
      breaks: PatternBreak[];
      sampleFirstBlock: string[];
    }
  | {
      type: 'DateSequence';
      count: number;
      first: string;
      last: string;
      sample: string[];
    }
  | {
      type: 'VariedWithPrefix';
      commonPrefix: string;
      prefixCount: number;
      total: number;
      sample: string[];
    }
  | { type: 'List'; values: string[]; total: number }
  | { type: 'Varied'; uniqueCount: number; total: number; sample: string[] };

export type PatternType = PatternResult['type'];

// ── Formula ranges ──────────────────────────────────────────────────────────

/** A maximal run of contiguous rows whose formulas share one signature. */
export interface FormulaRange {
  startRow: number;
  endRow: number;
  pattern: string;
  firstFormula: string;
  formulaCount: number;
  /** Up to three example formulas, in row order. */
  formulas: string[];
}

/** A formula range in 1-based rows, with the gap to the next formula row. */
export interface FormulaFlowEntry extends FormulaRange {
  breakAfter?: boolean;
  continuesAtRow?: number;
  breakSize?: number;
}

// ── Column analysis ─────────────────────────────────────────────────────────

export interface ColumnAnalysis {
  columnIndex: number;
  columnLetter: string;
  dominantCellType: CellType;
  cellTypeDistribution: Partial<Record<CellType, number>>;
  dominantDataType: DataType;
  dataTypeDistribution: Partial<Record<DataType, number>>;
  nonEmptyCount: number;
  formulaCount?: number;
  formulaRanges?: number;
  formulaFlow?: FormulaFlowEntry[];
  hasDropdown?: boolean;
  dropdownOptions?: string[];
}

// ── Sheet documents ─────────────────────────────────────────────────────────

export interface SheetError {
  sheetName: string;
  sheetId?: number;
  error: string;
}

export interface EmptySheet {
  sheetName: string;
  isEmpty: true;
}

export interface SheetStructure {
  sheetName: string;
  isEmpty: false;
  dimensions: { rows: number; columns: number };
  columnStructure: PatternResult;
  rowStructure: PatternResult;
  frozen?: { rows: number; columns: number };
}

export interface SheetAnalysis {
  sheetName: string;
  sheetId: number;
  isEmpty: false;
  dimensions: { rowCount: number; columnCount: number };
  columnHeaders: string[];
  rowHeaders: string[];
  columns: ColumnAnalysis[];
}

export interface SheetTable {
  sheetName: string;
  isEmpty: false;
  dimensions: { rows: number; columns: number };
  headers: string[];
  data: Array<Record<string, CellValue>>;
}

export type SheetStructureEntry = SheetStructure | EmptySheet | SheetError;
export type SheetAnalysisEntry = SheetAnalysis | EmptySheet | SheetError;
export type SheetTableEntry = SheetTable | EmptySheet | SheetError;

/** Fields shared by every spreadsheet-level document. */
export interface SpreadsheetEnvelope {
  spreadsheetId: string;
  spreadsheetUrl: string;
  title: string;
  locale: string;
  timezone: string;
  sheetCount: number;
}

export interface StructureDocument extends SpreadsheetEnvelope {
  sheets: SheetStructureEntry[];
}

export interface AnalysisDocument extends SpreadsheetEnvelope {
  sheets: SheetAnalysisEntry[];
  analysisSummary: {
    totalSheets: number;
    nonEmptySheets: number;
    totalRows: number;
    sheetNames: string[];
  };
}

export interface DataDocument extends SpreadsheetEnvelope {
  sheets: SheetTableEntry[];
  summary: {
    totalSheets: number;
    sheetNames: string[];
    totalDataRows: number;
  };
}

// ── CLI options ─────────────────────────────────────────────────────────────

/** Options shared by every command that talks to the Sheets API. */
export interface SourceOptions {
  /** Path to the OAuth client file. */
  credentials?: string;
  /** Path to the cached user token. */
  token?: string;
  /** Directory JSON documents are written to. */
  outputDir?: string;
}

export interface StructureOptions extends SourceOptions {
  /** Number of leading rows fetched for header detection. Default: 20 */
  rows?: number;
}

export interface AnalyzeOptions extends SourceOptions {
  /** Rows fetched per sheet before truncation. Default: 5000 */
  maxRows?: number;
}

export interface ExtractOptions extends SourceOptions {
  /** Rows fetched per sheet before truncation. Default: 5000 */
  maxRows?: number;
}

export type SummaryFormat = 'table' | 'markdown';

export interface SummarizeOptions {
  format?: SummaryFormat;
}
