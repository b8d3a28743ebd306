import { describe, it, expect } from 'vitest';
import {
  formatAnalysisMarkdown,
  formatStructureMarkdown,
} from '../../src/formatters/markdown.js';
import type {
  AnalysisDocument,
  SpreadsheetEnvelope,
  StructureDocument,
} from '../../src/types/index.js';

// ── Helpers ──────────────────────────────────────────────────────────────────

const ENVELOPE: SpreadsheetEnvelope = {
  spreadsheetId: 'abc123',
  spreadsheetUrl: 'https://docs.google.com/spreadsheets/d/abc123',
  title: 'Household Budget',
  locale: 'en_GB',
  timezone: 'Europe/London',
  sheetCount: 2,
};

const STRUCTURE: StructureDocument = {
  ...ENVELOPE,
  sheets: [
    {
      sheetName: 'In|Out',
      isEmpty: false,
      dimensions: { rows: 10, columns: 4 },
      columnStructure: { type: 'Single', value: 'Date' },
      rowStructure: { type: 'AllEmpty', count: 9 },
    },
    { sheetName: 'Notes', isEmpty: true },
  ],
};

const ANALYSIS: AnalysisDocument = {
  ...ENVELOPE,
  sheets: [
    {
      sheetName: 'Budget',
      sheetId: 0,
      isEmpty: false,
      dimensions: { rowCount: 4, columnCount: 1 },
      columnHeaders: ['Double'],
      rowHeaders: ['Double'],
      columns: [
        {
          columnIndex: 0,
          columnLetter: 'A',
          dominantCellType: 'formula',
          cellTypeDistribution: { formula: 1 },
          dominantDataType: 'number',
          dataTypeDistribution: { number: 1 },
          nonEmptyCount: 3,
          formulaCount: 3,
          formulaRanges: 1,
        },
      ],
    },
    { sheetName: 'Broken', sheetId: 1, error: 'quota exceeded' },
  ],
  analysisSummary: {
    totalSheets: 2,
    nonEmptySheets: 2,
    totalRows: 4,
    sheetNames: ['Budget', 'Broken'],
  },
};

// ── Tests ────────────────────────────────────────────────────────────────────

describe('formatStructureMarkdown', () => {
  it('starts with a title and the spreadsheet details', () => {
    const lines = formatStructureMarkdown(STRUCTURE).split('\n');
    expect(lines[0]).toBe('# Household Budget - Sheet Structure');
    expect(lines).toContain('**Locale:** en_GB  ');
    expect(lines).toContain('**Sheets:** 2');
  });

  it('renders one table row per sheet and escapes pipes', () => {
    const lines = formatStructureMarkdown(STRUCTURE).split('\n');
    expect(lines).toContain(
      "| 1 | In\\|Out | 10 × 4 | single value 'Date' | all blank (9) |",
    );
    expect(lines).toContain('| 2 | Notes | _empty_ | | |');
  });
});

describe('formatAnalysisMarkdown', () => {
  it('renders a section per sheet with a column table', () => {
    const lines = formatAnalysisMarkdown(ANALYSIS).split('\n');
    expect(lines).toContain('## Budget');
    expect(lines).toContain('**Size:** 4 rows × 1 columns');
    expect(lines).toContain('| A | Double | formula | number | 3 | 1 |');
  });

  it('reports failed sheets and the total', () => {
    const lines = formatAnalysisMarkdown(ANALYSIS).split('\n');
    expect(lines).toContain('_Error: quota exceeded_');
    expect(lines[lines.length - 1]).toBe('**Total rows:** 4');
  });
});
