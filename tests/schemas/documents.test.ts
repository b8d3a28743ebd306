import { describe, it, expect } from 'vitest';
import {
  DocumentFormatError,
  parseSummarizableDocument,
  patternResultSchema,
} from '../../src/schemas/documents.js';
import { spreadsheetFixtureSchema } from '../../src/schemas/sheets.js';

const ENVELOPE = {
  spreadsheetId: 'abc123',
  spreadsheetUrl: 'https://docs.google.com/spreadsheets/d/abc123',
  title: 'Ledger',
  locale: 'en_US',
  timezone: 'America/New_York',
  sheetCount: 1,
};

describe('parseSummarizableDocument', () => {
  it('recognises a structure document', () => {
    const parsed = parseSummarizableDocument({
      ...ENVELOPE,
      sheets: [
        {
          sheetName: 'Main',
          isEmpty: false,
          dimensions: { rows: 5, columns: 2 },
          columnStructure: { type: 'List', values: ['A', 'B'], total: 2 },
          rowStructure: { type: 'Empty' },
        },
      ],
    });

    expect(parsed.kind).toBe('structure');
  });

  it('recognises an analysis document by its summary block', () => {
    const parsed = parseSummarizableDocument({
      ...ENVELOPE,
      sheets: [{ sheetName: 'Main', isEmpty: true }],
      analysisSummary: {
        totalSheets: 1,
        nonEmptySheets: 0,
        totalRows: 0,
        sheetNames: ['Main'],
      },
    });

    expect(parsed.kind).toBe('analysis');
  });

  it('keeps per-sheet errors', () => {
    const parsed = parseSummarizableDocument({
      ...ENVELOPE,
      sheets: [{ sheetName: 'Main', error: 'quota exceeded' }],
    });

    expect(parsed.document.sheets).toEqual([
      { sheetName: 'Main', error: 'quota exceeded' },
    ]);
  });

  it('rejects other JSON', () => {
    expect(() => parseSummarizableDocument({ sheets: 'nope' })).toThrow(
      DocumentFormatError,
    );
    expect(() => parseSummarizableDocument([])).toThrow(
      'Not a sheetscope structure or analysis document.',
    );
  });
});

describe('patternResultSchema', () => {
  it('rejects an unknown pattern type', () => {
    expect(patternResultSchema.safeParse({ type: 'Spiral' }).success).toBe(false);
  });

  it('requires the fields of the tagged variant', () => {
    expect(patternResultSchema.safeParse({ type: 'Uniform', value: 'x' }).success).toBe(false);
  });
});

describe('spreadsheetFixtureSchema', () => {
  it('accepts nullable API fields', () => {
    const result = spreadsheetFixtureSchema.safeParse({
      title: 'Ledger',
      sheets: [
        {
          properties: { sheetId: 0, title: 'Main' },
          rowData: [{ values: [{ formattedValue: null, effectiveValue: { numberValue: 1 } }] }],
        },
      ],
    });

    expect(result.success).toBe(true);
  });
});
