import { describe, it, expect } from 'vitest';
import type {
  CellData,
  FormulaFlowEntry,
  PatternResult,
  PatternType,
  SheetStructureEntry,
} from '../src/types/index.js';

describe('types', () => {
  it('PatternResult narrows on its type tag', () => {
    const p: PatternResult = { type: 'Uniform', value: 'x', count: 2 };
    const kind: PatternType = p.type;
    expect(kind).toBe('Uniform');
    if (p.type === 'Uniform') {
      expect(p.count).toBe(2);
    }
  });

  it('CellData accepts nullable API fields', () => {
    const cell: CellData = {
      formattedValue: null,
      effectiveValue: { numberValue: null, stringValue: 'x' },
    };
    expect(cell.effectiveValue?.stringValue).toBe('x');
  });

  it('FormulaFlowEntry break fields are optional', () => {
    const entry: FormulaFlowEntry = {
      startRow: 2,
      endRow: 6,
      pattern: '={REL}*2',
      firstFormula: '=B2*2',
      formulaCount: 5,
      formulas: ['=B2*2'],
    };
    expect(entry.breakAfter).toBeUndefined();
  });

  it('SheetStructureEntry covers errors and empty sheets', () => {
    const entries: SheetStructureEntry[] = [
      { sheetName: 'A', isEmpty: true },
      { sheetName: 'B', error: 'quota exceeded' },
    ];
    expect(entries.map((e) => ('error' in e ? 'error' : 'empty'))).toEqual([
      'empty',
      'error',
    ]);
  });
});
