/**
 * zod schemas for the documents sheetscope writes, used by `summarize` to
 * load them back.
 */

import { z } from 'zod';
import type {
  AnalysisDocument,
  ColumnAnalysis,
  PatternResult,
  StructureDocument,
} from '../types/index.js';

const stringList = z.array(z.string());

export const patternResultSchema: z.ZodType<PatternResult, z.ZodTypeDef, unknown> =
  z.discriminatedUnion('type', [
    z.object({ type: z.literal('Empty') }),
    z.object({ type: z.literal('AllEmpty'), count: z.number() }),
    z.object({ type: z.literal('Single'), value: z.string() }),
    z.object({ type: z.literal('Uniform'), value: z.string(), count: z.number() }),
    z.object({
      type: z.literal('Repeating'),
      blockSize: z.number(),
      template: stringList,
      repeatCount: z.number(),
      totalItems: z.number(),
      breaks: z.array(
        z.object({
          blockIndex: z.number(),
          position: z.number(),
          expectedTemplate: stringList,
          actualValues: stringList,
        }),
      ),
      sampleFirstBlock: stringList,
    }),
    z.object({
      type: z.literal('DateSequence'),
      count: z.number(),
      first: z.string(),
      last: z.string(),
      sample: stringList,
    }),
    z.object({
      type: z.literal('VariedWithPrefix'),
      commonPrefix: z.string(),
      prefixCount: z.number(),
      total: z.number(),
      sample: stringList,
    }),
    z.object({ type: z.literal('List'), values: stringList, total: z.number() }),
    z.object({
      type: z.literal('Varied'),
      uniqueCount: z.number(),
      total: z.number(),
      sample: stringList,
    }),
  ]);

const cellTypeSchema = z.enum([
  'checkbox',
  'dropdown',
  'formula',
  'number',
  'text',
  'boolean',
  'empty',
]);

const dataTypeSchema = z.enum([
  'empty',
  'number',
  'boolean',
  'date',
  'url',
  'email',
  'text',
]);

const formulaFlowEntrySchema = z.object({
  startRow: z.number(),
  endRow: z.number(),
  pattern: z.string(),
  firstFormula: z.string(),
  formulaCount: z.number(),
  formulas: stringList,
  breakAfter: z.boolean().optional(),
  continuesAtRow: z.number().optional(),
  breakSize: z.number().optional(),
});

const columnAnalysisSchema: z.ZodType<ColumnAnalysis, z.ZodTypeDef, unknown> =
  z.object({
    columnIndex: z.number(),
    columnLetter: z.string(),
    dominantCellType: cellTypeSchema,
    cellTypeDistribution: z.record(cellTypeSchema, z.number()),
    dominantDataType: dataTypeSchema,
    dataTypeDistribution: z.record(dataTypeSchema, z.number()),
    nonEmptyCount: z.number(),
    formulaCount: z.number().optional(),
    formulaRanges: z.number().optional(),
    formulaFlow: z.array(formulaFlowEntrySchema).optional(),
    hasDropdown: z.boolean().optional(),
    dropdownOptions: stringList.optional(),
  });

const envelope = {
  spreadsheetId: z.string(),
  spreadsheetUrl: z.string(),
  title: z.string(),
  locale: z.string(),
  timezone: z.string(),
  sheetCount: z.number(),
};

const sheetErrorSchema = z.object({
  sheetName: z.string(),
  sheetId: z.number().optional(),
  error: z.string(),
});

const emptySheetSchema = z.object({
  sheetName: z.string(),
  isEmpty: z.literal(true),
});

const sheetStructureSchema = z.object({
  sheetName: z.string(),
  isEmpty: z.literal(false),
  dimensions: z.object({ rows: z.number(), columns: z.number() }),
  columnStructure: patternResultSchema,
  rowStructure: patternResultSchema,
  frozen: z.object({ rows: z.number(), columns: z.number() }).optional(),
});

const sheetAnalysisSchema = z.object({
  sheetName: z.string(),
  sheetId: z.number(),
  isEmpty: z.literal(false),
  dimensions: z.object({ rowCount: z.number(), columnCount: z.number() }),
  columnHeaders: stringList,
  rowHeaders: stringList,
  columns: z.array(columnAnalysisSchema),
});

export const structureDocumentSchema: z.ZodType<
  StructureDocument,
  z.ZodTypeDef,
  unknown
> = z.object({
  ...envelope,
  sheets: z.array(
    z.union([sheetStructureSchema, emptySheetSchema, sheetErrorSchema]),
  ),
});

export const analysisDocumentSchema: z.ZodType<
  AnalysisDocument,
  z.ZodTypeDef,
  unknown
> = z.object({
  ...envelope,
  sheets: z.array(
    z.union([sheetAnalysisSchema, emptySheetSchema, sheetErrorSchema]),
  ),
  analysisSummary: z.object({
    totalSheets: z.number(),
    nonEmptySheets: z.number(),
    totalRows: z.number(),
    sheetNames: stringList,
  }),
});

/** A document `summarize` knows how to read. */
export type SummarizableDocument =
  | { kind: 'structure'; document: StructureDocument }
  | { kind: 'analysis'; document: AnalysisDocument };

/** Thrown when a file is not a sheetscope structure or analysis document. */
export class DocumentFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DocumentFormatError';
  }
}

/**
 * Identify and validate a parsed document. Analysis documents are told apart
 * by their `analysisSummary` block.
 *
 * @throws DocumentFormatError when neither schema matches.
 */
export function parseSummarizableDocument(raw: unknown): SummarizableDocument {
  const analysis = analysisDocumentSchema.safeParse(raw);
  if (analysis.success) return { kind: 'analysis', document: analysis.data };

  const structure = structureDocumentSchema.safeParse(raw);
  if (structure.success) return { kind: 'structure', document: structure.data };

  throw new DocumentFormatError(
    'Not a sheetscope structure or analysis document.',
  );
}
