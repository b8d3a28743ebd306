/**
 * Markdown formatter for structure and analysis documents.
 *
 * Used by `summarize --format markdown`.
 */

import { describePattern } from './table.js';
import type {
  AnalysisDocument,
  SpreadsheetEnvelope,
  StructureDocument,
} from '../types/index.js';

/** Format a structure document as a Markdown report. */
export function formatStructureMarkdown(document: StructureDocument): string {
  const lines = header('Sheet Structure', document);

  lines.push('| # | Sheet | Size | Columns | Rows |');
  lines.push('|---|-------|------|---------|------|');

  document.sheets.forEach((sheet, i) => {
    const name = escapeMarkdown(sheet.sheetName);
    if ('error' in sheet) {
      lines.push(`| ${i + 1} | ${name} | _error_ | ${escapeMarkdown(sheet.error)} | |`);
    } else if (sheet.isEmpty) {
      lines.push(`| ${i + 1} | ${name} | _empty_ | | |`);
    } else {
      const size = `${sheet.dimensions.rows} × ${sheet.dimensions.columns}`;
      lines.push(
        `| ${i + 1} | ${name} | ${size} | ${escapeMarkdown(describePattern(sheet.columnStructure))} | ${escapeMarkdown(describePattern(sheet.rowStructure))} |`,
      );
    }
  });

  return lines.join('\n');
}

/** Format an analysis document as a Markdown report. */
export function formatAnalysisMarkdown(document: AnalysisDocument): string {
  const lines = header('Sheet Analysis', document);

  for (const sheet of document.sheets) {
    lines.push(`## ${escapeMarkdown(sheet.sheetName)}`);
    lines.push('');

    if ('error' in sheet) {
      lines.push(`_Error: ${escapeMarkdown(sheet.error)}_`);
      lines.push('');
      continue;
    }
    if (sheet.isEmpty) {
      lines.push('_Empty sheet._');
      lines.push('');
      continue;
    }

    lines.push(
      `**Size:** ${sheet.dimensions.rowCount} rows × ${sheet.dimensions.columnCount} columns`,
    );
    lines.push('');
    lines.push('| Column | Header | Cell type | Data type | Non-empty | Formula ranges |');
    lines.push('|--------|--------|-----------|-----------|-----------|----------------|');

    for (const column of sheet.columns) {
      const headerText = escapeMarkdown(sheet.columnHeaders[column.columnIndex] ?? '');
      lines.push(
        `| ${column.columnLetter} | ${headerText} | ${column.dominantCellType} | ${column.dominantDataType} | ${column.nonEmptyCount} | ${column.formulaRanges ?? 0} |`,
      );
    }
    lines.push('');
  }

  lines.push(`**Total rows:** ${document.analysisSummary.totalRows}`);

  return lines.join('\n');
}

// ── Helpers ─────────────────────────────────────────────────────────────────

function header(subtitle: string, document: SpreadsheetEnvelope): string[] {
  return [
    `# ${escapeMarkdown(document.title)} - ${subtitle}`,
    '',
    `**URL:** ${document.spreadsheetUrl}  `,
    `**Locale:** ${document.locale}  `,
    `**Timezone:** ${document.timezone}  `,
    `**Sheets:** ${document.sheetCount}`,
    '',
    '---',
    '',
  ];
}

/** Escape characters that break Markdown table cells. */
function escapeMarkdown(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\n/g, ' ');
}
