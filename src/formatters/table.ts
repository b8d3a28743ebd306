/**
 * Terminal formatter for structure and analysis documents.
 *
 * Uses chalk for colours, boxen for the bordered header box.
 */

import boxen from 'boxen';
import chalk from 'chalk';
import { plural, truncate } from '../utils/strings.js';
import type {
  AnalysisDocument,
  PatternResult,
  SpreadsheetEnvelope,
  StructureDocument,
} from '../types/index.js';

/** Values listed before a list pattern is cut short. */
const LIST_PREVIEW = 5;

// ── Pattern descriptions ────────────────────────────────────────────────────

/** One-line, uncoloured description of a pattern. */
export function describePattern(pattern: PatternResult): string {
  switch (pattern.type) {
    case 'Empty':
      return 'empty';
    case 'AllEmpty':
      return `all blank (${pattern.count})`;
    case 'Single':
      return `single value '${pattern.value}'`;
    case 'Uniform':
      return `all '${pattern.value}' (${pattern.count}×)`;
    case 'Repeating': {
      const base = `${JSON.stringify(pattern.template)} × ${plural(pattern.repeatCount, 'block')}`;
      return pattern.breaks.length > 0
        ? `${base} (${plural(pattern.breaks.length, 'break')})`
        : base;
    }
    case 'DateSequence':
      return `${pattern.count} dates from ${pattern.first} to ${pattern.last}`;
    case 'VariedWithPrefix':
      return `${pattern.prefixCount}/${pattern.total} start with '${pattern.commonPrefix}'`;
    case 'List': {
      const preview = pattern.values.slice(0, LIST_PREVIEW).join(', ');
      const more = pattern.values.length > LIST_PREVIEW ? ', ...' : '';
      return `${plural(pattern.values.length, 'item')}: ${preview}${more}`;
    }
    case 'Varied':
      return `${pattern.uniqueCount} unique values`;
    default: {
      const unreachable: never = pattern;
      return unreachable;
    }
  }
}

// ── Documents ───────────────────────────────────────────────────────────────

/**
 * Format a structure document as a styled terminal summary.
 *
 * @returns A multi-line string ready for `console.log`.
 */
export function formatStructureTable(document: StructureDocument): string {
  const output: string[] = [headerBox('Sheet Structure', document), ''];

  document.sheets.forEach((sheet, i) => {
    const label = `${chalk.yellow(`${i + 1}.`)} ${chalk.bold(sheet.sheetName)}`;

    if ('error' in sheet) {
      output.push(`${label}: ${chalk.red(`ERROR - ${sheet.error}`)}`);
      return;
    }
    if (sheet.isEmpty) {
      output.push(`${label}: ${chalk.dim('EMPTY')}`);
      return;
    }

    const { rows, columns } = sheet.dimensions;
    output.push(`${label}: ${rows} rows × ${columns} cols`);
    output.push(`   ${chalk.dim('Columns:')} ${describePattern(sheet.columnStructure)}`);
    output.push(`   ${chalk.dim('Rows:')}    ${describePattern(sheet.rowStructure)}`);
    if (sheet.frozen) {
      output.push(
        `   ${chalk.dim('Frozen:')}  ${sheet.frozen.rows} rows, ${sheet.frozen.columns} columns`,
      );
    }
    output.push('');
  });

  return output.join('\n');
}

/**
 * Format an analysis document as a styled terminal summary.
 *
 * @returns A multi-line string ready for `console.log`.
 */
export function formatAnalysisTable(document: AnalysisDocument): string {
  const output: string[] = [headerBox('Sheet Analysis', document), ''];

  document.sheets.forEach((sheet, i) => {
    const label = `${chalk.yellow(`${i + 1}.`)} ${chalk.bold(sheet.sheetName)}`;

    if ('error' in sheet) {
      output.push(`${label}: ${chalk.red(`ERROR - ${sheet.error}`)}`);
      return;
    }
    if (sheet.isEmpty) {
      output.push(`${label}: ${chalk.dim('EMPTY')}`);
      return;
    }

    const { rowCount, columnCount } = sheet.dimensions;
    output.push(`${label}: ${rowCount} rows × ${columnCount} columns`);

    for (const column of sheet.columns) {
      if (!column.formulaFlow) continue;
      const header = sheet.columnHeaders[column.columnIndex] ?? '';
      output.push(
        `   ${chalk.cyan(column.columnLetter)} ${truncate(header, 30)}: ` +
          `${plural(column.formulaCount ?? 0, 'formula')} in ${plural(column.formulaRanges ?? 0, 'range')}`,
      );
    }
  });

  output.push('');
  output.push(
    chalk.bold(
      `Total rows across all sheets: ${document.analysisSummary.totalRows.toLocaleString('en-US')}`,
    ),
  );

  return output.join('\n');
}

function headerBox(subtitle: string, document: SpreadsheetEnvelope): string {
  const title = chalk.bold.cyan(`SHEETSCOPE - ${subtitle}`);
  const divider = chalk.dim('─'.repeat(55));
  const stats = [
    `${chalk.bold('Spreadsheet:')} ${document.title}`,
    `${chalk.bold('URL:')} ${document.spreadsheetUrl}`,
    `${chalk.bold('Locale:')} ${document.locale} | ${chalk.bold('Timezone:')} ${document.timezone}`,
    `${chalk.bold('Sheets:')} ${document.sheetCount}`,
  ].join('\n');

  return boxen(`${title}\n${divider}\n${stats}`, {
    padding: 1,
    borderStyle: 'round',
    borderColor: 'cyan',
  });
}
