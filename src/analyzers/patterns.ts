/**
 * Sequence pattern detection.
 *
 * Classifies an ordered list of header-like values (a header row or the first
 * column of a sheet) into one structural shape. Shapes are tried in a fixed
 * priority order and the first one that fits wins:
 *
 *   Empty → AllEmpty → Single → Uniform → Repeating → DateSequence
 *     → VariedWithPrefix → List | Varied
 */

import type { PatternBreak, PatternResult } from '../types/index.js';

// ── Options ─────────────────────────────────────────────────────────────────

/** Tunable thresholds for pattern detection. */
export interface PatternOptions {
  /** Largest block size tried by the repeating-block search. Default: 10 */
  maxBlockSize?: number;
  /** Share of blocks that must match the first block's template. Default: 0.7 */
  blockMatchRatio?: number;
  /** Share of values that must be dates for a date sequence (exclusive). Default: 0.7 */
  dateRatio?: number;
  /** Share of values the dominant prefix must cover (exclusive). Default: 0.3 */
  prefixRatio?: number;
  /** Prefix length used for values without a space. Default: 5 */
  prefixLength?: number;
  /** Largest number of distinct values still reported as a list. Default: 20 */
  maxListSize?: number;
  /** Sample size for date sequences and prefix groups. Default: 5 */
  sampleSize?: number;
  /** Sample size for varied sequences. Default: 10 */
  variedSampleSize?: number;
}

const DEFAULT_OPTIONS: Required<PatternOptions> = {
  maxBlockSize: 10,
  blockMatchRatio: 0.7,
  dateRatio: 0.7,
  prefixRatio: 0.3,
  prefixLength: 5,
  maxListSize: 20,
  sampleSize: 5,
  variedSampleSize: 10,
};

export const DATE_TOKEN = '<date>';
export const NUMBER_TOKEN = '<number>';

const DATE_PATTERNS: RegExp[] = [
  /^\d{1,2}\/\d{1,2}\/\d{4}$/, // 26/09/2025
  /^\d{4}-\d{2}-\d{2}$/, // 2025-09-26
  /^\d{1,2}-\d{1,2}-\d{4}$/, // 26-09-2025
];

// ── Value shapes ────────────────────────────────────────────────────────────

/** Whether a value looks like a calendar date. */
export function isDateLike(value: string): boolean {
  if (!value) return false;
  return DATE_PATTERNS.some((re) => re.test(value));
}

/** Whether a value is all digits once `.` and `-` are removed. */
export function isNumberLike(value: string): boolean {
  const digits = value.replace(/[.-]/g, '');
  return digits.length > 0 && /^\d+$/.test(digits);
}

/** Map a value to its template token: `<date>`, `<number>` or itself. */
export function templateToken(value: string): string {
  if (isDateLike(value)) return DATE_TOKEN;
  if (isNumberLike(value)) return NUMBER_TOKEN;
  return value;
}

// ── Public API ──────────────────────────────────────────────────────────────

/**
 * Detect the structural pattern of a sequence of values.
 *
 * Blank entries (`null`, `undefined`, `''`) count towards the sequence length
 * but are skipped by every shape test after `AllEmpty`.
 */
export function detectPattern(
  values: ReadonlyArray<string | null | undefined>,
  options?: PatternOptions,
): PatternResult {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  if (values.length === 0) return { type: 'Empty' };

  const nonBlank = values.filter(
    (v): v is string => v !== null && v !== undefined && v !== '',
  );

  if (nonBlank.length === 0) {
    return { type: 'AllEmpty', count: values.length };
  }

  if (nonBlank.length === 1) {
    return { type: 'Single', value: nonBlank[0] };
  }

  const unique = [...new Set(nonBlank)];

  if (unique.length === 1) {
    return { type: 'Uniform', value: unique[0], count: values.length };
  }

  const repeating = findRepeatingBlocks(nonBlank, opts);
  if (repeating) return repeating;

  if (nonBlank.length >= 3) {
    const dateCount = nonBlank.filter(isDateLike).length;
    if (dateCount > nonBlank.length * opts.dateRatio) {
      return {
        type: 'DateSequence',
        count: nonBlank.length,
        first: nonBlank[0],
        last: nonBlank[nonBlank.length - 1],
        sample: nonBlank.slice(0, opts.sampleSize),
      };
    }
  }

  if (nonBlank.length > 5) {
    const grouped = findDominantPrefix(nonBlank, opts);
    if (grouped) return grouped;
  }

  if (unique.length <= opts.maxListSize) {
    return { type: 'List', values: unique, total: values.length };
  }

  return {
    type: 'Varied',
    uniqueCount: unique.length,
    total: values.length,
    sample: nonBlank.slice(0, opts.variedSampleSize),
  };
}

// ── Internal helpers ────────────────────────────────────────────────────────

/**
 * Try block sizes in increasing order and return the first one whose blocks
 * mostly share the first block's template.
 */
function findRepeatingBlocks(
  values: string[],
  opts: Required<PatternOptions>,
): PatternResult | null {
  const largest = Math.min(opts.maxBlockSize, Math.floor(values.length / 2));

  for (let blockSize = 1; blockSize <= largest; blockSize++) {
    const blocks = chunk(values, blockSize);
    if (blocks.length < 2) continue;

    const template = blocks[0].map(templateToken);

    // An all-date template is a run of dates; the date-sequence check owns it.
    if (template.every((token) => token === DATE_TOKEN)) continue;

    let matching = 1;
    const breaks: PatternBreak[] = [];

    for (let i = 1; i < blocks.length; i++) {
      const blockTemplate = blocks[i].map(templateToken);
      if (sameTemplate(blockTemplate, template)) {
        matching += 1;
      } else {
        breaks.push({
          blockIndex: i,
          position: i * blockSize,
          expectedTemplate: template,
          actualValues: blocks[i],
        });
      }
    }

    if (matching >= blocks.length * opts.blockMatchRatio) {
      return {
        type: 'Repeating',
        blockSize,
        template,
        repeatCount: blocks.length,
        totalItems: values.length,
        breaks,
        sampleFirstBlock: blocks[0],
      };
    }
  }

  return null;
}

/** Group values by prefix and return the dominant group if it is large enough. */
function findDominantPrefix(
  values: string[],
  opts: Required<PatternOptions>,
): PatternResult | null {
  const counts = new Map<string, number>();

  for (const value of values) {
    const prefix = value.includes(' ')
      ? value.split(' ')[0]
      : value.slice(0, opts.prefixLength);
    counts.set(prefix, (counts.get(prefix) ?? 0) + 1);
  }

  // Map iteration follows insertion order, so ties go to the earliest prefix.
  let best: [string, number] | null = null;
  for (const entry of counts) {
    if (!best || entry[1] > best[1]) best = entry;
  }

  if (!best || best[1] <= values.length * opts.prefixRatio) return null;

  return {
    type: 'VariedWithPrefix',
    commonPrefix: best[0],
    prefixCount: best[1],
    total: values.length,
    sample: values.slice(0, opts.sampleSize),
  };
}

/** Split into consecutive chunks of `size`, dropping a trailing partial chunk. */
function chunk(values: string[], size: number): string[][] {
  const blocks: string[][] = [];
  for (let i = 0; i + size <= values.length; i += size) {
    blocks.push(values.slice(i, i + size));
  }
  return blocks;
}

function sameTemplate(a: string[], b: string[]): boolean {
  return a.length === b.length && a.every((token, i) => token === b[i]);
}
