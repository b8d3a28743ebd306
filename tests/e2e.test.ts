/**
 * End-to-end workflow tests for sheetscope.
 *
 * The commands create their own source from the environment here, reading
 * the fixture spreadsheet through SHEETSCOPE_FIXTURES_DIR:
 *   structure → summarize, analyze → summarize, extract
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import path from 'node:path';
import os from 'node:os';
import fs from 'node:fs/promises';
import { fileURLToPath } from 'node:url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const FIXTURES_DIR = path.resolve(__dirname, 'fixtures', 'sheets');
const OUTPUT_DIR = path.join(os.tmpdir(), 'sheetscope-e2e-test');

// ── Mock ora to suppress spinner output ──────────────────────────────────────

vi.mock('ora', () => ({
  default: () => {
    const spinner = {
      start: vi.fn().mockReturnThis(),
      succeed: vi.fn().mockReturnThis(),
      fail: vi.fn().mockReturnThis(),
      warn: vi.fn().mockReturnThis(),
      stop: vi.fn().mockReturnThis(),
      text: '',
    };
    return new Proxy(spinner, {
      set(target, prop, value) {
        if (prop === 'text') {
          target.text = String(value);
          return true;
        }
        return Reflect.set(target, prop, value);
      },
    });
  },
}));

import { runAnalyze } from '../src/commands/analyze.js';
import { runExtract } from '../src/commands/extract.js';
import { runStructure } from '../src/commands/structure.js';
import { runSummarize } from '../src/commands/summarize.js';

/** Strip ANSI escape sequences for assertion. */
function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1B\[[0-9;]*[a-zA-Z]/g, '');
}

// ── Tests ────────────────────────────────────────────────────────────────────

describe('E2E: Full workflow', () => {
  beforeEach(async () => {
    await fs.rm(OUTPUT_DIR, { recursive: true, force: true });
    vi.stubEnv('SHEETSCOPE_FIXTURES_DIR', FIXTURES_DIR);
    vi.stubEnv('SHEETSCOPE_OUTPUT_DIR', OUTPUT_DIR);
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(process, 'exit').mockImplementation(((code?: number) => {
      throw new Error(`process.exit(${code})`);
    }) as never);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    await fs.rm(OUTPUT_DIR, { recursive: true, force: true });
  });

  it('structure then summarize describes every sheet', async () => {
    await runStructure('budget-demo');

    const summary = await runSummarize(
      path.join(OUTPUT_DIR, 'sheet_structure_budget-demo.json'),
      { format: 'markdown' },
    );

    const lines = summary.split('\n');
    expect(lines[0]).toBe('# Household Budget - Sheet Structure');
    expect(lines).toContain(
      '| 1 | Budget | 4 × 4 | 4 items: Item, Amount, Double, Status | 4 items: Item, Rent, Food, Misc |',
    );
    expect(lines).toContain('| 2 | Empty | _empty_ | | |');
    expect(lines).toContain(
      "| 3 | Dates | 4 × 1 | single value 'Date' | 4 dates from Date to 2024-01-03 |",
    );
  });

  it('analyze then summarize lists the formula column', async () => {
    const document = await runAnalyze('budget-demo');

    const summary = stripAnsi(
      await runSummarize(path.join(OUTPUT_DIR, 'sheet_analysis_budget-demo.json')),
    );

    expect(document.analysisSummary.totalRows).toBe(8);
    expect(summary).toContain('C Double: 3 formulas in 1 range');
    expect(summary).toContain('Total rows across all sheets: 8');
  });

  it('extract writes header-keyed rows for every sheet', async () => {
    await runExtract('budget-demo');

    const written: unknown = JSON.parse(
      await fs.readFile(path.join(OUTPUT_DIR, 'sheet_data_budget-demo.json'), 'utf-8'),
    );
    expect(written).toMatchObject({
      title: 'Household Budget',
      summary: { totalSheets: 3, totalDataRows: 6 },
    });
  });
});
