import { describe, it, expect, vi, afterEach } from 'vitest';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { google } from 'googleapis';
import {
  createSheetsSource,
  FixtureSheetsSource,
  GoogleSheetsSource,
} from '../../src/sheets/client.js';
import { SheetsRequestError } from '../../src/sheets/errors.js';

// ── Resolve fixture directory ────────────────────────────────────────────────

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const FIXTURES_DIR = path.resolve(__dirname, '..', 'fixtures', 'sheets');

// ── FixtureSheetsSource ──────────────────────────────────────────────────────

describe('FixtureSheetsSource', () => {
  const source = new FixtureSheetsSource(FIXTURES_DIR);

  it('derives sheet properties from the grid', async () => {
    const info = await source.getSpreadsheet('budget-demo');

    expect(info.title).toBe('Household Budget');
    expect(info.locale).toBe('en_GB');
    expect(info.timeZone).toBe('Europe/London');
    expect(info.sheets[0]).toEqual({
      sheetId: 0,
      title: 'Budget',
      index: 0,
      rowCount: 4,
      columnCount: 4,
      frozenRowCount: 1,
      frozenColumnCount: 0,
    });
    expect(info.sheets.map((s) => [s.title, s.rowCount])).toEqual([
      ['Budget', 4],
      ['Empty', 0],
      ['Dates', 4],
    ]);
  });

  it('cuts grid data to a bounded range', async () => {
    const rows = await source.getGridData('budget-demo', "'Budget'!A1:ZZZ2");
    expect(rows).toHaveLength(2);
  });

  it('returns formatted values', async () => {
    const values = await source.getValues('budget-demo', "'Budget'!A1:ZZZ2");
    expect(values).toEqual([
      ['Item', 'Amount', 'Double', 'Status'],
      ['Rent', '1,200', '2,400', 'Open'],
    ]);
  });

  it('returns no values for an empty sheet', async () => {
    expect(await source.getValues('budget-demo', "'Empty'")).toEqual([]);
  });

  it('rejects an unknown sheet', async () => {
    await expect(source.getGridData('budget-demo', "'Nope'")).rejects.toThrow(
      "Unable to parse range: 'Nope'",
    );
  });

  it('rejects a missing spreadsheet', async () => {
    await expect(source.getSpreadsheet('does-not-exist')).rejects.toThrow(
      'Requested entity was not found: spreadsheet does-not-exist',
    );
  });

  it('rejects a fixture that does not match the schema', async () => {
    await expect(source.getSpreadsheet('malformed')).rejects.toBeInstanceOf(
      SheetsRequestError,
    );
  });
});

// ── GoogleSheetsSource ───────────────────────────────────────────────────────

describe('GoogleSheetsSource', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('fills in defaults for missing metadata', async () => {
    const sheets = google.sheets({ version: 'v4' });
    vi.spyOn(sheets.spreadsheets, 'get').mockResolvedValue({
      data: {
        properties: { title: 'Ledger' },
        sheets: [{ properties: { sheetId: 3, title: 'Main', gridProperties: { rowCount: 10 } } }],
      },
    } as never);

    const info = await new GoogleSheetsSource(sheets).getSpreadsheet('abc123');

    expect(info).toEqual({
      spreadsheetId: 'abc123',
      title: 'Ledger',
      locale: 'unknown',
      timeZone: 'unknown',
      sheets: [
        {
          sheetId: 3,
          title: 'Main',
          index: 0,
          rowCount: 10,
          columnCount: 0,
          frozenRowCount: 0,
          frozenColumnCount: 0,
        },
      ],
    });
  });

  it('wraps API failures in SheetsRequestError', async () => {
    const sheets = google.sheets({ version: 'v4' });
    vi.spyOn(sheets.spreadsheets, 'get').mockRejectedValue(new Error('quota exceeded'));

    const request = new GoogleSheetsSource(sheets).getSpreadsheet('abc123');

    await expect(request).rejects.toBeInstanceOf(SheetsRequestError);
    await expect(request).rejects.toThrow(
      'Google API error (read spreadsheet abc123): quota exceeded',
    );
  });
});

// ── createSheetsSource ───────────────────────────────────────────────────────

describe('createSheetsSource', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('uses fixtures when SHEETSCOPE_FIXTURES_DIR is set', async () => {
    vi.stubEnv('SHEETSCOPE_FIXTURES_DIR', FIXTURES_DIR);

    const source = await createSheetsSource();

    expect(source).toBeInstanceOf(FixtureSheetsSource);
    expect((await source.getSpreadsheet('budget-demo')).title).toBe('Household Budget');
  });
});
