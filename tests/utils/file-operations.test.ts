import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import path from 'node:path';
import os from 'node:os';
import fs from 'node:fs/promises';
import { z } from 'zod';
import {
  ensureDir,
  fileExists,
  getDocumentPath,
  getOutputDir,
  readFileIfExists,
  readJsonFile,
  writeFileSafe,
  writeJsonFile,
} from '../../src/utils/file-operations.js';

// ── Test directory setup ─────────────────────────────────────────────────────

const TEST_DIR = path.join(os.tmpdir(), 'sheetscope-file-ops-test');

const pointSchema = z.object({ x: z.number(), y: z.number() });

describe('file-operations', () => {
  beforeEach(async () => {
    await fs.rm(TEST_DIR, { recursive: true, force: true });
    await fs.mkdir(TEST_DIR, { recursive: true });
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await fs.rm(TEST_DIR, { recursive: true, force: true });
  });

  // ── ensureDir ──────────────────────────────────────────────────────────

  describe('ensureDir', () => {
    it('creates a nested directory', async () => {
      const dirPath = path.join(TEST_DIR, 'a', 'b', 'c');
      await ensureDir(dirPath);
      const stat = await fs.stat(dirPath);
      expect(stat.isDirectory()).toBe(true);
    });

    it('is idempotent', async () => {
      const dirPath = path.join(TEST_DIR, 'already');
      await ensureDir(dirPath);
      await ensureDir(dirPath);
      expect(await fileExists(dirPath)).toBe(true);
    });
  });

  // ── Output paths ───────────────────────────────────────────────────────

  describe('getOutputDir', () => {
    it('prefers the explicit override', () => {
      vi.stubEnv('SHEETSCOPE_OUTPUT_DIR', '/from/env');
      expect(getOutputDir('/from/flag')).toBe(path.resolve('/from/flag'));
    });

    it('falls back to the environment, then .tmp', () => {
      vi.stubEnv('SHEETSCOPE_OUTPUT_DIR', '/from/env');
      expect(getOutputDir()).toBe(path.resolve('/from/env'));

      vi.unstubAllEnvs();
      delete process.env.SHEETSCOPE_OUTPUT_DIR;
      expect(getOutputDir()).toBe(path.resolve('.tmp'));
    });
  });

  describe('getDocumentPath', () => {
    it('joins kind and spreadsheet id', () => {
      expect(getDocumentPath('/out', 'sheet_analysis', 'abc123')).toBe(
        path.join('/out', 'sheet_analysis_abc123.json'),
      );
    });
  });

  // ── readFileIfExists ───────────────────────────────────────────────────

  describe('readFileIfExists', () => {
    it('returns file contents', async () => {
      const filePath = path.join(TEST_DIR, 'hello.txt');
      await fs.writeFile(filePath, 'Hello!', 'utf-8');
      expect(await readFileIfExists(filePath)).toBe('Hello!');
    });

    it('returns null for a missing file', async () => {
      expect(await readFileIfExists(path.join(TEST_DIR, 'nope.txt'))).toBeNull();
    });
  });

  // ── readJsonFile ───────────────────────────────────────────────────────

  describe('readJsonFile', () => {
    it('parses and validates JSON', async () => {
      const filePath = path.join(TEST_DIR, 'point.json');
      await fs.writeFile(filePath, '{"x":1,"y":2}', 'utf-8');
      expect(await readJsonFile(filePath, pointSchema)).toEqual({ x: 1, y: 2 });
    });

    it('returns null for invalid JSON', async () => {
      const filePath = path.join(TEST_DIR, 'bad.json');
      await fs.writeFile(filePath, '{not json', 'utf-8');
      expect(await readJsonFile(filePath, pointSchema)).toBeNull();
    });

    it('returns null when the schema rejects the data', async () => {
      const filePath = path.join(TEST_DIR, 'wrong.json');
      await fs.writeFile(filePath, '{"x":"1"}', 'utf-8');
      expect(await readJsonFile(filePath, pointSchema)).toBeNull();
    });

    it('returns null for a missing file', async () => {
      expect(await readJsonFile(path.join(TEST_DIR, 'none.json'), pointSchema)).toBeNull();
    });
  });

  // ── Writers ────────────────────────────────────────────────────────────

  describe('writeFileSafe', () => {
    it('creates parent directories', async () => {
      const filePath = path.join(TEST_DIR, 'deep', 'nested', 'file.txt');
      await writeFileSafe(filePath, 'content');
      expect(await fs.readFile(filePath, 'utf-8')).toBe('content');
    });
  });

  describe('writeJsonFile', () => {
    it('writes pretty-printed JSON with a trailing newline', async () => {
      const filePath = path.join(TEST_DIR, 'out.json');
      await writeJsonFile(filePath, { a: 1 });
      expect(await fs.readFile(filePath, 'utf-8')).toBe('{\n  "a": 1\n}\n');
    });
  });

  describe('fileExists', () => {
    it('reports missing files', async () => {
      expect(await fileExists(path.join(TEST_DIR, 'missing'))).toBe(false);
    });
  });
});
