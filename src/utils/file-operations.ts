/**
 * File read/write utilities.
 *
 * Used by the commands to write their JSON documents, by `summarize` to load
 * them back, and by the OAuth flow for the credentials and token files.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import type { ZodType, ZodTypeDef } from 'zod';

// ── Constants ────────────────────────────────────────────────────────────────

/** Default output directory, relative to the working directory. */
const DEFAULT_OUTPUT_DIR = '.tmp';

/** Kinds of document the commands write. */
export type DocumentKind = 'sheet_structure' | 'sheet_analysis' | 'sheet_data';

// ── Directory helpers ────────────────────────────────────────────────────────

/**
 * Ensure a directory exists, creating it (and parents) if necessary.
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

/**
 * Resolve the output directory: `--output-dir`, then `$SHEETSCOPE_OUTPUT_DIR`,
 * then `./.tmp`.
 */
export function getOutputDir(override?: string): string {
  return path.resolve(
    override ?? process.env.SHEETSCOPE_OUTPUT_DIR ?? DEFAULT_OUTPUT_DIR,
  );
}

/**
 * Full path of a document: `<outputDir>/<kind>_<spreadsheetId>.json`.
 */
export function getDocumentPath(
  outputDir: string,
  kind: DocumentKind,
  spreadsheetId: string,
): string {
  return path.join(outputDir, `${kind}_${spreadsheetId}.json`);
}

// ── Read helpers ─────────────────────────────────────────────────────────────

/**
 * Read a file's contents as UTF-8 text.
 * Returns `null` if the file does not exist.
 */
export async function readFileIfExists(
  filePath: string,
): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch {
    return null;
  }
}

/**
 * Read, parse and validate a JSON file. Returns `null` if the file doesn't
 * exist, contains invalid JSON, or does not match `schema`.
 */
export async function readJsonFile<T>(
  filePath: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
): Promise<T | null> {
  const content = await readFileIfExists(filePath);
  if (content === null) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    return null;
  }

  const parsed = schema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

// ── Write helpers ────────────────────────────────────────────────────────────

/**
 * Write text content to a file, creating parent directories as needed.
 */
export async function writeFileSafe(
  filePath: string,
  content: string,
): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await fs.writeFile(filePath, content, 'utf-8');
}

/**
 * Write a JSON-serialisable value to a file (pretty-printed).
 */
export async function writeJsonFile(
  filePath: string,
  data: unknown,
): Promise<void> {
  const json = JSON.stringify(data, null, 2) + '\n';
  await writeFileSafe(filePath, json);
}

// ── File existence ───────────────────────────────────────────────────────────

/**
 * Check whether a file exists.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}
