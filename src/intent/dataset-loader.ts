/**
 * Labeled dataset loading for intent training.
 *
 * Accepts CSV with a header row naming `text` and `intent` columns (any
 * order, extra columns ignored) or a JSON array of {text, intent}
 * objects. Every row is validated against the closed label set.
 */

import { readFile } from 'fs/promises';
import { extname } from 'path';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { LabeledExampleSchema } from '../types/intent.js';
import type { LabeledExample } from '../types/intent.js';
import { DatasetFormatError } from './errors.js';

const REQUIRED_COLUMNS = ['text', 'intent'] as const;

const CsvRecordsSchema = z.array(z.array(z.string()));

/**
 * Validate raw rows as {text, intent} pairs.
 *
 * @throws {DatasetFormatError} Naming the first invalid row (1-based)
 */
export function validateExamples(rows: readonly unknown[]): LabeledExample[] {
  return rows.map((row, i) => {
    const result = LabeledExampleSchema.safeParse(row);
    if (!result.success) {
      const issue = result.error.issues[0];
      const field = issue?.path.join('.') || 'row';
      throw new DatasetFormatError(
        `Row ${i + 1}: ${field}: ${issue?.message ?? 'invalid row'}`,
        { row: i + 1 },
      );
    }
    return result.data;
  });
}

/**
 * Parse CSV dataset content.
 *
 * @throws {DatasetFormatError} On malformed CSV, a missing `text` or
 *   `intent` column, or an invalid row
 */
export function parseCsvDataset(content: string): LabeledExample[] {
  let records: string[][];
  try {
    const parsed: unknown = parse(content, {
      bom: true,
      skip_empty_lines: true,
      trim: true,
    });
    records = CsvRecordsSchema.parse(parsed);
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    throw new DatasetFormatError(`Malformed CSV: ${message}`);
  }

  const [header, ...body] = records;
  if (!header) {
    throw new DatasetFormatError('Dataset is empty');
  }

  const columns = header.map((name) => name.trim().toLowerCase());
  const missing = REQUIRED_COLUMNS.filter((name) => !columns.includes(name));
  if (missing.length > 0) {
    throw new DatasetFormatError(`Missing required column(s): ${missing.join(', ')}`);
  }

  const textIndex = columns.indexOf('text');
  const intentIndex = columns.indexOf('intent');

  return validateExamples(
    body.map((record) => ({ text: record[textIndex], intent: record[intentIndex] })),
  );
}

/**
 * Parse a JSON array of {text, intent} objects.
 *
 * @throws {DatasetFormatError} On invalid JSON, a non-array document or
 *   an invalid row
 */
export function parseJsonDataset(content: string): LabeledExample[] {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new DatasetFormatError('Invalid JSON in dataset');
  }

  if (!Array.isArray(raw)) {
    throw new DatasetFormatError('JSON dataset must be an array of {text, intent} objects');
  }
  return validateExamples(raw);
}

/**
 * Read a dataset file, choosing the parser by extension (.json, else CSV).
 */
export async function loadDataset(datasetPath: string): Promise<LabeledExample[]> {
  const content = await readFile(datasetPath, 'utf-8');
  return extname(datasetPath).toLowerCase() === '.json'
    ? parseJsonDataset(content)
    : parseCsvDataset(content);
}
