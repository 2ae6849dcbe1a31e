import Papa from 'papaparse';
import type { GradeTable, RawRow } from '../types';
import { SchemaError } from './errors';
import { type NormalizeOptions, normalizeRows } from './schemaService';
import { createLogger } from './logger';

const log = createLogger('data');

export interface ParsedCsv {
  rows: RawRow[];
  columns: string[];
}

/**
 * Parses a grade export with a header row. Lines holding only delimiters or
 * whitespace (blank spreadsheet rows) are skipped. Broken quoting is fatal;
 * ragged rows are left for the normalizer to reject or accept.
 */
export function parseGradeCsv(text: string): ParsedCsv {
  const parsed = Papa.parse<RawRow>(text, {
    header: true,
    skipEmptyLines: 'greedy',
    transformHeader: header => header.trim()
  });

  const quoteError = parsed.errors.find(e => e.type === 'Quotes');
  if (quoteError) {
    const row = quoteError.row === undefined ? undefined : quoteError.row + 1;
    throw new SchemaError(`Malformed CSV: ${quoteError.message}`, { row });
  }
  if (parsed.errors.length > 0) {
    log.warn('CSV parse warnings', { count: parsed.errors.length, first: parsed.errors[0].message });
  }

  return { rows: parsed.data, columns: parsed.meta.fields ?? [] };
}

export function loadGradeTable(text: string, options: NormalizeOptions = {}): GradeTable {
  const { rows, columns } = parseGradeCsv(text);
  return normalizeRows(rows, columns, options);
}

export interface DatasetCache {
  /** Returns the cached table for `key`, parsing `text` only on first use. */
  load(key: string, text: string): GradeTable;
  /** Drops any cached table for `key` and parses `text` again. */
  reload(key: string, text: string): GradeTable;
  has(key: string): boolean;
  clear(): void;
}

export function createDatasetCache(options: NormalizeOptions = {}): DatasetCache {
  const tables = new Map<string, GradeTable>();

  const reload = (key: string, text: string): GradeTable => {
    tables.delete(key);
    const table = loadGradeTable(text, options);
    tables.set(key, table);
    log.info('Loaded dataset', { key, records: table.records.length });
    return table;
  };

  return {
    load: (key, text) => tables.get(key) ?? reload(key, text),
    reload,
    has: key => tables.has(key),
    clear: () => tables.clear()
  };
}

export type UploadResult =
  | { status: 'loaded'; table: GradeTable }
  | { status: 'rejected'; message: string };

/**
 * Replaces the cached table for an uploaded file. Failures are logged and
 * returned as a message for the error banner, never thrown.
 */
export function loadUpload(cache: DatasetCache, name: string, text: string): UploadResult {
  try {
    return { status: 'loaded', table: cache.reload(name, text) };
  } catch (err) {
    log.error('Rejected dataset', err, { file: name });
    return { status: 'rejected', message: err instanceof SchemaError ? err.message : `Could not load ${name}.` };
  }
}
