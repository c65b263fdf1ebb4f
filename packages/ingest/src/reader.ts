import * as XLSX from 'xlsx';
import { parse } from 'csv-parse/sync';
import { ShipqueryError } from '@shipquery/core';
import { isEmptyCell } from '@shipquery/catalog';
import { detectFormat, type TableFormat } from './detector';

export interface Table {
  format: TableFormat;
  sheet?: string;
  columns: string[];
  rows: unknown[][]; // aligned with columns
}

export interface ReadOptions {
  sheetName?: string;
  mimeType?: string;
}

const readXlsxMatrix = (bytes: Buffer, sheetName?: string): { sheet?: string; matrix: unknown[][] } => {
  const workbook = XLSX.read(bytes, { type: 'buffer', cellDates: true });
  const name = sheetName ?? workbook.SheetNames[0];
  if (!name) return { matrix: [] };
  const sheet = workbook.Sheets[name];
  if (!sheet) {
    throw new ShipqueryError('VALIDATION', `Sheet not found: ${name} (available: ${workbook.SheetNames.join(', ')})`);
  }
  const matrix = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, defval: null, raw: true, blankrows: false });
  return { sheet: name, matrix };
};

const readCsvMatrix = (bytes: Buffer): unknown[][] => {
  const records: unknown = parse(bytes, {
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });
  if (!Array.isArray(records)) return [];
  return records.filter((r): r is unknown[] => Array.isArray(r));
};

/**
 * Header row -> column names used verbatim. A repeated header keeps its first
 * column; blank headers get a positional name.
 */
export const toTable = (format: TableFormat, matrix: unknown[][], sheet?: string): Table => {
  const [header = [], ...body] = matrix;
  const columns: string[] = [];
  const keep: number[] = [];
  const seen = new Set<string>();

  header.forEach((cell, i) => {
    const name = isEmptyCell(cell) ? `column_${i + 1}` : String(cell);
    if (seen.has(name)) return;
    seen.add(name);
    columns.push(name);
    keep.push(i);
  });

  const rows = body
    .map((r) => keep.map((i) => (i < r.length ? r[i] : null)))
    .filter((r) => r.some((v) => !isEmptyCell(v)));

  return { format, sheet, columns, rows };
};

export const readTable = (bytes: Buffer, filename: string, opts: ReadOptions = {}): Table => {
  const format = detectFormat(filename, opts.mimeType);
  if (bytes.length === 0) return { format, columns: [], rows: [] };

  if (format === 'xlsx') {
    const { sheet, matrix } = readXlsxMatrix(bytes, opts.sheetName);
    return toTable(format, matrix, sheet);
  }
  return toTable(format, readCsvMatrix(bytes));
};
