import { UnsupportedFileError } from '@shipquery/core';

export type TableFormat = 'xlsx' | 'csv';

export const detectFormat = (filename: string, mimeType?: string): TableFormat => {
  const lower = filename.toLowerCase();
  if (lower.endsWith('.xlsx') || lower.endsWith('.xls') || lower.endsWith('.xlsm')) return 'xlsx';
  if (lower.endsWith('.csv') || lower.endsWith('.txt')) return 'csv';
  if (mimeType) {
    if (mimeType.includes('csv')) return 'csv';
    if (mimeType.includes('spreadsheet') || mimeType.includes('excel')) return 'xlsx';
  }
  throw new UnsupportedFileError(filename);
};
