import type { CellValue, FieldRole } from '@shipquery/core';
import { isEmptyCell, parseDate, parseNumber } from '@shipquery/catalog';

function asText(v: unknown): string {
  if (v instanceof Date) return v.toISOString();
  return typeof v === 'string' ? v : String(v);
}

/** Coerce a cell to its column role; a cell that does not coerce keeps its text. */
export function coerceCell(role: FieldRole, v: unknown): CellValue {
  if (isEmptyCell(v)) return null;
  switch (role) {
    case 'numeric':
      return parseNumber(v) ?? asText(v);
    case 'date':
      return parseDate(v) ?? asText(v);
    case 'identifier':
    case 'text':
      return asText(v);
  }
}
