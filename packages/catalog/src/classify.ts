import type { FieldRole } from '@shipquery/core';
import { isEmptyCell, parseDate, parseNumber } from './parse';

export const SAMPLE_SIZE = 20;

// Name rules are tried first, in order; content rules only when no name rule matches.
const NAME_RULES: ReadonlyArray<{ role: FieldRole; hints: readonly string[] }> = [
  { role: 'numeric', hints: ['cost', 'amount', 'charge', 'price'] },
  { role: 'identifier', hints: ['ref', 'tracking', 'awb'] },
];

const VALUE_RULES: ReadonlyArray<{ role: FieldRole; accepts: (v: unknown) => boolean }> = [
  { role: 'date', accepts: (v) => parseDate(v) !== null },
  { role: 'numeric', accepts: (v) => parseNumber(v) !== null },
];

export function roleFromName(columnName: string): FieldRole | null {
  const lc = columnName.toLowerCase();
  for (const rule of NAME_RULES) {
    if (rule.hints.some((h) => lc.includes(h))) return rule.role;
  }
  return null;
}

/**
 * Classify a column from its name and a sample of its values.
 * Content rules need a strict majority of the first SAMPLE_SIZE non-empty values.
 */
export function classify(columnName: string, sampleValues: readonly unknown[]): FieldRole {
  const byName = roleFromName(columnName);
  if (byName) return byName;

  const sample = sampleValues.filter((v) => !isEmptyCell(v)).slice(0, SAMPLE_SIZE);
  if (!sample.length) return 'text';

  for (const rule of VALUE_RULES) {
    const hits = sample.filter(rule.accepts).length;
    if (hits * 2 > sample.length) return rule.role;
  }
  return 'text';
}
