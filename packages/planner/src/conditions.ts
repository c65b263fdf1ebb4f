// packages/planner/src/conditions.ts
// Equality / threshold constraints pulled out of the question text.
import type { Condition, KnownField } from '@shipquery/core';
import {
  detectDestinationField, detectOriginField, detectStatusField, parseDate, resolveFieldToken
} from '@shipquery/catalog';

export const STATUS_WORDS = [
  'delivered', 'pending', 'in transit', 'cancelled', 'returned', 'booked', 'shipped'
] as const;

// words that end a "from X" / "to Y" place name
const PLACE_STOP = new Set([
  'to', 'from', 'this', 'last', 'past', 'current', 'in', 'on', 'between', 'with', 'for',
  'the', 'grouped', 'group', 'by', 'during', 'created', 'shipped', 'delivered', 'since',
  'and', 'where', 'that', 'which', 'over', 'under', 'above', 'below'
]);

function rangeOp(sym: string): 'gt' | 'gte' | 'lt' | 'lte' | null {
  switch (sym) {
    case '>': return 'gt';
    case '>=': return 'gte';
    case '<': return 'lt';
    case '<=': return 'lte';
    default: return null;
  }
}

const VERBAL_OPS: ReadonlyArray<{ re: RegExp; op: 'gt' | 'lt' }> = [
  { re: /\b(?:over|above|more\s+than|greater\s+than|exceeding)\s+[$€£₹]?\s*(\d[\d,]*(?:\.\d+)?)/gi, op: 'gt' },
  { re: /\b(?:under|below|less\s+than|cheaper\s+than)\s+[$€£₹]?\s*(\d[\d,]*(?:\.\d+)?)/gi, op: 'lt' },
];

// a number followed by one of these is a duration or quantity, not a price
const UNIT_AFTER =
  /^\s*(?:days?|weeks?|months?|years?|hours?|hrs?|kgs?|kilo(?:gram)?s?|lbs?|pounds?|tons?|tonnes?|pallets?|boxes|box|cartons?|pieces?|pcs|units?|items?|km|miles?)\b/i;

const toNumber = (s: string) => Number(s.replace(/,/g, ''));

function placeAfter(text: string, keyword: 'from' | 'to'): string | null {
  const m = text.match(new RegExp(`\\b${keyword}\\s+([A-Za-z0-9][A-Za-z0-9 \\-]*)`, 'i'));
  if (!m) return null;
  const words: string[] = [];
  for (const w of m[1].trim().split(/\s+/)) {
    if (PLACE_STOP.has(w.toLowerCase()) || words.length === 3) break;
    words.push(w);
  }
  if (!words.length) return null;
  const place = words.join(' ');
  // "from 2026-10-01 to ..." is a date range
  return parseDate(place) ? null : place;
}

// the words just before a comparison operator, e.g. "weight" in "weight > 10"
function fieldBefore(fields: readonly KnownField[], lead: string): string | undefined {
  const words = lead.trim().split(/\s+/).filter(Boolean).slice(-3);
  for (let k = words.length; k > 0; k--) {
    const hit = resolveFieldToken(fields, words.slice(-k).join(' '));
    if (hit) return hit;
  }
  return undefined;
}

// identifier and text columns are stored as strings
function isTextField(fields: readonly KnownField[], name: string): boolean {
  const role = fields.find((f) => f.name === name)?.role;
  return role === 'identifier' || role === 'text';
}

export function extractStatus(text: string, fields: readonly KnownField[]): Condition[] {
  const hits = STATUS_WORDS.filter((s) => new RegExp(`\\b${s}\\b`, 'i').test(text));
  const field = detectStatusField(fields);
  if (!hits.length || !field) return [];
  return [{ field, op: 'in', value: [...hits] }];
}

export function extractPlaces(text: string, fields: readonly KnownField[]): Condition[] {
  const out: Condition[] = [];
  const origin = detectOriginField(fields);
  const destination = detectDestinationField(fields);
  const from = origin ? placeAfter(text, 'from') : null;
  const to = destination ? placeAfter(text, 'to') : null;
  if (origin && from) out.push({ field: origin, op: 'contains', value: from });
  if (destination && to) out.push({ field: destination, op: 'contains', value: to });
  return out;
}

/** "<field> >= 100" on the named field, or "over 100" on the cost field. */
export function extractThresholds(
  text: string,
  fields: readonly KnownField[],
  costField: string | undefined
): Condition[] {
  const out: Condition[] = [];

  for (const m of text.matchAll(/([A-Za-z _#-]{2,40}?)\s*(>=|<=|>|<|=)\s*(\d[\d,]*(?:\.\d+)?)/g)) {
    const field = fieldBefore(fields, m[1]) ?? costField;
    if (!field) continue;
    const value = toNumber(m[3]);
    const op = rangeOp(m[2]);
    if (op) out.push({ field, op, value });
    else out.push({ field, op: 'eq', value: isTextField(fields, field) ? m[3] : value });
  }

  if (costField) {
    for (const { re, op } of VERBAL_OPS) {
      for (const m of text.matchAll(re)) {
        if (UNIT_AFTER.test(text.slice((m.index ?? 0) + m[0].length))) continue;
        out.push({ field: costField, op, value: toNumber(m[1]) });
      }
    }
  }
  return out;
}
