import type { FieldOverrides, FieldRole, KnownField, ShipmentRecord } from '@shipquery/core';
import { classify } from './classify';

const COST_HINTS = ['cost', 'amount', 'charge', 'price', 'freight'];
const DATE_HINTS = ['ship date', 'shipdate', 'ship', 'created', 'date', 'delivered', 'etd'];
const STATUS_HINTS = ['status', 'shipment type'];
const ORIGIN_HINTS = ['origin', 'from'];
const DESTINATION_HINTS = ['destination', 'dest', 'consignee'];

function norm(s: string): string {
  return s.toLowerCase().replace(/[^a-z0-9]+/g, '');
}

/** Known fields of a collection, from sampled documents. `_id` is skipped. */
export function describeFields(docs: readonly ShipmentRecord[]): KnownField[] {
  const names: string[] = [];
  const seen = new Set<string>();
  for (const d of docs) {
    for (const k of Object.keys(d)) {
      if (k === '_id' || seen.has(k)) continue;
      seen.add(k);
      names.push(k);
    }
  }
  return names.map((name) => ({ name, role: classify(name, docs.map((d) => d[name])) }));
}

/** First field whose lowercased name contains a hint; hints are tried in priority order. */
export function findField(fields: readonly KnownField[], hints: readonly string[]): string | undefined {
  for (const h of hints) {
    const hit = fields.find((f) => f.name.toLowerCase().includes(h));
    if (hit) return hit.name;
  }
  return undefined;
}

function ofRole(fields: readonly KnownField[], role: FieldRole): KnownField[] {
  return fields.filter((f) => f.role === role);
}

/** Override resolved against known fields (case-insensitive); unknown names are ignored. */
export function resolveOverride(fields: readonly KnownField[], name?: string): string | undefined {
  if (!name) return undefined;
  const exact = fields.find((f) => f.name === name);
  if (exact) return exact.name;
  return fields.find((f) => f.name.toLowerCase() === name.toLowerCase())?.name;
}

export function detectCostField(fields: readonly KnownField[], overrides: FieldOverrides = {}): string | undefined {
  const o = resolveOverride(fields, overrides.costField);
  if (o) return o;
  const numeric = ofRole(fields, 'numeric');
  return findField(numeric, COST_HINTS) ?? numeric[0]?.name;
}

export function detectDateField(fields: readonly KnownField[], overrides: FieldOverrides = {}): string | undefined {
  const o = resolveOverride(fields, overrides.dateField);
  if (o) return o;
  const dates = ofRole(fields, 'date');
  return findField(dates, DATE_HINTS) ?? dates[0]?.name;
}

export function detectIdentifierField(fields: readonly KnownField[]): string | undefined {
  return ofRole(fields, 'identifier')[0]?.name;
}

export function detectStatusField(fields: readonly KnownField[]): string | undefined {
  return findField(fields, STATUS_HINTS);
}

export function detectOriginField(fields: readonly KnownField[]): string | undefined {
  return findField(fields, ORIGIN_HINTS);
}

export function detectDestinationField(fields: readonly KnownField[]): string | undefined {
  return findField(fields, DESTINATION_HINTS);
}

/**
 * Resolve a free-text field token ("status", "ship date") to a known field.
 * Exact normalized match first, then the field name containing the token.
 * `loose` also accepts the token containing the field name.
 */
export function resolveFieldToken(
  fields: readonly KnownField[],
  token: string,
  opts: { loose?: boolean } = {}
): string | undefined {
  const t = norm(token);
  if (!t) return undefined;
  const hit =
    fields.find((f) => norm(f.name) === t) ??
    fields.find((f) => norm(f.name).includes(t)) ??
    (opts.loose ? fields.find((f) => norm(f.name).length >= 3 && t.includes(norm(f.name))) : undefined);
  return hit?.name;
}
