/* tests/helpers.ts */
// In-process ShipmentStore for tests: same contract as MongoStore, no server.
import * as XLSX from 'xlsx';
import {
  ConnectionError,
  type CellValue,
  type Condition,
  type ExecutionResult,
  type GroupRow,
  type InsertSummary,
  type PlanFilter,
  type QueryPlan,
  type ShipmentRecord,
  type ShipmentStore,
} from '@shipquery/core';

function num(v: CellValue | undefined): number {
  return typeof v === 'number' ? v : 0;
}

function matchesCondition(doc: ShipmentRecord, c: Condition): boolean {
  const v = doc[c.field];
  switch (c.op) {
    case 'eq': return v === c.value;
    case 'in': return typeof v === 'string' && c.value.some((x) => x.toLowerCase() === v.toLowerCase());
    case 'gt': return typeof v === 'number' && v > c.value;
    case 'gte': return typeof v === 'number' && v >= c.value;
    case 'lt': return typeof v === 'number' && v < c.value;
    case 'lte': return typeof v === 'number' && v <= c.value;
    case 'contains': return typeof v === 'string' && v.toLowerCase().includes(c.value.toLowerCase());
  }
}

export function matchesFilter(doc: ShipmentRecord, f: PlanFilter): boolean {
  if (f.dateRange) {
    const v = doc[f.dateRange.field];
    if (!(v instanceof Date) || v < f.dateRange.start || v >= f.dateRange.end) return false;
  }
  return f.conditions.every((c) => matchesCondition(doc, c));
}

function groupBy(docs: ShipmentRecord[], field: string, valueOf: (d: ShipmentRecord) => number): GroupRow[] {
  const groups = new Map<string, GroupRow>();
  for (const d of docs) {
    const key = d[field] ?? null;
    const id = key instanceof Date ? key.toISOString() : String(key);
    const g = groups.get(id) ?? { key, value: 0, count: 0 };
    g.value += valueOf(d);
    g.count += 1;
    groups.set(id, g);
  }
  return [...groups.values()];
}

export class MemoryStore implements ShipmentStore {
  name = 'memory';
  docs: ShipmentRecord[] = [];
  indexes: string[] = [];
  executed: QueryPlan[] = [];
  closed = false;

  constructor(private opts: { unreachable?: boolean } = {}) {}

  private guard(): void {
    if (this.opts.unreachable) throw new ConnectionError('memory store unreachable');
  }

  async insertMany(docs: ShipmentRecord[]): Promise<InsertSummary> {
    this.guard();
    this.docs.push(...docs.map((d) => ({ ...d })));
    return { insertedCount: docs.length };
  }

  async ensureIndexes(fields: string[]): Promise<string[]> {
    this.guard();
    this.indexes.push(...fields);
    return fields;
  }

  async sample(limit: number): Promise<ShipmentRecord[]> {
    this.guard();
    return this.docs.slice(0, limit);
  }

  async execute(plan: QueryPlan): Promise<ExecutionResult> {
    this.guard();
    this.executed.push(plan);
    const hits = this.docs.filter((d) => matchesFilter(d, plan.filter));

    switch (plan.kind) {
      case 'count': {
        const unique = plan.uniqueBy
          ? new Set(hits.map((d) => d[plan.uniqueBy ?? '']).filter((v) => v !== null && v !== '')).size
          : undefined;
        return {
          kind: 'scalar',
          value: hits.length,
          ...(unique !== undefined ? { unique } : {}),
          ...(plan.sample ? { rows: hits.slice(0, plan.sample) } : {})
        };
      }
      case 'aggregate': {
        if (!hits.length) return { kind: 'scalar', value: null };
        const total = hits.reduce((s, d) => s + num(d[plan.field]), 0);
        return { kind: 'scalar', value: plan.op === 'sum' ? total : total / hits.length };
      }
      case 'top_n': {
        const rows = [...hits].sort((a, b) => num(b[plan.field]) - num(a[plan.field])).slice(0, plan.n);
        return { kind: 'rows', rows };
      }
      case 'grouped_aggregate': {
        const field = plan.valueField;
        const groups = groupBy(hits, plan.groupBy, (d) => (plan.op === 'count' || !field ? 1 : num(d[field])))
          .map((g) => (plan.op === 'avg' ? { ...g, value: g.value / g.count } : g))
          .sort((a, b) => b.value - a.value);
        return { kind: 'groups', groups };
      }
      case 'duplicates': {
        const keyed = hits.filter((d) => d[plan.field] !== null && d[plan.field] !== undefined && d[plan.field] !== '');
        const groups = groupBy(keyed, plan.field, () => 1)
          .filter((g) => g.count > 1)
          .sort((a, b) => b.count - a.count)
          .slice(0, plan.limit);
        return { kind: 'groups', groups };
      }
    }
  }

  async health(): Promise<{ ok: boolean; error?: string }> {
    return this.opts.unreachable ? { ok: false, error: 'unreachable' } : { ok: true };
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/** Build an .xlsx workbook in memory from a header row and data rows. */
export function xlsxBuffer(rows: unknown[][], sheetName = 'Sheet1'): Buffer {
  const wb = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(wb, XLSX.utils.aoa_to_sheet(rows, { cellDates: true }), sheetName);
  const out: unknown = XLSX.write(wb, { type: 'buffer', bookType: 'xlsx' });
  if (!Buffer.isBuffer(out)) throw new Error('xlsx write did not return a buffer');
  return out;
}

export function csvBuffer(text: string): Buffer {
  return Buffer.from(text, 'utf8');
}

const BOUNDARY = '----shipquery-test-boundary';

/** A multipart/form-data body carrying one file part, for fastify.inject(). */
export function multipartFile(
  filename: string,
  bytes: Buffer,
  contentType = 'application/octet-stream',
  field = 'file'
): { payload: Buffer; headers: Record<string, string> } {
  const head = Buffer.from(
    `--${BOUNDARY}\r\nContent-Disposition: form-data; name="${field}"; filename="${filename}"\r\n` +
    `Content-Type: ${contentType}\r\n\r\n`
  );
  const tail = Buffer.from(`\r\n--${BOUNDARY}--\r\n`);
  return {
    payload: Buffer.concat([head, bytes, tail]),
    headers: { 'content-type': `multipart/form-data; boundary=${BOUNDARY}` }
  };
}
