// packages/present/src/render.ts
import type { CellValue, ExecutionResult, GroupRow, QueryPlan, ShipmentRecord } from '@shipquery/core';

export interface ScalarLine {
  label: string;
  value: string;
}

export interface TableBlock {
  title: string;
  columns: string[];
  rows: string[][];
}

// a scalar may carry the rows behind it (listing questions)
export type Rendered =
  | { kind: 'scalar'; lines: ScalarLine[]; table?: TableBlock }
  | ({ kind: 'table' } & TableBlock)
  | { kind: 'empty'; message: string };

export const EMPTY_MESSAGE = 'No matching shipments';
export const SAMPLE_TITLE = 'Sample matching shipments';

const pad2 = (n: number) => String(n).padStart(2, '0');

export function formatCell(v: CellValue | undefined): string {
  if (v === null || v === undefined) return '';
  if (v instanceof Date) {
    const day = `${v.getFullYear()}-${pad2(v.getMonth() + 1)}-${pad2(v.getDate())}`;
    const midnight = v.getHours() === 0 && v.getMinutes() === 0 && v.getSeconds() === 0;
    return midnight ? day : `${day} ${pad2(v.getHours())}:${pad2(v.getMinutes())}`;
  }
  if (typeof v === 'number') return Number.isInteger(v) ? String(v) : v.toFixed(2);
  return v;
}

const empty = (): Rendered => ({ kind: 'empty', message: EMPTY_MESSAGE });

// union of keys in first-seen order, _id dropped
function columnsOf(rows: ShipmentRecord[]): string[] {
  const cols: string[] = [];
  for (const r of rows) {
    for (const k of Object.keys(r)) if (k !== '_id' && !cols.includes(k)) cols.push(k);
  }
  return cols;
}

function recordTable(title: string, rows: ShipmentRecord[]): TableBlock {
  const columns = columnsOf(rows);
  return { title, columns, rows: rows.map((r) => columns.map((c) => formatCell(r[c]))) };
}

const byValueDesc = (groups: GroupRow[]) => [...groups].sort((a, b) => b.value - a.value);

/** Formats an executed plan for display. Pure; the same inputs always give an equal value. */
export function render(plan: QueryPlan, result: ExecutionResult): Rendered {
  switch (plan.kind) {
    case 'count': {
      if (result.kind !== 'scalar' || result.value === null) return empty();
      const lines = [{ label: 'Shipments matched', value: String(result.value) }];
      if (result.unique !== undefined) lines.push({ label: 'Unique shipments', value: String(result.unique) });
      if (!result.rows?.length) return { kind: 'scalar', lines };
      return { kind: 'scalar', lines, table: recordTable(SAMPLE_TITLE, result.rows) };
    }

    case 'aggregate': {
      if (result.kind !== 'scalar' || result.value === null) return empty();
      const label = `${plan.op === 'sum' ? 'Total' : 'Average'} ${plan.field}`;
      return { kind: 'scalar', lines: [{ label, value: result.value.toFixed(2) }] };
    }

    case 'top_n': {
      if (result.kind !== 'rows' || !result.rows.length) return empty();
      return { kind: 'table', ...recordTable(`Top ${plan.n} by ${plan.field}`, result.rows) };
    }

    case 'grouped_aggregate': {
      if (result.kind !== 'groups' || !result.groups.length) return empty();
      const label =
        plan.op === 'count' || !plan.valueField ? 'Shipments'
        : `${plan.op === 'sum' ? 'Total' : 'Average'} ${plan.valueField}`;
      return {
        kind: 'table',
        title: `${label} by ${plan.groupBy}`,
        columns: [plan.groupBy, label],
        rows: byValueDesc(result.groups).map((g) => [
          formatCell(g.key),
          plan.op === 'count' ? String(g.value) : g.value.toFixed(2)
        ])
      };
    }

    case 'duplicates': {
      if (result.kind !== 'groups' || !result.groups.length) return empty();
      return {
        kind: 'table',
        title: `Duplicate ${plan.field} values`,
        columns: [plan.field, 'count'],
        rows: result.groups.map((g) => [formatCell(g.key), String(g.count)])
      };
    }
  }
}
