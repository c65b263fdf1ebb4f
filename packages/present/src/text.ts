// packages/present/src/text.ts
// Fixed-width plain text for terminals.
import type { Rendered, TableBlock } from './render';

function tableText(t: TableBlock): string {
  const widths = t.columns.map((c, i) => Math.max(c.length, ...t.rows.map((row) => (row[i] ?? '').length)));
  const line = (cells: string[]) => cells.map((c, i) => c.padEnd(widths[i])).join('  ').trimEnd();
  return [
    t.title,
    line(t.columns),
    line(widths.map((w) => '-'.repeat(w))),
    ...t.rows.map(line),
  ].join('\n');
}

export function toText(r: Rendered): string {
  switch (r.kind) {
    case 'empty':
      return r.message;

    case 'scalar': {
      const width = Math.max(...r.lines.map((l) => l.label.length));
      const lines = r.lines.map((l) => `${l.label.padEnd(width)}  ${l.value}`).join('\n');
      return r.table ? `${lines}\n\n${tableText(r.table)}` : lines;
    }

    case 'table':
      return tableText(r);
  }
}
