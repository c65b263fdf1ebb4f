import {
  EmptyFileError,
  indexCandidates,
  type KnownField,
  type Logger,
  type ShipmentRecord,
  type ShipmentStore,
} from '@shipquery/core';
import { classify } from '@shipquery/catalog';
import { coerceCell } from './coerce';
import { readTable, type Table } from './reader';

export interface IngestRequest {
  bytes: Buffer;
  filename: string;
  mimeType?: string;
  sheetName?: string;
}

export interface IngestContext {
  store: ShipmentStore;
  log?: Logger;
  createIndexes?: boolean; // default true
}

export interface IngestSummary {
  rowsInserted: number;
  columnsDetected: string[];
  roles: KnownField[];
  sheet?: string;
}

/** Classify each column once, then coerce every row into a record. */
export function toRecords(table: Table): { roles: KnownField[]; docs: ShipmentRecord[] } {
  const roles = table.columns.map((name, i) => ({
    name,
    role: classify(name, table.rows.map((r) => r[i])),
  }));
  const docs = table.rows.map((r) => {
    const doc: ShipmentRecord = {};
    roles.forEach((f, i) => { doc[f.name] = coerceCell(f.role, r[i]); });
    return doc;
  });
  return { roles, docs };
}

export async function ingest(req: IngestRequest, ctx: IngestContext): Promise<IngestSummary> {
  const { store, log } = ctx;
  const table = readTable(req.bytes, req.filename, { sheetName: req.sheetName, mimeType: req.mimeType });
  log?.info({ filename: req.filename, format: table.format, sheet: table.sheet, columns: table.columns }, 'ingest-columns');

  if (!table.rows.length) throw new EmptyFileError(req.filename);

  const { roles, docs } = toRecords(table);
  const { insertedCount } = await store.insertMany(docs);
  log?.info({ filename: req.filename, store: store.name, inserted: insertedCount }, 'ingest-inserted');

  if (ctx.createIndexes !== false) {
    const created = await store.ensureIndexes(indexCandidates(table.columns));
    if (created.length) log?.info({ indexes: created }, 'ingest-indexes');
  }

  return {
    rowsInserted: insertedCount,
    columnsDetected: table.columns,
    roles,
    ...(table.sheet ? { sheet: table.sheet } : {}),
  };
}
