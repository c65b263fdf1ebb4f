export { ingest, toRecords } from './service';
export type { IngestRequest, IngestContext, IngestSummary } from './service';
export { readTable, toTable } from './reader';
export type { Table, ReadOptions } from './reader';
export { coerceCell } from './coerce';
export { detectFormat } from './detector';
export type { TableFormat } from './detector';
