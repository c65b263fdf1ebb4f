// packages/store-mongo/src/store.ts
import {
  MongoClient,
  MongoNetworkError,
  MongoServerSelectionError,
  type Collection,
  type Document,
} from 'mongodb';
import {
  ConnectionError,
  errorMessage,
  type CellValue,
  type CountPlan,
  type ExecutionResult,
  type GroupRow,
  type InsertSummary,
  type Logger,
  type QueryPlan,
  type ShipmentRecord,
  type ShipmentStore,
} from '@shipquery/core';
import { compilePlan, compileSample } from './compile';

export interface MongoStoreConfig {
  uri: string;
  db: string;
  collection: string;
  timeoutMs?: number; // serverSelectionTimeoutMS
  log?: Logger;
}

const isUnreachable = (e: unknown) =>
  e instanceof MongoServerSelectionError || e instanceof MongoNetworkError;

function toCell(v: unknown): CellValue {
  if (v === null || v === undefined) return null;
  if (typeof v === 'string' || typeof v === 'number' || v instanceof Date) return v;
  return String(v);
}

function toRecord(doc: Document): ShipmentRecord {
  const out: ShipmentRecord = {};
  for (const [k, v] of Object.entries(doc)) {
    if (k !== '_id') out[k] = toCell(v);
  }
  return out;
}

const numberOr = <T>(v: unknown, fallback: T): number | T => (typeof v === 'number' ? v : fallback);

function toGroupRow(doc: Document): GroupRow {
  return { key: toCell(doc.key), value: numberOr(doc.value, 0), count: numberOr(doc.count, 0) };
}

/** ShipmentStore on one MongoDB collection. The client connects lazily on first use. */
export class MongoStore implements ShipmentStore {
  name = 'mongodb';
  private client: MongoClient;
  private cfg: MongoStoreConfig;

  constructor(cfg: MongoStoreConfig) {
    this.cfg = cfg;
    this.client = new MongoClient(cfg.uri, { serverSelectionTimeoutMS: cfg.timeoutMs ?? 2000 });
  }

  private get coll(): Collection<Document> {
    return this.client.db(this.cfg.db).collection(this.cfg.collection);
  }

  // driver connectivity failures become ConnectionError; everything else propagates
  private async run<T>(op: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (e: unknown) {
      if (!isUnreachable(e)) throw e;
      this.cfg.log?.error({ op, db: this.cfg.db, error: errorMessage(e) }, 'mongo-unreachable');
      throw new ConnectionError(`Cannot reach MongoDB at ${this.cfg.uri}: ${errorMessage(e)}`, { cause: e });
    }
  }

  async connect(): Promise<void> {
    await this.run('connect', async () => { await this.client.connect(); });
  }

  async insertMany(docs: ShipmentRecord[]): Promise<InsertSummary> {
    return this.run('insertMany', async () => {
      // driver writes _id back into inserted objects
      const res = await this.coll.insertMany(docs.map((d) => ({ ...d })));
      return { insertedCount: res.insertedCount };
    });
  }

  async ensureIndexes(fields: string[]): Promise<string[]> {
    const created: string[] = [];
    for (const field of fields) {
      try {
        await this.run('createIndex', () => this.coll.createIndex({ [field]: 1 }));
        created.push(field);
      } catch (e: unknown) {
        if (e instanceof ConnectionError) throw e;
        this.cfg.log?.warn({ field, error: errorMessage(e) }, 'index-failed');
      }
    }
    return created;
  }

  async sample(limit: number): Promise<ShipmentRecord[]> {
    return this.run('sample', async () => {
      const docs = await this.coll.find({}, { projection: { _id: 0 } }).limit(limit).toArray();
      return docs.map(toRecord);
    });
  }

  async execute(plan: QueryPlan): Promise<ExecutionResult> {
    const pipeline = compilePlan(plan);
    this.cfg.log?.debug({ kind: plan.kind, pipeline }, 'mongo-pipeline');
    const docs = await this.run('aggregate', () => this.coll.aggregate(pipeline, { allowDiskUse: true }).toArray());

    switch (plan.kind) {
      case 'count': {
        const [row] = docs;
        const value = row ? numberOr(row.total, 0) : 0;
        const rows = plan.sample ? await this.listing(plan) : undefined;
        return {
          kind: 'scalar',
          value,
          ...(plan.uniqueBy ? { unique: row ? numberOr(row.unique, 0) : 0 } : {}),
          ...(rows ? { rows } : {})
        };
      }
      case 'aggregate': {
        const [row] = docs;
        return { kind: 'scalar', value: row ? numberOr(row.value, null) : null };
      }
      case 'top_n':
        return { kind: 'rows', rows: docs.map(toRecord) };
      case 'grouped_aggregate':
      case 'duplicates':
        return { kind: 'groups', groups: docs.map(toGroupRow) };
    }
  }

  private async listing(plan: CountPlan): Promise<ShipmentRecord[]> {
    const pipeline = compileSample(plan);
    const docs = await this.run('aggregate', () => this.coll.aggregate(pipeline).toArray());
    return docs.map(toRecord);
  }

  async health(): Promise<{ ok: boolean; error?: string }> {
    try {
      await this.client.db(this.cfg.db).command({ ping: 1 });
      return { ok: true };
    } catch (e: unknown) {
      return { ok: false, error: errorMessage(e) };
    }
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}
