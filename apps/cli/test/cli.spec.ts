/* apps/cli/test/cli.spec.ts */
import { describe, it, expect, beforeEach } from 'vitest';
import pino from 'pino';
import { MemoryStore, csvBuffer } from '../../../tests/helpers';
import type { CliConfig } from '../src/config';
import { loadConfig } from '../src/config';
import type { CliDeps } from '../src/context';
import { buildProgram } from '../src/program';

const NOW = new Date(2026, 9, 19, 14, 30);

function harness(store: MemoryStore, files: Record<string, Buffer> = {}) {
  const out: string[] = [];
  const err: string[] = [];
  const exits: number[] = [];
  const opened: CliConfig[] = [];
  const deps: CliDeps = {
    env: {},
    openStore: (config) => { opened.push(config); return store; },
    readFile: async (path) => {
      const f = files[path];
      if (!f) throw new Error(`ENOENT: no such file, open '${path}'`);
      return f;
    },
    stdout: (t) => { out.push(t); },
    stderr: (t) => { err.push(t); },
    exit: (code) => { exits.push(code); },
    logger: pino({ level: 'silent' }),
    now: () => NOW,
  };
  const program = buildProgram(deps).exitOverride();
  const run = (...args: string[]) => program.parseAsync(['node', 'shipquery', ...args]);
  return { out, err, exits, opened, run };
}

describe('shipquery CLI', () => {
  let store: MemoryStore;

  beforeEach(() => {
    store = new MemoryStore();
  });

  it('ingests a file and lists detected roles', async () => {
    const h = harness(store, { 'oct.csv': csvBuffer('RefNo,Cost,Status\nR1,10,Delivered\nR2,20,Pending\n') });
    await h.run('ingest', 'oct.csv');
    expect(h.out).toEqual([
      'Inserted 2 rows',
      `  ${'RefNo'.padEnd(24)} identifier`,
      `  ${'Cost'.padEnd(24)} numeric`,
      `  ${'Status'.padEnd(24)} text`,
    ]);
    expect(store.docs).toHaveLength(2);
    expect(store.indexes).toEqual(['RefNo', 'Cost', 'Status']);
    expect(store.closed).toBe(true);
  });

  it('skips indexes with --no-indexes', async () => {
    const h = harness(store, { 'oct.csv': csvBuffer('RefNo,Cost\nR1,10\n') });
    await h.run('ingest', 'oct.csv', '--no-indexes');
    expect(store.indexes).toEqual([]);
  });

  it('answers a question as text', async () => {
    store.docs.push(
      { RefNo: 'R1', Cost: 100, ShipDate: new Date(2026, 9, 2) },
      { RefNo: 'R2', Cost: 50.5, ShipDate: new Date(2026, 9, 3) },
    );
    const h = harness(store);
    await h.run('ask', 'total', 'cost', 'this', 'month');
    expect(h.out).toEqual(['Total Cost  150.50']);
    expect(h.exits).toEqual([]);
  });

  it('prints notices before the answer', async () => {
    store.docs.push({ RefNo: 'R1', Cost: 100 });
    const h = harness(store);
    await h.run('ask', 'how many shipments this month');
    expect(h.out).toEqual([
      'Note: No date field is available, so "this month" was ignored.',
      'Shipments matched  1\nUnique shipments   1',
    ]);
  });

  it('prints JSON with --json', async () => {
    store.docs.push({ RefNo: 'R1', Cost: 100 });
    const h = harness(store);
    await h.run('ask', 'how many shipments', '--json');
    expect(JSON.parse(h.out[0])).toMatchObject({
      plan: { kind: 'count', intent: 'count', uniqueBy: 'RefNo' },
      result: { kind: 'scalar', value: 1, unique: 1 },
    });
  });

  it('lists fields', async () => {
    store.docs.push({ RefNo: 'R1', Cost: 100 });
    const h = harness(store);
    await h.run('fields');
    expect(h.out).toEqual([`${'RefNo'.padEnd(24)} identifier`, `${'Cost'.padEnd(24)} numeric`]);
  });

  it('passes connection flags through to the store config', async () => {
    const h = harness(store);
    await h.run('--db', 'ops', '--collection', 'loads', 'fields');
    expect(h.opened[0].mongo).toMatchObject({ db: 'ops', collection: 'loads', uri: 'mongodb://localhost:27017' });
    expect(h.out).toEqual(['No shipments loaded']);
  });

  it('prints the error and exits 1 when the store is unreachable', async () => {
    const h = harness(new MemoryStore({ unreachable: true }));
    await h.run('fields');
    expect(h.err).toEqual(['Error: memory store unreachable']);
    expect(h.exits).toEqual([1]);
  });

  it('reports an empty file', async () => {
    const h = harness(store, { 'empty.csv': csvBuffer('RefNo\n') });
    await h.run('ingest', 'empty.csv');
    expect(h.err).toEqual(['Error: No rows found in empty.csv']);
    expect(h.exits).toEqual([1]);
    expect(store.closed).toBe(true);
  });
});

describe('cli loadConfig', () => {
  it('lets flags win over the environment', () => {
    const c = loadConfig({ MONGO_URI: 'mongodb://env-host:27017', MONGO_DB: 'envdb' }, { db: 'flagdb' });
    expect(c.mongo).toEqual({ uri: 'mongodb://env-host:27017', db: 'flagdb', collection: 'shipments', timeoutMs: 2000 });
    expect(c.logLevel).toBe('warn');
  });
});
