// apps/cli/src/commands/ingest.ts
import type { Command } from 'commander';
import { ingest } from '@shipquery/ingest';
import { withSession, type CliDeps } from '../context';

export function registerIngest(program: Command, deps: CliDeps) {
  program
    .command('ingest <file>')
    .description('Load an .xlsx/.xls/.csv file into the shipments collection')
    .option('--sheet <name>', 'worksheet to read (default: first sheet)')
    .option('--no-indexes', 'skip creating indexes on likely query fields')
    .action(async (file: string, opts: { sheet?: string; indexes: boolean }, cmd: Command) => {
      await withSession(cmd, deps, async ({ store, log }) => {
        const bytes = await deps.readFile(file);
        const summary = await ingest(
          { bytes, filename: file, sheetName: opts.sheet },
          { store, log, createIndexes: opts.indexes }
        );
        deps.stdout(`Inserted ${summary.rowsInserted} rows${summary.sheet ? ` from sheet ${summary.sheet}` : ''}`);
        for (const f of summary.roles) deps.stdout(`  ${f.name.padEnd(24)} ${f.role}`);
      });
    });
}
