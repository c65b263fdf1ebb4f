// apps/cli/src/commands/fields.ts
import type { Command } from 'commander';
import { describeFields } from '@shipquery/catalog';
import { withSession, type CliDeps } from '../context';

export const FIELD_SAMPLE = 50;

export function registerFields(program: Command, deps: CliDeps) {
  program
    .command('fields')
    .description('List the fields of the shipments collection with their roles')
    .action(async (_opts: unknown, cmd: Command) => {
      await withSession(cmd, deps, async ({ store }) => {
        const fields = describeFields(await store.sample(FIELD_SAMPLE));
        if (!fields.length) {
          deps.stdout('No shipments loaded');
          return;
        }
        for (const f of fields) deps.stdout(`${f.name.padEnd(24)} ${f.role}`);
      });
    });
}
