// apps/cli/src/commands/ask.ts
import type { Command } from 'commander';
import { AskRequestSchema } from '@shipquery/core';
import { describeFields } from '@shipquery/catalog';
import { translate } from '@shipquery/planner';
import { render, toText } from '@shipquery/present';
import { withSession, type CliDeps } from '../context';
import { FIELD_SAMPLE } from './fields';

interface AskOptions {
  dateField?: string;
  costField?: string;
  json?: boolean;
}

export function registerAsk(program: Command, deps: CliDeps) {
  program
    .command('ask <question...>')
    .description('Answer a plain-English question about the loaded shipments')
    .option('--date-field <name>', 'date field to filter on (default: detected)')
    .option('--cost-field <name>', 'numeric field to aggregate (default: detected)')
    .option('--json', 'print plan, notices and result as JSON')
    .action(async (words: string[], opts: AskOptions, cmd: Command) => {
      await withSession(cmd, deps, async ({ store, log }) => {
        const req = AskRequestSchema.parse({
          question: words.join(' '),
          dateField: opts.dateField,
          costField: opts.costField,
        });
        const fields = describeFields(await store.sample(FIELD_SAMPLE));
        const { plan, notices } = translate(req.question, fields, req, { now: deps.now?.() });
        log.debug({ plan }, 'translated');

        const result = await store.execute(plan);
        const rendered = render(plan, result);
        if (opts.json) {
          deps.stdout(JSON.stringify({ plan, notices, result, rendered }, null, 2));
          return;
        }
        for (const n of notices) deps.stdout(`Note: ${n.message}`);
        deps.stdout(toText(rendered));
      });
    });
}
