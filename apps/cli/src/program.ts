// apps/cli/src/program.ts
import { Command } from 'commander';
import type { CliDeps } from './context';
import { registerIngest } from './commands/ingest';
import { registerAsk } from './commands/ask';
import { registerFields } from './commands/fields';

export function buildProgram(deps: CliDeps): Command {
  const program = new Command();
  program
    .name('shipquery')
    .description('Load shipment spreadsheets and ask questions about them')
    .option('--mongo-uri <uri>', 'MongoDB connection string (default: $MONGO_URI)')
    .option('--db <name>', 'database name (default: $MONGO_DB)')
    .option('--collection <name>', 'collection name (default: $MONGO_COLLECTION)');

  registerIngest(program, deps);
  registerAsk(program, deps);
  registerFields(program, deps);
  return program;
}
