// apps/cli/src/index.ts
import { readFile } from 'node:fs/promises';
import { config as loadEnv } from 'dotenv';
import { MongoStore } from '@shipquery/store-mongo';
import { buildProgram } from './program';

loadEnv();

const program = buildProgram({
  env: process.env,
  openStore: (config, log) => new MongoStore({ ...config.mongo, log }),
  readFile: (path) => readFile(path),
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
  exit: (code) => { process.exitCode = code; },
});

program.parseAsync(process.argv).catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
});
