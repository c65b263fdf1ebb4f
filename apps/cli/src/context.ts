// apps/cli/src/context.ts
import type { Command } from 'commander';
import { errorMessage, type Logger, type ShipmentStore } from '@shipquery/core';
import { loadConfig, type CliConfig, type ConnectionFlags } from './config';
import { createLogger } from './logger';

export interface CliDeps {
  env: NodeJS.ProcessEnv;
  openStore(config: CliConfig, log: Logger): ShipmentStore;
  readFile(path: string): Promise<Buffer>;
  stdout(text: string): void;
  stderr(text: string): void;
  exit(code: number): void;
  logger?: Logger;
  now?: () => Date;
}

export interface Session {
  config: CliConfig;
  log: Logger;
  store: ShipmentStore;
}

function connectionFlags(cmd: Command): ConnectionFlags {
  const o = cmd.optsWithGlobals();
  const pick = (k: string): string | undefined => {
    const v: unknown = o[k];
    return typeof v === 'string' ? v : undefined;
  };
  return { mongoUri: pick('mongoUri'), db: pick('db'), collection: pick('collection') };
}

/**
 * Runs one command against a freshly opened store. Failures print the message
 * and exit 1; the store is always closed.
 */
export async function withSession(cmd: Command, deps: CliDeps, fn: (s: Session) => Promise<void>): Promise<void> {
  let store: ShipmentStore | undefined;
  let log: Logger | undefined;
  try {
    const config = loadConfig(deps.env, connectionFlags(cmd));
    log = deps.logger ?? createLogger(config);
    store = deps.openStore(config, log);
    await fn({ config, log, store });
  } catch (e: unknown) {
    log?.debug({ err: e }, 'command-failed');
    deps.stderr(`Error: ${errorMessage(e)}`);
    deps.exit(1);
  } finally {
    await store?.close();
  }
}
