// apps/cli/src/logger.ts
import pino from 'pino';
import type { CliConfig } from './config';

// logs go to stderr so stdout carries only answers
export function createLogger(config: Pick<CliConfig, 'logLevel' | 'pretty'>) {
  if (config.pretty) {
    return pino({ level: config.logLevel, transport: { target: 'pino-pretty', options: { destination: 2 } } });
  }
  return pino({ level: config.logLevel }, pino.destination(2));
}
