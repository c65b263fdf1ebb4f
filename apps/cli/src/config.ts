// apps/cli/src/config.ts
import { z } from 'zod';

const EnvSchema = z.object({
  MONGO_URI: z.string().min(1).default('mongodb://localhost:27017'),
  MONGO_DB: z.string().min(1).default('shipments_db'),
  MONGO_COLLECTION: z.string().min(1).default('shipments'),
  MONGO_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('warn'),
  NODE_ENV: z.string().default('development'),
});

export type CliConfig = {
  mongo: { uri: string; db: string; collection: string; timeoutMs: number };
  logLevel: z.infer<typeof EnvSchema>['LOG_LEVEL'];
  pretty: boolean;
};

// command-line flags win over the environment
export interface ConnectionFlags {
  mongoUri?: string;
  db?: string;
  collection?: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, flags: ConnectionFlags = {}): CliConfig {
  const e = EnvSchema.parse(env);
  return {
    mongo: {
      uri: flags.mongoUri ?? e.MONGO_URI,
      db: flags.db ?? e.MONGO_DB,
      collection: flags.collection ?? e.MONGO_COLLECTION,
      timeoutMs: e.MONGO_TIMEOUT_MS,
    },
    logLevel: e.LOG_LEVEL,
    pretty: e.NODE_ENV !== 'production',
  };
}
