// apps/http/src/config.ts
import { z } from 'zod';

const csv = z
  .string()
  .optional()
  .transform((v) => (v ?? '').split(',').map((s) => s.trim()).filter(Boolean));

const EnvSchema = z.object({
  MONGO_URI: z.string().min(1).default('mongodb://localhost:27017'),
  MONGO_DB: z.string().min(1).default('shipments_db'),
  MONGO_COLLECTION: z.string().min(1).default('shipments'),
  MONGO_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),
  PORT: z.coerce.number().int().min(0).max(65535).default(4000),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CORS_ORIGIN: csv,
  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(20_000_000),
  DEBUG_ERRORS: z.string().optional().transform((v) => v === '1' || v === 'true'),
  NODE_ENV: z.string().default('development'),
});

export type HttpConfig = {
  mongo: { uri: string; db: string; collection: string; timeoutMs: number };
  port: number;
  host: string;
  logLevel: z.infer<typeof EnvSchema>['LOG_LEVEL'];
  corsOrigins: string[];
  maxUploadBytes: number;
  debugErrors: boolean;
  pretty: boolean;
};

/** Parse the environment once. Throws a ZodError naming the bad variables. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): HttpConfig {
  const e = EnvSchema.parse(env);
  return {
    mongo: { uri: e.MONGO_URI, db: e.MONGO_DB, collection: e.MONGO_COLLECTION, timeoutMs: e.MONGO_TIMEOUT_MS },
    port: e.PORT,
    host: e.HOST,
    logLevel: e.LOG_LEVEL,
    corsOrigins: e.CORS_ORIGIN,
    maxUploadBytes: e.MAX_UPLOAD_BYTES,
    debugErrors: e.DEBUG_ERRORS,
    pretty: e.NODE_ENV !== 'production',
  };
}
