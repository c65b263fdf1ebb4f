// apps/http/src/index.ts
import { config as loadEnv } from 'dotenv';
import pino from 'pino';
import { MongoStore } from '@shipquery/store-mongo';
import { loadConfig } from './config';
import { buildServer } from './server';

async function main() {
  loadEnv();
  const config = loadConfig();
  const logger = pino({
    level: config.logLevel,
    ...(config.pretty ? { transport: { target: 'pino-pretty' } } : {})
  });

  const store = new MongoStore({ ...config.mongo, log: logger });
  const app = await buildServer({ store, config, logger });

  app.log.info(
    {
      mongo_uri: process.env.MONGO_URI ? 'env:MONGO_URI' : 'default',
      mongo_db: config.mongo.db,
      collection: config.mongo.collection,
    },
    'store-config'
  );

  const onShutdown = async (signal: string) => {
    app.log.info({ signal }, 'shutting-down');
    try {
      await Promise.allSettled([store.close(), app.close()]);
    } finally {
      process.exit(0);
    }
  };
  process.on('SIGINT', () => void onShutdown('SIGINT'));
  process.on('SIGTERM', () => void onShutdown('SIGTERM'));

  await app.listen({ port: config.port, host: config.host });
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Fatal boot error', err);
  process.exit(1);
});
