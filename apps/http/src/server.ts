// apps/http/src/server.ts
import Fastify, { type FastifyBaseLogger, type FastifyInstance, type FastifyRequest } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import multipart from '@fastify/multipart';
import {
  AskRequestSchema,
  IngestQuerySchema,
  ShipqueryError,
  type KnownField,
  type ShipmentStore,
  type Translation,
} from '@shipquery/core';
import { describeFields } from '@shipquery/catalog';
import { ingest } from '@shipquery/ingest';
import { translate } from '@shipquery/planner';
import { render } from '@shipquery/present';
import type { HttpConfig } from './config';
import { classifyError } from './errors';

export interface ServerContext {
  store: ShipmentStore;
  config: HttpConfig;
  logger?: FastifyBaseLogger;
  now?: () => Date; // fixed clock for tests
}

// documents read to discover the field set
export const FIELD_SAMPLE = 50;

const genReqId = () => `req-${Math.random().toString(36).slice(2, 10)}`;

function shouldDebug(req: FastifyRequest, config: HttpConfig): boolean {
  const q = req.query;
  const flag = q && typeof q === 'object' && 'debug' in q ? String(q.debug) : '';
  return flag === '1' || req.headers['x-debug'] === '1' || config.debugErrors;
}

export async function buildServer(ctx: ServerContext): Promise<FastifyInstance> {
  const { store, config } = ctx;
  const app = Fastify({
    logger: ctx.logger ?? { level: config.logLevel },
    requestIdHeader: 'x-request-id',
    genReqId,
    bodyLimit: 1_000_000,
  });

  await app.register(cors, {
    origin: (origin, cb) => {
      const allow = config.corsOrigins;
      if (!origin || allow.length === 0 || allow.includes(origin)) return cb(null, true);
      cb(new Error('CORS not allowed'), false);
    },
    credentials: true
  });

  await app.register(rateLimit, {
    max: 600,
    timeWindow: '1 minute',
  });

  await app.register(multipart, {
    limits: { fileSize: config.maxUploadBytes, files: 1 }
  });

  app.addHook('onSend', async (req, reply, payload) => {
    reply.header('x-request-id', req.id);
    return payload;
  });

  app.setErrorHandler((err: Error, req, reply) => {
    const { code, status, message } = classifyError(err);
    if (status >= 500) req.log.error({ err, requestId: req.id, code }, 'request-error');
    else req.log.warn({ requestId: req.id, code, error: message }, 'request-rejected');
    reply.status(status).send({
      code,
      message: 'Request failed',
      error: message,
      requestId: req.id,
      ...(shouldDebug(req, config) ? { trace: { errorCode: code } } : {})
    });
  });

  const knownFields = async (): Promise<KnownField[]> => describeFields(await store.sample(FIELD_SAMPLE));

  async function translateBody(body: unknown): Promise<Translation> {
    const { question, dateField, costField } = AskRequestSchema.parse(body);
    const fields = await knownFields();
    return translate(question, fields, { dateField, costField }, { now: ctx.now?.() });
  }

  app.post('/ingest', async (req) => {
    const query = IngestQuerySchema.parse(req.query);
    const file = await req.file();
    if (!file) throw new ShipqueryError('VALIDATION', 'multipart field "file" is required');
    const bytes = await file.toBuffer();

    const summary = await ingest(
      { bytes, filename: file.filename, mimeType: file.mimetype, sheetName: query.sheet },
      { store, log: req.log }
    );
    return summary;
  });

  app.get('/fields', async () => ({ fields: await knownFields() }));

  app.post('/translate', async (req) => {
    const { plan, notices } = await translateBody(req.body);
    req.log.info({ kind: plan.kind, notices: notices.map((n) => n.code) }, 'translated');
    return { plan, notices };
  });

  app.post('/ask', async (req) => {
    const { plan, notices } = await translateBody(req.body);
    const t0 = Date.now();
    const result = await store.execute(plan);
    req.log.info({ kind: plan.kind, store: store.name, ms: Date.now() - t0 }, 'executed');
    return { plan, notices, result, rendered: render(plan, result) };
  });

  app.get('/healthz', async () => ({ ok: true }));

  app.get('/readyz', async () => {
    const health = await store.health();
    return { ok: health.ok, store: { name: store.name, ...health } };
  });

  return app;
}
