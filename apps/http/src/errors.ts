// apps/http/src/errors.ts
import { ZodError } from 'zod';
import { errorMessage, isShipqueryError, type ErrorCode } from '@shipquery/core';

const STATUS: Record<ErrorCode, number> = {
  CONNECTION: 503,
  EMPTY_FILE: 422,
  UNSUPPORTED_FILE: 415,
  VALIDATION: 400,
  INTERNAL: 500,
};

function zodMessage(e: ZodError): string {
  return e.issues.map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message)).join('; ');
}

// Fastify's own client errors (bad JSON, body too large) carry a 4xx statusCode
function clientStatus(e: unknown): number | null {
  if (!(e instanceof Error) || !('statusCode' in e)) return null;
  const s = e.statusCode;
  return typeof s === 'number' && s >= 400 && s < 500 ? s : null;
}

export function classifyError(e: unknown): { code: ErrorCode; status: number; message: string } {
  if (e instanceof ZodError) return { code: 'VALIDATION', status: 400, message: zodMessage(e) };
  if (isShipqueryError(e)) return { code: e.code, status: STATUS[e.code], message: e.message };
  const client = clientStatus(e);
  if (client) return { code: 'VALIDATION', status: client, message: errorMessage(e) };
  return { code: 'INTERNAL', status: 500, message: errorMessage(e) };
}
