import { randomUUID } from 'node:crypto';
import type { Context, Next } from 'hono';
import type { Logger } from 'pino';
import logger from '../lib/logger.js';

declare module 'hono' {
  interface ContextVariableMap {
    requestId: string;
    log: Logger;
  }
}

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._:-]+$/;

/** Accepts a caller-supplied X-Request-ID when it is short and safe to log, else mints one. */
export function resolveRequestId(raw: string | undefined): string {
  const candidate = raw?.trim().slice(0, 64);
  return candidate && REQUEST_ID_PATTERN.test(candidate) ? candidate : randomUUID();
}

/**
 * Tags the request with an id, echoes it in X-Request-ID, exposes a child
 * logger carrying it, and writes one access log line per request.
 */
export async function requestIdMiddleware(c: Context, next: Next) {
  const requestId = resolveRequestId(c.req.header('X-Request-ID'));
  const log = logger.child({ requestId });
  c.set('requestId', requestId);
  c.set('log', log);
  c.header('X-Request-ID', requestId);

  const startedAt = Date.now();
  await next();
  log.info({
    method: c.req.method,
    path: c.req.path,
    status: c.res.status,
    durationMs: Date.now() - startedAt,
  }, 'Request completed');
}
