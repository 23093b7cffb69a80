import type { Context, Next } from 'hono';
import { getCookie, setCookie } from 'hono/cookie';
import type { SessionStore } from '../lib/session-store.js';

export const SESSION_COOKIE = 'career_copilot_session';

declare module 'hono' {
  interface ContextVariableMap {
    sessionId: string;
  }
}

export interface SessionMiddlewareOptions {
  ttlMs: number;
  secure: boolean;
}

/**
 * Attaches a session id to every request, issuing a fresh cookie when the
 * browser has none or its session has expired.
 */
export function sessionMiddleware(store: SessionStore, options: SessionMiddlewareOptions) {
  return async (c: Context, next: Next) => {
    const existing = getCookie(c, SESSION_COOKIE);
    let sessionId = existing && store.has(existing) ? existing : null;

    if (!sessionId) {
      sessionId = store.create();
      setCookie(c, SESSION_COOKIE, sessionId, {
        httpOnly: true,
        sameSite: 'Lax',
        secure: options.secure,
        path: '/',
        maxAge: Math.floor(options.ttlMs / 1000),
      });
    }

    c.set('sessionId', sessionId);
    await next();
  };
}
