import type { Context, Next } from 'hono';
import logger from '../lib/logger.js';

interface RateLimitEntry {
  count: number;
  resetAt: number;
}

export interface RateLimitOptions {
  /** Key anonymous callers by the first X-Forwarded-For hop. */
  trustProxy?: boolean;
}

const MAX_RATE_LIMIT_BUCKETS = 50_000;
const MAX_DENIED_SCOPE_ENTRIES = 200;

const buckets = new Map<string, RateLimitEntry>();
const deniedByScope = new Map<string, number>();
let allowedDecisions = 0;
let deniedDecisions = 0;

function trimKeySegment(value: string, maxLen = 128): string {
  const trimmed = value.trim();
  return trimmed.length > maxLen ? trimmed.slice(0, maxLen) : trimmed;
}

const cleanupTimer = setInterval(() => {
  const now = Date.now();
  for (const [key, entry] of buckets) {
    if (now >= entry.resetAt) buckets.delete(key);
  }
}, 60_000);
cleanupTimer.unref();

export function getRateLimitStats() {
  const topDeniedScopes = Array.from(deniedByScope.entries())
    .sort((a, b) => b[1] - a[1])
    .slice(0, 10)
    .map(([scope, count]) => ({ scope, count }));
  return {
    active_buckets: buckets.size,
    max_buckets: MAX_RATE_LIMIT_BUCKETS,
    allowed_decisions: allowedDecisions,
    denied_decisions: deniedDecisions,
    denied_by_scope: topDeniedScopes,
  };
}

// Test-only helper to avoid cross-test leakage from module-level state.
export function resetRateLimitStateForTests() {
  buckets.clear();
  deniedByScope.clear();
  allowedDecisions = 0;
  deniedDecisions = 0;
}

function recordDenied(scope: string): void {
  deniedDecisions += 1;
  deniedByScope.set(scope, (deniedByScope.get(scope) ?? 0) + 1);
  while (deniedByScope.size > MAX_DENIED_SCOPE_ENTRIES) {
    const oldest = deniedByScope.keys().next().value;
    if (!oldest) break;
    deniedByScope.delete(oldest);
  }
}

function identify(c: Context, scope: string, trustProxy: boolean): string {
  const user = c.get('user');
  if (user?.id) return `user:${trimKeySegment(user.id, 64)}:${scope}`;
  if (trustProxy) {
    const forwarded = trimKeySegment(c.req.header('x-forwarded-for')?.split(',')[0] ?? '') || 'anonymous';
    return `ip:${forwarded}:${scope}`;
  }
  return `anonymous:${scope}`;
}

/**
 * Fixed-window in-memory rate limiter, one bucket per caller per method+path.
 * Callers are the authenticated user when one is set on the context, else the
 * forwarded client IP behind a trusted proxy, else a shared anonymous bucket.
 */
export function rateLimitMiddleware(maxRequests: number, windowMs: number, options: RateLimitOptions = {}) {
  const trustProxy = options.trustProxy ?? false;

  return async (c: Context, next: Next) => {
    const scope = `${c.req.method}:${c.req.path}`;
    const key = identify(c, scope, trustProxy);
    const now = Date.now();
    let entry = buckets.get(key);

    if (!entry || now >= entry.resetAt) {
      while (buckets.size >= MAX_RATE_LIMIT_BUCKETS) {
        const oldest = buckets.keys().next().value;
        if (!oldest) break;
        buckets.delete(oldest);
      }
      entry = { count: 0, resetAt: now + windowMs };
      buckets.set(key, entry);
    } else {
      // Refresh insertion order so the least recently used buckets go first.
      buckets.delete(key);
      buckets.set(key, entry);
    }

    entry.count++;
    const resetSeconds = Math.max(1, Math.ceil((entry.resetAt - now) / 1000));
    c.header('X-RateLimit-Limit', String(maxRequests));
    c.header('X-RateLimit-Remaining', String(Math.max(0, maxRequests - entry.count)));
    c.header('X-RateLimit-Reset', String(resetSeconds));

    if (entry.count > maxRequests) {
      recordDenied(scope);
      c.header('Retry-After', String(resetSeconds));
      logger.warn({ key, scope, count: entry.count, max: maxRequests }, 'Rate limit exceeded');
      return c.json({ error: 'Too many requests. Please try again later.' }, 429);
    }

    allowedDecisions += 1;
    await next();
  };
}
