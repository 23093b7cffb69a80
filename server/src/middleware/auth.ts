import type { Context, MiddlewareHandler, Next } from 'hono';
import logger from '../lib/logger.js';

export interface AuthUser {
  id: string;
  email: string;
  accessToken: string;
}

declare module 'hono' {
  interface ContextVariableMap {
    user: AuthUser | undefined;
  }
}

/** Resolves a bearer token to its user, or null when the token is invalid or expired. */
export type TokenVerifier = (token: string) => Promise<{ id: string; email: string } | null>;

const TOKEN_CACHE_TTL_MS = 5 * 60 * 1000;
const MAX_TOKEN_CACHE_ENTRIES = 1000;

function decodeJwtExpiryMs(token: string): number | null {
  const payloadPart = token.split('.')[1];
  if (!payloadPart || token.split('.').length !== 3) return null;
  try {
    const decoded = Buffer.from(payloadPart, 'base64url').toString('utf8');
    const parsed: unknown = JSON.parse(decoded);
    if (typeof parsed !== 'object' || parsed === null || !('exp' in parsed)) return null;
    const exp = parsed.exp;
    return typeof exp === 'number' && Number.isFinite(exp) ? Math.floor(exp * 1000) : null;
  } catch {
    return null;
  }
}

interface CacheEntry {
  user: AuthUser;
  expiresAt: number;
}

/**
 * Token → user cache with a 5 minute TTL, never outliving the JWT's own
 * expiry. Bounded LRU: the least recently used token is evicted first.
 */
export class TokenCache {
  private readonly entries = new Map<string, CacheEntry>();
  private hits = 0;
  private misses = 0;

  constructor(private readonly now: () => number = Date.now) {}

  get(token: string): AuthUser | null {
    const entry = this.entries.get(token);
    if (!entry || this.now() >= entry.expiresAt) {
      if (entry) this.entries.delete(token);
      this.misses += 1;
      return null;
    }
    this.entries.delete(token);
    this.entries.set(token, entry);
    this.hits += 1;
    return entry.user;
  }

  set(token: string, user: AuthUser): void {
    const now = this.now();
    const tokenExpMs = decodeJwtExpiryMs(token);
    let expiresAt = now + TOKEN_CACHE_TTL_MS;
    if (tokenExpMs !== null) expiresAt = Math.min(expiresAt, tokenExpMs - 1_000);
    if (expiresAt <= now) return;

    while (this.entries.size >= MAX_TOKEN_CACHE_ENTRIES) {
      const oldest = this.entries.keys().next().value;
      if (!oldest) break;
      this.entries.delete(oldest);
    }
    this.entries.set(token, { user, expiresAt });
  }

  sweep(): void {
    const now = this.now();
    for (const [token, entry] of this.entries) {
      if (now >= entry.expiresAt) this.entries.delete(token);
    }
  }

  stats() {
    const lookups = this.hits + this.misses;
    return {
      active_tokens: this.entries.size,
      cache_hits: this.hits,
      cache_misses: this.misses,
      cache_hit_rate: lookups > 0 ? Number((this.hits / lookups).toFixed(4)) : 0,
    };
  }
}

function bearerToken(c: Context): string | null {
  const header = c.req.header('Authorization');
  if (!header?.startsWith('Bearer ')) return null;
  return header.slice(7).trim() || null;
}

export interface AuthMiddleware {
  /** Rejects the request with 401 unless a valid bearer token is present. */
  required: MiddlewareHandler;
  /** Sets `user` when a valid bearer token is present; anonymous otherwise. */
  optional: MiddlewareHandler;
  cache: TokenCache;
}

/**
 * Builds bearer-token middleware around a verifier. With no verifier
 * (accounts not configured) `required` answers 503 and `optional` passes
 * every request through anonymously.
 */
export function createAuthMiddleware(verify: TokenVerifier | null, cache = new TokenCache()): AuthMiddleware {
  async function resolve(token: string): Promise<AuthUser | null> {
    const cached = cache.get(token);
    if (cached) return cached;
    if (!verify) return null;

    const verified = await verify(token);
    if (!verified) return null;
    const user: AuthUser = { id: verified.id, email: verified.email, accessToken: token };
    cache.set(token, user);
    return user;
  }

  return {
    cache,

    required: async (c: Context, next: Next) => {
      if (!verify) {
        return c.json({ error: 'Accounts are not configured on this server' }, 503);
      }
      const token = bearerToken(c);
      if (!token) {
        return c.json({ error: 'Missing or invalid Authorization header' }, 401);
      }
      const user = await resolve(token);
      if (!user) {
        return c.json({ error: 'Invalid or expired token' }, 401);
      }
      c.set('user', user);
      await next();
    },

    optional: async (c: Context, next: Next) => {
      const token = bearerToken(c);
      if (token && verify) {
        const user = await resolve(token);
        if (user) {
          c.set('user', user);
        } else {
          logger.debug({ path: c.req.path }, 'Ignoring invalid bearer token on optional-auth route');
        }
      }
      await next();
    },
  };
}
