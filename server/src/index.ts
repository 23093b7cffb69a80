import { Hono } from 'hono';
import { serve } from '@hono/node-server';
import { cors } from 'hono/cors';
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import { loadConfig, type ServerConfig } from './lib/config.js';
import { loadCredentials } from './lib/credentials.js';
import { KeyPool, type KeyPoolOptions } from './lib/key-pool.js';
import { LlmExecutor } from './lib/llm-executor.js';
import { GroqProvider, type UpstreamClient } from './lib/llm-provider.js';
import { extractResumeText, type ResumeTextExtractor } from './lib/resume-text.js';
import { SessionStore } from './lib/session-store.js';
import { SupabaseAnalysisRepository, type AnalysisRepository } from './lib/analysis-store.js';
import { createSupabaseAdmin, createSupabaseTokenVerifier } from './lib/supabase.js';
import { createAuthMiddleware, type AuthMiddleware, type TokenVerifier } from './middleware/auth.js';
import { getRateLimitStats } from './middleware/rate-limit.js';
import { requestIdMiddleware } from './middleware/request-id.js';
import { sessionMiddleware } from './middleware/session.js';
import { createAnalysisRoutes } from './routes/analysis.js';
import { createHistoryRoutes } from './routes/history.js';
import logger from './lib/logger.js';

/** Everything the routes share, built once per process. */
export interface AppContext {
  config: ServerConfig;
  pool: KeyPool;
  executor: LlmExecutor;
  sessions: SessionStore;
  repository: AnalysisRepository | null;
  auth: AuthMiddleware;
  extractText: ResumeTextExtractor;
  now: () => Date;
}

export interface AppContextOverrides {
  config?: ServerConfig;
  credentials?: string[];
  client?: UpstreamClient;
  poolOptions?: KeyPoolOptions;
  repository?: AnalysisRepository | null;
  verifyToken?: TokenVerifier | null;
  extractText?: ResumeTextExtractor;
  now?: () => Date;
}

/**
 * Composition root: one key pool and one executor for the whole process,
 * handed to every route that talks to the upstream API.
 */
export function createAppContext(overrides: AppContextOverrides = {}): AppContext {
  const config = overrides.config ?? loadConfig();
  const credentials = overrides.credentials ?? loadCredentials(process.env, config.llm.keysFile);
  const pool = new KeyPool(credentials, overrides.poolOptions);
  const client = overrides.client ?? GroqProvider.fromConfig(config.llm);
  const executor = new LlmExecutor(pool, client, { cooldownSeconds: config.llm.cooldownSeconds });

  const needsSupabase = overrides.repository === undefined || overrides.verifyToken === undefined;
  const supabase = needsSupabase ? createSupabaseAdmin(config.supabase) : null;
  const repository = overrides.repository !== undefined
    ? overrides.repository
    : (supabase ? new SupabaseAnalysisRepository(supabase) : null);
  const verifyToken = overrides.verifyToken !== undefined
    ? overrides.verifyToken
    : (supabase ? createSupabaseTokenVerifier(supabase) : null);

  if (pool.totalCount() === 0) {
    logger.warn('No upstream API keys configured: analyses will use keyword mode');
  }

  return {
    config,
    pool,
    executor,
    sessions: new SessionStore({ ttlMs: config.sessionTtlMs }),
    repository,
    auth: createAuthMiddleware(verifyToken),
    extractText: overrides.extractText ?? extractResumeText,
    now: overrides.now ?? (() => new Date()),
  };
}

export interface AppLifecycle {
  shuttingDown: boolean;
}

export function createApp(ctx: AppContext, lifecycle: AppLifecycle = { shuttingDown: false }) {
  const { config, pool, sessions } = ctx;
  const app = new Hono();
  const startTime = Date.now();

  if (config.isProduction && config.allowedOrigins.length === 0) {
    logger.error('ALLOWED_ORIGINS not set in production: all cross-origin requests will be blocked');
  }

  app.use('*', requestIdMiddleware);

  app.use('*', async (c, next) => {
    const requestPath = c.req.path;
    const bypass = requestPath === '/health' || requestPath === '/ready' || requestPath === '/metrics';
    if (lifecycle.shuttingDown && !bypass) {
      return c.json({ error: 'Server is restarting. Please retry shortly.' }, 503);
    }
    await next();
  });

  app.use('*', async (c, next) => {
    await next();
    c.header('X-Content-Type-Options', 'nosniff');
    c.header('X-Frame-Options', 'DENY');
    c.header('Referrer-Policy', 'no-referrer');
    const forwardedProto = c.req.header('x-forwarded-proto')?.split(',')[0]?.trim().toLowerCase();
    const requestIsHttps = forwardedProto === 'https' || new URL(c.req.url).protocol === 'https:';
    if (config.isProduction && requestIsHttps) {
      c.header('Strict-Transport-Security', 'max-age=63072000; includeSubDomains; preload');
    }
  });

  app.use('*', cors({
    origin: config.allowedOrigins,
    credentials: true,
  }));

  app.get('/health', (c) => {
    c.header('Cache-Control', 'no-store');
    const status = lifecycle.shuttingDown
      ? 'draining'
      : (pool.totalCount() > 0 ? 'ok' : 'degraded');
    return c.json({
      status,
      shutting_down: lifecycle.shuttingDown,
      llm: pool.getStats(),
      accounts_enabled: ctx.repository !== null,
      timestamp: new Date().toISOString(),
    });
  });

  app.get('/ready', (c) => {
    c.header('Cache-Control', 'no-store');
    const ready = !lifecycle.shuttingDown && pool.totalCount() > 0;
    return c.json({
      ready,
      shutting_down: lifecycle.shuttingDown,
      llm_keys_ok: pool.totalCount() > 0,
      timestamp: new Date().toISOString(),
    }, ready ? 200 : 503);
  });

  app.get('/metrics', (c) => {
    c.header('Cache-Control', 'no-store');
    if (config.metricsKey) {
      if (c.req.header('Authorization') !== `Bearer ${config.metricsKey}`) {
        return c.json({ error: 'Unauthorized' }, 401);
      }
    } else if (config.isProduction) {
      return c.json({ error: 'Not found' }, 404);
    }

    const memUsage = process.memoryUsage();
    return c.json({
      uptime_seconds: Math.floor((Date.now() - startTime) / 1000),
      shutting_down: lifecycle.shuttingDown,
      key_pool: pool.getStats(),
      rate_limit_runtime: getRateLimitStats(),
      auth_cache_runtime: ctx.auth.cache.stats(),
      active_sessions: sessions.size(),
      memory: {
        rss_mb: Math.round(memUsage.rss / 1024 / 1024),
        heap_used_mb: Math.round(memUsage.heapUsed / 1024 / 1024),
        heap_total_mb: Math.round(memUsage.heapTotal / 1024 / 1024),
      },
      node_version: process.version,
    });
  });

  const api = new Hono();
  api.use('*', sessionMiddleware(sessions, { ttlMs: config.sessionTtlMs, secure: config.isProduction }));
  api.route('/', createAnalysisRoutes({
    executor: ctx.executor,
    sessions,
    extractText: ctx.extractText,
    repository: ctx.repository,
    auth: ctx.auth,
    maxResumeUploadBytes: config.maxResumeUploadBytes,
    trustProxy: config.trustProxy,
    now: ctx.now,
  }));
  api.route('/history', createHistoryRoutes({ repository: ctx.repository, auth: ctx.auth }));
  app.route('/api', api);

  app.notFound((c) => {
    return c.json({ error: 'Not found' }, 404);
  });

  app.onError((err, c) => {
    const requestId = c.get('requestId');
    logger.error({ err, requestId, path: c.req.path, method: c.req.method }, 'Unhandled error');
    return c.json({ error: 'Internal server error', request_id: requestId }, 500);
  });

  return app;
}

let server: ReturnType<typeof serve> | null = null;
const lifecycle: AppLifecycle = { shuttingDown: false };

function shutdown(signal: string) {
  if (lifecycle.shuttingDown) return;
  if (!server) return;
  lifecycle.shuttingDown = true;
  logger.info({ signal }, 'Graceful shutdown initiated');

  // Stop accepting new connections; in-flight requests finish first.
  server.close(() => {
    logger.info('HTTP server closed');
    process.exit(0);
  });

  // Force exit after 10s if connections don't drain
  setTimeout(() => {
    logger.warn('Forcing exit after shutdown timeout');
    process.exit(1);
  }, 10_000).unref();
}

export function startServer(ctx: AppContext = createAppContext()) {
  if (server) return server;

  const { port } = ctx.config;
  const app = createApp(ctx, lifecycle);

  logger.info({ port, keys: ctx.pool.totalCount(), model: ctx.config.llm.model }, 'Career Copilot server starting');
  server = serve({ fetch: app.fetch, port });
  logger.info({ port }, `Server running at http://localhost:${port}`);

  const sweepTimer = setInterval(() => {
    const removed = ctx.sessions.sweep();
    ctx.auth.cache.sweep();
    if (removed > 0) logger.debug({ removed }, 'Expired sessions swept');
  }, 60_000);
  sweepTimer.unref();

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled promise rejection');
    shutdown('UNHANDLED_REJECTION');
  });
  process.on('uncaughtException', (err) => {
    logger.error({ err }, 'Uncaught exception');
    shutdown('UNCAUGHT_EXCEPTION');
  });

  return server;
}

function isMainModule(): boolean {
  const current = fileURLToPath(import.meta.url);
  const entry = process.argv[1];
  if (!entry) return false;
  return path.resolve(entry) === path.resolve(current);
}

if (isMainModule()) {
  startServer();
}
