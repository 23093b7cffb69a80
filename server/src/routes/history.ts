import { Hono, type Context } from 'hono';
import type { AnalysisRepository } from '../lib/analysis-store.js';
import type { AuthMiddleware } from '../middleware/auth.js';

const DEFAULT_LIMIT = 20;
const MAX_LIMIT = 100;

export interface HistoryRouteDeps {
  repository: AnalysisRepository | null;
  auth: AuthMiddleware;
}

function parseLimit(raw: string | undefined): number {
  const parsed = Number.parseInt(raw ?? '', 10);
  if (!Number.isFinite(parsed) || parsed <= 0) return DEFAULT_LIMIT;
  return Math.min(parsed, MAX_LIMIT);
}

function historyUnavailable(c: Context) {
  return c.json({ error: 'History is not available on this server' }, 503);
}

export function createHistoryRoutes(deps: HistoryRouteDeps) {
  const { repository, auth } = deps;
  const history = new Hono();

  history.use('*', async (c, next) => {
    if (!repository) return historyUnavailable(c);
    await next();
  });
  history.use('*', auth.required);

  // GET /history — The user's past analyses, newest first
  history.get('/', async (c) => {
    const user = c.get('user');
    if (!repository) return historyUnavailable(c);
    if (!user) return c.json({ error: 'Unauthorized' }, 401);
    try {
      const analyses = await repository.listAnalyses(user.id, parseLimit(c.req.query('limit')));
      return c.json({ analyses });
    } catch (err) {
      c.get('log').error({ userId: user.id, error: err instanceof Error ? err.message : String(err) }, 'Failed to load analysis history');
      return c.json({ error: 'Failed to load history' }, 500);
    }
  });

  // GET /history/audit — The user's audit trail, newest first
  history.get('/audit', async (c) => {
    const user = c.get('user');
    if (!repository) return historyUnavailable(c);
    if (!user) return c.json({ error: 'Unauthorized' }, 401);
    try {
      const logs = await repository.listAuditLogs(user.id, parseLimit(c.req.query('limit')));
      return c.json({ logs });
    } catch (err) {
      c.get('log').error({ userId: user.id, error: err instanceof Error ? err.message : String(err) }, 'Failed to load audit logs');
      return c.json({ error: 'Failed to load audit logs' }, 500);
    }
  });

  return history;
}
