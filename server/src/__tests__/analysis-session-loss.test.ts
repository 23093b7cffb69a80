import { describe, it, expect, vi } from 'vitest';

vi.mock('../lib/logger.js', () => {
  const noopLogger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    child: vi.fn().mockReturnThis(),
  };
  return {
    default: noopLogger,
    createSessionLogger: vi.fn().mockReturnValue(noopLogger),
    maskCredential: (credential: string) => `...${credential.slice(-6)}`,
  };
});

import { createApp, createAppContext } from '../index.js';
import { loadConfig } from '../lib/config.js';
import logger from '../lib/logger.js';
import { SessionStore } from '../lib/session-store.js';
import { FakeUpstream } from './fake-upstream.js';

describe('POST /api/analyze session loss', () => {
  it('warns when the session is evicted before the analysis is stored', async () => {
    const sessions = new SessionStore({ ttlMs: 60_000, maxSessions: 1 });
    const ctx = createAppContext({
      config: loadConfig({}),
      credentials: [],
      client: new FakeUpstream(),
      repository: null,
      verifyToken: null,
      // A second session pushes the request's session out of the only slot.
      extractText: async () => {
        sessions.create();
        return 'Python, React, SQL';
      },
      now: () => new Date('2026-03-01T09:30:00Z'),
    });
    ctx.sessions = sessions;
    const app = createApp(ctx);

    const form = new FormData();
    form.append('resume', new File(['%PDF-1.4 test'], 'cv.pdf', { type: 'application/pdf' }));
    form.append('target_role', 'Full Stack Developer');
    const res = await app.request('http://test/api/analyze', { method: 'POST', body: form });

    expect(res.status).toBe(200);
    expect(logger.warn).toHaveBeenCalledWith(
      { sessionId: expect.any(String) },
      'Session expired during analysis; result not stored',
    );

    const cookie = (res.headers.get('Set-Cookie') ?? '').split(';')[0] ?? '';
    const stored = await app.request('http://test/api/analysis', { headers: { Cookie: cookie } });
    expect(stored.status).toBe(404);
  });
});
