import { randomUUID } from 'node:crypto';
import type { AnalysisReport } from '../agents/types.js';
import type { CoverLetter } from '../agents/cover-letter.js';

export interface SessionData {
  resumeText: string | null;
  fileName: string | null;
  targetRole: string | null;
  analysis: AnalysisReport | null;
  coverLetter: CoverLetter | null;
}

interface SessionEntry {
  data: SessionData;
  expiresAt: number;
}

export interface SessionStoreOptions {
  ttlMs: number;
  maxSessions?: number;
  now?: () => number;
}

const DEFAULT_MAX_SESSIONS = 10_000;

function emptySession(): SessionData {
  return { resumeText: null, fileName: null, targetRole: null, analysis: null, coverLetter: null };
}

/**
 * In-memory browser sessions with a sliding TTL. Reads extend the expiry;
 * expired entries disappear on the next read or sweep. When full, the least
 * recently used session is evicted.
 */
export class SessionStore {
  private readonly sessions = new Map<string, SessionEntry>();
  private readonly ttlMs: number;
  private readonly maxSessions: number;
  private readonly now: () => number;

  constructor(options: SessionStoreOptions) {
    this.ttlMs = options.ttlMs;
    this.maxSessions = options.maxSessions ?? DEFAULT_MAX_SESSIONS;
    this.now = options.now ?? Date.now;
  }

  create(): string {
    while (this.sessions.size >= this.maxSessions) {
      const oldest = this.sessions.keys().next().value;
      if (!oldest) break;
      this.sessions.delete(oldest);
    }
    const id = randomUUID();
    this.sessions.set(id, { data: emptySession(), expiresAt: this.now() + this.ttlMs });
    return id;
  }

  has(id: string): boolean {
    return this.get(id) !== null;
  }

  get(id: string): SessionData | null {
    const entry = this.sessions.get(id);
    if (!entry) return null;
    if (this.now() >= entry.expiresAt) {
      this.sessions.delete(id);
      return null;
    }
    entry.expiresAt = this.now() + this.ttlMs;
    this.sessions.delete(id);
    this.sessions.set(id, entry);
    return entry.data;
  }

  /** Merges `patch` into a live session. Returns false when the session is gone. */
  update(id: string, patch: Partial<SessionData>): boolean {
    const data = this.get(id);
    if (!data) return false;
    Object.assign(data, patch);
    return true;
  }

  delete(id: string): void {
    this.sessions.delete(id);
  }

  sweep(): number {
    const now = this.now();
    let removed = 0;
    for (const [id, entry] of this.sessions) {
      if (now >= entry.expiresAt) {
        this.sessions.delete(id);
        removed += 1;
      }
    }
    return removed;
  }

  size(): number {
    return this.sessions.size;
  }
}
