import logger, { maskCredential } from './logger.js';

/** Longest cooldown remainder `acquire()` is willing to wait out. */
export const MAX_ACQUIRE_WAIT_MS = 5_000;
const WAIT_MARGIN_MS = 100;
/** One wait per acquisition is enough: the horizon already caps it at 5s. */
const MAX_ACQUIRE_WAITS = 1;

export interface KeyPoolOptions {
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export interface KeyPoolStats {
  total_keys: number;
  available_keys: number;
  rate_limited: number;
  total_calls: number;
}

type Selection =
  | { credential: string }
  | { credential: null; waitMs: number | null };

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Shares a fixed set of upstream API keys between concurrent callers.
 *
 * Hands out the least-used key that is not cooling down. Every read and
 * mutation of the cooldown/usage maps runs synchronously, so on the event loop
 * each one is an exclusive critical section; the only suspension point is the
 * short wait in `acquire()`, which happens between two such sections.
 */
export class KeyPool {
  private readonly keys: readonly string[];
  private readonly cooldowns = new Map<string, number>();
  private readonly usageCounts = new Map<string, number>();
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(keys: readonly string[], options: KeyPoolOptions = {}) {
    this.keys = Object.freeze(Array.from(new Set(keys)));
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
    for (const key of this.keys) {
      this.usageCounts.set(key, 0);
    }
  }

  totalCount(): number {
    return this.keys.length;
  }

  availableCount(): number {
    const now = this.now();
    return this.keys.filter((k) => this.isAvailable(k, now)).length;
  }

  usageCount(credential: string): number {
    return this.usageCounts.get(credential) ?? 0;
  }

  /** Epoch ms until which the key is cooling down, or null when usable. */
  cooldownUntil(credential: string): number | null {
    const until = this.cooldowns.get(credential);
    return until !== undefined && until > this.now() ? until : null;
  }

  /**
   * Returns the best available key, or null when every key is cooling down
   * with no relief inside MAX_ACQUIRE_WAIT_MS. An empty pool resolves null
   * without waiting. Keys in `exclude` are neither handed out nor waited for.
   */
  async acquire(exclude: ReadonlySet<string> = new Set()): Promise<string | null> {
    for (let waits = 0; ; waits++) {
      const selection = this.select(exclude);
      if (selection.credential !== null) return selection.credential;
      if (selection.waitMs === null || waits >= MAX_ACQUIRE_WAITS) return null;

      logger.debug({ waitMs: selection.waitMs }, 'All API keys cooling down, waiting for the soonest one');
      await this.sleep(selection.waitMs + WAIT_MARGIN_MS);
    }
  }

  /** A success proves the throttle has lifted: clear any pending cooldown. */
  releaseSuccess(credential: string): void {
    const until = this.cooldowns.get(credential);
    if (until !== undefined && until > this.now()) {
      this.cooldowns.delete(credential);
      logger.info({ key: maskCredential(credential) }, 'API key recovered early');
    }
  }

  /** Last write wins: a shorter cooldown reported later replaces a longer one. */
  releaseThrottled(credential: string, cooldownSeconds: number): void {
    if (!this.usageCounts.has(credential)) return;
    this.cooldowns.set(credential, this.now() + cooldownSeconds * 1000);
    logger.warn({
      key: maskCredential(credential),
      cooldownSeconds,
      available: this.availableCount(),
      total: this.totalCount(),
    }, 'API key rate-limited');
  }

  getStats(): KeyPoolStats {
    const now = this.now();
    const available = this.keys.filter((k) => this.isAvailable(k, now)).length;
    let totalCalls = 0;
    for (const count of this.usageCounts.values()) totalCalls += count;
    return {
      total_keys: this.keys.length,
      available_keys: available,
      rate_limited: this.keys.length - available,
      total_calls: totalCalls,
    };
  }

  private isAvailable(credential: string, now: number): boolean {
    return (this.cooldowns.get(credential) ?? 0) <= now;
  }

  private select(exclude: ReadonlySet<string>): Selection {
    const now = this.now();
    let best: string | null = null;
    let bestUsage = Number.POSITIVE_INFINITY;
    let soonest: number | null = null;

    for (const key of this.keys) {
      if (exclude.has(key)) continue;
      if (this.isAvailable(key, now)) {
        const usage = this.usageCounts.get(key) ?? 0;
        if (usage < bestUsage) {
          best = key;
          bestUsage = usage;
        }
        continue;
      }
      const until = this.cooldowns.get(key) ?? 0;
      if (soonest === null || until < soonest) soonest = until;
    }

    if (best !== null) {
      this.usageCounts.set(best, bestUsage + 1);
      return { credential: best };
    }

    if (soonest !== null && soonest - now <= MAX_ACQUIRE_WAIT_MS) {
      return { credential: null, waitMs: soonest - now };
    }
    return { credential: null, waitMs: null };
  }
}
