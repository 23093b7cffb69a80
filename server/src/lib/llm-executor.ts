import type { KeyPool } from './key-pool.js';
import type { ChatRequest, UpstreamClient } from './llm-provider.js';
import {
  ConfigurationError,
  PoolExhaustedError,
  RetriesExhaustedError,
  UpstreamError,
} from './llm-errors.js';
import logger, { maskCredential } from './logger.js';

export const DEFAULT_COOLDOWN_SECONDS = 60;

export interface ExecutionResult {
  text: string;
  attempts: number;
}

export interface LlmExecutorOptions {
  cooldownSeconds?: number;
}

/**
 * Runs one logical upstream call, rotating to another key when the current
 * one is throttled. Holds no per-call state, so a single instance is shared
 * by every request.
 */
export class LlmExecutor {
  private readonly cooldownSeconds: number;

  constructor(
    private readonly pool: KeyPool,
    private readonly client: UpstreamClient,
    options: LlmExecutorOptions = {},
  ) {
    this.cooldownSeconds = options.cooldownSeconds ?? DEFAULT_COOLDOWN_SECONDS;
  }

  async run(request: ChatRequest): Promise<ExecutionResult> {
    // At least one attempt so an empty pool reports a configuration error.
    const maxAttempts = Math.max(this.pool.totalCount(), 1);
    let attempts = 0;
    let lastDetail: string | null = null;
    // A throttled key is never retried within the same call.
    const tried = new Set<string>();

    while (attempts < maxAttempts) {
      const credential = await this.pool.acquire(tried);
      if (!credential) {
        if (this.pool.totalCount() === 0) {
          throw new ConfigurationError('No upstream API keys configured (set GROQ_API_KEY)', attempts);
        }
        throw new PoolExhaustedError(attempts, lastDetail);
      }

      attempts += 1;
      tried.add(credential);
      const outcome = await this.client.complete(credential, request);

      switch (outcome.kind) {
        case 'success':
          this.pool.releaseSuccess(credential);
          return { text: outcome.text, attempts };

        case 'throttled':
          lastDetail = outcome.detail;
          this.pool.releaseThrottled(credential, this.cooldownSeconds);
          logger.warn({
            key: maskCredential(credential),
            attempt: attempts,
            maxAttempts,
            retryAfterSeconds: outcome.retryAfterSeconds,
          }, 'Upstream throttled, rotating to next key');
          break;

        case 'failure':
          logger.error({
            provider: this.client.name,
            attempt: attempts,
            status: outcome.status,
            detail: outcome.detail,
          }, 'Upstream call failed');
          throw new UpstreamError(outcome.detail, attempts, outcome.status);
      }
    }

    throw new RetriesExhaustedError(attempts, lastDetail ?? 'rate limited');
  }
}
