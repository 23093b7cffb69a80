import { classifyHttpFailure, classifyThrownFailure, type CallOutcome } from './upstream-failure.js';
import type { LlmConfig } from './config.js';

// ─── Shared interfaces ───────────────────────────────────────────────

export interface ChatRequest {
  /** Fixed system instructions. */
  system: string;
  /** Fully rendered user prompt. */
  prompt: string;
  temperature?: number;
  maxTokens?: number;
}

/**
 * The one capability the executor needs from an upstream binding: call with
 * a given credential and report a tagged outcome. Implementations never
 * throw for upstream failures.
 */
export interface UpstreamClient {
  readonly name: string;
  complete(credential: string, request: ChatRequest): Promise<CallOutcome>;
}

type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

function createTimeoutSignal(timeoutMs: number): { signal: AbortSignal; cleanup: () => void } {
  const controller = new AbortController();
  const timeout = setTimeout(() => {
    controller.abort(new Error(`Timed out after ${timeoutMs}ms`));
  }, timeoutMs);
  timeout.unref?.();
  return {
    signal: controller.signal,
    cleanup: () => clearTimeout(timeout),
  };
}

// ─── Groq provider (OpenAI-compatible) ───────────────────────────────

export interface GroqProviderOptions {
  baseUrl: string;
  model: string;
  timeoutMs: number;
  maxTokens: number;
  temperature: number;
  fetch?: FetchLike;
}

export class GroqProvider implements UpstreamClient {
  readonly name = 'groq';
  private readonly baseUrl: string;
  private readonly model: string;
  private readonly timeoutMs: number;
  private readonly maxTokens: number;
  private readonly temperature: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: GroqProviderOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.model = options.model;
    this.timeoutMs = options.timeoutMs;
    this.maxTokens = options.maxTokens;
    this.temperature = options.temperature;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  static fromConfig(config: LlmConfig, fetchImpl?: FetchLike): GroqProvider {
    return new GroqProvider({
      baseUrl: config.baseUrl,
      model: config.model,
      timeoutMs: config.timeoutMs,
      maxTokens: config.maxTokens,
      temperature: config.temperature,
      fetch: fetchImpl,
    });
  }

  async complete(credential: string, request: ChatRequest): Promise<CallOutcome> {
    const { signal, cleanup } = createTimeoutSignal(this.timeoutMs);
    try {
      const response = await this.fetchImpl(`${this.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Authorization': `Bearer ${credential}`,
        },
        body: JSON.stringify({
          model: this.model,
          messages: [
            { role: 'system', content: request.system },
            { role: 'user', content: request.prompt },
          ],
          temperature: request.temperature ?? this.temperature,
          max_tokens: request.maxTokens ?? this.maxTokens,
        }),
        signal,
      });

      if (!response.ok) {
        const errText = await response.text().catch(() => '');
        return classifyHttpFailure(response.status, errText, response.headers);
      }

      const data = await response.json() as OpenAIChatResponse;
      const text = data.choices?.[0]?.message?.content;
      if (typeof text !== 'string') {
        return { kind: 'failure', detail: 'Upstream API returned no message content', status: response.status };
      }
      return { kind: 'success', text };
    } catch (err) {
      if (signal.aborted) {
        return { kind: 'failure', detail: `Upstream call timed out after ${this.timeoutMs}ms`, status: null };
      }
      return classifyThrownFailure(err);
    } finally {
      cleanup();
    }
  }
}

// ─── OpenAI-compatible type definitions (internal) ───────────────────

interface OpenAIChatResponse {
  choices?: Array<{
    message?: {
      content?: string | null;
    };
  }>;
}
