import { describe, it, expect, vi } from 'vitest';
import { GroqProvider } from '../lib/llm-provider.js';
import { loadConfig } from '../lib/config.js';

function jsonResponse(body: unknown, init: ResponseInit = {}) {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
    ...init,
  });
}

function provider(fetchImpl: (input: string, init: RequestInit) => Promise<Response>, timeoutMs = 1_000) {
  return new GroqProvider({
    baseUrl: 'https://llm.test/v1/',
    model: 'test-model',
    timeoutMs,
    maxTokens: 256,
    temperature: 0.2,
    fetch: fetchImpl,
  });
}

describe('GroqProvider', () => {
  it('posts an OpenAI-style chat completion and returns the message text', async () => {
    const fetchImpl = vi.fn(async (_input: string, _init: RequestInit) =>
      jsonResponse({ choices: [{ message: { content: '{"ok":true}' } }] }));

    const outcome = await provider(fetchImpl).complete('test-key', { system: 'sys', prompt: 'hello' });

    expect(outcome).toEqual({ kind: 'success', text: '{"ok":true}' });
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(url).toBe('https://llm.test/v1/chat/completions');
    expect(new Headers(init?.headers).get('Authorization')).toBe('Bearer test-key');
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'test-model',
      messages: [
        { role: 'system', content: 'sys' },
        { role: 'user', content: 'hello' },
      ],
      temperature: 0.2,
      max_tokens: 256,
    });
  });

  it('lets a request override temperature and token limit', async () => {
    const fetchImpl = vi.fn(async (_input: string, _init: RequestInit) =>
      jsonResponse({ choices: [{ message: { content: 'text' } }] }));

    await provider(fetchImpl).complete('test-key', { system: 's', prompt: 'p', temperature: 0.9, maxTokens: 50 });

    const init = fetchImpl.mock.calls[0]?.[1];
    expect(JSON.parse(String(init?.body))).toMatchObject({ temperature: 0.9, max_tokens: 50 });
  });

  it('reports 429 responses as throttled with the retry hint', async () => {
    const fetchImpl = async () => new Response('rate limited', { status: 429, headers: { 'retry-after': '4' } });

    await expect(provider(fetchImpl).complete('test-key', { system: 's', prompt: 'p' })).resolves.toEqual({
      kind: 'throttled',
      detail: 'Upstream API error 429: rate limited',
      status: 429,
      retryAfterSeconds: 4,
    });
  });

  it('reports other error statuses as failures', async () => {
    const fetchImpl = async () => new Response('bad request', { status: 400 });

    await expect(provider(fetchImpl).complete('test-key', { system: 's', prompt: 'p' })).resolves.toEqual({
      kind: 'failure',
      detail: 'Upstream API error 400: bad request',
      status: 400,
    });
  });

  it('fails when the response carries no message content', async () => {
    const fetchImpl = async () => jsonResponse({ choices: [] });

    await expect(provider(fetchImpl).complete('test-key', { system: 's', prompt: 'p' })).resolves.toEqual({
      kind: 'failure',
      detail: 'Upstream API returned no message content',
      status: 200,
    });
  });

  it('fails with a timeout detail when the call is aborted', async () => {
    const fetchImpl = (_input: string, init: RequestInit) => new Promise<Response>((_resolve, reject) => {
      init.signal?.addEventListener('abort', () => reject(new Error('aborted')));
    });

    await expect(provider(fetchImpl, 20).complete('test-key', { system: 's', prompt: 'p' })).resolves.toEqual({
      kind: 'failure',
      detail: 'Upstream call timed out after 20ms',
      status: null,
    });
  });

  it('classifies network errors without throwing', async () => {
    const fetchImpl = async (): Promise<Response> => {
      throw new TypeError('fetch failed');
    };

    await expect(provider(fetchImpl).complete('test-key', { system: 's', prompt: 'p' })).resolves.toEqual({
      kind: 'failure',
      detail: 'fetch failed',
      status: null,
    });
  });

  it('builds from configuration', () => {
    const config = loadConfig({ GROQ_MODEL: 'configured-model' });
    const built = GroqProvider.fromConfig(config.llm, async () => jsonResponse({}));
    expect(built.name).toBe('groq');
  });
});
