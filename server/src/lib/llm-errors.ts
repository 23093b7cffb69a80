export type LlmErrorCode =
  | 'CONFIGURATION'
  | 'POOL_EXHAUSTED'
  | 'RETRIES_EXHAUSTED'
  | 'UPSTREAM'
  | 'DECODE';

/** Base class for every failure the LLM call path surfaces to its callers. */
export class LlmError extends Error {
  readonly code: LlmErrorCode;
  readonly attempts: number;

  constructor(code: LlmErrorCode, message: string, attempts = 0) {
    super(message);
    this.name = 'LlmError';
    this.code = code;
    this.attempts = attempts;
  }
}

/** No credentials configured at all. */
export class ConfigurationError extends LlmError {
  constructor(message: string, attempts = 0) {
    super('CONFIGURATION', message, attempts);
    this.name = 'ConfigurationError';
  }
}

/** Every credential is cooling down and none frees up within the wait horizon. */
export class PoolExhaustedError extends LlmError {
  readonly lastDetail: string | null;

  constructor(attempts: number, lastDetail: string | null = null) {
    super(
      'POOL_EXHAUSTED',
      lastDetail
        ? `All API keys are rate-limited. Last error: ${lastDetail}`
        : 'All API keys are rate-limited',
      attempts,
    );
    this.name = 'PoolExhaustedError';
    this.lastDetail = lastDetail;
  }
}

/** Every attempt was throttled. */
export class RetriesExhaustedError extends LlmError {
  readonly lastDetail: string;

  constructor(attempts: number, lastDetail: string) {
    super('RETRIES_EXHAUSTED', `All API keys exhausted after ${attempts} attempt(s). Last error: ${lastDetail}`, attempts);
    this.name = 'RetriesExhaustedError';
    this.lastDetail = lastDetail;
  }
}

/** A non-throttling upstream failure: bad request, auth, server fault, timeout. */
export class UpstreamError extends LlmError {
  readonly status: number | null;

  constructor(detail: string, attempts: number, status: number | null = null) {
    super('UPSTREAM', detail, attempts);
    this.name = 'UpstreamError';
    this.status = status;
  }
}

/** Response text that is not a JSON object. */
export class DecodeError extends LlmError {
  readonly snippet: string;

  constructor(message: string, text: string) {
    super('DECODE', message);
    this.name = 'DecodeError';
    this.snippet = text.substring(0, 300);
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
