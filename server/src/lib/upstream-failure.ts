const THROTTLE_STATUSES = new Set([429]);
const THROTTLE_PATTERNS = [
  'rate_limit',
  'rate limit',
  'too many requests',
];

type HeaderBag = Headers | Record<string, string | undefined>;

export type CallOutcome =
  | { kind: 'success'; text: string }
  | { kind: 'throttled'; detail: string; status: number | null; retryAfterSeconds: number | null }
  | { kind: 'failure'; detail: string; status: number | null };

function readHeader(headers: HeaderBag | undefined, name: string): string | null {
  if (!headers) return null;
  if (headers instanceof Headers) {
    return headers.get(name);
  }
  const key = Object.keys(headers).find((k) => k.toLowerCase() === name.toLowerCase());
  const value = key ? headers[key] : undefined;
  return typeof value === 'string' ? value : null;
}

/**
 * Seconds from a Retry-After header, capped at 60. Null when absent or not a
 * positive number of seconds.
 */
export function getRetryAfterSeconds(headers: HeaderBag | undefined): number | null {
  const retryAfter = readHeader(headers, 'retry-after');
  if (!retryAfter) return null;
  const seconds = Number.parseFloat(retryAfter);
  if (Number.isNaN(seconds) || seconds <= 0) return null;
  return Math.min(seconds, 60);
}

function hasHttpStatus(err: unknown): err is { status: number; headers?: HeaderBag } {
  return typeof err === 'object'
    && err !== null
    && 'status' in err
    && typeof err.status === 'number';
}

/** Substring sniffing, used only when the status code says nothing. */
export function looksThrottled(detail: string): boolean {
  const msg = detail.toLowerCase();
  return THROTTLE_PATTERNS.some((p) => msg.includes(p));
}

/**
 * Classifies a non-2xx HTTP response. 429 is throttling; any other status is
 * a hard failure unless the provider's error body names a rate limit.
 */
export function classifyHttpFailure(
  status: number,
  body: string,
  headers?: HeaderBag,
): CallOutcome {
  const detail = `Upstream API error ${status}: ${body.substring(0, 500)}`;
  if (THROTTLE_STATUSES.has(status) || looksThrottled(body)) {
    return { kind: 'throttled', detail, status, retryAfterSeconds: getRetryAfterSeconds(headers) };
  }
  return { kind: 'failure', detail, status };
}

/**
 * Classifies a thrown error (network failure, abort, SDK error). Errors that
 * carry a numeric `status` go through the HTTP path; everything else is a
 * hard failure unless its message names a rate limit.
 */
export function classifyThrownFailure(err: unknown): CallOutcome {
  const detail = err instanceof Error ? err.message : String(err);
  if (hasHttpStatus(err)) {
    return classifyHttpFailure(err.status, detail, err.headers);
  }
  if (looksThrottled(detail)) {
    return { kind: 'throttled', detail, status: null, retryAfterSeconds: null };
  }
  return { kind: 'failure', detail, status: null };
}
