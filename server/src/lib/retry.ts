const TRANSIENT_STATUSES = new Set([408, 425, 429, 500, 502, 503, 504, 529]);
const TRANSIENT_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ETIMEDOUT',
  'ECONNABORTED',
  'EAI_AGAIN',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);
const TRANSIENT_PATTERNS = [
  'rate limit',
  'rate_limit',
  'too many requests',
  'overloaded',
  'temporarily unavailable',
  'aborted due to timeout',
  'timeout',
  'timed out',
  'connection error',
  'socket hang up',
  'fetch failed',
  'network error',
  'service unavailable',
  'gateway timeout',
  'bad gateway',
];
const CONTENT_POLICY_PATTERNS = [
  'content policy',
  'content_policy',
  'content_filter',
  'content filter',
  'safety system',
];

const MAX_RETRY_AFTER_MS = 60_000;

export type FailureClass = 'transient' | 'permanent';

function field(value: unknown, key: string): unknown {
  if (value === null || typeof value !== 'object' || !(key in value)) return undefined;
  return Reflect.get(value, key);
}

function readHeader(headers: unknown, name: string): string | null {
  if (headers instanceof Headers) {
    return headers.get(name);
  }
  if (headers === null || typeof headers !== 'object') return null;
  const key = Object.keys(headers).find((k) => k.toLowerCase() === name.toLowerCase());
  const value = key ? field(headers, key) : undefined;
  return typeof value === 'string' ? value : null;
}

export function getStatusCode(error: unknown): number | null {
  const status = field(error, 'status');
  if (typeof status === 'number') return status;
  const statusCode = field(error, 'statusCode');
  if (typeof statusCode === 'number') return statusCode;

  const responseStatus = field(field(error, 'response'), 'status');
  if (typeof responseStatus === 'number') return responseStatus;
  return null;
}

function getErrorCode(error: unknown): string | null {
  const code = field(error, 'code');
  return typeof code === 'string' ? code.toUpperCase() : null;
}

function messageOf(error: unknown): string {
  return (error instanceof Error ? error.message : String(error)).toLowerCase();
}

export function isContentPolicyError(error: unknown): boolean {
  if (field(error, 'contentPolicy') === true) return true;
  const msg = messageOf(error);
  return CONTENT_POLICY_PATTERNS.some((p) => msg.includes(p));
}

/**
 * Transient failures (rate limits, timeouts, 5xx, dropped connections) are
 * worth another attempt; everything else, including unrecognised errors,
 * is permanent.
 */
export function classifyError(error: unknown): FailureClass {
  if (isContentPolicyError(error)) return 'permanent';

  const status = getStatusCode(error);
  if (status != null) return TRANSIENT_STATUSES.has(status) ? 'transient' : 'permanent';

  const code = getErrorCode(error);
  if (code && TRANSIENT_ERROR_CODES.has(code)) return 'transient';

  const msg = messageOf(error);
  if (TRANSIENT_PATTERNS.some((p) => msg.includes(p))) return 'transient';

  // Catch status text embedded in message ("Request failed with status 429")
  if (/\b(408|425|429|500|502|503|504|529)\b/.test(msg)) return 'transient';
  return 'permanent';
}

/**
 * Extract the Retry-After delay from provider error headers.
 * Returns delay in milliseconds, or 0 if not present.
 */
export function getRetryAfterMs(error: unknown): number {
  // SDK errors may attach headers directly or under response.headers.
  const retryAfter = readHeader(field(error, 'headers'), 'retry-after')
    ?? readHeader(field(field(error, 'response'), 'headers'), 'retry-after');
  if (!retryAfter) return 0;

  const seconds = parseFloat(retryAfter);
  if (!isNaN(seconds) && seconds > 0) {
    return Math.min(seconds * 1000, MAX_RETRY_AFTER_MS);
  }
  return 0;
}

/** Resolves after `ms`, or rejects with the signal's reason once it aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export interface AttemptReport {
  attempt: number;
  latencyMs: number;
  outcome: 'success' | FailureClass;
  error?: Error;
}

export interface RetryOptions {
  maxAttempts?: number;
  baseDelay?: number;
  factor?: number;
  maxDelay?: number;
  /** Stops further attempts and interrupts backoff sleeps. */
  signal?: AbortSignal;
  onAttempt?: (report: AttemptReport) => void;
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
}

export function backoffDelay(
  attempt: number,
  options: { baseDelay: number; factor: number; maxDelay: number },
  jitter: number = 0.5 + Math.random(),
): number {
  const raw = options.baseDelay * Math.pow(options.factor, attempt - 1) * jitter;
  return Math.min(raw, options.maxDelay);
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options?: RetryOptions,
): Promise<T> {
  const maxAttempts = options?.maxAttempts ?? 3;
  const backoff = {
    baseDelay: options?.baseDelay ?? 1000,
    factor: options?.factor ?? 2,
    maxDelay: options?.maxDelay ?? 30_000,
  };

  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const startedAt = Date.now();
    try {
      const result = await fn(attempt);
      options?.onAttempt?.({ attempt, latencyMs: Date.now() - startedAt, outcome: 'success' });
      return result;
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));
      const failureClass = classifyError(err);
      options?.onAttempt?.({
        attempt,
        latencyMs: Date.now() - startedAt,
        outcome: failureClass,
        error: lastError,
      });

      if (options?.signal?.aborted || attempt >= maxAttempts || failureClass === 'permanent') {
        throw lastError;
      }

      // Prefer server-specified Retry-After delay; fall back to exponential backoff
      const retryAfterMs = getRetryAfterMs(err);
      const delay = retryAfterMs > 0 ? retryAfterMs : backoffDelay(attempt, backoff);
      options?.onRetry?.(attempt, lastError, delay);
      await sleep(delay, options?.signal);
    }
  }

  throw lastError;
}
