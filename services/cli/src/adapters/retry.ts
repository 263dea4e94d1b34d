/**
 * Retry policy for exchange HTTP calls
 *
 * Throttling, timeouts, 5xx responses and failed connections are retried
 * with doubling backoff; anything the exchange answered deliberately
 * (4xx, JSON-RPC errors) fails on the first attempt.
 */

export class HttpError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly retryAfterMs?: number
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

export interface RetryPolicy {
  maxAttempts: number;
  /** First backoff delay; doubles per retry */
  baseDelayMs: number;
  /** Cap for backoff and Retry-After */
  maxDelayMs: number;
}

const RETRIABLE_STATUS = new Set([408, 429]);

export function isRetriable(error: unknown): boolean {
  if (error instanceof HttpError) {
    return RETRIABLE_STATUS.has(error.statusCode) || error.statusCode >= 500;
  }
  // undici rejects refused/reset connections with TypeError('fetch failed')
  return error instanceof Error && (error.name === 'AbortError' || error.message === 'fetch failed');
}

/**
 * Retry-After header as a delay in ms (delta-seconds or HTTP-date)
 *
 * retryAfterMs('5') -> 5000
 */
export function retryAfterMs(header: string | null, now: number = Date.now()): number | undefined {
  const value = header?.trim();
  if (!value) return undefined;

  if (/^\d+$/.test(value)) {
    const seconds = Number(value);
    return seconds > 0 ? seconds * 1000 : undefined;
  }

  const at = Date.parse(value);
  if (Number.isNaN(at) || at <= now) return undefined;
  return at - now;
}

/**
 * Wait before retry number `attempt` (1-based).
 * Retry-After wins when the server sent one; otherwise base * 2^(attempt-1)
 * capped at maxDelayMs, plus up to 25% jitter.
 */
export function retryDelay(
  attempt: number,
  policy: RetryPolicy,
  error: unknown,
  random: () => number = Math.random
): number {
  if (error instanceof HttpError && error.retryAfterMs !== undefined) {
    return Math.min(error.retryAfterMs, policy.maxDelayMs);
  }
  const capped = Math.min(policy.baseDelayMs * 2 ** (attempt - 1), policy.maxDelayMs);
  return Math.floor(capped * (1 + 0.25 * random()));
}

function wait(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run `fn` until it succeeds, fails with a non-retriable error or runs out of attempts.
 * The last error is rethrown as-is.
 */
export async function withRetry<T>(fn: () => Promise<T>, policy: RetryPolicy, label: string): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= policy.maxAttempts || !isRetriable(error)) {
        throw error;
      }
      const delayMs = retryDelay(attempt, policy, error);
      console.warn(`${label} Retry ${attempt} in ${delayMs}ms: ${error instanceof Error ? error.message : String(error)}`);
      await wait(delayMs);
    }
  }
}
