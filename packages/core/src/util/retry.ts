/**
 * Bounded retry with exponential backoff for calls to model services.
 * Transient errors (429 rate limits, 5xx, network failures, timeouts) are
 * retried with jittered backoff; anything else is thrown straight away.
 */

export interface RetryOpts {
  /** Maximum number of retry attempts after the first call (default 3) */
  maxRetries?: number;
  /** Initial backoff delay in ms (default 500) */
  initialDelayMs?: number;
  /** Maximum backoff delay in ms (default 8000) */
  maxDelayMs?: number;
  /** Backoff multiplier (default 2) */
  multiplier?: number;
  /** Jitter factor 0-1 (default 0.25) */
  jitter?: number;
  /** Decides whether an error is worth another attempt */
  isRetryable?: (err: Error) => boolean;
  /** Callback on each retry attempt */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
  /** Stops retrying once aborted */
  signal?: AbortSignal;
  /** Injected for tests */
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export function isTransientError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  if (err.name === "AbortError") return false;
  const msg = err.message.toLowerCase();

  if (msg.includes("429") || msg.includes("rate limit") || msg.includes("too many requests")) return true;

  if (/\b5\d{2}\b/.test(msg)) return true;

  if (
    msg.includes("econnreset") ||
    msg.includes("econnrefused") ||
    msg.includes("etimedout") ||
    msg.includes("socket hang up") ||
    msg.includes("network") ||
    msg.includes("fetch failed") ||
    msg.includes("timed out")
  ) {
    return true;
  }

  return msg.includes("overloaded");
}

export function computeDelay(
  attempt: number,
  opts: { initialDelayMs: number; maxDelayMs: number; multiplier: number; jitter: number },
  random: () => number = Math.random
): number {
  const baseDelay = Math.min(opts.initialDelayMs * Math.pow(opts.multiplier, attempt), opts.maxDelayMs);
  const jitterRange = baseDelay * opts.jitter;
  const jitter = (random() - 0.5) * 2 * jitterRange;
  return Math.max(0, Math.round(baseDelay + jitter));
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Execute an async function with retry logic. Throws the last error once the
 * attempts are spent.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, opts?: RetryOpts): Promise<T> {
  const maxRetries = Math.max(0, opts?.maxRetries ?? 3);
  const backoff = {
    initialDelayMs: opts?.initialDelayMs ?? 500,
    maxDelayMs: opts?.maxDelayMs ?? 8000,
    multiplier: opts?.multiplier ?? 2,
    jitter: opts?.jitter ?? 0.25,
  };
  const isRetryable = opts?.isRetryable ?? isTransientError;
  const sleep = opts?.sleep ?? defaultSleep;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      if (attempt >= maxRetries || opts?.signal?.aborted || !isRetryable(error)) {
        throw error;
      }

      const delay = computeDelay(attempt, backoff, opts?.random);
      opts?.onRetry?.(attempt + 1, error, delay);
      await sleep(delay);
    }
  }
}
