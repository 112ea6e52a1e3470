/**
 * Retry + Timeout Utility
 *
 * Bounded exponential backoff with an optional per-attempt timeout for
 * wrapping external API calls (Gemini extraction, transcription).
 * Sleep is injectable so callers and tests control the passage of time.
 */

export type Sleep = (ms: number) => Promise<void>;

export interface RetryAttempt {
  attempt: number;
  signal: AbortSignal;
}

export interface RetryNotice {
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  error: unknown;
}

export interface RetryConfig {
  /** Total attempts, including the first one. */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterFactor: number;
  /** Per-attempt timeout; a timed-out attempt counts toward maxAttempts. */
  attemptTimeoutMs: number | null;
  retryOn: (error: unknown) => boolean;
  /** Provider hint (e.g. a Retry-After header) that overrides the computed delay. */
  retryAfterMs: (error: unknown) => number | null;
  sleep: Sleep;
  onRetry?: (notice: RetryNotice) => void;
}

const TRANSIENT_STATUSES = new Set([408, 429, 500, 502, 503, 504]);

export const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 4,
  baseDelayMs: 1000,
  maxDelayMs: 60_000,
  jitterFactor: 0,
  attemptTimeoutMs: null,
  retryOn: isRetryableError,
  retryAfterMs: () => null,
  sleep: defaultSleep,
};

export class AttemptTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Request timeout after ${timeoutMs}ms`);
    this.name = "AttemptTimeoutError";
  }
}

export function getErrorStatus(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null) {
    return undefined;
  }
  if ("status" in error && typeof error.status === "number") {
    return error.status;
  }
  if ("statusCode" in error && typeof error.statusCode === "number") {
    return error.statusCode;
  }
  return undefined;
}

export function isTransientStatus(status: number): boolean {
  return TRANSIENT_STATUSES.has(status);
}

export function isRetryableError(error: unknown): boolean {
  if (error instanceof AttemptTimeoutError) return true;

  const status = getErrorStatus(error);
  if (status !== undefined) {
    return isTransientStatus(status);
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    if (message.includes("rate limit")) return true;
    if (message.includes("timeout")) return true;
    if (message.includes("econnreset")) return true;
    if (message.includes("socket hang up")) return true;
    if (message.includes("network")) return true;
  }

  return false;
}

/**
 * Delay before retrying after the given (1-based) failed attempt:
 * base, 2×base, 4×base, ... capped at maxDelayMs, with optional jitter.
 */
export function calculateBackoff(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  jitterFactor: number
): number {
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt - 1);
  const cappedDelay = Math.min(exponentialDelay, maxDelayMs);

  if (jitterFactor <= 0) {
    return cappedDelay;
  }

  const jitter = cappedDelay * jitterFactor * (Math.random() * 2 - 1);
  return Math.max(0, Math.round(cappedDelay + jitter));
}

export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number | null
): Promise<T> {
  const controller = new AbortController();
  if (timeoutMs === null) {
    return fn(controller.signal);
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new AttemptTimeoutError(timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export async function withRetry<T>(
  fn: (attempt: RetryAttempt) => Promise<T>,
  config: Partial<RetryConfig> = {}
): Promise<T> {
  const opts = { ...DEFAULT_RETRY_CONFIG, ...config };
  const maxAttempts = Math.max(1, opts.maxAttempts);

  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await withTimeout((signal) => fn({ attempt, signal }), opts.attemptTimeoutMs);
    } catch (error) {
      lastError = error;

      if (!opts.retryOn(error)) {
        throw error;
      }

      if (attempt === maxAttempts) {
        break;
      }

      const hinted = opts.retryAfterMs(error);
      const delayMs = hinted ?? calculateBackoff(
        attempt,
        opts.baseDelayMs,
        opts.maxDelayMs,
        opts.jitterFactor
      );

      opts.onRetry?.({ attempt, maxAttempts, delayMs, error });
      await opts.sleep(delayMs);
    }
  }

  throw lastError;
}
