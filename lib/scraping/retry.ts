import { FetchError } from "@/lib/errors";

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Base delay when the remote signalled rate limiting without a Retry-After hint. */
  rateLimitedBaseDelayMs: number;
  rateLimitedMaxDelayMs: number;
  /** +/- fraction of the computed delay. */
  jitter: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 10_000,
  rateLimitedBaseDelayMs: 5_000,
  rateLimitedMaxDelayMs: 60_000,
  jitter: 0.1
};

export interface RetryAttemptInfo {
  attempt: number;
  delayMs: number;
  error: FetchError;
}

export function computeBackoffDelay(input: {
  attempt: number;
  error: FetchError;
  policy: RetryPolicy;
  random?: () => number;
}): number {
  const { policy, error } = input;
  const rateLimited = error.kind === "rate_limited_by_remote";
  if (rateLimited && error.retryAfterMs !== null) {
    return Math.min(Math.max(0, error.retryAfterMs), policy.rateLimitedMaxDelayMs);
  }

  const base = rateLimited ? policy.rateLimitedBaseDelayMs : policy.baseDelayMs;
  const cap = rateLimited ? policy.rateLimitedMaxDelayMs : policy.maxDelayMs;
  const exponential = Math.min(base * 2 ** (input.attempt - 1), cap);
  const random = input.random ?? Math.random;
  const jitterValue = (random() * 2 - 1) * exponential * policy.jitter;

  return Math.round(Math.max(0, exponential + jitterValue));
}

export function parseRetryAfter(header: string | null, nowMs: number): number | null {
  if (!header) {
    return null;
  }

  const seconds = Number(header.trim());
  if (Number.isFinite(seconds) && seconds >= 0) {
    return seconds * 1000;
  }

  const dateMs = Date.parse(header);
  if (!Number.isNaN(dateMs)) {
    const delayMs = dateMs - nowMs;
    return delayMs > 0 ? delayMs : 0;
  }

  return null;
}

/**
 * Retries transient fetch failures with exponential backoff and jitter.
 * Permanent failures (`not_found`, `parse_failure`) and non-fetch errors are
 * rethrown immediately.
 */
export async function withFetchRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: {
    policy: RetryPolicy;
    sleep: (ms: number) => Promise<void>;
    random?: () => number;
    onRetry?: (info: RetryAttemptInfo) => void;
  }
): Promise<T> {
  for (let attempt = 1; ; attempt += 1) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (!(error instanceof FetchError) || !error.retryable || attempt >= options.policy.maxAttempts) {
        throw error;
      }

      const delayMs = computeBackoffDelay({ attempt, error, policy: options.policy, random: options.random });
      options.onRetry?.({ attempt, delayMs, error });
      await options.sleep(delayMs);
    }
  }
}
