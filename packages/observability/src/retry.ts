import { sleep } from '@ledgerline/shared-utils';

export interface BackoffPolicy {
  baseDelayMs: number;
  maxDelayMs: number;
  /** Fraction of the delay added as random jitter (0 disables jitter). */
  jitterRatio?: number;
}

export interface RetryOptions extends Partial<BackoffPolicy> {
  maxAttempts?: number;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
  wait?: (ms: number) => Promise<void>;
}

const DEFAULT_OPTIONS = {
  maxAttempts: 3,
  baseDelayMs: 200,
  maxDelayMs: 2000,
  jitterRatio: 0.1,
};

/**
 * Delay before the attempt following `attempt` (1-based): base * 2^(attempt-1), capped.
 */
export function computeBackoffDelay(
  attempt: number,
  policy: BackoffPolicy,
  random: () => number = Math.random
): number {
  const exponential = policy.baseDelayMs * Math.pow(2, Math.max(0, attempt - 1));
  const delay = Math.min(policy.maxDelayMs, exponential);
  const jitter = (policy.jitterRatio ?? 0) * delay * random();
  return Math.round(delay + jitter);
}

/**
 * In-memory retry loop. Only for idempotent reads; anything that must survive a restart
 * persists its own attempt state instead.
 */
export async function withExponentialBackoff<T>(
  fn: () => Promise<T>,
  options?: RetryOptions
): Promise<T> {
  const maxAttempts = options?.maxAttempts ?? DEFAULT_OPTIONS.maxAttempts;
  const policy: BackoffPolicy = {
    baseDelayMs: options?.baseDelayMs ?? DEFAULT_OPTIONS.baseDelayMs,
    maxDelayMs: options?.maxDelayMs ?? DEFAULT_OPTIONS.maxDelayMs,
    jitterRatio: options?.jitterRatio ?? DEFAULT_OPTIONS.jitterRatio,
  };
  const wait = options?.wait ?? ((ms: number) => sleep(ms));

  let attempt = 0;
  let lastError: unknown;

  while (attempt < maxAttempts) {
    attempt += 1;
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (attempt >= maxAttempts || (options?.shouldRetry && !options.shouldRetry(error))) {
        break;
      }
      const delay = computeBackoffDelay(attempt, policy);
      options?.onRetry?.(attempt, error, delay);
      await wait(delay);
    }
  }

  throw lastError instanceof Error ? lastError : new Error(String(lastError));
}
