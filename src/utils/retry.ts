/**
 * Bounded retries with exponential backoff and a per-attempt deadline.
 *
 * Wraps envelope delivery: an attempt cut off by `attemptTimeoutMs` fails
 * with a TimeoutError, which `isRetryable` accepts, so a slow delivery is
 * retried like a dropped connection.
 */

import { TimeoutError, isRetryable } from './errors.js';

export interface RetryPolicy {
  /** Attempts after the first one (default: 3) */
  maxRetries?: number;
  /** Wait before the first retry (default: 1000ms) */
  initialDelayMs?: number;
  /** Upper bound for any single wait (default: 30000ms) */
  maxDelayMs?: number;
  /** Growth factor between waits (default: 2) */
  backoffMultiplier?: number;
  /** Scale each wait into [50%, 100%] of its nominal value (default: true) */
  jitter?: boolean;
  /** Deadline for one attempt; 0 waits indefinitely (default: 0) */
  attemptTimeoutMs?: number;
  /** Named in timeout errors (default: 'operation') */
  operation?: string;
  /** Decides whether an error is retried (default: isRetryable) */
  shouldRetry?: (error: Error) => boolean;
  /** Called before waiting for retry number `attempt` */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
}

type ResolvedPolicy = Required<RetryPolicy>;

const DEFAULT_POLICY: ResolvedPolicy = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  jitter: true,
  attemptTimeoutMs: 0,
  operation: 'operation',
  shouldRetry: isRetryable,
  onRetry: () => {},
};

/**
 * Nominal wait before retry number `attempt` (1-based), before jitter.
 */
export function backoffDelay(
  attempt: number,
  policy: Pick<RetryPolicy, 'initialDelayMs' | 'maxDelayMs' | 'backoffMultiplier'> = {}
): number {
  const initial = policy.initialDelayMs ?? DEFAULT_POLICY.initialDelayMs;
  const multiplier = policy.backoffMultiplier ?? DEFAULT_POLICY.backoffMultiplier;
  const ceiling = policy.maxDelayMs ?? DEFAULT_POLICY.maxDelayMs;
  return Math.min(initial * multiplier ** (attempt - 1), ceiling);
}

/**
 * Settle with `work`, or reject with a TimeoutError once `timeoutMs` passes.
 * A non-positive `timeoutMs` returns `work` unchanged.
 */
export function withTimeout<T>(work: Promise<T>, timeoutMs: number, operation: string): Promise<T> {
  if (timeoutMs <= 0) {
    return work;
  }

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new TimeoutError(`${operation} timed out after ${timeoutMs}ms`, timeoutMs, operation));
    }, timeoutMs);

    work.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}

/**
 * Run `operation` until it succeeds, fails with a non-retryable error or
 * runs out of retries.
 *
 * @throws The last error seen
 */
export async function retry<T>(operation: () => Promise<T>, policy: RetryPolicy = {}): Promise<T> {
  const resolved: ResolvedPolicy = { ...DEFAULT_POLICY, ...policy };

  for (let attempt = 0; ; attempt++) {
    try {
      return await withTimeout(operation(), resolved.attemptTimeoutMs, resolved.operation);
    } catch (caught) {
      const error = caught instanceof Error ? caught : new Error(String(caught));
      if (attempt >= resolved.maxRetries || !resolved.shouldRetry(error)) {
        throw error;
      }

      const nominal = backoffDelay(attempt + 1, resolved);
      const delayMs = resolved.jitter ? nominal * (0.5 + Math.random() * 0.5) : nominal;
      resolved.onRetry(attempt + 1, error, delayMs);
      await sleep(delayMs);
    }
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
