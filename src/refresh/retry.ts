/**
 * Retrying Fetch
 * Layer: engine
 *
 * Wraps one logical health fetch with bounded exponential-backoff retries.
 *
 * Algorithm:
 *   attempt the fetch
 *   on failure, while retries < maxRetries:
 *     delay = baseDelayMs * 2^retries   (1s, 2s, 4s with the defaults)
 *     sleep(delay); retries += 1; attempt again
 *   success at any attempt returns immediately
 *   a failure with no retries left returns an exhausted Failure
 *
 * Cancellation is checked before and after every attempt, and the signal is
 * handed to the fetcher so an in-flight request is aborted too. A cancelled
 * fetch resolves to null: it has no outcome.
 */

import type { ErrorDetail, FetchAttemptResult, FetchOutcome, StatusFetcher } from '../types';
import { MAX_RETRY_ATTEMPTS, BASE_RETRY_DELAY_MS } from '../types';
import { sleep as sleepImpl } from '../utils';

export interface RetryOptions {
  maxRetries?: number;
  baseDelayMs?: number;
  signal?: AbortSignal;
}

export interface RetryDeps {
  sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  warn: (message: string) => void;
}

const defaultDeps: RetryDeps = {
  sleep: sleepImpl,
  warn: (message) => console.warn(message),
};

/**
 * Delay before retry number `retry` (0-based).
 */
export function computeBackoffDelay(retry: number, baseDelayMs: number = BASE_RETRY_DELAY_MS): number {
  return baseDelayMs * Math.pow(2, retry);
}

/**
 * Runs the fetcher once, converting a rejection into a transport failure.
 */
async function attemptOnce(
  fetcher: StatusFetcher,
  signal: AbortSignal | undefined,
): Promise<FetchAttemptResult> {
  try {
    return await fetcher(signal);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { success: false, kind: 'transport', error: message };
  }
}

/**
 * Fetches a health snapshot, retrying failures with exponential backoff.
 *
 * @returns The outcome, or null if the signal aborted before one was reached
 */
export async function fetchWithRetry(
  fetcher: StatusFetcher,
  options: RetryOptions = {},
  deps: RetryDeps = defaultDeps,
): Promise<FetchOutcome | null> {
  const maxRetries = options.maxRetries ?? MAX_RETRY_ATTEMPTS;
  const baseDelayMs = options.baseDelayMs ?? BASE_RETRY_DELAY_MS;
  const signal = options.signal;

  let retries = 0;

  while (true) {
    if (signal?.aborted) {
      return null;
    }

    const attempt = retries + 1;
    const result = await attemptOnce(fetcher, signal);

    // An attempt cut short by cancellation produces no outcome
    if (signal?.aborted) {
      return null;
    }

    if (result.success) {
      return { success: true, snapshot: result.snapshot, attempts: attempt };
    }

    const detail: ErrorDetail = { kind: result.kind, message: result.error, attempt };

    if (retries >= maxRetries) {
      return {
        success: false,
        error: { kind: 'exhausted', cause: detail, attempts: attempt },
      };
    }

    const delayMs = computeBackoffDelay(retries, baseDelayMs);
    deps.warn(
      `System health request failed (attempt ${attempt}/${maxRetries + 1}), ` +
        `retrying in ${delayMs}ms: ${result.error}`,
    );
    await deps.sleep(delayMs, signal);
    retries++;
  }
}

/**
 * Formats an exhausted failure for display.
 */
export function describeFailure(outcome: FetchOutcome): string | null {
  if (outcome.success) return null;
  const { cause, attempts } = outcome.error;
  return `System health failed after ${attempts} attempts (${cause.kind}): ${cause.message}`;
}
