/**
 * Tests for fetchWithRetry, computeBackoffDelay and describeFailure.
 *
 * sleep and warn are injected, so no real time passes.
 */

import { describe, it, expect, vi } from 'vitest';
import { computeBackoffDelay, describeFailure, fetchWithRetry } from '../../src/refresh';
import type { FetchAttemptResult, StatusFetcher } from '../../src/types';
import { makeFailure, makeSnapshot, makeSuccess } from '../helpers';

const snapshot = makeSnapshot();
const ok: FetchAttemptResult = { success: true, snapshot };

function failure(error = 'Network error: connection refused'): FetchAttemptResult {
  return { success: false, kind: 'transport', error };
}

function makeDeps() {
  return {
    sleep: vi.fn((_ms: number, _signal?: AbortSignal) => Promise.resolve()),
    warn: vi.fn(),
  };
}

function sequenceFetcher(results: FetchAttemptResult[]) {
  let call = 0;
  return vi.fn<StatusFetcher>(() => {
    const result = results[Math.min(call, results.length - 1)];
    call++;
    return Promise.resolve(result ?? ok);
  });
}

// -----------------------------------------------------------------------------
// computeBackoffDelay
// -----------------------------------------------------------------------------

describe('computeBackoffDelay', () => {
  it('doubles the base delay for each retry', () => {
    expect(computeBackoffDelay(0)).toBe(1000);
    expect(computeBackoffDelay(1)).toBe(2000);
    expect(computeBackoffDelay(2)).toBe(4000);
  });

  it('honours a custom base', () => {
    expect(computeBackoffDelay(3, 10)).toBe(80);
  });
});

// -----------------------------------------------------------------------------
// fetchWithRetry
// -----------------------------------------------------------------------------

describe('fetchWithRetry', () => {
  it('returns success on the first attempt without sleeping', async () => {
    const fetcher = sequenceFetcher([ok]);
    const deps = makeDeps();

    const outcome = await fetchWithRetry(fetcher, {}, deps);

    expect(outcome).toEqual({ success: true, snapshot, attempts: 1 });
    expect(fetcher).toHaveBeenCalledTimes(1);
    expect(deps.sleep).not.toHaveBeenCalled();
    expect(deps.warn).not.toHaveBeenCalled();
  });

  it('succeeds on the fourth attempt after backing off 1s, 2s and 4s', async () => {
    const fetcher = sequenceFetcher([failure(), failure(), failure(), ok]);
    const deps = makeDeps();

    const outcome = await fetchWithRetry(fetcher, {}, deps);

    expect(outcome).toEqual({ success: true, snapshot, attempts: 4 });
    expect(fetcher).toHaveBeenCalledTimes(4);
    expect(deps.sleep.mock.calls.map((call) => call[0])).toEqual([1000, 2000, 4000]);
  });

  it('returns an exhausted failure after the retry budget is spent', async () => {
    const fetcher = sequenceFetcher([
      failure('first'),
      failure('second'),
      failure('third'),
      { success: false, kind: 'decode', error: 'last' },
    ]);
    const deps = makeDeps();

    const outcome = await fetchWithRetry(fetcher, {}, deps);

    expect(outcome).toEqual({
      success: false,
      error: {
        kind: 'exhausted',
        cause: { kind: 'decode', message: 'last', attempt: 4 },
        attempts: 4,
      },
    });
    expect(fetcher).toHaveBeenCalledTimes(4);
    expect(deps.sleep).toHaveBeenCalledTimes(3);
  });

  it('warns once per retry with the attempt number and delay', async () => {
    const fetcher = sequenceFetcher([failure('boom'), ok]);
    const deps = makeDeps();

    await fetchWithRetry(fetcher, {}, deps);

    expect(deps.warn).toHaveBeenCalledTimes(1);
    expect(deps.warn).toHaveBeenCalledWith(
      'System health request failed (attempt 1/4), retrying in 1000ms: boom',
    );
  });

  it('never retries when maxRetries is 0', async () => {
    const fetcher = sequenceFetcher([failure()]);
    const deps = makeDeps();

    const outcome = await fetchWithRetry(fetcher, { maxRetries: 0 }, deps);

    expect(outcome?.success).toBe(false);
    expect(fetcher).toHaveBeenCalledTimes(1);
    expect(deps.sleep).not.toHaveBeenCalled();
  });

  it('treats a rejecting fetcher as a transport failure', async () => {
    const fetcher = vi.fn<StatusFetcher>(() => Promise.reject(new Error('socket hang up')));
    const deps = makeDeps();

    const outcome = await fetchWithRetry(fetcher, { maxRetries: 0 }, deps);

    expect(outcome).toEqual(makeFailure('socket hang up', 1));
  });

  it('returns null without calling the fetcher when already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const fetcher = sequenceFetcher([ok]);

    const outcome = await fetchWithRetry(fetcher, { signal: controller.signal }, makeDeps());

    expect(outcome).toBeNull();
    expect(fetcher).not.toHaveBeenCalled();
  });

  it('returns null when cancelled during a backoff sleep', async () => {
    const controller = new AbortController();
    const fetcher = sequenceFetcher([failure(), ok]);
    const deps = makeDeps();
    deps.sleep.mockImplementation(() => {
      controller.abort();
      return Promise.resolve();
    });

    const outcome = await fetchWithRetry(fetcher, { signal: controller.signal }, deps);

    expect(outcome).toBeNull();
    expect(fetcher).toHaveBeenCalledTimes(1);
  });

  it('passes the signal to the backoff sleep', async () => {
    const controller = new AbortController();
    const fetcher = sequenceFetcher([failure(), ok]);
    const deps = makeDeps();

    await fetchWithRetry(fetcher, { signal: controller.signal, baseDelayMs: 5 }, deps);

    expect(deps.sleep).toHaveBeenCalledWith(5, controller.signal);
  });

  it('hands the signal to the fetcher', async () => {
    const controller = new AbortController();
    const fetcher = sequenceFetcher([ok]);

    await fetchWithRetry(fetcher, { signal: controller.signal }, makeDeps());

    expect(fetcher).toHaveBeenCalledWith(controller.signal);
  });

  it('returns null when cancelled during an attempt', async () => {
    const controller = new AbortController();
    const fetcher = vi.fn<StatusFetcher>(() => {
      controller.abort();
      return Promise.resolve(failure('Request cancelled'));
    });
    const deps = makeDeps();

    const outcome = await fetchWithRetry(fetcher, { signal: controller.signal }, deps);

    expect(outcome).toBeNull();
    expect(fetcher).toHaveBeenCalledTimes(1);
    expect(deps.sleep).not.toHaveBeenCalled();
    expect(deps.warn).not.toHaveBeenCalled();
  });
});

// -----------------------------------------------------------------------------
// describeFailure
// -----------------------------------------------------------------------------

describe('describeFailure', () => {
  it('formats the final error with the attempt count', () => {
    expect(describeFailure(makeFailure('HTTP 503: Service Unavailable'))).toBe(
      'System health failed after 4 attempts (transport): HTTP 503: Service Unavailable',
    );
  });

  it('returns null for a success', () => {
    expect(describeFailure(makeSuccess())).toBeNull();
  });
});
