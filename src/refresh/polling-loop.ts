/**
 * Polling Loop
 * Layer: engine
 *
 * Background task that runs one tick per interval until its session is
 * cancelled. A tick is a single-flight fetch-and-publish owned by the
 * coordinator; the loop only decides when ticks happen.
 *
 * Cancellation is observed:
 *   - immediately before each tick
 *   - immediately after each tick (no sleep is started)
 *   - on waking from the interval sleep (which wakes early on abort)
 */

import type { PollingSession } from './session';
import { sleep as sleepImpl } from '../utils';

export interface PollingLoopDeps {
  sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  logError: (message: string) => void;
}

const defaultDeps: PollingLoopDeps = {
  sleep: sleepImpl,
  logError: (message) => console.error(message),
};

/**
 * Runs until `session` is cancelled.
 *
 * A failed outcome never stops the loop; neither does a tick that throws,
 * which is logged before the loop sleeps for the regular interval.
 */
export async function runPollingLoop(
  session: PollingSession,
  tick: () => Promise<void>,
  intervalMs: number,
  deps: PollingLoopDeps = defaultDeps,
): Promise<void> {
  while (!session.cancelled) {
    try {
      await tick();
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      deps.logError(`Polling loop error: ${message}`);
    }

    if (session.cancelled) {
      return;
    }

    await deps.sleep(intervalMs, session.signal);
  }
}
