/**
 * Poller Process Signals
 *
 * Stopping the poller (SIGTERM with verification and SIGKILL escalation)
 * and requesting a manual refresh (SIGUSR1).
 */

import { sleep } from '../utils';

// -----------------------------------------------------------------------------
// Port: poller.signal
// -----------------------------------------------------------------------------

export interface SignalResult {
  success: true;
  /** True if SIGKILL was needed after SIGTERM timeout */
  escalated?: boolean;
}

export interface SignalError {
  success: false;
  error: string;
  /** True if process was not found (may have already exited) */
  notFound: boolean;
}

export type SignalOutcome = SignalResult | SignalError;

// Callers should not depend on these; tests mock process.kill directly.
const KILL_TIMEOUT_MS = 3000;
const KILL_CHECK_INTERVAL_MS = 100;

/**
 * Sends `signal` to the poller after checking that it exists.
 */
export function signalPoller(pid: number, signal: NodeJS.Signals): SignalOutcome {
  try {
    process.kill(pid, 0);
    process.kill(pid, signal);
    return { success: true };
  } catch (err) {
    const error = err as NodeJS.ErrnoException;
    if (error.code === 'ESRCH') {
      return { success: false, error: 'Process not found', notFound: true };
    }
    return {
      success: false,
      error: `Failed to send ${signal} to poller: ${error.message}`,
      notFound: false,
    };
  }
}

/**
 * Asks the poller for an out-of-band refresh.
 */
export function requestRefresh(pid: number): SignalOutcome {
  return signalPoller(pid, 'SIGUSR1');
}

/**
 * Sends SIGTERM without waiting for exit.
 */
export function killPoller(pid: number): SignalOutcome {
  return signalPoller(pid, 'SIGTERM');
}

/**
 * Sends SIGTERM, waits for exit, escalates to SIGKILL if needed.
 */
export async function killPollerWithVerification(pid: number): Promise<SignalOutcome> {
  if (!isProcessRunning(pid)) {
    return { success: false, error: 'Process not found', notFound: true };
  }

  const termResult = signalPoller(pid, 'SIGTERM');
  if (!termResult.success) {
    return termResult;
  }

  const startTime = Date.now();
  while (Date.now() - startTime < KILL_TIMEOUT_MS) {
    await sleep(KILL_CHECK_INTERVAL_MS);
    if (!isProcessRunning(pid)) {
      return { success: true, escalated: false };
    }
  }

  try {
    process.kill(pid, 'SIGKILL');
  } catch (err) {
    const error = err as NodeJS.ErrnoException;
    if (error.code === 'ESRCH') {
      // Exited between the last check and SIGKILL
      return { success: true, escalated: true };
    }
    return { success: false, error: `Failed to send SIGKILL: ${error.message}`, notFound: false };
  }

  await sleep(KILL_CHECK_INTERVAL_MS);
  if (!isProcessRunning(pid)) {
    return { success: true, escalated: true };
  }
  return { success: false, error: 'Process survived SIGKILL', notFound: false };
}

/**
 * Checks whether a process with the given PID is currently running.
 */
export function isProcessRunning(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}
