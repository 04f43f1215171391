/**
 * State Manager
 * Layer: core
 *
 * Provided ports:
 *   - state.read
 *   - state.write
 *   - state.pid
 *
 * Persists the monitor state in $RUNNER_TEMP so the pre, main and post
 * steps and the background poller can share it. Writes are atomic
 * (temp file + rename) so a reader never sees a partial file.
 */

import * as fs from 'fs';
import type { MonitorState } from './types';
import { getStateDir, getStatePath, getStateTmpPath, getPidPath } from './paths';
import { isARealObject, isStringOrNull, sleep } from './utils';

// -----------------------------------------------------------------------------
// Port: state.read
// -----------------------------------------------------------------------------

export interface ReadStateResult {
  success: true;
  state: MonitorState;
}

export interface ReadStateError {
  success: false;
  error: string;
  /** True if file doesn't exist (expected before the first write) */
  notFound: boolean;
}

export type ReadStateOutcome = ReadStateResult | ReadStateError;

export function readState(): ReadStateOutcome {
  const statePath = getStatePath();

  try {
    const content = fs.readFileSync(statePath, 'utf-8');
    const parsed = JSON.parse(content) as unknown;

    if (!isValidState(parsed)) {
      return {
        success: false,
        error: 'Invalid state structure',
        notFound: false,
      };
    }

    return { success: true, state: parsed };
  } catch (err) {
    const error = err as NodeJS.ErrnoException;
    if (error.code === 'ENOENT') {
      return {
        success: false,
        error: 'State file not found',
        notFound: true,
      };
    }
    return {
      success: false,
      error: `Failed to read state: ${error.message}`,
      notFound: false,
    };
  }
}

// -----------------------------------------------------------------------------
// Port: state.write
// -----------------------------------------------------------------------------

export interface WriteStateResult {
  success: true;
}

export interface WriteStateError {
  success: false;
  error: string;
}

export type WriteStateOutcome = WriteStateResult | WriteStateError;

/**
 * Writes monitor state to disk atomically.
 * Creates the state directory if needed and removes the temp file on failure.
 */
export function writeState(state: MonitorState): WriteStateOutcome {
  const stateDir = getStateDir();
  const statePath = getStatePath();
  const tmpPath = getStateTmpPath();

  try {
    fs.mkdirSync(stateDir, { recursive: true });
    fs.writeFileSync(tmpPath, JSON.stringify(state, null, 2), 'utf-8');
    fs.renameSync(tmpPath, statePath);
    return { success: true };
  } catch (err) {
    try {
      fs.unlinkSync(tmpPath);
    } catch {
      // Temp file may never have been created
    }
    const error = err as Error;
    return {
      success: false,
      error: `Failed to write state: ${error.message}`,
    };
  }
}

// -----------------------------------------------------------------------------
// Validation
// -----------------------------------------------------------------------------

/**
 * Validates that parsed JSON has the MonitorState shape.
 * The latest snapshot is trusted as written by the poller.
 */
export function isValidState(value: unknown): value is MonitorState {
  if (!isARealObject(value)) {
    return false;
  }

  if (typeof value['started_at_ts'] !== 'string') return false;
  if (!isStringOrNull(value['stopped_at_ts'])) return false;
  if (!isStringOrNull(value['poller_started_at_ts'])) return false;
  if (!isStringOrNull(value['reported_at_ts'])) return false;
  if (!isStringOrNull(value['last_updated_ts'])) return false;
  if (!isStringOrNull(value['last_error'])) return false;

  const counters = [
    'interval_ms',
    'update_count',
    'failure_count',
    'consecutive_failures',
    'last_sequence',
  ];
  if (!counters.every((field) => typeof value[field] === 'number')) {
    return false;
  }

  if (value['latest'] !== null && !isARealObject(value['latest'])) return false;
  if (!Array.isArray(value['status_changes'])) return false;
  if (!Array.isArray(value['alerts_seen'])) return false;
  if (!isARealObject(value['peak'])) return false;

  return true;
}

// -----------------------------------------------------------------------------
// Port: state.pid
// -----------------------------------------------------------------------------

export function writePid(pid: number): WriteStateOutcome {
  try {
    fs.mkdirSync(getStateDir(), { recursive: true });
    fs.writeFileSync(getPidPath(), String(pid), 'utf-8');
    return { success: true };
  } catch (err) {
    const error = err as Error;
    return {
      success: false,
      error: `Failed to write PID: ${error.message}`,
    };
  }
}

export function readPid(): number | null {
  try {
    const content = fs.readFileSync(getPidPath(), 'utf-8');
    const pid = parseInt(content.trim(), 10);
    return isNaN(pid) ? null : pid;
  } catch {
    return null;
  }
}

export function removePid(): void {
  try {
    fs.unlinkSync(getPidPath());
  } catch {
    // File may not exist
  }
}

// -----------------------------------------------------------------------------
// Startup verification
// -----------------------------------------------------------------------------

export type VerifyStartupOutcome = { success: true } | { success: false; error: string };

const STARTUP_TIMEOUT_MS = 5000;
const STARTUP_CHECK_INTERVAL_MS = 100;

/**
 * Waits for the poller to stamp poller_started_at_ts into the state file,
 * which it does before issuing its first fetch.
 */
export async function verifyPollerStartup(
  timeoutMs: number = STARTUP_TIMEOUT_MS,
): Promise<VerifyStartupOutcome> {
  const deadline = Date.now() + timeoutMs;

  while (Date.now() < deadline) {
    const result = readState();
    if (result.success && result.state.poller_started_at_ts !== null) {
      return { success: true };
    }
    await sleep(STARTUP_CHECK_INTERVAL_MS);
  }

  return {
    success: false,
    error: `Poller did not report startup within ${timeoutMs}ms`,
  };
}
