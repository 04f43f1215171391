/**
 * Main Entry
 * Layer: action
 *
 * GitHub Action entry point dispatching start/refresh/stop modes.
 *
 * Required ports:
 *   - poller.spawn
 *   - poller.signal
 *   - state.read
 *   - output.render
 */

import * as core from '@actions/core';
import { isProcessRunning, requestRefresh } from './poller';
import { readPid } from './state';
import { startMonitor } from './start';
import { stopMonitor } from './stop';
import { isDiagnosticsEnabled, readActionMode, readMonitorConfig } from './inputs';

// -----------------------------------------------------------------------------
// Start mode
// -----------------------------------------------------------------------------

/**
 * Starts the monitor unless the pre step already did.
 */
export async function handleStart(diagnosticsEnabled: boolean): Promise<void> {
  const pid = readPid();
  if (pid && isProcessRunning(pid)) {
    core.info(`Monitor already running (PID: ${pid})`);
    return;
  }
  await startMonitor(readMonitorConfig(), diagnosticsEnabled);
}

// -----------------------------------------------------------------------------
// Refresh mode
// -----------------------------------------------------------------------------

/**
 * Signals the running poller to fetch now. The result lands in the state file.
 */
export function handleRefresh(): void {
  const pid = readPid();
  if (!pid) {
    throw new Error('No PID file found. Start the monitor before requesting a refresh.');
  }

  const result = requestRefresh(pid);
  if (!result.success) {
    throw new Error(
      result.notFound
        ? `Poller process ${pid} not found (may have exited)`
        : result.error,
    );
  }

  core.info(`Manual refresh requested (PID: ${pid})`);
}

// -----------------------------------------------------------------------------
// Action entry point
// -----------------------------------------------------------------------------

export async function run(): Promise<void> {
  try {
    const mode = readActionMode();
    const diagnosticsEnabled = isDiagnosticsEnabled();

    switch (mode) {
      case 'start':
        await handleStart(diagnosticsEnabled);
        break;
      case 'refresh':
        handleRefresh();
        break;
      case 'stop':
        await stopMonitor(diagnosticsEnabled);
        break;
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    core.setFailed(message);
  }
}
