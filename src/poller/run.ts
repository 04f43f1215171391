/**
 * Poller Process
 *
 * Entry logic of the detached background poller. Runs one refresh session
 * against the simulator backend until SIGTERM (or the lifetime cap), mapping
 * SIGUSR1 to a manual refresh.
 *
 * Startup sequence:
 *   1. Read existing state (written by the pre step) or create one
 *   2. Stamp poller_started_at_ts and write state (signals "alive" to parent)
 *   3. Start the coordinator; the first fetch is issued immediately
 *
 * Shutdown sequence (SIGTERM or lifetime cap):
 *   1. Stop the coordinator (no further fetches or publishes)
 *   2. Wait for the loop and any in-flight fetch to finish
 *   3. Mark stopped, write final state, exit 0
 */

import type { MonitorConfig, StatusFetcher } from '../types';
import { AUTO_REFRESH_INTERVAL_MS, MAX_LIFETIME_MS } from '../types';
import { createInitialState, markPollerStarted, markStopped } from '../reducer';
import { readState, writeState } from '../state';
import { parseBooleanFlag, parsePositiveInt } from '../utils';
import { createRpcStatusFetcher } from '../rpc';
import { RefreshCoordinator } from '../refresh';
import { createStateFileSink } from './state-sink';

export const ENV_ENDPOINT = 'PROMOTION_HEALTH_MONITOR_ENDPOINT';
export const ENV_TOKEN = 'PROMOTION_HEALTH_MONITOR_TOKEN';
export const ENV_INTERVAL_MS = 'PROMOTION_HEALTH_MONITOR_INTERVAL_MS';
export const ENV_DIAGNOSTICS = 'PROMOTION_HEALTH_MONITOR_DIAGNOSTICS';

// -----------------------------------------------------------------------------
// Configuration
// -----------------------------------------------------------------------------

export type PollerConfigOutcome =
  | { success: true; config: MonitorConfig }
  | { success: false; error: string };

/**
 * Reads the poller configuration handed over by spawnPoller.
 */
export function readPollerConfig(env: NodeJS.ProcessEnv = process.env): PollerConfigOutcome {
  const endpoint = env[ENV_ENDPOINT];
  if (!endpoint) {
    return { success: false, error: `${ENV_ENDPOINT} not set` };
  }

  return {
    success: true,
    config: {
      endpoint,
      token: env[ENV_TOKEN] || null,
      interval_ms: parsePositiveInt(env[ENV_INTERVAL_MS], AUTO_REFRESH_INTERVAL_MS),
    },
  };
}

/**
 * Returns true if the diagnostics env var is truthy.
 */
export function isDiagnosticsEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return parseBooleanFlag(env[ENV_DIAGNOSTICS]);
}

// -----------------------------------------------------------------------------
// Poller run
// -----------------------------------------------------------------------------

/**
 * Dependency injection interface for runPoller.
 * Production defaults are used when not provided by tests.
 */
export interface PollerDeps {
  registerSignal: (event: NodeJS.Signals, handler: () => void) => void;
  exit: (code: number) => void;
  createFetcher: (config: MonitorConfig) => StatusFetcher;
  setTimer: (handler: () => void, ms: number) => NodeJS.Timeout;
  clearTimer: (timer: NodeJS.Timeout) => void;
}

const defaultDeps: PollerDeps = {
  registerSignal: (event, handler) => {
    process.on(event, handler);
  },
  exit: (code) => {
    process.exit(code);
  },
  createFetcher: createRpcStatusFetcher,
  setTimer: (handler, ms) => setTimeout(handler, ms),
  clearTimer: (timer) => clearTimeout(timer),
};

export async function runPoller(
  config: MonitorConfig,
  diagnosticsEnabled: boolean,
  deps: PollerDeps = defaultDeps,
): Promise<void> {
  const stateResult = readState();
  const initialState = markPollerStarted(
    stateResult.success ? stateResult.state : createInitialState(config.interval_ms),
  );
  writeState(initialState);

  const sink = createStateFileSink(initialState, diagnosticsEnabled);
  const coordinator = new RefreshCoordinator(deps.createFetcher(config), sink, {
    intervalMs: config.interval_ms,
  });

  let stopping = false;
  const shutdown = (reason: string): void => {
    if (stopping) return;
    stopping = true;
    console.error(`Poller stopping: ${reason}`);
    coordinator.stop();
  };

  deps.registerSignal('SIGTERM', () => shutdown('SIGTERM received'));
  deps.registerSignal('SIGUSR1', () => {
    coordinator.manualRefresh().catch((error: unknown) => {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`Manual refresh failed: ${message}`);
    });
  });

  // Never outlive the job by more than the lifetime cap
  const lifetimeTimer = deps.setTimer(
    () => shutdown(`exceeded max lifetime (${MAX_LIFETIME_MS}ms)`),
    MAX_LIFETIME_MS,
  );

  coordinator.start();
  await coordinator.whenStopped();
  deps.clearTimer(lifetimeTimer);

  writeState(markStopped(sink.getState()));
  deps.exit(0);
}

// -----------------------------------------------------------------------------
// Child process entry point
// -----------------------------------------------------------------------------

/**
 * Entry point when run as child process.
 * Exported for use by poller-entry.ts
 */
export async function main(): Promise<void> {
  const configResult = readPollerConfig();
  if (!configResult.success) {
    console.error(configResult.error);
    process.exit(1);
  }

  await runPoller(configResult.config, isDiagnosticsEnabled());
}
