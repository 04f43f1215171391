/**
 * Poller
 * Layer: poller
 *
 * Provided ports:
 *   - poller.spawn
 *   - poller.signal
 *   - poller.run
 *
 * Background process that keeps a refresh session running against the
 * simulator backend and persists every accepted outcome.
 */

export { spawnPoller, buildPollerEnv, resolvePollerEntry } from './poller/spawn';
export type { SpawnOutcome } from './poller/spawn';
export {
  signalPoller,
  requestRefresh,
  killPoller,
  killPollerWithVerification,
  isProcessRunning,
} from './poller/kill';
export type { SignalOutcome, SignalResult, SignalError } from './poller/kill';
export {
  runPoller,
  main,
  readPollerConfig,
  isDiagnosticsEnabled,
  ENV_ENDPOINT,
  ENV_TOKEN,
  ENV_INTERVAL_MS,
  ENV_DIAGNOSTICS,
} from './poller/run';
export type { PollerDeps, PollerConfigOutcome } from './poller/run';
export { createStateFileSink } from './poller/state-sink';
export type { StateFileSink, StateSinkDeps } from './poller/state-sink';
