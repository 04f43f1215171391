/**
 * Refresh Engine
 * Layer: engine
 *
 * Status polling with bounded retries, single-flight manual refresh and
 * cooperative cancellation. Transport-agnostic: callers inject the fetcher
 * and the sink.
 */

export { fetchWithRetry, computeBackoffDelay, describeFailure } from './retry';
export type { RetryOptions, RetryDeps } from './retry';
export { runPollingLoop } from './polling-loop';
export type { PollingLoopDeps } from './polling-loop';
export { PollingSession } from './session';
export type { SessionPhase } from './session';
export { RefreshCoordinator } from './coordinator';
export type { CoordinatorOptions, CoordinatorDeps, RefreshTrigger } from './coordinator';
export type {
  ErrorDetail,
  ExhaustedError,
  FetchAttemptResult,
  FetchOutcome,
  HealthSnapshot,
  StateSink,
  StatusFetcher,
} from '../types';
export { AUTO_REFRESH_INTERVAL_MS, BASE_RETRY_DELAY_MS, MAX_RETRY_ATTEMPTS } from '../types';
