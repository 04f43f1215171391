/**
 * Boundary types for promotion-health-monitor
 *
 * These types define the contracts between modules: the health snapshot
 * served by the simulator backend, the outcomes produced by the refresh
 * engine, and the monitor state persisted by the background poller.
 */

// -----------------------------------------------------------------------------
// HealthSnapshot
// One complete health report returned by get_system_health
// -----------------------------------------------------------------------------

/** Status category reported upstream. Unknown values are kept verbatim. */
export type SystemStatus = 'Operational' | 'Warning' | 'Critical' | (string & {});

export type AlertPriority = 'Critical' | 'High' | 'Medium' | 'Low' | 'Info';

export interface PerformanceMetrics {
  /** Average database response time (ms) */
  readonly db_response_time: number;
  /** Database health score (0-100) */
  readonly db_health_score: number;
  /** Memory usage (percent) */
  readonly memory_usage: number;
  /** CPU usage (percent) */
  readonly cpu_usage: number;
  readonly requests_per_minute: number;
  /** Fraction of failed requests (0-1) */
  readonly error_rate: number;
}

export interface DatabaseHealth {
  readonly avg_response_time: number;
  readonly connection_pool_healthy: boolean;
  readonly health_score: number;
  readonly active_connections: number;
  readonly queries_last_hour: number;
}

export interface SystemAlert {
  readonly message: string;
  readonly priority: AlertPriority;
  /** ISO timestamp when the backend raised the alert */
  readonly created_at: string;
  readonly category: string;
  readonly requires_action: boolean;
}

export interface HealthSnapshot {
  readonly status: SystemStatus;
  readonly uptime_seconds: number;
  readonly version: string;
  readonly performance_metrics: PerformanceMetrics;
  readonly database_health: DatabaseHealth;
  /** Alerts computed upstream, in backend order */
  readonly active_alerts: readonly SystemAlert[];
  /** Decisions awaiting an operator, in backend order */
  readonly pending_decisions: readonly string[];
  /** Producer-side ISO timestamp */
  readonly generated_at: string;
}

// -----------------------------------------------------------------------------
// Fetch attempts and outcomes
// -----------------------------------------------------------------------------

/** transport: the remote call failed. decode: the response had the wrong shape. */
export type AttemptErrorKind = 'transport' | 'decode';

export interface ErrorDetail {
  readonly kind: AttemptErrorKind;
  readonly message: string;
  /** 1-based attempt number that produced this error */
  readonly attempt: number;
}

export interface AttemptSuccess {
  success: true;
  snapshot: HealthSnapshot;
}

export interface AttemptFailure {
  success: false;
  kind: AttemptErrorKind;
  error: string;
}

/** Result of one call to a StatusFetcher. */
export type FetchAttemptResult = AttemptSuccess | AttemptFailure;

/**
 * One attempt at fetching a health snapshot. Implementations should resolve
 * to a failure rather than reject; a rejection is treated as a transport error.
 * The signal aborts when the owning session is cancelled.
 */
export type StatusFetcher = (signal?: AbortSignal) => Promise<FetchAttemptResult>;

export interface ExhaustedError {
  readonly kind: 'exhausted';
  /** The error from the final attempt */
  readonly cause: ErrorDetail;
  /** Total attempts made, including the first */
  readonly attempts: number;
}

export interface FetchSuccess {
  success: true;
  snapshot: HealthSnapshot;
  /** Total attempts made, including the first */
  attempts: number;
}

export interface FetchFailure {
  success: false;
  error: ExhaustedError;
}

/** Produced exactly once per completed fetch-with-retries. */
export type FetchOutcome = FetchSuccess | FetchFailure;

/** Receives accepted outcomes in request-sequence order. */
export interface StateSink {
  /**
   * @param completedAt - ISO timestamp of when the outcome was accepted
   * @param sequence - Request sequence number within the session
   */
  onUpdate(outcome: FetchOutcome, completedAt: string, sequence: number): void;
}

// -----------------------------------------------------------------------------
// MonitorState
// State persisted to state.json by the background poller
// -----------------------------------------------------------------------------

export interface StatusChange {
  /** Status before the change (null for the first observation) */
  from: SystemStatus | null;
  to: SystemStatus;
  /** ISO completion timestamp of the update that observed the change */
  at: string;
}

export interface AlertRecord {
  message: string;
  priority: AlertPriority;
  category: string;
  requires_action: boolean;
  /** ISO timestamp of the first update that relayed this alert */
  first_seen_ts: string;
  /** Number of accepted updates that carried this alert */
  times_seen: number;
}

export interface PeakMetrics {
  cpu_usage: number;
  memory_usage: number;
  error_rate: number;
}

export interface MonitorState {
  /** ISO timestamp when monitoring started */
  started_at_ts: string;
  /** ISO timestamp when monitoring stopped (null if still running) */
  stopped_at_ts: string | null;
  /** ISO timestamp when poller process started (null before poller runs) */
  poller_started_at_ts: string | null;
  /** ISO timestamp when the job summary was written (null until then) */
  reported_at_ts: string | null;
  /** ISO timestamp of the last accepted outcome (null before the first) */
  last_updated_ts: string | null;
  /** Auto-refresh interval in milliseconds */
  interval_ms: number;
  /** Accepted successful outcomes */
  update_count: number;
  /** Accepted exhausted outcomes */
  failure_count: number;
  /** Exhausted outcomes since the last success */
  consecutive_failures: number;
  /** Highest sequence number applied to this state (0 before the first) */
  last_sequence: number;
  /** Last error message (null if no errors) */
  last_error: string | null;
  /** Latest snapshot (null until the first success) */
  latest: HealthSnapshot | null;
  status_changes: StatusChange[];
  alerts_seen: AlertRecord[];
  peak: PeakMetrics;
}

// -----------------------------------------------------------------------------
// SummaryData
// Data passed to output renderer for summary generation
// -----------------------------------------------------------------------------

export interface SummaryData {
  /** Final monitor state */
  state: MonitorState;
  /** Job duration in seconds */
  duration_seconds: number;
  /** Warning messages to display */
  warnings: string[];
}

// -----------------------------------------------------------------------------
// Configuration
// -----------------------------------------------------------------------------

export interface MonitorConfig {
  /** URL of the simulator's RPC bridge */
  endpoint: string;
  /** Optional bearer token for the bridge */
  token: string | null;
  /** Auto-refresh interval in milliseconds */
  interval_ms: number;
}

export type ActionMode = 'start' | 'refresh' | 'stop';

// -----------------------------------------------------------------------------
// Platform info
// -----------------------------------------------------------------------------

export type Platform = 'linux' | 'darwin' | 'win32' | 'unknown';

export interface PlatformInfo {
  platform: Platform;
  supported: boolean;
  reason?: string;
}

// -----------------------------------------------------------------------------
// UpdateLogEntry
// Diagnostic per-update record for the JSONL update log
// -----------------------------------------------------------------------------

export interface UpdateLogEntry {
  /** Request sequence number of the accepted outcome */
  sequence: number;
  /** ISO completion timestamp */
  completed_at: string;
  success: boolean;
  /** Attempts used by the fetch */
  attempts: number;
  /** Reported status (successful outcomes only) */
  status?: SystemStatus;
  /** Number of relayed alerts (successful outcomes only) */
  alert_count?: number;
  /** Final error (failed outcomes only) */
  error?: ErrorDetail;
}

// -----------------------------------------------------------------------------
// Constants
// -----------------------------------------------------------------------------

/** Retries after the first attempt before a fetch is exhausted */
export const MAX_RETRY_ATTEMPTS = 3;

/** Backoff base; retry n waits BASE_RETRY_DELAY_MS * 2^(n-1) */
export const BASE_RETRY_DELAY_MS = 1000;

export const AUTO_REFRESH_INTERVAL_MS = 30_000;

/** Timeout for one RPC call to the simulator backend (milliseconds) */
export const FETCH_TIMEOUT_MS = 10_000;

/** Maximum poller lifetime (6 hours in milliseconds) */
export const MAX_LIFETIME_MS = 6 * 60 * 60 * 1000;

export const STATE_DIR_NAME = 'promotion-health-monitor';
export const STATE_FILE_NAME = 'state.json';
export const PID_FILE_NAME = 'poller.pid';
export const UPDATE_LOG_FILE_NAME = 'update-log.jsonl';

/** Distinct alerts kept in state; older ones are dropped first */
export const MAX_ALERTS_TRACKED = 50;
