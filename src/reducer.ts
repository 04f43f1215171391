/**
 * Reducer
 * Layer: core
 *
 * Provided ports:
 *   - reducer.applyOutcome
 *   - reducer.createInitialState
 *
 * Pure functions folding accepted fetch outcomes into the monitor state.
 *
 * Per accepted outcome:
 *   success:
 *     update_count += 1, consecutive_failures = 0
 *     record a status change if the status differs from the latest one
 *     merge relayed alerts (distinct by message + category)
 *     raise peak cpu/memory/error_rate
 *     latest = snapshot
 *   failure:
 *     failure_count += 1, consecutive_failures += 1
 *     last_error = formatted exhausted error
 *     latest is kept (the dashboard keeps showing the last good data)
 *
 * Outcomes carrying a sequence at or below last_sequence are ignored, so a
 * replayed update cannot be counted twice.
 */

import type {
  AlertRecord,
  FetchOutcome,
  HealthSnapshot,
  MonitorState,
  PeakMetrics,
  SystemAlert,
} from './types';
import { AUTO_REFRESH_INTERVAL_MS, MAX_ALERTS_TRACKED } from './types';
import { describeFailure } from './refresh/retry';

// -----------------------------------------------------------------------------
// Port: reducer.createInitialState
// -----------------------------------------------------------------------------

export function createInitialState(intervalMs: number = AUTO_REFRESH_INTERVAL_MS): MonitorState {
  return {
    started_at_ts: new Date().toISOString(),
    stopped_at_ts: null,
    poller_started_at_ts: null,
    reported_at_ts: null,
    last_updated_ts: null,
    interval_ms: intervalMs,
    update_count: 0,
    failure_count: 0,
    consecutive_failures: 0,
    last_sequence: 0,
    last_error: null,
    latest: null,
    status_changes: [],
    alerts_seen: [],
    peak: { cpu_usage: 0, memory_usage: 0, error_rate: 0 },
  };
}

// -----------------------------------------------------------------------------
// Port: reducer.applyOutcome
// -----------------------------------------------------------------------------

export interface ApplyResult {
  state: MonitorState;
  /** False if the outcome was ignored as a replay */
  applied: boolean;
  /** True if this outcome changed the reported status */
  status_changed: boolean;
}

/**
 * Applies one accepted outcome. Returns new state without mutating input.
 *
 * @param sequence - Request sequence number the coordinator stamped
 * @param completedAt - ISO completion timestamp
 */
export function applyOutcome(
  state: MonitorState,
  outcome: FetchOutcome,
  sequence: number,
  completedAt: string,
): ApplyResult {
  if (sequence <= state.last_sequence) {
    return { state, applied: false, status_changed: false };
  }

  if (!outcome.success) {
    return {
      state: {
        ...state,
        failure_count: state.failure_count + 1,
        consecutive_failures: state.consecutive_failures + 1,
        last_sequence: sequence,
        last_updated_ts: completedAt,
        last_error: describeFailure(outcome),
      },
      applied: true,
      status_changed: false,
    };
  }

  const snapshot = outcome.snapshot;
  const previousStatus = state.latest?.status ?? null;
  const statusChanged = previousStatus !== snapshot.status;

  return {
    state: {
      ...state,
      update_count: state.update_count + 1,
      consecutive_failures: 0,
      last_sequence: sequence,
      last_updated_ts: completedAt,
      latest: snapshot,
      status_changes: statusChanged
        ? [...state.status_changes, { from: previousStatus, to: snapshot.status, at: completedAt }]
        : state.status_changes,
      alerts_seen: mergeAlerts(state.alerts_seen, snapshot.active_alerts, completedAt),
      peak: raisePeak(state.peak, snapshot),
    },
    applied: true,
    status_changed: statusChanged,
  };
}

// -----------------------------------------------------------------------------
// Lifecycle helpers
// -----------------------------------------------------------------------------

/**
 * Stamps the poller start time, which the pre step waits for.
 */
export function markPollerStarted(state: MonitorState, timestamp?: string): MonitorState {
  return { ...state, poller_started_at_ts: timestamp ?? new Date().toISOString() };
}

/**
 * Marks the state as stopped. Idempotent: keeps an existing stop time.
 */
export function markStopped(state: MonitorState, timestamp?: string): MonitorState {
  if (state.stopped_at_ts !== null) {
    return state;
  }
  return { ...state, stopped_at_ts: timestamp ?? new Date().toISOString() };
}

/**
 * Records that the job summary has been written, so a later stop does not
 * report again.
 */
export function markReported(state: MonitorState, timestamp?: string): MonitorState {
  return { ...state, reported_at_ts: timestamp ?? new Date().toISOString() };
}

// -----------------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------------

function alertKey(alert: Pick<SystemAlert, 'message' | 'category'>): string {
  return `${alert.category}\u0000${alert.message}`;
}

/**
 * Merges relayed alerts into the distinct-alert list, keeping first-seen
 * order. Beyond MAX_ALERTS_TRACKED the oldest records are dropped.
 */
export function mergeAlerts(
  seen: AlertRecord[],
  alerts: readonly SystemAlert[],
  timestamp: string,
): AlertRecord[] {
  if (alerts.length === 0) {
    return seen;
  }

  const merged = seen.map((record) => ({ ...record }));
  const index = new Map(merged.map((record, i) => [alertKey(record), i]));

  for (const alert of alerts) {
    const key = alertKey(alert);
    const existing = index.get(key);
    if (existing !== undefined) {
      const record = merged[existing];
      if (record) {
        record.times_seen += 1;
        record.priority = alert.priority;
        record.requires_action = alert.requires_action;
      }
      continue;
    }
    index.set(key, merged.length);
    merged.push({
      message: alert.message,
      priority: alert.priority,
      category: alert.category,
      requires_action: alert.requires_action,
      first_seen_ts: timestamp,
      times_seen: 1,
    });
  }

  return merged.length > MAX_ALERTS_TRACKED ? merged.slice(-MAX_ALERTS_TRACKED) : merged;
}

function raisePeak(peak: PeakMetrics, snapshot: HealthSnapshot): PeakMetrics {
  const metrics = snapshot.performance_metrics;
  return {
    cpu_usage: Math.max(peak.cpu_usage, metrics.cpu_usage),
    memory_usage: Math.max(peak.memory_usage, metrics.memory_usage),
    error_rate: Math.max(peak.error_rate, metrics.error_rate),
  };
}
