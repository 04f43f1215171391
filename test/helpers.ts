/**
 * Shared test helpers.
 */

import type {
  FetchFailure,
  FetchSuccess,
  HealthSnapshot,
  MonitorState,
  SystemAlert,
} from '../src/types';

export function makeSnapshot(overrides: Partial<HealthSnapshot> = {}): HealthSnapshot {
  return {
    status: 'Operational',
    uptime_seconds: 3600,
    version: '2.4.0',
    performance_metrics: {
      db_response_time: 40,
      db_health_score: 95,
      memory_usage: 50,
      cpu_usage: 20,
      requests_per_minute: 1000,
      error_rate: 0.01,
    },
    database_health: {
      avg_response_time: 35,
      connection_pool_healthy: true,
      health_score: 95,
      active_connections: 10,
      queries_last_hour: 40000,
    },
    active_alerts: [],
    pending_decisions: [],
    generated_at: '2026-03-02T10:00:00.000Z',
    ...overrides,
  };
}

export function makeAlert(overrides: Partial<SystemAlert> = {}): SystemAlert {
  return {
    message: 'CPU usage above 90%',
    priority: 'High',
    created_at: '2026-03-02T09:58:00.000Z',
    category: 'performance',
    requires_action: true,
    ...overrides,
  };
}

export function makeSuccess(snapshot: HealthSnapshot = makeSnapshot(), attempts = 1): FetchSuccess {
  return { success: true, snapshot, attempts };
}

export function makeFailure(message = 'Network error: connection refused', attempts = 4): FetchFailure {
  return {
    success: false,
    error: {
      kind: 'exhausted',
      cause: { kind: 'transport', message, attempt: attempts },
      attempts,
    },
  };
}

export function makeState(overrides: Partial<MonitorState> = {}): MonitorState {
  return {
    started_at_ts: '2026-03-02T10:00:00.000Z',
    stopped_at_ts: null,
    poller_started_at_ts: null,
    reported_at_ts: null,
    last_updated_ts: null,
    interval_ms: 30000,
    update_count: 0,
    failure_count: 0,
    consecutive_failures: 0,
    last_sequence: 0,
    last_error: null,
    latest: null,
    status_changes: [],
    alerts_seen: [],
    peak: { cpu_usage: 0, memory_usage: 0, error_rate: 0 },
    ...overrides,
  };
}

/**
 * A promise that can be resolved from the outside.
 */
export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

/**
 * Lets every queued promise callback run.
 */
export function flushPromises(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
