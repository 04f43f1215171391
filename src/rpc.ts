/**
 * Simulator RPC Client
 * Layer: infra
 *
 * Provided ports:
 *   - rpc.fetchSystemHealth
 *   - rpc.createStatusFetcher
 *
 * Calls get_system_health on the simulator's JSON-RPC bridge and validates
 * the returned snapshot.
 */

import type {
  AlertPriority,
  DatabaseHealth,
  FetchAttemptResult,
  HealthSnapshot,
  MonitorConfig,
  PerformanceMetrics,
  StatusFetcher,
  SystemAlert,
} from './types';
import { FETCH_TIMEOUT_MS } from './types';
import { isARealObject, isFiniteNumber } from './utils';

// -----------------------------------------------------------------------------
// Constants
// -----------------------------------------------------------------------------

const HEALTH_METHOD = 'get_system_health';
const USER_AGENT = 'promotion-health-monitor';

const ALERT_PRIORITIES: readonly AlertPriority[] = ['Critical', 'High', 'Medium', 'Low', 'Info'];

let requestId = 0;

// -----------------------------------------------------------------------------
// Port: rpc.fetchSystemHealth
// -----------------------------------------------------------------------------

export type RpcClientConfig = Pick<MonitorConfig, 'endpoint' | 'token'>;

/**
 * Performs a single get_system_health call.
 * Never rejects: every failure is classified as transport or decode.
 *
 * @param signal - Aborts the request early, on top of the per-call timeout
 */
export async function fetchSystemHealth(
  config: RpcClientConfig,
  signal?: AbortSignal,
): Promise<FetchAttemptResult> {
  const receivedAt = new Date().toISOString();

  // Set up abort controller with timeout to prevent indefinite hangs
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), FETCH_TIMEOUT_MS);
  const onCancel = (): void => controller.abort();
  if (signal?.aborted) {
    controller.abort();
  } else {
    signal?.addEventListener('abort', onCancel, { once: true });
  }

  const headers: Record<string, string> = {
    Accept: 'application/json',
    'Content-Type': 'application/json',
    'User-Agent': USER_AGENT,
  };
  if (config.token) {
    headers['Authorization'] = `Bearer ${config.token}`;
  }

  requestId += 1;
  const body = JSON.stringify({ jsonrpc: '2.0', id: requestId, method: HEALTH_METHOD, params: {} });

  let text: string;
  try {
    const response = await fetch(config.endpoint, {
      signal: controller.signal,
      method: 'POST',
      headers,
      body,
    });

    if (!response.ok) {
      const statusText = response.statusText || 'Unknown error';
      return { success: false, kind: 'transport', error: `HTTP ${response.status}: ${statusText}` };
    }

    text = await response.text();
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));

    if (error.name === 'AbortError') {
      return {
        success: false,
        kind: 'transport',
        error: signal?.aborted
          ? 'Request cancelled'
          : `Request timeout: backend did not respond within ${FETCH_TIMEOUT_MS}ms`,
      };
    }

    return { success: false, kind: 'transport', error: `Network error: ${error.message}` };
  } finally {
    clearTimeout(timeoutId);
    signal?.removeEventListener('abort', onCancel);
  }

  return decodeRpcResponse(text, receivedAt);
}

/**
 * Decodes a JSON-RPC response body into a snapshot.
 * An RPC error member is a transport failure; anything unreadable is a decode failure.
 */
export function decodeRpcResponse(text: string, receivedAt: string): FetchAttemptResult {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return { success: false, kind: 'decode', error: 'Response body is not valid JSON' };
  }

  if (!isARealObject(raw)) {
    return { success: false, kind: 'decode', error: 'Response is not a JSON-RPC object' };
  }

  const rpcError = raw['error'];
  if (isARealObject(rpcError)) {
    const code = isFiniteNumber(rpcError['code']) ? rpcError['code'] : 'unknown';
    const message = typeof rpcError['message'] === 'string' ? rpcError['message'] : 'no message';
    return { success: false, kind: 'transport', error: `RPC error ${code}: ${message}` };
  }

  const snapshot = parseHealthSnapshot(raw['result'], receivedAt);
  if (!snapshot) {
    return { success: false, kind: 'decode', error: 'Failed to parse system health response' };
  }

  return { success: true, snapshot };
}

// -----------------------------------------------------------------------------
// Port: rpc.createStatusFetcher
// -----------------------------------------------------------------------------

/**
 * Binds the RPC client to a configuration as an injectable StatusFetcher.
 */
export function createRpcStatusFetcher(config: RpcClientConfig): StatusFetcher {
  return (signal) => fetchSystemHealth(config, signal);
}

// -----------------------------------------------------------------------------
// Validation
// -----------------------------------------------------------------------------

function hasNumberFields(value: Record<string, unknown>, fields: readonly string[]): boolean {
  return fields.every((field) => isFiniteNumber(value[field]));
}

/**
 * Validates that metrics have the expected shape.
 */
export function isValidMetrics(value: unknown): value is PerformanceMetrics {
  if (!isARealObject(value)) {
    return false;
  }
  return hasNumberFields(value, [
    'db_response_time',
    'db_health_score',
    'memory_usage',
    'cpu_usage',
    'requests_per_minute',
    'error_rate',
  ]);
}

export function isValidDatabaseHealth(value: unknown): value is DatabaseHealth {
  if (!isARealObject(value)) {
    return false;
  }
  return (
    typeof value['connection_pool_healthy'] === 'boolean' &&
    hasNumberFields(value, [
      'avg_response_time',
      'health_score',
      'active_connections',
      'queries_last_hour',
    ])
  );
}

function isAlertPriority(value: unknown): value is AlertPriority {
  return ALERT_PRIORITIES.some((priority) => priority === value);
}

export function isValidAlert(value: unknown): value is SystemAlert {
  if (!isARealObject(value)) {
    return false;
  }
  return (
    typeof value['message'] === 'string' &&
    isAlertPriority(value['priority']) &&
    typeof value['created_at'] === 'string' &&
    typeof value['category'] === 'string' &&
    typeof value['requires_action'] === 'boolean'
  );
}

/**
 * Parses the get_system_health result into a HealthSnapshot.
 * Returns null if a required field is missing or mistyped.
 * Malformed alerts and non-string decisions are skipped rather than failing
 * the whole snapshot; a missing generated_at falls back to `receivedAt`.
 */
export function parseHealthSnapshot(raw: unknown, receivedAt: string): HealthSnapshot | null {
  if (!isARealObject(raw)) {
    return null;
  }

  const status = raw['status'];
  const version = raw['version'];
  const uptime = raw['uptime_seconds'];
  const metrics = raw['performance_metrics'];
  const database = raw['database_health'];
  const alerts = raw['active_alerts'];
  const decisions = raw['pending_decisions'];

  if (typeof status !== 'string' || status.length === 0) return null;
  if (typeof version !== 'string') return null;
  if (!isFiniteNumber(uptime)) return null;
  if (!isValidMetrics(metrics)) return null;
  if (!isValidDatabaseHealth(database)) return null;
  if (!Array.isArray(alerts) || !Array.isArray(decisions)) return null;

  const generatedAt = raw['generated_at'];

  return {
    status,
    uptime_seconds: uptime,
    version,
    performance_metrics: {
      db_response_time: metrics.db_response_time,
      db_health_score: metrics.db_health_score,
      memory_usage: metrics.memory_usage,
      cpu_usage: metrics.cpu_usage,
      requests_per_minute: metrics.requests_per_minute,
      error_rate: metrics.error_rate,
    },
    database_health: {
      avg_response_time: database.avg_response_time,
      connection_pool_healthy: database.connection_pool_healthy,
      health_score: database.health_score,
      active_connections: database.active_connections,
      queries_last_hour: database.queries_last_hour,
    },
    active_alerts: alerts.filter(isValidAlert).map((alert) => ({ ...alert })),
    pending_decisions: decisions.filter((d): d is string => typeof d === 'string'),
    generated_at: typeof generatedAt === 'string' ? generatedAt : receivedAt,
  };
}
