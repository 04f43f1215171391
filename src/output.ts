/**
 * Output Renderer
 * Layer: infra
 *
 * Provided ports:
 *   - output.render
 *
 * Generates the job summary for the GitHub step summary and the console.
 */

import * as fs from 'fs';
import type { AlertPriority, AlertRecord, MonitorState, SummaryData, SystemStatus } from './types';

// -----------------------------------------------------------------------------
// Port: output.render
// -----------------------------------------------------------------------------

export interface RenderResult {
  /** Markdown for step summary */
  markdown: string;
  /** Plain text for console */
  console: string;
}

export function render(data: SummaryData): RenderResult {
  return { markdown: renderMarkdown(data), console: renderConsole(data) };
}

// -----------------------------------------------------------------------------
// Status badges
// -----------------------------------------------------------------------------

export type StatusLevel = 'operational' | 'warning' | 'critical' | 'unknown';

/**
 * Maps the upstream status string to a display level.
 */
export function classifyStatus(status: SystemStatus): StatusLevel {
  switch (status) {
    case 'Operational':
      return 'operational';
    case 'Warning':
      return 'warning';
    case 'Critical':
      return 'critical';
    default:
      return 'unknown';
  }
}

const STATUS_BADGES: Record<StatusLevel, string> = {
  operational: '🟢',
  warning: '🟡',
  critical: '🔴',
  unknown: '⚪',
};

const PRIORITY_RANK: Record<AlertPriority, number> = {
  Critical: 0,
  High: 1,
  Medium: 2,
  Low: 3,
  Info: 4,
};

// -----------------------------------------------------------------------------
// Markdown rendering
// -----------------------------------------------------------------------------

/**
 * Renders full markdown summary for $GITHUB_STEP_SUMMARY.
 */
export function renderMarkdown(data: SummaryData): string {
  const { state, duration_seconds, warnings } = data;

  const lines: string[] = [];

  lines.push('## Promotion Health Monitor — Job Summary');
  lines.push('');

  lines.push(
    `**Duration:** ${formatDuration(duration_seconds)} | **Updates:** ${state.update_count} | **Failures:** ${state.failure_count}`,
  );
  lines.push('');

  const latest = state.latest;
  if (latest) {
    const badge = STATUS_BADGES[classifyStatus(latest.status)];
    lines.push(
      `**Status:** ${badge} ${latest.status} | **Version:** ${latest.version} | **Uptime:** ${formatDuration(latest.uptime_seconds)}`,
    );
    lines.push('');

    const metrics = latest.performance_metrics;
    lines.push('| Metric | Latest | Peak |');
    lines.push('|--------|-------:|-----:|');
    lines.push(`| CPU usage | ${metrics.cpu_usage}% | ${state.peak.cpu_usage}% |`);
    lines.push(`| Memory usage | ${metrics.memory_usage}% | ${state.peak.memory_usage}% |`);
    lines.push(
      `| Error rate | ${formatRate(metrics.error_rate)} | ${formatRate(state.peak.error_rate)} |`,
    );
    lines.push(`| DB response time | ${metrics.db_response_time} ms | - |`);
    lines.push(`| Requests / min | ${metrics.requests_per_minute} | - |`);
    lines.push('');
  } else {
    lines.push('*No health snapshot was received during this job.*');
    lines.push('');
  }

  if (state.alerts_seen.length > 0) {
    lines.push('### Alerts');
    lines.push('');
    lines.push('| Priority | Category | Message | Action | Seen |');
    lines.push('|----------|----------|---------|:------:|-----:|');
    for (const alert of sortAlerts(state.alerts_seen)) {
      const action = alert.requires_action ? 'yes' : '';
      lines.push(
        `| ${alert.priority} | ${escapeCell(alert.category)} | ${escapeCell(alert.message)} | ${action} | ${alert.times_seen} |`,
      );
    }
    lines.push('');
  }

  if (latest && latest.pending_decisions.length > 0) {
    lines.push('### Pending decisions');
    lines.push('');
    for (const decision of latest.pending_decisions) {
      lines.push(`- ${decision}`);
    }
    lines.push('');
  }

  if (state.status_changes.length > 1) {
    lines.push('### Status changes');
    lines.push('');
    for (const change of state.status_changes) {
      lines.push(`- ${formatTimestamp(change.at)}: ${change.from ?? 'initial'} → ${change.to}`);
    }
    lines.push('');
  }

  if (warnings.length > 0) {
    lines.push('### Warnings');
    lines.push('');
    for (const warning of warnings) {
      lines.push(`- ${warning}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}

// -----------------------------------------------------------------------------
// Console rendering
// -----------------------------------------------------------------------------

/**
 * Renders concise console output.
 */
export function renderConsole(data: SummaryData): string {
  const { state, duration_seconds, warnings } = data;

  const lines: string[] = [];

  const status = state.latest?.status ?? 'unknown';
  lines.push(
    `Promotion health: ${status} after ${formatDuration(duration_seconds)} ` +
      `(${state.update_count} updates, ${state.failure_count} failures)`,
  );

  const actionable = state.alerts_seen.filter((alert) => alert.requires_action);
  if (actionable.length > 0) {
    lines.push(`Alerts requiring action: ${actionable.length}`);
  }

  if (warnings.length > 0) {
    lines.push(`Warnings: ${warnings.length}`);
  }

  return lines.join('\n');
}

// -----------------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------------

/**
 * Orders alerts by priority, then first-seen time.
 */
function sortAlerts(alerts: AlertRecord[]): AlertRecord[] {
  return [...alerts].sort(
    (a, b) =>
      PRIORITY_RANK[a.priority] - PRIORITY_RANK[b.priority] ||
      a.first_seen_ts.localeCompare(b.first_seen_ts),
  );
}

function escapeCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

/**
 * Formats duration in human-readable form.
 */
export function formatDuration(seconds: number): string {
  if (seconds < 60) {
    return `${seconds}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const secs = seconds % 60;
  if (minutes < 60) {
    return secs > 0 ? `${minutes}m ${secs}s` : `${minutes}m`;
  }
  const hours = Math.floor(minutes / 60);
  const mins = minutes % 60;
  return mins > 0 ? `${hours}h ${mins}m` : `${hours}h`;
}

/**
 * Formats a 0-1 rate as a percentage with two decimals.
 */
function formatRate(rate: number): string {
  return `${(rate * 100).toFixed(2)}%`;
}

function formatTimestamp(iso: string): string {
  return iso.replace('T', ' ').replace(/\.\d{3}Z$/, ' UTC').replace(/Z$/, ' UTC');
}

// -----------------------------------------------------------------------------
// GitHub Step Summary
// -----------------------------------------------------------------------------

/**
 * Writes markdown to GitHub step summary.
 */
export function writeStepSummary(markdown: string): void {
  const summaryPath = process.env['GITHUB_STEP_SUMMARY'];
  if (summaryPath) {
    fs.appendFileSync(summaryPath, markdown + '\n');
  }
}

// -----------------------------------------------------------------------------
// Warning generation
// -----------------------------------------------------------------------------

/**
 * Generates warnings based on state analysis. Alerts are relayed as
 * reported upstream; only their counts feed into warnings.
 */
export function generateWarnings(state: MonitorState): string[] {
  const warnings: string[] = [];

  if (state.latest === null) {
    warnings.push('No health snapshot was received from the backend');
  }

  if (state.failure_count > 0) {
    warnings.push(`${state.failure_count} refresh(es) failed after retries`);
  }

  if (state.consecutive_failures > 0 && state.latest !== null) {
    warnings.push(
      `Last ${state.consecutive_failures} refresh(es) failed; the reported status may be stale`,
    );
  }

  if (state.latest && classifyStatus(state.latest.status) === 'critical') {
    warnings.push('Backend reported Critical status at the last update');
  }

  const actionable = state.alerts_seen.filter((alert) => alert.requires_action).length;
  if (actionable > 0) {
    warnings.push(`${actionable} alert(s) require action`);
  }

  if (state.last_error) {
    warnings.push(`Last error: ${state.last_error}`);
  }

  return warnings;
}
