/**
 * Update Log
 * Layer: infra
 *
 * Provided ports:
 *   - updateLog.append
 *   - updateLog.read
 *
 * Append-only JSONL diagnostic log with one line per accepted outcome.
 * Only written when diagnostics are enabled; the job summary does not read it.
 */

import * as fs from 'fs';
import type { FetchOutcome, UpdateLogEntry } from './types';
import { getUpdateLogPath } from './paths';

/**
 * Builds the log line for an accepted outcome.
 */
export function buildUpdateLogEntry(
  outcome: FetchOutcome,
  sequence: number,
  completedAt: string,
): UpdateLogEntry {
  if (outcome.success) {
    return {
      sequence,
      completed_at: completedAt,
      success: true,
      attempts: outcome.attempts,
      status: outcome.snapshot.status,
      alert_count: outcome.snapshot.active_alerts.length,
    };
  }
  return {
    sequence,
    completed_at: completedAt,
    success: false,
    attempts: outcome.error.attempts,
    error: outcome.error.cause,
  };
}

// -----------------------------------------------------------------------------
// Port: updateLog.append
// -----------------------------------------------------------------------------

/**
 * Appends one entry as a JSON line, creating the file if needed.
 *
 * Best-effort: a write failure is reported to stderr and otherwise ignored
 * so diagnostics never disrupt the poller.
 */
export function appendUpdateLogEntry(entry: UpdateLogEntry): void {
  try {
    fs.appendFileSync(getUpdateLogPath(), JSON.stringify(entry) + '\n', 'utf-8');
  } catch (err) {
    const error = err as Error;
    console.error(`Update log write failed: ${error.message}`);
  }
}

// -----------------------------------------------------------------------------
// Port: updateLog.read
// -----------------------------------------------------------------------------

/**
 * Reads all entries. Returns an empty array if the file is missing or unreadable;
 * lines that are not valid JSON are skipped.
 */
export function readUpdateLog(): UpdateLogEntry[] {
  let content: string;
  try {
    const logPath = getUpdateLogPath();
    if (!fs.existsSync(logPath)) return [];
    content = fs.readFileSync(logPath, 'utf-8');
  } catch {
    return [];
  }

  const entries: UpdateLogEntry[] = [];
  for (const line of content.split('\n')) {
    if (!line) continue;
    try {
      entries.push(JSON.parse(line) as UpdateLogEntry);
    } catch {
      continue;
    }
  }
  return entries;
}
