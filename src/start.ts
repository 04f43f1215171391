/**
 * Start handler
 * Layer: action
 *
 * Shared startup logic used by the pre hook and main's start mode.
 */

import * as core from '@actions/core';
import type { MonitorConfig } from './types';
import { assertSupported } from './platform';
import { spawnPoller, killPoller } from './poller';
import { writeState, writePid, verifyPollerStartup } from './state';
import { createInitialState, applyOutcome } from './reducer';
import { createRpcStatusFetcher } from './rpc';
import { describeFailure, fetchWithRetry } from './refresh';
import { sleep } from './utils';

/** Sequence stamped on the validation fetch; the poller continues after it. */
const VALIDATION_SEQUENCE = 1;

export async function startMonitor(config: MonitorConfig, diagnosticsEnabled: boolean): Promise<void> {
  core.info('Starting promotion health monitor...');

  // Validate platform
  assertSupported();

  // Initial fetch to validate the endpoint and establish a baseline (fail-fast)
  core.info(`Validating endpoint ${config.endpoint}...`);
  const outcome = await fetchWithRetry(createRpcStatusFetcher(config), {}, {
    sleep,
    warn: (message) => core.warning(message),
  });
  if (outcome === null) {
    throw new Error('Endpoint validation was cancelled');
  }
  if (!outcome.success) {
    throw new Error(`Endpoint validation failed: ${describeFailure(outcome) ?? 'unknown error'}`);
  }

  const completedAt = new Date().toISOString();
  const { state } = applyOutcome(
    createInitialState(config.interval_ms),
    outcome,
    VALIDATION_SEQUENCE,
    completedAt,
  );

  const writeResult = writeState(state);
  if (!writeResult.success) {
    throw new Error(`Failed to write initial state: ${writeResult.error}`);
  }

  // Spawn poller
  const spawnResult = spawnPoller(config, diagnosticsEnabled);
  if (!spawnResult.success) {
    throw new Error(`Failed to spawn poller: ${spawnResult.error}`);
  }

  // Save PID - if this fails, kill the orphan process
  const pidResult = writePid(spawnResult.pid);
  if (!pidResult.success) {
    killPoller(spawnResult.pid);
    throw new Error(`Failed to write PID: ${pidResult.error}`);
  }

  // Verify poller actually started - if this fails, kill and cleanup
  core.info('Verifying poller startup...');
  const verifyResult = await verifyPollerStartup();
  if (!verifyResult.success) {
    killPoller(spawnResult.pid);
    throw new Error(`Poller startup verification failed: ${verifyResult.error}`);
  }

  core.info(
    `Monitor started (PID: ${spawnResult.pid}, status: ${outcome.snapshot.status}, ` +
      `refreshing every ${config.interval_ms}ms)`,
  );
}
