/**
 * Stop handler
 * Layer: action
 *
 * Shared shutdown and reporting logic used by the post hook and main's stop mode.
 *
 * Required ports:
 *   - poller.kill
 *   - state.read
 *   - output.render
 */

import * as core from '@actions/core';
import { DefaultArtifactClient } from '@actions/artifact';
import * as fs from 'fs';
import type { MonitorState, SummaryData } from './types';
import { isSupported } from './platform';
import { killPollerWithVerification } from './poller';
import { readState, writeState, readPid, removePid } from './state';
import { markReported, markStopped } from './reducer';
import { render, writeStepSummary, generateWarnings } from './output';
import { getStateDir, getStatePath, getUpdateLogPath } from './paths';

// -----------------------------------------------------------------------------
// Diagnostics artifact
// -----------------------------------------------------------------------------

const ARTIFACT_PREFIX = 'promotion-health-monitor';

export type UploadOutcome =
  | { success: true; name: string; files: string[] }
  | { success: false; name: string; error: string };

export function getArtifactName(): string {
  const custom = core.getInput('artifact_name');
  if (custom) return custom;
  const jobId = process.env['GITHUB_JOB'] ?? 'job';
  return `${ARTIFACT_PREFIX}-${jobId}`;
}

/**
 * Uploads the state file and the update log, whichever exist.
 */
export async function uploadDiagnosticsArtifact(): Promise<UploadOutcome> {
  const artifactName = getArtifactName();

  try {
    const files = [getStatePath(), getUpdateLogPath()].filter((file) => fs.existsSync(file));
    if (files.length === 0) {
      return {
        success: false,
        name: artifactName,
        error: 'No diagnostic files available for upload',
      };
    }

    const artifactClient = new DefaultArtifactClient();
    await artifactClient.uploadArtifact(artifactName, files, getStateDir());

    return { success: true, name: artifactName, files };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { success: false, name: artifactName, error: message };
  }
}

// -----------------------------------------------------------------------------
// Stop handler
// -----------------------------------------------------------------------------

/**
 * Job duration in whole seconds, from start to stop (or now).
 */
export function computeDurationSeconds(state: MonitorState, now: number = Date.now()): number {
  const startTime = new Date(state.started_at_ts).getTime();
  const endTime = state.stopped_at_ts ? new Date(state.stopped_at_ts).getTime() : now;
  return Math.max(0, Math.floor((endTime - startTime) / 1000));
}

export async function stopMonitor(diagnosticsEnabled: boolean): Promise<void> {
  core.info('Stopping promotion health monitor...');

  const warnings: string[] = [];

  // Check platform (warn but continue)
  const platformInfo = isSupported();
  if (!platformInfo.supported) {
    warnings.push(`Unsupported platform: ${platformInfo.reason}`);
  }

  // Read PID and kill poller with verification
  const pid = readPid();
  if (pid) {
    const killResult = await killPollerWithVerification(pid);
    if (!killResult.success) {
      if (killResult.notFound) {
        warnings.push('Poller process not found (may have exited)');
      } else {
        warnings.push(`Failed to kill poller: ${killResult.error}`);
      }
    } else if (killResult.escalated) {
      warnings.push('Poller required SIGKILL (did not respond to SIGTERM)');
    }
    removePid();
  } else {
    warnings.push('No PID file found (monitor may not have started)');
  }

  const stateResult = readState();
  if (!stateResult.success) {
    if (stateResult.notFound) {
      core.warning('No state file found. Monitor may not have started or state was lost.');
      return;
    }
    throw new Error(`Failed to read state: ${stateResult.error}`);
  }

  // Reported by an earlier stop, e.g. main's stop mode before the post step
  if (stateResult.state.reported_at_ts !== null) {
    core.info(`Summary already written at ${stateResult.state.reported_at_ts}; skipping.`);
    return;
  }

  const finalState = markReported(markStopped(stateResult.state));
  const writeResult = writeState(finalState);
  if (!writeResult.success) {
    warnings.push(`Failed to write final state: ${writeResult.error}`);
  }

  core.debug(
    `Updates: ${finalState.update_count} | Failures: ${finalState.failure_count} | ` +
      `Last sequence: ${finalState.last_sequence}`,
  );

  warnings.push(...generateWarnings(finalState));

  if (diagnosticsEnabled) {
    const uploadResult = await uploadDiagnosticsArtifact();
    if (uploadResult.success) {
      core.info(
        `Diagnostics artifact uploaded: ${uploadResult.name} (${uploadResult.files.length} files)`,
      );
    } else {
      warnings.push(`Diagnostics artifact upload failed: ${uploadResult.error}`);
      core.warning(`Diagnostics artifact upload failed: ${uploadResult.error}`);
    }
  } else {
    core.info('Diagnostics disabled; skipping artifact upload.');
  }

  const summaryData: SummaryData = {
    state: finalState,
    duration_seconds: computeDurationSeconds(finalState),
    warnings,
  };

  const { markdown, console: consoleText } = render(summaryData);

  core.info(consoleText);
  writeStepSummary(markdown);

  core.info('Monitor stopped');
}
