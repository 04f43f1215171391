/**
 * Action Inputs
 * Layer: action
 *
 * Reads and validates the action inputs shared by the pre, main and post steps.
 */

import * as core from '@actions/core';
import type { ActionMode, MonitorConfig } from './types';
import { AUTO_REFRESH_INTERVAL_MS } from './types';
import { parseBooleanFlag, parsePositiveInt } from './utils';

const ACTION_MODES: readonly ActionMode[] = ['start', 'refresh', 'stop'];

export function isDiagnosticsEnabled(): boolean {
  return parseBooleanFlag(core.getInput('diagnostics'));
}

/**
 * Reads the monitor configuration. The token is masked before it is returned.
 */
export function readMonitorConfig(): MonitorConfig {
  const endpoint = core.getInput('endpoint');
  if (!endpoint) {
    throw new Error('No endpoint provided. Set the endpoint input to the RPC bridge URL.');
  }

  const token = core.getInput('token') || null;
  if (token) {
    // Mask token to prevent accidental exposure
    core.setSecret(token);
  }

  return {
    endpoint,
    token,
    interval_ms: parsePositiveInt(core.getInput('interval_ms'), AUTO_REFRESH_INTERVAL_MS),
  };
}

export function readActionMode(): ActionMode {
  const mode = core.getInput('mode', { required: true });
  const match = ACTION_MODES.find((candidate) => candidate === mode);
  if (!match) {
    throw new Error(`Invalid mode: ${mode}. Must be 'start', 'refresh' or 'stop'.`);
  }
  return match;
}
