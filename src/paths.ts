/**
 * Path Resolver
 * Layer: infra
 *
 * Provided ports:
 *   - paths.statePath
 *   - paths.pidPath
 *   - paths.updateLogPath
 *
 * Resolves paths within $RUNNER_TEMP for state persistence.
 */

import * as path from 'path';
import { STATE_DIR_NAME, STATE_FILE_NAME, PID_FILE_NAME, UPDATE_LOG_FILE_NAME } from './types';

// -----------------------------------------------------------------------------
// Port: paths.statePath
// -----------------------------------------------------------------------------

/**
 * Returns the absolute path to the state directory.
 * Creates the path string only; does not create the directory.
 *
 * @throws Error if RUNNER_TEMP is not set
 */
export function getStateDir(): string {
  const runnerTemp = process.env['RUNNER_TEMP'];
  if (!runnerTemp) {
    throw new Error('RUNNER_TEMP environment variable is not set');
  }
  return path.join(runnerTemp, STATE_DIR_NAME);
}

export function getStatePath(): string {
  return path.join(getStateDir(), STATE_FILE_NAME);
}

/**
 * Returns the path for atomic write temporary file
 */
export function getStateTmpPath(): string {
  return path.join(getStateDir(), `${STATE_FILE_NAME}.tmp`);
}

// -----------------------------------------------------------------------------
// Port: paths.pidPath
// -----------------------------------------------------------------------------

export function getPidPath(): string {
  return path.join(getStateDir(), PID_FILE_NAME);
}

// -----------------------------------------------------------------------------
// Port: paths.updateLogPath
// -----------------------------------------------------------------------------

export function getUpdateLogPath(): string {
  return path.join(getStateDir(), UPDATE_LOG_FILE_NAME);
}
