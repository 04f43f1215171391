/**
 * Poller Process Spawning
 *
 * Spawns the poller as a detached background child process, handing the
 * monitor configuration over through environment variables.
 */

import { spawn, ChildProcess } from 'child_process';
import * as path from 'path';
import type { MonitorConfig } from '../types';
import { ENV_DIAGNOSTICS, ENV_ENDPOINT, ENV_INTERVAL_MS, ENV_TOKEN } from './run';

// -----------------------------------------------------------------------------
// Port: poller.spawn
// -----------------------------------------------------------------------------

export type SpawnOutcome = { success: true; pid: number } | { success: false; error: string };

/**
 * Resolves the bundled poller entry. ncc bundles each entry to its own
 * dist/<name>/index.js, so without GITHUB_ACTION_PATH the poller sits beside
 * the running pre/main bundle's directory.
 */
export function resolvePollerEntry(): string {
  const actionPath = process.env['GITHUB_ACTION_PATH'];
  const baseDir = actionPath
    ? path.resolve(actionPath, 'dist')
    : path.resolve(path.dirname(process.argv[1] ?? ''), '..');
  return path.join(baseDir, 'poller', 'index.js');
}

/**
 * Builds the child environment. The token is only passed when configured.
 */
export function buildPollerEnv(
  config: MonitorConfig,
  diagnosticsEnabled: boolean,
  baseEnv: NodeJS.ProcessEnv = process.env,
): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = {
    ...baseEnv,
    [ENV_ENDPOINT]: config.endpoint,
    [ENV_INTERVAL_MS]: String(config.interval_ms),
    [ENV_DIAGNOSTICS]: diagnosticsEnabled ? 'true' : 'false',
  };
  if (config.token) {
    env[ENV_TOKEN] = config.token;
  } else {
    delete env[ENV_TOKEN];
  }
  return env;
}

/**
 * Spawns the poller as a detached background process.
 *
 * @returns PID of spawned process or error
 */
export function spawnPoller(config: MonitorConfig, diagnosticsEnabled: boolean): SpawnOutcome {
  try {
    const child: ChildProcess = spawn(process.execPath, [resolvePollerEntry()], {
      detached: true,
      stdio: 'ignore',
      env: buildPollerEnv(config, diagnosticsEnabled),
    });

    // Allow parent to exit without waiting
    child.unref();

    if (!child.pid) {
      return { success: false, error: 'Failed to get child PID' };
    }

    return { success: true, pid: child.pid };
  } catch (err) {
    const error = err as Error;
    return { success: false, error: `Failed to spawn poller: ${error.message}` };
  }
}
