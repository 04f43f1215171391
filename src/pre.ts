/**
 * Pre Entry
 * Layer: action
 *
 * GitHub Action pre entry point for startup.
 * Runs automatically at job start (via action.yml pre entry).
 */

import * as core from '@actions/core';
import { startMonitor } from './start';
import { isDiagnosticsEnabled, readMonitorConfig } from './inputs';

async function run(): Promise<void> {
  try {
    await startMonitor(readMonitorConfig(), isDiagnosticsEnabled());
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    core.setFailed(message);
  }
}

void run();
