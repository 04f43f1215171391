/**
 * Post Entry
 * Layer: action
 *
 * GitHub Action post entry point for cleanup and reporting.
 * Runs automatically after job completes (via action.yml post-if: always()).
 */

import * as core from '@actions/core';
import { stopMonitor } from './stop';
import { isDiagnosticsEnabled } from './inputs';

async function run(): Promise<void> {
  try {
    await stopMonitor(isDiagnosticsEnabled());
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    core.setFailed(message);
  }
}

void run();
