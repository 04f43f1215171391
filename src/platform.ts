/**
 * Platform Detection
 * Layer: infra
 *
 * Provided ports:
 *   - platform.detect
 *   - platform.isSupported
 *
 * The background poller is stopped with SIGTERM and asked for a manual
 * refresh with SIGUSR1, so only POSIX runners (Linux, macOS) are supported.
 */

import * as os from 'os';
import type { Platform, PlatformInfo } from './types';

const SIGNAL_CAPABLE: ReadonlySet<Platform> = new Set<Platform>(['linux', 'darwin']);

// -----------------------------------------------------------------------------
// Port: platform.detect
// -----------------------------------------------------------------------------

export function detect(): Platform {
  const platform = os.platform();
  if (platform === 'linux' || platform === 'darwin' || platform === 'win32') {
    return platform;
  }
  return 'unknown';
}

// -----------------------------------------------------------------------------
// Port: platform.isSupported
// -----------------------------------------------------------------------------

/**
 * Returns detailed info including reason if unsupported.
 */
export function isSupported(): PlatformInfo {
  const platform = detect();

  if (SIGNAL_CAPABLE.has(platform)) {
    return { platform, supported: true };
  }

  if (platform === 'win32') {
    return {
      platform,
      supported: false,
      reason: 'Windows is not supported. The poller is controlled with POSIX signals (SIGTERM, SIGUSR1).',
    };
  }

  return {
    platform,
    supported: false,
    reason: `Unknown platform: ${os.platform()}. Only Linux and macOS are supported.`,
  };
}

/**
 * Validates platform and throws if unsupported.
 */
export function assertSupported(): void {
  const info = isSupported();
  if (!info.supported) {
    throw new Error(`Unsupported platform: ${info.reason}`);
  }
}
