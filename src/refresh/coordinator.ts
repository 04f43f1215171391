/**
 * Refresh Coordinator
 * Layer: engine
 *
 * Provided ports:
 *   - refresh.start
 *   - refresh.stop
 *   - refresh.manualRefresh
 *   - refresh.publish
 *
 * Arbitrates between scheduled ticks and manual refreshes.
 *
 * Guarantees per session:
 *   1. Single-flight: one fetch at a time. A manual refresh during a fetch is
 *      coalesced into at most one follow-up; a scheduled tick during a fetch
 *      waits for it instead of starting another.
 *   2. Ordering: fetches are stamped with a sequence number at request time
 *      and publish() drops any outcome older than the newest one published.
 *   3. Delivery: every accepted outcome reaches the sink exactly once.
 *
 * Phases: idle -> fetching -> publishing -> idle, with cancelled terminal.
 */

import type { FetchOutcome, StateSink, StatusFetcher } from '../types';
import { AUTO_REFRESH_INTERVAL_MS, BASE_RETRY_DELAY_MS, MAX_RETRY_ATTEMPTS } from '../types';
import { sleep as sleepImpl } from '../utils';
import { fetchWithRetry } from './retry';
import { runPollingLoop } from './polling-loop';
import { PollingSession } from './session';
import type { SessionPhase } from './session';

export type RefreshTrigger = 'scheduled' | 'manual';

export interface CoordinatorOptions {
  intervalMs?: number;
  maxRetries?: number;
  baseDelayMs?: number;
}

export interface CoordinatorDeps {
  sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  now: () => Date;
  warn: (message: string) => void;
  logError: (message: string) => void;
}

const defaultDeps: CoordinatorDeps = {
  sleep: sleepImpl,
  now: () => new Date(),
  warn: (message) => console.warn(message),
  logError: (message) => console.error(message),
};

export class RefreshCoordinator {
  private session: PollingSession | null = null;
  private loop: Promise<void> | null = null;
  private readonly intervalMs: number;
  private readonly maxRetries: number;
  private readonly baseDelayMs: number;

  constructor(
    private readonly fetcher: StatusFetcher,
    private readonly sink: StateSink,
    options: CoordinatorOptions = {},
    private readonly deps: CoordinatorDeps = defaultDeps,
  ) {
    this.intervalMs = options.intervalMs ?? AUTO_REFRESH_INTERVAL_MS;
    this.maxRetries = options.maxRetries ?? MAX_RETRY_ATTEMPTS;
    this.baseDelayMs = options.baseDelayMs ?? BASE_RETRY_DELAY_MS;
  }

  get isRunning(): boolean {
    return this.session !== null && !this.session.cancelled;
  }

  get phase(): SessionPhase {
    return this.session?.phase ?? 'idle';
  }

  /**
   * Begins polling with a fresh session. The first fetch is issued
   * immediately. No-op while already running.
   */
  start(): void {
    if (this.isRunning) return;

    const session = new PollingSession();
    this.session = session;
    this.loop = runPollingLoop(session, () => this.request(session, 'scheduled'), this.intervalMs, {
      sleep: this.deps.sleep,
      logError: this.deps.logError,
    });
  }

  /**
   * Cancels the current session. Idempotent.
   * No fetch starts and nothing is published afterwards.
   */
  stop(): void {
    this.session?.cancel();
  }

  /**
   * Requests an out-of-band fetch now.
   * Resolves when the fetch (or the one it was coalesced behind) has published.
   */
  manualRefresh(): Promise<void> {
    const session = this.session;
    if (!session || session.cancelled) {
      return Promise.resolve();
    }
    return this.request(session, 'manual');
  }

  /**
   * Resolves once the background loop and any in-flight fetch have finished.
   * Only meaningful after stop(); a running loop never finishes on its own.
   */
  async whenStopped(): Promise<void> {
    await this.loop;
    const inFlight = this.session?.inFlight;
    if (inFlight) {
      await inFlight;
    }
  }

  /**
   * Forwards an outcome to the sink unless the session is cancelled or a
   * newer sequence has already been published.
   *
   * @returns true if the outcome was delivered
   */
  publish(outcome: FetchOutcome, sequence: number): boolean {
    const session = this.session;
    if (!session || !session.acceptPublish(sequence)) {
      return false;
    }

    const completedAt = this.deps.now().toISOString();
    try {
      this.sink.onUpdate(outcome, completedAt, sequence);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      this.deps.logError(`State sink failed for update #${sequence}: ${message}`);
    }
    return true;
  }

  // ---------------------------------------------------------------------------
  // Single-flight
  // ---------------------------------------------------------------------------

  private request(session: PollingSession, trigger: RefreshTrigger): Promise<void> {
    if (session.cancelled) {
      return Promise.resolve();
    }

    if (session.inFlight) {
      if (trigger === 'manual') {
        session.pendingRefresh = true;
      }
      return session.inFlight;
    }

    const flight = this.drain(session);
    session.inFlight = flight;
    return flight;
  }

  /**
   * Runs fetches back to back until no follow-up is owed.
   * The pending check and the in-flight reset happen without an await
   * between them, so a manual refresh can never be lost.
   */
  private async drain(session: PollingSession): Promise<void> {
    try {
      do {
        session.pendingRefresh = false;
        await this.fetchAndPublish(session);
      } while (session.pendingRefresh && !session.cancelled);
    } finally {
      session.inFlight = null;
      session.transition('idle');
    }
  }

  private async fetchAndPublish(session: PollingSession): Promise<void> {
    const sequence = session.nextSequence();
    session.transition('fetching');

    const outcome = await fetchWithRetry(
      this.fetcher,
      { maxRetries: this.maxRetries, baseDelayMs: this.baseDelayMs, signal: session.signal },
      { sleep: this.deps.sleep, warn: this.deps.warn },
    );

    if (outcome === null || session.cancelled) {
      return;
    }

    session.transition('publishing');
    this.publish(outcome, sequence);
  }
}
