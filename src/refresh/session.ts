/**
 * Polling Session
 * Layer: engine
 *
 * The lifetime of one active polling instance, from start() to stop().
 * Owns the cancellation signal, the request sequence counter and the
 * single-flight bookkeeping. Each coordinator start() creates a fresh
 * session, so a stale session can never publish into a new one.
 */

export type SessionPhase = 'idle' | 'fetching' | 'publishing' | 'cancelled';

export class PollingSession {
  private readonly controller = new AbortController();
  private sequence = 0;
  private highestPublished = 0;
  private currentPhase: SessionPhase = 'idle';

  /** Promise of the fetch currently in flight (including coalesced follow-ups) */
  inFlight: Promise<void> | null = null;
  /** True when a manual refresh is owed after the in-flight fetch */
  pendingRefresh = false;

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  get phase(): SessionPhase {
    return this.cancelled ? 'cancelled' : this.currentPhase;
  }

  /** Last sequence number handed out (0 before the first request) */
  get lastSequence(): number {
    return this.sequence;
  }

  get lastPublished(): number {
    return this.highestPublished;
  }

  /**
   * Stamps a new request. Sequence numbers start at 1 and strictly increase.
   */
  nextSequence(): number {
    this.sequence += 1;
    return this.sequence;
  }

  /**
   * Moves to a new phase. Ignored once cancelled, which is terminal.
   */
  transition(phase: Exclude<SessionPhase, 'cancelled'>): void {
    if (this.cancelled) return;
    this.currentPhase = phase;
  }

  /**
   * Records a publish for `sequence`.
   *
   * @returns false if the session is cancelled or a newer (or the same)
   *   sequence was already published
   */
  acceptPublish(sequence: number): boolean {
    if (this.cancelled || sequence <= this.highestPublished) {
      return false;
    }
    this.highestPublished = sequence;
    return true;
  }

  /** Idempotent. */
  cancel(): void {
    if (this.cancelled) return;
    this.pendingRefresh = false;
    this.controller.abort();
  }
}
