/**
 * State File Sink
 *
 * StateSink used by the background poller: folds each accepted outcome into
 * the monitor state, persists it, and optionally appends a diagnostics line.
 *
 * Session sequence numbers restart at 1 on every start(), so they are offset
 * by the last sequence already in the state. The persisted sequence therefore
 * keeps increasing across the initial validation fetch and the poller's session.
 */

import type { MonitorState, StateSink } from '../types';
import { applyOutcome } from '../reducer';
import { writeState as writeStateImpl } from '../state';
import { appendUpdateLogEntry, buildUpdateLogEntry } from '../update-log';

export interface StateFileSink extends StateSink {
  getState(): MonitorState;
}

export interface StateSinkDeps {
  writeState: typeof writeStateImpl;
  appendLog: typeof appendUpdateLogEntry;
  log: (message: string) => void;
  logError: (message: string) => void;
}

const defaultDeps: StateSinkDeps = {
  writeState: writeStateImpl,
  appendLog: appendUpdateLogEntry,
  log: (message) => console.log(message),
  logError: (message) => console.error(message),
};

export function createStateFileSink(
  initialState: MonitorState,
  diagnosticsEnabled: boolean,
  deps: StateSinkDeps = defaultDeps,
): StateFileSink {
  let state = initialState;
  const sequenceBase = initialState.last_sequence;

  return {
    getState: () => state,

    onUpdate(outcome, completedAt, sequence) {
      const persistedSequence = sequenceBase + sequence;
      const result = applyOutcome(state, outcome, persistedSequence, completedAt);
      if (!result.applied) {
        return;
      }
      state = result.state;

      const writeResult = deps.writeState(state);
      if (!writeResult.success) {
        deps.logError(writeResult.error);
      }

      if (result.status_changed && state.latest) {
        deps.log(`System status is now ${state.latest.status}`);
      }

      if (diagnosticsEnabled) {
        deps.appendLog(buildUpdateLogEntry(outcome, persistedSequence, completedAt));
      }
    },
  };
}
