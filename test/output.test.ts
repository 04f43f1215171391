/**
 * Output Renderer Tests
 *
 * Tests for summary rendering and warning generation.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  classifyStatus,
  formatDuration,
  generateWarnings,
  render,
  renderConsole,
  renderMarkdown,
  writeStepSummary,
} from '../src/output';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import type { AlertRecord, MonitorState, SummaryData } from '../src/types';
import { makeSnapshot, makeState } from './helpers';

// -----------------------------------------------------------------------------
// Test helpers
// -----------------------------------------------------------------------------

function makeRecord(overrides: Partial<AlertRecord> = {}): AlertRecord {
  return {
    message: 'CPU usage above 90%',
    priority: 'High',
    category: 'performance',
    requires_action: true,
    first_seen_ts: '2026-03-02T10:00:30.000Z',
    times_seen: 1,
    ...overrides,
  };
}

function makeReportState(overrides: Partial<MonitorState> = {}): MonitorState {
  return makeState({
    stopped_at_ts: '2026-03-02T10:10:00.000Z',
    update_count: 20,
    latest: makeSnapshot(),
    peak: { cpu_usage: 35, memory_usage: 64, error_rate: 0.025 },
    ...overrides,
  });
}

function makeSummaryData(overrides: Partial<SummaryData> = {}): SummaryData {
  return {
    state: makeReportState(),
    duration_seconds: 600,
    warnings: [],
    ...overrides,
  };
}

function lines(markdown: string): string[] {
  return markdown.split('\n');
}

// -----------------------------------------------------------------------------
// render
// -----------------------------------------------------------------------------

describe('render', () => {
  it('returns both markdown and console output', () => {
    const data = makeSummaryData();

    const result = render(data);

    expect(result.markdown).toBe(renderMarkdown(data));
    expect(result.console).toBe(renderConsole(data));
  });
});

// -----------------------------------------------------------------------------
// renderMarkdown
// -----------------------------------------------------------------------------

describe('renderMarkdown', () => {
  it('starts with the header and run counts', () => {
    const output = lines(renderMarkdown(makeSummaryData()));

    expect(output[0]).toBe('## Promotion Health Monitor — Job Summary');
    expect(output[2]).toBe('**Duration:** 10m | **Updates:** 20 | **Failures:** 0');
  });

  it('shows the latest status with its badge', () => {
    const output = lines(renderMarkdown(makeSummaryData()));

    expect(output).toContain('**Status:** 🟢 Operational | **Version:** 2.4.0 | **Uptime:** 1h');
  });

  it.each([
    ['Warning', '🟡'],
    ['Critical', '🔴'],
    ['Maintenance', '⚪'],
  ])('uses the %s badge', (status, badge) => {
    const state = makeReportState({ latest: makeSnapshot({ status }) });

    const output = renderMarkdown(makeSummaryData({ state }));

    expect(output).toContain(`**Status:** ${badge} ${status} |`);
  });

  it('renders latest and peak metrics', () => {
    const output = lines(renderMarkdown(makeSummaryData()));

    expect(output).toContain('| CPU usage | 20% | 35% |');
    expect(output).toContain('| Memory usage | 50% | 64% |');
    expect(output).toContain('| Error rate | 1.00% | 2.50% |');
    expect(output).toContain('| DB response time | 40 ms | - |');
    expect(output).toContain('| Requests / min | 1000 | - |');
  });

  it('shows a message when no snapshot was received', () => {
    const state = makeReportState({ latest: null });

    const output = renderMarkdown(makeSummaryData({ state }));

    expect(output).toContain('*No health snapshot was received during this job.*');
    expect(output).not.toContain('| Metric |');
  });

  it('lists alerts by priority, then first-seen time', () => {
    const state = makeReportState({
      alerts_seen: [
        makeRecord({ message: 'Budget 80% spent', priority: 'Medium', category: 'budget', requires_action: false }),
        makeRecord({ message: 'Disk 95% full', priority: 'Critical', category: 'database', times_seen: 2 }),
        makeRecord({ first_seen_ts: '2026-03-02T10:05:00.000Z', message: 'Queue backlog' }),
        makeRecord(),
      ],
    });

    const output = lines(renderMarkdown(makeSummaryData({ state })));
    const start = output.indexOf('### Alerts');

    expect(output.slice(start, start + 8)).toEqual([
      '### Alerts',
      '',
      '| Priority | Category | Message | Action | Seen |',
      '|----------|----------|---------|:------:|-----:|',
      '| Critical | database | Disk 95% full | yes | 2 |',
      '| High | performance | CPU usage above 90% | yes | 1 |',
      '| High | performance | Queue backlog | yes | 1 |',
      '| Medium | budget | Budget 80% spent |  | 1 |',
    ]);
  });

  it('escapes pipes in alert messages', () => {
    const state = makeReportState({ alerts_seen: [makeRecord({ message: 'read|write split' })] });

    const output = renderMarkdown(makeSummaryData({ state }));

    expect(output).toContain('| High | performance | read\\|write split | yes | 1 |');
  });

  it('lists pending decisions', () => {
    const state = makeReportState({
      latest: makeSnapshot({ pending_decisions: ['Approve spring promotion extension'] }),
    });

    const output = lines(renderMarkdown(makeSummaryData({ state })));

    expect(output).toContain('### Pending decisions');
    expect(output).toContain('- Approve spring promotion extension');
  });

  it('lists status changes once the status has moved', () => {
    const state = makeReportState({
      status_changes: [
        { from: null, to: 'Operational', at: '2026-03-02T10:00:30.000Z' },
        { from: 'Operational', to: 'Warning', at: '2026-03-02T10:05:00.000Z' },
      ],
    });

    const output = lines(renderMarkdown(makeSummaryData({ state })));

    expect(output).toContain('- 2026-03-02 10:00:30 UTC: initial → Operational');
    expect(output).toContain('- 2026-03-02 10:05:00 UTC: Operational → Warning');
  });

  it('omits status changes when the status never moved', () => {
    const state = makeReportState({
      status_changes: [{ from: null, to: 'Operational', at: '2026-03-02T10:00:30.000Z' }],
    });

    expect(renderMarkdown(makeSummaryData({ state }))).not.toContain('### Status changes');
  });

  it('includes warnings section when warnings exist', () => {
    const output = lines(renderMarkdown(makeSummaryData({ warnings: ['Test warning'] })));

    expect(output).toContain('### Warnings');
    expect(output).toContain('- Test warning');
  });

  it('omits warnings section when no warnings', () => {
    expect(renderMarkdown(makeSummaryData())).not.toContain('### Warnings');
  });
});

// -----------------------------------------------------------------------------
// renderConsole
// -----------------------------------------------------------------------------

describe('renderConsole', () => {
  it('prints a one-line summary', () => {
    expect(renderConsole(makeSummaryData())).toBe(
      'Promotion health: Operational after 10m (20 updates, 0 failures)',
    );
  });

  it('reports unknown status without a snapshot', () => {
    const state = makeReportState({ latest: null, update_count: 0, failure_count: 3 });

    expect(renderConsole(makeSummaryData({ state, duration_seconds: 45 }))).toBe(
      'Promotion health: unknown after 45s (0 updates, 3 failures)',
    );
  });

  it('adds actionable alert and warning counts', () => {
    const state = makeReportState({
      alerts_seen: [makeRecord(), makeRecord({ message: 'FYI', requires_action: false })],
    });

    const output = renderConsole(makeSummaryData({ state, warnings: ['a', 'b'] }));

    expect(output.split('\n')).toEqual([
      'Promotion health: Operational after 10m (20 updates, 0 failures)',
      'Alerts requiring action: 1',
      'Warnings: 2',
    ]);
  });
});

// -----------------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------------

describe('formatDuration', () => {
  it.each([
    [0, '0s'],
    [45, '45s'],
    [60, '1m'],
    [90, '1m 30s'],
    [3600, '1h'],
    [3660, '1h 1m'],
  ])('formats %i seconds as %s', (seconds, expected) => {
    expect(formatDuration(seconds)).toBe(expected);
  });
});

describe('classifyStatus', () => {
  it('maps known statuses and falls back to unknown', () => {
    expect(classifyStatus('Operational')).toBe('operational');
    expect(classifyStatus('Warning')).toBe('warning');
    expect(classifyStatus('Critical')).toBe('critical');
    expect(classifyStatus('Degraded')).toBe('unknown');
  });
});

// -----------------------------------------------------------------------------
// generateWarnings
// -----------------------------------------------------------------------------

describe('generateWarnings', () => {
  it('returns empty array when no issues', () => {
    expect(generateWarnings(makeReportState())).toEqual([]);
  });

  it('warns when no snapshot was ever received', () => {
    expect(generateWarnings(makeReportState({ latest: null }))).toEqual([
      'No health snapshot was received from the backend',
    ]);
  });

  it('reports failures, staleness, critical status, alerts and the last error in order', () => {
    const state = makeReportState({
      latest: makeSnapshot({ status: 'Critical' }),
      failure_count: 2,
      consecutive_failures: 1,
      alerts_seen: [makeRecord(), makeRecord({ message: 'FYI', requires_action: false })],
      last_error: 'System health failed after 4 attempts (transport): HTTP 503: Service Unavailable',
    });

    expect(generateWarnings(state)).toEqual([
      '2 refresh(es) failed after retries',
      'Last 1 refresh(es) failed; the reported status may be stale',
      'Backend reported Critical status at the last update',
      '1 alert(s) require action',
      'Last error: System health failed after 4 attempts (transport): HTTP 503: Service Unavailable',
    ]);
  });
});

// -----------------------------------------------------------------------------
// writeStepSummary
// -----------------------------------------------------------------------------

describe('writeStepSummary', () => {
  let originalEnv: string | undefined;
  let tempDir: string;

  beforeEach((): void => {
    originalEnv = process.env['GITHUB_STEP_SUMMARY'];
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'test-step-summary-'));
  });

  afterEach((): void => {
    if (originalEnv !== undefined) {
      process.env['GITHUB_STEP_SUMMARY'] = originalEnv;
    } else {
      delete process.env['GITHUB_STEP_SUMMARY'];
    }
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('appends markdown to GITHUB_STEP_SUMMARY file when env var is set', (): void => {
    const summaryPath = path.join(tempDir, 'summary.md');
    process.env['GITHUB_STEP_SUMMARY'] = summaryPath;

    writeStepSummary('# Hello');
    writeStepSummary('# Again');

    expect(fs.readFileSync(summaryPath, 'utf-8')).toBe('# Hello\n# Again\n');
  });

  it('does nothing when GITHUB_STEP_SUMMARY is not set', (): void => {
    delete process.env['GITHUB_STEP_SUMMARY'];

    expect(() => {
      writeStepSummary('anything');
    }).not.toThrow();
  });
});
