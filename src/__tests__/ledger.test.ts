import { describe, it, expect } from 'vitest';
import { buildLedger } from '../ledger/ledger.js';
import type { StepResult } from '../ledger/types.js';
import { buildStagePlan } from '../control-plane/workflow.js';

const STARTED = '2025-11-03T14:00:00.000Z';

describe('buildLedger', () => {
  describe('successful run', () => {
    const steps: StepResult[] = [
      { stage: 'event_detection', status: 'passed', durationMs: 3 },
      { stage: 'scoring', status: 'passed', durationMs: 1 },
      { stage: 'strategy_calc', status: 'skipped', durationMs: 0, reason: 'already present' },
    ];

    it('separates executed from skipped stages', () => {
      const ledger = buildLedger({
        runId: 'run_20251103_abc123',
        startedAt: STARTED,
        plan: buildStagePlan('update', true),
        steps,
        passed: true,
      });
      expect(ledger.executed_stages).toEqual(['event_detection', 'scoring']);
      expect(ledger.skipped_stages).toEqual(['strategy_calc']);
      expect(ledger.skip_reasons).toEqual({ strategy_calc: 'already present' });
    });

    it('records durations of executed stages only', () => {
      const ledger = buildLedger({
        runId: 'run_20251103_abc123',
        startedAt: STARTED,
        plan: buildStagePlan('update', true),
        steps,
        passed: true,
      });
      expect(ledger.durations_ms).toEqual({ event_detection: 3, scoring: 1 });
    });

    it('includes run metadata and the planned sequence', () => {
      const ledger = buildLedger({
        runId: 'run_20251103_abc123',
        startedAt: STARTED,
        plan: buildStagePlan('update', true),
        steps,
        passed: true,
      });
      expect(ledger.run_id).toBe('run_20251103_abc123');
      expect(ledger.mode).toBe('update');
      expect(ledger.started_at).toBe(STARTED);
      expect(ledger.planned_stages).toEqual(['event_detection', 'scoring', 'strategy_calc']);
      expect(ledger.persisted).toBe(true);
      expect(ledger.failure_reason).toBeUndefined();
    });
  });

  describe('failed run', () => {
    it('counts the failed stage as executed and marks nothing persisted', () => {
      const ledger = buildLedger({
        runId: 'run_20251103_abc123',
        startedAt: STARTED,
        plan: buildStagePlan('full', false),
        steps: [
          { stage: 'event_detection', status: 'passed', durationMs: 2 },
          { stage: 'scoring', status: 'failed', durationMs: 1, error: 'Missing required market param "ivr"' },
        ],
        passed: false,
        failureReason: 'Missing required market param "ivr"',
      });
      expect(ledger.executed_stages).toEqual(['event_detection', 'scoring']);
      expect(ledger.passed).toBe(false);
      expect(ledger.persisted).toBe(false);
      expect(ledger.failure_reason).toBe('Missing required market param "ivr"');
    });
  });

  it('never marks a backtest as persisted', () => {
    const ledger = buildLedger({
      runId: 'run_20251126_abc123',
      startedAt: STARTED,
      plan: buildStagePlan('backtest', true, { testDate: '2025-11-20' }),
      steps: [],
      passed: true,
    });
    expect(ledger.persisted).toBe(false);
  });
});
