import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import type { RunLedger } from '../ledger/types.js';
import { emitReport, renderHistoryTable, renderMarkdown } from '../report/render.js';
import { narrativePayload } from '../report/narrator.js';
import type { RunState } from '../control-plane/types.js';
import { makeState, makeTempDir, removeDir } from './fixtures.js';

const AT = '2025-11-03T14:00:00.000Z';

const LEDGER: RunLedger = {
  run_id: 'run_20251103_abc123',
  mode: 'refresh',
  started_at: AT,
  planned_stages: ['comparison'],
  executed_stages: ['comparison'],
  skipped_stages: [],
  durations_ms: { comparison: 1 },
  skip_reasons: {},
  persisted: true,
  passed: true,
};

function analyzedState(): RunState {
  return makeState({
    mode: 'refresh',
    ledger: LEDGER,
    stage_results: {
      event_detection: {
        output: {
          tags: ['ivr_high'],
          events: [{ tag: 'ivr_high', kind: 'threshold', param: 'ivr', value: 65, threshold: 50, direction: 'above' }],
        },
        executed_at: AT,
        revisions: [],
      },
      scoring: {
        output: { score: 19.5, breakdown: { ivr: 32.5, vix: -18, 'event:ivr_high': 5 } },
        executed_at: AT,
        revisions: [],
      },
      strategy_calc: {
        output: {
          strategy: 'credit_spread',
          bucket_min: 5,
          risk_rank: 2,
          score: 19.5,
          candidates: [],
          rationale: 'Score 19.50 clears the credit_spread bucket (>= 5)',
        },
        executed_at: AT,
        revisions: [],
      },
      comparison: {
        output: {
          baseline_timestamp: AT,
          deltas: {
            vix: { previous: 18, current: 22, delta: 4, change_pct: 22.22, threshold: 2, significant: true },
          },
          significant_fields: ['vix'],
          material_change: true,
        },
        executed_at: AT,
        revisions: [],
      },
    },
  });
}

describe('renderMarkdown', () => {
  it('renders every stage section', () => {
    const lines = renderMarkdown(analyzedState()).split('\n');

    expect(lines[0]).toBe('# Analysis: NVDA (refresh)');
    expect(lines).toContain('**Run ID:** run_20251103_abc123');
    expect(lines).toContain('- ivr_high (ivr 65 > 50)');
    expect(lines).toContain('**Score:** 19.50');
    expect(lines).toContain('| event:ivr_high | 5.00 |');
    expect(lines).toContain('**Recommendation:** credit_spread');
    expect(lines).toContain('**Material change:** yes');
    expect(lines).toContain('| vix | 18 | 22 | 4.00 | 22.22 | yes |');
  });

  it('appends a narrative when given one', () => {
    const lines = renderMarkdown(analyzedState(), 'Volatility is rising.\n').split('\n');
    expect(lines.slice(-4)).toEqual(['## Narrative', '', 'Volatility is rising.', '']);
  });

  it('says so when no events were detected', () => {
    const state = makeState({
      stage_results: {
        event_detection: { output: { tags: [], events: [] }, executed_at: AT, revisions: [] },
      },
    });
    expect(renderMarkdown(state).split('\n')).toContain('- none');
  });
});

describe('renderHistoryTable', () => {
  it('aligns columns', () => {
    const table = renderHistoryTable([
      {
        key: 'NVDA_20251103',
        timestamp: AT,
        summary: { mode: 'full', score: 19.5, strategy: 'credit_spread', material_change: null, snapshot_count: 1 },
      },
    ]);
    expect(table.split('\n')).toEqual([
      'KEY            TIMESTAMP                 MODE  SCORE  STRATEGY       MATERIAL',
      'NVDA_20251103  2025-11-03T14:00:00.000Z  full  19.50  credit_spread  -',
    ]);
  });

  it('handles an empty history', () => {
    expect(renderHistoryTable([])).toBe('(no cached analyses)');
  });
});

describe('emitReport', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('writes the JSON report and the ledger', async () => {
    const { reportPath, ledgerPath } = await emitReport(analyzedState(), join(dir, 'out'), 'json');

    expect(reportPath).toBe(join(dir, 'out', 'NVDA_20251103-refresh.json'));
    expect(ledgerPath).toBe(join(dir, 'out', 'NVDA_20251103-refresh-ledger.json'));
    const report = JSON.parse(await readFile(reportPath, 'utf-8'));
    expect(report.stage_results.strategy_calc.output.strategy).toBe('credit_spread');
    expect(JSON.parse(await readFile(join(dir, 'out', 'NVDA_20251103-refresh-ledger.json'), 'utf-8'))).toEqual(LEDGER);
  });

  it('writes markdown when asked', async () => {
    const { reportPath } = await emitReport(makeState(), dir, 'md');
    expect(reportPath).toBe(join(dir, 'NVDA_20251103-full.md'));
    expect((await readFile(reportPath, 'utf-8')).split('\n')[0]).toBe('# Analysis: NVDA (full)');
  });
});

describe('narrativePayload', () => {
  it('sends stage outputs without ledger or revisions', () => {
    const payload = narrativePayload(analyzedState());
    expect(Object.keys(payload)).toEqual([
      'symbol',
      'mode',
      'as_of',
      'market_params',
      'events',
      'scoring',
      'strategy',
      'comparison',
    ]);
    expect(payload.strategy).toMatchObject({ strategy: 'credit_spread' });
  });
});
