import { ModeError, NotFoundError } from './errors.js';
import type { PlannedStage, RunMode, StagePlan } from './types.js';

export interface PlanOptions {
  overwrite?: boolean;
  testDate?: string;
  hasOutcome?: boolean;
}

const ANALYSIS_STEPS: readonly PlannedStage[] = [
  { stage: 'event_detection', policy: 'replace' },
  { stage: 'scoring', policy: 'replace' },
  { stage: 'strategy_calc', policy: 'replace' },
];

/**
 * Picks the stage sequence and merge policies for a mode, enforcing the
 * mode's cache precondition. `hasCache` means an entry exists for the target
 * key (for backtest: an entry at or before the test date).
 */
export function buildStagePlan(mode: RunMode, hasCache: boolean, options: PlanOptions = {}): StagePlan {
  switch (mode) {
    case 'full': {
      const overwrite = options.overwrite === true;
      if (hasCache && !overwrite) {
        throw new ModeError(
          'A cached analysis already exists for this key; pass --overwrite to replace it or use --mode update'
        );
      }
      return {
        mode,
        steps: ANALYSIS_STEPS.map((s) => ({ ...s })),
        persist: true,
        carryOver: false,
        overwrite,
      };
    }

    case 'update':
      if (!hasCache) {
        throw new ModeError('Update mode needs a prior cached analysis; run a full analysis first');
      }
      return {
        mode,
        steps: [
          { stage: 'event_detection', policy: 'append' },
          { stage: 'scoring', policy: 'append' },
          { stage: 'strategy_calc', policy: 'append', gate: 'score_changed' },
        ],
        persist: true,
        carryOver: true,
      };

    case 'refresh':
      if (!hasCache) {
        throw new ModeError('Refresh mode needs a prior cached analysis to compare against');
      }
      return {
        mode,
        steps: [{ stage: 'comparison', policy: 'append' }],
        persist: true,
        carryOver: true,
      };

    case 'backtest': {
      const testDate = options.testDate ?? '';
      if (!hasCache) {
        throw new NotFoundError(`No cached analysis at or before ${testDate || 'the test date'}`);
      }
      const steps = ANALYSIS_STEPS.map((s) => ({ ...s }));
      if (options.hasOutcome) {
        steps.push({ stage: 'comparison', policy: 'replace' });
      }
      return { mode, steps, persist: false, carryOver: false, testDate };
    }
  }
}
