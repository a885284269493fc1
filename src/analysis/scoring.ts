import { StageError } from '../control-plane/errors.js';
import { mapAt, valueAt } from '../control-plane/parameters.js';
import type { ScoringOutput } from '../control-plane/types.js';
import { latestOutput, type StageHandler } from './stage.js';

export const SCORE_TOLERANCE = 1e-6;

/**
 * Composite score: weighted market readings plus a fixed contribution for
 * each detected event. The total is the sum of the breakdown.
 */
export const scoringEngine: StageHandler<'scoring'> = {
  name: 'scoring',

  execute(view, params): ScoringOutput {
    const detection = latestOutput(view, 'event_detection');
    if (!detection) {
      throw new StageError('scoring', 'Event detection output is required before scoring');
    }

    const breakdown: Record<string, number> = {};

    for (const [factor, weight] of Object.entries(mapAt(params, 'scoring.weights'))) {
      if (typeof weight !== 'number') {
        throw new StageError('scoring', `Weight for "${factor}" must be numeric`);
      }
      const value = valueAt(params, factor);
      if (value === undefined || value === null) {
        throw new StageError('scoring', `Missing required market param "${factor}"`);
      }
      if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new StageError(
          'scoring',
          `Market param "${factor}" must be numeric, got ${JSON.stringify(value)}`
        );
      }
      breakdown[factor] = weight * value;
    }

    const eventWeights = mapAt(params, 'scoring.event_weights');
    for (const tag of detection.tags) {
      const weight = eventWeights[tag];
      if (typeof weight === 'number') {
        breakdown[`event:${tag}`] = weight;
      }
    }

    const score = Object.values(breakdown).reduce((sum, part) => sum + part, 0);
    return { score, breakdown };
  },
};
