import { StageError } from '../control-plane/errors.js';
import { mapAt, numberAt } from '../control-plane/parameters.js';
import type { ComparisonOutput, FieldDelta } from '../control-plane/types.js';
import type { StageHandler } from './stage.js';

function roundTo(value: number, places: number): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}

function isNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Diffs every numeric market reading present in both snapshots. A field is
 * significant when its absolute change exceeds its threshold.
 */
export const comparator: StageHandler<'comparison'> = {
  name: 'comparison',

  execute(view, params): ComparisonOutput {
    const { previous, current } = view;
    if (!previous) {
      throw new StageError('comparison', 'A previous snapshot is required for comparison');
    }

    const significance = numberAt(params, 'comparison.significance', 2);
    const fieldThresholds = mapAt(params, 'comparison.field_thresholds');

    const deltas: Record<string, FieldDelta> = {};
    const significantFields: string[] = [];

    for (const [field, now] of Object.entries(current.market_params)) {
      const before = previous.market_params[field];
      if (!isNumber(now) || !isNumber(before)) continue;

      const override = fieldThresholds[field];
      const threshold = isNumber(override) ? override : significance;
      const delta = now - before;
      const significant = Math.abs(delta) > threshold;

      deltas[field] = {
        previous: before,
        current: now,
        delta,
        change_pct: before === 0 ? null : roundTo((delta / before) * 100, 2),
        threshold,
        significant,
      };
      if (significant) significantFields.push(field);
    }

    return {
      baseline_timestamp: previous.timestamp,
      deltas,
      significant_fields: significantFields,
      material_change: significantFields.length > 0,
    };
  },
};
