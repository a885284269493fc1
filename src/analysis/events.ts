import { StageError } from '../control-plane/errors.js';
import { isParamMap, mapAt, numberAt, valueAt } from '../control-plane/parameters.js';
import type { DetectedEvent, EventDetectionOutput, ParamValue } from '../control-plane/types.js';
import type { StageHandler } from './stage.js';

const DAY_MS = 86_400_000;
const QUARTERLY_MONTHS = new Set([2, 5, 8, 11]);

interface ThresholdRule {
  tag: string;
  param: string;
  direction: 'above' | 'below';
  threshold: number;
}

function parseRule(tag: string, raw: ParamValue): ThresholdRule {
  if (!isParamMap(raw) || typeof raw.param !== 'string') {
    throw new StageError('event_detection', `Rule "${tag}" must name a market param`);
  }
  if (typeof raw.above === 'number') {
    return { tag, param: raw.param, direction: 'above', threshold: raw.above };
  }
  if (typeof raw.below === 'number') {
    return { tag, param: raw.param, direction: 'below', threshold: raw.below };
  }
  throw new StageError('event_detection', `Rule "${tag}" needs a numeric "above" or "below" threshold`);
}

/** Third Friday of the given UTC month, as a UTC midnight timestamp. */
export function thirdFriday(year: number, month: number): number {
  const firstWeekday = new Date(Date.UTC(year, month, 1)).getUTCDay();
  const firstFriday = 1 + ((5 - firstWeekday + 7) % 7);
  return Date.UTC(year, month, firstFriday + 14);
}

/** Next options expiration on or after `asOf`, if it falls inside the window. */
export function detectOpex(asOf: Date, windowDays: number): DetectedEvent | null {
  const day = Date.UTC(asOf.getUTCFullYear(), asOf.getUTCMonth(), asOf.getUTCDate());
  let year = asOf.getUTCFullYear();
  let month = asOf.getUTCMonth();
  let expiry = thirdFriday(year, month);

  if (expiry < day) {
    month += 1;
    if (month > 11) {
      month = 0;
      year += 1;
    }
    expiry = thirdFriday(year, month);
  }

  const daysAway = Math.round((expiry - day) / DAY_MS);
  if (daysAway > windowDays) return null;

  return {
    tag: QUARTERLY_MONTHS.has(month) ? 'quarterly_opex' : 'monthly_opex',
    kind: 'calendar',
    date: new Date(expiry).toISOString().slice(0, 10),
    days_away: daysAway,
  };
}

export const eventDetector: StageHandler<'event_detection'> = {
  name: 'event_detection',

  execute(view, params): EventDetectionOutput {
    const events: DetectedEvent[] = [];

    for (const [tag, raw] of Object.entries(mapAt(params, 'events.rules'))) {
      const rule = parseRule(tag, raw);
      const value = valueAt(params, rule.param);
      if (value === undefined || value === null) continue;

      if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new StageError(
          'event_detection',
          `Market param "${rule.param}" must be numeric, got ${JSON.stringify(value)}`
        );
      }

      const crossed = rule.direction === 'above' ? value > rule.threshold : value < rule.threshold;
      if (crossed) {
        events.push({
          tag,
          kind: 'threshold',
          param: rule.param,
          value,
          threshold: rule.threshold,
          direction: rule.direction,
        });
      }
    }

    const asOf = new Date(view.as_of);
    if (Number.isNaN(asOf.getTime())) {
      throw new StageError('event_detection', `Invalid analysis date "${view.as_of}"`);
    }
    const opex = detectOpex(asOf, numberAt(params, 'events.opex_window_days', 7));
    if (opex) events.push(opex);

    return { tags: events.map((e) => e.tag), events };
  },
};
