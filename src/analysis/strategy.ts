import { StageError } from '../control-plane/errors.js';
import { isParamMap, mapAt } from '../control-plane/parameters.js';
import type { ParamValue, StrategyCandidate, StrategyOutput } from '../control-plane/types.js';
import { latestOutput, type StageHandler } from './stage.js';

export const STAND_ASIDE = 'stand_aside';

interface StrategyCategory extends StrategyCandidate {
  blockedBy: string[];
}

function stringList(value: ParamValue): string[] | null {
  if (!Array.isArray(value)) return null;
  const list: string[] = [];
  for (const item of value) {
    if (typeof item !== 'string') return null;
    list.push(item);
  }
  return list;
}

function parseCategory(name: string, raw: ParamValue): StrategyCategory {
  if (!isParamMap(raw) || typeof raw.min_score !== 'number' || typeof raw.risk_rank !== 'number') {
    throw new StageError(
      'strategy_calc',
      `Strategy category "${name}" needs numeric min_score and risk_rank`
    );
  }
  const blocked = stringList(raw.blocked_by ?? []);
  if (!blocked) {
    throw new StageError('strategy_calc', `Strategy category "${name}" blocked_by must list event tags`);
  }
  return { strategy: name, min_score: raw.min_score, risk_rank: raw.risk_rank, blockedBy: blocked };
}

// Highest bucket first; an exact tie goes to the narrower risk profile.
function compareCandidates(a: StrategyCandidate, b: StrategyCandidate): number {
  if (a.min_score !== b.min_score) return b.min_score - a.min_score;
  if (a.risk_rank !== b.risk_rank) return a.risk_rank - b.risk_rank;
  return a.strategy.localeCompare(b.strategy);
}

export const strategyCalculator: StageHandler<'strategy_calc'> = {
  name: 'strategy_calc',

  execute(view, params): StrategyOutput {
    const scoring = latestOutput(view, 'scoring');
    if (!scoring) {
      throw new StageError('strategy_calc', 'Scoring output is required before strategy selection');
    }
    const tags = new Set(latestOutput(view, 'event_detection')?.tags ?? []);
    const { score } = scoring;

    const categories = Object.entries(mapAt(params, 'strategy.categories')).map(([name, raw]) =>
      parseCategory(name, raw)
    );

    const candidates: StrategyCandidate[] = categories
      .filter((c) => c.min_score <= score && !c.blockedBy.some((tag) => tags.has(tag)))
      .map(({ strategy, min_score, risk_rank }) => ({ strategy, min_score, risk_rank }))
      .sort(compareCandidates);

    const winner = candidates[0];
    if (!winner) {
      return {
        strategy: STAND_ASIDE,
        bucket_min: null,
        risk_rank: 0,
        score,
        candidates,
        rationale: `No strategy bucket admits score ${score.toFixed(2)}`,
      };
    }

    const runnerUp = candidates[1];
    const tieNote =
      runnerUp && runnerUp.min_score === winner.min_score
        ? `; tie with ${runnerUp.strategy} broken by risk rank ${winner.risk_rank}`
        : '';

    return {
      strategy: winner.strategy,
      bucket_min: winner.min_score,
      risk_rank: winner.risk_rank,
      score,
      candidates,
      rationale: `Score ${score.toFixed(2)} clears the ${winner.strategy} bucket (>= ${winner.min_score})${tieNote}`,
    };
  },
};
