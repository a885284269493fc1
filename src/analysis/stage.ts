import { StageError } from '../control-plane/errors.js';
import type {
  MarketSnapshot,
  ParameterSet,
  RunMode,
  StageEntry,
  StageName,
  StageOutputs,
  StageResults,
} from '../control-plane/types.js';

/**
 * Read-only view of the run handed to a stage. `current` and `previous` are
 * the market snapshots the comparator diffs; `as_of` is the date rules are
 * evaluated at (the historical timestamp when backtesting).
 */
export interface StageView {
  readonly symbol: string;
  readonly mode: RunMode;
  readonly as_of: string;
  readonly stage_results: Readonly<StageResults>;
  readonly current: Readonly<MarketSnapshot>;
  readonly previous: Readonly<MarketSnapshot> | null;
}

export interface StageHandler<S extends StageName> {
  readonly name: S;
  execute(view: StageView, params: ParameterSet): StageOutputs[S] | Promise<StageOutputs[S]>;
}

export type StageRegistry = { readonly [S in StageName]: StageHandler<S> };

export function handlerFor<S extends StageName>(registry: StageRegistry, stage: S): StageHandler<S> {
  return registry[stage];
}

export async function executeStage<S extends StageName>(
  handler: StageHandler<S>,
  view: StageView,
  params: ParameterSet
): Promise<StageOutputs[S]> {
  try {
    return await handler.execute(view, params);
  } catch (err) {
    if (err instanceof StageError) throw err;
    const message = err instanceof Error ? err.message : String(err);
    throw new StageError(handler.name, `Unexpected failure: ${message}`, { cause: err });
  }
}

export function latestOutput<S extends StageName>(
  view: StageView,
  stage: S
): StageOutputs[S] | undefined {
  const entry: StageEntry<StageOutputs[S]> | undefined = view.stage_results[stage];
  return entry?.output;
}
