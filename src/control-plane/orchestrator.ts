import { DEFAULT_PARAMETERS } from '../config.js';
import { DEFAULT_STAGES } from '../analysis/registry.js';
import { executeStage, handlerFor, type StageRegistry, type StageView } from '../analysis/stage.js';
import { HistoryReader } from '../history/reader.js';
import { buildLedger } from '../ledger/ledger.js';
import type { StepResult } from '../ledger/types.js';
import {
  buildCacheKey,
  normalizeCacheKey,
  normalizeSymbol,
  type CacheEntry,
  type CacheStore,
} from '../tools/cache.js';
import { freezeDeep } from '../utils/freeze.js';
import { generateRunId } from '../utils/id.js';
import { StageTimer } from '../utils/timer.js';
import { ModeError, ParameterError, SymflowError, errorMessage, type RunContext } from './errors.js';
import { mergeParams, numberAt, resolveParameters } from './parameters.js';
import { buildStagePlan } from './workflow.js';
import type {
  MarketSnapshot,
  MergePolicy,
  ParamMap,
  ParameterSet,
  PlannedStage,
  RunInputs,
  RunMode,
  RunOptions,
  RunState,
  StageEntry,
  StageName,
  StageOutputs,
  StagePlan,
  StageResults,
} from './types.js';

export interface EngineOptions {
  store: CacheStore;
  defaults?: ParamMap;
  stages?: StageRegistry;
  clock?: () => Date;
}

interface ExecutionContext {
  plan: StagePlan;
  state: RunState;
  params: ParameterSet;
  asOf: string;
  current: MarketSnapshot;
  previous: MarketSnapshot | null;
  prior: RunState | null;
  steps: StepResult[];
}

function setStageEntry<S extends StageName>(
  results: { [K in S]?: StageEntry<StageOutputs[K]> },
  stage: S,
  entry: StageEntry<StageOutputs[S]>
): void {
  results[stage] = entry;
}

function snapshotOf(state: RunState): MarketSnapshot {
  return {
    timestamp: state.timestamp,
    mode: state.mode,
    market_params: structuredClone(state.market_params),
  };
}

/**
 * Runs one symbol through the stage plan of a mode. Everything between the
 * cache read and the atomic write happens under the key's lock; a failure
 * anywhere leaves the cache file exactly as it was.
 */
export class WorkflowEngine {
  readonly store: CacheStore;
  readonly history: HistoryReader;
  private readonly defaults: ParamMap;
  private readonly stages: StageRegistry;
  private readonly clock: () => Date;

  constructor(options: EngineOptions) {
    this.store = options.store;
    this.history = new HistoryReader(options.store);
    this.defaults = options.defaults ?? DEFAULT_PARAMETERS;
    this.stages = options.stages ?? DEFAULT_STAGES;
    this.clock = options.clock ?? (() => new Date());
  }

  async run(
    symbol: string,
    mode: RunMode,
    inputs: RunInputs,
    cacheKey?: string,
    options: RunOptions = {}
  ): Promise<RunState> {
    const sym = normalizeSymbol(symbol);
    const context: RunContext = { symbol: sym, mode };
    const now = this.clock();

    console.log(`\n[symflow] mode=${mode} symbol=${sym}`);

    try {
      if (mode === 'backtest') {
        return await this.runBacktest(sym, context, inputs, options, now);
      }

      const key = await this.resolveCacheKey(sym, mode, cacheKey, now);
      context.cacheKey = key;
      console.log(`[symflow] cache=${key}`);

      return await this.store.withLock(key, async () => {
        const prior = await this.store.read(key);
        if (prior && normalizeSymbol(prior.state.symbol) !== sym) {
          throw new ModeError(`Cache ${key} belongs to ${prior.state.symbol}, not ${sym}`);
        }

        const plan = buildStagePlan(mode, prior !== null, { overwrite: options.overwrite });
        const state = this.seedState(sym, plan, key, inputs, prior, now);
        const exec = this.prepare(plan, state, prior?.state ?? null, now.toISOString());

        await this.executePlan(exec, now);

        state.snapshots.push(snapshotOf(state));
        const path = await this.store.write(key, state, prior?.extras ?? {});
        console.log(`[symflow] cache written: ${path}`);
        return state;
      });
    } catch (err) {
      if (err instanceof SymflowError) throw err.withContext(context);
      throw err;
    }
  }

  private async runBacktest(
    symbol: string,
    context: RunContext,
    inputs: RunInputs,
    options: RunOptions,
    now: Date
  ): Promise<RunState> {
    const testDate = options.testDate;
    if (!testDate) {
      throw new ParameterError('test_date', 'Backtest needs a test date');
    }
    const entry = await this.history.loadForBacktest(symbol, testDate);
    context.cacheKey = entry.key;
    console.log(`[symflow] backtest date=${testDate} using cache=${entry.key} (${entry.state.timestamp})`);

    const hasOutcome = Object.keys(inputs.market_params).length > 0;
    const plan = buildStagePlan('backtest', true, { testDate, hasOutcome });
    const historical = entry.state;

    const state: RunState = {
      symbol,
      timestamp: now.toISOString(),
      created_at: historical.created_at,
      cache_key: entry.key,
      mode: 'backtest',
      market_params: structuredClone(historical.market_params),
      dyn_params: mergeParams(historical.dyn_params, inputs.dyn_params),
      stage_results: {},
      snapshots: structuredClone(historical.snapshots),
    };

    const exec = this.prepare(plan, state, historical, historical.timestamp);
    if (hasOutcome) {
      exec.previous = snapshotOf(historical);
      exec.current = {
        timestamp: testDateTimestamp(testDate),
        mode: 'backtest',
        market_params: structuredClone(inputs.market_params),
      };
    }

    await this.executePlan(exec, now);
    console.log('[symflow] backtest complete (cache untouched)');
    return state;
  }

  private async resolveCacheKey(
    symbol: string,
    mode: RunMode,
    cacheKey: string | undefined,
    now: Date
  ): Promise<string> {
    if (cacheKey) {
      const key = normalizeCacheKey(cacheKey);
      if (!key.startsWith(`${symbol}_`)) {
        throw new ParameterError('cache_key', `Cache key "${key}" must start with "${symbol}_"`);
      }
      return key;
    }
    if (mode === 'full') return buildCacheKey(symbol, now);

    const latest = await this.history.latestKey(symbol);
    if (!latest) {
      throw new ModeError(`No cached analysis found for ${symbol}; run a full analysis first`);
    }
    return latest;
  }

  private seedState(
    symbol: string,
    plan: StagePlan,
    key: string,
    inputs: RunInputs,
    prior: CacheEntry | null,
    now: Date
  ): RunState {
    const timestamp = now.toISOString();

    if (plan.carryOver && prior) {
      if (plan.mode === 'refresh' && Object.keys(inputs.market_params).length === 0) {
        throw new ParameterError('market_params', 'Refresh needs fresh market readings to compare');
      }
      const base = prior.state;
      return {
        symbol,
        timestamp,
        created_at: base.created_at,
        cache_key: key,
        mode: plan.mode,
        market_params: mergeParams(base.market_params, inputs.market_params),
        dyn_params: mergeParams(base.dyn_params, inputs.dyn_params),
        stage_results: structuredClone(base.stage_results),
        snapshots: structuredClone(base.snapshots),
      };
    }

    return {
      symbol,
      timestamp,
      created_at: timestamp,
      cache_key: key,
      mode: plan.mode,
      market_params: structuredClone(inputs.market_params),
      dyn_params: structuredClone(inputs.dyn_params),
      stage_results: {},
      snapshots: [],
    };
  }

  private prepare(plan: StagePlan, state: RunState, prior: RunState | null, asOf: string): ExecutionContext {
    const params = resolveParameters(this.defaults, state.market_params, state.dyn_params);
    return {
      plan,
      state,
      params,
      asOf,
      current: { timestamp: state.timestamp, mode: state.mode, market_params: state.market_params },
      previous: prior ? snapshotOf(prior) : null,
      prior,
      steps: [],
    };
  }

  private async executePlan(exec: ExecutionContext, now: Date): Promise<void> {
    const runId = generateRunId(now);
    const startedAt = now.toISOString();

    for (const step of exec.plan.steps) {
      try {
        await this.executeStep(exec, step);
      } catch (err) {
        const ledger = buildLedger({
          runId,
          startedAt,
          plan: exec.plan,
          steps: exec.steps,
          passed: false,
          failureReason: errorMessage(err),
        });
        if (err instanceof SymflowError) err.withContext({ ledger });
        throw err;
      }
    }

    exec.state.ledger = buildLedger({
      runId,
      startedAt,
      plan: exec.plan,
      steps: exec.steps,
      passed: true,
    });
  }

  private async executeStep(exec: ExecutionContext, step: PlannedStage): Promise<void> {
    const { state } = exec;
    let policy: MergePolicy = step.policy;
    let skipReason = 'already present';

    if (step.gate === 'score_changed' && !this.scoreChanged(exec)) {
      policy = 'skip-if-present';
      skipReason = 'score change below materiality threshold';
    }

    if (policy === 'skip-if-present' && state.stage_results[step.stage]) {
      exec.steps.push({ stage: step.stage, status: 'skipped', durationMs: 0, reason: skipReason });
      console.log(`  [skip] ${step.stage} (${skipReason})`);
      return;
    }

    const timer = new StageTimer();
    console.log(`  [run]  ${step.stage}...`);

    try {
      await this.runStage(exec, step.stage, policy);
    } catch (err) {
      const durationMs = timer.elapsedMs();
      exec.steps.push({ stage: step.stage, status: 'failed', durationMs, error: errorMessage(err) });
      console.error(`  [FAIL] ${step.stage}: ${errorMessage(err)}`);
      throw err;
    }

    const durationMs = timer.elapsedMs();
    exec.steps.push({ stage: step.stage, status: 'passed', durationMs });
    console.log(`  [pass] ${step.stage} (${durationMs}ms)`);
  }

  private async runStage<S extends StageName>(
    exec: ExecutionContext,
    stage: S,
    policy: MergePolicy
  ): Promise<void> {
    const { state } = exec;
    const view: StageView = freezeDeep({
      symbol: state.symbol,
      mode: state.mode,
      as_of: exec.asOf,
      stage_results: structuredClone(state.stage_results),
      current: structuredClone(exec.current),
      previous: exec.previous ? structuredClone(exec.previous) : null,
    });

    const output = await executeStage(handlerFor(this.stages, stage), view, exec.params);
    this.mergeOutput(state.stage_results, stage, output, policy, state.timestamp);
  }

  private mergeOutput<S extends StageName>(
    results: StageResults,
    stage: S,
    output: StageOutputs[S],
    policy: MergePolicy,
    executedAt: string
  ): void {
    const existing: StageEntry<StageOutputs[S]> | undefined = results[stage];
    if (policy === 'append' && existing) {
      setStageEntry(results, stage, {
        output,
        executed_at: executedAt,
        revisions: [...existing.revisions, existing.output],
      });
      return;
    }
    setStageEntry(results, stage, { output, executed_at: executedAt, revisions: [] });
  }

  private scoreChanged(exec: ExecutionContext): boolean {
    const before = exec.prior?.stage_results.scoring?.output.score;
    const after = exec.state.stage_results.scoring?.output.score;
    if (before === undefined || after === undefined) return true;

    const threshold = numberAt(exec.params, 'update.material_score_delta', 5);
    const changed = Math.abs(after - before) >= threshold;
    console.log(
      `  [gate] score ${before.toFixed(2)} -> ${after.toFixed(2)} (threshold ${threshold}): ${changed ? 'material' : 'not material'}`
    );
    return changed;
  }
}

function testDateTimestamp(testDate: string): string {
  const parsed = new Date(/^\d{4}-\d{2}-\d{2}$/.test(testDate) ? `${testDate}T00:00:00.000Z` : testDate);
  return parsed.toISOString();
}
