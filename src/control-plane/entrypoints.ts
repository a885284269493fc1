import { getConfig, type Config } from '../config.js';
import type { HistoryRecord } from '../history/reader.js';
import { CacheStore, normalizeSymbol } from '../tools/cache.js';
import { loadInputs, parseParamJson } from '../tools/inputs.js';
import { SymflowError, type RunContext } from './errors.js';
import { mergeParams } from './parameters.js';
import { WorkflowEngine } from './orchestrator.js';
import type { ParamMap, RunMode, RunState } from './types.js';

export interface Workspace {
  config: Config;
  engine: WorkflowEngine;
}

export interface AnalyzeOptions {
  overwrite?: boolean;
  /** Extra dyn params layered over whatever the source carries; a string is parsed as JSON. */
  params?: ParamMap | string;
  testDate?: string;
}

export function createWorkspace(config: Config = getConfig(), clock?: () => Date): Workspace {
  const store = new CacheStore(config.cacheDir, config.lock);
  return { config, engine: new WorkflowEngine({ store, clock }) };
}

export async function analyze(
  workspace: Workspace,
  symbol: string,
  mode: RunMode,
  source?: string,
  cacheKey?: string,
  options: AnalyzeOptions = {}
): Promise<RunState> {
  const context: RunContext = { symbol: normalizeSymbol(symbol), mode };
  try {
    const inputs = await loadInputs(source);
    const params = typeof options.params === 'string' ? parseParamJson(options.params, '--params') : options.params;
    if (params) {
      inputs.dyn_params = mergeParams(inputs.dyn_params, params);
    }
    if (inputs.assets.length > 0) {
      console.log(`[symflow] ${inputs.assets.length} chart asset(s) attached`);
    }
    return await workspace.engine.run(symbol, mode, inputs, cacheKey, {
      overwrite: options.overwrite,
      testDate: options.testDate,
    });
  } catch (err) {
    if (err instanceof SymflowError) throw err.withContext(context);
    throw err;
  }
}

export function refresh(
  workspace: Workspace,
  symbol: string,
  source: string,
  cacheKey?: string,
  options: AnalyzeOptions = {}
): Promise<RunState> {
  return analyze(workspace, symbol, 'refresh', source, cacheKey, options);
}

export async function history(workspace: Workspace, symbol: string): Promise<HistoryRecord[]> {
  const records: HistoryRecord[] = [];
  try {
    for await (const record of workspace.engine.history.listHistory(symbol)) {
      records.push(record);
    }
  } catch (err) {
    if (err instanceof SymflowError) throw err.withContext({ symbol: normalizeSymbol(symbol) });
    throw err;
  }
  return records;
}

export function backtest(
  workspace: Workspace,
  symbol: string,
  testDate: string,
  source?: string,
  options: AnalyzeOptions = {}
): Promise<RunState> {
  return analyze(workspace, symbol, 'backtest', source, undefined, { ...options, testDate });
}
