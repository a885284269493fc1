import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { StageView } from '../analysis/stage.js';
import { DEFAULT_PARAMETERS, type LockConfig } from '../config.js';
import { resolveParameters } from '../control-plane/parameters.js';
import type { MarketSnapshot, ParamMap, ParameterSet, RunState, StageResults } from '../control-plane/types.js';

export const FAST_LOCK: LockConfig = { timeoutMs: 300, retryMs: 10, staleMs: 60_000 };

export function paramsFor(market: ParamMap, dyn: ParamMap = {}): ParameterSet {
  return resolveParameters(DEFAULT_PARAMETERS, market, dyn);
}

export function makeView(overrides: {
  as_of?: string;
  stage_results?: StageResults;
  current?: ParamMap;
  previous?: MarketSnapshot | null;
} = {}): StageView {
  return {
    symbol: 'NVDA',
    mode: 'full',
    as_of: overrides.as_of ?? '2025-11-03T14:00:00.000Z',
    stage_results: overrides.stage_results ?? {},
    current: {
      timestamp: overrides.as_of ?? '2025-11-03T14:00:00.000Z',
      mode: 'full',
      market_params: overrides.current ?? {},
    },
    previous: overrides.previous ?? null,
  };
}

export function makeState(overrides: Partial<RunState> = {}): RunState {
  return {
    symbol: 'NVDA',
    timestamp: '2025-11-03T14:00:00.000Z',
    created_at: '2025-11-03T14:00:00.000Z',
    cache_key: 'NVDA_20251103',
    mode: 'full',
    market_params: { vix: 18, ivr: 65 },
    dyn_params: {},
    stage_results: {},
    snapshots: [],
    ...overrides,
  };
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'symflow-test-'));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}
