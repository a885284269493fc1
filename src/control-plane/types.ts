import type { RunLedger } from '../ledger/types.js';

export type RunMode = 'full' | 'update' | 'refresh' | 'backtest';

export const RUN_MODES: readonly RunMode[] = ['full', 'update', 'refresh', 'backtest'];

export type StageName = 'event_detection' | 'scoring' | 'strategy_calc' | 'comparison';

export type MergePolicy = 'replace' | 'append' | 'skip-if-present';

export type ParamScalar = number | string | boolean | null;
export type ParamValue = ParamScalar | ParamValue[] | ParamMap;
export interface ParamMap {
  [key: string]: ParamValue;
}

export type ParameterSet = Readonly<ParamMap>;

export interface MarketSnapshot {
  timestamp: string;
  mode: RunMode;
  market_params: ParamMap;
}

// Stage outputs

export interface DetectedEvent {
  tag: string;
  kind: 'threshold' | 'calendar';
  param?: string;
  value?: number;
  threshold?: number;
  direction?: 'above' | 'below';
  date?: string;
  days_away?: number;
}

export interface EventDetectionOutput {
  tags: string[];
  events: DetectedEvent[];
}

export interface ScoringOutput {
  score: number;
  breakdown: Record<string, number>;
}

export interface StrategyCandidate {
  strategy: string;
  min_score: number;
  risk_rank: number;
}

export interface StrategyOutput {
  strategy: string;
  bucket_min: number | null;
  risk_rank: number;
  score: number;
  candidates: StrategyCandidate[];
  rationale: string;
}

export interface FieldDelta {
  previous: number;
  current: number;
  delta: number;
  change_pct: number | null;
  threshold: number;
  significant: boolean;
}

export interface ComparisonOutput {
  baseline_timestamp: string;
  deltas: Record<string, FieldDelta>;
  significant_fields: string[];
  material_change: boolean;
}

export interface StageOutputs {
  event_detection: EventDetectionOutput;
  scoring: ScoringOutput;
  strategy_calc: StrategyOutput;
  comparison: ComparisonOutput;
}

export interface StageEntry<O> {
  output: O;
  executed_at: string;
  revisions: O[];
}

export type StageResults = {
  [S in StageName]?: StageEntry<StageOutputs[S]>;
};

export interface RunState {
  symbol: string;
  timestamp: string;
  created_at: string;
  cache_key: string;
  mode: RunMode;
  market_params: ParamMap;
  dyn_params: ParamMap;
  stage_results: StageResults;
  snapshots: MarketSnapshot[];
  ledger?: RunLedger;
}

// Planning

export type StageGate = 'score_changed';

export interface PlannedStage {
  stage: StageName;
  policy: MergePolicy;
  gate?: StageGate;
}

interface PlanBase {
  steps: PlannedStage[];
  carryOver: boolean;
}

export type StagePlan =
  | (PlanBase & { mode: 'full'; persist: true; overwrite: boolean })
  | (PlanBase & { mode: 'update'; persist: true })
  | (PlanBase & { mode: 'refresh'; persist: true })
  | (PlanBase & { mode: 'backtest'; persist: false; testDate: string });

// Inputs

export interface RunInputs {
  market_params: ParamMap;
  dyn_params: ParamMap;
  assets: string[];
}

export interface RunOptions {
  overwrite?: boolean;
  testDate?: string;
}
