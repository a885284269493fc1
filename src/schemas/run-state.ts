import { z } from 'zod';
import type {
  ComparisonOutput,
  EventDetectionOutput,
  MarketSnapshot,
  ParamMap,
  ParamValue,
  RunMode,
  ScoringOutput,
  StrategyOutput,
} from '../control-plane/types.js';
import type { RunLedger } from '../ledger/types.js';

export const runModeSchema: z.ZodType<RunMode> = z.enum(['full', 'update', 'refresh', 'backtest']);

export const paramValueSchema: z.ZodType<ParamValue> = z.lazy(() =>
  z.union([
    z.number(),
    z.string(),
    z.boolean(),
    z.null(),
    z.array(paramValueSchema),
    z.record(paramValueSchema),
  ])
);

export const paramMapSchema: z.ZodType<ParamMap> = z.record(paramValueSchema);

const stageNameSchema = z.enum(['event_detection', 'scoring', 'strategy_calc', 'comparison']);

const eventDetectionSchema: z.ZodType<EventDetectionOutput> = z.object({
  tags: z.array(z.string()),
  events: z.array(
    z.object({
      tag: z.string(),
      kind: z.enum(['threshold', 'calendar']),
      param: z.string().optional(),
      value: z.number().optional(),
      threshold: z.number().optional(),
      direction: z.enum(['above', 'below']).optional(),
      date: z.string().optional(),
      days_away: z.number().optional(),
    })
  ),
}).passthrough();

const scoringSchema: z.ZodType<ScoringOutput> = z.object({
  score: z.number(),
  breakdown: z.record(z.number()),
}).passthrough();

const strategySchema: z.ZodType<StrategyOutput> = z.object({
  strategy: z.string(),
  bucket_min: z.number().nullable(),
  risk_rank: z.number(),
  score: z.number(),
  candidates: z.array(
    z.object({ strategy: z.string(), min_score: z.number(), risk_rank: z.number() })
  ),
  rationale: z.string(),
}).passthrough();

const comparisonSchema: z.ZodType<ComparisonOutput> = z.object({
  baseline_timestamp: z.string(),
  deltas: z.record(
    z.object({
      previous: z.number(),
      current: z.number(),
      delta: z.number(),
      change_pct: z.number().nullable(),
      threshold: z.number(),
      significant: z.boolean(),
    })
  ),
  significant_fields: z.array(z.string()),
  material_change: z.boolean(),
}).passthrough();

function stageEntrySchema<T>(output: z.ZodType<T>) {
  return z.object({
    output,
    executed_at: z.string(),
    revisions: z.array(output).default([]),
  }).passthrough();
}

/** Unknown stage names and output fields are kept as written. */
const stageResultsSchema = z.object({
  event_detection: stageEntrySchema(eventDetectionSchema).optional(),
  scoring: stageEntrySchema(scoringSchema).optional(),
  strategy_calc: stageEntrySchema(strategySchema).optional(),
  comparison: stageEntrySchema(comparisonSchema).optional(),
}).passthrough();

const snapshotSchema: z.ZodType<MarketSnapshot> = z.object({
  timestamp: z.string(),
  mode: runModeSchema,
  market_params: paramMapSchema,
});

const ledgerSchema: z.ZodType<RunLedger> = z.object({
  run_id: z.string(),
  mode: runModeSchema,
  started_at: z.string(),
  planned_stages: z.array(stageNameSchema),
  executed_stages: z.array(stageNameSchema),
  skipped_stages: z.array(stageNameSchema),
  durations_ms: z.record(z.number()),
  skip_reasons: z.record(z.string()),
  persisted: z.boolean(),
  passed: z.boolean(),
  failure_reason: z.string().optional(),
});

/**
 * On-disk cache document. Only the first six fields are required so that
 * documents written by other tools stay readable.
 */
export const cacheDocumentSchema = z.object({
  symbol: z.string().min(1),
  timestamp: z.string().min(1),
  mode: runModeSchema,
  market_params: paramMapSchema,
  dyn_params: paramMapSchema,
  stage_results: stageResultsSchema,
  created_at: z.string().optional(),
  cache_key: z.string().optional(),
  snapshots: z.array(snapshotSchema).optional(),
  ledger: ledgerSchema.optional(),
});

export type CacheDocument = z.infer<typeof cacheDocumentSchema>;

export const KNOWN_DOCUMENT_KEYS: ReadonlySet<string> = new Set(
  Object.keys(cacheDocumentSchema.shape)
);
