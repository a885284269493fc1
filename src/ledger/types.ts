import type { RunMode, StageName } from '../control-plane/types.js';

export type StepStatus = 'passed' | 'failed' | 'skipped';

export interface StepResult {
  stage: StageName;
  status: StepStatus;
  durationMs: number;
  reason?: string;
  error?: string;
}

/** What a run planned, what actually executed, and how long each stage took. */
export interface RunLedger {
  run_id: string;
  mode: RunMode;
  started_at: string;
  planned_stages: StageName[];
  executed_stages: StageName[];
  skipped_stages: StageName[];
  durations_ms: Record<string, number>;
  skip_reasons: Record<string, string>;
  persisted: boolean;
  passed: boolean;
  failure_reason?: string;
}
