import type { StagePlan, StageName } from '../control-plane/types.js';
import type { RunLedger, StepResult } from './types.js';

export interface LedgerInput {
  runId: string;
  startedAt: string;
  plan: StagePlan;
  steps: StepResult[];
  passed: boolean;
  failureReason?: string;
}

export function buildLedger(input: LedgerInput): RunLedger {
  const { plan, steps } = input;
  const durationsMs: Record<string, number> = {};
  const skipReasons: Record<string, string> = {};
  const executedStages: StageName[] = [];
  const skippedStages: StageName[] = [];

  for (const step of steps) {
    if (step.status === 'skipped') {
      skippedStages.push(step.stage);
      if (step.reason) skipReasons[step.stage] = step.reason;
      continue;
    }
    executedStages.push(step.stage);
    durationsMs[step.stage] = step.durationMs;
  }

  return {
    run_id: input.runId,
    mode: plan.mode,
    started_at: input.startedAt,
    planned_stages: plan.steps.map((s) => s.stage),
    executed_stages: executedStages,
    skipped_stages: skippedStages,
    durations_ms: durationsMs,
    skip_reasons: skipReasons,
    persisted: plan.persist && input.passed,
    passed: input.passed,
    failure_reason: input.failureReason,
  };
}
