import { z } from 'zod';
import type { ParamMap } from './control-plane/types.js';

const envSchema = z.object({
  CACHE_DIR: z.string().min(1).default('data/cache'),
  OUTPUT_DIR: z.string().min(1).default('data/output'),
  LOCK_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  LOCK_RETRY_MS: z.coerce.number().int().positive().default(100),
  LOCK_STALE_MS: z.coerce.number().int().positive().default(60_000),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
});

export interface LockConfig {
  timeoutMs: number;
  retryMs: number;
  staleMs: number;
}

export interface Config {
  cacheDir: string;
  outputDir: string;
  lock: LockConfig;
  openai: {
    apiKey?: string;
    model: string;
  };
}

/**
 * Static parameter defaults: the lowest-precedence layer of every resolved
 * ParameterSet. Rule and category maps are evaluated in key order.
 */
export const DEFAULT_PARAMETERS: ParamMap = {
  events: {
    rules: {
      vix_elevated: { param: 'vix', above: 20 },
      vix_extreme: { param: 'vix', above: 30 },
      ivr_high: { param: 'ivr', above: 50 },
      ivr_low: { param: 'ivr', below: 20 },
      iv_premium: { param: 'iv_hv_spread', above: 5 },
    },
    opex_window_days: 7,
  },
  scoring: {
    weights: {
      ivr: 0.5,
      vix: -1,
    },
    event_weights: {
      ivr_high: 5,
      ivr_low: -5,
      vix_elevated: -5,
      vix_extreme: -10,
      iv_premium: 3,
      quarterly_opex: -2,
    },
  },
  strategy: {
    categories: {
      iron_condor: { min_score: 20, risk_rank: 1, blocked_by: ['vix_extreme'] },
      credit_spread: { min_score: 5, risk_rank: 2, blocked_by: [] },
      debit_spread: { min_score: -10, risk_rank: 3, blocked_by: [] },
      long_option: { min_score: -25, risk_rank: 4, blocked_by: ['ivr_high'] },
    },
  },
  comparison: {
    significance: 2,
    field_thresholds: {
      ivr: 10,
    },
  },
  update: {
    material_score_delta: 5,
  },
};

function loadConfig(env: NodeJS.ProcessEnv): Config {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const errors = parsed.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new Error(`Configuration validation failed:\n${errors}`);
  }

  const values = parsed.data;
  return {
    cacheDir: values.CACHE_DIR,
    outputDir: values.OUTPUT_DIR,
    lock: {
      timeoutMs: values.LOCK_TIMEOUT_MS,
      retryMs: values.LOCK_RETRY_MS,
      staleMs: values.LOCK_STALE_MS,
    },
    openai: {
      apiKey: values.OPENAI_API_KEY,
      model: values.OPENAI_MODEL,
    },
  };
}

let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig(process.env);
  }
  return configInstance;
}

/** For tests. */
export function resetConfig(): void {
  configInstance = null;
}

export { loadConfig };
