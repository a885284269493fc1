import OpenAI from 'openai';
import type { Config } from '../config.js';
import { SymflowError } from '../control-plane/errors.js';
import type { RunState } from '../control-plane/types.js';

const SYSTEM_PROMPT = `You are writing a short trading-desk note about one symbol.

You receive the final state of a deterministic analysis run as JSON: detected
market events, a numeric score with its breakdown, the recommended strategy
category and, when present, a comparison against an earlier snapshot.

Write 3 to 6 plain sentences. Use only the numbers in the JSON. Do not
recommend a different strategy than the one given and do not invent events.`;

export class NarrativeError extends SymflowError {
  constructor(message: string) {
    super(message, 'NARRATIVE_ERROR');
    this.name = 'NarrativeError';
  }
}

/** Fields the model sees; the ledger and revision history are left out. */
export function narrativePayload(state: RunState): Record<string, unknown> {
  const results = state.stage_results;
  return {
    symbol: state.symbol,
    mode: state.mode,
    as_of: state.timestamp,
    market_params: state.market_params,
    events: results.event_detection?.output ?? null,
    scoring: results.scoring?.output ?? null,
    strategy: results.strategy_calc?.output ?? null,
    comparison: results.comparison?.output ?? null,
  };
}

export async function narrateRun(state: RunState, config: Config['openai'], client?: OpenAI): Promise<string> {
  const apiKey = config.apiKey;
  if (!client && !apiKey) {
    throw new NarrativeError(
      'OPENAI_API_KEY environment variable is required for --narrate.\n' +
      'Set it with: export OPENAI_API_KEY=sk-...'
    );
  }

  const openai = client ?? new OpenAI({ apiKey });
  console.log(`  [llm] Sending run state to ${config.model}...`);

  const response = await openai.chat.completions.create({
    model: config.model,
    temperature: 0.2,
    messages: [
      { role: 'system', content: SYSTEM_PROMPT },
      { role: 'user', content: JSON.stringify(narrativePayload(state)) },
    ],
  });

  const text = response.choices[0]?.message?.content?.trim();
  if (!text) {
    throw new NarrativeError('LLM returned empty response');
  }
  return text;
}
