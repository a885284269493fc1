import { NotFoundError, ParameterError } from '../control-plane/errors.js';
import type { RunMode } from '../control-plane/types.js';
import { normalizeSymbol, type CacheEntry, type CacheStore } from '../tools/cache.js';

export interface HistorySummary {
  mode: RunMode;
  score: number | null;
  strategy: string | null;
  material_change: boolean | null;
  snapshot_count: number;
}

export interface HistoryRecord {
  key: string;
  timestamp: string;
  summary: HistorySummary;
}

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

/** Inclusive upper bound for a test date: a bare date covers the whole UTC day. */
export function testDateCutoff(testDate: string): number {
  const iso = DATE_ONLY.test(testDate) ? `${testDate}T23:59:59.999Z` : testDate;
  const cutoff = Date.parse(iso);
  if (Number.isNaN(cutoff)) {
    throw new ParameterError('test_date', `Invalid test date "${testDate}" (expected YYYY-MM-DD)`);
  }
  return cutoff;
}

function compareEntries(a: CacheEntry, b: CacheEntry): number {
  const byTime = Date.parse(a.state.timestamp) - Date.parse(b.state.timestamp);
  if (byTime !== 0) return byTime;
  return a.key < b.key ? -1 : a.key > b.key ? 1 : 0;
}

function summarize(entry: CacheEntry): HistoryRecord {
  const { state } = entry;
  return {
    key: entry.key,
    timestamp: state.timestamp,
    summary: {
      mode: state.mode,
      score: state.stage_results.scoring?.output.score ?? null,
      strategy: state.stage_results.strategy_calc?.output.strategy ?? null,
      material_change: state.stage_results.comparison?.output.material_change ?? null,
      snapshot_count: state.snapshots.length,
    },
  };
}

/**
 * Read-only view over every cache document of a symbol. Nothing is kept
 * between calls; each lookup re-scans the store.
 */
export class HistoryReader {
  constructor(private readonly store: CacheStore) {}

  /** Entries of the symbol in ascending timestamp order. */
  async index(symbol: string): Promise<CacheEntry[]> {
    const wanted = normalizeSymbol(symbol);
    const entries: CacheEntry[] = [];
    for (const key of await this.store.listKeys(wanted)) {
      const entry = await this.store.read(key);
      if (entry && normalizeSymbol(entry.state.symbol) === wanted) {
        entries.push(entry);
      }
    }
    return entries.sort(compareEntries);
  }

  /** Lazy: the store is scanned when iteration starts, again on every new iteration. */
  listHistory(symbol: string): AsyncIterable<HistoryRecord> {
    const scan = (): Promise<CacheEntry[]> => this.index(symbol);
    return {
      async *[Symbol.asyncIterator]() {
        for (const entry of await scan()) {
          yield summarize(entry);
        }
      },
    };
  }

  async latestKey(symbol: string): Promise<string | null> {
    const entries = await this.index(symbol);
    return entries.at(-1)?.key ?? null;
  }

  async loadForBacktest(symbol: string, testDate: string): Promise<CacheEntry> {
    const cutoff = testDateCutoff(testDate);
    const eligible = (await this.index(symbol)).filter(
      (entry) => Date.parse(entry.state.timestamp) <= cutoff
    );
    const chosen = eligible.at(-1);
    if (!chosen) {
      throw new NotFoundError(
        `No cached analysis for ${normalizeSymbol(symbol)} at or before ${testDate}`,
        { symbol: normalizeSymbol(symbol), mode: 'backtest' }
      );
    }
    return chosen;
  }
}
