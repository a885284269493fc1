import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { NotFoundError, ParameterError } from '../control-plane/errors.js';
import { HistoryReader, testDateCutoff, type HistoryRecord } from '../history/reader.js';
import { CacheStore } from '../tools/cache.js';
import { FAST_LOCK, makeState, makeTempDir, removeDir } from './fixtures.js';

async function collect(iterable: AsyncIterable<HistoryRecord>): Promise<HistoryRecord[]> {
  const out: HistoryRecord[] = [];
  for await (const record of iterable) out.push(record);
  return out;
}

async function seed(store: CacheStore, date: string): Promise<void> {
  const key = `NVDA_${date.replace(/-/g, '')}`;
  await store.write(key, makeState({ cache_key: key, timestamp: `${date}T14:00:00.000Z` }));
}

describe('testDateCutoff', () => {
  it('covers the whole UTC day of a bare date', () => {
    expect(testDateCutoff('2025-11-20')).toBe(Date.parse('2025-11-20T23:59:59.999Z'));
  });

  it('rejects an unparseable date', () => {
    expect(() => testDateCutoff('not-a-date')).toThrow(ParameterError);
  });
});

describe('HistoryReader', () => {
  let dir: string;
  let store: CacheStore;
  let reader: HistoryReader;

  beforeEach(async () => {
    dir = await makeTempDir();
    store = new CacheStore(join(dir, 'cache'), FAST_LOCK);
    reader = new HistoryReader(store);
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('lists entries in ascending timestamp order whatever the write order', async () => {
    await seed(store, '2025-11-25');
    await seed(store, '2025-11-03');
    await seed(store, '2025-11-10');

    const records = await collect(reader.listHistory('NVDA'));
    expect(records.map((r) => r.key)).toEqual(['NVDA_20251103', 'NVDA_20251110', 'NVDA_20251125']);
  });

  it('summarizes each entry', async () => {
    await store.write(
      'NVDA_20251103',
      makeState({
        snapshots: [{ timestamp: '2025-11-03T14:00:00.000Z', mode: 'full', market_params: { vix: 18 } }],
        stage_results: {
          scoring: {
            output: { score: 19.5, breakdown: { ivr: 32.5, vix: -18, 'event:ivr_high': 5 } },
            executed_at: '2025-11-03T14:00:00.000Z',
            revisions: [],
          },
        },
      })
    );

    const [record] = await collect(reader.listHistory('nvda'));
    expect(record?.summary).toEqual({
      mode: 'full',
      score: 19.5,
      strategy: null,
      material_change: null,
      snapshot_count: 1,
    });
  });

  it('re-scans the store on every iteration', async () => {
    const history = reader.listHistory('NVDA');
    expect(await collect(history)).toEqual([]);

    await seed(store, '2025-11-03');
    expect((await collect(history)).map((r) => r.key)).toEqual(['NVDA_20251103']);
  });

  it('returns the latest key', async () => {
    await seed(store, '2025-11-10');
    await seed(store, '2025-11-03');
    expect(await reader.latestKey('NVDA')).toBe('NVDA_20251110');
    expect(await reader.latestKey('AMD')).toBeNull();
  });

  it('picks the latest entry on or before the test date', async () => {
    await seed(store, '2025-11-25');
    await seed(store, '2025-11-10');

    const entry = await reader.loadForBacktest('NVDA', '2025-11-20');
    expect(entry.key).toBe('NVDA_20251110');
  });

  it('includes an entry from the test date itself', async () => {
    await seed(store, '2025-11-10');
    const entry = await reader.loadForBacktest('NVDA', '2025-11-10');
    expect(entry.key).toBe('NVDA_20251110');
  });

  it('raises NotFoundError when nothing is old enough', async () => {
    await seed(store, '2025-11-10');
    await expect(reader.loadForBacktest('NVDA', '2025-11-01')).rejects.toBeInstanceOf(NotFoundError);
  });
});
