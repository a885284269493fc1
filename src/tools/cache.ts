import { mkdir, readFile, readdir } from 'node:fs/promises';
import { join } from 'node:path';
import writeFileAtomic from 'write-file-atomic';
import { CacheIOError, ParameterError, errorMessage } from '../control-plane/errors.js';
import { cacheDocumentSchema, KNOWN_DOCUMENT_KEYS } from '../schemas/run-state.js';
import type { RunState } from '../control-plane/types.js';
import type { LockConfig } from '../config.js';
import { acquireLock, hasErrorCode } from './lock.js';
import { formatDateKey } from '../utils/id.js';

const KEY_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export interface CacheEntry {
  key: string;
  path: string;
  state: RunState;
  /** Top-level keys this version does not interpret; written back verbatim. */
  extras: Record<string, unknown>;
}

export function normalizeSymbol(symbol: string): string {
  return symbol.trim().toUpperCase();
}

export function buildCacheKey(symbol: string, date: Date): string {
  return `${normalizeSymbol(symbol)}_${formatDateKey(date)}`;
}

export function normalizeCacheKey(key: string): string {
  const trimmed = key.trim().replace(/\.json$/i, '');
  if (!KEY_PATTERN.test(trimmed) || trimmed.includes('..')) {
    throw new ParameterError('cache_key', `Invalid cache key "${key}"`);
  }
  return trimmed;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * One JSON document per cache key under `dir`. Writes go through a temp file
 * and rename, so a reader sees either the old document or the new one.
 */
export class CacheStore {
  constructor(
    readonly dir: string,
    private readonly lockConfig: LockConfig
  ) {}

  pathFor(key: string): string {
    return join(this.dir, `${normalizeCacheKey(key)}.json`);
  }

  async read(key: string): Promise<CacheEntry | null> {
    const path = this.pathFor(key);

    let raw: string;
    try {
      raw = await readFile(path, 'utf-8');
    } catch (err) {
      if (hasErrorCode(err, 'ENOENT')) return null;
      throw new CacheIOError(path, `Cannot read cache file: ${errorMessage(err)}`, { cause: err });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new CacheIOError(path, `Cache file is not valid JSON: ${errorMessage(err)}`, { cause: err });
    }

    const parsed = cacheDocumentSchema.safeParse(json);
    if (!parsed.success || !isPlainObject(json)) {
      const issues = parsed.success
        ? 'document is not an object'
        : parsed.error.errors.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`).join('; ');
      throw new CacheIOError(path, `Cache file failed validation: ${issues}`);
    }

    const extras: Record<string, unknown> = {};
    for (const [name, value] of Object.entries(json)) {
      if (!KNOWN_DOCUMENT_KEYS.has(name)) extras[name] = value;
    }

    const doc = parsed.data;
    const normalizedKey = normalizeCacheKey(key);
    return {
      key: normalizedKey,
      path,
      extras,
      state: {
        symbol: doc.symbol,
        timestamp: doc.timestamp,
        created_at: doc.created_at ?? doc.timestamp,
        cache_key: doc.cache_key ?? normalizedKey,
        mode: doc.mode,
        market_params: doc.market_params,
        dyn_params: doc.dyn_params,
        stage_results: doc.stage_results,
        snapshots: doc.snapshots ?? [],
        ledger: doc.ledger,
      },
    };
  }

  async write(key: string, state: RunState, extras: Record<string, unknown> = {}): Promise<string> {
    const path = this.pathFor(key);
    const document = { ...state, ...extras };

    try {
      await mkdir(this.dir, { recursive: true });
      await writeFileAtomic(path, `${JSON.stringify(document, null, 2)}\n`, { encoding: 'utf8' });
    } catch (err) {
      throw new CacheIOError(path, `Cannot write cache file: ${errorMessage(err)}`, { cause: err });
    }
    return path;
  }

  /** Cache keys whose file name starts with the symbol, unordered. */
  async listKeys(symbol: string): Promise<string[]> {
    const prefix = `${normalizeSymbol(symbol)}_`;
    let names: string[];
    try {
      names = await readdir(this.dir);
    } catch (err) {
      if (hasErrorCode(err, 'ENOENT')) return [];
      throw new CacheIOError(this.dir, `Cannot list cache directory: ${errorMessage(err)}`, { cause: err });
    }
    return names
      .filter((name) => name.startsWith(prefix) && name.endsWith('.json'))
      .map((name) => name.slice(0, -'.json'.length));
  }

  async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    try {
      await mkdir(this.dir, { recursive: true });
    } catch (err) {
      throw new CacheIOError(this.dir, `Cannot create cache directory: ${errorMessage(err)}`, { cause: err });
    }
    const lock = await acquireLock(`${this.pathFor(key)}.lock`, this.lockConfig);
    let result: T;
    try {
      result = await fn();
    } catch (err) {
      try {
        await lock.release();
      } catch (releaseErr) {
        console.warn(`  [lock] release failed after an earlier error: ${errorMessage(releaseErr)}`);
      }
      throw err;
    }
    await lock.release();
    return result;
  }
}
