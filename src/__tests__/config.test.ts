import { afterEach, describe, it, expect } from 'vitest';
import { getConfig, loadConfig, resetConfig } from '../config.js';

describe('loadConfig', () => {
  afterEach(() => {
    resetConfig();
  });

  it('applies defaults', () => {
    const config = loadConfig({});
    expect(config.cacheDir).toBe('data/cache');
    expect(config.outputDir).toBe('data/output');
    expect(config.lock).toEqual({ timeoutMs: 10_000, retryMs: 100, staleMs: 60_000 });
    expect(config.openai).toEqual({ apiKey: undefined, model: 'gpt-4o-mini' });
  });

  it('coerces numeric settings from strings', () => {
    const config = loadConfig({ LOCK_TIMEOUT_MS: '2500', OPENAI_API_KEY: 'test-secret' });
    expect(config.lock.timeoutMs).toBe(2500);
    expect(config.openai.apiKey).toBe('test-secret');
  });

  it('rejects invalid settings', () => {
    expect(() => loadConfig({ LOCK_RETRY_MS: '-5' })).toThrow(/LOCK_RETRY_MS/);
  });

  it('caches the process configuration until reset', () => {
    const first = getConfig();
    expect(getConfig()).toBe(first);
    resetConfig();
    expect(getConfig()).not.toBe(first);
  });
});
