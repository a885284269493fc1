import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { ParameterError } from '../control-plane/errors.js';
import { loadInputs, parseParamJson } from '../tools/inputs.js';
import { makeTempDir, removeDir } from './fixtures.js';

describe('loadInputs', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('returns empty inputs without a source', async () => {
    expect(await loadInputs()).toEqual({ market_params: {}, dyn_params: {}, assets: [] });
  });

  it('accepts inline JSON as a flat mapping of readings', async () => {
    expect(await loadInputs('{"vix": 18, "ivr": 65}')).toEqual({
      market_params: { vix: 18, ivr: 65 },
      dyn_params: {},
      assets: [],
    });
  });

  it('accepts the structured shape with dyn params', async () => {
    const inputs = await loadInputs(
      JSON.stringify({ market_params: { vix: 18 }, dyn_params: { comparison: { significance: 4 } } })
    );
    expect(inputs.market_params).toEqual({ vix: 18 });
    expect(inputs.dyn_params).toEqual({ comparison: { significance: 4 } });
  });

  it('reads a .json file', async () => {
    const path = join(dir, 'nvda.json');
    await writeFile(path, JSON.stringify({ vix: 22, ivr: 70 }));
    expect((await loadInputs(path)).market_params).toEqual({ vix: 22, ivr: 70 });
  });

  it('reads a folder and lists chart images as assets', async () => {
    const folder = join(dir, 'NVDA');
    await mkdir(folder);
    await writeFile(join(folder, 'market_params.json'), JSON.stringify({ vix: 18, ivr: 65 }));
    await writeFile(join(folder, 'dyn_params.json'), JSON.stringify({ update: { material_score_delta: 2 } }));
    await writeFile(join(folder, 'daily.png'), '');
    await writeFile(join(folder, 'weekly.JPG'), '');
    await writeFile(join(folder, 'notes.txt'), 'ignored');

    const inputs = await loadInputs(folder);
    expect(inputs.market_params).toEqual({ vix: 18, ivr: 65 });
    expect(inputs.dyn_params).toEqual({ update: { material_score_delta: 2 } });
    expect(inputs.assets).toEqual([join(folder, 'daily.png'), join(folder, 'weekly.JPG')]);
  });

  it('rejects a folder without market_params.json', async () => {
    await expect(loadInputs(dir)).rejects.toThrow(/has no market_params.json/);
  });

  it('rejects readings outside their range', async () => {
    await expect(loadInputs('{"ivr": 120}')).rejects.toThrow('ivr must be between 0 and 100, got 120');
    await expect(loadInputs('{"vix": -1}')).rejects.toThrow('vix must be >= 0, got -1');
  });

  it('rejects a non-numeric reading it range-checks', async () => {
    await expect(loadInputs('{"vix": "high"}')).rejects.toBeInstanceOf(ParameterError);
  });

  it('rejects malformed JSON', async () => {
    await expect(loadInputs('{"vix": ')).rejects.toBeInstanceOf(ParameterError);
  });

  it('rejects an unsupported file type', async () => {
    const path = join(dir, 'readings.csv');
    await writeFile(path, 'vix,18');
    await expect(loadInputs(path)).rejects.toThrow(/Unsupported input source/);
  });

  it('rejects a missing path', async () => {
    await expect(loadInputs(join(dir, 'missing.json'))).rejects.toBeInstanceOf(ParameterError);
  });
});

describe('parseParamJson', () => {
  it('parses a mapping', () => {
    expect(parseParamJson('{"comparison": {"significance": 3}}', '--params')).toEqual({
      comparison: { significance: 3 },
    });
  });

  it('rejects a non-object', () => {
    expect(() => parseParamJson('[1, 2]', '--params')).toThrow(ParameterError);
  });
});
