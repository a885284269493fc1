import { readFile, readdir, stat } from 'node:fs/promises';
import { extname, join } from 'node:path';
import { z } from 'zod';
import { ParameterError, errorMessage } from '../control-plane/errors.js';
import type { ParamMap, RunInputs } from '../control-plane/types.js';
import { paramMapSchema } from '../schemas/run-state.js';
import { hasErrorCode } from './lock.js';

const MARKET_FILE = 'market_params.json';
const DYN_FILE = 'dyn_params.json';
const IMAGE_EXTENSIONS = new Set(['.png', '.jpg', '.jpeg']);

const structuredInputSchema = z
  .object({
    market_params: paramMapSchema,
    dyn_params: paramMapSchema.optional(),
  })
  .strict();

interface Range {
  min: number;
  max?: number;
}

const READING_RANGES: Record<string, Range> = {
  ivr: { min: 0, max: 100 },
  vix: { min: 0 },
};

export function emptyInputs(): RunInputs {
  return { market_params: {}, dyn_params: {}, assets: [] };
}

function parseJson(text: string, label: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new ParameterError(label, `${label} is not valid JSON: ${errorMessage(err)}`);
  }
}

function formatIssues(error: z.ZodError): string {
  return error.errors.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`).join('; ');
}

/** Parses a JSON mapping of parameters, e.g. the `--params` option. */
export function parseParamJson(text: string, label: string): ParamMap {
  const parsed = paramMapSchema.safeParse(parseJson(text, label));
  if (!parsed.success) {
    throw new ParameterError(label, `${label} must be a JSON object of parameters (${formatIssues(parsed.error)})`);
  }
  return parsed.data;
}

export function checkReadingRanges(marketParams: ParamMap): void {
  for (const [field, range] of Object.entries(READING_RANGES)) {
    if (!(field in marketParams)) continue;
    const value = marketParams[field];
    const path = `market_params.${field}`;
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new ParameterError(path, `${field} must be a number, got ${JSON.stringify(value)}`);
    }
    if (value < range.min || (range.max !== undefined && value > range.max)) {
      const bounds = range.max !== undefined ? `between ${range.min} and ${range.max}` : `>= ${range.min}`;
      throw new ParameterError(path, `${field} must be ${bounds}, got ${value}`);
    }
  }
}

/**
 * Accepts either `{ market_params, dyn_params? }` or a flat mapping of
 * market readings.
 */
export function normalizeInputDocument(document: unknown, label: string): Omit<RunInputs, 'assets'> {
  const structured = structuredInputSchema.safeParse(document);
  if (structured.success) {
    checkReadingRanges(structured.data.market_params);
    return {
      market_params: structured.data.market_params,
      dyn_params: structured.data.dyn_params ?? {},
    };
  }

  const flat = paramMapSchema.safeParse(document);
  if (!flat.success) {
    throw new ParameterError(label, `${label} must be a JSON object of market readings (${formatIssues(flat.error)})`);
  }
  checkReadingRanges(flat.data);
  return { market_params: flat.data, dyn_params: {} };
}

async function readText(path: string, label: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf-8');
  } catch (err) {
    if (hasErrorCode(err, 'ENOENT')) return null;
    throw new ParameterError(label, `Cannot read ${path}: ${errorMessage(err)}`);
  }
}

async function loadFolder(dir: string): Promise<RunInputs> {
  const marketText = await readText(join(dir, MARKET_FILE), 'source');
  if (marketText === null) {
    throw new ParameterError('source', `Input folder ${dir} has no ${MARKET_FILE}`);
  }
  const inputs = normalizeInputDocument(parseJson(marketText, MARKET_FILE), MARKET_FILE);

  const dynText = await readText(join(dir, DYN_FILE), 'source');
  const dyn_params = dynText === null
    ? inputs.dyn_params
    : { ...inputs.dyn_params, ...parseParamJson(dynText, DYN_FILE) };

  const assets = (await readdir(dir))
    .filter((name) => IMAGE_EXTENSIONS.has(extname(name).toLowerCase()))
    .sort()
    .map((name) => join(dir, name));

  return { market_params: inputs.market_params, dyn_params, assets };
}

/**
 * Reads run inputs from inline JSON, a `.json` file, or a folder holding
 * `market_params.json` (plus optional `dyn_params.json` and chart images).
 */
export async function loadInputs(source?: string): Promise<RunInputs> {
  if (source === undefined || source.trim() === '') return emptyInputs();

  const trimmed = source.trim();
  if (trimmed.startsWith('{')) {
    return { ...normalizeInputDocument(parseJson(trimmed, 'source'), 'source'), assets: [] };
  }

  let isDirectory: boolean;
  try {
    isDirectory = (await stat(trimmed)).isDirectory();
  } catch (err) {
    throw new ParameterError('source', `Input source ${trimmed} not found: ${errorMessage(err)}`);
  }

  if (isDirectory) return loadFolder(trimmed);

  if (extname(trimmed).toLowerCase() !== '.json') {
    throw new ParameterError('source', `Unsupported input source ${trimmed} (expected a folder, a .json file or inline JSON)`);
  }
  const text = await readText(trimmed, 'source');
  if (text === null) {
    throw new ParameterError('source', `Input source ${trimmed} not found`);
  }
  return { ...normalizeInputDocument(parseJson(text, trimmed), trimmed), assets: [] };
}
