import { freezeDeep } from '../utils/freeze.js';
import { ParameterError } from './errors.js';
import type { ParamMap, ParamValue, ParameterSet } from './types.js';

export type ParamCategory = 'null' | 'number' | 'string' | 'boolean' | 'array' | 'mapping';

export function isParamMap(value: ParamValue | undefined): value is ParamMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function categoryOf(value: ParamValue): ParamCategory {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'object') return 'mapping';
  if (typeof value === 'number') return 'number';
  if (typeof value === 'string') return 'string';
  return 'boolean';
}

function cloneValue(value: ParamValue): ParamValue {
  if (Array.isArray(value)) return value.map(cloneValue);
  if (isParamMap(value)) {
    const copy: ParamMap = {};
    for (const [key, inner] of Object.entries(value)) {
      copy[key] = cloneValue(inner);
    }
    return copy;
  }
  return value;
}

/**
 * Overlays `overlay` on `base` into a fresh mapping. Nested mappings merge
 * key by key; every other value (arrays included) replaces.
 */
export function mergeParams(base: ParamMap, overlay: ParamMap): ParamMap {
  const merged: ParamMap = {};
  for (const [key, value] of Object.entries(base)) {
    merged[key] = cloneValue(value);
  }
  for (const [key, value] of Object.entries(overlay)) {
    const existing = merged[key];
    merged[key] =
      isParamMap(existing) && isParamMap(value)
        ? mergeParams(existing, value)
        : cloneValue(value);
  }
  return merged;
}

function checkOverrideTypes(defaults: ParamMap, overrides: ParamMap, prefix: string): void {
  for (const [key, value] of Object.entries(overrides)) {
    const path = prefix ? `${prefix}.${key}` : key;
    if (!(key in defaults)) continue;

    const expected = defaults[key];
    if (expected === null) continue;

    const expectedCategory = categoryOf(expected);
    const actualCategory = categoryOf(value);
    if (expectedCategory !== actualCategory) {
      throw new ParameterError(
        path,
        `Parameter "${path}" expects ${expectedCategory} but dyn params supplied ${actualCategory} (${JSON.stringify(value)})`
      );
    }

    if (isParamMap(expected) && isParamMap(value)) {
      checkOverrideTypes(expected, value, path);
    }
  }
}

/**
 * Resolves the effective parameters for a run: defaults < market layer < dyn.
 * Pure: inputs are left untouched and the result is a deep-frozen copy.
 */
export function resolveParameters(
  defaults: ParamMap,
  cachedMarketParams: ParamMap,
  dynParams: ParamMap
): ParameterSet {
  checkOverrideTypes(defaults, dynParams, '');
  const withMarket = mergeParams(defaults, cachedMarketParams);
  return freezeDeep(mergeParams(withMarket, dynParams));
}

// Typed accessors used by stage handlers. They return undefined on a missing
// path and leave type complaints to the caller, which knows the stage name.

export function valueAt(params: ParameterSet, path: string): ParamValue | undefined {
  let current: ParamValue | undefined = params;
  for (const segment of path.split('.')) {
    if (!isParamMap(current)) return undefined;
    current = current[segment];
  }
  return current;
}

export function mapAt(params: ParameterSet, path: string): ParamMap {
  const value = valueAt(params, path);
  return isParamMap(value) ? value : {};
}

export function numberAt(params: ParameterSet, path: string, fallback: number): number {
  const value = valueAt(params, path);
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}
