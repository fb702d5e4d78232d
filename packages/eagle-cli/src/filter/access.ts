/**
 * Path access: field lookup, indexing, slicing, iteration.
 */

import { isJsonObject } from '@eaglet/api';
import { FilterRuntimeError } from '../errors.js';
import type { JsonValue } from '../output/types.js';
import { describe, typeName } from './values.js';

export function indexField(value: JsonValue, name: string): JsonValue {
  if (value === null) return null;
  if (isJsonObject(value)) {
    return Object.hasOwn(value, name) ? (value[name] ?? null) : null;
  }
  throw new FilterRuntimeError(`Cannot index ${typeName(value)} with "${name}"`);
}

export function indexValue(value: JsonValue, index: JsonValue): JsonValue {
  if (typeof index === 'string') return indexField(value, index);
  if (typeof index === 'number') {
    if (value === null) return null;
    if (Array.isArray(value)) {
      const i = Math.floor(index);
      const at = i < 0 ? value.length + i : i;
      return value[at] ?? null;
    }
  }
  throw new FilterRuntimeError(`Cannot index ${typeName(value)} with ${typeName(index)}`);
}

function sliceBound(bound: JsonValue, length: number, fallback: number, round: (n: number) => number): number {
  if (bound === null) return fallback;
  if (typeof bound !== 'number') {
    throw new FilterRuntimeError(`Start and end indices of a slice must be numbers, got ${typeName(bound)}`);
  }
  const n = round(bound);
  const resolved = n < 0 ? length + n : n;
  return Math.min(Math.max(resolved, 0), length);
}

export function sliceValue(value: JsonValue, from: JsonValue, to: JsonValue): JsonValue {
  if (value === null) return null;
  if (Array.isArray(value)) {
    const start = sliceBound(from, value.length, 0, Math.floor);
    const end = sliceBound(to, value.length, value.length, Math.ceil);
    return value.slice(start, Math.max(start, end));
  }
  if (typeof value === 'string') {
    const chars = Array.from(value);
    const start = sliceBound(from, chars.length, 0, Math.floor);
    const end = sliceBound(to, chars.length, chars.length, Math.ceil);
    return chars.slice(start, Math.max(start, end)).join('');
  }
  throw new FilterRuntimeError(`Cannot index ${typeName(value)} with object`);
}

export function iterateValue(value: JsonValue): JsonValue[] {
  if (Array.isArray(value)) return value;
  if (isJsonObject(value)) return Object.values(value);
  throw new FilterRuntimeError(
    value === null ? 'Cannot iterate over null' : `Cannot iterate over ${describe(value)}`,
  );
}

/** Every value reachable from `value`, parents before children. */
export function* recurseValues(value: JsonValue): Generator<JsonValue> {
  yield value;
  if (Array.isArray(value) || isJsonObject(value)) {
    for (const child of iterateValue(value)) {
      yield* recurseValues(child);
    }
  }
}
