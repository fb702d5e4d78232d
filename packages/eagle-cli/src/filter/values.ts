/**
 * Value semantics used by the filter evaluator: type names, truthiness,
 * total ordering and arithmetic.
 */

import { isJsonObject, setJsonField } from '@eaglet/api';
import { FilterRuntimeError } from '../errors.js';
import type { JsonObject, JsonValue } from '../output/types.js';
import type { ArithmeticOperator } from './ast.js';

export type TypeName = 'null' | 'boolean' | 'number' | 'string' | 'array' | 'object';

export function typeName(value: JsonValue): TypeName {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  switch (typeof value) {
    case 'boolean':
      return 'boolean';
    case 'number':
      return 'number';
    case 'string':
      return 'string';
    default:
      return 'object';
  }
}

/** `type (value)` as shown in error messages, with long values cut. */
export function describe(value: JsonValue): string {
  const text = JSON.stringify(value);
  const shown = text.length > 11 ? `${text.slice(0, 10)}...` : text;
  return `${typeName(value)} (${shown})`;
}

export function isTruthy(value: JsonValue): boolean {
  return value !== null && value !== false;
}

function rank(value: JsonValue): number {
  if (value === null) return 0;
  if (value === false) return 1;
  if (value === true) return 2;
  if (typeof value === 'number') return 3;
  if (typeof value === 'string') return 4;
  if (Array.isArray(value)) return 5;
  return 6;
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function compareArrays(a: JsonValue[], b: JsonValue[]): number {
  const shared = Math.min(a.length, b.length);
  for (let i = 0; i < shared; i++) {
    const left = a[i];
    const right = b[i];
    if (left === undefined || right === undefined) break;
    const order = compareValues(left, right);
    if (order !== 0) return order;
  }
  return a.length - b.length;
}

function compareObjects(a: JsonObject, b: JsonObject): number {
  const aKeys = Object.keys(a).sort();
  const bKeys = Object.keys(b).sort();
  const byKeys = compareArrays(aKeys, bKeys);
  if (byKeys !== 0) return byKeys;
  for (const key of aKeys) {
    const order = compareValues(a[key] ?? null, b[key] ?? null);
    if (order !== 0) return order;
  }
  return 0;
}

/**
 * Total order over JSON values:
 * null < false < true < numbers < strings < arrays < objects.
 */
export function compareValues(a: JsonValue, b: JsonValue): number {
  const byRank = rank(a) - rank(b);
  if (byRank !== 0) return Math.sign(byRank);
  if (typeof a === 'number' && typeof b === 'number') return Math.sign(a - b);
  if (typeof a === 'string' && typeof b === 'string') return compareStrings(a, b);
  if (Array.isArray(a) && Array.isArray(b)) return Math.sign(compareArrays(a, b));
  if (isJsonObject(a) && isJsonObject(b)) return compareObjects(a, b);
  return 0;
}

export function valuesEqual(a: JsonValue, b: JsonValue): boolean {
  return compareValues(a, b) === 0;
}

function deepMerge(a: JsonObject, b: JsonObject): JsonObject {
  const merged: JsonObject = { ...a };
  for (const [key, value] of Object.entries(b)) {
    const existing = merged[key];
    setJsonField(
      merged,
      key,
      isJsonObject(existing) && isJsonObject(value) && Object.hasOwn(merged, key) ? deepMerge(existing, value) : value,
    );
  }
  return merged;
}

function add(a: JsonValue, b: JsonValue): JsonValue {
  if (a === null) return b;
  if (b === null) return a;
  if (typeof a === 'number' && typeof b === 'number') return a + b;
  if (typeof a === 'string' && typeof b === 'string') return a + b;
  if (Array.isArray(a) && Array.isArray(b)) return [...a, ...b];
  if (isJsonObject(a) && isJsonObject(b)) return { ...a, ...b };
  throw new FilterRuntimeError(`${describe(a)} and ${describe(b)} cannot be added`);
}

function subtract(a: JsonValue, b: JsonValue): JsonValue {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.filter((item) => !b.some((other) => valuesEqual(item, other)));
  }
  throw new FilterRuntimeError(`${describe(a)} and ${describe(b)} cannot be subtracted`);
}

function multiply(a: JsonValue, b: JsonValue): JsonValue {
  if (typeof a === 'number' && typeof b === 'number') return a * b;
  if (isJsonObject(a) && isJsonObject(b)) return deepMerge(a, b);
  throw new FilterRuntimeError(`${describe(a)} and ${describe(b)} cannot be multiplied`);
}

function divide(a: JsonValue, b: JsonValue): JsonValue {
  if (typeof a === 'number' && typeof b === 'number') {
    if (b === 0) {
      throw new FilterRuntimeError(
        `${describe(a)} and ${describe(b)} cannot be divided because the divisor is zero`,
      );
    }
    return a / b;
  }
  if (typeof a === 'string' && typeof b === 'string') {
    return a === '' ? [] : a.split(b);
  }
  throw new FilterRuntimeError(`${describe(a)} and ${describe(b)} cannot be divided`);
}

function modulo(a: JsonValue, b: JsonValue): JsonValue {
  if (typeof a === 'number' && typeof b === 'number') {
    const divisor = Math.trunc(b);
    if (divisor === 0) {
      throw new FilterRuntimeError(
        `${describe(a)} and ${describe(b)} cannot be divided because the divisor is zero`,
      );
    }
    return Math.trunc(a) % divisor;
  }
  throw new FilterRuntimeError(`${describe(a)} and ${describe(b)} cannot be divided`);
}

export function applyArithmetic(operator: ArithmeticOperator, a: JsonValue, b: JsonValue): JsonValue {
  switch (operator) {
    case '+':
      return add(a, b);
    case '-':
      return subtract(a, b);
    case '*':
      return multiply(a, b);
    case '/':
      return divide(a, b);
    case '%':
      return modulo(a, b);
  }
}
