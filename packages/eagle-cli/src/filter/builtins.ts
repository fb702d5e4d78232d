/**
 * Builtin function table, keyed by `name/arity`.
 */

import { isJsonObject, setJsonField } from '@eaglet/api';
import { FilterRuntimeError } from '../errors.js';
import type { JsonObject, JsonValue } from '../output/types.js';
import { indexValue, iterateValue } from './access.js';
import {
  applyArithmetic,
  compareValues,
  describe,
  isTruthy,
  typeName,
  valuesEqual,
} from './values.js';

export type Evaluator = (input: JsonValue) => Iterable<JsonValue>;

export type Builtin = (input: JsonValue, args: readonly Evaluator[]) => Iterable<JsonValue>;

const table = new Map<string, Builtin>();

export function builtinKey(name: string, arity: number): string {
  return `${name}/${arity}`;
}

function define(name: string, arity: number, fn: Builtin): void {
  table.set(builtinKey(name, arity), fn);
}

/** Wrap a one-input, one-output function. */
function simple(name: string, fn: (input: JsonValue) => JsonValue): void {
  define(name, 0, function* (input) {
    yield fn(input);
  });
}

function requireArray(name: string, input: JsonValue): JsonValue[] {
  if (!Array.isArray(input)) {
    throw new FilterRuntimeError(`${describe(input)} cannot be processed by ${name}, expected an array`);
  }
  return input;
}

function requireString(name: string, input: JsonValue): string {
  if (typeof input !== 'string') {
    throw new FilterRuntimeError(`${name} requires string input, got ${describe(input)}`);
  }
  return input;
}

function sortValues(values: JsonValue[]): JsonValue[] {
  return [...values].sort(compareValues);
}

function contains(a: JsonValue, b: JsonValue): boolean {
  if (isJsonObject(a) && isJsonObject(b)) {
    return Object.entries(b).every(
      ([key, value]) => Object.hasOwn(a, key) && contains(a[key] ?? null, value),
    );
  }
  if (Array.isArray(a) && Array.isArray(b)) {
    return b.every((needle) => a.some((item) => contains(item, needle)));
  }
  if (typeof a === 'string' && typeof b === 'string') {
    return a.includes(b);
  }
  if (typeName(a) === typeName(b)) {
    return valuesEqual(a, b);
  }
  throw new FilterRuntimeError(`${describe(a)} and ${describe(b)} cannot have their containment checked`);
}

function toText(value: JsonValue): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

function entryKey(entry: JsonObject): string {
  for (const name of ['key', 'k', 'name', 'Name', 'Key', 'K']) {
    if (!Object.hasOwn(entry, name)) continue;
    const key = entry[name];
    if (typeof key === 'string') return key;
    if (typeof key === 'number' || typeof key === 'boolean') return JSON.stringify(key);
  }
  throw new FilterRuntimeError(`Cannot use ${describe(entry)} as object key`);
}

function entryValue(entry: JsonObject): JsonValue {
  for (const name of ['value', 'v', 'Value', 'V']) {
    if (Object.hasOwn(entry, name)) return entry[name] ?? null;
  }
  return null;
}

// ── core ──

define('empty', 0, function* () {
  // yields nothing
});

simple('not', (input) => !isTruthy(input));

simple('type', (input) => typeName(input));

simple('length', (input) => {
  if (input === null) return 0;
  if (typeof input === 'boolean') throw new FilterRuntimeError(`${describe(input)} has no length`);
  if (typeof input === 'number') return Math.abs(input);
  if (typeof input === 'string') return Array.from(input).length;
  if (Array.isArray(input)) return input.length;
  return Object.keys(input).length;
});

simple('keys', (input) => {
  if (Array.isArray(input)) return input.map((_, i) => i);
  if (isJsonObject(input)) return Object.keys(input).sort();
  throw new FilterRuntimeError(`${describe(input)} has no keys`);
});

simple('keys_unsorted', (input) => {
  if (Array.isArray(input)) return input.map((_, i) => i);
  if (isJsonObject(input)) return Object.keys(input);
  throw new FilterRuntimeError(`${describe(input)} has no keys`);
});

define('values', 0, function* (input) {
  if (input !== null) yield input;
});

define('has', 1, function* (input, [key]) {
  for (const k of key(input)) {
    if (isJsonObject(input) && typeof k === 'string') {
      yield Object.hasOwn(input, k);
    } else if (Array.isArray(input) && typeof k === 'number') {
      yield k >= 0 && k < input.length;
    } else {
      throw new FilterRuntimeError(`Cannot check whether ${typeName(input)} has a ${typeName(k)} key`);
    }
  }
});

define('select', 1, function* (input, [predicate]) {
  for (const result of predicate(input)) {
    if (isTruthy(result)) yield input;
  }
});

define('map', 1, function* (input, [fn]) {
  const out: JsonValue[] = [];
  for (const element of iterateValue(input)) {
    out.push(...fn(element));
  }
  yield out;
});

simple('add', (input) => {
  let sum: JsonValue = null;
  for (const element of iterateValue(input)) {
    sum = applyArithmetic('+', sum, element);
  }
  return sum;
});

simple('first', (input) => indexValue(input, 0));
simple('last', (input) => indexValue(input, -1));

define('first', 1, function* (input, [fn]) {
  for (const result of fn(input)) {
    yield result;
    return;
  }
});

simple('reverse', (input) => {
  if (input === null) return [];
  if (typeof input === 'string') return Array.from(input).reverse().join('');
  return [...requireArray('reverse', input)].reverse();
});

// ── conversion ──

simple('tostring', (input) => toText(input));

simple('tojson', (input) => JSON.stringify(input));

simple('tonumber', (input) => {
  if (typeof input === 'number') return input;
  if (typeof input === 'string' && /^\s*-?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?\s*$/.test(input)) {
    return Number(input);
  }
  throw new FilterRuntimeError(`Cannot parse ${describe(input)} as a number`);
});

function toEntries(input: JsonValue): JsonValue[] {
  if (!isJsonObject(input)) {
    throw new FilterRuntimeError(`${describe(input)} has no keys`);
  }
  return Object.entries(input).map(([key, value]) => ({ key, value }));
}

function fromEntries(input: JsonValue): JsonObject {
  const out: JsonObject = {};
  for (const entry of requireArray('from_entries', input)) {
    if (!isJsonObject(entry)) {
      throw new FilterRuntimeError(`Cannot use ${describe(entry)} as an entry`);
    }
    setJsonField(out, entryKey(entry), entryValue(entry));
  }
  return out;
}

simple('to_entries', toEntries);
simple('from_entries', fromEntries);

define('with_entries', 1, function* (input, [fn]) {
  const mapped: JsonValue[] = [];
  for (const entry of toEntries(input)) {
    mapped.push(...fn(entry));
  }
  yield fromEntries(mapped);
});

/** First output of fn, or undefined when it yields nothing. */
function firstOf(fn: Evaluator, input: JsonValue): JsonValue | undefined {
  for (const result of fn(input)) {
    return result;
  }
  return undefined;
}

// A value whose update yields nothing is dropped, as in jq 1.7.
define('map_values', 1, function* (input, [fn]) {
  if (Array.isArray(input)) {
    const out: JsonValue[] = [];
    for (const element of input) {
      const updated = firstOf(fn, element);
      if (updated !== undefined) out.push(updated);
    }
    yield out;
    return;
  }
  if (isJsonObject(input)) {
    const out: JsonObject = {};
    for (const [key, value] of Object.entries(input)) {
      const updated = firstOf(fn, value);
      if (updated !== undefined) setJsonField(out, key, updated);
    }
    yield out;
    return;
  }
  throw new FilterRuntimeError(`Cannot iterate over ${describe(input)}`);
});

define('limit', 2, function* (input, [count, fn]) {
  for (const n of count(input)) {
    if (typeof n !== 'number') {
      throw new FilterRuntimeError(`Invalid limit ${describe(n)}, expected a number`);
    }
    if (n <= 0) continue;
    let emitted = 0;
    for (const result of fn(input)) {
      yield result;
      emitted++;
      if (emitted >= n) break;
    }
  }
});

// ── ordering ──

simple('sort', (input) => sortValues(requireArray('sort', input)));

define('sort_by', 1, function* (input, [fn]) {
  const keyed = requireArray('sort_by', input).map((element) => ({
    element,
    key: [...fn(element)],
  }));
  keyed.sort((a, b) => compareValues(a.key, b.key));
  yield keyed.map(({ element }) => element);
});

simple('unique', (input) => {
  const sorted = sortValues(requireArray('unique', input));
  return sorted.filter((value, i) => {
    const previous = sorted[i - 1];
    return i === 0 || previous === undefined || !valuesEqual(previous, value);
  });
});

simple('min', (input) => {
  const sorted = sortValues(requireArray('min', input));
  return sorted[0] ?? null;
});

simple('max', (input) => {
  const sorted = sortValues(requireArray('max', input));
  return sorted[sorted.length - 1] ?? null;
});

simple('any', (input) => requireArray('any', input).some(isTruthy));
simple('all', (input) => requireArray('all', input).every(isTruthy));

// ── strings ──

define('join', 1, function* (input, [separator]) {
  const parts = requireArray('join', input).map((value) => {
    if (value === null) return '';
    if (typeof value === 'object') {
      throw new FilterRuntimeError(`Cannot join with ${describe(value)}`);
    }
    return toText(value);
  });
  for (const sep of separator(input)) {
    yield parts.join(requireString('join', sep));
  }
});

define('split', 1, function* (input, [separator]) {
  const text = requireString('split', input);
  for (const sep of separator(input)) {
    const by = requireString('split', sep);
    yield text === '' ? [] : text.split(by);
  }
});

simple('ascii_downcase', (input) =>
  requireString('ascii_downcase', input).replace(/[A-Z]/g, (c) => c.toLowerCase()),
);

simple('ascii_upcase', (input) =>
  requireString('ascii_upcase', input).replace(/[a-z]/g, (c) => c.toUpperCase()),
);

define('startswith', 1, function* (input, [prefix]) {
  for (const p of prefix(input)) {
    if (typeof input !== 'string' || typeof p !== 'string') {
      throw new FilterRuntimeError('startswith() requires string inputs');
    }
    yield input.startsWith(p);
  }
});

define('endswith', 1, function* (input, [suffix]) {
  for (const s of suffix(input)) {
    if (typeof input !== 'string' || typeof s !== 'string') {
      throw new FilterRuntimeError('endswith() requires string inputs');
    }
    yield input.endsWith(s);
  }
});

define('contains', 1, function* (input, [needle]) {
  for (const n of needle(input)) {
    yield contains(input, n);
  }
});

define('ltrimstr', 1, function* (input, [prefix]) {
  for (const p of prefix(input)) {
    yield typeof input === 'string' && typeof p === 'string' && input.startsWith(p) ? input.slice(p.length) : input;
  }
});

define('rtrimstr', 1, function* (input, [suffix]) {
  for (const x of suffix(input)) {
    yield typeof input === 'string' && typeof x === 'string' && input.endsWith(x)
      ? input.slice(0, input.length - x.length)
      : input;
  }
});

// g and n change nothing for a yes/no match.
const REGEX_FLAGS: ReadonlyMap<string, string> = new Map([
  ['i', 'i'],
  ['s', 's'],
  ['g', ''],
  ['n', ''],
]);

function compileRegex(pattern: JsonValue, flags: JsonValue): RegExp {
  if (typeof pattern !== 'string') {
    throw new FilterRuntimeError(`${describe(pattern)} cannot be matched, as it is not a string`);
  }
  if (flags !== null && typeof flags !== 'string') {
    throw new FilterRuntimeError(`${describe(flags)} is not a string`);
  }
  let jsFlags = 'u';
  for (const flag of flags ?? '') {
    const mapped = REGEX_FLAGS.get(flag);
    if (mapped === undefined) {
      throw new FilterRuntimeError(`${flags} is not a valid modifier string`);
    }
    if (!jsFlags.includes(mapped)) jsFlags += mapped;
  }
  try {
    return new RegExp(pattern, jsFlags);
  } catch (err) {
    throw new FilterRuntimeError(
      `${describe(pattern)} is not a valid regex: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
}

function* testRegex(input: JsonValue, regex: Evaluator, flags: Evaluator | undefined): Iterable<JsonValue> {
  const text = requireString('test', input);
  for (const pattern of regex(input)) {
    for (const flag of flags === undefined ? [null] : flags(input)) {
      yield compileRegex(pattern, flag).test(text);
    }
  }
}

define('test', 1, (input, [regex]) => testRegex(input, regex, undefined));
define('test', 2, (input, [regex, flags]) => testRegex(input, regex, flags));

export const BUILTINS: ReadonlyMap<string, Builtin> = table;
