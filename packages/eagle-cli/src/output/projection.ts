/**
 * Value-level stages that run before a renderer: field projection and counting.
 */

import { isJsonObject, setJsonField } from '@eaglet/api';
import type { JsonObject, JsonValue } from './types.js';

/**
 * Keep only the named fields of each object, in the object's own key order.
 * Absent fields are skipped; non-object values pass through unchanged.
 */
export function projectFields(value: JsonValue, fields: readonly string[]): JsonValue {
  const wanted = new Set(fields);
  if (Array.isArray(value)) {
    return value.map((element) => (isJsonObject(element) ? projectObject(element, wanted) : element));
  }
  return isJsonObject(value) ? projectObject(value, wanted) : value;
}

function projectObject(obj: JsonObject, wanted: ReadonlySet<string>): JsonObject {
  const projected: JsonObject = {};
  for (const [key, field] of Object.entries(obj)) {
    if (wanted.has(key)) setJsonField(projected, key, field);
  }
  return projected;
}

/**
 * Number of records: array length, 0 for null, 1 for anything else.
 */
export function countValue(value: JsonValue): number {
  if (Array.isArray(value)) return value.length;
  if (value === null) return 0;
  return 1;
}
