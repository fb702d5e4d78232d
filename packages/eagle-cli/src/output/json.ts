/**
 * JSON output formats: pretty, compact and newline-delimited.
 */

import { SerializationError } from '../errors.js';
import type { JsonValue } from './types.js';

/** JSON.stringify that reports failures as SerializationError. */
export function toJsonText(data: JsonValue, indent?: number): string {
  let text: string | undefined;
  try {
    text = JSON.stringify(data, null, indent);
  } catch (err) {
    throw new SerializationError(err instanceof Error ? err.message : String(err));
  }
  if (text === undefined) {
    throw new SerializationError('value has no JSON representation');
  }
  return text;
}

/**
 * Format data as pretty-printed JSON.
 */
export function formatJson(data: JsonValue): string {
  return toJsonText(data, 2) + '\n';
}

/** Single-line JSON. */
export function formatCompact(data: JsonValue): string {
  return toJsonText(data) + '\n';
}

/**
 * One compact JSON record per line. Arrays are split into their elements.
 */
export function formatNdjson(data: JsonValue): string {
  if (!Array.isArray(data)) return formatCompact(data);
  return data.map((record) => formatCompact(record)).join('');
}
