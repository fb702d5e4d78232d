/**
 * Line-oriented output: one field per record (id/path formats), and plain string lists.
 */

import { isJsonObject } from '@eaglet/api';
import { formatCompact, formatJson, toJsonText } from './json.js';
import type { JsonValue, OutputConfig } from './types.js';

export function lineDelimiter(print0: boolean): string {
  return print0 ? '\0' : '\n';
}

function fieldText(record: JsonValue, field: string): string {
  if (isJsonObject(record)) {
    if (!Object.hasOwn(record, field)) return '';
    const value = record[field];
    return typeof value === 'string' ? value : toJsonText(value ?? null);
  }
  return typeof record === 'string' ? record : toJsonText(record);
}

/**
 * Emit one named field per record. Strings print raw, other values as compact
 * JSON, and records without the field as an empty line.
 */
export function formatFieldLines(data: JsonValue, field: string, print0: boolean): string {
  const delimiter = lineDelimiter(print0);
  const records = Array.isArray(data) ? data : [data];
  return records.map((record) => fieldText(record, field) + delimiter).join('');
}

/**
 * Render a flat list of strings. Explicit JSON-family formats serialize the
 * list; every other format prints one string per line.
 */
export function formatStringLines(lines: readonly string[], config: OutputConfig): string {
  const list: JsonValue = [...lines];
  if (config.explicit) {
    switch (config.format) {
      case 'json':
        return formatJson(list);
      case 'compact':
        return formatCompact(list);
      case 'ndjson':
        return lines.map((line) => formatCompact(line)).join('');
      default:
        break;
    }
  }
  const delimiter = lineDelimiter(config.print0);
  return lines.map((line) => line + delimiter).join('');
}
