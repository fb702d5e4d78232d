/**
 * Cell formatting for table and CSV output.
 */

import { isJsonObject } from '@eaglet/api';
import type { JsonValue } from './types.js';

/** Longest a table cell may grow before it is cut. */
export const MAX_CELL_WIDTH = 60;

/**
 * Stringify one value for display in a cell.
 * Arrays become a comma list, objects compact JSON.
 */
export function formatCell(value: JsonValue | undefined): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return JSON.stringify(value);
  if (Array.isArray(value)) {
    return value.map((v) => (typeof v === 'string' ? v : JSON.stringify(v))).join(', ');
  }
  return JSON.stringify(value);
}

/** Display width in code points. */
export function displayWidth(text: string): number {
  return Array.from(text).length;
}

/**
 * Cut text to `width` code points, marking the cut with `~`.
 */
export function truncate(text: string, width: number): string {
  const chars = Array.from(text);
  if (chars.length <= width) return text;
  if (width > 1) return chars.slice(0, width - 1).join('') + '~';
  return '~';
}

/** Right-pad to a display width. */
export function padCell(text: string, width: number): string {
  const gap = width - displayWidth(text);
  return gap > 0 ? text + ' '.repeat(gap) : text;
}

/**
 * Column names for tabular output: the keys of the first element, when the
 * value is a non-empty array whose first element is an object. Otherwise null.
 */
export function tabularColumns(data: JsonValue): string[] | null {
  if (!Array.isArray(data)) return null;
  const first = data[0];
  return isJsonObject(first) ? Object.keys(first) : null;
}

/** A row's value for a column; undefined when the row lacks it or is not an object. */
export function cellOf(row: JsonValue, column: string): JsonValue | undefined {
  return isJsonObject(row) && Object.hasOwn(row, column) ? row[column] : undefined;
}
