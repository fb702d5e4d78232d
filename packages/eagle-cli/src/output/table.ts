/**
 * Table output format: human-readable terminal output.
 */

import { isJsonObject } from '@eaglet/api';
import {
  MAX_CELL_WIDTH,
  cellOf,
  displayWidth,
  formatCell,
  padCell,
  tabularColumns,
  truncate,
} from './cell.js';
import { formatJson } from './json.js';
import type { JsonObject, JsonValue } from './types.js';

const KEY_HEADER = 'KEY';
const VALUE_RULE_WIDTH = 40;

export interface TableOptions {
  noHeader: boolean;
}

/**
 * Format data as a human-readable table.
 *
 * Arrays of objects become rows, a single object becomes KEY/VALUE pairs.
 * Everything else (scalars, empty arrays, arrays of scalars) falls back to JSON.
 */
export function formatTable(data: JsonValue, options: TableOptions): string {
  const columns = tabularColumns(data);
  if (columns !== null && Array.isArray(data)) {
    return renderObjectTable(data, columns, options);
  }
  if (isJsonObject(data)) {
    return renderKeyValue(data, options);
  }
  return formatJson(data);
}

function renderObjectTable(rows: JsonValue[], columns: string[], options: TableOptions): string {
  const cells = rows.map((row) => columns.map((col) => formatCell(cellOf(row, col))));
  const widths = columns.map((col, i) => {
    let width = displayWidth(col);
    for (const rowCells of cells) {
      width = Math.max(width, displayWidth(rowCells[i] ?? ''));
    }
    return Math.min(width, MAX_CELL_WIDTH);
  });

  // The last column is left unpadded so lines carry no trailing spaces
  const fit = (text: string, i: number): string => {
    const cut = truncate(text, widths[i] ?? MAX_CELL_WIDTH);
    return i === columns.length - 1 ? cut : padCell(cut, widths[i] ?? 0);
  };

  const lines: string[] = [];
  if (!options.noHeader) {
    lines.push(columns.map((col, i) => fit(col.toUpperCase(), i)).join('  '));
    lines.push(widths.map((w) => '-'.repeat(w)).join('  '));
  }
  for (const rowCells of cells) {
    lines.push(rowCells.map((text, i) => fit(text, i)).join('  '));
  }
  return lines.join('\n') + '\n';
}

function renderKeyValue(obj: JsonObject, options: TableOptions): string {
  const entries = Object.entries(obj);
  const keyWidth = entries.reduce(
    (max, [key]) => Math.max(max, displayWidth(key)),
    KEY_HEADER.length,
  );

  const lines: string[] = [];
  if (!options.noHeader) {
    lines.push(`${padCell(KEY_HEADER, keyWidth)}  VALUE`);
    lines.push(`${'-'.repeat(keyWidth)}  ${'-'.repeat(VALUE_RULE_WIDTH)}`);
  }
  for (const [key, value] of entries) {
    lines.push(`${padCell(key, keyWidth)}  ${truncate(formatCell(value), MAX_CELL_WIDTH)}`);
  }
  return lines.length === 0 ? '' : lines.join('\n') + '\n';
}
