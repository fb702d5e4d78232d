/**
 * CSV output format (RFC 4180 quoting).
 */

import { isJsonObject } from '@eaglet/api';
import { cellOf, formatCell, tabularColumns } from './cell.js';
import { formatJson } from './json.js';
import type { JsonValue } from './types.js';

export interface CsvOptions {
  noHeader: boolean;
}

/**
 * Quote a field when it holds a comma, a double quote or a newline.
 */
export function csvEscape(field: string): string {
  if (field.includes(',') || field.includes('"') || field.includes('\n')) {
    return `"${field.replace(/"/g, '""')}"`;
  }
  return field;
}

function csvLine(fields: string[]): string {
  return fields.map(csvEscape).join(',');
}

/**
 * Format data as CSV. Column rules match the table format; cells are never truncated.
 */
export function formatCsv(data: JsonValue, options: CsvOptions): string {
  const columns = tabularColumns(data);
  const lines: string[] = [];

  if (columns !== null && Array.isArray(data)) {
    if (!options.noHeader) lines.push(csvLine(columns));
    for (const row of data) {
      lines.push(csvLine(columns.map((col) => formatCell(cellOf(row, col)))));
    }
  } else if (isJsonObject(data)) {
    if (!options.noHeader) lines.push('key,value');
    for (const [key, value] of Object.entries(data)) {
      lines.push(csvLine([key, formatCell(value)]));
    }
  } else {
    return formatJson(data);
  }

  return lines.length === 0 ? '' : lines.join('\n') + '\n';
}
