/**
 * Output pipeline: filter, count, projection, then one of seven formats.
 *
 * Each render call formats its whole output into one string and writes it
 * with a single call, so a logical unit is never split across writes.
 */

import { WriteError } from '../errors.js';
import { applyFilter, type FilterEngine } from '../filter/index.js';
import { formatCsv } from './csv.js';
import { formatCompact, formatJson, formatNdjson } from './json.js';
import { formatFieldLines, formatStringLines } from './lines.js';
import { countValue, projectFields } from './projection.js';
import { formatTable } from './table.js';
import type { JsonValue, OutputConfig, OutputSink } from './types.js';

export interface RenderOptions {
  /** Destination; process.stdout when omitted. */
  out?: OutputSink;
  /** Filter engine used for `--jq`. */
  engine?: FilterEngine;
}

function formatFilterResults(results: JsonValue[]): string {
  return results.map((result) => formatJson(result)).join('');
}

/**
 * Format a value under the given config without writing it.
 */
export function formatOutput(value: JsonValue, config: OutputConfig, engine?: FilterEngine): string {
  if (config.filter !== undefined) {
    return formatFilterResults(applyFilter(value, config.filter, engine));
  }

  if (config.count) {
    return `${countValue(value)}\n`;
  }

  const data = config.fields !== undefined ? projectFields(value, config.fields) : value;

  switch (config.format) {
    case 'json':
      return formatJson(data);
    case 'compact':
      return formatCompact(data);
    case 'ndjson':
      return formatNdjson(data);
    case 'table':
      return formatTable(data, { noHeader: config.noHeader });
    case 'csv':
      return formatCsv(data, { noHeader: config.noHeader });
    case 'id':
      return formatFieldLines(data, 'id', config.print0);
    case 'path':
      return formatFieldLines(data, 'path', config.print0);
  }
}

/**
 * Format a flat list of derived strings (paths, names) without writing it.
 */
export function formatLines(lines: readonly string[], config: OutputConfig, engine?: FilterEngine): string {
  if (config.filter !== undefined) {
    return formatFilterResults(applyFilter([...lines], config.filter, engine));
  }
  if (config.count) {
    return `${lines.length}\n`;
  }
  return formatStringLines(lines, config);
}

function emit(text: string, out: OutputSink): void {
  if (text === '') return;
  try {
    out.write(text);
  } catch (err) {
    throw new WriteError(err instanceof Error ? err.message : String(err));
  }
}

/**
 * Render a value to the output sink.
 */
export function render(value: JsonValue, config: OutputConfig, options: RenderOptions = {}): void {
  emit(formatOutput(value, config, options.engine), options.out ?? process.stdout);
}

/**
 * Render derived text lines to the output sink.
 */
export function renderLines(
  lines: readonly string[],
  config: OutputConfig,
  options: RenderOptions = {},
): void {
  emit(formatLines(lines, config, options.engine), options.out ?? process.stdout);
}

export type { OutputConfig, OutputFormat, OutputSink, JsonValue } from './types.js';
export { OUTPUT_FORMATS } from './types.js';
export { resolveOutputConfig, parseOutputFormat, parseFieldList } from './config.js';
export type { OutputFlags, TerminalState } from './config.js';
export { formatTable } from './table.js';
export { formatCsv, csvEscape } from './csv.js';
export { formatJson, formatCompact, formatNdjson } from './json.js';
export { formatFieldLines } from './lines.js';
export { formatCell, truncate } from './cell.js';
export { projectFields, countValue } from './projection.js';
export { watchOutputErrors } from './stream.js';
export type { ErrorEmitter, OutputErrorHandlers } from './stream.js';
