/**
 * Output configuration shared by every renderer.
 */

export type { JsonValue, JsonObject } from '@eaglet/api';

export const OUTPUT_FORMATS = ['json', 'compact', 'ndjson', 'table', 'csv', 'id', 'path'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/**
 * Immutable per-invocation settings. Built once by resolveOutputConfig();
 * renderers never look at the terminal themselves.
 */
export type OutputConfig = Readonly<{
  format: OutputFormat;
  /** The format was requested with --json / --output rather than auto-detected. */
  explicit: boolean;
  fields?: readonly string[];
  count: boolean;
  noHeader: boolean;
  print0: boolean;
  dryRun: boolean;
  quiet: boolean;
  filter?: string;
}>;

/** Anything with a synchronous write, such as process.stdout. */
export interface OutputSink {
  write(chunk: string): unknown;
}
