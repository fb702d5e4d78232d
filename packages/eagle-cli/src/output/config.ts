/**
 * Output config resolution: flags plus terminal detection to OutputConfig.
 */

import { OUTPUT_FORMATS, type OutputConfig, type OutputFormat } from './types.js';

/** Output flags as commander parses them (`--no-header` arrives as `header: false`). */
export type OutputFlags = {
  json?: boolean;
  output?: string;
  fields?: string;
  count?: boolean;
  header?: boolean;
  print0?: boolean;
  dryRun?: boolean;
  quiet?: boolean;
  jq?: string;
};

export interface TerminalState {
  isTTY: boolean;
}

/**
 * Map a format token to an OutputFormat. Unknown tokens fall back to json.
 */
export function parseOutputFormat(token: string): OutputFormat {
  return OUTPUT_FORMATS.find((format) => format === token) ?? 'json';
}

/**
 * Split a comma-separated field list, trimming names and dropping empties.
 */
export function parseFieldList(raw: string): string[] {
  return raw
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}

/**
 * Resolve the output configuration for one invocation.
 *
 * Format precedence: --json, then --output, then table on an interactive
 * terminal, json otherwise.
 */
export function resolveOutputConfig(flags: OutputFlags, terminal: TerminalState): OutputConfig {
  const explicit = flags.json === true || flags.output !== undefined;

  let format: OutputFormat;
  if (flags.json === true) {
    format = 'json';
  } else if (flags.output !== undefined) {
    format = parseOutputFormat(flags.output);
  } else {
    format = terminal.isTTY ? 'table' : 'json';
  }

  const config: OutputConfig = {
    format,
    explicit,
    count: flags.count === true,
    noHeader: flags.header === false,
    print0: flags.print0 === true,
    dryRun: flags.dryRun === true,
    quiet: flags.quiet === true,
    ...(flags.fields !== undefined ? { fields: parseFieldList(flags.fields) } : {}),
    ...(flags.jq !== undefined ? { filter: flags.jq } : {}),
  };
  return Object.freeze(config);
}
