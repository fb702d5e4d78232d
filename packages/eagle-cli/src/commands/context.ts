/**
 * Shared command plumbing: global output flags and the action boundary.
 */

import { Option, type Command } from 'commander';
import { loadApi, type EagleApi } from '../api.js';
import { describeError, type ExitCode } from '../errors.js';
import {
  OUTPUT_FORMATS,
  render,
  renderLines,
  resolveOutputConfig,
  type JsonValue,
  type OutputConfig,
  type OutputFlags,
  type OutputSink,
} from '../output/index.js';
import { createStatus, type StatusReporter } from '../ui/status.js';

/** Process streams, swappable in tests. */
export interface CliIO {
  out: OutputSink;
  err: OutputSink;
  stdin: AsyncIterable<string | Buffer>;
  isTTY: boolean;
  setExitCode(code: ExitCode): void;
}

export function defaultIO(): CliIO {
  return {
    out: process.stdout,
    err: process.stderr,
    stdin: process.stdin,
    isTTY: process.stdout.isTTY === true,
    setExitCode: (code) => {
      process.exitCode = code;
    },
  };
}

export interface CommandContext {
  readonly api: EagleApi;
  readonly config: OutputConfig;
  readonly status: StatusReporter;
  readonly io: CliIO;
  render(value: JsonValue): void;
  renderLines(lines: readonly string[]): void;
  /** Report a skipped mutation. Returns config.dryRun. */
  dryRun(description: string): boolean;
}

/**
 * Output flags, registered once on the program and read through
 * optsWithGlobals() so they work before or after the subcommand.
 */
export function addOutputOptions(program: Command): Command {
  return program
    .option('--json', 'Output as JSON (same as --output json)')
    .addOption(new Option('-o, --output <format>', 'Output format').choices(OUTPUT_FORMATS))
    .option('--fields <list>', 'Comma-separated fields to keep')
    .option('--count', 'Print the number of results instead of the results')
    .option('--no-header', 'Omit the table/csv header')
    .option('--print0', 'Delimit id, path and line output with NUL')
    .option('--dry-run', 'Preview changes without executing them')
    .option('-q, --quiet', 'Suppress all output except errors on stderr')
    .option('--jq <expr>', 'Filter output with a jq expression');
}

const JSON_FAMILY = new Set(['json', 'compact', 'ndjson']);

function reportError(err: unknown, config: OutputConfig, status: StatusReporter, io: CliIO): void {
  const described = describeError(err);

  if (config.explicit && JSON_FAMILY.has(config.format)) {
    io.err.write(
      JSON.stringify({ ok: false, error: { message: described.message, exitCode: described.exitCode } }) + '\n',
    );
  } else {
    status.error(`Error: ${described.message}`);
    for (const hint of described.recoveryHints) {
      status.hint(hint);
    }
  }
  io.setExitCode(described.exitCode);
}

/**
 * Run a command body with the invocation's output config. Every error is
 * caught here, reported on stderr and turned into the exit code.
 */
export async function runAction(
  command: Command,
  io: CliIO,
  body: (ctx: CommandContext) => Promise<void>,
): Promise<void> {
  const config = resolveOutputConfig(command.optsWithGlobals<OutputFlags>(), { isTTY: io.isTTY });
  const status = createStatus({ quiet: config.quiet, err: io.err });

  const ctx: CommandContext = {
    get api(): EagleApi {
      return loadApi();
    },
    config,
    status,
    io,
    render: (value) => render(value, config, { out: io.out }),
    renderLines: (lines) => renderLines(lines, config, { out: io.out }),
    dryRun: (description) => {
      if (config.dryRun) {
        status.info(`dry-run: would ${description}`);
      }
      return config.dryRun;
    },
  };

  try {
    await body(ctx);
  } catch (err) {
    reportError(err, config, status, io);
  }
}

/** Split a comma-separated flag value. */
export function splitList(raw: string | undefined): string[] | undefined {
  if (raw === undefined) return undefined;
  return raw
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}
