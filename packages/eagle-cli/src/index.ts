/**
 * eaglet: command-line client for the Eagle app's local API.
 *
 * Usage:
 *   eaglet item list --output table
 *   eaglet folder list --tree
 *   eaglet --port 41596 library path
 *   eaglet completions bash > ~/.local/share/bash-completion/completions/eaglet
 *
 * Environment Variables:
 *   EAGLE_HOST        - API host (default: localhost)
 *   EAGLE_PORT        - API port (default: 41595)
 *   EAGLE_TIMEOUT_MS  - Request timeout in milliseconds (default: 30000)
 */

import { Command } from 'commander';
import { configureApi } from './api.js';
import { registerAppCommand } from './commands/app.js';
import { registerCompletionsCommand } from './commands/completions.js';
import { addOutputOptions, defaultIO, type CliIO } from './commands/context.js';
import { registerFolderCommand } from './commands/folder.js';
import { registerItemCommand } from './commands/item.js';
import { registerLibraryCommand } from './commands/library.js';
import { registerPluginCommand, type PluginCommandOptions } from './commands/plugin.js';
import { registerTagCommand } from './commands/tag.js';

export const CLI_VERSION = '0.1.0';

export interface ProgramOptions {
  io?: CliIO;
  plugins?: PluginCommandOptions;
}

/**
 * Build the program. Commander errors are thrown as CommanderError
 * instead of exiting, and help/error text goes through io.
 */
export function createProgram(options: ProgramOptions = {}): Command {
  const io = options.io ?? defaultIO();
  const program = new Command('eaglet');

  program
    .description('Command-line client for the Eagle app')
    .version(CLI_VERSION)
    .option('--host <host>', 'Eagle API host (overrides EAGLE_HOST)')
    .option('--port <port>', 'Eagle API port (overrides EAGLE_PORT)')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => {
        io.out.write(text);
      },
      writeErr: (text) => {
        io.err.write(text);
      },
    })
    .hook('preAction', (_program, actionCommand) => {
      const { host, port } = actionCommand.optsWithGlobals<{ host?: string; port?: string }>();
      configureApi({ host, port });
    });

  addOutputOptions(program);

  registerAppCommand(program, io);
  registerFolderCommand(program, io);
  registerItemCommand(program, io);
  registerLibraryCommand(program, io);
  registerTagCommand(program, io);
  registerPluginCommand(program, io, options.plugins);
  registerCompletionsCommand(program, io);

  return program;
}

export { EXIT_CODES, CliError, UsageError, describeError } from './errors.js';
export { render, renderLines, formatOutput, formatLines, resolveOutputConfig } from './output/index.js';
export type { OutputConfig, OutputFormat } from './output/index.js';
export { createFilterEngine, applyFilter } from './filter/index.js';
export type { FilterEngine, CompiledFilter } from './filter/index.js';
