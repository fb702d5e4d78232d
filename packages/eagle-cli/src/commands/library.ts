/**
 * eaglet library: current library info, history and switching.
 */

import { libraryHistorySchema, libraryInfoSchema, isJsonObject } from '@eaglet/api';
import type { Command } from 'commander';
import { CliError } from '../errors.js';
import { defaultIO, runAction, type CliIO, type CommandContext } from './context.js';

interface LibraryInfoOptions {
  folders?: boolean;
  smartFolders?: boolean;
  quickAccess?: boolean;
  tagsGroups?: boolean;
  modificationTime?: boolean;
}

/** Selector flag → response key, checked in this order. */
const INFO_SELECTORS = [
  ['folders', 'folders'],
  ['smartFolders', 'smartFolders'],
  ['quickAccess', 'quickAccess'],
  ['tagsGroups', 'tagsGroups'],
  ['modificationTime', 'modificationTime'],
] as const satisfies ReadonlyArray<readonly [keyof LibraryInfoOptions, string]>;

async function currentLibrary(ctx: CommandContext): Promise<{ path: string; name: string }> {
  const info = libraryInfoSchema.safeParse(await ctx.api.library.info());
  if (!info.success) {
    throw new CliError('Library info did not include the current library');
  }
  return info.data.library;
}

export function registerLibraryCommand(program: Command, io: CliIO = defaultIO()): void {
  const library = program.command('library').description('Library info and switching');

  library
    .command('info')
    .description('Show library info, or one section of it')
    .option('--folders', 'Show folders')
    .option('--smart-folders', 'Show smart folders')
    .option('--quick-access', 'Show quick access entries')
    .option('--tags-groups', 'Show tag groups')
    .option('--modification-time', 'Show modification time')
    .action(async (opts: LibraryInfoOptions, command: Command) => {
      await runAction(command, io, async (ctx) => {
        const data = await ctx.api.library.info();
        const selected = INFO_SELECTORS.find(([flag]) => opts[flag] === true);
        if (selected === undefined) {
          ctx.render(data);
          return;
        }
        const [, key] = selected;
        if (!isJsonObject(data) || !Object.hasOwn(data, key)) {
          throw new CliError(`Library info has no '${key}' section`);
        }
        ctx.render(data[key] ?? null);
      });
    });

  library
    .command('history')
    .description('List recently opened libraries')
    .action(async (_opts: object, command: Command) => {
      await runAction(command, io, async (ctx) => {
        const history = libraryHistorySchema.safeParse(await ctx.api.library.history());
        if (!history.success) {
          throw new CliError('Unexpected library history shape from Eagle');
        }
        ctx.renderLines(history.data);
      });
    });

  library
    .command('switch <path>')
    .description('Switch to another library')
    .action(async (libraryPath: string, _opts: object, command: Command) => {
      await runAction(command, io, async (ctx) => {
        if (ctx.dryRun(`switch library to ${libraryPath}`)) return;
        ctx.render(await ctx.api.library.switch(libraryPath));
      });
    });

  library
    .command('path')
    .description('Print the current library path')
    .action(async (_opts: object, command: Command) => {
      await runAction(command, io, async (ctx) => {
        ctx.renderLines([(await currentLibrary(ctx)).path]);
      });
    });

  library
    .command('name')
    .description('Print the current library name')
    .action(async (_opts: object, command: Command) => {
      await runAction(command, io, async (ctx) => {
        ctx.renderLines([(await currentLibrary(ctx)).name]);
      });
    });
}
