/**
 * eaglet app: Eagle application info.
 */

import { applicationInfoSchema } from '@eaglet/api';
import type { Command } from 'commander';
import { CliError } from '../errors.js';
import { defaultIO, runAction, type CliIO } from './context.js';

export function registerAppCommand(program: Command, io: CliIO = defaultIO()): void {
  const app = program.command('app').description('Eagle application info');

  app
    .command('info')
    .description('Show application info (version, build, platform)')
    .action(async (_opts: object, command: Command) => {
      await runAction(command, io, async (ctx) => {
        ctx.render(await ctx.api.application.info());
      });
    });

  app
    .command('version')
    .description('Print the Eagle application version')
    .action(async (_opts: object, command: Command) => {
      await runAction(command, io, async (ctx) => {
        const info = applicationInfoSchema.safeParse(await ctx.api.application.info());
        if (!info.success) {
          throw new CliError('Application info did not include a version');
        }
        ctx.renderLines([info.data.version]);
      });
    });
}
