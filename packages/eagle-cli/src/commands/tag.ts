/**
 * eaglet tag: tag listings.
 */

import type { Command } from 'commander';
import type { EagleApi, JsonValue } from '@eaglet/api';
import { defaultIO, runAction, type CliIO } from './context.js';

const TAG_LISTINGS: ReadonlyArray<{
  name: string;
  description: string;
  fetch: (api: EagleApi) => Promise<JsonValue>;
}> = [
  { name: 'list', description: 'List tags', fetch: (api) => api.tag.list() },
  { name: 'all', description: 'List all tags with recent, starred and grouped tags', fetch: (api) => api.tag.all() },
  { name: 'list-recent', description: 'List recently used tags', fetch: (api) => api.tag.listRecent() },
  { name: 'groups', description: 'List tag groups', fetch: (api) => api.tag.groups() },
];

export function registerTagCommand(program: Command, io: CliIO = defaultIO()): void {
  const tag = program.command('tag').description('Tags and tag groups');

  for (const listing of TAG_LISTINGS) {
    tag
      .command(listing.name)
      .description(listing.description)
      .action(async (_opts: object, command: Command) => {
        await runAction(command, io, async (ctx) => {
          ctx.render(await listing.fetch(ctx.api));
        });
      });
  }
}
