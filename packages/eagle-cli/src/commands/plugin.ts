/**
 * eaglet plugin: discover and call running plugin servers.
 *
 * Usage:
 *   eaglet plugin list
 *   eaglet plugin routes my-plugin
 *   eaglet plugin call my-plugin POST /search --body '{"q":"sky"}'
 */

import type { FetchLike } from '@eaglet/api';
import type { Command } from 'commander';
import {
  callPlugin,
  findPlugin,
  listLivePlugins,
  parseHttpMethod,
  parseJsonBody,
  type DiscoveryOptions,
} from '../plugins/discovery.js';
import { defaultIO, runAction, type CliIO } from './context.js';

export interface PluginCommandOptions {
  /** Discovery directory override; the home directory default otherwise. */
  discoveryDir?: string;
  isAlive?: DiscoveryOptions['isAlive'];
  fetch?: FetchLike;
}

export function registerPluginCommand(
  program: Command,
  io: CliIO = defaultIO(),
  pluginOptions: PluginCommandOptions = {},
): void {
  const plugin = program.command('plugin').description('Running plugin servers');

  plugin
    .command('list')
    .description('List running plugin servers')
    .action(async (_opts: object, command: Command) => {
      await runAction(command, io, async (ctx) => {
        const plugins = listLivePlugins({
          dir: pluginOptions.discoveryDir,
          isAlive: pluginOptions.isAlive,
          status: ctx.status,
        });
        if (plugins.length === 0) {
          ctx.status.info('No running plugin servers found');
          return;
        }
        ctx.render(plugins);
      });
    });

  plugin
    .command('routes <pluginId>')
    .description("List a plugin server's routes")
    .action(async (pluginId: string, _opts: object, command: Command) => {
      await runAction(command, io, async (ctx) => {
        const found = findPlugin(pluginId, {
          dir: pluginOptions.discoveryDir,
          isAlive: pluginOptions.isAlive,
          status: ctx.status,
        });
        ctx.render(found.routes);
      });
    });

  plugin
    .command('call <pluginId> <method> <path>')
    .description('Call a plugin server route')
    .option('--body <json>', 'JSON request body')
    .action(async (pluginId: string, method: string, routePath: string, opts: { body?: string }, command: Command) => {
      await runAction(command, io, async (ctx) => {
        const httpMethod = parseHttpMethod(method);
        const body = opts.body !== undefined ? parseJsonBody(opts.body) : undefined;
        const found = findPlugin(pluginId, {
          dir: pluginOptions.discoveryDir,
          isAlive: pluginOptions.isAlive,
          status: ctx.status,
        });
        if (httpMethod !== 'GET' && ctx.dryRun(`${httpMethod} ${routePath} on ${found.pluginId}`)) return;
        ctx.render(await callPlugin(found, httpMethod, routePath, body, pluginOptions.fetch));
      });
    });
}
