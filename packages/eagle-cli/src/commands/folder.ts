/**
 * eaglet folder: list, create, rename and update folders.
 *
 * Usage:
 *   eaglet folder list --tree
 *   eaglet folder create Inbox --parent FOLDER01
 *   eaglet folder update FOLDER01 --color blue
 */

import { FOLDER_COLORS, folderListSchema, type FolderColor, type FolderNode } from '@eaglet/api';
import chalk from 'chalk';
import { Option, type Command } from 'commander';
import { CliError, UsageError } from '../errors.js';
import { defaultIO, runAction, type CliIO } from './context.js';

const DEPTH_COLORS = [chalk.red, chalk.green, chalk.yellow, chalk.blue, chalk.magenta, chalk.cyan];

/**
 * Top-level names, each followed by its subtree drawn with box glyphs.
 * Glyph and name share a colour chosen by depth.
 */
export function folderTreeLines(roots: readonly FolderNode[]): string[] {
  const lines: string[] = [];

  const walk = (node: FolderNode, indent: string, last: boolean, depth: number): void => {
    const paint = DEPTH_COLORS[depth % DEPTH_COLORS.length] ?? chalk.reset;
    lines.push(`${indent}${paint(last ? '╰── ' : '├── ')}${paint(node.name)}`);
    const childIndent = indent + (last ? '    ' : '│   ');
    node.children.forEach((child, i) => walk(child, childIndent, i === node.children.length - 1, depth + 1));
  };

  for (const root of roots) {
    lines.push(root.name);
    root.children.forEach((child, i) => walk(child, '    ', i === root.children.length - 1, 0));
  }
  return lines;
}

/** Every folder name, depth-first. */
export function folderNamesDeep(roots: readonly FolderNode[]): string[] {
  return roots.flatMap((node) => [node.name, ...folderNamesDeep(node.children)]);
}

function parseFolders(data: unknown): FolderNode[] {
  const folders = folderListSchema.safeParse(data);
  if (!folders.success) {
    throw new CliError('Unexpected folder list shape from Eagle');
  }
  return folders.data;
}

interface FolderListOptions {
  names?: boolean;
  recursive?: boolean;
  tree?: boolean;
}

interface FolderUpdateOptions {
  name?: string;
  description?: string;
  color?: string;
}

export function registerFolderCommand(program: Command, io: CliIO = defaultIO()): void {
  const folder = program.command('folder').description('Manage folders');

  folder
    .command('list')
    .description('List folders')
    .option('--names', 'Print top-level folder names only')
    .option('-r, --recursive', 'Print every folder name, depth-first')
    .option('--tree', 'Print the folder hierarchy as a tree')
    .action(async (opts: FolderListOptions, command: Command) => {
      await runAction(command, io, async (ctx) => {
        const data = await ctx.api.folder.list();
        if (opts.tree) {
          ctx.renderLines(folderTreeLines(parseFolders(data)));
        } else if (opts.recursive) {
          ctx.renderLines(folderNamesDeep(parseFolders(data)));
        } else if (opts.names) {
          ctx.renderLines(parseFolders(data).map((node) => node.name));
        } else {
          ctx.render(data);
        }
      });
    });

  folder
    .command('list-recent')
    .description('List recently used folders')
    .action(async (_opts: object, command: Command) => {
      await runAction(command, io, async (ctx) => {
        ctx.render(await ctx.api.folder.listRecent());
      });
    });

  folder
    .command('create <name>')
    .description('Create a folder')
    .option('--parent <id>', 'Parent folder ID')
    .action(async (name: string, opts: { parent?: string }, command: Command) => {
      await runAction(command, io, async (ctx) => {
        const where = opts.parent !== undefined ? ` under ${opts.parent}` : '';
        if (ctx.dryRun(`create folder ${name}${where}`)) return;
        ctx.render(await ctx.api.folder.create(name, opts.parent));
      });
    });

  folder
    .command('rename <id> <name>')
    .description('Rename a folder')
    .action(async (id: string, name: string, _opts: object, command: Command) => {
      await runAction(command, io, async (ctx) => {
        if (ctx.dryRun(`rename folder ${id} to ${name}`)) return;
        ctx.render(await ctx.api.folder.rename(id, name));
      });
    });

  folder
    .command('update <id>')
    .description("Update a folder's name, description or color")
    .option('--name <name>', 'New name')
    .option('--description <text>', 'New description')
    .addOption(new Option('--color <color>', 'New color').choices(FOLDER_COLORS))
    .action(async (id: string, opts: FolderUpdateOptions, command: Command) => {
      await runAction(command, io, async (ctx) => {
        let color: FolderColor | undefined;
        if (opts.color !== undefined) {
          color = FOLDER_COLORS.find((c) => c === opts.color);
          if (color === undefined) {
            throw new UsageError(`Unknown folder color '${opts.color}'`);
          }
        }
        if (opts.name === undefined && opts.description === undefined && color === undefined) {
          throw new UsageError('Nothing to update: pass --name, --description or --color');
        }
        if (ctx.dryRun(`update folder ${id}`)) return;
        ctx.render(
          await ctx.api.folder.update(id, {
            newName: opts.name,
            newDescription: opts.description,
            newColor: color,
          }),
        );
      });
    });
}
