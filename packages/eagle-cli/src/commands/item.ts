/**
 * eaglet item: query, add, update and trash library items.
 *
 * Usage:
 *   eaglet item list --ext png --limit 20
 *   eaglet item list --paths --print0 | xargs -0 open
 *   eaglet item list -o id | eaglet item update --stdin --tags sky,sunset
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import {
  ITEM_ORDER_BY,
  itemListSchema,
  libraryInfoSchema,
  type AddFromUrlInput,
  type ItemOrderBy,
  type ItemSummary,
  type JsonValue,
} from '@eaglet/api';
import { InvalidArgumentError, Option, type Command } from 'commander';
import { z } from 'zod';
import { CliError, PartialFailureError, UsageError, describeError } from '../errors.js';
import { readIdsFromStdin } from '../stdin.js';
import { defaultIO, runAction, splitList, type CliIO, type CommandContext } from './context.js';

function parseNonNegativeInt(raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidArgumentError('Not a non-negative integer.');
  }
  return value;
}

function parseStar(raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0 || value > 5) {
    throw new InvalidArgumentError('Star rating must be an integer from 0 to 5.');
  }
  return value;
}

/**
 * On-disk location of an item's original file, or of its thumbnail when one
 * exists and `preferThumbnail` is set.
 */
export function itemFilePath(
  libraryPath: string,
  item: ItemSummary,
  preferThumbnail = false,
  exists: (file: string) => boolean = fs.existsSync,
): string {
  const dir = path.join(libraryPath, 'images', `${item.id}.info`);
  if (preferThumbnail) {
    const thumbnail = path.join(dir, `${item.name}_thumbnail.png`);
    if (exists(thumbnail)) return thumbnail;
  }
  return path.join(dir, `${item.name}.${item.ext}`);
}

async function currentLibraryPath(ctx: CommandContext): Promise<string> {
  const info = libraryInfoSchema.safeParse(await ctx.api.library.info());
  if (!info.success) {
    throw new CliError('Library info did not include a library path');
  }
  return info.data.library.path;
}

const urlItemSchema = z.object({
  url: z.string().min(1),
  name: z.string().optional(),
  website: z.string().optional(),
  tags: z.array(z.string()).optional(),
  annotation: z.string().optional(),
  modificationTime: z.number().optional(),
  headers: z.record(z.string()).optional(),
});

/** Parse the add-from-urls argument. An item without a name is named after its url. */
export function parseUrlItems(raw: string): AddFromUrlInput[] {
  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch (err) {
    throw new UsageError(`Invalid items JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  const items = z.array(urlItemSchema).safeParse(decoded);
  if (!items.success) {
    throw new UsageError('Items JSON must be an array of objects with a "url" string');
  }
  return items.data.map((item) => ({ ...item, name: item.name ?? item.url }));
}

interface ItemListOptions {
  limit?: number;
  offset?: number;
  orderBy?: string;
  keyword?: string;
  ext?: string;
  tags?: string;
  folders?: string;
  url?: string;
  paths?: boolean;
  thumbnails?: boolean;
}

interface ItemUpdateOptions {
  tags?: string;
  annotation?: string;
  url?: string;
  star?: number;
  stdin?: boolean;
}

interface AddOptions {
  website?: string;
  tags?: string;
  annotation?: string;
  folderId?: string;
}

export function registerItemCommand(program: Command, io: CliIO = defaultIO()): void {
  const item = program.command('item').description('Query and manage library items');

  item
    .command('list')
    .description('List items')
    .option('-n, --limit <n>', 'Maximum number of items', parseNonNegativeInt)
    .option('--offset <n>', 'Page offset', parseNonNegativeInt)
    .addOption(new Option('--order-by <order>', 'Sort order').choices(ITEM_ORDER_BY))
    .option('-k, --keyword <keyword>', 'Filter by keyword')
    .option('-e, --ext <ext>', 'Filter by file extension')
    .option('-t, --tags <tags>', 'Filter by comma-separated tags')
    .option('-f, --folders <ids>', 'Filter by comma-separated folder IDs')
    .option('-u, --url <keyword>', 'Keep items whose url contains the keyword')
    .option('--paths', 'Print the file path of each item')
    .option('--thumbnails', 'With --paths, prefer thumbnail files')
    .action(async (opts: ItemListOptions, command: Command) => {
      await runAction(command, io, async (ctx) => {
        const orderBy: ItemOrderBy | undefined = ITEM_ORDER_BY.find((o) => o === opts.orderBy);
        const data = await ctx.api.item.list({
          limit: opts.limit,
          offset: opts.offset,
          orderBy,
          keyword: opts.keyword,
          ext: opts.ext,
          tags: splitList(opts.tags),
          folders: splitList(opts.folders),
        });

        if (opts.url === undefined && !opts.paths && !opts.thumbnails) {
          ctx.render(data);
          return;
        }

        const parsed = itemListSchema.safeParse(data);
        if (!parsed.success) {
          throw new CliError('Unexpected item list shape from Eagle');
        }
        const keyword = opts.url;
        const matches = (entry: ItemSummary): boolean =>
          keyword === undefined || keyword === '' || (entry.url ?? '').includes(keyword);

        if (opts.paths || opts.thumbnails) {
          const library = await currentLibraryPath(ctx);
          ctx.renderLines(
            parsed.data.filter(matches).map((entry) => itemFilePath(library, entry, opts.thumbnails === true)),
          );
          return;
        }
        // parsed.data runs parallel to data; render the untouched objects
        const raw = Array.isArray(data) ? data : [];
        ctx.render(
          raw.filter((_, i) => {
            const entry = parsed.data[i];
            return entry !== undefined && matches(entry);
          }),
        );
      });
    });

  item
    .command('info <id>')
    .description('Show item details')
    .action(async (id: string, _opts: object, command: Command) => {
      await runAction(command, io, async (ctx) => {
        ctx.render(await ctx.api.item.info(id));
      });
    });

  item
    .command('thumbnail <id>')
    .description("Print the path of an item's thumbnail")
    .action(async (id: string, _opts: object, command: Command) => {
      await runAction(command, io, async (ctx) => {
        const thumbnail = z.string().safeParse(await ctx.api.item.thumbnail(id));
        if (!thumbnail.success) {
          throw new CliError(`Eagle returned no thumbnail path for ${id}`);
        }
        let decoded: string;
        try {
          decoded = decodeURIComponent(thumbnail.data);
        } catch {
          decoded = thumbnail.data;
        }
        ctx.renderLines([decoded]);
      });
    });

  item
    .command('add-from-url <url> <name>')
    .description('Add an image from a URL')
    .option('--website <url>', 'Source website URL')
    .option('--tags <tags>', 'Comma-separated tags')
    .option('--annotation <text>', 'Annotation text')
    .option('--folder-id <id>', 'Target folder ID')
    .action(async (url: string, name: string, opts: AddOptions, command: Command) => {
      await runAction(command, io, async (ctx) => {
        if (ctx.dryRun(`add item from url ${url}`)) return;
        ctx.render(
          await ctx.api.item.addFromUrl({
            url,
            name,
            website: opts.website,
            tags: splitList(opts.tags),
            annotation: opts.annotation,
            folderId: opts.folderId,
          }),
        );
      });
    });

  item
    .command('add-from-urls <json>')
    .description('Add several images from a JSON array of {url, name?, tags?, ...}')
    .option('--folder-id <id>', 'Target folder ID for all items')
    .action(async (json: string, opts: { folderId?: string }, command: Command) => {
      await runAction(command, io, async (ctx) => {
        const items = parseUrlItems(json);
        if (ctx.dryRun(`add ${items.length} item(s) from urls`)) return;
        ctx.render(await ctx.api.item.addFromUrls(items, opts.folderId));
      });
    });

  item
    .command('add-from-path <path> <name>')
    .description('Add a local file')
    .option('--website <url>', 'Source website URL')
    .option('--annotation <text>', 'Annotation text')
    .option('--tags <tags>', 'Comma-separated tags')
    .option('--folder-id <id>', 'Target folder ID')
    .addOption(
      new Option('--if-exists <action>', 'When the item already exists').choices(['skip', 'error']).default('error'),
    )
    .action(async (file: string, name: string, opts: AddOptions & { ifExists: string }, command: Command) => {
      await runAction(command, io, async (ctx) => {
        if (ctx.dryRun(`add item from path ${file}`)) return;
        let result: JsonValue;
        try {
          result = await ctx.api.item.addFromPath({
            path: file,
            name,
            website: opts.website,
            annotation: opts.annotation,
            tags: splitList(opts.tags),
            folderId: opts.folderId,
          });
        } catch (err) {
          if (opts.ifExists !== 'skip') throw err;
          ctx.status.warning(`Skipped (--if-exists skip): ${describeError(err).message}`);
          return;
        }
        ctx.render(result);
      });
    });

  item
    .command('add-bookmark <url> <name>')
    .description('Add a bookmark')
    .option('--base64 <data>', 'Base64-encoded thumbnail')
    .option('--tags <tags>', 'Comma-separated tags')
    .option('--folder-id <id>', 'Target folder ID')
    .action(
      async (url: string, name: string, opts: { base64?: string; tags?: string; folderId?: string }, command: Command) => {
        await runAction(command, io, async (ctx) => {
          if (ctx.dryRun(`add bookmark ${url}`)) return;
          ctx.render(
            await ctx.api.item.addBookmark({
              url,
              name,
              base64: opts.base64,
              tags: splitList(opts.tags),
              folderId: opts.folderId,
            }),
          );
        });
      },
    );

  item
    .command('update [id]')
    .description("Update items' tags, annotation, url or star rating")
    .option('--tags <tags>', 'Comma-separated tags (replaces existing tags)')
    .option('--annotation <text>', 'Annotation text')
    .option('--url <url>', 'Source URL')
    .option('--star <rating>', 'Star rating (0-5)', parseStar)
    .option('--stdin', 'Read item IDs from stdin (JSON array, lines or NUL-delimited)')
    .action(async (id: string | undefined, opts: ItemUpdateOptions, command: Command) => {
      await runAction(command, io, async (ctx) => {
        let ids: string[];
        if (opts.stdin) {
          ids = await readIdsFromStdin(ctx.io.stdin);
        } else if (id !== undefined) {
          ids = [id];
        } else {
          throw new UsageError('Provide an item ID or use --stdin');
        }
        if (ids.length === 0) {
          throw new UsageError('No item IDs provided');
        }

        if (ctx.dryRun(`update ${ids.length} item(s): ${ids.join(', ')}`)) return;

        const tags = splitList(opts.tags);
        const successes: JsonValue[] = [];
        let failed = 0;
        for (const itemId of ids) {
          try {
            successes.push(
              await ctx.api.item.update({
                id: itemId,
                tags,
                annotation: opts.annotation,
                url: opts.url,
                star: opts.star,
              }),
            );
          } catch (err) {
            ctx.status.error(`Error updating ${itemId}: ${describeError(err).message}`);
            failed++;
          }
        }

        const [only] = successes;
        if (successes.length === 1 && only !== undefined) {
          ctx.render(only);
        } else if (successes.length > 1) {
          ctx.render(successes);
        }

        if (failed === ids.length) {
          throw new CliError(`${failed} of ${ids.length} operation(s) failed`);
        }
        if (failed > 0) {
          throw new PartialFailureError(failed, ids.length);
        }
      });
    });

  item
    .command('move-to-trash <ids>')
    .description('Move items to the trash (comma-separated IDs)')
    .option('--force', 'Confirm the destructive operation')
    .action(async (rawIds: string, opts: { force?: boolean }, command: Command) => {
      await runAction(command, io, async (ctx) => {
        if (!opts.force) {
          throw new UsageError('move-to-trash is destructive. Use --force to confirm.');
        }
        const ids = splitList(rawIds) ?? [];
        if (ids.length === 0) {
          throw new UsageError('No item IDs provided');
        }
        if (ctx.dryRun(`move ${ids.length} item(s) to trash: ${ids.join(', ')}`)) return;
        ctx.render(await ctx.api.item.moveToTrash(ids));
      });
    });

  item
    .command('refresh-palette <id>')
    .description("Recompute an item's color palette")
    .action(async (id: string, _opts: object, command: Command) => {
      await runAction(command, io, async (ctx) => {
        if (ctx.dryRun(`refresh palette of ${id}`)) return;
        ctx.render(await ctx.api.item.refreshPalette(id));
      });
    });

  item
    .command('refresh-thumbnail <id>')
    .description("Regenerate an item's thumbnail")
    .action(async (id: string, _opts: object, command: Command) => {
      await runAction(command, io, async (ctx) => {
        if (ctx.dryRun(`refresh thumbnail of ${id}`)) return;
        ctx.render(await ctx.api.item.refreshThumbnail(id));
      });
    });
}
