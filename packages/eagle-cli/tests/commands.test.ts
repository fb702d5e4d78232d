/**
 * Command integration tests: the full program against the stub API,
 * with stdout, stderr, stdin and the exit code captured in memory.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  EagleApiError,
  EagleConnectionError,
  STUB_LIBRARY_PATH,
  createStubApi,
  type EagleApi,
  type ItemListParams,
  type ItemUpdateInput,
} from '@eaglet/api';
import { resetApi, setApi } from '../src/api.js';
import type { CliIO } from '../src/commands/context.js';
import type { PluginCommandOptions } from '../src/commands/plugin.js';
import type { ExitCode } from '../src/errors.js';
import { createProgram } from '../src/index.js';

interface RunResult {
  stdout: string;
  stderr: string;
  exitCode: ExitCode | undefined;
}

interface RunOptions {
  api?: EagleApi;
  stdin?: string;
  isTTY?: boolean;
  plugins?: PluginCommandOptions;
}

const ANSI = /\u001b\[\d+m/g;

interface CapturedIO {
  io: CliIO;
  result(): RunResult;
}

function captureIO(options: RunOptions = {}): CapturedIO {
  const out: string[] = [];
  const err: string[] = [];
  let exitCode: ExitCode | undefined;

  async function* stdin(): AsyncGenerator<string> {
    yield options.stdin ?? '';
  }

  return {
    io: {
      out: { write: (chunk: string) => out.push(chunk) },
      err: { write: (chunk: string) => err.push(chunk) },
      stdin: stdin(),
      isTTY: options.isTTY ?? false,
      setExitCode: (code) => {
        exitCode = code;
      },
    },
    result: () => ({ stdout: out.join(''), stderr: err.join('').replace(ANSI, ''), exitCode }),
  };
}

async function run(args: string[], options: RunOptions = {}): Promise<RunResult> {
  const captured = captureIO(options);
  setApi(options.api ?? createStubApi());
  await createProgram({ io: captured.io, plugins: options.plugins }).parseAsync(args, { from: 'user' });
  return captured.result();
}

afterEach(() => {
  resetApi();
});

describe('program', () => {
  it('registers every command group', () => {
    expect(createProgram().commands.map((c) => c.name())).toEqual([
      'app',
      'folder',
      'item',
      'library',
      'tag',
      'plugin',
      'completions',
    ]);
  });

  it('rejects an unknown output format', async () => {
    const captured = captureIO();
    setApi(createStubApi());
    await expect(
      createProgram({ io: captured.io }).parseAsync(['item', 'list', '-o', 'yaml'], { from: 'user' }),
    ).rejects.toHaveProperty('code', 'commander.invalidArgument');
    expect(captured.result().stderr).toContain("'yaml' is invalid");
  });

  it('reports invalid connection settings as a usage error', async () => {
    const captured = captureIO();
    await createProgram({ io: captured.io }).parseAsync(['--port', 'not-a-port', 'app', 'info'], { from: 'user' });
    const result = captured.result();
    expect(result.exitCode).toBe(2);
    expect(result.stdout).toBe('');
    expect(result.stderr).toContain('Invalid');
  });
});

describe('app', () => {
  it('prints the version as a plain line', async () => {
    const result = await run(['app', 'version']);
    expect(result.stdout).toBe('4.0.0\n');
    expect(result.exitCode).toBeUndefined();
  });

  it('prints application info as JSON', async () => {
    const result = await run(['app', 'info', '--json']);
    expect(result.stdout).toBe('{\n  "version": "4.0.0",\n  "buildVersion": "20",\n  "platform": "darwin"\n}\n');
  });

  it('shows a connection failure with a hint and exit code 3', async () => {
    const api = createStubApi({
      application: {
        info: async () => {
          throw new EagleConnectionError(
            'Could not connect to http://localhost:41595: connect ECONNREFUSED',
            'http://localhost:41595/api/application/info',
          );
        },
      },
    });
    const result = await run(['app', 'info'], { api });
    expect(result.exitCode).toBe(3);
    expect(result.stdout).toBe('');
    expect(result.stderr).toContain('Error: Could not connect to http://localhost:41595: connect ECONNREFUSED');
    expect(result.stderr).toContain('Make sure the Eagle app is running');
  });

  it('writes the error as JSON when a JSON format was requested', async () => {
    const api = createStubApi({
      application: {
        info: async () => {
          throw new EagleApiError('boom', 500);
        },
      },
    });
    const result = await run(['app', 'info', '-o', 'compact'], { api });
    expect(result.exitCode).toBe(1);
    expect(result.stderr).toBe('{"ok":false,"error":{"message":"boom","exitCode":1}}\n');
  });
});

describe('item list', () => {
  it('renders a projected table', async () => {
    const result = await run(['item', 'list', '-o', 'table', '--fields', 'id,name']);
    expect(result.stdout).toBe(
      'ID        NAME\n--------  --------\nITEM0001  sunset\nITEM0002  mountain\n',
    );
  });

  it('defaults to a table on a terminal', async () => {
    const result = await run(['item', 'list', '--fields', 'id', '--no-header'], { isTTY: true });
    expect(result.stdout).toBe('ITEM0001\nITEM0002\n');
  });

  it('prints ids one per line', async () => {
    expect((await run(['item', 'list', '-o', 'id'])).stdout).toBe('ITEM0001\nITEM0002\n');
  });

  it('counts items', async () => {
    expect((await run(['item', 'list', '--count'])).stdout).toBe('2\n');
  });

  it('filters with --jq', async () => {
    expect((await run(['item', 'list', '--jq', '.[0].id'])).stdout).toBe('"ITEM0001"\n');
  });

  it('reports a bad filter as a usage error', async () => {
    const result = await run(['item', 'list', '--jq', '.[invalid']);
    expect(result.exitCode).toBe(2);
    expect(result.stdout).toBe('');
    expect(result.stderr).toContain("Error: jq parse error: expected ']', found end of input at position 9");
  });

  it('keeps items whose url contains the keyword', async () => {
    const result = await run(['item', 'list', '--url', 'example', '-o', 'compact', '--fields', 'id']);
    expect(result.stdout).toBe('[{"id":"ITEM0001"}]\n');
  });

  it('prints file paths inside the library', async () => {
    const result = await run(['item', 'list', '--paths']);
    expect(result.stdout).toBe(
      `${STUB_LIBRARY_PATH}/images/ITEM0001.info/sunset.jpg\n${STUB_LIBRARY_PATH}/images/ITEM0002.info/mountain.png\n`,
    );
  });

  it('passes filters through to the API', async () => {
    let received: ItemListParams | undefined;
    const api = createStubApi({
      item: {
        list: async (params) => {
          received = params;
          return [];
        },
      },
    });
    await run(['item', 'list', '-n', '5', '-e', 'png', '-t', 'sky, sea', '--order-by', '-NAME'], { api });
    expect(received).toEqual({ limit: 5, ext: 'png', tags: ['sky', 'sea'], orderBy: '-NAME' });
  });

  it('rejects a negative limit', async () => {
    await expect(run(['item', 'list', '-n', '-3'])).rejects.toHaveProperty('code', 'commander.invalidArgument');
  });
});

describe('item commands', () => {
  it('percent-decodes the thumbnail path', async () => {
    const api = createStubApi({
      item: { thumbnail: async () => '/lib/images/A.info/my%20file_thumbnail.png' },
    });
    expect((await run(['item', 'thumbnail', 'A'], { api })).stdout).toBe('/lib/images/A.info/my file_thumbnail.png\n');
  });

  it('updates every id read from stdin', async () => {
    const updates: ItemUpdateInput[] = [];
    const api = createStubApi({
      item: {
        update: async (input) => {
          updates.push(input);
          return { id: input.id };
        },
      },
    });
    const result = await run(['item', 'update', '--stdin', '--tags', 'sky', '-o', 'compact'], {
      api,
      stdin: 'ITEM0001\nITEM0002\n',
    });
    expect(result.stdout).toBe('[{"id":"ITEM0001"},{"id":"ITEM0002"}]\n');
    expect(updates.map((u) => [u.id, u.tags])).toEqual([
      ['ITEM0001', ['sky']],
      ['ITEM0002', ['sky']],
    ]);
    expect(result.exitCode).toBeUndefined();
  });

  it('renders a single update as an object', async () => {
    const result = await run(['item', 'update', 'ITEM0001', '--star', '5', '-o', 'compact']);
    expect(result.stdout).toBe('{"id":"ITEM0001"}\n');
  });

  it('exits 4 when part of a batch fails', async () => {
    const api = createStubApi({
      item: {
        update: async (input) => {
          if (input.id === 'ITEM0002') throw new EagleApiError('locked');
          return { id: input.id };
        },
      },
    });
    const result = await run(['item', 'update', '--stdin', '-o', 'compact'], { api, stdin: '["ITEM0001","ITEM0002"]' });
    expect(result.stdout).toBe('{"id":"ITEM0001"}\n');
    expect(result.stderr).toContain('Error updating ITEM0002: locked');
    expect(result.exitCode).toBe(4);
  });

  it('exits 1 when the whole batch fails', async () => {
    const api = createStubApi({
      item: {
        update: async () => {
          throw new EagleApiError('locked');
        },
      },
    });
    const result = await run(['item', 'update', '--stdin'], { api, stdin: 'a\nb' });
    expect(result.stdout).toBe('');
    expect(result.exitCode).toBe(1);
  });

  it('skips the request on --dry-run', async () => {
    const updates: ItemUpdateInput[] = [];
    const api = createStubApi({
      item: {
        update: async (input) => {
          updates.push(input);
          return null;
        },
      },
    });
    const result = await run(['item', 'update', '--stdin', '--dry-run'], { api, stdin: 'a\nb\n' });
    expect(updates).toEqual([]);
    expect(result.stdout).toBe('');
    expect(result.stderr).toContain('dry-run: would update 2 item(s): a, b');
  });

  it('keeps dry-run notices quiet under --quiet', async () => {
    const result = await run(['item', 'update', 'a', '--dry-run', '--quiet']);
    expect(result.stderr).toBe('');
  });

  it('requires an id or --stdin', async () => {
    const result = await run(['item', 'update', '--tags', 'x']);
    expect(result.exitCode).toBe(2);
    expect(result.stderr).toContain('Provide an item ID or use --stdin');
  });

  it('refuses to trash without --force', async () => {
    const result = await run(['item', 'move-to-trash', 'a,b']);
    expect(result.exitCode).toBe(2);
    expect(result.stderr).toContain('move-to-trash is destructive. Use --force to confirm.');
  });

  it('trashes comma-separated ids with --force', async () => {
    let trashed: string[] = [];
    const api = createStubApi({
      item: {
        moveToTrash: async (ids) => {
          trashed = ids;
          return null;
        },
      },
    });
    const result = await run(['item', 'move-to-trash', 'a, b', '--force'], { api });
    expect(trashed).toEqual(['a', 'b']);
    expect(result.stdout).toBe('null\n');
  });

  it('skips an existing file with --if-exists skip', async () => {
    const api = createStubApi({
      item: {
        addFromPath: async () => {
          throw new EagleApiError('Item already exists');
        },
      },
    });
    const result = await run(['item', 'add-from-path', '/tmp/a.png', 'a', '--if-exists', 'skip'], { api });
    expect(result.exitCode).toBeUndefined();
    expect(result.stderr).toContain('Skipped (--if-exists skip): Item already exists');
  });

  it('names url items after their url when no name is given', async () => {
    let received: unknown;
    const api = createStubApi({
      item: {
        addFromUrls: async (items, folderId) => {
          received = { items, folderId };
          return null;
        },
      },
    });
    await run(['item', 'add-from-urls', '[{"url":"https://example.com/a.png"}]', '--folder-id', 'F1'], { api });
    expect(received).toEqual({
      items: [{ url: 'https://example.com/a.png', name: 'https://example.com/a.png' }],
      folderId: 'F1',
    });
  });
});

describe('folder', () => {
  it('draws the folder tree', async () => {
    const result = await run(['folder', 'list', '--tree']);
    expect(result.stdout.replace(ANSI, '')).toBe('Photos\n    ╰── Travel\nDrafts\n');
  });

  it('lists names at the top level or recursively', async () => {
    expect((await run(['folder', 'list', '--names'])).stdout).toBe('Photos\nDrafts\n');
    expect((await run(['folder', 'list', '--recursive'])).stdout).toBe('Photos\nTravel\nDrafts\n');
  });

  it('needs something to update', async () => {
    const result = await run(['folder', 'update', 'FOLDER01']);
    expect(result.exitCode).toBe(2);
  });

  it('creates a folder under a parent', async () => {
    const result = await run(['folder', 'create', 'Inbox', '--parent', 'FOLDER01', '-o', 'compact']);
    expect(result.stdout).toBe('{"id":"FOLDERNEW","name":"Inbox","children":[]}\n');
  });
});

describe('library', () => {
  it('prints the current library path and name', async () => {
    expect((await run(['library', 'path'])).stdout).toBe(`${STUB_LIBRARY_PATH}\n`);
    expect((await run(['library', 'name'])).stdout).toBe('Test\n');
  });

  it('selects one section of the library info', async () => {
    expect((await run(['library', 'info', '--modification-time'])).stdout).toBe('1700000000000\n');
  });

  it('serializes history lines when JSON is requested', async () => {
    expect((await run(['library', 'history', '-o', 'json'])).stdout).toBe(`[\n  "${STUB_LIBRARY_PATH}"\n]\n`);
  });
});

describe('tag', () => {
  it('lists recent tags', async () => {
    const api = createStubApi({ tag: { listRecent: async () => ['sky', 'sea'] } });
    expect((await run(['tag', 'list-recent', '-o', 'compact'], { api })).stdout).toBe('["sky","sea"]\n');
  });
});

describe('plugin', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'eaglet-cli-plugins-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reports when no plugin servers are running and prints nothing', async () => {
    const result = await run(['plugin', 'list'], { plugins: { discoveryDir: dir, isAlive: () => true } });
    expect(result.stdout).toBe('');
    expect(result.stderr).toContain('No running plugin servers found');
  });

  it('lists routes of a plugin found by prefix', async () => {
    fs.writeFileSync(
      path.join(dir, 'search.json'),
      JSON.stringify({
        pluginId: 'search',
        pluginName: 'Search',
        version: '1.0.0',
        port: 47001,
        pid: 4242,
        startedAt: '2026-01-01T00:00:00Z',
        routes: [{ method: 'GET', path: '/status' }],
      }),
    );
    const result = await run(['plugin', 'routes', 'sea', '-o', 'compact'], {
      plugins: { discoveryDir: dir, isAlive: () => true },
    });
    expect(result.stdout).toBe('[{"method":"GET","path":"/status"}]\n');
  });

  it('calls a plugin route', async () => {
    fs.writeFileSync(
      path.join(dir, 'search.json'),
      JSON.stringify({
        pluginId: 'search',
        pluginName: 'Search',
        version: '1.0.0',
        port: 47001,
        pid: 4242,
        startedAt: '2026-01-01T00:00:00Z',
      }),
    );
    const urls: string[] = [];
    const result = await run(['plugin', 'call', 'search', 'get', '/status', '-o', 'compact'], {
      plugins: {
        discoveryDir: dir,
        isAlive: () => true,
        fetch: async (url) => {
          urls.push(url);
          return new Response('{"status":"success","data":{"ok":true}}');
        },
      },
    });
    expect(urls).toEqual(['http://127.0.0.1:47001/status']);
    expect(result.stdout).toBe('{"ok":true}\n');
  });
});

describe('completions', () => {
  it('generates a bash script from the command tree', async () => {
    const { stdout } = await run(['completions', 'bash']);
    const lines = stdout.split('\n');
    expect(lines[0]).toBe('# bash completion for eaglet');
    expect(lines).toContain('    "tag:") words="list all list-recent groups --help" ;;');
    expect(lines).toContain('    "completions:") words="bash zsh fish --help" ;;');
    expect(lines).toContain(
      '    -o|--output) COMPREPLY=($(compgen -W "json compact ndjson table csv id path" -- "$cur")); return ;;',
    );
    expect(stdout.endsWith('complete -F _eaglet eaglet\n')).toBe(true);
  });

  it('wraps the bash script for zsh', async () => {
    const { stdout } = await run(['completions', 'zsh']);
    expect(stdout.startsWith('#compdef eaglet\nautoload -U +X bashcompinit && bashcompinit\n# bash completion')).toBe(
      true,
    );
  });

  it('generates fish completions with descriptions and choices', async () => {
    const lines = (await run(['completions', 'fish'])).stdout.split('\n');
    expect(lines).toContain("complete -c eaglet -n '__fish_use_subcommand' -a 'tag' -d 'Tags and tag groups'");
    expect(lines).toContain("complete -c eaglet -n '__fish_seen_subcommand_from completions' -a 'bash zsh fish'");
    expect(lines).toContain(
      "complete -c eaglet -s o -l output -r -a 'json compact ndjson table csv id path' -d 'Output format'",
    );
  });

  it('rejects an unknown shell', async () => {
    const captured = captureIO();
    await expect(
      createProgram({ io: captured.io }).parseAsync(['completions', 'tcsh'], { from: 'user' }),
    ).rejects.toHaveProperty('code', 'commander.invalidArgument');
  });
});
