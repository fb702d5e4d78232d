/**
 * Plugin server discovery.
 *
 * Plugins that expose an HTTP server drop a JSON file into
 * ~/.eagle-plugins/servers/<pluginId>.json while they run. Files whose
 * process is gone are pruned on read.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { z } from 'zod';
import {
  DEFAULT_CONNECTION_CONFIG,
  EagleHttpClient,
  jsonValueSchema,
  type FetchLike,
  type HttpMethod,
  type JsonValue,
} from '@eaglet/api';
import { CliError, UsageError } from '../errors.js';
import { createStatus, type StatusReporter } from '../ui/status.js';

export const DISCOVERY_SUBDIR = path.join('.eagle-plugins', 'servers');

const PLUGIN_HOST = '127.0.0.1';

const HTTP_METHODS: readonly HttpMethod[] = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'];

const pluginRouteSchema = z.object({
  method: z.string(),
  path: z.string(),
});

export const pluginDiscoverySchema = z.object({
  pluginId: z.string().min(1),
  pluginName: z.string(),
  version: z.string(),
  port: z.number().int().min(1).max(65535),
  pid: z.number().int().positive(),
  startedAt: z.string(),
  routes: z.array(pluginRouteSchema).default([]),
});

export type PluginDiscovery = z.infer<typeof pluginDiscoverySchema>;

/** A parsed discovery entry and the file it was read from. */
export interface DiscoveryFile {
  file: string;
  plugin: PluginDiscovery;
}

export interface DiscoveryOptions {
  /** Directory holding discovery files; ~/.eagle-plugins/servers by default. */
  dir?: string;
  /** Liveness check; signal 0 by default. */
  isAlive?: (pid: number) => boolean;
  status?: StatusReporter;
}

export function discoveryDir(home: string = os.homedir()): string {
  return path.join(home, DISCOVERY_SUBDIR);
}

/**
 * Whether a process exists. EPERM means it exists but belongs to someone else.
 */
export function isPidAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    return err instanceof Error && 'code' in err && err.code === 'EPERM';
  }
}

/**
 * Parse every *.json file in the directory. Unreadable or invalid files are
 * reported and skipped.
 */
export function readDiscoveryFiles(dir: string, status: StatusReporter): DiscoveryFile[] {
  if (!fs.existsSync(dir)) return [];

  const entries: DiscoveryFile[] = [];
  for (const name of fs.readdirSync(dir).sort()) {
    if (path.extname(name) !== '.json') continue;
    const file = path.join(dir, name);

    let decoded: unknown;
    try {
      decoded = JSON.parse(fs.readFileSync(file, 'utf-8'));
    } catch (err) {
      status.warning(`Could not read ${file}: ${err instanceof Error ? err.message : String(err)}`);
      continue;
    }

    const parsed = pluginDiscoverySchema.safeParse(decoded);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      status.warning(
        `Invalid discovery file ${file}: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'schema mismatch'}`,
      );
      continue;
    }
    entries.push({ file, plugin: parsed.data });
  }
  return entries;
}

/**
 * Discovery entries whose process is alive. Stale files are deleted.
 */
export function listLivePlugins(options: DiscoveryOptions = {}): PluginDiscovery[] {
  const dir = options.dir ?? discoveryDir();
  const isAlive = options.isAlive ?? isPidAlive;
  const status = options.status ?? createStatus();

  const live: PluginDiscovery[] = [];
  for (const { file, plugin } of readDiscoveryFiles(dir, status)) {
    if (isAlive(plugin.pid)) {
      live.push(plugin);
      continue;
    }
    try {
      fs.unlinkSync(file);
      status.info(`Pruned stale discovery for ${plugin.pluginId} (PID ${plugin.pid} not running)`);
    } catch (err) {
      status.warning(`Could not remove ${file}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
  return live;
}

/**
 * Resolve a plugin by exact id, then by unique id prefix.
 */
export function findPlugin(pluginId: string, options: DiscoveryOptions = {}): PluginDiscovery {
  const plugins = listLivePlugins(options);

  const exact = plugins.find((p) => p.pluginId === pluginId);
  if (exact !== undefined) return exact;

  const matches = plugins.filter((p) => p.pluginId.startsWith(pluginId));
  const [only] = matches;
  if (matches.length === 1 && only !== undefined) return only;
  if (matches.length === 0) {
    throw new CliError(`No plugin found matching '${pluginId}'`);
  }
  throw new CliError(
    `Ambiguous plugin ID '${pluginId}', matches: ${matches.map((p) => p.pluginId).join(', ')}`,
  );
}

export function parseHttpMethod(raw: string): HttpMethod {
  const method = HTTP_METHODS.find((m) => m === raw.toUpperCase());
  if (method === undefined) {
    throw new UsageError(`Unsupported HTTP method '${raw}' (expected one of ${HTTP_METHODS.join(', ')})`);
  }
  return method;
}

export function parseJsonBody(raw: string): JsonValue {
  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch (err) {
    throw new UsageError(`--body is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  const body = jsonValueSchema.safeParse(decoded);
  if (!body.success) {
    throw new UsageError('--body is not valid JSON');
  }
  return body.data;
}

/**
 * Call a route on a plugin server and return the envelope's data.
 */
export async function callPlugin(
  plugin: PluginDiscovery,
  method: HttpMethod,
  routePath: string,
  body?: JsonValue,
  fetchImpl?: FetchLike,
): Promise<JsonValue> {
  const client = new EagleHttpClient(
    { ...DEFAULT_CONNECTION_CONFIG, host: PLUGIN_HOST, port: plugin.port },
    fetchImpl,
  );
  const normalized = routePath.startsWith('/') ? routePath : `/${routePath}`;
  return client.requestUrl(`http://${PLUGIN_HOST}:${plugin.port}${normalized}`, method, body);
}
