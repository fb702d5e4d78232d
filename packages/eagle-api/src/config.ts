/**
 * Connection configuration: defaults, environment overrides, flag overrides.
 */

import { z } from 'zod';
import { EagleConfigError } from './errors.js';

export interface ConnectionConfig {
  /** Host the Eagle app listens on. */
  host: string;
  /** Port of the local API server. */
  port: number;
  /** Per-request timeout in milliseconds. */
  timeoutMs: number;
}

export const DEFAULT_CONNECTION_CONFIG: ConnectionConfig = {
  host: 'localhost',
  port: 41595,
  timeoutMs: 30_000,
};

/** Values supplied on the command line; strings as commander hands them over. */
export interface ConnectionOverrides {
  host?: string;
  port?: string | number;
  timeoutMs?: string | number;
}

const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const hostSchema = z.preprocess(blankToUndefined, z.string().trim().min(1).optional());
const portSchema = z.preprocess(
  blankToUndefined,
  z.coerce.number().int().min(1).max(65535).optional(),
);
const timeoutSchema = z.preprocess(
  blankToUndefined,
  z.coerce.number().int().positive().optional(),
);

const connectionEnvSchema = z.object({
  EAGLE_HOST: hostSchema,
  EAGLE_PORT: portSchema,
  EAGLE_TIMEOUT_MS: timeoutSchema,
});

const connectionOverridesSchema = z.object({
  host: hostSchema,
  port: portSchema,
  timeoutMs: timeoutSchema,
});

/**
 * Resolve the effective connection settings.
 * Precedence: explicit overrides, then EAGLE_* environment variables, then defaults.
 */
export function resolveConnectionConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConnectionOverrides = {},
): ConnectionConfig {
  const fromEnv = connectionEnvSchema.safeParse({
    EAGLE_HOST: env['EAGLE_HOST'],
    EAGLE_PORT: env['EAGLE_PORT'],
    EAGLE_TIMEOUT_MS: env['EAGLE_TIMEOUT_MS'],
  });
  if (!fromEnv.success) {
    throw new EagleConfigError(describeIssue(fromEnv.error));
  }

  const fromFlags = connectionOverridesSchema.safeParse(overrides);
  if (!fromFlags.success) {
    throw new EagleConfigError(describeIssue(fromFlags.error));
  }

  return {
    host: fromFlags.data.host ?? fromEnv.data.EAGLE_HOST ?? DEFAULT_CONNECTION_CONFIG.host,
    port: fromFlags.data.port ?? fromEnv.data.EAGLE_PORT ?? DEFAULT_CONNECTION_CONFIG.port,
    timeoutMs:
      fromFlags.data.timeoutMs ??
      fromEnv.data.EAGLE_TIMEOUT_MS ??
      DEFAULT_CONNECTION_CONFIG.timeoutMs,
  };
}

function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (issue === undefined) return 'Invalid connection settings';
  return `Invalid ${issue.path.join('.')}: ${issue.message}`;
}
