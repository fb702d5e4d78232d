/**
 * API loader: singleton with lazy initialization and test injection.
 *
 * loadApi() builds an HTTP-backed EagleApi from the resolved connection
 * config on first use. configureApi() records flag overrides before that.
 * setApi() swaps in a caller-provided instance (tests, embedding).
 */

import { createHttpApi } from './api.js';
import { resolveConnectionConfig, type ConnectionOverrides } from './config.js';
import { EagleHttpClient, type FetchLike } from './http.js';
import type { EagleApi } from './interface.js';

/** The singleton instance. null = not yet initialized. */
let instance: EagleApi | null = null;

/** Whether the current instance was set via setApi(). */
let isOverride = false;

let pendingOverrides: ConnectionOverrides = {};

/**
 * Return the shared API instance, creating it on first call.
 *
 * Resolution order:
 * 1. If setApi() was called, returns the injected instance
 * 2. Otherwise builds an HTTP client from env + configureApi() overrides
 */
export function loadApi(fetchImpl?: FetchLike): EagleApi {
  if (instance !== null) {
    return instance;
  }
  const config = resolveConnectionConfig(process.env, pendingOverrides);
  instance = createHttpApi(new EagleHttpClient(config, fetchImpl));
  return instance;
}

/**
 * Record connection overrides (e.g. --host / --port). Drops a lazily built
 * instance so the next loadApi() uses them. Ignored while an injected instance is active.
 */
export function configureApi(overrides: ConnectionOverrides): void {
  if (isOverride) return;
  pendingOverrides = { ...overrides };
  instance = null;
}

/**
 * Override the singleton with a caller-provided instance.
 */
export function setApi(api: EagleApi): void {
  instance = api;
  isOverride = true;
}

/**
 * Clear the singleton and any recorded overrides. Primarily for test cleanup.
 */
export function resetApi(): void {
  instance = null;
  isOverride = false;
  pendingOverrides = {};
}

/**
 * Check if the current instance was injected via setApi().
 */
export function isApiOverridden(): boolean {
  return isOverride;
}
