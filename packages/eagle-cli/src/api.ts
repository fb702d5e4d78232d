/**
 * API bridge for the CLI: re-exports the loader from @eaglet/api.
 */

export { loadApi, setApi, resetApi, configureApi } from '@eaglet/api';
export type { EagleApi } from '@eaglet/api';
