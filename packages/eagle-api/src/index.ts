/**
 * @eaglet/api: typed client for the Eagle app's local HTTP API.
 */

export type {
  EagleApi,
  ApplicationApi,
  FolderApi,
  ItemApi,
  LibraryApi,
  TagApi,
  ItemListParams,
  ItemOrderBy,
  FolderColor,
  AddFromUrlInput,
  AddFromPathInput,
  AddBookmarkInput,
  ItemUpdateInput,
  FolderUpdateInput,
} from './interface.js';
export { ITEM_ORDER_BY, FOLDER_COLORS } from './interface.js';

export type { JsonValue, JsonObject, JsonPrimitive } from './json.js';
export { jsonValueSchema, isJsonObject, compactObject, setJsonField } from './json.js';

export type { ConnectionConfig, ConnectionOverrides } from './config.js';
export { DEFAULT_CONNECTION_CONFIG, resolveConnectionConfig } from './config.js';

export type { FetchLike, HttpMethod, QueryValue } from './http.js';
export { EagleHttpClient, parseEnvelope } from './http.js';

export type { EagleErrorCode, EagleError } from './errors.js';
export {
  EagleApiError,
  EagleConnectionError,
  EagleConfigError,
  isEagleError,
} from './errors.js';

export { createHttpApi } from './api.js';
export { createStubApi, STUB_LIBRARY_PATH } from './stub.js';
export { loadApi, configureApi, setApi, resetApi, isApiOverridden } from './loader.js';

export type { ItemSummary, FolderNode } from './schemas.js';
export {
  applicationInfoSchema,
  itemSummarySchema,
  itemListSchema,
  folderNodeSchema,
  folderListSchema,
  libraryInfoSchema,
  libraryHistorySchema,
} from './schemas.js';
