/**
 * EagleApi: the resource-grouped surface of the Eagle local API.
 *
 * Results are returned as decoded JSON. Callers that need specific fields
 * validate them with the schemas in ./schemas.ts.
 */

import type { JsonValue } from './json.js';

export const ITEM_ORDER_BY = [
  'MANUAL',
  'CREATEDATE',
  '-CREATEDATE',
  'BTIME',
  'MTIME',
  'FILESIZE',
  '-FILESIZE',
  'NAME',
  '-NAME',
  'RESOLUTION',
  '-RESOLUTION',
] as const;

export type ItemOrderBy = (typeof ITEM_ORDER_BY)[number];

export const FOLDER_COLORS = [
  'red',
  'orange',
  'green',
  'yellow',
  'aqua',
  'blue',
  'purple',
  'pink',
] as const;

export type FolderColor = (typeof FOLDER_COLORS)[number];

export interface ItemListParams {
  limit?: number;
  offset?: number;
  orderBy?: ItemOrderBy;
  keyword?: string;
  ext?: string;
  tags?: string[];
  folders?: string[];
}

export interface AddFromUrlInput {
  url: string;
  name: string;
  website?: string;
  tags?: string[];
  annotation?: string;
  modificationTime?: number;
  folderId?: string;
  headers?: Record<string, string>;
}

export interface AddFromPathInput {
  path: string;
  name: string;
  website?: string;
  annotation?: string;
  tags?: string[];
  folderId?: string;
}

export interface AddBookmarkInput {
  url: string;
  name: string;
  base64?: string;
  tags?: string[];
  modificationTime?: number;
  folderId?: string;
}

export interface ItemUpdateInput {
  id: string;
  tags?: string[];
  annotation?: string;
  url?: string;
  star?: number;
}

export interface FolderUpdateInput {
  newName?: string;
  newDescription?: string;
  newColor?: FolderColor;
}

export interface ApplicationApi {
  info(): Promise<JsonValue>;
}

export interface FolderApi {
  list(): Promise<JsonValue>;
  listRecent(): Promise<JsonValue>;
  create(name: string, parentId?: string): Promise<JsonValue>;
  rename(folderId: string, newName: string): Promise<JsonValue>;
  update(folderId: string, input: FolderUpdateInput): Promise<JsonValue>;
}

export interface ItemApi {
  list(params?: ItemListParams): Promise<JsonValue>;
  info(id: string): Promise<JsonValue>;
  thumbnail(id: string): Promise<JsonValue>;
  addFromUrl(input: AddFromUrlInput): Promise<JsonValue>;
  addFromUrls(items: AddFromUrlInput[], folderId?: string): Promise<JsonValue>;
  addFromPath(input: AddFromPathInput): Promise<JsonValue>;
  addBookmark(input: AddBookmarkInput): Promise<JsonValue>;
  update(input: ItemUpdateInput): Promise<JsonValue>;
  moveToTrash(ids: string[]): Promise<JsonValue>;
  refreshPalette(id: string): Promise<JsonValue>;
  refreshThumbnail(id: string): Promise<JsonValue>;
}

export interface LibraryApi {
  info(): Promise<JsonValue>;
  history(): Promise<JsonValue>;
  switch(libraryPath: string): Promise<JsonValue>;
}

export interface TagApi {
  list(): Promise<JsonValue>;
  all(): Promise<JsonValue>;
  listRecent(): Promise<JsonValue>;
  groups(): Promise<JsonValue>;
}

export interface EagleApi {
  application: ApplicationApi;
  folder: FolderApi;
  item: ItemApi;
  library: LibraryApi;
  tag: TagApi;
}
