/**
 * HTTP-backed EagleApi: one method per endpoint.
 */

import type { EagleHttpClient } from './http.js';
import type {
  AddFromUrlInput,
  EagleApi,
  ItemListParams,
} from './interface.js';
import { compactObject, type JsonObject } from './json.js';

function joinList(values: string[] | undefined): string | undefined {
  return values && values.length > 0 ? values.join(',') : undefined;
}

function urlItemBody(input: AddFromUrlInput): JsonObject {
  return compactObject({
    url: input.url,
    name: input.name,
    website: input.website,
    tags: input.tags,
    annotation: input.annotation,
    modificationTime: input.modificationTime,
    folderId: input.folderId,
    headers: input.headers,
  });
}

export function createHttpApi(client: EagleHttpClient): EagleApi {
  return {
    application: {
      info: () => client.get('application', 'info'),
    },

    folder: {
      list: () => client.get('folder', 'list'),
      listRecent: () => client.get('folder', 'listRecent'),
      create: (name, parentId) =>
        client.post('folder', 'create', compactObject({ folderName: name, parent: parentId })),
      rename: (folderId, newName) => client.post('folder', 'rename', { folderId, newName }),
      update: (folderId, input) =>
        client.post(
          'folder',
          'update',
          compactObject({
            folderId,
            newName: input.newName,
            newDescription: input.newDescription,
            newColor: input.newColor,
          }),
        ),
    },

    item: {
      list: (params: ItemListParams = {}) =>
        client.get('item', 'list', {
          limit: params.limit,
          offset: params.offset,
          orderBy: params.orderBy,
          keyword: params.keyword,
          ext: params.ext,
          tags: joinList(params.tags),
          folders: joinList(params.folders),
        }),
      info: (id) => client.get('item', 'info', { id }),
      thumbnail: (id) => client.get('item', 'thumbnail', { id }),
      addFromUrl: (input) => client.post('item', 'addFromURL', urlItemBody(input)),
      addFromUrls: (items, folderId) =>
        client.post(
          'item',
          'addFromURLs',
          compactObject({ items: items.map(urlItemBody), folderId }),
        ),
      addFromPath: (input) =>
        client.post(
          'item',
          'addFromPath',
          compactObject({
            path: input.path,
            name: input.name,
            website: input.website,
            annotation: input.annotation,
            tags: input.tags,
            folderId: input.folderId,
          }),
        ),
      addBookmark: (input) =>
        client.post(
          'item',
          'addBookmark',
          compactObject({
            url: input.url,
            name: input.name,
            base64: input.base64,
            tags: input.tags,
            modificationTime: input.modificationTime,
            folderId: input.folderId,
          }),
        ),
      update: (input) =>
        client.post(
          'item',
          'update',
          compactObject({
            id: input.id,
            tags: input.tags,
            annotation: input.annotation,
            url: input.url,
            star: input.star,
          }),
        ),
      moveToTrash: (ids) => client.post('item', 'moveToTrash', { itemIds: ids }),
      refreshPalette: (id) => client.post('item', 'refreshPalette', { id }),
      refreshThumbnail: (id) => client.post('item', 'refreshThumbnail', { id }),
    },

    library: {
      info: () => client.get('library', 'info'),
      history: () => client.get('library', 'history'),
      switch: (libraryPath) => client.post('library', 'switch', { libraryPath }),
    },

    tag: {
      list: () => client.get('tag', 'list'),
      all: () => client.get('tag', 'all'),
      listRecent: () => client.get('tag', 'listRecent'),
      groups: () => client.get('tag', 'groups'),
    },
  };
}
