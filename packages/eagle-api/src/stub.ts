/**
 * In-memory EagleApi returning canned data. Used by tests and offline dry runs.
 */

import type { EagleApi } from './interface.js';
import type { JsonValue } from './json.js';

export const STUB_LIBRARY_PATH = '/Users/test/Pictures/Test.library';

const STUB_ITEMS: JsonValue = [
  {
    id: 'ITEM0001',
    name: 'sunset',
    ext: 'jpg',
    url: 'https://example.com/sunset',
    tags: ['sky', 'orange'],
    star: 4,
  },
  {
    id: 'ITEM0002',
    name: 'mountain',
    ext: 'png',
    url: '',
    tags: [],
    star: 2,
  },
];

const STUB_FOLDERS: JsonValue = [
  {
    id: 'FOLDER01',
    name: 'Photos',
    children: [{ id: 'FOLDER02', name: 'Travel', children: [] }],
  },
  { id: 'FOLDER03', name: 'Drafts', children: [] },
];

type Overrides = {
  [K in keyof EagleApi]?: Partial<EagleApi[K]>;
};

/**
 * Create a stub API. Each resource group can be partially overridden.
 */
export function createStubApi(overrides: Overrides = {}): EagleApi {
  const ok = async (): Promise<JsonValue> => null;
  return {
    application: {
      info: async () => ({ version: '4.0.0', buildVersion: '20', platform: 'darwin' }),
      ...overrides.application,
    },
    folder: {
      list: async () => STUB_FOLDERS,
      listRecent: async () => [],
      create: async (name) => ({ id: 'FOLDERNEW', name, children: [] }),
      rename: async (folderId, newName) => ({ id: folderId, name: newName }),
      update: async (folderId, input) => ({ id: folderId, name: input.newName ?? 'Folder' }),
      ...overrides.folder,
    },
    item: {
      list: async () => STUB_ITEMS,
      info: async (id) => ({ id, name: 'sunset', ext: 'jpg' }),
      thumbnail: async (id) => `${STUB_LIBRARY_PATH}/images/${id}.info/sunset_thumbnail.png`,
      addFromUrl: ok,
      addFromUrls: ok,
      addFromPath: ok,
      addBookmark: ok,
      update: async (input) => ({ id: input.id }),
      moveToTrash: ok,
      refreshPalette: ok,
      refreshThumbnail: ok,
      ...overrides.item,
    },
    library: {
      info: async () => ({
        folders: STUB_FOLDERS,
        smartFolders: [],
        quickAccess: [],
        tagsGroups: [],
        modificationTime: 1700000000000,
        applicationVersion: '4.0.0',
        library: { path: STUB_LIBRARY_PATH, name: 'Test' },
      }),
      history: async () => [STUB_LIBRARY_PATH],
      switch: ok,
      ...overrides.library,
    },
    tag: {
      list: async () => [],
      all: async () => ({ tags: [], recent: [], groups: [], starred: [] }),
      listRecent: async () => [],
      groups: async () => [],
      ...overrides.tag,
    },
  };
}
