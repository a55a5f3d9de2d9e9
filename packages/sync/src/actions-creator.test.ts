import { ALL_LIBRARIES, MY_LIBRARY, groupLibrary, specificLibraries } from '@folio/core';
import { describe, expect, it } from 'vitest';
import { DefaultActionsCreator, splitIntoBatches } from './actions-creator.js';
import type { LibraryData, WriteBatch } from './types.js';

const creator = new DefaultActionsCreator();

function libraryData(overrides: Partial<LibraryData> = {}): LibraryData {
  return {
    identifier: MY_LIBRARY,
    name: 'My Library',
    versions: { collections: 1, searches: 2, items: 3, trash: 4, deletions: 5, settings: 6 },
    canEditMetadata: true,
    canEditFiles: true,
    updates: [],
    deletions: [],
    hasUpload: false,
    hasWebDavDeletions: false,
    ...overrides,
  };
}

const writeBatch: WriteBatch = {
  libraryId: MY_LIBRARY,
  object: 'item',
  version: 10,
  parameters: [{ key: 'AAAA1111' }],
  changeUuids: { AAAA1111: ['uuid-1'] },
};

describe('splitIntoBatches', () => {
  it('grows item batches up to the maximum', () => {
    const keys = Array.from({ length: 100 }, (_, index) => `K${index}`);
    expect(splitIntoBatches('item', keys).map((batch) => batch.length)).toEqual([5, 10, 20, 40, 25]);
  });

  it('uses full batches for collections', () => {
    const keys = Array.from({ length: 60 }, (_, index) => `K${index}`);
    expect(splitIntoBatches('collection', keys).map((batch) => batch.length)).toEqual([50, 10]);
  });
});

describe('DefaultActionsCreator', () => {
  describe('createInitialActions', () => {
    it('only checks the key for keys-only syncs', () => {
      expect(creator.createInitialActions(ALL_LIBRARIES, 'keys-only')).toEqual([{ type: 'load-key-permissions' }]);
    });

    it('syncs groups when the scope can contain them', () => {
      expect(creator.createInitialActions(ALL_LIBRARIES, 'normal')).toEqual([
        { type: 'load-key-permissions' },
        { type: 'sync-group-versions' },
      ]);
      expect(creator.createInitialActions(specificLibraries([groupLibrary(2)]), 'normal')).toEqual([
        { type: 'load-key-permissions' },
        { type: 'sync-group-versions' },
      ]);
    });

    it('goes straight to library actions for the personal library', () => {
      const libraries = specificLibraries([MY_LIBRARY]);
      expect(creator.createInitialActions(libraries, 'full')).toEqual([
        { type: 'load-key-permissions' },
        { type: 'create-library-actions', libraries, options: 'force-downloads' },
      ]);
    });
  });

  describe('createGroupActions', () => {
    it('resolves removed groups before syncing updated ones', () => {
      const libraries = specificLibraries([groupLibrary(1), groupLibrary(2)]);
      expect(
        creator.createGroupActions([1, 3], [{ groupId: 2, name: 'Old' }, { groupId: 4, name: 'Other' }], 'normal', libraries)
      ).toEqual([
        { type: 'resolve-deleted-group', groupId: 2, name: 'Old' },
        { type: 'sync-group-to-db', groupId: 1 },
        { type: 'create-library-actions', libraries, options: 'automatic' },
      ]);
    });
  });

  describe('createBatchedObjectActions', () => {
    it('downloads keys and stores the version', () => {
      expect(creator.createBatchedObjectActions(MY_LIBRARY, 'search', ['S1', 'S2'], 8, true, 'normal')).toEqual([
        {
          type: 'sync-batches-to-db',
          batches: [{ libraryId: MY_LIBRARY, object: 'search', keys: ['S1', 'S2'], version: 8 }],
        },
        { type: 'store-version', libraryId: MY_LIBRARY, object: 'search', version: 8 },
      ]);
    });

    it('only stores the version without keys', () => {
      expect(creator.createBatchedObjectActions(MY_LIBRARY, 'item', [], 8, true, 'normal')).toEqual([
        { type: 'store-version', libraryId: MY_LIBRARY, object: 'item', version: 8 },
      ]);
      expect(creator.createBatchedObjectActions(MY_LIBRARY, 'item', [], 8, false, 'normal')).toEqual([]);
    });
  });

  describe('createLibraryActions', () => {
    it('downloads a library without local changes', () => {
      const result = creator.createLibraryActions([libraryData()], 'automatic', 'normal');

      expect(result.queueIndex).toBe(0);
      expect(result.writeCount).toBe(0);
      expect(result.actions).toEqual([
        { type: 'sync-settings', libraryId: MY_LIBRARY, version: 6 },
        { type: 'sync-versions', libraryId: MY_LIBRARY, object: 'collection', version: 1, checkRemote: true },
        { type: 'sync-versions', libraryId: MY_LIBRARY, object: 'search', version: 2, checkRemote: true },
        { type: 'sync-versions', libraryId: MY_LIBRARY, object: 'item', version: 3, checkRemote: true },
        { type: 'sync-versions', libraryId: MY_LIBRARY, object: 'trash', version: 4, checkRemote: true },
        { type: 'sync-deletions', libraryId: MY_LIBRARY, version: 5 },
        { type: 'store-deletion-version', libraryId: MY_LIBRARY, version: 5 },
      ]);
    });

    it('only lists collections for collections-only syncs', () => {
      const result = creator.createLibraryActions([libraryData()], 'only-downloads', 'collections-only');

      expect(result.queueIndex).toBeUndefined();
      expect(result.actions).toEqual([
        { type: 'sync-versions', libraryId: MY_LIBRARY, object: 'collection', version: 1, checkRemote: true },
      ]);
    });

    it('submits local changes first', () => {
      const result = creator.createLibraryActions(
        [libraryData({ updates: [writeBatch], hasUpload: true })],
        'automatic',
        'normal'
      );

      expect(result.writeCount).toBe(1);
      expect(result.actions).toEqual([
        { type: 'submit-write-batch', batch: writeBatch },
        { type: 'create-upload-actions', libraryId: MY_LIBRARY, hadOtherWriteActions: true, canEditFiles: true },
      ]);
    });

    it('puts downloads before writes when downloads are prioritized', () => {
      const result = creator.createLibraryActions(
        [libraryData({ updates: [writeBatch] })],
        'automatic',
        'prioritize-downloads'
      );

      expect(result.writeCount).toBe(0);
      expect(result.actions).toHaveLength(8);
      expect(result.actions[7]).toEqual({
        type: 'create-library-actions',
        libraries: specificLibraries([MY_LIBRARY]),
        options: 'only-writes',
      });
    });

    it('asks about read-only groups with local changes', () => {
      const result = creator.createLibraryActions(
        [
          libraryData({
            identifier: groupLibrary(7),
            name: 'Lab',
            canEditMetadata: false,
            updates: [{ ...writeBatch, libraryId: groupLibrary(7) }],
          }),
        ],
        'only-writes',
        'normal'
      );

      expect(result).toEqual({
        actions: [{ type: 'resolve-group-metadata-write-permission', groupId: 7, name: 'Lab' }],
        writeCount: 0,
      });
    });

    it('writes and downloads when downloads are forced', () => {
      const result = creator.createLibraryActions(
        [libraryData({ hasWebDavDeletions: true })],
        'force-downloads',
        'full'
      );

      expect(result.actions[0]).toEqual({ type: 'perform-webdav-deletions', libraryId: MY_LIBRARY });
      expect(result.actions[1]).toEqual({ type: 'sync-settings', libraryId: MY_LIBRARY, version: 6 });
      expect(result.actions).toHaveLength(8);
    });
  });
});
