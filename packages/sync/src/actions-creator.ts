import {
  VERSIONED_OBJECTS,
  isLibraryInScope,
  groupLibrary,
  scopeIncludesGroups,
  specificLibraries,
  type Libraries,
  type LibraryIdentifier,
  type SyncObject,
} from '@folio/core';
import type { Action } from './actions.js';
import type { ActionsCreator, LibraryActions } from './collaborators.js';
import type {
  CreateLibraryActionsOptions,
  DownloadBatch,
  LibraryData,
  RemovedGroup,
  SyncKind,
  Versions,
} from './types.js';

/** Largest number of objects requested at once */
export const MAX_BATCH_SIZE = 50;

/** Size of the first item batch; item batches double up to {@link MAX_BATCH_SIZE} */
export const INITIAL_ITEM_BATCH_SIZE = 5;

const VERSION_FIELDS: Record<SyncObject, keyof Versions> = {
  collection: 'collections',
  search: 'searches',
  item: 'items',
  trash: 'trash',
  settings: 'settings',
};

function libraryOptions(kind: SyncKind): CreateLibraryActionsOptions {
  return kind === 'full' ? 'force-downloads' : 'automatic';
}

/**
 * Split keys into download batches. Items start small so the first objects
 * show up quickly.
 */
export function splitIntoBatches(object: SyncObject, keys: readonly string[]): string[][] {
  const batches: string[][] = [];
  const growing = object === 'item' || object === 'trash';
  let size = growing ? INITIAL_ITEM_BATCH_SIZE : MAX_BATCH_SIZE;

  for (let start = 0; start < keys.length; start += size) {
    if (batches.length > 0 && growing) {
      size = Math.min(size * 2, MAX_BATCH_SIZE);
    }
    batches.push(keys.slice(start, start + size));
  }
  return batches;
}

/**
 * Default {@link ActionsCreator}: derives sync actions from the scope of the
 * sync and the local state of each library.
 */
export class DefaultActionsCreator implements ActionsCreator {
  createInitialActions(libraries: Libraries, kind: SyncKind): Action[] {
    if (kind === 'keys-only') {
      return [{ type: 'load-key-permissions' }];
    }
    if (scopeIncludesGroups(libraries)) {
      return [{ type: 'load-key-permissions' }, { type: 'sync-group-versions' }];
    }
    return [
      { type: 'load-key-permissions' },
      { type: 'create-library-actions', libraries, options: libraryOptions(kind) },
    ];
  }

  createGroupActions(
    toUpdate: number[],
    toRemove: RemovedGroup[],
    kind: SyncKind,
    libraries: Libraries
  ): Action[] {
    const actions: Action[] = [];

    for (const group of toRemove) {
      if (isLibraryInScope(libraries, groupLibrary(group.groupId))) {
        actions.push({ type: 'resolve-deleted-group', groupId: group.groupId, name: group.name });
      }
    }
    for (const groupId of toUpdate) {
      if (isLibraryInScope(libraries, groupLibrary(groupId))) {
        actions.push({ type: 'sync-group-to-db', groupId });
      }
    }

    actions.push({ type: 'create-library-actions', libraries, options: libraryOptions(kind) });
    return actions;
  }

  createBatchedObjectActions(
    libraryId: LibraryIdentifier,
    object: SyncObject,
    keys: string[],
    version: number,
    shouldStoreVersion: boolean,
    _kind: SyncKind
  ): Action[] {
    const actions: Action[] = [];

    if (keys.length > 0) {
      const batches = splitIntoBatches(object, keys).map(
        (batchKeys): DownloadBatch => ({ libraryId, object, keys: batchKeys, version })
      );
      actions.push({ type: 'sync-batches-to-db', batches });
    }
    if (shouldStoreVersion) {
      actions.push({ type: 'store-version', libraryId, object, version });
    }
    return actions;
  }

  createLibraryActions(
    data: LibraryData[],
    options: CreateLibraryActionsOptions,
    kind: SyncKind
  ): LibraryActions {
    const actions: Action[] = [];
    let writeCount = 0;

    for (const library of data) {
      const writes = (): Action[] => {
        const result = this.createWriteActions(library);
        writeCount += result.writeCount;
        return result.actions;
      };
      const downloads = (): Action[] => this.createDownloadActions(library.identifier, library.versions, kind);

      switch (options) {
        case 'automatic':
          if (!hasPendingWrites(library)) {
            actions.push(...downloads());
          } else if (kind === 'prioritize-downloads') {
            actions.push(...downloads(), {
              type: 'create-library-actions',
              libraries: specificLibraries([library.identifier]),
              options: 'only-writes',
            });
          } else {
            actions.push(...writes());
          }
          break;
        case 'force-downloads':
          actions.push(...writes(), ...downloads());
          break;
        case 'only-writes':
          actions.push(...writes());
          break;
        case 'only-downloads':
          actions.push(...downloads());
          break;
      }
    }

    return options === 'automatic' ? { actions, queueIndex: 0, writeCount } : { actions, writeCount };
  }

  private createWriteActions(library: LibraryData): LibraryActions {
    const { identifier } = library;
    const writeCount = library.updates.length + library.deletions.length;

    if (writeCount > 0 && !library.canEditMetadata && identifier.type === 'group') {
      return {
        actions: [
          { type: 'resolve-group-metadata-write-permission', groupId: identifier.groupId, name: library.name },
        ],
        writeCount: 0,
      };
    }

    const actions: Action[] = [
      ...library.updates.map((batch): Action => ({ type: 'submit-write-batch', batch })),
      ...library.deletions.map((batch): Action => ({ type: 'submit-delete-batch', batch })),
    ];
    if (library.hasUpload) {
      actions.push({
        type: 'create-upload-actions',
        libraryId: identifier,
        hadOtherWriteActions: writeCount > 0,
        canEditFiles: library.canEditFiles,
      });
    }
    if (library.hasWebDavDeletions) {
      actions.push({ type: 'perform-webdav-deletions', libraryId: identifier });
    }
    return { actions, writeCount };
  }

  private createDownloadActions(libraryId: LibraryIdentifier, versions: Versions, kind: SyncKind): Action[] {
    if (kind === 'collections-only') {
      return [
        { type: 'sync-versions', libraryId, object: 'collection', version: versions.collections, checkRemote: true },
      ];
    }

    return [
      { type: 'sync-settings', libraryId, version: versions.settings },
      ...VERSIONED_OBJECTS.map(
        (object): Action => ({
          type: 'sync-versions',
          libraryId,
          object,
          version: versions[VERSION_FIELDS[object]],
          checkRemote: true,
        })
      ),
      { type: 'sync-deletions', libraryId, version: versions.deletions },
      { type: 'store-deletion-version', libraryId, version: versions.deletions },
    ];
  }
}

function hasPendingWrites(library: LibraryData): boolean {
  return (
    library.updates.length > 0 ||
    library.deletions.length > 0 ||
    library.hasUpload ||
    library.hasWebDavDeletions
  );
}
