import { MY_LIBRARY, success, type LibraryIdentifier } from '@folio/core';
import { firstValueFrom } from 'rxjs';
import { vi } from 'vitest';
import { DefaultActionsCreator } from '../actions-creator.js';
import type { Action } from '../actions.js';
import type { SyncActionExecutor, SyncVersionsRequest, VersionedRequest } from '../collaborators.js';
import { SyncController, type SyncOutcome } from '../sync-controller.js';
import type { AccessPermissions, AttachmentUpload, DeleteBatch, LibraryData, WriteBatch } from '../types.js';

export const permissions: AccessPermissions = {
  user: { library: true, notes: true, files: true, write: true },
  groupDefault: null,
  groups: {},
};

/**
 * Executor whose calls all succeed without any remote or local changes
 */
export function createExecutor(overrides: Partial<SyncActionExecutor> = {}): SyncActionExecutor {
  return {
    loadKeyPermissions: vi.fn(async () => success(permissions)),
    loadLibraryData: vi.fn(async (): Promise<LibraryData[]> => []),
    syncGroupVersions: vi.fn(async () => success({ toUpdate: [], toRemove: [] })),
    fetchAndStoreGroup: vi.fn(async () => success(undefined)),
    markGroupForResync: vi.fn(async () => {}),
    readGroupName: vi.fn(async (): Promise<string | null> => null),
    syncVersions: vi.fn(async (request: SyncVersionsRequest) =>
      success({ version: request.sinceVersion, toUpdate: [] })
    ),
    syncSettings: vi.fn(async (request: VersionedRequest) =>
      success({ settingsChanged: false, version: request.sinceVersion })
    ),
    loadDeletions: vi.fn(async (request: VersionedRequest) =>
      success({ collections: [], items: [], searches: [], tags: [], version: request.sinceVersion })
    ),
    syncBatches: vi.fn(async () => success({ failedKeys: [], parseErrors: [] })),
    markForResync: vi.fn(async () => {}),
    storeVersion: vi.fn(async () => {}),
    storeDeletionVersion: vi.fn(async () => {}),
    performDeletions: vi.fn(async (): Promise<string[]> => []),
    restoreDeletions: vi.fn(async () => {}),
    markChangesAsResolved: vi.fn(async () => {}),
    markGroupAsLocalOnly: vi.fn(async () => {}),
    deleteGroup: vi.fn(async () => {}),
    revertLibraryUpdates: vi.fn(async () => {}),
    revertLibraryFiles: vi.fn(async () => {}),
    submitUpdate: vi.fn(async (batch: WriteBatch) => success({ version: batch.version, failure: null })),
    submitDeletion: vi.fn(async (batch: DeleteBatch) =>
      success({ version: batch.version, didCreateDeletions: false })
    ),
    loadUploads: vi.fn(async (): Promise<AttachmentUpload[]> => []),
    uploadAttachment: vi.fn(async () => ({ result: success(undefined), failedBeforeReachingBackend: false })),
    fixUpload: vi.fn(async () => {}),
    markItemForUpload: vi.fn(async () => {}),
    performWebDavDeletions: vi.fn(async (): Promise<string[]> => []),
    ...overrides,
  };
}

/**
 * Controller whose syncs start with the given actions
 */
export function createTestController(
  executor: SyncActionExecutor,
  initialActions?: Action[],
  maxRetryCount = 3
): SyncController {
  const actionsCreator = new DefaultActionsCreator();
  if (initialActions) {
    vi.spyOn(actionsCreator, 'createInitialActions').mockReturnValue(initialActions);
  }
  return new SyncController({ actionsCreator, executor }, { userId: 42, maxRetryCount, logger: false });
}

/**
 * Next outcome of the controller; subscribe before starting the sync
 */
export function nextOutcome(controller: SyncController): Promise<SyncOutcome> {
  return firstValueFrom(controller.getOutcomes());
}

export function writeBatch(key: string, version = 10, libraryId: LibraryIdentifier = MY_LIBRARY): WriteBatch {
  return {
    libraryId,
    object: 'item',
    version,
    parameters: [{ key, title: `Title ${key}` }],
    changeUuids: { [key]: [`uuid-${key}`] },
  };
}

export function attachmentUpload(key: string, libraryId: LibraryIdentifier = MY_LIBRARY): AttachmentUpload {
  return {
    libraryId,
    key,
    filename: `${key}.pdf`,
    contentType: 'application/pdf',
    md5: `md5-${key}`,
    mtime: 1000,
    file: `/tmp/${key}.pdf`,
    oldMd5: null,
  };
}

export function libraryData(overrides: Partial<LibraryData> = {}): LibraryData {
  return {
    identifier: MY_LIBRARY,
    name: 'My Library',
    versions: { collections: 1, searches: 1, items: 1, trash: 1, deletions: 1, settings: 1 },
    canEditMetadata: true,
    canEditFiles: true,
    updates: [],
    deletions: [],
    hasUpload: false,
    hasWebDavDeletions: false,
    ...overrides,
  };
}

/**
 * Promise with its resolver exposed
 */
export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

/**
 * Let pending promise callbacks run
 */
export function flushPromises(): Promise<void> {
  return new Promise((done) => setTimeout(done, 0));
}
