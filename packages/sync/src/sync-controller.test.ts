import {
  ALL_LIBRARIES,
  MY_LIBRARY,
  ParsingError,
  StorageError,
  codeError,
  groupLibrary,
  networkError,
  success,
  type LibraryIdentifier,
  type SyncObject,
} from '@folio/core';
import { afterEach, describe, expect, it, vi } from 'vitest';
import type { Action } from './actions.js';
import type { SyncController } from './sync-controller.js';
import { SyncActionError } from './sync-error.js';
import {
  createExecutor,
  createTestController,
  deferred,
  flushPromises,
  nextOutcome,
  writeBatch,
} from './__tests__/fixtures.js';

describe('SyncController', () => {
  let controller: SyncController | undefined;

  afterEach(() => {
    controller?.destroy();
    controller = undefined;
  });

  describe('lifecycle', () => {
    it('starts idle', () => {
      controller = createTestController(createExecutor(), []);
      expect(controller.isSyncing).toBe(false);
      expect(controller.getCurrentProgress()).toEqual({ state: 'idle' });
      expect(controller.getQueue()).toEqual([]);
    });

    it('runs the queued actions in order and finishes', async () => {
      const order: string[] = [];
      const executor = createExecutor({
        storeVersion: vi.fn(async (_libraryId: LibraryIdentifier, object: SyncObject) => {
          order.push(`version:${object}`);
        }),
        storeDeletionVersion: vi.fn(async () => {
          order.push('deletions');
        }),
      });
      controller = createTestController(executor, [
        { type: 'store-version', libraryId: MY_LIBRARY, object: 'item', version: 5 },
        { type: 'store-version', libraryId: MY_LIBRARY, object: 'collection', version: 5 },
        { type: 'store-deletion-version', libraryId: MY_LIBRARY, version: 6 },
      ]);

      const outcome = nextOutcome(controller);
      controller.start('normal', ALL_LIBRARIES);

      expect(await outcome).toEqual({
        status: 'finished',
        sessionId: expect.any(Number),
        kind: 'normal',
        libraries: ALL_LIBRARIES,
        retryAttempt: 0,
        fatalError: null,
        errors: [],
        retry: null,
      });
      expect(order).toEqual(['version:item', 'version:collection', 'deletions']);
      expect(controller.isSyncing).toBe(false);
      expect(controller.getCurrentProgress()).toMatchObject({ state: 'finished', errors: 0 });
    });

    it('runs one action at a time', async () => {
      const gate = deferred();
      const executor = createExecutor({ storeVersion: vi.fn(() => gate.promise) });
      controller = createTestController(executor, [
        { type: 'store-version', libraryId: MY_LIBRARY, object: 'item', version: 5 },
        { type: 'store-deletion-version', libraryId: MY_LIBRARY, version: 6 },
      ]);

      const outcome = nextOutcome(controller);
      controller.start();
      await flushPromises();

      expect(controller.isSyncing).toBe(true);
      expect(executor.storeDeletionVersion).not.toHaveBeenCalled();
      expect(controller.getQueue()).toEqual([{ type: 'store-deletion-version', libraryId: MY_LIBRARY, version: 6 }]);
      expect(controller.getCurrentProgress()).toMatchObject({
        state: 'running',
        action: 'store-version',
        queued: 1,
      });

      gate.resolve();
      expect((await outcome).status).toBe('finished');
      expect(executor.storeDeletionVersion).toHaveBeenCalledWith(MY_LIBRARY, 6);
    });

    it('ignores start while a sync runs', async () => {
      const gate = deferred();
      const executor = createExecutor({ storeVersion: vi.fn(() => gate.promise) });
      controller = createTestController(executor, [
        { type: 'store-version', libraryId: MY_LIBRARY, object: 'item', version: 5 },
      ]);

      const outcome = nextOutcome(controller);
      controller.start('normal');
      controller.start('full');
      gate.resolve();

      expect((await outcome).kind).toBe('normal');
      expect(executor.storeVersion).toHaveBeenCalledTimes(1);
    });

    it('reports a cancelled sync and drops the remaining actions', async () => {
      const gate = deferred();
      const executor = createExecutor({ storeVersion: vi.fn(() => gate.promise) });
      controller = createTestController(executor, [
        { type: 'store-version', libraryId: MY_LIBRARY, object: 'item', version: 5 },
        { type: 'store-version', libraryId: MY_LIBRARY, object: 'collection', version: 5 },
        { type: 'store-version', libraryId: MY_LIBRARY, object: 'search', version: 5 },
        { type: 'store-deletion-version', libraryId: MY_LIBRARY, version: 6 },
      ]);

      const outcome = nextOutcome(controller);
      controller.start();
      controller.cancel();

      expect(await outcome).toMatchObject({
        status: 'cancelled',
        fatalError: { kind: 'cancelled' },
        errors: [],
        retry: null,
      });
      expect(controller.isSyncing).toBe(false);
      expect(controller.getQueue()).toEqual([]);

      gate.resolve();
      await flushPromises();
      expect(executor.storeVersion).toHaveBeenCalledTimes(1);
      expect(executor.storeDeletionVersion).not.toHaveBeenCalled();
    });

    it('drops a resolution without a running sync', () => {
      const executor = createExecutor();
      controller = createTestController(executor, []);

      controller.enqueueResolution({ type: 'delete-group', groupId: 3 });

      expect(controller.isSyncing).toBe(false);
      expect(executor.deleteGroup).not.toHaveBeenCalled();
    });
  });

  describe('fatal errors', () => {
    it('aborts on a storage failure without a retry', async () => {
      const executor = createExecutor({
        storeVersion: vi.fn(async () => {
          throw new StorageError('disk full');
        }),
      });
      controller = createTestController(executor, [
        { type: 'store-version', libraryId: MY_LIBRARY, object: 'item', version: 5 },
        { type: 'store-version', libraryId: MY_LIBRARY, object: 'collection', version: 5 },
        { type: 'store-deletion-version', libraryId: MY_LIBRARY, version: 6 },
      ]);

      const outcome = nextOutcome(controller);
      controller.start();

      expect(await outcome).toMatchObject({
        status: 'aborted',
        fatalError: { kind: 'db-error' },
        errors: [],
        retry: null,
      });
      expect(executor.storeVersion).toHaveBeenCalledTimes(1);
      expect(executor.storeDeletionVersion).not.toHaveBeenCalled();
      expect(controller.getQueue()).toEqual([]);
      expect(controller.getCurrentProgress()).toMatchObject({ state: 'aborted', error: { kind: 'db-error' } });
    });

    it('falls back to a permission failure for transient errors', async () => {
      const executor = createExecutor({ loadKeyPermissions: vi.fn(async () => networkError(500)) });
      controller = createTestController(executor, [{ type: 'load-key-permissions' }]);

      const outcome = nextOutcome(controller);
      controller.start('keys-only');

      expect((await outcome).fatalError).toEqual({ kind: 'permission-loading-failed' });
    });

    it('keeps fatal permission failures', async () => {
      const executor = createExecutor({ loadKeyPermissions: vi.fn(async () => networkError(403)) });
      controller = createTestController(executor, [{ type: 'load-key-permissions' }]);

      const outcome = nextOutcome(controller);
      controller.start('keys-only');

      expect((await outcome).fatalError).toEqual({ kind: 'forbidden' });
    });

    it('requests a single full sync after an object conflict', async () => {
      const executor = createExecutor({
        submitUpdate: vi.fn(async () => codeError(new SyncActionError({ kind: 'object-precondition-error' }))),
      });
      controller = createTestController(executor, [{ type: 'submit-write-batch', batch: writeBatch('AAAA1111') }]);

      const outcome = nextOutcome(controller);
      controller.start('normal', ALL_LIBRARIES, 1);

      expect(await outcome).toMatchObject({
        status: 'aborted',
        fatalError: {
          kind: 'upload-object-conflict',
          data: { libraryId: MY_LIBRARY, objectType: 'item', keys: ['AAAA1111'] },
        },
        retry: { kind: 'full', libraries: ALL_LIBRARIES, retryAttempt: 2, retryOnce: true },
      });
    });
  });

  describe('non-fatal errors', () => {
    it('skips the rest of a library after a precondition failure and retries it', async () => {
      const executor = createExecutor({ submitUpdate: vi.fn(async () => networkError(412)) });
      controller = createTestController(executor, [
        { type: 'submit-write-batch', batch: writeBatch('AAAA1111') },
        { type: 'store-version', libraryId: MY_LIBRARY, object: 'item', version: 3 },
        { type: 'store-version', libraryId: groupLibrary(2), object: 'item', version: 4 },
      ]);

      const outcome = nextOutcome(controller);
      controller.start();

      expect(await outcome).toMatchObject({
        status: 'finished',
        errors: [],
        retry: {
          kind: 'prioritize-downloads',
          libraries: { type: 'specific', identifiers: [MY_LIBRARY] },
          retryAttempt: 1,
          retryOnce: true,
        },
      });
      expect(executor.storeVersion).toHaveBeenCalledTimes(1);
      expect(executor.storeVersion).toHaveBeenCalledWith(groupLibrary(2), 'item', 4);
    });

    it('reports the errors once retries are exhausted', async () => {
      const executor = createExecutor({ submitUpdate: vi.fn(async () => networkError(412)) });
      controller = createTestController(executor, [{ type: 'submit-write-batch', batch: writeBatch('AAAA1111') }]);

      const outcome = nextOutcome(controller);
      controller.start('normal', ALL_LIBRARIES, 3);

      expect(await outcome).toMatchObject({
        status: 'finished',
        errors: [{ kind: 'precondition-failed', libraryId: MY_LIBRARY }],
        retry: null,
      });
    });

    it('records unexpected failures and continues', async () => {
      const executor = createExecutor({
        syncVersions: vi.fn(async () => {
          throw new Error('boom');
        }),
      });
      controller = createTestController(executor, [
        { type: 'sync-versions', libraryId: MY_LIBRARY, object: 'item', version: 2, checkRemote: true },
        { type: 'store-deletion-version', libraryId: MY_LIBRARY, version: 6 },
      ]);

      const outcome = nextOutcome(controller);
      controller.start();

      expect((await outcome).errors).toEqual([
        { kind: 'unknown', message: 'boom', data: { libraryId: MY_LIBRARY, keys: [] } },
      ]);
      expect(executor.storeDeletionVersion).toHaveBeenCalledWith(MY_LIBRARY, 6);
    });

    it('records parse errors and marks failed keys for resync', async () => {
      const executor = createExecutor({
        syncBatches: vi.fn(async () =>
          success({ failedKeys: ['K2'], parseErrors: [new ParsingError('bad json')] })
        ),
      });
      controller = createTestController(executor, [
        {
          type: 'sync-batches-to-db',
          batches: [{ libraryId: MY_LIBRARY, object: 'item', keys: ['K1', 'K2'], version: 9 }],
        },
      ]);

      const outcome = nextOutcome(controller);
      controller.start();

      expect((await outcome).errors).toEqual([
        {
          kind: 'parsing',
          message: 'bad json',
          data: { libraryId: MY_LIBRARY, objectType: 'item', keys: ['K2'] },
        },
      ]);
      expect(executor.markForResync).toHaveBeenCalledWith(MY_LIBRARY, 'item', ['K2']);
    });
  });

  describe('unchanged libraries', () => {
    const libraryActions = (): Action[] => [
      { type: 'sync-settings', libraryId: MY_LIBRARY, version: 6 },
      { type: 'sync-versions', libraryId: MY_LIBRARY, object: 'collection', version: 1, checkRemote: true },
      { type: 'sync-versions', libraryId: MY_LIBRARY, object: 'item', version: 7, checkRemote: true },
      { type: 'sync-deletions', libraryId: MY_LIBRARY, version: 6 },
      { type: 'store-deletion-version', libraryId: MY_LIBRARY, version: 6 },
    ];

    it('skips remote checks that cannot find anything new', async () => {
      const executor = createExecutor({ syncSettings: vi.fn(async () => networkError(304)) });
      controller = createTestController(executor, libraryActions());

      const outcome = nextOutcome(controller);
      controller.start();

      expect((await outcome).errors).toEqual([]);
      expect(executor.syncVersions).toHaveBeenCalledTimes(2);
      expect(executor.syncVersions).toHaveBeenNthCalledWith(
        1,
        expect.objectContaining({ object: 'collection', checkRemote: true, currentVersion: 6 })
      );
      expect(executor.syncVersions).toHaveBeenNthCalledWith(
        2,
        expect.objectContaining({ object: 'item', checkRemote: false, currentVersion: 6 })
      );
      expect(executor.loadDeletions).not.toHaveBeenCalled();
      expect(executor.storeDeletionVersion).not.toHaveBeenCalled();
    });

    it('keeps every action in a full sync', async () => {
      const executor = createExecutor({ syncSettings: vi.fn(async () => networkError(304)) });
      controller = createTestController(executor, libraryActions());

      const outcome = nextOutcome(controller);
      controller.start('full');
      await outcome;

      expect(executor.syncVersions).toHaveBeenNthCalledWith(
        2,
        expect.objectContaining({ object: 'item', checkRemote: true })
      );
      expect(executor.performDeletions).toHaveBeenCalledWith({
        libraryId: MY_LIBRARY,
        collections: [],
        items: [],
        searches: [],
        tags: [],
        conflictMode: 'restore-conflicts',
      });
      expect(executor.storeDeletionVersion).toHaveBeenCalledWith(MY_LIBRARY, 6);
    });

    it('forgets the returned version when the next library starts', async () => {
      const executor = createExecutor({ syncSettings: vi.fn(async () => networkError(304)) });
      controller = createTestController(executor, [
        { type: 'sync-settings', libraryId: MY_LIBRARY, version: 6 },
        { type: 'sync-versions', libraryId: groupLibrary(2), object: 'item', version: 3, checkRemote: true },
      ]);

      const outcome = nextOutcome(controller);
      controller.start();
      await outcome;

      expect(executor.syncVersions).toHaveBeenCalledWith(
        expect.objectContaining({ libraryId: groupLibrary(2), currentVersion: null, checkRemote: true })
      );
    });
  });

  describe('write batches', () => {
    it('carries the returned version into the next write batch', async () => {
      const executor = createExecutor();
      vi.mocked(executor.submitUpdate).mockResolvedValueOnce(success({ version: 11, failure: null }));
      controller = createTestController(executor, [
        { type: 'submit-write-batch', batch: writeBatch('AAAA1111', 10) },
        { type: 'submit-write-batch', batch: writeBatch('BBBB2222', 10) },
      ]);

      const outcome = nextOutcome(controller);
      controller.start();
      await outcome;

      expect(executor.submitUpdate).toHaveBeenNthCalledWith(2, { ...writeBatch('BBBB2222'), version: 11 });
    });

    it('removes WebDAV files after deletions that left some behind', async () => {
      const order: string[] = [];
      const executor = createExecutor({
        submitDeletion: vi.fn(async () => success({ version: 6, didCreateDeletions: true })),
        storeVersion: vi.fn(async (libraryId: LibraryIdentifier) => {
          order.push(`version:${libraryId.type}`);
        }),
        performWebDavDeletions: vi.fn(async (): Promise<string[]> => {
          order.push('webdav');
          return [];
        }),
      });
      controller = createTestController(executor, [
        {
          type: 'submit-delete-batch',
          batch: { libraryId: MY_LIBRARY, object: 'item', version: 5, keys: ['K1'] },
        },
        { type: 'store-version', libraryId: MY_LIBRARY, object: 'item', version: 5 },
        { type: 'store-version', libraryId: groupLibrary(2), object: 'item', version: 1 },
      ]);

      const outcome = nextOutcome(controller);
      controller.start();
      await outcome;

      expect(order).toEqual(['version:custom', 'webdav', 'version:group']);
    });

    it('does not queue WebDAV removal twice', async () => {
      const executor = createExecutor({
        submitDeletion: vi.fn(async () => success({ version: 6, didCreateDeletions: true })),
      });
      controller = createTestController(executor, [
        {
          type: 'submit-delete-batch',
          batch: { libraryId: MY_LIBRARY, object: 'item', version: 5, keys: ['K1'] },
        },
        { type: 'perform-webdav-deletions', libraryId: MY_LIBRARY },
      ]);

      const outcome = nextOutcome(controller);
      controller.start();
      await outcome;

      expect(executor.performWebDavDeletions).toHaveBeenCalledTimes(1);
    });

    it('records files that could not be removed from WebDAV', async () => {
      const executor = createExecutor({
        performWebDavDeletions: vi.fn(async () => ['K1', 'K2']),
      });
      controller = createTestController(executor, [{ type: 'perform-webdav-deletions', libraryId: MY_LIBRARY }]);

      const outcome = nextOutcome(controller);
      controller.start();

      expect((await outcome).errors).toEqual([{ kind: 'webdav-deletion', count: 2, libraryId: MY_LIBRARY }]);
    });
  });
});
