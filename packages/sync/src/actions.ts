import { groupLibrary, type Libraries, type LibraryIdentifier, type SyncObject } from '@folio/core';
import type {
  AttachmentUpload,
  CreateLibraryActionsOptions,
  DeleteBatch,
  DeletionConflictMode,
  DownloadBatch,
  WriteBatch,
} from './types.js';

/**
 * A unit of work in the sync queue.
 *
 * Actions run strictly one at a time. Each belongs to a library (see
 * {@link actionLibraryId}) and the order of actions of one library is
 * significant: version checks come before the downloads they produce,
 * write batches carry versions forward to the next write batch.
 */
export type Action =
  | { type: 'load-key-permissions' }
  | {
      type: 'create-library-actions';
      libraries: Libraries;
      options: CreateLibraryActionsOptions;
    }
  | { type: 'sync-group-versions' }
  | { type: 'sync-group-to-db'; groupId: number }
  | { type: 'resolve-deleted-group'; groupId: number; name: string }
  | { type: 'resolve-group-metadata-write-permission'; groupId: number; name: string }
  | { type: 'resolve-group-file-write-permission'; groupId: number; name: string }
  | {
      type: 'sync-versions';
      libraryId: LibraryIdentifier;
      object: SyncObject;
      version: number;
      checkRemote: boolean;
    }
  | { type: 'sync-settings'; libraryId: LibraryIdentifier; version: number }
  | { type: 'sync-deletions'; libraryId: LibraryIdentifier; version: number }
  | { type: 'sync-batches-to-db'; batches: DownloadBatch[] }
  | { type: 'store-version'; libraryId: LibraryIdentifier; object: SyncObject; version: number }
  | { type: 'store-deletion-version'; libraryId: LibraryIdentifier; version: number }
  | { type: 'submit-write-batch'; batch: WriteBatch }
  | { type: 'submit-delete-batch'; batch: DeleteBatch }
  | {
      type: 'create-upload-actions';
      libraryId: LibraryIdentifier;
      hadOtherWriteActions: boolean;
      canEditFiles: boolean;
    }
  | { type: 'upload-attachment'; upload: AttachmentUpload }
  | {
      type: 'perform-deletions';
      libraryId: LibraryIdentifier;
      collections: string[];
      items: string[];
      searches: string[];
      tags: string[];
      conflictMode: DeletionConflictMode;
    }
  | { type: 'restore-deletions'; libraryId: LibraryIdentifier; collections: string[]; items: string[] }
  | { type: 'mark-changes-as-resolved'; libraryId: LibraryIdentifier }
  | { type: 'mark-group-as-local-only'; groupId: number }
  | { type: 'delete-group'; groupId: number }
  | { type: 'revert-library-to-original'; libraryId: LibraryIdentifier }
  | { type: 'revert-library-files-to-original'; libraryId: LibraryIdentifier }
  | { type: 'fix-upload'; key: string; libraryId: LibraryIdentifier }
  | { type: 'remove-actions'; libraryId: LibraryIdentifier }
  | { type: 'perform-webdav-deletions'; libraryId: LibraryIdentifier };

/**
 * Discriminator of an action
 */
export type ActionType = Action['type'];

/**
 * Action variant with the given discriminator
 */
export type ActionOf<T extends ActionType> = Extract<Action, { type: T }>;

/**
 * Library an action belongs to, or `null` for library-agnostic actions
 */
export function actionLibraryId(action: Action): LibraryIdentifier | null {
  switch (action.type) {
    case 'load-key-permissions':
    case 'sync-group-versions':
    case 'create-library-actions':
      return null;

    case 'sync-group-to-db':
    case 'resolve-deleted-group':
    case 'resolve-group-metadata-write-permission':
    case 'resolve-group-file-write-permission':
    case 'mark-group-as-local-only':
    case 'delete-group':
      return groupLibrary(action.groupId);

    case 'sync-batches-to-db':
      return action.batches[0]?.libraryId ?? null;

    case 'submit-write-batch':
    case 'submit-delete-batch':
      return action.batch.libraryId;

    case 'upload-attachment':
      return action.upload.libraryId;

    case 'sync-versions':
    case 'sync-settings':
    case 'sync-deletions':
    case 'store-version':
    case 'store-deletion-version':
    case 'create-upload-actions':
    case 'perform-deletions':
    case 'restore-deletions':
    case 'mark-changes-as-resolved':
    case 'revert-library-to-original':
    case 'revert-library-files-to-original':
    case 'fix-upload':
    case 'remove-actions':
    case 'perform-webdav-deletions':
      return action.libraryId;
  }
}

/**
 * Keys of the objects serialized in a write batch
 */
export function writeBatchKeys(batch: WriteBatch): string[] {
  return batch.parameters.flatMap((parameters) =>
    typeof parameters.key === 'string' ? [parameters.key] : []
  );
}
