import type { ApiError, ApiResult, Libraries, LibraryIdentifier, SyncObject } from '@folio/core';
import type { Action, ActionOf } from './actions.js';
import type {
  AccessPermissions,
  AttachmentUpload,
  BatchSyncResult,
  CreateLibraryActionsOptions,
  DeleteBatch,
  DownloadBatch,
  LibraryData,
  RemoteDeletions,
  RemovedGroup,
  SyncKind,
  WriteBatch,
} from './types.js';

/**
 * Actions derived from local library state
 */
export interface LibraryActions {
  actions: Action[];
  /** Queue position to insert at; appended when omitted */
  queueIndex?: number;
  /** Number of write actions among `actions` */
  writeCount: number;
}

/**
 * Builds the actions a sync runs
 */
export interface ActionsCreator {
  createInitialActions(libraries: Libraries, kind: SyncKind): Action[];

  createBatchedObjectActions(
    libraryId: LibraryIdentifier,
    object: SyncObject,
    keys: string[],
    version: number,
    shouldStoreVersion: boolean,
    kind: SyncKind
  ): Action[];

  createLibraryActions(
    data: LibraryData[],
    options: CreateLibraryActionsOptions,
    kind: SyncKind
  ): LibraryActions;

  createGroupActions(
    toUpdate: number[],
    toRemove: RemovedGroup[],
    kind: SyncKind,
    libraries: Libraries
  ): Action[];
}

export interface LoadLibraryDataRequest {
  libraries: Libraries;
  /** Load pending local changes */
  fetchUpdates: boolean;
  /** Load stored versions; a full sync starts from version 0 */
  loadVersions: boolean;
}

/**
 * Request against a library's versioned endpoint
 */
export interface VersionedRequest {
  userId: number;
  libraryId: LibraryIdentifier;
  sinceVersion: number;
  /** Library version returned earlier in this run of library actions */
  currentVersion: number | null;
}

export interface SyncVersionsRequest extends VersionedRequest {
  object: SyncObject;
  kind: SyncKind;
  /** Delays, in seconds, for objects that failed to sync before */
  delayIntervals: readonly number[];
  /** Compare remote versions even when the library version is unchanged */
  checkRemote: boolean;
}

export interface SyncVersionsResponse {
  /** Library version of the listing */
  version: number;
  /** Keys of objects to download */
  toUpdate: string[];
}

export interface GroupVersionsResponse {
  toUpdate: number[];
  toRemove: RemovedGroup[];
}

export interface SyncSettingsResponse {
  settingsChanged: boolean;
  version: number;
}

export interface SubmitUpdateResponse {
  version: number;
  /** Failure of some of the submitted objects */
  failure: ApiError | null;
}

export interface SubmitDeletionResponse {
  version: number;
  /** Whether the deletion left attachment files to remove from WebDAV */
  didCreateDeletions: boolean;
}

export interface AttachmentUploadResult {
  result: ApiResult<void>;
  /** The upload failed before any request reached the backend */
  failedBeforeReachingBackend: boolean;
}

export type PerformDeletionsRequest = Omit<ActionOf<'perform-deletions'>, 'type'>;

/**
 * Concrete remote and local operations run by sync actions.
 *
 * Remote calls report failures through {@link ApiResult}. Local calls throw,
 * with a `StorageError` when the object store fails.
 */
export interface SyncActionExecutor {
  loadKeyPermissions(): Promise<ApiResult<AccessPermissions>>;
  loadLibraryData(request: LoadLibraryDataRequest): Promise<LibraryData[]>;

  syncGroupVersions(): Promise<ApiResult<GroupVersionsResponse>>;
  fetchAndStoreGroup(groupId: number, userId: number): Promise<ApiResult<void>>;
  markGroupForResync(groupId: number): Promise<void>;
  readGroupName(groupId: number): Promise<string | null>;

  syncVersions(request: SyncVersionsRequest): Promise<ApiResult<SyncVersionsResponse>>;
  syncSettings(request: VersionedRequest): Promise<ApiResult<SyncSettingsResponse>>;
  loadDeletions(request: VersionedRequest): Promise<ApiResult<RemoteDeletions>>;
  syncBatches(batches: DownloadBatch[]): Promise<ApiResult<BatchSyncResult>>;
  markForResync(libraryId: LibraryIdentifier, object: SyncObject, keys: string[]): Promise<void>;

  storeVersion(libraryId: LibraryIdentifier, object: SyncObject, version: number): Promise<void>;
  storeDeletionVersion(libraryId: LibraryIdentifier, version: number): Promise<void>;

  /** @returns keys of locally changed items that were kept */
  performDeletions(request: PerformDeletionsRequest): Promise<string[]>;
  restoreDeletions(libraryId: LibraryIdentifier, collections: string[], items: string[]): Promise<void>;
  markChangesAsResolved(libraryId: LibraryIdentifier): Promise<void>;
  markGroupAsLocalOnly(groupId: number): Promise<void>;
  deleteGroup(groupId: number): Promise<void>;
  revertLibraryUpdates(libraryId: LibraryIdentifier): Promise<void>;
  revertLibraryFiles(libraryId: LibraryIdentifier): Promise<void>;

  submitUpdate(batch: WriteBatch): Promise<ApiResult<SubmitUpdateResponse>>;
  submitDeletion(batch: DeleteBatch): Promise<ApiResult<SubmitDeletionResponse>>;
  loadUploads(libraryId: LibraryIdentifier): Promise<AttachmentUpload[]>;
  uploadAttachment(upload: AttachmentUpload): Promise<AttachmentUploadResult>;
  fixUpload(key: string, libraryId: LibraryIdentifier): Promise<void>;
  markItemForUpload(key: string, libraryId: LibraryIdentifier): Promise<void>;

  /** @returns keys whose files could not be removed */
  performWebDavDeletions(libraryId: LibraryIdentifier): Promise<string[]>;
}
