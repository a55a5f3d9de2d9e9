import type { Libraries, LibraryIdentifier, SyncObject } from '@folio/core';

/**
 * Scope and strategy of a sync attempt
 */
export type SyncKind =
  | 'normal'
  | 'full'
  | 'keys-only'
  | 'prioritize-downloads'
  | 'collections-only'
  | 'ignore-individual-delays';

/**
 * Which halves of a library sync `create-library-actions` may produce
 */
export type CreateLibraryActionsOptions =
  | 'automatic'
  | 'only-writes'
  | 'only-downloads'
  | 'force-downloads';

/**
 * How local changes are treated when remotely deleted objects are removed
 */
export type DeletionConflictMode = 'resolve-conflicts' | 'delete-conflicts' | 'restore-conflicts';

/**
 * Keys of one object type to download and store in a single request
 */
export interface DownloadBatch {
  libraryId: LibraryIdentifier;
  object: SyncObject;
  keys: string[];
  version: number;
}

/**
 * Local changes submitted in a single write request
 */
export interface WriteBatch {
  libraryId: LibraryIdentifier;
  object: SyncObject;
  /** Library version sent as `If-Unmodified-Since-Version` */
  version: number;
  /** Serialized objects; each carries its `key` */
  parameters: Record<string, unknown>[];
  /** Local change identifiers per object key, cleared after a successful submit */
  changeUuids: Record<string, string[]>;
}

/**
 * Local deletions submitted in a single delete request
 */
export interface DeleteBatch {
  libraryId: LibraryIdentifier;
  object: SyncObject;
  version: number;
  keys: string[];
}

/**
 * An attachment file waiting to be uploaded
 */
export interface AttachmentUpload {
  libraryId: LibraryIdentifier;
  key: string;
  filename: string;
  contentType: string;
  md5: string;
  mtime: number;
  /** Path of the file in local storage */
  file: string;
  /** Hash of the previously uploaded file, when replacing one */
  oldMd5: string | null;
}

/**
 * Access rights granted by the API key for a library
 */
export interface LibraryAccess {
  library: boolean;
  notes: boolean;
  files: boolean;
  write: boolean;
}

/**
 * Access rights of the API key, loaded at the start of every sync
 */
export interface AccessPermissions {
  user: LibraryAccess;
  groupDefault: LibraryAccess | null;
  groups: Record<number, LibraryAccess>;
}

/**
 * Locally stored versions of a library
 */
export interface Versions {
  collections: number;
  searches: number;
  items: number;
  trash: number;
  deletions: number;
  settings: number;
}

/**
 * Local state of one library, used to derive its sync actions
 */
export interface LibraryData {
  identifier: LibraryIdentifier;
  name: string;
  versions: Versions;
  canEditMetadata: boolean;
  canEditFiles: boolean;
  updates: WriteBatch[];
  deletions: DeleteBatch[];
  hasUpload: boolean;
  hasWebDavDeletions: boolean;
}

/**
 * Request to run another sync, emitted when a finished or aborted sync
 * should be retried with a narrower scope
 */
export interface SyncDirective {
  kind: SyncKind;
  libraries: Libraries;
  retryAttempt: number;
  /** The retried sync must not schedule a retry of its own */
  retryOnce: boolean;
}

/**
 * Object keys that failed to download or parse within a batch action
 */
export interface BatchSyncResult {
  failedKeys: string[];
  parseErrors: unknown[];
}

/**
 * Object keys deleted remotely since a version
 */
export interface RemoteDeletions {
  collections: string[];
  items: string[];
  searches: string[];
  tags: string[];
  version: number;
}

/**
 * A group the user lost access to
 */
export interface RemovedGroup {
  groupId: number;
  name: string;
}
