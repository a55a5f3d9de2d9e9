import { FolioError, libraryKey, type LibraryIdentifier, type SyncObject } from '@folio/core';

/**
 * Diagnostic data attached to sync errors: which library and objects were
 * affected. Also used to build follow-up actions.
 */
export interface ErrorData {
  readonly libraryId: LibraryIdentifier;
  readonly objectType?: SyncObject;
  readonly keys: readonly string[];
}

export function errorData(
  libraryId: LibraryIdentifier,
  objectType?: SyncObject,
  keys: readonly string[] = []
): ErrorData {
  return objectType === undefined ? { libraryId, keys } : { libraryId, objectType, keys };
}

/**
 * Errors that abort the whole sync
 */
export type FatalError =
  | { readonly kind: 'permission-loading-failed' }
  | { readonly kind: 'all-libraries-fetch-failed' }
  | { readonly kind: 'group-sync-failed' }
  | { readonly kind: 'upload-object-conflict'; readonly data: ErrorData }
  | { readonly kind: 'cant-submit-attachment-item'; readonly data: ErrorData }
  | { readonly kind: 'db-error' }
  | { readonly kind: 'service-unavailable' }
  | { readonly kind: 'forbidden' }
  | { readonly kind: 'api-error'; readonly response: string; readonly data: ErrorData }
  | { readonly kind: 'cancelled' };

/**
 * Errors that are recorded while the sync continues
 */
export type NonFatalError =
  | { readonly kind: 'version-mismatch'; readonly libraryId: LibraryIdentifier }
  | { readonly kind: 'unchanged' }
  | { readonly kind: 'precondition-failed'; readonly libraryId: LibraryIdentifier }
  | { readonly kind: 'quota-limit'; readonly libraryId: LibraryIdentifier }
  | { readonly kind: 'insufficient-space' }
  | {
      readonly kind: 'attachment-missing';
      readonly key: string;
      readonly libraryId: LibraryIdentifier;
      readonly title: string;
    }
  | {
      readonly kind: 'annotation-did-split';
      readonly message: string;
      readonly keys: readonly string[];
      readonly libraryId: LibraryIdentifier;
    }
  | { readonly kind: 'schema'; readonly message: string; readonly data: ErrorData }
  | { readonly kind: 'parsing'; readonly message: string; readonly data: ErrorData }
  | { readonly kind: 'api-error'; readonly response: string; readonly data: ErrorData }
  | { readonly kind: 'unknown'; readonly message: string; readonly data: ErrorData }
  | { readonly kind: 'webdav-deletion'; readonly count: number; readonly libraryId: LibraryIdentifier }
  | {
      readonly kind: 'webdav-deletion-failed';
      readonly message: string;
      readonly libraryId: LibraryIdentifier;
    };

/**
 * Classified sync failure
 */
export type SyncError =
  | { readonly type: 'fatal'; readonly error: FatalError }
  | { readonly type: 'non-fatal'; readonly error: NonFatalError };

export function fatal(error: FatalError): SyncError {
  return { type: 'fatal', error };
}

export function nonFatal(error: NonFatalError): SyncError {
  return { type: 'non-fatal', error };
}

const FATAL_KINDS: Record<FatalError['kind'], true> = {
  'permission-loading-failed': true,
  'all-libraries-fetch-failed': true,
  'group-sync-failed': true,
  'upload-object-conflict': true,
  'cant-submit-attachment-item': true,
  'db-error': true,
  'service-unavailable': true,
  forbidden: true,
  'api-error': true,
  cancelled: true,
};

const NON_FATAL_KINDS: Record<NonFatalError['kind'], true> = {
  'version-mismatch': true,
  unchanged: true,
  'precondition-failed': true,
  'quota-limit': true,
  'insufficient-space': true,
  'attachment-missing': true,
  'annotation-did-split': true,
  schema: true,
  parsing: true,
  'api-error': true,
  unknown: true,
  'webdav-deletion': true,
  'webdav-deletion-failed': true,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Whether a value is an already classified {@link SyncError}
 */
export function isSyncError(value: unknown): value is SyncError {
  if (!isRecord(value) || !isRecord(value.error)) return false;
  const kind = value.error.kind;
  if (typeof kind !== 'string') return false;
  if (value.type === 'fatal') return Object.hasOwn(FATAL_KINDS, kind);
  if (value.type === 'non-fatal') return Object.hasOwn(NON_FATAL_KINDS, kind);
  return false;
}

/**
 * Short human readable description of a sync error, for logs
 */
export function describeSyncError(error: SyncError): string {
  const { kind } = error.error;
  const prefix = error.type === 'fatal' ? 'Fatal' : 'Non-fatal';
  if ('libraryId' in error.error) {
    return `${prefix} ${kind} (${libraryKey(error.error.libraryId)})`;
  }
  if ('data' in error.error) {
    return `${prefix} ${kind} (${libraryKey(error.error.data.libraryId)})`;
  }
  return `${prefix} ${kind}`;
}

/**
 * Throwable carrier of a classified sync error.
 *
 * Collaborators throw it from inside an action (for example a version
 * listing that notices the library version moved) and the classifier passes
 * the carried error through unchanged.
 */
export class SyncFailure extends FolioError {
  readonly syncError: SyncError;

  constructor(syncError: SyncError, cause?: Error) {
    super({
      code: 'FOLIO_C500',
      message: describeSyncError(syncError),
      context: { type: syncError.type, kind: syncError.error.kind },
      cause,
    });
    this.name = 'SyncFailure';
    this.syncError = syncError;
  }
}

/**
 * Failures reported by individual sync actions
 */
export type SyncActionErrorReason =
  | {
      readonly kind: 'attachment-missing';
      readonly key: string;
      readonly libraryId: LibraryIdentifier;
      readonly title: string;
    }
  | {
      readonly kind: 'annotation-needed-splitting';
      readonly message: string;
      readonly keys: readonly string[];
      readonly libraryId: LibraryIdentifier;
    }
  | { readonly kind: 'submit-update-failures'; readonly message: string }
  | {
      readonly kind: 'authorization-failed';
      readonly statusCode: number;
      readonly response: string;
      readonly hadIfMatchHeader: boolean;
    }
  | { readonly kind: 'attachment-already-uploaded' }
  | { readonly kind: 'attachment-item-not-submitted' }
  | { readonly kind: 'object-precondition-error' };

function describeActionError(reason: SyncActionErrorReason): string {
  switch (reason.kind) {
    case 'attachment-missing':
      return `Attachment file "${reason.title}" (${reason.key}) is missing`;
    case 'annotation-needed-splitting':
    case 'submit-update-failures':
      return reason.message;
    case 'authorization-failed':
      return `Upload authorization failed with status ${reason.statusCode}`;
    case 'attachment-already-uploaded':
      return 'Attachment file is already uploaded';
    case 'attachment-item-not-submitted':
      return 'Attachment item was not submitted before its file';
    case 'object-precondition-error':
      return 'Object was modified remotely';
  }
}

/**
 * Error raised by a sync action collaborator with a known reason
 */
export class SyncActionError extends FolioError {
  readonly reason: SyncActionErrorReason;

  constructor(reason: SyncActionErrorReason, cause?: Error) {
    super({
      code: 'FOLIO_C510',
      message: describeActionError(reason),
      context: { reason: reason.kind },
      cause,
    });
    this.name = 'SyncActionError';
    this.reason = reason;
  }
}
