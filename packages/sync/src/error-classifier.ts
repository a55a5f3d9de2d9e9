import { ParsingError, SchemaError, StorageError, type ApiError } from '@folio/core';
import { ZodError } from 'zod';
import {
  SyncActionError,
  SyncFailure,
  fatal,
  isSyncError,
  nonFatal,
  type ErrorData,
  type SyncError,
} from './sync-error.js';

const NO_RESPONSE = 'No Response';

/**
 * Message of a thrown value
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

function classifyActionError(error: SyncActionError, data: ErrorData): SyncError {
  const { reason } = error;
  switch (reason.kind) {
    case 'attachment-missing':
      return nonFatal({
        kind: 'attachment-missing',
        key: reason.key,
        libraryId: reason.libraryId,
        title: reason.title,
      });
    case 'annotation-needed-splitting':
      return nonFatal({
        kind: 'annotation-did-split',
        message: reason.message,
        keys: reason.keys,
        libraryId: reason.libraryId,
      });
    case 'submit-update-failures':
    case 'authorization-failed':
    case 'attachment-already-uploaded':
    case 'attachment-item-not-submitted':
      return nonFatal({ kind: 'unknown', message: error.message, data });
    case 'object-precondition-error':
      return fatal({ kind: 'upload-object-conflict', data });
  }
}

/**
 * Map a raw failure raised by an action into a {@link SyncError}.
 *
 * Already classified errors pass through unchanged. Local store failures are
 * always fatal; everything unrecognized becomes a non-fatal `unknown`.
 */
export function classifyError(error: unknown, data: ErrorData): SyncError {
  if (isSyncError(error)) return error;
  if (error instanceof SyncFailure) return error.syncError;
  if (error instanceof SyncActionError) return classifyActionError(error, data);
  if (error instanceof StorageError) return fatal({ kind: 'db-error' });
  if (error instanceof SchemaError) {
    return nonFatal({ kind: 'schema', message: error.message, data });
  }
  if (error instanceof ParsingError || error instanceof ZodError) {
    return nonFatal({ kind: 'parsing', message: error.message, data });
  }
  return nonFatal({ kind: 'unknown', message: errorMessage(error), data });
}

/**
 * Map a failed remote call into a {@link SyncError}.
 *
 * Code errors are classified like thrown errors. Network errors are mapped
 * by HTTP status: unlisted client errors are fatal, anything else is
 * treated as transient.
 */
export function classifyResultError(error: ApiError, data: ErrorData): SyncError {
  if (error.type === 'code-error') return classifyError(error.error, data);

  const response = error.body ?? NO_RESPONSE;
  switch (error.httpCode) {
    case 304:
      return nonFatal({ kind: 'unchanged' });
    case 403:
      return fatal({ kind: 'forbidden' });
    case 412:
      return nonFatal({ kind: 'precondition-failed', libraryId: data.libraryId });
    case 413:
      return nonFatal({ kind: 'quota-limit', libraryId: data.libraryId });
    case 503:
      return fatal({ kind: 'service-unavailable' });
    case 507:
      return nonFatal({ kind: 'insufficient-space' });
  }

  if (error.httpCode >= 400 && error.httpCode <= 499) {
    return fatal({ kind: 'api-error', response, data });
  }
  return nonFatal({ kind: 'api-error', response, data });
}
