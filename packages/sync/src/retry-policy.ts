import {
  ALL_LIBRARIES,
  isSameLibrary,
  specificLibraries,
  type Libraries,
  type LibraryIdentifier,
} from '@folio/core';
import type { FatalError, NonFatalError } from './sync-error.js';
import type { SyncDirective, SyncKind } from './types.js';

/**
 * Session values the retry decisions depend on
 */
export interface RetryContext {
  kind: SyncKind;
  libraries: Libraries;
  retryAttempt: number;
  maxRetryCount: number;
}

/**
 * Retry decision taken when a sync finishes with recorded non-fatal errors
 */
export interface NonFatalRetry {
  directive: SyncDirective;
  /** Errors that did not contribute to the retry and are still reported */
  reportErrors: NonFatalError[];
}

export function isRetryAllowed(context: RetryContext): boolean {
  return context.retryAttempt < context.maxRetryCount;
}

/**
 * Decide whether an aborted sync is retried.
 *
 * An upload conflict triggers a one-off full sync of every library so the
 * conflicting objects are downloaded again. A missing attachment item
 * retries the same sync.
 */
export function retryForFatal(error: FatalError, context: RetryContext): SyncDirective | null {
  if (!isRetryAllowed(context)) return null;

  const retryAttempt = context.retryAttempt + 1;
  switch (error.kind) {
    case 'upload-object-conflict':
      return { kind: 'full', libraries: ALL_LIBRARIES, retryAttempt, retryOnce: true };
    case 'cant-submit-attachment-item':
      return { kind: context.kind, libraries: context.libraries, retryAttempt, retryOnce: false };
    default:
      return null;
  }
}

/**
 * Decide whether a finished sync is retried for the libraries that reported
 * stale versions or split annotations.
 */
export function retryForNonFatal(
  errors: readonly NonFatalError[],
  context: RetryContext
): NonFatalRetry | null {
  const retryLibraries: LibraryIdentifier[] = [];
  const reportErrors: NonFatalError[] = [];
  let kind = context.kind;
  let retryOnce = false;

  const addLibrary = (libraryId: LibraryIdentifier): void => {
    if (!retryLibraries.some((id) => isSameLibrary(id, libraryId))) {
      retryLibraries.push(libraryId);
    }
  };

  for (const error of errors) {
    switch (error.kind) {
      case 'version-mismatch':
      case 'precondition-failed':
        addLibrary(error.libraryId);
        kind = 'prioritize-downloads';
        retryOnce = true;
        break;
      case 'annotation-did-split':
        addLibrary(error.libraryId);
        break;
      default:
        reportErrors.push(error);
    }
  }

  if (retryLibraries.length === 0 || !isRetryAllowed(context)) return null;

  return {
    directive: {
      kind,
      libraries: specificLibraries(retryLibraries),
      retryAttempt: context.retryAttempt + 1,
      retryOnce,
    },
    reportErrors,
  };
}
