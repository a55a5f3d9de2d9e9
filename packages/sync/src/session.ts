import type { Libraries } from '@folio/core';
import type { Action } from './actions.js';
import type { NonFatalError } from './sync-error.js';
import type { AccessPermissions, SyncKind } from './types.js';
import { UploadAccounting } from './upload-accounting.js';

let nextSessionId = 1;

/**
 * State of one running sync. Owned and mutated by the controller's run loop
 * only; discarded when the sync finishes, aborts or is cancelled.
 */
export interface SyncSession {
  readonly id: number;
  readonly userId: number;
  readonly kind: SyncKind;
  readonly libraries: Libraries;
  readonly retryAttempt: number;
  readonly maxRetryCount: number;
  readonly queue: Action[];
  readonly nonFatalErrors: NonFatalError[];
  readonly uploads: UploadAccounting;
  processingAction: Action | null;
  /** Library version returned by an unchanged response, valid for one run of library actions */
  lastReturnedVersion: number | null;
  accessPermissions: AccessPermissions | null;
  didEnqueueWriteActionsToBackend: boolean;
}

export interface SyncSessionOptions {
  userId: number;
  kind: SyncKind;
  libraries: Libraries;
  retryAttempt: number;
  maxRetryCount: number;
  actions: Action[];
}

export function createSyncSession(options: SyncSessionOptions): SyncSession {
  return {
    id: nextSessionId++,
    userId: options.userId,
    kind: options.kind,
    libraries: options.libraries,
    retryAttempt: options.retryAttempt,
    maxRetryCount: options.maxRetryCount,
    queue: [...options.actions],
    nonFatalErrors: [],
    uploads: new UploadAccounting(),
    processingAction: null,
    lastReturnedVersion: null,
    accessPermissions: null,
    didEnqueueWriteActionsToBackend: false,
  };
}
