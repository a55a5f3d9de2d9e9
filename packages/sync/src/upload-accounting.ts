import { isSameLibrary, specificLibraries, type LibraryIdentifier } from '@folio/core';
import { actionLibraryId, type Action } from './actions.js';

/**
 * Counts attachment uploads of a sync to notice when every one of them failed
 * before a request reached the backend.
 */
export class UploadAccounting {
  private enqueued = 0;
  private failedBeforeReachingBackend = 0;

  get enqueuedCount(): number {
    return this.enqueued;
  }

  get failedCount(): number {
    return this.failedBeforeReachingBackend;
  }

  reset(enqueued = 0): void {
    this.enqueued = enqueued;
    this.failedBeforeReachingBackend = 0;
  }

  /**
   * Record an upload that failed before reaching the backend.
   *
   * Once all enqueued uploads of the library failed and its actions are
   * done, a download-only library sync is put at the front of the queue.
   *
   * @returns `true` when the download was queued
   */
  recordFailureBeforeBackend(
    libraryId: LibraryIdentifier,
    queue: Action[],
    didEnqueueWriteActionsToBackend: boolean
  ): boolean {
    if (didEnqueueWriteActionsToBackend || this.enqueued === 0) return false;

    this.failedBeforeReachingBackend += 1;
    if (this.failedBeforeReachingBackend < this.enqueued) return false;

    const next = queue[0];
    if (next && isSameLibrary(actionLibraryId(next), libraryId)) return false;

    this.reset();
    queue.unshift({
      type: 'create-library-actions',
      libraries: specificLibraries([libraryId]),
      options: 'only-downloads',
    });
    return true;
  }
}
