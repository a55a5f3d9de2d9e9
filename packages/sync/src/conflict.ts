import { groupLibrary, type LibraryIdentifier } from '@folio/core';
import { Subject, takeUntil, type Observable } from 'rxjs';
import type { Action } from './actions.js';

/**
 * A divergence between local and remote state that needs an external
 * decision before the sync can go on
 */
export type Conflict =
  | { type: 'group-removed'; groupId: number; name: string }
  | { type: 'group-metadata-write-denied'; groupId: number; name: string }
  | { type: 'group-file-write-denied'; groupId: number; name: string }
  | { type: 'removed-items-have-local-changes'; keys: string[]; libraryId: LibraryIdentifier }
  | {
      type: 'objects-removed-remotely';
      libraryId: LibraryIdentifier;
      collections: string[];
      items: string[];
      searches: string[];
      tags: string[];
    };

/**
 * Answer to a {@link Conflict}
 */
export type ConflictResolution =
  | { type: 'delete-group'; groupId: number }
  | { type: 'keep-group-changes'; libraryId: LibraryIdentifier }
  | { type: 'mark-group-as-local-only'; groupId: number }
  | { type: 'revert-group-changes'; libraryId: LibraryIdentifier }
  | { type: 'revert-group-files'; libraryId: LibraryIdentifier }
  | { type: 'skip-group'; libraryId: LibraryIdentifier }
  | {
      type: 'remote-deletion-of-active-object';
      libraryId: LibraryIdentifier;
      toDeleteCollections: string[];
      toRestoreCollections: string[];
      toDeleteItems: string[];
      toRestoreItems: string[];
      searches: string[];
      tags: string[];
    }
  | {
      type: 'remote-deletion-of-changed-item';
      libraryId: LibraryIdentifier;
      toDelete: string[];
      toRestore: string[];
    };

/**
 * Library a conflict was raised for
 */
export function conflictLibraryId(conflict: Conflict): LibraryIdentifier {
  switch (conflict.type) {
    case 'group-removed':
    case 'group-metadata-write-denied':
    case 'group-file-write-denied':
      return groupLibrary(conflict.groupId);
    case 'removed-items-have-local-changes':
    case 'objects-removed-remotely':
      return conflict.libraryId;
  }
}

/**
 * Follow-up actions of a resolution, in execution order
 */
export function resolutionActions(resolution: ConflictResolution): Action[] {
  switch (resolution.type) {
    case 'delete-group':
      return [{ type: 'delete-group', groupId: resolution.groupId }];
    case 'keep-group-changes':
      return [{ type: 'mark-changes-as-resolved', libraryId: resolution.libraryId }];
    case 'mark-group-as-local-only':
      return [{ type: 'mark-group-as-local-only', groupId: resolution.groupId }];
    case 'revert-group-changes':
      return [{ type: 'revert-library-to-original', libraryId: resolution.libraryId }];
    case 'revert-group-files':
      return [{ type: 'revert-library-files-to-original', libraryId: resolution.libraryId }];
    case 'skip-group':
      return [{ type: 'remove-actions', libraryId: resolution.libraryId }];

    case 'remote-deletion-of-active-object': {
      const actions: Action[] = [];
      const hasDeletions =
        resolution.toDeleteCollections.length > 0 ||
        resolution.toDeleteItems.length > 0 ||
        resolution.searches.length > 0 ||
        resolution.tags.length > 0;
      if (hasDeletions) {
        actions.push({
          type: 'perform-deletions',
          libraryId: resolution.libraryId,
          collections: resolution.toDeleteCollections,
          items: resolution.toDeleteItems,
          searches: resolution.searches,
          tags: resolution.tags,
          conflictMode: 'resolve-conflicts',
        });
      }
      if (resolution.toRestoreCollections.length > 0 || resolution.toRestoreItems.length > 0) {
        actions.push({
          type: 'restore-deletions',
          libraryId: resolution.libraryId,
          collections: resolution.toRestoreCollections,
          items: resolution.toRestoreItems,
        });
      }
      return actions;
    }

    case 'remote-deletion-of-changed-item': {
      const actions: Action[] = [];
      if (resolution.toDelete.length > 0) {
        actions.push({
          type: 'perform-deletions',
          libraryId: resolution.libraryId,
          collections: [],
          items: resolution.toDelete,
          searches: [],
          tags: [],
          conflictMode: 'delete-conflicts',
        });
      }
      if (resolution.toRestore.length > 0) {
        actions.push({
          type: 'restore-deletions',
          libraryId: resolution.libraryId,
          collections: [],
          items: resolution.toRestore,
        });
      }
      return actions;
    }
  }
}

/**
 * Outward channel for conflicts.
 *
 * Publishing never blocks the caller: conflicts are delivered on a later
 * microtask, after the engine has stopped draining its queue.
 */
export class ConflictBridge {
  private readonly conflictsSubject = new Subject<Conflict>();
  private readonly destroy$ = new Subject<void>();

  readonly conflicts$: Observable<Conflict> = this.conflictsSubject
    .asObservable()
    .pipe(takeUntil(this.destroy$));

  resolve(conflict: Conflict): void {
    queueMicrotask(() => this.conflictsSubject.next(conflict));
  }

  destroy(): void {
    this.destroy$.next();
    this.destroy$.complete();
    this.conflictsSubject.complete();
  }
}
