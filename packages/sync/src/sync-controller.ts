import {
  ALL_LIBRARIES,
  FolioError,
  MY_LIBRARY,
  ensureFolioError,
  groupLibrary,
  isSameLibrary,
  libraryKey,
  specificLibraries,
  type ApiError,
  type Libraries,
  type LibraryIdentifier,
  type SyncObject,
} from '@folio/core';
import { BehaviorSubject, Subject, takeUntil, type Observable } from 'rxjs';
import { actionLibraryId, writeBatchKeys, type Action, type ActionOf, type ActionType } from './actions.js';
import type { ActionsCreator, SyncActionExecutor } from './collaborators.js';
import { parseSyncControllerConfig, type SyncControllerConfig, type SyncControllerConfigInput } from './config.js';
import { ConflictBridge, resolutionActions, type Conflict, type ConflictResolution } from './conflict.js';
import { classifyError, classifyResultError, errorMessage } from './error-classifier.js';
import { resolveLogger, type Logger } from './logger.js';
import { retryForFatal, retryForNonFatal } from './retry-policy.js';
import { createSyncSession, type SyncSession } from './session.js';
import {
  describeSyncError,
  errorData,
  nonFatal,
  SyncActionError,
  type ErrorData,
  type FatalError,
  type NonFatalError,
  type SyncActionErrorReason,
  type SyncError,
} from './sync-error.js';
import type { AttachmentUpload, LibraryData, SyncDirective, SyncKind } from './types.js';

/**
 * Terminal report of a sync
 */
export interface SyncOutcome {
  status: 'finished' | 'aborted' | 'cancelled';
  sessionId: number;
  kind: SyncKind;
  libraries: Libraries;
  retryAttempt: number;
  /** Error that ended the sync; `null` when it finished */
  fatalError: FatalError | null;
  /** Recorded non-fatal errors, minus the ones covered by the retry */
  errors: NonFatalError[];
  /** Sync to run next, if any */
  retry: SyncDirective | null;
}

/**
 * Current state of the controller
 */
export type SyncProgress =
  | { state: 'idle' }
  | { state: 'running'; sessionId: number; kind: SyncKind; action: ActionType; queued: number }
  | { state: 'awaiting-resolution'; sessionId: number; conflict: Conflict['type'] }
  | { state: 'finished'; sessionId: number; errors: number }
  | { state: 'aborted'; sessionId: number; error: FatalError };

/**
 * Collaborators the controller drives
 */
export interface SyncCollaborators {
  actionsCreator: ActionsCreator;
  executor: SyncActionExecutor;
}

interface SubmissionResult {
  error: ApiError | null;
  newVersion: number | null;
  keys: string[];
  libraryId: LibraryIdentifier;
  object: SyncObject;
  failedBeforeReachingBackend: boolean;
}

function describeLibraries(libraries: Libraries): string | string[] {
  return libraries.type === 'all' ? 'all' : libraries.identifiers.map(libraryKey);
}

/**
 * Queue driven sync engine.
 *
 * A sync is a queue of {@link Action}s run strictly one at a time. Actions
 * may queue follow-up actions, record non-fatal errors, pause the queue on a
 * conflict until {@link SyncController.enqueueResolution} is called, or abort
 * the sync. When the queue runs empty, the recorded errors decide whether a
 * narrower retry is requested through the outcome.
 *
 * @example
 * ```typescript
 * const controller = createSyncController({ actionsCreator, executor }, { userId: 42 });
 *
 * controller.getOutcomes().subscribe((outcome) => {
 *   if (outcome.retry) scheduleRetry(outcome.retry);
 * });
 * controller.getConflicts().subscribe((conflict) => {
 *   controller.enqueueResolution(askUser(conflict));
 * });
 *
 * controller.start('normal', ALL_LIBRARIES);
 * ```
 */
export class SyncController {
  private readonly actionsCreator: ActionsCreator;
  private readonly executor: SyncActionExecutor;
  private readonly config: SyncControllerConfig;
  private readonly logger: Logger;
  private readonly bridge = new ConflictBridge();

  private readonly outcomes$ = new Subject<SyncOutcome>();
  private readonly progress$ = new BehaviorSubject<SyncProgress>({ state: 'idle' });
  private readonly destroy$ = new Subject<void>();

  private session: SyncSession | null = null;

  constructor(collaborators: SyncCollaborators, config: SyncControllerConfigInput) {
    this.actionsCreator = collaborators.actionsCreator;
    this.executor = collaborators.executor;
    this.config = parseSyncControllerConfig(config);
    this.logger = resolveLogger(this.config.logger, 'SyncController');
  }

  /**
   * Whether a sync is running
   */
  get isSyncing(): boolean {
    return this.session !== null;
  }

  /**
   * Observable of terminal sync reports, delivered asynchronously
   */
  getOutcomes(): Observable<SyncOutcome> {
    return this.outcomes$.asObservable().pipe(takeUntil(this.destroy$));
  }

  /**
   * Observable of conflicts waiting for {@link enqueueResolution}
   */
  getConflicts(): Observable<Conflict> {
    return this.bridge.conflicts$;
  }

  getProgress(): Observable<SyncProgress> {
    return this.progress$.asObservable().pipe(takeUntil(this.destroy$));
  }

  getCurrentProgress(): SyncProgress {
    return this.progress$.getValue();
  }

  /**
   * Snapshot of the queued actions of the running sync
   */
  getQueue(): Action[] {
    return this.session ? [...this.session.queue] : [];
  }

  /**
   * Start a sync. Does nothing while another sync is running.
   */
  start(kind: SyncKind = 'normal', libraries: Libraries = ALL_LIBRARIES, retryAttempt = 0): void {
    if (this.session) {
      this.logger.debug('Start called while a sync is running', { kind });
      return;
    }

    const actions = this.actionsCreator.createInitialActions(libraries, kind);
    const session = createSyncSession({
      userId: this.config.userId,
      kind,
      libraries,
      retryAttempt,
      maxRetryCount: this.config.maxRetryCount,
      actions,
    });
    this.session = session;

    this.logger.info('Sync started', {
      sessionId: session.id,
      kind,
      libraries: describeLibraries(libraries),
      retryAttempt,
    });
    this.processNextAction(session);
  }

  /**
   * Stop the running sync. Late results of the action in flight are ignored.
   */
  cancel(): void {
    const session = this.session;
    if (!session) return;

    this.logger.info('Sync cancelled', { sessionId: session.id, queued: session.queue.length });
    this.report(session, 'cancelled', { kind: 'cancelled' }, null);
  }

  /**
   * Continue a sync paused on a conflict with the follow-up actions of the
   * resolution.
   *
   * Must only be called after a conflict was published and before any other
   * resolution for it; calling it while an action is in flight runs the
   * resolution actions concurrently with the queue.
   */
  enqueueResolution(resolution: ConflictResolution): void {
    const session = this.session;
    if (!session) {
      this.logger.warn('Conflict resolution received without a running sync', { type: resolution.type });
      return;
    }

    this.logger.debug('Conflict resolved', { type: resolution.type });
    this.enqueue(session, resolutionActions(resolution), 0);
  }

  destroy(): void {
    if (this.session) {
      this.cleanup(this.session);
    }
    this.destroy$.next();
    this.destroy$.complete();
    this.bridge.destroy();
    this.outcomes$.complete();
    this.progress$.complete();
  }

  private isCurrent(session: SyncSession): boolean {
    return this.session === session;
  }

  private processNextAction(session: SyncSession): void {
    if (!this.isCurrent(session)) return;

    const action = session.queue.shift();
    if (!action) {
      session.processingAction = null;
      this.finish(session);
      return;
    }

    const previousLibrary = session.processingAction ? actionLibraryId(session.processingAction) : null;
    if (session.lastReturnedVersion !== null && !isSameLibrary(actionLibraryId(action), previousLibrary)) {
      session.lastReturnedVersion = null;
    }
    session.processingAction = action;

    this.progress$.next({
      state: 'running',
      sessionId: session.id,
      kind: session.kind,
      action: action.type,
      queued: session.queue.length,
    });

    this.process(session, action).catch((error: unknown) =>
      this.handleUnexpectedError(session, action, error)
    );
  }

  private async process(session: SyncSession, action: Action): Promise<void> {
    switch (action.type) {
      case 'load-key-permissions':
        return this.loadKeyPermissions(session);
      case 'create-library-actions':
        return this.createLibraryActions(session, action);
      case 'sync-group-versions':
        return this.syncGroupVersions(session);
      case 'sync-group-to-db':
        return this.syncGroupToDb(session, action.groupId);
      case 'resolve-deleted-group':
        return this.resolveConflict(session, {
          type: 'group-removed',
          groupId: action.groupId,
          name: action.name,
        });
      case 'resolve-group-metadata-write-permission':
        return this.resolveConflict(session, {
          type: 'group-metadata-write-denied',
          groupId: action.groupId,
          name: action.name,
        });
      case 'resolve-group-file-write-permission':
        return this.resolveConflict(session, {
          type: 'group-file-write-denied',
          groupId: action.groupId,
          name: action.name,
        });
      case 'sync-versions':
        return this.syncVersions(session, action);
      case 'sync-settings':
        return this.syncSettings(session, action);
      case 'sync-deletions':
        return this.syncDeletions(session, action);
      case 'sync-batches-to-db':
        return this.syncBatchesToDb(session, action);
      case 'store-version':
        return this.runCompletable(session, errorData(action.libraryId, action.object), () =>
          this.executor.storeVersion(action.libraryId, action.object, action.version)
        );
      case 'store-deletion-version':
        return this.runCompletable(session, errorData(action.libraryId), () =>
          this.executor.storeDeletionVersion(action.libraryId, action.version)
        );
      case 'submit-write-batch':
        return this.submitWriteBatch(session, action);
      case 'submit-delete-batch':
        return this.submitDeleteBatch(session, action);
      case 'create-upload-actions':
        return this.createUploadActions(session, action);
      case 'upload-attachment':
        return this.uploadAttachment(session, action.upload);
      case 'perform-deletions':
        return this.performDeletions(session, action);
      case 'restore-deletions':
        return this.runCompletable(session, errorData(action.libraryId, 'item', action.items), () =>
          this.executor.restoreDeletions(action.libraryId, action.collections, action.items)
        );
      case 'mark-changes-as-resolved':
        return this.runCompletable(session, errorData(action.libraryId), () =>
          this.executor.markChangesAsResolved(action.libraryId)
        );
      case 'mark-group-as-local-only':
        return this.runCompletable(session, errorData(groupLibrary(action.groupId)), () =>
          this.executor.markGroupAsLocalOnly(action.groupId)
        );
      case 'delete-group':
        return this.runCompletable(session, errorData(groupLibrary(action.groupId)), () =>
          this.executor.deleteGroup(action.groupId)
        );
      case 'revert-library-to-original':
        return this.runCompletable(session, errorData(action.libraryId), () =>
          this.executor.revertLibraryUpdates(action.libraryId)
        );
      case 'revert-library-files-to-original':
        return this.runCompletable(session, errorData(action.libraryId), () =>
          this.executor.revertLibraryFiles(action.libraryId)
        );
      case 'fix-upload':
        return this.fixUpload(session, action.key, action.libraryId);
      case 'remove-actions':
        this.removeAllActions(session, action.libraryId);
        return this.processNextAction(session);
      case 'perform-webdav-deletions':
        return this.performWebDavDeletions(session, action.libraryId);
      default: {
        const unhandled: never = action;
        throw new FolioError({
          code: 'FOLIO_X900',
          message: 'Unhandled sync action',
          context: { action: unhandled },
        });
      }
    }
  }

  // Handlers

  private async loadKeyPermissions(session: SyncSession): Promise<void> {
    const result = await this.executor.loadKeyPermissions();
    if (!this.isCurrent(session)) return;

    if (result.type === 'success') {
      session.accessPermissions = result.value;
      this.processNextAction(session);
      return;
    }

    const error = classifyResultError(result, errorData(MY_LIBRARY));
    this.abort(session, error.type === 'fatal' ? error.error : { kind: 'permission-loading-failed' });
  }

  private async createLibraryActions(
    session: SyncSession,
    action: ActionOf<'create-library-actions'>
  ): Promise<void> {
    let data: LibraryData[];
    try {
      data = await this.executor.loadLibraryData({
        libraries: action.libraries,
        fetchUpdates: action.options !== 'only-downloads',
        loadVersions: session.kind !== 'full',
      });
    } catch (error) {
      if (!this.isCurrent(session)) return;
      const syncError = classifyError(error, errorData(MY_LIBRARY));
      this.abort(session, syncError.type === 'fatal' ? syncError.error : { kind: 'all-libraries-fetch-failed' });
      return;
    }
    if (!this.isCurrent(session)) return;

    const { actions, queueIndex, writeCount } = this.actionsCreator.createLibraryActions(
      data,
      action.options,
      session.kind
    );
    session.didEnqueueWriteActionsToBackend = action.options !== 'automatic' || writeCount > 0;
    this.enqueue(session, actions, queueIndex);
  }

  private async syncGroupVersions(session: SyncSession): Promise<void> {
    const result = await this.executor.syncGroupVersions();
    if (!this.isCurrent(session)) return;

    if (result.type !== 'success') {
      const error = classifyResultError(result, errorData(MY_LIBRARY));
      this.abort(session, error.type === 'fatal' ? error.error : { kind: 'group-sync-failed' });
      return;
    }

    const actions = this.actionsCreator.createGroupActions(
      result.value.toUpdate,
      result.value.toRemove,
      session.kind,
      session.libraries
    );
    this.enqueue(session, actions, 0);
  }

  private async syncGroupToDb(session: SyncSession, groupId: number): Promise<void> {
    const result = await this.executor.fetchAndStoreGroup(groupId, session.userId);
    if (!this.isCurrent(session)) return;

    if (result.type === 'success') {
      this.processNextAction(session);
      return;
    }

    const data = errorData(groupLibrary(groupId));
    const error = classifyResultError(result, data);
    if (error.type === 'fatal') {
      this.abort(session, error.error);
      return;
    }

    this.logger.warn('Group sync failed', { groupId, error: describeSyncError(error) });
    session.nonFatalErrors.push(error.error);
    await this.runCompletable(session, data, () => this.executor.markGroupForResync(groupId));
  }

  private async syncVersions(session: SyncSession, action: ActionOf<'sync-versions'>): Promise<void> {
    const { libraryId, object, version } = action;
    const lastVersion = session.lastReturnedVersion;

    const result = await this.executor.syncVersions({
      userId: session.userId,
      libraryId,
      object,
      sinceVersion: version,
      currentVersion: lastVersion,
      kind: session.kind,
      delayIntervals: this.config.syncDelayIntervals,
      checkRemote: action.checkRemote,
    });
    if (!this.isCurrent(session)) return;

    if (result.type !== 'success') {
      this.handleFailure(session, classifyResultError(result, errorData(libraryId, object)), libraryId, version);
      return;
    }

    const actions = this.actionsCreator.createBatchedObjectActions(
      libraryId,
      object,
      result.value.toUpdate,
      result.value.version,
      version !== lastVersion,
      session.kind
    );
    this.enqueue(session, actions, 0);
  }

  private async syncSettings(session: SyncSession, action: ActionOf<'sync-settings'>): Promise<void> {
    const { libraryId, version } = action;
    const result = await this.executor.syncSettings({
      userId: session.userId,
      libraryId,
      sinceVersion: version,
      currentVersion: session.lastReturnedVersion,
    });
    if (!this.isCurrent(session)) return;

    if (result.type !== 'success') {
      this.handleFailure(session, classifyResultError(result, errorData(libraryId, 'settings')), libraryId, version);
      return;
    }

    this.logger.debug('Settings synced', {
      library: libraryKey(libraryId),
      changed: result.value.settingsChanged,
    });
    this.processNextAction(session);
  }

  private async syncDeletions(session: SyncSession, action: ActionOf<'sync-deletions'>): Promise<void> {
    const { libraryId, version } = action;
    const result = await this.executor.loadDeletions({
      userId: session.userId,
      libraryId,
      sinceVersion: version,
      currentVersion: session.lastReturnedVersion,
    });
    if (!this.isCurrent(session)) return;

    if (result.type !== 'success') {
      this.handleFailure(session, classifyResultError(result, errorData(libraryId)), libraryId, version);
      return;
    }

    const { collections, items, searches, tags } = result.value;
    this.updateDeletionVersion(session, libraryId, result.value.version);

    if (session.kind === 'full') {
      await this.performDeletions(session, {
        type: 'perform-deletions',
        libraryId,
        collections,
        items,
        searches,
        tags,
        conflictMode: 'restore-conflicts',
      });
      return;
    }

    if (collections.length + items.length + searches.length + tags.length === 0) {
      this.processNextAction(session);
      return;
    }

    this.resolveConflict(session, {
      type: 'objects-removed-remotely',
      libraryId,
      collections,
      items,
      searches,
      tags,
    });
  }

  private async syncBatchesToDb(session: SyncSession, action: ActionOf<'sync-batches-to-db'>): Promise<void> {
    const first = action.batches[0];
    if (!first) {
      this.processNextAction(session);
      return;
    }

    const { libraryId, object } = first;
    const result = await this.executor.syncBatches(action.batches);
    if (!this.isCurrent(session)) return;

    if (result.type !== 'success') {
      this.handleFailure(session, classifyResultError(result, errorData(libraryId)), libraryId, null);
      return;
    }

    const { failedKeys, parseErrors } = result.value;
    const data = errorData(libraryId, object, failedKeys);
    for (const parseError of parseErrors) {
      const error = classifyError(parseError, data);
      session.nonFatalErrors.push(
        error.type === 'non-fatal' ? error.error : { kind: 'unknown', message: errorMessage(parseError), data }
      );
    }
    if (parseErrors.length > 0) {
      this.logger.warn('Objects could not be parsed', { object, count: parseErrors.length });
    }

    if (failedKeys.length === 0) {
      this.processNextAction(session);
      return;
    }

    await this.runCompletable(session, data, () =>
      this.executor.markForResync(libraryId, object, failedKeys)
    );
  }

  private async performDeletions(session: SyncSession, action: ActionOf<'perform-deletions'>): Promise<void> {
    const { libraryId, collections, items, searches, tags, conflictMode } = action;

    let conflicts: string[];
    try {
      conflicts = await this.executor.performDeletions({
        libraryId,
        collections,
        items,
        searches,
        tags,
        conflictMode,
      });
    } catch (error) {
      if (!this.isCurrent(session)) return;
      const data = errorData(libraryId, items.length > 0 ? 'item' : 'collection', items);
      this.handleFailure(session, classifyError(error, data), libraryId, null);
      return;
    }
    if (!this.isCurrent(session)) return;

    if (conflicts.length === 0) {
      this.processNextAction(session);
      return;
    }
    this.resolveConflict(session, { type: 'removed-items-have-local-changes', keys: conflicts, libraryId });
  }

  private async submitWriteBatch(session: SyncSession, action: ActionOf<'submit-write-batch'>): Promise<void> {
    const { batch } = action;
    const result = await this.executor.submitUpdate(batch);
    if (!this.isCurrent(session)) return;

    const submission = {
      keys: writeBatchKeys(batch),
      libraryId: batch.libraryId,
      object: batch.object,
      failedBeforeReachingBackend: false,
    };
    if (result.type !== 'success') {
      await this.finishSubmission(session, { ...submission, error: result, newVersion: batch.version });
      return;
    }
    await this.finishSubmission(session, {
      ...submission,
      error: result.value.failure,
      newVersion: result.value.version,
    });
  }

  private async submitDeleteBatch(session: SyncSession, action: ActionOf<'submit-delete-batch'>): Promise<void> {
    const { batch } = action;
    const result = await this.executor.submitDeletion(batch);
    if (!this.isCurrent(session)) return;

    const submission = {
      keys: batch.keys,
      libraryId: batch.libraryId,
      object: batch.object,
      failedBeforeReachingBackend: false,
    };
    if (result.type !== 'success') {
      await this.finishSubmission(session, { ...submission, error: result, newVersion: batch.version });
      return;
    }

    if (result.value.didCreateDeletions) {
      this.addWebDavDeletionsActionIfNeeded(session, batch.libraryId);
    }
    await this.finishSubmission(session, { ...submission, error: null, newVersion: result.value.version });
  }

  private async createUploadActions(
    session: SyncSession,
    action: ActionOf<'create-upload-actions'>
  ): Promise<void> {
    const { libraryId } = action;

    let uploads: AttachmentUpload[];
    try {
      uploads = await this.executor.loadUploads(libraryId);
    } catch (error) {
      if (!this.isCurrent(session)) return;
      session.uploads.reset();
      this.handleFailure(session, classifyError(error, errorData(libraryId)), libraryId, null);
      return;
    }
    if (!this.isCurrent(session)) return;

    if (uploads.length === 0) {
      if (action.hadOtherWriteActions) {
        this.processNextAction(session);
        return;
      }
      this.enqueue(
        session,
        [{ type: 'create-library-actions', libraries: specificLibraries([libraryId]), options: 'only-downloads' }],
        0
      );
      return;
    }

    if (!action.canEditFiles) {
      if (libraryId.type === 'group') {
        await this.enqueueFileWritePermission(session, libraryId.groupId);
        return;
      }
      this.logger.warn('Attachment files of the personal library are read-only, skipping uploads', {
        count: uploads.length,
      });
      this.processNextAction(session);
      return;
    }

    session.uploads.reset(uploads.length);
    this.enqueue(
      session,
      uploads.map((upload): Action => ({ type: 'upload-attachment', upload })),
      0
    );
  }

  private async uploadAttachment(session: SyncSession, upload: AttachmentUpload): Promise<void> {
    const { result, failedBeforeReachingBackend } = await this.executor.uploadAttachment(upload);
    if (!this.isCurrent(session)) return;

    await this.finishSubmission(session, {
      error: result.type === 'success' ? null : result,
      newVersion: null,
      keys: [upload.key],
      libraryId: upload.libraryId,
      object: 'item',
      failedBeforeReachingBackend: result.type !== 'success' && failedBeforeReachingBackend,
    });
  }

  private async fixUpload(session: SyncSession, key: string, libraryId: LibraryIdentifier): Promise<void> {
    try {
      await this.executor.fixUpload(key, libraryId);
    } catch (error) {
      if (!this.isCurrent(session)) return;
      this.logger.error('Upload fix failed', ensureFolioError(error), { key });
      this.abort(session, { kind: 'upload-object-conflict', data: errorData(libraryId, 'item', [key]) });
      return;
    }
    this.processNextAction(session);
  }

  private async performWebDavDeletions(session: SyncSession, libraryId: LibraryIdentifier): Promise<void> {
    let failedKeys: string[];
    try {
      failedKeys = await this.executor.performWebDavDeletions(libraryId);
    } catch (error) {
      if (!this.isCurrent(session)) return;
      this.handleNonFatal(
        session,
        { kind: 'webdav-deletion-failed', message: errorMessage(error), libraryId },
        libraryId,
        null
      );
      return;
    }
    if (!this.isCurrent(session)) return;

    if (failedKeys.length === 0) {
      this.processNextAction(session);
      return;
    }
    this.handleNonFatal(session, { kind: 'webdav-deletion', count: failedKeys.length, libraryId }, libraryId, null);
  }

  // Submissions

  private async finishSubmission(session: SyncSession, submission: SubmissionResult): Promise<void> {
    const { error, newVersion, keys, libraryId, object } = submission;

    if (!error) {
      this.continueAfterSubmission(session, newVersion);
      return;
    }

    const data = errorData(libraryId, object, keys);
    if (error.type === 'code-error' && error.error instanceof SyncActionError) {
      const { reason } = error.error;
      switch (reason.kind) {
        case 'attachment-already-uploaded':
          this.continueAfterSubmission(session, newVersion);
          return;
        case 'authorization-failed':
          await this.handleUploadAuthorizationFailure(session, reason, submission);
          return;
        case 'attachment-item-not-submitted': {
          const key = keys[0];
          if (key !== undefined) {
            await this.markItemForUploadAndRestartSync(session, key, libraryId);
            return;
          }
          break;
        }
        case 'object-precondition-error':
          this.logger.warn('Object conflict on submission, requesting full sync', { keys });
          this.abort(session, { kind: 'upload-object-conflict', data });
          return;
        default:
          break;
      }
    }

    const syncError = classifyResultError(error, data);
    this.handleFailure(session, syncError, libraryId, newVersion, () =>
      this.afterFailedSubmission(session, submission)
    );
  }

  private continueAfterSubmission(session: SyncSession, newVersion: number | null): void {
    if (newVersion !== null) {
      this.updateVersionInNextWriteBatch(session, newVersion);
    }
    this.processNextAction(session);
  }

  private afterFailedSubmission(session: SyncSession, submission: SubmissionResult): void {
    if (submission.newVersion !== null) {
      this.updateVersionInNextWriteBatch(session, submission.newVersion);
    }
    if (submission.failedBeforeReachingBackend) {
      this.handleAllUploadsFailedBeforeReachingBackend(session, submission.libraryId);
    }
  }

  private async handleUploadAuthorizationFailure(
    session: SyncSession,
    reason: Extract<SyncActionErrorReason, { kind: 'authorization-failed' }>,
    submission: SubmissionResult
  ): Promise<void> {
    const { libraryId, object } = submission;
    const key = submission.keys[0] ?? '';

    let error: NonFatalError;
    switch (reason.statusCode) {
      case 403:
        if (libraryId.type === 'group') {
          await this.enqueueFileWritePermission(session, libraryId.groupId);
          return;
        }
        error = { kind: 'api-error', response: reason.response, data: errorData(libraryId, object, [key]) };
        break;
      case 404:
        await this.markItemForUploadAndRestartSync(session, key, libraryId);
        return;
      case 412:
        this.logger.warn('Attachment changed remotely, fixing upload', {
          key,
          hadIfMatchHeader: reason.hadIfMatchHeader,
        });
        this.enqueue(session, [{ type: 'fix-upload', key, libraryId }], 0);
        return;
      case 413:
        error = { kind: 'quota-limit', libraryId };
        break;
      default:
        error = { kind: 'api-error', response: reason.response, data: errorData(libraryId, object, [key]) };
    }

    this.handleNonFatal(session, error, libraryId, submission.newVersion, () =>
      this.afterFailedSubmission(session, submission)
    );
  }

  private async enqueueFileWritePermission(session: SyncSession, groupId: number): Promise<void> {
    const name = await this.executor.readGroupName(groupId);
    if (!this.isCurrent(session)) return;
    this.enqueue(session, [{ type: 'resolve-group-file-write-permission', groupId, name: name ?? '' }], 0);
  }

  private async markItemForUploadAndRestartSync(
    session: SyncSession,
    key: string,
    libraryId: LibraryIdentifier
  ): Promise<void> {
    try {
      await this.executor.markItemForUpload(key, libraryId);
    } catch (error) {
      if (!this.isCurrent(session)) return;
      this.logger.error('Could not mark item for upload', ensureFolioError(error), { key });
      this.abort(session, { kind: 'db-error' });
      return;
    }
    if (!this.isCurrent(session)) return;
    this.abort(session, { kind: 'cant-submit-attachment-item', data: errorData(libraryId, 'item', [key]) });
  }

  private updateVersionInNextWriteBatch(session: SyncSession, version: number): void {
    const next = session.queue[0];
    if (next?.type === 'submit-write-batch') {
      session.queue[0] = { ...next, batch: { ...next.batch, version } };
    } else if (next?.type === 'submit-delete-batch') {
      session.queue[0] = { ...next, batch: { ...next.batch, version } };
    }
  }

  private handleAllUploadsFailedBeforeReachingBackend(session: SyncSession, libraryId: LibraryIdentifier): void {
    const requeued = session.uploads.recordFailureBeforeBackend(
      libraryId,
      session.queue,
      session.didEnqueueWriteActionsToBackend
    );
    if (requeued) {
      session.didEnqueueWriteActionsToBackend = false;
      this.logger.warn('All uploads failed before reaching the backend, downloading library again', {
        library: libraryKey(libraryId),
      });
    }
  }

  private addWebDavDeletionsActionIfNeeded(session: SyncSession, libraryId: LibraryIdentifier): void {
    let index = 0;
    for (const action of session.queue) {
      if (!isSameLibrary(actionLibraryId(action), libraryId)) break;
      if (action.type === 'perform-webdav-deletions') return;
      index += 1;
    }
    session.queue.splice(index, 0, { type: 'perform-webdav-deletions', libraryId });
  }

  private updateDeletionVersion(session: SyncSession, libraryId: LibraryIdentifier, version: number): void {
    const index = session.queue.findIndex(
      (action) => action.type === 'store-deletion-version' && isSameLibrary(action.libraryId, libraryId)
    );
    if (index !== -1) {
      session.queue[index] = { type: 'store-deletion-version', libraryId, version };
    }
  }

  // Queue control

  private async runCompletable(
    session: SyncSession,
    data: ErrorData,
    operation: () => Promise<void>
  ): Promise<void> {
    try {
      await operation();
    } catch (error) {
      if (!this.isCurrent(session)) return;
      this.handleFailure(session, classifyError(error, data), data.libraryId, null);
      return;
    }
    this.processNextAction(session);
  }

  private resolveConflict(session: SyncSession, conflict: Conflict): void {
    this.logger.info('Waiting for conflict resolution', { type: conflict.type });
    this.progress$.next({ state: 'awaiting-resolution', sessionId: session.id, conflict: conflict.type });
    this.bridge.resolve(conflict);
  }

  private enqueue(session: SyncSession, actions: Action[], index?: number): void {
    if (actions.length > 0) {
      if (index === undefined) {
        session.queue.push(...actions);
      } else {
        session.queue.splice(index, 0, ...actions);
      }
    }
    this.processNextAction(session);
  }

  private handleFailure(
    session: SyncSession,
    error: SyncError,
    libraryId: LibraryIdentifier,
    version: number | null,
    additionalAction?: () => void
  ): void {
    if (error.type === 'fatal') {
      this.abort(session, error.error);
      return;
    }
    this.handleNonFatal(session, error.error, libraryId, version, additionalAction);
  }

  private handleNonFatal(
    session: SyncSession,
    error: NonFatalError,
    libraryId: LibraryIdentifier,
    version: number | null,
    additionalAction?: () => void
  ): void {
    const appendAndContinue = (): void => {
      this.logger.warn('Sync error recorded', { error: describeSyncError(nonFatal(error)) });
      session.nonFatalErrors.push(error);
      additionalAction?.();
      this.processNextAction(session);
    };

    switch (error.kind) {
      case 'version-mismatch':
      case 'precondition-failed':
        this.removeAllActions(session, libraryId);
        appendAndContinue();
        return;
      case 'unchanged':
        if (version !== null) {
          this.handleUnchangedFailure(session, version, libraryId);
          return;
        }
        additionalAction?.();
        this.processNextAction(session);
        return;
      case 'quota-limit':
        // No quota specific reaction, the error is reported with the outcome.
        appendAndContinue();
        return;
      default:
        appendAndContinue();
    }
  }

  private handleUnchangedFailure(session: SyncSession, lastVersion: number, libraryId: LibraryIdentifier): void {
    this.logger.debug('Library unchanged', { library: libraryKey(libraryId), version: lastVersion });
    session.lastReturnedVersion = lastVersion;

    if (session.kind === 'full') {
      this.processNextAction(session);
      return;
    }

    const redundant = new Set<number>();
    for (const [index, action] of session.queue.entries()) {
      if (!isSameLibrary(actionLibraryId(action), libraryId)) break;

      switch (action.type) {
        case 'sync-versions':
          session.queue[index] = { ...action, checkRemote: action.version < lastVersion };
          break;
        case 'sync-settings':
        case 'sync-deletions':
        case 'store-deletion-version':
          if (action.version === lastVersion) redundant.add(index);
          break;
        default:
          break;
      }
    }

    if (redundant.size > 0) {
      const kept = session.queue.filter((_, index) => !redundant.has(index));
      session.queue.splice(0, session.queue.length, ...kept);
    }
    this.processNextAction(session);
  }

  private removeAllActions(session: SyncSession, libraryId: LibraryIdentifier): void {
    let next = session.queue[0];
    while (next && isSameLibrary(actionLibraryId(next), libraryId)) {
      session.queue.shift();
      next = session.queue[0];
    }
  }

  private handleUnexpectedError(session: SyncSession, action: Action, error: unknown): void {
    if (!this.isCurrent(session)) return;

    const libraryId = actionLibraryId(action) ?? MY_LIBRARY;
    const syncError = classifyError(error, errorData(libraryId));
    this.logger.error(`Action ${action.type} failed`, ensureFolioError(error), {
      error: describeSyncError(syncError),
    });
    this.handleFailure(session, syncError, libraryId, null);
  }

  // Lifecycle

  private finish(session: SyncSession): void {
    const retry = retryForNonFatal(session.nonFatalErrors, session);
    this.logger.info('Sync finished', {
      sessionId: session.id,
      errors: session.nonFatalErrors.length,
      retry: retry !== null,
    });

    this.cleanup(session);
    this.progress$.next({ state: 'finished', sessionId: session.id, errors: session.nonFatalErrors.length });
    this.emitOutcome(session, {
      status: 'finished',
      fatalError: null,
      errors: retry ? retry.reportErrors : [...session.nonFatalErrors],
      retry: retry?.directive ?? null,
    });
  }

  private abort(session: SyncSession, error: FatalError): void {
    this.logger.info('Sync aborted', { sessionId: session.id, error: error.kind });
    this.report(session, 'aborted', error, retryForFatal(error, session));
  }

  private report(
    session: SyncSession,
    status: 'aborted' | 'cancelled',
    error: FatalError,
    retry: SyncDirective | null
  ): void {
    this.cleanup(session);
    this.progress$.next({ state: 'aborted', sessionId: session.id, error });
    this.emitOutcome(session, {
      status,
      fatalError: error,
      errors: [...session.nonFatalErrors],
      retry,
    });
  }

  private emitOutcome(
    session: SyncSession,
    outcome: Pick<SyncOutcome, 'status' | 'fatalError' | 'errors' | 'retry'>
  ): void {
    const report: SyncOutcome = {
      ...outcome,
      sessionId: session.id,
      kind: session.kind,
      libraries: session.libraries,
      retryAttempt: session.retryAttempt,
    };
    queueMicrotask(() => this.outcomes$.next(report));
  }

  private cleanup(session: SyncSession): void {
    session.queue.length = 0;
    session.processingAction = null;
    session.lastReturnedVersion = null;
    session.uploads.reset();
    if (this.session === session) {
      this.session = null;
    }
  }
}

/**
 * Create a sync controller
 */
export function createSyncController(
  collaborators: SyncCollaborators,
  config: SyncControllerConfigInput
): SyncController {
  return new SyncController(collaborators, config);
}
