/**
 * @folio/sync - Queue-driven synchronization engine for Folio
 *
 * Reconciles a local object store with a remote library backend where every
 * library carries its own version counter. A sync is a queue of actions run
 * one at a time; the engine owns ordering, error classification, conflict
 * hand-off and retry decisions, while all remote and local work is done by
 * an injected executor.
 *
 * ## Architecture
 *
 * ```
 * ┌─────────────────────────────────────────────────────────────────────┐
 * │                          SyncScheduler                               │
 * │               (pending requests, delayed retries)                    │
 * └───────────────────────────────┬─────────────────────────────────────┘
 *                                 │ start / outcomes
 *                                 ▼
 * ┌─────────────────────────────────────────────────────────────────────┐
 * │                         SyncController                               │
 * │                                                                      │
 * │  ┌──────────────┐  ┌─────────────────┐  ┌───────────────────────┐  │
 * │  │ Action queue │  │ Error           │  │ Retry policy          │  │
 * │  │ (session)    │  │ classifier      │  │                       │  │
 * │  └──────────────┘  └─────────────────┘  └───────────────────────┘  │
 * │  ┌──────────────┐  ┌─────────────────┐                              │
 * │  │ Conflict     │  │ Upload          │                              │
 * │  │ bridge       │  │ accounting      │                              │
 * │  └──────────────┘  └─────────────────┘                              │
 * └──────────────┬───────────────────────────────────┬──────────────────┘
 *                │                                   │
 *                ▼                                   ▼
 * ┌──────────────────────────────┐   ┌──────────────────────────────────┐
 * │       ActionsCreator         │   │       SyncActionExecutor         │
 * │  (local state → actions)     │   │  (remote API, local store)       │
 * └──────────────────────────────┘   └──────────────────────────────────┘
 * ```
 *
 * ## Quick Start
 *
 * ```typescript
 * import { ALL_LIBRARIES } from '@folio/core';
 * import { DefaultActionsCreator, createSyncController, createSyncScheduler } from '@folio/sync';
 *
 * const controller = createSyncController(
 *   { actionsCreator: new DefaultActionsCreator(), executor },
 *   { userId: 42 }
 * );
 * const scheduler = createSyncScheduler(controller);
 *
 * controller.getConflicts().subscribe((conflict) => {
 *   controller.enqueueResolution(chooseResolution(conflict));
 * });
 *
 * scheduler.request('normal', ALL_LIBRARIES);
 * ```
 *
 * @packageDocumentation
 * @module @folio/sync
 *
 * @see {@link SyncController} for the sync engine
 * @see {@link SyncActionExecutor} for the operations a host provides
 */

export * from './actions-creator.js';
export * from './actions.js';
export * from './collaborators.js';
export * from './config.js';
export * from './conflict.js';
export * from './error-classifier.js';
export * from './logger.js';
export * from './retry-policy.js';
export * from './sync-controller.js';
export * from './sync-error.js';
export * from './sync-scheduler.js';
export * from './types.js';
export * from './upload-accounting.js';

export { createSyncSession, type SyncSession, type SyncSessionOptions } from './session.js';
