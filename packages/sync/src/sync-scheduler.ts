import { ALL_LIBRARIES, type Libraries } from '@folio/core';
import { Subject, takeUntil, timer, type Observable, type Subscription } from 'rxjs';
import { parseSyncSchedulerConfig, type SyncSchedulerConfig, type SyncSchedulerConfigInput } from './config.js';
import { resolveLogger, type Logger } from './logger.js';
import type { SyncOutcome } from './sync-controller.js';
import type { SyncDirective, SyncKind } from './types.js';

/**
 * The part of a controller the scheduler drives
 */
export interface SchedulableSync {
  readonly isSyncing: boolean;
  start(kind: SyncKind, libraries: Libraries, retryAttempt: number): void;
  cancel(): void;
  getOutcomes(): Observable<SyncOutcome>;
}

/**
 * A requested sync
 */
export interface SyncRequest {
  kind: SyncKind;
  libraries: Libraries;
}

/**
 * Decides when syncs run.
 *
 * Requests made while a sync runs are kept (the latest wins) and started
 * once it ends. Retries requested by an outcome are started after the
 * configured delay for the attempt, unless the ending sync was itself a
 * one-off retry.
 */
export class SyncScheduler {
  private readonly controller: SchedulableSync;
  private readonly config: SyncSchedulerConfig;
  private readonly logger: Logger;
  private readonly destroy$ = new Subject<void>();

  private pending: SyncRequest | null = null;
  private retryTimer: Subscription | null = null;
  private runningRetryOnce = false;

  constructor(controller: SchedulableSync, config: SyncSchedulerConfigInput = {}) {
    this.controller = controller;
    this.config = parseSyncSchedulerConfig(config);
    this.logger = resolveLogger(this.config.logger, 'SyncScheduler');

    this.controller
      .getOutcomes()
      .pipe(takeUntil(this.destroy$))
      .subscribe((outcome) => this.handleOutcome(outcome));
  }

  /**
   * Whether a retry is waiting for its delay
   */
  get hasScheduledRetry(): boolean {
    return this.retryTimer !== null;
  }

  /**
   * Request a sync. Starts it right away when nothing runs.
   */
  request(kind: SyncKind = 'normal', libraries: Libraries = ALL_LIBRARIES): void {
    if (this.controller.isSyncing || this.retryTimer) {
      this.logger.debug('Sync request queued', { kind });
      this.pending = { kind, libraries };
      return;
    }
    this.run({ kind, libraries }, 0, false);
  }

  /**
   * Cancel the running sync and drop every pending request and retry
   */
  cancel(): void {
    this.pending = null;
    this.clearRetry();
    this.controller.cancel();
  }

  destroy(): void {
    this.pending = null;
    this.clearRetry();
    this.destroy$.next();
    this.destroy$.complete();
  }

  private handleOutcome(outcome: SyncOutcome): void {
    const wasRetryOnce = this.runningRetryOnce;
    this.runningRetryOnce = false;

    if (outcome.retry && !wasRetryOnce) {
      this.scheduleRetry(outcome.retry);
      return;
    }

    const pending = this.pending;
    if (pending) {
      this.pending = null;
      this.run(pending, 0, false);
    }
  }

  private scheduleRetry(directive: SyncDirective): void {
    const { retryDelays } = this.config;
    const index = Math.min(Math.max(directive.retryAttempt - 1, 0), retryDelays.length - 1);
    const delay = retryDelays[index] ?? 0;

    this.logger.info('Retry scheduled', {
      kind: directive.kind,
      retryAttempt: directive.retryAttempt,
      delay,
    });

    this.clearRetry();
    this.retryTimer = timer(delay * 1000)
      .pipe(takeUntil(this.destroy$))
      .subscribe(() => {
        this.retryTimer = null;
        this.run(directive, directive.retryAttempt, directive.retryOnce);
      });
  }

  private run(request: SyncRequest, retryAttempt: number, retryOnce: boolean): void {
    if (this.controller.isSyncing) {
      this.pending = request;
      return;
    }
    this.runningRetryOnce = retryOnce;
    this.controller.start(request.kind, request.libraries, retryAttempt);
  }

  private clearRetry(): void {
    this.retryTimer?.unsubscribe();
    this.retryTimer = null;
  }
}

/**
 * Create a sync scheduler
 */
export function createSyncScheduler(
  controller: SchedulableSync,
  config?: SyncSchedulerConfigInput
): SyncScheduler {
  return new SyncScheduler(controller, config);
}
