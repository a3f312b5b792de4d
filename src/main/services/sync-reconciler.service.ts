/**
 * Sync Reconciler Service
 *
 * Drains the pending operation queue into the primary card store.
 *
 * Each run:
 * 1. Re-queues TRANSIENT failures whose backoff has elapsed
 * 2. Takes PENDING operations in arrival order, grouped by card
 * 3. Applies each card's operations in order under the card lock,
 *    stopping that card at its first failure
 * 4. Repeats until the queue yields nothing new
 *
 * Cards are processed concurrently; one card's operations never are.
 * Runs are coalesced: a trigger during a run joins that run.
 *
 * @module main/services/sync-reconciler
 */

import type { CardRecordStore } from '../dal/card-records.dal';
import type { PendingOperationsDAL } from '../dal/pending-operations.dal';
import type { ReconcileLogDAL, ReconcileRunCounts } from '../dal/reconcile-log.dal';
import { RetryStrategyService } from './retry-strategy.service';
import { KeyedMutex } from '../utils/keyed-mutex';
import { CardEventBus, CardEvents, type ReconcileSummary } from '../utils/event-bus';
import { SyncConflictError } from '../utils/errors';
import type { PendingOperation, ReconcileTrigger } from '../../shared/types/card.types';
import { createLogger } from '../utils/logger';

// ============================================================================
// Types
// ============================================================================

export interface SyncReconcilerDependencies {
  store: CardRecordStore;
  queue: PendingOperationsDAL;
  reconcileLog: ReconcileLogDAL;
  locks: KeyedMutex;
  events: CardEventBus;
  retry?: RetryStrategyService;
  /** SYNCED operations older than this are purged after each run (default: 7 days) */
  syncedRetentionMs?: number;
}

export interface ReconcilerStatus {
  isRunning: boolean;
  isScheduled: boolean;
  intervalMs: number;
  lastRunAt: string | null;
  lastSummary: ReconcileSummary | null;
}

interface CardOutcome {
  synced: number;
  failed: number;
  transientFailures: number;
}

// ============================================================================
// Constants
// ============================================================================

const DEFAULT_RECONCILE_INTERVAL_MS = 60_000;
const MIN_RECONCILE_INTERVAL_MS = 1_000;
const MAX_RECONCILE_INTERVAL_MS = 60 * 60 * 1000;
const DEFAULT_SYNCED_RETENTION_MS = 7 * 24 * 60 * 60 * 1000;

// ============================================================================
// Logger
// ============================================================================

const log = createLogger('sync-reconciler');

// ============================================================================
// Sync Reconciler Service
// ============================================================================

export class SyncReconcilerService {
  private readonly store: CardRecordStore;
  private readonly queue: PendingOperationsDAL;
  private readonly reconcileLog: ReconcileLogDAL;
  private readonly locks: KeyedMutex;
  private readonly events: CardEventBus;
  private readonly retry: RetryStrategyService;
  private readonly syncedRetentionMs: number;

  private intervalId: NodeJS.Timeout | null = null;
  private intervalMs = DEFAULT_RECONCILE_INTERVAL_MS;
  private unsubscribeReconnect: (() => void) | null = null;
  private currentRun: Promise<ReconcileSummary> | null = null;
  private lastRunAt: Date | null = null;
  private lastSummary: ReconcileSummary | null = null;

  constructor(deps: SyncReconcilerDependencies) {
    this.store = deps.store;
    this.queue = deps.queue;
    this.reconcileLog = deps.reconcileLog;
    this.locks = deps.locks;
    this.events = deps.events;
    this.retry = deps.retry ?? new RetryStrategyService();
    this.syncedRetentionMs = deps.syncedRetentionMs ?? DEFAULT_SYNCED_RETENTION_MS;
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Reconcile now, then every `intervalMs`, and whenever the reader reconnects
   */
  start(intervalMs?: number): void {
    if (this.intervalId) {
      log.warn('Reconciler already running');
      return;
    }

    if (intervalMs) {
      this.intervalMs = Math.max(
        MIN_RECONCILE_INTERVAL_MS,
        Math.min(intervalMs, MAX_RECONCILE_INTERVAL_MS)
      );
    }

    log.info('Starting reconciler', { intervalSec: this.intervalMs / 1000 });

    this.reconcileLog.closeAbandonedRuns();

    this.unsubscribeReconnect = this.events.on(CardEvents.HARDWARE_RECONNECTED, () => {
      this.triggerReconcile('reconnected').catch((err) => {
        log.error('Reconnect reconcile failed', {
          error: err instanceof Error ? err.message : 'Unknown error',
        });
      });
    });

    this.triggerReconcile('startup').catch((err) => {
      log.error('Initial reconcile failed', {
        error: err instanceof Error ? err.message : 'Unknown error',
      });
    });

    this.intervalId = setInterval(() => {
      this.triggerReconcile('interval').catch((err) => {
        log.error('Scheduled reconcile failed', {
          error: err instanceof Error ? err.message : 'Unknown error',
        });
      });
    }, this.intervalMs);
  }

  /**
   * Stop scheduling runs. A run in progress finishes; see whenIdle().
   */
  stop(): void {
    let stopped = false;

    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
      stopped = true;
    }

    if (this.unsubscribeReconnect) {
      this.unsubscribeReconnect();
      this.unsubscribeReconnect = null;
      stopped = true;
    }

    if (stopped) {
      log.info('Reconciler stopped');
    }
  }

  /**
   * Resolves once no run is in progress
   */
  async whenIdle(): Promise<void> {
    while (this.currentRun) {
      await this.currentRun.catch(() => undefined);
    }
  }

  /**
   * Run reconciliation now. If a run is already in progress, its result is returned.
   */
  triggerReconcile(trigger: ReconcileTrigger = 'manual'): Promise<ReconcileSummary> {
    if (this.currentRun) {
      log.debug('Reconcile already in progress, joining it', { trigger });
      return this.currentRun;
    }

    const run = this.runReconcile(trigger).finally(() => {
      this.currentRun = null;
    });
    this.currentRun = run;
    return run;
  }

  getStatus(): ReconcilerStatus {
    return {
      isRunning: this.currentRun !== null,
      isScheduled: this.intervalId !== null,
      intervalMs: this.intervalMs,
      lastRunAt: this.lastRunAt?.toISOString() ?? null,
      lastSummary: this.lastSummary,
    };
  }

  // ==========================================================================
  // Run
  // ==========================================================================

  private async runReconcile(trigger: ReconcileTrigger): Promise<ReconcileSummary> {
    const startedAt = Date.now();
    const runId = this.reconcileLog.startRun(trigger);
    const counts: ReconcileRunCounts = { seen: 0, synced: 0, failed: 0, requeued: 0 };

    try {
      counts.requeued = this.queue.requeueDue(new Date(), this.retry.getMaxAttempts());

      for (;;) {
        const batch = this.queue.peekBatch(this.retry.getCurrentBatchSize());
        if (batch.length === 0) break;

        counts.seen += batch.length;
        const outcome = await this.processBatch(batch);
        counts.synced += outcome.synced;
        counts.failed += outcome.failed;

        if (outcome.transientFailures > 0) {
          this.retry.recordBatchFailure();
        } else {
          this.retry.recordBatchSuccess();
        }

        // Nothing changed state; another pass would see the same batch
        if (outcome.synced + outcome.failed === 0) break;
      }

      this.reconcileLog.completeRun(runId, counts);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      log.error('Reconcile run failed', { runId, trigger, error: errorMessage });
      this.failRunQuietly(runId, counts, errorMessage);
    }

    this.purgeSyncedQuietly();

    const summary: ReconcileSummary = {
      runId,
      trigger,
      processed: counts.seen,
      synced: counts.synced,
      failed: counts.failed,
      requeued: counts.requeued,
      durationMs: Date.now() - startedAt,
    };

    this.lastRunAt = new Date();
    this.lastSummary = summary;

    if (summary.processed > 0 || summary.requeued > 0) {
      log.info(`Reconcile completed: ${summary.synced}/${summary.processed} synced`, {
        runId,
        trigger,
        failed: summary.failed,
        requeued: summary.requeued,
        durationMs: summary.durationMs,
      });
    } else {
      log.debug('Reconcile completed: queue empty', { runId, trigger });
    }

    this.events.emit(CardEvents.RECONCILE_COMPLETED, summary);
    return summary;
  }

  private async processBatch(batch: PendingOperation[]): Promise<CardOutcome> {
    const byCard = new Map<string, PendingOperation[]>();
    for (const operation of batch) {
      const operations = byCard.get(operation.card_id);
      if (operations) {
        operations.push(operation);
      } else {
        byCard.set(operation.card_id, [operation]);
      }
    }

    const outcomes = await Promise.all(
      [...byCard.entries()].map(([cardId, operations]) =>
        this.locks.runExclusive(cardId, () => this.applyCardOperations(operations))
      )
    );

    return outcomes.reduce<CardOutcome>(
      (total, outcome) => ({
        synced: total.synced + outcome.synced,
        failed: total.failed + outcome.failed,
        transientFailures: total.transientFailures + outcome.transientFailures,
      }),
      { synced: 0, failed: 0, transientFailures: 0 }
    );
  }

  /**
   * Apply one card's operations in order; stop at the first failure
   */
  private applyCardOperations(operations: PendingOperation[]): CardOutcome {
    const outcome: CardOutcome = { synced: 0, failed: 0, transientFailures: 0 };

    for (const operation of operations) {
      try {
        const result = this.store.applyOperation({
          operation_id: operation.operation_id,
          card_id: operation.card_id,
          operation_kind: operation.operation_kind,
          amount: operation.amount,
          student_id: operation.student_id,
        });
        this.queue.markSynced(operation.operation_id);
        outcome.synced++;

        log.debug('Operation reconciled', {
          operationId: operation.operation_id,
          cardId: operation.card_id,
          balance: result.record.balance,
          alreadyApplied: !result.applied,
        });
      } catch (error) {
        this.recordFailure(operation, error);
        outcome.failed++;
        if (!(error instanceof SyncConflictError)) outcome.transientFailures++;
        break;
      }
    }

    return outcome;
  }

  private recordFailure(operation: PendingOperation, error: unknown): void {
    const reason = error instanceof Error ? error.message : 'Unknown error';

    if (error instanceof SyncConflictError) {
      this.queue.markFailed(operation.operation_id, reason, 'CONFLICT');
      return;
    }

    const attempts = operation.attempts + 1;
    const decision = this.retry.makeRetryDecision(attempts, 'TRANSIENT');
    const retryAfter = decision.shouldRetry ? this.retry.calculateRetryAfter(attempts) : null;
    this.queue.markFailed(operation.operation_id, reason, 'TRANSIENT', retryAfter);

    if (!decision.shouldRetry) {
      log.warn('Operation exhausted its retries; manual retry required', {
        operationId: operation.operation_id,
        cardId: operation.card_id,
        attempts,
      });
    }
  }

  // ==========================================================================
  // Housekeeping
  // ==========================================================================

  private failRunQuietly(runId: string, counts: ReconcileRunCounts, errorMessage: string): void {
    try {
      this.reconcileLog.failRun(runId, counts, errorMessage);
    } catch (error) {
      log.error('Could not record failed reconcile run', {
        runId,
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  }

  private purgeSyncedQuietly(): void {
    try {
      this.queue.purgeSynced(this.syncedRetentionMs);
    } catch (error) {
      log.warn('Purging synced operations failed', {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  }
}
