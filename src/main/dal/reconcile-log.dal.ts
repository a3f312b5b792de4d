/**
 * Reconcile Log Data Access Layer
 *
 * History of reconciler runs, for troubleshooting a queue that will not drain.
 *
 * @module main/dal/reconcile-log
 */

import { BaseDAL } from './base.dal';
import type { ReconcileTrigger } from '../../shared/types/card.types';
import { createLogger } from '../utils/logger';

// ============================================================================
// Types
// ============================================================================

export type ReconcileRunStatus = 'RUNNING' | 'COMPLETED' | 'FAILED';

export interface ReconcileRun {
  id: string;
  trigger: ReconcileTrigger;
  status: ReconcileRunStatus;
  operations_seen: number;
  operations_synced: number;
  operations_failed: number;
  operations_requeued: number;
  started_at: string;
  completed_at: string | null;
  error_message: string | null;
}

export interface ReconcileRunCounts {
  seen: number;
  synced: number;
  failed: number;
  requeued: number;
}

// ============================================================================
// Constants
// ============================================================================

const MAX_LOG_LIMIT = 500;
const DEFAULT_LOG_LIMIT = 50;

// ============================================================================
// Logger
// ============================================================================

const log = createLogger('reconcile-log-dal');

// ============================================================================
// Reconcile Log DAL
// ============================================================================

export class ReconcileLogDAL extends BaseDAL<ReconcileRun> {
  protected readonly tableName = 'reconcile_log';
  protected readonly primaryKey = 'id';

  /**
   * @returns ID of the new RUNNING entry
   */
  startRun(trigger: ReconcileTrigger): string {
    const id = this.generateId();

    this.guard('startRun', () =>
      this.db
        .prepare(
          `INSERT INTO reconcile_log (id, trigger, status, started_at) VALUES (?, ?, 'RUNNING', ?)`
        )
        .run(id, trigger, this.now())
    );

    log.debug('Reconcile run started', { id, trigger });
    return id;
  }

  completeRun(id: string, counts: ReconcileRunCounts): void {
    this.finish(id, 'COMPLETED', counts, null);
  }

  failRun(id: string, counts: ReconcileRunCounts, errorMessage: string): void {
    this.finish(id, 'FAILED', counts, errorMessage);
  }

  /**
   * Most recent runs first
   */
  getRecentRuns(limit: number = DEFAULT_LOG_LIMIT): ReconcileRun[] {
    const safeLimit = Math.max(1, Math.min(limit, MAX_LOG_LIMIT));
    return this.guard('getRecentRuns', () =>
      this.db
        .prepare<[number], ReconcileRun>(
          `SELECT * FROM reconcile_log ORDER BY started_at DESC, rowid DESC LIMIT ?`
        )
        .all(safeLimit)
    );
  }

  getLastRun(): ReconcileRun | undefined {
    return this.getRecentRuns(1)[0];
  }

  /**
   * Mark runs left RUNNING by a crashed process as FAILED
   *
   * @returns Number of runs closed
   */
  closeAbandonedRuns(): number {
    const closed = this.guard(
      'closeAbandonedRuns',
      () =>
        this.db
          .prepare(
            `UPDATE reconcile_log SET
               status = 'FAILED',
               completed_at = ?,
               error_message = 'Process stopped before the run completed'
             WHERE status = 'RUNNING'`
          )
          .run(this.now()).changes
    );

    if (closed > 0) {
      log.warn('Closed abandoned reconcile runs', { count: closed });
    }
    return closed;
  }

  /**
   * @returns Number of entries deleted
   */
  deleteOldRuns(olderThanDays: number = 30): number {
    const cutoff = new Date(Date.now() - olderThanDays * 24 * 60 * 60 * 1000).toISOString();
    return this.guard(
      'deleteOldRuns',
      () =>
        this.db
          .prepare(`DELETE FROM reconcile_log WHERE status != 'RUNNING' AND started_at < ?`)
          .run(cutoff).changes
    );
  }

  private finish(
    id: string,
    status: Exclude<ReconcileRunStatus, 'RUNNING'>,
    counts: ReconcileRunCounts,
    errorMessage: string | null
  ): void {
    this.guard('finish', () =>
      this.db
        .prepare(
          `UPDATE reconcile_log SET
             status = ?,
             operations_seen = ?,
             operations_synced = ?,
             operations_failed = ?,
             operations_requeued = ?,
             completed_at = ?,
             error_message = ?
           WHERE id = ?`
        )
        .run(
          status,
          counts.seen,
          counts.synced,
          counts.failed,
          counts.requeued,
          this.now(),
          errorMessage,
          id
        )
    );
  }
}
