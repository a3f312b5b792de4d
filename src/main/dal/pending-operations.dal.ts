/**
 * Pending Operations Data Access Layer
 *
 * Durable FIFO log of balance changes accepted while the primary store was
 * out of reach. Arrival order is the autoincrement `seq`; operations on one
 * card are released strictly in that order.
 *
 * Status transitions:
 * - PENDING → SYNCED (terminal) once applied to the primary store
 * - PENDING → FAILED when an apply attempt fails
 * - FAILED → PENDING on manual retry, or on scheduled retry for TRANSIENT failures
 *
 * A FAILED operation holds every later operation of the same card back
 * from peekBatch until it is retried.
 *
 * @module main/dal/pending-operations
 */

import { BaseDAL } from './base.dal';
import {
  EnqueueOperationSchema,
  type EnqueueOperationInput,
  type FailureCategory,
  type PendingOperation,
  type QueueStats,
} from '../../shared/types/card.types';
import { createLogger } from '../utils/logger';

// ============================================================================
// Constants
// ============================================================================

const DEFAULT_BATCH_SIZE = 50;

/** Upper bound for any single read of the queue */
const MAX_BATCH_SIZE = 500;

/** Stored error messages are truncated to this length */
const MAX_ERROR_LENGTH = 500;

// ============================================================================
// Logger
// ============================================================================

const log = createLogger('pending-operations-dal');

// ============================================================================
// Pending Operations DAL
// ============================================================================

export class PendingOperationsDAL extends BaseDAL<PendingOperation> {
  protected readonly tableName = 'pending_operations';
  protected readonly primaryKey = 'operation_id';

  /**
   * Run `fn` in one transaction on the offline database. Other offline
   * DALs called inside it (the card cache) commit or roll back with it.
   */
  atomically<R>(fn: () => R): R {
    return this.withTransaction(fn);
  }

  /**
   * Append an operation to the queue. Durable once this returns.
   *
   * @throws ZodError if the operation is malformed
   */
  enqueue(input: EnqueueOperationInput): PendingOperation {
    const data = EnqueueOperationSchema.parse(input);
    const operationId = this.generateId();
    const now = this.now();

    this.guard('enqueue', () =>
      this.db
        .prepare(
          `INSERT INTO pending_operations (
             operation_id, card_id, operation_kind, amount, student_id,
             created_at, sync_status, attempts
           ) VALUES (?, ?, ?, ?, ?, ?, 'PENDING', 0)`
        )
        .run(operationId, data.card_id, data.operation_kind, data.amount, data.student_id, now)
    );

    log.info('Operation enqueued', {
      operationId,
      cardId: data.card_id,
      kind: data.operation_kind,
      amount: data.amount,
    });

    const created = this.findById(operationId);
    if (!created) {
      throw new Error(`Failed to retrieve enqueued operation: ${operationId}`);
    }
    return created;
  }

  /**
   * Up to `limit` PENDING operations in arrival order, skipping cards held
   * by an earlier FAILED operation
   */
  peekBatch(limit: number = DEFAULT_BATCH_SIZE): PendingOperation[] {
    const safeLimit = Math.max(1, Math.min(limit, MAX_BATCH_SIZE));

    return this.guard('peekBatch', () =>
      this.db
        .prepare<[number], PendingOperation>(
          `SELECT p.* FROM pending_operations p
           WHERE p.sync_status = 'PENDING'
             AND NOT EXISTS (
               SELECT 1 FROM pending_operations f
               WHERE f.card_id = p.card_id
                 AND f.sync_status = 'FAILED'
                 AND f.seq < p.seq
             )
           ORDER BY p.seq ASC
           LIMIT ?`
        )
        .all(safeLimit)
    );
  }

  /**
   * @returns true if the operation was PENDING and is now SYNCED
   */
  markSynced(operationId: string): boolean {
    const now = this.now();
    const result = this.guard('markSynced', () =>
      this.db
        .prepare(
          `UPDATE pending_operations SET
             sync_status = 'SYNCED',
             attempts = attempts + 1,
             last_error = NULL,
             error_category = NULL,
             retry_after = NULL,
             last_attempt_at = ?,
             synced_at = ?
           WHERE operation_id = ? AND sync_status = 'PENDING'`
        )
        .run(now, now, operationId)
    );

    log.debug('Operation marked synced', { operationId, updated: result.changes > 0 });
    return result.changes > 0;
  }

  /**
   * Record a failed apply attempt
   *
   * @param retryAfter - ISO time after which a TRANSIENT failure may be re-queued
   * @returns true if the operation was PENDING and is now FAILED
   */
  markFailed(
    operationId: string,
    reason: string,
    category: FailureCategory,
    retryAfter: string | null = null
  ): boolean {
    const result = this.guard('markFailed', () =>
      this.db
        .prepare(
          `UPDATE pending_operations SET
             sync_status = 'FAILED',
             attempts = attempts + 1,
             last_error = ?,
             error_category = ?,
             retry_after = ?,
             last_attempt_at = ?
           WHERE operation_id = ? AND sync_status = 'PENDING'`
        )
        .run(reason.substring(0, MAX_ERROR_LENGTH), category, retryAfter, this.now(), operationId)
    );

    log.warn('Operation marked failed', {
      operationId,
      category,
      retryAfter,
      error: reason,
    });
    return result.changes > 0;
  }

  /**
   * Manually release FAILED operations back to PENDING, resetting their
   * attempt count. Without ids, every FAILED operation is released.
   *
   * @returns Number of operations released
   */
  retryFailed(operationIds?: string[]): number {
    if (operationIds && operationIds.length === 0) return 0;

    const released = this.guard('retryFailed', () => {
      const reset = `UPDATE pending_operations SET
           sync_status = 'PENDING',
           attempts = 0,
           last_error = NULL,
           error_category = NULL,
           retry_after = NULL
         WHERE sync_status = 'FAILED'`;

      if (!operationIds) {
        return this.db.prepare(reset).run().changes;
      }

      const placeholders = operationIds.map(() => '?').join(', ');
      return this.db
        .prepare(`${reset} AND operation_id IN (${placeholders})`)
        .run(...operationIds).changes;
    });

    log.info('Failed operations released for retry', { count: released });
    return released;
  }

  /**
   * Scheduled retry: TRANSIENT failures whose retry time has passed and
   * that have not used up their attempts go back to PENDING
   *
   * @returns Number of operations re-queued
   */
  requeueDue(now: Date, maxAttempts: number): number {
    const requeued = this.guard('requeueDue', () =>
      this.db
        .prepare(
          `UPDATE pending_operations SET
             sync_status = 'PENDING',
             retry_after = NULL
           WHERE sync_status = 'FAILED'
             AND error_category = 'TRANSIENT'
             AND attempts < ?
             AND (retry_after IS NULL OR retry_after <= ?)`
        )
        .run(maxAttempts, now.toISOString()).changes
    );

    if (requeued > 0) {
      log.info('Transient failures re-queued', { count: requeued });
    }
    return requeued;
  }

  /**
   * Whether the card has operations not yet applied to the primary store
   */
  hasOutstanding(cardId: string): boolean {
    return this.guard(
      'hasOutstanding',
      () =>
        this.db
          .prepare<[string], { present: number }>(
            `SELECT 1 as present FROM pending_operations
             WHERE card_id = ? AND sync_status IN ('PENDING', 'FAILED')
             LIMIT 1`
          )
          .get(cardId) !== undefined
    );
  }

  listPending(limit: number = MAX_BATCH_SIZE): PendingOperation[] {
    return this.listByStatus('PENDING', limit);
  }

  listFailed(limit: number = MAX_BATCH_SIZE): PendingOperation[] {
    return this.listByStatus('FAILED', limit);
  }

  /**
   * All operations of one card in arrival order
   */
  listForCard(cardId: string): PendingOperation[] {
    return this.guard('listForCard', () =>
      this.db
        .prepare<[string], PendingOperation>(
          `SELECT * FROM pending_operations WHERE card_id = ? ORDER BY seq ASC`
        )
        .all(cardId)
    );
  }

  getStats(): QueueStats {
    return this.guard('getStats', () => {
      const counts = this.db
        .prepare<[], { pending: number | null; failed: number | null; synced: number | null }>(
          `SELECT
             SUM(CASE WHEN sync_status = 'PENDING' THEN 1 ELSE 0 END) as pending,
             SUM(CASE WHEN sync_status = 'FAILED' THEN 1 ELSE 0 END) as failed,
             SUM(CASE WHEN sync_status = 'SYNCED' THEN 1 ELSE 0 END) as synced
           FROM pending_operations`
        )
        .get();

      const oldest = this.db
        .prepare<[], { created_at: string }>(
          `SELECT created_at FROM pending_operations
           WHERE sync_status IN ('PENDING', 'FAILED')
           ORDER BY seq ASC LIMIT 1`
        )
        .get();

      return {
        pending: counts?.pending ?? 0,
        failed: counts?.failed ?? 0,
        synced: counts?.synced ?? 0,
        oldestPending: oldest?.created_at ?? null,
      };
    });
  }

  /**
   * Delete SYNCED operations older than `olderThanMs`
   *
   * @returns Number of operations deleted
   */
  purgeSynced(olderThanMs: number): number {
    const cutoff = new Date(Date.now() - olderThanMs).toISOString();
    const deleted = this.guard('purgeSynced', () =>
      this.db
        .prepare(`DELETE FROM pending_operations WHERE sync_status = 'SYNCED' AND synced_at < ?`)
        .run(cutoff).changes
    );

    if (deleted > 0) {
      log.info('Synced operations purged', { count: deleted, cutoff });
    }
    return deleted;
  }

  private listByStatus(status: 'PENDING' | 'FAILED', limit: number): PendingOperation[] {
    const safeLimit = Math.max(1, Math.min(limit, MAX_BATCH_SIZE));
    return this.guard('listByStatus', () =>
      this.db
        .prepare<[string, number], PendingOperation>(
          `SELECT * FROM pending_operations WHERE sync_status = ? ORDER BY seq ASC LIMIT ?`
        )
        .all(status, safeLimit)
    );
  }
}
