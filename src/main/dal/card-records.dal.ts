/**
 * Card Records Data Access Layer
 *
 * Authoritative balance and student binding per card, in the primary
 * database. Replayed operations are recorded in applied_operations so that
 * applying the same operation id twice changes the balance once.
 *
 * @module main/dal/card-records
 */

import { BaseDAL } from './base.dal';
import { calculateChecksum } from '../hardware/card-layout';
import {
  BalanceCentsSchema,
  CardIdSchema,
  StudentIdSchema,
  operationDelta,
  type CardRecord,
  type OperationKind,
} from '../../shared/types/card.types';
import { SyncConflictError } from '../utils/errors';
import { createLogger } from '../utils/logger';

// ============================================================================
// Types
// ============================================================================

/**
 * Operation replayed against the authoritative store
 */
export interface AuthoritativeOperation {
  operation_id: string;
  card_id: string;
  operation_kind: OperationKind;
  amount: number;
  /** New binding; null leaves the current one */
  student_id: string | null;
}

export interface ApplyOperationResult {
  record: CardRecord;
  /** false when the operation id had already been applied */
  applied: boolean;
}

export interface AppliedOperation {
  operation_id: string;
  card_id: string;
  delta: number;
  balance_after: number;
  applied_at: string;
}

/**
 * What the facade and the reconciler need from the authoritative store
 */
export interface CardRecordStore {
  get(cardId: string): CardRecord | undefined;
  put(cardId: string, balance: number, studentId: string | null): CardRecord;
  applyOperation(operation: AuthoritativeOperation): ApplyOperationResult;
}

// ============================================================================
// Logger
// ============================================================================

const log = createLogger('card-records-dal');

// ============================================================================
// Card Records DAL
// ============================================================================

export class CardRecordsDAL extends BaseDAL<CardRecord> implements CardRecordStore {
  protected readonly tableName = 'card_records';
  protected readonly primaryKey = 'card_id';

  get(cardId: string): CardRecord | undefined {
    return this.findById(cardId);
  }

  /**
   * Set the absolute balance and binding of a card, creating it if needed
   */
  put(cardId: string, balance: number, studentId: string | null): CardRecord {
    CardIdSchema.parse(cardId);
    BalanceCentsSchema.parse(balance);
    if (studentId !== null) StudentIdSchema.parse(studentId);

    return this.guard('put', () => {
      const now = this.now();
      this.db
        .prepare(
          `INSERT INTO card_records (card_id, balance, student_id, checksum, created_at, updated_at)
           VALUES (?, ?, ?, ?, ?, ?)
           ON CONFLICT(card_id) DO UPDATE SET
             balance = excluded.balance,
             student_id = excluded.student_id,
             checksum = excluded.checksum,
             updated_at = excluded.updated_at`
        )
        .run(cardId, balance, studentId, calculateChecksum(balance, studentId), now, now);

      log.info('Card record written', { cardId, balance });
      return this.requireRecord(cardId);
    });
  }

  /**
   * Apply one balance change exactly once
   *
   * Creates the record at balance 0 for an unknown card.
   *
   * @throws SyncConflictError if the balance would go negative; nothing is written
   */
  applyOperation(operation: AuthoritativeOperation): ApplyOperationResult {
    return this.guard('applyOperation', () =>
      this.withTransaction(() => {
        const previous = this.getAppliedOperation(operation.operation_id);
        if (previous) {
          log.debug('Operation already applied, skipping', {
            operationId: operation.operation_id,
            cardId: operation.card_id,
          });
          return { record: this.requireRecord(operation.card_id), applied: false };
        }

        const now = this.now();
        const existing = this.findById(operation.card_id);
        const currentBalance = existing?.balance ?? 0;
        const delta = operationDelta(operation.operation_kind, operation.amount);
        const newBalance = currentBalance + delta;

        if (newBalance < 0) {
          throw new SyncConflictError(operation.card_id, currentBalance, delta);
        }

        const studentId = operation.student_id ?? existing?.student_id ?? null;
        const checksum = calculateChecksum(newBalance, studentId);

        if (existing) {
          this.db
            .prepare(
              `UPDATE card_records
               SET balance = ?, student_id = ?, checksum = ?, updated_at = ?
               WHERE card_id = ?`
            )
            .run(newBalance, studentId, checksum, now, operation.card_id);
        } else {
          this.db
            .prepare(
              `INSERT INTO card_records (card_id, balance, student_id, checksum, created_at, updated_at)
               VALUES (?, ?, ?, ?, ?, ?)`
            )
            .run(operation.card_id, newBalance, studentId, checksum, now, now);
        }

        this.db
          .prepare(
            `INSERT INTO applied_operations (operation_id, card_id, delta, balance_after, applied_at)
             VALUES (?, ?, ?, ?, ?)`
          )
          .run(operation.operation_id, operation.card_id, delta, newBalance, now);

        log.info('Operation applied to card record', {
          operationId: operation.operation_id,
          cardId: operation.card_id,
          kind: operation.operation_kind,
          delta,
          balance: newBalance,
          created: existing === undefined,
        });

        return { record: this.requireRecord(operation.card_id), applied: true };
      })
    );
  }

  getAppliedOperation(operationId: string): AppliedOperation | undefined {
    return this.guard('getAppliedOperation', () =>
      this.db
        .prepare<[string], AppliedOperation>(
          `SELECT operation_id, card_id, delta, balance_after, applied_at
           FROM applied_operations WHERE operation_id = ?`
        )
        .get(operationId)
    );
  }

  /**
   * Applied operations for one card, oldest first
   */
  listAppliedOperations(cardId: string): AppliedOperation[] {
    return this.guard('listAppliedOperations', () =>
      this.db
        .prepare<[string], AppliedOperation>(
          `SELECT operation_id, card_id, delta, balance_after, applied_at
           FROM applied_operations WHERE card_id = ?
           ORDER BY applied_at ASC, rowid ASC`
        )
        .all(cardId)
    );
  }

  private requireRecord(cardId: string): CardRecord {
    const record = this.findById(cardId);
    if (!record) {
      throw new Error(`Card record ${cardId} missing after write`);
    }
    return record;
  }
}
