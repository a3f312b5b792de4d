/**
 * Card Records DAL Unit Tests
 *
 * Authoritative balances: absolute writes, idempotent operation replay
 * and the non-negative balance guard.
 *
 * @module tests/unit/dal/card-records.dal.spec
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../../../src/main/utils/logger', () => ({
  createLogger: vi.fn(() => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  })),
}));

import { CardRecordsDAL } from '../../../src/main/dal/card-records.dal';
import { SyncConflictError, StorageUnavailableError } from '../../../src/main/utils/errors';
import type { DatabaseInstance } from '../../../src/main/services/database.service';
import { createPrimaryTestDatabase } from '../../helpers/test-database';

describe('CardRecordsDAL', () => {
  let db: DatabaseInstance;
  let dal: CardRecordsDAL;

  beforeEach(() => {
    db = createPrimaryTestDatabase();
    dal = new CardRecordsDAL(db);
  });

  afterEach(() => {
    if (db.open) db.close();
  });

  describe('put', () => {
    it('creates a record with its checksum', () => {
      const record = dal.put('A1', 2000, 'S1');

      expect(record).toMatchObject({
        card_id: 'A1',
        balance: 2000,
        student_id: 'S1',
        checksum: 'c1f2c730',
      });
      expect(record.created_at).toBe(record.updated_at);
    });

    it('overwrites balance and binding of an existing record', () => {
      dal.put('A1', 2000, 'S1');
      const updated = dal.put('A1', 650, null);

      expect(updated).toMatchObject({ balance: 650, student_id: null, checksum: '7010c2b9' });
      expect(dal.count()).toBe(1);
    });

    it('rejects a negative balance', () => {
      expect(() => dal.put('A1', -1, null)).toThrow('Balance cannot be negative');
      expect(dal.get('A1')).toBeUndefined();
    });
  });

  describe('applyOperation', () => {
    it('creates an unknown card at zero before applying the change', () => {
      const result = dal.applyOperation({
        operation_id: 'op-1',
        card_id: 'A1',
        operation_kind: 'LOAD_FUNDS',
        amount: 1000,
        student_id: null,
      });

      expect(result.applied).toBe(true);
      expect(result.record.balance).toBe(1000);
    });

    it('applies changes in order', () => {
      dal.applyOperation({
        operation_id: 'op-1',
        card_id: 'A1',
        operation_kind: 'LOAD_FUNDS',
        amount: 1000,
        student_id: null,
      });
      dal.applyOperation({
        operation_id: 'op-2',
        card_id: 'A1',
        operation_kind: 'PURCHASE',
        amount: 350,
        student_id: null,
      });

      expect(dal.get('A1')?.balance).toBe(650);
      expect(
        dal.listAppliedOperations('A1').map((op) => [op.operation_id, op.delta, op.balance_after])
      ).toEqual([
        ['op-1', 1000, 1000],
        ['op-2', -350, 650],
      ]);
    });

    it('ignores an operation id it has already applied', () => {
      const operation = {
        operation_id: 'op-1',
        card_id: 'A1',
        operation_kind: 'REFUND' as const,
        amount: 500,
        student_id: null,
      };

      dal.applyOperation(operation);
      const replay = dal.applyOperation(operation);

      expect(replay.applied).toBe(false);
      expect(replay.record.balance).toBe(500);
      expect(dal.listAppliedOperations('A1')).toHaveLength(1);
    });

    it('raises SyncConflictError and changes nothing when the balance would go negative', () => {
      dal.put('A1', 300, 'S1');

      const attempt = () =>
        dal.applyOperation({
          operation_id: 'op-1',
          card_id: 'A1',
          operation_kind: 'PURCHASE',
          amount: 350,
          student_id: null,
        });

      expect(attempt).toThrow(SyncConflictError);
      expect(attempt).toThrow('Operation on card A1 would make balance negative (current 300, change -350)');
      expect(dal.get('A1')?.balance).toBe(300);
      expect(dal.getAppliedOperation('op-1')).toBeUndefined();
    });

    it('does not create a record for a rejected purchase on an unknown card', () => {
      expect(() =>
        dal.applyOperation({
          operation_id: 'op-1',
          card_id: 'Z9',
          operation_kind: 'PURCHASE',
          amount: 100,
          student_id: null,
        })
      ).toThrow(SyncConflictError);

      expect(dal.get('Z9')).toBeUndefined();
    });

    it('keeps the binding unless the operation carries one', () => {
      dal.put('A1', 0, 'S1');

      dal.applyOperation({
        operation_id: 'op-1',
        card_id: 'A1',
        operation_kind: 'LOAD_FUNDS',
        amount: 100,
        student_id: null,
      });
      expect(dal.get('A1')?.student_id).toBe('S1');

      dal.applyOperation({
        operation_id: 'op-2',
        card_id: 'A1',
        operation_kind: 'ADJUSTMENT',
        amount: 0,
        student_id: 'S2',
      });
      expect(dal.get('A1')).toMatchObject({ balance: 100, student_id: 'S2' });
    });

    it('accepts a negative adjustment', () => {
      dal.put('A1', 1000, null);

      const result = dal.applyOperation({
        operation_id: 'op-1',
        card_id: 'A1',
        operation_kind: 'ADJUSTMENT',
        amount: -250,
        student_id: null,
      });

      expect(result.record.balance).toBe(750);
    });
  });

  it('raises StorageUnavailableError once the database is closed', () => {
    db.close();

    expect(() => dal.get('A1')).toThrow(StorageUnavailableError);
    expect(() => dal.put('A1', 100, null)).toThrow(StorageUnavailableError);
  });
});
