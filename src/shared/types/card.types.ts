/**
 * Card Types
 *
 * Records, cached mirrors and queued operations for student balance cards,
 * with Zod schemas for everything that crosses a storage or caller boundary.
 *
 * All money values are integer cents.
 *
 * @module shared/types/card.types
 */

import { z } from 'zod';

// ============================================================================
// Primitive Schemas
// ============================================================================

/**
 * Card identifier: the card UID as uppercase hex, or any caller-chosen
 * token without whitespace
 */
export const CardIdSchema = z
  .string()
  .min(1, 'Card ID is required')
  .max(64, 'Card ID too long')
  .regex(/^[A-Za-z0-9:\-_]+$/, 'Card ID contains invalid characters');

/**
 * Student identifier; must fit the 16-byte student block
 */
export const StudentIdSchema = z
  .string()
  .min(1, 'Student ID cannot be empty')
  .refine((value) => Buffer.byteLength(value, 'utf8') <= 16, 'Student ID exceeds 16 bytes')
  .refine((value) => !value.includes('\u0000'), 'Student ID cannot contain NUL');

/** Non-negative balance in cents */
export const BalanceCentsSchema = z
  .number()
  .int('Balance must be whole cents')
  .min(0, 'Balance cannot be negative')
  .max(99_999_999, 'Balance exceeds card capacity');

// ============================================================================
// Operation Kinds & Status
// ============================================================================

export const OperationKindSchema = z.enum(['LOAD_FUNDS', 'PURCHASE', 'REFUND', 'ADJUSTMENT']);

export type OperationKind = z.infer<typeof OperationKindSchema>;

export const SyncStatusSchema = z.enum(['PENDING', 'SYNCED', 'FAILED']);

export type SyncStatus = z.infer<typeof SyncStatusSchema>;

/**
 * Why an operation is FAILED
 * - CONFLICT: the authoritative store rejected it (balance would go negative);
 *   held until someone retries it by hand
 * - TRANSIENT: the store could not be reached; re-queued after a backoff
 */
export const FailureCategorySchema = z.enum(['CONFLICT', 'TRANSIENT']);

export type FailureCategory = z.infer<typeof FailureCategorySchema>;

// ============================================================================
// Records
// ============================================================================

/**
 * Authoritative card record (primary database)
 */
export interface CardRecord {
  card_id: string;
  balance: number;
  student_id: string | null;
  checksum: string;
  created_at: string;
  updated_at: string;
}

/**
 * Offline mirror of a card record
 */
export interface CachedCardRecord {
  card_id: string;
  balance: number;
  student_id: string | null;
  checksum: string;
  cached_at: string;
  /** Older than the cache TTL; still served */
  is_stale: boolean;
  /** Accepted offline; the physical card has not been written since */
  card_behind: boolean;
}

/**
 * Card contents as written to or read from the three data blocks
 */
export interface CardContents {
  balance: number;
  student_id: string | null;
}

// ============================================================================
// Pending Operations
// ============================================================================

/**
 * Balance-changing operation accepted while the authoritative store was out of reach
 */
export interface PendingOperation {
  operation_id: string;
  /** Arrival order; FIFO key */
  seq: number;
  card_id: string;
  operation_kind: OperationKind;
  /** Cents. Positive for every kind except ADJUSTMENT, which is signed */
  amount: number;
  /** Student binding to apply with the balance change */
  student_id: string | null;
  created_at: string;
  sync_status: SyncStatus;
  attempts: number;
  last_error: string | null;
  error_category: FailureCategory | null;
  retry_after: string | null;
  last_attempt_at: string | null;
  synced_at: string | null;
}

/**
 * Input accepted by the queue
 */
export const EnqueueOperationSchema = z
  .object({
    card_id: CardIdSchema,
    operation_kind: OperationKindSchema,
    amount: z.number().int('Amount must be whole cents'),
    student_id: StudentIdSchema.nullable().default(null),
  })
  .superRefine((value, ctx) => {
    if (value.operation_kind !== 'ADJUSTMENT' && value.amount <= 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['amount'],
        message: `${value.operation_kind} amount must be positive`,
      });
    }
  });

export type EnqueueOperationInput = z.input<typeof EnqueueOperationSchema>;
export type EnqueueOperationData = z.output<typeof EnqueueOperationSchema>;

/**
 * Signed balance change of an operation
 */
export function operationDelta(kind: OperationKind, amount: number): number {
  switch (kind) {
    case 'LOAD_FUNDS':
    case 'REFUND':
      return amount;
    case 'PURCHASE':
      return -amount;
    case 'ADJUSTMENT':
      return amount;
    default: {
      const unreachable: never = kind;
      throw new Error(`Unhandled operation kind: ${String(unreachable)}`);
    }
  }
}

/**
 * Operation that carries a balance change of `delta` from an absolute write.
 * A zero delta is an ADJUSTMENT so that a re-binding still reaches the store.
 */
export function operationForDelta(delta: number): { kind: OperationKind; amount: number } {
  if (delta > 0) return { kind: 'LOAD_FUNDS', amount: delta };
  if (delta < 0) return { kind: 'PURCHASE', amount: -delta };
  return { kind: 'ADJUSTMENT', amount: 0 };
}

/**
 * What started a reconciler run
 */
export type ReconcileTrigger = 'interval' | 'manual' | 'reconnected' | 'startup';

// ============================================================================
// Facade Results
// ============================================================================

export interface CardReadResult {
  card_id: string;
  balance: number;
  student_id: string | null;
  from_cache: boolean;
  /** Only ever true when from_cache is true */
  is_stale: boolean;
}

export interface CardWriteResult {
  card_id: string;
  balance: number;
  committed_to_hardware: boolean;
  /** A pending operation was queued for the authoritative store */
  queued: boolean;
}

export interface QueueStats {
  pending: number;
  failed: number;
  synced: number;
  oldestPending: string | null;
}
