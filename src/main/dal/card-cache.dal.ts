/**
 * Card Cache Data Access Layer
 *
 * Offline mirror of card state, written after every successful reader
 * interaction and every offline write. Served when the reader is
 * unavailable; entries older than the TTL are still returned, flagged stale.
 * An offline write marks its entry card_behind until the card itself is
 * written again.
 *
 * @module main/dal/card-cache
 */

import { BaseDAL } from './base.dal';
import type { DatabaseInstance } from '../services/database.service';
import { calculateChecksum, verifyChecksum } from '../hardware/card-layout';
import {
  BalanceCentsSchema,
  CardIdSchema,
  StudentIdSchema,
  type CachedCardRecord,
  type CardContents,
} from '../../shared/types/card.types';
import { DataIntegrityError } from '../utils/errors';
import { createLogger } from '../utils/logger';

// ============================================================================
// Types
// ============================================================================

interface CardCacheRow {
  card_id: string;
  balance: number;
  student_id: string | null;
  checksum: string;
  cached_at: string;
  card_behind: number;
}

export interface CardCachePut extends CardContents {
  card_id: string;
  /** Set when the change could not be written to the card (default: false) */
  card_behind?: boolean;
}

// ============================================================================
// Constants
// ============================================================================

/** Default staleness threshold (24 hours) */
export const DEFAULT_CACHE_TTL_MS = 24 * 60 * 60 * 1000;

// ============================================================================
// Logger
// ============================================================================

const log = createLogger('card-cache-dal');

// ============================================================================
// Card Cache DAL
// ============================================================================

export class CardCacheDAL extends BaseDAL<CardCacheRow> {
  protected readonly tableName = 'card_cache';
  protected readonly primaryKey = 'card_id';

  constructor(
    db: DatabaseInstance,
    private readonly ttlMs: number = DEFAULT_CACHE_TTL_MS
  ) {
    super(db);
  }

  /**
   * Cached state of a card
   *
   * @throws DataIntegrityError if the stored checksum does not match
   */
  get(cardId: string): CachedCardRecord | undefined {
    const row = this.findById(cardId);
    if (!row) return undefined;

    if (!verifyChecksum(row.balance, row.student_id, row.checksum)) {
      log.error('Cached card failed checksum validation', { cardId });
      throw new DataIntegrityError(cardId, 'cache', 'checksum mismatch');
    }

    return this.toCachedRecord(row, Date.now());
  }

  /**
   * Overwrite the cached state of a card (last writer wins)
   */
  put(entry: CardCachePut): CachedCardRecord {
    CardIdSchema.parse(entry.card_id);
    BalanceCentsSchema.parse(entry.balance);
    if (entry.student_id !== null) StudentIdSchema.parse(entry.student_id);

    const row: CardCacheRow = {
      card_id: entry.card_id,
      balance: entry.balance,
      student_id: entry.student_id,
      checksum: calculateChecksum(entry.balance, entry.student_id),
      cached_at: this.now(),
      card_behind: entry.card_behind ? 1 : 0,
    };

    this.guard('put', () =>
      this.db
        .prepare(
          `INSERT INTO card_cache (card_id, balance, student_id, checksum, cached_at, card_behind)
           VALUES (@card_id, @balance, @student_id, @checksum, @cached_at, @card_behind)
           ON CONFLICT(card_id) DO UPDATE SET
             balance = excluded.balance,
             student_id = excluded.student_id,
             checksum = excluded.checksum,
             cached_at = excluded.cached_at,
             card_behind = excluded.card_behind`
        )
        .run(row)
    );

    log.debug('Card cached', { cardId: entry.card_id, balance: entry.balance });
    return this.toCachedRecord(row, Date.parse(row.cached_at));
  }

  remove(cardId: string): boolean {
    return this.delete(cardId);
  }

  /**
   * Entries older than the TTL, oldest first. Checksums are not validated here.
   */
  listStale(): CachedCardRecord[] {
    const now = Date.now();
    const cutoff = new Date(now - this.ttlMs).toISOString();

    const rows = this.guard('listStale', () =>
      this.db
        .prepare<[string], CardCacheRow>(
          `SELECT card_id, balance, student_id, checksum, cached_at, card_behind
           FROM card_cache WHERE cached_at < ?
           ORDER BY cached_at ASC`
        )
        .all(cutoff)
    );

    return rows.map((row) => this.toCachedRecord(row, now));
  }

  private toCachedRecord(row: CardCacheRow, now: number): CachedCardRecord {
    return {
      card_id: row.card_id,
      balance: row.balance,
      student_id: row.student_id,
      checksum: row.checksum,
      cached_at: row.cached_at,
      is_stale: now - Date.parse(row.cached_at) > this.ttlMs,
      card_behind: row.card_behind === 1,
    };
  }
}
