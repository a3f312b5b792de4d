/**
 * Card Access Service
 *
 * The read/write facade the web layer calls. Every request tries the
 * reader first; when the reader is unavailable, times out, holds the
 * wrong card or sits behind an open circuit, reads are answered from the
 * offline cache and writes are accepted into the cache and the pending
 * operation queue for the reconciler to replay.
 *
 * A card is never read and written concurrently: each call runs under the
 * card's lock from the first reader command to the last store write.
 *
 * A change accepted offline leaves the physical card behind. Once the
 * queue for that card has drained, the next call that reaches the card
 * brings it up to the primary store's state before using it.
 *
 * @module main/services/card-access
 */

import { randomUUID } from 'crypto';
import type { HardwareAdapter } from '../hardware/hardware-adapter';
import {
  BALANCE_BLOCK,
  CHECKSUM_BLOCK,
  STUDENT_ID_BLOCK,
  XorCardCipher,
  decodeCardBlocks,
  encodeCardBlocks,
} from '../hardware/card-layout';
import type { CardRecordStore } from '../dal/card-records.dal';
import type { CardCacheDAL } from '../dal/card-cache.dal';
import type { PendingOperationsDAL } from '../dal/pending-operations.dal';
import { CircuitBreakerService } from './circuit-breaker.service';
import { KeyedMutex } from '../utils/keyed-mutex';
import { CardEventBus, CardEvents } from '../utils/event-bus';
import { withTimeout } from '../utils/timeout';
import {
  CardNotFoundError,
  DataIntegrityError,
  HardwareUnavailableError,
  InsufficientFundsError,
  StorageUnavailableError,
  SyncConflictError,
  TimedOutError,
  isAdapterFailure,
} from '../utils/errors';
import {
  BalanceCentsSchema,
  CardIdSchema,
  EnqueueOperationSchema,
  StudentIdSchema,
  operationDelta,
  operationForDelta,
  type CachedCardRecord,
  type CardContents,
  type CardReadResult,
  type CardWriteResult,
  type OperationKind,
  type PendingOperation,
} from '../../shared/types/card.types';
import { createLogger } from '../utils/logger';

// ============================================================================
// Types
// ============================================================================

export interface CardAccessDependencies {
  adapter: HardwareAdapter;
  store: CardRecordStore;
  cache: CardCacheDAL;
  queue: PendingOperationsDAL;
  locks: KeyedMutex;
  events: CardEventBus;
  cipher?: XorCardCipher;
  breaker?: CircuitBreakerService;
  /** Upper bound for each reader call (default: 10000) */
  hardwareTimeoutMs?: number;
}

interface BalanceChange {
  kind: OperationKind;
  amount: number;
}

interface KnownState {
  balance: number;
  student_id: string | null;
}

// ============================================================================
// Constants
// ============================================================================

const DEFAULT_HARDWARE_TIMEOUT_MS = 10_000;

const DATA_BLOCKS = [BALANCE_BLOCK, STUDENT_ID_BLOCK, CHECKSUM_BLOCK] as const;

// ============================================================================
// Logger
// ============================================================================

const log = createLogger('card-access');

// ============================================================================
// Card Access Service
// ============================================================================

export class CardAccessService {
  private readonly adapter: HardwareAdapter;
  private readonly store: CardRecordStore;
  private readonly cache: CardCacheDAL;
  private readonly queue: PendingOperationsDAL;
  private readonly locks: KeyedMutex;
  private readonly events: CardEventBus;
  private readonly cipher: XorCardCipher;
  private readonly breaker: CircuitBreakerService;
  private readonly hardwareTimeoutMs: number;

  constructor(deps: CardAccessDependencies) {
    this.adapter = deps.adapter;
    this.store = deps.store;
    this.cache = deps.cache;
    this.queue = deps.queue;
    this.locks = deps.locks;
    this.events = deps.events;
    this.cipher = deps.cipher ?? new XorCardCipher();
    this.hardwareTimeoutMs = deps.hardwareTimeoutMs ?? DEFAULT_HARDWARE_TIMEOUT_MS;
    this.breaker =
      deps.breaker ??
      new CircuitBreakerService('nfc-reader', { isFailure: isReaderHealthFailure });

    this.breaker.onStateChange((from, to) => {
      if (to === 'OPEN' && from === 'CLOSED') {
        this.events.emit(CardEvents.HARDWARE_DISCONNECTED);
      } else if (to === 'CLOSED' && from !== 'CLOSED') {
        this.events.emit(CardEvents.HARDWARE_RECONNECTED);
      }
    });
  }

  // ==========================================================================
  // Read
  // ==========================================================================

  /**
   * Current balance and binding of a card
   *
   * @throws DataIntegrityError if the card or the cached copy fails its checksum
   * @throws CardNotFoundError if the reader is unavailable and the card was never cached
   */
  async read(cardId: string): Promise<CardReadResult> {
    CardIdSchema.parse(cardId);

    return this.locks.runExclusive(cardId, async () => {
      let contents: CardContents;
      try {
        contents = await this.readFromCard(cardId);
      } catch (error) {
        if (!isAdapterFailure(error)) throw error;
        log.warn('Reader unavailable, serving card from offline cache', {
          cardId,
          error: error instanceof Error ? error.message : 'Unknown error',
        });
        return this.readFromCache(cardId);
      }

      // The card lags behind changes still waiting in the queue
      const queued = this.queuedState(cardId);
      if (queued) {
        log.debug('Card has queued changes, serving cached view', { cardId });
        return {
          card_id: cardId,
          balance: queued.balance,
          student_id: queued.student_id,
          from_cache: true,
          is_stale: queued.is_stale,
        };
      }

      const target = this.catchUpState(cardId);
      if (target && !sameContents(target, contents)) {
        try {
          await this.writeToCard(cardId, target);
        } catch (error) {
          if (!isAdapterFailure(error)) throw error;
          log.warn('Could not bring card up to date, serving cached view', {
            cardId,
            error: error instanceof Error ? error.message : 'Unknown error',
          });
          return this.readFromCache(cardId);
        }
        log.info('Card brought up to date', { cardId, balance: target.balance });
      }

      const state = target ?? contents;
      this.cache.put({ card_id: cardId, ...state });
      return { card_id: cardId, ...state, from_cache: false, is_stale: false };
    });
  }

  /**
   * Wait for any card on the reader, then read it
   *
   * @throws TimedOutError if no card arrives in time
   */
  async scan(timeoutMs: number = this.hardwareTimeoutMs): Promise<CardReadResult> {
    const cardId = await this.breaker.execute(async () => {
      await withTimeout(this.adapter.connect(), this.hardwareTimeoutMs, 'connect');
      try {
        return await withTimeout(this.adapter.waitForCard(timeoutMs), timeoutMs, 'waitForCard');
      } catch (error) {
        // An empty reader is healthy; keep it out of the breaker's failure count
        if (error instanceof TimedOutError) return null;
        throw error;
      }
    });

    if (cardId === null) {
      throw new TimedOutError('waitForCard', timeoutMs);
    }

    log.info('Card scanned', { cardId });
    return this.read(cardId);
  }

  // ==========================================================================
  // Write
  // ==========================================================================

  /**
   * Set the balance (and optionally the student binding) of a card
   *
   * @param studentId - New binding. Null or omitted keeps the current one;
   *   a card cannot be unbound here, since a queued operation uses null
   *   for "binding unchanged".
   */
  async write(
    cardId: string,
    balance: number,
    studentId: string | null = null
  ): Promise<CardWriteResult> {
    CardIdSchema.parse(cardId);
    BalanceCentsSchema.parse(balance);
    if (studentId !== null) StudentIdSchema.parse(studentId);

    return this.locks.runExclusive(cardId, async () => {
      const known = this.lastKnownState(cardId);
      const next: CardContents = {
        balance,
        student_id: studentId ?? known?.student_id ?? null,
      };
      const change = operationForDelta(balance - (known?.balance ?? 0));
      const bindingChanged = next.student_id !== (known?.student_id ?? null);

      return this.commit(cardId, next, change, bindingChanged, (record) =>
        this.store.put(cardId, record.balance, record.student_id)
      );
    });
  }

  /**
   * Apply one balance change as a single read-modify-write
   *
   * @throws InsufficientFundsError if the change would make the known balance negative
   */
  async applyOperation(
    cardId: string,
    kind: OperationKind,
    amount: number,
    studentId: string | null = null
  ): Promise<CardWriteResult> {
    CardIdSchema.parse(cardId);
    const operation = EnqueueOperationSchema.parse({
      card_id: cardId,
      operation_kind: kind,
      amount,
      student_id: studentId,
    });

    return this.locks.runExclusive(cardId, async () => {
      const current = await this.currentState(cardId);
      const delta = operationDelta(operation.operation_kind, operation.amount);
      const newBalance = current.balance + delta;

      if (newBalance < 0) {
        throw new InsufficientFundsError(cardId, current.balance, -delta);
      }

      const next: CardContents = {
        balance: newBalance,
        student_id: operation.student_id ?? current.student_id,
      };
      const change: BalanceChange = { kind: operation.operation_kind, amount: operation.amount };
      const bindingChanged = next.student_id !== current.student_id;

      return this.commit(cardId, next, change, bindingChanged, () =>
        this.store.applyOperation({
          operation_id: randomUUID(),
          card_id: cardId,
          operation_kind: change.kind,
          amount: change.amount,
          student_id: operation.student_id,
        })
      );
    });
  }

  // ==========================================================================
  // Private: commit paths
  // ==========================================================================

  /**
   * Write `next` to the card, then bring the primary store along.
   * Falls back to cache + queue when the reader fails.
   */
  private async commit(
    cardId: string,
    next: CardContents,
    change: BalanceChange,
    bindingChanged: boolean,
    updateStore: (next: CardContents) => unknown
  ): Promise<CardWriteResult> {
    try {
      await this.writeToCard(cardId, next);
    } catch (error) {
      if (!isAdapterFailure(error)) throw error;
      log.warn('Reader unavailable, accepting write offline', {
        cardId,
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      return this.commitOffline(cardId, next, change, bindingChanged);
    }

    this.cache.put({ card_id: cardId, ...next });

    if (this.queue.hasOutstanding(cardId)) {
      // Queued changes must reach the store first, in order
      const queued = this.announce(this.enqueueChange(cardId, next, change, bindingChanged));
      return { card_id: cardId, balance: next.balance, committed_to_hardware: true, queued };
    }

    try {
      updateStore(next);
      return { card_id: cardId, balance: next.balance, committed_to_hardware: true, queued: false };
    } catch (error) {
      if (!(error instanceof StorageUnavailableError || error instanceof SyncConflictError)) {
        throw error;
      }
      log.warn('Primary store rejected or unreachable, queueing change', {
        cardId,
        error: error.message,
      });
      const queued = this.announce(this.enqueueChange(cardId, next, change, bindingChanged));
      return { card_id: cardId, balance: next.balance, committed_to_hardware: true, queued };
    }
  }

  private commitOffline(
    cardId: string,
    next: CardContents,
    change: BalanceChange,
    bindingChanged: boolean
  ): CardWriteResult {
    // Queue row and cache row land together or not at all
    const operation = this.queue.atomically(() => {
      const enqueued = this.enqueueChange(cardId, next, change, bindingChanged);
      this.cache.put({ card_id: cardId, ...next, card_behind: true });
      return enqueued;
    });
    const queued = this.announce(operation);
    return { card_id: cardId, balance: next.balance, committed_to_hardware: false, queued };
  }

  /**
   * @returns null when there is nothing to replay (no balance change, same binding)
   */
  private enqueueChange(
    cardId: string,
    next: CardContents,
    change: BalanceChange,
    bindingChanged: boolean
  ): PendingOperation | null {
    if (operationDelta(change.kind, change.amount) === 0 && !bindingChanged) {
      return null;
    }

    return this.queue.enqueue({
      card_id: cardId,
      operation_kind: change.kind,
      amount: change.amount,
      student_id: bindingChanged ? next.student_id : null,
    });
  }

  private announce(operation: PendingOperation | null): boolean {
    if (!operation) return false;
    this.events.emit(CardEvents.CARD_QUEUED, {
      cardId: operation.card_id,
      operationId: operation.operation_id,
    });
    return true;
  }

  // ==========================================================================
  // Private: state lookups
  // ==========================================================================

  /**
   * Card state for a read-modify-write: the offline view while changes are
   * queued, the primary store while the card is behind, else the card
   */
  private async currentState(cardId: string): Promise<KnownState> {
    let fromCard: KnownState;
    try {
      fromCard = await this.readFromCard(cardId);
    } catch (error) {
      if (!isAdapterFailure(error)) throw error;
      return this.lastKnownState(cardId) ?? { balance: 0, student_id: null };
    }
    return this.queuedState(cardId) ?? this.catchUpState(cardId) ?? fromCard;
  }

  /**
   * Cached state of a card with operations still queued, which includes
   * changes the physical card has not seen yet
   */
  private queuedState(cardId: string): (KnownState & { is_stale: boolean }) | null {
    if (!this.queue.hasOutstanding(cardId)) return null;
    try {
      const cached = this.cache.get(cardId);
      if (!cached) return null;
      return { balance: cached.balance, student_id: cached.student_id, is_stale: cached.is_stale };
    } catch (error) {
      if (!(error instanceof DataIntegrityError)) throw error;
      log.warn('Ignoring corrupt cache entry', { cardId });
      return null;
    }
  }

  /**
   * State a card should be brought to when it missed an offline change
   * whose queue has since drained; null when the card is current
   */
  private catchUpState(cardId: string): KnownState | null {
    if (this.queue.hasOutstanding(cardId)) return null;

    let cached: CachedCardRecord | undefined;
    try {
      cached = this.cache.get(cardId);
    } catch (error) {
      if (!(error instanceof DataIntegrityError)) throw error;
      log.warn('Ignoring corrupt cache entry', { cardId });
      return null;
    }
    if (!cached?.card_behind) return null;

    try {
      const record = this.store.get(cardId);
      if (record) return { balance: record.balance, student_id: record.student_id };
    } catch (error) {
      if (!(error instanceof StorageUnavailableError)) throw error;
      log.warn('Primary store unreachable, catching card up from cache', { cardId });
    }
    return { balance: cached.balance, student_id: cached.student_id };
  }

  /**
   * Most recent state this service has seen: the offline cache, else the
   * primary store. A corrupt cache entry or an unreachable store counts
   * as unknown.
   */
  private lastKnownState(cardId: string): KnownState | null {
    try {
      const cached = this.cache.get(cardId);
      if (cached) return { balance: cached.balance, student_id: cached.student_id };
    } catch (error) {
      if (!(error instanceof DataIntegrityError)) throw error;
      log.warn('Ignoring corrupt cache entry', { cardId });
    }

    try {
      const record = this.store.get(cardId);
      if (record) return { balance: record.balance, student_id: record.student_id };
    } catch (error) {
      if (!(error instanceof StorageUnavailableError)) throw error;
      log.warn('Primary store unreachable while resolving card state', { cardId });
    }

    return null;
  }

  private readFromCache(cardId: string): CardReadResult {
    const cached = this.cache.get(cardId);
    if (!cached) {
      throw new CardNotFoundError(cardId);
    }
    return {
      card_id: cardId,
      balance: cached.balance,
      student_id: cached.student_id,
      from_cache: true,
      is_stale: cached.is_stale,
    };
  }

  // ==========================================================================
  // Private: reader access
  // ==========================================================================

  private async readFromCard(cardId: string): Promise<CardContents> {
    const blocks = await this.hardware('read', async () => {
      await this.adapter.connect();
      return {
        [BALANCE_BLOCK]: await this.adapter.readBlock(cardId, BALANCE_BLOCK),
        [STUDENT_ID_BLOCK]: await this.adapter.readBlock(cardId, STUDENT_ID_BLOCK),
        [CHECKSUM_BLOCK]: await this.adapter.readBlock(cardId, CHECKSUM_BLOCK),
      };
    });

    return decodeCardBlocks(cardId, blocks, this.cipher);
  }

  private async writeToCard(cardId: string, contents: CardContents): Promise<void> {
    const blocks = encodeCardBlocks(contents, this.cipher);
    await this.hardware('write', async () => {
      await this.adapter.connect();
      for (const block of DATA_BLOCKS) {
        await this.adapter.writeBlock(cardId, block, blocks[block]);
      }
    });
    log.info('Card written', { cardId, balance: contents.balance });
  }

  /**
   * Run a reader interaction through the breaker, bounded by the hardware timeout
   */
  private hardware<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return this.breaker.execute(() => withTimeout(fn(), this.hardwareTimeoutMs, operation));
  }
}

function sameContents(a: KnownState, b: KnownState): boolean {
  return a.balance === b.balance && a.student_id === b.student_id;
}

/**
 * Failures that say the reader itself is unwell
 */
export function isReaderHealthFailure(error: Error): boolean {
  return error instanceof HardwareUnavailableError || error instanceof TimedOutError;
}
