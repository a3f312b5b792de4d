/**
 * Card Access Service Unit Tests
 *
 * The facade against the simulated reader and real in-memory stores:
 * hardware reads and writes, the offline fallback, the reader circuit,
 * and the partial-write case.
 *
 * @module tests/unit/services/card-access.service.spec
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

import {
  CardAccessService,
  isReaderHealthFailure,
} from '../../../src/main/services/card-access.service';
import { CircuitBreakerService } from '../../../src/main/services/circuit-breaker.service';
import { SimulatedReader } from '../../../src/main/hardware/simulated-reader';
import { XorCardCipher, decodeCardBlocks } from '../../../src/main/hardware/card-layout';
import { CardRecordsDAL } from '../../../src/main/dal/card-records.dal';
import { CardCacheDAL } from '../../../src/main/dal/card-cache.dal';
import { PendingOperationsDAL } from '../../../src/main/dal/pending-operations.dal';
import { KeyedMutex } from '../../../src/main/utils/keyed-mutex';
import { CardEventBus, CardEvents } from '../../../src/main/utils/event-bus';
import {
  CardNotFoundError,
  DataIntegrityError,
  HardwareUnavailableError,
  InsufficientFundsError,
  StorageUnavailableError,
  TimedOutError,
} from '../../../src/main/utils/errors';
import { createTestDatabases, type TestDatabaseContext } from '../../helpers/test-database';

// ============================================================================
// Test Helpers
// ============================================================================

const RESET_TIMEOUT_MS = 50;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function cardContents(reader: SimulatedReader, cardId: string) {
  return decodeCardBlocks(cardId, reader.getCardBlocks(cardId), new XorCardCipher());
}

describe('CardAccessService', () => {
  let dbs: TestDatabaseContext;
  let reader: SimulatedReader;
  let store: CardRecordsDAL;
  let cache: CardCacheDAL;
  let queue: PendingOperationsDAL;
  let events: CardEventBus;
  let breaker: CircuitBreakerService;
  let access: CardAccessService;

  beforeEach(() => {
    dbs = createTestDatabases();
    reader = new SimulatedReader();
    store = new CardRecordsDAL(dbs.primary);
    cache = new CardCacheDAL(dbs.offline);
    queue = new PendingOperationsDAL(dbs.offline);
    events = new CardEventBus();
    breaker = new CircuitBreakerService('nfc-reader', {
      failureThreshold: 2,
      resetTimeoutMs: RESET_TIMEOUT_MS,
      isFailure: isReaderHealthFailure,
    });
    access = new CardAccessService({
      adapter: reader,
      store,
      cache,
      queue,
      locks: new KeyedMutex(),
      events,
      breaker,
      hardwareTimeoutMs: 100,
    });
  });

  afterEach(() => {
    events.removeAllListeners();
    dbs.cleanup();
  });

  // ==========================================================================
  // read
  // ==========================================================================

  describe('read', () => {
    it('reads the card and refreshes the cache', async () => {
      reader.addCard('A1', { balance: 2000, student_id: 'S1' });
      reader.presentCard('A1');

      await expect(access.read('A1')).resolves.toEqual({
        card_id: 'A1',
        balance: 2000,
        student_id: 'S1',
        from_cache: false,
        is_stale: false,
      });
      expect(cache.get('A1')).toMatchObject({ balance: 2000, student_id: 'S1', is_stale: false });
    });

    it('serves the cache when the reader is unavailable', async () => {
      cache.put({ card_id: 'A1', balance: 1500, student_id: 'S1' });
      reader.setAvailable(false);

      await expect(access.read('A1')).resolves.toEqual({
        card_id: 'A1',
        balance: 1500,
        student_id: 'S1',
        from_cache: true,
        is_stale: false,
      });
    });

    it('serves the cache when another card is on the reader', async () => {
      cache.put({ card_id: 'A1', balance: 1500, student_id: null });
      reader.addCard('B2', { balance: 10, student_id: null });
      reader.presentCard('B2');

      await expect(access.read('A1')).resolves.toMatchObject({ balance: 1500, from_cache: true });
    });

    it('serves the cache when the reader hangs', async () => {
      cache.put({ card_id: 'A1', balance: 700, student_id: null });
      reader.setUnresponsive(true);

      await expect(access.read('A1')).resolves.toMatchObject({ balance: 700, from_cache: true });
    });

    it('raises CardNotFoundError when neither the reader nor the cache knows the card', async () => {
      reader.setAvailable(false);

      await expect(access.read('A1')).rejects.toBeInstanceOf(CardNotFoundError);
    });

    it('raises DataIntegrityError on a checksum mismatch without falling back', async () => {
      cache.put({ card_id: 'A1', balance: 2000, student_id: 'S1' });
      reader.addCard('A1', { balance: 2000, student_id: 'S1' });
      reader.setBlock('A1', 6, Buffer.from('deadbeef'.padEnd(16, '\u0000'), 'latin1'));
      reader.presentCard('A1');

      await expect(access.read('A1')).rejects.toBeInstanceOf(DataIntegrityError);
      expect(cache.get('A1')?.balance).toBe(2000);
    });

    it('rejects an invalid card id', async () => {
      await expect(access.read('not a card')).rejects.toThrow('Card ID contains invalid characters');
    });
  });

  // ==========================================================================
  // scan
  // ==========================================================================

  describe('scan', () => {
    it('reads the card placed on the reader', async () => {
      reader.addCard('A1', { balance: 500, student_id: null });

      const scanning = access.scan(1000);
      reader.presentCard('A1');

      await expect(scanning).resolves.toMatchObject({ card_id: 'A1', balance: 500 });
    });

    it('times out on an empty reader without tripping the circuit', async () => {
      await expect(access.scan(30)).rejects.toBeInstanceOf(TimedOutError);
      await expect(access.scan(30)).rejects.toBeInstanceOf(TimedOutError);

      expect(breaker.getState()).toBe('CLOSED');
      expect(breaker.getMetrics().failureCount).toBe(0);
    });

    it('fails while the reader is unavailable', async () => {
      reader.setAvailable(false);

      await expect(access.scan(30)).rejects.toBeInstanceOf(HardwareUnavailableError);
    });
  });

  // ==========================================================================
  // write
  // ==========================================================================

  describe('write', () => {
    it('writes the card, the cache and the primary store', async () => {
      reader.presentCard('A1');

      await expect(access.write('A1', 2000, 'S1')).resolves.toEqual({
        card_id: 'A1',
        balance: 2000,
        committed_to_hardware: true,
        queued: false,
      });

      expect(reader.getBlock('A1', 4).subarray(0, 5)).toEqual(
        Buffer.from([0x97, 0x95, 0x8b, 0x95, 0x95])
      );
      expect(reader.getBlock('A1', 6).subarray(0, 8).toString('ascii')).toBe('c1f2c730');
      expect(store.get('A1')).toMatchObject({ balance: 2000, student_id: 'S1' });
      expect(cache.get('A1')).toMatchObject({ balance: 2000, student_id: 'S1', card_behind: false });
      expect(queue.count()).toBe(0);
    });

    it('keeps the current binding when no student is given', async () => {
      reader.presentCard('A1');
      await access.write('A1', 2000, 'S1');

      await access.write('A1', 1500);

      await expect(access.read('A1')).resolves.toMatchObject({ balance: 1500, student_id: 'S1' });
      expect(store.get('A1')?.student_id).toBe('S1');
    });

    it('accepts the write offline and queues the change', async () => {
      reader.setAvailable(false);
      const queuedEvents: string[] = [];
      events.on(CardEvents.CARD_QUEUED, (event) => queuedEvents.push(event.cardId));

      await expect(access.write('A1', 2000, 'S1')).resolves.toEqual({
        card_id: 'A1',
        balance: 2000,
        committed_to_hardware: false,
        queued: true,
      });

      expect(queue.listPending()).toEqual([
        expect.objectContaining({
          card_id: 'A1',
          operation_kind: 'LOAD_FUNDS',
          amount: 2000,
          student_id: 'S1',
          sync_status: 'PENDING',
        }),
      ]);
      expect(queuedEvents).toEqual(['A1']);
      expect(cache.get('A1')?.card_behind).toBe(true);
      await expect(access.read('A1')).resolves.toMatchObject({
        balance: 2000,
        student_id: 'S1',
        from_cache: true,
      });
      expect(store.get('A1')).toBeUndefined();
    });

    it('queues nothing when the offline cache cannot be written', async () => {
      dbs.offline.exec(`
        CREATE TRIGGER reject_cache_insert BEFORE INSERT ON card_cache
        BEGIN SELECT RAISE(ABORT, 'cache unavailable'); END
      `);
      reader.setAvailable(false);
      const queuedEvent = vi.fn();
      events.on(CardEvents.CARD_QUEUED, queuedEvent);

      await expect(access.write('A1', 2000, 'S1')).rejects.toBeInstanceOf(
        StorageUnavailableError
      );

      expect(queue.count()).toBe(0);
      expect(queuedEvent).not.toHaveBeenCalled();
    });

    it('treats a null student as keeping the binding', async () => {
      reader.presentCard('A1');
      await access.write('A1', 2000, 'S1');

      await access.write('A1', 1800, null);

      expect(store.get('A1')).toMatchObject({ balance: 1800, student_id: 'S1' });
      expect(cardContents(reader, 'A1')).toEqual({ balance: 1800, student_id: 'S1' });
    });

    it('queues the difference from the last known balance', async () => {
      cache.put({ card_id: 'A1', balance: 2000, student_id: 'S1' });
      reader.setAvailable(false);

      await access.write('A1', 1500);

      expect(queue.listPending()).toEqual([
        expect.objectContaining({ operation_kind: 'PURCHASE', amount: 500, student_id: null }),
      ]);
    });

    it('queues nothing when the offline write changes nothing', async () => {
      cache.put({ card_id: 'A1', balance: 2000, student_id: 'S1' });
      reader.setAvailable(false);

      await expect(access.write('A1', 2000)).resolves.toMatchObject({ queued: false });
      expect(queue.count()).toBe(0);
    });

    it('queues a re-binding with no balance change as an adjustment', async () => {
      cache.put({ card_id: 'A1', balance: 2000, student_id: 'S1' });
      reader.setAvailable(false);

      await access.write('A1', 2000, 'S2');

      expect(queue.listPending()).toEqual([
        expect.objectContaining({ operation_kind: 'ADJUSTMENT', amount: 0, student_id: 'S2' }),
      ]);
    });

    it('queues behind outstanding operations even with the reader present', async () => {
      queue.enqueue({ card_id: 'A1', operation_kind: 'LOAD_FUNDS', amount: 1000 });
      cache.put({ card_id: 'A1', balance: 1000, student_id: null });
      reader.presentCard('A1');

      await expect(access.write('A1', 1200)).resolves.toEqual({
        card_id: 'A1',
        balance: 1200,
        committed_to_hardware: true,
        queued: true,
      });

      expect(store.get('A1')).toBeUndefined();
      expect(queue.listPending().map((op) => [op.operation_kind, op.amount])).toEqual([
        ['LOAD_FUNDS', 1000],
        ['LOAD_FUNDS', 200],
      ]);
    });

    it('rejects a negative balance before touching the reader', async () => {
      const connect = vi.spyOn(reader, 'connect');

      await expect(access.write('A1', -1)).rejects.toThrow();
      expect(connect).not.toHaveBeenCalled();
    });

    it('heals a card left half-written', async () => {
      reader.addCard('A1', { balance: 1000, student_id: null });
      reader.presentCard('A1');
      await access.read('A1');

      reader.interruptAfterWrites(1);
      await expect(access.write('A1', 2000)).resolves.toMatchObject({
        committed_to_hardware: false,
        queued: true,
      });

      reader.interruptAfterWrites(null);
      await expect(access.read('A1')).rejects.toBeInstanceOf(DataIntegrityError);

      await expect(access.write('A1', 2000)).resolves.toMatchObject({
        committed_to_hardware: true,
      });
      expect(reader.getBlock('A1', 6).subarray(0, 8).toString('ascii')).toBe('031c0004');
      await expect(access.read('A1')).resolves.toMatchObject({ balance: 2000 });
    });
  });

  // ==========================================================================
  // applyOperation
  // ==========================================================================

  describe('applyOperation', () => {
    beforeEach(() => {
      reader.addCard('A1', { balance: 1000, student_id: 'S1' });
      store.put('A1', 1000, 'S1');
    });

    it('applies the change to the card and the primary store', async () => {
      reader.presentCard('A1');

      await expect(access.applyOperation('A1', 'PURCHASE', 350)).resolves.toEqual({
        card_id: 'A1',
        balance: 650,
        committed_to_hardware: true,
        queued: false,
      });

      expect(store.get('A1')).toMatchObject({ balance: 650, student_id: 'S1' });
      expect(store.listAppliedOperations('A1')).toEqual([
        expect.objectContaining({ delta: -350, balance_after: 650 }),
      ]);
      await expect(access.read('A1')).resolves.toMatchObject({ balance: 650, student_id: 'S1' });
    });

    it('refuses a purchase larger than the balance', async () => {
      reader.presentCard('A1');

      await expect(access.applyOperation('A1', 'PURCHASE', 1001)).rejects.toMatchObject({
        code: 'INSUFFICIENT_FUNDS',
        balance: 1000,
        requested: 1001,
      });
      await expect(access.applyOperation('A1', 'PURCHASE', 1001)).rejects.toBeInstanceOf(
        InsufficientFundsError
      );
      expect(store.get('A1')?.balance).toBe(1000);
    });

    it('applies offline against the cached balance', async () => {
      cache.put({ card_id: 'A1', balance: 1000, student_id: 'S1' });
      reader.setAvailable(false);

      await expect(access.applyOperation('A1', 'LOAD_FUNDS', 500)).resolves.toMatchObject({
        balance: 1500,
        committed_to_hardware: false,
        queued: true,
      });
      expect(cache.get('A1')?.balance).toBe(1500);
      expect(queue.listPending()).toEqual([
        expect.objectContaining({ operation_kind: 'LOAD_FUNDS', amount: 500, student_id: null }),
      ]);
    });

    it('queues the change when the primary store rejects it', async () => {
      reader.addCard('B2', { balance: 1000, student_id: null });
      reader.presentCard('B2');

      await expect(access.applyOperation('B2', 'PURCHASE', 350)).resolves.toMatchObject({
        balance: 650,
        committed_to_hardware: true,
        queued: true,
      });
      expect(store.get('B2')).toBeUndefined();
      expect(queue.listForCard('B2')).toEqual([
        expect.objectContaining({ operation_kind: 'PURCHASE', amount: 350 }),
      ]);
    });

    it('starts from the cached balance while changes for the card are queued', async () => {
      reader.presentCard('A1');
      reader.setAvailable(false);
      await access.applyOperation('A1', 'PURCHASE', 300);

      reader.setAvailable(true);
      await sleep(RESET_TIMEOUT_MS + 20);

      await expect(access.applyOperation('A1', 'LOAD_FUNDS', 500)).resolves.toEqual({
        card_id: 'A1',
        balance: 1200,
        committed_to_hardware: true,
        queued: true,
      });
      await expect(access.read('A1')).resolves.toMatchObject({ balance: 1200, from_cache: true });
      expect(queue.listForCard('A1').map((op) => [op.operation_kind, op.amount])).toEqual([
        ['PURCHASE', 300],
        ['LOAD_FUNDS', 500],
      ]);
    });

    it('serializes concurrent changes to one card', async () => {
      reader.presentCard('A1');

      await Promise.all([
        access.applyOperation('A1', 'LOAD_FUNDS', 100),
        access.applyOperation('A1', 'PURCHASE', 300),
        access.applyOperation('A1', 'REFUND', 50),
      ]);

      expect(store.get('A1')?.balance).toBe(850);
      await expect(access.read('A1')).resolves.toMatchObject({ balance: 850 });
    });

    it('rejects a non-positive purchase', async () => {
      await expect(access.applyOperation('A1', 'PURCHASE', 0)).rejects.toThrow(
        'PURCHASE amount must be positive'
      );
    });
  });

  // ==========================================================================
  // Cards behind an offline write
  // ==========================================================================

  describe('card behind an offline write', () => {
    beforeEach(() => {
      reader.addCard('A1', { balance: 1000, student_id: 'S1' });
      store.put('A1', 1500, 'S1');
      cache.put({ card_id: 'A1', balance: 1500, student_id: 'S1', card_behind: true });
      reader.presentCard('A1');
    });

    it('rewrites the card from the primary store once its queue has drained', async () => {
      await expect(access.read('A1')).resolves.toEqual({
        card_id: 'A1',
        balance: 1500,
        student_id: 'S1',
        from_cache: false,
        is_stale: false,
      });

      expect(cardContents(reader, 'A1')).toEqual({ balance: 1500, student_id: 'S1' });
      expect(cache.get('A1')?.card_behind).toBe(false);
    });

    it('applies a change against the primary store rather than the card', async () => {
      await expect(access.applyOperation('A1', 'PURCHASE', 300)).resolves.toEqual({
        card_id: 'A1',
        balance: 1200,
        committed_to_hardware: true,
        queued: false,
      });

      expect(store.get('A1')?.balance).toBe(1200);
      expect(cardContents(reader, 'A1')).toEqual({ balance: 1200, student_id: 'S1' });
      expect(cache.get('A1')?.card_behind).toBe(false);
    });

    it('leaves the card alone while its changes are still queued', async () => {
      queue.enqueue({ card_id: 'A1', operation_kind: 'LOAD_FUNDS', amount: 500 });

      await expect(access.read('A1')).resolves.toMatchObject({ balance: 1500, from_cache: true });
      expect(cardContents(reader, 'A1')).toEqual({ balance: 1000, student_id: 'S1' });
      expect(cache.get('A1')?.card_behind).toBe(true);
    });

    it('serves the cache when the card cannot be rewritten', async () => {
      reader.interruptAfterWrites(0);

      await expect(access.read('A1')).resolves.toMatchObject({ balance: 1500, from_cache: true });
      expect(cardContents(reader, 'A1')).toEqual({ balance: 1000, student_id: 'S1' });
      expect(cache.get('A1')?.card_behind).toBe(true);
    });
  });

  // ==========================================================================
  // Reader circuit
  // ==========================================================================

  describe('reader circuit', () => {
    it('opens after repeated reader failures and closes when the reader answers again', async () => {
      const states: string[] = [];
      events.on(CardEvents.HARDWARE_DISCONNECTED, () => states.push('disconnected'));
      events.on(CardEvents.HARDWARE_RECONNECTED, () => states.push('reconnected'));
      cache.put({ card_id: 'A1', balance: 300, student_id: null });
      reader.setAvailable(false);

      await access.read('A1');
      await access.read('A1');
      expect(breaker.getState()).toBe('OPEN');
      expect(states).toEqual(['disconnected']);

      const connect = vi.spyOn(reader, 'connect');
      await expect(access.read('A1')).resolves.toMatchObject({ from_cache: true });
      expect(connect).not.toHaveBeenCalled();

      reader.setAvailable(true);
      reader.addCard('A1', { balance: 300, student_id: null });
      reader.presentCard('A1');
      await sleep(RESET_TIMEOUT_MS + 20);

      await expect(access.read('A1')).resolves.toMatchObject({ from_cache: false });
      expect(breaker.getState()).toBe('CLOSED');
      expect(states).toEqual(['disconnected', 'reconnected']);
    });

    it('does not count corrupt cards against the reader', async () => {
      reader.addCard('A1');
      reader.presentCard('A1');

      await expect(access.read('A1')).rejects.toBeInstanceOf(DataIntegrityError);
      await expect(access.read('A1')).rejects.toBeInstanceOf(DataIntegrityError);

      expect(breaker.getState()).toBe('CLOSED');
    });
  });

  describe('isReaderHealthFailure', () => {
    it('counts only unavailable and hung readers', () => {
      expect(isReaderHealthFailure(new HardwareUnavailableError())).toBe(true);
      expect(isReaderHealthFailure(new TimedOutError('read', 10))).toBe(true);
      expect(isReaderHealthFailure(new DataIntegrityError('A1', 'card', 'checksum mismatch'))).toBe(
        false
      );
    });
  });
});
