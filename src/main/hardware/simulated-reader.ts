/**
 * Simulated NFC reader
 *
 * In-memory stand-in for a reader and a stack of Mifare cards, used in
 * development without hardware and throughout the tests. Cards keep their
 * blocks between presentations, so a "physical" balance survives while the
 * reader is switched off.
 *
 * @module main/hardware/simulated-reader
 */

import { createLogger } from '../utils/logger';
import { HardwareUnavailableError, TimedOutError, WrongCardError } from '../utils/errors';
import { BLOCK_SIZE, encodeCardBlocks, XorCardCipher, type CardBlocks } from './card-layout';
import type { HardwareAdapter } from './hardware-adapter';
import type { CardContents } from '../../shared/types/card.types';

const log = createLogger('simulated-reader');

interface CardWaiter {
  resolve: (cardId: string) => void;
}

export class SimulatedReader implements HardwareAdapter {
  readonly name = 'simulated';

  private readonly cards = new Map<string, Map<number, Buffer>>();
  private readonly waiters: CardWaiter[] = [];
  private presentedCardId: string | null = null;
  private available = true;
  private unresponsive = false;
  private writesBeforeInterrupt: number | null = null;
  private connected = false;

  /** Block reads and writes that reached a card */
  readonly stats = { reads: 0, writes: 0 };

  // ==========================================================================
  // Test & Development Controls
  // ==========================================================================

  /**
   * Register a card; with contents, its blocks are written as the layout requires
   */
  addCard(cardId: string, contents?: CardContents, cipher: XorCardCipher = new XorCardCipher()): void {
    const blocks = new Map<number, Buffer>();
    if (contents) {
      const encoded = encodeCardBlocks(contents, cipher);
      for (const block of [4, 5, 6] as const) {
        blocks.set(block, Buffer.from(encoded[block]));
      }
    }
    this.cards.set(cardId, blocks);
  }

  /** Place a registered card on the reader */
  presentCard(cardId: string): void {
    if (!this.cards.has(cardId)) {
      this.addCard(cardId);
    }
    this.presentedCardId = cardId;
    for (const waiter of this.waiters.splice(0)) {
      waiter.resolve(cardId);
    }
  }

  removeCard(): void {
    this.presentedCardId = null;
  }

  /** Unplugged readers raise HardwareUnavailableError on every call */
  setAvailable(available: boolean): void {
    this.available = available;
  }

  /** A hung reader never answers; only a caller timeout ends the call */
  setUnresponsive(unresponsive: boolean): void {
    this.unresponsive = unresponsive;
  }

  /** Let `count` more block writes succeed, then fail the rest (card lifted mid-write) */
  interruptAfterWrites(count: number | null): void {
    this.writesBeforeInterrupt = count;
  }

  /** Overwrite a block directly, bypassing the layout */
  setBlock(cardId: string, block: number, data: Buffer): void {
    const blocks = this.cards.get(cardId) ?? new Map<number, Buffer>();
    blocks.set(block, Buffer.from(data));
    this.cards.set(cardId, blocks);
  }

  getBlock(cardId: string, block: number): Buffer {
    return Buffer.from(this.cards.get(cardId)?.get(block) ?? Buffer.alloc(BLOCK_SIZE));
  }

  /** The three data blocks of a card as last written */
  getCardBlocks(cardId: string): CardBlocks {
    return {
      4: this.getBlock(cardId, 4),
      5: this.getBlock(cardId, 5),
      6: this.getBlock(cardId, 6),
    };
  }

  isConnected(): boolean {
    return this.connected;
  }

  // ==========================================================================
  // HardwareAdapter
  // ==========================================================================

  async connect(): Promise<void> {
    await this.precheck();
    this.connected = true;
  }

  async waitForCard(timeoutMs: number): Promise<string> {
    await this.precheck();
    if (this.presentedCardId) {
      return this.presentedCardId;
    }

    return new Promise<string>((resolve, reject) => {
      const waiter: CardWaiter = {
        resolve: (cardId) => {
          clearTimeout(timer);
          resolve(cardId);
        },
      };
      const timer = setTimeout(() => {
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) this.waiters.splice(index, 1);
        reject(new TimedOutError('waitForCard', timeoutMs));
      }, timeoutMs);
      this.waiters.push(waiter);
    });
  }

  async readBlock(cardId: string, block: number): Promise<Buffer> {
    await this.precheck();
    this.requirePresented(cardId);
    this.stats.reads++;
    return this.getBlock(cardId, block);
  }

  async writeBlock(cardId: string, block: number, data: Buffer): Promise<void> {
    await this.precheck();
    this.requirePresented(cardId);

    if (data.length !== BLOCK_SIZE) {
      throw new RangeError(`Block data must be ${BLOCK_SIZE} bytes, got ${data.length}`);
    }

    if (this.writesBeforeInterrupt !== null) {
      if (this.writesBeforeInterrupt <= 0) {
        throw new HardwareUnavailableError('Card removed during write');
      }
      this.writesBeforeInterrupt--;
    }

    this.setBlock(cardId, block, data);
    this.stats.writes++;
    log.debug('Block written', { cardId, block });
  }

  async disconnect(): Promise<void> {
    this.connected = false;
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private async precheck(): Promise<void> {
    if (this.unresponsive) {
      await new Promise<never>(() => undefined);
    }
    if (!this.available) {
      throw new HardwareUnavailableError('Simulated reader is offline');
    }
  }

  private requirePresented(cardId: string): void {
    if (this.presentedCardId === null) {
      throw new HardwareUnavailableError('No card on reader');
    }
    if (this.presentedCardId !== cardId) {
      throw new WrongCardError(cardId, this.presentedCardId);
    }
  }
}
