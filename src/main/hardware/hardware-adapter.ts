/**
 * Hardware Adapter contract
 *
 * Everything the card services need from an NFC reader. Implementations
 * raise HardwareUnavailableError when the reader is absent or stops
 * responding, TimedOutError when no card arrives in time and
 * WrongCardError when the card on the reader is not the requested one.
 *
 * @module main/hardware/hardware-adapter
 */

export interface HardwareAdapter {
  /** Human-readable adapter name for logs */
  readonly name: string;

  /** Attach to the reader; idempotent */
  connect(): Promise<void>;

  /**
   * Wait for a card to be placed on the reader
   *
   * @returns UID of the presented card, uppercase hex without separators
   */
  waitForCard(timeoutMs: number): Promise<string>;

  /** Read one 16-byte block from the card with the given UID */
  readBlock(cardId: string, block: number): Promise<Buffer>;

  /** Write one 16-byte block to the card with the given UID */
  writeBlock(cardId: string, block: number, data: Buffer): Promise<void>;

  disconnect(): Promise<void>;
}
