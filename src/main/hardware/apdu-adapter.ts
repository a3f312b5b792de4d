/**
 * APDU Hardware Adapter
 *
 * Speaks the PC/SC pseudo-APDU command set of ACR122U-class readers to
 * Mifare Classic 1K cards. The PC/SC binding itself is injected as a
 * CardReaderTransport so the command logic runs without native modules.
 *
 * @module main/hardware/apdu-adapter
 */

import { setTimeout as sleep } from 'timers/promises';
import { createLogger } from '../utils/logger';
import { HardwareUnavailableError, TimedOutError, WrongCardError } from '../utils/errors';
import { BLOCK_SIZE } from './card-layout';
import type { HardwareAdapter } from './hardware-adapter';

// ============================================================================
// Transport Types
// ============================================================================

/**
 * Connection to the card currently on a reader
 */
export interface CardChannel {
  /** Send a command APDU; resolves with response data followed by SW1 SW2 */
  transmit(apdu: Buffer, maxResponseLength: number): Promise<Buffer>;
  disconnect(): Promise<void>;
}

/**
 * PC/SC access. `connect` rejects when no card is on the reader.
 */
export interface CardReaderTransport {
  listReaders(): Promise<string[]>;
  connect(reader: string): Promise<CardChannel>;
}

export interface ApduAdapterOptions {
  /** Reader to use; defaults to the first one listed */
  readerName?: string;
  /** Mifare key A for the data sector (default: transport key FF FF FF FF FF FF) */
  keyA?: Buffer;
  /** Delay between card presence checks in waitForCard (default: 500) */
  pollIntervalMs?: number;
}

// ============================================================================
// Constants
// ============================================================================

const CMD_GET_UID = Buffer.from([0xff, 0xca, 0x00, 0x00, 0x00]);

/** Load key into volatile key slot 0 */
const CMD_LOAD_KEY_PREFIX = [0xff, 0x82, 0x00, 0x00, 0x06];

const CMD_AUTHENTICATE_PREFIX = [0xff, 0x86, 0x00, 0x00, 0x05, 0x01, 0x00];
const KEY_TYPE_A = 0x60;
const KEY_SLOT = 0x00;

const CMD_READ_PREFIX = [0xff, 0xb0, 0x00];
const CMD_WRITE_PREFIX = [0xff, 0xd6, 0x00];

const SW_SUCCESS = 0x9000;

const DEFAULT_KEY_A = Buffer.from([0xff, 0xff, 0xff, 0xff, 0xff, 0xff]);
const DEFAULT_POLL_INTERVAL_MS = 500;

/** Response buffer large enough for a UID or a block plus status word */
const MAX_RESPONSE_LENGTH = 64;

// ============================================================================
// Logger
// ============================================================================

const log = createLogger('apdu-adapter');

// ============================================================================
// Helpers
// ============================================================================

interface ApduResponse {
  data: Buffer;
  status: number;
}

function parseResponse(response: Buffer): ApduResponse {
  if (response.length < 2) {
    throw new HardwareUnavailableError(`Malformed reader response (${response.length} bytes)`);
  }
  return {
    data: response.subarray(0, response.length - 2),
    status: response.readUInt16BE(response.length - 2),
  };
}

function formatStatus(status: number): string {
  return status.toString(16).toUpperCase().padStart(4, '0');
}

export function formatUid(data: Buffer): string {
  return data.toString('hex').toUpperCase();
}

/** Accept "04 A2 1B", "04:a2:1b" or "04A21B" */
function normalizeUid(uid: string): string {
  return uid.replace(/[\s:-]/g, '').toUpperCase();
}

// ============================================================================
// APDU Adapter
// ============================================================================

export class ApduHardwareAdapter implements HardwareAdapter {
  readonly name = 'apdu';

  private readonly keyA: Buffer;
  private readonly pollIntervalMs: number;
  private readerName: string | null = null;
  private channel: CardChannel | null = null;

  constructor(
    private readonly transport: CardReaderTransport,
    private readonly options: ApduAdapterOptions = {}
  ) {
    this.keyA = options.keyA ?? DEFAULT_KEY_A;
    if (this.keyA.length !== 6) {
      throw new RangeError(`Mifare key must be 6 bytes, got ${this.keyA.length}`);
    }
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  }

  async connect(): Promise<void> {
    if (this.readerName) return;

    let readers: string[];
    try {
      readers = await this.transport.listReaders();
    } catch (error) {
      throw new HardwareUnavailableError('Unable to list NFC readers', { cause: error });
    }

    const wanted = this.options.readerName;
    const reader = wanted ? readers.find((r) => r === wanted) : readers[0];
    if (!reader) {
      throw new HardwareUnavailableError(
        wanted ? `NFC reader "${wanted}" not found` : 'No NFC reader found'
      );
    }

    this.readerName = reader;
    log.info('Connected to reader', { reader });
  }

  async waitForCard(timeoutMs: number): Promise<string> {
    const reader = await this.requireReader();
    const deadline = Date.now() + timeoutMs;

    while (Date.now() < deadline) {
      const uid = await this.probeCard(reader);
      if (uid) {
        log.debug('Card presented', { cardId: uid });
        return uid;
      }
      await sleep(Math.min(this.pollIntervalMs, Math.max(0, deadline - Date.now())));
    }

    throw new TimedOutError('waitForCard', timeoutMs);
  }

  async readBlock(cardId: string, block: number): Promise<Buffer> {
    const channel = await this.channelFor(cardId);
    await this.authenticate(channel, block);

    const response = await this.transmit(
      channel,
      Buffer.from([...CMD_READ_PREFIX, block, BLOCK_SIZE])
    );
    this.expectSuccess(response, `read block ${block}`);

    if (response.data.length !== BLOCK_SIZE) {
      throw new HardwareUnavailableError(
        `Read of block ${block} returned ${response.data.length} bytes`
      );
    }
    return Buffer.from(response.data);
  }

  async writeBlock(cardId: string, block: number, data: Buffer): Promise<void> {
    if (data.length !== BLOCK_SIZE) {
      throw new RangeError(`Block data must be ${BLOCK_SIZE} bytes, got ${data.length}`);
    }

    const channel = await this.channelFor(cardId);
    await this.authenticate(channel, block);

    const response = await this.transmit(
      channel,
      Buffer.concat([Buffer.from([...CMD_WRITE_PREFIX, block, BLOCK_SIZE]), data])
    );
    this.expectSuccess(response, `write block ${block}`);
  }

  async disconnect(): Promise<void> {
    await this.replaceChannel(null);
    this.readerName = null;
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private async requireReader(): Promise<string> {
    await this.connect();
    if (!this.readerName) {
      throw new HardwareUnavailableError('NFC reader not connected');
    }
    return this.readerName;
  }

  /**
   * Channel to the requested card, opening one if needed
   *
   * @throws WrongCardError if a different card is on the reader
   */
  private async channelFor(cardId: string): Promise<CardChannel> {
    const reader = await this.requireReader();

    let channel = this.channel;
    if (!channel) {
      try {
        channel = await this.transport.connect(reader);
      } catch (error) {
        throw new HardwareUnavailableError('No card on reader', { cause: error });
      }
      await this.replaceChannel(channel);
    }

    const presented = await this.readUid(channel);
    if (presented !== normalizeUid(cardId)) {
      throw new WrongCardError(cardId, presented);
    }
    return channel;
  }

  /**
   * UID of the card on the reader, or null when none answers
   */
  private async probeCard(reader: string): Promise<string | null> {
    let channel: CardChannel;
    try {
      channel = await this.transport.connect(reader);
    } catch {
      return null;
    }

    try {
      const uid = await this.readUid(channel);
      await this.replaceChannel(channel);
      return uid;
    } catch (error) {
      log.debug('Card probe failed', {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      await closeQuietly(channel);
      return null;
    }
  }

  private async readUid(channel: CardChannel): Promise<string> {
    const response = await this.transmit(channel, CMD_GET_UID);
    this.expectSuccess(response, 'get UID');
    return formatUid(response.data);
  }

  private async authenticate(channel: CardChannel, block: number): Promise<void> {
    const loaded = await this.transmit(
      channel,
      Buffer.concat([Buffer.from(CMD_LOAD_KEY_PREFIX), this.keyA])
    );
    this.expectSuccess(loaded, 'load key');

    const auth = await this.transmit(
      channel,
      Buffer.from([...CMD_AUTHENTICATE_PREFIX, block, KEY_TYPE_A, KEY_SLOT])
    );
    this.expectSuccess(auth, `authenticate block ${block}`);
  }

  private async transmit(channel: CardChannel, apdu: Buffer): Promise<ApduResponse> {
    let raw: Buffer;
    try {
      raw = await channel.transmit(apdu, MAX_RESPONSE_LENGTH);
    } catch (error) {
      // Card lifted or reader unplugged mid-command; reopen on the next call
      if (this.channel === channel) {
        await this.replaceChannel(null);
      }
      throw new HardwareUnavailableError('Reader transmit failed', { cause: error });
    }
    return parseResponse(raw);
  }

  private expectSuccess(response: ApduResponse, step: string): void {
    if (response.status !== SW_SUCCESS) {
      throw new HardwareUnavailableError(`Reader rejected ${step} (SW ${formatStatus(response.status)})`);
    }
  }

  private async replaceChannel(next: CardChannel | null): Promise<void> {
    const previous = this.channel;
    this.channel = next;
    if (previous && previous !== next) {
      await closeQuietly(previous);
    }
  }
}

async function closeQuietly(channel: CardChannel): Promise<void> {
  try {
    await channel.disconnect();
  } catch (error) {
    log.debug('Ignoring card disconnect failure', {
      error: error instanceof Error ? error.message : 'Unknown error',
    });
  }
}
