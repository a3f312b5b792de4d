/**
 * Mifare Classic data layout for balance cards
 *
 * | Block | Contents                                                  |
 * |-------|-----------------------------------------------------------|
 * | 4     | balance as "%.2f" ASCII, NUL-padded to 16, XOR-obfuscated |
 * | 5     | student id, UTF-8, NUL-padded (all zero when unbound)     |
 * | 6     | checksum, 8 ASCII hex chars, NUL-padded                   |
 *
 * The XOR step only hides the balance from casual inspection. Anyone with
 * a reader and the one-byte key can rewrite it; the checksum catches
 * accidental corruption, not tampering.
 *
 * @module main/hardware/card-layout
 */

import { createHash } from 'crypto';
import { formatMoney, parseMoney, InvalidAmountError } from '../../shared/money';
import type { CardContents } from '../../shared/types/card.types';
import { DataIntegrityError } from '../utils/errors';

// ============================================================================
// Constants
// ============================================================================

export const BALANCE_BLOCK = 4;
export const STUDENT_ID_BLOCK = 5;
export const CHECKSUM_BLOCK = 6;

/** Bytes per Mifare Classic block */
export const BLOCK_SIZE = 16;

export const DEFAULT_XOR_KEY = 0xa5;

const CHECKSUM_LENGTH = 8;

// ============================================================================
// Checksum
// ============================================================================

/**
 * First 8 hex chars of MD5 over "<balance 2dp>:<student id or ''>"
 *
 * @example calculateChecksum(2000, 'S1') // md5("20.00:S1").slice(0, 8)
 */
export function calculateChecksum(balance: number, studentId: string | null): string {
  return createHash('md5')
    .update(`${formatMoney(balance)}:${studentId ?? ''}`)
    .digest('hex')
    .substring(0, CHECKSUM_LENGTH);
}

export function verifyChecksum(
  balance: number,
  studentId: string | null,
  checksum: string
): boolean {
  return calculateChecksum(balance, studentId) === checksum;
}

// ============================================================================
// Cipher
// ============================================================================

/**
 * One-byte XOR applied to the balance block
 */
export class XorCardCipher {
  constructor(private readonly key: number = DEFAULT_XOR_KEY) {
    if (!Number.isInteger(key) || key < 0 || key > 0xff) {
      throw new RangeError(`XOR key must be a byte, got ${key}`);
    }
  }

  apply(data: Buffer): Buffer {
    const out = Buffer.alloc(data.length);
    for (let i = 0; i < data.length; i++) {
      out[i] = data[i] ^ this.key;
    }
    return out;
  }
}

// ============================================================================
// Block Encoding
// ============================================================================

export type CardBlocks = Record<
  typeof BALANCE_BLOCK | typeof STUDENT_ID_BLOCK | typeof CHECKSUM_BLOCK,
  Buffer
>;

function padBlock(bytes: Buffer): Buffer {
  if (bytes.length > BLOCK_SIZE) {
    throw new RangeError(`Block data exceeds ${BLOCK_SIZE} bytes (${bytes.length})`);
  }
  const block = Buffer.alloc(BLOCK_SIZE);
  bytes.copy(block);
  return block;
}

/** Strip NUL padding from both ends */
function unpad(bytes: Buffer, encoding: BufferEncoding): string {
  return bytes.toString(encoding).replace(/^\u0000+|\u0000+$/g, '');
}

export function encodeCardBlocks(contents: CardContents, cipher: XorCardCipher): CardBlocks {
  const balanceText = padBlock(Buffer.from(formatMoney(contents.balance), 'ascii'));
  return {
    [BALANCE_BLOCK]: cipher.apply(balanceText),
    [STUDENT_ID_BLOCK]: padBlock(Buffer.from(contents.student_id ?? '', 'utf8')),
    [CHECKSUM_BLOCK]: padBlock(
      Buffer.from(calculateChecksum(contents.balance, contents.student_id), 'ascii')
    ),
  };
}

/**
 * Decode the three data blocks and validate the checksum
 *
 * @throws DataIntegrityError when the balance is unreadable or the checksum does not match
 */
export function decodeCardBlocks(
  cardId: string,
  blocks: CardBlocks,
  cipher: XorCardCipher
): CardContents {
  const balanceText = unpad(cipher.apply(blocks[BALANCE_BLOCK]), 'latin1');

  let balance: number;
  try {
    balance = parseMoney(balanceText);
  } catch (error) {
    if (error instanceof InvalidAmountError) {
      throw new DataIntegrityError(cardId, 'card', 'balance block is not a decimal amount');
    }
    throw error;
  }
  if (balance < 0) {
    throw new DataIntegrityError(cardId, 'card', 'balance block holds a negative amount');
  }

  const studentText = unpad(blocks[STUDENT_ID_BLOCK], 'utf8');
  const studentId = studentText.length > 0 ? studentText : null;

  const checksum = unpad(blocks[CHECKSUM_BLOCK], 'latin1');
  if (!verifyChecksum(balance, studentId, checksum)) {
    throw new DataIntegrityError(cardId, 'card', 'checksum mismatch');
  }

  return { balance, student_id: studentId };
}
