/**
 * Card Service Errors
 *
 * Every failure the facade or reconciler surfaces is one of these classes.
 * `code` is stable and safe to hand to the web layer.
 *
 * @module main/utils/errors
 */

export type CardErrorCode =
  | 'HARDWARE_UNAVAILABLE'
  | 'TIMED_OUT'
  | 'WRONG_CARD'
  | 'DATA_INTEGRITY'
  | 'SYNC_CONFLICT'
  | 'INSUFFICIENT_FUNDS'
  | 'CARD_NOT_FOUND'
  | 'STORAGE_UNAVAILABLE'
  | 'CIRCUIT_OPEN';

export abstract class CardServiceError extends Error {
  abstract readonly code: CardErrorCode;
}

/**
 * Reader not connected or not responding. Triggers the offline fallback.
 */
export class HardwareUnavailableError extends CardServiceError {
  public readonly code = 'HARDWARE_UNAVAILABLE';

  constructor(message: string = 'NFC reader unavailable', options?: ErrorOptions) {
    super(message, options);
    this.name = 'HardwareUnavailableError';
  }
}

/**
 * No card (or no reader response) within the allotted time
 */
export class TimedOutError extends CardServiceError {
  public readonly code = 'TIMED_OUT';

  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'TimedOutError';
  }
}

/**
 * A card other than the requested one is on the reader
 */
export class WrongCardError extends CardServiceError {
  public readonly code = 'WRONG_CARD';

  constructor(
    public readonly expectedCardId: string,
    public readonly presentedCardId: string
  ) {
    super(`Wrong card presented: expected ${expectedCardId}, got ${presentedCardId}`);
    this.name = 'WrongCardError';
  }
}

/**
 * Card or cache contents do not match their checksum
 */
export class DataIntegrityError extends CardServiceError {
  public readonly code = 'DATA_INTEGRITY';

  constructor(
    public readonly cardId: string,
    public readonly source: 'card' | 'cache',
    detail: string
  ) {
    super(`Data integrity check failed for card ${cardId} (${source}): ${detail}`);
    this.name = 'DataIntegrityError';
  }
}

/**
 * The authoritative store rejected a replayed operation
 */
export class SyncConflictError extends CardServiceError {
  public readonly code = 'SYNC_CONFLICT';

  constructor(
    public readonly cardId: string,
    public readonly currentBalance: number,
    public readonly delta: number
  ) {
    super(
      `Operation on card ${cardId} would make balance negative ` +
        `(current ${currentBalance}, change ${delta})`
    );
    this.name = 'SyncConflictError';
  }
}

/**
 * A purchase exceeds the last known balance
 */
export class InsufficientFundsError extends CardServiceError {
  public readonly code = 'INSUFFICIENT_FUNDS';

  constructor(
    public readonly cardId: string,
    public readonly balance: number,
    public readonly requested: number
  ) {
    super(`Insufficient balance on card ${cardId}: balance ${balance}, requested ${requested}`);
    this.name = 'InsufficientFundsError';
  }
}

/**
 * Neither the reader nor the offline cache knows the card
 */
export class CardNotFoundError extends CardServiceError {
  public readonly code = 'CARD_NOT_FOUND';

  constructor(public readonly cardId: string) {
    super(`Card ${cardId} not found on reader or in offline cache`);
    this.name = 'CardNotFoundError';
  }
}

/**
 * A SQLite store could not complete a read or write
 */
export class StorageUnavailableError extends CardServiceError {
  public readonly code = 'STORAGE_UNAVAILABLE';

  constructor(
    public readonly store: string,
    public readonly operation: string,
    options?: ErrorOptions
  ) {
    const cause = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`Storage ${store} unavailable during ${operation}${cause}`, options);
    this.name = 'StorageUnavailableError';
  }
}

/**
 * Hardware failures that the facade answers with the offline path
 */
export function isAdapterFailure(error: unknown): boolean {
  return (
    error instanceof HardwareUnavailableError ||
    error instanceof TimedOutError ||
    error instanceof WrongCardError ||
    (error instanceof CardServiceError && error.code === 'CIRCUIT_OPEN')
  );
}
