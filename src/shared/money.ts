/**
 * Fixed-point money helpers
 *
 * Balances are integer cents in code and storage, and a two-decimal
 * string ("20.00") on the card and in checksums.
 *
 * @module shared/money
 */

const MONEY_PATTERN = /^(-)?(\d+)(?:\.(\d{1,2}))?$/;

export class InvalidAmountError extends Error {
  public readonly code = 'INVALID_AMOUNT';

  constructor(public readonly input: string) {
    super(`Invalid money amount: "${input}"`);
    this.name = 'InvalidAmountError';
  }
}

/**
 * Parse a decimal string into cents
 *
 * @example parseMoney('6.5') // 650
 * @throws InvalidAmountError when the string is not a decimal with at most two places
 */
export function parseMoney(input: string): number {
  const match = MONEY_PATTERN.exec(input.trim());
  if (!match) {
    throw new InvalidAmountError(input);
  }

  const [, sign, whole, fraction = ''] = match;
  const cents = parseInt(whole, 10) * 100 + parseInt(fraction.padEnd(2, '0'), 10);
  if (!Number.isSafeInteger(cents)) {
    throw new InvalidAmountError(input);
  }
  return sign && cents !== 0 ? -cents : cents;
}

/**
 * Format cents as a two-decimal string
 *
 * @example formatMoney(650) // '6.50'
 */
export function formatMoney(cents: number): string {
  if (!Number.isInteger(cents)) {
    throw new InvalidAmountError(String(cents));
  }
  const sign = cents < 0 ? '-' : '';
  const abs = Math.abs(cents);
  const whole = Math.floor(abs / 100);
  const fraction = String(abs % 100).padStart(2, '0');
  return `${sign}${whole}.${fraction}`;
}

/**
 * Convert a decimal number such as 3.5 into cents, rounding half away from zero
 */
export function toCents(amount: number): number {
  if (!Number.isFinite(amount)) {
    throw new InvalidAmountError(String(amount));
  }
  return Math.sign(amount) * Math.round(Math.abs(amount) * 100);
}
