/**
 * Money Helper Unit Tests
 *
 * @module tests/unit/shared/money.spec
 */

import { describe, it, expect } from 'vitest';
import {
  formatMoney,
  parseMoney,
  toCents,
  InvalidAmountError,
} from '../../../src/shared/money';

describe('money', () => {
  describe('parseMoney', () => {
    it.each([
      ['20.00', 2000],
      ['6.5', 650],
      ['0.05', 5],
      ['7', 700],
      [' 3.50 ', 350],
      ['-2.25', -225],
      ['-0.00', 0],
    ])('parses %j as %i cents', (input, expected) => {
      expect(parseMoney(input)).toBe(expected);
    });

    it.each(['', 'abc', '1.234', '1,50', '.50', '1e3', '--1'])(
      'rejects %j',
      (input) => {
        expect(() => parseMoney(input)).toThrow(InvalidAmountError);
      }
    );
  });

  describe('formatMoney', () => {
    it('formats cents with two decimals', () => {
      expect(formatMoney(0)).toBe('0.00');
      expect(formatMoney(5)).toBe('0.05');
      expect(formatMoney(650)).toBe('6.50');
      expect(formatMoney(2000)).toBe('20.00');
      expect(formatMoney(-225)).toBe('-2.25');
    });

    it('rejects fractional cents', () => {
      expect(() => formatMoney(1.5)).toThrow(InvalidAmountError);
    });
  });

  describe('toCents', () => {
    it('converts decimal amounts without float drift', () => {
      expect(toCents(3.5)).toBe(350);
      expect(toCents(0.1 + 0.2)).toBe(30);
      expect(toCents(19.99)).toBe(1999);
      expect(toCents(-1.25)).toBe(-125);
    });

    it('rejects non-finite numbers', () => {
      expect(() => toCents(Number.NaN)).toThrow(InvalidAmountError);
      expect(() => toCents(Number.POSITIVE_INFINITY)).toThrow(InvalidAmountError);
    });
  });
});
