import { describe, expect, it } from 'vitest';
import {
  amountFor,
  bipsOf,
  computePeriodShare,
  formatUnits,
  mulDiv,
  normalizePrice,
  parseUnits,
  percentOf,
  valueOf,
} from '../src/domain/math/fixedPoint.js';

describe('fixedPoint', () => {
  it('floors every division', () => {
    expect(mulDiv(7n, 3n, 2n)).toBe(10n);
    expect(percentOf(199n, 50)).toBe(99n);
    expect(bipsOf(19_999n, 500)).toBe(999n);
  });

  it('refuses a zero denominator', () => {
    expect(() => mulDiv(1n, 1n, 0n)).toThrow(RangeError);
  });

  it('rescales oracle answers to 18 decimals', () => {
    expect(normalizePrice(200_00000000n, 8)).toBe(200n * 10n ** 18n);
    expect(normalizePrice(5n * 10n ** 18n, 18)).toBe(5n * 10n ** 18n);
    expect(normalizePrice(3n * 10n ** 20n, 20)).toBe(3n * 10n ** 18n);
  });

  it('values token amounts across decimals', () => {
    const price = 200n * 10n ** 18n;
    expect(valueOf(10n ** 6n, 6, price)).toBe(price);
    expect(amountFor(price, 6, price)).toBe(10n ** 6n);
    expect(amountFor(199n, 18, price)).toBe(0n);
  });

  it('computes the share of a year one period represents', () => {
    expect(computePeriodShare(300, 2_628_000)).toBe(114_155_251_141_552n);
  });

  it('parses and formats decimal strings', () => {
    expect(parseUnits('1.5', 18)).toBe(15n * 10n ** 17n);
    expect(parseUnits('42', 6)).toBe(42_000_000n);
    expect(() => parseUnits('1.0000001', 6)).toThrow(RangeError);
    expect(() => parseUnits('-1', 6)).toThrow(RangeError);
    expect(formatUnits(15n * 10n ** 17n, 18)).toBe('1.5');
    expect(formatUnits(-42_000_000n, 6)).toBe('-42');
  });
});
