/**
 * Scaled-integer helpers shared by the ledger, the interest engine and the
 * leverage builder. Every division floors.
 */

export const PRICE_DECIMALS = 18;
export const PRECISION = 10n ** 18n;
export const BIPS = 10_000n;
export const PERCENT = 100n;
export const MAX_UINT256 = 2n ** 256n - 1n;

export const pow10 = (decimals: number): bigint => 10n ** BigInt(decimals);

export const mulDiv = (a: bigint, b: bigint, denominator: bigint): bigint => {
  if (denominator === 0n) throw new RangeError('mulDiv: division by zero');
  return (a * b) / denominator;
};

/** Rescales an oracle answer with `decimals` places to 18 places. */
export const normalizePrice = (price: bigint, decimals: number): bigint => {
  if (decimals === PRICE_DECIMALS) return price;
  if (decimals < PRICE_DECIMALS) return price * pow10(PRICE_DECIMALS - decimals);
  return price / pow10(decimals - PRICE_DECIMALS);
};

/** Value of `amount` token units in 18-decimal quote units. */
export const valueOf = (amount: bigint, assetDecimals: number, price18: bigint): bigint => (
  mulDiv(amount, price18, pow10(assetDecimals))
);

/** Token units worth `value` (18-decimal quote units), floored. */
export const amountFor = (value: bigint, assetDecimals: number, price18: bigint): bigint => (
  mulDiv(value, pow10(assetDecimals), price18)
);

export const percentOf = (value: bigint, percent: number): bigint => mulDiv(value, BigInt(percent), PERCENT);

export const bipsOf = (value: bigint, bips: number): bigint => mulDiv(value, BigInt(bips), BIPS);

export const computePeriodShare = (periodBlocks: number, blocksPerYear: number): bigint => (
  mulDiv(BigInt(periodBlocks), PRECISION, BigInt(blocksPerYear))
);

export const parseUnits = (value: string, decimals: number): bigint => {
  const match = /^(\d+)(?:\.(\d+))?$/.exec(value.trim());
  if (!match) throw new RangeError(`parseUnits: "${value}" is not a non-negative decimal`);
  const [, whole, fraction = ''] = match;
  if (fraction.length > decimals) {
    throw new RangeError(`parseUnits: "${value}" has more than ${decimals} decimal places`);
  }
  return BigInt(whole) * pow10(decimals) + BigInt(fraction.padEnd(decimals, '0') || '0');
};

export const formatUnits = (value: bigint, decimals: number): string => {
  const negative = value < 0n;
  const abs = negative ? -value : value;
  const scale = pow10(decimals);
  const whole = abs / scale;
  const fraction = (abs % scale).toString().padStart(decimals, '0').replace(/0+$/, '');
  return `${negative ? '-' : ''}${whole}${fraction ? `.${fraction}` : ''}`;
};
