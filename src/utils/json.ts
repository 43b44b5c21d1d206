/**
 * JSON helpers for state that carries bigint amounts.
 * bigints are written as `{ "$bigint": "<decimal>" }` so they survive a round trip.
 */

const BIGINT_TAG = '$bigint';

export const bigintReplacer = (_key: string, value: unknown): unknown => (
  typeof value === 'bigint' ? { [BIGINT_TAG]: value.toString() } : value
);

export const bigintReviver = (_key: string, value: unknown): unknown => {
  if (value && typeof value === 'object' && BIGINT_TAG in value && Object.keys(value).length === 1) {
    const tagged = value[BIGINT_TAG];
    if (typeof tagged === 'string') return BigInt(tagged);
  }
  return value;
};

export const stringifyState = (value: unknown): string => JSON.stringify(value, bigintReplacer, 2);

export const parseState = (raw: string): unknown => JSON.parse(raw, bigintReviver);

/** Deep-converts bigints to decimal strings for logs, events and API replies. */
export const toPlain = (value: unknown): unknown => {
  if (typeof value === 'bigint') return value.toString();
  if (Array.isArray(value)) return value.map(toPlain);
  if (value && typeof value === 'object') {
    return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, toPlain(v)]));
  }
  return value;
};
