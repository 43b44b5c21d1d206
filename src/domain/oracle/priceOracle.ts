import { domainError, ErrorCode } from '../../errors/taxonomy.js';
import { normalizePrice } from '../math/fixedPoint.js';

export interface OracleAnswer {
  price: bigint;
  decimals: number;
  /** Unix seconds. */
  updatedAt: number;
}

export interface PriceOracle {
  latestPrice(feedId: string): Promise<OracleAnswer | undefined>;
}

/**
 * Fetches a feed and returns its price scaled to 18 decimals, rejecting
 * missing, non-positive and stale answers.
 */
export const readPrice = async (
  oracle: PriceOracle,
  feedId: string,
  now: number,
  stalenessWindowSeconds: number,
): Promise<bigint> => {
  const answer = await oracle.latestPrice(feedId);
  if (!answer) {
    throw domainError(ErrorCode.InvalidPrice, `No price published for ${feedId}.`, { feedId });
  }
  if (answer.price <= 0n) {
    throw domainError(ErrorCode.InvalidPrice, `Non-positive price for ${feedId}.`, {
      feedId,
      price: answer.price.toString(),
    });
  }
  if (now - answer.updatedAt > stalenessWindowSeconds) {
    throw domainError(ErrorCode.StalePrice, `Price for ${feedId} is ${now - answer.updatedAt}s old.`, {
      feedId,
      updatedAt: answer.updatedAt,
      now,
      stalenessWindowSeconds,
    });
  }
  return normalizePrice(answer.price, answer.decimals);
};
