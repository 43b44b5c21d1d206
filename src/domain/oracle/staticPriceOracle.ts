import { OracleAnswer, PriceOracle } from './priceOracle.js';

/** In-memory feed table; prices are pushed in by an operator or a test. */
export class StaticPriceOracle implements PriceOracle {
  private readonly feeds = new Map<string, OracleAnswer>();

  publish(feedId: string, price: bigint, decimals: number, updatedAt: number): void {
    this.feeds.set(feedId, { price, decimals, updatedAt });
  }

  async latestPrice(feedId: string): Promise<OracleAnswer | undefined> {
    const answer = this.feeds.get(feedId);
    return answer ? { ...answer } : undefined;
  }

  feedIds(): string[] {
    return [...this.feeds.keys()];
  }
}
