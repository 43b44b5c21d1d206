import { requirePermission } from '../domain/auth/capabilities.js';
import { recordAdminChange } from '../domain/ledger/ledgerTx.js';
import { OracleAnswer } from '../domain/oracle/priceOracle.js';
import { StaticPriceOracle } from '../domain/oracle/staticPriceOracle.js';
import { domainError, ErrorCode } from '../errors/taxonomy.js';
import { ChainClock } from '../infra/clock.js';
import { EventLogger } from '../infra/logger.js';
import { ReentrancyGuard } from '../infra/reentrancyGuard.js';
import { StateStore } from '../infra/storage/stateStore.js';
import { TransactionRunner } from '../infra/transactionRunner.js';
import { Address, PriceRecord } from '../types.js';

export interface FeedAnswer {
  feedId: string;
  answer: OracleAnswer | undefined;
}

const MAX_DECIMALS = 36;

/**
 * Operator price publishing. Every answer is stored and audited in the ledger
 * state, and pushed into the in-memory oracle once the write commits.
 */
export class OracleService {
  private readonly runner: TransactionRunner;

  constructor(
    private readonly store: StateStore,
    logger: EventLogger,
    clock: ChainClock,
    private readonly oracle: StaticPriceOracle,
  ) {
    this.runner = new TransactionRunner(store, logger, clock, new ReentrancyGuard('oracle'));
  }

  /** Loads the persisted answers into the oracle. */
  restore(): void {
    const { prices } = this.store.snapshot().oracle;
    for (const [feedId, record] of Object.entries(prices)) {
      this.oracle.publish(feedId, record.price, record.decimals, record.updatedAt);
    }
  }

  async publishPrice(
    caller: Address,
    feedId: string,
    price: bigint,
    decimals: number,
    updatedAt?: number,
  ): Promise<PriceRecord> {
    const record = await this.runner.run('publishPrice', caller, (tx) => {
      requirePermission(tx.state, caller, 'vault.admin');
      if (feedId.trim() === '') throw domainError(ErrorCode.InvalidConfig, 'Feed id cannot be empty.');
      if (!Number.isInteger(decimals) || decimals < 0 || decimals > MAX_DECIMALS) {
        throw domainError(ErrorCode.InvalidConfig, `Decimals must be an integer between 0 and ${MAX_DECIMALS}.`, { decimals });
      }
      if (price <= 0n) {
        throw domainError(ErrorCode.InvalidPrice, `Non-positive price for ${feedId}.`, { feedId, price: price.toString() });
      }

      const next: PriceRecord = { price, decimals, updatedAt: updatedAt ?? tx.now };
      const previous = tx.state.oracle.prices[feedId];
      tx.state.oracle.prices[feedId] = next;
      recordAdminChange(tx, caller, `oracle.prices.${feedId}`, previous ?? null, next);
      tx.events.push({ type: 'oracle.price.published', data: { feedId, ...next } });
      return next;
    });

    this.oracle.publish(feedId, record.price, record.decimals, record.updatedAt);
    return record;
  }

  async listFeeds(): Promise<FeedAnswer[]> {
    return Promise.all(this.oracle.feedIds().map(async (feedId) => ({
      feedId,
      answer: await this.oracle.latestPrice(feedId),
    })));
  }
}
