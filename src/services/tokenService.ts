import { requireAddress, requirePermission } from '../domain/auth/capabilities.js';
import { ChainClock } from '../infra/clock.js';
import { EventLogger } from '../infra/logger.js';
import { ReentrancyGuard } from '../infra/reentrancyGuard.js';
import { StateStore } from '../infra/storage/stateStore.js';
import { TransactionRunner } from '../infra/transactionRunner.js';
import { Address, AssetId } from '../types.js';

export interface TokenBalances {
  asset: AssetId;
  decimals: number;
  totalSupply: bigint;
  balance: bigint;
}

/** Caller-facing token operations over the shared token ledgers. */
export class TokenService {
  private readonly runner: TransactionRunner;

  constructor(store: StateStore, logger: EventLogger, clock: ChainClock) {
    this.runner = new TransactionRunner(store, logger, clock, new ReentrancyGuard('tokens'));
  }

  balanceOf(asset: AssetId, holder: Address): bigint {
    const tx = this.runner.readTx();
    return tx.bank.token(asset).balanceOf(holder);
  }

  allowance(asset: AssetId, owner: Address, spender: Address): bigint {
    const tx = this.runner.readTx();
    return tx.bank.token(asset).allowance(owner, spender);
  }

  balancesOf(holder: Address): TokenBalances[] {
    const { state } = this.runner.readTx();
    return Object.values(state.tokens).map((token) => ({
      asset: token.symbol,
      decimals: token.decimals,
      totalSupply: token.totalSupply,
      balance: token.balances[holder] ?? 0n,
    }));
  }

  async approve(caller: Address, asset: AssetId, spender: Address, amount: bigint): Promise<void> {
    requireAddress(spender, 'spender');
    await this.runner.run('approve', caller, (tx) => {
      tx.bank.token(asset).approve(caller, spender, amount);
    });
  }

  async transfer(caller: Address, asset: AssetId, to: Address, amount: bigint): Promise<void> {
    requireAddress(to, 'to');
    await this.runner.run('transfer', caller, (tx) => {
      tx.bank.token(asset).transfer(caller, to, amount);
    });
  }

  async mint(caller: Address, asset: AssetId, to: Address, amount: bigint): Promise<void> {
    requireAddress(to, 'to');
    await this.runner.run('mint', caller, (tx) => {
      requirePermission(tx.state, caller, 'token.minter', asset);
      tx.bank.token(asset).mint(caller, to, amount);
    });
  }
}
