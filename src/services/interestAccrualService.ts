import { requireAddress, requirePermission } from '../domain/auth/capabilities.js';
import { InterestEngine } from '../domain/interest/interestEngine.js';
import { LedgerTx, recordAdminChange } from '../domain/ledger/ledgerTx.js';
import { domainError, ErrorCode } from '../errors/taxonomy.js';
import { ChainClock } from '../infra/clock.js';
import { EventLogger } from '../infra/logger.js';
import { ReentrancyGuard } from '../infra/reentrancyGuard.js';
import { StateStore } from '../infra/storage/stateStore.js';
import { TransactionRunner } from '../infra/transactionRunner.js';
import { Address, AssetId, InterestVaultState, PositionInterestState } from '../types.js';

export interface InterestSettings {
  periodBlocks: number;
  blocksPerYear: number;
  periodShare: bigint;
  vaults: Record<string, InterestVaultState>;
}

/**
 * Owner-facing surface of the interest engine: vault registration, rate and
 * period settings, and withdrawal of collected interest. Charging itself is
 * driven by the vault through its position ledger.
 */
export class InterestAccrualService {
  private readonly runner: TransactionRunner;

  constructor(
    private readonly store: StateStore,
    logger: EventLogger,
    private readonly clock: ChainClock,
    readonly engine: InterestEngine,
  ) {
    this.runner = new TransactionRunner(store, logger, clock, new ReentrancyGuard('interest'));
  }

  /* ── reads ─────────────────────────────────────────────────── */

  getSettings(): InterestSettings {
    const { periodBlocks, blocksPerYear, periodShare, vaults } = this.store.snapshot().interest;
    return { periodBlocks, blocksPerYear, periodShare, vaults };
  }

  isRegistered(vaultId: string): boolean {
    return this.store.snapshot().interest.vaults[vaultId] !== undefined;
  }

  getInterestState(vaultId: string, positionId: number): PositionInterestState {
    return this.engine.stateOf(this.store.snapshot(), vaultId, positionId);
  }

  getTreasury(token: AssetId): bigint {
    return this.store.snapshot().interest.treasury[token] ?? 0n;
  }

  calculateInterestDue(vaultId: string, positionId: number, debtAmount: bigint): bigint {
    return this.engine.calculateInterestDue(
      this.store.snapshot(),
      this.clock.currentBlock(),
      vaultId,
      positionId,
      debtAmount,
    );
  }

  /* ── administration ────────────────────────────────────────── */

  async registerVault(caller: Address, vaultId: string, annualRateBips: number): Promise<void> {
    await this.administer('registerVault', caller, (tx) => {
      this.engine.registerVault(tx, vaultId, annualRateBips);
      recordAdminChange(tx, caller, `interest.vaults.${vaultId}`, null, { annualRateBips });
    });
  }

  async setVaultRate(caller: Address, vaultId: string, annualRateBips: number): Promise<void> {
    await this.administer('setVaultRate', caller, (tx) => {
      const previous = this.engine.setVaultRate(tx, vaultId, annualRateBips);
      recordAdminChange(tx, caller, `interest.vaults.${vaultId}.annualRateBips`, previous, annualRateBips);
    });
  }

  async setPeriodBlocks(caller: Address, periodBlocks: number): Promise<void> {
    await this.administer('setPeriodBlocks', caller, (tx) => {
      const previous = this.engine.setPeriodBlocks(tx, periodBlocks);
      recordAdminChange(tx, caller, 'interest.periodBlocks', previous, periodBlocks);
    });
  }

  /** Pays out collected interest held by the engine's account. */
  async withdrawTreasury(caller: Address, token: AssetId, to: Address, amount: bigint): Promise<void> {
    requireAddress(to, 'to');
    await this.administer('withdrawTreasury', caller, (tx) => {
      const available = tx.state.interest.treasury[token] ?? 0n;
      if (amount <= 0n || amount > available) {
        throw domainError(ErrorCode.InsufficientBalance, `Treasury holds ${available} ${token}.`, {
          token,
          available: available.toString(),
          requested: amount.toString(),
        });
      }
      tx.bank.token(token).transfer(this.engine.address, to, amount);
      tx.state.interest.treasury[token] = available - amount;
      tx.events.push({ type: 'interest.treasury.withdrawn', data: { token, to, amount } });
    });
  }

  private async administer(operation: string, caller: Address, work: (tx: LedgerTx) => void): Promise<void> {
    await this.runner.run(operation, caller, (tx) => {
      requirePermission(tx.state, caller, 'interest.admin');
      work(tx);
    });
  }
}
