import { AppConfig } from '../config.js';
import { ANY_SCOPE, grantRole, requireAddress, requirePermission, revokeRole } from '../domain/auth/capabilities.js';
import { CollectionOutcome, InterestEngine } from '../domain/interest/interestEngine.js';
import { LedgerTx, recordAdminChange } from '../domain/ledger/ledgerTx.js';
import { LiquidationResult, PositionBook } from '../domain/ledger/positionBook.js';
import { PriceOracle } from '../domain/oracle/priceOracle.js';
import { domainError, ErrorCode } from '../errors/taxonomy.js';
import { ChainClock } from '../infra/clock.js';
import { EventLogger } from '../infra/logger.js';
import { ReentrancyGuard } from '../infra/reentrancyGuard.js';
import { StateStore } from '../infra/storage/stateStore.js';
import { TransactionRunner } from '../infra/transactionRunner.js';
import { Address, AssetId, Permission, Position, UserBalances, VaultConfig } from '../types.js';

export interface OpenPositionInput {
  collateralAsset?: AssetId;
  collateralAmount: bigint;
  debtAmount: bigint;
  leverageHint?: number;
}

export interface PositionView extends Position {
  health: bigint;
  maxBorrowable: bigint;
  pendingInterest: bigint;
  liquidatable: boolean;
}

const validateVaultConfig = (config: VaultConfig): void => {
  const { ltvRatio, liquidationThreshold, liquidatorRewardBips } = config;
  if (!Number.isInteger(ltvRatio) || ltvRatio <= 0 || ltvRatio > 100) {
    throw domainError(ErrorCode.InvalidConfig, 'ltvRatio must be an integer in (0, 100].', { ltvRatio });
  }
  if (!Number.isInteger(liquidationThreshold) || liquidationThreshold < ltvRatio) {
    throw domainError(ErrorCode.InvalidConfig, 'liquidationThreshold must be an integer no lower than ltvRatio.', {
      ltvRatio,
      liquidationThreshold,
    });
  }
  if (ltvRatio * liquidationThreshold > 10_000) {
    throw domainError(ErrorCode.InvalidConfig, 'A position borrowed to the LTV limit would already be liquidatable.', {
      ltvRatio,
      liquidationThreshold,
    });
  }
  if (!Number.isInteger(liquidatorRewardBips) || liquidatorRewardBips < 0 || liquidatorRewardBips > 10_000) {
    throw domainError(ErrorCode.InvalidConfig, 'liquidatorRewardBips must be within [0, 10000].', { liquidatorRewardBips });
  }
};

/**
 * Position ledger of a single vault. Each mutating call runs under the
 * vault's reentrancy guard inside one store transaction, and publishes its
 * events only after the transaction commits.
 */
export class PositionLedgerService {
  readonly book: PositionBook;
  private readonly runner: TransactionRunner;

  constructor(
    private readonly store: StateStore,
    logger: EventLogger,
    clock: ChainClock,
    oracle: PriceOracle,
    interest: InterestEngine,
    config: AppConfig,
  ) {
    this.book = new PositionBook(oracle, interest, config.vault.id, config.interest.enabled);
    this.runner = new TransactionRunner(store, logger, clock, new ReentrancyGuard(config.vault.id));
    validateVaultConfig(store.snapshot().vault.config);
  }

  get vaultId(): string {
    return this.book.vaultId;
  }

  /* ── atomic execution ──────────────────────────────────────── */

  /**
   * Runs `work` as one guarded, all-or-nothing ledger call. Exposed so that
   * orchestrators (the leverage builder) can compose several book operations
   * into a single call.
   */
  async atomically<T>(operation: string, actor: Address, work: (tx: LedgerTx) => Promise<T> | T): Promise<T> {
    return this.runner.run(operation, actor, work);
  }

  /* ── read helpers ──────────────────────────────────────────── */

  getPosition(positionId: number): Position {
    return this.book.requirePosition(this.readTx(), positionId);
  }

  listPositions(owner?: Address): Position[] {
    const positions = Object.values(this.store.snapshot().vault.positions);
    return (owner === undefined ? positions : positions.filter((p) => p.owner === owner))
      .sort((a, b) => a.id - b.id);
  }

  getCollateralBalance(user: Address): bigint {
    return this.balancesOf(user).collateral;
  }

  getDebtBalance(user: Address): bigint {
    return this.balancesOf(user).debt;
  }

  balancesOf(user: Address): UserBalances {
    return this.store.snapshot().vault.userBalances[user] ?? { collateral: 0n, debt: 0n };
  }

  getVaultConfig(): VaultConfig {
    return this.store.snapshot().vault.config;
  }

  getBadDebt(): bigint {
    return this.store.snapshot().vault.badDebt;
  }

  async getPositionHealth(positionId: number): Promise<bigint> {
    const tx = this.readTx();
    return this.book.health(tx, this.book.requirePosition(tx, positionId));
  }

  async getMaxBorrowable(positionId: number): Promise<bigint> {
    const tx = this.readTx();
    return this.book.maxBorrowable(tx, this.book.requirePosition(tx, positionId));
  }

  async isLiquidatable(positionId: number): Promise<boolean> {
    const tx = this.readTx();
    const position = this.book.requirePosition(tx, positionId);
    if (position.status !== 'open' || this.book.currentDebt(tx, position) === 0n) return false;
    return this.book.isUnderThreshold(tx, await this.book.health(tx, position));
  }

  async describePosition(positionId: number): Promise<PositionView> {
    const tx = this.readTx();
    const position = this.book.requirePosition(tx, positionId);
    const debt = this.book.currentDebt(tx, position);
    const health = await this.book.health(tx, position);
    return {
      ...position,
      health,
      maxBorrowable: await this.book.maxBorrowable(tx, position),
      pendingInterest: debt - position.debtAmount,
      liquidatable: position.status === 'open' && debt > 0n && this.book.isUnderThreshold(tx, health),
    };
  }

  /* ── position operations ───────────────────────────────────── */

  async openPosition(caller: Address, input: OpenPositionInput): Promise<Position> {
    return this.atomically('openPosition', caller, (tx) => this.book.open(tx, {
      owner: caller,
      payer: caller,
      collateralAsset: input.collateralAsset,
      collateralAmount: input.collateralAmount,
      debtAmount: input.debtAmount,
      debtRecipient: caller,
      leverageHint: input.leverageHint,
    }));
  }

  async addCollateral(caller: Address, positionId: number, amount: bigint): Promise<Position> {
    return this.atomically('addCollateral', caller, (tx) => this.book.addCollateral(tx, caller, positionId, amount));
  }

  async removeCollateral(caller: Address, positionId: number, amount: bigint): Promise<Position> {
    return this.atomically('removeCollateral', caller, (tx) => this.book.removeCollateral(tx, caller, positionId, amount));
  }

  async borrow(caller: Address, positionId: number, amount: bigint): Promise<Position> {
    return this.atomically('borrow', caller, (tx) => this.book.borrow(tx, {
      caller,
      positionId,
      beneficiary: caller,
      amount,
      access: 'owner',
    }));
  }

  async borrowFor(caller: Address, positionId: number, beneficiary: Address, amount: bigint): Promise<Position> {
    requireAddress(beneficiary, 'beneficiary');
    return this.atomically('borrowFor', caller, (tx) => this.book.borrow(tx, {
      caller,
      positionId,
      beneficiary,
      amount,
      access: 'ownerOrDelegate',
    }));
  }

  async repay(caller: Address, positionId: number, amount: bigint): Promise<Position> {
    return this.atomically('repay', caller, (tx) => this.book.repay(tx, caller, positionId, amount));
  }

  async closePosition(caller: Address, positionId: number): Promise<Position> {
    return this.atomically('closePosition', caller, (tx) => this.book.close(tx, caller, positionId));
  }

  async liquidate(caller: Address, positionId: number): Promise<LiquidationResult> {
    return this.atomically('liquidate', caller, (tx) => this.book.liquidate(tx, caller, positionId));
  }

  /** Permissionless: charges due interest on a position, or does nothing. */
  async accrueInterest(caller: Address, positionId: number): Promise<CollectionOutcome> {
    return this.atomically('accrueInterest', caller, (tx) => (
      this.book.accrue(tx, this.book.requireOpen(tx, positionId))
    ));
  }

  /* ── administration ────────────────────────────────────────── */

  async updatePriceFeed(caller: Address, asset: AssetId, feedId: string): Promise<void> {
    await this.administer('updatePriceFeed', caller, (tx) => {
      const config = tx.state.vault.config;
      if (asset !== config.collateralAsset && asset !== config.debtAsset) {
        throw domainError(ErrorCode.InvalidAsset, `${asset} is not an asset of this vault.`, { asset });
      }
      if (feedId.trim() === '') throw domainError(ErrorCode.InvalidConfig, 'Feed id cannot be empty.');
      const previous = config.priceFeeds[asset];
      config.priceFeeds[asset] = feedId;
      recordAdminChange(tx, caller, `priceFeeds.${asset}`, previous ?? null, feedId);
    });
  }

  async updateLtv(caller: Address, ltvRatio: number): Promise<void> {
    await this.administer('updateLtv', caller, (tx) => {
      const config = tx.state.vault.config;
      const previous = config.ltvRatio;
      validateVaultConfig({ ...config, ltvRatio });
      config.ltvRatio = ltvRatio;
      recordAdminChange(tx, caller, 'ltvRatio', previous, ltvRatio);
    });
  }

  async updateLiquidationParams(caller: Address, liquidationThreshold: number, liquidatorRewardBips: number): Promise<void> {
    await this.administer('updateLiquidationParams', caller, (tx) => {
      const config = tx.state.vault.config;
      const previous = {
        liquidationThreshold: config.liquidationThreshold,
        liquidatorRewardBips: config.liquidatorRewardBips,
      };
      validateVaultConfig({ ...config, liquidationThreshold, liquidatorRewardBips });
      config.liquidationThreshold = liquidationThreshold;
      config.liquidatorRewardBips = liquidatorRewardBips;
      recordAdminChange(tx, caller, 'liquidationParams', previous, { liquidationThreshold, liquidatorRewardBips });
    });
  }

  async updateStalenessWindow(caller: Address, seconds: number): Promise<void> {
    await this.administer('updateStalenessWindow', caller, (tx) => {
      if (!Number.isInteger(seconds) || seconds <= 0) {
        throw domainError(ErrorCode.InvalidConfig, 'Staleness window must be a positive number of seconds.', { seconds });
      }
      const previous = tx.state.vault.config.stalenessWindowSeconds;
      tx.state.vault.config.stalenessWindowSeconds = seconds;
      recordAdminChange(tx, caller, 'stalenessWindowSeconds', previous, seconds);
    });
  }

  async updateTreasury(caller: Address, treasury: Address): Promise<void> {
    requireAddress(treasury, 'treasury');
    await this.administer('updateTreasury', caller, (tx) => {
      const previous = tx.state.vault.config.treasury;
      tx.state.vault.config.treasury = treasury;
      recordAdminChange(tx, caller, 'treasury', previous, treasury);
    });
  }

  async grantRole(caller: Address, permission: Permission, address: Address, scope: string = ANY_SCOPE): Promise<boolean> {
    requireAddress(address, 'address');
    return this.administer('grantRole', caller, (tx) => {
      const granted = grantRole(tx.state, { permission, address, scope });
      if (granted) recordAdminChange(tx, caller, `roles.${permission}`, null, { address, scope });
      return granted;
    });
  }

  async revokeRole(caller: Address, permission: Permission, address: Address, scope: string = ANY_SCOPE): Promise<boolean> {
    return this.administer('revokeRole', caller, (tx) => {
      const revoked = revokeRole(tx.state, { permission, address, scope });
      if (revoked) recordAdminChange(tx, caller, `roles.${permission}`, { address, scope }, null);
      return revoked;
    });
  }

  /**
   * Sends tokens the vault holds but does not owe to any position. For the
   * collateral asset only the surplus over recorded collateral can leave.
   */
  async emergencyWithdraw(caller: Address, asset: AssetId, to: Address, amount: bigint): Promise<void> {
    requireAddress(to, 'to');
    await this.administer('emergencyWithdraw', caller, (tx) => {
      const token = tx.bank.token(asset);
      const held = token.balanceOf(this.vaultId);
      const locked = asset === tx.state.vault.config.collateralAsset
        ? Object.values(tx.state.vault.positions).reduce((sum, p) => sum + p.collateralAmount, 0n)
        : 0n;
      const stray = held - locked;
      if (amount <= 0n || amount > stray) {
        throw domainError(ErrorCode.InsufficientBalance, `Only ${stray} ${asset} can be withdrawn.`, {
          asset,
          withdrawable: stray.toString(),
          requested: amount.toString(),
        });
      }
      token.transfer(this.vaultId, to, amount);
      recordAdminChange(tx, caller, `emergencyWithdraw.${asset}`, held, held - amount);
    });
  }

  private async administer<T>(operation: string, caller: Address, work: (tx: LedgerTx) => T): Promise<T> {
    return this.atomically(operation, caller, (tx) => {
      requirePermission(tx.state, caller, 'vault.admin');
      return work(tx);
    });
  }

  private readTx(): LedgerTx {
    return this.runner.readTx();
  }
}
