import { v4 as uuid } from 'uuid';
import { domainError, ErrorCode } from '../../errors/taxonomy.js';
import { Address, AssetId, LiquidationRecord, Position, VaultConfig } from '../../types.js';
import { isoNow } from '../../utils/time.js';
import { PositionAccess, requirePositionAccess } from '../auth/capabilities.js';
import { CollectionOutcome, InterestCharge, InterestDebtor, InterestEngine } from '../interest/interestEngine.js';
import {
  amountFor,
  bipsOf,
  MAX_UINT256,
  percentOf,
  PERCENT,
  PRECISION,
  valueOf,
} from '../math/fixedPoint.js';
import { PriceOracle, readPrice } from '../oracle/priceOracle.js';
import { LedgerTx } from './ledgerTx.js';

export interface VaultPrices {
  collateral: bigint;
  debt: bigint;
}

export interface PositionValuation {
  collateralValue: bigint;
  debtValue: bigint;
}

export interface OpenPositionParams {
  owner: Address;
  /** Account the collateral is pulled from; the owner unless a delegate funds it. */
  payer: Address;
  collateralAsset?: AssetId;
  collateralAmount: bigint;
  debtAmount: bigint;
  debtRecipient: Address;
  leverageHint?: number;
}

export interface BorrowParams {
  caller: Address;
  positionId: number;
  beneficiary: Address;
  amount: bigint;
  access: PositionAccess;
}

export interface LiquidationResult {
  position: Position;
  record: LiquidationRecord;
}

/**
 * Position bookkeeping for one vault, operating on a ledger transaction.
 * Callers are responsible for running these inside the store transaction and
 * the vault's reentrancy guard.
 */
export class PositionBook implements InterestDebtor {
  constructor(
    private readonly oracle: PriceOracle,
    private readonly interest: InterestEngine,
    readonly vaultId: string,
    private readonly interestEnabled: boolean,
  ) {}

  /* ── lookups & valuation ───────────────────────────────────── */

  requirePosition(tx: LedgerTx, positionId: number): Position {
    const position = tx.state.vault.positions[String(positionId)];
    if (!position) {
      throw domainError(ErrorCode.PositionNotFound, `Position ${positionId} does not exist.`, { positionId });
    }
    return position;
  }

  requireOpen(tx: LedgerTx, positionId: number): Position {
    const position = this.requirePosition(tx, positionId);
    if (position.status !== 'open') {
      throw domainError(ErrorCode.PositionClosed, `Position ${positionId} is ${position.status}.`, {
        positionId,
        status: position.status,
      });
    }
    return position;
  }

  async prices(tx: LedgerTx): Promise<VaultPrices> {
    const config = tx.state.vault.config;
    const [collateral, debt] = await Promise.all([
      this.priceOf(config, config.collateralAsset, tx.now),
      this.priceOf(config, config.debtAsset, tx.now),
    ]);
    return { collateral, debt };
  }

  value(tx: LedgerTx, collateralAmount: bigint, debtAmount: bigint, prices: VaultPrices): PositionValuation {
    const { collateralAsset, debtAsset } = tx.state.vault.config;
    return {
      collateralValue: valueOf(collateralAmount, tx.bank.decimalsOf(collateralAsset), prices.collateral),
      debtValue: valueOf(debtAmount, tx.bank.decimalsOf(debtAsset), prices.debt),
    };
  }

  /** Debt including interest that is due but not yet charged. */
  currentDebt(tx: LedgerTx, position: Position): bigint {
    if (!this.interestEnabled) return position.debtAmount;
    return position.debtAmount
      + this.interest.calculateInterestDue(tx.state, tx.block, this.vaultId, position.id, position.debtAmount);
  }

  async health(tx: LedgerTx, position: Position): Promise<bigint> {
    const debt = this.currentDebt(tx, position);
    if (debt === 0n) return MAX_UINT256;
    const { collateralValue, debtValue } = this.value(tx, position.collateralAmount, debt, await this.prices(tx));
    if (debtValue === 0n) return MAX_UINT256;
    return (collateralValue * PRECISION) / debtValue;
  }

  async maxBorrowable(tx: LedgerTx, position: Position): Promise<bigint> {
    const prices = await this.prices(tx);
    const { collateralValue, debtValue } = this.value(tx, position.collateralAmount, this.currentDebt(tx, position), prices);
    const limit = percentOf(collateralValue, tx.state.vault.config.ltvRatio);
    if (limit <= debtValue) return 0n;
    return amountFor(limit - debtValue, tx.bank.decimalsOf(tx.state.vault.config.debtAsset), prices.debt);
  }

  isUnderThreshold(tx: LedgerTx, health: bigint): boolean {
    return health * PERCENT < BigInt(tx.state.vault.config.liquidationThreshold) * PRECISION;
  }

  /* ── interest ──────────────────────────────────────────────── */

  /** Folds due interest into the position's debt; no-op when nothing is due. */
  accrue(tx: LedgerTx, position: Position): CollectionOutcome {
    if (!this.interestEnabled || position.debtAmount === 0n) return { status: 'not_ready' };

    const due = this.interest.calculateInterestDue(tx.state, tx.block, this.vaultId, position.id, position.debtAmount);
    if (due === 0n) return { status: 'not_ready' };

    return this.interest.collectInterest(tx, {
      caller: this.vaultId,
      vaultId: this.vaultId,
      token: tx.state.vault.config.debtAsset,
      positionId: position.id,
      debtAmount: position.debtAmount,
      debtor: this,
    });
  }

  chargeInterest(tx: LedgerTx, charge: InterestCharge): void {
    const position = this.requirePosition(tx, charge.positionId);
    position.debtAmount += charge.amount;
    position.updatedAtBlock = tx.block;
    this.adjustBalances(tx, position.owner, 0n, charge.amount);
    tx.bank.token(tx.state.vault.config.debtAsset).mint(this.vaultId, charge.payTo, charge.amount);
  }

  /* ── mutations ─────────────────────────────────────────────── */

  async open(tx: LedgerTx, params: OpenPositionParams): Promise<Position> {
    const vault = tx.state.vault;
    const { collateralAsset, debtAsset } = vault.config;

    if (params.collateralAsset !== undefined && params.collateralAsset !== collateralAsset) {
      throw domainError(ErrorCode.InvalidAsset, `Vault takes ${collateralAsset} as collateral, not ${params.collateralAsset}.`, {
        expected: collateralAsset,
        received: params.collateralAsset,
      });
    }
    if (params.collateralAmount <= 0n) {
      throw domainError(ErrorCode.InvalidCollateralAmount, 'Collateral amount must be positive.');
    }
    if (params.debtAmount < 0n) {
      throw domainError(ErrorCode.InvalidAmount, 'Debt amount cannot be negative.');
    }

    tx.bank.token(collateralAsset).transferFrom(this.vaultId, params.payer, this.vaultId, params.collateralAmount);

    const position: Position = {
      id: vault.nextPositionId,
      owner: params.owner,
      collateralAmount: params.collateralAmount,
      debtAmount: 0n,
      status: 'open',
      leverageHint: params.leverageHint ?? 0,
      createdAtBlock: tx.block,
      updatedAtBlock: tx.block,
    };
    vault.nextPositionId += 1;
    vault.positions[String(position.id)] = position;
    this.adjustBalances(tx, position.owner, params.collateralAmount, 0n);

    if (this.interestEnabled) this.interest.activate(tx, this.vaultId, position.id);

    if (params.debtAmount > 0n) {
      position.debtAmount = params.debtAmount;
      this.adjustBalances(tx, position.owner, 0n, params.debtAmount);
      await this.assertWithinLtv(tx, position, ErrorCode.LoanExceedsLtvLimit);
      tx.bank.token(debtAsset).mint(this.vaultId, params.debtRecipient, params.debtAmount);
    }

    tx.events.push({
      type: 'position.opened',
      data: {
        positionId: position.id,
        owner: position.owner,
        collateralAmount: position.collateralAmount,
        debtAmount: position.debtAmount,
        leverageHint: position.leverageHint,
      },
    });
    return position;
  }

  addCollateral(tx: LedgerTx, caller: Address, positionId: number, amount: bigint): Position {
    const position = this.requireOpen(tx, positionId);
    requirePositionAccess(tx.state, caller, position, 'ownerOrDelegate');
    this.requirePositive(amount);

    this.accrue(tx, position);
    tx.bank.token(tx.state.vault.config.collateralAsset).transferFrom(this.vaultId, caller, this.vaultId, amount);
    position.collateralAmount += amount;
    position.updatedAtBlock = tx.block;
    this.adjustBalances(tx, position.owner, amount, 0n);

    tx.events.push({
      type: 'position.collateral.added',
      data: { positionId, caller, amount, collateralAmount: position.collateralAmount },
    });
    return position;
  }

  async removeCollateral(tx: LedgerTx, caller: Address, positionId: number, amount: bigint): Promise<Position> {
    const position = this.requireOpen(tx, positionId);
    requirePositionAccess(tx.state, caller, position, 'owner');
    this.requirePositive(amount);

    this.accrue(tx, position);
    if (amount > position.collateralAmount) {
      throw domainError(
        ErrorCode.InsufficientCollateralAfterWithdrawal,
        `Position ${positionId} holds ${position.collateralAmount} collateral, cannot remove ${amount}.`,
        { positionId, collateralAmount: position.collateralAmount.toString(), requested: amount.toString() },
      );
    }

    position.collateralAmount -= amount;
    position.updatedAtBlock = tx.block;
    this.adjustBalances(tx, position.owner, -amount, 0n);
    await this.assertWithinLtv(tx, position, ErrorCode.InsufficientCollateralAfterWithdrawal);
    tx.bank.token(tx.state.vault.config.collateralAsset).transfer(this.vaultId, position.owner, amount);

    tx.events.push({
      type: 'position.collateral.removed',
      data: { positionId, amount, collateralAmount: position.collateralAmount },
    });
    return position;
  }

  async borrow(tx: LedgerTx, params: BorrowParams): Promise<Position> {
    const { caller, positionId, beneficiary, amount } = params;
    const position = this.requireOpen(tx, positionId);
    requirePositionAccess(tx.state, caller, position, params.access);
    this.requirePositive(amount);

    this.accrue(tx, position);
    if (position.debtAmount === 0n && this.interestEnabled) {
      this.interest.activate(tx, this.vaultId, position.id);
    }

    position.debtAmount += amount;
    position.updatedAtBlock = tx.block;
    this.adjustBalances(tx, position.owner, 0n, amount);
    await this.assertWithinLtv(tx, position, ErrorCode.LoanExceedsLtvLimit);
    tx.bank.token(tx.state.vault.config.debtAsset).mint(this.vaultId, beneficiary, amount);

    tx.events.push({
      type: 'position.borrowed',
      data: { positionId, caller, beneficiary, amount, debtAmount: position.debtAmount },
    });
    return position;
  }

  repay(tx: LedgerTx, caller: Address, positionId: number, amount: bigint): Position {
    const position = this.requireOpen(tx, positionId);
    this.requirePositive(amount);

    this.accrue(tx, position);
    if (amount > position.debtAmount) {
      throw domainError(ErrorCode.AmountExceedsLoan, `Position ${positionId} owes ${position.debtAmount}, cannot repay ${amount}.`, {
        positionId,
        debtAmount: position.debtAmount.toString(),
        requested: amount.toString(),
      });
    }

    tx.bank.token(tx.state.vault.config.debtAsset).burn(this.vaultId, caller, amount);
    position.debtAmount -= amount;
    position.updatedAtBlock = tx.block;
    this.adjustBalances(tx, position.owner, 0n, -amount);

    tx.events.push({
      type: 'position.repaid',
      data: { positionId, caller, amount, debtAmount: position.debtAmount },
    });
    return position;
  }

  close(tx: LedgerTx, caller: Address, positionId: number): Position {
    const position = this.requireOpen(tx, positionId);
    requirePositionAccess(tx.state, caller, position, 'owner');

    this.accrue(tx, position);
    const { collateralAmount, debtAmount } = position;
    const { collateralAsset, debtAsset } = tx.state.vault.config;

    if (debtAmount > 0n) tx.bank.token(debtAsset).burn(this.vaultId, caller, debtAmount);
    if (collateralAmount > 0n) tx.bank.token(collateralAsset).transfer(this.vaultId, position.owner, collateralAmount);

    this.zero(tx, position, 'closed');
    tx.events.push({
      type: 'position.closed',
      data: { positionId, owner: position.owner, repaid: debtAmount, returnedCollateral: collateralAmount },
    });
    return position;
  }

  async liquidate(tx: LedgerTx, caller: Address, positionId: number): Promise<LiquidationResult> {
    const position = this.requireOpen(tx, positionId);

    this.accrue(tx, position);
    const health = await this.health(tx, position);
    if (position.debtAmount === 0n || !this.isUnderThreshold(tx, health)) {
      throw domainError(ErrorCode.PositionHealthy, `Position ${positionId} is above the liquidation threshold.`, {
        positionId,
        health: health.toString(),
        liquidationThreshold: tx.state.vault.config.liquidationThreshold,
      });
    }

    const config = tx.state.vault.config;
    const seized = position.collateralAmount;
    const reward = bipsOf(seized, config.liquidatorRewardBips);
    const treasuryShare = seized - reward;
    const writtenOff = position.debtAmount;
    const collateral = tx.bank.token(config.collateralAsset);

    if (reward > 0n) collateral.transfer(this.vaultId, caller, reward);
    if (treasuryShare > 0n) collateral.transfer(this.vaultId, config.treasury, treasuryShare);

    tx.state.vault.badDebt += writtenOff;
    this.zero(tx, position, 'liquidated');

    const record: LiquidationRecord = {
      id: uuid(),
      positionId,
      owner: position.owner,
      liquidator: caller,
      seizedCollateral: seized,
      liquidatorReward: reward,
      treasuryShare,
      writtenOffDebt: writtenOff,
      block: tx.block,
      createdAt: isoNow(),
    };
    tx.state.vault.liquidations.push(record);
    tx.events.push({
      type: 'position.liquidated',
      data: { ...record },
    });
    return { position, record };
  }

  /* ── internals ─────────────────────────────────────────────── */

  async assertWithinLtv(tx: LedgerTx, position: Position, code: ErrorCode): Promise<void> {
    if (position.debtAmount === 0n) return;
    const { collateralValue, debtValue } = this.value(tx, position.collateralAmount, position.debtAmount, await this.prices(tx));
    const limit = percentOf(collateralValue, tx.state.vault.config.ltvRatio);
    if (debtValue > limit) {
      throw domainError(code, `Position ${position.id} would owe ${debtValue} against a limit of ${limit}.`, {
        positionId: position.id,
        debtValue: debtValue.toString(),
        limit: limit.toString(),
        ltvRatio: tx.state.vault.config.ltvRatio,
      });
    }
  }

  private zero(tx: LedgerTx, position: Position, status: 'closed' | 'liquidated'): void {
    this.adjustBalances(tx, position.owner, -position.collateralAmount, -position.debtAmount);
    position.collateralAmount = 0n;
    position.debtAmount = 0n;
    position.status = status;
    position.updatedAtBlock = tx.block;
    if (this.interestEnabled) this.interest.deactivate(tx, this.vaultId, position.id);
  }

  private adjustBalances(tx: LedgerTx, owner: Address, collateralDelta: bigint, debtDelta: bigint): void {
    const current = tx.state.vault.userBalances[owner] ?? { collateral: 0n, debt: 0n };
    tx.state.vault.userBalances[owner] = {
      collateral: current.collateral + collateralDelta,
      debt: current.debt + debtDelta,
    };
  }

  private async priceOf(config: VaultConfig, asset: AssetId, now: number): Promise<bigint> {
    const feedId = config.priceFeeds[asset];
    if (feedId === undefined) {
      throw domainError(ErrorCode.InvalidAsset, `No price feed configured for ${asset}.`, { asset });
    }
    return readPrice(this.oracle, feedId, now, config.stalenessWindowSeconds);
  }

  private requirePositive(amount: bigint): void {
    if (amount <= 0n) throw domainError(ErrorCode.InvalidAmount, 'Amount must be positive.');
  }
}
