import { domainError, ErrorCode } from '../../errors/taxonomy.js';
import { Address, AppState, AssetId, PositionInterestState } from '../../types.js';
import { LedgerTx } from '../ledger/ledgerTx.js';
import { BIPS, PRECISION, computePeriodShare } from '../math/fixedPoint.js';

export interface InterestCharge {
  positionId: number;
  amount: bigint;
  /** Account the newly owed debt asset is credited to. */
  payTo: Address;
}

/** Implemented by the vault whose positions the engine charges. */
export interface InterestDebtor {
  chargeInterest(tx: LedgerTx, charge: InterestCharge): void;
}

export interface CollectInterestRequest {
  caller: Address;
  vaultId: string;
  token: AssetId;
  positionId: number;
  debtAmount: bigint;
  debtor: InterestDebtor;
}

export type CollectionOutcome =
  | { status: 'collected'; amount: bigint; periods: number }
  | { status: 'not_ready' };

export const interestKey = (vaultId: string, positionId: number): string => `${vaultId}:${positionId}`;

/**
 * Discretized simple interest: a position is charged
 * `debt * rate * periodShare * wholePeriods` at each collection, and the
 * collection restarts the period count at the current block. Blocks short of
 * a whole period are dropped.
 */
export class InterestEngine {
  constructor(readonly address: Address) {}

  stateOf(state: AppState, vaultId: string, positionId: number): PositionInterestState {
    return state.interest.positions[interestKey(vaultId, positionId)] ?? { lastCollectionBlock: 0 };
  }

  periodsElapsed(state: AppState, block: number, vaultId: string, positionId: number): number {
    const { lastCollectionBlock } = this.stateOf(state, vaultId, positionId);
    if (lastCollectionBlock === 0 || block <= lastCollectionBlock) return 0;
    return Math.floor((block - lastCollectionBlock) / state.interest.periodBlocks);
  }

  calculateInterestDue(
    state: AppState,
    block: number,
    vaultId: string,
    positionId: number,
    debtAmount: bigint,
  ): bigint {
    const vault = state.interest.vaults[vaultId];
    if (!vault || vault.annualRateBips === 0 || debtAmount === 0n) return 0n;

    const periods = this.periodsElapsed(state, block, vaultId, positionId);
    if (periods === 0) return 0n;

    return (debtAmount * BigInt(vault.annualRateBips) * state.interest.periodShare * BigInt(periods))
      / (BIPS * PRECISION);
  }

  activate(tx: LedgerTx, vaultId: string, positionId: number): void {
    tx.state.interest.positions[interestKey(vaultId, positionId)] = { lastCollectionBlock: tx.block };
    tx.events.push({ type: 'interest.activated', data: { vaultId, positionId, block: tx.block } });
  }

  deactivate(tx: LedgerTx, vaultId: string, positionId: number): void {
    const key = interestKey(vaultId, positionId);
    if (tx.state.interest.positions[key]) {
      tx.state.interest.positions[key] = { lastCollectionBlock: 0 };
    }
  }

  collectInterest(tx: LedgerTx, request: CollectInterestRequest): CollectionOutcome {
    const { caller, vaultId, token, positionId, debtAmount, debtor } = request;
    if (!tx.state.interest.vaults[vaultId] || caller !== vaultId) {
      throw domainError(ErrorCode.VaultNotCaller, `${caller} is not the registered vault ${vaultId}.`, {
        caller,
        vaultId,
      });
    }

    const periods = this.periodsElapsed(tx.state, tx.block, vaultId, positionId);
    if (periods === 0) return { status: 'not_ready' };

    const amount = this.calculateInterestDue(tx.state, tx.block, vaultId, positionId, debtAmount);
    if (amount === 0n) {
      throw domainError(ErrorCode.NoInterestToCollect, `Position ${positionId} owes no interest.`, {
        vaultId,
        positionId,
        debtAmount: debtAmount.toString(),
      });
    }

    debtor.chargeInterest(tx, { positionId, amount, payTo: this.address });

    tx.state.interest.positions[interestKey(vaultId, positionId)] = { lastCollectionBlock: tx.block };
    tx.state.interest.treasury[token] = (tx.state.interest.treasury[token] ?? 0n) + amount;
    tx.events.push({
      type: 'interest.collected',
      data: { vaultId, positionId, token, amount, periods, block: tx.block },
    });

    return { status: 'collected', amount, periods };
  }

  registerVault(tx: LedgerTx, vaultId: string, annualRateBips: number): void {
    if (tx.state.interest.vaults[vaultId]) {
      throw domainError(ErrorCode.VaultAlreadyRegistered, `Vault ${vaultId} is already registered.`, { vaultId });
    }
    this.requireRate(annualRateBips);
    tx.state.interest.vaults[vaultId] = { annualRateBips, registeredAtBlock: tx.block };
    tx.events.push({ type: 'interest.vault.registered', data: { vaultId, annualRateBips } });
  }

  setVaultRate(tx: LedgerTx, vaultId: string, annualRateBips: number): number {
    const vault = tx.state.interest.vaults[vaultId];
    if (!vault) {
      throw domainError(ErrorCode.VaultNotRegistered, `Vault ${vaultId} is not registered.`, { vaultId });
    }
    this.requireRate(annualRateBips);
    const previous = vault.annualRateBips;
    vault.annualRateBips = annualRateBips;
    return previous;
  }

  setPeriodBlocks(tx: LedgerTx, periodBlocks: number): number {
    if (!Number.isInteger(periodBlocks) || periodBlocks <= 0 || periodBlocks > tx.state.interest.blocksPerYear) {
      throw domainError(ErrorCode.InvalidConfig, 'periodBlocks must be a positive integer no larger than a year.', {
        periodBlocks,
      });
    }
    const previous = tx.state.interest.periodBlocks;
    tx.state.interest.periodBlocks = periodBlocks;
    tx.state.interest.periodShare = computePeriodShare(periodBlocks, tx.state.interest.blocksPerYear);
    return previous;
  }

  private requireRate(annualRateBips: number): void {
    if (!Number.isInteger(annualRateBips) || annualRateBips <= 0) {
      throw domainError(ErrorCode.InvalidRate, 'Annual rate must be a positive number of basis points.', {
        annualRateBips,
      });
    }
  }
}
