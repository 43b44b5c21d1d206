import { AppConfig } from '../config.js';
import { ExchangeRouter } from '../domain/exchange/exchangeRouter.js';
import { BIPS } from '../domain/math/fixedPoint.js';
import { domainError, ErrorCode } from '../errors/taxonomy.js';
import { Address, AssetId } from '../types.js';
import { PositionLedgerService } from './positionLedgerService.js';

export interface SwapHints {
  /** Per-iteration minimum outputs; falls back to `minAmountOut`. */
  minAmountsOut?: bigint[];
  /** Overrides the configured debt-asset → collateral-asset route. */
  route?: AssetId[];
}

export interface LeverageRequest {
  collateralAmount: bigint;
  leverage: number;
  minAmountOut: bigint;
  swapHints?: SwapHints;
}

export interface LeverageIteration {
  iteration: number;
  borrowed: bigint;
  /** Collateral bought with `borrowed`; 0 on the final iteration. */
  collateralOut: bigint;
}

export interface LeverageResult {
  positionId: number;
  totalCollateral: bigint;
  totalDebt: bigint;
  leverage: number;
  effectiveLeverageBips: bigint;
  iterations: LeverageIteration[];
  residualDebtAsset: bigint;
}

/**
 * Builds a looped position in one ledger call: borrow the full headroom,
 * swap it into collateral, deposit, repeat. The last tranche is not swapped
 * and goes to the caller. Holds no state between calls.
 */
export class LeverageService {
  readonly address: Address;
  readonly maxLeverage: number;
  private readonly route: AssetId[];

  constructor(
    private readonly ledger: PositionLedgerService,
    private readonly router: ExchangeRouter,
    config: AppConfig,
  ) {
    this.address = config.leverage.address;
    this.maxLeverage = config.leverage.maxLeverage;
    this.route = config.leverage.route;
  }

  async leveragePosition(caller: Address, request: LeverageRequest): Promise<LeverageResult> {
    const { collateralAmount, leverage, minAmountOut } = request;
    if (!Number.isInteger(leverage) || leverage < 1) {
      throw domainError(ErrorCode.InvalidLeverage, 'Leverage must be a positive integer.', { leverage });
    }
    if (leverage > this.maxLeverage) {
      throw domainError(ErrorCode.LeverageTooHigh, `Leverage ${leverage} exceeds the maximum of ${this.maxLeverage}.`, {
        leverage,
        maxLeverage: this.maxLeverage,
      });
    }
    if (collateralAmount <= 0n) {
      throw domainError(ErrorCode.InvalidCollateralAmount, 'Collateral amount must be positive.');
    }
    if (minAmountOut < 0n) {
      throw domainError(ErrorCode.InvalidAmount, 'minAmountOut cannot be negative.');
    }

    const self = this.address;
    const route = request.swapHints?.route ?? this.route;

    return this.ledger.atomically('leveragePosition', caller, async (tx) => {
      const { book } = this.ledger;
      const { collateralAsset, debtAsset } = tx.state.vault.config;
      const collateral = tx.bank.token(collateralAsset);
      const debt = tx.bank.token(debtAsset);

      collateral.transferFrom(self, caller, self, collateralAmount);
      collateral.approve(self, book.vaultId, collateralAmount);
      const position = await book.open(tx, {
        owner: caller,
        payer: self,
        collateralAmount,
        debtAmount: 0n,
        debtRecipient: caller,
        leverageHint: leverage,
      });

      const iterations: LeverageIteration[] = [];
      for (let i = 0; i < leverage; i += 1) {
        const headroom = await book.maxBorrowable(tx, position);
        if (headroom === 0n) {
          throw domainError(ErrorCode.NoBorrowCapacity, `No borrow capacity left at iteration ${i + 1}.`, {
            iteration: i + 1,
            debtAmount: position.debtAmount.toString(),
            collateralAmount: position.collateralAmount.toString(),
          });
        }

        await book.borrow(tx, {
          caller: self,
          positionId: position.id,
          beneficiary: self,
          amount: headroom,
          access: 'ownerOrDelegate',
        });

        if (i === leverage - 1) {
          iterations.push({ iteration: i + 1, borrowed: headroom, collateralOut: 0n });
          break;
        }

        debt.approve(self, this.router.address, headroom);
        const collateralOut = await this.router.swapExactInput({
          route,
          amountIn: headroom,
          minAmountOut: request.swapHints?.minAmountsOut?.[i] ?? minAmountOut,
          payer: self,
          recipient: self,
        }, tx);

        collateral.approve(self, book.vaultId, collateralOut);
        book.addCollateral(tx, self, position.id, collateralOut);
        iterations.push({ iteration: i + 1, borrowed: headroom, collateralOut });
      }

      const residualDebtAsset = debt.balanceOf(self);
      if (residualDebtAsset > 0n) debt.transfer(self, caller, residualDebtAsset);

      const result: LeverageResult = {
        positionId: position.id,
        totalCollateral: position.collateralAmount,
        totalDebt: position.debtAmount,
        leverage,
        effectiveLeverageBips: (position.collateralAmount * BIPS) / collateralAmount,
        iterations,
        residualDebtAsset,
      };
      tx.events.push({
        type: 'leverage.opened',
        data: {
          owner: caller,
          positionId: result.positionId,
          totalCollateral: result.totalCollateral,
          totalDebt: result.totalDebt,
          leverage,
          swaps: iterations.filter((it) => it.collateralOut > 0n).length,
        },
      });
      return result;
    });
  }
}
