import { domainError, ErrorCode } from '../../errors/taxonomy.js';
import { Address, AssetId } from '../../types.js';
import { LedgerTx } from '../ledger/ledgerTx.js';
import { amountFor, bipsOf, valueOf } from '../math/fixedPoint.js';
import { PriceOracle, readPrice } from '../oracle/priceOracle.js';
import { ExchangeRouter, SwapRequest } from './exchangeRouter.js';

export interface OracleRouterOptions {
  address: Address;
  feeBips: number;
}

/**
 * In-process venue that fills at oracle prices less a flat fee, out of its
 * own token inventory. Feeds and the staleness window are read from the
 * vault configuration of the call being settled.
 */
export class OracleRouter implements ExchangeRouter {
  readonly address: Address;

  constructor(
    private readonly oracle: PriceOracle,
    private readonly options: OracleRouterOptions,
  ) {
    this.address = options.address;
  }

  async quote(route: AssetId[], amountIn: bigint, tx: LedgerTx): Promise<bigint> {
    const assetIn = route[0];
    const assetOut = route[route.length - 1];
    if (route.length < 2 || assetIn === undefined || assetOut === undefined || assetIn === assetOut) {
      throw domainError(ErrorCode.InvalidAsset, 'Swap route needs two distinct end assets.', { route });
    }

    const [priceIn, priceOut] = await Promise.all([this.priceOf(tx, assetIn), this.priceOf(tx, assetOut)]);
    const value = valueOf(amountIn, tx.bank.decimalsOf(assetIn), priceIn);
    const gross = amountFor(value, tx.bank.decimalsOf(assetOut), priceOut);
    return gross - bipsOf(gross, this.options.feeBips);
  }

  async swapExactInput(request: SwapRequest, tx: LedgerTx): Promise<bigint> {
    const amountOut = await this.quote(request.route, request.amountIn, tx);
    if (amountOut < request.minAmountOut || amountOut === 0n) {
      throw domainError(ErrorCode.SlippageExceeded, `Swap returns ${amountOut}, minimum is ${request.minAmountOut}.`, {
        route: request.route,
        amountIn: request.amountIn.toString(),
        amountOut: amountOut.toString(),
        minAmountOut: request.minAmountOut.toString(),
      });
    }

    const assetIn = request.route[0];
    const assetOut = request.route[request.route.length - 1];
    tx.bank.token(assetIn).transferFrom(this.address, request.payer, this.address, request.amountIn);
    tx.bank.token(assetOut).transfer(this.address, request.recipient, amountOut);
    return amountOut;
  }

  private async priceOf(tx: LedgerTx, asset: AssetId): Promise<bigint> {
    const { priceFeeds, stalenessWindowSeconds } = tx.state.vault.config;
    const feedId = priceFeeds[asset];
    if (feedId === undefined) {
      throw domainError(ErrorCode.InvalidAsset, `No price feed for ${asset}.`, { asset });
    }
    return readPrice(this.oracle, feedId, tx.now, stalenessWindowSeconds);
  }
}
