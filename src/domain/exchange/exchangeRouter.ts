import { Address, AssetId } from '../../types.js';
import { LedgerTx } from '../ledger/ledgerTx.js';

export interface SwapRequest {
  /** Asset path, first entry is sold and last entry is bought. */
  route: AssetId[];
  amountIn: bigint;
  minAmountOut: bigint;
  payer: Address;
  recipient: Address;
}

/**
 * Exact-input swap venue. Settles through the bank of the ledger call it is
 * handed: pulls `amountIn` from the payer (which must have approved the
 * router) and sends the output to the recipient. Must throw when the output
 * is below `minAmountOut`.
 */
export interface ExchangeRouter {
  readonly address: Address;
  swapExactInput(request: SwapRequest, tx: LedgerTx): Promise<bigint>;
}
