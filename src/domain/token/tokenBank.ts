import { domainError, ErrorCode } from '../../errors/taxonomy.js';
import { PendingEvent } from '../../infra/eventBus.js';
import { Address, AppState, AssetId, TokenState } from '../../types.js';
import { hasPermission } from '../auth/capabilities.js';
import { MAX_UINT256 } from '../math/fixedPoint.js';

/** Allowance-and-balance token operations, ERC-20 style. */
export interface FungibleToken {
  balanceOf(holder: Address): bigint;
  allowance(owner: Address, spender: Address): bigint;
  transfer(from: Address, to: Address, amount: bigint): void;
  transferFrom(spender: Address, from: Address, to: Address, amount: bigint): void;
  approve(owner: Address, spender: Address, amount: bigint): void;
  mint(minter: Address, to: Address, amount: bigint): void;
  burn(minter: Address, from: Address, amount: bigint): void;
}

/**
 * Token ledgers living in a transaction draft. Every movement lands in the
 * same draft as the ledger bookkeeping, so both commit or roll back together.
 */
export class TokenBank {
  constructor(
    private readonly state: AppState,
    private readonly events: PendingEvent[] = [],
  ) {}

  token(asset: AssetId): FungibleToken {
    const ledger = this.ledgerOf(asset);
    return {
      balanceOf: (holder) => ledger.balances[holder] ?? 0n,
      allowance: (owner, spender) => ledger.allowances[owner]?.[spender] ?? 0n,
      transfer: (from, to, amount) => this.move(ledger, from, to, amount),
      transferFrom: (spender, from, to, amount) => {
        if (spender !== from) this.spendAllowance(ledger, from, spender, amount);
        this.move(ledger, from, to, amount);
      },
      approve: (owner, spender, amount) => {
        if (amount < 0n) throw domainError(ErrorCode.InvalidAmount, 'Allowance cannot be negative.');
        ledger.allowances[owner] = { ...(ledger.allowances[owner] ?? {}), [spender]: amount };
      },
      mint: (minter, to, amount) => {
        this.requireMinter(ledger, minter);
        this.requirePositive(amount);
        ledger.balances[to] = (ledger.balances[to] ?? 0n) + amount;
        ledger.totalSupply += amount;
        this.events.push({ type: 'token.transfer', data: { asset, from: null, to, amount } });
      },
      burn: (minter, from, amount) => {
        this.requireMinter(ledger, minter);
        this.requirePositive(amount);
        this.debit(ledger, from, amount);
        ledger.totalSupply -= amount;
        this.events.push({ type: 'token.transfer', data: { asset, from, to: null, amount } });
      },
    };
  }

  decimalsOf(asset: AssetId): number {
    return this.ledgerOf(asset).decimals;
  }

  private ledgerOf(asset: AssetId): TokenState {
    const ledger = this.state.tokens[asset];
    if (!ledger) throw domainError(ErrorCode.InvalidAsset, `Unknown asset ${asset}.`, { asset });
    return ledger;
  }

  private move(ledger: TokenState, from: Address, to: Address, amount: bigint): void {
    this.requirePositive(amount);
    this.debit(ledger, from, amount);
    ledger.balances[to] = (ledger.balances[to] ?? 0n) + amount;
    this.events.push({ type: 'token.transfer', data: { asset: ledger.symbol, from, to, amount } });
  }

  private debit(ledger: TokenState, from: Address, amount: bigint): void {
    const balance = ledger.balances[from] ?? 0n;
    if (balance < amount) {
      throw domainError(ErrorCode.InsufficientBalance, `${from} holds ${balance} ${ledger.symbol}, needs ${amount}.`, {
        asset: ledger.symbol,
        holder: from,
        balance: balance.toString(),
        required: amount.toString(),
      });
    }
    ledger.balances[from] = balance - amount;
  }

  private spendAllowance(ledger: TokenState, owner: Address, spender: Address, amount: bigint): void {
    const current = ledger.allowances[owner]?.[spender] ?? 0n;
    if (current === MAX_UINT256) return;
    if (current < amount) {
      throw domainError(ErrorCode.InsufficientAllowance, `${spender} may spend ${current} ${ledger.symbol} of ${owner}, needs ${amount}.`, {
        asset: ledger.symbol,
        owner,
        spender,
        allowance: current.toString(),
        required: amount.toString(),
      });
    }
    ledger.allowances[owner] = { ...(ledger.allowances[owner] ?? {}), [spender]: current - amount };
  }

  private requireMinter(ledger: TokenState, minter: Address): void {
    if (!hasPermission(this.state.roles, minter, 'token.minter', ledger.symbol)) {
      throw domainError(ErrorCode.MissingRole, `${minter} cannot mint or burn ${ledger.symbol}.`, {
        asset: ledger.symbol,
        caller: minter,
      });
    }
  }

  private requirePositive(amount: bigint): void {
    if (amount <= 0n) throw domainError(ErrorCode.InvalidAmount, 'Token amount must be positive.');
  }
}
