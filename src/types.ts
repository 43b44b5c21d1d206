export type Address = string;
export type AssetId = string;

export type PositionStatus = 'open' | 'closed' | 'liquidated';

export interface Position {
  id: number;
  owner: Address;
  collateralAmount: bigint;
  debtAmount: bigint;
  status: PositionStatus;
  leverageHint: number;
  createdAtBlock: number;
  updatedAtBlock: number;
}

export interface UserBalances {
  collateral: bigint;
  debt: bigint;
}

export interface VaultConfig {
  collateralAsset: AssetId;
  debtAsset: AssetId;
  /** Max debt value as a percentage of collateral value, (0, 100]. */
  ltvRatio: number;
  /** Minimum collateral ratio in percent; below it a position can be liquidated. */
  liquidationThreshold: number;
  liquidatorRewardBips: number;
  stalenessWindowSeconds: number;
  priceFeeds: Record<AssetId, string>;
  treasury: Address;
}

export interface LiquidationRecord {
  id: string;
  positionId: number;
  owner: Address;
  liquidator: Address;
  seizedCollateral: bigint;
  liquidatorReward: bigint;
  treasuryShare: bigint;
  writtenOffDebt: bigint;
  block: number;
  createdAt: string;
}

export interface VaultState {
  id: string;
  config: VaultConfig;
  nextPositionId: number;
  positions: Record<string, Position>;
  userBalances: Record<Address, UserBalances>;
  /** Debt zeroed by liquidation while its debt-asset stays in circulation. */
  badDebt: bigint;
  liquidations: LiquidationRecord[];
}

export interface PositionInterestState {
  /** 0 means never activated, or dormant after close/liquidation. */
  lastCollectionBlock: number;
}

export interface InterestVaultState {
  annualRateBips: number;
  registeredAtBlock: number;
}

export interface InterestEngineState {
  periodBlocks: number;
  blocksPerYear: number;
  /** periodBlocks / blocksPerYear scaled by PRECISION. */
  periodShare: bigint;
  vaults: Record<string, InterestVaultState>;
  positions: Record<string, PositionInterestState>;
  /** Collected, not yet withdrawn interest per debt asset. */
  treasury: Record<AssetId, bigint>;
}

export interface TokenState {
  symbol: AssetId;
  decimals: number;
  totalSupply: bigint;
  balances: Record<Address, bigint>;
  allowances: Record<Address, Record<Address, bigint>>;
}

export type Permission =
  | 'vault.admin'
  | 'interest.admin'
  | 'position.delegate'
  | 'token.minter';

export interface RoleGrant {
  permission: Permission;
  address: Address;
  /** Scope of the grant: an asset for token.minter, '*' otherwise. */
  scope: string;
}

export interface AuditEntry {
  id: string;
  actor: Address;
  setting: string;
  oldValue: unknown;
  newValue: unknown;
  block: number;
  createdAt: string;
}

export interface PriceRecord {
  price: bigint;
  decimals: number;
  /** Unix seconds. */
  updatedAt: number;
}

export interface AppState {
  vault: VaultState;
  interest: InterestEngineState;
  tokens: Record<AssetId, TokenState>;
  /** Last operator-published answer per feed, reloaded into the oracle on start. */
  oracle: { prices: Record<string, PriceRecord> };
  roles: RoleGrant[];
  audit: AuditEntry[];
  metrics: {
    startedAt: string;
    transactionsCommitted: number;
    transactionsReverted: number;
  };
}
