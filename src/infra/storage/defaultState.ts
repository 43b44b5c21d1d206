import { AppConfig } from '../../config.js';
import { computePeriodShare } from '../../domain/math/fixedPoint.js';
import { AppState, TokenState } from '../../types.js';
import { isoNow } from '../../utils/time.js';

const emptyToken = (symbol: string, decimals: number): TokenState => ({
  symbol,
  decimals,
  totalSupply: 0n,
  balances: {},
  allowances: {},
});

export const createDefaultState = (config: AppConfig): AppState => {
  const { vault, interest, leverage } = config;

  return {
    vault: {
      id: vault.id,
      config: {
        collateralAsset: vault.collateralAsset,
        debtAsset: vault.debtAsset,
        ltvRatio: vault.ltvRatio,
        liquidationThreshold: vault.liquidationThreshold,
        liquidatorRewardBips: vault.liquidatorRewardBips,
        stalenessWindowSeconds: vault.stalenessWindowSeconds,
        priceFeeds: { ...vault.priceFeeds },
        treasury: vault.treasury,
      },
      nextPositionId: 1,
      positions: {},
      userBalances: {},
      badDebt: 0n,
      liquidations: [],
    },
    interest: {
      periodBlocks: interest.periodBlocks,
      blocksPerYear: interest.blocksPerYear,
      periodShare: computePeriodShare(interest.periodBlocks, interest.blocksPerYear),
      vaults: {},
      positions: {},
      treasury: {},
    },
    tokens: {
      [vault.collateralAsset]: emptyToken(vault.collateralAsset, vault.collateralDecimals),
      [vault.debtAsset]: emptyToken(vault.debtAsset, vault.debtDecimals),
    },
    oracle: { prices: {} },
    roles: [
      { permission: 'vault.admin', address: vault.owner, scope: '*' },
      { permission: 'interest.admin', address: interest.owner, scope: '*' },
      { permission: 'position.delegate', address: leverage.address, scope: '*' },
      { permission: 'token.minter', address: vault.id, scope: vault.debtAsset },
      { permission: 'token.minter', address: vault.owner, scope: vault.collateralAsset },
    ],
    audit: [],
    metrics: {
      startedAt: isoNow(),
      transactionsCommitted: 0,
      transactionsReverted: 0,
    },
  };
};
