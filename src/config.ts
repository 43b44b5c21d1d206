import dotenv from 'dotenv';
import path from 'node:path';

dotenv.config();

const parseBool = (input: string | undefined, fallback = false): boolean => {
  if (input === undefined) return fallback;
  return ['1', 'true', 'yes', 'on'].includes(input.toLowerCase());
};

const parseNumber = (input: string | undefined, fallback: number): number => {
  if (input === undefined) return fallback;
  const n = Number(input);
  return Number.isFinite(n) ? n : fallback;
};

const parseList = (input: string | undefined, fallback: string[]): string[] => {
  if (input === undefined) return fallback;
  return input.split(',').map((s) => s.trim()).filter(Boolean);
};

const collateralAsset = process.env.VAULT_COLLATERAL_ASSET ?? 'WETH';
const debtAsset = process.env.VAULT_DEBT_ASSET ?? 'USDL';

export const config = {
  app: {
    name: 'collateral-ledger-engine',
    env: process.env.NODE_ENV ?? 'development',
    port: parseNumber(process.env.PORT, 8787),
  },
  paths: {
    dataDir: process.env.DATA_DIR ?? path.resolve(process.cwd(), 'data'),
    stateFile: process.env.STATE_FILE ?? path.resolve(process.cwd(), 'data', 'state.json'),
    logFile: process.env.LOG_FILE ?? path.resolve(process.cwd(), 'data', 'events.ndjson'),
  },
  chain: {
    blockTimeSeconds: parseNumber(process.env.CHAIN_BLOCK_TIME_SECONDS, 12),
    // 0 means "start counting blocks when the process starts"
    genesisUnix: parseNumber(process.env.CHAIN_GENESIS_UNIX, 0),
  },
  vault: {
    id: process.env.VAULT_ID ?? 'vault-main',
    owner: process.env.VAULT_OWNER ?? 'admin',
    treasury: process.env.VAULT_TREASURY ?? 'treasury',
    collateralAsset,
    collateralDecimals: parseNumber(process.env.VAULT_COLLATERAL_DECIMALS, 18),
    debtAsset,
    debtDecimals: parseNumber(process.env.VAULT_DEBT_DECIMALS, 18),
    ltvRatio: parseNumber(process.env.VAULT_LTV_RATIO, 50),
    liquidationThreshold: parseNumber(process.env.VAULT_LIQUIDATION_THRESHOLD, 150),
    liquidatorRewardBips: parseNumber(process.env.VAULT_LIQUIDATOR_REWARD_BIPS, 500),
    stalenessWindowSeconds: parseNumber(process.env.ORACLE_STALENESS_SECONDS, 3600),
    priceFeeds: {
      [collateralAsset]: process.env.PRICE_FEED_COLLATERAL ?? `${collateralAsset}/USD`,
      [debtAsset]: process.env.PRICE_FEED_DEBT ?? `${debtAsset}/USD`,
    },
  },
  interest: {
    enabled: parseBool(process.env.INTEREST_ENABLED, true),
    owner: process.env.INTEREST_OWNER ?? 'admin',
    address: process.env.INTEREST_ADDRESS ?? 'interest-engine',
    periodBlocks: parseNumber(process.env.INTEREST_PERIOD_BLOCKS, 300),
    blocksPerYear: parseNumber(process.env.INTEREST_BLOCKS_PER_YEAR, 2_628_000),
    annualRateBips: parseNumber(process.env.INTEREST_ANNUAL_RATE_BIPS, 500),
  },
  leverage: {
    maxLeverage: parseNumber(process.env.LEVERAGE_MAX, 10),
    address: process.env.LEVERAGE_ADDRESS ?? 'leverage-builder',
    route: parseList(process.env.LEVERAGE_ROUTE, [debtAsset, collateralAsset]),
  },
  exchange: {
    address: process.env.EXCHANGE_ADDRESS ?? 'exchange-router',
    feeBips: parseNumber(process.env.EXCHANGE_FEE_BIPS, 30),
  },
};

export type AppConfig = typeof config;
