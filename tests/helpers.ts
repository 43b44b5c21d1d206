import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { buildEngine, EngineContext } from '../src/app.js';
import { AppConfig, config as baseConfig } from '../src/config.js';
import { StaticPriceOracle } from '../src/domain/oracle/staticPriceOracle.js';
import { DomainError } from '../src/errors/taxonomy.js';
import { ManualClock } from '../src/infra/clock.js';

export const E18 = 10n ** 18n;

/** Whole units to 18-decimal base units. */
export const units = (whole: number | bigint): bigint => BigInt(whole) * E18;

/** Awaits a call expected to fail with a DomainError and returns that error. */
export const rejectionOf = async (pending: Promise<unknown>): Promise<DomainError> => {
  try {
    await pending;
  } catch (error) {
    if (error instanceof DomainError) return error;
    throw error;
  }
  throw new Error('expected the call to be rejected');
};

export const createTempDir = async (): Promise<string> => fs.mkdtemp(path.join(os.tmpdir(), 'ledger-test-'));

export const buildTestConfig = (dir: string): AppConfig => ({
  ...baseConfig,
  app: { ...baseConfig.app, env: 'test', port: 0 },
  paths: {
    dataDir: dir,
    stateFile: path.join(dir, 'state.json'),
    logFile: path.join(dir, 'events.ndjson'),
  },
  vault: {
    ...baseConfig.vault,
    id: 'vault-main',
    owner: 'admin',
    treasury: 'treasury',
    collateralAsset: 'WETH',
    collateralDecimals: 18,
    debtAsset: 'USDL',
    debtDecimals: 18,
    ltvRatio: 50,
    liquidationThreshold: 150,
    liquidatorRewardBips: 500,
    stalenessWindowSeconds: 3600,
    priceFeeds: { WETH: 'WETH/USD', USDL: 'USDL/USD' },
  },
  interest: {
    ...baseConfig.interest,
    enabled: true,
    owner: 'admin',
    address: 'interest-engine',
    periodBlocks: 300,
    blocksPerYear: 2_628_000,
    annualRateBips: 500,
  },
  leverage: {
    ...baseConfig.leverage,
    maxLeverage: 10,
    address: 'leverage-builder',
    route: ['USDL', 'WETH'],
  },
  exchange: { ...baseConfig.exchange, address: 'exchange-router', feeBips: 0 },
});

export interface Fixture extends EngineContext {
  config: AppConfig;
  dir: string;
  manualClock: ManualClock;
  priceOracle: StaticPriceOracle;
  /** Publishes collateral and debt prices (whole dollars) stamped with the clock's time. */
  setPrices(collateralUsd: number, debtUsd?: number): void;
  /** Mints collateral to `holder` and approves `spender` (the vault by default) to pull it. */
  fundCollateral(holder: string, amount: bigint, spender?: string): Promise<void>;
  cleanup(): Promise<void>;
}

export const createFixture = async (
  overrides: (config: AppConfig) => AppConfig = (config) => config,
): Promise<Fixture> => {
  const dir = await createTempDir();
  const config = overrides(buildTestConfig(dir));
  const manualClock = new ManualClock();
  const priceOracle = new StaticPriceOracle();
  const engine = await buildEngine(config, { clock: manualClock, oracle: priceOracle });

  const setPrices = (collateralUsd: number, debtUsd = 1): void => {
    priceOracle.publish('WETH/USD', units(collateralUsd), 18, manualClock.now());
    priceOracle.publish('USDL/USD', units(debtUsd), 18, manualClock.now());
  };
  setPrices(200);

  const fundCollateral = async (holder: string, amount: bigint, spender = config.vault.id): Promise<void> => {
    await engine.tokens.mint(config.vault.owner, 'WETH', holder, amount);
    await engine.tokens.approve(holder, 'WETH', spender, amount);
  };

  const cleanup = async (): Promise<void> => {
    await engine.store.flush();
    await fs.rm(dir, { recursive: true, force: true });
  };

  return { ...engine, config, dir, manualClock, priceOracle, setPrices, fundCollateral, cleanup };
};
