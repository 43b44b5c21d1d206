import Fastify from 'fastify';
import fastifyWebSocket from '@fastify/websocket';
import { registerRoutes } from './api/routes.js';
import { registerWebSocket } from './api/websocket.js';
import { AppConfig } from './config.js';
import { OracleRouter } from './domain/exchange/oracleRouter.js';
import { InterestEngine } from './domain/interest/interestEngine.js';
import { StaticPriceOracle } from './domain/oracle/staticPriceOracle.js';
import { ChainClock, SystemClock } from './infra/clock.js';
import { EventLogger } from './infra/logger.js';
import { createDefaultState } from './infra/storage/defaultState.js';
import { StateStore } from './infra/storage/stateStore.js';
import { InterestAccrualService } from './services/interestAccrualService.js';
import { LeverageService } from './services/leverageService.js';
import { OracleService } from './services/oracleService.js';
import { PositionLedgerService } from './services/positionLedgerService.js';
import { TokenService } from './services/tokenService.js';

export interface EngineContext {
  store: StateStore;
  logger: EventLogger;
  clock: ChainClock;
  oracle: StaticPriceOracle;
  router: OracleRouter;
  feeds: OracleService;
  ledger: PositionLedgerService;
  interest: InterestAccrualService;
  leverage: LeverageService;
  tokens: TokenService;
}

export interface AppContext extends EngineContext {
  app: ReturnType<typeof Fastify>;
  stopEventFeed: () => void;
}

export interface EngineOverrides {
  clock?: ChainClock;
  oracle?: StaticPriceOracle;
}

/**
 * Wires the ledger, the interest engine and the leverage builder over one
 * state store, reloads published prices into the oracle, and registers the vault with the interest engine on first run.
 */
export async function buildEngine(config: AppConfig, overrides: EngineOverrides = {}): Promise<EngineContext> {
  const store = new StateStore(config.paths.stateFile, () => createDefaultState(config));
  await store.init();

  const logger = new EventLogger(config.paths.logFile);
  await logger.init();

  const clock = overrides.clock ?? new SystemClock(config.chain.blockTimeSeconds, config.chain.genesisUnix);
  const oracle = overrides.oracle ?? new StaticPriceOracle();
  const engine = new InterestEngine(config.interest.address);

  const feeds = new OracleService(store, logger, clock, oracle);
  feeds.restore();

  const interest = new InterestAccrualService(store, logger, clock, engine);
  const ledger = new PositionLedgerService(store, logger, clock, oracle, engine, config);
  const tokens = new TokenService(store, logger, clock);
  const router = new OracleRouter(oracle, {
    address: config.exchange.address,
    feeBips: config.exchange.feeBips,
  });
  const leverage = new LeverageService(ledger, router, config);

  if (config.interest.enabled && !interest.isRegistered(config.vault.id)) {
    await interest.registerVault(config.interest.owner, config.vault.id, config.interest.annualRateBips);
  }

  return { store, logger, clock, oracle, router, feeds, ledger, interest, leverage, tokens };
}

export async function buildApp(config: AppConfig, overrides: EngineOverrides = {}): Promise<AppContext> {
  const app = Fastify({
    logger: false,
  });

  // Register WebSocket plugin first so routes can use { websocket: true }.
  await app.register(fastifyWebSocket);

  const engine = await buildEngine(config, overrides);

  await registerRoutes(app, { config, ...engine });
  const stopEventFeed = await registerWebSocket(app);

  return { app, stopEventFeed, ...engine };
}
