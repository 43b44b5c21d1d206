import { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { AppConfig } from '../config.js';
import { requireAddress } from '../domain/auth/capabilities.js';
import { DomainError, domainError, ErrorCode, toErrorEnvelope } from '../errors/taxonomy.js';
import { ChainClock } from '../infra/clock.js';
import { EventLogger } from '../infra/logger.js';
import { InterestAccrualService } from '../services/interestAccrualService.js';
import { LeverageService } from '../services/leverageService.js';
import { OracleService } from '../services/oracleService.js';
import { PositionLedgerService } from '../services/positionLedgerService.js';
import { TokenService } from '../services/tokenService.js';
import { toPlain } from '../utils/json.js';
import { connectedClients } from './websocket.js';

interface RouteDeps {
  config: AppConfig;
  clock: ChainClock;
  logger: EventLogger;
  feeds: OracleService;
  ledger: PositionLedgerService;
  interest: InterestAccrualService;
  leverage: LeverageService;
  tokens: TokenService;
}

const CALLER_HEADER = 'x-caller-address';

const amount = z.string().regex(/^\d+$/, 'amount must be a base-unit integer string').transform((v) => BigInt(v));
const address = z.string().min(1).max(128);
const positionParams = z.object({ id: z.coerce.number().int().positive() });

const openPositionSchema = z.object({
  collateralAsset: z.string().min(1).optional(),
  collateralAmount: amount,
  debtAmount: amount.default('0'),
  leverageHint: z.number().int().nonnegative().optional(),
});

const amountSchema = z.object({ amount });

const borrowForSchema = z.object({ beneficiary: address, amount });

const leverageSchema = z.object({
  collateralAmount: amount,
  leverage: z.number().int(),
  minAmountOut: amount.default('0'),
  swapHints: z.object({
    minAmountsOut: z.array(amount).optional(),
    route: z.array(z.string().min(1)).min(2).optional(),
  }).optional(),
});

const tokenMoveSchema = z.object({ to: address, amount });
const approveSchema = z.object({ spender: address, amount });

const priceFeedSchema = z.object({ asset: z.string().min(1), feedId: z.string().min(1) });
const ltvSchema = z.object({ ltvRatio: z.number().int() });
const liquidationParamsSchema = z.object({
  liquidationThreshold: z.number().int(),
  liquidatorRewardBips: z.number().int(),
});
const stalenessSchema = z.object({ seconds: z.number().int() });
const treasurySchema = z.object({ treasury: address });
const emergencyWithdrawSchema = z.object({ asset: z.string().min(1), to: address, amount });
const periodBlocksSchema = z.object({ periodBlocks: z.number().int() });
const vaultRateSchema = z.object({ vaultId: z.string().min(1), annualRateBips: z.number().int() });
const treasuryWithdrawSchema = z.object({ token: z.string().min(1), to: address, amount });
const roleSchema = z.object({
  permission: z.enum(['vault.admin', 'interest.admin', 'position.delegate', 'token.minter']),
  address,
  scope: z.string().min(1).optional(),
});
const publishPriceSchema = z.object({
  feedId: z.string().min(1),
  price: amount,
  decimals: z.number().int().min(0).max(36),
  updatedAt: z.number().int().positive().optional(),
});

const parse = <T extends z.ZodTypeAny>(schema: T, payload: unknown): z.output<T> => {
  const result = schema.safeParse(payload);
  if (!result.success) {
    throw domainError(ErrorCode.InvalidPayload, 'Invalid payload.', { issues: result.error.issues });
  }
  return result.data;
};

const callerOf = (request: FastifyRequest): string => {
  const header = request.headers[CALLER_HEADER];
  if (typeof header !== 'string' || header.length === 0) {
    throw domainError(ErrorCode.InvalidAddress, `Missing ${CALLER_HEADER} header.`);
  }
  return requireAddress(header, CALLER_HEADER);
};

const sendDomainError = (reply: FastifyReply, error: unknown): void => {
  if (error instanceof DomainError) {
    void reply.code(error.statusCode).send(toErrorEnvelope(error.code, error.message, error.details));
    return;
  }

  void reply.code(500).send(toErrorEnvelope(
    ErrorCode.InternalError,
    'Unexpected internal error',
    { error: String(error) },
  ));
};

/** Wraps a handler so domain errors become envelopes and bigints become strings. */
const handle = <R>(fn: (request: FastifyRequest) => Promise<R> | R) => (
  async (request: FastifyRequest, reply: FastifyReply): Promise<void> => {
    try {
      const result = await fn(request);
      void reply.send(toPlain(result));
    } catch (error) {
      sendDomainError(reply, error);
    }
  }
);

export async function registerRoutes(app: FastifyInstance, deps: RouteDeps): Promise<void> {
  const { ledger, interest, leverage, tokens } = deps;

  app.get('/', async () => ({
    name: deps.config.app.name,
    version: '0.1.0',
    status: 'ok',
    vaultId: ledger.vaultId,
    block: deps.clock.currentBlock(),
    wsClients: connectedClients(),
  }));

  /* ── reads ───────────────────────────────────────────────── */

  app.get('/vault', handle(() => ({
    vaultId: ledger.vaultId,
    config: ledger.getVaultConfig(),
    badDebt: ledger.getBadDebt(),
    maxLeverage: leverage.maxLeverage,
  })));

  app.get('/positions', handle((request) => {
    const query = parse(z.object({ owner: address.optional() }), request.query);
    return { positions: ledger.listPositions(query.owner) };
  }));

  app.get('/positions/:id', handle(async (request) => {
    const { id } = parse(positionParams, request.params);
    return { position: await ledger.describePosition(id) };
  }));

  app.get('/positions/:id/health', handle(async (request) => {
    const { id } = parse(positionParams, request.params);
    return { positionId: id, health: await ledger.getPositionHealth(id) };
  }));

  app.get('/positions/:id/max-borrowable', handle(async (request) => {
    const { id } = parse(positionParams, request.params);
    return { positionId: id, maxBorrowable: await ledger.getMaxBorrowable(id) };
  }));

  app.get('/users/:address/balances', handle((request) => {
    const params = parse(z.object({ address }), request.params);
    return {
      address: params.address,
      ledger: ledger.balancesOf(params.address),
      tokens: tokens.balancesOf(params.address),
    };
  }));

  app.get('/interest', handle(() => ({
    settings: interest.getSettings(),
    treasury: interest.getTreasury(ledger.getVaultConfig().debtAsset),
  })));

  app.get('/interest/positions/:id', handle((request) => {
    const { id } = parse(positionParams, request.params);
    return { vaultId: ledger.vaultId, positionId: id, ...interest.getInterestState(ledger.vaultId, id) };
  }));

  app.get('/events', handle(async (request) => {
    const query = parse(z.object({ limit: z.coerce.number().int().positive().max(500).default(50) }), request.query);
    return { events: await deps.logger.tail(query.limit) };
  }));

  /* ── position operations ─────────────────────────────────── */

  app.post('/positions', handle(async (request) => {
    const body = parse(openPositionSchema, request.body);
    return { position: await ledger.openPosition(callerOf(request), body) };
  }));

  app.post('/positions/:id/collateral/add', handle(async (request) => {
    const { id } = parse(positionParams, request.params);
    const body = parse(amountSchema, request.body);
    return { position: await ledger.addCollateral(callerOf(request), id, body.amount) };
  }));

  app.post('/positions/:id/collateral/remove', handle(async (request) => {
    const { id } = parse(positionParams, request.params);
    const body = parse(amountSchema, request.body);
    return { position: await ledger.removeCollateral(callerOf(request), id, body.amount) };
  }));

  app.post('/positions/:id/borrow', handle(async (request) => {
    const { id } = parse(positionParams, request.params);
    const body = parse(amountSchema, request.body);
    return { position: await ledger.borrow(callerOf(request), id, body.amount) };
  }));

  app.post('/positions/:id/borrow-for', handle(async (request) => {
    const { id } = parse(positionParams, request.params);
    const body = parse(borrowForSchema, request.body);
    return { position: await ledger.borrowFor(callerOf(request), id, body.beneficiary, body.amount) };
  }));

  app.post('/positions/:id/repay', handle(async (request) => {
    const { id } = parse(positionParams, request.params);
    const body = parse(amountSchema, request.body);
    return { position: await ledger.repay(callerOf(request), id, body.amount) };
  }));

  app.post('/positions/:id/close', handle(async (request) => {
    const { id } = parse(positionParams, request.params);
    return { position: await ledger.closePosition(callerOf(request), id) };
  }));

  app.post('/positions/:id/liquidate', handle(async (request) => {
    const { id } = parse(positionParams, request.params);
    return ledger.liquidate(callerOf(request), id);
  }));

  app.post('/positions/:id/accrue', handle(async (request) => {
    const { id } = parse(positionParams, request.params);
    return { outcome: await ledger.accrueInterest(callerOf(request), id) };
  }));

  app.post('/leverage', handle(async (request) => {
    const body = parse(leverageSchema, request.body);
    return leverage.leveragePosition(callerOf(request), body);
  }));

  /* ── tokens ──────────────────────────────────────────────── */

  app.post('/tokens/:asset/approve', handle(async (request) => {
    const { asset } = parse(z.object({ asset: z.string().min(1) }), request.params);
    const body = parse(approveSchema, request.body);
    await tokens.approve(callerOf(request), asset, body.spender, body.amount);
    return { ok: true };
  }));

  app.post('/tokens/:asset/transfer', handle(async (request) => {
    const { asset } = parse(z.object({ asset: z.string().min(1) }), request.params);
    const body = parse(tokenMoveSchema, request.body);
    await tokens.transfer(callerOf(request), asset, body.to, body.amount);
    return { ok: true };
  }));

  app.post('/tokens/:asset/mint', handle(async (request) => {
    const { asset } = parse(z.object({ asset: z.string().min(1) }), request.params);
    const body = parse(tokenMoveSchema, request.body);
    await tokens.mint(callerOf(request), asset, body.to, body.amount);
    return { ok: true };
  }));

  /* ── administration ──────────────────────────────────────── */

  app.post('/admin/price-feed', handle(async (request) => {
    const body = parse(priceFeedSchema, request.body);
    await ledger.updatePriceFeed(callerOf(request), body.asset, body.feedId);
    return { ok: true };
  }));

  app.post('/admin/ltv', handle(async (request) => {
    const body = parse(ltvSchema, request.body);
    await ledger.updateLtv(callerOf(request), body.ltvRatio);
    return { ok: true };
  }));

  app.post('/admin/liquidation', handle(async (request) => {
    const body = parse(liquidationParamsSchema, request.body);
    await ledger.updateLiquidationParams(callerOf(request), body.liquidationThreshold, body.liquidatorRewardBips);
    return { ok: true };
  }));

  app.post('/admin/staleness', handle(async (request) => {
    const body = parse(stalenessSchema, request.body);
    await ledger.updateStalenessWindow(callerOf(request), body.seconds);
    return { ok: true };
  }));

  app.post('/admin/treasury', handle(async (request) => {
    const body = parse(treasurySchema, request.body);
    await ledger.updateTreasury(callerOf(request), body.treasury);
    return { ok: true };
  }));

  app.post('/admin/emergency-withdraw', handle(async (request) => {
    const body = parse(emergencyWithdrawSchema, request.body);
    await ledger.emergencyWithdraw(callerOf(request), body.asset, body.to, body.amount);
    return { ok: true };
  }));

  app.post('/admin/roles/grant', handle(async (request) => {
    const body = parse(roleSchema, request.body);
    return { changed: await ledger.grantRole(callerOf(request), body.permission, body.address, body.scope) };
  }));

  app.post('/admin/roles/revoke', handle(async (request) => {
    const body = parse(roleSchema, request.body);
    return { changed: await ledger.revokeRole(callerOf(request), body.permission, body.address, body.scope) };
  }));

  app.post('/admin/interest/period', handle(async (request) => {
    const body = parse(periodBlocksSchema, request.body);
    await interest.setPeriodBlocks(callerOf(request), body.periodBlocks);
    return { ok: true };
  }));

  app.post('/admin/interest/rate', handle(async (request) => {
    const body = parse(vaultRateSchema, request.body);
    await interest.setVaultRate(callerOf(request), body.vaultId, body.annualRateBips);
    return { ok: true };
  }));

  app.post('/admin/interest/register', handle(async (request) => {
    const body = parse(vaultRateSchema, request.body);
    await interest.registerVault(callerOf(request), body.vaultId, body.annualRateBips);
    return { ok: true };
  }));

  app.post('/admin/interest/withdraw', handle(async (request) => {
    const body = parse(treasuryWithdrawSchema, request.body);
    await interest.withdrawTreasury(callerOf(request), body.token, body.to, body.amount);
    return { ok: true };
  }));

  app.get('/oracle/feeds', handle(async () => ({ feeds: await deps.feeds.listFeeds() })));

  app.post('/oracle/prices', handle(async (request) => {
    const body = parse(publishPriceSchema, request.body);
    const record = await deps.feeds.publishPrice(callerOf(request), body.feedId, body.price, body.decimals, body.updatedAt);
    return { ok: true, record };
  }));
}
