import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ErrorCode } from '../src/errors/taxonomy.js';
import { eventBus } from '../src/infra/eventBus.js';
import { createFixture, Fixture, rejectionOf, units } from './helpers.js';

describe('liquidation', () => {
  let fx: Fixture;

  beforeEach(async () => {
    fx = await createFixture();
    await fx.fundCollateral('alice', units(1000));
    await fx.ledger.openPosition('alice', { collateralAmount: units(1000), debtAmount: units(100_000) });
  });

  afterEach(async () => {
    eventBus.clear();
    await fx.cleanup();
  });

  it('does not flag a position borrowed to its LTV limit', async () => {
    expect(await fx.ledger.isLiquidatable(1)).toBe(false);

    const error = await rejectionOf(fx.ledger.liquidate('liz', 1));
    expect(error.code).toBe(ErrorCode.PositionHealthy);
  });

  it('treats health exactly at the threshold as healthy', async () => {
    fx.setPrices(150);

    expect(await fx.ledger.getPositionHealth(1)).toBe(15n * 10n ** 17n);
    expect(await fx.ledger.isLiquidatable(1)).toBe(false);
    const error = await rejectionOf(fx.ledger.liquidate('liz', 1));
    expect(error.code).toBe(ErrorCode.PositionHealthy);
  });

  it('seizes the collateral of an unhealthy position and records the loss', async () => {
    fx.setPrices(140);
    expect(await fx.ledger.getPositionHealth(1)).toBe(14n * 10n ** 17n);
    expect(await fx.ledger.isLiquidatable(1)).toBe(true);

    const { position, record } = await fx.ledger.liquidate('liz', 1);

    expect(position.status).toBe('liquidated');
    expect(position.collateralAmount).toBe(0n);
    expect(position.debtAmount).toBe(0n);
    expect(record).toMatchObject({
      positionId: 1,
      owner: 'alice',
      liquidator: 'liz',
      seizedCollateral: units(1000),
      liquidatorReward: units(50),
      treasuryShare: units(950),
      writtenOffDebt: units(100_000),
    });

    expect(fx.tokens.balanceOf('WETH', 'liz')).toBe(units(50));
    expect(fx.tokens.balanceOf('WETH', 'treasury')).toBe(units(950));
    expect(fx.tokens.balanceOf('WETH', 'vault-main')).toBe(0n);
    expect(fx.tokens.balanceOf('USDL', 'alice')).toBe(units(100_000));
    expect(fx.ledger.getBadDebt()).toBe(units(100_000));
    expect(fx.ledger.balancesOf('alice')).toEqual({ collateral: 0n, debt: 0n });
    expect(fx.interest.getInterestState('vault-main', 1).lastCollectionBlock).toBe(0);
  });

  it('cannot liquidate the same position twice', async () => {
    fx.setPrices(140);
    await fx.ledger.liquidate('liz', 1);

    const error = await rejectionOf(fx.ledger.liquidate('liz', 1));
    expect(error.code).toBe(ErrorCode.PositionClosed);
    expect(await fx.ledger.isLiquidatable(1)).toBe(false);
  });

  it('never liquidates a debt-free position', async () => {
    await fx.fundCollateral('bob', units(1));
    await fx.ledger.openPosition('bob', { collateralAmount: units(1), debtAmount: 0n });
    fx.setPrices(1);

    expect(await fx.ledger.isLiquidatable(2)).toBe(false);
    const error = await rejectionOf(fx.ledger.liquidate('liz', 2));
    expect(error.code).toBe(ErrorCode.PositionHealthy);
  });

  it('refuses to liquidate on a stale price', async () => {
    fx.setPrices(140);
    fx.manualClock.advanceSeconds(3601);

    const error = await rejectionOf(fx.ledger.liquidate('liz', 1));
    expect(error.code).toBe(ErrorCode.StalePrice);
    expect(fx.ledger.getPosition(1).status).toBe('open');
  });

  it('follows an updated threshold and reward', async () => {
    await fx.ledger.updateLiquidationParams('admin', 190, 1000);
    fx.setPrices(180);

    const { record } = await fx.ledger.liquidate('liz', 1);
    expect(record.liquidatorReward).toBe(units(100));
    expect(record.treasuryShare).toBe(units(900));
  });

  it('pays the treasury configured at liquidation time', async () => {
    await fx.ledger.updateTreasury('admin', 'reserve');
    fx.setPrices(100);

    await fx.ledger.liquidate('liz', 1);
    expect(fx.tokens.balanceOf('WETH', 'reserve')).toBe(units(950));
  });
});
