import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ErrorCode } from '../src/errors/taxonomy.js';
import { eventBus, EventType } from '../src/infra/eventBus.js';
import { createFixture, Fixture, rejectionOf, units } from './helpers.js';

describe('PositionLedgerService', () => {
  let fx: Fixture;

  beforeEach(async () => {
    fx = await createFixture();
    await fx.fundCollateral('alice', units(1000));
  });

  afterEach(async () => {
    eventBus.clear();
    await fx.cleanup();
  });

  const openAlice = async (debt = 0n) => fx.ledger.openPosition('alice', {
    collateralAmount: units(1000),
    debtAmount: debt,
  });

  describe('openPosition', () => {
    it('locks collateral and assigns sequential ids', async () => {
      const position = await openAlice();

      expect(position.id).toBe(1);
      expect(position.owner).toBe('alice');
      expect(position.collateralAmount).toBe(units(1000));
      expect(position.debtAmount).toBe(0n);
      expect(position.status).toBe('open');
      expect(fx.tokens.balanceOf('WETH', 'alice')).toBe(0n);
      expect(fx.tokens.balanceOf('WETH', 'vault-main')).toBe(units(1000));
      expect(fx.ledger.balancesOf('alice')).toEqual({ collateral: units(1000), debt: 0n });

      await fx.fundCollateral('bob', units(10));
      const second = await fx.ledger.openPosition('bob', { collateralAmount: units(10), debtAmount: 0n });
      expect(second.id).toBe(2);
    });

    it('opens with debt in the same call and mints it to the owner', async () => {
      const position = await openAlice(units(60_000));

      expect(position.debtAmount).toBe(units(60_000));
      expect(fx.tokens.balanceOf('USDL', 'alice')).toBe(units(60_000));
      expect(fx.ledger.getDebtBalance('alice')).toBe(units(60_000));
    });

    it('rejects an opening loan above the LTV limit without moving collateral', async () => {
      const error = await rejectionOf(openAlice(units(100_001)));

      expect(error.code).toBe(ErrorCode.LoanExceedsLtvLimit);
      expect(fx.tokens.balanceOf('WETH', 'alice')).toBe(units(1000));
      expect(fx.ledger.listPositions()).toEqual([]);
    });

    it('rejects a foreign collateral asset', async () => {
      const error = await rejectionOf(fx.ledger.openPosition('alice', {
        collateralAsset: 'DOGE',
        collateralAmount: units(1),
        debtAmount: 0n,
      }));
      expect(error.code).toBe(ErrorCode.InvalidAsset);
    });

    it('rejects a zero collateral amount', async () => {
      const error = await rejectionOf(fx.ledger.openPosition('alice', { collateralAmount: 0n, debtAmount: 0n }));
      expect(error.code).toBe(ErrorCode.InvalidCollateralAmount);
    });

    it('requires the vault to be approved for the collateral', async () => {
      await fx.tokens.mint('admin', 'WETH', 'carol', units(5));
      const error = await rejectionOf(fx.ledger.openPosition('carol', { collateralAmount: units(5), debtAmount: 0n }));
      expect(error.code).toBe(ErrorCode.InsufficientAllowance);
    });
  });

  describe('borrow', () => {
    it('allows borrowing exactly up to the LTV limit and not a unit more', async () => {
      await openAlice();
      expect(await fx.ledger.getMaxBorrowable(1)).toBe(units(100_000));

      const tooMuch = await rejectionOf(fx.ledger.borrow('alice', 1, units(100_000) + 1n));
      expect(tooMuch.code).toBe(ErrorCode.LoanExceedsLtvLimit);
      expect(tooMuch.statusCode).toBe(422);

      const position = await fx.ledger.borrow('alice', 1, units(100_000));
      expect(position.debtAmount).toBe(units(100_000));
      expect(fx.tokens.balanceOf('USDL', 'alice')).toBe(units(100_000));
      expect(await fx.ledger.getMaxBorrowable(1)).toBe(0n);
      expect(await fx.ledger.getPositionHealth(1)).toBe(2n * 10n ** 18n);
    });

    it('reports max borrowable net of existing debt', async () => {
      await openAlice(units(30_000));
      expect(await fx.ledger.getMaxBorrowable(1)).toBe(units(70_000));
    });

    it('lets only the owner borrow, and delegates borrow for the owner', async () => {
      await openAlice();

      const stranger = await rejectionOf(fx.ledger.borrow('bob', 1, units(10)));
      expect(stranger.code).toBe(ErrorCode.NotPositionOwner);

      const strangerFor = await rejectionOf(fx.ledger.borrowFor('bob', 1, 'bob', units(10)));
      expect(strangerFor.code).toBe(ErrorCode.NotPositionOwner);

      await fx.ledger.borrowFor('leverage-builder', 1, 'alice', units(10));
      expect(fx.tokens.balanceOf('USDL', 'alice')).toBe(units(10));
      expect(fx.ledger.getPosition(1).debtAmount).toBe(units(10));
    });

    it('rejects borrowing against a stale price', async () => {
      await openAlice();
      fx.manualClock.advanceSeconds(3601);

      const error = await rejectionOf(fx.ledger.borrow('alice', 1, units(1)));
      expect(error.code).toBe(ErrorCode.StalePrice);
      expect(error.statusCode).toBe(424);
    });

    it('accepts a price exactly at the edge of the staleness window', async () => {
      await openAlice();
      fx.manualClock.advanceSeconds(3600);

      const position = await fx.ledger.borrow('alice', 1, units(1));
      expect(position.debtAmount).toBe(units(1));
    });

    it('rejects a non-positive price', async () => {
      await openAlice();
      fx.priceOracle.publish('WETH/USD', 0n, 18, fx.manualClock.now());

      const error = await rejectionOf(fx.ledger.borrow('alice', 1, units(1)));
      expect(error.code).toBe(ErrorCode.InvalidPrice);
    });

    it('rejects a zero amount', async () => {
      await openAlice();
      const error = await rejectionOf(fx.ledger.borrow('alice', 1, 0n));
      expect(error.code).toBe(ErrorCode.InvalidAmount);
    });

    it('rejects an unknown position', async () => {
      const error = await rejectionOf(fx.ledger.borrow('alice', 42, units(1)));
      expect(error.code).toBe(ErrorCode.PositionNotFound);
      expect(error.statusCode).toBe(404);
    });
  });

  describe('removeCollateral', () => {
    it('returns collateral while the position stays within the LTV limit', async () => {
      await openAlice(units(50_000));

      const position = await fx.ledger.removeCollateral('alice', 1, units(500));
      expect(position.collateralAmount).toBe(units(500));
      expect(fx.tokens.balanceOf('WETH', 'alice')).toBe(units(500));
      expect(fx.ledger.getCollateralBalance('alice')).toBe(units(500));
    });

    it('rejects a withdrawal that would breach the LTV limit', async () => {
      await openAlice(units(100_000));

      const error = await rejectionOf(fx.ledger.removeCollateral('alice', 1, 1n));
      expect(error.code).toBe(ErrorCode.InsufficientCollateralAfterWithdrawal);
      expect(fx.ledger.getPosition(1).collateralAmount).toBe(units(1000));
    });

    it('rejects a withdrawal larger than the position holds', async () => {
      await openAlice();
      const error = await rejectionOf(fx.ledger.removeCollateral('alice', 1, units(1001)));
      expect(error.code).toBe(ErrorCode.InsufficientCollateralAfterWithdrawal);
    });

    it('lets only the owner withdraw', async () => {
      await openAlice();
      const error = await rejectionOf(fx.ledger.removeCollateral('leverage-builder', 1, units(1)));
      expect(error.code).toBe(ErrorCode.NotPositionOwner);
    });
  });

  describe('addCollateral', () => {
    it('pulls collateral from the caller and credits the owner', async () => {
      await openAlice();
      await fx.fundCollateral('alice', units(250));

      const position = await fx.ledger.addCollateral('alice', 1, units(250));
      expect(position.collateralAmount).toBe(units(1250));
      expect(fx.ledger.getCollateralBalance('alice')).toBe(units(1250));
      expect(await fx.ledger.getMaxBorrowable(1)).toBe(units(125_000));
    });
  });

  describe('repay', () => {
    it('burns the repaid debt asset and reduces the debt', async () => {
      await openAlice(units(100_000));

      const position = await fx.ledger.repay('alice', 1, units(40_000));
      expect(position.debtAmount).toBe(units(60_000));
      expect(fx.tokens.balanceOf('USDL', 'alice')).toBe(units(60_000));
      expect(fx.store.snapshot().tokens.USDL?.totalSupply).toBe(units(60_000));
      expect(fx.ledger.getDebtBalance('alice')).toBe(units(60_000));
    });

    it('rejects repaying more than the debt', async () => {
      await openAlice(units(100));
      const error = await rejectionOf(fx.ledger.repay('alice', 1, units(101)));
      expect(error.code).toBe(ErrorCode.AmountExceedsLoan);
    });

    it('lets a third party repay with their own tokens', async () => {
      await openAlice(units(100));
      await fx.tokens.transfer('alice', 'USDL', 'bob', units(40));

      await fx.ledger.repay('bob', 1, units(40));
      expect(fx.ledger.getPosition(1).debtAmount).toBe(units(60));
      expect(fx.tokens.balanceOf('USDL', 'bob')).toBe(0n);
    });
  });

  describe('closePosition', () => {
    it('burns the full debt, returns the collateral and blocks further use', async () => {
      await openAlice(units(60_000));

      const closed = await fx.ledger.closePosition('alice', 1);
      expect(closed.status).toBe('closed');
      expect(closed.collateralAmount).toBe(0n);
      expect(closed.debtAmount).toBe(0n);
      expect(fx.tokens.balanceOf('WETH', 'alice')).toBe(units(1000));
      expect(fx.tokens.balanceOf('USDL', 'alice')).toBe(0n);
      expect(fx.ledger.balancesOf('alice')).toEqual({ collateral: 0n, debt: 0n });

      const afterClose = await rejectionOf(fx.ledger.borrow('alice', 1, units(1)));
      expect(afterClose.code).toBe(ErrorCode.PositionClosed);
    });

    it('cannot be closed by someone else', async () => {
      await openAlice();
      const error = await rejectionOf(fx.ledger.closePosition('bob', 1));
      expect(error.code).toBe(ErrorCode.NotPositionOwner);
    });

    it('fails when the owner cannot cover the debt', async () => {
      await openAlice(units(100));
      await fx.tokens.transfer('alice', 'USDL', 'bob', units(1));

      const error = await rejectionOf(fx.ledger.closePosition('alice', 1));
      expect(error.code).toBe(ErrorCode.InsufficientBalance);
      expect(fx.ledger.getPosition(1).status).toBe('open');
    });
  });

  describe('aggregates and reads', () => {
    it('keeps per-user aggregates equal to the sum of open positions', async () => {
      await openAlice(units(10_000));
      await fx.fundCollateral('alice', units(500));
      await fx.ledger.openPosition('alice', { collateralAmount: units(500), debtAmount: units(2_000) });
      await fx.ledger.repay('alice', 2, units(500));

      const positions = fx.ledger.listPositions('alice');
      const collateral = positions.reduce((sum, p) => sum + p.collateralAmount, 0n);
      const debt = positions.reduce((sum, p) => sum + p.debtAmount, 0n);

      expect(positions.map((p) => p.id)).toEqual([1, 2]);
      expect(fx.ledger.balancesOf('alice')).toEqual({ collateral, debt });
      expect(debt).toBe(units(11_500));
    });

    it('describes a position with its health and headroom', async () => {
      await openAlice(units(40_000));

      const view = await fx.ledger.describePosition(1);
      expect(view.health).toBe(5n * 10n ** 18n);
      expect(view.maxBorrowable).toBe(units(60_000));
      expect(view.pendingInterest).toBe(0n);
      expect(view.liquidatable).toBe(false);
    });

    it('reports unlimited health for a debt-free position', async () => {
      await openAlice();
      expect(await fx.ledger.getPositionHealth(1)).toBe(2n ** 256n - 1n);
    });
  });

  describe('atomicity and events', () => {
    it('leaves state untouched and counts the revert when a call fails', async () => {
      await openAlice(units(1_000));
      const before = fx.store.snapshot();

      await rejectionOf(fx.ledger.borrow('alice', 1, units(200_000)));

      const after = fx.store.snapshot();
      expect(after.vault).toEqual(before.vault);
      expect(after.tokens).toEqual(before.tokens);
      expect(after.metrics.transactionsReverted).toBe(before.metrics.transactionsReverted + 1);
    });

    it('publishes events only for committed calls', async () => {
      const received: EventType[] = [];
      eventBus.on('*', (event) => {
        if (event !== 'token.transfer') received.push(event);
      });

      await rejectionOf(openAlice(units(200_000)));
      expect(received).toEqual([]);

      await openAlice(units(10));
      expect(received).toEqual(['interest.activated', 'position.opened']);
    });

    it('writes committed events and rejections to the event log', async () => {
      await openAlice();
      await rejectionOf(fx.ledger.borrow('bob', 1, units(1)));

      const records = await fx.logger.tail(10);
      const events = records.map((r) => r.event);
      expect(events).toContain('position.opened');
      expect(records[records.length - 1]).toMatchObject({
        level: 'warn',
        event: 'borrow.rejected',
        data: { actor: 'bob', code: 'not_position_owner' },
      });
    });

    it('returns copies that do not alias the committed state', async () => {
      const position = await openAlice();
      position.collateralAmount = 0n;
      expect(fx.ledger.getPosition(1).collateralAmount).toBe(units(1000));
    });
  });

  describe('administration', () => {
    it('restricts settings to the vault admin and audits changes', async () => {
      const denied = await rejectionOf(fx.ledger.updateLtv('bob', 60));
      expect(denied.code).toBe(ErrorCode.MissingRole);

      await fx.ledger.updateLtv('admin', 60);
      expect(fx.ledger.getVaultConfig().ltvRatio).toBe(60);

      const audit = fx.store.snapshot().audit;
      expect(audit[audit.length - 1]).toMatchObject({
        actor: 'admin',
        setting: 'ltvRatio',
        oldValue: 50,
        newValue: 60,
      });
    });

    it('rejects an LTV that would make a fully borrowed position liquidatable', async () => {
      const error = await rejectionOf(fx.ledger.updateLtv('admin', 70));
      expect(error.code).toBe(ErrorCode.InvalidConfig);
      expect(fx.ledger.getVaultConfig().ltvRatio).toBe(50);
    });

    it('switches price feeds only for the vault assets', async () => {
      const error = await rejectionOf(fx.ledger.updatePriceFeed('admin', 'DOGE', 'DOGE/USD'));
      expect(error.code).toBe(ErrorCode.InvalidAsset);

      await fx.ledger.updatePriceFeed('admin', 'WETH', 'WETH/USD-alt');
      fx.priceOracle.publish('WETH/USD-alt', units(100), 18, fx.manualClock.now());
      await openAlice();
      expect(await fx.ledger.getMaxBorrowable(1)).toBe(units(50_000));
    });

    it('grants and revokes delegate rights', async () => {
      await openAlice();
      expect(await fx.ledger.grantRole('admin', 'position.delegate', 'keeper')).toBe(true);
      expect(await fx.ledger.grantRole('admin', 'position.delegate', 'keeper')).toBe(false);
      await fx.ledger.borrowFor('keeper', 1, 'alice', units(1));

      expect(await fx.ledger.revokeRole('admin', 'position.delegate', 'keeper')).toBe(true);
      const error = await rejectionOf(fx.ledger.borrowFor('keeper', 1, 'alice', units(1)));
      expect(error.code).toBe(ErrorCode.NotPositionOwner);
    });

    it('withdraws only collateral not owed to any position', async () => {
      await openAlice();
      await fx.fundCollateral('alice', units(5));
      await fx.tokens.transfer('alice', 'WETH', 'vault-main', units(5));

      const tooMuch = await rejectionOf(fx.ledger.emergencyWithdraw('admin', 'WETH', 'ops', units(6)));
      expect(tooMuch.code).toBe(ErrorCode.InsufficientBalance);

      await fx.ledger.emergencyWithdraw('admin', 'WETH', 'ops', units(5));
      expect(fx.tokens.balanceOf('WETH', 'ops')).toBe(units(5));
      expect(fx.tokens.balanceOf('WETH', 'vault-main')).toBe(units(1000));
    });
  });
});
