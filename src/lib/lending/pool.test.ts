import { describe, expect, it } from 'vitest';

import { parReadings, reading, T0, variablePoolConfig } from '../../testutils';
import { MAX_UINT256 } from './constants';
import {
  AccessDeniedError,
  ArithmeticOverflowError,
  InsolvencyError,
  InvalidInputError,
  LiquidationNotEligibleError,
  OracleError,
} from './errors';
import {
  addCollateral,
  borrowAsset,
  borrowShares,
  collateralBalance,
  createPool,
  deposit,
  liquidate,
  mint,
  redeem,
  removeCollateral,
  repayAsset,
  updateExchangeRate,
  withdraw,
} from './pool';
import { createPoolState } from './state';
import { LENDING_EVENTS, type ActionContext, type OracleReadings, type PoolConfig, type PoolState } from './types';

const PAR = 10n ** 18n;

/** multiply / divide collateral units per asset unit, both feeds without decimals */
function priceReadings(multiply: bigint, divide: bigint, updatedAt: bigint = T0): OracleReadings {
  return { divide: reading(divide, updatedAt, 0), multiply: reading(multiply, updatedAt, 0) };
}

function ctx(oracle?: OracleReadings, now: bigint = T0): ActionContext {
  return oracle ? { now, oracle } : { now };
}

function fundedPool(config: PoolConfig = variablePoolConfig()): PoolState {
  return deposit(createPoolState('pool-1', config, T0), { amount: 10_000n, recipient: 'lender' }, ctx()).state;
}

function borrowedPool(config: PoolConfig = variablePoolConfig()): PoolState {
  return borrowAsset(
    fundedPool(config),
    { amount: 3000n, collateralAmount: 4000n, borrower: 'borrower' },
    ctx(parReadings(T0))
  ).state;
}

describe('createPool', () => {
  it('emits the creation event with the starting rate', () => {
    const { state, events } = createPool('pool-1', variablePoolConfig(), T0);

    expect(state.currentRateInfo.ratePerSecond).toBe(158_049_988n);
    expect(events).toEqual([
      {
        type: LENDING_EVENTS.POOL_CREATED,
        poolId: 'pool-1',
        timestamp: T0,
        user: null,
        data: { name: 'TEST/VAR', rateModel: 'variable', maxLTV: 75_000n, ratePerSecond: 158_049_988n },
      },
    ]);
  });
});

describe('lender actions', () => {
  it('issues shares one-to-one into an empty pool', () => {
    const empty = createPoolState('pool-1', variablePoolConfig(), T0);
    const { state, result, events } = deposit(empty, { amount: 1000n, recipient: 'alice' }, ctx());

    expect(result).toEqual({ amount: 1000n, shares: 1000n });
    expect(state.totalAsset).toEqual({ amount: 1000n, shares: 1000n });
    expect(state.positions.get('alice')?.assetShares).toBe(1000n);
    expect(events.map((event) => event.type)).toEqual([LENDING_EVENTS.DEPOSIT]);
    expect(empty.totalAsset).toEqual({ amount: 0n, shares: 0n });
  });

  it('rounds minted shares in favour of the pool', () => {
    const state = createPoolState('pool-1', variablePoolConfig(), T0);
    state.totalAsset = { amount: 1001n, shares: 1000n };

    expect(mint(state, { shares: 333n, recipient: 'alice' }, ctx()).result).toEqual({ amount: 334n, shares: 333n });
    expect(deposit(state, { amount: 334n, recipient: 'alice' }, ctx()).result).toEqual({ amount: 334n, shares: 333n });
  });

  it('rejects a deposit worth zero shares', () => {
    const state = createPoolState('pool-1', variablePoolConfig(), T0);
    state.totalAsset = { amount: 1000n, shares: 1n };

    expect(() => deposit(state, { amount: 999n, recipient: 'alice' }, ctx())).toThrow(InvalidInputError);
    expect(() => deposit(state, { amount: 0n, recipient: 'alice' }, ctx())).toThrow(InvalidInputError);
  });

  it('redeems and withdraws against the share price', () => {
    const pool = fundedPool();

    const redeemed = redeem(pool, { shares: 400n, owner: 'lender' }, ctx());
    expect(redeemed.result).toEqual({ amount: 400n, shares: 400n });
    expect(redeemed.state.totalAsset).toEqual({ amount: 9600n, shares: 9600n });

    const withdrawn = withdraw(pool, { amount: 400n, owner: 'lender' }, ctx());
    expect(withdrawn.result).toEqual({ amount: 400n, shares: 400n });
  });

  it('refuses to redeem more shares than held', () => {
    expect(() => redeem(fundedPool(), { shares: 10_001n, owner: 'lender' }, ctx())).toThrow(InvalidInputError);
    expect(() => redeem(fundedPool(), { shares: 1n, owner: 'stranger' }, ctx())).toThrow(InvalidInputError);
  });

  it('refuses to withdraw borrowed liquidity', () => {
    expect(() => withdraw(borrowedPool(), { amount: 7001n, owner: 'lender' }, ctx())).toThrow(InsolvencyError);
    expect(withdraw(borrowedPool(), { amount: 7000n, owner: 'lender' }, ctx()).state.totalAsset.amount).toBe(3000n);
  });

  it('enforces the lender allow-list', () => {
    const config = variablePoolConfig({ approvedLenders: new Set(['alice']) });
    const empty = createPoolState('pool-1', config, T0);

    expect(() => deposit(empty, { amount: 1000n, recipient: 'mallory' }, ctx())).toThrow(AccessDeniedError);
    expect(deposit(empty, { amount: 1000n, recipient: 'alice' }, ctx()).result.shares).toBe(1000n);
  });

  it('stops accepting deposits after maturity', () => {
    const config = variablePoolConfig({ maturity: T0 + 10n, penaltyRate: 200_000_000n });
    const empty = createPoolState('pool-1', config, T0);

    expect(() => deposit(empty, { amount: 1000n, recipient: 'alice' }, ctx(undefined, T0 + 11n))).toThrow(
      'Pool pool-1 is past maturity'
    );
  });
});

describe('borrowing', () => {
  it('borrows against exactly enough collateral', () => {
    const { state, result, events } = borrowAsset(
      fundedPool(),
      { amount: 3000n, collateralAmount: 4000n, borrower: 'borrower' },
      ctx(parReadings(T0))
    );

    expect(result).toEqual({ amount: 3000n, sharesAdded: 3000n, collateralBalance: 4000n });
    expect(state.totalBorrow).toEqual({ amount: 3000n, shares: 3000n });
    expect(state.totalCollateral).toBe(4000n);
    expect(state.exchangeRateInfo).toEqual({ lastTimestamp: T0, exchangeRate: PAR });
    expect(events.map((event) => event.type)).toEqual([
      LENDING_EVENTS.EXCHANGE_RATE_UPDATED,
      LENDING_EVENTS.COLLATERAL_ADDED,
      LENDING_EVENTS.BORROW,
    ]);
  });

  it('leaves state untouched when the borrow would be insolvent', () => {
    const pool = fundedPool();

    expect(() =>
      borrowAsset(pool, { amount: 3000n, collateralAmount: 3999n, borrower: 'borrower' }, ctx(parReadings(T0)))
    ).toThrow(InsolvencyError);
    expect(pool.totalBorrow).toEqual({ amount: 0n, shares: 0n });
    expect(pool.totalCollateral).toBe(0n);
    expect(pool.positions.has('borrower')).toBe(false);
    expect(pool.exchangeRateInfo.exchangeRate).toBe(0n);
  });

  it('needs oracle readings', () => {
    expect(() =>
      borrowAsset(fundedPool(), { amount: 1n, collateralAmount: 10n, borrower: 'borrower' }, ctx())
    ).toThrow(OracleError);
  });

  it('cannot lend more than the pool holds', () => {
    expect(() =>
      borrowAsset(
        fundedPool(),
        { amount: 10_001n, collateralAmount: 20_000n, borrower: 'borrower' },
        ctx(parReadings(T0))
      )
    ).toThrow(InsolvencyError);
  });

  it('enforces the borrower allow-list', () => {
    const pool = fundedPool(variablePoolConfig({ approvedBorrowers: new Set(['desk-a']) }));

    try {
      borrowAsset(pool, { amount: 1n, collateralAmount: 10n, borrower: 'mallory' }, ctx(parReadings(T0)));
    } catch (error) {
      expect(error).toBeInstanceOf(AccessDeniedError);
      expect(error instanceof AccessDeniedError && error.code).toBe('NOT_APPROVED');
      return;
    }
    throw new Error('expected an AccessDeniedError');
  });

  it('repays by shares', () => {
    const { state, result, events } = repayAsset(
      borrowedPool(),
      { shares: 1000n, borrower: 'borrower', payer: 'helper' },
      ctx()
    );

    expect(result).toEqual({ amountRepaid: 1000n, sharesRepaid: 1000n, remainingShares: 2000n });
    expect(state.totalBorrow).toEqual({ amount: 2000n, shares: 2000n });
    expect(events[0]?.data).toEqual({ amount: 1000n, shares: 1000n, payer: 'helper' });
  });

  it('refuses to repay more than owed', () => {
    expect(() => repayAsset(borrowedPool(), { shares: 3001n, borrower: 'borrower' }, ctx())).toThrow(
      InvalidInputError
    );
  });
});

describe('collateral', () => {
  it('adds and removes collateral without debt and without an oracle', () => {
    const empty = createPoolState('pool-1', variablePoolConfig(), T0);
    const added = addCollateral(empty, { amount: 500n, borrower: 'alice' }, ctx());
    expect(added.result).toEqual({ amount: 500n, collateralBalance: 500n });

    const removed = removeCollateral(added.state, { amount: 200n, borrower: 'alice' }, ctx());
    expect(removed.result).toEqual({ amount: 200n, collateralBalance: 300n });
    expect(removed.state.totalCollateral).toBe(300n);
  });

  it('keeps a borrower solvent when removing collateral', () => {
    expect(() =>
      removeCollateral(borrowedPool(), { amount: 1n, borrower: 'borrower' }, ctx(parReadings(T0)))
    ).toThrow(InsolvencyError);

    const topped = addCollateral(borrowedPool(), { amount: 1000n, borrower: 'borrower' }, ctx()).state;
    const removed = removeCollateral(topped, { amount: 1000n, borrower: 'borrower' }, ctx(parReadings(T0)));
    expect(removed.result.collateralBalance).toBe(4000n);
  });

  it('keeps collateral within the uint256 range', () => {
    const empty = createPoolState('pool-1', variablePoolConfig(), T0);
    expect(() => addCollateral(empty, { amount: MAX_UINT256 + 1n, borrower: 'b' }, ctx())).toThrow(
      ArithmeticOverflowError
    );

    const full = addCollateral(empty, { amount: MAX_UINT256, borrower: 'a' }, ctx()).state;
    expect(full.totalCollateral).toBe(MAX_UINT256);
    expect(() => addCollateral(full, { amount: 1n, borrower: 'b' }, ctx())).toThrow(ArithmeticOverflowError);
    expect(() =>
      borrowAsset(fundedPool(), { amount: 1n, collateralAmount: MAX_UINT256 + 1n, borrower: 'b' }, ctx(parReadings(T0)))
    ).toThrow(ArithmeticOverflowError);
  });

  it('refuses to remove more than deposited', () => {
    expect(() => removeCollateral(borrowedPool(), { amount: 4001n, borrower: 'borrower' }, ctx())).toThrow(
      InvalidInputError
    );
  });
});

describe('liquidation', () => {
  it('seizes collateral with the liquidation bonus', () => {
    const { state, result, events } = liquidate(
      borrowedPool(),
      { shares: 1000n, borrower: 'borrower', liquidator: 'keeper' },
      ctx(priceReadings(3n, 2n))
    );

    expect(result).toEqual({
      sharesLiquidated: 1000n,
      amountRepaid: 1000n,
      collateralSeized: 1650n,
      badDebtAmount: 0n,
      badDebtShares: 0n,
    });
    expect(borrowShares(state, 'borrower')).toBe(2000n);
    expect(collateralBalance(state, 'borrower')).toBe(2350n);
    expect(state.totalBorrow).toEqual({ amount: 2000n, shares: 2000n });
    expect(state.totalCollateral).toBe(2350n);
    expect(events.map((event) => event.type)).toEqual([
      LENDING_EVENTS.EXCHANGE_RATE_UPDATED,
      LENDING_EVENTS.LIQUIDATION,
    ]);
  });

  it('writes off the remaining debt when all collateral is taken', () => {
    const { state, result, events } = liquidate(
      borrowedPool(),
      { shares: 2000n, borrower: 'borrower', liquidator: 'keeper' },
      ctx(priceReadings(3n, 1n))
    );

    expect(result).toEqual({
      sharesLiquidated: 2000n,
      amountRepaid: 2000n,
      collateralSeized: 4000n,
      badDebtAmount: 1000n,
      badDebtShares: 1000n,
    });
    expect(state.totalBorrow).toEqual({ amount: 0n, shares: 0n });
    expect(state.totalAsset).toEqual({ amount: 9000n, shares: 10_000n });
    expect(state.totalCollateral).toBe(0n);
    expect(borrowShares(state, 'borrower')).toBe(0n);
    expect(events.map((event) => event.type)).toEqual([
      LENDING_EVENTS.EXCHANGE_RATE_UPDATED,
      LENDING_EVENTS.BAD_DEBT_WRITTEN_OFF,
      LENDING_EVENTS.LIQUIDATION,
    ]);
  });

  it('refuses to liquidate a solvent position before maturity', () => {
    expect(() =>
      liquidate(borrowedPool(), { shares: 1000n, borrower: 'borrower', liquidator: 'keeper' }, ctx(parReadings(T0)))
    ).toThrow(LiquidationNotEligibleError);
  });

  it('liquidates any borrower once the pool has matured', () => {
    const config = variablePoolConfig({ maturity: T0 + 100n, penaltyRate: 200_000_000n });
    const later = T0 + 101n;
    const { result } = liquidate(
      borrowedPool(config),
      { shares: 1000n, borrower: 'borrower', liquidator: 'keeper' },
      ctx(parReadings(later), later)
    );

    expect(result.collateralSeized).toBe(1100n);
    expect(result.badDebtAmount).toBe(0n);
  });

  it('refuses to liquidate more shares than owed', () => {
    expect(() =>
      liquidate(
        borrowedPool(),
        { shares: 3001n, borrower: 'borrower', liquidator: 'keeper' },
        ctx(priceReadings(3n, 1n))
      )
    ).toThrow(InvalidInputError);
  });
});

describe('updateExchangeRate', () => {
  it('stores the refreshed rate', () => {
    const { state, result } = updateExchangeRate(fundedPool(), ctx(priceReadings(3n, 2n)));

    expect(result).toBe(1_500_000_000_000_000_000n);
    expect(state.exchangeRateInfo).toEqual({ lastTimestamp: T0, exchangeRate: 1_500_000_000_000_000_000n });
  });
});
