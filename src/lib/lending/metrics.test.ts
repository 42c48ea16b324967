import { describe, expect, it } from 'vitest';

import { parReadings, T0, variablePoolConfig } from '../../testutils';
import {
  calculateBorrowApr,
  calculateHealthFactor,
  calculateSupplyApr,
  calculateSupplyApy,
  calculateUtilizationRate,
  getPoolMetrics,
  getPositionMetrics,
} from './metrics';
import { addCollateral, borrowAsset, deposit } from './pool';
import { createPoolState } from './state';

const PAR = 10n ** 18n;

const funded = deposit(
  createPoolState('pool-1', variablePoolConfig(), T0),
  { amount: 10_000n, recipient: 'lender' },
  { now: T0 }
).state;
const borrowed = borrowAsset(
  funded,
  { amount: 3000n, collateralAmount: 4000n, borrower: 'borrower' },
  { now: T0, oracle: parReadings(T0) }
).state;

describe('rate helpers', () => {
  it('computes utilization', () => {
    expect(calculateUtilizationRate(3000n, 10_000n)).toBe(0.3);
    expect(calculateUtilizationRate(0n, 0n)).toBe(0);
  });

  it('annualises the per-second rate', () => {
    expect(calculateBorrowApr(1_268_391_679n)).toBe(0.03999999);
  });

  it('nets the protocol fee out of the supply rate', () => {
    expect(calculateSupplyApr(0.1, 0.5, 10_000n)).toBe(0.045);
    expect(calculateSupplyApy(0)).toBe(0);
  });

  it('computes the health factor', () => {
    expect(calculateHealthFactor(0.5, 0.75)).toBe(1.5);
    expect(calculateHealthFactor(0, 0.75)).toBe(Infinity);
  });
});

describe('getPoolMetrics', () => {
  it('summarises the pool', () => {
    const metrics = getPoolMetrics(borrowed);

    expect(metrics.totalAssetAmount).toBe(10_000n);
    expect(metrics.totalBorrowAmount).toBe(3000n);
    expect(metrics.availableLiquidity).toBe(7000n);
    expect(metrics.utilizationRate).toBe(0.3);
    expect(metrics.borrowApr).toBe(0.00498426);
    expect(metrics.supplyApr).toBe(0.00149527);
    expect(metrics.assetPerShare).toBe(1);
    expect(metrics.lastUpdate).toBe(T0);
  });
});

describe('getPositionMetrics', () => {
  it('describes a borrower at the limit', () => {
    expect(getPositionMetrics(borrowed, 'borrower', PAR, T0)).toEqual({
      assetAmount: 0n,
      borrowAmount: 3000n,
      collateralBalance: 4000n,
      requiredCollateral: 4000n,
      currentLtv: 0.75,
      healthFactor: 1,
      liquidatable: false,
      maxBorrowableAmount: 0n,
      maxWithdrawableCollateral: 0n,
    });
  });

  it('reports headroom for an overcollateralised borrower', () => {
    const topped = addCollateral(borrowed, { amount: 1000n, borrower: 'borrower' }, { now: T0 }).state;
    const metrics = getPositionMetrics(topped, 'borrower', PAR, T0);

    expect(metrics.currentLtv).toBe(0.6);
    expect(metrics.healthFactor).toBe(1.25);
    expect(metrics.maxBorrowableAmount).toBe(750n);
    expect(metrics.maxWithdrawableCollateral).toBe(1000n);
  });

  it('describes a lender', () => {
    const metrics = getPositionMetrics(borrowed, 'lender', PAR, T0);

    expect(metrics.assetAmount).toBe(10_000n);
    expect(metrics.borrowAmount).toBe(0n);
    expect(metrics.currentLtv).toBe(0);
    expect(metrics.healthFactor).toBe(Infinity);
  });
});
