/**
 * Pool and Position Metrics
 *
 * Human-facing figures derived from settled pool state. Ledger values stay bigint;
 * ratios and annualised rates use decimal.js for precision.
 * Formulas:
 * - utilization = totalBorrow / totalAsset
 * - borrowApr = ratePerSecond * SECONDS_PER_YEAR / RATE_PRECISION
 * - supplyApr = borrowApr * utilization * (1 - protocolFee)
 * - healthFactor = maxLtv / currentLtv
 */

import Decimal from 'decimal.js';

import { EXCHANGE_PRECISION, FEE_PRECISION, LTV_PRECISION, RATE_PRECISION, SECONDS_PER_YEAR } from './constants';
import { maxBigInt } from './math';
import { toAmount } from './shares';
import { borrowAmountOf, isLiquidatable, requiredCollateral } from './solvency';
import { getPosition } from './state';
import type { Identity, PoolMetrics, PoolState, PositionMetrics } from './types';

Decimal.set({ precision: 40, rounding: Decimal.ROUND_DOWN });

function dec(value: bigint): Decimal {
  return new Decimal(value.toString());
}

/**
 * Calculate pool utilization rate (borrowed / supplied).
 */
export function calculateUtilizationRate(totalBorrowed: bigint, totalSupplied: bigint): number {
  if (totalSupplied <= 0n) {
    return 0;
  }

  return dec(totalBorrowed).div(dec(totalSupplied)).toDecimalPlaces(8, Decimal.ROUND_DOWN).toNumber();
}

/**
 * Annualise a per-second rate (simple, not compounded).
 */
export function calculateBorrowApr(ratePerSecond: bigint): number {
  return dec(ratePerSecond * SECONDS_PER_YEAR)
    .div(dec(RATE_PRECISION))
    .toDecimalPlaces(8, Decimal.ROUND_DOWN)
    .toNumber();
}

/**
 * Calculate supplier APR from borrow APR, utilization, and protocol fee (FEE_PRECISION scale).
 */
export function calculateSupplyApr(borrowApr: number, utilizationRate: number, feeToProtocolRate: bigint): number {
  const fee = dec(feeToProtocolRate).div(dec(FEE_PRECISION));
  const clampedFee = Decimal.max(0, Decimal.min(1, fee));

  return new Decimal(borrowApr)
    .mul(utilizationRate)
    .mul(new Decimal(1).sub(clampedFee))
    .toDecimalPlaces(8, Decimal.ROUND_DOWN)
    .toNumber();
}

/**
 * Convert supplier APR to APY using daily compounding.
 */
export function calculateSupplyApy(supplyApr: number): number {
  const apr = new Decimal(supplyApr);

  if (apr.lte(0)) {
    return 0;
  }

  const apy = new Decimal(1).add(apr.div(365)).pow(365).sub(1);
  return apy.toDecimalPlaces(8, Decimal.ROUND_DOWN).toNumber();
}

/**
 * healthFactor > 1 means the position can still borrow or withdraw
 */
export function calculateHealthFactor(currentLtv: number, maxLtv: number): number {
  if (currentLtv <= 0) {
    return Infinity;
  }

  return new Decimal(maxLtv).div(currentLtv).toDecimalPlaces(4, Decimal.ROUND_DOWN).toNumber();
}

export function getPoolMetrics(state: PoolState): PoolMetrics {
  const { totalAsset, totalBorrow, currentRateInfo } = state;

  const utilizationRate = calculateUtilizationRate(totalBorrow.amount, totalAsset.amount);
  const borrowApr = calculateBorrowApr(currentRateInfo.ratePerSecond);
  const supplyApr = calculateSupplyApr(borrowApr, utilizationRate, currentRateInfo.feeToProtocolRate);

  const assetPerShare =
    totalAsset.shares === 0n
      ? 1
      : dec(totalAsset.amount).div(dec(totalAsset.shares)).toDecimalPlaces(18, Decimal.ROUND_DOWN).toNumber();

  return {
    poolId: state.id,
    totalAssetAmount: totalAsset.amount,
    totalBorrowAmount: totalBorrow.amount,
    availableLiquidity: maxBigInt(0n, totalAsset.amount - totalBorrow.amount),
    utilizationRate,
    borrowApr,
    supplyApr,
    supplyApy: calculateSupplyApy(supplyApr),
    assetPerShare,
    lastUpdate: currentRateInfo.lastTimestamp,
  };
}

/**
 * Position metrics at `exchangeRate` (collateral per asset, EXCHANGE_PRECISION scale).
 */
export function getPositionMetrics(
  state: PoolState,
  user: Identity,
  exchangeRate: bigint,
  now: bigint
): PositionMetrics {
  const position = getPosition(state, user);
  const { maxLTV } = state.config;

  const assetAmount = toAmount(state.totalAsset, position.assetShares, false);
  const borrowAmount = borrowAmountOf(state, user);
  const required = requiredCollateral(borrowAmount, exchangeRate, maxLTV);

  const debtInCollateral = dec(borrowAmount * exchangeRate).div(dec(EXCHANGE_PRECISION));
  const currentLtv =
    borrowAmount === 0n
      ? 0
      : position.collateralBalance === 0n
        ? Infinity
        : debtInCollateral.div(dec(position.collateralBalance)).toDecimalPlaces(6, Decimal.ROUND_UP).toNumber();
  const maxLtv = dec(maxLTV).div(dec(LTV_PRECISION)).toNumber();

  const borrowCapacity = (position.collateralBalance * maxLTV * EXCHANGE_PRECISION) / (LTV_PRECISION * exchangeRate);

  return {
    assetAmount,
    borrowAmount,
    collateralBalance: position.collateralBalance,
    requiredCollateral: required,
    currentLtv,
    healthFactor: calculateHealthFactor(currentLtv, maxLtv),
    liquidatable: isLiquidatable(state, user, exchangeRate, now),
    maxBorrowableAmount: maxBigInt(0n, borrowCapacity - borrowAmount),
    maxWithdrawableCollateral: maxBigInt(0n, position.collateralBalance - required),
  };
}
