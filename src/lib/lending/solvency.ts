/**
 * Collateral Solvency
 *
 * Required collateral is rounded up and debt is valued with its shares rounded up,
 * so rounding can only make a position look less solvent than it is.
 */

import { EXCHANGE_PRECISION, LTV_PRECISION } from './constants';
import { ConfigurationError, OracleError } from './errors';
import { divUp } from './math';
import { getPosition } from './state';
import { toAmount } from './shares';
import type { Identity, PoolState } from './types';

/**
 * Collateral needed to back `borrowAmount` at `targetLTV`.
 *
 * @param exchangeRate - collateral units per asset unit, EXCHANGE_PRECISION scale
 * @param targetLTV - LTV_PRECISION scale
 */
export function requiredCollateral(borrowAmount: bigint, exchangeRate: bigint, targetLTV: bigint): bigint {
  if (exchangeRate === 0n) {
    throw new OracleError('Exchange rate is zero');
  }
  if (targetLTV === 0n) {
    throw new ConfigurationError('Target LTV must be greater than zero');
  }

  return divUp(borrowAmount * exchangeRate * LTV_PRECISION, targetLTV * EXCHANGE_PRECISION);
}

export function borrowAmountOf(state: PoolState, user: Identity): bigint {
  return toAmount(state.totalBorrow, getPosition(state, user).borrowShares, true);
}

export function isSolvent(state: PoolState, user: Identity, exchangeRate: bigint): boolean {
  const position = getPosition(state, user);
  if (position.borrowShares === 0n) {
    return true;
  }

  const required = requiredCollateral(borrowAmountOf(state, user), exchangeRate, state.config.maxLTV);
  return position.collateralBalance >= required;
}

/**
 * Current LTV in LTV_PRECISION units. Positions with debt and no collateral report
 * `null` (unbounded).
 */
export function currentLtv(state: PoolState, user: Identity, exchangeRate: bigint): bigint | null {
  const position = getPosition(state, user);
  const borrowAmount = borrowAmountOf(state, user);

  if (borrowAmount === 0n) {
    return 0n;
  }
  if (position.collateralBalance === 0n) {
    return null;
  }

  return (((borrowAmount * exchangeRate) / EXCHANGE_PRECISION) * LTV_PRECISION) / position.collateralBalance;
}

export function isPastMaturity(state: PoolState, now: bigint): boolean {
  return state.config.maturity !== 0n && now > state.config.maturity;
}

export function isLiquidatable(state: PoolState, user: Identity, exchangeRate: bigint, now: bigint): boolean {
  if (getPosition(state, user).borrowShares === 0n) {
    return false;
  }
  return !isSolvent(state, user, exchangeRate) || isPastMaturity(state, now);
}
