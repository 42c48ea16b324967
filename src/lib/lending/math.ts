/**
 * Checked unsigned integer helpers over bigint.
 *
 * bigint never wraps, so "overflow" here means leaving the fixed-width range the
 * ledger is specified for.
 */

import { MAX_UINT128, MAX_UINT256 } from './constants';
import { ArithmeticOverflowError, InvalidInputError } from './errors';

export function assertUint128(value: bigint, label: string): bigint {
  if (value < 0n || value > MAX_UINT128) {
    throw new ArithmeticOverflowError(`${label} is outside the uint128 range: ${value}`);
  }
  return value;
}

export function assertUint256(value: bigint, label: string): bigint {
  if (value < 0n || value > MAX_UINT256) {
    throw new ArithmeticOverflowError(`${label} is outside the uint256 range: ${value}`);
  }
  return value;
}

export function checkedSub(a: bigint, b: bigint, label: string): bigint {
  if (b > a) {
    throw new ArithmeticOverflowError(`${label} underflow: ${a} - ${b}`);
  }
  return a - b;
}

/** Division rounding toward positive infinity for non-negative operands. */
export function divUp(numerator: bigint, denominator: bigint): bigint {
  if (numerator === 0n) {
    return 0n;
  }
  return (numerator - 1n) / denominator + 1n;
}

export function minBigInt(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

export function maxBigInt(a: bigint, b: bigint): bigint {
  return a > b ? a : b;
}

export function clamp(value: bigint, lower: bigint, upper: bigint): bigint {
  return minBigInt(maxBigInt(value, lower), upper);
}

export function requirePositive(value: bigint, label: string): bigint {
  if (value <= 0n) {
    throw new InvalidInputError(`${label} must be greater than zero`);
  }
  return value;
}
