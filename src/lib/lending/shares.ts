/**
 * Share Ledger Conversions
 *
 * Converts between an amount and the shares representing it, given the pool totals
 * on one side (asset or borrow). Both sides use the same formula; the caller picks
 * the rounding direction per call site:
 *
 * - deposit: shares down     - mint: amount up
 * - redeem: amount down      - withdraw: shares up
 * - borrow: shares up        - repay: amount up
 */

import { assertUint128 } from './math';
import type { Ledger } from './types';

function convert(input: bigint, dividendTotal: bigint, divisorTotal: bigint, roundUp: boolean): bigint {
  if (divisorTotal === 0n) {
    return input;
  }

  const result = (input * dividendTotal) / divisorTotal;

  // Nothing on the other side to reconstruct against: the exact result is zero
  if (dividendTotal === 0n) {
    return result;
  }

  if (roundUp && (result * divisorTotal) / dividendTotal < input) {
    return result + 1n;
  }

  return result;
}

/**
 * Amount represented by `shares`.
 * Returns `shares` unchanged while `totalShares` is zero.
 */
export function amountForShares(
  totalAmount: bigint,
  totalShares: bigint,
  shares: bigint,
  roundUp: boolean
): bigint {
  assertUint128(totalAmount, 'totalAmount');
  assertUint128(totalShares, 'totalShares');
  assertUint128(shares, 'shares');

  return convert(shares, totalAmount, totalShares, roundUp);
}

/**
 * Shares representing `amount`.
 * Returns `amount` unchanged while `totalAmount` is zero.
 */
export function sharesForAmount(
  totalAmount: bigint,
  totalShares: bigint,
  amount: bigint,
  roundUp: boolean
): bigint {
  assertUint128(totalAmount, 'totalAmount');
  assertUint128(totalShares, 'totalShares');
  assertUint128(amount, 'amount');

  return convert(amount, totalShares, totalAmount, roundUp);
}

export function toAmount(ledger: Ledger, shares: bigint, roundUp: boolean): bigint {
  return amountForShares(ledger.amount, ledger.shares, shares, roundUp);
}

export function toShares(ledger: Ledger, amount: bigint, roundUp: boolean): bigint {
  return sharesForAmount(ledger.amount, ledger.shares, amount, roundUp);
}
