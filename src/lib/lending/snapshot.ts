/**
 * Pool Accounting Snapshots
 *
 * Plain projections of settled state, taken before and after a sequence of actions
 * for reconciliation.
 */

import { getPosition } from './state';
import type { Identity, PoolState } from './types';

export interface PoolAccountingSnapshot {
  totalAssetAmount: bigint;
  totalAssetShares: bigint;
  totalBorrowAmount: bigint;
  totalBorrowShares: bigint;
  totalCollateral: bigint;
}

export interface UserSnapshot {
  assetShares: bigint;
  borrowShares: bigint;
  collateralBalance: bigint;
}

export type SnapshotDelta = PoolAccountingSnapshot;

export interface LedgerConsistencyReport {
  consistent: boolean;
  sumAssetShares: bigint;
  sumBorrowShares: bigint;
  sumCollateral: bigint;
}

export function takeSnapshot(state: PoolState): PoolAccountingSnapshot {
  return {
    totalAssetAmount: state.totalAsset.amount,
    totalAssetShares: state.totalAsset.shares,
    totalBorrowAmount: state.totalBorrow.amount,
    totalBorrowShares: state.totalBorrow.shares,
    totalCollateral: state.totalCollateral,
  };
}

export function takeUserSnapshot(state: PoolState, user: Identity): UserSnapshot {
  const { assetShares, borrowShares, collateralBalance } = getPosition(state, user);
  return { assetShares, borrowShares, collateralBalance };
}

/** Signed change from `before` to `after`. */
export function diffSnapshots(before: PoolAccountingSnapshot, after: PoolAccountingSnapshot): SnapshotDelta {
  return {
    totalAssetAmount: after.totalAssetAmount - before.totalAssetAmount,
    totalAssetShares: after.totalAssetShares - before.totalAssetShares,
    totalBorrowAmount: after.totalBorrowAmount - before.totalBorrowAmount,
    totalBorrowShares: after.totalBorrowShares - before.totalBorrowShares,
    totalCollateral: after.totalCollateral - before.totalCollateral,
  };
}

export function checkLedgerConsistency(state: PoolState): LedgerConsistencyReport {
  let sumAssetShares = 0n;
  let sumBorrowShares = 0n;
  let sumCollateral = 0n;

  for (const position of state.positions.values()) {
    sumAssetShares += position.assetShares;
    sumBorrowShares += position.borrowShares;
    sumCollateral += position.collateralBalance;
  }

  return {
    consistent:
      sumAssetShares === state.totalAsset.shares &&
      sumBorrowShares === state.totalBorrow.shares &&
      sumCollateral === state.totalCollateral,
    sumAssetShares,
    sumBorrowShares,
    sumCollateral,
  };
}
