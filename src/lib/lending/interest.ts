/**
 * Interest Accrual
 *
 * Brings a pool's totals up to `now`:
 *
 *   utilization    = totalBorrow.amount * utilizationPrecision / totalAsset.amount
 *   ratePerSecond  = curve(utilization, previous rate, elapsed)   (penaltyRate after maturity)
 *   interestEarned = totalBorrow.amount * ratePerSecond * elapsed / RATE_PRECISION
 *
 * Interest is added to both totals; the protocol fee is taken by minting asset shares
 * to the fee recipient.
 */

import { FEE_PRECISION, MAX_UINT128, RATE_PRECISION } from './constants';
import { InvalidInputError } from './errors';
import { getNewRate, getUtilizationPrecision } from './rates';
import { sharesForAmount } from './shares';
import { isPastMaturity } from './solvency';
import { clonePoolState, ensurePosition, runPoolAction, type PoolDraft } from './state';
import { LENDING_EVENTS, type ActionOutcome, type AddInterestResult, type PoolState } from './types';

export function calculateUtilization(state: PoolState): bigint {
  if (state.totalAsset.amount === 0n) {
    return 0n;
  }
  const precision = getUtilizationPrecision(state.config.rateModel);
  return (state.totalBorrow.amount * precision) / state.totalAsset.amount;
}

function accrue(state: PoolState, now: bigint): AddInterestResult {
  const rateInfo = state.currentRateInfo;

  if (now < rateInfo.lastTimestamp) {
    throw new InvalidInputError(`Timestamp ${now} is before the last accrual at ${rateInfo.lastTimestamp}`);
  }

  const unchanged: AddInterestResult = {
    interestEarned: 0n,
    feesAmount: 0n,
    feesShare: 0n,
    newRate: rateInfo.ratePerSecond,
    utilization: calculateUtilization(state),
  };

  if (now === rateInfo.lastTimestamp) {
    return unchanged;
  }

  if (state.totalAsset.amount === 0n) {
    rateInfo.lastTimestamp = now;
    return unchanged;
  }

  const elapsedTime = now - rateInfo.lastTimestamp;
  const utilization = unchanged.utilization;

  const newRate = isPastMaturity(state, now)
    ? state.config.penaltyRate
    : getNewRate(state.config.rateModel, {
        utilization,
        currentRate: rateInfo.ratePerSecond,
        elapsedTime,
      });

  rateInfo.ratePerSecond = newRate;
  rateInfo.lastTimestamp = now;

  let interestEarned = (state.totalBorrow.amount * newRate * elapsedTime) / RATE_PRECISION;

  // Past the ledger width the interest is dropped for this update so the pool stays usable
  if (
    state.totalBorrow.amount + interestEarned > MAX_UINT128 ||
    state.totalAsset.amount + interestEarned > MAX_UINT128
  ) {
    interestEarned = 0n;
  }

  let feesAmount = 0n;
  let feesShare = 0n;

  if (interestEarned > 0n) {
    state.totalBorrow.amount += interestEarned;
    state.totalAsset.amount += interestEarned;

    if (rateInfo.feeToProtocolRate > 0n) {
      feesAmount = (interestEarned * rateInfo.feeToProtocolRate) / FEE_PRECISION;
      feesShare = sharesForAmount(state.totalAsset.amount, state.totalAsset.shares, feesAmount, false);

      if (feesShare > 0n && state.totalAsset.shares + feesShare <= MAX_UINT128) {
        state.totalAsset.shares += feesShare;
        ensurePosition(state, state.config.feeRecipient).assetShares += feesShare;
      } else {
        feesShare = 0n;
      }
    }
  }

  return { interestEarned, feesAmount, feesShare, newRate, utilization };
}

/** Accrue inside a running action and record the events. */
export function accrueInterest(draft: PoolDraft): AddInterestResult {
  const previousRate = draft.state.currentRateInfo.ratePerSecond;
  const previousTimestamp = draft.state.currentRateInfo.lastTimestamp;
  const result = accrue(draft.state, draft.context.now);

  if (previousTimestamp === draft.context.now) {
    return result;
  }

  if (result.newRate !== previousRate) {
    draft.emit(LENDING_EVENTS.RATE_UPDATED, null, {
      oldRate: previousRate,
      newRate: result.newRate,
      utilization: result.utilization,
    });
  }

  if (result.interestEarned > 0n) {
    draft.emit(LENDING_EVENTS.INTEREST_ADDED, null, {
      interestEarned: result.interestEarned,
      feesAmount: result.feesAmount,
      feesShare: result.feesShare,
      ratePerSecond: result.newRate,
    });
  }

  return result;
}

export function addInterest(state: PoolState, now: bigint): ActionOutcome<AddInterestResult> {
  return runPoolAction(state, { now }, accrueInterest);
}

/** What `addInterest` would report at `now`, without touching `state`. */
export function previewAddInterest(state: PoolState, now: bigint): AddInterestResult {
  return accrue(clonePoolState(state), now);
}
