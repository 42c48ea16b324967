/**
 * Pool Actions
 *
 * Every mutating entry point runs through `runPoolAction`: interest is accrued to
 * `context.now` first, then the ledger is changed on a draft, then borrow-side
 * actions re-check solvency. Any thrown error leaves the caller's state untouched.
 */

import { assertApprovedBorrower, assertApprovedLender } from './access';
import { EXCHANGE_PRECISION, LIQ_PRECISION } from './constants';
import { InsolvencyError, InvalidInputError, LiquidationNotEligibleError, OracleError } from './errors';
import { accrueInterest } from './interest';
import { assertUint256, checkedSub, requirePositive } from './math';
import { computeExchangeRate } from './oracle';
import { toAmount, toShares } from './shares';
import { isPastMaturity, isSolvent } from './solvency';
import { createPoolState, ensurePosition, getPosition, runPoolAction, type PoolDraft } from './state';
import {
  LENDING_EVENTS,
  type ActionContext,
  type ActionOutcome,
  type BorrowResult,
  type CollateralResult,
  type CurrentRateInfo,
  type DepositResult,
  type ExchangeRateInfo,
  type Identity,
  type Ledger,
  type LiquidationResult,
  type PoolConfig,
  type PoolState,
  type RepayResult,
  type WithdrawResult,
} from './types';

export interface DepositParams {
  amount: bigint;
  recipient: Identity;
}

export interface MintParams {
  shares: bigint;
  recipient: Identity;
}

export interface RedeemParams {
  shares: bigint;
  owner: Identity;
}

export interface WithdrawParams {
  amount: bigint;
  owner: Identity;
}

export interface BorrowParams {
  amount: bigint;
  collateralAmount: bigint;
  borrower: Identity;
}

export interface RepayParams {
  shares: bigint;
  borrower: Identity;
  payer?: Identity;
}

export interface CollateralParams {
  amount: bigint;
  borrower: Identity;
}

export interface LiquidateParams {
  shares: bigint;
  borrower: Identity;
  liquidator: Identity;
}

// ============================================================
// Internal steps
// ============================================================

function assertNotPastMaturity(draft: PoolDraft): void {
  if (isPastMaturity(draft.state, draft.context.now)) {
    throw new InvalidInputError(`Pool ${draft.state.id} is past maturity`);
  }
}

function refreshRate(draft: PoolDraft): bigint {
  const readings = draft.context.oracle;
  if (!readings) {
    throw new OracleError('No oracle readings supplied for an action that needs the exchange rate');
  }

  const { state, context } = draft;
  const exchangeRate = computeExchangeRate(readings, state.config.oracle, context.now);
  const previous = state.exchangeRateInfo.exchangeRate;

  state.exchangeRateInfo = { lastTimestamp: context.now, exchangeRate };
  if (previous !== exchangeRate) {
    draft.emit(LENDING_EVENTS.EXCHANGE_RATE_UPDATED, null, { oldRate: previous, newRate: exchangeRate });
  }

  return exchangeRate;
}

function availableLiquidity(state: PoolState): bigint {
  return state.totalAsset.amount - state.totalBorrow.amount;
}

function applyDeposit(draft: PoolDraft, amount: bigint, shares: bigint, recipient: Identity): DepositResult {
  if (shares === 0n) {
    throw new InvalidInputError(`Deposit of ${amount} would issue zero shares`);
  }

  const { state } = draft;
  state.totalAsset.amount += amount;
  state.totalAsset.shares += shares;
  ensurePosition(state, recipient).assetShares += shares;

  draft.emit(LENDING_EVENTS.DEPOSIT, recipient, { amount, shares });
  return { amount, shares };
}

function applyRedeem(draft: PoolDraft, amount: bigint, shares: bigint, owner: Identity): WithdrawResult {
  const { state } = draft;
  const position = ensurePosition(state, owner);

  if (shares > position.assetShares) {
    throw new InvalidInputError(`${owner} holds ${position.assetShares} shares, cannot redeem ${shares}`);
  }
  if (availableLiquidity(state) < amount) {
    throw new InsolvencyError(`Pool has ${availableLiquidity(state)} available, cannot pay out ${amount}`);
  }

  position.assetShares -= shares;
  state.totalAsset.amount = checkedSub(state.totalAsset.amount, amount, 'totalAsset.amount');
  state.totalAsset.shares = checkedSub(state.totalAsset.shares, shares, 'totalAsset.shares');

  draft.emit(LENDING_EVENTS.WITHDRAW, owner, { amount, shares });
  return { amount, shares };
}

function applyAddCollateral(draft: PoolDraft, amount: bigint, borrower: Identity): bigint {
  const { state } = draft;
  assertUint256(amount, 'Collateral amount');
  const position = ensurePosition(state, borrower);

  position.collateralBalance += amount;
  state.totalCollateral += amount;

  draft.emit(LENDING_EVENTS.COLLATERAL_ADDED, borrower, { amount });
  return position.collateralBalance;
}

function applyRemoveCollateral(draft: PoolDraft, amount: bigint, borrower: Identity): bigint {
  const { state } = draft;
  const position = ensurePosition(state, borrower);

  if (amount > position.collateralBalance) {
    throw new InvalidInputError(
      `${borrower} has ${position.collateralBalance} collateral, cannot remove ${amount}`
    );
  }

  position.collateralBalance -= amount;
  state.totalCollateral = checkedSub(state.totalCollateral, amount, 'totalCollateral');

  draft.emit(LENDING_EVENTS.COLLATERAL_REMOVED, borrower, { amount });
  return position.collateralBalance;
}

function applyRepay(draft: PoolDraft, shares: bigint, borrower: Identity): bigint {
  const { state } = draft;
  const position = ensurePosition(state, borrower);

  if (shares > position.borrowShares) {
    throw new InvalidInputError(`${borrower} owes ${position.borrowShares} shares, cannot repay ${shares}`);
  }

  const amount = toAmount(state.totalBorrow, shares, true);
  position.borrowShares -= shares;
  state.totalBorrow.amount = checkedSub(state.totalBorrow.amount, amount, 'totalBorrow.amount');
  state.totalBorrow.shares = checkedSub(state.totalBorrow.shares, shares, 'totalBorrow.shares');

  return amount;
}

// ============================================================
// Lifecycle
// ============================================================

export function createPool(id: string, config: PoolConfig, now: bigint): ActionOutcome<null> {
  const state = createPoolState(id, config, now);
  return {
    state,
    result: null,
    events: [
      {
        type: LENDING_EVENTS.POOL_CREATED,
        poolId: id,
        timestamp: now,
        user: null,
        data: {
          name: config.name,
          rateModel: config.rateModel.kind,
          maxLTV: config.maxLTV,
          ratePerSecond: state.currentRateInfo.ratePerSecond,
        },
      },
    ],
  };
}

export function updateExchangeRate(state: PoolState, context: ActionContext): ActionOutcome<bigint> {
  return runPoolAction(state, context, refreshRate);
}

// ============================================================
// Lender side
// ============================================================

export function deposit(state: PoolState, params: DepositParams, context: ActionContext): ActionOutcome<DepositResult> {
  return runPoolAction(state, context, (draft) => {
    assertApprovedLender(draft.state.config, params.recipient);
    assertNotPastMaturity(draft);
    requirePositive(params.amount, 'Deposit amount');
    accrueInterest(draft);

    const shares = toShares(draft.state.totalAsset, params.amount, false);
    return applyDeposit(draft, params.amount, shares, params.recipient);
  });
}

export function mint(state: PoolState, params: MintParams, context: ActionContext): ActionOutcome<DepositResult> {
  return runPoolAction(state, context, (draft) => {
    assertApprovedLender(draft.state.config, params.recipient);
    assertNotPastMaturity(draft);
    requirePositive(params.shares, 'Mint shares');
    accrueInterest(draft);

    const amount = toAmount(draft.state.totalAsset, params.shares, true);
    return applyDeposit(draft, amount, params.shares, params.recipient);
  });
}

export function redeem(state: PoolState, params: RedeemParams, context: ActionContext): ActionOutcome<WithdrawResult> {
  return runPoolAction(state, context, (draft) => {
    requirePositive(params.shares, 'Redeem shares');
    accrueInterest(draft);

    const amount = toAmount(draft.state.totalAsset, params.shares, false);
    return applyRedeem(draft, amount, params.shares, params.owner);
  });
}

export function withdraw(
  state: PoolState,
  params: WithdrawParams,
  context: ActionContext
): ActionOutcome<WithdrawResult> {
  return runPoolAction(state, context, (draft) => {
    requirePositive(params.amount, 'Withdraw amount');
    accrueInterest(draft);

    const shares = toShares(draft.state.totalAsset, params.amount, true);
    return applyRedeem(draft, params.amount, shares, params.owner);
  });
}

// ============================================================
// Borrower side
// ============================================================

export function borrowAsset(state: PoolState, params: BorrowParams, context: ActionContext): ActionOutcome<BorrowResult> {
  return runPoolAction(state, context, (draft) => {
    const { amount, collateralAmount, borrower } = params;
    assertApprovedBorrower(draft.state.config, borrower);
    assertNotPastMaturity(draft);
    requirePositive(amount, 'Borrow amount');
    if (collateralAmount < 0n) {
      throw new InvalidInputError('Collateral amount cannot be negative');
    }

    accrueInterest(draft);
    const exchangeRate = refreshRate(draft);

    if (collateralAmount > 0n) {
      applyAddCollateral(draft, collateralAmount, borrower);
    }

    const { state } = draft;
    if (availableLiquidity(state) < amount) {
      throw new InsolvencyError(`Pool has ${availableLiquidity(state)} available, cannot lend ${amount}`);
    }

    const sharesAdded = toShares(state.totalBorrow, amount, true);
    state.totalBorrow.amount += amount;
    state.totalBorrow.shares += sharesAdded;
    const position = ensurePosition(state, borrower);
    position.borrowShares += sharesAdded;

    if (!isSolvent(state, borrower, exchangeRate)) {
      throw new InsolvencyError(`Borrow of ${amount} would leave ${borrower} below the maximum LTV`);
    }

    draft.emit(LENDING_EVENTS.BORROW, borrower, { amount, shares: sharesAdded });
    return { amount, sharesAdded, collateralBalance: position.collateralBalance };
  });
}

export function repayAsset(state: PoolState, params: RepayParams, context: ActionContext): ActionOutcome<RepayResult> {
  return runPoolAction(state, context, (draft) => {
    requirePositive(params.shares, 'Repay shares');
    accrueInterest(draft);

    const amountRepaid = applyRepay(draft, params.shares, params.borrower);
    const remainingShares = getPosition(draft.state, params.borrower).borrowShares;

    draft.emit(LENDING_EVENTS.REPAY, params.borrower, {
      amount: amountRepaid,
      shares: params.shares,
      payer: params.payer ?? params.borrower,
    });
    return { amountRepaid, sharesRepaid: params.shares, remainingShares };
  });
}

export function addCollateral(
  state: PoolState,
  params: CollateralParams,
  context: ActionContext
): ActionOutcome<CollateralResult> {
  return runPoolAction(state, context, (draft) => {
    requirePositive(params.amount, 'Collateral amount');
    accrueInterest(draft);

    const collateralBalance = applyAddCollateral(draft, params.amount, params.borrower);
    return { amount: params.amount, collateralBalance };
  });
}

export function removeCollateral(
  state: PoolState,
  params: CollateralParams,
  context: ActionContext
): ActionOutcome<CollateralResult> {
  return runPoolAction(state, context, (draft) => {
    requirePositive(params.amount, 'Collateral amount');
    accrueInterest(draft);

    const collateralBalance = applyRemoveCollateral(draft, params.amount, params.borrower);

    if (getPosition(draft.state, params.borrower).borrowShares > 0n) {
      const exchangeRate = refreshRate(draft);
      if (!isSolvent(draft.state, params.borrower, exchangeRate)) {
        throw new InsolvencyError(
          `Removing ${params.amount} collateral would leave ${params.borrower} below the maximum LTV`
        );
      }
    }

    return { amount: params.amount, collateralBalance };
  });
}

// ============================================================
// Liquidation
// ============================================================

/**
 * Repay `shares` of an insolvent (or matured) borrower's debt in exchange for their
 * collateral at a `liquidationFee` bonus. When the seizure takes all collateral and
 * debt remains, the remainder is written off against both totals.
 */
export function liquidate(
  state: PoolState,
  params: LiquidateParams,
  context: ActionContext
): ActionOutcome<LiquidationResult> {
  return runPoolAction(state, context, (draft) => {
    const { shares, borrower, liquidator } = params;
    requirePositive(shares, 'Liquidation shares');

    accrueInterest(draft);
    const exchangeRate = refreshRate(draft);
    const { state: pool } = draft;
    const position = ensurePosition(pool, borrower);

    if (shares > position.borrowShares) {
      throw new InvalidInputError(`${borrower} owes ${position.borrowShares} shares, cannot liquidate ${shares}`);
    }
    if (isSolvent(pool, borrower, exchangeRate) && !isPastMaturity(pool, draft.context.now)) {
      throw new LiquidationNotEligibleError(borrower);
    }

    const liquidationAmountInCollateral =
      (toAmount(pool.totalBorrow, shares, false) * exchangeRate) / EXCHANGE_PRECISION;
    const optimisticCollateral =
      (liquidationAmountInCollateral * (LIQ_PRECISION + pool.config.liquidationFee)) / LIQ_PRECISION;
    const seizesEverything = optimisticCollateral >= position.collateralBalance;
    const collateralSeized = seizesEverything ? position.collateralBalance : optimisticCollateral;

    let badDebtAmount = 0n;
    let badDebtShares = 0n;

    if (seizesEverything && position.borrowShares > shares) {
      badDebtShares = position.borrowShares - shares;
      badDebtAmount = toAmount(pool.totalBorrow, badDebtShares, false);

      position.borrowShares -= badDebtShares;
      pool.totalBorrow.amount = checkedSub(pool.totalBorrow.amount, badDebtAmount, 'totalBorrow.amount');
      pool.totalBorrow.shares = checkedSub(pool.totalBorrow.shares, badDebtShares, 'totalBorrow.shares');
      pool.totalAsset.amount = checkedSub(pool.totalAsset.amount, badDebtAmount, 'totalAsset.amount');

      draft.emit(LENDING_EVENTS.BAD_DEBT_WRITTEN_OFF, borrower, {
        amount: badDebtAmount,
        shares: badDebtShares,
      });
    }

    const amountRepaid = applyRepay(draft, shares, borrower);

    position.collateralBalance -= collateralSeized;
    pool.totalCollateral = checkedSub(pool.totalCollateral, collateralSeized, 'totalCollateral');

    draft.emit(LENDING_EVENTS.LIQUIDATION, borrower, {
      liquidator,
      shares,
      amountRepaid,
      collateralSeized,
    });

    return { sharesLiquidated: shares, amountRepaid, collateralSeized, badDebtAmount, badDebtShares };
  });
}

// ============================================================
// Queries
// ============================================================

export function totalAsset(state: PoolState): Ledger {
  return { ...state.totalAsset };
}

export function totalBorrow(state: PoolState): Ledger {
  return { ...state.totalBorrow };
}

export function currentRateInfo(state: PoolState): CurrentRateInfo {
  return { ...state.currentRateInfo };
}

export function exchangeRateInfo(state: PoolState): ExchangeRateInfo {
  return { ...state.exchangeRateInfo };
}

export function assetShares(state: PoolState, user: Identity): bigint {
  return getPosition(state, user).assetShares;
}

export function borrowShares(state: PoolState, user: Identity): bigint {
  return getPosition(state, user).borrowShares;
}

export function collateralBalance(state: PoolState, user: Identity): bigint {
  return getPosition(state, user).collateralBalance;
}

export function toAssetAmount(state: PoolState, shares: bigint, roundUp: boolean): bigint {
  return toAmount(state.totalAsset, shares, roundUp);
}

export function toAssetShares(state: PoolState, amount: bigint, roundUp: boolean): bigint {
  return toShares(state.totalAsset, amount, roundUp);
}

export function toBorrowAmount(state: PoolState, shares: bigint, roundUp: boolean): bigint {
  return toAmount(state.totalBorrow, shares, roundUp);
}

export function toBorrowShares(state: PoolState, amount: bigint, roundUp: boolean): bigint {
  return toShares(state.totalBorrow, amount, roundUp);
}
