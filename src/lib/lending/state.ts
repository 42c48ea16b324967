/**
 * Pool State Management
 *
 * Creation, validation and copying of the pool aggregate, plus the draft/commit
 * runner every mutating action goes through: actions mutate a copy, and the copy
 * only replaces the caller's state when the whole action succeeded.
 */

import { FEE_PRECISION, LIQ_PRECISION, LTV_PRECISION } from './constants';
import { ConfigurationError } from './errors';
import { assertUint128, assertUint256 } from './math';
import { getInitialRate, getRateBounds, validateRateModel } from './rates';
import type {
  ActionContext,
  ActionOutcome,
  Identity,
  LendingEventType,
  PoolConfig,
  PoolEvent,
  PoolState,
  UserPosition,
} from './types';

const EMPTY_POSITION: Readonly<UserPosition> = Object.freeze({
  assetShares: 0n,
  borrowShares: 0n,
  collateralBalance: 0n,
});

export function validatePoolConfig(config: PoolConfig): void {
  if (config.name.trim().length === 0) {
    throw new ConfigurationError('Pool name is required');
  }
  if (config.maxLTV <= 0n || config.maxLTV > LTV_PRECISION) {
    throw new ConfigurationError(`maxLTV must be in (0, ${LTV_PRECISION}] (got ${config.maxLTV})`);
  }
  if (config.liquidationFee < 0n || config.liquidationFee > LIQ_PRECISION) {
    throw new ConfigurationError(`liquidationFee must be in [0, ${LIQ_PRECISION}] (got ${config.liquidationFee})`);
  }
  if (config.feeToProtocolRate < 0n || config.feeToProtocolRate > FEE_PRECISION) {
    throw new ConfigurationError(
      `feeToProtocolRate must be in [0, ${FEE_PRECISION}] (got ${config.feeToProtocolRate})`
    );
  }
  if (config.feeToProtocolRate > 0n && config.feeRecipient.length === 0) {
    throw new ConfigurationError('feeRecipient is required when a protocol fee is charged');
  }
  if (config.maturity < 0n) {
    throw new ConfigurationError('maturity must be a unix timestamp or 0');
  }
  if (!Number.isInteger(config.oracle.normalizationExponent)) {
    throw new ConfigurationError('oracle.normalizationExponent must be an integer');
  }
  if (config.oracle.maxDelay <= 0n) {
    throw new ConfigurationError('oracle.maxDelay must be positive');
  }

  validateRateModel(config.rateModel);

  if (config.maturity !== 0n) {
    const { minInterest, maxInterest } = getRateBounds(config.rateModel);
    if (config.penaltyRate < minInterest || config.penaltyRate > maxInterest) {
      throw new ConfigurationError(
        `penaltyRate must lie within the rate model bounds [${minInterest}, ${maxInterest}] (got ${config.penaltyRate})`
      );
    }
  }
}

export function createPoolState(id: string, config: PoolConfig, now: bigint): PoolState {
  validatePoolConfig(config);

  return {
    id,
    config,
    totalAsset: { amount: 0n, shares: 0n },
    totalBorrow: { amount: 0n, shares: 0n },
    totalCollateral: 0n,
    currentRateInfo: {
      lastTimestamp: now,
      feeToProtocolRate: config.feeToProtocolRate,
      ratePerSecond: getInitialRate(config.rateModel),
    },
    exchangeRateInfo: {
      lastTimestamp: 0n,
      exchangeRate: 0n,
    },
    positions: new Map(),
  };
}

export function clonePoolState(state: PoolState): PoolState {
  const positions = new Map<Identity, UserPosition>();
  for (const [user, position] of state.positions) {
    positions.set(user, { ...position });
  }

  return {
    id: state.id,
    config: state.config,
    totalAsset: { ...state.totalAsset },
    totalBorrow: { ...state.totalBorrow },
    totalCollateral: state.totalCollateral,
    currentRateInfo: { ...state.currentRateInfo },
    exchangeRateInfo: { ...state.exchangeRateInfo },
    positions,
  };
}

/** Read-only view of a position; absent users read as all zeros. */
export function getPosition(state: PoolState, user: Identity): Readonly<UserPosition> {
  return state.positions.get(user) ?? EMPTY_POSITION;
}

/** Mutable position on a draft, created on first touch. */
export function ensurePosition(state: PoolState, user: Identity): UserPosition {
  let position = state.positions.get(user);
  if (!position) {
    position = { assetShares: 0n, borrowShares: 0n, collateralBalance: 0n };
    state.positions.set(user, position);
  }
  return position;
}

export function assertLedgerRange(state: PoolState): void {
  assertUint128(state.totalAsset.amount, 'totalAsset.amount');
  assertUint128(state.totalAsset.shares, 'totalAsset.shares');
  assertUint128(state.totalBorrow.amount, 'totalBorrow.amount');
  assertUint128(state.totalBorrow.shares, 'totalBorrow.shares');
  assertUint256(state.totalCollateral, 'totalCollateral');
}

/** Working copy handed to an action while it runs. */
export interface PoolDraft {
  state: PoolState;
  context: ActionContext;
  events: PoolEvent[];
  emit(type: LendingEventType, user: Identity | null, data: PoolEvent['data']): void;
}

export function runPoolAction<R>(
  state: PoolState,
  context: ActionContext,
  action: (draft: PoolDraft) => R
): ActionOutcome<R> {
  const draftState = clonePoolState(state);
  const events: PoolEvent[] = [];

  const draft: PoolDraft = {
    state: draftState,
    context,
    events,
    emit(type, user, data) {
      events.push({ type, poolId: draftState.id, timestamp: context.now, user, data });
    },
  };

  const result = action(draft);
  assertLedgerRange(draftState);

  return { state: draftState, result, events };
}
