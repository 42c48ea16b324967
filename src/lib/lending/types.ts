/**
 * Lending Pool Type Definitions
 */

import type { RateModel } from './rates/types';

export type { RateModel } from './rates/types';

export type Identity = string;

/** One side of the share ledger: the asset (lender) side or the borrow (debt) side. */
export interface Ledger {
  amount: bigint;
  shares: bigint;
}

export interface UserPosition {
  assetShares: bigint;
  borrowShares: bigint;
  collateralBalance: bigint;
}

export interface CurrentRateInfo {
  lastTimestamp: bigint;
  feeToProtocolRate: bigint;
  ratePerSecond: bigint;
}

export interface ExchangeRateInfo {
  lastTimestamp: bigint;
  exchangeRate: bigint;
}

export interface OracleConfig {
  /** Decimal exponent applied after combining the feeds; negative values divide. */
  normalizationExponent: number;
  /** Readings older than this many seconds are rejected. */
  maxDelay: bigint;
}

export interface PoolConfig {
  name: string;
  maxLTV: bigint;
  liquidationFee: bigint;
  feeToProtocolRate: bigint;
  feeRecipient: Identity;
  /** Unix seconds; 0n means the pool never matures. */
  maturity: bigint;
  penaltyRate: bigint;
  rateModel: RateModel;
  oracle: OracleConfig;
  approvedBorrowers: ReadonlySet<Identity> | null;
  approvedLenders: ReadonlySet<Identity> | null;
}

export interface PoolState {
  id: string;
  config: PoolConfig;
  totalAsset: Ledger;
  totalBorrow: Ledger;
  totalCollateral: bigint;
  currentRateInfo: CurrentRateInfo;
  exchangeRateInfo: ExchangeRateInfo;
  positions: Map<Identity, UserPosition>;
}

export interface PriceReading {
  answer: bigint;
  decimals: number;
  /** Unix seconds */
  updatedAt: bigint;
}

export interface OracleReadings {
  divide: PriceReading;
  multiply?: PriceReading | null;
}

export interface ActionContext {
  /** Unix seconds */
  now: bigint;
  oracle?: OracleReadings;
}

// Event types emitted by pool actions
export const LENDING_EVENTS = {
  POOL_CREATED: 'LENDING_POOL_CREATED',
  INTEREST_ADDED: 'LENDING_INTEREST_ADDED',
  RATE_UPDATED: 'LENDING_RATE_UPDATED',
  EXCHANGE_RATE_UPDATED: 'LENDING_EXCHANGE_RATE_UPDATED',
  DEPOSIT: 'LENDING_DEPOSIT',
  WITHDRAW: 'LENDING_WITHDRAW',
  BORROW: 'LENDING_BORROW',
  REPAY: 'LENDING_REPAY',
  COLLATERAL_ADDED: 'LENDING_COLLATERAL_ADDED',
  COLLATERAL_REMOVED: 'LENDING_COLLATERAL_REMOVED',
  LIQUIDATION: 'LENDING_LIQUIDATION',
  BAD_DEBT_WRITTEN_OFF: 'LENDING_BAD_DEBT_WRITTEN_OFF',
} as const;

export type LendingEventType = (typeof LENDING_EVENTS)[keyof typeof LENDING_EVENTS];

export interface PoolEvent {
  type: LendingEventType;
  poolId: string;
  timestamp: bigint;
  user: Identity | null;
  data: Record<string, bigint | string>;
}

export interface ActionOutcome<R> {
  state: PoolState;
  result: R;
  events: PoolEvent[];
}

// Lending operation result types
export interface AddInterestResult {
  interestEarned: bigint;
  feesAmount: bigint;
  feesShare: bigint;
  newRate: bigint;
  utilization: bigint;
}

export interface DepositResult {
  amount: bigint;
  shares: bigint;
}

export interface WithdrawResult {
  amount: bigint;
  shares: bigint;
}

export interface BorrowResult {
  amount: bigint;
  sharesAdded: bigint;
  collateralBalance: bigint;
}

export interface RepayResult {
  amountRepaid: bigint;
  sharesRepaid: bigint;
  remainingShares: bigint;
}

export interface CollateralResult {
  amount: bigint;
  collateralBalance: bigint;
}

export interface LiquidationResult {
  sharesLiquidated: bigint;
  amountRepaid: bigint;
  collateralSeized: bigint;
  badDebtAmount: bigint;
  badDebtShares: bigint;
}

// Human-facing metrics (decimal.js derived)
export interface PoolMetrics {
  poolId: string;
  totalAssetAmount: bigint;
  totalBorrowAmount: bigint;
  availableLiquidity: bigint;
  utilizationRate: number;
  borrowApr: number;
  supplyApr: number;
  supplyApy: number;
  assetPerShare: number;
  lastUpdate: bigint;
}

export interface PositionMetrics {
  assetAmount: bigint;
  borrowAmount: bigint;
  collateralBalance: bigint;
  requiredCollateral: bigint;
  currentLtv: number;
  healthFactor: number;
  liquidatable: boolean;
  maxBorrowableAmount: bigint;
  maxWithdrawableCollateral: bigint;
}

// Service-level request events, opened PENDING and then completed or failed
export const LENDING_REQUESTS = {
  CREATE_POOL: 'LENDING_CREATE_POOL_INITIATED',
  DEPOSIT: 'LENDING_DEPOSIT_INITIATED',
  MINT: 'LENDING_MINT_INITIATED',
  REDEEM: 'LENDING_REDEEM_INITIATED',
  WITHDRAW: 'LENDING_WITHDRAW_INITIATED',
  BORROW: 'LENDING_BORROW_INITIATED',
  REPAY: 'LENDING_REPAY_INITIATED',
  ADD_COLLATERAL: 'LENDING_ADD_COLLATERAL_INITIATED',
  REMOVE_COLLATERAL: 'LENDING_REMOVE_COLLATERAL_INITIATED',
  LIQUIDATE: 'LENDING_LIQUIDATION_INITIATED',
  ADD_INTEREST: 'LENDING_ADD_INTEREST_INITIATED',
  UPDATE_EXCHANGE_RATE: 'LENDING_UPDATE_EXCHANGE_RATE_INITIATED',
} as const;

export type LendingRequestType = (typeof LENDING_REQUESTS)[keyof typeof LENDING_REQUESTS];
