/**
 * Lending Module Exports
 */

// Types
export * from './types';
export * from './constants';
export * from './errors';

// Share ledger
export { amountForShares, sharesForAmount, toAmount, toShares } from './shares';

// Rate models
export {
  DEFAULT_LINEAR_RATE_CONSTANTS,
  DEFAULT_VARIABLE_RATE_CONSTANTS,
  getInitialRate,
  getNewRate,
  getRateBounds,
  getUtilizationPrecision,
  linearRateCurve,
  updateLinearRate,
  updateVariableRate,
  validateRateModel,
  variableRateCurve,
} from './rates';
export type {
  LinearRateConstants,
  RateBounds,
  RateCurve,
  RateModelKind,
  RateUpdateInput,
  VariableRateConstants,
} from './rates';

// Interest accrual
export { addInterest, previewAddInterest, calculateUtilization } from './interest';

// Solvency and oracle
export {
  requiredCollateral,
  isSolvent,
  isLiquidatable,
  isPastMaturity,
  currentLtv,
  borrowAmountOf,
} from './solvency';
export { computeExchangeRate } from './oracle';

// Pool state and actions
export { createPoolState, clonePoolState, getPosition, validatePoolConfig } from './state';
export {
  createPool,
  updateExchangeRate,
  deposit,
  mint,
  redeem,
  withdraw,
  borrowAsset,
  repayAsset,
  addCollateral,
  removeCollateral,
  liquidate,
  totalAsset,
  totalBorrow,
  currentRateInfo,
  exchangeRateInfo,
  assetShares,
  borrowShares,
  collateralBalance,
  toAssetAmount,
  toAssetShares,
  toBorrowAmount,
  toBorrowShares,
} from './pool';
export type {
  BorrowParams,
  CollateralParams,
  DepositParams,
  LiquidateParams,
  MintParams,
  RedeemParams,
  RepayParams,
  WithdrawParams,
} from './pool';
export { isApproved } from './access';

// Snapshots and metrics
export { takeSnapshot, takeUserSnapshot, diffSnapshots, checkLedgerConsistency } from './snapshot';
export type { PoolAccountingSnapshot, UserSnapshot, SnapshotDelta, LedgerConsistencyReport } from './snapshot';
export {
  getPoolMetrics,
  getPositionMetrics,
  calculateUtilizationRate,
  calculateBorrowApr,
  calculateSupplyApr,
  calculateSupplyApy,
  calculateHealthFactor,
} from './metrics';

// Configuration codec
export { parsePoolConfig, parsePoolSeeds, serializePoolConfig, serializeEventData } from './codec';
export type { ParseOptions, PoolConfigJson, PoolSeed } from './codec';

// Persistence and events
export { DrizzleLendingRepository } from './repository';
export type { LendingRepository } from './repository';
export { recordPoolEvents, toEmitParams } from './events';
export type { EmitEventParams, EventStatus, PoolEventRecord } from './events';

// Main service
export { createLendingService } from './service';
export type { LendingService, LendingServiceDeps, LendingServiceError, PriceSource, ServiceResult } from './service';
