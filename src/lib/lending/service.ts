/**
 * Lending Service
 *
 * Main service layer coordinating pool actions against storage and price feeds.
 * Each request loads the pool, opens a PENDING event, runs the pure action, saves
 * the new state and closes the event. Requests for the same pool are serialised.
 */

import { getLogLevel } from '../config/runtime';
import { logger } from '../logger';
import { parsePoolConfig } from './codec';
import { isLendingError, OracleError } from './errors';
import { recordPoolEvents, type PoolEventRecord } from './events';
import { previewAddInterest, addInterest } from './interest';
import { getPoolMetrics, getPositionMetrics } from './metrics';
import { computeExchangeRate } from './oracle';
import {
  addCollateral,
  borrowAsset,
  createPool,
  deposit,
  liquidate,
  mint,
  redeem,
  removeCollateral,
  repayAsset,
  updateExchangeRate,
  withdraw,
  type BorrowParams,
  type CollateralParams,
  type DepositParams,
  type LiquidateParams,
  type MintParams,
  type RedeemParams,
  type RepayParams,
  type WithdrawParams,
} from './pool';
import { PoolActionQueue } from './queue';
import type { LendingRepository } from './repository';
import { getPosition } from './state';
import {
  LENDING_REQUESTS,
  type ActionContext,
  type ActionOutcome,
  type AddInterestResult,
  type BorrowResult,
  type CollateralResult,
  type DepositResult,
  type Identity,
  type LendingRequestType,
  type LiquidationResult,
  type OracleReadings,
  type PoolMetrics,
  type PoolState,
  type PositionMetrics,
  type RepayResult,
  type WithdrawResult,
} from './types';

export interface LendingServiceError {
  code: string;
  message: string;
  retryable: boolean;
}

export interface ServiceResult<T> {
  result?: T;
  error?: LendingServiceError;
}

/** Supplies the current oracle readings for a pool. */
export interface PriceSource {
  getReadings(poolId: string): Promise<OracleReadings>;
}

export interface LendingServiceDeps {
  repository: LendingRepository;
  prices: PriceSource;
  /** Unix seconds; defaults to the wall clock. */
  clock?: () => bigint;
  /** Applied to new pool configs that leave oracle.maxDelay out. */
  defaultOracleMaxDelay?: bigint;
}

interface RequestInfo {
  type: LendingRequestType;
  user: Identity | null;
  payload: Record<string, string>;
}

const serviceLogger = logger.child('service');

function createError(code: string, message: string, retryable: boolean = false): LendingServiceError {
  return { code, message, retryable };
}

function toServiceError(error: unknown): LendingServiceError {
  if (isLendingError(error)) {
    return createError(error.code, error.message, error.retryable);
  }
  const message = error instanceof Error ? error.message : 'Unknown error';
  return createError('INTERNAL_ERROR', message);
}

function systemClock(): bigint {
  return BigInt(Math.floor(Date.now() / 1000));
}

export function createLendingService(deps: LendingServiceDeps) {
  const { repository, prices } = deps;
  const clock = deps.clock ?? systemClock;
  const queue = new PoolActionQueue();

  // Fail at startup rather than inside a logging call after a commit
  getLogLevel();

  async function fetchReadings(poolId: string): Promise<OracleReadings> {
    try {
      return await prices.getReadings(poolId);
    } catch (error) {
      if (isLendingError(error)) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new OracleError(`Price source failed for pool ${poolId}: ${reason}`);
    }
  }

  /**
   * Bookkeeping that runs once the new pool state is saved. A failure here is
   * logged and does not turn the request into an error.
   */
  async function afterCommit(poolId: string, label: string, steps: () => Promise<void>): Promise<void> {
    try {
      await steps();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      serviceLogger.error(`${label} committed but its event trail was not fully recorded`, { poolId, error: message });
    }
  }

  async function execute<R>(
    poolId: string,
    request: RequestInfo,
    needsOracle: (state: PoolState) => boolean,
    action: (state: PoolState, context: ActionContext) => ActionOutcome<R>
  ): Promise<ServiceResult<R>> {
    return queue.run(poolId, async () => {
      const state = await repository.loadPool(poolId);
      if (!state) {
        return { error: createError('POOL_NOT_FOUND', `Pool ${poolId} not found`) };
      }

      const event = await repository.emitEvent({
        poolId,
        eventType: request.type,
        status: 'PENDING',
        userIdentity: request.user,
        payload: request.payload,
      });

      try {
        const context: ActionContext = { now: clock() };
        if (needsOracle(state)) {
          context.oracle = await fetchReadings(poolId);
        }

        const outcome = action(state, context);
        await repository.savePool(outcome.state);

        // Committed: from here on the request is reported as completed
        await afterCommit(poolId, request.type, async () => {
          await repository.updateEventStatus(event.id, 'COMPLETED');
          await recordPoolEvents(repository, outcome.events);
        });

        serviceLogger.info(`${request.type} completed`, { poolId, user: request.user, ...request.payload });
        return { result: outcome.result };
      } catch (error) {
        const serviceError = toServiceError(error);
        await repository.updateEventStatus(event.id, 'FAILED', {
          code: serviceError.code,
          message: serviceError.message,
        });

        if (serviceError.code === 'INTERNAL_ERROR') {
          serviceLogger.error(`${request.type} failed`, { poolId, error: serviceError.message });
        } else {
          serviceLogger.warn(`${request.type} rejected`, { poolId, code: serviceError.code, error: serviceError.message });
        }
        return { error: serviceError };
      }
    });
  }

  const never = () => false;
  const always = () => true;

  return {
    /**
     * Create a pool from raw (JSON) configuration.
     */
    async processCreatePool(poolId: string, rawConfig: unknown): Promise<ServiceResult<PoolState>> {
      return queue.run(poolId, async () => {
        try {
          if (await repository.loadPool(poolId)) {
            return { error: createError('POOL_EXISTS', `Pool ${poolId} already exists`) };
          }

          const config = parsePoolConfig(rawConfig, { defaultOracleMaxDelay: deps.defaultOracleMaxDelay });
          const outcome = createPool(poolId, config, clock());
          await repository.savePool(outcome.state);

          await afterCommit(poolId, LENDING_REQUESTS.CREATE_POOL, async () => {
            await recordPoolEvents(repository, outcome.events);
          });

          serviceLogger.info('Pool created', { poolId, name: outcome.state.config.name });
          return { result: outcome.state };
        } catch (error) {
          const serviceError = toServiceError(error);
          serviceLogger.warn(`${LENDING_REQUESTS.CREATE_POOL} rejected`, { poolId, error: serviceError.message });
          return { error: serviceError };
        }
      });
    },

    async processDeposit(poolId: string, params: DepositParams): Promise<ServiceResult<DepositResult>> {
      return execute(
        poolId,
        { type: LENDING_REQUESTS.DEPOSIT, user: params.recipient, payload: { amount: params.amount.toString() } },
        never,
        (state, context) => deposit(state, params, context)
      );
    },

    async processMint(poolId: string, params: MintParams): Promise<ServiceResult<DepositResult>> {
      return execute(
        poolId,
        { type: LENDING_REQUESTS.MINT, user: params.recipient, payload: { shares: params.shares.toString() } },
        never,
        (state, context) => mint(state, params, context)
      );
    },

    async processRedeem(poolId: string, params: RedeemParams): Promise<ServiceResult<WithdrawResult>> {
      return execute(
        poolId,
        { type: LENDING_REQUESTS.REDEEM, user: params.owner, payload: { shares: params.shares.toString() } },
        never,
        (state, context) => redeem(state, params, context)
      );
    },

    async processWithdraw(poolId: string, params: WithdrawParams): Promise<ServiceResult<WithdrawResult>> {
      return execute(
        poolId,
        { type: LENDING_REQUESTS.WITHDRAW, user: params.owner, payload: { amount: params.amount.toString() } },
        never,
        (state, context) => withdraw(state, params, context)
      );
    },

    async processBorrow(poolId: string, params: BorrowParams): Promise<ServiceResult<BorrowResult>> {
      return execute(
        poolId,
        {
          type: LENDING_REQUESTS.BORROW,
          user: params.borrower,
          payload: { amount: params.amount.toString(), collateralAmount: params.collateralAmount.toString() },
        },
        always,
        (state, context) => borrowAsset(state, params, context)
      );
    },

    async processRepay(poolId: string, params: RepayParams): Promise<ServiceResult<RepayResult>> {
      return execute(
        poolId,
        { type: LENDING_REQUESTS.REPAY, user: params.borrower, payload: { shares: params.shares.toString() } },
        never,
        (state, context) => repayAsset(state, params, context)
      );
    },

    async processAddCollateral(poolId: string, params: CollateralParams): Promise<ServiceResult<CollateralResult>> {
      return execute(
        poolId,
        {
          type: LENDING_REQUESTS.ADD_COLLATERAL,
          user: params.borrower,
          payload: { amount: params.amount.toString() },
        },
        never,
        (state, context) => addCollateral(state, params, context)
      );
    },

    async processRemoveCollateral(
      poolId: string,
      params: CollateralParams
    ): Promise<ServiceResult<CollateralResult>> {
      return execute(
        poolId,
        {
          type: LENDING_REQUESTS.REMOVE_COLLATERAL,
          user: params.borrower,
          payload: { amount: params.amount.toString() },
        },
        (state) => getPosition(state, params.borrower).borrowShares > 0n,
        (state, context) => removeCollateral(state, params, context)
      );
    },

    async processLiquidation(poolId: string, params: LiquidateParams): Promise<ServiceResult<LiquidationResult>> {
      return execute(
        poolId,
        {
          type: LENDING_REQUESTS.LIQUIDATE,
          user: params.borrower,
          payload: { shares: params.shares.toString(), liquidator: params.liquidator },
        },
        always,
        (state, context) => liquidate(state, params, context)
      );
    },

    async processAddInterest(poolId: string): Promise<ServiceResult<AddInterestResult>> {
      return execute(
        poolId,
        { type: LENDING_REQUESTS.ADD_INTEREST, user: null, payload: {} },
        never,
        (state, context) => addInterest(state, context.now)
      );
    },

    async processUpdateExchangeRate(poolId: string): Promise<ServiceResult<bigint>> {
      return execute(
        poolId,
        { type: LENDING_REQUESTS.UPDATE_EXCHANGE_RATE, user: null, payload: {} },
        always,
        (state, context) => updateExchangeRate(state, context)
      );
    },

    async previewInterest(poolId: string): Promise<ServiceResult<AddInterestResult>> {
      const state = await repository.loadPool(poolId);
      if (!state) {
        return { error: createError('POOL_NOT_FOUND', `Pool ${poolId} not found`) };
      }

      try {
        return { result: previewAddInterest(state, clock()) };
      } catch (error) {
        return { error: toServiceError(error) };
      }
    },

    /**
     * Audit trail for a pool, newest first.
     */
    async getPoolEvents(poolId: string, limit: number = 50): Promise<ServiceResult<PoolEventRecord[]>> {
      if (!Number.isInteger(limit) || limit <= 0) {
        return { error: createError('INVALID_INPUT', `limit must be a positive integer (got ${limit})`) };
      }

      const state = await repository.loadPool(poolId);
      if (!state) {
        return { error: createError('POOL_NOT_FOUND', `Pool ${poolId} not found`) };
      }

      return { result: await repository.getEventsForPool(poolId, limit) };
    },

    async getPoolWithMetrics(poolId: string): Promise<ServiceResult<PoolMetrics>> {
      const state = await repository.loadPool(poolId);
      if (!state) {
        return { error: createError('POOL_NOT_FOUND', `Pool ${poolId} not found`) };
      }

      return { result: getPoolMetrics(state) };
    },

    async getPositionWithMetrics(poolId: string, user: Identity): Promise<ServiceResult<PositionMetrics>> {
      const state = await repository.loadPool(poolId);
      if (!state) {
        return { error: createError('POOL_NOT_FOUND', `Pool ${poolId} not found`) };
      }

      try {
        const now = clock();
        const readings = await fetchReadings(poolId);
        const exchangeRate = computeExchangeRate(readings, state.config.oracle, now);
        return { result: getPositionMetrics(state, user, exchangeRate, now) };
      } catch (error) {
        return { error: toServiceError(error) };
      }
    },
  };
}

export type LendingService = ReturnType<typeof createLendingService>;
