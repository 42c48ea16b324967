/**
 * Lending Persistence
 *
 * `LendingRepository` is what the service layer needs from storage. The Drizzle
 * implementation maps the pool aggregate onto the `pools`, `pool_positions` and
 * `pool_events` tables.
 */

import { desc, eq, sql } from 'drizzle-orm';

import { poolEvents, poolPositions, pools, type Database, type PoolEventRow, type PoolRow } from '../db';
import { parsePoolConfig, serializePoolConfig } from './codec';
import type { EmitEventParams, EventStatus, PoolEventRecord } from './events';
import type { Identity, PoolState, UserPosition } from './types';

export interface LendingRepository {
  loadPool(poolId: string): Promise<PoolState | null>;
  /** Inserts or overwrites the pool and all of its positions. */
  savePool(state: PoolState): Promise<void>;
  emitEvent(params: EmitEventParams): Promise<PoolEventRecord>;
  updateEventStatus(eventId: string, status: EventStatus, error?: { code: string; message: string }): Promise<void>;
  getEventsForPool(poolId: string, limit?: number): Promise<PoolEventRecord[]>;
}

function toEventRecord(row: PoolEventRow): PoolEventRecord {
  return {
    id: row.id,
    poolId: row.poolId,
    eventType: row.eventType,
    status: row.status,
    userIdentity: row.userIdentity,
    occurredAt: row.occurredAt === null ? null : BigInt(row.occurredAt),
    errorCode: row.errorCode,
    errorMessage: row.errorMessage,
    payload: row.payload,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

function rowToPoolState(row: PoolRow, positions: Map<Identity, UserPosition>): PoolState {
  return {
    id: row.id,
    config: parsePoolConfig(row.config),
    totalAsset: { amount: BigInt(row.totalAssetAmount), shares: BigInt(row.totalAssetShares) },
    totalBorrow: { amount: BigInt(row.totalBorrowAmount), shares: BigInt(row.totalBorrowShares) },
    totalCollateral: BigInt(row.totalCollateral),
    currentRateInfo: {
      lastTimestamp: BigInt(row.rateLastTimestamp),
      feeToProtocolRate: BigInt(row.feeToProtocolRate),
      ratePerSecond: BigInt(row.ratePerSecond),
    },
    exchangeRateInfo: {
      lastTimestamp: BigInt(row.exchangeRateLastTimestamp),
      exchangeRate: BigInt(row.exchangeRate),
    },
    positions,
  };
}

export class DrizzleLendingRepository implements LendingRepository {
  constructor(private readonly db: Database) {}

  async loadPool(poolId: string): Promise<PoolState | null> {
    const row = await this.db.query.pools.findFirst({
      where: eq(pools.id, poolId),
    });

    if (!row) {
      return null;
    }

    const positionRows = await this.db.query.poolPositions.findMany({
      where: eq(poolPositions.poolId, poolId),
    });

    const positions = new Map<Identity, UserPosition>();
    for (const position of positionRows) {
      positions.set(position.identity, {
        assetShares: BigInt(position.assetShares),
        borrowShares: BigInt(position.borrowShares),
        collateralBalance: BigInt(position.collateralBalance),
      });
    }

    return rowToPoolState(row, positions);
  }

  async savePool(state: PoolState): Promise<void> {
    const now = new Date();
    const values = {
      totalAssetAmount: state.totalAsset.amount.toString(),
      totalAssetShares: state.totalAsset.shares.toString(),
      totalBorrowAmount: state.totalBorrow.amount.toString(),
      totalBorrowShares: state.totalBorrow.shares.toString(),
      totalCollateral: state.totalCollateral.toString(),
      ratePerSecond: state.currentRateInfo.ratePerSecond.toString(),
      feeToProtocolRate: state.currentRateInfo.feeToProtocolRate.toString(),
      rateLastTimestamp: state.currentRateInfo.lastTimestamp.toString(),
      exchangeRate: state.exchangeRateInfo.exchangeRate.toString(),
      exchangeRateLastTimestamp: state.exchangeRateInfo.lastTimestamp.toString(),
      updatedAt: now,
    };

    // Neon HTTP driver does not support transactions; pool row first, then positions.
    await this.db
      .insert(pools)
      .values({
        id: state.id,
        name: state.config.name,
        config: serializePoolConfig(state.config),
        ...values,
      })
      .onConflictDoUpdate({ target: pools.id, set: values });

    const positionValues = [...state.positions].map(([identity, position]) => ({
      poolId: state.id,
      identity,
      assetShares: position.assetShares.toString(),
      borrowShares: position.borrowShares.toString(),
      collateralBalance: position.collateralBalance.toString(),
      updatedAt: now,
    }));

    if (positionValues.length === 0) {
      return;
    }

    await this.db
      .insert(poolPositions)
      .values(positionValues)
      .onConflictDoUpdate({
        target: [poolPositions.poolId, poolPositions.identity],
        set: {
          assetShares: sql`excluded.asset_shares`,
          borrowShares: sql`excluded.borrow_shares`,
          collateralBalance: sql`excluded.collateral_balance`,
          updatedAt: now,
        },
      });
  }

  async emitEvent(params: EmitEventParams): Promise<PoolEventRecord> {
    const [inserted] = await this.db
      .insert(poolEvents)
      .values({
        poolId: params.poolId,
        eventType: params.eventType,
        status: params.status,
        userIdentity: params.userIdentity ?? null,
        occurredAt: params.occurredAt?.toString() ?? null,
        errorCode: params.errorCode ?? null,
        errorMessage: params.errorMessage ?? null,
        payload: params.payload ?? {},
      })
      .returning();

    if (!inserted) {
      throw new Error(`Failed to record ${params.eventType} event for pool ${params.poolId}`);
    }

    return toEventRecord(inserted);
  }

  async updateEventStatus(
    eventId: string,
    status: EventStatus,
    error?: { code: string; message: string }
  ): Promise<void> {
    await this.db
      .update(poolEvents)
      .set({
        status,
        errorCode: error?.code ?? null,
        errorMessage: error?.message ?? null,
        updatedAt: new Date(),
      })
      .where(eq(poolEvents.id, eventId));
  }

  async getEventsForPool(poolId: string, limit: number = 50): Promise<PoolEventRecord[]> {
    const results = await this.db.query.poolEvents.findMany({
      where: eq(poolEvents.poolId, poolId),
      orderBy: [desc(poolEvents.createdAt)],
      limit,
    });

    return results.map(toEventRecord);
  }
}
