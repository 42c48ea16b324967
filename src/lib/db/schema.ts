/**
 * Drizzle ORM Schema for Neon Postgres
 *
 * This is the single source of truth for the database schema.
 * Ledger integers are stored as numeric(78, 0), wide enough for any uint256.
 */

import { pgTable, pgEnum, text, uuid, numeric, timestamp, jsonb, index, unique } from 'drizzle-orm/pg-core';

import type { PoolConfigJson } from '../lending/codec';

const uint = (name: string) => numeric(name, { precision: 78, scale: 0 });

// Enums
export const eventStatusEnum = pgEnum('event_status', ['PENDING', 'COMPLETED', 'FAILED']);

// Pools table
export const pools = pgTable(
  'pools',
  {
    id: text('id').primaryKey(),
    name: text('name').notNull().unique(),
    config: jsonb('config').$type<PoolConfigJson>().notNull(),
    totalAssetAmount: uint('total_asset_amount').notNull().default('0'),
    totalAssetShares: uint('total_asset_shares').notNull().default('0'),
    totalBorrowAmount: uint('total_borrow_amount').notNull().default('0'),
    totalBorrowShares: uint('total_borrow_shares').notNull().default('0'),
    totalCollateral: uint('total_collateral').notNull().default('0'),
    ratePerSecond: uint('rate_per_second').notNull(),
    feeToProtocolRate: uint('fee_to_protocol_rate').notNull().default('0'),
    rateLastTimestamp: uint('rate_last_timestamp').notNull(),
    exchangeRate: uint('exchange_rate').notNull().default('0'),
    exchangeRateLastTimestamp: uint('exchange_rate_last_timestamp').notNull().default('0'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    idxPoolsName: index('idx_pools_name').on(table.name),
  })
);

// Per-user positions within a pool
export const poolPositions = pgTable(
  'pool_positions',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    poolId: text('pool_id')
      .notNull()
      .references(() => pools.id),
    identity: text('identity').notNull(),
    assetShares: uint('asset_shares').notNull().default('0'),
    borrowShares: uint('borrow_shares').notNull().default('0'),
    collateralBalance: uint('collateral_balance').notNull().default('0'),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    poolPositionsPoolIdentityUnique: unique('pool_positions_pool_identity_unique').on(table.poolId, table.identity),
    idxPoolPositionsPool: index('idx_pool_positions_pool').on(table.poolId),
  })
);

// Action audit trail
export const poolEvents = pgTable(
  'pool_events',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    poolId: text('pool_id')
      .notNull()
      .references(() => pools.id),
    eventType: text('event_type').notNull(),
    status: eventStatusEnum('status').notNull(),
    userIdentity: text('user_identity'),
    errorCode: text('error_code'),
    errorMessage: text('error_message'),
    payload: jsonb('payload').$type<Record<string, string>>().notNull().default({}),
    occurredAt: uint('occurred_at'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    idxPoolEventsPoolCreated: index('idx_pool_events_pool_created').on(table.poolId, table.createdAt),
    idxPoolEventsUserCreated: index('idx_pool_events_user_created').on(table.userIdentity, table.createdAt),
  })
);

// Type exports for use in application code
export type PoolRow = typeof pools.$inferSelect;
export type NewPoolRow = typeof pools.$inferInsert;

export type PoolPositionRow = typeof poolPositions.$inferSelect;
export type NewPoolPositionRow = typeof poolPositions.$inferInsert;

export type PoolEventRow = typeof poolEvents.$inferSelect;
export type NewPoolEventRow = typeof poolEvents.$inferInsert;
