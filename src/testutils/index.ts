/**
 * In-process stand-ins and builders shared by the lending tests.
 */

import { randomUUID } from 'node:crypto';

import type { EmitEventParams, EventStatus, PoolEventRecord } from '../lib/lending/events';
import type { LendingRepository } from '../lib/lending/repository';
import { DEFAULT_LINEAR_RATE_CONSTANTS, DEFAULT_VARIABLE_RATE_CONSTANTS } from '../lib/lending/rates';
import type { PriceSource } from '../lib/lending/service';
import { clonePoolState } from '../lib/lending/state';
import type { OracleReadings, PoolConfig, PoolState, PriceReading } from '../lib/lending/types';

export const T0 = 1_700_000_000n;

export function variablePoolConfig(overrides: Partial<PoolConfig> = {}): PoolConfig {
  return {
    name: 'TEST/VAR',
    maxLTV: 75_000n,
    liquidationFee: 10_000n,
    feeToProtocolRate: 0n,
    feeRecipient: '',
    maturity: 0n,
    penaltyRate: 0n,
    rateModel: { kind: 'variable', constants: { ...DEFAULT_VARIABLE_RATE_CONSTANTS } },
    oracle: { normalizationExponent: 0, maxDelay: 3600n },
    approvedBorrowers: null,
    approvedLenders: null,
    ...overrides,
  };
}

export function linearPoolConfig(overrides: Partial<PoolConfig> = {}): PoolConfig {
  return variablePoolConfig({
    name: 'TEST/LIN',
    rateModel: { kind: 'linear', constants: { ...DEFAULT_LINEAR_RATE_CONSTANTS } },
    ...overrides,
  });
}

/** A single feed with 18 decimals: `price` asset units per collateral unit. */
export function reading(answer: bigint, updatedAt: bigint, decimals: number = 18): PriceReading {
  return { answer, decimals, updatedAt };
}

/** Readings that produce an exchange rate of exactly 1e18 (one collateral unit per asset unit). */
export function parReadings(updatedAt: bigint): OracleReadings {
  return { divide: reading(10n ** 18n, updatedAt) };
}

export class InMemoryLendingRepository implements LendingRepository {
  readonly pools = new Map<string, PoolState>();
  readonly events: PoolEventRecord[] = [];

  async loadPool(poolId: string): Promise<PoolState | null> {
    const state = this.pools.get(poolId);
    return state ? clonePoolState(state) : null;
  }

  async savePool(state: PoolState): Promise<void> {
    this.pools.set(state.id, clonePoolState(state));
  }

  async emitEvent(params: EmitEventParams): Promise<PoolEventRecord> {
    const now = new Date();
    const record: PoolEventRecord = {
      id: randomUUID(),
      poolId: params.poolId,
      eventType: params.eventType,
      status: params.status,
      userIdentity: params.userIdentity ?? null,
      occurredAt: params.occurredAt ?? null,
      errorCode: params.errorCode ?? null,
      errorMessage: params.errorMessage ?? null,
      payload: params.payload ?? {},
      createdAt: now,
      updatedAt: now,
    };
    this.events.push(record);
    return { ...record };
  }

  async updateEventStatus(
    eventId: string,
    status: EventStatus,
    error?: { code: string; message: string }
  ): Promise<void> {
    const record = this.events.find((event) => event.id === eventId);
    if (!record) {
      throw new Error(`Unknown event ${eventId}`);
    }
    record.status = status;
    record.errorCode = error?.code ?? null;
    record.errorMessage = error?.message ?? null;
    record.updatedAt = new Date();
  }

  async getEventsForPool(poolId: string, limit: number = 50): Promise<PoolEventRecord[]> {
    return this.events
      .filter((event) => event.poolId === poolId)
      .reverse()
      .slice(0, limit);
  }
}

/** Price source whose readings the test sets directly. */
export class StaticPriceSource implements PriceSource {
  private readonly readings = new Map<string, OracleReadings>();
  calls = 0;
  failure: Error | null = null;

  set(poolId: string, readings: OracleReadings): void {
    this.readings.set(poolId, readings);
  }

  async getReadings(poolId: string): Promise<OracleReadings> {
    this.calls += 1;
    if (this.failure) {
      throw this.failure;
    }
    const readings = this.readings.get(poolId);
    if (!readings) {
      throw new Error(`No readings for ${poolId}`);
    }
    return readings;
  }
}
