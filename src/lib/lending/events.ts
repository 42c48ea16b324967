/**
 * Pool Event Trail
 *
 * Audit trail for pool actions. The service opens a PENDING event for each request,
 * then completes or fails it; the events an action produced are stored as COMPLETED
 * rows of their own.
 */

import { logger } from '../logger';
import { serializeEventData } from './codec';
import type { LendingRepository } from './repository';
import type { PoolEvent } from './types';

export type EventStatus = 'PENDING' | 'COMPLETED' | 'FAILED';

export interface EmitEventParams {
  poolId: string;
  eventType: string;
  status: EventStatus;
  userIdentity?: string | null;
  occurredAt?: bigint | null;
  errorCode?: string | null;
  errorMessage?: string | null;
  payload?: Record<string, string>;
}

export interface PoolEventRecord {
  id: string;
  poolId: string;
  eventType: string;
  status: EventStatus;
  userIdentity: string | null;
  occurredAt: bigint | null;
  errorCode: string | null;
  errorMessage: string | null;
  payload: Record<string, string>;
  createdAt: Date;
  updatedAt: Date;
}

const eventLogger = logger.child('events');

export function toEmitParams(event: PoolEvent): EmitEventParams {
  return {
    poolId: event.poolId,
    eventType: event.type,
    status: 'COMPLETED',
    userIdentity: event.user,
    occurredAt: event.timestamp,
    payload: serializeEventData(event.data),
  };
}

/**
 * Store the events an action produced, in order.
 */
export async function recordPoolEvents(
  repository: LendingRepository,
  events: readonly PoolEvent[]
): Promise<PoolEventRecord[]> {
  const records: PoolEventRecord[] = [];

  for (const event of events) {
    eventLogger.debug(event.type, { poolId: event.poolId, user: event.user, ...serializeEventData(event.data) });
    records.push(await repository.emitEvent(toEmitParams(event)));
  }

  return records;
}
