/**
 * Allow-list gate checked at the boundary of mutating actions.
 * A `null` list means the role is open to everyone.
 */

import { AccessDeniedError } from './errors';
import type { Identity, PoolConfig } from './types';

export function isApproved(list: ReadonlySet<Identity> | null, identity: Identity): boolean {
  return list === null || list.has(identity);
}

export function assertApprovedLender(config: PoolConfig, identity: Identity): void {
  if (!isApproved(config.approvedLenders, identity)) {
    throw new AccessDeniedError(identity, 'lender');
  }
}

export function assertApprovedBorrower(config: PoolConfig, identity: Identity): void {
  if (!isApproved(config.approvedBorrowers, identity)) {
    throw new AccessDeniedError(identity, 'borrower');
  }
}
