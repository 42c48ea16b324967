/**
 * Database Seed Module
 *
 * Creates the pools listed in a seed file. Pools that already exist are left
 * untouched, so the seed can be re-run safely.
 */

import { logger } from '../logger';
import { createPool } from '../lending/pool';
import type { LendingRepository } from '../lending/repository';
import type { PoolSeed } from '../lending/codec';
import { recordPoolEvents } from '../lending/events';

const seedLogger = logger.child('seed');

export interface SeedSummary {
  created: string[];
  skipped: string[];
}

/**
 * Seed every pool that does not exist yet
 */
export async function seedPools(
  repository: LendingRepository,
  seeds: PoolSeed[],
  now: bigint
): Promise<SeedSummary> {
  const summary: SeedSummary = { created: [], skipped: [] };

  for (const seed of seeds) {
    const existing = await repository.loadPool(seed.id);
    if (existing) {
      seedLogger.info('Pool already exists, skipping', { poolId: seed.id });
      summary.skipped.push(seed.id);
      continue;
    }

    const { id, ...config } = seed;
    const outcome = createPool(id, config, now);
    await repository.savePool(outcome.state);
    await recordPoolEvents(repository, outcome.events);

    seedLogger.info('Seeded pool', { poolId: id, name: config.name, rateModel: config.rateModel.kind });
    summary.created.push(id);
  }

  return summary;
}
