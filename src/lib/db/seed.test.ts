import { beforeAll, describe, expect, it } from 'vitest';

import { InMemoryLendingRepository, linearPoolConfig, T0, variablePoolConfig } from '../../testutils';
import { LENDING_EVENTS } from '../lending/types';
import { setLogLevel } from '../logger';
import { seedPools } from './seed';

describe('seedPools', () => {
  beforeAll(() => {
    setLogLevel('error');
  });

  it('creates missing pools and skips existing ones', async () => {
    const repository = new InMemoryLendingRepository();
    const seeds = [
      { id: 'var', ...variablePoolConfig() },
      { id: 'lin', ...linearPoolConfig() },
    ];

    expect(await seedPools(repository, seeds, T0)).toEqual({ created: ['var', 'lin'], skipped: [] });
    expect(await seedPools(repository, seeds, T0 + 60n)).toEqual({ created: [], skipped: ['var', 'lin'] });

    expect(repository.pools.get('lin')?.currentRateInfo).toEqual({
      lastTimestamp: T0,
      feeToProtocolRate: 0n,
      ratePerSecond: 0n,
    });
    expect(repository.events.map((event) => event.eventType)).toEqual([
      LENDING_EVENTS.POOL_CREATED,
      LENDING_EVENTS.POOL_CREATED,
    ]);
  });
});
