import { readFileSync } from 'node:fs';

import { describe, expect, it } from 'vitest';

import { variablePoolConfig } from '../../testutils';
import { parsePoolConfig, parsePoolSeeds, serializeEventData, serializePoolConfig } from './codec';
import { ConfigurationError } from './errors';
import { createPoolState } from './state';

const rawConfig = {
  name: 'TEST/USD',
  maxLTV: '75000',
  liquidationFee: 10_000,
  rateModel: {
    kind: 'linear',
    constants: {
      minInterest: '0',
      vertexInterest: '1268391679',
      maxInterest: '146248508681',
      vertexUtilization: '80000',
      utilizationPrecision: '100000',
    },
  },
  oracle: { normalizationExponent: -6, maxDelay: '900' },
  approvedLenders: ['alice', 'bob'],
};

describe('parsePoolConfig', () => {
  it('reads integers as bigint and fills defaults', () => {
    const config = parsePoolConfig(rawConfig);

    expect(config.maxLTV).toBe(75_000n);
    expect(config.liquidationFee).toBe(10_000n);
    expect(config.feeToProtocolRate).toBe(0n);
    expect(config.feeRecipient).toBe('');
    expect(config.maturity).toBe(0n);
    expect(config.oracle).toEqual({ normalizationExponent: -6, maxDelay: 900n });
    expect(config.approvedBorrowers).toBeNull();
    expect(config.approvedLenders).toEqual(new Set(['alice', 'bob']));
    expect(config.rateModel.kind).toBe('linear');
  });

  it('falls back to the default oracle delay', () => {
    const withoutDelay = { ...rawConfig, oracle: { normalizationExponent: 0 } };

    expect(() => parsePoolConfig(withoutDelay)).toThrow(ConfigurationError);
    expect(parsePoolConfig(withoutDelay, { defaultOracleMaxDelay: 3600n }).oracle.maxDelay).toBe(3600n);
  });

  it('names the offending field', () => {
    expect(() => parsePoolConfig({ ...rawConfig, maxLTV: '-1' })).toThrow(/maxLTV/);
    expect(() => parsePoolConfig({ ...rawConfig, rateModel: { kind: 'cubic', constants: {} } })).toThrow(
      ConfigurationError
    );
  });

  it('refuses integers a JSON number cannot hold exactly', () => {
    const raw: unknown = JSON.parse(
      `{"name":"TEST/USD","maxLTV":75000,"liquidationFee":10000,"penaltyRate":12345678901234567891,` +
        `"rateModel":${JSON.stringify(rawConfig.rateModel)},"oracle":{"normalizationExponent":0,"maxDelay":900}}`
    );

    expect(() => parsePoolConfig(raw)).toThrow(/penaltyRate/);
    expect(parsePoolConfig({ ...rawConfig, penaltyRate: '12345678901234567891' }).penaltyRate).toBe(
      12_345_678_901_234_567_891n
    );
  });

  it('serializes back to the same config', () => {
    const config = variablePoolConfig({ approvedBorrowers: new Set(['b', 'a']) });
    const json = serializePoolConfig(config);

    expect(json.approvedBorrowers).toEqual(['a', 'b']);
    expect(json.maxLTV).toBe('75000');
    expect(parsePoolConfig(json)).toEqual(config);
  });
});

describe('parsePoolSeeds', () => {
  it('loads the bundled seed file', () => {
    const raw: unknown = JSON.parse(readFileSync(new URL('../../../config/pools.json', import.meta.url), 'utf8'));
    const seeds = parsePoolSeeds(raw, { defaultOracleMaxDelay: 7200n });

    expect(seeds.map((seed) => seed.id)).toEqual(['weth-usdc-variable', 'wbtc-usdc-linear-2027']);
    expect(seeds[0]?.oracle.maxDelay).toBe(3600n);
    expect(seeds[1]?.oracle.maxDelay).toBe(7200n);
    expect(seeds[1]?.approvedBorrowers).toEqual(new Set(['desk-a', 'desk-b']));
    for (const seed of seeds) {
      expect(() => createPoolState(seed.id, seed, 0n)).not.toThrow();
    }
  });

  it('rejects a seed without an id', () => {
    expect(() => parsePoolSeeds([rawConfig], { defaultOracleMaxDelay: 60n })).toThrow(/Invalid pool seed file: 0\.id/);
  });
});

describe('serializeEventData', () => {
  it('renders bigints as decimal strings', () => {
    expect(serializeEventData({ amount: 5n, liquidator: 'keeper' })).toEqual({ amount: '5', liquidator: 'keeper' });
  });
});
