import { describe, expect, it } from 'vitest';

import { reading, T0 } from '../../testutils';
import { OracleError } from './errors';
import { computeExchangeRate } from './oracle';
import type { OracleConfig } from './types';

const config: OracleConfig = { normalizationExponent: 12, maxDelay: 3600n };

describe('computeExchangeRate', () => {
  it('inverts a single feed and normalizes decimals', () => {
    const rate = computeExchangeRate({ divide: reading(2000n * 10n ** 8n, T0, 8) }, config, T0);
    expect(rate).toBe(5n * 10n ** 26n);
  });

  it('combines a multiply feed', () => {
    const rate = computeExchangeRate(
      { divide: reading(2000n * 10n ** 8n, T0, 8), multiply: reading(10n ** 8n, T0, 8) },
      config,
      T0
    );
    expect(rate).toBe(5n * 10n ** 26n);
  });

  it('divides by a negative normalization exponent', () => {
    const rate = computeExchangeRate({ divide: reading(10n ** 18n, T0) }, { normalizationExponent: -2, maxDelay: 3600n }, T0);
    expect(rate).toBe(10n ** 16n);
  });

  it('accepts a reading exactly at the max delay', () => {
    expect(computeExchangeRate({ divide: reading(10n ** 18n, T0) }, { ...config, normalizationExponent: 0 }, T0 + 3600n)).toBe(
      10n ** 18n
    );
  });

  it('rejects stale, future and non-positive readings', () => {
    expect(() => computeExchangeRate({ divide: reading(10n ** 18n, T0) }, config, T0 + 3601n)).toThrow(OracleError);
    expect(() => computeExchangeRate({ divide: reading(10n ** 18n, T0 + 1n) }, config, T0)).toThrow(OracleError);
    expect(() => computeExchangeRate({ divide: reading(0n, T0) }, config, T0)).toThrow(OracleError);
    expect(() =>
      computeExchangeRate({ divide: reading(10n ** 18n, T0), multiply: reading(-1n, T0) }, config, T0)
    ).toThrow(OracleError);
  });

  it('rejects a rate that truncates to zero', () => {
    expect(() =>
      computeExchangeRate({ divide: reading(10n ** 40n, T0, 0) }, { normalizationExponent: 0, maxDelay: 3600n }, T0)
    ).toThrow('Exchange rate truncated to zero');
  });

  it('marks oracle failures as retryable', () => {
    try {
      computeExchangeRate({ divide: reading(0n, T0) }, config, T0);
    } catch (error) {
      expect(error).toBeInstanceOf(OracleError);
      expect(error instanceof OracleError && error.retryable).toBe(true);
      return;
    }
    throw new Error('expected an OracleError');
  });
});
