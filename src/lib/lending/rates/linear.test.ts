import { describe, expect, it } from 'vitest';

import { ConfigurationError } from '../errors';
import { getInitialRate, getNewRate, validateRateModel } from './index';
import { DEFAULT_LINEAR_RATE_CONSTANTS, linearRateCurve, updateLinearRate } from './linear';

const constants = DEFAULT_LINEAR_RATE_CONSTANTS;

function rateAt(utilization: bigint): bigint {
  return updateLinearRate(constants, { utilization, currentRate: 0n, elapsedTime: 0n });
}

describe('linear rate curve', () => {
  it('interpolates below the vertex', () => {
    expect(rateAt(0n)).toBe(0n);
    expect(rateAt(40_000n)).toBe(634_195_839n);
    expect(rateAt(80_000n)).toBe(1_268_391_679n);
  });

  it('interpolates above the vertex', () => {
    expect(rateAt(90_000n)).toBe(73_758_450_180n);
    expect(rateAt(100_000n)).toBe(146_248_508_681n);
  });

  it('ignores the previous rate and elapsed time', () => {
    expect(updateLinearRate(constants, { utilization: 40_000n, currentRate: 999n, elapsedTime: 86_400n })).toBe(
      634_195_839n
    );
  });

  it('rejects a vertex outside the utilization range', () => {
    expect(() => linearRateCurve.validate({ ...constants, vertexUtilization: 0n })).toThrow(ConfigurationError);
    expect(() => linearRateCurve.validate({ ...constants, vertexUtilization: 100_000n })).toThrow(ConfigurationError);
    expect(() => linearRateCurve.validate({ ...constants, vertexInterest: constants.maxInterest + 1n })).toThrow(
      ConfigurationError
    );
  });

  it('is reachable through the model dispatch', () => {
    const model = { kind: 'linear' as const, constants };
    expect(() => validateRateModel(model)).not.toThrow();
    expect(getInitialRate(model)).toBe(0n);
    expect(getNewRate(model, { utilization: 80_000n, currentRate: 0n, elapsedTime: 1n })).toBe(1_268_391_679n);
  });
});
