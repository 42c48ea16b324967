/**
 * Utilization-seeking rate curve.
 *
 * Below the target band the rate decays toward minInterest, above it the rate grows
 * toward maxInterest. The step scales with the square of the distance from the band
 * and linearly with elapsed time; `interestHalfLife` is the time constant. At full
 * distance from the band, one half-life halves (or doubles) the rate.
 */

import { DEFAULT_RATE_PER_SECOND, HALF_LIFE_SCALE, UTILIZATION_DELTA_SCALE } from '../constants';
import { ConfigurationError } from '../errors';
import { clamp } from '../math';
import type { RateBounds, RateCurve, RateUpdateInput, VariableRateConstants } from './types';

export const DEFAULT_VARIABLE_RATE_CONSTANTS: VariableRateConstants = {
  minUtilization: 75_000n,
  maxUtilization: 85_000n,
  utilizationPrecision: 100_000n,
  minInterest: 79_123_523n,
  maxInterest: 146_248_508_681n,
  interestHalfLife: 43_200n,
};

function validate(constants: VariableRateConstants): void {
  const { minUtilization, maxUtilization, utilizationPrecision, minInterest, maxInterest, interestHalfLife } =
    constants;

  if (utilizationPrecision <= 0n) {
    throw new ConfigurationError('utilizationPrecision must be positive');
  }
  if (minUtilization <= 0n || minUtilization > maxUtilization || maxUtilization >= utilizationPrecision) {
    throw new ConfigurationError(
      `Utilization band must satisfy 0 < min <= max < precision (got ${minUtilization}, ${maxUtilization}, ${utilizationPrecision})`
    );
  }
  if (minInterest <= 0n || minInterest > maxInterest) {
    throw new ConfigurationError(`Interest bounds must satisfy 0 < min <= max (got ${minInterest}, ${maxInterest})`);
  }
  if (interestHalfLife <= 0n) {
    throw new ConfigurationError('interestHalfLife must be positive');
  }
}

function bounds(constants: VariableRateConstants): RateBounds {
  return { minInterest: constants.minInterest, maxInterest: constants.maxInterest };
}

export function updateVariableRate(constants: VariableRateConstants, input: RateUpdateInput): bigint {
  const { utilization, currentRate, elapsedTime } = input;
  const { minUtilization, maxUtilization, utilizationPrecision, minInterest, maxInterest } = constants;
  const halfLife = constants.interestHalfLife * HALF_LIFE_SCALE;

  let newRate = currentRate;

  if (utilization < minUtilization) {
    const deltaUtilization = ((minUtilization - utilization) * UTILIZATION_DELTA_SCALE) / minUtilization;
    const decay = halfLife + deltaUtilization * deltaUtilization * elapsedTime;
    newRate = (currentRate * halfLife) / decay;
  } else if (utilization > maxUtilization) {
    const deltaUtilization =
      ((utilization - maxUtilization) * UTILIZATION_DELTA_SCALE) / (utilizationPrecision - maxUtilization);
    const growth = halfLife + deltaUtilization * deltaUtilization * elapsedTime;
    newRate = (currentRate * growth) / halfLife;
  }

  return clamp(newRate, minInterest, maxInterest);
}

export const variableRateCurve: RateCurve<VariableRateConstants> = {
  kind: 'variable',
  validate,
  bounds,
  utilizationPrecision: (constants) => constants.utilizationPrecision,
  initialRate: (constants) => clamp(DEFAULT_RATE_PER_SECOND, constants.minInterest, constants.maxInterest),
  updateRate: updateVariableRate,
};
