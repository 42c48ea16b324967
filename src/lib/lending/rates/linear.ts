import { ConfigurationError } from '../errors';
import { clamp } from '../math';
import type { LinearRateConstants, RateBounds, RateCurve, RateUpdateInput } from './types';

// Two-segment curve with a kink at vertexUtilization. Stateless: the previous
// rate and elapsed time do not matter.

export const DEFAULT_LINEAR_RATE_CONSTANTS: LinearRateConstants = {
  minInterest: 0n,
  vertexInterest: 1_268_391_679n,
  maxInterest: 146_248_508_681n,
  vertexUtilization: 80_000n,
  utilizationPrecision: 100_000n,
};

function validate(constants: LinearRateConstants): void {
  const { minInterest, vertexInterest, maxInterest, vertexUtilization, utilizationPrecision } = constants;

  if (utilizationPrecision <= 0n) {
    throw new ConfigurationError('utilizationPrecision must be positive');
  }
  if (vertexUtilization <= 0n || vertexUtilization >= utilizationPrecision) {
    throw new ConfigurationError(
      `vertexUtilization must lie strictly between 0 and ${utilizationPrecision} (got ${vertexUtilization})`
    );
  }
  if (minInterest < 0n || minInterest > vertexInterest || vertexInterest > maxInterest) {
    throw new ConfigurationError(
      `Interest points must satisfy 0 <= min <= vertex <= max (got ${minInterest}, ${vertexInterest}, ${maxInterest})`
    );
  }
}

function bounds(constants: LinearRateConstants): RateBounds {
  return { minInterest: constants.minInterest, maxInterest: constants.maxInterest };
}

export function updateLinearRate(constants: LinearRateConstants, input: RateUpdateInput): bigint {
  const { minInterest, vertexInterest, maxInterest, vertexUtilization, utilizationPrecision } = constants;
  const { utilization } = input;

  let newRate: bigint;
  if (utilization < vertexUtilization) {
    newRate = minInterest + (utilization * (vertexInterest - minInterest)) / vertexUtilization;
  } else {
    newRate =
      vertexInterest +
      ((utilization - vertexUtilization) * (maxInterest - vertexInterest)) / (utilizationPrecision - vertexUtilization);
  }

  return clamp(newRate, minInterest, maxInterest);
}

export const linearRateCurve: RateCurve<LinearRateConstants> = {
  kind: 'linear',
  validate,
  bounds,
  utilizationPrecision: (constants) => constants.utilizationPrecision,
  initialRate: (constants) => constants.minInterest,
  updateRate: updateLinearRate,
};
