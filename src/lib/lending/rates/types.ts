/**
 * Interest Rate Curve Contract
 *
 * A pool picks one rate model at creation. The pool only talks to the model through
 * `RateCurve`; constants are validated once when the pool is configured.
 */

export interface VariableRateConstants {
  minUtilization: bigint;
  maxUtilization: bigint;
  utilizationPrecision: bigint;
  /** Floor, per second, RATE_PRECISION scale */
  minInterest: bigint;
  /** Ceiling, per second, RATE_PRECISION scale */
  maxInterest: bigint;
  /** Seconds */
  interestHalfLife: bigint;
}

export interface LinearRateConstants {
  minInterest: bigint;
  vertexInterest: bigint;
  maxInterest: bigint;
  vertexUtilization: bigint;
  utilizationPrecision: bigint;
}

export type RateModel =
  | { kind: 'variable'; constants: VariableRateConstants }
  | { kind: 'linear'; constants: LinearRateConstants };

export type RateModelKind = RateModel['kind'];

export interface RateUpdateInput {
  /** utilizationPrecision scale */
  utilization: bigint;
  currentRate: bigint;
  /** Seconds since the previous update */
  elapsedTime: bigint;
}

export interface RateBounds {
  minInterest: bigint;
  maxInterest: bigint;
}

export interface RateCurve<C> {
  readonly kind: RateModelKind;
  /** Throws ConfigurationError for constants the curve cannot run with. */
  validate(constants: C): void;
  bounds(constants: C): RateBounds;
  utilizationPrecision(constants: C): bigint;
  initialRate(constants: C): bigint;
  updateRate(constants: C, input: RateUpdateInput): bigint;
}
