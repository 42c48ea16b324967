/**
 * Fixed-point precisions used across the pool.
 *
 * Each scale is named once here; conversions between scales happen only at
 * component boundaries (oracle decimals -> EXCHANGE_PRECISION, utilization -> curve).
 */

/** maxLTV and current LTV values: 75_000n = 75% */
export const LTV_PRECISION = 100_000n;

/** liquidationFee: 10_000n = 10% bonus on seized collateral */
export const LIQ_PRECISION = 100_000n;

/** feeToProtocolRate: share of accrued interest diverted to the fee recipient */
export const FEE_PRECISION = 100_000n;

/** Collateral units per asset unit, scaled by 1e18 */
export const EXCHANGE_PRECISION = 10n ** 18n;

/** ratePerSecond, scaled by 1e18 */
export const RATE_PRECISION = 10n ** 18n;

/** Scale of the utilization delta inside the variable rate curve */
export const UTILIZATION_DELTA_SCALE = 10n ** 18n;

/** The half-life is compared against a squared utilization delta, so it carries the square of its scale */
export const HALF_LIFE_SCALE = UTILIZATION_DELTA_SCALE * UTILIZATION_DELTA_SCALE;

export const MAX_UINT128 = 2n ** 128n - 1n;
export const MAX_UINT256 = 2n ** 256n - 1n;

export const SECONDS_PER_YEAR = 31_536_000n;

/** ~0.5% APR, starting rate of the variable curve before it is clamped into bounds */
export const DEFAULT_RATE_PER_SECOND = 158_049_988n;
