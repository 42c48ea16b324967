/**
 * Exchange Rate Composition
 *
 * Turns the pool's oracle readings into a single exchange rate: collateral units
 * per asset unit, scaled by EXCHANGE_PRECISION.
 *
 *   rate = EXCHANGE_PRECISION * multiply * 10^divideDecimals * 10^N
 *          / (divide * 10^multiplyDecimals)
 *
 * N is the pool's normalization exponent (typically collateral decimals minus
 * asset decimals). A missing multiply feed counts as 1 with 0 decimals.
 */

import { EXCHANGE_PRECISION } from './constants';
import { OracleError } from './errors';
import { assertUint256 } from './math';
import type { OracleConfig, OracleReadings, PriceReading } from './types';

function checkReading(reading: PriceReading, label: string, config: OracleConfig, now: bigint): void {
  if (reading.answer <= 0n) {
    throw new OracleError(`${label} feed returned a non-positive price: ${reading.answer}`);
  }
  if (!Number.isInteger(reading.decimals) || reading.decimals < 0) {
    throw new OracleError(`${label} feed reported invalid decimals: ${reading.decimals}`);
  }
  if (reading.updatedAt > now) {
    throw new OracleError(`${label} feed reading is from the future (${reading.updatedAt} > ${now})`);
  }
  if (now - reading.updatedAt > config.maxDelay) {
    throw new OracleError(
      `${label} feed is stale: updated at ${reading.updatedAt}, max delay ${config.maxDelay}s at ${now}`
    );
  }
}

export function computeExchangeRate(readings: OracleReadings, config: OracleConfig, now: bigint): bigint {
  checkReading(readings.divide, 'divide', config, now);

  let numerator = EXCHANGE_PRECISION * 10n ** BigInt(readings.divide.decimals);
  let denominator = readings.divide.answer;

  if (readings.multiply) {
    checkReading(readings.multiply, 'multiply', config, now);
    numerator *= readings.multiply.answer;
    denominator *= 10n ** BigInt(readings.multiply.decimals);
  }

  const exponent = config.normalizationExponent;
  if (exponent >= 0) {
    numerator *= 10n ** BigInt(exponent);
  } else {
    denominator *= 10n ** BigInt(-exponent);
  }

  const exchangeRate = assertUint256(numerator / denominator, 'exchangeRate');
  if (exchangeRate === 0n) {
    throw new OracleError('Exchange rate truncated to zero');
  }

  return exchangeRate;
}
