/**
 * Pool Configuration Codec
 *
 * Parses pool configuration from JSON (seed files, database jsonb) into typed
 * config, and back. Integers travel as decimal strings so nothing passes through
 * a float.
 */

import { z } from 'zod';

import { ConfigurationError } from './errors';
import type { OracleConfig, PoolConfig, PoolEvent, RateModel } from './types';

const uint = z
  .union([z.string().regex(/^\d+$/, 'expected an unsigned integer string'), z.number().int().nonnegative().safe()])
  .transform((value) => BigInt(value));

const identityList = z
  .array(z.string().min(1))
  .nullable()
  .default(null)
  .transform((list) => (list === null ? null : new Set(list)));

const variableConstantsSchema = z.object({
  minUtilization: uint,
  maxUtilization: uint,
  utilizationPrecision: uint,
  minInterest: uint,
  maxInterest: uint,
  interestHalfLife: uint,
});

const linearConstantsSchema = z.object({
  minInterest: uint,
  vertexInterest: uint,
  maxInterest: uint,
  vertexUtilization: uint,
  utilizationPrecision: uint,
});

const rateModelSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('variable'), constants: variableConstantsSchema }),
  z.object({ kind: z.literal('linear'), constants: linearConstantsSchema }),
]);

export const poolConfigSchema = z.object({
  name: z.string().min(1),
  maxLTV: uint,
  liquidationFee: uint,
  feeToProtocolRate: uint.default(0),
  feeRecipient: z.string().default(''),
  maturity: uint.default(0),
  penaltyRate: uint.default(0),
  rateModel: rateModelSchema,
  oracle: z.object({
    normalizationExponent: z.number().int(),
    maxDelay: uint.optional(),
  }),
  approvedBorrowers: identityList,
  approvedLenders: identityList,
});

export const poolSeedSchema = poolConfigSchema.extend({ id: z.string().min(1) });

export type PoolConfigJson = z.input<typeof poolConfigSchema>;
export type PoolSeed = PoolConfig & { id: string };

export interface ParseOptions {
  /** Used when the oracle block omits maxDelay. */
  defaultOracleMaxDelay?: bigint;
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

function resolveOracle(
  oracle: { normalizationExponent: number; maxDelay?: bigint },
  poolName: string,
  options: ParseOptions
): OracleConfig {
  const maxDelay = oracle.maxDelay ?? options.defaultOracleMaxDelay;
  if (maxDelay === undefined) {
    throw new ConfigurationError(`Pool ${poolName} has no oracle.maxDelay and no default was given`);
  }
  return { normalizationExponent: oracle.normalizationExponent, maxDelay };
}

export function parsePoolConfig(raw: unknown, options: ParseOptions = {}): PoolConfig {
  const parsed = poolConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid pool configuration: ${describeIssues(parsed.error)}`);
  }
  const { oracle, ...config } = parsed.data;
  return { ...config, oracle: resolveOracle(oracle, config.name, options) };
}

export function parsePoolSeeds(raw: unknown, options: ParseOptions = {}): PoolSeed[] {
  const parsed = z.array(poolSeedSchema).safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid pool seed file: ${describeIssues(parsed.error)}`);
  }
  return parsed.data.map(({ oracle, ...seed }) => ({ ...seed, oracle: resolveOracle(oracle, seed.name, options) }));
}

function serializeRateModel(model: RateModel): PoolConfigJson['rateModel'] {
  switch (model.kind) {
    case 'variable': {
      const c = model.constants;
      return {
        kind: 'variable',
        constants: {
          minUtilization: c.minUtilization.toString(),
          maxUtilization: c.maxUtilization.toString(),
          utilizationPrecision: c.utilizationPrecision.toString(),
          minInterest: c.minInterest.toString(),
          maxInterest: c.maxInterest.toString(),
          interestHalfLife: c.interestHalfLife.toString(),
        },
      };
    }
    case 'linear': {
      const c = model.constants;
      return {
        kind: 'linear',
        constants: {
          minInterest: c.minInterest.toString(),
          vertexInterest: c.vertexInterest.toString(),
          maxInterest: c.maxInterest.toString(),
          vertexUtilization: c.vertexUtilization.toString(),
          utilizationPrecision: c.utilizationPrecision.toString(),
        },
      };
    }
  }
}

export function serializePoolConfig(config: PoolConfig): PoolConfigJson {
  return {
    name: config.name,
    maxLTV: config.maxLTV.toString(),
    liquidationFee: config.liquidationFee.toString(),
    feeToProtocolRate: config.feeToProtocolRate.toString(),
    feeRecipient: config.feeRecipient,
    maturity: config.maturity.toString(),
    penaltyRate: config.penaltyRate.toString(),
    rateModel: serializeRateModel(config.rateModel),
    oracle: {
      normalizationExponent: config.oracle.normalizationExponent,
      maxDelay: config.oracle.maxDelay.toString(),
    },
    approvedBorrowers: config.approvedBorrowers === null ? null : [...config.approvedBorrowers].sort(),
    approvedLenders: config.approvedLenders === null ? null : [...config.approvedLenders].sort(),
  };
}

/** Event payload with bigints rendered as decimal strings, for jsonb and logs. */
export function serializeEventData(data: PoolEvent['data']): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(data)) {
    out[key] = value.toString();
  }
  return out;
}
