import { DEFAULT_FEE_PARAMETERS, assertPositivePrice, defineFeeParameters, type FeeParameters } from '@pegfee/fees';
import { DecimalPriceSchema, parsePrice } from '@pegfee/shared';
import { z } from 'zod';

// Blank values fall back to the default instead of coercing to 0.
function intWithDefault(fallback: number) {
  return z.preprocess((v) => {
    if (typeof v === 'string' && v.trim().length === 0) return undefined;
    return v;
  }, z.coerce.number().int().default(fallback));
}

export const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),

  // Observability
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

  // Fee curve, in parts-per-million and basis points
  FEE_BASE: intWithDefault(DEFAULT_FEE_PARAMETERS.baseFee),
  FEE_MIN: intWithDefault(DEFAULT_FEE_PARAMETERS.minFee),
  FEE_MAX: intWithDefault(DEFAULT_FEE_PARAMETERS.maxFee),
  FEE_DEADZONE_BPS: intWithDefault(DEFAULT_FEE_PARAMETERS.deadzoneBps),
  FEE_SLOPE_TOWARD: intWithDefault(DEFAULT_FEE_PARAMETERS.slopeToward),
  FEE_SLOPE_AWAY: intWithDefault(DEFAULT_FEE_PARAMETERS.slopeAway),
  FEE_ARB_TRIGGER_BPS: intWithDefault(DEFAULT_FEE_PARAMETERS.arbTriggerBps),

  // Reference price the pool should track, as a decimal string
  PEG_PRICE: DecimalPriceSchema.default('1'),
});

export type Env = z.infer<typeof EnvSchema>;

export type AppConfig = {
  nodeEnv: Env['NODE_ENV'];
  logLevel: NonNullable<Env['LOG_LEVEL']> | null;
  fees: FeeParameters;
  peg: {
    price: bigint;
  };
};

export function loadEnv(input: NodeJS.ProcessEnv = process.env): Env {
  return EnvSchema.parse(input);
}

/**
 * Load and validate configuration. Parameter ordering problems surface as
 * FeeEngineError (INVALID_PARAMETERS), a zero peg as INVALID_PRICE.
 */
export function loadConfig(input: NodeJS.ProcessEnv = process.env): AppConfig {
  const env = loadEnv(input);

  const pegPrice = parsePrice(env.PEG_PRICE);
  assertPositivePrice(pegPrice, 'PEG_PRICE');

  return {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL ?? null,
    fees: defineFeeParameters({
      baseFee: env.FEE_BASE,
      minFee: env.FEE_MIN,
      maxFee: env.FEE_MAX,
      deadzoneBps: env.FEE_DEADZONE_BPS,
      slopeToward: env.FEE_SLOPE_TOWARD,
      slopeAway: env.FEE_SLOPE_AWAY,
      arbTriggerBps: env.FEE_ARB_TRIGGER_BPS,
    }),
    peg: {
      price: pegPrice,
    },
  };
}
