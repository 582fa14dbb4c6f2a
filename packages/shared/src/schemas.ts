import { z } from 'zod';

import { FEE_UNITS_DENOMINATOR, PRICE_DECIMALS } from './units';

export const DecimalPriceSchema = z
  .string()
  .trim()
  .regex(
    new RegExp(`^[0-9]+(\\.[0-9]{1,${PRICE_DECIMALS}})?$`),
    `Expected a decimal price with at most ${PRICE_DECIMALS} fractional digits`,
  );

export const TradeDirectionSchema = z.enum(['DECREASE', 'INCREASE']);
export type TradeDirection = z.infer<typeof TradeDirectionSchema>;

const FeeUnitsSchema = z.number().int().min(0).max(FEE_UNITS_DENOMINATOR);
const NonNegativeIntSchema = z.number().int().nonnegative().safe();

export const FeeParametersInputSchema = z
  .object({
    baseFee: FeeUnitsSchema,
    minFee: FeeUnitsSchema,
    maxFee: FeeUnitsSchema,
    deadzoneBps: NonNegativeIntSchema,
    slopeToward: NonNegativeIntSchema,
    slopeAway: NonNegativeIntSchema,
    arbTriggerBps: NonNegativeIntSchema,
  })
  .superRefine((params, ctx) => {
    if (params.minFee > params.maxFee) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['minFee'],
        message: 'minFee must not exceed maxFee',
      });
    }
    if (params.baseFee < params.minFee || params.baseFee > params.maxFee) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['baseFee'],
        message: 'baseFee must lie within [minFee, maxFee]',
      });
    }
    // A trigger inside the dead-zone would shadow it.
    if (params.arbTriggerBps <= params.deadzoneBps) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['arbTriggerBps'],
        message: 'arbTriggerBps must be greater than deadzoneBps',
      });
    }
  });

export type FeeParametersInput = z.input<typeof FeeParametersInputSchema>;

/** Output of a successful parse; only obtainable through the schema. */
export const ValidatedFeeParametersSchema = FeeParametersInputSchema.brand<'FeeParameters'>();
export type ValidatedFeeParameters = z.output<typeof ValidatedFeeParametersSchema>;

export const FeeQuoteRequestSchema = z.object({
  poolPrice: DecimalPriceSchema,
  pegPrice: DecimalPriceSchema,
  direction: TradeDirectionSchema,
});

export type FeeQuoteRequest = z.infer<typeof FeeQuoteRequestSchema>;
