import { ValidatedFeeParametersSchema, type FeeParametersInput } from '@pegfee/shared';

import { FeeEngineError, formatZodIssues } from './errors';
import type { FeeParameters } from './types';

/**
 * Validate a parameter set once, at configuration time.
 * The returned object is frozen; the engine does not re-check it per call.
 */
export function defineFeeParameters(input: FeeParametersInput): FeeParameters {
  const parsed = ValidatedFeeParametersSchema.safeParse(input);
  if (!parsed.success) {
    throw new FeeEngineError({
      code: 'INVALID_PARAMETERS',
      message: 'invalid_fee_parameters',
      issues: formatZodIssues(parsed.error),
      cause: parsed.error,
    });
  }
  return Object.freeze(parsed.data);
}

/**
 * Default curve: 0.30% base, 0.05%..1.00% bounds, 25 bps dead-zone,
 * and a steeper penalty for trades that push the price away from the peg.
 */
export const DEFAULT_FEE_PARAMETERS: FeeParameters = defineFeeParameters({
  baseFee: 3000,
  minFee: 500,
  maxFee: 10000,
  deadzoneBps: 25,
  slopeToward: 150,
  slopeAway: 1200,
  arbTriggerBps: 5000,
});
