import { BPS_DENOMINATOR, PRICE_SCALE } from '@pegfee/shared';

import { computeFee } from './engine';
import { FeeEngineError } from './errors';
import type { FeeCurveRow, FeeParameters } from './types';

export type FeeCurveOptions = {
  maxDeviationBps: number;
  stepBps: number;
  /** Defaults to 1.0 */
  pegPrice?: bigint;
};

/**
 * Sample the fee curve for pool prices at and above the peg.
 * A price above the peg makes a DECREASE trade toward and an INCREASE trade away.
 */
export function previewFeeCurve(params: FeeParameters, options: FeeCurveOptions): FeeCurveRow[] {
  const issues: string[] = [];
  if (!Number.isSafeInteger(options.stepBps) || options.stepBps <= 0) {
    issues.push('stepBps: must be a positive integer');
  }
  if (!Number.isSafeInteger(options.maxDeviationBps) || options.maxDeviationBps < 0) {
    issues.push('maxDeviationBps: must be a non-negative integer');
  }
  if (issues.length > 0) {
    throw new FeeEngineError({ code: 'INVALID_PARAMETERS', message: 'invalid_curve_options', issues });
  }

  const pegPrice = options.pegPrice ?? PRICE_SCALE;
  const rows: FeeCurveRow[] = [];

  for (let bps = 0; bps <= options.maxDeviationBps; bps += options.stepBps) {
    const poolPrice = pegPrice + (pegPrice * BigInt(bps)) / BPS_DENOMINATOR;
    const toward = computeFee({ poolPrice, pegPrice, direction: 'DECREASE' }, params);
    const away = computeFee({ poolPrice, pegPrice, direction: 'INCREASE' }, params);
    rows.push({
      deviationBps: toward.diagnostics.deviationBps,
      towardFee: toward.fee,
      awayFee: away.fee,
      zone: toward.diagnostics.zone,
    });
  }

  return rows;
}
