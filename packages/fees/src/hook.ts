import type { FeeParametersInput } from '@pegfee/shared';
import { getLogger, logError, logFeeQuote, type AppLogger } from '@pegfee/shared/server';

import { assertPositivePrice, createFeeEngine } from './engine';
import { toFeeEngineError } from './errors';
import { directionFromZeroForOne } from './observation';
import { sqrtPriceX96ToPrice } from './sqrtPrice';
import type { FeeParameters, FeeResult } from './types';

export type PegFeeHookOptions = {
  params: FeeParametersInput;
  /** Reference price, 18-decimal fixed point. Fixed for the hook's lifetime. */
  pegPrice: bigint;
  logger?: AppLogger;
};

export type SwapContext = {
  /** Pool price before the swap, Q64.96 square-root form */
  sqrtPriceX96: bigint;
  zeroForOne: boolean;
};

export type PegFeeHook = {
  readonly params: FeeParameters;
  readonly pegPrice: bigint;
  beforeSwap(context: SwapContext): FeeResult;
};

/**
 * Swap-execution boundary: validates configuration once, then prices each
 * swap from the pool's square-root price and the fixed peg.
 */
export function createPegFeeHook(options: PegFeeHookOptions): PegFeeHook {
  const engine = createFeeEngine(options.params);
  const pegPrice = options.pegPrice;
  assertPositivePrice(pegPrice, 'pegPrice');

  const log = (options.logger ?? getLogger()).child({ component: 'peg-fee-hook' });

  return {
    params: engine.params,
    pegPrice,

    beforeSwap(context: SwapContext): FeeResult {
      try {
        const poolPrice = sqrtPriceX96ToPrice(context.sqrtPriceX96);
        const direction = directionFromZeroForOne(context.zeroForOne);
        const result = engine.quote({ poolPrice, pegPrice, direction });

        logFeeQuote(log, {
          poolPrice: poolPrice.toString(),
          pegPrice: pegPrice.toString(),
          direction,
          fee: result.fee,
          unclampedFee: result.diagnostics.unclampedFee,
          deviationBps: result.diagnostics.deviationBps.toString(),
          pctUnits: result.diagnostics.pctUnits.toString(),
          toward: result.diagnostics.toward,
          zone: result.diagnostics.zone,
        });

        return result;
      } catch (err) {
        const mapped = toFeeEngineError(err);
        if (mapped) {
          logError(log, mapped, { code: mapped.code, sqrtPriceX96: context.sqrtPriceX96.toString() });
          throw mapped;
        }
        if (err instanceof Error) {
          logError(log, err, { sqrtPriceX96: context.sqrtPriceX96.toString() });
        }
        throw err;
      }
    },
  };
}
