import { FeeQuoteRequestSchema, parsePrice } from '@pegfee/shared';

import { assertPositivePrice } from './engine';
import { FeeEngineError, formatZodIssues } from './errors';
import type { PriceObservation, TradeDirection } from './types';

/**
 * Selling token0 (zeroForOne) lowers the token1/token0 price.
 */
export function directionFromZeroForOne(zeroForOne: boolean): TradeDirection {
  return zeroForOne ? 'DECREASE' : 'INCREASE';
}

/**
 * Build an observation from decimal-string prices, e.g. a request body.
 */
export function parseFeeQuoteRequest(input: unknown): PriceObservation {
  const parsed = FeeQuoteRequestSchema.safeParse(input);
  if (!parsed.success) {
    throw new FeeEngineError({
      code: 'INVALID_PRICE',
      message: 'invalid_fee_quote_request',
      issues: formatZodIssues(parsed.error),
      cause: parsed.error,
    });
  }

  const poolPrice = parsePrice(parsed.data.poolPrice);
  const pegPrice = parsePrice(parsed.data.pegPrice);
  assertPositivePrice(poolPrice, 'poolPrice');
  assertPositivePrice(pegPrice, 'pegPrice');

  return { poolPrice, pegPrice, direction: parsed.data.direction };
}
