import { PRICE_SCALE } from '@pegfee/shared';

import { FeeEngineError } from './errors';
import { assertPositivePrice } from './engine';

export const Q96 = 1n << 96n;
const Q192 = Q96 * Q96;

/** Bounds of a Q64.96 square-root price, matching the pool's tick range. */
export const MIN_SQRT_PRICE = 4295128739n;
export const MAX_SQRT_PRICE = 1461446703485210103287273052203988822378723970342n;

/**
 * Floor square root by Newton's method.
 */
export function sqrtBigInt(value: bigint): bigint {
  if (value < 0n) {
    throw new RangeError('square root of negative value');
  }
  let x = value;
  let y = (x + 1n) >> 1n;
  while (y < x) {
    x = y;
    y = (x + value / x) >> 1n;
  }
  return x;
}

function assertSqrtPriceInRange(sqrtPriceX96: bigint): void {
  if (sqrtPriceX96 < MIN_SQRT_PRICE || sqrtPriceX96 > MAX_SQRT_PRICE) {
    throw new FeeEngineError({
      code: 'INVALID_PRICE',
      message: 'sqrtPriceX96 out of range',
      issues: [`sqrtPriceX96: ${sqrtPriceX96.toString()}`],
    });
  }
}

/**
 * Convert an 18-decimal price (token1 per token0) to Q64.96 square-root form.
 */
export function priceToSqrtPriceX96(price: bigint): bigint {
  assertPositivePrice(price, 'price');
  const sqrtPriceX96 = sqrtBigInt((price * Q192) / PRICE_SCALE);
  assertSqrtPriceInRange(sqrtPriceX96);
  return sqrtPriceX96;
}

/**
 * Convert a Q64.96 square-root price back to 18-decimal fixed point (floored).
 */
export function sqrtPriceX96ToPrice(sqrtPriceX96: bigint): bigint {
  assertSqrtPriceInRange(sqrtPriceX96);
  const price = (sqrtPriceX96 * sqrtPriceX96 * PRICE_SCALE) / Q192;
  if (price === 0n) {
    throw new FeeEngineError({
      code: 'INVALID_PRICE',
      message: 'price below fixed-point resolution',
      issues: [`sqrtPriceX96: ${sqrtPriceX96.toString()}`],
    });
  }
  return price;
}
