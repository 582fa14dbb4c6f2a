/**
 * @pegfee/fees
 *
 * Asymmetric peg-aware swap fee derivation
 */

export { DEFAULT_FEE_PARAMETERS, defineFeeParameters } from './params';
export {
  assertPositivePrice,
  computeDeviationBps,
  computeFee,
  createFeeEngine,
  isTowardPeg,
} from './engine';
export { FeeEngineError, formatZodIssues, toFeeEngineError } from './errors';
export type { FeeEngineErrorCode } from './errors';
export {
  MAX_SQRT_PRICE,
  MIN_SQRT_PRICE,
  Q96,
  priceToSqrtPriceX96,
  sqrtBigInt,
  sqrtPriceX96ToPrice,
} from './sqrtPrice';
export { directionFromZeroForOne, parseFeeQuoteRequest } from './observation';
export { createPegFeeHook } from './hook';
export type { PegFeeHook, PegFeeHookOptions, SwapContext } from './hook';
export { previewFeeCurve } from './curve';
export type { FeeCurveOptions } from './curve';
export type {
  FeeCurveRow,
  FeeDiagnostics,
  FeeEngine,
  FeeParameters,
  FeeResult,
  FeeZone,
  PriceObservation,
  TradeDirection,
} from './types';
