import { formatUnits, parseUnits } from 'viem';

import { DecimalPriceSchema } from './schemas';
import { BPS_PER_PERCENT, FEE_UNITS_DENOMINATOR, PRICE_DECIMALS } from './units';

export function formatDecimalFromRatio(input: {
  numerator: bigint;
  denominator: bigint;
  decimals: number;
}): string {
  if (input.denominator === 0n) {
    throw new RangeError('denominator must be non-zero');
  }
  const negative = (input.numerator < 0n) !== (input.denominator < 0n) && input.numerator !== 0n;
  const numerator = input.numerator < 0n ? -input.numerator : input.numerator;
  const denominator = input.denominator < 0n ? -input.denominator : input.denominator;
  const scale = 10n ** BigInt(input.decimals);
  const value = (numerator * scale) / denominator;
  const intPart = value / scale;
  const fracPart = value % scale;
  const frac = fracPart
    .toString()
    .padStart(input.decimals, '0')
    .replace(/0+$/, '');
  const sign = negative ? '-' : '';
  return frac.length === 0 ? `${sign}${intPart.toString()}` : `${sign}${intPart.toString()}.${frac}`;
}

/**
 * Format a fee in parts-per-million as a percentage, e.g. 3000 => "0.30%".
 */
export function formatFeeDisplay(feeUnits: number): string {
  const percent = (feeUnits * 100) / FEE_UNITS_DENOMINATOR;
  return `${percent.toFixed(2)}%`;
}

/**
 * Format a deviation in basis points as a percentage, e.g. 25n => "0.25%".
 */
export function formatDeviation(deviationBps: bigint): string {
  return `${formatDecimalFromRatio({ numerator: deviationBps, denominator: BPS_PER_PERCENT, decimals: 2 })}%`;
}

export function formatPrice(price: bigint): string {
  return formatUnits(price, PRICE_DECIMALS);
}

/**
 * Parse a decimal price string into 18-decimal fixed point.
 * Throws a ZodError on malformed input.
 */
export function parsePrice(value: string): bigint {
  return parseUnits(DecimalPriceSchema.parse(value), PRICE_DECIMALS);
}
