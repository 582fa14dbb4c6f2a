import { BPS_DENOMINATOR, BPS_PER_PERCENT, type FeeParametersInput } from '@pegfee/shared';
import { maxUint24 } from 'viem';

import { FeeEngineError } from './errors';
import { defineFeeParameters } from './params';
import type {
  FeeEngine,
  FeeParameters,
  FeeResult,
  FeeZone,
  PriceObservation,
  TradeDirection,
} from './types';

export function assertPositivePrice(price: bigint, label: string): void {
  if (price <= 0n) {
    throw new FeeEngineError({
      code: 'INVALID_PRICE',
      message: `${label} must be strictly positive`,
      issues: [`${label}: ${price.toString()}`],
    });
  }
}

/**
 * Absolute distance between pool and peg, in basis points of the peg.
 * Truncates toward zero.
 */
export function computeDeviationBps(poolPrice: bigint, pegPrice: bigint): bigint {
  assertPositivePrice(poolPrice, 'poolPrice');
  assertPositivePrice(pegPrice, 'pegPrice');
  const gap = poolPrice >= pegPrice ? poolPrice - pegPrice : pegPrice - poolPrice;
  return (gap * BPS_DENOMINATOR) / pegPrice;
}

/**
 * Whether a trade moving the price in `direction` narrows the gap to the peg.
 * At the peg every direction counts as toward.
 */
export function isTowardPeg(poolPrice: bigint, pegPrice: bigint, direction: TradeDirection): boolean {
  if (poolPrice === pegPrice) return true;
  return direction === 'DECREASE' ? pegPrice <= poolPrice : pegPrice >= poolPrice;
}

function resolveZone(
  deviationBps: bigint,
  toward: boolean,
  params: FeeParameters,
): { zone: FeeZone; pctUnits: bigint; unclamped: bigint } {
  const baseFee = BigInt(params.baseFee);

  if (deviationBps >= BigInt(params.arbTriggerBps)) {
    return {
      zone: 'ARBITRAGE',
      pctUnits: 0n,
      unclamped: BigInt(toward ? params.minFee : params.maxFee),
    };
  }

  if (deviationBps > BigInt(params.deadzoneBps)) {
    const pctUnits = (deviationBps - BigInt(params.deadzoneBps)) / BPS_PER_PERCENT;
    const magnitude = pctUnits * BigInt(toward ? params.slopeToward : params.slopeAway);
    let unclamped: bigint;
    if (toward) {
      unclamped = magnitude >= baseFee ? 0n : baseFee - magnitude;
    } else {
      unclamped = baseFee + magnitude;
    }
    return { zone: 'GRADUATED', pctUnits, unclamped };
  }

  return { zone: 'DEADZONE', pctUnits: 0n, unclamped: baseFee };
}

// The fee field is a uint24; saturate instead of wrapping.
function saturateFee(value: bigint): number {
  if (value <= 0n) return 0;
  if (value >= maxUint24) return Number(maxUint24);
  return Number(value);
}

function clampFee(value: number, params: FeeParameters): number {
  return Math.max(params.minFee, Math.min(params.maxFee, value));
}

/**
 * Derive the swap fee for one trade attempt.
 *
 * Pure: no I/O and no shared state. `params` is expected to come from
 * {@link defineFeeParameters}; prices are checked on every call.
 */
export function computeFee(observation: PriceObservation, params: FeeParameters): FeeResult {
  const { poolPrice, pegPrice, direction } = observation;

  const deviationBps = computeDeviationBps(poolPrice, pegPrice);
  const toward = isTowardPeg(poolPrice, pegPrice, direction);
  const { zone, pctUnits, unclamped } = resolveZone(deviationBps, toward, params);

  const unclampedFee = saturateFee(unclamped);
  const fee = clampFee(unclampedFee, params);

  return {
    fee,
    diagnostics: Object.freeze({
      baseFee: params.baseFee,
      unclampedFee,
      clampedFee: fee,
      deviationBps,
      pctUnits,
      toward,
      arbZone: zone === 'ARBITRAGE',
      zone,
    }),
  };
}

export function createFeeEngine(input: FeeParametersInput): FeeEngine {
  const params = defineFeeParameters(input);
  return {
    params,
    quote(observation: PriceObservation): FeeResult {
      return computeFee(observation, params);
    },
  };
}
