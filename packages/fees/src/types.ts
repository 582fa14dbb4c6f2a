import type { TradeDirection, ValidatedFeeParameters } from '@pegfee/shared';

export type { TradeDirection };

/** A parameter set that has passed {@link defineFeeParameters}; plain objects do not type-check. */
export type FeeParameters = Readonly<ValidatedFeeParameters>;

export type PriceObservation = {
  /** Current pool price, 18-decimal fixed point */
  poolPrice: bigint;
  /** Reference (peg) price, same scale as poolPrice */
  pegPrice: bigint;
  /** Which way the pending trade pushes the pool price */
  direction: TradeDirection;
};

export type FeeZone = 'DEADZONE' | 'GRADUATED' | 'ARBITRAGE';

export type FeeDiagnostics = Readonly<{
  baseFee: number;
  /** Computed value before clamping, saturated to the uint24 fee range */
  unclampedFee: number;
  clampedFee: number;
  deviationBps: bigint;
  /** Whole percentage points beyond the dead-zone; 0n outside the graduated zone */
  pctUnits: bigint;
  toward: boolean;
  arbZone: boolean;
  zone: FeeZone;
}>;

export type FeeResult = {
  fee: number;
  diagnostics: FeeDiagnostics;
};

export type FeeEngine = {
  readonly params: FeeParameters;
  quote(observation: PriceObservation): FeeResult;
};

export type FeeCurveRow = {
  deviationBps: bigint;
  towardFee: number;
  awayFee: number;
  zone: FeeZone;
};
