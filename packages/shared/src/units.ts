/** Fee values are expressed in parts-per-million of the swap amount. */
export const FEE_UNITS_DENOMINATOR = 1_000_000;

/** Prices are 18-decimal fixed point. */
export const PRICE_DECIMALS = 18;
export const PRICE_SCALE = 10n ** 18n;

export const BPS_DENOMINATOR = 10_000n;
export const BPS_PER_PERCENT = 100n;
