import { describe, expect, it } from 'vitest';
import {
  DecimalPriceSchema,
  FeeParametersInputSchema,
  FeeQuoteRequestSchema,
  TradeDirectionSchema,
} from '../src/schemas';

const validParams = {
  baseFee: 3000,
  minFee: 500,
  maxFee: 10000,
  deadzoneBps: 25,
  slopeToward: 150,
  slopeAway: 1200,
  arbTriggerBps: 5000,
};

describe('DecimalPriceSchema', () => {
  it('accepts integers and decimals up to 18 places', () => {
    expect(DecimalPriceSchema.parse('1')).toBe('1');
    expect(DecimalPriceSchema.parse('1.000000000000000001')).toBe('1.000000000000000001');
  });

  it('trims surrounding whitespace', () => {
    expect(DecimalPriceSchema.parse(' 1.05 ')).toBe('1.05');
  });

  it('rejects signs, exponents and excess precision', () => {
    expect(DecimalPriceSchema.safeParse('-1').success).toBe(false);
    expect(DecimalPriceSchema.safeParse('1e18').success).toBe(false);
    expect(DecimalPriceSchema.safeParse('0.0000000000000000001').success).toBe(false);
  });
});

describe('TradeDirectionSchema', () => {
  it('accepts the two directions only', () => {
    expect(TradeDirectionSchema.parse('DECREASE')).toBe('DECREASE');
    expect(TradeDirectionSchema.parse('INCREASE')).toBe('INCREASE');
    expect(TradeDirectionSchema.safeParse('UP').success).toBe(false);
  });
});

describe('FeeParametersInputSchema', () => {
  it('accepts an ordered parameter set', () => {
    expect(FeeParametersInputSchema.parse(validParams)).toEqual(validParams);
  });

  it('rejects minFee above maxFee', () => {
    const result = FeeParametersInputSchema.safeParse({ ...validParams, minFee: 20000, baseFee: 20000 });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues.map((i) => i.message)).toContain('minFee must not exceed maxFee');
    }
  });

  it('rejects baseFee outside the clamp bounds', () => {
    const result = FeeParametersInputSchema.safeParse({ ...validParams, baseFee: 400 });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues.map((i) => i.path.join('.'))).toEqual(['baseFee']);
    }
  });

  it('rejects a trigger that does not exceed the dead-zone', () => {
    const result = FeeParametersInputSchema.safeParse({ ...validParams, arbTriggerBps: 25 });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe('arbTriggerBps must be greater than deadzoneBps');
    }
  });

  it('rejects negative slopes and fractional bps', () => {
    expect(FeeParametersInputSchema.safeParse({ ...validParams, slopeAway: -1 }).success).toBe(false);
    expect(FeeParametersInputSchema.safeParse({ ...validParams, deadzoneBps: 2.5 }).success).toBe(false);
  });

  it('rejects fees above 100%', () => {
    expect(FeeParametersInputSchema.safeParse({ ...validParams, maxFee: 1_000_001 }).success).toBe(false);
  });
});

describe('FeeQuoteRequestSchema', () => {
  it('accepts a well-formed request', () => {
    expect(
      FeeQuoteRequestSchema.parse({ poolPrice: '1.05', pegPrice: '1', direction: 'DECREASE' }),
    ).toEqual({ poolPrice: '1.05', pegPrice: '1', direction: 'DECREASE' });
  });
});
