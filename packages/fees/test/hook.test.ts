import { createLogger } from '@pegfee/shared/server';
import { describe, expect, it } from 'vitest';

import { DEFAULT_FEE_PARAMETERS, FeeEngineError, Q96, createPegFeeHook, priceToSqrtPriceX96 } from '../src';

const ONE = 10n ** 18n;

function createCapturingLogger() {
  const lines: Record<string, unknown>[] = [];
  const logger = createLogger({
    environment: 'test',
    level: 'debug',
    destination: {
      write(msg: string) {
        const parsed: Record<string, unknown> = JSON.parse(msg);
        lines.push(parsed);
      },
    },
  });
  return { lines, logger };
}

describe('createPegFeeHook', () => {
  const sqrtPriceAbovePeg = priceToSqrtPriceX96((ONE * 105n) / 100n);

  it('discounts swaps that push the price back to the peg', () => {
    const { logger } = createCapturingLogger();
    const hook = createPegFeeHook({ params: DEFAULT_FEE_PARAMETERS, pegPrice: ONE, logger });

    const result = hook.beforeSwap({ sqrtPriceX96: sqrtPriceAbovePeg, zeroForOne: true });
    expect(result.fee).toBe(2400);
    expect(result.diagnostics.toward).toBe(true);
    expect(result.diagnostics.pctUnits).toBe(4n);
  });

  it('surcharges swaps that push the price further away', () => {
    const { logger } = createCapturingLogger();
    const hook = createPegFeeHook({ params: DEFAULT_FEE_PARAMETERS, pegPrice: ONE, logger });

    const result = hook.beforeSwap({ sqrtPriceX96: sqrtPriceAbovePeg, zeroForOne: false });
    expect(result.fee).toBe(7800);
    expect(result.diagnostics.toward).toBe(false);
  });

  it('logs a structured fee_quote record per swap', () => {
    const { lines, logger } = createCapturingLogger();
    const hook = createPegFeeHook({ params: DEFAULT_FEE_PARAMETERS, pegPrice: ONE, logger });

    hook.beforeSwap({ sqrtPriceX96: Q96, zeroForOne: true });
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 'debug',
      component: 'peg-fee-hook',
      event: 'fee_quote',
      poolPrice: '1000000000000000000',
      pegPrice: '1000000000000000000',
      direction: 'DECREASE',
      fee: 3000,
      unclampedFee: 3000,
      deviationBps: '0',
      pctUnits: '0',
      toward: true,
      zone: 'DEADZONE',
    });
  });

  it('logs and rethrows invalid pool prices', () => {
    const { lines, logger } = createCapturingLogger();
    const hook = createPegFeeHook({ params: DEFAULT_FEE_PARAMETERS, pegPrice: ONE, logger });

    expect(() => hook.beforeSwap({ sqrtPriceX96: 0n, zeroForOne: true })).toThrow(FeeEngineError);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 'error',
      event: 'error',
      code: 'INVALID_PRICE',
      sqrtPriceX96: '0',
      msg: 'sqrtPriceX96 out of range',
    });
  });

  it('rethrows foreign errors unchanged after logging them', () => {
    const lines: Record<string, unknown>[] = [];
    const logger = createLogger({
      environment: 'test',
      level: 'debug',
      destination: {
        write(msg: string) {
          if (msg.includes('"fee_quote"')) throw new RangeError('sink_full');
          const parsed: Record<string, unknown> = JSON.parse(msg);
          lines.push(parsed);
        },
      },
    });
    const hook = createPegFeeHook({ params: DEFAULT_FEE_PARAMETERS, pegPrice: ONE, logger });

    let thrown: unknown;
    try {
      hook.beforeSwap({ sqrtPriceX96: Q96, zeroForOne: true });
    } catch (err) {
      thrown = err;
    }
    expect(thrown).toBeInstanceOf(RangeError);
    expect(thrown).not.toBeInstanceOf(FeeEngineError);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 'error',
      error: { name: 'RangeError', message: 'sink_full' },
      sqrtPriceX96: Q96.toString(),
    });
    expect(lines[0]).not.toHaveProperty('code');
  });

  it('validates configuration at construction', () => {
    expect(() =>
      createPegFeeHook({ params: { ...DEFAULT_FEE_PARAMETERS, maxFee: 100 }, pegPrice: ONE }),
    ).toThrow('invalid_fee_parameters');
    expect(() => createPegFeeHook({ params: DEFAULT_FEE_PARAMETERS, pegPrice: 0n })).toThrow(
      'pegPrice must be strictly positive',
    );
  });

  it('exposes the frozen configuration', () => {
    const hook = createPegFeeHook({ params: DEFAULT_FEE_PARAMETERS, pegPrice: 2n * ONE });
    expect(hook.pegPrice).toBe(2n * ONE);
    expect(hook.params).toEqual(DEFAULT_FEE_PARAMETERS);
    expect(Object.isFrozen(hook.params)).toBe(true);
  });
});
