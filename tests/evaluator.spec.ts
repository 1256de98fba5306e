import { describe, it, expect } from 'vitest';
import { assess, evaluate } from '../src/evaluator.js';
import { InvalidInputError } from '../src/errors.js';
import { OpportunityStatus } from '../src/types.js';
import { USDC, evaluatorConfig, makePool, makeTrade } from './fixtures.js';

describe('evaluate', () => {
  it('accepts a large swap on a deep pool', () => {
    const opportunity = evaluate(makeTrade(), makePool(), evaluatorConfig);

    expect(opportunity).not.toBeNull();
    expect(opportunity?.status).toBe(OpportunityStatus.ACCEPTED);
    expect(opportunity?.frontRunAmount).toBeCloseTo(1000, 9);
    expect(opportunity?.targetPriceImpact).toBe(0.01);
    expect(opportunity?.expectedProfit).toBeCloseTo(0.8333333, 6);
    expect(opportunity?.netProfit).toBeCloseTo(0.8323333, 6);
    expect(opportunity?.estimatedCost).toBe(0.001);
    expect(opportunity?.confidence).toBeCloseTo(50, 9);
    expect(opportunity?.frontRunPriceImpact).toBeGreaterThan(0);
    expect(opportunity?.frontRunPriceImpact).toBeLessThan(0.05);
    expect(opportunity?.backRunAmount).toBeGreaterThan(24_900);
    expect(opportunity?.backRunAmount).toBeLessThan(25_000);
  });

  it('returns null when the net profit does not clear the threshold', () => {
    const config = { ...evaluatorConfig, minProfitThreshold: 1 };
    expect(evaluate(makeTrade(), makePool(), config)).toBeNull();
  });

  it('is a pure function of its inputs', () => {
    const trade = makeTrade();
    const pool = makePool();
    expect(evaluate(trade, pool, evaluatorConfig)).toEqual(
      evaluate(trade, pool, evaluatorConfig),
    );
  });

  it('caps the front-run at the maximum position size', () => {
    const config = { ...evaluatorConfig, maxPositionSize: 2 };
    const opportunity = assess(makeTrade(), makePool(), config);
    expect(opportunity.frontRunAmount).toBe(2);
    expect(opportunity.status).toBe(OpportunityStatus.REJECTED);
  });

  it('rejects a front-run that moves the price too far on its own', () => {
    const config = { ...evaluatorConfig, maxSlippage: 0.001 };
    const opportunity = assess(makeTrade(), makePool(), config);
    expect(opportunity.status).toBe(OpportunityStatus.REJECTED);
    expect(opportunity.rejectReason).toBe('front-run impact 0.20% exceeds 0.10%');
    expect(evaluate(makeTrade(), makePool(), config)).toBeNull();
  });

  it('falls back to liquidity and price when reserves are unknown', () => {
    const pool = makePool({ baseReserve: undefined, quoteReserve: undefined });
    const opportunity = evaluate(makeTrade(), pool, evaluatorConfig);
    expect(opportunity?.netProfit).toBeCloseTo(0.8323333, 6);
  });

  it('orients the pool for swaps paying the quote asset', () => {
    const trade = makeTrade({ inputMint: USDC, outputMint: makePool().baseMint, amountIn: 125_000 });
    const opportunity = evaluate(trade, makePool(), evaluatorConfig);
    expect(opportunity?.frontRunAmount).toBeCloseTo(1000, 9);
    // 1000 * 1% * 0.5 * 1000 / 126000, less the fee estimate
    expect(opportunity?.netProfit).toBeCloseTo(0.0386825, 6);
  });

  describe('front-run sizing', () => {
    const deepBase = makePool({ baseReserve: 4_000_000, liquidity: 1_000_000 });
    const thinLiquidity = makePool({ liquidity: 200_000 });
    const cases = [
      { name: 'base side, reserve above liquidity', pool: deepBase, trade: makeTrade() },
      {
        name: 'quote side, reserve above liquidity',
        pool: deepBase,
        trade: makeTrade({ inputMint: USDC, outputMint: deepBase.baseMint, amountIn: 125_000 }),
      },
      { name: 'base side, thin liquidity', pool: thinLiquidity, trade: makeTrade() },
      {
        name: 'quote side, thin liquidity',
        pool: thinLiquidity,
        trade: makeTrade({ inputMint: USDC, outputMint: thinLiquidity.baseMint, amountIn: 50 }),
      },
    ];

    it.each(cases)('stays within liquidity and position limits ($name)', ({ pool, trade }) => {
      for (const maxPositionSize of [2, 150, 5000]) {
        const config = { ...evaluatorConfig, maxPositionSize };
        const bound = Math.min(pool.liquidity * config.sizingFraction, maxPositionSize);
        const opportunity = assess(trade, pool, config);
        expect(opportunity.frontRunAmount).toBeLessThanOrEqual(bound);
        expect(opportunity.frontRunAmount).toBe(bound);
      }
    });
  });

  it('prices the target itself when no impact estimate came with it', () => {
    const opportunity = assess(
      makeTrade({ estimatedPriceImpact: 0 }),
      makePool(),
      evaluatorConfig,
    );
    expect(opportunity.targetPriceImpact).toBeCloseTo(0.0099, 3);
  });

  it('refuses trades that do not belong to the pool', () => {
    expect(() =>
      assess(makeTrade({ poolId: 'another-pool' }), makePool(), evaluatorConfig),
    ).toThrow(InvalidInputError);
    expect(() =>
      assess(makeTrade({ inputMint: 'unknown-mint' }), makePool(), evaluatorConfig),
    ).toThrow(InvalidInputError);
    expect(() =>
      assess(makeTrade({ amountIn: 0 }), makePool(), evaluatorConfig),
    ).toThrow(InvalidInputError);
  });
});
