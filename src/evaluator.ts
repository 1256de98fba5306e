import { fromAtomic, quote, toAtomic } from './amm.js';
import type { EvaluatorConfig } from './config.js';
import { InvalidInputError } from './errors.js';
import {
  OpportunityStatus,
  type Opportunity,
  type PendingTrade,
  type PoolState,
} from './types.js';

// pools deeper than this get full confidence on the depth axis
const CONFIDENT_LIQUIDITY = 100000;

export type OrientedPool = {
  reserveIn: number;
  reserveOut: number;
  decimalsIn: number;
  decimalsOut: number;
};

export type TradeSide = {
  poolId: string;
  inputMint: string;
};

/** Reserves seen from the input side, in UI units of each asset. */
function orient(side: TradeSide, pool: PoolState): OrientedPool {
  if (side.poolId !== pool.id) {
    throw new InvalidInputError(
      `trade is on pool ${side.poolId}, not ${pool.id}`,
      'poolId',
    );
  }

  const baseIn = side.inputMint === pool.baseMint;
  if (!baseIn && side.inputMint !== pool.quoteMint) {
    throw new InvalidInputError(
      `mint ${side.inputMint} is not traded on pool ${pool.id}`,
      'inputMint',
    );
  }

  // without reserves, liquidity stands in for the input side
  const reserves = baseIn
    ? {
        reserveIn: pool.baseReserve ?? pool.liquidity,
        reserveOut: pool.quoteReserve ?? pool.liquidity * pool.price,
      }
    : {
        reserveIn: pool.quoteReserve ?? pool.liquidity,
        reserveOut: pool.baseReserve ?? pool.liquidity / pool.price,
      };

  if (!(reserves.reserveIn > 0) || !(reserves.reserveOut > 0)) {
    throw new InvalidInputError(`pool ${pool.id} has no usable reserves`, 'reserves');
  }

  return {
    ...reserves,
    decimalsIn: baseIn ? pool.baseDecimals : pool.quoteDecimals,
    decimalsOut: baseIn ? pool.quoteDecimals : pool.baseDecimals,
  };
}

function confidenceOf(pool: PoolState): number {
  if (!(pool.liquidity > 0)) return 0;
  const turnover = pool.volume24h / pool.liquidity;
  const depth = pool.liquidity / CONFIDENT_LIQUIDITY;
  return Math.max(0, Math.min(turnover, depth, 1)) * 100;
}

/**
 * Scores a pending trade as a sandwich target. Always returns an opportunity;
 * rejected ones carry the reason.
 */
function assess(
  trade: PendingTrade,
  pool: PoolState,
  config: EvaluatorConfig,
): Opportunity {
  if (!(trade.amountIn > 0)) {
    throw new InvalidInputError(
      `trade ${trade.signature} has non-positive amount ${trade.amountIn}`,
      'amountIn',
    );
  }

  const { reserveIn, reserveOut, decimalsIn, decimalsOut } = orient(trade, pool);
  const atomicIn = toAtomic(reserveIn, decimalsIn);
  const atomicOut = toAtomic(reserveOut, decimalsOut);

  // sized off the pool's liquidity, whichever side the trade pays
  const frontRunAmount = Math.min(
    pool.liquidity * config.sizingFraction,
    config.maxPositionSize,
  );

  const rejected = (
    reason: string,
    fields: Partial<Opportunity> = {},
  ): Opportunity => ({
    targetSignature: trade.signature,
    poolId: pool.id,
    inputMint: trade.inputMint,
    outputMint: trade.outputMint,
    targetAmountIn: trade.amountIn,
    frontRunAmount,
    backRunAmount: 0,
    frontRunPriceImpact: 0,
    targetPriceImpact: 0,
    expectedProfit: 0,
    estimatedCost: config.estimatedFeeCost,
    netProfit: -config.estimatedFeeCost,
    confidence: 0,
    ...fields,
    status: OpportunityStatus.REJECTED,
    rejectReason: reason,
  });

  const frontRunAtomic = toAtomic(frontRunAmount, decimalsIn);
  if (frontRunAtomic <= 0n) {
    return rejected('front-run size rounds to zero');
  }

  const frontRun = quote(atomicIn, atomicOut, frontRunAtomic, config.feeRate);
  const backRunAmount = fromAtomic(frontRun.amountOut, decimalsOut);
  if (frontRun.priceImpact > config.maxSlippage) {
    return rejected(
      `front-run impact ${(frontRun.priceImpact * 100).toFixed(2)}% exceeds ${(config.maxSlippage * 100).toFixed(2)}%`,
      { backRunAmount, frontRunPriceImpact: frontRun.priceImpact },
    );
  }

  const targetAtomic = toAtomic(trade.amountIn, decimalsIn);
  const targetPriceImpact =
    trade.estimatedPriceImpact > 0
      ? trade.estimatedPriceImpact
      : targetAtomic > 0n
        ? quote(atomicIn, atomicOut, targetAtomic, config.feeRate).priceImpact
        : 0;

  // share of the combined flow the bracket owns, times the move it can keep
  const expectedProfit =
    frontRunAmount *
    targetPriceImpact *
    config.captureRatio *
    (frontRunAmount / (frontRunAmount + trade.amountIn));
  const netProfit = expectedProfit - config.estimatedFeeCost;

  const scored = {
    backRunAmount,
    frontRunPriceImpact: frontRun.priceImpact,
    targetPriceImpact,
    expectedProfit,
    netProfit,
  };

  if (netProfit <= config.minProfitThreshold) {
    return rejected(
      `net profit ${netProfit.toFixed(6)} below threshold ${config.minProfitThreshold}`,
      scored,
    );
  }

  return {
    targetSignature: trade.signature,
    poolId: pool.id,
    inputMint: trade.inputMint,
    outputMint: trade.outputMint,
    targetAmountIn: trade.amountIn,
    frontRunAmount,
    ...scored,
    estimatedCost: config.estimatedFeeCost,
    confidence: confidenceOf(pool),
    status: OpportunityStatus.ACCEPTED,
  };
}

/** Accepted opportunity for `trade`, or null when it is not worth bracketing. */
function evaluate(
  trade: PendingTrade,
  pool: PoolState,
  config: EvaluatorConfig,
): Opportunity | null {
  const opportunity = assess(trade, pool, config);
  return opportunity.status === OpportunityStatus.ACCEPTED ? opportunity : null;
}

export { assess, evaluate, orient };
