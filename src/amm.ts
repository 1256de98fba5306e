import { InvalidInputError } from './errors.js';
import { toDecimalString } from './utils.js';

// fee rates are applied as a fixed point numerator over this scale
const FEE_SCALE = 1_000_000n;
const IMPACT_SCALE = 10n ** 18n;

export type Quote = {
  amountOut: bigint;
  priceImpact: number;
};

export type Reserves = {
  reserveIn: bigint;
  reserveOut: bigint;
};

function feeKeepNumerator(feeRate: number): bigint {
  if (!Number.isFinite(feeRate) || feeRate < 0 || feeRate >= 1) {
    throw new InvalidInputError(`fee rate ${feeRate} out of range`, 'feeRate');
  }
  return FEE_SCALE - BigInt(Math.round(feeRate * Number(FEE_SCALE)));
}

/**
 * Constant product quote. Output is rounded down, never in the trader's
 * favour. Price impact compares reserveOut / reserveIn before and after the
 * swap, with the full input (fee included) left in the pool.
 */
function quote(
  reserveIn: bigint,
  reserveOut: bigint,
  amountIn: bigint,
  feeRate: number,
): Quote {
  if (amountIn <= 0n) {
    throw new InvalidInputError(
      `amountIn must be positive, got ${amountIn}`,
      'amountIn',
    );
  }
  if (reserveIn + amountIn <= 0n) {
    throw new InvalidInputError('reserveIn + amountIn must be positive', 'reserveIn');
  }
  if (reserveIn <= 0n || reserveOut <= 0n) {
    throw new InvalidInputError(
      `pool reserves must be positive, got ${reserveIn}/${reserveOut}`,
      'reserves',
    );
  }

  const effectiveIn = (amountIn * feeKeepNumerator(feeRate)) / FEE_SCALE;
  const amountOut = (reserveOut * effectiveIn) / (reserveIn + effectiveIn);

  // priceAfter / priceBefore = (rOut' * rIn) / (rIn' * rOut) and is always < 1
  const ratio =
    ((reserveOut - amountOut) * reserveIn * IMPACT_SCALE) /
    ((reserveIn + amountIn) * reserveOut);
  const priceImpact = Number(IMPACT_SCALE - ratio) / Number(IMPACT_SCALE);

  return { amountOut, priceImpact };
}

/** Quotes a swap and returns the reserves the pool is left with. */
function applySwap(
  reserves: Reserves,
  amountIn: bigint,
  feeRate: number,
): { quote: Quote; reserves: Reserves } {
  const result = quote(reserves.reserveIn, reserves.reserveOut, amountIn, feeRate);
  return {
    quote: result,
    reserves: {
      reserveIn: reserves.reserveIn + amountIn,
      reserveOut: reserves.reserveOut - result.amountOut,
    },
  };
}

function flip(reserves: Reserves): Reserves {
  return { reserveIn: reserves.reserveOut, reserveOut: reserves.reserveIn };
}

/** UI amount to atomic units, rounded to `decimals` places. */
function toAtomic(amount: number, decimals: number): bigint {
  // toFixed switches to exponent notation from 1e21
  if (!Number.isFinite(amount) || amount < 0 || amount >= 1e21) {
    throw new InvalidInputError(`cannot convert ${amount} to atomic units`, 'amount');
  }
  const [whole, fraction = ''] = amount.toFixed(decimals).split('.');
  return BigInt(whole + fraction);
}

function fromAtomic(amount: bigint, decimals: number): number {
  return Number(toDecimalString(amount.toString(), decimals));
}

export { quote, applySwap, flip, toAtomic, fromAtomic };
