import { z } from 'zod';
import { DecodeError } from '../errors.js';
import { fromAtomic, quote } from '../amm.js';
import {
  RayLogType,
  SwapBaseInLogLayout,
  SwapBaseOutLogLayout,
  SwapDirection,
} from '../markets/raydium/layout.js';
import type { PendingTrade, PoolState, TradeSource } from '../types.js';

const RAY_LOG_MARKER = 'ray_log: ';

const LogsNotificationSchema = z.object({
  jsonrpc: z.literal('2.0'),
  method: z.literal('logsNotification'),
  params: z.object({
    subscription: z.number(),
    result: z.object({
      context: z.object({ slot: z.number() }),
      value: z.object({
        signature: z.string(),
        err: z.unknown(),
        logs: z.array(z.string()).nullable(),
      }),
    }),
  }),
});

export type LogsNotification = z.infer<typeof LogsNotificationSchema>;

export type DecodeResult =
  | { kind: 'trade'; trade: PendingTrade }
  | { kind: 'unrelated' }
  | { kind: 'error'; error: DecodeError };

export type DecodedSwap = {
  direction: SwapDirection;
  amountIn: bigint;
  poolBase: bigint;
  poolQuote: bigint;
};

export type TradeMeta = {
  signature: string;
  initiator: string | null;
  source: TradeSource;
  observedAt: number;
};

/**
 * Returns the base64 ray_log payload emitted by `programId`, or null when the
 * logs never invoke the program.
 */
function findRayLog(logs: readonly string[], programId: string): string | null {
  const invoke = `Program ${programId} invoke`;
  let invoked = false;
  for (const line of logs) {
    if (line.startsWith(invoke)) {
      invoked = true;
      continue;
    }
    if (!invoked) continue;
    const at = line.indexOf(RAY_LOG_MARKER);
    if (at !== -1) {
      return line.slice(at + RAY_LOG_MARKER.length).trim();
    }
  }
  return null;
}

function toDirection(value: bigint): SwapDirection {
  if (value === 1n) return SwapDirection.QUOTE_TO_BASE;
  if (value === 2n) return SwapDirection.BASE_TO_QUOTE;
  throw new DecodeError(`unknown swap direction ${value}`);
}

/** Null for ray_log entries that are not swaps (deposits, withdrawals). */
function decodeRayLog(payload: string): DecodedSwap | null {
  const data = Buffer.from(payload, 'base64');
  if (data.length === 0) {
    throw new DecodeError('empty ray_log payload');
  }

  switch (data[0]) {
    case RayLogType.SWAP_BASE_IN: {
      if (data.length < SwapBaseInLogLayout.span) {
        throw new DecodeError(`truncated swap log (${data.length} bytes)`);
      }
      const log = SwapBaseInLogLayout.decode(data);
      return {
        direction: toDirection(log.direction),
        amountIn: log.amountIn,
        poolBase: log.poolCoin,
        poolQuote: log.poolPc,
      };
    }
    case RayLogType.SWAP_BASE_OUT: {
      if (data.length < SwapBaseOutLogLayout.span) {
        throw new DecodeError(`truncated swap log (${data.length} bytes)`);
      }
      const log = SwapBaseOutLogLayout.decode(data);
      return {
        direction: toDirection(log.direction),
        amountIn: log.deductIn,
        poolBase: log.poolCoin,
        poolQuote: log.poolPc,
      };
    }
    default:
      return null;
  }
}

function toPendingTrade(
  swap: DecodedSwap,
  pool: PoolState,
  meta: TradeMeta,
  feeRate: number,
): PendingTrade {
  if (swap.amountIn <= 0n) {
    throw new DecodeError(`swap ${meta.signature} has no input amount`);
  }

  const baseIn = swap.direction === SwapDirection.BASE_TO_QUOTE;
  const [reserveIn, reserveOut] = baseIn
    ? [swap.poolBase, swap.poolQuote]
    : [swap.poolQuote, swap.poolBase];

  // empty reserves leave the estimate to the evaluator
  const known = reserveIn > 0n && reserveOut > 0n;
  const estimatedPriceImpact = known
    ? quote(reserveIn, reserveOut, swap.amountIn, feeRate).priceImpact
    : 0;

  return {
    signature: meta.signature,
    initiator: meta.initiator,
    inputMint: baseIn ? pool.baseMint : pool.quoteMint,
    outputMint: baseIn ? pool.quoteMint : pool.baseMint,
    amountIn: fromAtomic(
      swap.amountIn,
      baseIn ? pool.baseDecimals : pool.quoteDecimals,
    ),
    poolId: pool.id,
    estimatedPriceImpact,
    observedAt: meta.observedAt,
    source: meta.source,
    ...(known
      ? {
          poolReserves: {
            base: fromAtomic(swap.poolBase, pool.baseDecimals),
            quote: fromAtomic(swap.poolQuote, pool.quoteDecimals),
          },
        }
      : {}),
  };
}

/**
 * Turns the log lines of one transaction into a pending trade on `pool`.
 * Returns null when the transaction did not swap on the amm.
 */
function decodeSwapLogs(
  logs: readonly string[],
  pool: PoolState,
  meta: TradeMeta,
  options: { programId: string; feeRate: number },
): PendingTrade | null {
  const payload = findRayLog(logs, options.programId);
  if (payload === null) return null;
  const swap = decodeRayLog(payload);
  if (swap === null) return null;
  return toPendingTrade(swap, pool, meta, options.feeRate);
}

class NotificationDecoder {
  private readonly subscriptions: Map<number, PoolState> = new Map();

  constructor(
    private readonly options: { programId: string; feeRate: number },
  ) {}

  bind(subscriptionId: number, pool: PoolState) {
    this.subscriptions.set(subscriptionId, pool);
  }

  decode(message: unknown, observedAt: number): DecodeResult {
    const parsed = LogsNotificationSchema.safeParse(message);
    if (!parsed.success) {
      return {
        kind: 'error',
        error: new DecodeError(
          `malformed logs notification: ${parsed.error.issues
            .map((issue) => `${issue.path.join('.')} ${issue.message}`)
            .join('; ')}`,
        ),
      };
    }

    const { subscription, result } = parsed.data.params;
    const pool = this.subscriptions.get(subscription);
    if (pool === undefined) {
      return {
        kind: 'error',
        error: new DecodeError(`notification for unknown subscription ${subscription}`),
      };
    }

    const { signature, err, logs } = result.value;
    if ((err !== null && err !== undefined) || logs === null) {
      return { kind: 'unrelated' };
    }

    try {
      const trade = decodeSwapLogs(
        logs,
        pool,
        { signature, initiator: null, source: 'stream', observedAt },
        this.options,
      );
      return trade === null ? { kind: 'unrelated' } : { kind: 'trade', trade };
    } catch (error) {
      if (error instanceof DecodeError) {
        return { kind: 'error', error };
      }
      throw error;
    }
  }
}

export { NotificationDecoder, decodeSwapLogs, decodeRayLog, findRayLog };
