import { pino } from 'pino';
import { z } from 'zod';
import { Keypair, type VersionedTransaction } from '@solana/web3.js';
import { RAYDIUM_AMM_PROGRAM_ID } from '../src/constants.js';
import { TransportError } from '../src/errors.js';
import type { CandidateSource } from '../src/mempool/candidates.js';
import type { LogStream, LogStreamHandlers } from '../src/mempool/log-stream.js';
import type { EvaluatorConfig, BuilderConfig } from '../src/config.js';
import { derivePoolKeys } from '../src/markets/raydium/index.js';
import { RayLogType, SwapBaseInLogLayout } from '../src/markets/raydium/layout.js';
import type { PendingTrade, PoolState } from '../src/types.js';
import type { SigningIdentity } from '../src/clients/wallet.js';

export const silentLogger = pino({ level: 'silent' });

const LEVELS = { debug: 20, info: 30, warn: 40, error: 50 } as const;
const LogLineSchema = z.object({ level: z.number(), msg: z.string().optional() });

/** A logger that keeps what it writes, for asserting on warnings. */
export function captureLogger() {
  const lines: z.infer<typeof LogLineSchema>[] = [];
  const logger = pino(
    { level: 'debug' },
    {
      write(line: string) {
        lines.push(LogLineSchema.parse(JSON.parse(line)));
      },
    },
  );
  const messages = (level: keyof typeof LEVELS) =>
    lines
      .filter((line) => line.level === LEVELS[level])
      .map((line) => line.msg ?? '');
  return { logger, messages };
}

export const SOL = 'So11111111111111111111111111111111111111112';
export const USDC = 'EPjFWdd5AufqSSqeM2qN1xzybapC8G4wEGGkZwyTDt1v';

const keys = derivePoolKeys('test-sol-usdc');

export function makePool(overrides: Partial<PoolState> = {}): PoolState {
  return {
    id: keys.id,
    baseMint: SOL,
    quoteMint: USDC,
    baseSymbol: 'SOL',
    quoteSymbol: 'USDC',
    baseDecimals: 9,
    quoteDecimals: 6,
    baseReserve: 1_000_000,
    quoteReserve: 25_000_000,
    liquidity: 1_000_000,
    volume24h: 500_000,
    price: 25,
    lastRefreshed: 0,
    keys,
    ...overrides,
  };
}

export function makeTrade(overrides: Partial<PendingTrade> = {}): PendingTrade {
  return {
    signature: 'target-signature',
    initiator: null,
    inputMint: SOL,
    outputMint: USDC,
    amountIn: 5000,
    poolId: keys.id,
    estimatedPriceImpact: 0.01,
    observedAt: 1_000,
    source: 'stream',
    ...overrides,
  };
}

const PROGRAM = RAYDIUM_AMM_PROGRAM_ID.toBase58();

/** Log lines of a transaction that swapped `amountIn` on the test pool. */
export function swapLogLines(amountIn: bigint, direction = 2n): string[] {
  const data = Buffer.alloc(SwapBaseInLogLayout.span);
  SwapBaseInLogLayout.encode(
    {
      logType: RayLogType.SWAP_BASE_IN,
      amountIn,
      minimumOut: 0n,
      direction,
      userSource: 0n,
      poolCoin: 10n ** 15n,
      poolPc: 25n * 10n ** 12n,
      outAmount: 0n,
    },
    data,
  );
  return [
    `Program ${PROGRAM} invoke [1]`,
    `Program log: ray_log: ${data.toString('base64')}`,
    `Program ${PROGRAM} success`,
  ];
}

export function swapNotification(subscription: number, signature: string) {
  return {
    jsonrpc: '2.0',
    method: 'logsNotification',
    params: {
      subscription,
      result: {
        context: { slot: 1 },
        value: { signature, err: null, logs: swapLogLines(5_000_000_000n) },
      },
    },
  };
}

export function sequence(...values: number[]): () => number {
  return () => values.shift() ?? 0;
}

export const evaluatorConfig: EvaluatorConfig = {
  minProfitThreshold: 0.001,
  maxPositionSize: 5000,
  maxSlippage: 0.05,
  sizingFraction: 0.001,
  captureRatio: 0.5,
  feeRate: 0.0025,
  estimatedFeeCost: 0.001,
};

export const builderConfig: BuilderConfig = {
  feeRate: 0.0025,
  minProfitRatio: 0.01,
  slippageTolerance: 0.02,
  priorityFeeMicroLamports: 0,
};

export class TestIdentity implements SigningIdentity {
  readonly keypair = Keypair.generate();
  signed = 0;

  get publicKey() {
    return this.keypair.publicKey;
  }

  sign(transaction: VersionedTransaction) {
    this.signed++;
    transaction.sign([this.keypair]);
  }
}

// any 32 byte base58 string works as a blockhash for compiling messages
export const BLOCKHASH = Keypair.generate().publicKey.toBase58();

export class FakeLogStream implements LogStream {
  private handlers: LogStreamHandlers | null = null;
  readonly subscribed: string[] = [];
  closed = 0;

  constructor(private readonly acknowledge = true) {}

  async connect(handlers: LogStreamHandlers) {
    this.handlers = handlers;
  }

  subscribe(address: string): Promise<number> {
    this.subscribed.push(address);
    if (!this.acknowledge) return new Promise(() => {});
    return Promise.resolve(this.subscribed.length);
  }

  close() {
    this.closed++;
  }

  emit(message: unknown) {
    this.handlers?.onNotification(message);
  }

  drop() {
    this.handlers?.onClose(new TransportError('log stream closed (1006)'));
  }
}

export class ScriptedCandidates implements CandidateSource {
  calls = 0;

  constructor(private readonly batches: PendingTrade[][]) {}

  async next(): Promise<PendingTrade[]> {
    this.calls++;
    return this.batches.shift() ?? [];
  }
}
