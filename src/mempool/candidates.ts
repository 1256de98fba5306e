import { randomBytes } from 'crypto';
import bs58 from 'bs58';
import { Keypair } from '@solana/web3.js';
import { DecodeError, TransportError } from '../errors.js';
import type { Logger } from '../logger.js';
import type { PendingTrade, PoolState } from '../types.js';
import { decodeSwapLogs } from './decoder.js';

/** Where the feed looks for trades once the log stream is gone. */
export interface CandidateSource {
  next(pools: readonly PoolState[], signal: AbortSignal): Promise<PendingTrade[]>;
}

export type TransactionLogs = {
  logs: string[];
  feePayer: string | null;
  failed: boolean;
};

/** Lookups reject with a TransportError when the node cannot answer. */
export interface SwapHistory {
  /** Newest first, stopping before `until` when given. */
  recentSignatures(
    address: string,
    until: string | undefined,
    limit: number,
  ): Promise<string[]>;
  transactionLogs(signature: string): Promise<TransactionLogs | null>;
}

type RecentSwapCandidatesOptions = {
  history: SwapHistory;
  programId: string;
  feeRate: number;
  logger: Logger;
  limit?: number;
  now?: () => number;
};

/**
 * Reads the swaps that landed on each pool since the previous tick. The first
 * tick for a pool only records where to resume from. A pool's cursor only
 * moves once all of its new swaps have been read, so a pool that fails is
 * read again from the same place next tick.
 */
class RecentSwapCandidates implements CandidateSource {
  private readonly cursors: Map<string, string> = new Map();
  private readonly primed: Set<string> = new Set();

  constructor(private readonly options: RecentSwapCandidatesOptions) {}

  async next(
    pools: readonly PoolState[],
    signal: AbortSignal,
  ): Promise<PendingTrade[]> {
    const trades: PendingTrade[] = [];

    for (const pool of pools) {
      if (signal.aborted) break;
      try {
        trades.push(...(await this.poolTrades(pool, signal)));
      } catch (error) {
        if (!(error instanceof TransportError)) throw error;
        this.options.logger.warn({ err: error, pool: pool.id }, 'swap history unavailable');
      }
    }

    return trades;
  }

  private async poolTrades(
    pool: PoolState,
    signal: AbortSignal,
  ): Promise<PendingTrade[]> {
    const { logger } = this.options;
    const now = this.options.now ?? Date.now;

    const signatures = await this.options.history.recentSignatures(
      pool.id,
      this.cursors.get(pool.id),
      this.options.limit ?? 20,
    );
    if (!this.primed.has(pool.id)) {
      this.commit(pool.id, signatures);
      this.primed.add(pool.id);
      return [];
    }

    const trades: PendingTrade[] = [];
    // oldest first
    for (const signature of [...signatures].reverse()) {
      if (signal.aborted) return [];
      const transaction = await this.options.history.transactionLogs(signature);
      if (transaction === null || transaction.failed) continue;

      try {
        const trade = decodeSwapLogs(
          transaction.logs,
          pool,
          {
            signature,
            initiator: transaction.feePayer,
            source: 'poll',
            observedAt: now(),
          },
          this.options,
        );
        if (trade !== null) trades.push(trade);
      } catch (error) {
        if (!(error instanceof DecodeError)) throw error;
        logger.debug({ signature, err: error }, 'skipping undecodable swap');
      }
    }

    this.commit(pool.id, signatures);
    return trades;
  }

  private commit(poolId: string, signatures: readonly string[]) {
    if (signatures.length > 0) {
      this.cursors.set(poolId, signatures[0]);
    }
  }
}

type SyntheticCandidatesOptions = {
  random?: () => number;
  now?: () => number;
};

/**
 * Made-up swaps on the known pools for dry runs: on every second tick, with
 * a 30% chance, one trade of 0.5 to 10 base units moving the price 0.5% to 3%.
 */
class SyntheticCandidates implements CandidateSource {
  private ticks = 0;

  constructor(private readonly options: SyntheticCandidatesOptions = {}) {}

  async next(pools: readonly PoolState[]): Promise<PendingTrade[]> {
    const random = this.options.random ?? Math.random;
    const now = this.options.now ?? Date.now;

    this.ticks++;
    if (this.ticks % 2 !== 0 || pools.length === 0) return [];
    if (random() >= 0.3) return [];

    const pool = pools[Math.min(Math.floor(random() * pools.length), pools.length - 1)];
    const amountIn = 0.5 + random() * 9.5;
    const estimatedPriceImpact = 0.005 + random() * 0.025;

    return [
      {
        signature: bs58.encode(randomBytes(64)),
        initiator: Keypair.generate().publicKey.toBase58(),
        inputMint: pool.baseMint,
        outputMint: pool.quoteMint,
        amountIn,
        poolId: pool.id,
        estimatedPriceImpact,
        observedAt: now(),
        source: 'synthetic',
      },
    ];
  }
}

export { RecentSwapCandidates, SyntheticCandidates };
