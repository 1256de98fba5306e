import { NATIVE_MINT } from '@solana/spl-token';
import type { Logger } from '../logger.js';
import type { PoolState } from '../types.js';

export enum DexLabel {
  RAYDIUM = 'Raydium',
}

// pools turning over less than this share of their liquidity a day are skipped
const MIN_DAILY_TURNOVER = 0.1;

export type PoolSourceOptions = {
  cacheTtlMs: number;
  logger: Logger;
  now?: () => number;
};

function toPairLabel(pool: Pick<PoolState, 'baseSymbol' | 'quoteSymbol'>): string {
  return `${pool.baseSymbol}/${pool.quoteSymbol}`;
}

/** One SOL in units of `mint`, or null unless the pool pairs the two. */
function solPriceIn(pool: PoolState, mint: string): number | null {
  const sol = NATIVE_MINT.toBase58();
  if (mint === sol) return 1;

  // quote per base
  const price =
    pool.baseReserve !== undefined && pool.quoteReserve !== undefined && pool.baseReserve > 0
      ? pool.quoteReserve / pool.baseReserve
      : pool.price;
  if (!(price > 0)) return null;
  if (pool.baseMint === sol && pool.quoteMint === mint) return price;
  if (pool.quoteMint === sol && pool.baseMint === mint) return 1 / price;
  return null;
}

/**
 * Pool metadata with a time-based cache. Once the cache has expired a failed
 * refresh is an error, except when picking targets, which may go on with the
 * previous list.
 */
abstract class PoolSource {
  private cache: { pools: PoolState[]; fetchedAt: number } | null = null;

  constructor(
    readonly label: DexLabel,
    protected readonly options: PoolSourceOptions,
  ) {}

  protected abstract loadPools(): Promise<PoolState[]>;

  getPools(): Promise<PoolState[]> {
    return this.refresh(false);
  }

  private async refresh(allowStale: boolean): Promise<PoolState[]> {
    const now = (this.options.now ?? Date.now)();
    if (this.cache !== null && now - this.cache.fetchedAt < this.options.cacheTtlMs) {
      return this.cache.pools;
    }

    let pools: PoolState[];
    try {
      pools = await this.loadPools();
    } catch (error) {
      if (!allowStale || this.cache === null) throw error;
      this.options.logger.warn(
        { err: error },
        `${this.label}: pool refresh failed, keeping ${this.cache.pools.length} cached pools`,
      );
      return this.cache.pools;
    }

    this.cache = { pools, fetchedAt: now };
    this.options.logger.debug(`${this.label}: loaded ${pools.length} pools`);
    return pools;
  }

  async getPool(id: string): Promise<PoolState | null> {
    const pools = await this.getPools();
    return pools.find((pool) => pool.id === id) ?? null;
  }

  async getSandwichTargets(minLiquidity: number): Promise<PoolState[]> {
    const pools = await this.refresh(true);
    return pools.filter(
      (pool) =>
        pool.liquidity >= minLiquidity &&
        pool.volume24h > pool.liquidity * MIN_DAILY_TURNOVER,
    );
  }

  async findPoolsBySymbol(symbol: string): Promise<PoolState[]> {
    const needle = symbol.toUpperCase();
    const pools = await this.getPools();
    return pools.filter(
      (pool) =>
        pool.baseSymbol.toUpperCase().includes(needle) ||
        pool.quoteSymbol.toUpperCase().includes(needle),
    );
  }
}

export { PoolSource, solPriceIn, toPairLabel };
