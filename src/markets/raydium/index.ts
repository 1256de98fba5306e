import * as fs from 'fs';
import fetch from 'node-fetch';
import { PublicKey } from '@solana/web3.js';
import { z } from 'zod';
import { OPENBOOK_PROGRAM_ID, RAYDIUM_AMM_PROGRAM_ID } from '../../constants.js';
import { DecodeError, TransportError, errorMessage } from '../../errors.js';
import type { PoolKeys, PoolState } from '../../types.js';
import { DexLabel, PoolSource, type PoolSourceOptions } from '../types.js';

const MIN_LIQUIDITY = 50_000;
const MIN_VOLUME_24H = 10_000;
const MAX_POOLS = 20;

const DEVNET_POOLS_PATH = new URL('../../../data/devnet-pools.json', import.meta.url);

const PairSchema = z.object({
  name: z.string(),
  ammId: z.string(),
  liquidity: z.number().nullish(),
  volume24h: z.number().nullish(),
  price: z.number().nullish(),
});

const ApiPoolKeysSchema = z.object({
  id: z.string(),
  baseMint: z.string(),
  quoteMint: z.string(),
  baseDecimals: z.number(),
  quoteDecimals: z.number(),
  authority: z.string(),
  openOrders: z.string(),
  targetOrders: z.string(),
  baseVault: z.string(),
  quoteVault: z.string(),
  marketProgramId: z.string(),
  marketId: z.string(),
  marketAuthority: z.string(),
  marketBaseVault: z.string(),
  marketQuoteVault: z.string(),
  marketBids: z.string(),
  marketAsks: z.string(),
  marketEventQueue: z.string(),
});

const PoolKeysFileSchema = z.object({
  official: z.array(z.unknown()),
  unOfficial: z.array(z.unknown()).default([]),
});

const BundledPoolSchema = z.object({
  label: z.string(),
  baseMint: z.string(),
  quoteMint: z.string(),
  baseSymbol: z.string(),
  quoteSymbol: z.string(),
  baseDecimals: z.number().int(),
  quoteDecimals: z.number().int(),
  baseReserve: z.number().nonnegative().optional(),
  quoteReserve: z.number().nonnegative().optional(),
  liquidity: z.number(),
  volume24h: z.number(),
  price: z.number(),
});

type BundledPool = z.infer<typeof BundledPoolSchema>;

export type FetchJson = (url: string) => Promise<unknown>;

async function fetchJson(url: string): Promise<unknown> {
  const response = await fetch(url).catch((error: unknown) => {
    throw new TransportError(`GET ${url} failed: ${errorMessage(error)}`, {
      cause: error,
    });
  });
  if (!response.ok) {
    throw new TransportError(`GET ${url} returned ${response.status}`);
  }
  return response.json();
}

function isTradeable(pool: PoolState): boolean {
  return (
    pool.liquidity > MIN_LIQUIDITY &&
    pool.volume24h > MIN_VOLUME_24H &&
    pool.baseSymbol.length > 0 &&
    pool.quoteSymbol.length > 0
  );
}

/** Stable stand-in accounts for pools that only exist in the bundled list. */
function derivePoolKeys(label: string): PoolKeys {
  const derive = (field: string, programId: PublicKey) =>
    PublicKey.findProgramAddressSync(
      [Buffer.from(label), Buffer.from(field)],
      programId,
    )[0].toBase58();

  return {
    id: derive('amm', RAYDIUM_AMM_PROGRAM_ID),
    authority: derive('authority', RAYDIUM_AMM_PROGRAM_ID),
    openOrders: derive('open_orders', RAYDIUM_AMM_PROGRAM_ID),
    targetOrders: derive('target_orders', RAYDIUM_AMM_PROGRAM_ID),
    baseVault: derive('base_vault', RAYDIUM_AMM_PROGRAM_ID),
    quoteVault: derive('quote_vault', RAYDIUM_AMM_PROGRAM_ID),
    marketProgramId: OPENBOOK_PROGRAM_ID.toBase58(),
    marketId: derive('market', OPENBOOK_PROGRAM_ID),
    marketBids: derive('bids', OPENBOOK_PROGRAM_ID),
    marketAsks: derive('asks', OPENBOOK_PROGRAM_ID),
    marketEventQueue: derive('event_queue', OPENBOOK_PROGRAM_ID),
    marketBaseVault: derive('market_base_vault', OPENBOOK_PROGRAM_ID),
    marketQuoteVault: derive('market_quote_vault', OPENBOOK_PROGRAM_ID),
    marketAuthority: derive('market_authority', OPENBOOK_PROGRAM_ID),
  };
}

function fromBundled(pool: BundledPool, now: number): PoolState {
  const keys = derivePoolKeys(pool.label);
  return {
    id: keys.id,
    baseMint: pool.baseMint,
    quoteMint: pool.quoteMint,
    baseSymbol: pool.baseSymbol,
    quoteSymbol: pool.quoteSymbol,
    baseDecimals: pool.baseDecimals,
    quoteDecimals: pool.quoteDecimals,
    baseReserve: pool.baseReserve,
    quoteReserve: pool.quoteReserve,
    liquidity: pool.liquidity,
    volume24h: pool.volume24h,
    price: pool.price,
    lastRefreshed: now,
    keys,
  };
}

type RaydiumPoolSourceOptions = PoolSourceOptions & {
  network: 'mainnet-beta' | 'devnet';
  statsUrl: string;
  keysUrl: string;
  fetchJson?: FetchJson;
  bundledPoolsPath?: URL | string;
};

/**
 * Raydium v4 pools. On mainnet the pair statistics are joined with the pool
 * key list by amm id; devnet has no such list and gets the bundled pools, as
 * does mainnet when the api cannot be reached on the first load.
 */
class RaydiumPoolSource extends PoolSource {
  private loadedFromApi = false;

  constructor(private readonly raydium: RaydiumPoolSourceOptions) {
    super(DexLabel.RAYDIUM, raydium);
  }

  protected async loadPools(): Promise<PoolState[]> {
    if (this.raydium.network === 'devnet') {
      return this.bundledPools();
    }

    try {
      const pools = await this.apiPools();
      this.loadedFromApi = true;
      return pools;
    } catch (error) {
      if (this.loadedFromApi) throw error;
      this.options.logger.warn(
        { err: error },
        `${this.label}: api unavailable, using bundled pools`,
      );
      return this.bundledPools();
    }
  }

  private now(): number {
    return (this.options.now ?? Date.now)();
  }

  private async apiPools(): Promise<PoolState[]> {
    const get = this.raydium.fetchJson ?? fetchJson;
    const [pairsRaw, keysRaw] = await Promise.all([
      get(this.raydium.statsUrl),
      get(this.raydium.keysUrl),
    ]);

    const pairs = z.array(z.unknown()).safeParse(pairsRaw);
    const keyFile = PoolKeysFileSchema.safeParse(keysRaw);
    if (!pairs.success || !keyFile.success) {
      throw new DecodeError(`${this.label}: unexpected pool api response`);
    }

    const pairsByAmm = new Map<string, z.infer<typeof PairSchema>>();
    for (const entry of pairs.data) {
      const pair = PairSchema.safeParse(entry);
      if (pair.success) pairsByAmm.set(pair.data.ammId, pair.data);
    }

    const now = this.now();
    const pools: PoolState[] = [];
    for (const entry of [...keyFile.data.official, ...keyFile.data.unOfficial]) {
      const parsed = ApiPoolKeysSchema.safeParse(entry);
      if (!parsed.success) continue;
      const keys = parsed.data;
      const pair = pairsByAmm.get(keys.id);
      if (pair === undefined) continue;

      const [baseSymbol = '', quoteSymbol = ''] = pair.name.split('-');
      const pool: PoolState = {
        id: keys.id,
        baseMint: keys.baseMint,
        quoteMint: keys.quoteMint,
        baseSymbol,
        quoteSymbol,
        baseDecimals: keys.baseDecimals,
        quoteDecimals: keys.quoteDecimals,
        liquidity: pair.liquidity ?? 0,
        volume24h: pair.volume24h ?? 0,
        price: pair.price ?? 0,
        lastRefreshed: now,
        keys: {
          id: keys.id,
          authority: keys.authority,
          openOrders: keys.openOrders,
          targetOrders: keys.targetOrders,
          baseVault: keys.baseVault,
          quoteVault: keys.quoteVault,
          marketProgramId: keys.marketProgramId,
          marketId: keys.marketId,
          marketBids: keys.marketBids,
          marketAsks: keys.marketAsks,
          marketEventQueue: keys.marketEventQueue,
          marketBaseVault: keys.marketBaseVault,
          marketQuoteVault: keys.marketQuoteVault,
          marketAuthority: keys.marketAuthority,
        },
      };
      if (isTradeable(pool)) pools.push(pool);
    }

    // deepest pools first
    pools.sort((a, b) => b.liquidity - a.liquidity);
    return pools.slice(0, MAX_POOLS);
  }

  private bundledPools(): PoolState[] {
    const path = this.raydium.bundledPoolsPath ?? DEVNET_POOLS_PATH;
    const parsed = z
      .array(BundledPoolSchema)
      .safeParse(JSON.parse(fs.readFileSync(path, 'utf-8')));
    if (!parsed.success) {
      throw new DecodeError(`${this.label}: invalid bundled pool list ${path.toString()}`);
    }
    const now = this.now();
    return parsed.data.map((pool) => fromBundled(pool, now));
  }
}

export { RaydiumPoolSource, derivePoolKeys };
