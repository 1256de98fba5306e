import { buildBracket } from './build-bracket.js';
import type { LedgerClient } from './clients/rpc.js';
import type { SigningIdentity } from './clients/wallet.js';
import type { BotConfig } from './config.js';
import type { SandwichCoordinator } from './coordinator.js';
import { BuildError, DecodeError, InvalidInputError, TransportError } from './errors.js';
import { assess } from './evaluator.js';
import type { Logger } from './logger.js';
import { solPriceIn, toPairLabel, type PoolSource } from './markets/types.js';
import type { PendingTradeFeed } from './mempool/feed.js';
import type { AttemptLedger, SessionStats, StatsSnapshot } from './stats.js';
import {
  OpportunityStatus,
  type Bracket,
  type Opportunity,
  type PendingTrade,
  type PoolState,
} from './types.js';
import { shortenAddress } from './utils.js';

type SessionOptions = {
  config: Pick<BotConfig, 'evaluator' | 'builder' | 'maxTradeAgeMs'>;
  feed: PendingTradeFeed;
  poolSource: PoolSource;
  ledger: LedgerClient;
  identity: SigningIdentity;
  coordinator: SandwichCoordinator;
  stats: SessionStats;
  attemptLedger?: AttemptLedger;
  logger: Logger;
  now?: () => number;
};

/**
 * Runs the pipeline for a bounded time: feed, evaluate, build, execute, one
 * trade at a time. Statistics are reported however the session ends.
 */
class Session {
  private readonly abort = new AbortController();

  constructor(private readonly options: SessionOptions) {}

  /** Zero runs until stop() is called. */
  async run(durationMs: number): Promise<StatsSnapshot> {
    const { feed, stats, ledger, logger } = this.options;
    const timer =
      durationMs > 0
        ? setTimeout(() => {
            logger.info(`session ran for ${durationMs}ms, stopping`);
            this.stop();
          }, durationMs)
        : null;

    try {
      await feed.start((trade) => this.handleTrade(trade));
    } finally {
      if (timer !== null) clearTimeout(timer);
      this.stop();
      stats.report(logger);
      logger.info(ledger.getStats(), 'ledger client statistics');
      await this.options.attemptLedger?.close();
    }
    return stats.snapshot();
  }

  stop() {
    if (this.abort.signal.aborted) return;
    this.abort.abort();
    this.options.feed.stop();
  }

  private now(): number {
    return (this.options.now ?? Date.now)();
  }

  private async handleTrade(trade: PendingTrade) {
    const { config, poolSource, stats, ledger, identity, coordinator, logger } =
      this.options;
    stats.recordDetected();

    const age = this.now() - trade.observedAt;
    if (age > config.maxTradeAgeMs) {
      logger.debug(`dropping ${shortenAddress(trade.signature)}, ${age}ms old`);
      return;
    }

    let listed: PoolState | null;
    try {
      listed = await poolSource.getPool(trade.poolId);
    } catch (error) {
      if (!(error instanceof TransportError || error instanceof DecodeError)) throw error;
      logger.warn({ err: error, signature: trade.signature }, 'pool metadata unavailable');
      return;
    }
    if (listed === null) {
      logger.debug(`no metadata for pool ${trade.poolId}`);
      return;
    }
    const pair = toPairLabel(listed);
    const pool = await this.withReserves(trade, listed, pair);

    let opportunity: Opportunity;
    try {
      opportunity = assess(trade, pool, config.evaluator);
    } catch (error) {
      if (!(error instanceof InvalidInputError)) throw error;
      logger.warn({ err: error, signature: trade.signature }, `cannot evaluate trade on ${pair}`);
      return;
    }
    stats.recordEvaluation(opportunity);
    if (opportunity.status !== OpportunityStatus.ACCEPTED) {
      logger.debug(`${pair} ${shortenAddress(trade.signature)} rejected: ${opportunity.rejectReason}`);
      return;
    }
    const evaluated = this.now();
    logger.info(
      `${pair}: ${trade.amountIn.toFixed(4)} in, front-run ${opportunity.frontRunAmount.toFixed(4)}, ` +
        `net ${opportunity.netProfit.toFixed(6)}, confidence ${opportunity.confidence.toFixed(0)}%`,
    );

    const blockhash = await ledger.getRecentBlockhash();
    let bracket: Bracket;
    try {
      bracket = buildBracket(opportunity, pool, identity, blockhash, config.builder);
    } catch (error) {
      if (!(error instanceof BuildError)) throw error;
      logger.info(`${pair}: no bracket (${error.reason}): ${error.message}`);
      return;
    }
    const built = this.now();

    await coordinator.execute(opportunity, bracket, {
      pair,
      timings: { detected: trade.observedAt, evaluated, built },
      solPrice: solPriceIn(pool, opportunity.inputMint),
      signal: this.abort.signal,
    });
  }

  /**
   * Pool metadata from the api carries no reserves. Take the ones logged with
   * the trade, else read the pool's vaults.
   */
  private async withReserves(
    trade: PendingTrade,
    pool: PoolState,
    pair: string,
  ): Promise<PoolState> {
    if (pool.baseReserve !== undefined && pool.quoteReserve !== undefined) return pool;

    let reserves = trade.poolReserves ?? null;
    if (reserves === null && pool.keys !== undefined) {
      try {
        reserves = await this.options.ledger.getPoolReserves(pool.keys);
      } catch (error) {
        if (!(error instanceof TransportError)) throw error;
        this.options.logger.warn({ err: error }, `cannot read reserves of ${pair}`);
      }
    }
    if (reserves === null) return pool;
    return { ...pool, baseReserve: reserves.base, quoteReserve: reserves.quote };
  }
}

export { Session };
