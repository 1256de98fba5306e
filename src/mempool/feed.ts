import { RAYDIUM_AMM_PROGRAM_ID } from '../constants.js';
import type { FeedConfig } from '../config.js';
import { SandwichBotError, SubscriptionError, TransportError } from '../errors.js';
import type { Logger } from '../logger.js';
import type { PendingTrade, PoolState } from '../types.js';
import { AsyncQueue, TimeoutError, sleep, withTimeout } from '../utils.js';
import type { CandidateSource } from './candidates.js';
import { NotificationDecoder } from './decoder.js';
import type { LogStream, LogStreamFactory } from './log-stream.js';

export enum FeedState {
  IDLE = 'Idle',
  STREAMING_PRIMARY = 'StreamingPrimary',
  POLLING_FALLBACK = 'PollingFallback',
  STOPPED = 'Stopped',
}

export type TradeHandler = (trade: PendingTrade) => Promise<void>;

export type FeedMetrics = {
  notifications: number;
  decodeErrors: number;
  delivered: number;
  dropped: number;
};

type FeedItem = { kind: 'trade'; trade: PendingTrade } | { kind: 'stop' };

type PendingTradeFeedOptions = {
  pools: readonly PoolState[];
  createStream: LogStreamFactory;
  candidates: CandidateSource;
  config: FeedConfig;
  feeRate: number;
  logger: Logger;
  programId?: string;
  now?: () => number;
};

/**
 * Streams swaps on the target pools from program log notifications, and
 * switches to polling a candidate source for the rest of the session once the
 * stream fails, goes quiet or cannot be subscribed. Trades are handed to the
 * consumer one at a time.
 */
class PendingTradeFeed {
  private _state: FeedState = FeedState.IDLE;
  private readonly queue: AsyncQueue<FeedItem> = new AsyncQueue();
  private readonly decoder: NotificationDecoder;
  private readonly pollAbort = new AbortController();
  private stream: LogStream | null = null;
  private idleTimer: NodeJS.Timeout | null = null;
  private lastObservedAt = 0;
  private readonly metrics: FeedMetrics = {
    notifications: 0,
    decodeErrors: 0,
    delivered: 0,
    dropped: 0,
  };

  constructor(private readonly options: PendingTradeFeedOptions) {
    this.decoder = new NotificationDecoder({
      programId: options.programId ?? RAYDIUM_AMM_PROGRAM_ID.toBase58(),
      feeRate: options.feeRate,
    });
  }

  get state(): FeedState {
    return this._state;
  }

  getMetrics(): FeedMetrics {
    return { ...this.metrics };
  }

  /** Resolves once the feed is stopped. */
  async start(onTrade: TradeHandler): Promise<void> {
    if (this._state !== FeedState.IDLE) {
      throw new SandwichBotError(`feed cannot start from ${this._state}`, 'FEED_STATE');
    }
    this._state = FeedState.STREAMING_PRIMARY;
    this.openStream().catch((error: unknown) =>
      this.fallback(
        error instanceof Error
          ? error
          : new TransportError(`log stream failed: ${String(error)}`),
      ),
    );
    await this.deliver(onTrade);
  }

  stop() {
    if (this._state === FeedState.STOPPED) return;
    this._state = FeedState.STOPPED;
    this.clearIdleTimer();
    this.pollAbort.abort();
    this.closeStream();
    this.queue.clear();
    this.queue.put({ kind: 'stop' });
    this.options.logger.debug(this.metrics, 'feed stopped');
  }

  private async openStream() {
    const { pools, config, logger } = this.options;
    const stream = this.options.createStream();
    this.stream = stream;

    const subscribeAll = async () => {
      await stream.connect({
        onNotification: (message) => this.onNotification(message),
        onClose: (error) => this.fallback(error),
      });
      await Promise.all(
        pools.map((pool) =>
          stream.subscribe(pool.id).then((subscriptionId) => {
            this.decoder.bind(subscriptionId, pool);
          }),
        ),
      );
    };

    try {
      await withTimeout(
        subscribeAll(),
        config.subscriptionAckTimeoutMs,
        'logsSubscribe',
      );
    } catch (error) {
      if (error instanceof TimeoutError) {
        throw new SubscriptionError(
          `subscriptions not acknowledged within ${config.subscriptionAckTimeoutMs}ms`,
          { cause: error },
        );
      }
      throw error;
    }

    if (this._state !== FeedState.STREAMING_PRIMARY) return;
    logger.info(`streaming swaps on ${pools.length} pools`);
    this.resetIdleTimer();
  }

  private onNotification(message: unknown) {
    if (this._state !== FeedState.STREAMING_PRIMARY) return;
    this.metrics.notifications++;
    this.resetIdleTimer();

    const result = this.decoder.decode(message, this.observe(this.now()));
    switch (result.kind) {
      case 'trade':
        this.enqueue(result.trade);
        break;
      case 'error':
        this.metrics.decodeErrors++;
        this.options.logger.warn({ err: result.error }, 'skipping notification');
        break;
      case 'unrelated':
        break;
    }
  }

  private fallback(reason: Error) {
    if (this._state !== FeedState.STREAMING_PRIMARY) return;
    this._state = FeedState.POLLING_FALLBACK;
    this.clearIdleTimer();
    this.closeStream();
    this.options.logger.warn(
      { err: reason },
      `log stream unavailable, polling every ${this.options.config.pollIntervalMs}ms`,
    );
    this.poll().catch((error: unknown) =>
      this.options.logger.error({ err: error }, 'polling stopped'),
    );
  }

  private async poll() {
    const { candidates, pools, config, logger } = this.options;
    const signal = this.pollAbort.signal;

    while (!signal.aborted) {
      try {
        const trades = await candidates.next(pools, signal);
        for (const trade of trades) {
          this.enqueue(trade);
        }
      } catch (error) {
        logger.warn({ err: error }, 'candidate poll failed');
      }
      await sleep(config.pollIntervalMs, signal);
    }
  }

  private enqueue(trade: PendingTrade) {
    if (this._state === FeedState.STOPPED) return;

    const queued = this.queue.length();
    const { highWaterMark } = this.options.config;
    if (highWaterMark > 0 && queued >= highWaterMark) {
      this.metrics.dropped++;
      this.options.logger.warn(
        { signature: trade.signature, queued },
        'trade queue full, dropping trade',
      );
      return;
    }

    this.queue.put({
      kind: 'trade',
      trade: { ...trade, observedAt: this.observe(trade.observedAt) },
    });
  }

  private async deliver(onTrade: TradeHandler) {
    for (;;) {
      const item = await this.queue.get();
      if (item.kind === 'stop' || this._state === FeedState.STOPPED) return;

      this.metrics.delivered++;
      try {
        await onTrade(item.trade);
      } catch (error) {
        this.options.logger.error(
          { err: error, signature: item.trade.signature },
          'trade handler failed',
        );
      }
    }
  }

  // observation times never go backwards within a session
  private observe(at: number): number {
    this.lastObservedAt = Math.max(this.lastObservedAt, at);
    return this.lastObservedAt;
  }

  private now(): number {
    return (this.options.now ?? Date.now)();
  }

  private resetIdleTimer() {
    this.clearIdleTimer();
    const idleMs = this.options.config.streamIdleTimeoutMs;
    this.idleTimer = setTimeout(
      () => this.fallback(new TransportError(`no notifications for ${idleMs}ms`)),
      idleMs,
    );
  }

  private clearIdleTimer() {
    if (this.idleTimer !== null) {
      clearTimeout(this.idleTimer);
      this.idleTimer = null;
    }
  }

  private closeStream() {
    if (this.stream !== null) {
      this.stream.close();
      this.stream = null;
    }
  }
}

export { PendingTradeFeed };
