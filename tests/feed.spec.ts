import { describe, it, expect } from 'vitest';
import type { FeedConfig } from '../src/config.js';
import { RAYDIUM_FEE_RATE } from '../src/constants.js';
import { SandwichBotError } from '../src/errors.js';
import type { CandidateSource } from '../src/mempool/candidates.js';
import { FeedState, PendingTradeFeed } from '../src/mempool/feed.js';
import type { PendingTrade } from '../src/types.js';
import { sleep } from '../src/utils.js';
import {
  FakeLogStream,
  ScriptedCandidates,
  captureLogger,
  makePool,
  makeTrade,
  swapNotification,
} from './fixtures.js';

const pool = makePool();

const config: FeedConfig = {
  subscriptionAckTimeoutMs: 20,
  streamIdleTimeoutMs: 1000,
  pollIntervalMs: 5,
  highWaterMark: 10,
};

function polled(signature: string, observedAt = 100): PendingTrade {
  return makeTrade({ signature, source: 'poll', observedAt });
}

function createFeed(
  stream: FakeLogStream,
  candidates: CandidateSource,
  overrides: Partial<FeedConfig> = {},
) {
  const { logger, messages } = captureLogger();
  const feed = new PendingTradeFeed({
    pools: [pool],
    createStream: () => stream,
    candidates,
    config: { ...config, ...overrides },
    feeRate: RAYDIUM_FEE_RATE,
    logger,
    now: () => 500,
  });
  const fallbacks = () =>
    messages('warn').filter((msg) => msg.startsWith('log stream unavailable'));
  return { feed, messages, fallbacks };
}

describe('PendingTradeFeed', () => {
  it('polls once subscriptions go unacknowledged', async () => {
    const stream = new FakeLogStream(false);
    const candidates = new ScriptedCandidates([[polled('a'), polled('b')]]);
    const { feed, messages, fallbacks } = createFeed(stream, candidates);

    const seen: string[] = [];
    await feed.start(async (trade) => {
      seen.push(trade.signature);
      if (trade.signature === 'a') throw new Error('handler blew up');
      feed.stop();
    });

    expect(seen).toEqual(['a', 'b']);
    expect(stream.closed).toBe(1);
    expect(fallbacks()).toEqual(['log stream unavailable, polling every 5ms']);
    expect(messages('error')).toEqual(['trade handler failed']);
    expect(feed.state).toBe(FeedState.STOPPED);
  });

  it('delivers streamed trades one at a time, in order, then keeps going by polling', async () => {
    const stream = new FakeLogStream();
    const candidates = new ScriptedCandidates([[polled('third')]]);
    const { feed, fallbacks } = createFeed(stream, candidates);

    const seen: PendingTrade[] = [];
    let active = 0;
    let maxActive = 0;
    const done = feed.start(async (trade) => {
      active++;
      maxActive = Math.max(maxActive, active);
      await sleep(2);
      seen.push(trade);
      active--;
      if (seen.length === 3) feed.stop();
    });

    await sleep(5);
    expect(stream.subscribed).toEqual([pool.id]);
    expect(feed.state).toBe(FeedState.STREAMING_PRIMARY);

    stream.emit(swapNotification(1, 'first'));
    stream.emit({ jsonrpc: '2.0', method: 'logsNotification' });
    stream.emit(swapNotification(1, 'second'));
    stream.drop();
    await done;

    expect(seen.map((trade) => trade.signature)).toEqual(['first', 'second', 'third']);
    expect(seen.map((trade) => trade.source)).toEqual(['stream', 'stream', 'poll']);
    // polled trade observed earlier than the stream clock is clamped forward
    expect(seen.map((trade) => trade.observedAt)).toEqual([500, 500, 500]);
    expect(maxActive).toBe(1);
    expect(fallbacks()).toHaveLength(1);
    expect(feed.getMetrics()).toEqual({
      notifications: 3,
      decodeErrors: 1,
      delivered: 3,
      dropped: 0,
    });
  });

  it('falls back when the stream goes quiet', async () => {
    const stream = new FakeLogStream();
    const candidates = new ScriptedCandidates([[polled('late')]]);
    const { feed, fallbacks } = createFeed(stream, candidates, { streamIdleTimeoutMs: 20 });

    const seen: string[] = [];
    await feed.start(async (trade) => {
      seen.push(trade.signature);
      feed.stop();
    });

    expect(seen).toEqual(['late']);
    expect(stream.closed).toBe(1);
    expect(fallbacks()).toHaveLength(1);
  });

  it('drops trades beyond the high-water mark', async () => {
    const stream = new FakeLogStream(false);
    const batch = ['t1', 't2', 't3', 't4', 't5'].map((signature) => polled(signature));
    const candidates = new ScriptedCandidates([batch]);
    const { feed, messages } = createFeed(stream, candidates, { highWaterMark: 2 });

    const seen: string[] = [];
    await feed.start(async (trade) => {
      seen.push(trade.signature);
      if (seen.length === 3) feed.stop();
    });

    // t1 goes straight to the waiting consumer and never occupies the queue
    expect(seen).toEqual(['t1', 't2', 't3']);
    expect(feed.getMetrics().dropped).toBe(2);
    expect(
      messages('warn').filter((msg) => msg === 'trade queue full, dropping trade'),
    ).toHaveLength(2);
  });

  it('delivers every trade when no high-water mark is set', async () => {
    const stream = new FakeLogStream(false);
    const batch = ['t1', 't2', 't3', 't4', 't5'].map((signature) => polled(signature));
    const { feed } = createFeed(stream, new ScriptedCandidates([batch]), { highWaterMark: 0 });

    const seen: string[] = [];
    await feed.start(async (trade) => {
      seen.push(trade.signature);
      if (seen.length === 5) feed.stop();
    });

    expect(seen).toEqual(['t1', 't2', 't3', 't4', 't5']);
    expect(feed.getMetrics()).toMatchObject({ delivered: 5, dropped: 0 });
  });

  it('stops without falling back and cannot be restarted', async () => {
    const stream = new FakeLogStream();
    const candidates = new ScriptedCandidates([]);
    const { feed, fallbacks } = createFeed(stream, candidates);

    const done = feed.start(async () => {});
    await sleep(5);
    feed.stop();
    await done;

    expect(feed.state).toBe(FeedState.STOPPED);
    expect(stream.closed).toBe(1);
    expect(candidates.calls).toBe(0);
    expect(fallbacks()).toEqual([]);
    await expect(feed.start(async () => {})).rejects.toThrow(SandwichBotError);
  });
});
