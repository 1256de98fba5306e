import { describe, it, expect } from 'vitest';
import type { PublicKey, VersionedTransaction } from '@solana/web3.js';
import { buildBracket } from '../src/build-bracket.js';
import type { LedgerClient, LedgerStats, SwapSettlement } from '../src/clients/rpc.js';
import type { CoordinatorConfig } from '../src/config.js';
import { SandwichCoordinator, type AttemptContext } from '../src/coordinator.js';
import { TransportError } from '../src/errors.js';
import { assess } from '../src/evaluator.js';
import { SessionStats } from '../src/stats.js';
import {
  AttemptOutcome,
  AttemptState,
  type Opportunity,
  type PoolReserves,
} from '../src/types.js';
import {
  BLOCKHASH,
  SOL,
  TestIdentity,
  USDC,
  builderConfig,
  evaluatorConfig,
  makePool,
  makeTrade,
  silentLogger,
} from './fixtures.js';

class ScriptedLedger implements LedgerClient {
  sent = 0;
  readonly failSends: Set<number>;
  readonly timeouts: number[] = [];
  readonly settled: string[] = [];

  constructor(
    private readonly script: {
      failSends?: number[];
      confirmations?: Array<boolean | Error>;
      settlements?: Array<SwapSettlement | null>;
    } = {},
  ) {
    this.failSends = new Set(script.failSends ?? []);
  }

  async getBalance(): Promise<number> {
    return 1;
  }

  async sendTransaction(_transaction: VersionedTransaction): Promise<string> {
    this.sent++;
    if (this.failSends.has(this.sent)) throw new TransportError('rpc down');
    return `sig-${this.sent}`;
  }

  async confirmTransaction(_signature: string, timeoutMs: number): Promise<boolean> {
    this.timeouts.push(timeoutMs);
    const next = this.script.confirmations?.shift() ?? true;
    if (next instanceof Error) throw next;
    return next;
  }

  async getRecentBlockhash(): Promise<string> {
    return BLOCKHASH;
  }

  async getPoolReserves(): Promise<PoolReserves | null> {
    return null;
  }

  async getSwapSettlement(
    signature: string,
    _owner: PublicKey,
    _mint: string,
  ): Promise<SwapSettlement | null> {
    this.settled.push(signature);
    return this.script.settlements?.shift() ?? null;
  }

  getStats(): LedgerStats {
    return { sent: this.sent, confirmed: 0, failed: 0, averageConfirmationMs: 0 };
  }
}

const config: CoordinatorConfig = {
  frontRunTimeoutMs: 50,
  backRunTimeoutMs: 100,
  confirmPollIntervalMs: 10,
};

const pool = makePool();
const identity = new TestIdentity();
const assessed = assess(makeTrade({ amountIn: 20_000 }), pool, evaluatorConfig);
const bracket = buildBracket(assessed, pool, identity, BLOCKHASH, builderConfig);
const opportunity: Opportunity = {
  ...assessed,
  expectedProfit: 0.5,
  estimatedCost: 0.002,
  netProfit: 0.498,
};
const context: AttemptContext = {
  pair: 'SOL/USDC',
  timings: { detected: 1, evaluated: 2, built: 3 },
};

function setup(ledger: LedgerClient, simulateProfit = true) {
  const stats = new SessionStats();
  let clock = 100;
  const coordinator = new SandwichCoordinator({
    ledger,
    stats,
    config,
    logger: silentLogger,
    owner: identity.publicKey,
    simulateProfit,
    random: () => 0.5,
    now: () => (clock += 10),
  });
  return { stats, coordinator };
}

describe('SandwichCoordinator', () => {
  it('sends the back-run only after the front-run confirms', async () => {
    const ledger = new ScriptedLedger();
    const { stats, coordinator } = setup(ledger);

    const attempt = await coordinator.execute(opportunity, bracket, context);

    expect(attempt.outcome).toBe(AttemptOutcome.SUCCESS);
    expect(attempt.state).toBe(AttemptState.BACK_RUN_CONFIRMED);
    expect(attempt.frontRunSignature).toBe('sig-1');
    expect(attempt.backRunSignature).toBe('sig-2');
    expect(ledger.timeouts).toEqual([50, 100]);
    expect(attempt.actualProfit).toBeCloseTo(0.498, 9);
    expect(attempt.feeCost).toBe(0.002);
    expect(attempt.failureReason).toBeNull();
    expect(attempt.timings).toEqual({
      detected: 1,
      evaluated: 2,
      built: 3,
      frontRunSent: 120,
      frontRunConfirmed: 130,
      backRunSent: 140,
      backRunConfirmed: 150,
    });
    expect(attempt.durationMs).toBe(50);
    expect(stats.snapshot()).toMatchObject({ attempted: 1, successes: 1 });
  });

  it('does nothing once the session is stopping', async () => {
    const ledger = new ScriptedLedger();
    const { stats, coordinator } = setup(ledger);
    const controller = new AbortController();
    controller.abort();

    const attempt = await coordinator.execute(opportunity, bracket, {
      ...context,
      signal: controller.signal,
    });

    expect(attempt.outcome).toBe(AttemptOutcome.FAILURE);
    expect(attempt.actualProfit).toBe(0);
    expect(ledger.sent).toBe(0);
    expect(stats.snapshot().failures).toBe(1);
  });

  it('fails without cost when the front-run cannot be sent', async () => {
    const ledger = new ScriptedLedger({ failSends: [1] });
    const { coordinator } = setup(ledger);

    const attempt = await coordinator.execute(opportunity, bracket, context);

    expect(attempt).toMatchObject({
      outcome: AttemptOutcome.FAILURE,
      state: AttemptState.BUILT,
      frontRunSignature: null,
      actualProfit: 0,
      feeCost: 0,
      failureReason: 'front-run not submitted: rpc down',
    });
  });

  it.each([
    ['times out', false],
    ['cannot be checked', new TransportError('status unavailable')],
  ])('charges the front-run fee when its confirmation %s', async (_, confirmation) => {
    const ledger = new ScriptedLedger({ confirmations: [confirmation] });
    const { coordinator } = setup(ledger);

    const attempt = await coordinator.execute(opportunity, bracket, context);

    expect(attempt).toMatchObject({
      outcome: AttemptOutcome.FAILURE,
      state: AttemptState.FRONT_RUN_SUBMITTED,
      actualProfit: -0.001,
      feeCost: 0.001,
      failureReason: 'front-run not confirmed within 50ms',
    });
    expect(ledger.sent).toBe(1);
  });

  it('counts the stranded front-run when the back-run is not sent', async () => {
    const ledger = new ScriptedLedger({ failSends: [2] });
    const { stats, coordinator } = setup(ledger);

    const attempt = await coordinator.execute(opportunity, bracket, context);

    expect(attempt.outcome).toBe(AttemptOutcome.PARTIAL_FAILURE);
    expect(attempt.state).toBe(AttemptState.FRONT_RUN_CONFIRMED);
    expect(attempt.failureReason).toBe('back-run not submitted: rpc down');
    expect(attempt.actualProfit).toBeCloseTo(-1000.001, 9);
    expect(attempt.feeCost).toBe(0.001);
    expect(stats.snapshot().partialFailures).toBe(1);
  });

  it('is a partial failure when the back-run does not confirm', async () => {
    const ledger = new ScriptedLedger({ confirmations: [true, false] });
    const { coordinator } = setup(ledger);

    const attempt = await coordinator.execute(opportunity, bracket, context);

    expect(attempt.outcome).toBe(AttemptOutcome.PARTIAL_FAILURE);
    expect(attempt.state).toBe(AttemptState.BACK_RUN_SUBMITTED);
    expect(attempt.backRunSignature).toBe('sig-2');
    expect(attempt.failureReason).toBe('back-run not confirmed within 100ms');
  });

  it('reads the realised profit from both settlements when live', async () => {
    const ledger = new ScriptedLedger({
      settlements: [
        { tokenDelta: -1000, feeLamports: 5000 },
        { tokenDelta: 1000.7, feeLamports: 5000 },
      ],
    });
    const { coordinator } = setup(ledger, false);

    const attempt = await coordinator.execute(opportunity, bracket, context);

    expect(ledger.settled).toEqual(['sig-1', 'sig-2']);
    expect(attempt.actualProfit).toBeCloseTo(0.69999, 9);
    expect(attempt.feeCost).toBeCloseTo(0.00001, 12);
  });

  describe('when the input asset is not SOL', () => {
    const quoteSide: Opportunity = { ...opportunity, inputMint: USDC, outputMint: SOL };
    const settlements = () => [
      { tokenDelta: -1000, feeLamports: 5000 },
      { tokenDelta: 1000.7, feeLamports: 5000 },
    ];

    it('converts network fees at the pool price', async () => {
      const ledger = new ScriptedLedger({ settlements: settlements() });
      const { coordinator } = setup(ledger, false);

      const attempt = await coordinator.execute(quoteSide, bracket, { ...context, solPrice: 25 });

      // 0.00001 SOL of fees at 25 USDC each
      expect(attempt.feeCost).toBeCloseTo(0.00025, 12);
      expect(attempt.actualProfit).toBeCloseTo(0.69975, 9);
    });

    it('charges the estimated cost without a price', async () => {
      const ledger = new ScriptedLedger({ settlements: settlements() });
      const { coordinator } = setup(ledger, false);

      const attempt = await coordinator.execute(quoteSide, bracket, context);

      expect(attempt.feeCost).toBe(0.002);
      expect(attempt.actualProfit).toBeCloseTo(0.698, 9);
    });
  });

  it('falls back to the expected profit when a settlement is missing', async () => {
    const ledger = new ScriptedLedger({
      settlements: [{ tokenDelta: -1000, feeLamports: 5000 }, null],
    });
    const { coordinator } = setup(ledger, false);

    const attempt = await coordinator.execute(opportunity, bracket, context);

    expect(attempt.outcome).toBe(AttemptOutcome.SUCCESS);
    expect(attempt.actualProfit).toBe(0.498);
    expect(attempt.feeCost).toBe(0.002);
  });

  it('records each attempt once under its own id', async () => {
    const ledger = new ScriptedLedger({ failSends: [1] });
    const { stats, coordinator } = setup(ledger);

    const first = await coordinator.execute(opportunity, bracket, context);
    const second = await coordinator.execute(opportunity, bracket, context);

    expect([first.id, second.id]).toEqual([1, 2]);
    expect(stats.snapshot()).toMatchObject({
      attempted: 2,
      successes: 1,
      failures: 1,
    });
  });
});
