import { LAMPORTS_PER_SOL, type PublicKey } from '@solana/web3.js';
import { NATIVE_MINT } from '@solana/spl-token';
import type { LedgerClient } from './clients/rpc.js';
import type { CoordinatorConfig } from './config.js';
import { errorMessage } from './errors.js';
import type { Logger } from './logger.js';
import type { SessionStats } from './stats.js';
import {
  AttemptOutcome,
  AttemptState,
  type Bracket,
  type Opportunity,
  type SandwichAttempt,
  type Timings,
} from './types.js';
import { shortenAddress } from './utils.js';

export type AttemptContext = {
  pair: string;
  timings: Pick<Timings, 'detected' | 'evaluated' | 'built'>;
  /** One SOL in units of the input asset, when the pool can tell. */
  solPrice?: number | null;
  signal?: AbortSignal;
};

type Result = Pick<SandwichAttempt, 'actualProfit' | 'feeCost' | 'failureReason'>;

type SandwichCoordinatorOptions = {
  ledger: LedgerClient;
  stats: SessionStats;
  config: CoordinatorConfig;
  logger: Logger;
  owner: PublicKey;
  // price successes from the expected profit instead of the chain
  simulateProfit: boolean;
  random?: () => number;
  now?: () => number;
};

/**
 * Submits a bracket leg by leg: the back-run only goes out once the front-run
 * is confirmed. Submitted legs are never retried. Each attempt ends in exactly
 * one outcome and is recorded once.
 */
class SandwichCoordinator {
  private nextId = 1;

  constructor(private readonly options: SandwichCoordinatorOptions) {}

  async execute(
    opportunity: Opportunity,
    bracket: Bracket,
    context: AttemptContext,
  ): Promise<SandwichAttempt> {
    const { ledger, config } = this.options;
    const now = this.options.now ?? Date.now;
    const startedAt = now();
    const legFee = opportunity.estimatedCost / 2;

    const attempt: SandwichAttempt = {
      id: this.nextId++,
      opportunity,
      pair: context.pair,
      state: AttemptState.BUILT,
      frontRunSignature: null,
      backRunSignature: null,
      actualProfit: 0,
      feeCost: 0,
      durationMs: 0,
      outcome: null,
      failureReason: null,
      timings: {
        ...context.timings,
        frontRunSent: 0,
        frontRunConfirmed: 0,
        backRunSent: 0,
        backRunConfirmed: 0,
      },
    };

    const finish = (outcome: AttemptOutcome, result: Result) => {
      attempt.outcome = outcome;
      attempt.actualProfit = result.actualProfit;
      attempt.feeCost = result.feeCost;
      attempt.failureReason = result.failureReason;
      attempt.durationMs = now() - startedAt;
      this.options.stats.recordAttempt(attempt);
      this.log(attempt);
      return attempt;
    };

    if (context.signal?.aborted) {
      return finish(AttemptOutcome.FAILURE, {
        actualProfit: 0,
        feeCost: 0,
        failureReason: 'session stopped before submission',
      });
    }

    try {
      attempt.frontRunSignature = await ledger.sendTransaction(
        bracket.frontRun.transaction,
      );
    } catch (error) {
      return finish(AttemptOutcome.FAILURE, {
        actualProfit: 0,
        feeCost: 0,
        failureReason: `front-run not submitted: ${errorMessage(error)}`,
      });
    }
    attempt.state = AttemptState.FRONT_RUN_SUBMITTED;
    attempt.timings.frontRunSent = now();

    const frontRunLanded = await this.confirm(
      attempt.frontRunSignature,
      config.frontRunTimeoutMs,
      context.signal,
    );
    if (!frontRunLanded) {
      return finish(AttemptOutcome.FAILURE, {
        actualProfit: -legFee,
        feeCost: legFee,
        failureReason: `front-run not confirmed within ${config.frontRunTimeoutMs}ms`,
      });
    }
    attempt.state = AttemptState.FRONT_RUN_CONFIRMED;
    attempt.timings.frontRunConfirmed = now();

    // from here on the front-run position is exposed
    const stranded: Result = {
      actualProfit: -(opportunity.frontRunAmount + legFee),
      feeCost: legFee,
      failureReason: null,
    };

    try {
      attempt.backRunSignature = await ledger.sendTransaction(
        bracket.backRun.transaction,
      );
    } catch (error) {
      return finish(AttemptOutcome.PARTIAL_FAILURE, {
        ...stranded,
        failureReason: `back-run not submitted: ${errorMessage(error)}`,
      });
    }
    attempt.state = AttemptState.BACK_RUN_SUBMITTED;
    attempt.timings.backRunSent = now();

    const backRunLanded = await this.confirm(
      attempt.backRunSignature,
      config.backRunTimeoutMs,
      context.signal,
    );
    if (!backRunLanded) {
      return finish(AttemptOutcome.PARTIAL_FAILURE, {
        ...stranded,
        failureReason: `back-run not confirmed within ${config.backRunTimeoutMs}ms`,
      });
    }
    attempt.state = AttemptState.BACK_RUN_CONFIRMED;
    attempt.timings.backRunConfirmed = now();

    return finish(
      AttemptOutcome.SUCCESS,
      await this.realise(attempt, context.solPrice ?? null),
    );
  }

  private async confirm(
    signature: string,
    timeoutMs: number,
    signal: AbortSignal | undefined,
  ): Promise<boolean> {
    try {
      return await this.options.ledger.confirmTransaction(signature, timeoutMs, signal);
    } catch (error) {
      this.options.logger.warn({ signature, err: error }, 'confirmation failed');
      return false;
    }
  }

  private async realise(attempt: SandwichAttempt, solPrice: number | null): Promise<Result> {
    const { opportunity } = attempt;

    if (this.options.simulateProfit) {
      const random = this.options.random ?? Math.random;
      return {
        actualProfit:
          opportunity.expectedProfit * (0.8 + 0.4 * random()) -
          opportunity.estimatedCost,
        feeCost: opportunity.estimatedCost,
        failureReason: null,
      };
    }

    const fallback: Result = {
      actualProfit: opportunity.netProfit,
      feeCost: opportunity.estimatedCost,
      failureReason: null,
    };
    const { frontRunSignature, backRunSignature } = attempt;
    if (frontRunSignature === null || backRunSignature === null) return fallback;

    try {
      const [frontRun, backRun] = await Promise.all([
        this.options.ledger.getSwapSettlement(
          frontRunSignature,
          this.options.owner,
          opportunity.inputMint,
        ),
        this.options.ledger.getSwapSettlement(
          backRunSignature,
          this.options.owner,
          opportunity.inputMint,
        ),
      ]);
      if (frontRun !== null && backRun !== null) {
        // token deltas are in the input asset, network fees in SOL
        const feeSol = (frontRun.feeLamports + backRun.feeLamports) / LAMPORTS_PER_SOL;
        const rate = opportunity.inputMint === NATIVE_MINT.toBase58() ? 1 : solPrice;
        let feeCost = opportunity.estimatedCost;
        if (rate !== null && rate > 0) {
          feeCost = feeSol * rate;
        } else {
          this.options.logger.debug(
            { attempt: attempt.id, feeSol },
            'no SOL price for the input asset, charging the estimated cost',
          );
        }
        return {
          actualProfit: frontRun.tokenDelta + backRun.tokenDelta - feeCost,
          feeCost,
          failureReason: null,
        };
      }
      this.options.logger.warn(
        { attempt: attempt.id },
        'settlement unavailable, recording expected profit',
      );
    } catch (error) {
      this.options.logger.warn(
        { attempt: attempt.id, err: error },
        'settlement lookup failed, recording expected profit',
      );
    }
    return fallback;
  }

  private log(attempt: SandwichAttempt) {
    const { logger } = this.options;
    const { timings } = attempt;
    const summary = {
      id: attempt.id,
      pair: attempt.pair,
      target: attempt.opportunity.targetSignature,
      frontRun: attempt.frontRunSignature,
      backRun: attempt.backRunSignature,
      profit: attempt.actualProfit,
      fees: attempt.feeCost,
      durationMs: attempt.durationMs,
    };

    if (attempt.outcome === AttemptOutcome.SUCCESS) {
      logger.info(
        summary,
        `sandwich on ${attempt.pair} around ${shortenAddress(attempt.opportunity.targetSignature)} landed, profit ${attempt.actualProfit.toFixed(6)}`,
      );
      logger.info(
        `chain timings: evaluate: ${timings.evaluated - timings.detected}ms, build: ${
          timings.built - timings.evaluated
        }ms, front-run send: ${timings.frontRunSent - timings.built}ms, front-run confirm: ${
          timings.frontRunConfirmed - timings.frontRunSent
        }ms, back-run send: ${timings.backRunSent - timings.frontRunConfirmed}ms, back-run confirm: ${
          timings.backRunConfirmed - timings.backRunSent
        }ms ::: total ${timings.backRunConfirmed - timings.detected}ms`,
      );
    } else {
      logger.warn(
        summary,
        `sandwich on ${attempt.pair} ${attempt.outcome}: ${attempt.failureReason}, result ${attempt.actualProfit.toFixed(6)}`,
      );
    }
  }
}

export { SandwichCoordinator };
