import * as fs from 'fs';
import type { Writable } from 'stream';
import { stringify, type Stringifier } from 'csv-stringify';
import { SandwichBotError } from './errors.js';
import type { Logger } from './logger.js';
import {
  AttemptOutcome,
  OpportunityStatus,
  type Opportunity,
  type SandwichAttempt,
} from './types.js';

type AttemptCSV = {
  timestamp: number;
  id: number;
  pair: string;
  outcome: string;
  failureReason: string;
  targetSignature: string;
  frontRunSignature: string;
  backRunSignature: string;
  frontRunAmount: number;
  expectedProfit: number;
  actualProfit: number;
  feeCost: number;
  durationMs: number;
  detected: number;
  evaluated: number;
  built: number;
  frontRunSent: number;
  frontRunConfirmed: number;
  backRunSent: number;
  backRunConfirmed: number;
};

export interface AttemptLedger {
  write(attempt: SandwichAttempt): void;
  close(): Promise<void>;
}

/** One csv row per finished attempt. */
class CsvAttemptLedger implements AttemptLedger {
  private readonly stringifier: Stringifier;

  constructor(
    private readonly output: Writable,
    private readonly now: () => number = Date.now,
  ) {
    this.stringifier = stringify({ header: true });
    this.stringifier.pipe(output);
  }

  static toFile(path: string): CsvAttemptLedger {
    return new CsvAttemptLedger(fs.createWriteStream(path));
  }

  write(attempt: SandwichAttempt) {
    const row: AttemptCSV = {
      timestamp: this.now(),
      id: attempt.id,
      pair: attempt.pair,
      outcome: attempt.outcome ?? '',
      failureReason: attempt.failureReason ?? '',
      targetSignature: attempt.opportunity.targetSignature,
      frontRunSignature: attempt.frontRunSignature ?? '',
      backRunSignature: attempt.backRunSignature ?? '',
      frontRunAmount: attempt.opportunity.frontRunAmount,
      expectedProfit: attempt.opportunity.expectedProfit,
      actualProfit: attempt.actualProfit,
      feeCost: attempt.feeCost,
      durationMs: attempt.durationMs,
      ...attempt.timings,
    };
    this.stringifier.write(row);
  }

  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.output.once('finish', () => resolve());
      this.output.once('error', reject);
      this.stringifier.end();
    });
  }
}

export type StatsSnapshot = Readonly<{
  detected: number;
  accepted: number;
  rejected: number;
  attempted: number;
  successes: number;
  partialFailures: number;
  failures: number;
  totalProfit: number;
  totalCost: number;
  startedAt: number;
}>;

/**
 * Running counters of one session. Every finished attempt is recorded exactly
 * once; the coordinator is the only caller of recordAttempt.
 */
class SessionStats {
  private detected = 0;
  private accepted = 0;
  private rejected = 0;
  private successes = 0;
  private partialFailures = 0;
  private failures = 0;
  private totalProfit = 0;
  private totalCost = 0;
  private readonly startedAt: number;
  private readonly recorded: Set<number> = new Set();

  constructor(
    private readonly options: { ledger?: AttemptLedger; now?: () => number } = {},
  ) {
    this.startedAt = (options.now ?? Date.now)();
  }

  recordDetected() {
    this.detected++;
  }

  recordEvaluation(opportunity: Opportunity) {
    if (opportunity.status === OpportunityStatus.ACCEPTED) {
      this.accepted++;
    } else if (opportunity.status === OpportunityStatus.REJECTED) {
      this.rejected++;
    }
  }

  recordAttempt(attempt: SandwichAttempt) {
    if (attempt.outcome === null) {
      throw new SandwichBotError(`attempt ${attempt.id} has not finished`, 'STATS');
    }
    if (this.recorded.has(attempt.id)) {
      throw new SandwichBotError(`attempt ${attempt.id} already recorded`, 'STATS');
    }
    this.recorded.add(attempt.id);

    switch (attempt.outcome) {
      case AttemptOutcome.SUCCESS:
        this.successes++;
        break;
      case AttemptOutcome.PARTIAL_FAILURE:
        this.partialFailures++;
        break;
      case AttemptOutcome.FAILURE:
        this.failures++;
        break;
    }
    this.totalProfit += attempt.actualProfit;
    this.totalCost += attempt.feeCost;
    this.options.ledger?.write(attempt);
  }

  snapshot(): StatsSnapshot {
    return {
      detected: this.detected,
      accepted: this.accepted,
      rejected: this.rejected,
      attempted: this.recorded.size,
      successes: this.successes,
      partialFailures: this.partialFailures,
      failures: this.failures,
      totalProfit: this.totalProfit,
      totalCost: this.totalCost,
      startedAt: this.startedAt,
    };
  }

  successRate(): number {
    const attempted = this.recorded.size;
    return attempted === 0 ? 0 : (this.successes / attempted) * 100;
  }

  report(logger: Logger) {
    const stats = this.snapshot();
    const elapsedSeconds = ((this.options.now ?? Date.now)() - stats.startedAt) / 1000;
    logger.info(
      stats,
      `session over after ${elapsedSeconds.toFixed(0)}s: ${stats.detected} trades seen, ` +
        `${stats.accepted} accepted, ${stats.rejected} rejected, ` +
        `${stats.attempted} attempted (${stats.successes} ok, ${stats.partialFailures} partial, ${stats.failures} failed), ` +
        `success rate ${this.successRate().toFixed(1)}%, ` +
        `net ${stats.totalProfit.toFixed(6)} after ${stats.totalCost.toFixed(6)} in fees`,
    );
  }
}

export { SessionStats, CsvAttemptLedger };
