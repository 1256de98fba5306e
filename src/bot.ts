#!/usr/bin/env node
import { DryRunLedgerClient, SolanaLedgerClient, type LedgerClient } from './clients/rpc.js';
import { Wallet } from './clients/wallet.js';
import { loadConfig, type BotConfig } from './config.js';
import {
  MIN_OPERATING_BALANCE_SOL,
  RAYDIUM_AMM_PROGRAM_ID,
  RAYDIUM_FEE_RATE,
} from './constants.js';
import { SandwichCoordinator } from './coordinator.js';
import { logger } from './logger.js';
import { RaydiumPoolSource } from './markets/raydium/index.js';
import { toPairLabel } from './markets/types.js';
import {
  RecentSwapCandidates,
  SyntheticCandidates,
  type CandidateSource,
} from './mempool/candidates.js';
import { PendingTradeFeed } from './mempool/feed.js';
import { WebSocketLogStream } from './mempool/log-stream.js';
import { Session } from './session.js';
import { CsvAttemptLedger, SessionStats } from './stats.js';
import type { PoolState } from './types.js';
import { shortenAddress } from './utils.js';

let config: BotConfig;
try {
  config = loadConfig();
} catch (error) {
  logger.fatal({ err: error }, 'invalid configuration');
  process.exit(1);
}

let wallet: Wallet;
try {
  wallet = Wallet.fromFile(config.payerKeypairPath);
} catch (error) {
  logger.fatal({ err: error }, 'cannot load signing identity');
  process.exit(1);
}

logger.info(
  `${config.botName} on ${config.network} (${config.dryRun ? 'dry run' : 'live'}) as ${wallet.publicKey.toBase58()}`,
);

const rpc = SolanaLedgerClient.fromUrl(config.rpcUrl, config.wsUrl, {
  logger,
  confirmPollIntervalMs: config.coordinator.confirmPollIntervalMs,
});

try {
  const balance = await rpc.getBalance(wallet.publicKey);
  logger.info(`balance ${balance.toFixed(4)} SOL`);
  if (balance < MIN_OPERATING_BALANCE_SOL) {
    logger.warn(`balance below ${MIN_OPERATING_BALANCE_SOL} SOL, transactions may fail`);
  }
} catch (error) {
  logger.warn({ err: error }, 'cannot read balance');
}

const poolSource = new RaydiumPoolSource({
  network: config.network,
  statsUrl: config.pools.statsUrl,
  keysUrl: config.pools.keysUrl,
  cacheTtlMs: config.pools.cacheTtlMs,
  logger,
});

let targets: PoolState[];
try {
  targets = await poolSource.getSandwichTargets(config.pools.minTargetLiquidity);
} catch (error) {
  logger.fatal({ err: error }, 'cannot load pool metadata');
  process.exit(1);
}

logger.info(`${poolSource.label}: ${targets.length} sandwich targets`);
for (const pool of targets.slice(0, 10)) {
  logger.info(
    `  ${toPairLabel(pool).padEnd(14)} ${shortenAddress(pool.id)}  liquidity ${pool.liquidity.toFixed(0)}  24h volume ${pool.volume24h.toFixed(0)}  price ${pool.price}`,
  );
}
if (targets.length === 0) {
  logger.warn('no pools to watch, the session will see no trades');
}

const ledger: LedgerClient = config.dryRun
  ? new DryRunLedgerClient({
      confirmRate: config.simulation.confirmRate,
      latencyMs: config.simulation.latencyMs,
    })
  : rpc;

const candidates: CandidateSource = config.dryRun
  ? new SyntheticCandidates()
  : new RecentSwapCandidates({
      history: rpc,
      programId: RAYDIUM_AMM_PROGRAM_ID.toBase58(),
      feeRate: RAYDIUM_FEE_RATE,
      logger,
    });

const wsUrl = config.wsUrl;
const feed = new PendingTradeFeed({
  pools: targets,
  createStream: () => new WebSocketLogStream(wsUrl),
  candidates,
  config: config.feed,
  feeRate: RAYDIUM_FEE_RATE,
  logger,
});

const attemptLedger = config.attemptsCsvPath
  ? CsvAttemptLedger.toFile(config.attemptsCsvPath)
  : undefined;
const stats = new SessionStats({ ledger: attemptLedger });

const coordinator = new SandwichCoordinator({
  ledger,
  stats,
  config: config.coordinator,
  logger,
  owner: wallet.publicKey,
  simulateProfit: config.dryRun,
});

const session = new Session({
  config,
  feed,
  poolSource,
  ledger,
  identity: wallet,
  coordinator,
  stats,
  attemptLedger,
  logger,
});

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    logger.info(`${signal} received, stopping`);
    session.stop();
  });
}

await session.run(config.sessionDurationMs);
