import convict from 'convict';
import * as dotenv from 'dotenv';
import { RAYDIUM_FEE_RATE } from './constants.js';
dotenv.config();

const schema = {
  bot_name: {
    format: String,
    default: 'local',
    env: 'BOT_NAME',
  },
  network: {
    format: ['mainnet-beta', 'devnet'],
    default: 'devnet',
    env: 'SOLANA_NETWORK',
  },
  rpc_url: {
    format: String,
    default: 'https://api.devnet.solana.com',
    env: 'RPC_URL',
  },
  ws_url: {
    format: String,
    default: '',
    doc: 'pub/sub endpoint. derived from rpc_url when empty',
    env: 'WS_URL',
  },
  payer_keypair_path: {
    format: String,
    default: './payer.json',
    env: 'PAYER_KEYPAIR_PATH',
  },
  dry_run: {
    format: Boolean,
    default: true,
    doc: 'simulate submission and confirmation instead of sending transactions',
    env: 'DRY_RUN',
  },
  session_duration_seconds: {
    format: 'nat',
    default: 60,
    doc: '0 runs until interrupted',
    env: 'SESSION_DURATION_SECONDS',
  },
  min_profit_threshold: {
    format: Number,
    default: 0.001,
    env: 'MIN_PROFIT_THRESHOLD',
  },
  max_position_size: {
    format: Number,
    default: 1.0,
    env: 'MAX_POSITION_SIZE',
  },
  max_slippage: {
    format: Number,
    default: 0.05,
    doc: 'largest price impact the front-run leg may cause on its own',
    env: 'MAX_SLIPPAGE',
  },
  sizing_fraction: {
    format: Number,
    default: 0.001,
    env: 'SIZING_FRACTION',
  },
  capture_ratio: {
    format: Number,
    default: 0.5,
    env: 'CAPTURE_RATIO',
  },
  estimated_fee_cost: {
    format: Number,
    default: 0.001,
    doc: 'fee cost of both legs, in input asset units',
    env: 'ESTIMATED_FEE_COST',
  },
  min_profit_ratio: {
    format: Number,
    default: 0.01,
    env: 'MIN_PROFIT_RATIO',
  },
  slippage_tolerance: {
    format: Number,
    default: 0.02,
    env: 'SLIPPAGE_TOLERANCE',
  },
  priority_fee_micro_lamports: {
    format: 'nat',
    default: 0,
    env: 'PRIORITY_FEE_MICRO_LAMPORTS',
  },
  subscription_ack_timeout_ms: {
    format: 'nat',
    default: 5000,
    env: 'SUBSCRIPTION_ACK_TIMEOUT_MS',
  },
  stream_idle_timeout_ms: {
    format: 'nat',
    default: 30000,
    env: 'STREAM_IDLE_TIMEOUT_MS',
  },
  poll_interval_ms: {
    format: 'nat',
    default: 2000,
    env: 'POLL_INTERVAL_MS',
  },
  trade_queue_high_water_mark: {
    doc: 'queued trades beyond this are dropped. 0 keeps every trade',
    format: 'nat',
    default: 0,
    env: 'TRADE_QUEUE_HIGH_WATER_MARK',
  },
  max_trade_age_ms: {
    format: 'nat',
    default: 10000,
    env: 'MAX_TRADE_AGE_MS',
  },
  front_run_timeout_ms: {
    format: 'nat',
    default: 5000,
    env: 'FRONT_RUN_TIMEOUT_MS',
  },
  back_run_timeout_ms: {
    format: 'nat',
    default: 10000,
    env: 'BACK_RUN_TIMEOUT_MS',
  },
  confirm_poll_interval_ms: {
    format: 'nat',
    default: 500,
    env: 'CONFIRM_POLL_INTERVAL_MS',
  },
  pool_cache_ttl_ms: {
    format: 'nat',
    default: 300000,
    env: 'POOL_CACHE_TTL_MS',
  },
  pool_stats_url: {
    format: String,
    default: 'https://api.raydium.io/v2/main/pairs',
    env: 'POOL_STATS_URL',
  },
  pool_keys_url: {
    format: String,
    default: 'https://api.raydium.io/v2/sdk/liquidity/mainnet.json',
    env: 'POOL_KEYS_URL',
  },
  min_target_liquidity: {
    format: Number,
    default: 100000,
    env: 'MIN_TARGET_LIQUIDITY',
  },
  attempts_csv_path: {
    format: String,
    default: 'attempts.csv',
    doc: 'empty disables the attempt ledger',
    env: 'ATTEMPTS_CSV_PATH',
  },
  simulated_confirm_rate: {
    format: Number,
    default: 0.9,
    env: 'SIMULATED_CONFIRM_RATE',
  },
  simulated_latency_ms: {
    format: 'nat',
    default: 100,
    env: 'SIMULATED_LATENCY_MS',
  },
};

export type BotConfig = Readonly<{
  botName: string;
  network: 'mainnet-beta' | 'devnet';
  rpcUrl: string;
  wsUrl: string;
  payerKeypairPath: string;
  dryRun: boolean;
  sessionDurationMs: number;
  evaluator: EvaluatorConfig;
  builder: BuilderConfig;
  feed: FeedConfig;
  coordinator: CoordinatorConfig;
  pools: PoolSourceConfig;
  maxTradeAgeMs: number;
  attemptsCsvPath: string;
  simulation: SimulationConfig;
}>;

export type EvaluatorConfig = Readonly<{
  minProfitThreshold: number;
  maxPositionSize: number;
  maxSlippage: number;
  sizingFraction: number;
  captureRatio: number;
  feeRate: number;
  estimatedFeeCost: number;
}>;

export type BuilderConfig = Readonly<{
  feeRate: number;
  minProfitRatio: number;
  slippageTolerance: number;
  priorityFeeMicroLamports: number;
}>;

export type FeedConfig = Readonly<{
  subscriptionAckTimeoutMs: number;
  streamIdleTimeoutMs: number;
  pollIntervalMs: number;
  // 0 for no limit
  highWaterMark: number;
}>;

export type CoordinatorConfig = Readonly<{
  frontRunTimeoutMs: number;
  backRunTimeoutMs: number;
  confirmPollIntervalMs: number;
}>;

export type PoolSourceConfig = Readonly<{
  cacheTtlMs: number;
  statsUrl: string;
  keysUrl: string;
  minTargetLiquidity: number;
}>;

export type SimulationConfig = Readonly<{
  confirmRate: number;
  latencyMs: number;
}>;

function toWebsocketUrl(rpcUrl: string): string {
  return rpcUrl.replace(/^http/, 'ws');
}

function loadConfig(overrides: Record<string, unknown> = {}): BotConfig {
  const config = convict(schema);
  config.load(overrides);
  config.validate({ allowed: 'strict' });

  const rpcUrl = config.get('rpc_url');
  const feeRate = RAYDIUM_FEE_RATE;

  return Object.freeze({
    botName: config.get('bot_name'),
    network: config.get('network') === 'mainnet-beta' ? 'mainnet-beta' : 'devnet',
    rpcUrl,
    wsUrl: config.get('ws_url') || toWebsocketUrl(rpcUrl),
    payerKeypairPath: config.get('payer_keypair_path'),
    dryRun: config.get('dry_run'),
    sessionDurationMs: config.get('session_duration_seconds') * 1000,
    evaluator: {
      minProfitThreshold: config.get('min_profit_threshold'),
      maxPositionSize: config.get('max_position_size'),
      maxSlippage: config.get('max_slippage'),
      sizingFraction: config.get('sizing_fraction'),
      captureRatio: config.get('capture_ratio'),
      feeRate,
      estimatedFeeCost: config.get('estimated_fee_cost'),
    },
    builder: {
      feeRate,
      minProfitRatio: config.get('min_profit_ratio'),
      slippageTolerance: config.get('slippage_tolerance'),
      priorityFeeMicroLamports: config.get('priority_fee_micro_lamports'),
    },
    feed: {
      subscriptionAckTimeoutMs: config.get('subscription_ack_timeout_ms'),
      streamIdleTimeoutMs: config.get('stream_idle_timeout_ms'),
      pollIntervalMs: config.get('poll_interval_ms'),
      highWaterMark: config.get('trade_queue_high_water_mark'),
    },
    coordinator: {
      frontRunTimeoutMs: config.get('front_run_timeout_ms'),
      backRunTimeoutMs: config.get('back_run_timeout_ms'),
      confirmPollIntervalMs: config.get('confirm_poll_interval_ms'),
    },
    pools: {
      cacheTtlMs: config.get('pool_cache_ttl_ms'),
      statsUrl: config.get('pool_stats_url'),
      keysUrl: config.get('pool_keys_url'),
      minTargetLiquidity: config.get('min_target_liquidity'),
    },
    maxTradeAgeMs: config.get('max_trade_age_ms'),
    attemptsCsvPath: config.get('attempts_csv_path'),
    simulation: {
      confirmRate: config.get('simulated_confirm_rate'),
      latencyMs: config.get('simulated_latency_ms'),
    },
  });
}

export { loadConfig };
