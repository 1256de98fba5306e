import type { VersionedTransaction } from '@solana/web3.js';

export type TradeSource = 'stream' | 'poll' | 'synthetic';

/** Pool depth in UI units of each asset. */
export type PoolReserves = Readonly<{
  base: number;
  quote: number;
}>;

/** A swap observed on the network before we act on it. Never persisted. */
export type PendingTrade = Readonly<{
  signature: string;
  initiator: string | null;
  inputMint: string;
  outputMint: string;
  amountIn: number;
  poolId: string;
  estimatedPriceImpact: number;
  observedAt: number;
  source: TradeSource;
  // what the pool held when the swap was logged
  poolReserves?: PoolReserves;
}>;

/** Accounts a raydium v4 swap instruction references. */
export type PoolKeys = Readonly<{
  id: string;
  authority: string;
  openOrders: string;
  targetOrders: string;
  baseVault: string;
  quoteVault: string;
  marketProgramId: string;
  marketId: string;
  marketBids: string;
  marketAsks: string;
  marketEventQueue: string;
  marketBaseVault: string;
  marketQuoteVault: string;
  marketAuthority: string;
}>;

export type PoolState = Readonly<{
  id: string;
  baseMint: string;
  quoteMint: string;
  baseSymbol: string;
  quoteSymbol: string;
  baseDecimals: number;
  quoteDecimals: number;
  baseReserve?: number;
  quoteReserve?: number;
  liquidity: number;
  volume24h: number;
  price: number;
  lastRefreshed: number;
  keys?: PoolKeys;
}>;

export enum OpportunityStatus {
  PENDING = 'Pending',
  ACCEPTED = 'Accepted',
  REJECTED = 'Rejected',
}

export type Opportunity = Readonly<{
  targetSignature: string;
  poolId: string;
  inputMint: string;
  outputMint: string;
  targetAmountIn: number;
  frontRunAmount: number;
  backRunAmount: number;
  frontRunPriceImpact: number;
  targetPriceImpact: number;
  expectedProfit: number;
  estimatedCost: number;
  netProfit: number;
  confidence: number;
  status: OpportunityStatus;
  rejectReason?: string;
}>;

export type BracketLeg = {
  transaction: VersionedTransaction;
  amountIn: bigint;
  expectedOut: bigint;
  minimumAmountOut: bigint;
};

export type Bracket = {
  frontRun: BracketLeg;
  backRun: BracketLeg;
  expectedProfit: bigint;
  profitRatio: number;
};

export enum AttemptState {
  BUILT = 'Built',
  FRONT_RUN_SUBMITTED = 'FrontRunSubmitted',
  FRONT_RUN_CONFIRMED = 'FrontRunConfirmed',
  BACK_RUN_SUBMITTED = 'BackRunSubmitted',
  BACK_RUN_CONFIRMED = 'BackRunConfirmed',
}

export enum AttemptOutcome {
  SUCCESS = 'Success',
  PARTIAL_FAILURE = 'PartialFailure',
  FAILURE = 'Failure',
}

export type Timings = {
  detected: number;
  evaluated: number;
  built: number;
  frontRunSent: number;
  frontRunConfirmed: number;
  backRunSent: number;
  backRunConfirmed: number;
};

export type SandwichAttempt = {
  id: number;
  opportunity: Opportunity;
  pair: string;
  state: AttemptState;
  frontRunSignature: string | null;
  backRunSignature: string | null;
  actualProfit: number;
  feeCost: number;
  durationMs: number;
  outcome: AttemptOutcome | null;
  failureReason: string | null;
  timings: Timings;
};
