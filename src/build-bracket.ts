import {
  ComputeBudgetProgram,
  PublicKey,
  TransactionInstruction,
  TransactionMessage,
  VersionedTransaction,
} from '@solana/web3.js';
import * as Token from '@solana/spl-token';
import { applySwap, flip, toAtomic } from './amm.js';
import type { SigningIdentity } from './clients/wallet.js';
import type { BuilderConfig } from './config.js';
import { RAYDIUM_AMM_PROGRAM_ID, SWAP_BASE_IN_OPCODE } from './constants.js';
import { BuildError } from './errors.js';
import { orient } from './evaluator.js';
import { SwapBaseInInstructionLayout } from './markets/raydium/layout.js';
import type {
  Bracket,
  BracketLeg,
  Opportunity,
  PoolKeys,
  PoolState,
} from './types.js';

const BPS = 10_000n;

type SwapAccounts = {
  keys: PoolKeys;
  owner: PublicKey;
  userSource: PublicKey;
  userDestination: PublicKey;
};

function swapBaseInInstruction(
  accounts: SwapAccounts,
  amountIn: bigint,
  minimumAmountOut: bigint,
  programId: PublicKey = RAYDIUM_AMM_PROGRAM_ID,
): TransactionInstruction {
  const { keys, owner, userSource, userDestination } = accounts;
  const data = Buffer.alloc(SwapBaseInInstructionLayout.span);
  SwapBaseInInstructionLayout.encode(
    { instruction: SWAP_BASE_IN_OPCODE, amountIn, minimumAmountOut },
    data,
  );

  const meta = (address: string, isWritable: boolean) => ({
    pubkey: new PublicKey(address),
    isSigner: false,
    isWritable,
  });

  return new TransactionInstruction({
    programId,
    keys: [
      { pubkey: Token.TOKEN_PROGRAM_ID, isSigner: false, isWritable: false },
      meta(keys.id, true),
      meta(keys.authority, false),
      meta(keys.openOrders, true),
      meta(keys.targetOrders, true),
      meta(keys.baseVault, true),
      meta(keys.quoteVault, true),
      meta(keys.marketProgramId, false),
      meta(keys.marketId, true),
      meta(keys.marketBids, true),
      meta(keys.marketAsks, true),
      meta(keys.marketEventQueue, true),
      meta(keys.marketBaseVault, true),
      meta(keys.marketQuoteVault, true),
      meta(keys.marketAuthority, false),
      { pubkey: userSource, isSigner: false, isWritable: true },
      { pubkey: userDestination, isSigner: false, isWritable: true },
      { pubkey: owner, isSigner: true, isWritable: false },
    ],
    data,
  });
}

function minimumOut(expectedOut: bigint, slippageTolerance: number): bigint {
  const toleranceBps = BigInt(Math.round(slippageTolerance * Number(BPS)));
  return (expectedOut * (BPS - toleranceBps)) / BPS;
}

function buildLeg(
  keys: PoolKeys,
  identity: SigningIdentity,
  blockhash: string,
  config: BuilderConfig,
  swap: { sourceMint: string; destinationMint: string; amountIn: bigint; expectedOut: bigint },
): BracketLeg {
  const owner = identity.publicKey;
  const destinationMint = new PublicKey(swap.destinationMint);
  const userSource = Token.getAssociatedTokenAddressSync(
    new PublicKey(swap.sourceMint),
    owner,
  );
  const userDestination = Token.getAssociatedTokenAddressSync(destinationMint, owner);
  const minimumAmountOut = minimumOut(swap.expectedOut, config.slippageTolerance);

  const instructions: TransactionInstruction[] = [];
  if (config.priorityFeeMicroLamports > 0) {
    instructions.push(
      ComputeBudgetProgram.setComputeUnitPrice({
        microLamports: config.priorityFeeMicroLamports,
      }),
    );
  }
  instructions.push(
    Token.createAssociatedTokenAccountIdempotentInstruction(
      owner,
      userDestination,
      owner,
      destinationMint,
    ),
    swapBaseInInstruction(
      { keys, owner, userSource, userDestination },
      swap.amountIn,
      minimumAmountOut,
    ),
  );

  const message = new TransactionMessage({
    payerKey: owner,
    recentBlockhash: blockhash,
    instructions,
  }).compileToV0Message();
  const transaction = new VersionedTransaction(message);
  identity.sign(transaction);

  return {
    transaction,
    amountIn: swap.amountIn,
    expectedOut: swap.expectedOut,
    minimumAmountOut,
  };
}

/**
 * Builds and signs the front-run and back-run swaps around the target trade.
 * The target is replayed on the pool between the legs so the back-run is
 * priced on the reserves it will actually meet. Nothing is submitted.
 */
function buildBracket(
  opportunity: Opportunity,
  pool: PoolState,
  identity: SigningIdentity,
  blockhash: string,
  config: BuilderConfig,
): Bracket {
  if (pool.keys === undefined) {
    throw new BuildError('MissingPoolKeys', `pool ${pool.id} has no swap accounts`);
  }
  // slippage floors go on chain, so no pricing off the liquidity proxies here
  if (pool.baseReserve === undefined || pool.quoteReserve === undefined) {
    throw new BuildError('MissingReserves', `pool ${pool.id} has no known reserves`);
  }

  const { reserveIn, reserveOut, decimalsIn, decimalsOut } = orient(opportunity, pool);
  const reserves = {
    reserveIn: toAtomic(reserveIn, decimalsIn),
    reserveOut: toAtomic(reserveOut, decimalsOut),
  };
  const frontRunIn = toAtomic(opportunity.frontRunAmount, decimalsIn);
  const targetIn = toAtomic(opportunity.targetAmountIn, decimalsIn);
  if (frontRunIn <= 0n) {
    throw new BuildError('InsufficientOutput', 'front-run size rounds to zero');
  }

  const frontRun = applySwap(reserves, frontRunIn, config.feeRate);
  if (frontRun.quote.amountOut <= 0n) {
    throw new BuildError('InsufficientOutput', 'front-run returns nothing');
  }
  const afterTarget =
    targetIn > 0n
      ? applySwap(frontRun.reserves, targetIn, config.feeRate).reserves
      : frontRun.reserves;
  const backRun = applySwap(flip(afterTarget), frontRun.quote.amountOut, config.feeRate);
  if (backRun.quote.amountOut <= 0n) {
    throw new BuildError('InsufficientOutput', 'back-run returns nothing');
  }

  const feeCost = toAtomic(opportunity.estimatedCost, decimalsIn);
  const expectedProfit = backRun.quote.amountOut - frontRunIn - feeCost;
  const profitRatio = Number(expectedProfit) / Number(frontRunIn);
  if (profitRatio < config.minProfitRatio) {
    throw new BuildError(
      'Unprofitable',
      `bracket returns ${(profitRatio * 100).toFixed(3)}%, below ${(config.minProfitRatio * 100).toFixed(3)}%`,
    );
  }

  return {
    frontRun: buildLeg(pool.keys, identity, blockhash, config, {
      sourceMint: opportunity.inputMint,
      destinationMint: opportunity.outputMint,
      amountIn: frontRunIn,
      expectedOut: frontRun.quote.amountOut,
    }),
    backRun: buildLeg(pool.keys, identity, blockhash, config, {
      sourceMint: opportunity.outputMint,
      destinationMint: opportunity.inputMint,
      amountIn: frontRun.quote.amountOut,
      expectedOut: backRun.quote.amountOut,
    }),
    expectedProfit,
    profitRatio,
  };
}

export { buildBracket, swapBaseInInstruction, minimumOut };
