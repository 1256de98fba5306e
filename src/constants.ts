import { PublicKey } from '@solana/web3.js';

export const RAYDIUM_AMM_PROGRAM_ID = new PublicKey(
  '675kPX9MHTjS2zt1qfr1NYHuzeLXfQM9H24wFSUt1Mp8',
);
export const OPENBOOK_PROGRAM_ID = new PublicKey(
  'srmqPvymJeFKQ4zGQed1GFppgkRHL9kaELCbyksJtPX',
);

// raydium v4 constant product pools charge 25 bps
export const RAYDIUM_FEE_RATE = 0.0025;

// instruction tag of swapBaseIn in the raydium amm program
export const SWAP_BASE_IN_OPCODE = 9;

export const MIN_OPERATING_BALANCE_SOL = 0.1;
