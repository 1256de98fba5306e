import * as BufferLayout from '@solana/buffer-layout';
import { u64 } from '@solana/buffer-layout-utils';

export enum RayLogType {
  INIT = 0,
  DEPOSIT = 1,
  WITHDRAW = 2,
  SWAP_BASE_IN = 3,
  SWAP_BASE_OUT = 4,
}

// direction field of the swap logs
export enum SwapDirection {
  QUOTE_TO_BASE = 1,
  BASE_TO_QUOTE = 2,
}

export type SwapBaseInInstruction = {
  instruction: number;
  amountIn: bigint;
  minimumAmountOut: bigint;
};

export const SwapBaseInInstructionLayout =
  BufferLayout.struct<SwapBaseInInstruction>([
    BufferLayout.u8('instruction'),
    u64('amountIn'),
    u64('minimumAmountOut'),
  ]);

export type SwapBaseInLog = {
  logType: number;
  amountIn: bigint;
  minimumOut: bigint;
  direction: bigint;
  userSource: bigint;
  poolCoin: bigint;
  poolPc: bigint;
  outAmount: bigint;
};

export const SwapBaseInLogLayout = BufferLayout.struct<SwapBaseInLog>([
  BufferLayout.u8('logType'),
  u64('amountIn'),
  u64('minimumOut'),
  u64('direction'),
  u64('userSource'),
  u64('poolCoin'),
  u64('poolPc'),
  u64('outAmount'),
]);

export type SwapBaseOutLog = {
  logType: number;
  maxIn: bigint;
  amountOut: bigint;
  direction: bigint;
  userSource: bigint;
  poolCoin: bigint;
  poolPc: bigint;
  deductIn: bigint;
};

export const SwapBaseOutLogLayout = BufferLayout.struct<SwapBaseOutLog>([
  BufferLayout.u8('logType'),
  u64('maxIn'),
  u64('amountOut'),
  u64('direction'),
  u64('userSource'),
  u64('poolCoin'),
  u64('poolPc'),
  u64('deductIn'),
]);
