import {
  Connection,
  LAMPORTS_PER_SOL,
  PublicKey,
  VersionedTransaction,
  type TokenBalance,
  type VersionedTransactionResponse,
} from '@solana/web3.js';
import bs58 from 'bs58';
import { randomBytes } from 'crypto';
import { TransportError, errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import type { SwapHistory, TransactionLogs } from '../mempool/candidates.js';
import type { PoolKeys, PoolReserves } from '../types.js';
import { sleep } from '../utils.js';

/** Change in the owner's balance of one mint caused by a transaction. */
export type SwapSettlement = {
  tokenDelta: number;
  feeLamports: number;
};

export type LedgerStats = {
  sent: number;
  confirmed: number;
  failed: number;
  averageConfirmationMs: number;
};

export interface LedgerClient {
  /** Balance in SOL. */
  getBalance(account: PublicKey): Promise<number>;
  /** Resolves with the base58 signature, or rejects with a TransportError. */
  sendTransaction(transaction: VersionedTransaction): Promise<string>;
  /** False when the transaction failed, the wait timed out or was aborted. */
  confirmTransaction(
    signature: string,
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<boolean>;
  getRecentBlockhash(): Promise<string>;
  /** Vault balances of the pool, or null when either vault is empty. */
  getPoolReserves(keys: PoolKeys): Promise<PoolReserves | null>;
  getSwapSettlement(
    signature: string,
    owner: PublicKey,
    mint: string,
  ): Promise<SwapSettlement | null>;
  getStats(): LedgerStats;
}

class LedgerStatsTracker {
  private readonly stats: LedgerStats = {
    sent: 0,
    confirmed: 0,
    failed: 0,
    averageConfirmationMs: 0,
  };

  sent() {
    this.stats.sent++;
  }

  failed() {
    this.stats.failed++;
  }

  confirmed(elapsedMs: number) {
    this.stats.confirmed++;
    this.stats.averageConfirmationMs +=
      (elapsedMs - this.stats.averageConfirmationMs) / this.stats.confirmed;
  }

  snapshot(): LedgerStats {
    return { ...this.stats };
  }
}

function balanceOf(
  balances: TokenBalance[] | null | undefined,
  owner: string,
  mint: string,
): number {
  const entry = balances?.find(
    (balance) => balance.owner === owner && balance.mint === mint,
  );
  if (entry === undefined) return 0;
  return Number(entry.uiTokenAmount.uiAmountString ?? entry.uiTokenAmount.uiAmount ?? 0);
}

type SolanaLedgerClientOptions = {
  logger: Logger;
  confirmPollIntervalMs: number;
  now?: () => number;
};

class SolanaLedgerClient implements LedgerClient, SwapHistory {
  private readonly tracker = new LedgerStatsTracker();

  constructor(
    private readonly connection: Connection,
    private readonly options: SolanaLedgerClientOptions,
  ) {}

  static fromUrl(
    rpcUrl: string,
    wsUrl: string,
    options: SolanaLedgerClientOptions,
  ): SolanaLedgerClient {
    return new SolanaLedgerClient(
      new Connection(rpcUrl, { commitment: 'confirmed', wsEndpoint: wsUrl }),
      options,
    );
  }

  async getBalance(account: PublicKey): Promise<number> {
    try {
      return (await this.connection.getBalance(account)) / LAMPORTS_PER_SOL;
    } catch (error) {
      throw new TransportError(`getBalance failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  async sendTransaction(transaction: VersionedTransaction): Promise<string> {
    try {
      const signature = await this.connection.sendTransaction(transaction, {
        preflightCommitment: 'confirmed',
        maxRetries: 0,
      });
      this.tracker.sent();
      return signature;
    } catch (error) {
      this.tracker.failed();
      throw new TransportError(`sendTransaction failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  async confirmTransaction(
    signature: string,
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<boolean> {
    const now = this.options.now ?? Date.now;
    const startedAt = now();
    const deadline = startedAt + timeoutMs;

    while (now() < deadline && !signal?.aborted) {
      try {
        const { value } = await this.connection.getSignatureStatuses([signature]);
        const status = value[0];
        if (status !== null && status !== undefined) {
          if (status.err !== null) {
            this.tracker.failed();
            this.options.logger.warn({ signature, err: status.err }, 'transaction failed');
            return false;
          }
          if (
            status.confirmationStatus === 'confirmed' ||
            status.confirmationStatus === 'finalized'
          ) {
            this.tracker.confirmed(now() - startedAt);
            return true;
          }
        }
      } catch (error) {
        this.options.logger.warn(
          { signature, err: error },
          'signature status poll failed',
        );
      }
      await sleep(this.options.confirmPollIntervalMs, signal);
    }

    return false;
  }

  async getRecentBlockhash(): Promise<string> {
    try {
      const { blockhash } = await this.connection.getLatestBlockhash('confirmed');
      return blockhash;
    } catch (error) {
      throw new TransportError(`getLatestBlockhash failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  async getPoolReserves(keys: PoolKeys): Promise<PoolReserves | null> {
    try {
      const [base, quote] = await Promise.all(
        [keys.baseVault, keys.quoteVault].map((vault) =>
          this.connection.getTokenAccountBalance(new PublicKey(vault), 'processed'),
        ),
      );
      const reserves = {
        base: Number(base.value.uiAmountString ?? base.value.uiAmount ?? 0),
        quote: Number(quote.value.uiAmountString ?? quote.value.uiAmount ?? 0),
      };
      return reserves.base > 0 && reserves.quote > 0 ? reserves : null;
    } catch (error) {
      throw new TransportError(`pool vault lookup failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  async getSwapSettlement(
    signature: string,
    owner: PublicKey,
    mint: string,
  ): Promise<SwapSettlement | null> {
    const transaction = await this.connection.getTransaction(signature, {
      commitment: 'confirmed',
      maxSupportedTransactionVersion: 0,
    });
    const meta = transaction?.meta;
    if (meta === null || meta === undefined) return null;

    const holder = owner.toBase58();
    return {
      tokenDelta:
        balanceOf(meta.postTokenBalances, holder, mint) -
        balanceOf(meta.preTokenBalances, holder, mint),
      feeLamports: meta.fee,
    };
  }

  async recentSignatures(
    address: string,
    until: string | undefined,
    limit: number,
  ): Promise<string[]> {
    try {
      const signatures = await this.connection.getSignaturesForAddress(
        new PublicKey(address),
        { until, limit },
        'confirmed',
      );
      return signatures.map((info) => info.signature);
    } catch (error) {
      throw new TransportError(`getSignaturesForAddress failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  async transactionLogs(signature: string): Promise<TransactionLogs | null> {
    let transaction: VersionedTransactionResponse | null;
    try {
      transaction = await this.connection.getTransaction(signature, {
        commitment: 'confirmed',
        maxSupportedTransactionVersion: 0,
      });
    } catch (error) {
      throw new TransportError(`getTransaction failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    if (transaction === null || transaction.meta === null) return null;

    const feePayer = transaction.transaction.message.staticAccountKeys[0];
    return {
      logs: transaction.meta.logMessages ?? [],
      feePayer: feePayer === undefined ? null : feePayer.toBase58(),
      failed: transaction.meta.err !== null,
    };
  }

  getStats(): LedgerStats {
    return this.tracker.snapshot();
  }
}

type DryRunLedgerClientOptions = {
  confirmRate: number;
  latencyMs: number;
  balance?: number;
  random?: () => number;
};

/**
 * Stands in for the network during dry runs. Submissions always succeed and
 * each one lands with probability `confirmRate`.
 */
class DryRunLedgerClient implements LedgerClient {
  private readonly tracker = new LedgerStatsTracker();
  private readonly landed: Map<string, boolean> = new Map();

  constructor(private readonly options: DryRunLedgerClientOptions) {}

  async getBalance(): Promise<number> {
    return this.options.balance ?? 0;
  }

  async sendTransaction(transaction: VersionedTransaction): Promise<string> {
    await sleep(this.options.latencyMs);
    const signature = bs58.encode(transaction.signatures[0]);
    const random = this.options.random ?? Math.random;
    this.landed.set(signature, random() < this.options.confirmRate);
    this.tracker.sent();
    return signature;
  }

  async confirmTransaction(
    signature: string,
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<boolean> {
    const waitMs = Math.min(this.options.latencyMs, timeoutMs);
    await sleep(waitMs, signal);
    if (signal?.aborted || this.landed.get(signature) !== true) {
      this.tracker.failed();
      return false;
    }
    this.tracker.confirmed(waitMs);
    return true;
  }

  async getRecentBlockhash(): Promise<string> {
    return bs58.encode(randomBytes(32));
  }

  async getPoolReserves(): Promise<PoolReserves | null> {
    return null;
  }

  async getSwapSettlement(): Promise<SwapSettlement | null> {
    return null;
  }

  getStats(): LedgerStats {
    return this.tracker.snapshot();
  }
}

export { SolanaLedgerClient, DryRunLedgerClient };
