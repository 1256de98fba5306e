import * as fs from 'fs';
import { Keypair, PublicKey, VersionedTransaction } from '@solana/web3.js';
import { z } from 'zod';
import { SandwichBotError } from '../errors.js';

/** Anything that can sign the bot's transactions. */
export interface SigningIdentity {
  readonly publicKey: PublicKey;
  sign(transaction: VersionedTransaction): void;
}

// solana cli keypair files hold the 64 byte secret key as a json array
const KeypairFileSchema = z.array(z.number().int().min(0).max(255)).length(64);

class Wallet implements SigningIdentity {
  constructor(private readonly keypair: Keypair) {}

  static fromFile(path: string): Wallet {
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(path).toString());
    } catch (error) {
      throw new SandwichBotError(`cannot read keypair file ${path}`, 'WALLET_LOAD', {
        cause: error,
      });
    }

    const parsed = KeypairFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new SandwichBotError(
        `${path} is not a 64 byte keypair file`,
        'WALLET_LOAD',
      );
    }
    return new Wallet(Keypair.fromSecretKey(new Uint8Array(parsed.data)));
  }

  get publicKey(): PublicKey {
    return this.keypair.publicKey;
  }

  sign(transaction: VersionedTransaction) {
    transaction.sign([this.keypair]);
  }
}

export { Wallet };
