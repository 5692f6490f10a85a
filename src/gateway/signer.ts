import { type Address, isHex } from "viem";
import { type PrivateKeyAccount, privateKeyToAccount } from "viem/accounts";
import { logger } from "../utils/logger.js";
import type { KeySigner, SignedSerialized, UnsignedTransaction } from "./types.js";

const log = logger.child("signer");

/**
 * EVM signer backed by a local private key.
 *
 * Sign operations on the credential are serialised: each one waits for the
 * previous to finish, so concurrent callers never interleave on the key.
 */
export class LocalKeySigner implements KeySigner {
  private readonly account: PrivateKeyAccount;
  private queue: Promise<unknown> = Promise.resolve();

  /**
   * @param privateKey - 32-byte hex key, with or without 0x prefix
   */
  constructor(privateKey: string) {
    if (!privateKey) {
      throw new Error("A private key is required to sign transactions");
    }

    // Ensure private key has 0x prefix
    const formattedPrivateKey = privateKey.startsWith("0x") ? privateKey : `0x${privateKey}`;
    if (!isHex(formattedPrivateKey) || formattedPrivateKey.length !== 66) {
      throw new Error("Private key must be 32 bytes of hex");
    }

    this.account = privateKeyToAccount(formattedPrivateKey);
    log.info(`Signer initialized for address: ${this.account.address}`);
  }

  get address(): Address {
    return this.account.address;
  }

  /**
   * Sign an EIP-1559 transaction
   * @returns The serialized signed transaction, ready for broadcast
   */
  signTransaction(transaction: UnsignedTransaction): Promise<SignedSerialized> {
    const run = this.queue.then(async () => {
      log.debug(`Signing transaction nonce=${transaction.nonce} to=${transaction.to}`);
      return this.account.signTransaction(transaction);
    });
    // Keep the chain alive after a failed signature; the caller still sees the rejection via `run`
    this.queue = run.catch((error: unknown) => {
      log.warn("Signing failed", error);
    });
    return run;
  }
}
