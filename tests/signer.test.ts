import { describe, expect, expectTypeOf, it } from "vitest";
import {
  type TransactionSerializedEIP1559,
  parseTransaction,
  recoverTransactionAddress,
} from "viem";
import { LocalKeySigner } from "../src/gateway/signer.js";
import type { UnsignedTransaction } from "../src/gateway/types.js";
import { CONTRACTS, TEST_PRIVATE_KEY, TEST_WALLET } from "./helpers/fixtures.js";

const transaction = (nonce: number): UnsignedTransaction => ({
  type: "eip1559",
  chainId: 42161,
  to: CONTRACTS.exchangeRouter,
  data: "0x",
  value: 1n,
  gas: 21_000n,
  maxFeePerGas: 135_000_000n,
  maxPriorityFeePerGas: 0n,
  nonce,
});

describe("LocalKeySigner", () => {
  it("should derive the wallet address from the key", () => {
    expect(new LocalKeySigner(TEST_PRIVATE_KEY).address).toBe(TEST_WALLET);
  });

  it("should accept a key without 0x prefix", () => {
    expect(new LocalKeySigner(TEST_PRIVATE_KEY.slice(2)).address).toBe(TEST_WALLET);
  });

  it("should throw error if no private key provided", () => {
    expect(() => new LocalKeySigner("")).toThrow("A private key is required");
  });

  it("should reject keys that are not 32 bytes of hex", () => {
    expect(() => new LocalKeySigner("0x1234")).toThrow("Private key must be 32 bytes of hex");
    expect(() => new LocalKeySigner(`0x${"zz".repeat(32)}`)).toThrow();
  });

  it("should sign an EIP-1559 transaction recoverable to the wallet", async () => {
    const signer = new LocalKeySigner(TEST_PRIVATE_KEY);

    const serialized = await signer.signTransaction(transaction(7));

    expectTypeOf(serialized).toEqualTypeOf<TransactionSerializedEIP1559>();
    expect(serialized.startsWith("0x02")).toBe(true);
    expect(parseTransaction(serialized)).toMatchObject({
      type: "eip1559",
      nonce: 7,
      chainId: 42161,
    });
    const recovered = await recoverTransactionAddress({ serializedTransaction: serialized });
    expect(recovered).toBe(TEST_WALLET);
  });

  it("should sign concurrent requests in call order", async () => {
    const signer = new LocalKeySigner(TEST_PRIVATE_KEY);

    const signed = await Promise.all(
      [0, 1, 2].map((nonce) => signer.signTransaction(transaction(nonce)))
    );

    expect(signed.map((tx) => parseTransaction(tx).nonce)).toEqual([0, 1, 2]);
  });
});
