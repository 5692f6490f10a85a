import {
  type Address,
  type Hash,
  type Hex,
  decodeFunctionData,
  erc20Abi,
  keccak256,
  parseTransaction,
  toFunctionSelector,
} from "viem";
import type { ContractCall, LedgerGateway } from "../../src/gateway/types.js";

const APPROVE_SELECTOR = toFunctionSelector("approve(address,uint256)");

function pairKey(...addresses: Address[]): string {
  return addresses.map((a) => a.toLowerCase()).join(":");
}

/**
 * In-process ledger: balances, allowances and nonces held in maps.
 * Submitted approvals take effect immediately. Submissions stay pending until
 * `mine()`; `getNonce` answers with the pending count, `minedNonce` without it.
 */
export class FakeLedger implements LedgerGateway {
  readonly chainId: number;
  baseFee = 100_000_000n;
  gasPrice = 100_000_000n;
  failSubmit?: Error;
  callHandler?: (request: ContractCall) => unknown;

  readonly submitted: Hex[] = [];
  readonly reads: string[] = [];

  private readonly nativeBalances = new Map<string, bigint>();
  private readonly tokenBalances = new Map<string, bigint>();
  private readonly allowances = new Map<string, bigint>();
  private readonly minedNonces = new Map<string, number>();
  private readonly pendingCounts = new Map<string, number>();

  constructor(
    private readonly owner: Address,
    chainId = 42161
  ) {
    this.chainId = chainId;
  }

  setNativeBalance(owner: Address, amount: bigint): void {
    this.nativeBalances.set(pairKey(owner), amount);
  }

  setTokenBalance(token: Address, owner: Address, amount: bigint): void {
    this.tokenBalances.set(pairKey(token, owner), amount);
  }

  setAllowance(token: Address, owner: Address, spender: Address, amount: bigint): void {
    this.allowances.set(pairKey(token, owner, spender), amount);
  }

  /** Transactions confirmed outside the pipeline */
  setNonce(owner: Address, nonce: number): void {
    this.minedNonces.set(pairKey(owner), nonce);
  }

  minedNonce(owner: Address): number {
    return this.minedNonces.get(pairKey(owner)) ?? 0;
  }

  mine(): void {
    for (const [key, count] of this.pendingCounts) {
      this.minedNonces.set(key, (this.minedNonces.get(key) ?? 0) + count);
    }
    this.pendingCounts.clear();
  }

  async getNativeBalance(owner: Address): Promise<bigint> {
    this.reads.push("nativeBalance");
    return this.nativeBalances.get(pairKey(owner)) ?? 0n;
  }

  async getTokenBalance(token: Address, owner: Address): Promise<bigint> {
    this.reads.push(`balanceOf:${token}`);
    return this.tokenBalances.get(pairKey(token, owner)) ?? 0n;
  }

  async getAllowance(token: Address, owner: Address, spender: Address): Promise<bigint> {
    this.reads.push(`allowance:${token}`);
    return this.allowances.get(pairKey(token, owner, spender)) ?? 0n;
  }

  async getNonce(address: Address): Promise<number> {
    this.reads.push("nonce");
    const key = pairKey(address);
    return (this.minedNonces.get(key) ?? 0) + (this.pendingCounts.get(key) ?? 0);
  }

  async getBaseFee(): Promise<bigint> {
    this.reads.push("baseFee");
    return this.baseFee;
  }

  async getGasPrice(): Promise<bigint> {
    this.reads.push("gasPrice");
    return this.gasPrice;
  }

  async call(request: ContractCall): Promise<unknown> {
    this.reads.push(`call:${request.functionName}`);
    if (!this.callHandler) {
      throw new Error(`No handler for ${request.functionName}`);
    }
    return this.callHandler(request);
  }

  async submit(serializedTransaction: Hex): Promise<Hash> {
    if (this.failSubmit) {
      throw this.failSubmit;
    }

    const tx = parseTransaction(serializedTransaction);
    if (tx.to && tx.data?.startsWith(APPROVE_SELECTOR)) {
      const decoded = decodeFunctionData({ abi: erc20Abi, data: tx.data });
      if (decoded.functionName === "approve") {
        const [spender, amount] = decoded.args;
        this.setAllowance(tx.to, this.owner, spender, amount);
      }
    }

    const key = pairKey(this.owner);
    this.pendingCounts.set(key, (this.pendingCounts.get(key) ?? 0) + 1);
    this.submitted.push(serializedTransaction);
    return keccak256(serializedTransaction);
  }
}
