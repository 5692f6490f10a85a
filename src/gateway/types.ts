import type {
  Abi,
  Address,
  Hash,
  Hex,
  TransactionSerializableEIP1559,
  TransactionSerializedEIP1559,
} from "viem";

/**
 * A read-only contract call, encoded by the gateway
 */
export interface ContractCall {
  address: Address;
  abi: Abi;
  functionName: string;
  args: readonly unknown[];
}

/**
 * Ledger access used by the pipeline: reads, nonce, fees and broadcast
 */
export interface LedgerGateway {
  readonly chainId: number;
  getNativeBalance(owner: Address): Promise<bigint>;
  getTokenBalance(token: Address, owner: Address): Promise<bigint>;
  getAllowance(token: Address, owner: Address, spender: Address): Promise<bigint>;
  getNonce(address: Address): Promise<number>;
  getBaseFee(): Promise<bigint>;
  getGasPrice(): Promise<bigint>;
  call(request: ContractCall): Promise<unknown>;
  /** Broadcast a signed, serialized transaction; resolves once the node accepts it */
  submit(serializedTransaction: Hex): Promise<Hash>;
}

export type UnsignedTransaction = TransactionSerializableEIP1559;
export type SignedSerialized = TransactionSerializedEIP1559;

/**
 * Holds the credential and turns unsigned transactions into signed ones
 */
export interface KeySigner {
  readonly address: Address;
  signTransaction(transaction: UnsignedTransaction): Promise<SignedSerialized>;
}
