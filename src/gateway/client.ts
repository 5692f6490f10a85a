import {
  type Address,
  type Chain,
  type Hash,
  type Hex,
  type PublicClient,
  type Transport,
  createPublicClient,
  erc20Abi,
  http,
} from "viem";
import { arbitrum, avalanche } from "viem/chains";
import type { PipelineConfig } from "../config.js";
import type { ChainName } from "../types.js";
import { ConfigurationError } from "../utils/errors.js";
import { logger } from "../utils/logger.js";
import type { ContractCall, LedgerGateway } from "./types.js";

const log = logger.child("gateway");

const CHAINS: Record<ChainName, Chain> = {
  arbitrum,
  avalanche,
};

export type LedgerClient = PublicClient<Transport, Chain>;

/**
 * Create a viem public client for the configured chain and RPC endpoint
 */
export function createLedgerClient(config: Pick<PipelineConfig, "chain" | "rpcUrl">): LedgerClient {
  if (!config.rpcUrl) {
    throw new ConfigurationError("rpcUrl is required");
  }

  const client = createPublicClient({
    chain: CHAINS[config.chain],
    transport: http(config.rpcUrl),
  });
  log.info(`Initialized ledger client for ${config.chain}`);
  return client;
}

/**
 * LedgerGateway over a viem public client
 */
export class ViemLedgerGateway implements LedgerGateway {
  readonly chainId: number;
  private readonly client: LedgerClient;

  constructor(client: LedgerClient, chainId: number) {
    this.client = client;
    this.chainId = chainId;
  }

  /**
   * Connect and check the node once: it must serve the configured chain and
   * expose an EIP-1559 base fee. Per-call capability probing is not done.
   */
  static async connect(
    config: Pick<PipelineConfig, "chain" | "chainId" | "rpcUrl">
  ): Promise<ViemLedgerGateway> {
    const client = createLedgerClient(config);

    const [chainId, block] = await Promise.all([client.getChainId(), client.getBlock()]);
    if (chainId !== config.chainId) {
      throw new ConfigurationError(
        `RPC endpoint serves chain ${chainId}, expected ${config.chainId}`,
        { observed: chainId, required: config.chainId }
      );
    }
    if (block.baseFeePerGas === null) {
      throw new ConfigurationError(`Chain ${chainId} does not report an EIP-1559 base fee`);
    }

    log.info(`Connected to chain ${chainId} at block ${block.number}`);
    return new ViemLedgerGateway(client, chainId);
  }

  getNativeBalance(owner: Address): Promise<bigint> {
    return this.client.getBalance({ address: owner });
  }

  getTokenBalance(token: Address, owner: Address): Promise<bigint> {
    return this.client.readContract({
      address: token,
      abi: erc20Abi,
      functionName: "balanceOf",
      args: [owner],
    });
  }

  getAllowance(token: Address, owner: Address, spender: Address): Promise<bigint> {
    return this.client.readContract({
      address: token,
      abi: erc20Abi,
      functionName: "allowance",
      args: [owner, spender],
    });
  }

  /**
   * Next nonce, counting transactions still in the mempool
   */
  getNonce(address: Address): Promise<number> {
    return this.client.getTransactionCount({ address, blockTag: "pending" });
  }

  async getBaseFee(): Promise<bigint> {
    const block = await this.client.getBlock();
    if (block.baseFeePerGas === null) {
      throw new ConfigurationError(`Block ${block.number} has no base fee`);
    }
    return block.baseFeePerGas;
  }

  getGasPrice(): Promise<bigint> {
    return this.client.getGasPrice();
  }

  call(request: ContractCall): Promise<unknown> {
    log.debug(`eth_call ${request.functionName} on ${request.address}`);
    return this.client.readContract({
      address: request.address,
      abi: request.abi,
      functionName: request.functionName,
      args: request.args,
    });
  }

  async submit(serializedTransaction: Hex): Promise<Hash> {
    const hash = await this.client.sendRawTransaction({ serializedTransaction });
    log.info(`Transaction submitted: ${hash}`);
    return hash;
  }
}
