import { type Address, type Hex, encodeAbiParameters, keccak256 } from "viem";
import type { LedgerGateway } from "../gateway/types.js";
import type { GasLimitKey } from "../types.js";
import { DATA_STORE_ABI } from "./abis.js";
import type { GasLimitTable } from "./types.js";

const DATA_STORE_KEYS: Record<GasLimitKey, string> = {
  increase_order: "INCREASE_ORDER_GAS_LIMIT",
  decrease_order: "DECREASE_ORDER_GAS_LIMIT",
  swap_order: "SWAP_ORDER_GAS_LIMIT",
  estimated_fee_base_gas_limit: "ESTIMATED_GAS_FEE_BASE_AMOUNT",
  estimated_fee_multiplier_factor: "ESTIMATED_GAS_FEE_MULTIPLIER_FACTOR",
};

/**
 * DataStore key: keccak256(abi.encode(name))
 */
export function gasLimitKeyHash(key: GasLimitKey): Hex {
  return keccak256(encodeAbiParameters([{ type: "string" }], [DATA_STORE_KEYS[key]]));
}

/**
 * Gas-limit table read from the DataStore through the gateway
 */
export class DataStoreGasLimitTable implements GasLimitTable {
  constructor(
    private readonly gateway: LedgerGateway,
    private readonly dataStore: Address
  ) {}

  async getLimit(key: GasLimitKey): Promise<bigint> {
    const value = await this.gateway.call({
      address: this.dataStore,
      abi: DATA_STORE_ABI,
      functionName: "getUint",
      args: [gasLimitKeyHash(key)],
    });
    if (typeof value !== "bigint") {
      throw new Error(`DataStore.getUint(${DATA_STORE_KEYS[key]}) returned ${typeof value}`);
    }
    return value;
  }
}
