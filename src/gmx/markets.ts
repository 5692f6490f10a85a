import { type Address, getAddress, isAddress } from "viem";
import type { LedgerGateway } from "../gateway/types.js";
import type { MarketInfo } from "../types.js";
import { logger } from "../utils/logger.js";
import { READER_ABI } from "./abis.js";
import type { ContractAddresses } from "./contracts.js";
import { isRecord } from "./http.js";
import type { MarketRegistry } from "./types.js";

const log = logger.child("markets");

/** Upper bound passed to Reader.getMarkets; the reader clamps it to the market count */
const MARKET_PAGE_END = 1000n;

function readAddress(record: Record<string, unknown>, key: keyof MarketInfo): Address {
  const value = record[key];
  if (typeof value !== "string" || !isAddress(value, { strict: false })) {
    throw new Error(`Reader.getMarkets returned an invalid ${key}`);
  }
  return getAddress(value);
}

/**
 * Market registry backed by `Reader.getMarkets(dataStore, 0, end)` through the gateway
 */
export class GmxMarketRegistry implements MarketRegistry {
  constructor(
    private readonly gateway: LedgerGateway,
    private readonly contracts: Pick<ContractAddresses, "reader" | "dataStore">
  ) {}

  async getMarkets(): Promise<MarketInfo[]> {
    const result = await this.gateway.call({
      address: this.contracts.reader,
      abi: READER_ABI,
      functionName: "getMarkets",
      args: [this.contracts.dataStore, 0n, MARKET_PAGE_END],
    });
    if (!Array.isArray(result)) {
      throw new Error("Reader.getMarkets returned an unexpected payload");
    }

    const markets = result.map((entry: unknown): MarketInfo => {
      if (!isRecord(entry)) {
        throw new Error("Reader.getMarkets returned a malformed market");
      }
      return {
        marketToken: readAddress(entry, "marketToken"),
        indexToken: readAddress(entry, "indexToken"),
        longToken: readAddress(entry, "longToken"),
        shortToken: readAddress(entry, "shortToken"),
      };
    });

    log.debug(`Loaded ${markets.length} markets`);
    return markets;
  }
}
