import type { GasLimitKey, MarketInfo, OracleSnapshot, TokenInfo } from "../types.js";

/**
 * Token metadata source. Read fresh on every resolve; no caching.
 */
export interface TokenRegistry {
  getTokens(): Promise<TokenInfo[]>;
}

/**
 * Market metadata source, in registry order
 */
export interface MarketRegistry {
  getMarkets(): Promise<MarketInfo[]>;
}

/**
 * Latest bid/ask per token address
 */
export interface PriceOracleFeed {
  getSnapshot(): Promise<OracleSnapshot>;
}

/**
 * Protocol gas-limit parameters, keyed by order kind and execution-fee factor
 */
export interface GasLimitTable {
  getLimit(key: GasLimitKey): Promise<bigint>;
}
