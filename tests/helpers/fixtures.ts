import { type Address, type Hex, getAddress } from "viem";
import { privateKeyToAccount } from "viem/accounts";
import type { PipelineConfig } from "../../src/config.js";
import { LocalKeySigner } from "../../src/gateway/signer.js";
import { getContracts } from "../../src/gmx/contracts.js";
import type {
  GasLimitTable,
  MarketRegistry,
  PriceOracleFeed,
  TokenRegistry,
} from "../../src/gmx/types.js";
import { OrderPipeline } from "../../src/pipeline.js";
import type { GasLimitKey, MarketInfo, PriceQuote, TokenInfo } from "../../src/types.js";
import { FakeLedger } from "./fake-ledger.js";

// Test private key (placeholder, not a real one)
export const TEST_PRIVATE_KEY: Hex =
  "0x0000000000000000000000000000000000000000000000000000000000000001";
export const TEST_WALLET = privateKeyToAccount(TEST_PRIVATE_KEY).address;

export const WBTC_B = getAddress("0x2f2a2543b76a4166549f7aab2e75bef0aefc5b0f");
export const BTC_SYNTHETIC = getAddress("0x47904963fc8b2340414262125af798b9655e58cd");
export const USDC = getAddress("0xaf88d065e77c8cc2239327c5edb3a432268e5831");
export const WETH = getAddress("0x82af49447d8a07e3bd95bd0d56f35241523fbab1");

export const BTC_MARKET = getAddress("0x47c031236e19d024b42f8ae6780e44a573170703");
export const ETH_MARKET = getAddress("0x70d95587d40a2caf56bd97485ab3eec10bee6336");

export const CONTRACTS = getContracts("arbitrum");

export const TOKENS: TokenInfo[] = [
  { symbol: "WBTC.b", address: WBTC_B, decimals: 8 },
  { symbol: "BTC", address: BTC_SYNTHETIC, decimals: 8, synthetic: true },
  { symbol: "USDC", address: USDC, decimals: 6 },
  { symbol: "ETH", address: WETH, decimals: 18 },
];

export const MARKETS: MarketInfo[] = [
  { marketToken: BTC_MARKET, indexToken: BTC_SYNTHETIC, longToken: WBTC_B, shortToken: USDC },
  { marketToken: ETH_MARKET, indexToken: WETH, longToken: WETH, shortToken: USDC },
];

// Raw prices: USD × 10^30 per smallest unit
export const QUOTES: PriceQuote[] = [
  {
    tokenAddress: WBTC_B,
    bid: "600000000000000000000000000",
    ask: "600100000000000000000000000",
  },
  { tokenAddress: USDC, bid: "1000000000000000000000000", ask: "1000000000000000000000000" },
  { tokenAddress: WETH, bid: "3000000000000000", ask: "3000000000000000" },
];

export const GAS_LIMITS: Record<GasLimitKey, bigint> = {
  increase_order: 2_000_000n,
  decrease_order: 1_800_000n,
  swap_order: 1_500_000n,
  estimated_fee_base_gas_limit: 500_000n,
  estimated_fee_multiplier_factor: 10n ** 30n,
};

export class StaticTokenRegistry implements TokenRegistry {
  failure?: Error;
  calls = 0;

  constructor(private readonly tokens: TokenInfo[] = TOKENS) {}

  async getTokens(): Promise<TokenInfo[]> {
    this.calls++;
    if (this.failure) {
      throw this.failure;
    }
    return this.tokens;
  }
}

export class StaticMarketRegistry implements MarketRegistry {
  failure?: Error;

  constructor(private readonly markets: MarketInfo[] = MARKETS) {}

  async getMarkets(): Promise<MarketInfo[]> {
    if (this.failure) {
      throw this.failure;
    }
    return this.markets;
  }
}

export class StaticOracleFeed implements PriceOracleFeed {
  failure?: Error;
  calls = 0;

  constructor(private readonly quotes: PriceQuote[] = QUOTES) {}

  async getSnapshot(): Promise<ReadonlyMap<Address, PriceQuote>> {
    this.calls++;
    if (this.failure) {
      throw this.failure;
    }
    return new Map(this.quotes.map((q) => [q.tokenAddress, q]));
  }
}

export class StaticGasLimitTable implements GasLimitTable {
  readonly reads: GasLimitKey[] = [];

  constructor(private readonly limits: Record<GasLimitKey, bigint> = GAS_LIMITS) {}

  async getLimit(key: GasLimitKey): Promise<bigint> {
    this.reads.push(key);
    return this.limits[key];
  }
}

export function createTestConfig(overrides: Partial<PipelineConfig> = {}): PipelineConfig {
  return {
    chain: "arbitrum",
    chainId: 42161,
    rpcUrl: "http://localhost:8545",
    apiBaseUrl: "http://localhost:8080",
    walletAddress: TEST_WALLET,
    privateKey: TEST_PRIVATE_KEY,
    mode: "live",
    executionBuffer: 1.3,
    autoApprove: true,
    maxLeverage: 100,
    readConcurrency: 4,
    ...overrides,
  };
}

export function createTestPipeline(overrides: Partial<PipelineConfig> = {}) {
  const config = createTestConfig(overrides);
  const ledger = new FakeLedger(TEST_WALLET);
  const signer = new LocalKeySigner(TEST_PRIVATE_KEY);
  const tokens = new StaticTokenRegistry();
  const markets = new StaticMarketRegistry();
  const oracle = new StaticOracleFeed();
  const gasLimits = new StaticGasLimitTable();

  const pipeline = new OrderPipeline(config, {
    gateway: ledger,
    signer,
    tokens,
    markets,
    oracle,
    gasLimits,
    contracts: CONTRACTS,
  });
  return { config, pipeline, ledger, signer, tokens, markets, oracle, gasLimits };
}
