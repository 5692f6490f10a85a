import { describe, expect, it } from "vitest";
import {
  DEFAULT_CONFIG,
  loadConfigFromEnv,
  mergeConfig,
  validateConfig,
} from "../src/config.js";
import { ConfigurationError } from "../src/utils/errors.js";
import { TEST_PRIVATE_KEY, TEST_WALLET, createTestConfig } from "./helpers/fixtures.js";

const BASE_ENV = {
  GMX_RPC_URL: "http://localhost:8545",
  GMX_WALLET_ADDRESS: TEST_WALLET,
};

describe("loadConfigFromEnv", () => {
  it("should parse every supported variable", () => {
    const config = loadConfigFromEnv({
      ...BASE_ENV,
      GMX_CHAIN: "avalanche",
      GMX_API_URL: "http://localhost:8080",
      GMX_PRIVATE_KEY: TEST_PRIVATE_KEY.slice(2),
      GMX_MODE: "simulate",
      GMX_MAX_FEE_PER_GAS: "2000000000",
      GMX_EXECUTION_BUFFER: "1.5",
      GMX_AUTO_APPROVE: "false",
      GMX_MAX_LEVERAGE: "50",
      GMX_READ_CONCURRENCY: "8",
    });

    expect(config).toEqual({
      chain: "avalanche",
      rpcUrl: "http://localhost:8545",
      apiBaseUrl: "http://localhost:8080",
      walletAddress: TEST_WALLET,
      privateKey: TEST_PRIVATE_KEY,
      mode: "simulate",
      maxFeePerGas: 2_000_000_000n,
      executionBuffer: 1.5,
      autoApprove: false,
      maxLeverage: 50,
      readConcurrency: 8,
    });
  });

  it("should reject an unsupported chain", () => {
    expect(() => loadConfigFromEnv({ GMX_CHAIN: "solana" })).toThrow(ConfigurationError);
  });

  it("should reject an unknown mode", () => {
    expect(() => loadConfigFromEnv({ GMX_MODE: "paper" })).toThrow(ConfigurationError);
  });

  it("should reject a fee cap that is not whole wei", () => {
    expect(() => loadConfigFromEnv({ GMX_MAX_FEE_PER_GAS: "1.5 gwei" })).toThrow(
      "GMX_MAX_FEE_PER_GAS must be an integer amount of wei"
    );
  });

  it("should reject a malformed wallet address", () => {
    expect(() => loadConfigFromEnv({ GMX_WALLET_ADDRESS: "0x1234" })).toThrow(ConfigurationError);
  });
});

describe("mergeConfig", () => {
  it("should fill chain id, API URL and defaults from the chain", () => {
    const config = mergeConfig("arbitrum", {}, BASE_ENV);

    expect(config).toEqual({
      ...DEFAULT_CONFIG,
      chain: "arbitrum",
      chainId: 42161,
      rpcUrl: "http://localhost:8545",
      apiBaseUrl: "https://arbitrum-api.gmxinfra.io",
      walletAddress: TEST_WALLET,
    });
  });

  it("should let overrides win over the environment", () => {
    const config = mergeConfig("arbitrum", { mode: "simulate", maxLeverage: 10 }, {
      ...BASE_ENV,
      GMX_MODE: "live",
    });

    expect(config.mode).toBe("simulate");
    expect(config.maxLeverage).toBe(10);
  });

  it("should follow the chain named in the environment", () => {
    const config = mergeConfig("arbitrum", {}, { ...BASE_ENV, GMX_CHAIN: "avalanche" });

    expect(config.chainId).toBe(43114);
    expect(config.apiBaseUrl).toBe("https://avalanche-api.gmxinfra.io");
  });

  it("should require an RPC URL and a wallet", () => {
    expect(() => mergeConfig("arbitrum", {}, { GMX_WALLET_ADDRESS: TEST_WALLET })).toThrow(
      "rpcUrl is required"
    );
    expect(() => mergeConfig("arbitrum", {}, { GMX_RPC_URL: "http://localhost:8545" })).toThrow(
      "walletAddress is required"
    );
  });
});

describe("validateConfig", () => {
  it("should accept a complete configuration", () => {
    expect(() => validateConfig(createTestConfig())).not.toThrow();
  });

  it("should reject a chain id that does not match the chain", () => {
    expect(() => validateConfig(createTestConfig({ chainId: 1 }))).toThrow(
      "chainId 1 does not match arbitrum (42161)"
    );
  });

  it("should reject an execution buffer below 1", () => {
    expect(() => validateConfig(createTestConfig({ executionBuffer: 0.5 }))).toThrow(
      "executionBuffer must be at least 1"
    );
  });

  it("should reject a non-positive fee cap", () => {
    expect(() => validateConfig(createTestConfig({ maxFeePerGas: 0n }))).toThrow(
      ConfigurationError
    );
  });

  it("should reject a fractional read concurrency", () => {
    expect(() => validateConfig(createTestConfig({ readConcurrency: 1.5 }))).toThrow(
      "readConcurrency must be a positive integer"
    );
  });

  it("should require a private key in simulate mode too", () => {
    expect(() =>
      validateConfig(createTestConfig({ mode: "simulate", privateKey: undefined }))
    ).toThrow("privateKey is required");
  });
});
