import { type Address, type Hex, isAddress, isHex } from "viem";
import type { ChainName, SubmissionMode } from "./types.js";
import { ConfigurationError } from "./utils/errors.js";
import { logger } from "./utils/logger.js";

export const CHAIN_IDS: Record<ChainName, number> = {
  arbitrum: 42161,
  avalanche: 43114,
};

export const GMX_API_URLS: Record<ChainName, string> = {
  arbitrum: "https://arbitrum-api.gmxinfra.io",
  avalanche: "https://avalanche-api.gmxinfra.io",
};

/**
 * Pipeline configuration. Built once by the caller and passed to every component.
 */
export interface PipelineConfig {
  // Network
  chain: ChainName;
  chainId: number;
  rpcUrl: string;
  /** GMX REST API base URL for token and oracle data */
  apiBaseUrl: string;

  // Wallet
  walletAddress: Address;
  /** Only needed to sign; never logged */
  privateKey?: Hex;

  // Submission
  /** "simulate" signs but never broadcasts */
  mode: SubmissionMode;
  /** Explicit fee cap; defaults to 1.35 × current base fee when unset */
  maxFeePerGas?: bigint;
  /** Multiplier on the keeper execution fee (default: 1.3) */
  executionBuffer: number;
  /** Raise allowance automatically before increase/swap orders (default: true) */
  autoApprove: boolean;

  // Risk
  /** Maximum implied leverage for position orders (default: 100) */
  maxLeverage: number;

  // Reads
  /** Maximum concurrent read-only calls in a fan-out (default: 4) */
  readConcurrency: number;
}

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: Omit<
  PipelineConfig,
  "chain" | "chainId" | "rpcUrl" | "apiBaseUrl" | "walletAddress"
> = {
  mode: "live",
  executionBuffer: 1.3,
  autoApprove: true,
  maxLeverage: 100,
  readConcurrency: 4,
};

export function isChainName(value: string): value is ChainName {
  return Object.hasOwn(CHAIN_IDS, value);
}

function isSubmissionMode(value: string): value is SubmissionMode {
  return value === "live" || value === "simulate";
}

/**
 * Load configuration from environment variables
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<PipelineConfig> {
  const config: Partial<PipelineConfig> = {};

  // Network
  if (env.GMX_CHAIN) {
    if (!isChainName(env.GMX_CHAIN)) {
      throw new ConfigurationError(`Unsupported GMX_CHAIN: ${env.GMX_CHAIN}`, {
        supported: Object.keys(CHAIN_IDS),
      });
    }
    config.chain = env.GMX_CHAIN;
  }
  if (env.GMX_RPC_URL) {
    config.rpcUrl = env.GMX_RPC_URL;
  }
  if (env.GMX_API_URL) {
    config.apiBaseUrl = env.GMX_API_URL;
  }

  // Wallet
  if (env.GMX_WALLET_ADDRESS) {
    if (!isAddress(env.GMX_WALLET_ADDRESS, { strict: false })) {
      throw new ConfigurationError("GMX_WALLET_ADDRESS is not a valid address");
    }
    config.walletAddress = env.GMX_WALLET_ADDRESS;
  }
  if (env.GMX_PRIVATE_KEY) {
    const key = env.GMX_PRIVATE_KEY.startsWith("0x")
      ? env.GMX_PRIVATE_KEY
      : `0x${env.GMX_PRIVATE_KEY}`;
    if (!isHex(key)) {
      throw new ConfigurationError("GMX_PRIVATE_KEY is not hex encoded");
    }
    config.privateKey = key;
  }

  // Submission
  if (env.GMX_MODE) {
    if (!isSubmissionMode(env.GMX_MODE)) {
      throw new ConfigurationError(`GMX_MODE must be "live" or "simulate", got ${env.GMX_MODE}`);
    }
    config.mode = env.GMX_MODE;
  }
  if (env.GMX_MAX_FEE_PER_GAS) {
    if (!/^\d+$/.test(env.GMX_MAX_FEE_PER_GAS)) {
      throw new ConfigurationError("GMX_MAX_FEE_PER_GAS must be an integer amount of wei");
    }
    config.maxFeePerGas = BigInt(env.GMX_MAX_FEE_PER_GAS);
  }
  if (env.GMX_EXECUTION_BUFFER) {
    config.executionBuffer = Number.parseFloat(env.GMX_EXECUTION_BUFFER);
  }
  if (env.GMX_AUTO_APPROVE) {
    config.autoApprove = env.GMX_AUTO_APPROVE === "true";
  }

  // Risk
  if (env.GMX_MAX_LEVERAGE) {
    config.maxLeverage = Number.parseFloat(env.GMX_MAX_LEVERAGE);
  }

  // Reads
  if (env.GMX_READ_CONCURRENCY) {
    config.readConcurrency = Number.parseInt(env.GMX_READ_CONCURRENCY, 10);
  }

  return config;
}

/**
 * Merge configurations with defaults. Chain id and API URL follow the chain
 * unless overridden.
 */
export function mergeConfig(
  chain: ChainName,
  overrides: Partial<PipelineConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): PipelineConfig {
  const envConfig = loadConfigFromEnv(env);
  const resolvedChain = overrides.chain ?? envConfig.chain ?? chain;

  const rpcUrl = overrides.rpcUrl ?? envConfig.rpcUrl;
  if (!rpcUrl) {
    throw new ConfigurationError("rpcUrl is required (GMX_RPC_URL)");
  }
  const walletAddress = overrides.walletAddress ?? envConfig.walletAddress;
  if (!walletAddress) {
    throw new ConfigurationError("walletAddress is required (GMX_WALLET_ADDRESS)");
  }

  const config: PipelineConfig = {
    ...DEFAULT_CONFIG,
    chainId: CHAIN_IDS[resolvedChain],
    apiBaseUrl: GMX_API_URLS[resolvedChain],
    ...envConfig,
    ...overrides,
    chain: resolvedChain,
    rpcUrl,
    walletAddress,
  };

  const { privateKey: _hidden, ...printable } = config;
  logger.info("Order pipeline configuration:", printable);
  return config;
}

/**
 * Validate configuration
 */
export function validateConfig(config: PipelineConfig): void {
  if (!isChainName(config.chain)) {
    throw new ConfigurationError(`Unsupported chain: ${config.chain}`);
  }
  if (config.chainId !== CHAIN_IDS[config.chain]) {
    throw new ConfigurationError(
      `chainId ${config.chainId} does not match ${config.chain} (${CHAIN_IDS[config.chain]})`,
      { observed: config.chainId, required: CHAIN_IDS[config.chain] }
    );
  }
  if (!config.rpcUrl) {
    throw new ConfigurationError("rpcUrl is required");
  }
  if (!isAddress(config.walletAddress, { strict: false })) {
    throw new ConfigurationError(`walletAddress is not a valid address: ${config.walletAddress}`);
  }
  if (!(config.executionBuffer >= 1)) {
    throw new ConfigurationError("executionBuffer must be at least 1", {
      observed: config.executionBuffer,
      required: 1,
    });
  }
  if (!(config.maxLeverage > 0)) {
    throw new ConfigurationError("maxLeverage must be positive", { observed: config.maxLeverage });
  }
  if (config.maxFeePerGas !== undefined && config.maxFeePerGas <= 0n) {
    throw new ConfigurationError("maxFeePerGas must be positive when set");
  }
  if (!Number.isInteger(config.readConcurrency) || config.readConcurrency < 1) {
    throw new ConfigurationError("readConcurrency must be a positive integer", {
      observed: config.readConcurrency,
    });
  }
  // Simulate mode signs as well, so both modes need the key
  if (!config.privateKey) {
    throw new ConfigurationError("privateKey is required to sign transactions");
  }
}
