import { type PipelineConfig, validateConfig } from "./config.js";
import { ViemLedgerGateway } from "./gateway/client.js";
import { LocalKeySigner } from "./gateway/signer.js";
import { getContracts } from "./gmx/contracts.js";
import { DataStoreGasLimitTable } from "./gmx/gas-limits.js";
import { GmxApiClient } from "./gmx/http.js";
import { GmxMarketRegistry } from "./gmx/markets.js";
import { GmxOracleFeed } from "./gmx/oracle.js";
import { GmxTokenRegistry } from "./gmx/tokens.js";
import { OrderPipeline } from "./pipeline.js";
import { ConfigurationError } from "./utils/errors.js";
import { logger } from "./utils/logger.js";

/**
 * Wire the pipeline against a live node and the GMX API.
 * The node is checked once here; later calls assume its capabilities.
 */
export async function createOrderPipeline(config: PipelineConfig): Promise<OrderPipeline> {
  validateConfig(config);
  if (!config.privateKey) {
    throw new ConfigurationError("privateKey is required to sign transactions");
  }

  const gateway = await ViemLedgerGateway.connect(config);
  const signer = new LocalKeySigner(config.privateKey);
  const contracts = getContracts(config.chain);
  const api = new GmxApiClient(config.apiBaseUrl);

  const pipeline = new OrderPipeline(config, {
    gateway,
    signer,
    tokens: new GmxTokenRegistry(api),
    markets: new GmxMarketRegistry(gateway, contracts),
    oracle: new GmxOracleFeed(api),
    gasLimits: new DataStoreGasLimitTable(gateway, contracts.dataStore),
    contracts,
  });
  logger.info(`Order pipeline ready on ${config.chain} (${config.mode})`);
  return pipeline;
}

export * from "./config.js";
export * from "./gateway/index.js";
export * from "./gmx/index.js";
export * from "./order/index.js";
export { OrderPipeline } from "./pipeline.js";
export type { PipelineDependencies } from "./pipeline.js";
export * from "./types.js";
export * from "./utils/errors.js";
export { Logger, logger } from "./utils/logger.js";
export type { LogLevel } from "./utils/logger.js";
export { createLimiter, mapWithConcurrency } from "./utils/fan-out.js";
export type { Limiter } from "./utils/fan-out.js";
export * from "./utils/units.js";
