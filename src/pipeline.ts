import type { PipelineConfig } from "./config.js";
import type { KeySigner, LedgerGateway } from "./gateway/types.js";
import type { ContractAddresses } from "./gmx/contracts.js";
import type {
  GasLimitTable,
  MarketRegistry,
  PriceOracleFeed,
  TokenRegistry,
} from "./gmx/types.js";
import {
  AllowanceManager,
  type AllowanceOutcome,
  type EnsureAllowanceParams,
} from "./order/allowance.js";
import { OrderBuilder } from "./order/builder.js";
import { GasBudgeter } from "./order/gas-budget.js";
import { OrderResolver } from "./order/resolver.js";
import type { OrderRequest, ResolvedOrder, SubmissionMode, SubmissionResult } from "./types.js";
import { logger } from "./utils/logger.js";

const log = logger.child("pipeline");

/**
 * Collaborators the pipeline runs against
 */
export interface PipelineDependencies {
  gateway: LedgerGateway;
  signer: KeySigner;
  tokens: TokenRegistry;
  markets: MarketRegistry;
  oracle: PriceOracleFeed;
  gasLimits: GasLimitTable;
  contracts: ContractAddresses;
}

/**
 * Order pipeline facade: resolve, approve, build and submit
 */
export class OrderPipeline {
  readonly config: PipelineConfig;
  private readonly resolver: OrderResolver;
  private readonly allowance: AllowanceManager;
  private readonly gasBudgeter: GasBudgeter;
  private readonly builder: OrderBuilder;

  constructor(config: PipelineConfig, deps: PipelineDependencies) {
    this.config = config;
    this.resolver = new OrderResolver({
      tokens: deps.tokens,
      markets: deps.markets,
      oracle: deps.oracle,
      config,
    });
    this.allowance = new AllowanceManager({
      gateway: deps.gateway,
      signer: deps.signer,
      wrappedNativeToken: deps.contracts.wrappedNativeToken,
    });
    this.gasBudgeter = new GasBudgeter(deps.gateway, deps.gasLimits, config);
    this.builder = new OrderBuilder({
      gateway: deps.gateway,
      signer: deps.signer,
      oracle: deps.oracle,
      gasBudgeter: this.gasBudgeter,
      allowance: this.allowance,
      contracts: deps.contracts,
      config,
    });
  }

  resolve(request: OrderRequest): Promise<ResolvedOrder> {
    return this.resolver.resolve(request);
  }

  ensureAllowance(params: EnsureAllowanceParams): Promise<AllowanceOutcome> {
    return this.allowance.ensureAllowance(params);
  }

  /**
   * Current fee cap, as used for approvals and orders
   */
  resolveMaxFeePerGas(): Promise<bigint> {
    return this.gasBudgeter.resolveMaxFeePerGas();
  }

  buildAndSubmit(order: ResolvedOrder, mode?: SubmissionMode): Promise<SubmissionResult> {
    return this.builder.buildAndSubmit(order, mode);
  }

  /**
   * Resolve a request and carry it through to broadcast (or simulation)
   */
  async submitOrder(request: OrderRequest, mode?: SubmissionMode): Promise<SubmissionResult> {
    const order = await this.resolve(request);
    const result = await this.buildAndSubmit(order, mode);
    log.info(`Order finished at stage ${result.stage}`);
    return result;
  }
}
