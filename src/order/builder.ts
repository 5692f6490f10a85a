import {
  type Hash,
  type Hex,
  encodeFunctionData,
  isAddressEqual,
  keccak256,
  zeroAddress,
  zeroHash,
} from "viem";
import type { PipelineConfig } from "../config.js";
import type { KeySigner, LedgerGateway } from "../gateway/types.js";
import { EXCHANGE_ROUTER_ABI } from "../gmx/abis.js";
import type { ContractAddresses } from "../gmx/contracts.js";
import type { PriceOracleFeed } from "../gmx/types.js";
import {
  DecreasePositionSwapType,
  type ExecutionPrice,
  type GasPlan,
  ORDER_KINDS,
  type PipelineStage,
  type ResolvedOrder,
  type SignedTransaction,
  type SubmissionMode,
  type SubmissionResult,
  type TransactionEnvelope,
} from "../types.js";
import { ConfigurationError, SubmissionFailedError } from "../utils/errors.js";
import { logger } from "../utils/logger.js";
import { toBigInt } from "../utils/units.js";
import type { AllowanceManager } from "./allowance.js";
import type { GasBudgeter } from "./gas-budget.js";
import { computeExecutionPrice, estimateSwapOutput, quoteFor } from "./pricing.js";

const log = logger.child("builder");

const STAGE_ORDER: readonly PipelineStage[] = [
  "initialized",
  "resolved",
  "priced",
  "budgeted",
  "enveloped",
  "signed",
];

/**
 * Forward-only stage tracker for one build run
 */
export class StageTracker {
  private current: PipelineStage = "initialized";
  readonly history: PipelineStage[] = ["initialized"];

  get stage(): PipelineStage {
    return this.current;
  }

  advance(next: PipelineStage): void {
    const from = STAGE_ORDER.indexOf(this.current);
    const terminal = next === "broadcast" || next === "discarded";
    const allowed =
      from !== -1 &&
      (terminal ? this.current === "signed" : STAGE_ORDER.indexOf(next) === from + 1);
    if (!allowed) {
      throw new Error(`Illegal stage transition ${this.current} -> ${next}`);
    }
    this.current = next;
    this.history.push(next);
    log.debug(`Stage ${next}`);
  }
}

interface OrderAmounts {
  executionPrice: ExecutionPrice;
  triggerPrice: bigint;
  minOutputAmount: bigint;
}

export interface OrderBuilderOptions {
  gateway: LedgerGateway;
  signer: KeySigner;
  oracle: PriceOracleFeed;
  gasBudgeter: GasBudgeter;
  allowance: AllowanceManager;
  contracts: ContractAddresses;
  config: Pick<PipelineConfig, "walletAddress" | "mode" | "autoApprove">;
}

/**
 * Order Builder / Submitter
 * Prices, budgets, assembles the ExchangeRouter multicall, signs and submits
 */
export class OrderBuilder {
  private readonly gateway: LedgerGateway;
  private readonly signer: KeySigner;
  private readonly oracle: PriceOracleFeed;
  private readonly gasBudgeter: GasBudgeter;
  private readonly allowance: AllowanceManager;
  private readonly contracts: ContractAddresses;
  private readonly config: OrderBuilderOptions["config"];

  constructor(options: OrderBuilderOptions) {
    this.gateway = options.gateway;
    this.signer = options.signer;
    this.oracle = options.oracle;
    this.gasBudgeter = options.gasBudgeter;
    this.allowance = options.allowance;
    this.contracts = options.contracts;
    this.config = options.config;
  }

  async buildAndSubmit(
    order: ResolvedOrder,
    mode: SubmissionMode = this.config.mode
  ): Promise<SubmissionResult> {
    if (!isAddressEqual(this.config.walletAddress, this.signer.address)) {
      throw new ConfigurationError(
        `Wallet ${this.config.walletAddress} does not match signer ${this.signer.address}`
      );
    }

    const stages = new StageTracker();
    stages.advance("resolved");
    log.info(`Building ${order.kind} order (${mode})`);

    // Allowance settles before any price or gas read
    const approvalTxHash = mode === "live" ? await this.settleAllowance(order) : undefined;

    const amounts = await this.price(order);
    stages.advance("priced");

    const gas = await this.gasBudgeter.budget(order.kind);
    stages.advance("budgeted");

    const envelope = await this.assemble(order, amounts, gas);
    stages.advance("enveloped");

    const signed = await this.sign(envelope);
    stages.advance("signed");

    const details = {
      order,
      price: amounts.executionPrice,
      gas,
      envelope,
      signed,
      ...(approvalTxHash ? { approvalTxHash } : {}),
    };

    if (mode === "simulate") {
      stages.advance("discarded");
      log.info(`Simulated ${order.kind} order, nonce ${envelope.nonce}, not broadcast`);
      return { ...details, stage: "discarded" };
    }

    let txHash: Hash;
    try {
      txHash = await this.gateway.submit(signed.serialized);
    } catch (error) {
      throw new SubmissionFailedError(envelope.nonce, error);
    }
    stages.advance("broadcast");
    log.info(`Order submitted: ${txHash}`);
    return { ...details, stage: "broadcast", txHash };
  }

  private async settleAllowance(order: ResolvedOrder): Promise<Hash | undefined> {
    if (!ORDER_KINDS[order.kind].movesTokens) {
      return undefined;
    }
    if (isAddressEqual(order.startTokenAddress, this.contracts.wrappedNativeToken)) {
      return undefined;
    }

    const outcome = await this.allowance.ensureAllowance({
      owner: this.config.walletAddress,
      spender: this.contracts.syntheticsRouter,
      token: order.startTokenAddress,
      requiredAmount: order.collateralDeltaScaled,
      maxFeePerGas: await this.gasBudgeter.resolveMaxFeePerGas(),
      autoApprove: this.config.autoApprove,
    });
    return outcome.status === "approved" ? outcome.txHash : undefined;
  }

  private async price(order: ResolvedOrder): Promise<OrderAmounts> {
    const snapshot = await this.oracle.getSnapshot();
    const { intent } = ORDER_KINDS[order.kind];

    if (order.kind === "swap") {
      const inQuote = quoteFor(snapshot, order.startTokenAddress);
      const outQuote = quoteFor(snapshot, order.outTokenAddress);
      return {
        executionPrice: computeExecutionPrice({
          tokenDecimals: order.startTokenDecimals,
          quote: inQuote,
          isLong: false,
          intent,
          slippage: order.slippagePercent,
        }),
        triggerPrice: 0n,
        minOutputAmount: estimateSwapOutput({
          amountIn: order.collateralDeltaScaled,
          inQuote,
          outQuote,
          slippage: order.slippagePercent,
        }),
      };
    }

    const executionPrice = computeExecutionPrice({
      tokenDecimals: order.indexTokenDecimals,
      quote: quoteFor(snapshot, order.indexTokenAddress),
      isLong: order.isLong,
      intent,
      slippage: order.slippagePercent,
    });
    return {
      executionPrice,
      triggerPrice: order.kind === "increase" ? toBigInt(executionPrice.medianPrice) : 0n,
      minOutputAmount: 0n,
    };
  }

  /**
   * Multicall body: fund the order vault, then create the order
   */
  private encodeCalls(
    order: ResolvedOrder,
    amounts: OrderAmounts,
    gas: GasPlan
  ): { calls: Hex[]; value: bigint } {
    const { orderVault, wrappedNativeToken } = this.contracts;
    const { executionFee } = gas;
    const collateral = order.collateralDeltaScaled;

    const sendWnt = (amount: bigint): Hex =>
      encodeFunctionData({
        abi: EXCHANGE_ROUTER_ABI,
        functionName: "sendWnt",
        args: [orderVault, amount],
      });

    const isPosition = order.kind !== "swap";
    const createOrder = encodeFunctionData({
      abi: EXCHANGE_ROUTER_ABI,
      functionName: "createOrder",
      args: [
        {
          addresses: {
            receiver: this.config.walletAddress,
            callbackContract: zeroAddress,
            uiFeeReceiver: zeroAddress,
            market: isPosition ? order.marketKey : zeroAddress,
            initialCollateralToken: order.startTokenAddress,
            swapPath: order.swapPath,
          },
          numbers: {
            sizeDeltaUsd: isPosition ? order.sizeDeltaScaled : 0n,
            initialCollateralDeltaAmount: collateral,
            triggerPrice: amounts.triggerPrice,
            acceptablePrice: isPosition ? amounts.executionPrice.acceptablePrice : 0n,
            executionFee,
            callbackGasLimit: 0n,
            minOutputAmount: amounts.minOutputAmount,
          },
          orderType: ORDER_KINDS[order.kind].orderType,
          decreasePositionSwapType: DecreasePositionSwapType.NoSwap,
          isLong: isPosition ? order.isLong : false,
          shouldUnwrapNativeToken: true,
          referralCode: zeroHash,
        },
      ],
    });

    if (order.kind === "decrease") {
      return { calls: [sendWnt(executionFee), createOrder], value: executionFee };
    }
    if (isAddressEqual(order.startTokenAddress, wrappedNativeToken)) {
      const value = collateral + executionFee;
      return { calls: [sendWnt(value), createOrder], value };
    }

    const sendTokens = encodeFunctionData({
      abi: EXCHANGE_ROUTER_ABI,
      functionName: "sendTokens",
      args: [order.startTokenAddress, orderVault, collateral],
    });
    return { calls: [sendWnt(executionFee), sendTokens, createOrder], value: executionFee };
  }

  private async assemble(
    order: ResolvedOrder,
    amounts: OrderAmounts,
    gas: GasPlan
  ): Promise<TransactionEnvelope> {
    const { calls, value } = this.encodeCalls(order, amounts, gas);
    const data = encodeFunctionData({
      abi: EXCHANGE_ROUTER_ABI,
      functionName: "multicall",
      args: [calls],
    });

    // Nonce is read immediately before the envelope is fixed
    const nonce = await this.gateway.getNonce(this.config.walletAddress);
    return {
      to: this.contracts.exchangeRouter,
      data,
      calls,
      value,
      chainId: this.gateway.chainId,
      gas: gas.gasLimit,
      maxFeePerGas: gas.maxFeePerGas,
      maxPriorityFeePerGas: gas.maxPriorityFeePerGas,
      nonce,
    };
  }

  private async sign(envelope: TransactionEnvelope): Promise<SignedTransaction> {
    const serialized = await this.signer.signTransaction({
      type: "eip1559",
      chainId: envelope.chainId,
      to: envelope.to,
      data: envelope.data,
      value: envelope.value,
      gas: envelope.gas,
      maxFeePerGas: envelope.maxFeePerGas,
      maxPriorityFeePerGas: envelope.maxPriorityFeePerGas,
      nonce: envelope.nonce,
    });
    return Object.freeze({
      envelope: Object.freeze({ ...envelope, calls: [...envelope.calls] }),
      serialized,
      hash: keccak256(serialized),
    });
  }
}
