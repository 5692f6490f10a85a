// Shared types used across the order pipeline

import type { Decimal } from "decimal.js";
import type { Address, Hash, Hex, TransactionSerializedEIP1559 } from "viem";

export type ChainName = "arbitrum" | "avalanche";
export type OrderKind = "increase" | "decrease" | "swap";
export type PriceIntent = "open" | "close" | "swap";
export type SubmissionMode = "live" | "simulate";

export type GasLimitKey =
  | "increase_order"
  | "decrease_order"
  | "swap_order"
  | "estimated_fee_base_gas_limit"
  | "estimated_fee_multiplier_factor";

/**
 * Order type enum as defined by the GMX v2 Order library
 */
export enum GmxOrderType {
  MarketSwap = 0,
  LimitSwap = 1,
  MarketIncrease = 2,
  LimitIncrease = 3,
  MarketDecrease = 4,
  LimitDecrease = 5,
  StopLossDecrease = 6,
  Liquidation = 7,
}

export enum DecreasePositionSwapType {
  NoSwap = 0,
  SwapPnlTokenToCollateralToken = 1,
  SwapCollateralTokenToPnlToken = 2,
}

/**
 * The two kind-specific values the pipeline needs, plus the on-chain order type
 */
export interface OrderKindProfile {
  intent: PriceIntent;
  gasLimitKey: GasLimitKey;
  orderType: GmxOrderType;
  movesTokens: boolean; // Collateral leaves the wallet, so an allowance is needed
}

export const ORDER_KINDS = {
  increase: {
    intent: "open",
    gasLimitKey: "increase_order",
    orderType: GmxOrderType.MarketIncrease,
    movesTokens: true,
  },
  decrease: {
    intent: "close",
    gasLimitKey: "decrease_order",
    orderType: GmxOrderType.MarketDecrease,
    movesTokens: false,
  },
  swap: {
    intent: "swap",
    gasLimitKey: "swap_order",
    orderType: GmxOrderType.MarketSwap,
    movesTokens: true,
  },
} as const satisfies Record<OrderKind, OrderKindProfile>;

/**
 * User-facing trading intent. Anything left out is derived by the resolver.
 */
export interface OrderRequest {
  kind: OrderKind;
  chain?: ChainName;
  marketKey?: Address;
  indexTokenAddress?: Address;
  indexTokenSymbol?: string;
  startTokenAddress?: Address;
  startTokenSymbol?: string;
  outTokenAddress?: Address;
  outTokenSymbol?: string;
  collateralAddress?: Address;
  collateralTokenSymbol?: string;
  swapPath?: Address[];
  isLong?: boolean;
  sizeDeltaUsd?: number; // Position size change in USD
  leverage?: number; // Used to derive size or collateral when one of them is omitted
  initialCollateralDelta?: number; // Human-scale amount of the start token
  slippagePercent?: number; // Fraction, e.g. 0.003
}

export interface ResolvedPositionOrder {
  kind: "increase" | "decrease";
  chain: ChainName;
  marketKey: Address;
  indexTokenAddress: Address;
  indexTokenDecimals: number;
  startTokenAddress: Address;
  startTokenDecimals: number;
  collateralAddress: Address;
  swapPath: Address[];
  isLong: boolean;
  sizeDeltaUsd: number;
  initialCollateralDelta: number;
  collateralUsd: number;
  slippagePercent: number;
  sizeDeltaScaled: bigint; // sizeDeltaUsd × 10^30
  collateralDeltaScaled: bigint; // initialCollateralDelta × 10^startTokenDecimals
}

export interface ResolvedSwapOrder {
  kind: "swap";
  chain: ChainName;
  startTokenAddress: Address;
  startTokenDecimals: number;
  outTokenAddress: Address;
  outTokenDecimals: number;
  swapPath: Address[];
  initialCollateralDelta: number;
  slippagePercent: number;
  collateralDeltaScaled: bigint;
}

export type ResolvedOrder = ResolvedPositionOrder | ResolvedSwapOrder;

export interface TokenInfo {
  address: Address;
  symbol: string;
  decimals: number;
  synthetic?: boolean;
}

export interface MarketInfo {
  marketToken: Address; // The market key
  indexToken: Address;
  longToken: Address;
  shortToken: Address;
}

/**
 * Raw oracle prices: 30-decimal USD per smallest token unit, kept as strings
 */
export interface PriceQuote {
  tokenAddress: Address;
  bid: string; // minPriceFull
  ask: string; // maxPriceFull
}

export type OracleSnapshot = ReadonlyMap<Address, PriceQuote>;

export interface ExecutionPrice {
  medianPrice: Decimal;
  adjustedPrice: Decimal;
  acceptablePrice: bigint; // floor(adjustedPrice), the on-chain value
  acceptablePriceUsd: Decimal; // floor(adjustedPrice) × 10^(decimals - 30)
}

export interface GasPlan {
  orderKind: OrderKind;
  gasLimitKey: GasLimitKey;
  baseEstimate: bigint;
  gasLimit: bigint; // Call-gas ceiling, always 2 × baseEstimate
  maxFeePerGas: bigint;
  maxPriorityFeePerGas: bigint; // No tip bidding
  executionFee: bigint; // Keeper fee paid in native token
}

export interface TransactionEnvelope {
  to: Address;
  data: Hex; // Encoded multicall(calls)
  calls: Hex[];
  value: bigint;
  chainId: number;
  gas: bigint;
  maxFeePerGas: bigint;
  maxPriorityFeePerGas: bigint;
  nonce: number;
}

export interface SignedTransaction {
  readonly envelope: Readonly<TransactionEnvelope>;
  readonly serialized: TransactionSerializedEIP1559;
  readonly hash: Hash;
}

export type PipelineStage =
  | "initialized"
  | "resolved"
  | "priced"
  | "budgeted"
  | "enveloped"
  | "signed"
  | "broadcast"
  | "discarded";

interface SubmissionDetails {
  order: ResolvedOrder;
  price: ExecutionPrice;
  gas: GasPlan;
  envelope: TransactionEnvelope;
  signed: SignedTransaction;
  approvalTxHash?: Hash;
}

export type SubmissionResult =
  | (SubmissionDetails & { stage: "broadcast"; txHash: Hash })
  | (SubmissionDetails & { stage: "discarded" });
