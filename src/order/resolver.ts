import type { Decimal } from "decimal.js";
import { type Address, getAddress, isAddress, isAddressEqual } from "viem";
import type { PipelineConfig } from "../config.js";
import type { MarketRegistry, PriceOracleFeed, TokenRegistry } from "../gmx/types.js";
import type {
  MarketInfo,
  OracleSnapshot,
  OrderRequest,
  ResolvedOrder,
  ResolvedPositionOrder,
  ResolvedSwapOrder,
  TokenInfo,
} from "../types.js";
import {
  CollateralTooLowError,
  ConfigurationError,
  LeverageExceededError,
  type MissingFieldDetail,
  MissingFieldError,
  PriceUnavailableError,
  describeError,
} from "../utils/errors.js";
import { createLimiter } from "../utils/fan-out.js";
import { logger } from "../utils/logger.js";
import { USD_DECIMALS, rawPriceToUsd, scaleToUnits, toDecimal } from "../utils/units.js";
import { medianOf, quoteFor } from "./pricing.js";

const log = logger.child("resolver");

export const DEFAULT_SLIPPAGE = 0.003;

/** Increase orders below this collateral value are rejected */
export const MIN_COLLATERAL_USD = 2;

/** Registry symbols differ from the common ticker for bridged BTC */
const SYMBOL_ALIASES: ReadonlyMap<string, string> = new Map([["BTC", "WBTC.b"]]);

/** WBTC.b trades on the market indexed by the synthetic BTC token */
const MARKET_INDEX_ALIASES: ReadonlyMap<Address, Address> = new Map([
  [
    getAddress("0x2f2a2543b76a4166549f7aab2e75bef0aefc5b0f"),
    getAddress("0x47904963fc8b2340414262125af798b9655e58cd"),
  ],
]);

type DerivableField =
  | "indexTokenAddress"
  | "marketKey"
  | "collateralAddress"
  | "startTokenAddress"
  | "outTokenAddress"
  | "swapPath"
  | "slippagePercent";

type RequiredField = DerivableField | "chain" | "isLong";

/**
 * Fields that must be present after derivation, in derivation order
 */
export const REQUIRED_FIELDS: Record<OrderRequest["kind"], readonly RequiredField[]> = {
  increase: [
    "chain",
    "indexTokenAddress",
    "marketKey",
    "isLong",
    "collateralAddress",
    "startTokenAddress",
    "swapPath",
    "slippagePercent",
  ],
  decrease: [
    "chain",
    "indexTokenAddress",
    "marketKey",
    "isLong",
    "collateralAddress",
    "startTokenAddress",
    "slippagePercent",
  ],
  swap: ["chain", "startTokenAddress", "outTokenAddress", "swapPath", "slippagePercent"],
};

type Settled<T> = { ok: true; value: T } | { ok: false; reason: string };

/**
 * Registry reads joined before derivation. A failed read is kept so the
 * fields that depended on it can be reported.
 */
export interface RegistrySnapshot {
  tokens: Settled<TokenInfo[]>;
  markets: Settled<MarketInfo[]>;
}

type Derived<T> = { value: T } | { reason: string };

type Derivation<F extends DerivableField> = (
  draft: OrderRequest,
  registry: RegistrySnapshot
) => Derived<NonNullable<OrderRequest[F]>>;

type DerivationTable = { [F in DerivableField]: Derivation<F> };

function findTokenBySymbol(tokens: readonly TokenInfo[], symbol: string): TokenInfo | undefined {
  const target = SYMBOL_ALIASES.get(symbol) ?? symbol;
  return (
    tokens.find((t) => t.symbol === target) ??
    tokens.find((t) => t.symbol.toLowerCase() === target.toLowerCase())
  );
}

function deriveFromSymbol(
  registry: RegistrySnapshot,
  symbol: string | undefined,
  symbolField: string
): Derived<Address> {
  if (symbol === undefined) {
    return { reason: `neither the address nor ${symbolField} was supplied` };
  }
  if (!registry.tokens.ok) {
    return { reason: `token registry unavailable: ${registry.tokens.reason}` };
  }
  const token = findTokenBySymbol(registry.tokens.value, symbol);
  return token ? { value: token.address } : { reason: `symbol ${symbol} not in token registry` };
}

function findMarket(registry: RegistrySnapshot, marketKey: Address): Derived<MarketInfo> {
  if (!registry.markets.ok) {
    return { reason: `market registry unavailable: ${registry.markets.reason}` };
  }
  const market = registry.markets.value.find((m) => isAddressEqual(m.marketToken, marketKey));
  return market ? { value: market } : { reason: `market ${marketKey} not in market registry` };
}

function isCollateralOf(market: MarketInfo, token: Address): boolean {
  return isAddressEqual(market.longToken, token) || isAddressEqual(market.shortToken, token);
}

/**
 * Markets routing `from` into `to`: none when they match, one market listing
 * both, or two markets sharing a short token
 */
export function findSwapPath(
  markets: readonly MarketInfo[],
  from: Address,
  to: Address
): Address[] | undefined {
  if (isAddressEqual(from, to)) {
    return [];
  }

  const direct = markets.find((m) => isCollateralOf(m, from) && isCollateralOf(m, to));
  if (direct) {
    return [direct.marketToken];
  }

  for (const first of markets) {
    if (!isCollateralOf(first, from)) {
      continue;
    }
    const second = markets.find(
      (m) =>
        m !== first && isCollateralOf(m, to) && isAddressEqual(m.shortToken, first.shortToken)
    );
    if (second) {
      return [first.marketToken, second.marketToken];
    }
  }
  return undefined;
}

const DERIVATIONS: DerivationTable = {
  indexTokenAddress: (draft, registry) => {
    if (draft.indexTokenSymbol !== undefined || draft.marketKey === undefined) {
      return deriveFromSymbol(registry, draft.indexTokenSymbol, "indexTokenSymbol");
    }
    const market = findMarket(registry, draft.marketKey);
    return "value" in market ? { value: market.value.indexToken } : market;
  },

  marketKey: (draft, registry) => {
    if (draft.indexTokenAddress === undefined) {
      return { reason: "needs indexTokenAddress" };
    }
    if (!registry.markets.ok) {
      return { reason: `market registry unavailable: ${registry.markets.reason}` };
    }
    const indexToken = MARKET_INDEX_ALIASES.get(draft.indexTokenAddress) ?? draft.indexTokenAddress;
    const market = registry.markets.value.find((m) => isAddressEqual(m.indexToken, indexToken));
    return market
      ? { value: market.marketToken }
      : { reason: `no market indexes ${indexToken}` };
  },

  collateralAddress: (draft, registry) => {
    if (draft.marketKey === undefined) {
      return { reason: "needs marketKey" };
    }
    const found = findMarket(registry, draft.marketKey);
    if (!("value" in found)) {
      return found;
    }
    const market = found.value;

    if (draft.collateralTokenSymbol !== undefined) {
      const token = deriveFromSymbol(registry, draft.collateralTokenSymbol, "collateralTokenSymbol");
      if (!("value" in token)) {
        return token;
      }
      return isCollateralOf(market, token.value)
        ? token
        : { reason: `${draft.collateralTokenSymbol} is not a collateral token of the market` };
    }
    const start =
      draft.startTokenAddress ??
      (draft.startTokenSymbol !== undefined && registry.tokens.ok
        ? findTokenBySymbol(registry.tokens.value, draft.startTokenSymbol)?.address
        : undefined);
    if (start !== undefined && isCollateralOf(market, start)) {
      return { value: start };
    }
    if (draft.isLong === undefined) {
      return { reason: "needs isLong to pick the long or short token" };
    }
    return { value: draft.isLong ? market.longToken : market.shortToken };
  },

  startTokenAddress: (draft, registry) => {
    if (draft.startTokenSymbol === undefined && draft.kind !== "swap") {
      return draft.collateralAddress !== undefined
        ? { value: draft.collateralAddress }
        : { reason: "needs collateralAddress" };
    }
    return deriveFromSymbol(registry, draft.startTokenSymbol, "startTokenSymbol");
  },

  outTokenAddress: (draft, registry) =>
    deriveFromSymbol(registry, draft.outTokenSymbol, "outTokenSymbol"),

  swapPath: (draft, registry) => {
    const from = draft.startTokenAddress;
    const to = draft.kind === "swap" ? draft.outTokenAddress : draft.collateralAddress;
    if (from === undefined || to === undefined) {
      return { reason: "needs both ends of the swap" };
    }
    if (!registry.markets.ok) {
      return { reason: `market registry unavailable: ${registry.markets.reason}` };
    }
    const path = findSwapPath(registry.markets.value, from, to);
    return path ? { value: path } : { reason: `no route from ${from} to ${to}` };
  },

  slippagePercent: () => ({ value: DEFAULT_SLIPPAGE }),
};

function applyDerivation<F extends DerivableField>(
  field: F,
  draft: OrderRequest,
  registry: RegistrySnapshot
): string | undefined {
  if (draft[field] !== undefined) {
    return undefined;
  }
  const derived = DERIVATIONS[field](draft, registry);
  if ("reason" in derived) {
    return derived.reason;
  }
  draft[field] = derived.value;
  return undefined;
}

function isDerivable(field: RequiredField): field is DerivableField {
  return field !== "chain" && field !== "isLong";
}

const ADDRESS_FIELDS = [
  "marketKey",
  "indexTokenAddress",
  "startTokenAddress",
  "outTokenAddress",
  "collateralAddress",
] as const;

const AMOUNT_FIELDS = ["sizeDeltaUsd", "leverage", "initialCollateralDelta"] as const;

/**
 * Checksum the supplied addresses and reject malformed values up front
 */
function normalizeRequest(request: OrderRequest): {
  draft: OrderRequest;
  invalid: MissingFieldDetail[];
} {
  const draft: OrderRequest = { ...request };
  const invalid: MissingFieldDetail[] = [];

  for (const field of ADDRESS_FIELDS) {
    const value = draft[field];
    if (value === undefined) {
      continue;
    }
    if (isAddress(value, { strict: false })) {
      draft[field] = getAddress(value);
    } else {
      invalid.push({ field, reason: `${value} is not a valid address` });
      draft[field] = undefined;
    }
  }
  if (draft.swapPath !== undefined) {
    const path = draft.swapPath;
    if (path.every((hop) => isAddress(hop, { strict: false }))) {
      draft.swapPath = path.map((hop) => getAddress(hop));
    } else {
      invalid.push({ field: "swapPath", reason: "contains an invalid market address" });
    }
  }

  for (const field of AMOUNT_FIELDS) {
    const value = draft[field];
    if (value !== undefined && !(Number.isFinite(value) && value >= 0)) {
      invalid.push({ field, reason: `must be a non-negative number, got ${value}` });
    }
  }
  if (draft.leverage === 0) {
    invalid.push({ field: "leverage", reason: "must be positive" });
  }
  if (
    draft.slippagePercent !== undefined &&
    !(draft.slippagePercent >= 0 && draft.slippagePercent < 1)
  ) {
    invalid.push({
      field: "slippagePercent",
      reason: `must be a fraction in [0, 1), got ${draft.slippagePercent}`,
    });
  }

  return { draft, invalid };
}

async function settle<T>(read: () => Promise<T>): Promise<Settled<T>> {
  try {
    return { ok: true, value: await read() };
  } catch (error) {
    return { ok: false, reason: describeError(error) };
  }
}

export interface OrderResolverOptions {
  tokens: TokenRegistry;
  markets: MarketRegistry;
  oracle: PriceOracleFeed;
  config: Pick<PipelineConfig, "chain" | "maxLeverage" | "readConcurrency">;
}

/**
 * Parameter Resolver
 * Completes a partial order request from the registries and validates it
 */
export class OrderResolver {
  private readonly tokens: TokenRegistry;
  private readonly markets: MarketRegistry;
  private readonly oracle: PriceOracleFeed;
  private readonly config: OrderResolverOptions["config"];

  constructor(options: OrderResolverOptions) {
    this.tokens = options.tokens;
    this.markets = options.markets;
    this.oracle = options.oracle;
    this.config = options.config;
  }

  async resolve(request: OrderRequest): Promise<ResolvedOrder> {
    if (request.chain !== undefined && request.chain !== this.config.chain) {
      throw new ConfigurationError(
        `Order targets ${request.chain} but the pipeline is configured for ${this.config.chain}`,
        { observed: request.chain, required: this.config.chain }
      );
    }

    const { draft, invalid } = normalizeRequest(request);
    // Chain is never derived, so nothing is read for a request without one
    if (draft.chain === undefined) {
      throw new MissingFieldError([
        { field: "chain", reason: "chain is never derived" },
        ...invalid,
      ]);
    }
    if (invalid.length > 0) {
      throw new MissingFieldError(invalid);
    }
    if (draft.kind === "decrease" && draft.swapPath === undefined) {
      draft.swapPath = [];
    }

    const isPosition = draft.kind !== "swap";
    const { registry, oracle } = await this.readRegistries(isPosition);

    // Derive every missing field, then report all that remain
    const missing: MissingFieldDetail[] = [];
    for (const field of REQUIRED_FIELDS[draft.kind]) {
      if (isDerivable(field)) {
        const reason = applyDerivation(field, draft, registry);
        if (reason !== undefined) {
          missing.push({ field, reason });
        }
      } else if (draft[field] === undefined) {
        missing.push({
          field,
          reason: field === "chain" ? "chain is never derived" : "no default direction",
        });
      }
    }

    if (draft.kind === "swap" && draft.initialCollateralDelta === undefined) {
      missing.push({ field: "initialCollateralDelta", reason: "swap amount is required" });
    }
    if (isPosition) {
      missing.push(...missingSizeFields(draft));
    }

    const decimals = (field: string, address: Address | undefined): number | undefined => {
      if (address === undefined) {
        return undefined;
      }
      if (!registry.tokens.ok) {
        missing.push({ field, reason: `token registry unavailable: ${registry.tokens.reason}` });
        return undefined;
      }
      const token = registry.tokens.value.find((t) => isAddressEqual(t.address, address));
      if (!token) {
        missing.push({ field, reason: `${address} not in token registry` });
      }
      return token?.decimals;
    };

    if (draft.kind === "swap") {
      const startDecimals = decimals("startTokenAddress", draft.startTokenAddress);
      const outDecimals = decimals("outTokenAddress", draft.outTokenAddress);
      if (missing.length > 0) {
        throw new MissingFieldError(missing);
      }
      return this.formatSwap(draft, startDecimals, outDecimals);
    }

    const indexDecimals = decimals("indexTokenAddress", draft.indexTokenAddress);
    const startDecimals = decimals("startTokenAddress", draft.startTokenAddress);
    if (missing.length > 0) {
      throw new MissingFieldError(missing);
    }
    if (!oracle) {
      throw new PriceUnavailableError(undefined, "oracle snapshot was not read");
    }
    return this.formatPosition(draft, oracle, indexDecimals, startDecimals);
  }

  /**
   * Read the registries (and, for position orders, the oracle) concurrently
   */
  private async readRegistries(
    withOracle: boolean
  ): Promise<{ registry: RegistrySnapshot; oracle?: OracleSnapshot }> {
    const limit = createLimiter(this.config.readConcurrency);
    const [tokens, markets, oracle] = await Promise.all([
      limit(() => settle(() => this.tokens.getTokens())),
      limit(() => settle(() => this.markets.getMarkets())),
      withOracle ? limit(() => settle(() => this.oracle.getSnapshot())) : undefined,
    ]);

    let snapshot: OracleSnapshot | undefined;
    if (oracle) {
      if (!oracle.ok) {
        throw new PriceUnavailableError(undefined, oracle.reason);
      }
      snapshot = oracle.value;
    }
    if (!tokens.ok || !markets.ok) {
      log.warn("Registry read failed", { tokens: tokens.ok, markets: markets.ok });
    }
    return { registry: { tokens, markets }, oracle: snapshot };
  }

  private formatSwap(
    draft: OrderRequest,
    startTokenDecimals: number | undefined,
    outTokenDecimals: number | undefined
  ): ResolvedSwapOrder {
    const {
      chain,
      startTokenAddress,
      outTokenAddress,
      swapPath,
      initialCollateralDelta,
      slippagePercent,
    } = draft;
    if (
      chain === undefined ||
      startTokenAddress === undefined ||
      outTokenAddress === undefined ||
      swapPath === undefined ||
      initialCollateralDelta === undefined ||
      slippagePercent === undefined ||
      startTokenDecimals === undefined ||
      outTokenDecimals === undefined
    ) {
      throw new MissingFieldError([{ field: "swap", reason: "incomplete after derivation" }]);
    }

    const resolved: ResolvedSwapOrder = {
      kind: "swap",
      chain,
      startTokenAddress,
      startTokenDecimals,
      outTokenAddress,
      outTokenDecimals,
      swapPath,
      initialCollateralDelta,
      slippagePercent,
      collateralDeltaScaled: scaleToUnits(initialCollateralDelta, startTokenDecimals),
    };
    log.info(`Resolved swap ${startTokenAddress} -> ${outTokenAddress} via ${swapPath.length} hops`);
    return resolved;
  }

  private formatPosition(
    draft: OrderRequest,
    oracle: OracleSnapshot,
    indexTokenDecimals: number | undefined,
    startTokenDecimals: number | undefined
  ): ResolvedPositionOrder {
    const {
      kind,
      chain,
      marketKey,
      indexTokenAddress,
      startTokenAddress,
      collateralAddress,
      swapPath,
      isLong,
      slippagePercent,
    } = draft;
    if (
      kind === "swap" ||
      chain === undefined ||
      marketKey === undefined ||
      indexTokenAddress === undefined ||
      startTokenAddress === undefined ||
      collateralAddress === undefined ||
      swapPath === undefined ||
      isLong === undefined ||
      slippagePercent === undefined ||
      indexTokenDecimals === undefined ||
      startTokenDecimals === undefined
    ) {
      throw new MissingFieldError([{ field: "position", reason: "incomplete after derivation" }]);
    }

    // USD value of one whole start token
    const startPriceUsd = rawPriceToUsd(
      medianOf(quoteFor(oracle, startTokenAddress)),
      startTokenDecimals
    );
    const { sizeDeltaUsd, initialCollateralDelta } = completeSize(draft, startPriceUsd);
    const collateralUsd = startPriceUsd.times(initialCollateralDelta).toNumber();

    if (initialCollateralDelta > 0) {
      const leverage = sizeDeltaUsd / collateralUsd;
      if (leverage > this.config.maxLeverage) {
        throw new LeverageExceededError(leverage, this.config.maxLeverage);
      }
    }
    if (kind === "increase" && collateralUsd < MIN_COLLATERAL_USD) {
      throw new CollateralTooLowError(collateralUsd, MIN_COLLATERAL_USD);
    }

    const resolved: ResolvedPositionOrder = {
      kind,
      chain,
      marketKey,
      indexTokenAddress,
      indexTokenDecimals,
      startTokenAddress,
      startTokenDecimals,
      collateralAddress,
      swapPath,
      isLong,
      sizeDeltaUsd,
      initialCollateralDelta,
      collateralUsd,
      slippagePercent,
      sizeDeltaScaled: scaleToUnits(sizeDeltaUsd, USD_DECIMALS),
      collateralDeltaScaled: scaleToUnits(initialCollateralDelta, startTokenDecimals),
    };
    log.info(
      `Resolved ${kind} ${isLong ? "long" : "short"} on ${marketKey}: $${sizeDeltaUsd} with $${collateralUsd} collateral`
    );
    return resolved;
  }
}

/**
 * Position orders need two of size, collateral and leverage.
 * A decrease with only a size withdraws no collateral.
 */
function missingSizeFields(draft: OrderRequest): MissingFieldDetail[] {
  const hasSize = draft.sizeDeltaUsd !== undefined;
  const hasCollateral = draft.initialCollateralDelta !== undefined;
  const hasLeverage = draft.leverage !== undefined;

  if (hasSize && hasCollateral) {
    return [];
  }
  if ((hasSize || hasCollateral) && hasLeverage) {
    return [];
  }
  if (draft.kind === "decrease" && hasSize) {
    return [];
  }
  if (hasSize) {
    return [{ field: "initialCollateralDelta", reason: "needs the collateral amount or leverage" }];
  }
  if (hasCollateral) {
    return [{ field: "sizeDeltaUsd", reason: "needs the position size or leverage" }];
  }
  return [{ field: "sizeDeltaUsd", reason: "needs the position size or collateral with leverage" }];
}

function completeSize(
  draft: OrderRequest,
  startPriceUsd: Decimal
): { sizeDeltaUsd: number; initialCollateralDelta: number } {
  const { sizeDeltaUsd, initialCollateralDelta, leverage } = draft;

  if (sizeDeltaUsd !== undefined && initialCollateralDelta !== undefined) {
    return { sizeDeltaUsd, initialCollateralDelta };
  }
  if (initialCollateralDelta !== undefined && leverage !== undefined) {
    const collateralUsd = startPriceUsd.times(initialCollateralDelta);
    return { sizeDeltaUsd: collateralUsd.times(leverage).toNumber(), initialCollateralDelta };
  }
  if (sizeDeltaUsd !== undefined && leverage !== undefined) {
    if (startPriceUsd.isZero()) {
      throw new PriceUnavailableError(draft.startTokenAddress, "zero oracle price");
    }
    return {
      sizeDeltaUsd,
      initialCollateralDelta: toDecimal(sizeDeltaUsd).div(leverage).div(startPriceUsd).toNumber(),
    };
  }
  if (sizeDeltaUsd !== undefined) {
    return { sizeDeltaUsd, initialCollateralDelta: 0 };
  }
  throw new MissingFieldError(missingSizeFields(draft));
}
