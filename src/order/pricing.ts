import type { Decimal } from "decimal.js";
import type { Address } from "viem";
import type { ExecutionPrice, OracleSnapshot, PriceIntent, PriceQuote } from "../types.js";
import { PriceUnavailableError } from "../utils/errors.js";
import { USD_DECIMALS, shiftDecimals, toBigInt, toDecimal } from "../utils/units.js";

export interface ExecutionPriceInput {
  tokenDecimals: number;
  quote: PriceQuote;
  isLong: boolean;
  intent: PriceIntent;
  slippage: number;
}

function assertSlippage(slippage: number): void {
  if (!(slippage >= 0 && slippage < 1)) {
    throw new RangeError(`Slippage must be in [0, 1), got ${slippage}`);
  }
}

/**
 * Midpoint of a quote's bid and ask, in raw oracle units
 */
export function medianOf(quote: PriceQuote): Decimal {
  return toDecimal(quote.bid).plus(quote.ask).div(2);
}

/**
 * Look up a token's quote in an oracle snapshot
 */
export function quoteFor(snapshot: OracleSnapshot, token: Address): PriceQuote {
  const quote = snapshot.get(token);
  if (!quote) {
    throw new PriceUnavailableError(token, "token missing from oracle snapshot");
  }
  return quote;
}

/**
 * Direction-aware acceptable price.
 *
 * The price moves against the trader: opening a long or closing a short
 * accepts up to median × (1 + s), opening a short or closing a long down to
 * median × (1 − s). Swaps keep the median; their bound is the minimum output.
 */
export function computeExecutionPrice(input: ExecutionPriceInput): ExecutionPrice {
  const { tokenDecimals, quote, isLong, intent, slippage } = input;
  assertSlippage(slippage);

  const medianPrice = medianOf(quote);

  let adjustedPrice: Decimal;
  if (intent === "swap") {
    adjustedPrice = medianPrice;
  } else {
    const raisesPrice = (intent === "open") === isLong;
    const factor = raisesPrice ? toDecimal(1).plus(slippage) : toDecimal(1).minus(slippage);
    adjustedPrice = medianPrice.times(factor);
  }

  const acceptablePrice = toBigInt(adjustedPrice);
  return {
    medianPrice,
    adjustedPrice,
    acceptablePrice,
    acceptablePriceUsd: shiftDecimals(acceptablePrice.toString(), tokenDecimals - USD_DECIMALS),
  };
}

export interface SwapOutputInput {
  amountIn: bigint; // Smallest units of the input token
  inQuote: PriceQuote;
  outQuote: PriceQuote;
  slippage: number;
}

/**
 * Minimum output amount of a swap, in smallest units of the output token.
 * Raw prices are USD per smallest unit, so decimals cancel out.
 */
export function estimateSwapOutput(input: SwapOutputInput): bigint {
  const { amountIn, inQuote, outQuote, slippage } = input;
  assertSlippage(slippage);

  const outMedian = medianOf(outQuote);
  if (outMedian.isZero()) {
    throw new PriceUnavailableError(outQuote.tokenAddress, "zero oracle price");
  }

  const expected = toDecimal(amountIn.toString()).times(medianOf(inQuote)).div(outMedian);
  return toBigInt(expected.times(toDecimal(1).minus(slippage)));
}
