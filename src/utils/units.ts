import { Decimal } from "decimal.js";

/** GMX expresses USD amounts and oracle prices with 30 implied decimals */
export const USD_DECIMALS = 30;

/**
 * Decimal constructor with enough significant digits for raw 30-decimal
 * oracle prices multiplied by token amounts
 */
export const PreciseDecimal = Decimal.clone({ precision: 100 });

export type DecimalInput = Decimal.Value;

export function toDecimal(value: DecimalInput): Decimal {
  return new PreciseDecimal(value);
}

/**
 * Multiply by a power of ten; the exponent may be negative
 */
export function shiftDecimals(value: DecimalInput, exponent: number): Decimal {
  return toDecimal(value).times(PreciseDecimal.pow(10, exponent));
}

/**
 * Convert a human-scale amount into integer on-chain units (floored)
 */
export function scaleToUnits(amount: DecimalInput, decimals: number): bigint {
  const value = toDecimal(amount);
  if (value.isNegative() || value.isNaN()) {
    throw new RangeError(`Cannot scale negative or non-numeric amount: ${value.toString()}`);
  }
  return toBigInt(shiftDecimals(value, decimals));
}

/**
 * Convert integer on-chain units back into a human-scale amount
 */
export function descaleFromUnits(units: bigint, decimals: number): Decimal {
  return shiftDecimals(units.toString(), -decimals);
}

/**
 * Floor a decimal into a bigint
 */
export function toBigInt(value: Decimal): bigint {
  return BigInt(value.floor().toFixed(0));
}

/**
 * USD value of one whole token from a raw oracle price
 */
export function rawPriceToUsd(rawPrice: DecimalInput, tokenDecimals: number): Decimal {
  return shiftDecimals(rawPrice, tokenDecimals - USD_DECIMALS);
}
