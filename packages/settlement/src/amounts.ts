/**
 * @tallybridge/settlement: Deterministic amount arithmetic.
 *
 * All arithmetic uses bigint. Decimal strings are converted to and from
 * bigint by scaling.
 *
 * Rules:
 * - No floating-point operations
 * - Base-unit amounts are non-negative integers
 * - Prices carry at most PRICE_DECIMALS fractional digits
 */

import { SettlementError } from "./types.js";

/** Fixed-point precision of oracle prices. */
export const PRICE_DECIMALS = 18;

const PRICE_SCALE = 10n ** BigInt(PRICE_DECIMALS);

/**
 * Parse a base-unit amount ("1000000") into a bigint.
 */
export function parseBaseUnits(amount: string): bigint {
  if (!/^(0|[1-9]\d*)$/.test(amount)) {
    throw new SettlementError("INVALID_AMOUNT", `Invalid base-unit amount: "${amount}"`);
  }
  return BigInt(amount);
}

/**
 * Parse a non-negative decimal string into a bigint scaled by decimals.
 *
 * "2.0" with decimals=18 → 2000000000000000000n
 * "0.5" with decimals=2  → 50n
 */
export function parseDecimal(amount: string, decimals: number): bigint {
  if (!/^\d+(\.\d+)?$/.test(amount)) {
    throw new SettlementError("INVALID_PRICE", `Invalid decimal format: "${amount}"`);
  }

  const [intPart = "0", fracPart = ""] = amount.split(".");
  if (fracPart.length > decimals) {
    throw new SettlementError(
      "INVALID_PRICE",
      `"${amount}" has ${fracPart.length} decimal places, at most ${decimals} allowed`,
    );
  }

  return BigInt(intPart + fracPart.padEnd(decimals, "0"));
}

/**
 * Convert a scaled bigint back to a decimal string.
 *
 * 2000000000000000000n with decimals=18 → "2.000000000000000000"
 */
export function formatDecimal(scaled: bigint, decimals: number): string {
  if (decimals === 0) {
    return scaled.toString();
  }
  const str = scaled.toString().padStart(decimals + 1, "0");
  return `${str.slice(0, str.length - decimals)}.${str.slice(str.length - decimals)}`;
}

/**
 * Parse an oracle price into its PRICE_DECIMALS fixed-point form.
 * Returns undefined for malformed prices.
 */
export function tryParsePrice(price: string): bigint | undefined {
  try {
    return parseDecimal(price, PRICE_DECIMALS);
  } catch (err) {
    if (err instanceof SettlementError) return undefined;
    throw err;
  }
}

/**
 * floor(rawAmount × price) for a PRICE_DECIMALS-scaled price.
 */
export function applyPrice(rawAmount: bigint, scaledPrice: bigint): bigint {
  return (rawAmount * scaledPrice) / PRICE_SCALE;
}

/**
 * Sum decimal base-unit strings.
 */
export function sumBaseUnits(amounts: readonly string[]): bigint {
  return amounts.reduce((acc, a) => acc + parseBaseUnits(a), 0n);
}
