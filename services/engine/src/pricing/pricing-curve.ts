/**
 * Pricing Curve
 *
 * Linear bonding curve over a fixed sale capacity:
 *   avgPrice = target / capacity
 *   price(sold) = avgPrice * (1 + sold / capacity)
 *
 * The price runs from avgPrice at sold = 0 to 2 * avgPrice at sold = capacity.
 * Prices are settlement base units per token base unit, scaled by PRICE_SCALE.
 *
 * Two approximations of the same curve live here and are intentionally kept apart:
 * - purchaseReturn quotes at the single point price before the purchase
 * - exactCostForTokens integrates with the trapezoid (start + end) / 2
 * For a purchase of t tokens the trapezoid cost exceeds the point-price spend by
 * at most amountIn * t / (2 * capacity), plus t / (2 * PRICE_SCALE) from the
 * floored end price and one unit of rounding.
 */

import { PRICE_SCALE, ValidationError } from "@curvefund/shared";
import type { PurchaseQuote } from "./types.js";

function assertCurve(capacity: bigint, sold: bigint, target: bigint): void {
  if (capacity <= 0n) {
    throw new ValidationError("Curve capacity must be positive", "capacity");
  }
  if (sold < 0n || sold > capacity) {
    throw new ValidationError(`Sold amount ${sold} outside [0, ${capacity}]`, "sold");
  }
  if (target <= 0n) {
    throw new ValidationError("Curve target must be positive", "target");
  }
}

/**
 * Average price over the whole curve, scaled by PRICE_SCALE
 */
export function averagePrice(capacity: bigint, target: bigint): bigint {
  if (capacity <= 0n) {
    throw new ValidationError("Curve capacity must be positive", "capacity");
  }
  const avg = (target * PRICE_SCALE) / capacity;
  if (avg === 0n) {
    throw new ValidationError(
      `Target ${target} is below the price resolution for capacity ${capacity}`,
      "target"
    );
  }
  return avg;
}

/**
 * Spot price at `sold` tokens, scaled by PRICE_SCALE. Non-decreasing in `sold`.
 */
export function currentPrice(capacity: bigint, sold: bigint, target: bigint): bigint {
  assertCurve(capacity, sold, target);
  const avg = averagePrice(capacity, target);
  return avg + (avg * sold) / capacity;
}

/**
 * Trapezoidal cost of buying `tokensWanted` starting at `sold`
 */
export function exactCostForTokens(
  capacity: bigint,
  sold: bigint,
  target: bigint,
  tokensWanted: bigint
): bigint {
  assertCurve(capacity, sold, target);
  if (tokensWanted < 0n) {
    throw new ValidationError("Token amount must not be negative", "tokensWanted");
  }
  if (sold + tokensWanted > capacity) {
    throw new ValidationError(
      `Requested ${tokensWanted} tokens but only ${capacity - sold} remain`,
      "tokensWanted"
    );
  }

  const startPrice = currentPrice(capacity, sold, target);
  const endPrice = currentPrice(capacity, sold + tokensWanted, target);
  return (tokensWanted * (startPrice + endPrice)) / (2n * PRICE_SCALE);
}

/**
 * Tokens returned for `amountIn`, priced at the spot price before the purchase.
 * Clamps to the remaining capacity and charges no more than the clamped tokens cost.
 */
export function purchaseReturn(
  capacity: bigint,
  sold: bigint,
  target: bigint,
  amountIn: bigint
): PurchaseQuote {
  if (amountIn <= 0n) {
    throw new ValidationError("Purchase amount must be positive", "amountIn");
  }

  // averagePrice rejects curves whose price would round to zero
  const price = currentPrice(capacity, sold, target);

  const remaining = capacity - sold;
  const tokensOut = (amountIn * PRICE_SCALE) / price;

  if (tokensOut <= remaining) {
    return {
      tokensOut,
      amountUsed: amountIn,
      refund: 0n,
      price,
      clamped: false,
    };
  }

  // The trapezoid cost of the remainder can exceed the point-price spend,
  // so the charge is capped at what the buyer offered.
  const cost = exactCostForTokens(capacity, sold, target, remaining);
  const amountUsed = cost < amountIn ? cost : amountIn;

  return {
    tokensOut: remaining,
    amountUsed,
    refund: amountIn - amountUsed,
    price,
    clamped: true,
  };
}
