/**
 * Pricing Types
 */

export interface PurchaseQuote {
  /** Tokens delivered to the buyer */
  tokensOut: bigint;
  /** Settlement amount actually charged */
  amountUsed: bigint;
  /** amountIn - amountUsed, non-zero only when the quote was clamped */
  refund: bigint;
  /** Spot price the quote was taken at, scaled by PRICE_SCALE */
  price: bigint;
  /** True when the request exceeded the remaining capacity */
  clamped: boolean;
}
