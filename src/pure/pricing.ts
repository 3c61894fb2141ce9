/**
 * PRICING ENGINE
 *
 * Volume discounts for an order. Plain values in, plain values out; the
 * same rule prices every join and the final settlement, so the settled price
 * can never be worse than the last price a retailer was quoted.
 */

import {DiscountTier} from '../domain';
import {PriceQuote} from './types';

export const BPS_DENOMINATOR = 10_000n;

export const MAX_BPS = 10_000;

/**
 * The largest discount among the tiers whose threshold has been reached.
 * Tier order does not matter.
 */
export function resolveDiscount(
  tiers: readonly DiscountTier[],
  unitsCommitted: bigint
): number {
  return tiers
    .filter(tier => tier.unitsThreshold <= unitsCommitted)
    .reduce((best, tier) => Math.max(best, tier.discountBps), 0);
}

export function applyDiscount(price: bigint, discountBps: number): bigint {
  return price - (price * BigInt(discountBps)) / BPS_DENOMINATOR;
}

export function quotePrice(
  initialPrice: bigint,
  tiers: readonly DiscountTier[],
  unitsCommitted: bigint
): PriceQuote {
  const discountBps = resolveDiscount(tiers, unitsCommitted);
  return {
    discountBps,
    pricePerUnit: applyDiscount(initialPrice, discountBps),
  };
}

// Floor of value * bps / 10000; bigint division truncates toward zero
export function basisPointsOf(value: bigint, bps: number): bigint {
  return (value * BigInt(bps)) / BPS_DENOMINATOR;
}
