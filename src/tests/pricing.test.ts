/**
 * TESTS FOR THE PRICING ENGINE
 *
 * Pure functions: plain values in, plain values out, no mocks.
 */

import {DiscountTier} from '../domain';
import {applyDiscount, basisPointsOf, quotePrice, resolveDiscount} from '../pure/pricing';

const tiers: DiscountTier[] = [
  {unitsThreshold: 50n, discountBps: 500},
  {unitsThreshold: 100n, discountBps: 1000},
];

describe('resolveDiscount', () => {
  it('returns 0 when no tier is reached', () => {
    expect(resolveDiscount(tiers, 49n)).toBe(0);
  });

  it('returns 0 for an empty tier list', () => {
    expect(resolveDiscount([], 1_000n)).toBe(0);
  });

  it('applies a tier exactly at its threshold', () => {
    expect(resolveDiscount(tiers, 50n)).toBe(500);
    expect(resolveDiscount(tiers, 100n)).toBe(1000);
  });

  it('picks the largest discount regardless of tier order', () => {
    const shuffled: DiscountTier[] = [
      {unitsThreshold: 10n, discountBps: 300},
      {unitsThreshold: 100n, discountBps: 200},
      {unitsThreshold: 50n, discountBps: 700},
    ];

    expect(resolveDiscount(shuffled, 120n)).toBe(700);
    expect(resolveDiscount(shuffled, 20n)).toBe(300);
  });
});

describe('applyDiscount', () => {
  it('floors the discount amount', () => {
    // 10 * 500 / 10000 = 0.5 -> 0
    expect(applyDiscount(10n, 500)).toBe(10n);
    // 10 * 1000 / 10000 = 1
    expect(applyDiscount(10n, 1000)).toBe(9n);
    // 999 * 333 / 10000 = 33.26 -> 33
    expect(applyDiscount(999n, 333)).toBe(966n);
  });

  it('handles the bounds', () => {
    expect(applyDiscount(1_234n, 0)).toBe(1_234n);
    expect(applyDiscount(1_234n, 10_000)).toBe(0n);
  });
});

describe('quotePrice', () => {
  it('prices the worked order at 60 and 100 units', () => {
    expect(quotePrice(10n, tiers, 60n)).toEqual({discountBps: 500, pricePerUnit: 10n});
    expect(quotePrice(10n, tiers, 100n)).toEqual({discountBps: 1000, pricePerUnit: 9n});
  });

  it('never increases as more units are committed', () => {
    const prices = [0n, 25n, 50n, 75n, 100n, 500n].map(units => quotePrice(1_000n, tiers, units).pricePerUnit);

    expect(prices).toEqual([1_000n, 1_000n, 950n, 950n, 900n, 900n]);
  });
});

describe('basisPointsOf', () => {
  it('truncates', () => {
    expect(basisPointsOf(900n, 100)).toBe(9n);
    expect(basisPointsOf(900n, 50)).toBe(4n);
    expect(basisPointsOf(199n, 50)).toBe(0n);
  });
});
