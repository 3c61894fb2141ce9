/**
 * SETTLEMENT CALCULATOR
 *
 * Works out who gets paid what when an order closes. Nothing here moves
 * value; the ledger applies the returned figures through its ports.
 *
 * Rounding truncates everywhere. Whatever truncation leaves behind stays
 * with the ledger as dust and is never collected back from participants.
 */

import {Contribution, FulfillmentResult, Order, RefundEntry} from '../domain';
import {SettlementService} from './effects';
import {basisPointsOf, quotePrice} from './pricing';

// ============================================================================
// Fulfilment
// ============================================================================

export function computeSettlement(
  order: Order,
  contributions: readonly Contribution[],
  platformFeeBps: number
): FulfillmentResult {
  if (contributions.length === 0) {
    return {
      finalPricePerUnit: 0n,
      netPaymentToManufacturer: 0n,
      platformFeeCollected: 0n,
      refunds: [],
      totalValueForRewardCalc: 0n,
    };
  }

  const finalPricePerUnit = quotePrice(
    order.initialPrice,
    order.discountTiers,
    order.totalUnitsCommitted
  ).pricePerUnit;
  const grossValue = order.totalUnitsCommitted * finalPricePerUnit;
  const platformFeeCollected = basisPointsOf(grossValue, platformFeeBps);

  return {
    finalPricePerUnit,
    netPaymentToManufacturer: grossValue - platformFeeCollected,
    platformFeeCollected,
    refunds: calculatePriceDropRefunds(contributions, finalPricePerUnit),
    totalValueForRewardCalc: grossValue,
  };
}

/**
 * Retailers who paid more than the final price get the difference back.
 * Anyone who paid exactly the final price is left out; nobody is ever asked
 * to top up.
 */
export function calculatePriceDropRefunds(
  contributions: readonly Contribution[],
  finalPricePerUnit: bigint
): RefundEntry[] {
  return contributions.flatMap(contribution => {
    const idealPayment = contribution.unitsOrdered * finalPricePerUnit;
    return contribution.amountPaid > idealPayment
      ? [{retailer: contribution.retailer, amount: contribution.amountPaid - idealPayment}]
      : [];
  });
}

export function computeRewardPool(totalValueForRewardCalc: bigint, rewardBps: number): bigint {
  return basisPointsOf(totalValueForRewardCalc, rewardBps);
}

// ============================================================================
// Cancellation
// ============================================================================

export function computeCancellationRefunds(
  contributions: readonly Contribution[]
): RefundEntry[] {
  return contributions
    .filter(contribution => contribution.amountPaid > 0n)
    .map(contribution => ({retailer: contribution.retailer, amount: contribution.amountPaid}));
}

export function totalRefunded(refunds: readonly RefundEntry[]): bigint {
  return refunds.reduce((sum, refund) => sum + refund.amount, 0n);
}

export const settlementCalculator: SettlementService = {computeSettlement};
