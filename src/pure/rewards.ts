import {Contribution, OrderId, ParticipantId, RewardShare} from '../domain';

/**
 * Split a reward pool across contributions in proportion to units ordered.
 *
 * Each share is floored, so the shares add up to at most `totalRewardPool`
 * and fall short of it by less than one unit per contributor. Zero shares are
 * dropped.
 */
export function computeRewardShares(
  totalRewardPool: bigint,
  totalUnitsInOrder: bigint,
  contributions: readonly Contribution[]
): RewardShare[] {
  return contributions
    .filter(contribution => contribution.unitsOrdered > 0n)
    .map(contribution => ({
      retailer: contribution.retailer,
      amount: (totalRewardPool * contribution.unitsOrdered) / totalUnitsInOrder,
    }))
    .filter(share => share.amount > 0n);
}

export function sumShares(shares: readonly RewardShare[]): bigint {
  return shares.reduce((sum, share) => sum + share.amount, 0n);
}

export function rewardKey(orderId: OrderId, retailer: ParticipantId): string {
  return `${orderId}:${retailer}`;
}
