/**
 * REWARD DISTRIBUTOR
 *
 * Holds the reward pool of every settled order and lets each contributing
 * retailer draw their share exactly once. The ledger funds the pool and
 * records the shares at settlement; retailers claim on their own schedule.
 */

import {Either, Left, Maybe, Right} from 'purify-ts';
import {Contribution, LedgerError, OrderId, ParticipantId, RewardRecord, RewardShare} from '../domain';
import {DistributorEffects, RewardService} from '../pure/effects';
import {computeRewardShares, rewardKey} from '../pure/rewards';
import {insufficientFunds, invalidParameters, stateConflict, unauthorized} from '../pure/ledgerErrors';
import {EffectsError} from '../effects/EffectsError';
import {ReentrancyGuard} from './ReentrancyGuard';
import {publishCommitted} from './notifications';
import {withEntry, withMember} from './immutable';

export type RewardDistributorOptions = {
  /** The only participant allowed to record rewards, normally the ledger. */
  readonly recorder: ParticipantId;
  readonly guard?: ReentrancyGuard;
};

export class RewardDistributor implements RewardService {
  private records: ReadonlyMap<string, RewardRecord> = new Map();
  private recordedOrders: ReadonlySet<OrderId> = new Set();
  private readonly guard: ReentrancyGuard;

  constructor(
    private readonly effects: DistributorEffects,
    private readonly options: RewardDistributorOptions
  ) {
    this.guard = options.guard ?? new ReentrancyGuard();
  }

  get account(): ParticipantId {
    return this.effects.rewards.holder;
  }

  /**
   * Record each contributor's share of a funded pool. Runs inside the
   * recorder's own operation, so the recorder announces the shares once that
   * operation commits.
   */
  async recordRewards(
    caller: ParticipantId,
    orderId: OrderId,
    totalRewardPool: bigint,
    totalUnitsInOrder: bigint,
    contributions: readonly Contribution[]
  ): Promise<Either<LedgerError, readonly RewardShare[]>> {
    if (caller !== this.options.recorder) {
      return Left(unauthorized(`${caller} may not record rewards`));
    }
    if (totalRewardPool <= 0n || totalUnitsInOrder <= 0n) {
      return Left(invalidParameters('Reward pool and total units must both be positive'));
    }
    if (this.recordedOrders.has(orderId)) {
      return Left(stateConflict(`Rewards for order ${orderId} are already recorded`));
    }

    const balance = await this.effects.rewards.balanceOf(this.account);
    if (balance < totalRewardPool) {
      return Left(insufficientFunds(
        `Distributor holds ${balance} but order ${orderId} needs a pool of ${totalRewardPool}`
      ));
    }

    const shares = computeRewardShares(totalRewardPool, totalUnitsInOrder, contributions);
    this.records = shares.reduce(
      (records, share) => withEntry(records, rewardKey(orderId, share.retailer), {
        orderId,
        retailer: share.retailer,
        amount: share.amount,
        claimed: false,
      }),
      this.records
    );
    this.recordedOrders = withMember(this.recordedOrders, orderId);
    return Right(shares);
  }

  /**
   * Pay the caller their recorded share. The claimed flag is set before the
   * transfer goes out and put back only if the transfer fails.
   */
  async claim(caller: ParticipantId, orderId: OrderId): Promise<Either<LedgerError, bigint>> {
    return this.guard.run<bigint>('claimReward', async () => {
      const key = rewardKey(orderId, caller);
      const record = this.records.get(key);
      if (!record || record.amount === 0n) {
        return Left(stateConflict(`${caller} has no reward on order ${orderId}`));
      }
      if (record.claimed) {
        return Left(stateConflict(`${caller} already claimed the reward on order ${orderId}`));
      }

      this.records = withEntry(this.records, key, {...record, claimed: true});
      let paid: boolean;
      try {
        paid = await this.effects.rewards.transfer(caller, record.amount);
      } catch (error) {
        this.records = withEntry(this.records, key, record);
        throw EffectsError.fromThrown(error);
      }
      if (!paid) {
        this.records = withEntry(this.records, key, record);
        return Left(insufficientFunds(`Distributor could not pay ${record.amount} to ${caller}`));
      }

      await publishCommitted(this.effects.events, [{
        type: 'RewardClaimed',
        orderId,
        retailer: caller,
        amount: record.amount,
      }]);
      return Right(record.amount);
    });
  }

  getReward(orderId: OrderId, retailer: ParticipantId): Maybe<RewardRecord> {
    return Maybe.fromNullable(this.records.get(rewardKey(orderId, retailer)));
  }

  getRewards(orderId: OrderId): readonly RewardRecord[] {
    return [...this.records.values()].filter(record => record.orderId === orderId);
  }

  hasRecorded(orderId: OrderId): boolean {
    return this.recordedOrders.has(orderId);
  }
}
