/**
 * EFFECTS LAYER
 *
 * The ledger never talks to a token system, an event stream or the wall
 * clock directly. It is handed these narrow interfaces instead, so tests can
 * pass in-memory value ledgers and jest.fn() publishers.
 */

import {Either} from 'purify-ts';
import {
  Contribution,
  FulfillmentResult,
  LedgerError,
  Order,
  OrderId,
  ParticipantId,
  RewardShare,
} from '../domain';
import {LedgerEvent} from '../types';

// ============================================================================
// Effect Interfaces
// ============================================================================

/**
 * A handle on an external fungible-value system, acting on behalf of
 * `holder`. Transfers resolve to false when the source cannot cover them.
 */
export interface ValueTransferPort {
  readonly holder: ParticipantId;
  transferFrom(from: ParticipantId, to: ParticipantId, amount: bigint): Promise<boolean>;
  transfer(to: ParticipantId, amount: bigint): Promise<boolean>;
  balanceOf(id: ParticipantId): Promise<bigint>;
}

export interface EventPublisher {
  publish(events: readonly LedgerEvent[]): Promise<void>;
}

export interface Clock {
  /** Unix time in seconds. */
  now(): number;
}

// ============================================================================
// Downstream Services
//
// Wired into the ledger by an administrator after construction. Fulfilment
// refuses to run until both are present.
// ============================================================================

export interface SettlementService {
  computeSettlement(
    order: Order,
    contributions: readonly Contribution[],
    platformFeeBps: number
  ): FulfillmentResult;
}

// recordRewards publishes nothing; the recorder announces the shares it returns
export interface RewardService {
  readonly account: ParticipantId;
  recordRewards(
    caller: ParticipantId,
    orderId: OrderId,
    totalRewardPool: bigint,
    totalUnitsInOrder: bigint,
    contributions: readonly Contribution[]
  ): Promise<Either<LedgerError, readonly RewardShare[]>>;
}

// ============================================================================
// Combined Dependencies
// ============================================================================

export type LedgerEffects = {
  readonly payments: ValueTransferPort;
  readonly rewards: ValueTransferPort;
  readonly events: EventPublisher;
  readonly clock: Clock;
};

export type DistributorEffects = {
  readonly rewards: ValueTransferPort;
  readonly events: EventPublisher;
};
