// Non domain types

import {OrderId, ParticipantId} from './domain';

export type LedgerEvent =
  | {
      readonly type: 'OrderCreated';
      readonly orderId: OrderId;
      readonly manufacturer: ParticipantId;
      readonly productId: string;
      readonly minUnits: bigint;
      readonly initialPrice: bigint;
      readonly deadline: number;
      readonly stakeAmount: bigint;
    }
  | {
      readonly type: 'RetailerJoined';
      readonly orderId: OrderId;
      readonly retailer: ParticipantId;
      readonly units: bigint;
      readonly amountPaid: bigint;
    }
  | {
      readonly type: 'PriceUpdated';
      readonly orderId: OrderId;
      readonly previousPrice: bigint;
      readonly newPrice: bigint;
    }
  | {
      readonly type: 'OrderReadyForProcessing';
      readonly orderId: OrderId;
      readonly totalUnitsCommitted: bigint;
    }
  | {
      readonly type: 'OrderProcessed';
      readonly orderId: OrderId;
      readonly finalPricePerUnit: bigint;
      readonly netPaymentToManufacturer: bigint;
      readonly platformFeeCollected: bigint;
      readonly totalRefunded: bigint;
      readonly rewardPool: bigint;
    }
  | {
      readonly type: 'StakeReturned';
      readonly orderId: OrderId;
      readonly manufacturer: ParticipantId;
      readonly amount: bigint;
    }
  | {
      readonly type: 'OrderCancelled';
      readonly orderId: OrderId;
      readonly totalRefunded: bigint;
    }
  | {
      readonly type: 'RewardsRecorded';
      readonly orderId: OrderId;
      readonly retailer: ParticipantId;
      readonly amount: bigint;
    }
  | {
      readonly type: 'RewardClaimed';
      readonly orderId: OrderId;
      readonly retailer: ParticipantId;
      readonly amount: bigint;
    };

export type LedgerEventType = LedgerEvent['type'];

// JSON-safe form of a LedgerEvent, amounts rendered as decimal strings
export type EventRecord = {
  readonly type: LedgerEventType;
  readonly orderId: OrderId;
  readonly payload: Readonly<Record<string, string | number>>;
};
