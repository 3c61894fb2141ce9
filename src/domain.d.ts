// Domain types shared across the application

export type ParticipantId = string;

export type OrderId = number;

export type DiscountTier = {
  readonly unitsThreshold: bigint;
  readonly discountBps: number;
};

export type Order = {
  readonly id: OrderId;
  readonly manufacturer: ParticipantId;
  readonly productId: string;
  readonly minUnits: bigint;
  readonly initialPrice: bigint;
  readonly currentPrice: bigint;
  readonly totalUnitsCommitted: bigint;
  readonly totalValueCollected: bigint;
  readonly stakeAmount: bigint;
  readonly discountTiers: readonly DiscountTier[];
  readonly createdAt: number;
  readonly deadline: number;
  readonly active: boolean;
  readonly fulfilled: boolean;
};

export type OrderStatus = 'open' | 'fulfilled' | 'cancelled';

export type Contribution = {
  readonly retailer: ParticipantId;
  readonly unitsOrdered: bigint;
  readonly amountPaid: bigint;
};

export type RewardRecord = {
  readonly orderId: OrderId;
  readonly retailer: ParticipantId;
  readonly amount: bigint;
  readonly claimed: boolean;
};

export type RefundEntry = {
  readonly retailer: ParticipantId;
  readonly amount: bigint;
};

export type FulfillmentResult = {
  readonly finalPricePerUnit: bigint;
  readonly netPaymentToManufacturer: bigint;
  readonly platformFeeCollected: bigint;
  readonly refunds: readonly RefundEntry[];
  readonly totalValueForRewardCalc: bigint;
};

export type RewardShare = {
  readonly retailer: ParticipantId;
  readonly amount: bigint;
};

export type FulfillmentReceipt = FulfillmentResult & {
  readonly orderId: OrderId;
  readonly rewardPool: bigint;
  readonly rewards: readonly RewardShare[];
};

export type LedgerSettings = {
  readonly platformFeeBps: number;
  readonly rewardBps: number;
  readonly feeRecipient: ParticipantId;
  readonly rewardTreasury: ParticipantId;
  readonly administrators: readonly ParticipantId[];
};

export type LedgerErrorKind =
  | 'InvalidParameters'
  | 'Unauthorized'
  | 'StateConflict'
  | 'DeadlineViolation'
  | 'InsufficientFunds'
  | 'ServiceNotConfigured';

export type LedgerError = {
  readonly kind: LedgerErrorKind;
  readonly message: string;
};
