// Module product types

import {DiscountTier, ParticipantId} from '../domain';

export type CreateOrderParams = {
  readonly productId: string;
  readonly minUnits: bigint;
  readonly initialPrice: bigint;
  readonly discountTiers: readonly DiscountTier[];
  readonly deadline: number;
  readonly stakeAmount?: bigint;
};

export type OrderDraft = {
  readonly manufacturer: ParticipantId;
  readonly productId: string;
  readonly minUnits: bigint;
  readonly initialPrice: bigint;
  readonly discountTiers: readonly DiscountTier[];
  readonly deadline: number;
  readonly stakeAmount: bigint;
  readonly createdAt: number;
};

export type PriceQuote = {
  readonly discountBps: number;
  readonly pricePerUnit: bigint;
};
