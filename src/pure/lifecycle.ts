/**
 * ORDER LIFECYCLE RULES
 *
 * Preconditions and state transitions for an order, as pure functions over
 * values. The ledger decides when to call them and what to do with the
 * outcome; it never re-implements a check.
 *
 * An order is open while `active`, fulfilled once `fulfilled`, and cancelled
 * when it is neither. Both terminal states are final.
 */

import {Either, Left, Right} from 'purify-ts';
import {DiscountTier, LedgerError, Order, OrderId, OrderStatus, ParticipantId} from '../domain';
import {CreateOrderParams, OrderDraft} from './types';
import {MAX_BPS, quotePrice} from './pricing';
import {deadlineViolation, invalidParameters, stateConflict, unauthorized} from './ledgerErrors';

// ============================================================================
// Parameter Validation
// ============================================================================

export function validateBasisPoints(bps: number, label: string): Either<LedgerError, number> {
  return Number.isInteger(bps) && bps >= 0 && bps <= MAX_BPS
    ? Right(bps)
    : Left(invalidParameters(`${label} must be an integer between 0 and ${MAX_BPS}, got ${bps}`));
}

export function validateDiscountTiers(
  tiers: readonly DiscountTier[]
): Either<LedgerError, readonly DiscountTier[]> {
  return Either.sequence(
    tiers.map((tier, index): Either<LedgerError, DiscountTier> =>
      tier.unitsThreshold <= 0n
        ? Left(invalidParameters(`Discount tier ${index} must have a positive units threshold`))
        : validateBasisPoints(tier.discountBps, `Discount tier ${index} discount`).map(
            (discountBps): DiscountTier => ({unitsThreshold: tier.unitsThreshold, discountBps})
          )
    )
  );
}

export function validateOrderParams(
  manufacturer: ParticipantId,
  params: CreateOrderParams,
  now: number
): Either<LedgerError, OrderDraft> {
  const stakeAmount = params.stakeAmount ?? 0n;

  if (params.productId.trim().length === 0) {
    return Left(invalidParameters('Product id must not be empty'));
  }
  if (params.minUnits <= 0n) {
    return Left(invalidParameters('Minimum units must be positive'));
  }
  if (params.initialPrice <= 0n) {
    return Left(invalidParameters('Initial price must be positive'));
  }
  if (stakeAmount < 0n) {
    return Left(invalidParameters('Stake amount must not be negative'));
  }
  if (!Number.isInteger(params.deadline) || params.deadline <= now) {
    return Left(invalidParameters('Deadline must be a whole number of seconds in the future'));
  }

  return validateDiscountTiers(params.discountTiers).map(discountTiers => ({
    manufacturer,
    productId: params.productId,
    minUnits: params.minUnits,
    initialPrice: params.initialPrice,
    discountTiers,
    deadline: params.deadline,
    stakeAmount,
    createdAt: now,
  }));
}

// ============================================================================
// State Queries
// ============================================================================

export function orderStatus(order: Order): OrderStatus {
  if (order.fulfilled) return 'fulfilled';
  return order.active ? 'open' : 'cancelled';
}

export function isPastDeadline(order: Order, now: number): boolean {
  return now > order.deadline;
}

export function hasReachedMinimum(order: Order): boolean {
  return order.totalUnitsCommitted >= order.minUnits;
}

// ============================================================================
// Preconditions
// ============================================================================

export function requireOpen(order: Order): Either<LedgerError, Order> {
  const status = orderStatus(order);
  return status === 'open'
    ? Right(order)
    : Left(stateConflict(`Order ${order.id} is ${status}`));
}

export function checkJoin(
  order: Order,
  units: bigint,
  alreadyJoined: boolean,
  now: number
): Either<LedgerError, Order> {
  if (units <= 0n) {
    return Left(invalidParameters('Units must be positive'));
  }
  return requireOpen(order).chain((open): Either<LedgerError, Order> => {
    if (isPastDeadline(open, now)) {
      return Left(deadlineViolation(`Order ${open.id} closed for joining at ${open.deadline}`));
    }
    if (alreadyJoined) {
      return Left(stateConflict(`Retailer has already joined order ${open.id}`));
    }
    return Right(open);
  });
}

export function checkFulfillment(order: Order): Either<LedgerError, Order> {
  return requireOpen(order).chain((open): Either<LedgerError, Order> =>
    hasReachedMinimum(open)
      ? Right(open)
      : Left(stateConflict(
          `Order ${open.id} has ${open.totalUnitsCommitted} of ${open.minUnits} units committed`
        ))
  );
}

export function checkCancellation(
  order: Order,
  caller: ParticipantId,
  administrators: readonly ParticipantId[],
  now: number
): Either<LedgerError, Order> {
  if (caller !== order.manufacturer && !administrators.includes(caller)) {
    return Left(unauthorized(`Only the manufacturer or an administrator may cancel order ${order.id}`));
  }
  return requireOpen(order).chain((open): Either<LedgerError, Order> => {
    if (!isPastDeadline(open, now)) {
      return Left(deadlineViolation(`Order ${open.id} is still open for joining until ${open.deadline}`));
    }
    if (hasReachedMinimum(open)) {
      return Left(deadlineViolation(`Order ${open.id} has reached its minimum and can be fulfilled`));
    }
    return Right(open);
  });
}

// ============================================================================
// Transitions
// ============================================================================

export function createOrderRecord(id: OrderId, draft: OrderDraft): Order {
  return {
    id,
    manufacturer: draft.manufacturer,
    productId: draft.productId,
    minUnits: draft.minUnits,
    initialPrice: draft.initialPrice,
    currentPrice: draft.initialPrice,
    totalUnitsCommitted: 0n,
    totalValueCollected: 0n,
    stakeAmount: draft.stakeAmount,
    discountTiers: draft.discountTiers.map(tier => ({...tier})),
    createdAt: draft.createdAt,
    deadline: draft.deadline,
    active: true,
    fulfilled: false,
  };
}

export type JoinOutcome = {
  readonly order: Order;
  readonly amountPaid: bigint;
  readonly previousPrice: bigint;
  readonly priceChanged: boolean;
  readonly thresholdReached: boolean;
};

/**
 * Record `units` bought at the order's current price and re-quote.
 */
export function applyJoin(order: Order, units: bigint): JoinOutcome {
  const amountPaid = units * order.currentPrice;
  const totalUnitsCommitted = order.totalUnitsCommitted + units;
  const {pricePerUnit} = quotePrice(order.initialPrice, order.discountTiers, totalUnitsCommitted);
  const updated: Order = {
    ...order,
    totalUnitsCommitted,
    totalValueCollected: order.totalValueCollected + amountPaid,
    currentPrice: pricePerUnit,
  };

  return {
    order: updated,
    amountPaid,
    previousPrice: order.currentPrice,
    priceChanged: pricePerUnit !== order.currentPrice,
    thresholdReached: hasReachedMinimum(updated),
  };
}

export function markFulfilled(order: Order, finalPricePerUnit: bigint): Order {
  return {...order, active: false, fulfilled: true, currentPrice: finalPricePerUnit};
}

export function markCancelled(order: Order): Order {
  return {...order, active: false, fulfilled: false};
}
