/**
 * ORDER LEDGER - The Coordinator
 *
 * Owns every order and contribution and drives the order lifecycle:
 * 1. Checks preconditions with the pure lifecycle rules
 * 2. Commits the state transition
 * 3. Moves value through the injected ports
 * 4. Publishes the operation's events once it has committed
 *
 * Every state-mutating entry point runs under the reentrancy guard and is
 * all-or-nothing. Settlement and cancellation check that every balance they
 * draw on can cover its transfers before anything moves. If a step still
 * fails, the transfers already made are sent back in reverse order and the
 * previous state is restored before the call returns.
 */

import {Either, Left, Maybe, Right} from 'purify-ts';
import {
  Contribution,
  FulfillmentReceipt,
  LedgerError,
  LedgerSettings,
  Order,
  OrderId,
  OrderStatus,
  ParticipantId,
  RefundEntry,
  RewardShare,
} from '../domain';
import {LedgerEvent} from '../types';
import {LedgerEffects, RewardService, SettlementService, ValueTransferPort} from '../pure/effects';
import {CreateOrderParams} from '../pure/types';
import {
  applyJoin,
  checkCancellation,
  checkFulfillment,
  checkJoin,
  createOrderRecord,
  markCancelled,
  markFulfilled,
  orderStatus,
  validateBasisPoints,
  validateOrderParams,
} from '../pure/lifecycle';
import {computeCancellationRefunds, computeRewardPool, totalRefunded} from '../pure/settlement';
import {
  formatLedgerError,
  insufficientFunds,
  invalidParameters,
  serviceNotConfigured,
  unauthorized,
} from '../pure/ledgerErrors';
import {EffectsError} from '../effects/EffectsError';
import {ReentrancyGuard} from './ReentrancyGuard';
import {publishCommitted} from './notifications';
import {withEntry, withMember} from './immutable';

type LedgerResult<T> = Promise<Either<LedgerError, T>>;

type LedgerState = {
  readonly nextOrderId: OrderId;
  readonly orders: ReadonlyMap<OrderId, Order>;
  readonly contributions: ReadonlyMap<OrderId, readonly Contribution[]>;
  // one entry per (order, retailer); see contributionKey
  readonly joined: ReadonlySet<string>;
};

type Payout = {
  readonly recipient: ParticipantId;
  readonly amount: bigint;
  readonly description: string;
};

type Transfer = {
  readonly port: ValueTransferPort;
  readonly from: ParticipantId;
  readonly to: ParticipantId;
  readonly amount: bigint;
};

type Requirement = {
  readonly port: ValueTransferPort;
  readonly owner: ParticipantId;
  readonly amount: bigint;
  readonly description: string;
};

// What an operation has done so far; undone together when it fails
type UnitOfWork = {
  readonly events: LedgerEvent[];
  readonly transfers: Transfer[];
};

export type LedgerServices = {
  readonly settlement: SettlementService;
  readonly rewards: RewardService;
};

export type OrderLedgerOptions = {
  readonly administrators: readonly ParticipantId[];
  readonly feeRecipient: ParticipantId;
  readonly rewardTreasury: ParticipantId;
  readonly platformFeeBps?: number;
  readonly rewardBps?: number;
  readonly guard?: ReentrancyGuard;
};

const contributionKey = (orderId: OrderId, retailer: ParticipantId) => `${orderId}:${retailer}`;

function orThrow<T>(result: Either<LedgerError, T>): T {
  return result.caseOf({
    Left: error => {
      throw new Error(formatLedgerError(error));
    },
    Right: value => value,
  });
}

export class OrderLedger {
  private state: LedgerState = {
    nextOrderId: 1,
    orders: new Map(),
    contributions: new Map(),
    joined: new Set(),
  };
  private platformFeeBps: number;
  private rewardBps: number;
  private services: Partial<LedgerServices> = {};
  private readonly guard: ReentrancyGuard;

  constructor(
    private readonly effects: LedgerEffects,
    private readonly options: OrderLedgerOptions
  ) {
    this.platformFeeBps = orThrow(validateBasisPoints(options.platformFeeBps ?? 0, 'Platform fee'));
    this.rewardBps = orThrow(validateBasisPoints(options.rewardBps ?? 0, 'Reward rate'));
    this.guard = options.guard ?? new ReentrancyGuard();
  }

  /** The ledger's own account in the payment-value system. */
  get account(): ParticipantId {
    return this.effects.payments.holder;
  }

  // ==========================================================================
  // Administration
  // ==========================================================================

  isAdministrator(id: ParticipantId): boolean {
    return this.options.administrators.includes(id);
  }

  configureServices(caller: ParticipantId, services: Partial<LedgerServices>): Either<LedgerError, void> {
    return this.requireAdministrator(caller).map(() => {
      this.services = {...this.services, ...services};
    });
  }

  // Applies to every settlement from now on, including orders already open
  setPlatformFee(caller: ParticipantId, bps: number): Either<LedgerError, number> {
    return this.requireAdministrator(caller)
      .chain(() => validateBasisPoints(bps, 'Platform fee'))
      .map(valid => (this.platformFeeBps = valid));
  }

  setRewardRate(caller: ParticipantId, bps: number): Either<LedgerError, number> {
    return this.requireAdministrator(caller)
      .chain(() => validateBasisPoints(bps, 'Reward rate'))
      .map(valid => (this.rewardBps = valid));
  }

  getSettings(): LedgerSettings {
    return {
      platformFeeBps: this.platformFeeBps,
      rewardBps: this.rewardBps,
      feeRecipient: this.options.feeRecipient,
      rewardTreasury: this.options.rewardTreasury,
      administrators: this.options.administrators,
    };
  }

  // ==========================================================================
  // Operations
  // ==========================================================================

  async createOrder(caller: ParticipantId, params: CreateOrderParams): LedgerResult<OrderId> {
    return this.execute('createOrder', work =>
      validateOrderParams(caller, params, this.effects.clock.now()).caseOf<LedgerResult<OrderId>>({
        Left: error => Promise.resolve(Left(error)),
        Right: async draft => {
          const order = createOrderRecord(this.state.nextOrderId, draft);
          this.state = {
            ...this.state,
            nextOrderId: order.id + 1,
            orders: withEntry(this.state.orders, order.id, order),
            contributions: withEntry(this.state.contributions, order.id, []),
          };

          const failure = await this.collect(
            work, this.effects.rewards, caller, order.stakeAmount, `Stake for order ${order.id}`
          );
          if (failure) return Left(failure);

          work.events.push({
            type: 'OrderCreated',
            orderId: order.id,
            manufacturer: order.manufacturer,
            productId: order.productId,
            minUnits: order.minUnits,
            initialPrice: order.initialPrice,
            deadline: order.deadline,
            stakeAmount: order.stakeAmount,
          });
          return Right(order.id);
        },
      })
    );
  }

  async joinOrder(caller: ParticipantId, orderId: OrderId, units: bigint): LedgerResult<Contribution> {
    return this.execute('joinOrder', work =>
      this.findOrder(orderId)
        .chain(order => checkJoin(
          order, units, this.state.joined.has(contributionKey(order.id, caller)), this.effects.clock.now()
        ))
        .caseOf<LedgerResult<Contribution>>({
          Left: error => Promise.resolve(Left(error)),
          Right: async order => {
            const outcome = applyJoin(order, units);
            const contribution: Contribution = {
              retailer: caller,
              unitsOrdered: units,
              amountPaid: outcome.amountPaid,
            };
            this.state = {
              ...this.state,
              orders: withEntry(this.state.orders, order.id, outcome.order),
              contributions: withEntry(
                this.state.contributions, order.id, [...this.getContributions(order.id), contribution]
              ),
              joined: withMember(this.state.joined, contributionKey(order.id, caller)),
            };

            const failure = await this.collect(
              work, this.effects.payments, caller, outcome.amountPaid, `Payment for order ${order.id}`
            );
            if (failure) return Left(failure);

            work.events.push({
              type: 'RetailerJoined',
              orderId: order.id,
              retailer: caller,
              units,
              amountPaid: outcome.amountPaid,
            });
            if (outcome.priceChanged) {
              work.events.push({
                type: 'PriceUpdated',
                orderId: order.id,
                previousPrice: outcome.previousPrice,
                newPrice: outcome.order.currentPrice,
              });
            }
            if (outcome.thresholdReached) {
              work.events.push({
                type: 'OrderReadyForProcessing',
                orderId: order.id,
                totalUnitsCommitted: outcome.order.totalUnitsCommitted,
              });
            }
            return Right(contribution);
          },
        })
    );
  }

  /**
   * Settle an order that has reached its minimum. Effects run in a fixed
   * order: refunds, manufacturer payment, platform fee, stake return, reward
   * pool funding and recording. Rewards are announced after the stake return.
   */
  async executeFulfillment(_caller: ParticipantId, orderId: OrderId): LedgerResult<FulfillmentReceipt> {
    return this.execute('executeFulfillment', work =>
      this.findOrder(orderId)
        .chain(checkFulfillment)
        .chain(order => this.requireServices().map(services => ({order, services})))
        .caseOf<LedgerResult<FulfillmentReceipt>>({
          Left: error => Promise.resolve(Left(error)),
          Right: async ({order, services}) => {
            const contributions = this.getContributions(order.id);
            const result = services.settlement.computeSettlement(order, contributions, this.platformFeeBps);
            const rewardPool = computeRewardPool(result.totalValueForRewardCalc, this.rewardBps);
            const shortfall = await this.findShortfall([
              {
                port: this.effects.payments,
                owner: this.effects.payments.holder,
                amount: totalRefunded(result.refunds) + result.netPaymentToManufacturer + result.platformFeeCollected,
                description: `Settlement of order ${order.id}`,
              },
              {
                port: this.effects.rewards,
                owner: this.effects.rewards.holder,
                amount: order.stakeAmount,
                description: `Stake return for order ${order.id}`,
              },
              {
                port: this.effects.rewards,
                owner: this.options.rewardTreasury,
                amount: rewardPool,
                description: `Reward pool for order ${order.id}`,
              },
            ]);
            if (shortfall) return Left(shortfall);

            this.state = {
              ...this.state,
              orders: withEntry(this.state.orders, order.id, markFulfilled(order, result.finalPricePerUnit)),
            };

            const payoutFailure = await this.payAll(work, this.effects.payments, [
              ...result.refunds.map(refund => ({
                recipient: refund.retailer,
                amount: refund.amount,
                description: `Refund to ${refund.retailer} for order ${order.id}`,
              })),
              {
                recipient: order.manufacturer,
                amount: result.netPaymentToManufacturer,
                description: `Payment to manufacturer for order ${order.id}`,
              },
              {
                recipient: this.options.feeRecipient,
                amount: result.platformFeeCollected,
                description: `Platform fee for order ${order.id}`,
              },
            ]);
            if (payoutFailure) return Left(payoutFailure);

            const stakeFailure = await this.returnStake(work, order);
            if (stakeFailure) return Left(stakeFailure);

            const recorded: Either<LedgerError, readonly RewardShare[]> = rewardPool > 0n
              ? await this.fundRewards(work, services.rewards, order, rewardPool, contributions)
              : Right([]);

            return recorded.map((rewards): FulfillmentReceipt => {
              work.events.push(...rewards.map((share): LedgerEvent => ({
                type: 'RewardsRecorded',
                orderId: order.id,
                retailer: share.retailer,
                amount: share.amount,
              })));
              work.events.push({
                type: 'OrderProcessed',
                orderId: order.id,
                finalPricePerUnit: result.finalPricePerUnit,
                netPaymentToManufacturer: result.netPaymentToManufacturer,
                platformFeeCollected: result.platformFeeCollected,
                totalRefunded: totalRefunded(result.refunds),
                rewardPool,
              });
              return {...result, orderId: order.id, rewardPool, rewards};
            });
          },
        })
    );
  }

  /**
   * Unwind an order that missed its minimum by the deadline: every
   * contribution is refunded in full and the stake goes back.
   */
  async cancelOrder(caller: ParticipantId, orderId: OrderId): LedgerResult<readonly RefundEntry[]> {
    return this.execute('cancelOrder', work =>
      this.findOrder(orderId)
        .chain(order => checkCancellation(
          order, caller, this.options.administrators, this.effects.clock.now()
        ))
        .caseOf<LedgerResult<readonly RefundEntry[]>>({
          Left: error => Promise.resolve(Left(error)),
          Right: async order => {
            const refunds = computeCancellationRefunds(this.getContributions(order.id));
            const shortfall = await this.findShortfall([
              {
                port: this.effects.payments,
                owner: this.effects.payments.holder,
                amount: totalRefunded(refunds),
                description: `Refunds for cancelled order ${order.id}`,
              },
              {
                port: this.effects.rewards,
                owner: this.effects.rewards.holder,
                amount: order.stakeAmount,
                description: `Stake return for order ${order.id}`,
              },
            ]);
            if (shortfall) return Left(shortfall);

            this.state = {
              ...this.state,
              orders: withEntry(this.state.orders, order.id, markCancelled(order)),
            };

            const refundFailure = await this.payAll(work, this.effects.payments, refunds.map(refund => ({
              recipient: refund.retailer,
              amount: refund.amount,
              description: `Refund to ${refund.retailer} for cancelled order ${order.id}`,
            })));
            if (refundFailure) return Left(refundFailure);

            const stakeFailure = await this.returnStake(work, order);
            if (stakeFailure) return Left(stakeFailure);

            work.events.push({type: 'OrderCancelled', orderId: order.id, totalRefunded: totalRefunded(refunds)});
            return Right(refunds);
          },
        })
    );
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  getOrder(orderId: OrderId): Maybe<Order> {
    return Maybe.fromNullable(this.state.orders.get(orderId));
  }

  getOrderStatus(orderId: OrderId): Maybe<OrderStatus> {
    return this.getOrder(orderId).map(orderStatus);
  }

  getContributions(orderId: OrderId): readonly Contribution[] {
    return this.state.contributions.get(orderId) ?? [];
  }

  getContribution(orderId: OrderId, retailer: ParticipantId): Maybe<Contribution> {
    return Maybe.fromNullable(this.getContributions(orderId).find(c => c.retailer === retailer));
  }

  listOrders(): readonly Order[] {
    return [...this.state.orders.values()];
  }

  // ==========================================================================
  // Plumbing
  // ==========================================================================

  private async execute<T>(
    operation: string,
    perform: (work: UnitOfWork) => LedgerResult<T>
  ): LedgerResult<T> {
    return this.guard.run(operation, async () => {
      const snapshot = this.state;
      const work: UnitOfWork = {events: [], transfers: []};
      let result: Either<LedgerError, T>;
      try {
        result = await perform(work);
      } catch (error) {
        this.state = snapshot;
        const unreturned = await this.sendBack(work.transfers);
        throw EffectsError.fromThrown(error, ...unreturned);
      }
      if (result.isLeft()) {
        this.state = snapshot;
        const unreturned = await this.sendBack(work.transfers);
        if (unreturned.length > 0) {
          throw new EffectsError([new Error(`${operation} failed and could not be undone`), ...unreturned]);
        }
        return result;
      }
      await publishCommitted(this.effects.events, work.events);
      return result;
    });
  }

  /** Reverse completed transfers, newest first. Returns what could not be reversed. */
  private async sendBack(transfers: readonly Transfer[]): Promise<Error[]> {
    const unreturned: Error[] = [];
    for (const {port, from, to, amount} of [...transfers].reverse()) {
      try {
        if (!(await port.transferFrom(to, from, amount))) {
          unreturned.push(new Error(`Could not return ${amount} from ${to} to ${from}`));
        }
      } catch (error) {
        unreturned.push(error instanceof Error ? error : new Error(String(error)));
      }
    }
    return unreturned;
  }

  private async findShortfall(requirements: readonly Requirement[]): Promise<LedgerError | null> {
    // one check per balance, summing what the operation draws from it
    const needed = requirements.reduce<Requirement[]>((merged, requirement) => {
      if (requirement.amount === 0n) return merged;
      const same = merged.findIndex(r => r.port === requirement.port && r.owner === requirement.owner);
      if (same < 0) return [...merged, requirement];
      return merged.map((r, index) => index === same ? {...r, amount: r.amount + requirement.amount} : r);
    }, []);
    for (const {port, owner, amount, description} of needed) {
      const balance = await port.balanceOf(owner);
      if (balance < amount) {
        return insufficientFunds(`${description}: ${owner} holds ${balance} but ${amount} is needed`);
      }
    }
    return null;
  }

  private findOrder(orderId: OrderId): Either<LedgerError, Order> {
    return this.getOrder(orderId).toEither(invalidParameters(`Order ${orderId} does not exist`));
  }

  private requireAdministrator(caller: ParticipantId): Either<LedgerError, ParticipantId> {
    return this.isAdministrator(caller)
      ? Right(caller)
      : Left(unauthorized(`${caller} is not an administrator`));
  }

  private requireServices(): Either<LedgerError, LedgerServices> {
    const {settlement, rewards} = this.services;
    return settlement && rewards
      ? Right({settlement, rewards})
      : Left(serviceNotConfigured('Settlement and reward services must be configured before fulfilment'));
  }

  private async collect(
    work: UnitOfWork,
    port: ValueTransferPort,
    from: ParticipantId,
    amount: bigint,
    description: string
  ): Promise<LedgerError | null> {
    if (amount === 0n) return null;
    if (!(await port.transferFrom(from, port.holder, amount))) {
      return insufficientFunds(`${description}: ${from} could not cover ${amount}`);
    }
    work.transfers.push({port, from, to: port.holder, amount});
    return null;
  }

  private async payAll(
    work: UnitOfWork,
    port: ValueTransferPort,
    payouts: readonly Payout[]
  ): Promise<LedgerError | null> {
    for (const payout of payouts) {
      if (payout.amount === 0n) continue;
      if (!(await port.transfer(payout.recipient, payout.amount))) {
        return insufficientFunds(`${payout.description}: ${port.holder} could not cover ${payout.amount}`);
      }
      work.transfers.push({port, from: port.holder, to: payout.recipient, amount: payout.amount});
    }
    return null;
  }

  private async fundRewards(
    work: UnitOfWork,
    distributor: RewardService,
    order: Order,
    rewardPool: bigint,
    contributions: readonly Contribution[]
  ): LedgerResult<readonly RewardShare[]> {
    const port = this.effects.rewards;
    const treasury = this.options.rewardTreasury;
    if (!(await port.transferFrom(treasury, distributor.account, rewardPool))) {
      return Left(insufficientFunds(`Reward treasury ${treasury} could not fund ${rewardPool} for order ${order.id}`));
    }
    work.transfers.push({port, from: treasury, to: distributor.account, amount: rewardPool});
    return distributor.recordRewards(
      this.account, order.id, rewardPool, order.totalUnitsCommitted, contributions
    );
  }

  private async returnStake(work: UnitOfWork, order: Order): Promise<LedgerError | null> {
    if (order.stakeAmount === 0n) return null;
    const failure = await this.payAll(work, this.effects.rewards, [{
      recipient: order.manufacturer,
      amount: order.stakeAmount,
      description: `Stake return for order ${order.id}`,
    }]);
    if (failure) return failure;
    work.events.push({
      type: 'StakeReturned',
      orderId: order.id,
      manufacturer: order.manufacturer,
      amount: order.stakeAmount,
    });
    return null;
  }
}
