import {Either} from 'purify-ts';
import {DiscountTier, LedgerError, LedgerErrorKind} from '../domain';
import {LedgerEvent} from '../types';
import {Clock, EventPublisher, LedgerEffects, ValueTransferPort} from '../pure/effects';
import {CreateOrderParams} from '../pure/types';
import {formatLedgerError} from '../pure/ledgerErrors';
import {settlementCalculator} from '../pure/settlement';
import {InMemoryValueLedger} from '../effects/InMemoryValueLedger';
import {OrderLedger} from '../ledger/OrderLedger';
import {RewardDistributor} from '../ledger/RewardDistributor';
import {ReentrancyGuard} from '../ledger/ReentrancyGuard';

export const NOW = 1_700_000_000;
export const LEDGER = 'ledger';
export const DISTRIBUTOR = 'distributor';
export const ADMIN = 'admin';
export const FEE_RECIPIENT = 'platform';
export const TREASURY = 'treasury';
export const MAKER = 'maker';

export const tiers: DiscountTier[] = [
  {unitsThreshold: 50n, discountBps: 500},
  {unitsThreshold: 100n, discountBps: 1000},
];

export function orderParams(overrides: Partial<CreateOrderParams> = {}): CreateOrderParams {
  return {
    productId: 'widget',
    minUnits: 100n,
    initialPrice: 10n,
    discountTiers: tiers,
    deadline: NOW + 3_600,
    stakeAmount: 50n,
    ...overrides,
  };
}

export class ManualClock implements Clock {
  constructor(private current: number = NOW) {}

  now(): number {
    return this.current;
  }

  advance(seconds: number): void {
    this.current += seconds;
  }
}

export function leftKind<T>(result: Either<LedgerError, T>): LedgerErrorKind | null {
  return result.caseOf<LedgerErrorKind | null>({
    Left: error => error.kind,
    Right: () => null,
  });
}

export function rightValue<T>(result: Either<LedgerError, T>): T {
  return result.caseOf<T>({
    Left: error => {
      throw new Error(`Expected success, got ${formatLedgerError(error)}`);
    },
    Right: value => value,
  });
}

export function publishedEvents(publish: jest.Mock<Promise<void>, [readonly LedgerEvent[]]>): LedgerEvent[] {
  return publish.mock.calls.flatMap(([events]) => [...events]);
}

export type HarnessOptions = {
  readonly platformFeeBps?: number;
  readonly rewardBps?: number;
  readonly configureServices?: boolean;
  readonly wrapPayments?: (port: ValueTransferPort) => ValueTransferPort;
  readonly wrapRewards?: (port: ValueTransferPort) => ValueTransferPort;
};

export type Harness = {
  readonly ledger: OrderLedger;
  readonly distributor: RewardDistributor;
  readonly payments: InMemoryValueLedger;
  readonly rewards: InMemoryValueLedger;
  readonly publish: jest.Mock<Promise<void>, [readonly LedgerEvent[]]>;
  readonly clock: ManualClock;
};

/**
 * A ledger and distributor over in-memory value ledgers, sharing one guard,
 * with a jest.fn() publisher and a clock the test moves by hand.
 */
export function createHarness(options: HarnessOptions = {}): Harness {
  const payments = new InMemoryValueLedger('payment');
  const rewards = new InMemoryValueLedger('reward');
  const publish = jest.fn<Promise<void>, [readonly LedgerEvent[]]>().mockResolvedValue(undefined);
  const events: EventPublisher = {publish};
  const clock = new ManualClock();
  const guard = new ReentrancyGuard();
  const wrapPayments = options.wrapPayments ?? ((port: ValueTransferPort) => port);
  const wrapRewards = options.wrapRewards ?? ((port: ValueTransferPort) => port);

  const effects: LedgerEffects = {
    payments: wrapPayments(payments.portFor(LEDGER)),
    rewards: wrapRewards(rewards.portFor(LEDGER)),
    events,
    clock,
  };
  const ledger = new OrderLedger(effects, {
    administrators: [ADMIN],
    feeRecipient: FEE_RECIPIENT,
    rewardTreasury: TREASURY,
    platformFeeBps: options.platformFeeBps ?? 100,
    rewardBps: options.rewardBps ?? 50,
    guard,
  });
  const distributor = new RewardDistributor({rewards: rewards.portFor(DISTRIBUTOR), events}, {
    recorder: LEDGER,
    guard,
  });
  if (options.configureServices !== false) {
    rightValue(ledger.configureServices(ADMIN, {settlement: settlementCalculator, rewards: distributor}));
  }

  return {ledger, distributor, payments, rewards, publish, clock};
}
