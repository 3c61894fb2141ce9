/**
 * PRODUCTION EFFECTS
 *
 * Wires the ledger to its collaborators:
 * - In-memory value ledgers for the payment and reward assets
 * - Kinesis for ledger events when a stream is configured, the console otherwise
 * - The system clock
 */
import {Clock, DistributorEffects, EventPublisher, LedgerEffects, ValueTransferPort} from '../pure/effects';
import {OrderLedger} from '../ledger/OrderLedger';
import {RewardDistributor} from '../ledger/RewardDistributor';
import {ReentrancyGuard} from '../ledger/ReentrancyGuard';
import {settlementCalculator} from '../pure/settlement';
import {formatLedgerError} from '../pure/ledgerErrors';
import {InMemoryValueLedger} from './InMemoryValueLedger';
import {ConsoleEventPublisher, KinesisEventPublisher} from './eventPublishers';
import {EventStreamConfig, ProductionConfig} from './types';

// ============================================================================
// Configuration
// ============================================================================

type Env = Readonly<Record<string, string | undefined>>;

function readInteger(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new Error(`${name} must be an integer, got "${raw}"`);
  }
  return value;
}

function readList(env: Env, name: string, fallback: string): string[] {
  return (env[name] || fallback)
    .split(',')
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0);
}

function readEventStream(env: Env): EventStreamConfig | null {
  const streamName = env.EVENT_STREAM_NAME;
  if (!streamName) {
    return null;
  }
  return {
    streamName,
    region: env.AWS_DEFAULT_REGION || 'us-east-1',
    accessKeyId: env.AWS_ACCESS_KEY_ID || 'test',
    secretAccessKey: env.AWS_SECRET_ACCESS_KEY || 'test',
    endpoint: env.AWS_ENDPOINT_EVENTS || undefined,
  };
}

export function loadConfigFromEnv(env: Env = process.env): ProductionConfig {
  return {
    ledger: {
      account: env.LEDGER_ACCOUNT || 'ledger',
      administrators: readList(env, 'LEDGER_ADMINS', 'admin'),
      platformFeeBps: readInteger(env, 'PLATFORM_FEE_BPS', 100),
      rewardBps: readInteger(env, 'REWARD_BPS', 50),
      feeRecipient: env.FEE_RECIPIENT || 'platform-treasury',
      rewardTreasury: env.REWARD_TREASURY || 'reward-treasury',
      distributorAccount: env.REWARD_DISTRIBUTOR_ACCOUNT || 'reward-distributor',
    },
    server: {
      port: readInteger(env, 'API_PORT', 3000),
    },
    eventStream: readEventStream(env),
  };
}

export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000),
};

// ============================================================================
// Effects Factory
// ============================================================================

export class EffectsFactory implements LedgerEffects {
  readonly paymentLedger = new InMemoryValueLedger('payment');
  readonly rewardLedger = new InMemoryValueLedger('reward');
  private _payments?: ValueTransferPort;
  private _rewards?: ValueTransferPort;
  private _events?: EventPublisher;

  constructor(
    readonly config: ProductionConfig,
    readonly clock: Clock = systemClock
  ) {}

  get payments(): ValueTransferPort {
    if (!this._payments) {
      this._payments = this.paymentLedger.portFor(this.config.ledger.account);
    }
    return this._payments;
  }

  get rewards(): ValueTransferPort {
    if (!this._rewards) {
      this._rewards = this.rewardLedger.portFor(this.config.ledger.account);
    }
    return this._rewards;
  }

  get events(): EventPublisher {
    if (!this._events) {
      const stream = this.config.eventStream;
      this._events = stream ? KinesisEventPublisher.fromConfig(stream) : new ConsoleEventPublisher();
    }
    return this._events;
  }

  distributorEffects(): DistributorEffects {
    return {
      rewards: this.rewardLedger.portFor(this.config.ledger.distributorAccount),
      events: this.events,
    };
  }

  static make(config?: ProductionConfig, clock?: Clock): EffectsFactory {
    return new EffectsFactory(config || loadConfigFromEnv(), clock);
  }
}

// ============================================================================
// Ledger System
// ============================================================================

export type LedgerSystem = {
  readonly config: ProductionConfig;
  readonly effects: EffectsFactory;
  readonly ledger: OrderLedger;
  readonly distributor: RewardDistributor;
};

/**
 * Build a ledger and its reward distributor over one set of effects, sharing
 * a reentrancy guard, with the settlement and reward services wired in.
 */
export function makeLedgerSystem(config?: ProductionConfig, clock?: Clock): LedgerSystem {
  const effects = EffectsFactory.make(config, clock);
  const cfg = effects.config;
  const guard = new ReentrancyGuard();

  const ledger = new OrderLedger(effects, {
    administrators: cfg.ledger.administrators,
    feeRecipient: cfg.ledger.feeRecipient,
    rewardTreasury: cfg.ledger.rewardTreasury,
    platformFeeBps: cfg.ledger.platformFeeBps,
    rewardBps: cfg.ledger.rewardBps,
    guard,
  });
  const distributor = new RewardDistributor(effects.distributorEffects(), {
    recorder: ledger.account,
    guard,
  });

  const admin = cfg.ledger.administrators[0];
  if (admin === undefined) {
    throw new Error('At least one ledger administrator must be configured');
  }
  ledger.configureServices(admin, {settlement: settlementCalculator, rewards: distributor}).ifLeft(error => {
    throw new Error(formatLedgerError(error));
  });

  console.log(`✅ Ledger ${ledger.account} ready (events: ${cfg.eventStream ? cfg.eventStream.streamName : 'console'})`);
  return {config: cfg, effects, ledger, distributor};
}
