/**
 * TESTS FOR CONFIGURATION AND PRODUCTION WIRING
 */

import {EffectsFactory, loadConfigFromEnv, makeLedgerSystem} from '../effects/EffectsFactory';
import {ConsoleEventPublisher, KinesisEventPublisher} from '../effects/eventPublishers';
import {InMemoryValueLedger} from '../effects/InMemoryValueLedger';
import {ManualClock, NOW, orderParams, rightValue} from './helpers';

beforeEach(() => {
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe('loadConfigFromEnv', () => {
  it('falls back to defaults', () => {
    expect(loadConfigFromEnv({})).toEqual({
      ledger: {
        account: 'ledger',
        administrators: ['admin'],
        platformFeeBps: 100,
        rewardBps: 50,
        feeRecipient: 'platform-treasury',
        rewardTreasury: 'reward-treasury',
        distributorAccount: 'reward-distributor',
      },
      server: {port: 3000},
      eventStream: null,
    });
  });

  it('reads overrides', () => {
    const config = loadConfigFromEnv({
      API_PORT: '8080',
      LEDGER_ADMINS: 'alice, bob',
      PLATFORM_FEE_BPS: '250',
      EVENT_STREAM_NAME: 'ledger-events',
      AWS_DEFAULT_REGION: 'eu-west-1',
      AWS_ENDPOINT_EVENTS: 'http://localhost:4567',
    });

    expect(config.server.port).toBe(8080);
    expect(config.ledger.administrators).toEqual(['alice', 'bob']);
    expect(config.ledger.platformFeeBps).toBe(250);
    expect(config.eventStream).toEqual({
      streamName: 'ledger-events',
      region: 'eu-west-1',
      accessKeyId: 'test',
      secretAccessKey: 'test',
      endpoint: 'http://localhost:4567',
    });
  });

  it('refuses a non-integer setting', () => {
    expect(() => loadConfigFromEnv({PLATFORM_FEE_BPS: 'lots'}))
      .toThrow('PLATFORM_FEE_BPS must be an integer, got "lots"');
  });
});

describe('EffectsFactory', () => {
  it('logs events to the console unless a stream is configured', () => {
    expect(EffectsFactory.make(loadConfigFromEnv({})).events).toBeInstanceOf(ConsoleEventPublisher);
    expect(EffectsFactory.make(loadConfigFromEnv({EVENT_STREAM_NAME: 'ledger-events'})).events)
      .toBeInstanceOf(KinesisEventPublisher);
  });

  it('acts for the ledger account in both value systems', () => {
    const effects = EffectsFactory.make(loadConfigFromEnv({LEDGER_ACCOUNT: 'vault'}));

    expect(effects.payments.holder).toBe('vault');
    expect(effects.rewards.holder).toBe('vault');
    expect(effects.distributorEffects().rewards.holder).toBe('reward-distributor');
  });
});

describe('makeLedgerSystem', () => {
  it('wires a ledger that can settle an order', async () => {
    const clock = new ManualClock();
    const {ledger, distributor, effects} = makeLedgerSystem(loadConfigFromEnv({}), clock);
    effects.rewardLedger.mint('maker', 50n);
    effects.rewardLedger.mint('reward-treasury', 100n);
    effects.paymentLedger.mint('r1', 1_000n);

    const orderId = rightValue(await ledger.createOrder('maker', orderParams({deadline: NOW + 60})));
    rightValue(await ledger.joinOrder('r1', orderId, 100n));
    const receipt = rightValue(await ledger.executeFulfillment('r1', orderId));

    expect(receipt.rewardPool).toBe(4n);
    expect(distributor.account).toBe('reward-distributor');
    expect(effects.paymentLedger.balanceOf('platform-treasury')).toBe(9n);
    expect(rightValue(await distributor.claim('r1', orderId))).toBe(4n);
  });

  it('refuses an out-of-range fee', () => {
    expect(() => makeLedgerSystem(loadConfigFromEnv({PLATFORM_FEE_BPS: '20000'}))).toThrow('InvalidParameters');
  });

  it('needs an administrator', () => {
    expect(() => makeLedgerSystem(loadConfigFromEnv({LEDGER_ADMINS: ' , '})))
      .toThrow('At least one ledger administrator must be configured');
  });
});

describe('InMemoryValueLedger', () => {
  it('moves value only when the source can cover it', async () => {
    const ledger = new InMemoryValueLedger('payment');
    ledger.mint('alice', 10n);
    const port = ledger.portFor('alice');

    expect(await port.transfer('bob', 4n)).toBe(true);
    expect(await port.transfer('bob', 7n)).toBe(false);
    expect(await port.transferFrom('bob', 'carol', 0n)).toBe(true);
    expect(await port.transferFrom('bob', 'carol', -1n)).toBe(false);
    expect(await port.balanceOf('alice')).toBe(6n);
    expect(ledger.balanceOf('bob')).toBe(4n);
    expect(ledger.totalSupply()).toBe(10n);
  });

  it('only mints positive amounts', () => {
    expect(() => new InMemoryValueLedger('reward').mint('alice', 0n))
      .toThrow('Cannot mint a non-positive amount of reward: 0');
  });
});
