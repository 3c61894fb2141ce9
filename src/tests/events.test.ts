/**
 * TESTS FOR LEDGER EVENT PUBLISHING
 */

import {PutRecordsCommand, PutRecordsCommandOutput} from '@aws-sdk/client-kinesis';
import {LedgerEvent} from '../types';
import {describeEvent, toEventRecord} from '../pure/events';
import {ConsoleEventPublisher, KinesisEventPublisher} from '../effects/eventPublishers';

const joined: LedgerEvent = {type: 'RetailerJoined', orderId: 1, retailer: 'r1', units: 60n, amountPaid: 600n};
const cancelled: LedgerEvent = {type: 'OrderCancelled', orderId: 3, totalRefunded: 0n};

describe('toEventRecord', () => {
  it('turns amounts into decimal strings', () => {
    expect(toEventRecord(joined)).toEqual({
      type: 'RetailerJoined',
      orderId: 1,
      payload: {retailer: 'r1', units: '60', amountPaid: '600'},
    });
  });

  it('keeps numbers as numbers', () => {
    const created: LedgerEvent = {
      type: 'OrderCreated',
      orderId: 2,
      manufacturer: 'maker',
      productId: 'widget',
      minUnits: 100n,
      initialPrice: 10n,
      deadline: 1_700_003_600,
      stakeAmount: 0n,
    };

    expect(toEventRecord(created).payload.deadline).toBe(1_700_003_600);
  });
});

describe('describeEvent', () => {
  it('lists the payload after the type and order', () => {
    expect(describeEvent(joined)).toBe('RetailerJoined order=1 retailer=r1 units=60 amountPaid=600');
  });
});

describe('ConsoleEventPublisher', () => {
  it('logs one line per event', async () => {
    const logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);

    await new ConsoleEventPublisher().publish([joined, cancelled]);

    expect(logSpy.mock.calls).toEqual([
      ['📣 RetailerJoined order=1 retailer=r1 units=60 amountPaid=600'],
      ['📣 OrderCancelled order=3 totalRefunded=0'],
    ]);
    logSpy.mockRestore();
  });
});

describe('KinesisEventPublisher', () => {
  const accepted: PutRecordsCommandOutput = {$metadata: {}, FailedRecordCount: 0, Records: []};

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('puts every event on the stream keyed by order id', async () => {
    const send = jest.fn<Promise<PutRecordsCommandOutput>, [PutRecordsCommand]>().mockResolvedValue(accepted);
    const publisher = new KinesisEventPublisher('ledger-events', {send});

    await publisher.publish([joined, cancelled]);

    expect(send).toHaveBeenCalledTimes(1);
    const [command] = send.mock.calls[0];
    expect(command).toBeInstanceOf(PutRecordsCommand);
    expect(command.input.StreamName).toBe('ledger-events');
    const records = command.input.Records ?? [];
    expect(records.map(record => record.PartitionKey)).toEqual(['1', '3']);
    expect(JSON.parse(Buffer.from(records[0].Data ?? new Uint8Array()).toString('utf8'))).toEqual({
      type: 'RetailerJoined',
      orderId: 1,
      payload: {retailer: 'r1', units: '60', amountPaid: '600'},
    });
  });

  it('sends nothing for an empty batch', async () => {
    const send = jest.fn<Promise<PutRecordsCommandOutput>, [PutRecordsCommand]>().mockResolvedValue(accepted);

    await new KinesisEventPublisher('ledger-events', {send}).publish([]);

    expect(send).not.toHaveBeenCalled();
  });

  it('fails when the stream is unreachable', async () => {
    const send = jest.fn<Promise<PutRecordsCommandOutput>, [PutRecordsCommand]>()
      .mockRejectedValue(new Error('connect ECONNREFUSED'));

    await expect(new KinesisEventPublisher('ledger-events', {send}).publish([joined]))
      .rejects.toThrow('Event stream unavailable');
  });

  it('fails when the stream rejects records', async () => {
    const send = jest.fn<Promise<PutRecordsCommandOutput>, [PutRecordsCommand]>()
      .mockResolvedValue({...accepted, FailedRecordCount: 1});

    await expect(new KinesisEventPublisher('ledger-events', {send}).publish([joined, cancelled]))
      .rejects.toThrow('Event stream rejected 1 of 2 ledger event(s)');
  });
});
