import {KinesisClient, PutRecordsCommand, PutRecordsCommandOutput} from '@aws-sdk/client-kinesis';
import {EventPublisher} from '../pure/effects';
import {describeEvent, toEventRecord} from '../pure/events';
import {LedgerEvent} from '../types';
import {EventStreamConfig} from './types';

// ============================================================================
// Console Event Publisher
// ============================================================================

export class ConsoleEventPublisher implements EventPublisher {
  async publish(events: readonly LedgerEvent[]): Promise<void> {
    for (const event of events) {
      console.log(`📣 ${describeEvent(event)}`);
    }
  }
}

// ============================================================================
// Kinesis Event Publisher
// ============================================================================

export type KinesisSender = {
  send(command: PutRecordsCommand): Promise<PutRecordsCommandOutput>;
};

export function createKinesisClient(config: EventStreamConfig): KinesisClient {
  return new KinesisClient({
    region: config.region,
    endpoint: config.endpoint,
    credentials: {
      accessKeyId: config.accessKeyId,
      secretAccessKey: config.secretAccessKey,
    },
  });
}

/**
 * Streams ledger events to indexers. Records are keyed by order id so
 * each order's events stay in sequence within a shard.
 */
export class KinesisEventPublisher implements EventPublisher {
  constructor(
    private readonly streamName: string,
    private readonly kinesis: KinesisSender
  ) {}

  static fromConfig(config: EventStreamConfig): KinesisEventPublisher {
    return new KinesisEventPublisher(config.streamName, createKinesisClient(config));
  }

  async publish(events: readonly LedgerEvent[]): Promise<void> {
    if (events.length === 0) {
      return;
    }

    const command = new PutRecordsCommand({
      StreamName: this.streamName,
      Records: events.map(event => {
        const record = toEventRecord(event);
        return {
          PartitionKey: String(record.orderId),
          Data: Buffer.from(JSON.stringify(record)),
        };
      }),
    });

    let output: PutRecordsCommandOutput;
    try {
      output = await this.kinesis.send(command);
    } catch (error) {
      console.error('Failed to stream ledger events:', error);
      throw new Error('Event stream unavailable');
    }

    const failed = output.FailedRecordCount ?? 0;
    if (failed > 0) {
      throw new Error(`Event stream rejected ${failed} of ${events.length} ledger event(s)`);
    }
    console.log(`Streamed ${events.length} ledger event(s) to ${this.streamName}`);
  }
}
