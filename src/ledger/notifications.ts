import {EventPublisher} from '../pure/effects';
import {LedgerEvent} from '../types';

/**
 * Hand the events of a committed operation to the publisher. Value has
 * already moved by now, so a publisher failure is reported and the
 * operation still stands.
 */
export async function publishCommitted(
  publisher: EventPublisher,
  events: readonly LedgerEvent[]
): Promise<void> {
  if (events.length === 0) {
    return;
  }
  try {
    await publisher.publish(events);
  } catch (error) {
    console.error(`Failed to publish ${events.length} ledger event(s):`, error);
  }
}
