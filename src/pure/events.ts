import {EventRecord, LedgerEvent} from '../types';

/**
 * Flatten an event into a JSON-safe record: bigint amounts become decimal
 * strings, everything else is copied as is.
 */
export function toEventRecord(event: LedgerEvent): EventRecord {
  const {type, orderId, ...rest} = event;
  const entries: [string, unknown][] = Object.entries(rest);
  const payload: Record<string, string | number> = {};
  for (const [key, value] of entries) {
    payload[key] = typeof value === 'number' || typeof value === 'string' ? value : String(value);
  }
  return {type, orderId, payload};
}

export function describeEvent(event: LedgerEvent): string {
  const {type, orderId, payload} = toEventRecord(event);
  const details = Object.entries(payload)
    .map(([key, value]) => `${key}=${value}`)
    .join(' ');
  return details.length > 0 ? `${type} order=${orderId} ${details}` : `${type} order=${orderId}`;
}
