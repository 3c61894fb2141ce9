import {LedgerError, LedgerErrorKind} from '../domain';

const ledgerError = (kind: LedgerErrorKind) => (message: string): LedgerError => ({kind, message});

export const invalidParameters = ledgerError('InvalidParameters');
export const unauthorized = ledgerError('Unauthorized');
export const stateConflict = ledgerError('StateConflict');
export const deadlineViolation = ledgerError('DeadlineViolation');
export const insufficientFunds = ledgerError('InsufficientFunds');
export const serviceNotConfigured = ledgerError('ServiceNotConfigured');

export function formatLedgerError(error: LedgerError): string {
  return `${error.kind}: ${error.message}`;
}
