import {Request, Response} from 'express';
import {Either} from 'purify-ts';
import {z} from 'zod';
import {LedgerError, LedgerErrorKind, Order, ParticipantId} from '../domain';
import {orderStatus} from '../pure/lifecycle';
import {describeIssues} from './schemas';

const statusByKind: Record<LedgerErrorKind, number> = {
  InvalidParameters: 400,
  Unauthorized: 403,
  StateConflict: 409,
  DeadlineViolation: 422,
  InsufficientFunds: 402,
  ServiceNotConfigured: 503,
};

export const PARTICIPANT_HEADER = 'x-participant-id';

export function sendLedgerError(res: Response, error: LedgerError): void {
  res.status(statusByKind[error.kind]).json({success: false, error: error.message, code: error.kind});
}

export function sendValidationError(res: Response, error: z.ZodError): void {
  res.status(400).json({success: false, error: describeIssues(error), code: 'VALIDATION_ERROR'});
}

export function sendNotFound(res: Response, what: string): void {
  res.status(404).json({success: false, error: `${what} not found`, code: 'NOT_FOUND'});
}

export function sendResult<T>(
  res: Response,
  result: Either<LedgerError, T>,
  onSuccess: (value: T) => void
): void {
  result.caseOf({
    Left: error => sendLedgerError(res, error),
    Right: onSuccess,
  });
}

/**
 * The acting participant. Signatures are not checked; the header is trusted.
 */
export function callerOf(req: Request, res: Response): ParticipantId | null {
  const caller = req.header(PARTICIPANT_HEADER)?.trim();
  if (!caller) {
    res.status(401).json({
      success: false,
      error: `Missing ${PARTICIPANT_HEADER} header`,
      code: 'MISSING_PARTICIPANT',
    });
    return null;
  }
  return caller;
}

export function withStatus(order: Order) {
  return {...order, status: orderStatus(order)};
}
