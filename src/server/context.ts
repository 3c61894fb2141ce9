import {NextFunction, Request, RequestHandler, Response} from 'express';
import {OrderLedger} from '../ledger/OrderLedger';
import {RewardDistributor} from '../ledger/RewardDistributor';
import {InMemoryValueLedger} from '../effects/InMemoryValueLedger';
import {SerialExecutor} from './SerialExecutor';

export type ApiContext = {
  readonly ledger: OrderLedger;
  readonly distributor: RewardDistributor;
  readonly executor: SerialExecutor;
  readonly valueLedgers: {
    readonly payment: InMemoryValueLedger;
    readonly reward: InMemoryValueLedger;
  };
};

// express 4 does not forward rejected handler promises to the error middleware
export function asyncHandler(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}
