import express, {Express, NextFunction, Request, Response} from 'express';
import {EffectsError} from '../effects/EffectsError';
import {LedgerSystem} from '../effects/EffectsFactory';
import {ApiContext} from './context';
import {SerialExecutor} from './SerialExecutor';
import {createOrdersRouter} from './routes/orders';
import {createBalancesRouter, createSettingsRouter} from './routes/admin';

function isMalformedJson(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'type' in error && error.type === 'entity.parse.failed';
}

export function createApp(system: LedgerSystem): Express {
  const context: ApiContext = {
    ledger: system.ledger,
    distributor: system.distributor,
    executor: new SerialExecutor(),
    valueLedgers: {
      payment: system.effects.paymentLedger,
      reward: system.effects.rewardLedger,
    },
  };

  const app = express();
  app.use(express.json());
  // amounts are bigint; JSON carries them as decimal strings
  app.set('json replacer', (_key: string, value: unknown) =>
    typeof value === 'bigint' ? value.toString() : value
  );

  app.get('/health', (req, res) => {
    res.json({status: 'healthy', service: 'group-buying-ledger', ledger: system.ledger.account});
  });

  app.use('/api/orders', createOrdersRouter(context));
  app.use('/api/settings', createSettingsRouter(context));
  app.use('/api/balances', createBalancesRouter(context));

  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      return next(error);
    }
    if (isMalformedJson(error)) {
      return res.status(400).json({success: false, error: 'Malformed JSON body', code: 'VALIDATION_ERROR'});
    }
    console.error(`❌ ${req.method} ${req.path} failed:`, error);
    const code = error instanceof EffectsError ? 'EFFECTS_ERROR' : 'INTERNAL_ERROR';
    const message = error instanceof Error ? error.message : String(error);
    res.status(500).json({success: false, error: message, code});
  });

  return app;
}
