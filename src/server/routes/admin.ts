import {Router} from 'express';
import {ApiContext, asyncHandler} from '../context';
import {mintSchema, rateSchema} from '../schemas';
import {callerOf, sendLedgerError, sendResult, sendValidationError} from '../responses';
import {invalidParameters, unauthorized} from '../../pure/ledgerErrors';

export function createSettingsRouter({ledger, executor}: ApiContext): Router {
  const router = Router();

  router.get('/', (req, res) => {
    res.json({success: true, settings: ledger.getSettings()});
  });

  router.put('/platform-fee', asyncHandler(async (req, res) => {
    const caller = callerOf(req, res);
    if (!caller) return;
    const body = rateSchema.safeParse(req.body);
    if (!body.success) return sendValidationError(res, body.error);

    const result = await executor.run(async () => ledger.setPlatformFee(caller, body.data.bps));
    sendResult(res, result, platformFeeBps => {
      console.log(`⚙️  Platform fee set to ${platformFeeBps} bps by ${caller}`);
      res.json({success: true, settings: ledger.getSettings()});
    });
  }));

  router.put('/reward-rate', asyncHandler(async (req, res) => {
    const caller = callerOf(req, res);
    if (!caller) return;
    const body = rateSchema.safeParse(req.body);
    if (!body.success) return sendValidationError(res, body.error);

    const result = await executor.run(async () => ledger.setRewardRate(caller, body.data.bps));
    sendResult(res, result, rewardBps => {
      console.log(`⚙️  Reward rate set to ${rewardBps} bps by ${caller}`);
      res.json({success: true, settings: ledger.getSettings()});
    });
  }));

  return router;
}

/**
 * Balances in the in-process value ledgers. Minting exists only so that a
 * standalone server can be funded; administrators only.
 */
export function createBalancesRouter({ledger, executor, valueLedgers}: ApiContext): Router {
  const router = Router();

  router.get('/:participantId', (req, res) => {
    const {participantId} = req.params;
    res.json({
      success: true,
      participantId,
      payment: valueLedgers.payment.balanceOf(participantId),
      reward: valueLedgers.reward.balanceOf(participantId),
    });
  });

  router.post('/:participantId/mint', asyncHandler(async (req, res) => {
    const caller = callerOf(req, res);
    if (!caller) return;
    if (!ledger.isAdministrator(caller)) {
      return sendLedgerError(res, unauthorized(`${caller} is not an administrator`));
    }
    const body = mintSchema.safeParse(req.body);
    if (!body.success) return sendValidationError(res, body.error);
    if (body.data.amount <= 0n) {
      return sendLedgerError(res, invalidParameters('Mint amount must be positive'));
    }

    const {participantId} = req.params;
    const target = valueLedgers[body.data.asset];
    const balance = await executor.run(async () => {
      target.mint(participantId, body.data.amount);
      return target.balanceOf(participantId);
    });
    console.log(`💰 Minted ${body.data.amount} ${body.data.asset} to ${participantId}`);
    res.status(201).json({success: true, participantId, asset: body.data.asset, balance});
  }));

  return router;
}
