import {Router} from 'express';
import {ApiContext, asyncHandler} from '../context';
import {createOrderSchema, joinOrderSchema, orderIdSchema} from '../schemas';
import {callerOf, sendNotFound, sendResult, sendValidationError, withStatus} from '../responses';

export function createOrdersRouter({ledger, distributor, executor}: ApiContext): Router {
  const router = Router();

  router.get('/', (req, res) => {
    const orders = ledger.listOrders().map(withStatus);
    res.json({success: true, count: orders.length, orders});
  });

  router.post('/', asyncHandler(async (req, res) => {
    const caller = callerOf(req, res);
    if (!caller) return;
    const body = createOrderSchema.safeParse(req.body);
    if (!body.success) return sendValidationError(res, body.error);

    const result = await executor.run(() => ledger.createOrder(caller, body.data));
    sendResult(res, result, orderId => {
      console.log(`📦 Order ${orderId} created by ${caller}`);
      res.status(201).json({success: true, orderId});
    });
  }));

  router.get('/:orderId', (req, res) => {
    const orderId = orderIdSchema.safeParse(req.params.orderId);
    if (!orderId.success) return sendValidationError(res, orderId.error);

    ledger.getOrder(orderId.data).caseOf({
      Just: order => {
        res.json({success: true, order: withStatus(order)});
      },
      Nothing: () => sendNotFound(res, `Order ${orderId.data}`),
    });
  });

  router.get('/:orderId/contributions', (req, res) => {
    const orderId = orderIdSchema.safeParse(req.params.orderId);
    if (!orderId.success) return sendValidationError(res, orderId.error);
    if (ledger.getOrder(orderId.data).isNothing()) return sendNotFound(res, `Order ${orderId.data}`);

    const contributions = ledger.getContributions(orderId.data);
    res.json({success: true, count: contributions.length, contributions});
  });

  router.post('/:orderId/join', asyncHandler(async (req, res) => {
    const caller = callerOf(req, res);
    if (!caller) return;
    const orderId = orderIdSchema.safeParse(req.params.orderId);
    if (!orderId.success) return sendValidationError(res, orderId.error);
    const body = joinOrderSchema.safeParse(req.body);
    if (!body.success) return sendValidationError(res, body.error);

    const result = await executor.run(() => ledger.joinOrder(caller, orderId.data, body.data.units));
    sendResult(res, result, contribution => {
      console.log(`🛒 ${caller} joined order ${orderId.data} with ${contribution.unitsOrdered} unit(s)`);
      res.status(201).json({success: true, contribution});
    });
  }));

  router.post('/:orderId/fulfil', asyncHandler(async (req, res) => {
    const caller = callerOf(req, res);
    if (!caller) return;
    const orderId = orderIdSchema.safeParse(req.params.orderId);
    if (!orderId.success) return sendValidationError(res, orderId.error);

    const result = await executor.run(() => ledger.executeFulfillment(caller, orderId.data));
    sendResult(res, result, receipt => {
      console.log(`✅ Order ${orderId.data} settled at ${receipt.finalPricePerUnit} per unit`);
      res.json({success: true, receipt});
    });
  }));

  router.post('/:orderId/cancel', asyncHandler(async (req, res) => {
    const caller = callerOf(req, res);
    if (!caller) return;
    const orderId = orderIdSchema.safeParse(req.params.orderId);
    if (!orderId.success) return sendValidationError(res, orderId.error);

    const result = await executor.run(() => ledger.cancelOrder(caller, orderId.data));
    sendResult(res, result, refunds => {
      console.log(`🚫 Order ${orderId.data} cancelled by ${caller}`);
      res.json({success: true, refunds});
    });
  }));

  router.get('/:orderId/rewards/:retailerId', (req, res) => {
    const orderId = orderIdSchema.safeParse(req.params.orderId);
    if (!orderId.success) return sendValidationError(res, orderId.error);
    const {retailerId} = req.params;

    distributor.getReward(orderId.data, retailerId).caseOf({
      Just: reward => {
        res.json({success: true, reward});
      },
      Nothing: () => sendNotFound(res, `Reward for ${retailerId} on order ${orderId.data}`),
    });
  });

  router.post('/:orderId/rewards/claim', asyncHandler(async (req, res) => {
    const caller = callerOf(req, res);
    if (!caller) return;
    const orderId = orderIdSchema.safeParse(req.params.orderId);
    if (!orderId.success) return sendValidationError(res, orderId.error);

    const result = await executor.run(() => distributor.claim(caller, orderId.data));
    sendResult(res, result, amount => {
      console.log(`🎁 ${caller} claimed ${amount} on order ${orderId.data}`);
      res.json({success: true, amount});
    });
  }));

  return router;
}
