import { Router } from 'express';
import { LedgerController } from './controller';

export function createRouter(controller: LedgerController): Router {
  const router = Router();

  router.get('/health', (_req, res) => {
    res.status(200).json({ success: true, service: 'ledger-gateway', status: 'ok', timestamp: new Date().toISOString() });
  });

  router.get('/metrics', controller.getMetrics.bind(controller));
  router.get('/token', controller.getToken.bind(controller));
  router.get('/events', controller.getEvents.bind(controller));
  router.get('/balances/:account', controller.getBalance.bind(controller));
  router.get('/allowances/:owner/:spender', controller.getAllowance.bind(controller));
  router.get('/interfaces/:interfaceId', controller.supportsInterface.bind(controller));

  router.post('/transfer-and-call', controller.transferAndCall.bind(controller));
  router.post('/transfer-from-and-call', controller.transferFromAndCall.bind(controller));
  router.post('/approve-and-call', controller.approveAndCall.bind(controller));

  return router;
}
