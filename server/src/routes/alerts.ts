import { Router } from 'express';
import { budgetAlerts } from '../../../src/domain/alerts.js';
import type { LedgerStore } from '../ledgerStore.js';
import { parseWith, sendError } from '../http.js';
import { MonthQuerySchema } from '../schemas.js';

export function alertsRouter(store: LedgerStore): Router {
  const router = Router();

  // GET /alerts?year=2025&month=1 - Global and per-category overages
  router.get('/', (req, res) => {
    try {
      const window = parseWith(MonthQuerySchema, req.query);
      res.json({ alerts: budgetAlerts(store, window) });
    } catch (error) {
      sendError(res, error, 'Failed to compute alerts');
    }
  });

  return router;
}
