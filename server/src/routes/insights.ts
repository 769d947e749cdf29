import { Router } from 'express';
import { categoryBreakdown, monthlySummary, monthlyTotal } from '../../../src/domain/aggregation.js';
import { roundMoney } from '../../../src/domain/computations.js';
import type { LedgerStore } from '../ledgerStore.js';
import { parseWith, sendError } from '../http.js';
import { MonthlyTotalQuerySchema, MonthQuerySchema } from '../schemas.js';
import { summaryView } from '../views.js';

export function insightsRouter(store: LedgerStore): Router {
  const router = Router();

  // GET /insights/summary?year=2025&month=1
  router.get('/summary', (req, res) => {
    try {
      const window = parseWith(MonthQuerySchema, req.query);
      res.json(summaryView(monthlySummary(store, window)));
    } catch (error) {
      sendError(res, error, 'Failed to compute summary');
    }
  });

  // GET /insights/monthly-total?year=2025&month=1[&category_id=...]
  router.get('/monthly-total', (req, res) => {
    try {
      const { year, month, category_id } = parseWith(MonthlyTotalQuerySchema, req.query);
      const total = monthlyTotal(store, { year, month }, category_id);
      res.json({ total: roundMoney(total) });
    } catch (error) {
      sendError(res, error, 'Failed to compute monthly total');
    }
  });

  // GET /insights/category-breakdown?year=2025&month=1
  router.get('/category-breakdown', (req, res) => {
    try {
      const window = parseWith(MonthQuerySchema, req.query);
      res.json(categoryBreakdown(store, window));
    } catch (error) {
      sendError(res, error, 'Failed to compute category breakdown');
    }
  });

  return router;
}
