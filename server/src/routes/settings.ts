import { Router } from 'express';
import type { LedgerStore } from '../ledgerStore.js';
import { parseWith, sendError } from '../http.js';
import { SettingsUpdateSchema } from '../schemas.js';
import { settingsView } from '../views.js';

export function settingsRouter(store: LedgerStore): Router {
  const router = Router();

  // GET /settings - Created with no global budget on first read
  router.get('/', (_req, res) => {
    try {
      res.json(settingsView(store.getSettings()));
    } catch (error) {
      sendError(res, error, 'Failed to fetch settings');
    }
  });

  // PATCH /settings - global_monthly_budget: null resets the budget
  router.patch('/', (req, res) => {
    try {
      const body = parseWith(SettingsUpdateSchema, req.body);
      const settings = store.updateSettings({ globalMonthlyBudget: body.global_monthly_budget });
      res.json(settingsView(settings));
    } catch (error) {
      sendError(res, error, 'Failed to update settings');
    }
  });

  return router;
}
