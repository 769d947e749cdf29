import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import type { LedgerStore } from './ledgerStore.js';
import { sendError } from './http.js';
import { alertsRouter } from './routes/alerts.js';
import { categoriesRouter } from './routes/categories.js';
import { importRouter } from './routes/importCsv.js';
import { insightsRouter } from './routes/insights.js';
import { settingsRouter } from './routes/settings.js';
import { transactionsRouter } from './routes/transactions.js';

export const API_VERSION = '1.0.0';

export interface AppOptions {
  /** Empty allows every origin */
  allowedOrigins?: string[];
  importMaxBytes?: number;
}

export function createApp(store: LedgerStore, options: AppOptions = {}) {
  const app = express();
  const origins = options.allowedOrigins ?? [];

  app.use(cors(origins.length > 0 ? { origin: origins } : undefined));
  app.use(express.json());

  app.get('/', (_req, res) => {
    res.json({ message: 'Expense ledger API', version: API_VERSION });
  });

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({ status: 'healthy' });
  });

  const api = express.Router();
  api.use('/categories', categoriesRouter(store));
  api.use('/transactions', transactionsRouter(store));
  api.use('/settings', settingsRouter(store));
  api.use('/insights', insightsRouter(store));
  api.use('/alerts', alertsRouter(store));
  api.use('/import', importRouter(store, options.importMaxBytes ?? 5 * 1024 * 1024));
  app.use('/api', api);

  // Malformed JSON, oversized uploads and anything a route did not catch
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    sendError(res, error, 'Unexpected server error');
  });

  return app;
}
