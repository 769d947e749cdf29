import express, { Router } from 'express';
import { ValidationFailure } from '../../../src/domain/errors.js';
import { importCsv } from '../../../src/import/importPipeline.js';
import type { LedgerStore } from '../ledgerStore.js';
import { sendError } from '../http.js';

export function importRouter(store: LedgerStore, maxBytes: number): Router {
  const router = Router();
  const rawBody = express.raw({ type: ['text/csv', 'text/plain', 'application/octet-stream'], limit: maxBytes });

  // POST /import/csv - Raw CSV bytes in the body; always answers with a report
  router.post('/csv', rawBody, (req, res) => {
    try {
      const body: unknown = req.body;
      if (!Buffer.isBuffer(body)) {
        throw new ValidationFailure('Expected the CSV file as the request body (Content-Type: text/csv)');
      }
      if (body.length === 0) {
        throw new ValidationFailure('The uploaded file is empty');
      }

      const report = importCsv(body, store, { now: store.now() });
      console.log(`CSV import: inserted=${report.inserted} skipped=${report.skipped}`);
      res.json(report);
    } catch (error) {
      sendError(res, error, 'Failed to import CSV');
    }
  });

  return router;
}
