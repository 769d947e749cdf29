import { Router } from 'express';
import { ValidationFailure } from '../../../src/domain/errors.js';
import type { LedgerStore } from '../ledgerStore.js';
import { parseWith, sendError } from '../http.js';
import {
  TransactionCreateSchema,
  TransactionListQuerySchema,
  TransactionUpdateSchema,
} from '../schemas.js';
import { transactionView } from '../views.js';

export function transactionsRouter(store: LedgerStore): Router {
  const router = Router();

  // GET /transactions - Newest first, with optional period/category/search filters
  router.get('/', (req, res) => {
    try {
      const query = parseWith(TransactionListQuerySchema, req.query);
      if (query.from_date && query.to_date && query.from_date > query.to_date) {
        throw new ValidationFailure('from_date must be on or before to_date');
      }

      const transactions = store.listTransactions({
        skip: query.skip,
        limit: query.limit,
        fromDate: query.from_date,
        toDate: query.to_date,
        categoryId: query.category_id,
        search: query.search,
      });
      res.json(transactions.map(transactionView));
    } catch (error) {
      sendError(res, error, 'Failed to fetch transactions');
    }
  });

  // GET /transactions/:id
  router.get('/:id', (req, res) => {
    try {
      res.json(transactionView(store.getTransaction(req.params.id)));
    } catch (error) {
      sendError(res, error, 'Failed to fetch transaction');
    }
  });

  // POST /transactions - Create a single transaction
  router.post('/', (req, res) => {
    try {
      const body = parseWith(TransactionCreateSchema, req.body);
      const transaction = store.createTransaction({
        date: body.date,
        description: body.description,
        amount: body.amount,
        categoryId: body.category_id,
      });
      res.status(201).json(transactionView(transaction));
    } catch (error) {
      sendError(res, error, 'Failed to create transaction');
    }
  });

  // PATCH /transactions/:id - Partial update; category_id: null detaches
  router.patch('/:id', (req, res) => {
    try {
      const body = parseWith(TransactionUpdateSchema, req.body);
      const transaction = store.updateTransaction(req.params.id, {
        date: body.date,
        description: body.description,
        amount: body.amount,
        categoryId: body.category_id,
      });
      res.json(transactionView(transaction));
    } catch (error) {
      sendError(res, error, 'Failed to update transaction');
    }
  });

  // DELETE /transactions/:id
  router.delete('/:id', (req, res) => {
    try {
      store.deleteTransaction(req.params.id);
      res.status(204).end();
    } catch (error) {
      sendError(res, error, 'Failed to delete transaction');
    }
  });

  return router;
}
