import { Router } from 'express';
import type { LedgerStore } from '../ledgerStore.js';
import { parseWith, sendError } from '../http.js';
import { CategoryCreateSchema, CategoryUpdateSchema } from '../schemas.js';
import { categoryView } from '../views.js';

export function categoriesRouter(store: LedgerStore): Router {
  const router = Router();

  // GET /categories - All categories, creation order
  router.get('/', (_req, res) => {
    try {
      res.json(store.listCategories().map(categoryView));
    } catch (error) {
      sendError(res, error, 'Failed to fetch categories');
    }
  });

  // GET /categories/:id
  router.get('/:id', (req, res) => {
    try {
      res.json(categoryView(store.getCategory(req.params.id)));
    } catch (error) {
      sendError(res, error, 'Failed to fetch category');
    }
  });

  // POST /categories - 409 when the name is taken
  router.post('/', (req, res) => {
    try {
      const body = parseWith(CategoryCreateSchema, req.body);
      const category = store.createCategory({
        name: body.name,
        color: body.color,
        monthlyBudget: body.monthly_budget,
      });
      res.status(201).json(categoryView(category));
    } catch (error) {
      sendError(res, error, 'Failed to create category');
    }
  });

  // PATCH /categories/:id - Partial update (name, color, monthly budget)
  router.patch('/:id', (req, res) => {
    try {
      const body = parseWith(CategoryUpdateSchema, req.body);
      const category = store.updateCategory(req.params.id, {
        name: body.name,
        color: body.color,
        monthlyBudget: body.monthly_budget,
      });
      res.json(categoryView(category));
    } catch (error) {
      sendError(res, error, 'Failed to update category');
    }
  });

  // DELETE /categories/:id - Its transactions become uncategorized
  router.delete('/:id', (req, res) => {
    try {
      store.deleteCategory(req.params.id);
      res.status(204).end();
    } catch (error) {
      sendError(res, error, 'Failed to delete category');
    }
  });

  return router;
}
