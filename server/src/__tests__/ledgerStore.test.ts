import { describe, it, expect, beforeEach } from 'vitest';
import { monthlySummary, totalsByCategory } from '../../../src/domain/aggregation.js';
import { ConflictFailure, NotFoundFailure, ValidationFailure } from '../../../src/domain/errors.js';
import { openDatabase } from '../db.js';
import { LedgerStore } from '../ledgerStore.js';

describe('LedgerStore', () => {
  let clock: Date;
  let store: LedgerStore;

  beforeEach(() => {
    clock = new Date(2025, 5, 15, 12, 0);
    store = new LedgerStore(openDatabase(':memory:'), () => clock);
  });

  describe('settings', () => {
    it('initializes the record once, with no global budget', () => {
      const first = store.getSettings();
      expect(first).toEqual({ globalMonthlyBudget: null, updatedAt: clock.toISOString() });

      clock = new Date(2025, 5, 16, 9, 0);
      expect(store.getSettings()).toEqual(first);
    });

    it('refreshes updatedAt on update and can reset the budget', () => {
      store.getSettings();
      clock = new Date(2025, 5, 16, 9, 0);

      expect(store.updateSettings({ globalMonthlyBudget: 1500 })).toEqual({
        globalMonthlyBudget: 1500,
        updatedAt: clock.toISOString(),
      });
      expect(store.updateSettings({}).globalMonthlyBudget).toBe(1500);
      expect(store.updateSettings({ globalMonthlyBudget: null }).globalMonthlyBudget).toBeNull();
    });
  });

  describe('categories', () => {
    it('lists categories in creation order', () => {
      store.createCategory({ name: 'Transport' });
      store.createCategory({ name: 'Alimentation', color: '#00FF00', monthlyBudget: 400 });

      expect(store.listCategories().map((c) => [c.name, c.color, c.monthlyBudget])).toEqual([
        ['Transport', null, null],
        ['Alimentation', '#00FF00', 400],
      ]);
    });

    it('rejects a duplicate name with a conflict', () => {
      store.createCategory({ name: 'Alimentation' });
      expect(() => store.createCategory({ name: 'Alimentation' }))
        .toThrow(new ConflictFailure("A category named 'Alimentation' already exists"));
    });

    it('compares names case-sensitively', () => {
      store.createCategory({ name: 'Loisirs' });
      expect(store.createCategory({ name: 'loisirs' }).name).toBe('loisirs');
    });

    it('reserves the uncategorized label', () => {
      expect(() => store.createCategory({ name: 'Uncategorized' })).toThrow(ValidationFailure);
      const other = store.createCategory({ name: 'Divers' });
      expect(() => store.updateCategory(other.id, { name: 'Uncategorized' })).toThrow(ValidationFailure);
    });

    it('updates fields and rejects a rename onto an existing name', () => {
      const food = store.createCategory({ name: 'Alimentation', monthlyBudget: 300 });
      store.createCategory({ name: 'Transport' });

      expect(store.updateCategory(food.id, { color: '#123456' })).toEqual({
        id: food.id,
        name: 'Alimentation',
        color: '#123456',
        monthlyBudget: 300,
      });
      expect(store.updateCategory(food.id, { monthlyBudget: null }).monthlyBudget).toBeNull();
      expect(() => store.updateCategory(food.id, { name: 'Transport' })).toThrow(ConflictFailure);
      expect(store.updateCategory(food.id, { name: 'Courses' }).name).toBe('Courses');
    });

    it('reports unknown ids as not found', () => {
      expect(() => store.getCategory('nope')).toThrow(new NotFoundFailure('Category with id nope not found'));
      expect(() => store.updateCategory('nope', { name: 'X' })).toThrow(NotFoundFailure);
      expect(() => store.deleteCategory('nope')).toThrow(NotFoundFailure);
    });

    it('detaches transactions of a deleted category', () => {
      const food = store.createCategory({ name: 'Alimentation' });
      const t = store.createTransaction({ date: '2025-01-10', description: 'Marché', amount: 30, categoryId: food.id });

      store.deleteCategory(food.id);

      expect(store.getTransaction(t.id)).toMatchObject({ categoryId: null, category: null });
      expect(totalsByCategory(store, { year: 2025, month: 1 })).toEqual({ Uncategorized: 30 });
    });
  });

  describe('transactions', () => {
    it('creates a transaction with its category resolved', () => {
      const food = store.createCategory({ name: 'Alimentation', color: '#00FF00' });
      const t = store.createTransaction({
        date: '2025-01-15',
        description: 'Courses Carrefour',
        amount: 45.5,
        categoryId: food.id,
      });

      expect(t).toEqual({
        id: t.id,
        date: '2025-01-15',
        description: 'Courses Carrefour',
        amount: 45.5,
        categoryId: food.id,
        createdAt: clock.toISOString(),
        category: { id: food.id, name: 'Alimentation', color: '#00FF00' },
      });
    });

    it('accepts negative amounts as refunds', () => {
      const t = store.createTransaction({ date: '2025-01-15', description: 'Remboursement', amount: -20 });
      expect(t.amount).toBe(-20);
      expect(t.categoryId).toBeNull();
    });

    it('enforces the entity rules', () => {
      expect(() => store.createTransaction({ date: '2025-06-16', description: 'A', amount: 1 }))
        .toThrow(new ValidationFailure('date cannot be in the future'));
      expect(() => store.createTransaction({ date: '2025-06-15', description: 'A', amount: 0 }))
        .toThrow(new ValidationFailure('amount cannot be 0'));
      expect(() => store.createTransaction({ date: '2025-06-15', description: 'A', amount: 1, categoryId: 'ghost' }))
        .toThrow(new ValidationFailure('category ghost does not exist'));
    });

    it('keeps createdAt when updating', () => {
      const t = store.createTransaction({ date: '2025-01-15', description: 'Bus', amount: 2 });
      clock = new Date(2025, 5, 20, 8, 0);

      const updated = store.updateTransaction(t.id, { amount: 2.5, description: 'Bus ticket' });
      expect(updated).toMatchObject({ amount: 2.5, description: 'Bus ticket', date: '2025-01-15' });
      expect(updated.createdAt).toBe(t.createdAt);
    });

    it('detaches a transaction from its category on null', () => {
      const food = store.createCategory({ name: 'Alimentation' });
      const t = store.createTransaction({ date: '2025-01-15', description: 'Pain', amount: 2, categoryId: food.id });
      expect(store.updateTransaction(t.id, { categoryId: null }).categoryId).toBeNull();
    });

    it('rejects rule violations on update', () => {
      const t = store.createTransaction({ date: '2025-01-15', description: 'Bus', amount: 2 });
      expect(() => store.updateTransaction(t.id, { amount: 0 })).toThrow(ValidationFailure);
      expect(() => store.updateTransaction('nope', { amount: 1 }))
        .toThrow(new NotFoundFailure('Transaction with id nope not found'));
    });

    it('deletes a transaction and reports unknown ids', () => {
      const t = store.createTransaction({ date: '2025-01-15', description: 'Bus', amount: 2 });
      store.deleteTransaction(t.id);
      expect(() => store.getTransaction(t.id)).toThrow(NotFoundFailure);
      expect(() => store.deleteTransaction(t.id)).toThrow(NotFoundFailure);
    });
  });

  describe('listTransactions', () => {
    beforeEach(() => {
      const food = store.createCategory({ name: 'Alimentation' });
      store.createTransaction({ date: '2025-01-05', description: 'Courses Carrefour', amount: 45.5, categoryId: food.id });
      store.createTransaction({ date: '2025-01-20', description: 'Marché bio', amount: 20, categoryId: food.id });
      store.createTransaction({ date: '2025-02-01', description: 'Essence -10% promo', amount: 60 });
      store.createTransaction({ date: '2024-12-31', description: 'Réveillon', amount: 80 });
    });

    it('returns newest first', () => {
      expect(store.listTransactions().map((t) => t.date))
        .toEqual(['2025-02-01', '2025-01-20', '2025-01-05', '2024-12-31']);
    });

    it('filters by an inclusive date range', () => {
      expect(store.listTransactions({ fromDate: '2025-01-05', toDate: '2025-01-20' }).map((t) => t.date))
        .toEqual(['2025-01-20', '2025-01-05']);
    });

    it('filters by category', () => {
      const [food] = store.listCategories();
      expect(store.listTransactions({ categoryId: food.id })).toHaveLength(2);
    });

    it('searches descriptions case-insensitively', () => {
      expect(store.listTransactions({ search: 'carrefour' }).map((t) => t.description))
        .toEqual(['Courses Carrefour']);
    });

    it('treats LIKE wildcards in the search as literal text', () => {
      expect(store.listTransactions({ search: '%' }).map((t) => t.description))
        .toEqual(['Essence -10% promo']);
      expect(store.listTransactions({ search: '_' })).toEqual([]);
    });

    it('pages with limit and skip', () => {
      expect(store.listTransactions({ limit: 2, skip: 1 }).map((t) => t.date))
        .toEqual(['2025-01-20', '2025-01-05']);
    });
  });

  describe('entriesInWindow', () => {
    it('includes both ends of the month and nothing outside', () => {
      store.createTransaction({ date: '2024-12-31', description: 'Before', amount: 1 });
      store.createTransaction({ date: '2025-01-01', description: 'First', amount: 2 });
      store.createTransaction({ date: '2025-01-31', description: 'Last', amount: 3 });
      store.createTransaction({ date: '2025-02-01', description: 'After', amount: 4 });

      expect(store.entriesInWindow({ year: 2025, month: 1 }).map((e) => [e.date, e.amount])).toEqual([
        ['2025-01-01', 2],
        ['2025-01-31', 3],
      ]);
    });

    it('feeds a consistent monthly summary', () => {
      const food = store.createCategory({ name: 'Alimentation' });
      const transport = store.createCategory({ name: 'Transport' });
      store.createTransaction({ date: '2025-01-05', description: 'A', amount: 200, categoryId: food.id });
      store.createTransaction({ date: '2025-01-20', description: 'B', amount: 100, categoryId: food.id });
      store.createTransaction({ date: '2025-01-10', description: 'C', amount: 60, categoryId: transport.id });
      store.createTransaction({ date: '2025-01-12', description: 'D', amount: 40 });

      expect(monthlySummary(store, { year: 2025, month: 1 })).toEqual({
        total: 400,
        count: 4,
        average: 100,
        byCategory: {
          Alimentation: { total: 300, percentage: 75, count: 2 },
          Transport: { total: 60, percentage: 15, count: 1 },
          Uncategorized: { total: 40, percentage: 10, count: 1 },
        },
      });
    });
  });
});
