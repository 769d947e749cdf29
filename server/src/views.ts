/**
 * Domain → wire (snake_case) mapping for responses.
 */
import type { Category, MonthlySummary, Settings } from '../../src/domain/types.js';
import type { TransactionWithCategory } from './ledgerStore.js';

export function categoryView(category: Category) {
  return {
    id: category.id,
    name: category.name,
    color: category.color,
    monthly_budget: category.monthlyBudget,
  };
}

export function transactionView(transaction: TransactionWithCategory) {
  return {
    id: transaction.id,
    date: transaction.date,
    description: transaction.description,
    amount: transaction.amount,
    category_id: transaction.categoryId,
    created_at: transaction.createdAt,
    category: transaction.category,
  };
}

export function settingsView(settings: Settings) {
  return {
    global_monthly_budget: settings.globalMonthlyBudget,
    updated_at: settings.updatedAt,
  };
}

export function summaryView(summary: MonthlySummary) {
  return {
    total: summary.total,
    count: summary.count,
    average: summary.average,
    by_category: summary.byCategory,
  };
}
