/**
 * Budget overage detection. Read-only: compares the aggregation engine's
 * figures against the configured global and per-category budgets.
 */
import { monthlyTotal, totalsByCategory, type LedgerReader } from './aggregation.js';
import { roundMoney } from './computations.js';
import type {
  BudgetAlert,
  CategoryBudgetAlert,
  GlobalBudgetAlert,
  MonthWindow,
} from './types.js';

/**
 * A budget of 0 counts as "not configured", same as null.
 * It never raises an alert, whatever the spend.
 */
export function isBudgetConfigured(budget: number | null): budget is number {
  return budget !== null && budget !== 0;
}

/** Global budget check: zero or one alert */
export function globalBudgetAlerts(ledger: LedgerReader, window: MonthWindow): GlobalBudgetAlert[] {
  const budget = ledger.getSettings().globalMonthlyBudget;
  if (!isBudgetConfigured(budget)) return [];

  const actual = monthlyTotal(ledger, window);
  if (actual <= budget) return [];

  return [{
    scope: 'global',
    budget: roundMoney(budget),
    actual: roundMoney(actual),
    delta: roundMoney(actual - budget),
  }];
}

/** Per-category checks, in category enumeration order */
export function categoryBudgetAlerts(ledger: LedgerReader, window: MonthWindow): CategoryBudgetAlert[] {
  const actualByCategory = totalsByCategory(ledger, window);
  const alerts: CategoryBudgetAlert[] = [];

  for (const category of ledger.listCategories()) {
    const budget = category.monthlyBudget;
    if (!isBudgetConfigured(budget)) continue;

    const actual = Object.hasOwn(actualByCategory, category.name) ? actualByCategory[category.name] : 0;
    if (actual > budget) {
      alerts.push({
        scope: 'category',
        category: category.name,
        budget: roundMoney(budget),
        actual: roundMoney(actual),
        delta: roundMoney(actual - budget),
      });
    }
  }
  return alerts;
}

/** All overage alerts of a window: global first, then categories */
export function budgetAlerts(ledger: LedgerReader, window: MonthWindow): BudgetAlert[] {
  return [...globalBudgetAlerts(ledger, window), ...categoryBudgetAlerts(ledger, window)];
}
