/**
 * Domain types for the expense ledger.
 * Pure data, no HTTP or DB.
 */

/** Reserved aggregation label for transactions without a category */
export const UNCATEGORIZED = 'Uncategorized';

/** Color given to categories created on the fly by the CSV import */
export const DEFAULT_CATEGORY_COLOR = '#505050';

export interface Category {
  id: string;
  name: string;                  // unique, case-sensitive
  color: string | null;          // #RRGGBB
  monthlyBudget: number | null;  // null = no budget configured
}

export interface CategoryInput {
  name: string;
  color?: string | null;
  monthlyBudget?: number | null;
}

export type CategoryPatch = Partial<CategoryInput>;

export interface Transaction {
  id: string;
  date: string;                  // YYYY-MM-DD
  description: string;
  amount: number;                // negative = refund
  categoryId: string | null;
  createdAt: string;             // ISO timestamp, set once at insert
}

export interface TransactionInput {
  date: string;
  description: string;
  amount: number;
  categoryId?: string | null;
}

export type TransactionPatch = Partial<TransactionInput>;

/** Global, single-record configuration */
export interface Settings {
  globalMonthlyBudget: number | null;  // null = no global budget
  updatedAt: string;
}

/** A (year, month) pair; month is 1-12 */
export interface MonthWindow {
  year: number;
  month: number;
}

/** One transaction of a window with its category resolved */
export interface LedgerEntry {
  id: string;
  date: string;
  amount: number;
  categoryId: string | null;
  categoryName: string | null;
}

export interface CategoryBreakdownEntry {
  total: number;
  percentage: number;
  count: number;
}

/** Keyed by category label; UNCATEGORIZED is the only synthetic key */
export type CategoryTotals = Record<string, number>;
export type CategoryBreakdown = Record<string, CategoryBreakdownEntry>;

export interface MonthlySummary {
  total: number;
  count: number;
  average: number;
  byCategory: CategoryBreakdown;
}

export interface GlobalBudgetAlert {
  scope: 'global';
  budget: number;
  actual: number;
  delta: number;
}

export interface CategoryBudgetAlert {
  scope: 'category';
  category: string;
  budget: number;
  actual: number;
  delta: number;
}

export type BudgetAlert = GlobalBudgetAlert | CategoryBudgetAlert;

/** Outcome of one CSV import call */
export interface ImportReport {
  inserted: number;
  skipped: number;
  errors: string[];
}
