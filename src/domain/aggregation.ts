/**
 * Aggregation engine: monthly totals, per-category breakdowns and summaries.
 *
 * Every figure is derived from the same window query (`entriesInWindow`), so the
 * category totals always add up to the monthly total.
 */
import { roundMoney, sumAmounts } from './computations.js';
import {
  UNCATEGORIZED,
  type Category,
  type CategoryBreakdown,
  type CategoryBreakdownEntry,
  type CategoryTotals,
  type LedgerEntry,
  type MonthlySummary,
  type MonthWindow,
  type Settings,
} from './types.js';

/** Read-only view of the ledger that the engines need */
export interface LedgerReader {
  /** Transactions dated inside the window, with category names resolved */
  entriesInWindow(window: MonthWindow): LedgerEntry[];
  /** All categories in store order (creation order) */
  listCategories(): Category[];
  /** The settings record, initialized on first access */
  getSettings(): Settings;
}

function labelOf(entry: LedgerEntry): string {
  return entry.categoryName ?? UNCATEGORIZED;
}

/**
 * Named labels in code-point order, UNCATEGORIZED last. Objects built from this
 * order still list integer-like labels ("9", "10") first, in numeric order.
 */
function compareLabels(a: string, b: string): number {
  if (a === b) return 0;
  if (a === UNCATEGORIZED) return 1;
  if (b === UNCATEGORIZED) return -1;
  return a < b ? -1 : 1;
}

/** Group entries by label, keeping both the sum and the row count */
function groupByLabel(entries: LedgerEntry[]): Map<string, { total: number; count: number }> {
  const groups = new Map<string, { total: number; count: number }>();
  for (const entry of entries) {
    const label = labelOf(entry);
    const group = groups.get(label) ?? { total: 0, count: 0 };
    group.total += entry.amount;
    group.count += 1;
    groups.set(label, group);
  }
  return new Map([...groups.entries()].sort(([a], [b]) => compareLabels(a, b)));
}

/**
 * Sum of amounts in the window, optionally for one category id.
 * Full precision; 0 when nothing matches.
 */
export function monthlyTotal(
  ledger: LedgerReader,
  window: MonthWindow,
  categoryId?: string,
): number {
  const entries = ledger.entriesInWindow(window);
  const matching = categoryId === undefined
    ? entries
    : entries.filter((e) => e.categoryId === categoryId);
  return sumAmounts(matching);
}

/**
 * Totals per category label. Categories without transactions in the window are
 * omitted; UNCATEGORIZED appears only when an uncategorized transaction exists.
 * Key order follows `compareLabels`.
 */
export function totalsByCategory(ledger: LedgerReader, window: MonthWindow): CategoryTotals {
  const groups = groupByLabel(ledger.entriesInWindow(window));
  return Object.fromEntries(
    [...groups].map(([label, group]): [string, number] => [label, group.total]),
  );
}

/**
 * Total, share of the window's spend and transaction count per category label.
 * Empty when the category totals sum to exactly 0, refunds cancelling out included.
 */
export function categoryBreakdown(ledger: LedgerReader, window: MonthWindow): CategoryBreakdown {
  const groups = groupByLabel(ledger.entriesInWindow(window));
  const globalSum = [...groups.values()].reduce((sum, g) => sum + g.total, 0);
  if (globalSum === 0) return {};

  return Object.fromEntries([...groups].map(([label, group]): [string, CategoryBreakdownEntry] => [label, {
    total: roundMoney(group.total),
    percentage: roundMoney((group.total / globalSum) * 100),
    count: group.count,
  }]));
}

/** Total, count, average and breakdown of one window */
export function monthlySummary(ledger: LedgerReader, window: MonthWindow): MonthlySummary {
  const total = monthlyTotal(ledger, window);
  const count = ledger.entriesInWindow(window).length;
  return {
    total: roundMoney(total),
    count,
    average: count > 0 ? roundMoney(total / count) : 0,
    byCategory: categoryBreakdown(ledger, window),
  };
}
