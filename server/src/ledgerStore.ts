/**
 * SQLite-backed ledger store.
 *
 * Plain persistence plus the entity rules that guard writes (future dates,
 * zero amounts, unknown or duplicate categories). The aggregation and alert
 * engines read it through `LedgerReader`; the CSV import writes through
 * `ImportLedger`.
 */
import Database from 'better-sqlite3';
import type { LedgerReader } from '../../src/domain/aggregation.js';
import { isFutureDate, monthKey } from '../../src/domain/computations.js';
import {
  ConflictFailure,
  NotFoundFailure,
  ValidationFailure,
} from '../../src/domain/errors.js';
import type { ImportLedger, ImportSession } from '../../src/import/importPipeline.js';
import {
  UNCATEGORIZED,
  type Category,
  type CategoryInput,
  type CategoryPatch,
  type LedgerEntry,
  type MonthWindow,
  type Settings,
  type Transaction,
  type TransactionInput,
  type TransactionPatch,
} from '../../src/domain/types.js';
import { generateId, type CategoryRow, type Db, type SettingsRow, type TransactionRow } from './db.js';

export interface TransactionFilter {
  skip?: number;
  limit?: number;
  fromDate?: string;
  toDate?: string;
  categoryId?: string;
  search?: string;
}

export interface CategoryRef {
  id: string;
  name: string;
  color: string | null;
}

export interface TransactionWithCategory extends Transaction {
  category: CategoryRef | null;
}

interface TransactionJoinRow extends TransactionRow {
  category_name: string | null;
  category_color: string | null;
}

interface EntryRow {
  id: string;
  date: string;
  amount: number;
  category_id: string | null;
  category_name: string | null;
}

const TRANSACTION_SELECT = `
  SELECT t.*, c.name AS category_name, c.color AS category_color
  FROM transactions t
  LEFT JOIN categories c ON c.id = t.category_id
`;

function toCategory(row: CategoryRow): Category {
  return {
    id: row.id,
    name: row.name,
    color: row.color,
    monthlyBudget: row.monthly_budget,
  };
}

function toTransaction(row: TransactionJoinRow): TransactionWithCategory {
  return {
    id: row.id,
    date: row.date,
    description: row.description,
    amount: row.amount,
    categoryId: row.category_id,
    createdAt: row.created_at,
    category: row.category_id !== null && row.category_name !== null
      ? { id: row.category_id, name: row.category_name, color: row.category_color }
      : null,
  };
}

function toSettings(row: SettingsRow): Settings {
  return {
    globalMonthlyBudget: row.global_monthly_budget,
    updatedAt: row.updated_at,
  };
}

function isUniqueViolation(error: unknown): boolean {
  return error instanceof Database.SqliteError && error.code === 'SQLITE_CONSTRAINT_UNIQUE';
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

export class LedgerStore implements LedgerReader, ImportLedger {
  constructor(private readonly db: Db, private readonly clock: () => Date = () => new Date()) {}

  /** The store's notion of "now", used for future-date checks and timestamps */
  now(): Date {
    return this.clock();
  }

  // --- Categories ---

  listCategories(): Category[] {
    return this.db
      .prepare<[], CategoryRow>('SELECT * FROM categories ORDER BY rowid')
      .all()
      .map(toCategory);
  }

  findCategory(id: string): Category | undefined {
    const row = this.db.prepare<[string], CategoryRow>('SELECT * FROM categories WHERE id = ?').get(id);
    return row ? toCategory(row) : undefined;
  }

  getCategory(id: string): Category {
    const category = this.findCategory(id);
    if (!category) throw NotFoundFailure.of('Category', id);
    return category;
  }

  findCategoryByName(name: string): Category | undefined {
    const row = this.db
      .prepare<[string], CategoryRow>('SELECT * FROM categories WHERE name = ?')
      .get(name);
    return row ? toCategory(row) : undefined;
  }

  /** Raw insert; constraint errors surface as thrown SqliteErrors */
  insertCategory(input: CategoryInput): Category {
    const category: Category = {
      id: generateId(),
      name: input.name,
      color: input.color ?? null,
      monthlyBudget: input.monthlyBudget ?? null,
    };
    this.db
      .prepare('INSERT INTO categories (id, name, color, monthly_budget) VALUES (?, ?, ?, ?)')
      .run(category.id, category.name, category.color, category.monthlyBudget);
    return category;
  }

  createCategory(input: CategoryInput): Category {
    this.assertCategoryName(input.name);
    if (this.findCategoryByName(input.name)) {
      throw new ConflictFailure(`A category named '${input.name}' already exists`);
    }
    try {
      return this.insertCategory(input);
    } catch (error) {
      // Lost a race against a concurrent insert of the same name
      if (isUniqueViolation(error)) {
        throw new ConflictFailure(`A category named '${input.name}' already exists`);
      }
      throw error;
    }
  }

  updateCategory(id: string, patch: CategoryPatch): Category {
    const current = this.getCategory(id);
    const next: Category = {
      id,
      name: patch.name ?? current.name,
      color: patch.color !== undefined ? patch.color : current.color,
      monthlyBudget: patch.monthlyBudget !== undefined ? patch.monthlyBudget : current.monthlyBudget,
    };

    if (next.name !== current.name) {
      this.assertCategoryName(next.name);
      const clash = this.findCategoryByName(next.name);
      if (clash && clash.id !== id) {
        throw new ConflictFailure(`A category named '${next.name}' already exists`);
      }
    }

    try {
      this.db
        .prepare('UPDATE categories SET name = ?, color = ?, monthly_budget = ? WHERE id = ?')
        .run(next.name, next.color, next.monthlyBudget, id);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictFailure(`A category named '${next.name}' already exists`);
      }
      throw error;
    }
    return next;
  }

  /** Transactions of the category are detached, not deleted */
  deleteCategory(id: string): void {
    const result = this.db.prepare('DELETE FROM categories WHERE id = ?').run(id);
    if (result.changes === 0) throw NotFoundFailure.of('Category', id);
  }

  private assertCategoryName(name: string): void {
    if (name === UNCATEGORIZED) {
      throw new ValidationFailure(`'${UNCATEGORIZED}' is reserved for transactions without a category`);
    }
  }

  // --- Transactions ---

  listTransactions(filter: TransactionFilter = {}): TransactionWithCategory[] {
    const clauses: string[] = [];
    const params: (string | number)[] = [];

    if (filter.fromDate !== undefined) {
      clauses.push('t.date >= ?');
      params.push(filter.fromDate);
    }
    if (filter.toDate !== undefined) {
      clauses.push('t.date <= ?');
      params.push(filter.toDate);
    }
    if (filter.categoryId !== undefined) {
      clauses.push('t.category_id = ?');
      params.push(filter.categoryId);
    }
    if (filter.search !== undefined) {
      clauses.push(`t.description LIKE '%' || ? || '%' ESCAPE '\\'`);
      params.push(escapeLike(filter.search));
    }

    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    params.push(filter.limit ?? 100, filter.skip ?? 0);

    return this.db
      .prepare<(string | number)[], TransactionJoinRow>(`
        ${TRANSACTION_SELECT}
        ${where}
        ORDER BY t.date DESC, t.created_at DESC
        LIMIT ? OFFSET ?
      `)
      .all(...params)
      .map(toTransaction);
  }

  getTransaction(id: string): TransactionWithCategory {
    const row = this.db
      .prepare<[string], TransactionJoinRow>(`${TRANSACTION_SELECT} WHERE t.id = ?`)
      .get(id);
    if (!row) throw NotFoundFailure.of('Transaction', id);
    return toTransaction(row);
  }

  /** Raw insert; constraint errors surface as thrown SqliteErrors */
  insertTransaction(input: TransactionInput): Transaction {
    const transaction: Transaction = {
      id: generateId(),
      date: input.date,
      description: input.description,
      amount: input.amount,
      categoryId: input.categoryId ?? null,
      createdAt: this.now().toISOString(),
    };
    this.db.prepare(`
      INSERT INTO transactions (id, date, description, amount, category_id, created_at)
      VALUES (?, ?, ?, ?, ?, ?)
    `).run(
      transaction.id,
      transaction.date,
      transaction.description,
      transaction.amount,
      transaction.categoryId,
      transaction.createdAt,
    );
    return transaction;
  }

  createTransaction(input: TransactionInput): TransactionWithCategory {
    this.assertTransactionRules(input);
    const { id } = this.insertTransaction(input);
    return this.getTransaction(id);
  }

  updateTransaction(id: string, patch: TransactionPatch): TransactionWithCategory {
    const current = this.getTransaction(id);
    this.assertTransactionRules(patch);

    this.db.prepare(`
      UPDATE transactions SET date = ?, description = ?, amount = ?, category_id = ?
      WHERE id = ?
    `).run(
      patch.date ?? current.date,
      patch.description ?? current.description,
      patch.amount ?? current.amount,
      patch.categoryId !== undefined ? patch.categoryId : current.categoryId,
      id,
    );
    return this.getTransaction(id);
  }

  deleteTransaction(id: string): void {
    const result = this.db.prepare('DELETE FROM transactions WHERE id = ?').run(id);
    if (result.changes === 0) throw NotFoundFailure.of('Transaction', id);
  }

  private assertTransactionRules(input: TransactionPatch): void {
    if (input.date !== undefined && isFutureDate(input.date, this.now())) {
      throw new ValidationFailure('date cannot be in the future');
    }
    if (input.amount !== undefined && input.amount === 0) {
      throw new ValidationFailure('amount cannot be 0');
    }
    if (input.categoryId != null && !this.findCategory(input.categoryId)) {
      throw new ValidationFailure(`category ${input.categoryId} does not exist`);
    }
  }

  // --- Aggregation source ---

  entriesInWindow(window: MonthWindow): LedgerEntry[] {
    return this.db
      .prepare<[string], EntryRow>(`
        SELECT t.id, t.date, t.amount, t.category_id, c.name AS category_name
        FROM transactions t
        LEFT JOIN categories c ON c.id = t.category_id
        WHERE t.date LIKE ? || '-%'
        ORDER BY t.date ASC, t.rowid ASC
      `)
      .all(monthKey(window))
      .map((row) => ({
        id: row.id,
        date: row.date,
        amount: row.amount,
        categoryId: row.category_id,
        categoryName: row.category_name,
      }));
  }

  // --- Settings ---

  /** Get-or-initialize: the record is created once, with no budget, on first access */
  getSettings(): Settings {
    this.db
      .prepare('INSERT OR IGNORE INTO settings (id, global_monthly_budget, updated_at) VALUES (1, NULL, ?)')
      .run(this.now().toISOString());
    const row = this.db.prepare<[], SettingsRow>('SELECT * FROM settings WHERE id = 1').get();
    if (!row) throw new Error('settings record missing after initialization');
    return toSettings(row);
  }

  updateSettings(patch: { globalMonthlyBudget?: number | null }): Settings {
    const current = this.getSettings();
    const budget = patch.globalMonthlyBudget !== undefined
      ? patch.globalMonthlyBudget
      : current.globalMonthlyBudget;
    this.db
      .prepare('UPDATE settings SET global_monthly_budget = ?, updated_at = ? WHERE id = 1')
      .run(budget, this.now().toISOString());
    return this.getSettings();
  }

  // --- Import unit of work ---

  atomically<T>(work: (session: ImportSession) => T): T {
    const session: ImportSession = {
      findCategoryByName: (name) => this.findCategoryByName(name),
      createCategory: (input) => this.insertCategory(input),
      insertTransaction: (input) => this.insertTransaction(input),
      // Nested better-sqlite3 transactions run as savepoints
      savepoint: (fn) => this.db.transaction(fn)(),
    };
    return this.db.transaction(() => work(session))();
  }
}
