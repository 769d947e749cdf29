/**
 * Bulk CSV import.
 *
 *   decode → parse → validate/resolve/stage each row → commit once
 *
 * Row failures are reported and skipped. Decoding, parsing and commit failures
 * abort the batch and come back as a zeroed report carrying one error.
 */
import { isFutureDate, parseIsoDate } from '../domain/computations.js';
import { BatchFailure, messageOf } from '../domain/errors.js';
import {
  DEFAULT_CATEGORY_COLOR,
  UNCATEGORIZED,
  type Category,
  type CategoryInput,
  type ImportReport,
  type Transaction,
  type TransactionInput,
} from '../domain/types.js';
import { DECODING_ERROR, decodeFileContent, parseCsvText, type CsvRecord } from './csvParser.js';

/** Writes available while a batch is open */
export interface ImportSession {
  findCategoryByName(name: string): Category | undefined;
  createCategory(input: CategoryInput): Category;
  insertTransaction(input: TransactionInput): Transaction;
  /** Run one row's writes; if `work` throws, only those writes are undone */
  savepoint<T>(work: () => T): T;
}

/** Unit of work over the ledger store */
export interface ImportLedger {
  /** Run `work` as one atomic unit; throws when the unit cannot be committed */
  atomically<T>(work: (session: ImportSession) => T): T;
}

export interface ImportOptions {
  /** Reference clock for the future-date rule */
  now?: Date;
}

/** A row that passed validation */
export interface ValidRow {
  date: string;
  description: string;
  amount: number;
  category: string | null;
}

export type RowValidation =
  | { ok: true; row: ValidRow }
  | { ok: false; reason: string };

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function cell(record: CsvRecord, column: string): string {
  return (record[column] ?? '').trim();
}

/**
 * Check one record. Checks run in order and the first failure wins:
 * date, future date, description, amount, non-zero amount.
 */
export function validateRow(record: CsvRecord, now: Date = new Date()): RowValidation {
  const rawDate = cell(record, 'date');
  if (rawDate === '') return { ok: false, reason: 'date is required' };

  const date = parseIsoDate(rawDate);
  if (date === null) return { ok: false, reason: 'date must be in YYYY-MM-DD format' };
  if (isFutureDate(date, now)) return { ok: false, reason: 'date cannot be in the future' };

  const description = cell(record, 'description');
  if (description === '') return { ok: false, reason: 'description is required' };

  const rawAmount = cell(record, 'amount');
  if (rawAmount === '') return { ok: false, reason: 'amount is required' };

  const amount = DECIMAL_PATTERN.test(rawAmount) ? Number(rawAmount) : NaN;
  if (!Number.isFinite(amount)) {
    return { ok: false, reason: 'amount must be a number (e.g. 45.99)' };
  }
  if (amount === 0) return { ok: false, reason: 'amount cannot be 0' };

  const category = cell(record, 'category');
  return {
    ok: true,
    row: {
      date,
      description,
      amount,
      category: category === '' || category === UNCATEGORIZED ? null : category,
    },
  };
}

/** Reuse the category with that exact name, or create it with defaults */
export function resolveCategory(session: ImportSession, name: string): Category {
  return session.findCategoryByName(name) ?? session.createCategory({
    name,
    color: DEFAULT_CATEGORY_COLOR,
    monthlyBudget: null,
  });
}

function stageRows(rows: CsvRecord[], session: ImportSession, now: Date): ImportReport {
  const report: ImportReport = { inserted: 0, skipped: 0, errors: [] };

  rows.forEach((record, index) => {
    const rowNumber = index + 2; // row 1 is the header
    const validation = validateRow(record, now);
    if (!validation.ok) {
      report.skipped++;
      report.errors.push(`Row ${rowNumber}: ${validation.reason}`);
      return;
    }

    const { row } = validation;
    try {
      session.savepoint(() => {
        const category = row.category === null ? null : resolveCategory(session, row.category);
        session.insertTransaction({
          date: row.date,
          description: row.description,
          amount: row.amount,
          categoryId: category?.id ?? null,
        });
      });
      report.inserted++;
    } catch (error) {
      report.skipped++;
      report.errors.push(`Row ${rowNumber}: import failed - ${messageOf(error)}`);
    }
  });

  return report;
}

function runImport(payload: Uint8Array, ledger: ImportLedger, now: Date): ImportReport {
  const text = decodeFileContent(payload);
  if (text === null) throw new BatchFailure(DECODING_ERROR);

  const parsed = parseCsvText(text);
  if (parsed.error !== undefined) throw new BatchFailure(parsed.error);

  try {
    return ledger.atomically((session) => stageRows(parsed.rows, session, now));
  } catch (error) {
    throw new BatchFailure(`import failed: ${messageOf(error)}`);
  }
}

/**
 * Import a CSV payload (header: date,description,amount[,category]).
 * Always returns a report; batch-level failures give inserted = skipped = 0.
 */
export function importCsv(
  payload: Uint8Array,
  ledger: ImportLedger,
  options: ImportOptions = {},
): ImportReport {
  try {
    return runImport(payload, ledger, options.now ?? new Date());
  } catch (error) {
    if (error instanceof BatchFailure) {
      return { inserted: 0, skipped: 0, errors: [error.message] };
    }
    throw error;
  }
}
